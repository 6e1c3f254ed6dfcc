import type { Eq } from "@setkit/std";

/**
 * Linear scan of `collection` for a value equal to `value`.
 *
 * The set-algebra operations test membership in their argument lists with
 * this, so each algebra call costs O(n·m). Argument lists are not hashed.
 */
export function containsAny<A>(collection: readonly A[], value: A, eq: Eq<A>): boolean {
  for (let i = 0; i < collection.length; i++) {
    if (eq.equals(collection[i], value)) return true;
  }
  return false;
}
