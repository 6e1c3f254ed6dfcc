/**
 * Hashing layer: value → bucket index.
 */

import type { Hash, Printable } from "@setkit/std";

/**
 * Sum of the UTF-16 code units of `text`.
 *
 * Only the multiset of characters matters, so anagrams ("ab", "ba") always
 * collide. That is the default hash of a DynamicSet; pass a different
 * Hash<A> to opt out.
 */
export function charSum(text: string): number {
  let sum = 0;
  for (let i = 0; i < text.length; i++) {
    sum += text.charCodeAt(i);
  }
  return sum;
}

/** Hash<A> summing the character codes of each value's text form. */
export function charSumHash<A>(P: Printable<A>): Hash<A> {
  return {
    hash: (a) => charSum(P.display(a)),
  };
}

/**
 * Reduce a hash into `[0, capacity)`. Callers guard capacity 0.
 * Fractions are truncated; NaN and infinities land in bucket 0.
 */
export function bucketIndex(hash: number, capacity: number): number {
  const whole = Number.isFinite(hash) ? Math.trunc(hash) : 0;
  return ((whole % capacity) + capacity) % capacity;
}
