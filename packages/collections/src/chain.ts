/**
 * Bucket/chain storage.
 *
 * A bucket array holds the head of each singly linked chain. Chains keep
 * insertion order within their bucket. Nodes never leave this module's
 * callers: DynamicSet hands out values, not nodes.
 */

import type { Eq } from "@setkit/std";

export interface ChainNode<A> {
  value: A;
  next: ChainNode<A> | undefined;
}

export type Bucket<A> = ChainNode<A> | undefined;

export function allocateBuckets<A>(capacity: number): Bucket<A>[] {
  return new Array<Bucket<A>>(capacity).fill(undefined);
}

/** First node in the chain holding a value equal to `value`. */
export function findNode<A>(head: Bucket<A>, value: A, eq: Eq<A>): ChainNode<A> | undefined {
  for (let node = head; node !== undefined; node = node.next) {
    if (eq.equals(node.value, value)) return node;
  }
  return undefined;
}

/** Append a node for a value known to be absent from the chain. */
export function appendToBucket<A>(buckets: Bucket<A>[], index: number, value: A): void {
  const node: ChainNode<A> = { value, next: undefined };
  let tail = buckets[index];
  if (tail === undefined) {
    buckets[index] = node;
    return;
  }
  while (tail.next !== undefined) tail = tail.next;
  tail.next = node;
}

/**
 * Insert `value` into `buckets[index]`: an equal value already in the chain
 * is overwritten in place, otherwise a node is appended at the tail.
 *
 * @returns true when a node was appended
 */
export function insertIntoBucket<A>(buckets: Bucket<A>[], index: number, value: A, eq: Eq<A>): boolean {
  let node = buckets[index];
  if (node === undefined) {
    buckets[index] = { value, next: undefined };
    return true;
  }
  for (;;) {
    if (eq.equals(node.value, value)) {
      node.value = value;
      return false;
    }
    if (node.next === undefined) {
      node.next = { value, next: undefined };
      return true;
    }
    node = node.next;
  }
}

/**
 * Unlink the first node equal to `value` from `buckets[index]`.
 *
 * @returns true when a node was removed
 */
export function unlinkFromBucket<A>(buckets: Bucket<A>[], index: number, value: A, eq: Eq<A>): boolean {
  const head = buckets[index];
  if (head === undefined) return false;
  if (eq.equals(head.value, value)) {
    buckets[index] = head.next;
    return true;
  }
  // Look one node ahead so the predecessor can be relinked
  let prev = head;
  while (prev.next !== undefined) {
    const next = prev.next;
    if (eq.equals(next.value, value)) {
      prev.next = next.next;
      return true;
    }
    prev = next;
  }
  return false;
}

/** Values of one chain, head to tail. */
export function chainValues<A>(head: Bucket<A>): A[] {
  const values: A[] = [];
  for (let node = head; node !== undefined; node = node.next) {
    values.push(node.value);
  }
  return values;
}

/** Every value in bucket-index order, then chain order. */
export function collectValues<A>(buckets: readonly Bucket<A>[]): A[] {
  const values: A[] = [];
  for (const head of buckets) {
    for (let node = head; node !== undefined; node = node.next) {
      values.push(node.value);
    }
  }
  return values;
}
