/**
 * DynamicSet<A>: a resizable set backed by a hash table with separate
 * chaining, using Eq<A> for membership and Printable<A> for hashing.
 *
 * Growth doubles the bucket array and rehashes everything. The `*Update`
 * algebra operations instead rebuild into an array sized exactly to the
 * surviving count, which may be 0; an empty table answers lookups without
 * hashing and grows back to the default capacity on the next add.
 */

import { config, debugLog, SetkitError } from "@setkit/core";
import { showFromPrintable, type Eq, type Hash, type Printable, type Show } from "@setkit/std";
import {
  allocateBuckets,
  appendToBucket,
  chainValues,
  collectValues,
  findNode,
  insertIntoBucket,
  unlinkFromBucket,
  type Bucket,
} from "./chain.js";
import { bucketIndex, charSumHash } from "./hashing.js";
import { containsAny } from "./search.js";

const LOG_SCOPE = "dynamic-set";

export interface DynamicSetOptions<A> {
  /** Equality used for membership, both in the table and in algebra arguments */
  readonly eq: Eq<A>;
  /** Deterministic text form; the default hash sums its character codes */
  readonly printable: Printable<A>;
  /** Element rendering for describe(); defaults to the printable text */
  readonly show?: Show<A>;
  /** Replaces the character-sum hash */
  readonly hash?: Hash<A>;
  /** Initial bucket count; defaults to config `defaultCapacity` */
  readonly capacity?: number;
}

export class DynamicSet<A> {
  private readonly _eq: Eq<A>;
  private readonly _hash: Hash<A>;
  private readonly _show: Show<A>;
  private readonly _defaultCapacity: number;
  private _buckets: Bucket<A>[];
  private _capacity: number;
  private _size = 0;

  constructor(options: DynamicSetOptions<A>, values: Iterable<A> = []) {
    this._eq = options.eq;
    this._hash = options.hash ?? charSumHash(options.printable);
    this._show = options.show ?? showFromPrintable(options.printable);
    this._defaultCapacity = config.get("defaultCapacity");

    const capacity = options.capacity ?? this._defaultCapacity;
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new SetkitError(
        "invalid_capacity",
        `DynamicSet capacity must be a non-negative integer, got ${capacity}`
      );
    }
    this._capacity = capacity;
    this._buckets = allocateBuckets<A>(capacity);

    for (const value of values) this.add(value);
  }

  /** Current length of the bucket array. */
  get capacity(): number {
    return this._capacity;
  }

  /** Number of live values, O(1). */
  length(): number {
    return this._size;
  }

  private indexOf(value: A): number {
    return bucketIndex(this._hash.hash(value), this._capacity);
  }

  // ==========================================================================
  // Core mutators
  // ==========================================================================

  /**
   * Add `value`. An equal value already present is replaced by `value`
   * without changing the count.
   */
  add(value: A): this {
    if (this._capacity > 0) {
      const existing = findNode(this._buckets[this.indexOf(value)], value, this._eq);
      if (existing) {
        existing.value = value;
        return this;
      }
    }
    if (this._size + 1 >= this._capacity) {
      this.grow();
    }
    appendToBucket(this._buckets, this.indexOf(value), value);
    this._size++;
    return this;
  }

  /** Remove the value equal to `value`; absent values are ignored. */
  remove(value: A): this {
    if (this._capacity === 0) return this;
    if (unlinkFromBucket(this._buckets, this.indexOf(value), value, this._eq)) {
      this._size--;
    }
    return this;
  }

  contains(value: A): boolean {
    if (this._capacity === 0) return false;
    return findNode(this._buckets[this.indexOf(value)], value, this._eq) !== undefined;
  }

  /** Snapshot of every value, in bucket order and then chain order. */
  enumerate(): A[] {
    return collectValues(this._buckets);
  }

  /** Snapshot of each bucket's chain, indexed by bucket. */
  chains(): A[][] {
    return this._buckets.map((head) => chainValues(head));
  }

  /** Drop every value and return to the default capacity. */
  clear(): this {
    this.rebuild([], this._defaultCapacity);
    return this;
  }

  // ==========================================================================
  // Set algebra
  // ==========================================================================

  unionUpdate(...values: A[]): this {
    for (const value of values) this.add(value);
    return this;
  }

  /**
   * The supplied values as given (not deduplicated among themselves),
   * followed by every current value not among them. Length is
   * `length() + values.length - shared`.
   */
  union(...values: A[]): A[] {
    const missing = this.enumerate().filter((v) => !containsAny(values, v, this._eq));
    return [...values, ...missing];
  }

  /** Keep only values equal to some supplied value. */
  intersectionUpdate(...values: A[]): this {
    const survivors = this.intersection(...values);
    this.rebuild(survivors, survivors.length);
    debugLog(LOG_SCOPE, `rebuilt for intersection: ${survivors.length} values, capacity ${this._capacity}`);
    return this;
  }

  /** Current values equal to some supplied value, in enumeration order. */
  intersection(...values: A[]): A[] {
    return this.enumerate().filter((v) => containsAny(values, v, this._eq));
  }

  /** Drop every value equal to some supplied value. */
  differenceUpdate(...values: A[]): this {
    const survivors = this.difference(...values);
    this.rebuild(survivors, survivors.length);
    debugLog(LOG_SCOPE, `rebuilt for difference: ${survivors.length} values, capacity ${this._capacity}`);
    return this;
  }

  /** Current values not equal to any supplied value, in enumeration order. */
  difference(...values: A[]): A[] {
    return this.enumerate().filter((v) => !containsAny(values, v, this._eq));
  }

  // ==========================================================================
  // Storage
  // ==========================================================================

  private grow(): void {
    let capacity = this._capacity === 0 ? this._defaultCapacity : this._capacity * 2;
    // The pending insert must still leave a free slot
    while (capacity <= this._size + 1) capacity *= 2;
    debugLog(LOG_SCOPE, `grew capacity ${this._capacity} -> ${capacity} (${this._size} values)`);
    this.rebuild(this.enumerate(), capacity);
  }

  /**
   * Rehash `values` into a fresh array of `capacity` buckets, then swap it in.
   * The current array is not touched until the new one is complete.
   */
  private rebuild(values: readonly A[], capacity: number): void {
    const buckets = allocateBuckets<A>(capacity);
    let size = 0;
    if (capacity > 0) {
      for (const value of values) {
        const index = bucketIndex(this._hash.hash(value), capacity);
        if (insertIntoBucket(buckets, index, value, this._eq)) size++;
      }
    }
    this._buckets = buckets;
    this._capacity = capacity;
    this._size = size;
  }

  // ==========================================================================
  // Display & iteration
  // ==========================================================================

  /** `{e1, e2, ...}` in enumeration order, each element rendered by Show. */
  describe(): string {
    return `{${this.enumerate()
      .map((v) => this._show.show(v))
      .join(", ")}}`;
  }

  toString(): string {
    return this.describe();
  }

  *[Symbol.iterator](): IterableIterator<A> {
    yield* this.enumerate();
  }

  values(): IterableIterator<A> {
    return this[Symbol.iterator]();
  }
}
