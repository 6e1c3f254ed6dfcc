import { describe, it, expect } from "vitest";
import { eqBy, eqNumber } from "@setkit/std";
import {
  allocateBuckets,
  appendToBucket,
  chainValues,
  collectValues,
  findNode,
  insertIntoBucket,
  unlinkFromBucket,
} from "../src/chain.js";

describe("bucket storage", () => {
  it("allocates empty buckets", () => {
    const buckets = allocateBuckets<number>(3);
    expect(buckets).toHaveLength(3);
    expect(buckets.every((b) => b === undefined)).toBe(true);
  });

  it("inserts at the chain tail and reports new nodes", () => {
    const buckets = allocateBuckets<number>(2);
    expect(insertIntoBucket(buckets, 1, 10, eqNumber)).toBe(true);
    expect(insertIntoBucket(buckets, 1, 20, eqNumber)).toBe(true);
    expect(insertIntoBucket(buckets, 1, 10, eqNumber)).toBe(false);
    expect(chainValues(buckets[1])).toEqual([10, 20]);
    expect(chainValues(buckets[0])).toEqual([]);
  });

  it("overwrites an equal value in place", () => {
    interface Item {
      id: number;
      label: string;
    }
    const eqItem = eqBy((i: Item) => i.id, eqNumber);
    const buckets = allocateBuckets<Item>(1);
    insertIntoBucket(buckets, 0, { id: 1, label: "first" }, eqItem);
    insertIntoBucket(buckets, 0, { id: 2, label: "second" }, eqItem);
    insertIntoBucket(buckets, 0, { id: 1, label: "refreshed" }, eqItem);
    expect(chainValues(buckets[0]).map((i) => i.label)).toEqual(["refreshed", "second"]);
  });

  it("appends without an equality check", () => {
    const buckets = allocateBuckets<number>(1);
    appendToBucket(buckets, 0, 1);
    appendToBucket(buckets, 0, 2);
    appendToBucket(buckets, 0, 3);
    expect(chainValues(buckets[0])).toEqual([1, 2, 3]);
  });

  it("finds nodes by equality", () => {
    const buckets = allocateBuckets<number>(1);
    appendToBucket(buckets, 0, 1);
    appendToBucket(buckets, 0, 2);
    expect(findNode(buckets[0], 2, eqNumber)?.value).toBe(2);
    expect(findNode(buckets[0], 3, eqNumber)).toBeUndefined();
  });

  describe("unlinkFromBucket", () => {
    function chainOf(...values: number[]) {
      const buckets = allocateBuckets<number>(1);
      for (const v of values) appendToBucket(buckets, 0, v);
      return buckets;
    }

    it("unlinks the head", () => {
      const buckets = chainOf(1, 2, 3);
      expect(unlinkFromBucket(buckets, 0, 1, eqNumber)).toBe(true);
      expect(chainValues(buckets[0])).toEqual([2, 3]);
    });

    it("unlinks a middle node", () => {
      const buckets = chainOf(1, 2, 3);
      expect(unlinkFromBucket(buckets, 0, 2, eqNumber)).toBe(true);
      expect(chainValues(buckets[0])).toEqual([1, 3]);
    });

    it("unlinks the tail", () => {
      const buckets = chainOf(1, 2, 3);
      expect(unlinkFromBucket(buckets, 0, 3, eqNumber)).toBe(true);
      expect(chainValues(buckets[0])).toEqual([1, 2]);
    });

    it("ignores absent values and empty buckets", () => {
      const buckets = chainOf(1, 2);
      expect(unlinkFromBucket(buckets, 0, 9, eqNumber)).toBe(false);
      expect(chainValues(buckets[0])).toEqual([1, 2]);
      expect(unlinkFromBucket(allocateBuckets<number>(1), 0, 1, eqNumber)).toBe(false);
    });

    it("empties a single-node bucket", () => {
      const buckets = chainOf(5);
      unlinkFromBucket(buckets, 0, 5, eqNumber);
      expect(buckets[0]).toBeUndefined();
    });
  });

  it("collects values in bucket order, then chain order", () => {
    const buckets = allocateBuckets<number>(3);
    appendToBucket(buckets, 2, 7);
    appendToBucket(buckets, 0, 4);
    appendToBucket(buckets, 2, 8);
    appendToBucket(buckets, 0, 5);
    expect(collectValues(buckets)).toEqual([4, 5, 7, 8]);
  });
});
