import { describe, it, expect } from "vitest";
import { printableNumber, printableString } from "@setkit/std";
import { charSum, charSumHash, bucketIndex } from "../src/index.js";

describe("charSum", () => {
  it("sums character codes", () => {
    expect(charSum("")).toBe(0);
    expect(charSum("a")).toBe(97);
    expect(charSum("ab")).toBe(195);
  });

  it("collides on anagrams", () => {
    expect(charSum("ba")).toBe(charSum("ab"));
    expect(charSum("cab")).toBe(charSum("abc"));
  });
});

describe("charSumHash", () => {
  it("hashes the printable text form", () => {
    expect(charSumHash(printableNumber).hash(12)).toBe(49 + 50);
    expect(charSumHash(printableString).hash("ab")).toBe(195);
  });
});

describe("bucketIndex", () => {
  it("reduces modulo capacity", () => {
    expect(bucketIndex(195, 10)).toBe(5);
    expect(bucketIndex(20, 10)).toBe(0);
    expect(bucketIndex(3, 4)).toBe(3);
  });

  it("normalises negative hashes", () => {
    expect(bucketIndex(-3, 10)).toBe(7);
    expect(bucketIndex(-10, 10)).toBe(0);
    expect(bucketIndex(-20, 4)).toBe(0);
  });

  it("truncates fractional hashes", () => {
    expect(bucketIndex(1.5, 10)).toBe(1);
    expect(bucketIndex(0.5, 10)).toBe(0);
    expect(bucketIndex(-1.5, 10)).toBe(9);
  });

  it("sends NaN and infinities to bucket 0", () => {
    expect(bucketIndex(NaN, 10)).toBe(0);
    expect(bucketIndex(Infinity, 10)).toBe(0);
    expect(bucketIndex(-Infinity, 10)).toBe(0);
  });
});
