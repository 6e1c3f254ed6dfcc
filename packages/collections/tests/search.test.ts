import { describe, it, expect } from "vitest";
import { eqNumber, eqScalar, Char, type Scalar } from "@setkit/std";
import { containsAny } from "../src/index.js";

describe("containsAny", () => {
  it("scans the whole collection", () => {
    expect(containsAny([4, 5, 6], 6, eqNumber)).toBe(true);
    expect(containsAny([4, 5, 6], 4, eqNumber)).toBe(true);
    expect(containsAny([4, 5, 6], 7, eqNumber)).toBe(false);
  });

  it("is false for an empty collection", () => {
    expect(containsAny([], 1, eqNumber)).toBe(false);
  });

  it("uses the supplied equality", () => {
    expect(containsAny<Scalar>(["a", 1], Char.of("a"), eqScalar)).toBe(false);
    expect(containsAny<Scalar>([Char.of("a")], Char.of("a"), eqScalar)).toBe(true);
  });
});
