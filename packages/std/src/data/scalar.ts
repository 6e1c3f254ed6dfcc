/**
 * Scalar: the heterogeneous value type of a mixed set.
 *
 * Instances:
 * - eqScalar        Chars compare by character, everything else by Object.is
 * - printableScalar String(value); the text form the default hash sums over
 * - showScalar      'c' for Char, "text" for string (unescaped), bare for the rest
 */

import type { Eq, Printable, Show } from "../typeclasses/index.js";
import { Char } from "./char.js";

export type Scalar = number | bigint | boolean | string | Char;

export const eqScalar: Eq<Scalar> = {
  equals: (a, b) => scalarEquals(a, b),
  notEquals: (a, b) => !scalarEquals(a, b),
};

function scalarEquals(a: Scalar, b: Scalar): boolean {
  if (a instanceof Char) return b instanceof Char && a.equals(b);
  // NaN equals NaN; 0 and -0 stay distinct
  return Object.is(a, b);
}

export const printableScalar: Printable<Scalar> = {
  display: (a) => String(a),
};

export const showScalar: Show<Scalar> = {
  show: (a) => {
    if (a instanceof Char) return `'${a.value}'`;
    if (typeof a === "string") return `"${a}"`;
    return String(a);
  },
};
