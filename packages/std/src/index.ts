/**
 * @setkit/std: Standard Library
 *
 * Typeclasses describing what a collection needs from its elements, with
 * instances for the primitive types.
 *
 * ## Typeclasses
 *
 * - Eq, Hash, Printable, Show
 *
 * ## Data Types
 *
 * - Char (a single code point, distinct from a one-letter string)
 * - Scalar (number | bigint | boolean | string | Char) with Eq / Printable / Show instances
 *
 * @example
 * ```ts
 * import { Char, eqScalar, showScalar } from "@setkit/std";
 *
 * eqScalar.equals(Char.of("a"), "a"); // false
 * showScalar.show(Char.of("a"));      // 'a'
 * showScalar.show("ab");              // "ab"
 * ```
 */

// Typeclasses
export * from "./typeclasses/index.js";

// Data types
export * from "./data/index.js";
