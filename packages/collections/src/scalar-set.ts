import { eqScalar, printableScalar, showScalar, type Scalar } from "@setkit/std";
import { DynamicSet, type DynamicSetOptions } from "./dynamic-set.js";

/** Options a scalar set still accepts; the capabilities are fixed. */
export type ScalarSetOptions = Omit<DynamicSetOptions<Scalar>, "eq" | "printable" | "show">;

export const scalarSetInstances: DynamicSetOptions<Scalar> = {
  eq: eqScalar,
  printable: printableScalar,
  show: showScalar,
};

/**
 * A DynamicSet of mixed numbers, bigints, booleans, strings and Chars,
 * described with chars single-quoted and strings double-quoted.
 *
 * @example
 * ```ts
 * scalarSet([1, "ab", Char.of("c")]).describe(); // {1, "ab", 'c'} in bucket order
 * ```
 */
export function scalarSet(values: Iterable<Scalar> = [], options: ScalarSetOptions = {}): DynamicSet<Scalar> {
  return new DynamicSet<Scalar>({ ...scalarSetInstances, ...options }, values);
}
