export { Char, isChar } from "./char.js";
export { type Scalar, eqScalar, printableScalar, showScalar } from "./scalar.js";
