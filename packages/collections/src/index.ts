// Data structures
export { DynamicSet, type DynamicSetOptions } from "./dynamic-set.js";
export { scalarSet, scalarSetInstances, type ScalarSetOptions } from "./scalar-set.js";

// Hashing and storage helpers
export { charSum, charSumHash, bucketIndex } from "./hashing.js";
export { containsAny } from "./search.js";

