/**
 * Standard Typeclasses
 *
 * The capability set a setkit collection asks of its element type:
 * - Eq       : equality (Haskell Eq, Rust PartialEq)
 * - Hash     : integer hash (Rust Hash, Swift Hashable)
 * - Printable: deterministic text form (Rust Display)
 * - Show     : display form for describing a collection (Haskell Show)
 *
 * Instances are plain objects, passed explicitly to the collections that
 * need them.
 */

// ============================================================================
// Eq: Haskell Eq, Rust PartialEq/Eq, Scala CanEqual
// Types supporting equality comparison.
// ============================================================================

/**
 * Eq typeclass - equality comparison.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

export const eqNumber: Eq<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

export const eqBigInt: Eq<bigint> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

export const eqString: Eq<string> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

export const eqBoolean: Eq<boolean> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

/**
 * Create an Eq instance from a custom equality function.
 */
export function makeEq<A>(eq: (a: A, b: A) => boolean): Eq<A> {
  return {
    equals: eq,
    notEquals: (a, b) => !eq(a, b),
  };
}

/**
 * Eq by mapping to a comparable value.
 */
export function eqBy<A, B>(f: (a: A) => B, E: Eq<B> = eqStrict()): Eq<A> {
  return {
    equals: (a, b) => E.equals(f(a), f(b)),
    notEquals: (a, b) => E.notEquals(f(a), f(b)),
  };
}

/**
 * Eq using strict equality (===).
 */
export function eqStrict<A>(): Eq<A> {
  return {
    equals: (a, b) => a === b,
    notEquals: (a, b) => a !== b,
  };
}

// ============================================================================
// Hash: Rust Hash, Swift Hashable
// Integer hash consistent with Eq: equals(a, b) => hash(a) === hash(b).
// ============================================================================

export interface Hash<A> {
  hash(a: A): number;
}

/**
 * Hash by mapping to a hashable value.
 */
export function hashBy<A, B>(f: (a: A) => B, H: Hash<B>): Hash<A> {
  return {
    hash: (a) => H.hash(f(a)),
  };
}

// ============================================================================
// Printable: Rust Display
// Deterministic text form. Equal values must print identically.
// ============================================================================

export interface Printable<A> {
  display(a: A): string;
}

export const printableNumber: Printable<number> = {
  display: (a) => String(a),
};

export const printableString: Printable<string> = {
  display: (a) => a,
};

export const printableBoolean: Printable<boolean> = {
  display: (a) => (a ? "true" : "false"),
};

export const printableBigInt: Printable<bigint> = {
  display: (a) => String(a),
};

// ============================================================================
// Show: Haskell Show
// Programmer-facing representation: strings are quoted, numbers are not.
// ============================================================================

export interface Show<A> {
  readonly show: (a: A) => string;
}

/**
 * Show for strings (with quotes)
 */
export const showString: Show<string> = {
  show: (s) => JSON.stringify(s),
};

export const showNumber: Show<number> = {
  show: (n) => String(n),
};

export const showBoolean: Show<boolean> = {
  show: (b) => String(b),
};

/**
 * Show for bigints. Printed without the `n` suffix so mixed scalar sets
 * read the same as plain numbers.
 */
export const showBigInt: Show<bigint> = {
  show: (n) => String(n),
};

/**
 * Show that falls back to a Printable's text form.
 */
export function showFromPrintable<A>(P: Printable<A>): Show<A> {
  return {
    show: (a) => P.display(a),
  };
}
