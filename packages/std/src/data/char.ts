/**
 * Char: a single character value.
 *
 * JavaScript has no character type, so a lone code point is wrapped to keep
 * it distinct from a one-letter string: `Char.of("a")` and `"a"` print the
 * same but are not equal, and they are shown with different quotes.
 */

import { SetkitError } from "@setkit/core";

export class Char {
  private constructor(readonly value: string) {}

  /**
   * Wrap exactly one code point.
   * @throws SetkitError (`invalid_char`) for empty or longer input
   */
  static of(value: string): Char {
    const codePoints = Array.from(value);
    if (codePoints.length !== 1) {
      throw new SetkitError(
        "invalid_char",
        `Char.of expects exactly one character, got ${JSON.stringify(value)}`
      );
    }
    return new Char(value);
  }

  equals(other: Char): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}

export function isChar(value: unknown): value is Char {
  return value instanceof Char;
}
