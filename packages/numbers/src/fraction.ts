import type { RationalParts } from "./canonical.js";

/**
 * Immutable numerator/denominator pair that can also be read by index.
 *
 * @example
 * ```typescript
 * const f = new Fraction(5n, 2n);
 * f[0];             // 5n
 * const [n, d] = f; // destructuring
 * String(f);        // "5/2"
 * ```
 */
export class Fraction implements RationalParts, Iterable<bigint> {
  readonly 0: bigint;
  readonly 1: bigint;
  readonly length = 2;

  constructor(
    readonly numerator: bigint,
    readonly denominator: bigint
  ) {
    this[0] = numerator;
    this[1] = denominator;
    Object.freeze(this);
  }

  static of(parts: RationalParts): Fraction {
    return new Fraction(parts.numerator, parts.denominator);
  }

  *[Symbol.iterator](): Iterator<bigint> {
    yield this.numerator;
    yield this.denominator;
  }

  toArray(): [bigint, bigint] {
    return [this.numerator, this.denominator];
  }

  /**
   * Same numerator and denominator (not numeric equality: 2/4 ≠ 1/2 here).
   */
  equals(other: RationalParts): boolean {
    return this.numerator === other.numerator && this.denominator === other.denominator;
  }

  toString(): string {
    return `${this.numerator}/${this.denominator}`;
  }
}
