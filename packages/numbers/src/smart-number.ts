/**
 * SmartNumber
 *
 * Easy-to-use value object for interpreting numbers typed by people. It keeps:
 *
 * - the original input
 * - the canonical exact value (integer, decimal or fraction)
 * - lazily computed views: integer, decimal expansion with adjustable
 *   accuracy, fraction, human-readable string and LaTeX
 *
 * Construction either yields a fully parsed instance or throws. Every derived
 * view is computed at most once per instance and the same object is returned
 * on later calls.
 *
 * @example
 * ```typescript
 * const n = new SmartNumber(null, "2.500");
 * n.toHumanString();   // "2.5"
 * n.asFraction();      // Fraction 5/2
 *
 * new SmartNumber(null, "---6").asInteger();        // -6n
 * new SmartNumber(null, "6/8").asFraction().toString(); // "6/8"
 * new SmartNumber(null, "6/8").toLatex().render();      // "\\frac{3}{4}"
 * ```
 */

import { Decimal } from "decimal.js";
import type { Fragment, HumanStringBuilder, LatexBuilder } from "@smartnumber/latex";
import { toBigDecimal } from "./bignum.js";
import {
  formatDecimal,
  signum,
  toRationalParts,
  type CanonicalNumber,
  type RationalParts,
} from "./canonical.js";
import { PrecisionOverflowError, RoundingNecessaryError } from "./errors.js";
import { humanStringBuilder, latex } from "./format.js";
import { Fraction } from "./fraction.js";
import { normalizeInput } from "./normalize.js";
import { parseLiteral } from "./parse.js";
import { reducer } from "./reduce.js";
import { roundToInteger, type RoundingMode } from "./rounding.js";
import { getNumberSettings } from "./settings.js";

/**
 * Memoized derived views. Each slot is written once.
 */
interface DerivedViewCache {
  float?: number;
  decimal?: Decimal;
  fraction?: Fraction;
  fractionSimplified?: Fraction;
  rational?: RationalParts;
  rationalSimplified?: RationalParts;
  humanString?: HumanStringBuilder;
  latex?: LatexBuilder;
}

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

export class SmartNumber implements Fragment {
  /** Fractional digits of decimal expansions */
  readonly accuracy: number;
  /** The text exactly as given */
  readonly input: string;
  /** The text after normalization, as it was parsed */
  readonly normalizedInput: string;
  readonly value: CanonicalNumber;

  private readonly cache: DerivedViewCache = {};

  /**
   * @param accuracy - fractional digits of decimal expansions; `null` or
   *   `undefined` takes the configured default (100)
   * @param input - `123`, `-12.5`, `1.5e3`, `5/8`, `1 000`, `--6`, …
   * @throws RangeError if accuracy is not a non-negative integer
   * @throws InvalidInputError | DivisionByZeroError | PrecisionOverflowError
   */
  constructor(accuracy: number | null | undefined, input: string) {
    const resolved = accuracy ?? getNumberSettings().accuracy;
    if (!Number.isSafeInteger(resolved) || resolved < 0) {
      throw new RangeError(`SmartNumber: accuracy must be a non-negative integer, got ${resolved}`);
    }

    this.accuracy = resolved;
    this.input = input;
    this.normalizedInput = normalizeInput(input);
    this.value = parseLiteral(this.normalizedInput, resolved);
  }

  static of(input: string, accuracy?: number): SmartNumber {
    return new SmartNumber(accuracy, input);
  }

  // ==========================================================================
  // Integer views
  // ==========================================================================

  asInteger(mode: RoundingMode = "FLOOR"): bigint {
    return roundToInteger(this.value, mode);
  }

  /**
   * Rounded value as a JavaScript number.
   *
   * @throws PrecisionOverflowError beyond ±Number.MAX_SAFE_INTEGER
   */
  asSafeInteger(mode: RoundingMode = "FLOOR"): number {
    const integer = this.asInteger(mode);
    if (integer > MAX_SAFE || integer < -MAX_SAFE) {
      throw new PrecisionOverflowError(integer.toString(), "a safe integer");
    }
    return Number(integer);
  }

  asAbsoluteInteger(mode: RoundingMode = "FLOOR"): bigint {
    const integer = this.asInteger(mode);
    return integer < 0n ? -integer : integer;
  }

  // ==========================================================================
  // Decimal views
  // ==========================================================================

  /**
   * Decimal expansion truncated to `accuracy` fractional digits.
   */
  asDecimal(): Decimal {
    return (this.cache.decimal ??= toBigDecimal(this.value, this.accuracy));
  }

  /**
   * Nearest double to the exact value, independent of `accuracy`.
   * WARNING: only an approximation. Use {@link asDecimal} for exact work.
   */
  asFloat(): number {
    return (this.cache.float ??= this.toFloat());
  }

  private toFloat(): number {
    const { numerator, denominator } = toRationalParts(this.value);
    return new Decimal(numerator.toString()).div(denominator.toString()).toNumber();
  }

  // ==========================================================================
  // Fraction views
  // ==========================================================================

  /**
   * Numerator/denominator view, e.g. `2.5` → `[5, 2]`.
   *
   * @param simplify - reduce to lowest terms; when omitted, an explicit
   *   fraction input keeps its written form and everything else is reduced
   */
  asFraction(simplify?: boolean | null): Fraction {
    if (this.shouldSimplify(simplify)) {
      return (this.cache.fractionSimplified ??= Fraction.of(this.asRational(true)));
    }
    return (this.cache.fraction ??= Fraction.of(this.asRational(false)));
  }

  /**
   * Same as {@link asFraction} as a plain numerator/denominator record.
   */
  asRational(simplify?: boolean | null): RationalParts {
    if (this.shouldSimplify(simplify)) {
      return (this.cache.rationalSimplified ??= Object.freeze(this.simplified()));
    }
    return (this.cache.rational ??= Object.freeze(toRationalParts(this.value)));
  }

  private shouldSimplify(simplify: boolean | null | undefined): boolean {
    return simplify ?? this.value.kind !== "rational";
  }

  private simplified(): RationalParts {
    switch (this.value.kind) {
      case "integer":
        return { numerator: this.value.value, denominator: 1n };
      case "decimal": {
        const { numerator, denominator } = reducer.approximateReduce(
          formatDecimal(this.value.unscaled, this.value.scale)
        );
        return { numerator, denominator };
      }
      case "rational":
        return reducer.exactReduce(this.value.numerator, this.value.denominator);
    }
  }

  // ==========================================================================
  // Predicates
  // ==========================================================================

  /**
   * True when rounding with `UNNECESSARY` discards nothing.
   */
  isInteger(): boolean {
    try {
      roundToInteger(this.value, "UNNECESSARY");
      return true;
    } catch (error) {
      if (error instanceof RoundingNecessaryError) {
        return false;
      }
      throw error;
    }
  }

  isFloat(): boolean {
    return !this.isInteger();
  }

  isZero(): boolean {
    return signum(this.value) === 0;
  }

  isPositive(): boolean {
    return signum(this.value) > 0;
  }

  isNegative(): boolean {
    return signum(this.value) < 0;
  }

  // ==========================================================================
  // Rendering
  // ==========================================================================

  toHumanStringBuilder(): HumanStringBuilder {
    return (this.cache.humanString ??= humanStringBuilder(this.value, this.reducedForDisplay()));
  }

  /**
   * Human readable form, itself valid input: `3/4`, `2.5`, `-6`.
   */
  toHumanString(): string {
    return this.toHumanStringBuilder().render();
  }

  toLatex(): LatexBuilder {
    return (this.cache.latex ??= latex(this.value, this.reducedForDisplay()));
  }

  private reducedForDisplay(): RationalParts | undefined {
    return this.value.kind === "rational" ? this.asRational(true) : undefined;
  }

  /**
   * Lets an instance be used directly as a builder operand. Renders the human
   * string; pass {@link toLatex} for `\frac` markup.
   */
  render(): string {
    return this.toHumanString();
  }

  toString(): string {
    return this.toHumanString();
  }

  toJSON(): string {
    return this.toHumanString();
  }
}
