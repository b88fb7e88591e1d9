/**
 * Bridge between canonical values and decimal.js.
 *
 * decimal.js carries the operations that need a working precision: powers
 * with fractional exponents, division expansions, rounding decisions and
 * float conversion. Integers and fractions stay on native bigint.
 */

import { Decimal } from "decimal.js";
import {
  compactDecimal,
  digitCount,
  formatDecimal,
  type CanonicalNumber,
  type DecimalValue,
  type IntegerValue,
} from "./canonical.js";

/** Extra significant digits carried through intermediate results. */
export const GUARD_DIGITS = 10;

/**
 * Largest working precision for powers with fractional exponents. decimal.js
 * evaluates those through ln(10), which it only knows to about 1025 digits.
 */
export const MAX_EVALUATION_PRECISION = 900;

/**
 * A Decimal constructor working at `precision` significant digits.
 */
export function decimalContext(
  precision: number,
  rounding: Decimal.Rounding = Decimal.ROUND_HALF_UP
): Decimal.Constructor {
  return Decimal.clone({ precision: Math.max(1, precision), rounding });
}

/**
 * Unscaled digits and scale of a finite Decimal.
 */
export function decimalParts(value: Decimal): { unscaled: bigint; scale: number } {
  const fixed = value.toFixed();
  const negative = fixed.startsWith("-");
  const [integerPart, fractionPart = ""] = (negative ? fixed.slice(1) : fixed).split(".");
  const magnitude = BigInt(integerPart + fractionPart);
  return { unscaled: negative ? -magnitude : magnitude, scale: fractionPart.length };
}

/**
 * Canonical integer or decimal equal to a finite Decimal.
 */
export function fromBigDecimal(value: Decimal): IntegerValue | DecimalValue {
  const { unscaled, scale } = decimalParts(value);
  return compactDecimal(unscaled, scale);
}

/**
 * Decimal expansion of a canonical value truncated toward zero to
 * `fractionDigits` digits. Integers and short decimals are exact.
 */
export function toBigDecimal(value: CanonicalNumber, fractionDigits: number): Decimal {
  switch (value.kind) {
    case "integer":
      return new Decimal(value.value.toString());
    case "decimal":
      return new Decimal(formatDecimal(value.unscaled, value.scale)).toDecimalPlaces(
        fractionDigits,
        Decimal.ROUND_DOWN
      );
    case "rational": {
      const integerDigits = Math.max(1, digitCount(value.numerator) - digitCount(value.denominator) + 1);
      const D = decimalContext(integerDigits + fractionDigits + GUARD_DIGITS, Decimal.ROUND_DOWN);
      return new D(value.numerator.toString())
        .div(value.denominator.toString())
        .toDecimalPlaces(fractionDigits, Decimal.ROUND_DOWN);
    }
  }
}
