/**
 * Canonical Numbers
 *
 * The single normalized form stored for a parsed input. Values are exact:
 *
 * - `integer`:  value
 * - `decimal`:  unscaled × 10^(-scale), scale ≥ 0
 * - `rational`: numerator / denominator, denominator > 0, not necessarily reduced
 *
 * @example
 * ```typescript
 * decimalValue(25n, 1);     // 2.5
 * rationalValue(6n, -8n);   // { numerator: -6n, denominator: 8n }
 * ```
 */

import { DivisionByZeroError } from "./errors.js";

export interface IntegerValue {
  readonly kind: "integer";
  readonly value: bigint;
}

export interface DecimalValue {
  readonly kind: "decimal";
  readonly unscaled: bigint;
  readonly scale: number;
}

export interface RationalValue {
  readonly kind: "rational";
  readonly numerator: bigint;
  readonly denominator: bigint;
}

export type CanonicalNumber = IntegerValue | DecimalValue | RationalValue;

/**
 * A numerator/denominator pair with a positive denominator.
 */
export interface RationalParts {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

export function absBigInt(x: bigint): bigint {
  return x < 0n ? -x : x;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

/** 10^exponent for a non-negative exponent. */
export function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

/** Number of decimal digits of |x|. */
export function digitCount(x: bigint): number {
  return absBigInt(x).toString().length;
}

export function integerValue(value: bigint): IntegerValue {
  return Object.freeze({ kind: "integer", value });
}

export function decimalValue(unscaled: bigint, scale: number): DecimalValue {
  if (!Number.isSafeInteger(scale) || scale < 0) {
    throw new RangeError(`Decimal scale must be a non-negative integer, got ${scale}`);
  }
  return Object.freeze({ kind: "decimal", unscaled, scale });
}

/**
 * Build a rational with the sign carried by the numerator. The pair is not
 * reduced.
 *
 * @throws DivisionByZeroError if the denominator is zero
 */
export function rationalValue(numerator: bigint, denominator: bigint): RationalValue {
  if (denominator === 0n) {
    throw new DivisionByZeroError(numerator.toString(), "0");
  }
  const flip = denominator < 0n;
  return Object.freeze({
    kind: "rational",
    numerator: flip ? -numerator : numerator,
    denominator: flip ? -denominator : denominator,
  });
}

/**
 * Integer when the scale collapses to zero, decimal with trailing fractional
 * zeros dropped otherwise. A negative scale is folded into the unscaled value.
 */
export function compactDecimal(unscaled: bigint, scale: number): IntegerValue | DecimalValue {
  if (scale <= 0) {
    return integerValue(unscaled * pow10(-scale));
  }
  let u = unscaled;
  let s = scale;
  while (s > 0 && u % 10n === 0n) {
    u /= 10n;
    s--;
  }
  return s === 0 ? integerValue(u) : decimalValue(u, s);
}

/**
 * Exact numerator/denominator view without any reduction.
 *
 * `2.50` (unscaled 250, scale 2) gives 250/100.
 */
export function toRationalParts(value: CanonicalNumber): RationalParts {
  switch (value.kind) {
    case "integer":
      return { numerator: value.value, denominator: 1n };
    case "decimal":
      return { numerator: value.unscaled, denominator: pow10(value.scale) };
    case "rational":
      return { numerator: value.numerator, denominator: value.denominator };
  }
}

/**
 * Exact sign of the value.
 */
export function signum(value: CanonicalNumber): -1 | 0 | 1 {
  const { numerator } = toRationalParts(value);
  return numerator < 0n ? -1 : numerator > 0n ? 1 : 0;
}

/**
 * Plain decimal notation of unscaled × 10^(-scale), trailing fractional zeros
 * stripped.
 *
 * @example
 * formatDecimal(-2500n, 3); // "-2.5"
 * formatDecimal(5n, 3);     // "0.005"
 */
export function formatDecimal(unscaled: bigint, scale: number): string {
  const digits = absBigInt(unscaled).toString().padStart(scale + 1, "0");
  const integerPart = digits.slice(0, digits.length - scale);
  const fractionPart = digits.slice(digits.length - scale).replace(/0+$/, "");
  const body = fractionPart.length > 0 ? `${integerPart}.${fractionPart}` : integerPart;
  return unscaled < 0n ? `-${body}` : body;
}

/**
 * Debug-friendly text of a canonical value.
 */
export function canonicalToString(value: CanonicalNumber): string {
  switch (value.kind) {
    case "integer":
      return value.value.toString();
    case "decimal":
      return formatDecimal(value.unscaled, value.scale);
    case "rational":
      return `${value.numerator}/${value.denominator}`;
  }
}
