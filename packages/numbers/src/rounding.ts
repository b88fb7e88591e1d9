/**
 * Integer rounding
 *
 * The rounding decision is delegated to decimal.js. Because any fraction
 * rounds the same way as long as its position relative to one half is
 * preserved, the value is replaced by an exact proxy `q.25`, `q.5` or `q.75`
 * (q = truncated quotient) before rounding, so arbitrarily long fractions
 * never pass through a limited precision.
 */

import { Decimal } from "decimal.js";
import {
  absBigInt,
  canonicalToString,
  toRationalParts,
  type CanonicalNumber,
} from "./canonical.js";
import { RoundingNecessaryError } from "./errors.js";

export type RoundingMode =
  | "UP"
  | "DOWN"
  | "CEILING"
  | "FLOOR"
  | "HALF_UP"
  | "HALF_DOWN"
  | "HALF_EVEN"
  | "HALF_CEILING"
  | "HALF_FLOOR"
  | "UNNECESSARY";

const DECIMAL_ROUNDING: Record<Exclude<RoundingMode, "UNNECESSARY">, Decimal.Rounding> = {
  UP: Decimal.ROUND_UP,
  DOWN: Decimal.ROUND_DOWN,
  CEILING: Decimal.ROUND_CEIL,
  FLOOR: Decimal.ROUND_FLOOR,
  HALF_UP: Decimal.ROUND_HALF_UP,
  HALF_DOWN: Decimal.ROUND_HALF_DOWN,
  HALF_EVEN: Decimal.ROUND_HALF_EVEN,
  HALF_CEILING: Decimal.ROUND_HALF_CEIL,
  HALF_FLOOR: Decimal.ROUND_HALF_FLOOR,
};

export const ROUNDING_MODES: readonly RoundingMode[] = [
  "UP",
  "DOWN",
  "CEILING",
  "FLOOR",
  "HALF_UP",
  "HALF_DOWN",
  "HALF_EVEN",
  "HALF_CEILING",
  "HALF_FLOOR",
  "UNNECESSARY",
];

/**
 * Round a canonical value to an integer.
 *
 * @throws RoundingNecessaryError for `UNNECESSARY` when the value has a
 *   non-zero fractional part
 *
 * @example
 * roundToInteger(decimalValue(-25n, 1), "HALF_EVEN"); // -2n
 */
export function roundToInteger(value: CanonicalNumber, mode: RoundingMode = "FLOOR"): bigint {
  const { numerator, denominator } = toRationalParts(value);
  const quotient = numerator / denominator;
  const remainder = numerator % denominator;

  if (remainder === 0n) {
    return quotient;
  }
  if (mode === "UNNECESSARY") {
    throw new RoundingNecessaryError(canonicalToString(value));
  }

  const twice = 2n * absBigInt(remainder);
  const tail = twice < denominator ? "25" : twice > denominator ? "75" : "5";
  const sign = numerator < 0n ? "-" : "";
  const proxy = new Decimal(`${sign}${absBigInt(quotient)}.${tail}`);

  return BigInt(proxy.toDecimalPlaces(0, DECIMAL_ROUNDING[mode]).toFixed(0));
}
