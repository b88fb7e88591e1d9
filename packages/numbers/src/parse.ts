/**
 * Literal Parser
 *
 * Classifies normalized text and builds its canonical value. The grammars
 * overlap loosely (`1e5` also starts like a plain decimal), so classification
 * runs an explicit, ordered list of whole-string classifiers and the first
 * match wins:
 *
 * 1. `direct`    : `[+-]?` digits with at most one decimal point: `12`, `-0.5`, `.5`
 * 2. `scientific`: `<decimal>(e|E)<decimal>`: `1.5e3`, `2E-0.5`
 * 3. `fraction`  : `<decimal> / <decimal>`, blanks allowed around the slash: `6/8`, `1.5 / 2`
 *
 * Text that still starts with a run of signs is collapsed by parity and
 * parsed again; anything else is rejected with {@link InvalidInputError}.
 */

import { Decimal } from "decimal.js";
import { createLogger } from "@smartnumber/core";
import {
  decimalContext,
  decimalParts,
  GUARD_DIGITS,
  MAX_EVALUATION_PRECISION,
} from "./bignum.js";
import {
  absBigInt,
  compactDecimal,
  decimalValue,
  digitCount,
  formatDecimal,
  integerValue,
  pow10,
  rationalValue,
  type CanonicalNumber,
  type DecimalValue,
  type IntegerValue,
} from "./canonical.js";
import {
  DivisionByZeroError,
  InvalidInputError,
  NumberError,
  PrecisionOverflowError,
} from "./errors.js";
import { collapseSignRun, SIGN_RUN } from "./normalize.js";
import { getNumberSettings, type NumberSettings } from "./settings.js";

const log = createLogger("parse");

/** Largest whole exponent applied; 10^n beyond it exceeds the engine's bigint size. */
const MAX_EXPONENT_SHIFT = 300_000_000n;

const DECIMAL = String.raw`[+-]?(?:\d+(?:\.\d*)?|\.\d+)`;

export type LiteralKind = "direct" | "scientific" | "fraction";

interface ParseContext {
  readonly accuracy: number;
  readonly settings: NumberSettings;
}

/**
 * One grammar: a whole-string pattern and the builder for its matches.
 */
export interface LiteralClassifier {
  readonly kind: LiteralKind;
  readonly pattern: RegExp;
  build(match: RegExpExecArray, context: ParseContext): CanonicalNumber;
}

export type ParseResult =
  | { readonly ok: true; readonly value: CanonicalNumber; readonly kind: LiteralKind }
  | { readonly ok: false; readonly error: NumberError };

/**
 * Digits of a decimal literal as unscaled value and scale.
 *
 * @example
 * decimalLiteralParts("-1.50"); // { unscaled: -150n, scale: 2 }
 */
export function decimalLiteralParts(literal: string): { unscaled: bigint; scale: number } {
  const negative = literal.startsWith("-");
  const body = /^[+-]/.test(literal) ? literal.slice(1) : literal;
  const [integerPart, fractionPart = ""] = body.split(".");
  const magnitude = BigInt(integerPart + fractionPart || "0");
  return { unscaled: negative ? -magnitude : magnitude, scale: fractionPart.length };
}

function group(match: RegExpExecArray, name: string): string {
  const value = match.groups?.[name];
  if (value === undefined) {
    throw new InvalidInputError(match.input);
  }
  return value;
}

const direct: LiteralClassifier = {
  kind: "direct",
  pattern: new RegExp(`^${DECIMAL}$`),
  build(match) {
    const { unscaled, scale } = decimalLiteralParts(match[0]);
    return scale === 0 ? integerValue(unscaled) : decimalValue(unscaled, scale);
  },
};

/**
 * Truncate unscaled × 10^(-scale) toward zero to at most `digits` fractional digits.
 */
function truncateDecimal(unscaled: bigint, scale: number, digits: number): IntegerValue | DecimalValue {
  if (scale <= digits) {
    return compactDecimal(unscaled, scale);
  }
  return compactDecimal(unscaled / pow10(scale - digits), digits);
}

const scientific: LiteralClassifier = {
  kind: "scientific",
  pattern: new RegExp(`^(?<mantissa>${DECIMAL})[eE](?<exponent>${DECIMAL})$`),
  build(match, { accuracy, settings }) {
    const mantissa = group(match, "mantissa");
    const exponent = group(match, "exponent");
    const exp = decimalLiteralParts(exponent);
    const { unscaled, scale } = decimalLiteralParts(mantissa);

    // Split the exponent into whole + fractional with 0 ≤ fractional < 1.
    const unit = pow10(exp.scale);
    let whole = exp.unscaled / unit;
    if (whole * unit > exp.unscaled) whole -= 1n;
    const fractional = exp.unscaled - whole * unit;

    if (absBigInt(whole) > MAX_EXPONENT_SHIFT) {
      throw new PrecisionOverflowError(match.input, `a bigint of at most ${MAX_EXPONENT_SHIFT} digits`);
    }
    const shift = Number(whole);

    // Integral exponent: shift the scale, exactly.
    if (fractional === 0n) {
      return compactDecimal(unscaled, scale - shift);
    }

    if (new Decimal(exponent).abs().gt(settings.maxExponent)) {
      throw new PrecisionOverflowError(
        match.input,
        `a number with an exponent of magnitude at most ${settings.maxExponent}`
      );
    }

    // Fractional exponent: mantissa × 10^fractional, then the whole part as a shift.
    const fractionDigits = Math.max(0, accuracy + shift);
    const integerDigits = Math.max(1, digitCount(unscaled) - scale + 1);
    const D = decimalContext(
      Math.min(integerDigits + fractionDigits + GUARD_DIGITS, MAX_EVALUATION_PRECISION),
      Decimal.ROUND_DOWN
    );
    const significand = new D(mantissa)
      .times(new D(10).pow(formatDecimal(fractional, exp.scale)))
      .toDecimalPlaces(fractionDigits, Decimal.ROUND_DOWN);
    const parts = decimalParts(significand);
    return truncateDecimal(parts.unscaled, parts.scale - shift, accuracy);
  },
};

const fraction: LiteralClassifier = {
  kind: "fraction",
  pattern: new RegExp(`^(?<numerator>${DECIMAL})\\s*/\\s*(?<denominator>${DECIMAL})$`),
  build(match) {
    const numeratorText = group(match, "numerator");
    const denominatorText = group(match, "denominator");
    const x = decimalLiteralParts(numeratorText);
    const y = decimalLiteralParts(denominatorText);

    if (y.unscaled === 0n) {
      throw new DivisionByZeroError(numeratorText, denominatorText);
    }

    // Scale both sides to integers; no decimal intermediate.
    const scale = Math.max(x.scale, y.scale);
    return rationalValue(x.unscaled * pow10(scale - x.scale), y.unscaled * pow10(scale - y.scale));
  },
};

/**
 * The grammars, in priority order.
 */
export const LITERAL_CLASSIFIERS: readonly LiteralClassifier[] = [direct, scientific, fraction];

function classify(
  text: string,
  context: ParseContext
): { value: CanonicalNumber; kind: LiteralKind } {
  for (const classifier of LITERAL_CLASSIFIERS) {
    const match = classifier.pattern.exec(text);
    if (match) {
      log.debug(`"${text}" classified as ${classifier.kind}`);
      return { value: classifier.build(match, context), kind: classifier.kind };
    }
  }

  const run = SIGN_RUN.exec(text);
  if (run) {
    return classify(collapseSignRun(run[1]) + run[2], context);
  }

  throw new InvalidInputError(text);
}

function contextFor(accuracy: number | undefined): ParseContext {
  const settings = getNumberSettings();
  return { accuracy: accuracy ?? settings.accuracy, settings };
}

/**
 * Parse normalized text into its canonical value.
 *
 * @param accuracy - fractional digits kept when a fractional exponent is
 *   evaluated (default: configured `accuracy`)
 * @throws InvalidInputError when no grammar matches
 * @throws DivisionByZeroError for a zero fraction denominator
 * @throws PrecisionOverflowError for an exponent beyond `scientific.maxExponent`
 */
export function parseLiteral(text: string, accuracy?: number): CanonicalNumber {
  return classify(text, contextFor(accuracy)).value;
}

/**
 * Non-throwing variant of {@link parseLiteral}.
 */
export function tryParseLiteral(text: string, accuracy?: number): ParseResult {
  try {
    const { value, kind } = classify(text, contextFor(accuracy));
    return { ok: true, value, kind };
  } catch (error) {
    if (error instanceof NumberError) {
      return { ok: false, error };
    }
    throw error;
  }
}
