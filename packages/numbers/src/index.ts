/**
 * @smartnumber/numbers
 *
 * Parse numbers as people write them and derive exact views from them.
 *
 * @example
 * ```typescript
 * import { SmartNumber } from "@smartnumber/numbers";
 *
 * const n = SmartNumber.of("1 000.50");
 * n.toHumanString();            // "1000.5"
 * n.asFraction().toString();    // "2001/2"
 * n.asInteger("HALF_UP");       // 1001n
 * ```
 */

// Canonical values
export {
  integerValue,
  decimalValue,
  rationalValue,
  compactDecimal,
  toRationalParts,
  signum,
  formatDecimal,
  canonicalToString,
  type IntegerValue,
  type DecimalValue,
  type RationalValue,
  type CanonicalNumber,
  type RationalParts,
} from "./canonical.js";

// Errors
export {
  NumberError,
  InvalidInputError,
  DivisionByZeroError,
  PrecisionOverflowError,
  RoundingNecessaryError,
} from "./errors.js";

// Settings
export { getNumberSettings, type NumberSettings } from "./settings.js";

// decimal.js bridge
export { toBigDecimal, fromBigDecimal } from "./bignum.js";

// Pipeline
export { normalizeInput, collapseSignRun, stripTrailingZeros } from "./normalize.js";
export {
  parseLiteral,
  tryParseLiteral,
  decimalLiteralParts,
  LITERAL_CLASSIFIERS,
  type LiteralClassifier,
  type LiteralKind,
  type ParseResult,
} from "./parse.js";
export { sieve, primeTable } from "./primes.js";
export {
  exactReduce,
  approximateReduce,
  reducer,
  type Approximation,
  type ApproximationOptions,
  type RationalReducer,
} from "./reduce.js";
export { roundToInteger, ROUNDING_MODES, type RoundingMode } from "./rounding.js";

// Views
export { Fraction } from "./fraction.js";
export {
  humanString as formatHumanString,
  humanStringBuilder as formatHumanStringBuilder,
  latex as formatLatex,
} from "./format.js";
export { SmartNumber } from "./smart-number.js";
