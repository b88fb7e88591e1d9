/**
 * Display forms of a canonical value.
 *
 * Precedence: a rational shows its reduced fraction when the reduced
 * denominator is not 1, and its integer otherwise; an integer shows its
 * digits; a decimal shows its exact digits with trailing fractional zeros
 * dropped, so normalized decimal input round-trips unchanged.
 *
 * @example
 * ```typescript
 * humanString(rationalValue(6n, 8n));  // "3/4"
 * latex(rationalValue(-6n, 8n)).render(); // "-\\frac{3}{4}"
 * humanString(decimalValue(250n, 2));  // "2.5"
 * ```
 */

import {
  HumanStringBuilder,
  LatexBuilder,
  latexFraction,
} from "@smartnumber/latex";
import { formatDecimal, type CanonicalNumber, type RationalParts } from "./canonical.js";
import { reducer } from "./reduce.js";

function render(
  value: CanonicalNumber,
  reduced: RationalParts | undefined,
  fraction: (numerator: bigint, denominator: bigint) => string
): string {
  switch (value.kind) {
    case "integer":
      return value.value.toString();
    case "decimal":
      return formatDecimal(value.unscaled, value.scale);
    case "rational": {
      const { numerator, denominator } =
        reduced ?? reducer.exactReduce(value.numerator, value.denominator);
      return denominator === 1n ? numerator.toString() : fraction(numerator, denominator);
    }
  }
}

/**
 * @param reduced - the value's already reduced fraction, when the caller has it
 */
export function humanStringBuilder(
  value: CanonicalNumber,
  reduced?: RationalParts
): HumanStringBuilder {
  return new HumanStringBuilder(render(value, reduced, (n, d) => `${n}/${d}`));
}

export function humanString(value: CanonicalNumber, reduced?: RationalParts): string {
  return humanStringBuilder(value, reduced).render();
}

/**
 * @param reduced - the value's already reduced fraction, when the caller has it
 */
export function latex(value: CanonicalNumber, reduced?: RationalParts): LatexBuilder {
  return new LatexBuilder(render(value, reduced, latexFraction));
}
