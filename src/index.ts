/**
 * smartnumber
 *
 * Umbrella package for the smartnumber libraries:
 *
 * - `@smartnumber/core`: configuration and logging
 * - `@smartnumber/latex`: LaTeX and plain-text expression builders
 * - `@smartnumber/numbers`: parsing, reduction and the SmartNumber value object
 *
 * @example
 * ```typescript
 * import { SmartNumber, latex } from "smartnumber";
 *
 * const x = SmartNumber.of("6/8");
 * latex("x").equals(x.toLatex()).render(); // "x = \\frac{3}{4}"
 * ```
 */

export * from "@smartnumber/core";
export * from "@smartnumber/latex";
export * from "@smartnumber/numbers";
