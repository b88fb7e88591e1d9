/**
 * @smartnumber/latex
 *
 * Composable LaTeX and plain-text expression builders.
 *
 * @example
 * ```typescript
 * import { latex, text } from "@smartnumber/latex";
 *
 * latex("\\frac{1}{2}").plus(text("x")).wrap("\\left(", "\\right)").render();
 * // "\\left(\\frac{1}{2} + x\\right)"
 * ```
 */

export {
  TextFragment,
  text,
  isFragment,
  renderOperand,
  type Fragment,
  type Operand,
} from "./fragment.js";

export {
  LATEX_OPERATORS,
  HUMAN_OPERATORS,
  composeOperator,
  wrapText,
  latexFraction,
  type OperatorSet,
} from "./toolkit.js";

export { MathBuilder, type Delimiters } from "./builder.js";
export { LatexBuilder, latex } from "./latex-builder.js";
export { HumanStringBuilder, humanString } from "./human-string-builder.js";
