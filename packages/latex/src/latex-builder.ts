import { MathBuilder, type Delimiters } from "./builder.js";
import { renderOperand, type Operand } from "./fragment.js";
import { LATEX_OPERATORS, latexFraction, type OperatorSet } from "./toolkit.js";

/**
 * LaTeX expression builder.
 *
 * @example
 * ```typescript
 * latex("\\frac{1}{2}").plus("3").equals("\\frac{7}{2}").render();
 * // "\\frac{1}{2} + 3 = \\frac{7}{2}"
 *
 * latex("x", { left: "$", right: "$" }).render(); // "$x$"
 * ```
 */
export class LatexBuilder extends MathBuilder<LatexBuilder> {
  constructor(latex: Operand = "", delimiters?: Delimiters) {
    super(renderOperand(latex), delimiters);
  }

  protected get operators(): OperatorSet {
    return LATEX_OPERATORS;
  }

  protected derive(body: string): LatexBuilder {
    return new LatexBuilder(body, this.delimiters);
  }

  /**
   * Builder for `\frac{numerator}{denominator}`.
   */
  static fraction(numerator: bigint | string, denominator: bigint | string): LatexBuilder {
    return new LatexBuilder(latexFraction(numerator, denominator));
  }
}

export function latex(content: Operand = "", delimiters?: Delimiters): LatexBuilder {
  return new LatexBuilder(content, delimiters);
}
