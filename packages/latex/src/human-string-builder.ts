import { MathBuilder, type Delimiters } from "./builder.js";
import { renderOperand, type Operand } from "./fragment.js";
import { HUMAN_OPERATORS, type OperatorSet } from "./toolkit.js";

/**
 * Plain-text counterpart of {@link LatexBuilder}, producing strings that are
 * themselves valid number input (`3/4`, `-2.5`).
 */
export class HumanStringBuilder extends MathBuilder<HumanStringBuilder> {
  constructor(content: Operand = "", delimiters?: Delimiters) {
    super(renderOperand(content), delimiters);
  }

  protected get operators(): OperatorSet {
    return HUMAN_OPERATORS;
  }

  protected derive(body: string): HumanStringBuilder {
    return new HumanStringBuilder(body, this.delimiters);
  }
}

export function humanString(content: Operand = "", delimiters?: Delimiters): HumanStringBuilder {
  return new HumanStringBuilder(content, delimiters);
}
