/**
 * Text fragments
 *
 * Anything that renders to a piece of text can take part in an expression:
 * plain text wrappers, LaTeX builders and human-string builders all
 * implement {@link Fragment}, so any of them may appear as the right-hand
 * operand of an operator.
 */

/**
 * Capability: renders to a textual fragment.
 */
export interface Fragment {
  render(): string;
}

/**
 * Anything accepted as an operand. Primitives are rendered with `String()`.
 */
export type Operand = Fragment | string | number | bigint;

/**
 * Plain text operand.
 */
export class TextFragment implements Fragment {
  constructor(readonly text: string) {}

  render(): string {
    return this.text;
  }

  toString(): string {
    return this.text;
  }
}

/**
 * Wrap a value as a plain text fragment.
 */
export function text(value: string | number | bigint): TextFragment {
  return new TextFragment(String(value));
}

export function isFragment(value: unknown): value is Fragment {
  return (
    typeof value === "object" &&
    value !== null &&
    "render" in value &&
    typeof value.render === "function"
  );
}

/**
 * Render an operand to its text.
 */
export function renderOperand(operand: Operand): string {
  return isFragment(operand) ? operand.render() : String(operand);
}
