/**
 * Operator tables and string helpers shared by the builders.
 */

import { renderOperand, type Operand } from "./fragment.js";

/**
 * Symbols used for the five composable operators.
 */
export interface OperatorSet {
  readonly plus: string;
  readonly minus: string;
  readonly multiply: string;
  readonly divide: string;
  readonly equals: string;
}

export const LATEX_OPERATORS = {
  plus: "+",
  minus: "-",
  multiply: "\\cdot",
  divide: "\\div",
  equals: "=",
} as const satisfies OperatorSet;

export const HUMAN_OPERATORS = {
  plus: "+",
  minus: "-",
  multiply: "*",
  divide: "/",
  equals: "=",
} as const satisfies OperatorSet;

/**
 * Append `symbol right` to `left`. No parentheses are inserted.
 *
 * @example
 * composeOperator("1", "2", "+"); // "1 + 2"
 */
export function composeOperator(left: string, right: Operand, symbol: string): string {
  return `${left} ${symbol} ${renderOperand(right)}`;
}

/**
 * Surround text with delimiters; `right` defaults to `left`.
 */
export function wrapText(content: string, left: string, right: string = left): string {
  return `${left}${content}${right}`;
}

/**
 * `\frac{n}{d}`, with the sign of a negative numerator pulled in front.
 *
 * @example
 * latexFraction(-3n, 4n); // "-\\frac{3}{4}"
 */
export function latexFraction(numerator: bigint | string, denominator: bigint | string): string {
  const num = String(numerator);
  if (num.startsWith("-")) {
    return `-\\frac{${num.slice(1)}}{${denominator}}`;
  }
  return `\\frac{${num}}{${denominator}}`;
}
