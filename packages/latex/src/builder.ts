/**
 * Expression builders
 *
 * A builder holds a body of text and grows it one operator at a time:
 *
 * ```typescript
 * latex("1").plus("2").multipliedBy(x).render(); // "1 + 2 \\cdot x"
 * ```
 *
 * Composition is purely syntactic and left-associative: no precedence-aware
 * parenthesization happens, callers use {@link MathBuilder.wrap} where they
 * need grouping. Builders are immutable; every operator returns a new one.
 */

import type { Fragment, Operand } from "./fragment.js";
import { composeOperator, wrapText, type OperatorSet } from "./toolkit.js";

/**
 * Outer delimiters applied when rendering (e.g. `$` … `$`).
 */
export interface Delimiters {
  readonly left: string;
  readonly right: string;
}

export abstract class MathBuilder<Self extends MathBuilder<Self>> implements Fragment {
  protected constructor(
    readonly body: string,
    readonly delimiters?: Delimiters
  ) {}

  /** Operator symbols of this notation. */
  protected abstract get operators(): OperatorSet;

  /** New builder of the same notation and delimiters around `body`. */
  protected abstract derive(body: string): Self;

  plus(other: Operand): Self {
    return this.operator(this.operators.plus, other);
  }

  minus(other: Operand): Self {
    return this.operator(this.operators.minus, other);
  }

  multipliedBy(other: Operand): Self {
    return this.operator(this.operators.multiply, other);
  }

  dividedBy(other: Operand): Self {
    return this.operator(this.operators.divide, other);
  }

  equals(other: Operand): Self {
    return this.operator(this.operators.equals, other);
  }

  operator(symbol: string, other: Operand): Self {
    return this.derive(composeOperator(this.body, other, symbol));
  }

  wrap(left: string, right: string = left): Self {
    return this.derive(wrapText(this.body, left, right));
  }

  render(): string {
    return this.delimiters
      ? wrapText(this.body, this.delimiters.left, this.delimiters.right)
      : this.body;
  }

  toString(): string {
    return this.render();
  }
}
