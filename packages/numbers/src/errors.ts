/**
 * Number Error Types
 *
 * Every failure raised while parsing or converting a number derives from
 * {@link NumberError}, so callers can catch the whole family at once.
 */

/**
 * Base class for all number parsing and conversion failures.
 */
export class NumberError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NumberError";
  }
}

/**
 * Thrown when the text matches none of the recognized number grammars.
 */
export class InvalidInputError extends NumberError {
  constructor(public readonly input: string) {
    super(`Invalid number input: "${input}"`);
    this.name = "InvalidInputError";
  }
}

/**
 * Thrown for a fraction whose denominator is zero.
 */
export class DivisionByZeroError extends NumberError {
  constructor(
    public readonly numerator: string,
    public readonly denominator: string
  ) {
    super(`Cannot divide ${numerator} by zero (denominator "${denominator}")`);
    this.name = "DivisionByZeroError";
  }
}

/**
 * Thrown when a value does not fit the requested fixed-width target.
 */
export class PrecisionOverflowError extends NumberError {
  constructor(
    public readonly value: string,
    public readonly target: string
  ) {
    super(`${value} cannot be represented as ${target}`);
    this.name = "PrecisionOverflowError";
  }
}

/**
 * Thrown by `UNNECESSARY` rounding when a non-zero fraction would be lost.
 */
export class RoundingNecessaryError extends NumberError {
  constructor(public readonly value: string) {
    super(`Rounding is necessary to represent ${value} as an integer`);
    this.name = "RoundingNecessaryError";
  }
}
