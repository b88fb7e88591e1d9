/**
 * Rational Reduction
 *
 * Two ways of bringing a value to a numerator/denominator pair in lowest
 * terms:
 *
 * - {@link exactReduce} for values that are already exact fractions, by
 *   trial division with the prime table;
 * - {@link approximateReduce} for decimal or float-derived values, by the
 *   continued-fraction best rational approximation.
 *
 * Both return a positive denominator coprime with the numerator.
 *
 * @example
 * ```typescript
 * exactReduce(6n, -8n);             // { numerator: -3n, denominator: 4n }
 * approximateReduce("0.333333333"); // 1/3, converged
 * ```
 */

import { Decimal } from "decimal.js";
import { createLogger } from "@smartnumber/core";
import { decimalContext, decimalParts, GUARD_DIGITS } from "./bignum.js";
import { absBigInt, digitCount, minBigInt, pow10, type RationalParts } from "./canonical.js";
import { DivisionByZeroError } from "./errors.js";
import { primeTable } from "./primes.js";
import { getNumberSettings } from "./settings.js";

const log = createLogger("reduce");

/**
 * Result of the continued-fraction approximation.
 */
export interface Approximation extends RationalParts {
  /** Whether the tolerance was reached before the iteration cap */
  readonly converged: boolean;
  /** Continued-fraction steps taken */
  readonly iterations: number;
  /** Achieved relative error |x − n/d| / |x| */
  readonly error: Decimal;
}

export interface ApproximationOptions {
  /** Relative tolerance (default: `approximation.tolerance`, 1e-8) */
  tolerance?: number;
  /** Iteration cap (default: `approximation.maxIterations`, 100) */
  maxIterations?: number;
}

function euclid(a: bigint, b: bigint): bigint {
  while (b !== 0n) {
    [a, b] = [b, a % b];
  }
  return a;
}

/**
 * Reduce numerator/denominator to lowest terms by trial division.
 *
 * Primes from the table are divided out of both operands, each as often as
 * it divides both, while p ≤ min(|n|, d). Past the table, successive odd
 * integers are tried up to `reduction.trialDivisionLimit`; beyond that bound
 * the remaining common factor is removed with a Euclidean gcd.
 *
 * @throws DivisionByZeroError if the denominator is zero
 */
export function exactReduce(numerator: bigint, denominator: bigint): RationalParts {
  if (denominator === 0n) {
    throw new DivisionByZeroError(numerator.toString(), "0");
  }
  if (numerator === 0n) {
    return { numerator: 0n, denominator: 1n };
  }

  const negative = numerator < 0n !== denominator < 0n;
  let n = absBigInt(numerator);
  let d = absBigInt(denominator);

  const divideOut = (p: bigint): void => {
    while (n % p === 0n && d % p === 0n) {
      n /= p;
      d /= p;
    }
  };
  const exhausted = (p: bigint): boolean => n === 1n || d === 1n || p > minBigInt(n, d);
  const result = (): RationalParts => ({ numerator: negative ? -n : n, denominator: d });

  const primes = primeTable();
  for (const p of primes) {
    if (exhausted(p)) return result();
    divideOut(p);
  }

  const last = primes.length > 0 ? primes[primes.length - 1] : 1n;
  const limit = BigInt(getNumberSettings().trialDivisionLimit);
  let candidate = last < 2n ? 2n : last + (last === 2n ? 1n : 2n);

  while (!exhausted(candidate)) {
    if (candidate > limit) {
      const g = euclid(n, d);
      log.debug(`trial division stopped at ${limit}; removing remaining common factor ${g}`);
      n /= g;
      d /= g;
      break;
    }
    divideOut(candidate);
    candidate += candidate === 2n ? 1n : 2n;
  }

  return result();
}

/**
 * Best rational approximation of a decimal within a relative tolerance.
 *
 * Zero gives 0/1. Values smaller than 10^-k (k = `approximation.smallMagnitudeZeros`)
 * are reduced exactly from their digits. Anything else runs the
 * continued-fraction recurrence on |x| until a convergent h/k satisfies
 * |x − h/k| ≤ |x|·tolerance, the remaining fraction drops below the
 * tolerance, or the iteration cap is reached. Hitting the cap returns the
 * last convergent with `converged: false`.
 */
export function approximateReduce(
  input: Decimal.Value,
  options: ApproximationOptions = {}
): Approximation {
  const settings = getNumberSettings();
  const tolerance = new Decimal(options.tolerance ?? settings.tolerance);
  const maxIterations = Math.max(1, options.maxIterations ?? settings.maxIterations);
  const value = new Decimal(input);

  if (value.isZero()) {
    return { numerator: 0n, denominator: 1n, converged: true, iterations: 0, error: new Decimal(0) };
  }

  const { unscaled, scale } = decimalParts(value);

  if (value.abs().lt(new Decimal(10).pow(-settings.smallMagnitudeZeros))) {
    const exact = exactReduce(unscaled, pow10(scale));
    return { ...exact, converged: true, iterations: 0, error: new Decimal(0) };
  }

  const magnitude = absBigInt(unscaled);
  const unit = pow10(scale);
  const [tolNumerator, tolDenominator] = tolerance
    .toFraction()
    .map((part) => BigInt(part.toFixed(0)));

  // |x − h/k| ≤ |x|·tol  ⇔  |U·k − h·10^s|·tolDen ≤ U·k·tolNum
  const distance = (h: bigint, k: bigint): bigint => absBigInt(magnitude * k - h * unit);
  const withinTolerance = (h: bigint, k: bigint): boolean =>
    distance(h, k) * tolDenominator <= magnitude * k * tolNumerator;

  const D = decimalContext(Math.max(digitCount(magnitude), scale) + GUARD_DIGITS * 2);
  let b = new D(value.abs());
  let [h, hPrev] = [1n, 0n];
  let [k, kPrev] = [0n, 1n];
  let iterations = 0;
  let converged = false;

  while (iterations < maxIterations) {
    iterations++;
    const a = b.floor();
    const whole = BigInt(a.toFixed(0));
    [h, hPrev] = [whole * h + hPrev, h];
    [k, kPrev] = [whole * k + kPrev, k];

    if (withinTolerance(h, k)) {
      converged = true;
      break;
    }

    const fraction = b.minus(a);
    if (fraction.lt(tolerance)) break;
    b = new D(1).div(fraction);
  }

  const error = new D(distance(h, k).toString()).div((magnitude * k).toString());
  if (!converged) {
    log.warn(
      `approximation of ${value.toString()} stopped after ${iterations} iterations ` +
        `with relative error ${error.toExponential(3)}`
    );
  }

  return {
    numerator: unscaled < 0n ? -h : h,
    denominator: k,
    converged,
    iterations,
    error,
  };
}

/**
 * Both reduction algorithms behind one object, so that callers can be
 * observed or substituted in tests.
 */
export interface RationalReducer {
  exactReduce(numerator: bigint, denominator: bigint): RationalParts;
  approximateReduce(input: Decimal.Value, options?: ApproximationOptions): Approximation;
}

export const reducer: RationalReducer = {
  exactReduce,
  approximateReduce,
};
