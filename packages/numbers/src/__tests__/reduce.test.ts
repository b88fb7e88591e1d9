import { describe, it, expect, afterEach, vi } from "vitest";
import { config } from "@smartnumber/core";
import { approximateReduce, exactReduce, reducer } from "../reduce.js";
import { DivisionByZeroError } from "../errors.js";
import { decimalLiteralParts } from "../parse.js";

function gcd(a: bigint, b: bigint): bigint {
  a = a < 0n ? -a : a;
  while (b !== 0n) {
    [a, b] = [b, a % b];
  }
  return a;
}

describe("exactReduce", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
  });

  it("reduces to lowest terms", () => {
    expect(exactReduce(6n, 8n)).toEqual({ numerator: 3n, denominator: 4n });
    expect(exactReduce(12n, 18n)).toEqual({ numerator: 2n, denominator: 3n });
    expect(exactReduce(7n, 1n)).toEqual({ numerator: 7n, denominator: 1n });
  });

  it("normalizes the sign onto the numerator", () => {
    expect(exactReduce(6n, -8n)).toEqual({ numerator: -3n, denominator: 4n });
    expect(exactReduce(-6n, -8n)).toEqual({ numerator: 3n, denominator: 4n });
  });

  it("maps zero to 0/1", () => {
    expect(exactReduce(0n, -5n)).toEqual({ numerator: 0n, denominator: 1n });
  });

  it("rejects a zero denominator", () => {
    expect(() => exactReduce(5n, 0n)).toThrow(DivisionByZeroError);
  });

  it("continues past the prime table with odd divisors", () => {
    expect(exactReduce(10007n * 3n, 10007n * 5n)).toEqual({ numerator: 3n, denominator: 5n });
  });

  it("removes the remaining factor once the trial limit is reached", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    config.set({ logLevel: "debug", reduction: { trialDivisionLimit: 10_000 } });
    const common = 10007n * 10009n;

    expect(exactReduce(common * 3n, common * 5n)).toEqual({ numerator: 3n, denominator: 5n });
    expect(debug).toHaveBeenCalledWith(
      "[smartnumber/reduce] DEBUG: trial division stopped at 10000; removing remaining common factor 100160063"
    );
  });

  it("produces coprime terms with a positive denominator and is idempotent", () => {
    const pairs: Array<[bigint, bigint]> = [
      [360n, -48n],
      [-1024n, 96n],
      [2n ** 64n, 6n ** 20n],
      [9973n * 9967n, 9973n],
      [17n, 19n],
    ];
    for (const [n, d] of pairs) {
      const reduced = exactReduce(n, d);
      expect(reduced.denominator > 0n).toBe(true);
      expect(gcd(reduced.numerator, reduced.denominator)).toBe(1n);
      expect(reduced.numerator * d).toBe(n * reduced.denominator);
      expect(exactReduce(reduced.numerator, reduced.denominator)).toEqual(reduced);
    }
  });
});

describe("approximateReduce", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
  });

  it("maps zero to 0/1", () => {
    const result = approximateReduce("0");
    expect(result).toMatchObject({ numerator: 0n, denominator: 1n, converged: true, iterations: 0 });
  });

  it("recovers simple fractions", () => {
    expect(approximateReduce("2.5")).toMatchObject({
      numerator: 5n,
      denominator: 2n,
      converged: true,
      iterations: 2,
    });
    expect(approximateReduce("0.75")).toMatchObject({
      numerator: 3n,
      denominator: 4n,
      iterations: 3,
    });
    expect(approximateReduce("4")).toMatchObject({ numerator: 4n, denominator: 1n, iterations: 1 });
  });

  it("reapplies the sign", () => {
    expect(approximateReduce("-0.75")).toMatchObject({ numerator: -3n, denominator: 4n });
  });

  it("stops within the tolerance", () => {
    expect(approximateReduce("0.333333333")).toMatchObject({
      numerator: 1n,
      denominator: 3n,
      converged: true,
      iterations: 2,
    });

    const pi = approximateReduce("3.14159", { tolerance: 1e-2 });
    expect(pi).toMatchObject({ numerator: 22n, denominator: 7n, converged: true });
    expect(pi.error.lte(1e-2)).toBe(true);
  });

  it.each([
    "1.41421356237",
    "12345.6789",
    "0.999999999",
    "-2.718281828459",
    "0.1234567",
    "7.000000001",
  ])("converges to a reduced fraction within the tolerance for %s", (literal) => {
    const result = approximateReduce(literal);

    expect(result.converged).toBe(true);
    expect(result.denominator > 0n).toBe(true);
    expect(gcd(result.numerator, result.denominator)).toBe(1n);
    expect(result.error.lte(1e-8)).toBe(true);

    // |x − n/d| ≤ |x|·1e-8 with x = U/10^s
    const { unscaled, scale } = decimalLiteralParts(literal);
    const magnitude = unscaled < 0n ? -unscaled : unscaled;
    const diff = unscaled * result.denominator - result.numerator * 10n ** BigInt(scale);
    const distance = diff < 0n ? -diff : diff;
    expect(distance * 100_000_000n <= magnitude * result.denominator).toBe(true);
  });

  it("reduces small magnitudes exactly", () => {
    expect(approximateReduce("0.0005")).toMatchObject({
      numerator: 1n,
      denominator: 2000n,
      iterations: 0,
    });
    expect(approximateReduce("0.0000000000001")).toMatchObject({
      numerator: 1n,
      denominator: 10n ** 13n,
    });
  });

  it("returns the last convergent at the iteration cap", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const result = approximateReduce("2.5", { maxIterations: 1 });

    expect(result).toMatchObject({ numerator: 2n, denominator: 1n, converged: false, iterations: 1 });
    expect(result.error.toString()).toBe("0.2");
    expect(warn).toHaveBeenCalledWith(
      "[smartnumber/reduce] WARN: approximation of 2.5 stopped after 1 iterations with relative error 2.000e-1"
    );
  });

  it("takes at least one step", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(approximateReduce("2.5", { maxIterations: 0 }).iterations).toBe(1);
  });

  it("reads defaults from the configuration", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    config.set({ approximation: { maxIterations: 1 } });
    expect(approximateReduce("2.5").converged).toBe(false);
  });
});

describe("reducer", () => {
  it("exposes both algorithms", () => {
    expect(reducer.exactReduce).toBe(exactReduce);
    expect(reducer.approximateReduce).toBe(approximateReduce);
  });
});
