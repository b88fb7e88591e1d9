import { describe, it, expect, afterEach, vi } from "vitest";
import { HumanStringBuilder, LatexBuilder } from "@smartnumber/latex";
import { decimalValue, integerValue, rationalValue } from "../canonical.js";
import { humanString, humanStringBuilder, latex } from "../format.js";
import { reducer } from "../reduce.js";

describe("humanString", () => {
  it("shows reduced fractions", () => {
    expect(humanString(rationalValue(6n, 8n))).toBe("3/4");
    expect(humanString(rationalValue(-6n, 8n))).toBe("-3/4");
  });

  it("shows whole fractions as integers", () => {
    expect(humanString(rationalValue(8n, 4n))).toBe("2");
  });

  it("shows integers and exact decimals", () => {
    expect(humanString(integerValue(-6n))).toBe("-6");
    expect(humanString(decimalValue(250n, 2))).toBe("2.5");
    expect(humanString(decimalValue(5n, 3))).toBe("0.005");
  });
});

describe("latex", () => {
  it("renders fractions with the sign in front", () => {
    expect(latex(rationalValue(6n, 8n)).render()).toBe("\\frac{3}{4}");
    expect(latex(rationalValue(-6n, 8n)).render()).toBe("-\\frac{3}{4}");
  });

  it("renders integers and decimals as digits", () => {
    expect(latex(integerValue(1500n)).render()).toBe("1500");
    expect(latex(decimalValue(-25n, 1)).render()).toBe("-2.5");
  });

  it("returns composable builders", () => {
    const built = latex(rationalValue(1n, 2n));
    expect(built).toBeInstanceOf(LatexBuilder);
    expect(built.plus("x").render()).toBe("\\frac{1}{2} + x");
    expect(humanStringBuilder(rationalValue(1n, 2n))).toBeInstanceOf(HumanStringBuilder);
  });
});

describe("already reduced fractions", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("are used without reducing again", () => {
    const spy = vi.spyOn(reducer, "exactReduce");
    expect(humanString(rationalValue(6n, 8n), { numerator: 3n, denominator: 4n })).toBe("3/4");
    expect(spy).not.toHaveBeenCalled();
  });
});
