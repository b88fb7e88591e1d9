import { describe, it, expect } from "vitest";
import {
  decimalValue,
  integerValue,
  rationalValue,
  type CanonicalNumber,
} from "../canonical.js";
import { RoundingNecessaryError } from "../errors.js";
import { ROUNDING_MODES, roundToInteger, type RoundingMode } from "../rounding.js";

type Expectations = Record<Exclude<RoundingMode, "UNNECESSARY">, bigint>;

const cases: Array<[string, CanonicalNumber, Expectations]> = [
  [
    "2.5",
    decimalValue(25n, 1),
    {
      UP: 3n,
      DOWN: 2n,
      CEILING: 3n,
      FLOOR: 2n,
      HALF_UP: 3n,
      HALF_DOWN: 2n,
      HALF_EVEN: 2n,
      HALF_CEILING: 3n,
      HALF_FLOOR: 2n,
    },
  ],
  [
    "-2.5",
    decimalValue(-25n, 1),
    {
      UP: -3n,
      DOWN: -2n,
      CEILING: -2n,
      FLOOR: -3n,
      HALF_UP: -3n,
      HALF_DOWN: -2n,
      HALF_EVEN: -2n,
      HALF_CEILING: -2n,
      HALF_FLOOR: -3n,
    },
  ],
  [
    "7/3",
    rationalValue(7n, 3n),
    {
      UP: 3n,
      DOWN: 2n,
      CEILING: 3n,
      FLOOR: 2n,
      HALF_UP: 2n,
      HALF_DOWN: 2n,
      HALF_EVEN: 2n,
      HALF_CEILING: 2n,
      HALF_FLOOR: 2n,
    },
  ],
  [
    "-5/3",
    rationalValue(-5n, 3n),
    {
      UP: -2n,
      DOWN: -1n,
      CEILING: -1n,
      FLOOR: -2n,
      HALF_UP: -2n,
      HALF_DOWN: -2n,
      HALF_EVEN: -2n,
      HALF_CEILING: -2n,
      HALF_FLOOR: -2n,
    },
  ],
];

describe("roundToInteger", () => {
  for (const [label, value, expected] of cases) {
    describe(label, () => {
      for (const mode of ROUNDING_MODES) {
        if (mode === "UNNECESSARY") continue;
        it(`rounds ${mode} to ${expected[mode]}`, () => {
          expect(roundToInteger(value, mode)).toBe(expected[mode]);
        });
      }
    });
  }

  it("defaults to FLOOR", () => {
    expect(roundToInteger(decimalValue(-5n, 1))).toBe(-1n);
  });

  it("returns exact quotients in every mode", () => {
    for (const mode of ROUNDING_MODES) {
      expect(roundToInteger(integerValue(5n), mode)).toBe(5n);
      expect(roundToInteger(rationalValue(6n, 3n), mode)).toBe(2n);
    }
  });

  it("keeps long fractions exact", () => {
    const half = rationalValue(10n ** 30n + 1n, 2n);
    expect(roundToInteger(half, "HALF_EVEN")).toBe(5n * 10n ** 29n);
    expect(roundToInteger(half, "HALF_UP")).toBe(5n * 10n ** 29n + 1n);
  });

  it("refuses to discard a fraction in UNNECESSARY mode", () => {
    expect(() => roundToInteger(decimalValue(25n, 1), "UNNECESSARY")).toThrow(RoundingNecessaryError);
    expect(() => roundToInteger(decimalValue(25n, 1), "UNNECESSARY")).toThrow(
      "Rounding is necessary to represent 2.5 as an integer"
    );
  });

  it("lists every mode", () => {
    expect(ROUNDING_MODES).toHaveLength(10);
  });
});
