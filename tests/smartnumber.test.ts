import { describe, it, expect, afterEach } from "vitest";
import {
  SmartNumber,
  config,
  latex,
  humanString,
  formatHumanString,
  parseLiteral,
  InvalidInputError,
  NumberError,
} from "../src/index.js";

describe("smartnumber", () => {
  afterEach(() => {
    config.reset();
  });

  it("re-exports every package", () => {
    const x = SmartNumber.of("6/8");
    expect(latex("x").equals(x.toLatex()).render()).toBe("x = \\frac{3}{4}");
    expect(humanString("y").equals(x.toHumanStringBuilder()).render()).toBe("y = 3/4");
    expect(formatHumanString(parseLiteral("12/4"))).toBe("3");
  });

  it("exposes the error family", () => {
    expect(() => SmartNumber.of("twelve")).toThrow(InvalidInputError);
    expect(() => SmartNumber.of("twelve")).toThrow(NumberError);
  });

  it("shares one configuration", () => {
    config.set({ accuracy: 2 });
    expect(SmartNumber.of("1/3").asDecimal().toString()).toBe("0.33");
  });
});
