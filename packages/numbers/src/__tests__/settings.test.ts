import { describe, it, expect, afterEach, vi } from "vitest";
import { config } from "@smartnumber/core";
import { getNumberSettings } from "../settings.js";

describe("getNumberSettings", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    config.reset();
  });

  it("returns the defaults", () => {
    config.reset();
    expect(getNumberSettings()).toEqual({
      accuracy: 100,
      tolerance: 1e-8,
      maxIterations: 100,
      smallMagnitudeZeros: 3,
      primeLimit: 10_000,
      trialDivisionLimit: 1_000_000,
      maxExponent: 100_000,
    });
  });

  it("follows the configuration", () => {
    config.set({ accuracy: 12, approximation: { tolerance: 1e-4 } });
    const settings = getNumberSettings();
    expect(settings.accuracy).toBe(12);
    expect(settings.tolerance).toBe(1e-4);
  });

  it("falls back to the default for invalid values", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    config.set({ accuracy: -1 });

    expect(getNumberSettings().accuracy).toBe(100);
    expect(warn).toHaveBeenCalledWith(
      '[smartnumber/settings] WARN: ignoring invalid "accuracy" value -1, using 100'
    );
  });

  it("rejects non-numeric environment values", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    config.reset();
    vi.stubEnv("SMARTNUMBER_SCIENTIFIC__MAX_EXPONENT", "lots");

    expect(getNumberSettings().maxExponent).toBe(100_000);
    expect(warn).toHaveBeenCalledWith(
      '[smartnumber/settings] WARN: ignoring invalid "scientific.maxExponent" value lots, using 100000'
    );
  });
});
