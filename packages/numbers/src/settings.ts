/**
 * Typed, validated view of the `@smartnumber/core` configuration for the
 * numeric pipeline. An invalid configured value is reported once per read
 * and replaced by its default.
 */

import { config, createLogger, DEFAULT_CONFIG } from "@smartnumber/core";

const log = createLogger("settings");

export interface NumberSettings {
  /** Fractional digits kept by decimal expansions */
  readonly accuracy: number;
  /** Relative tolerance of the continued-fraction approximation */
  readonly tolerance: number;
  /** Continued-fraction iteration cap */
  readonly maxIterations: number;
  /** Leading fractional zeros from which decimals are reduced exactly */
  readonly smallMagnitudeZeros: number;
  /** Largest prime in the prime table */
  readonly primeLimit: number;
  /** Largest odd trial divisor tried after the prime table */
  readonly trialDivisionLimit: number;
  /** Largest accepted scientific exponent magnitude */
  readonly maxExponent: number;
}

type Check = (value: number) => boolean;

const isNonNegativeInteger: Check = (value) => Number.isSafeInteger(value) && value >= 0;
const isPositiveInteger: Check = (value) => Number.isSafeInteger(value) && value > 0;
const isPositiveFinite: Check = (value) => Number.isFinite(value) && value > 0;

function read(path: string, fallback: number, check: Check): number {
  const value = config.get(path);
  if (value === undefined) return fallback;
  if (typeof value === "number" && check(value)) return value;
  log.warn(`ignoring invalid "${path}" value ${String(value)}, using ${fallback}`);
  return fallback;
}

/**
 * Current settings, read from the unified config on every call.
 */
export function getNumberSettings(): NumberSettings {
  return {
    accuracy: read("accuracy", DEFAULT_CONFIG.accuracy, isNonNegativeInteger),
    tolerance: read(
      "approximation.tolerance",
      DEFAULT_CONFIG.approximation.tolerance,
      isPositiveFinite
    ),
    maxIterations: read(
      "approximation.maxIterations",
      DEFAULT_CONFIG.approximation.maxIterations,
      isPositiveInteger
    ),
    smallMagnitudeZeros: read(
      "approximation.smallMagnitudeZeros",
      DEFAULT_CONFIG.approximation.smallMagnitudeZeros,
      isNonNegativeInteger
    ),
    primeLimit: read("reduction.primeLimit", DEFAULT_CONFIG.reduction.primeLimit, isPositiveInteger),
    trialDivisionLimit: read(
      "reduction.trialDivisionLimit",
      DEFAULT_CONFIG.reduction.trialDivisionLimit,
      isPositiveInteger
    ),
    maxExponent: read(
      "scientific.maxExponent",
      DEFAULT_CONFIG.scientific.maxExponent,
      isNonNegativeInteger
    ),
  };
}
