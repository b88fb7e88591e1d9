/**
 * Prime table used for trial-division reduction.
 *
 * Built once, on first use, from the `reduction.primeLimit` setting in force
 * at that moment; frozen afterwards.
 */

import { getNumberSettings } from "./settings.js";

let table: readonly bigint[] | undefined;

/**
 * All primes ≤ limit, ascending (sieve of Eratosthenes).
 */
export function sieve(limit: number): bigint[] {
  if (limit < 2) return [];

  const composite = new Uint8Array(limit + 1);
  const primes: bigint[] = [];

  for (let i = 2; i <= limit; i++) {
    if (composite[i]) continue;
    primes.push(BigInt(i));
    for (let j = i * i; j <= limit; j += i) {
      composite[j] = 1;
    }
  }

  return primes;
}

/**
 * The process-wide prime table.
 */
export function primeTable(): readonly bigint[] {
  table ??= Object.freeze(sieve(getNumberSettings().primeLimit));
  return table;
}
