/**
 * Input normalization
 *
 * Cleans raw user text before classification. Never throws: whatever cannot
 * be cleaned is left for the parser to reject.
 *
 * @example
 * ```typescript
 * normalizeInput("1 000 000"); // "1000000"
 * normalizeInput("2.500");     // "2.5"
 * normalizeInput("---6");      // "-6"
 * ```
 */

const SPACE_BETWEEN_DIGITS = /(?<=\d)\s+(?=\d)/g;
const TRAILING_FRACTION_ZEROS = /^([+-]?\d*\.\d*?)0+$/;

/** Two or more leading sign characters, and the rest. */
export const SIGN_RUN = /^([+-]{2,})([\s\S]*)$/;

/**
 * Collapse a run of sign characters by parity: `+` is neutral, an odd number
 * of `-` yields `-`, an even number yields nothing.
 */
export function collapseSignRun(run: string): "" | "-" {
  let minus = 0;
  for (const c of run) {
    if (c === "-") minus++;
  }
  return minus % 2 === 1 ? "-" : "";
}

/**
 * `2.500` → `2.5`, `3.000` → `3`, `.000` → `0`. Other text is returned as is.
 */
export function stripTrailingZeros(input: string): string {
  const match = TRAILING_FRACTION_ZEROS.exec(input);
  if (!match) return input;

  const kept = match[1].endsWith(".") ? match[1].slice(0, -1) : match[1];
  return /\d/.test(kept) ? kept : `${kept}0`;
}

export function normalizeInput(raw: string): string {
  const text = stripTrailingZeros(raw.replace(SPACE_BETWEEN_DIGITS, ""));

  const run = SIGN_RUN.exec(text);
  if (run) {
    return collapseSignRun(run[1]) + normalizeInput(run[2]);
  }

  return text;
}
