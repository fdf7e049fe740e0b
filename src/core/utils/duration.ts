/**
 * Duration string parsing (e.g. "100ms", "5s", "1m30s", "-1s")
 */

/**
 * Milliseconds per unit
 */
const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  'μs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT_PATTERN = /^(\d*\.?\d*)([a-zµμ]+)/;

/**
 * Parse a signed sequence of decimal numbers, each with a unit suffix,
 * into milliseconds. A bare "0" is accepted.
 *
 * @throws Error if the string is not a valid duration
 */
export function parseDuration(input: string): number {
  const invalid = () => new Error(`invalid duration "${input}"`);

  let rest = input.trim();
  let sign = 1;

  if (rest.startsWith('-') || rest.startsWith('+')) {
    sign = rest.startsWith('-') ? -1 : 1;
    rest = rest.slice(1);
  }

  if (rest === '0') {
    return 0;
  }
  if (rest === '') {
    throw invalid();
  }

  let total = 0;
  while (rest.length > 0) {
    const match = SEGMENT_PATTERN.exec(rest);
    if (!match) {
      throw invalid();
    }

    const [segment, amount, unit] = match;
    if (amount === '' || amount === '.') {
      throw invalid();
    }

    const factor = UNIT_MS[unit];
    if (factor === undefined) {
      throw new Error(`unknown unit "${unit}" in duration "${input}"`);
    }

    total += Number(amount) * factor;
    rest = rest.slice(segment.length);
  }

  return sign * total;
}

/**
 * Format milliseconds for log output ("100ms", "5s", "1.5s")
 */
export function formatDuration(ms: number): string {
  if (ms >= 1000 && ms % 1 === 0) {
    return `${ms / 1000}s`;
  }
  return `${ms}ms`;
}
