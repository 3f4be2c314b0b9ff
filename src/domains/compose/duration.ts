/**
 * Compose duration strings: a sequence of decimal numbers each followed by a
 * unit, such as `10s`, `1m30s`, `1.5s` or `250ms`.
 */

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  µs: 1e-3,
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

const DURATION_PATTERN = /^(?:\d+(?:\.\d+)?(?:ns|us|µs|ms|s|m|h))+$/;
const SEGMENT_PATTERN = /(\d+(?:\.\d+)?)(ns|us|µs|ms|s|m|h)/g;

export const isDuration = (input: string): boolean => DURATION_PATTERN.test(input);

/**
 * Parse a duration into whole milliseconds, rounding sub-millisecond
 * remainders to the nearest millisecond.
 *
 * @throws {RangeError} When `input` is not a duration
 *
 * @example
 * ```typescript
 * parseDuration("1m30s"); // 90000
 * parseDuration("1.5s"); // 1500
 * ```
 */
export const parseDuration = (input: string): number => {
  if (!isDuration(input)) {
    throw new RangeError(`Invalid duration: "${input}"`);
  }

  let total = 0;
  for (const [, amount = "0", unit = "ms"] of input.matchAll(SEGMENT_PATTERN)) {
    total += Number(amount) * (UNIT_MS[unit] ?? 0);
  }
  return Math.round(total);
};
