export const NANOSECOND = 1;
export const MICROSECOND = 1_000 * NANOSECOND;
export const MILLISECOND = 1_000 * MICROSECOND;
export const SECOND = 1_000 * MILLISECOND;
export const MINUTE = 60 * SECOND;
export const HOUR = 60 * MINUTE;

export const KIB = 1024;
export const MIB = 1024 * KIB;

const UNIT_NANOS: Record<string, number> = {
  ns: NANOSECOND,
  us: MICROSECOND,
  "µs": MICROSECOND,
  ms: MILLISECOND,
  s: SECOND,
  m: MINUTE,
  h: HOUR
};

// largest first
const FORMAT_UNITS: Array<[string, number]> = [
  ["h", HOUR],
  ["m", MINUTE],
  ["s", SECOND],
  ["ms", MILLISECOND],
  ["µs", MICROSECOND],
  ["ns", NANOSECOND]
];

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)\s*(ns|us|µs|ms|s|m|h)?$/;

export class DurationParseError extends Error {
  readonly input: unknown;

  constructor(input: unknown) {
    super(`Invalid duration ${JSON.stringify(input)}: expected nanoseconds or "<number><ns|us|µs|ms|s|m|h>"`);
    this.name = "DurationParseError";
    this.input = input;
  }
}

/**
 * Converts a duration to integer nanoseconds. Numbers are taken as
 * nanoseconds already; strings carry a unit ("100ms", "1.5s") and a bare
 * numeric string is nanoseconds.
 */
export function parseDuration(input: number | string): number {
  if (typeof input === "number") {
    if (!Number.isInteger(input) || input < 0) {
      throw new DurationParseError(input);
    }
    return input;
  }
  const match = DURATION_PATTERN.exec(input.trim());
  if (!match) {
    throw new DurationParseError(input);
  }
  const unit = UNIT_NANOS[match[2] ?? "ns"];
  return Math.round(Number(match[1]) * unit);
}

export function formatDuration(nanos: number): string {
  if (nanos === 0) {
    return "0s";
  }
  const sign = nanos < 0 ? "-" : "";
  const abs = Math.abs(nanos);
  for (const [suffix, size] of FORMAT_UNITS) {
    if (abs >= size) {
      const value = Number((abs / size).toFixed(3));
      return `${sign}${value}${suffix}`;
    }
  }
  return `${sign}${abs}ns`;
}
