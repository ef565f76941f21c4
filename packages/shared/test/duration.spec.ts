import { describe, expect, it } from "vitest";
import {
  DurationParseError,
  HOUR,
  MICROSECOND,
  MILLISECOND,
  MINUTE,
  SECOND,
  formatDuration,
  parseDuration
} from "../src/budget/duration";

describe("parseDuration", () => {
  it.each([
    ["100ms", 100 * MILLISECOND],
    ["1.5s", 1500 * MILLISECOND],
    ["10us", 10 * MICROSECOND],
    ["10µs", 10 * MICROSECOND],
    ["500ns", 500],
    ["2m", 2 * MINUTE],
    ["1h", HOUR],
    [" 250 ms ", 250 * MILLISECOND],
    ["42", 42]
  ])("parses %j", (input, expected) => {
    expect(parseDuration(input)).toBe(expected);
  });

  it("takes integers as nanoseconds", () => {
    expect(parseDuration(0)).toBe(0);
    expect(parseDuration(1_000)).toBe(MICROSECOND);
  });

  it.each([["fast"], ["10 days"], ["-5ms"], [""]])("rejects %j", input => {
    expect(() => parseDuration(input)).toThrowError(DurationParseError);
  });

  it("rejects negative and fractional numbers", () => {
    expect(() => parseDuration(-1)).toThrowError(DurationParseError);
    expect(() => parseDuration(1.5)).toThrowError(DurationParseError);
  });
});

describe("formatDuration", () => {
  it("uses the largest whole unit", () => {
    expect(formatDuration(100 * MILLISECOND)).toBe("100ms");
    expect(formatDuration(10 * MICROSECOND)).toBe("10µs");
    expect(formatDuration(500)).toBe("500ns");
    expect(formatDuration(1500 * MILLISECOND)).toBe("1.5s");
    expect(formatDuration(90 * SECOND)).toBe("1.5m");
    expect(formatDuration(2 * HOUR)).toBe("2h");
    expect(formatDuration(0)).toBe("0s");
    expect(formatDuration(-3 * MILLISECOND)).toBe("-3ms");
  });
});
