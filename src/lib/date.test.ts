import { describe, it, expect, vi, afterEach } from "vitest";
import { normalizeDateText, parseListingDate } from "./date";
import { matchDatePatterns } from "./date-patterns";

const iso = (d: Date | null) => d?.toISOString() ?? null;

afterEach(() => {
  vi.restoreAllMocks();
});

describe("normalizeDateText", () => {
  it("collapses whitespace and comma spacing", () => {
    expect(normalizeDateText("  January   18 ,    2025  ")).toBe("January 18, 2025");
  });

  it("strips Eastern-time tokens but keeps UTC", () => {
    expect(normalizeDateText("September 28 2024 6pm ET")).toBe("September 28 2024 6pm");
    expect(normalizeDateText("March 1 at 8:00 PM EDT")).toBe("March 1 at 8:00 PM");
    expect(normalizeDateText("March 1 at 8:00 PM UTC")).toBe("March 1 at 8:00 PM UTC");
  });
});

describe("parseListingDate", () => {
  const now = new Date("2025-06-01T12:00:00Z");

  it("parses a full date with an Eastern evening time", () => {
    expect(iso(parseListingDate("September 28 2024 6pm ET", now))).toBe("2024-09-28T22:00:00.000Z");
  });

  it("treats a date without time as Eastern midnight", () => {
    expect(iso(parseListingDate("January 18, 2025", now))).toBe("2025-01-18T05:00:00.000Z");
    expect(iso(parseListingDate("2025-01-18", now))).toBe("2025-01-18T05:00:00.000Z");
    expect(iso(parseListingDate("1/18/2025", now))).toBe("2025-01-18T05:00:00.000Z");
  });

  it("tolerates irregular whitespace", () => {
    expect(iso(parseListingDate("  January   18,    2025  ", now))).toBe("2025-01-18T05:00:00.000Z");
  });

  it("pins a year-less date to the current year when it is not far in the past", () => {
    expect(iso(parseListingDate("August 10", new Date("2025-03-15T12:00:00Z")))).toBe(
      "2025-08-10T04:00:00.000Z",
    );
  });

  it("rolls a year-less date more than six months back into next year", () => {
    expect(iso(parseListingDate("February 20", new Date("2025-10-01T12:00:00Z")))).toBe(
      "2026-02-20T05:00:00.000Z",
    );
  });

  it("reads weekday-prefixed listings with a time and no year", () => {
    expect(iso(parseListingDate("Saturday, June 28, 7:00 PM", now))).toBe("2025-06-28T23:00:00.000Z");
  });

  it("reads a trailing year after the time", () => {
    expect(iso(parseListingDate("Sat Sep 13, 6pm, 2025", now))).toBe("2025-09-13T22:00:00.000Z");
  });

  it("reads dotted dates with a time", () => {
    expect(iso(parseListingDate("Saturday 06.28.2025 at 06:30 PM", now))).toBe("2025-06-28T22:30:00.000Z");
  });

  it("honours an explicit UTC marker", () => {
    expect(iso(parseListingDate("March 1, 2025 at 8:00 PM UTC", now))).toBe("2025-03-01T20:00:00.000Z");
  });

  it("returns null and warns for text that is not a date", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(parseListingDate("not a date", now)).toBeNull();
    expect(parseListingDate("12345", now)).toBeNull();
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it("returns null for empty input without warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(parseListingDate("", now)).toBeNull();
    expect(parseListingDate(null, now)).toBeNull();
    expect(warn).not.toHaveBeenCalled();
  });
});

describe("matchDatePatterns", () => {
  it("returns the first matching pattern", () => {
    expect(matchDatePatterns("June 28 at 7:00 PM")).toEqual({
      pattern: "month-day-at-time",
      parts: { year: null, month: 6, day: 28, hour: 19, minute: 0, utcOffsetMinutes: null },
    });
  });

  it("marks UTC times with a zero offset", () => {
    expect(matchDatePatterns("March 1 at 8:00 PM UTC")?.parts.utcOffsetMinutes).toBe(0);
    expect(matchDatePatterns("March 1, 2025 at 8:00 PM UTC")).toEqual({
      pattern: "month-day-year-time",
      parts: { year: 2025, month: 3, day: 1, hour: 20, minute: 0, utcOffsetMinutes: 0 },
    });
  });

  it("reads month-day-year-time with a bare hour", () => {
    expect(matchDatePatterns("September 28 2024 6pm")).toEqual({
      pattern: "month-day-year-time",
      parts: { year: 2024, month: 9, day: 28, hour: 18, minute: 0, utcOffsetMinutes: null },
    });
  });

  it("reads a time and trailing year after a comma", () => {
    expect(matchDatePatterns("Sat Sep 13, 6pm, 2025")).toEqual({
      pattern: "month-day-time-year",
      parts: { year: 2025, month: 9, day: 13, hour: 18, minute: 0, utcOffsetMinutes: null },
    });
  });

  it("converts 12 AM and 12 PM", () => {
    expect(matchDatePatterns("June 28 at 12:15 AM")?.parts.hour).toBe(0);
    expect(matchDatePatterns("June 28 at 12:15 PM")?.parts.hour).toBe(12);
  });

  it("reads ISO dates with dots", () => {
    expect(matchDatePatterns("2025.01.18")?.parts).toEqual({
      year: 2025, month: 1, day: 18, hour: 0, minute: 0, utcOffsetMinutes: null,
    });
  });

  it("returns null when nothing matches", () => {
    expect(matchDatePatterns("TBD")).toBeNull();
  });
});
