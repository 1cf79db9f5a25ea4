import { MONTHS } from "@/adapters/utils";

/** Calendar fields read from listing text, before year pinning and zone conversion. */
export interface DateParts {
  /** null when the text carries no year */
  year: number | null;
  month: number;
  day: number;
  hour: number;
  minute: number;
  /** Minutes east of UTC when the text names a zone; null means Eastern wall clock */
  utcOffsetMinutes: number | null;
}

export interface DatePattern {
  name: string;
  match: (text: string) => DateParts | null;
}

// Longest names first so "september" wins over "sep"
const MONTH_ALT = Object.keys(MONTHS)
  .sort((a, b) => b.length - a.length)
  .join("|");
const MONTH = `(${MONTH_ALT})\\.?`;
const DAY = "(\\d{1,2})(?:st|nd|rd|th)?";
const TIME_12H = "(\\d{1,2})(?::(\\d{2}))?\\s*([ap])\\.?m\\.?";

function monthNumber(name: string): number | null {
  return MONTHS[name.toLowerCase()] ?? null;
}

function to24Hour(hour: string, minute: string | undefined, meridiem: string): { hour: number; minute: number } | null {
  let h = parseInt(hour, 10);
  const m = minute ? parseInt(minute, 10) : 0;
  if (h < 1 || h > 12 || m > 59) return null;
  const pm = meridiem.toLowerCase() === "p";
  if (pm && h !== 12) h += 12;
  if (!pm && h === 12) h = 0;
  return { hour: h, minute: m };
}

function parts(
  year: number | null,
  month: number | null,
  day: string,
  time: { hour: number; minute: number } | null = { hour: 0, minute: 0 },
  utcOffsetMinutes: number | null = null,
): DateParts | null {
  if (month === null || time === null) return null;
  return { year, month, day: parseInt(day, 10), ...time, utcOffsetMinutes };
}

/**
 * Ordered fallback matchers; the first one to match wins.
 * Each matcher only reads fields, it never decides the year or the zone.
 */
export const DATE_PATTERNS: DatePattern[] = [
  {
    // "March 1 at 8:00 PM UTC", "June 28 at 7:00 PM"
    name: "month-day-at-time",
    match: (text) => {
      const m = text.match(new RegExp(`\\b${MONTH}\\s+${DAY}\\s+at\\s+${TIME_12H}(?:\\s+(utc|gmt))?`, "i"));
      if (!m) return null;
      return parts(null, monthNumber(m[1]), m[2], to24Hour(m[3], m[4], m[5]), m[6] ? 0 : null);
    },
  },
  {
    // "Saturday, June 28, 7:00 PM" and "Sat Sep 13, 6pm, 2025"
    name: "month-day-time-year",
    match: (text) => {
      const m = text.match(new RegExp(`\\b${MONTH}\\s+${DAY},\\s+${TIME_12H}(?:,?\\s+(\\d{4}))?`, "i"));
      if (!m) return null;
      const year = m[6] ? parseInt(m[6], 10) : null;
      return parts(year, monthNumber(m[1]), m[2], to24Hour(m[3], m[4], m[5]));
    },
  },
  {
    // "September 28 2024 6pm", "March 1, 2025 at 8:00 PM UTC"
    name: "month-day-year-time",
    match: (text) => {
      const m = text.match(
        new RegExp(`\\b${MONTH}\\s+${DAY},?\\s+(\\d{4}),?\\s+(?:at\\s+)?${TIME_12H}(?:\\s+(utc|gmt))?`, "i"),
      );
      if (!m) return null;
      return parts(parseInt(m[3], 10), monthNumber(m[1]), m[2], to24Hour(m[4], m[5], m[6]), m[7] ? 0 : null);
    },
  },
  {
    // "Saturday 06.28.2025 at 06:30 PM", "06.28.2025"
    name: "dotted",
    match: (text) => {
      const m = text.match(new RegExp(`\\b(\\d{1,2})\\.(\\d{1,2})\\.(\\d{4})(?:\\s+(?:at\\s+)?${TIME_12H})?`, "i"));
      if (!m) return null;
      const time = m[4] && m[6] ? to24Hour(m[4], m[5], m[6]) : { hour: 0, minute: 0 };
      return parts(parseInt(m[3], 10), parseInt(m[1], 10), m[2], time);
    },
  },
  {
    // "January 18, 2025"
    name: "month-day-year",
    match: (text) => {
      const m = text.match(new RegExp(`\\b${MONTH}\\s+${DAY},?\\s+(\\d{4})\\b`, "i"));
      if (!m) return null;
      return parts(parseInt(m[3], 10), monthNumber(m[1]), m[2]);
    },
  },
  {
    // "2025-01-18", "2025.01.18"
    name: "iso",
    match: (text) => {
      const m = text.match(/\b(\d{4})[-.](\d{1,2})[-.](\d{1,2})\b/);
      if (!m) return null;
      return parts(parseInt(m[1], 10), parseInt(m[2], 10), m[3]);
    },
  },
  {
    // "1/18/2025"
    name: "us-slash",
    match: (text) => {
      const m = text.match(/\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/);
      if (!m) return null;
      return parts(parseInt(m[3], 10), parseInt(m[1], 10), m[2]);
    },
  },
  {
    // "August 10"
    name: "month-day",
    match: (text) => {
      const m = text.match(new RegExp(`\\b${MONTH}\\s+${DAY}\\b(?!:)`, "i"));
      if (!m) return null;
      return parts(null, monthNumber(m[1]), m[2]);
    },
  },
];

/** Run the fallback matchers in order. */
export function matchDatePatterns(text: string): { pattern: string; parts: DateParts } | null {
  for (const pattern of DATE_PATTERNS) {
    const result = pattern.match(text);
    if (result) return { pattern: pattern.name, parts: result };
  }
  return null;
}
