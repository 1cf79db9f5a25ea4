import * as chrono from "chrono-node";
import { isBefore, subMonths } from "date-fns";
import { matchDatePatterns, type DateParts } from "./date-patterns";
import { EVENT_TIMEZONE, wallClockAtOffset, wallClockToUtc, yearInZone } from "./timezone";

const YEAR_RE = /\b(?:19|20)\d{2}\b/;
const TIME_RE = /\b\d{1,2}(?::\d{2})?\s*[ap]\.?m\b|\b\d{1,2}:\d{2}\b/i;
const EASTERN_RE = /\b(?:eastern(?:\s+time)?|e[sd]?t)\b/gi;

/** Year-less dates landing further back than this roll into next year. */
const PAST_ROLLOVER_MONTHS = 6;

/**
 * Normalize listing date text: collapse whitespace, tidy comma spacing and
 * drop Eastern-time tokens (Eastern is the default zone). UTC/GMT markers stay.
 */
export function normalizeDateText(text: string): string {
  return text
    .replace(EASTERN_RE, " ")
    .replace(/\s+/g, " ")
    .replace(/\s*,\s*/g, ", ")
    .replace(/,\s*$/, "")
    .trim();
}

/** General-purpose parse; rejected when it skipped part of what the text states. */
function partsFromChrono(text: string, now: Date): DateParts | null {
  const [result] = chrono.strict.parse(text, now);
  if (!result) return null;
  const { start } = result;

  if (!start.isCertain("month") || !start.isCertain("day")) return null;
  const yearText = text.match(YEAR_RE)?.[0];
  const hasYear = yearText !== undefined;
  if (hasYear && (!start.isCertain("year") || start.get("year") !== Number(yearText))) return null;
  const hasTime = start.isCertain("hour");
  if (TIME_RE.test(text) && !hasTime) return null;

  const year = start.get("year");
  const month = start.get("month");
  const day = start.get("day");
  if (year === null || month === null || day === null) return null;

  return {
    year: hasYear ? year : null,
    month,
    day,
    hour: hasTime ? start.get("hour") ?? 0 : 0,
    minute: hasTime ? start.get("minute") ?? 0 : 0,
    utcOffsetMinutes: start.isCertain("timezoneOffset") ? start.get("timezoneOffset") : null,
  };
}

function toInstant(parts: DateParts, year: number): Date | null {
  const wall = { year, month: parts.month, day: parts.day, hour: parts.hour, minute: parts.minute };
  return parts.utcOffsetMinutes === null
    ? wallClockToUtc(wall, EVENT_TIMEZONE)
    : wallClockAtOffset(wall, parts.utcOffsetMinutes);
}

/**
 * Apply the year rule: an explicit year wins; otherwise the current Eastern
 * year, bumped by one when that lands more than six months in the past.
 */
function resolveInstant(parts: DateParts, now: Date): Date | null {
  if (parts.year !== null) return toInstant(parts, parts.year);

  const year = yearInZone(now, EVENT_TIMEZONE);
  const candidate = toInstant(parts, year);
  if (!candidate) return null;
  if (isBefore(candidate, subMonths(now, PAST_ROLLOVER_MONTHS))) {
    return toInstant(parts, year + 1);
  }
  return candidate;
}

/**
 * Parse the free-form date text shown on event listings into a UTC instant.
 *
 * Times are US Eastern unless the text names another zone; a date without a
 * time means Eastern midnight. Never throws: unparseable text yields null.
 *
 * @param now - reference instant for year-less dates (injectable for tests)
 */
export function parseListingDate(text: string | null | undefined, now: Date = new Date()): Date | null {
  const normalized = normalizeDateText(text ?? "");
  if (!normalized) return null;

  const fromChrono = partsFromChrono(normalized, now);
  const instant = fromChrono ? resolveInstant(fromChrono, now) : null;
  if (instant) return instant;

  const matched = matchDatePatterns(normalized);
  const fallback = matched ? resolveInstant(matched.parts, now) : null;
  if (fallback) return fallback;

  console.warn(`[date] Could not parse date text: "${text}"`);
  return null;
}
