import type {
  ExtractedRecord,
  ExtractedValue,
  ListingEntry,
  ScrapedBout,
  ScrapedEvent,
  ScrapedEventHeader,
  ScrapedFighterProfile,
} from "../types";
import { toAbsoluteUrl } from "../utils";

function text(record: ExtractedRecord, key: string): string | null {
  const value = record[key];
  return typeof value === "string" ? value : null;
}

function isRecord(value: ExtractedValue | undefined): value is ExtractedRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nested(record: ExtractedRecord, key: string): ExtractedRecord | null {
  const value = record[key];
  return isRecord(value) ? value : null;
}

function list(record: ExtractedRecord, key: string): ExtractedRecord[] {
  const value = record[key];
  return Array.isArray(value) ? value : [];
}

/** First integer in the text: "Bout 12" → 12, "13 MMA Bouts" → 13 */
export function parseLeadingInt(value: string | null): number | null {
  const match = value?.match(/\d+/);
  return match ? parseInt(match[0], 10) : null;
}

function parseHeader(record: ExtractedRecord, baseUrl: string): ScrapedEventHeader {
  return {
    name: text(record, "name"),
    dateText: text(record, "dateText"),
    promotion: text(record, "promotion"),
    venue: text(record, "venue"),
    location: text(record, "location"),
    broadcast: text(record, "broadcast"),
    boutCount: parseLeadingInt(text(record, "boutCount")),
    imageUrl: toAbsoluteUrl(text(record, "imageUrl"), baseUrl),
  };
}

function parseBout(record: ExtractedRecord, baseUrl: string): ScrapedBout {
  return {
    fighter1: { name: text(record, "fighter1Name"), url: toAbsoluteUrl(text(record, "fighter1Url"), baseUrl) },
    fighter2: { name: text(record, "fighter2Name"), url: toAbsoluteUrl(text(record, "fighter2Url"), baseUrl) },
    result1: text(record, "fighter1Result"),
    result2: text(record, "fighter2Result"),
    boutOrder: parseLeadingInt(text(record, "boutOrder")),
    fightType: text(record, "fightType"),
    weightClass: text(record, "weightClass"),
    finishMethod: text(record, "finishMethod"),
    finishDetails: text(record, "finishDetails"),
    roundFormat: text(record, "roundFormat"),
  };
}

/**
 * Map extracted event-page records to a scraped event.
 * Returns null when extraction produced nothing usable.
 */
export function parseEventPage(records: ExtractedRecord[] | null, baseUrl: string): ScrapedEvent | null {
  const [page] = records ?? [];
  if (!page) return null;

  const header = nested(page, "header");
  const bouts = list(page, "bouts").map((bout) => parseBout(bout, baseUrl));
  if (!header && bouts.length === 0) return null;

  return { header: header ? parseHeader(header, baseUrl) : null, bouts };
}

/** Map extracted profile-page records to profile fields; null when the details block is missing. */
export function parseFighterProfile(
  records: ExtractedRecord[] | null,
  baseUrl: string,
): ScrapedFighterProfile | null {
  const [page] = records ?? [];
  const details = page ? nested(page, "details") : null;
  if (!page || !details) return null;

  return {
    name: text(details, "name"),
    nickname: text(details, "nickname"),
    age: text(details, "age"),
    dateOfBirth: text(details, "dateOfBirth"),
    height: text(details, "height"),
    weightClass: text(details, "weightClass"),
    lastWeighIn: text(details, "lastWeighIn"),
    lastFightDate: text(details, "lastFightDate"),
    born: text(details, "born"),
    headCoach: text(details, "headCoach"),
    otherCoaches: text(details, "otherCoaches"),
    affiliation: text(details, "affiliation"),
    record: text(details, "record"),
    currentStreak: text(details, "currentStreak"),
    imageUrl: toAbsoluteUrl(text(page, "imageUrl"), baseUrl),
  };
}

/** Map listing-page records to entries; rows without a link are dropped. */
export function parseListing(records: ExtractedRecord[], baseUrl: string): ListingEntry[] {
  const entries: ListingEntry[] = [];
  for (const record of records) {
    const url = toAbsoluteUrl(text(record, "url"), baseUrl);
    if (!url) continue;
    entries.push({ url, name: text(record, "name"), dateText: text(record, "dateText") });
  }
  return entries;
}
