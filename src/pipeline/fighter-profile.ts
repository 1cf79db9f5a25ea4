import type { Extractor, ScrapedFighterProfile } from "@/adapters/types";
import { cleanPlaceholder } from "@/adapters/utils";
import { parseFighterProfile } from "@/adapters/tapology/parser";
import { loadSchema } from "@/adapters/tapology/schemas";
import { parseListingDate } from "@/lib/date";
import type { FighterProfileFields } from "@/store/types";
import { generateContentHash } from "./fingerprint";

const LBS_TO_KG = 0.45359237;
/**
 * Canonical "W-L-D[-NC]" record.
 * "20-3-1, 1 NC" → "20-3-1-1"; "20-3-1 (Win-Loss-Draw)" → "20-3-1".
 * Text that doesn't look like a record is returned trimmed.
 */
export function normalizeRecord(raw: string | null): string | null {
  const value = cleanPlaceholder(raw);
  if (!value) return null;
  const match = value.match(/(\d+)-(\d+)-(\d+)(?:,\s*(\d+)\s*NC)?/i);
  if (!match) return value;
  const [, wins, losses, draws, noContests] = match;
  return noContests ? `${wins}-${losses}-${draws}-${noContests}` : `${wins}-${losses}-${draws}`;
}

/** Sum of the numeric parts of a normalized record */
export function calculateTotalFights(record: string | null): number | null {
  if (!record) return null;
  const parts = record.split("-").filter((part) => /^\d+$/.test(part));
  if (parts.length === 0) return null;
  return parts.reduce((sum, part) => sum + parseInt(part, 10), 0);
}

/** "155.5 lbs" → 70.5 (kg, one decimal) */
export function poundsToKilograms(raw: string | null): number | null {
  const match = raw?.match(/([\d.]+)\s*lbs?/i);
  if (!match) return null;
  const lbs = parseFloat(match[1]);
  if (Number.isNaN(lbs)) return null;
  return Math.round(lbs * LBS_TO_KG * 10) / 10;
}

/** `5'11" (180cm)` → 180 */
export function extractHeightCm(raw: string | null): number | null {
  const match = raw?.match(/\((\d+)\s*cm\)/i);
  return match ? parseInt(match[1], 10) : null;
}

function parseAge(raw: string | null): number | null {
  const match = raw?.match(/^\s*(\d{1,3})\b/);
  return match ? parseInt(match[1], 10) : null;
}

/** Map scraped profile text to stored columns. */
export function buildFighterProfileFields(
  profile: ScrapedFighterProfile,
  fallbackName: string | null,
  now: Date = new Date(),
): FighterProfileFields {
  const proMmaRecord = normalizeRecord(profile.record);
  const dateOfBirth = cleanPlaceholder(profile.dateOfBirth);
  const lastFightDate = cleanPlaceholder(profile.lastFightDate);

  return {
    name: cleanPlaceholder(profile.name) ?? fallbackName,
    nickname: cleanPlaceholder(profile.nickname),
    age: parseAge(profile.age),
    dateOfBirth: dateOfBirth ? parseListingDate(dateOfBirth, now) : null,
    heightCm: extractHeightCm(profile.height),
    weightClass: cleanPlaceholder(profile.weightClass),
    lastWeighInKg: poundsToKilograms(profile.lastWeighIn),
    lastFightDate: lastFightDate ? parseListingDate(lastFightDate, now) : null,
    born: cleanPlaceholder(profile.born),
    headCoach: cleanPlaceholder(profile.headCoach),
    otherCoaches: cleanPlaceholder(profile.otherCoaches),
    affiliation: cleanPlaceholder(profile.affiliation),
    proMmaRecord,
    totalFights: calculateTotalFights(proMmaRecord),
    currentStreak: cleanPlaceholder(profile.currentStreak),
    imageUrl: profile.imageUrl,
  };
}

export interface FetchedProfile {
  fields: FighterProfileFields;
  contentHash: string;
}

/**
 * Fetch and map a fighter's profile page.
 * Null when the page could not be fetched or has no details block.
 */
export async function fetchFighterProfile(
  url: string,
  fallbackName: string | null,
  ctx: { extract: Extractor; settings: { baseUrl: string }; now: () => Date },
): Promise<FetchedProfile | null> {
  const records = await ctx.extract(url, loadSchema("fighter-profile"));
  const profile = parseFighterProfile(records, ctx.settings.baseUrl);
  if (!profile) return null;
  return {
    fields: buildFighterProfileFields(profile, fallbackName, ctx.now()),
    contentHash: generateContentHash(profile),
  };
}
