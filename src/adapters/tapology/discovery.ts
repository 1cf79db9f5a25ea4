import { subDays, addDays, subHours, addHours, isAfter, isBefore } from "date-fns";
import type { Extractor, ListingEntry } from "@/adapters/types";
import type { SyncSettings } from "@/lib/config";
import { parseListingDate } from "@/lib/date";
import { parseListing } from "./parser";
import { loadSchema } from "./schemas";

/**
 * recent: events within now ± daysOffset.
 * upcoming: events that have not started yet.
 * all: every listed event, for backfills.
 */
export type DiscoveryMode = "recent" | "upcoming" | "all";

export interface DiscoveryDeps {
  extract: Extractor;
  settings: SyncSettings;
  now: () => Date;
}

export interface DatedListingEntry extends ListingEntry {
  startsAt: Date | null;
}

/** Fetch and date one page of the promotion listing. Null when the page could not be fetched. */
export async function fetchListingPage(page: number, deps: DiscoveryDeps): Promise<DatedListingEntry[] | null> {
  const url = `${deps.settings.promotionUrl}?page=${page}`;
  const records = await deps.extract(url, loadSchema("event-listing"));
  if (records === null) return null;
  const now = deps.now();
  return parseListing(records, deps.settings.baseUrl).map((entry) => ({
    ...entry,
    startsAt: parseListingDate(entry.dateText, now),
  }));
}

function latestStart(entries: DatedListingEntry[]): Date | null {
  let latest: Date | null = null;
  for (const entry of entries) {
    if (entry.startsAt && (!latest || isAfter(entry.startsAt, latest))) latest = entry.startsAt;
  }
  return latest;
}

/**
 * Page through the promotion listing and collect event URLs for the given mode.
 * The listing is ordered newest first; paging stops once it has moved past the
 * window, on an empty or failed page, or at `maxListingPages`.
 */
export async function discoverEventUrls(mode: DiscoveryMode, deps: DiscoveryDeps): Promise<string[]> {
  const now = deps.now();
  const windowStart = subDays(now, deps.settings.daysOffset);
  const windowEnd = addDays(now, deps.settings.daysOffset);
  const urls = new Set<string>();

  for (let page = 1; page <= deps.settings.maxListingPages; page++) {
    const entries = await fetchListingPage(page, deps);
    if (entries === null) {
      console.error(`[discovery] Could not fetch listing page ${page}; stopping`);
      break;
    }
    if (entries.length === 0) break;

    if (mode === "all") {
      for (const entry of entries) urls.add(entry.url);
      continue;
    }

    if (mode === "upcoming") {
      for (const entry of entries) {
        if (entry.startsAt && !isBefore(entry.startsAt, now)) urls.add(entry.url);
      }
      const last = entries[entries.length - 1].startsAt;
      if (last && isBefore(last, now)) break;
      continue;
    }

    let foundInRange = false;
    for (const entry of entries) {
      if (!entry.startsAt) continue;
      if (isBefore(entry.startsAt, windowStart) || isAfter(entry.startsAt, windowEnd)) continue;
      foundInRange = true;
      urls.add(entry.url);
    }
    if (!foundInRange && page > 1) {
      const latest = latestStart(entries);
      if (latest && isBefore(latest, windowStart)) break;
    }
  }

  console.log(`[discovery] Found ${urls.size} event(s) in ${mode} mode`);
  return [...urls];
}

/** First listed event whose start is within `liveWindowHours` of now, if any. */
export async function findLiveEvent(deps: DiscoveryDeps): Promise<DatedListingEntry | null> {
  const entries = await fetchListingPage(1, deps);
  if (!entries) {
    console.error("[discovery] Could not fetch listing for live check");
    return null;
  }
  const now = deps.now();
  const from = subHours(now, deps.settings.liveWindowHours);
  const to = addHours(now, deps.settings.liveWindowHours);
  return (
    entries.find((entry) => entry.startsAt !== null && !isBefore(entry.startsAt, from) && !isAfter(entry.startsAt, to)) ??
    null
  );
}
