import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { discoverEventUrls, findLiveEvent } from "./discovery";
import { buildSettings, eventUrl, fakeExtractor, listingRecords } from "@/test/factories";
import type { ExtractedRecord, ListingEntry } from "@/adapters/types";
import type { SyncSettings } from "@/lib/config";

const now = new Date("2025-06-20T12:00:00Z");

function entry(slug: string, dateText: string | null): ListingEntry {
  return { url: eventUrl(slug), name: slug, dateText };
}

let pages: Map<string, ExtractedRecord[] | null>;

function deps(overrides?: Partial<SyncSettings>) {
  const settings = buildSettings(overrides);
  const extract = fakeExtractor(pages);
  return { settings, extract, now: () => now };
}

function servePage(page: number, entries: ListingEntry[]) {
  const settings = buildSettings();
  pages.set(`${settings.promotionUrl}?page=${page}`, listingRecords(entries));
}

beforeEach(() => {
  pages = new Map();
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  // Newest first, as the listing shows them
  servePage(1, [
    entry("july-12", "July 12, 2025"),
    entry("june-25", "June 25, 2025"),
    entry("june-14", "June 14, 2025"),
  ]);
  servePage(2, [entry("june-10", "June 10, 2025"), entry("may-31", "May 31, 2025")]);
  servePage(3, []);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("discoverEventUrls", () => {
  it("collects events within the recent window and stops once past it", async () => {
    const d = deps();
    const urls = await discoverEventUrls("recent", d);
    expect(urls).toEqual([eventUrl("june-25"), eventUrl("june-14")]);
    expect(d.extract).toHaveBeenCalledTimes(2);
  });

  it("collects upcoming events and stops at the first page reaching the past", async () => {
    const d = deps();
    const urls = await discoverEventUrls("upcoming", d);
    expect(urls).toEqual([eventUrl("july-12"), eventUrl("june-25")]);
    expect(d.extract).toHaveBeenCalledTimes(1);
  });

  it("collects every event until an empty page", async () => {
    const d = deps();
    const urls = await discoverEventUrls("all", d);
    expect(urls).toHaveLength(5);
    expect(d.extract).toHaveBeenCalledTimes(3);
  });

  it("stops at the page limit", async () => {
    const d = deps({ maxListingPages: 1 });
    expect(await discoverEventUrls("all", d)).toHaveLength(3);
    expect(d.extract).toHaveBeenCalledTimes(1);
  });

  it("skips undated entries except when collecting everything", async () => {
    servePage(1, [entry("tba", "TBA"), entry("june-25", "June 25, 2025")]);
    servePage(2, []);
    expect(await discoverEventUrls("recent", deps())).toEqual([eventUrl("june-25")]);
    expect(await discoverEventUrls("all", deps())).toEqual([eventUrl("tba"), eventUrl("june-25")]);
  });

  it("stops when a listing page cannot be fetched", async () => {
    pages.delete(`${buildSettings().promotionUrl}?page=2`);
    const d = deps();
    expect(await discoverEventUrls("all", d)).toHaveLength(3);
    expect(d.extract).toHaveBeenCalledTimes(2);
  });

  it("requests pages of the promotion listing", async () => {
    const d = deps({ maxListingPages: 1 });
    await discoverEventUrls("recent", d);
    expect(d.extract.mock.calls[0][0]).toBe(
      "https://www.tapology.com/fightcenter/promotions/1-ultimate-fighting-championship-ufc?page=1",
    );
    expect(d.extract.mock.calls[0][1].name).toBe("event-listing");
  });
});

describe("findLiveEvent", () => {
  it("returns an event starting within the live window", async () => {
    servePage(1, [entry("tomorrow", "June 21, 2025"), entry("today", "June 20, 2025 at 10:00 AM")]);
    const live = await findLiveEvent(deps());
    expect(live?.url).toBe(eventUrl("today"));
    expect(live?.startsAt).toEqual(new Date("2025-06-20T14:00:00.000Z"));
  });

  it("returns null when nothing is close to now", async () => {
    expect(await findLiveEvent(deps())).toBeNull();
  });

  it("returns null when the listing cannot be fetched", async () => {
    pages.clear();
    expect(await findLiveEvent(deps())).toBeNull();
  });
});
