import type { ScrapedEvent, ScrapedEventHeader } from "@/adapters/types";
import { parseEventPage } from "@/adapters/tapology/parser";
import { loadSchema } from "@/adapters/tapology/schemas";
import { cleanPlaceholder } from "@/adapters/utils";
import { parseListingDate } from "@/lib/date";
import type { EventFields } from "@/store/types";
import type { SyncContext } from "./context";
import { reconcileFightCard, type FightCardResult } from "./fight-card";
import { generateContentHash } from "./fingerprint";

export type EventSyncStatus =
  | "created"
  | "updated"
  | "unchanged"
  | "fetch_failed" // extraction yielded nothing usable; no writes
  | "invalid" // header lacked a required field; header write abandoned
  | "error";

export interface EventSyncResult {
  url: string;
  status: EventSyncStatus;
  eventId?: number;
  fightCard?: FightCardResult;
  error?: string;
}

type ValidHeader = ScrapedEventHeader & { name: string; dateText: string };

/** Name and date text are required to write an event header. */
function missingHeaderField(header: ScrapedEventHeader | null): string | null {
  if (!header) return "header";
  if (!header.name) return "name";
  if (!header.dateText) return "date";
  return null;
}

function isValidHeader(header: ScrapedEventHeader | null): header is ValidHeader {
  return missingHeaderField(header) === null;
}

/** Stored event columns for a scraped header */
function buildEventFields(
  header: ValidHeader,
  scraped: ScrapedEvent,
  contentHash: string,
  now: Date,
): EventFields {
  return {
    name: header.name,
    scheduledAt: parseListingDate(header.dateText, now),
    promotion: header.promotion,
    venue: cleanPlaceholder(header.venue),
    location: cleanPlaceholder(header.location),
    broadcast: cleanPlaceholder(header.broadcast),
    boutCount: header.boutCount ?? scraped.bouts.length,
    imageUrl: header.imageUrl,
    contentHash,
  };
}

/**
 * Reconcile one event page with storage.
 *
 * DISCOVERED → fetch_failed | created | updated | unchanged (| invalid | error).
 * The fight card is reconciled on every path that has an event row, even when
 * the content hash matches.
 */
export async function syncEvent(url: string, ctx: SyncContext): Promise<EventSyncResult> {
  try {
    const existing = await ctx.store.getEventByUrl(url);

    const records = await ctx.extract(url, loadSchema("event"));
    const scraped = parseEventPage(records, ctx.settings.baseUrl);
    if (!scraped) {
      console.error(`[event-sync] No data extracted from ${url}`);
      return { url, status: "fetch_failed", eventId: existing?.id };
    }

    if (existing && scraped.bouts.length === 0) {
      // An emptied card on a known event is a partial page, not a cancellation
      const stored = await ctx.store.getFightsByEvent(existing.id);
      if (stored.length > 0) {
        console.warn(`[event-sync] No bouts extracted from ${url} but ${stored.length} stored; treating as partial extraction`);
        return { url, status: "fetch_failed", eventId: existing.id };
      }
    }

    const contentHash = generateContentHash(scraped);
    const header = scraped.header;

    if (!existing) {
      if (!isValidHeader(header)) {
        console.error(`[event-sync] Cannot create event from ${url}: missing ${missingHeaderField(header)}`);
        return { url, status: "invalid" };
      }
      const fields = buildEventFields(header, scraped, contentHash, ctx.now());
      const { id, created } = await ctx.store.createEvent({ ...fields, sourceUrl: url });
      if (!created) {
        // Created by a concurrent run since our lookup; continue as an update
        await ctx.store.updateEvent(id, fields);
      }
      const fightCard = await reconcileFightCard(scraped.bouts, id, ctx);
      console.log(
        `[event-sync] ${created ? "Created" : "Updated"} event ${fields.name} with ${fightCard.created} new fights (${url})`,
      );
      return { url, status: created ? "created" : "updated", eventId: id, fightCard };
    }

    let status: EventSyncStatus = "unchanged";
    if (existing.contentHash !== contentHash) {
      if (isValidHeader(header)) {
        await ctx.store.updateEvent(existing.id, buildEventFields(header, scraped, contentHash, ctx.now()));
        status = "updated";
      } else {
        // Hash left stale so the next run retries the header
        console.warn(`[event-sync] Not updating header of ${url}: missing ${missingHeaderField(header)}`);
        status = "invalid";
      }
    }

    const fightCard = await reconcileFightCard(scraped.bouts, existing.id, ctx);
    console.log(
      `[event-sync] Event ${status} (${url}): +${fightCard.created} ~${fightCard.updated} -${fightCard.deleted} fights`,
    );
    return { url, status, eventId: existing.id, fightCard };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[event-sync] Failed to process event ${url}: ${message}`);
    return { url, status: "error", error: message };
  }
}
