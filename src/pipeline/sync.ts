import { subDays } from "date-fns";
import { discoverEventUrls, findLiveEvent, type DiscoveryMode } from "@/adapters/tapology/discovery";
import { toAbsoluteUrl, validateSourceUrl } from "@/adapters/utils";
import { runBounded } from "./concurrency";
import { createSyncContext, type SyncDeps } from "./context";
import { syncEvent, type EventSyncResult, type EventSyncStatus } from "./event-sync";
import { syncFighter, type FighterSyncResult, type FighterSyncStatus } from "./fighter-sync";

const MAX_ERRORS = 50;

export interface BatchSummary<S extends string> {
  total: number;
  counts: Record<S, number>;
  errors: string[];
  durationMs: number;
}

export interface EventBatchSummary extends BatchSummary<EventSyncStatus> {
  fightsCreated: number;
  fightsUpdated: number;
  fightsDeleted: number;
  results: EventSyncResult[];
}

export interface FighterBatchSummary extends BatchSummary<FighterSyncStatus> {
  results: FighterSyncResult[];
}

function emptyEventCounts(): Record<EventSyncStatus, number> {
  return { created: 0, updated: 0, unchanged: 0, fetch_failed: 0, invalid: 0, error: 0 };
}

function emptyFighterCounts(): Record<FighterSyncStatus, number> {
  return { updated: 0, unchanged: 0, fetch_failed: 0, error: 0 };
}

function pushError(errors: string[], message: string): void {
  if (errors.length < MAX_ERRORS) errors.push(message);
}

function summarizeEvents(
  settled: PromiseSettledResult<EventSyncResult>[],
  urls: string[],
  startedAt: number,
): EventBatchSummary {
  const summary: EventBatchSummary = {
    total: urls.length,
    counts: emptyEventCounts(),
    errors: [],
    durationMs: 0,
    fightsCreated: 0,
    fightsUpdated: 0,
    fightsDeleted: 0,
    results: [],
  };

  settled.forEach((outcome, i) => {
    const result: EventSyncResult =
      outcome.status === "fulfilled"
        ? outcome.value
        : {
            url: urls[i],
            status: "error",
            error: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
          };
    summary.results.push(result);
    summary.counts[result.status]++;
    if (result.error) pushError(summary.errors, `${result.url}: ${result.error}`);
    if (result.fightCard) {
      summary.fightsCreated += result.fightCard.created;
      summary.fightsUpdated += result.fightCard.updated;
      summary.fightsDeleted += result.fightCard.deleted;
      for (const error of result.fightCard.errors) pushError(summary.errors, `${result.url}: ${error}`);
    }
  });

  summary.durationMs = Date.now() - startedAt;
  return summary;
}

async function syncEventUrls(urls: string[], deps: SyncDeps): Promise<EventBatchSummary> {
  const startedAt = Date.now();
  const ctx = createSyncContext(deps);
  const settled = await runBounded(urls, ctx.settings.concurrentRequests, (url) => syncEvent(url, ctx));
  return summarizeEvents(settled, urls, startedAt);
}

export interface ReconcileEventsOptions {
  mode?: DiscoveryMode;
}

/**
 * Discover events on the promotion listing and reconcile each one.
 * Defaults to the recent window (now ± daysOffset).
 */
export async function reconcileRecentEvents(
  deps: SyncDeps,
  options: ReconcileEventsOptions = {},
): Promise<EventBatchSummary> {
  const mode = options.mode ?? "recent";
  const now = deps.now ?? (() => new Date());
  const urls = await discoverEventUrls(mode, { extract: deps.extract, settings: deps.settings, now });
  if (urls.length === 0) console.log(`[sync] No events to process in ${mode} mode`);

  const summary = await syncEventUrls(urls, deps);
  const c = summary.counts;
  console.log(
    `[sync] ${mode}: ${summary.total} events (${c.created} created, ${c.updated} updated, ${c.unchanged} unchanged, ` +
      `${c.fetch_failed + c.invalid + c.error} failed) in ${summary.durationMs}ms`,
  );
  return summary;
}

/**
 * Reconcile one event page by URL. The URL is normalized the same way discovered
 * links are, so a fragment or relative path maps to the same event row.
 */
export async function reconcileSingleEvent(deps: SyncDeps, url: string): Promise<EventSyncResult> {
  const normalized = toAbsoluteUrl(url, deps.settings.baseUrl);
  if (!normalized) {
    console.error(`[sync] Refusing event URL ${url}: not an http(s) URL`);
    return { url, status: "invalid", error: "Not an http(s) URL" };
  }
  try {
    validateSourceUrl(normalized);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[sync] Refusing event URL ${normalized}: ${message}`);
    return { url: normalized, status: "invalid", error: message };
  }
  const ctx = createSyncContext(deps);
  return syncEvent(normalized, ctx);
}

/** Refresh every fighter flagged for update or who fought within `fighterRecentDays`. */
export async function updateFlaggedFighters(deps: SyncDeps): Promise<FighterBatchSummary> {
  const startedAt = Date.now();
  const ctx = createSyncContext(deps);
  const since = subDays(ctx.now(), ctx.settings.fighterRecentDays);
  const fighters = await ctx.store.getFightersToUpdate(since);
  console.log(`[sync] ${fighters.length} fighter(s) to refresh`);

  const settled = await runBounded(fighters, ctx.settings.concurrentRequests, (fighter) => syncFighter(fighter, ctx));

  const summary: FighterBatchSummary = {
    total: fighters.length,
    counts: emptyFighterCounts(),
    errors: [],
    durationMs: 0,
    results: [],
  };
  settled.forEach((outcome, i) => {
    const result: FighterSyncResult =
      outcome.status === "fulfilled"
        ? outcome.value
        : {
            fighterId: fighters[i].id,
            url: fighters[i].sourceUrl,
            status: "error",
            error: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
          };
    summary.results.push(result);
    summary.counts[result.status]++;
    if (result.error) pushError(summary.errors, `${result.url}: ${result.error}`);
  });
  summary.durationMs = Date.now() - startedAt;

  const c = summary.counts;
  console.log(
    `[sync] Fighters: ${c.updated} updated, ${c.unchanged} unchanged, ${c.fetch_failed + c.error} failed in ${summary.durationMs}ms`,
  );
  return summary;
}

/** Refresh a single fighter by id, regardless of its flag. Null when no such fighter exists. */
export async function refreshFighter(deps: SyncDeps, fighterId: number): Promise<FighterSyncResult | null> {
  const ctx = createSyncContext(deps);
  const fighter = await ctx.store.getFighterById(fighterId);
  if (!fighter) {
    console.warn(`[sync] Fighter ${fighterId} not found`);
    return null;
  }
  return syncFighter(fighter, ctx);
}

export interface LiveCheckResult {
  live: boolean;
  eventUrl?: string;
  summary?: EventBatchSummary;
}

/**
 * If an event on the first listing page starts within `liveWindowHours` of now,
 * reconcile that one event so in-progress results are picked up.
 */
export async function checkLiveEvents(deps: SyncDeps): Promise<LiveCheckResult> {
  const now = deps.now ?? (() => new Date());
  const live = await findLiveEvent({ extract: deps.extract, settings: deps.settings, now });
  if (!live) {
    console.log("[sync] No live events within the configured window");
    return { live: false };
  }
  console.log(`[sync] Live event detected: ${live.url}`);
  const summary = await syncEventUrls([live.url], deps);
  return { live: true, eventUrl: live.url, summary };
}
