import { toAbsoluteUrl } from "@/adapters/utils";
import type { NewFighter } from "@/store/types";
import type { SyncContext } from "./context";
import { fetchFighterProfile } from "./fighter-profile";

export type ResolveFailure = "missing_url" | "invalid_url" | "storage_error";

export type ResolveOutcome =
  | { status: "found"; fighterId: number }
  | { status: "created"; fighterId: number; enriched: boolean }
  | { status: "failed"; reason: ResolveFailure; message: string };

/** Fighter id of a successful resolution, else null */
export function fighterIdOf(outcome: ResolveOutcome): number | null {
  return outcome.status === "failed" ? null : outcome.fighterId;
}

/** Create path: enrich from the profile page when enabled, otherwise (or on failure) a stub. */
async function createFighterRecord(
  url: string,
  displayName: string | null,
  ctx: SyncContext,
): Promise<{ record: NewFighter; enriched: boolean }> {
  const name = displayName?.trim() || null;
  const profile = ctx.settings.fetchProfilesOnCreate ? await fetchFighterProfile(url, name, ctx) : null;

  if (!profile) {
    if (ctx.settings.fetchProfilesOnCreate) {
      console.warn(`[fighter-resolver] No profile data for ${name ?? url}, creating stub`);
    }
    return { record: { sourceUrl: url, name, needsUpdate: true, contentHash: null }, enriched: false };
  }

  return {
    record: { ...profile.fields, sourceUrl: url, needsUpdate: false, contentHash: profile.contentHash },
    enriched: true,
  };
}

async function resolveUncached(url: string, displayName: string | null, ctx: SyncContext): Promise<ResolveOutcome> {
  try {
    const existing = await ctx.store.getFighterByUrl(url);
    if (existing) return { status: "found", fighterId: existing.id };

    const { record, enriched } = await createFighterRecord(url, displayName, ctx);
    const { id, created } = await ctx.store.createFighter(record);
    // Another writer inserted the same URL between our lookup and insert
    if (!created) return { status: "found", fighterId: id };

    console.log(`[fighter-resolver] Created fighter ${record.name ?? url}${enriched ? "" : " (stub)"}`);
    return { status: "created", fighterId: id, enriched };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[fighter-resolver] Failed to resolve ${url}: ${message}`);
    return { status: "failed", reason: "storage_error", message };
  }
}

/**
 * Resolve a fighter profile URL to a Fighter id, creating the fighter if needed.
 *
 * Pipeline:
 * 1. Empty or unparseable URL → failed
 * 2. Batch cache hit (settled or in flight) → same fighter, reported as found
 * 3. Existing Fighter by URL → found (no fetch, no write)
 * 4. Otherwise create, enriched from the profile page or as a needs_update stub
 *
 * Failed resolutions are evicted from the cache so a later bout can retry.
 */
export async function resolveFighter(
  sourceUrl: string | null,
  displayName: string | null,
  ctx: SyncContext,
): Promise<ResolveOutcome> {
  if (!sourceUrl?.trim()) {
    return { status: "failed", reason: "missing_url", message: `No profile URL for ${displayName ?? "fighter"}` };
  }
  const url = toAbsoluteUrl(sourceUrl, ctx.settings.baseUrl);
  if (!url) {
    return { status: "failed", reason: "invalid_url", message: `Invalid profile URL: ${sourceUrl}` };
  }

  const cached = ctx.fighterCache.get(url);
  if (cached) {
    const outcome = await cached;
    return outcome.status === "created" ? { status: "found", fighterId: outcome.fighterId } : outcome;
  }

  const pending = resolveUncached(url, displayName, ctx).then((outcome) => {
    if (outcome.status === "failed") ctx.fighterCache.delete(url);
    return outcome;
  });
  ctx.fighterCache.set(url, pending);
  return pending;
}
