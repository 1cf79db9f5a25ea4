import type { FighterRecord } from "@/store/types";
import type { SyncContext } from "./context";
import { fetchFighterProfile } from "./fighter-profile";

export type FighterSyncStatus = "updated" | "unchanged" | "fetch_failed" | "error";

export interface FighterSyncResult {
  fighterId: number;
  url: string;
  status: FighterSyncStatus;
  error?: string;
}

/**
 * Refresh one fighter from its profile page.
 * Same hash: only a pending needs_update flag is cleared. New hash: profile
 * columns are rewritten. A failed fetch leaves the flag set for the next run.
 */
export async function syncFighter(fighter: FighterRecord, ctx: SyncContext): Promise<FighterSyncResult> {
  const base = { fighterId: fighter.id, url: fighter.sourceUrl };
  try {
    const profile = await fetchFighterProfile(fighter.sourceUrl, fighter.name, ctx);
    if (!profile) {
      console.error(`[fighter-sync] No profile data for ${fighter.name ?? fighter.sourceUrl}`);
      return { ...base, status: "fetch_failed" };
    }

    if (profile.contentHash === fighter.contentHash) {
      if (fighter.needsUpdate) await ctx.store.updateFighter(fighter.id, { needsUpdate: false });
      return { ...base, status: "unchanged" };
    }

    await ctx.store.updateFighter(fighter.id, {
      ...profile.fields,
      contentHash: profile.contentHash,
      needsUpdate: false,
    });
    console.log(`[fighter-sync] Updated ${profile.fields.name ?? fighter.sourceUrl}`);
    return { ...base, status: "updated" };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[fighter-sync] Failed to update ${fighter.sourceUrl}: ${message}`);
    return { ...base, status: "error", error: message };
  }
}
