import type { ScrapedBout } from "@/adapters/types";
import type { FightFields, FightRecord, FightResult } from "@/store/types";
import type { SyncContext } from "./context";
import { fighterIdOf, resolveFighter } from "./fighter-resolver";

export interface FightCardResult {
  created: number;
  updated: number;
  deleted: number;
  unchanged: number;
  skipped: number; // bouts missing a link, or with an unresolvable or repeated fighter
  /** Fights left in place because a bout involving one of their fighters failed to resolve */
  protectedFromDeletion: number;
  errors: string[];
}

const FIGHT_FIELD_KEYS = [
  "boutOrder",
  "fightType",
  "weightClass",
  "finishMethod",
  "finishDetails",
  "rounds",
  "minutesPerRound",
  "result1",
  "result2",
] as const satisfies readonly (keyof FightFields)[];

const RESULT_ALIASES: Record<string, FightResult> = {
  w: "win",
  win: "win",
  won: "win",
  l: "loss",
  loss: "loss",
  lost: "loss",
  d: "draw",
  draw: "draw",
  nc: "no_contest",
  "no contest": "no_contest",
  "no-contest": "no_contest",
  cancelled: "cancelled",
  canceled: "cancelled",
  cancel: "cancelled",
};

/**
 * Map a scraped result label to a result.
 * Text without letters (a record such as "16-0" in the result slot) is not a result.
 */
export function normalizeResult(raw: string | null): FightResult {
  const value = raw?.trim().toLowerCase().replace(/\.$/, "");
  if (!value || !/[a-z]/.test(value)) return "unknown";
  return RESULT_ALIASES[value] ?? "unknown";
}

/** "3 x 5" → 3 rounds of 5 minutes; "5 Rounds" → 5 rounds */
export function parseRoundFormat(raw: string | null): { rounds: number | null; minutesPerRound: number | null } {
  const both = raw?.match(/(\d+)\s*x\s*(\d+)/i);
  if (both) return { rounds: parseInt(both[1], 10), minutesPerRound: parseInt(both[2], 10) };
  const roundsOnly = raw?.match(/(\d+)\s*rounds?/i);
  return { rounds: roundsOnly ? parseInt(roundsOnly[1], 10) : null, minutesPerRound: null };
}

/** Stored fields for a bout, with results oriented as fighter1 / fighter2 of the bout */
export function boutToFightFields(bout: ScrapedBout): FightFields {
  return {
    boutOrder: bout.boutOrder,
    fightType: bout.fightType,
    weightClass: bout.weightClass,
    finishMethod: bout.finishMethod,
    finishDetails: bout.finishDetails,
    ...parseRoundFormat(bout.roundFormat),
    result1: normalizeResult(bout.result1),
    result2: normalizeResult(bout.result2),
  };
}

/** Unordered pair identity */
export function pairKey(a: number, b: number): string {
  return a < b ? `${a}:${b}` : `${b}:${a}`;
}

/** Express fields in the stored fight's fighter order. */
function orientTo(fight: Pick<FightRecord, "fighter1Id">, fighterA: number, fields: FightFields): FightFields {
  if (fight.fighter1Id === fighterA) return fields;
  return { ...fields, result1: fields.result2, result2: fields.result1 };
}

/** Fields whose desired value differs from the stored one */
export function diffFightFields(current: FightFields, desired: FightFields): Partial<FightFields> {
  const changes: Partial<FightFields> = {};
  for (const key of FIGHT_FIELD_KEYS) {
    if (current[key] !== desired[key]) Object.assign(changes, { [key]: desired[key] });
  }
  return changes;
}

interface TargetFight {
  fighterA: number;
  fighterB: number;
  fields: FightFields;
  label: string;
}

function boutLabel(bout: ScrapedBout): string {
  return `${bout.fighter1.name ?? bout.fighter1.url ?? "?"} vs ${bout.fighter2.name ?? bout.fighter2.url ?? "?"}`;
}

function recordError(result: FightCardResult, msg: string) {
  console.error(`[fight-card] ${msg}`);
  if (result.errors.length < 50) result.errors.push(msg);
}

async function updateExisting(
  existing: FightRecord,
  target: TargetFight,
  ctx: SyncContext,
  result: FightCardResult,
): Promise<void> {
  const desired = orientTo(existing, target.fighterA, target.fields);
  const changes = diffFightFields(existing, desired);
  if (Object.keys(changes).length === 0) {
    result.unchanged++;
    return;
  }

  await ctx.store.updateFight(existing.id, changes);
  result.updated++;

  // A new result changes both records; the fighter-profile job picks these up.
  if (changes.result1 !== undefined || changes.result2 !== undefined) {
    await ctx.store.updateFighter(existing.fighter1Id, { needsUpdate: true });
    await ctx.store.updateFighter(existing.fighter2Id, { needsUpdate: true });
  }
}

/**
 * Reconcile a freshly scraped fight card against the stored fights of an event.
 *
 * 1. Resolve both fighters of every bout → target pairs
 * 2. Delete stored fights whose pair is no longer on the card
 * 3. Update stored fights whose fields changed; create the new pairs
 *
 * A bout whose fighter failed to resolve protects any stored fight involving
 * the fighter that did resolve; if neither resolved, nothing is deleted this pass.
 */
export async function reconcileFightCard(
  bouts: ScrapedBout[],
  eventId: number,
  ctx: SyncContext,
): Promise<FightCardResult> {
  const result: FightCardResult = {
    created: 0,
    updated: 0,
    deleted: 0,
    unchanged: 0,
    skipped: 0,
    protectedFromDeletion: 0,
    errors: [],
  };

  const targets = new Map<string, TargetFight>();
  const protectedFighters = new Set<number>();
  let holdAllDeletions = false;

  // Sequential: keeps profile fetches for new fighters inside the event's concurrency slot
  for (const bout of bouts) {
    const label = boutLabel(bout);
    if (!bout.fighter1.url || !bout.fighter2.url) {
      console.warn(`[fight-card] Skipping bout without both profile links: ${label}`);
      result.skipped++;
      continue;
    }

    const outcome1 = await resolveFighter(bout.fighter1.url, bout.fighter1.name, ctx);
    const outcome2 = await resolveFighter(bout.fighter2.url, bout.fighter2.name, ctx);
    const fighterA = fighterIdOf(outcome1);
    const fighterB = fighterIdOf(outcome2);

    if (fighterA === null || fighterB === null) {
      result.skipped++;
      recordError(result, `Event ${eventId}: could not resolve fighters for ${label}`);
      if (fighterA !== null) protectedFighters.add(fighterA);
      if (fighterB !== null) protectedFighters.add(fighterB);
      if (fighterA === null && fighterB === null) holdAllDeletions = true;
      continue;
    }
    if (fighterA === fighterB) {
      console.warn(`[fight-card] Skipping bout with the same fighter on both sides: ${label}`);
      result.skipped++;
      continue;
    }

    const key = pairKey(fighterA, fighterB);
    if (targets.has(key)) {
      console.warn(`[fight-card] Duplicate bout on card, keeping the first: ${label}`);
      result.skipped++;
      continue;
    }
    targets.set(key, { fighterA, fighterB, fields: boutToFightFields(bout), label });
  }

  const current = await ctx.store.getFightsByEvent(eventId);
  const currentByKey = new Map(current.map((fight) => [pairKey(fight.fighter1Id, fight.fighter2Id), fight]));

  // Deletions
  for (const [key, fight] of currentByKey) {
    if (targets.has(key)) continue;
    if (holdAllDeletions || protectedFighters.has(fight.fighter1Id) || protectedFighters.has(fight.fighter2Id)) {
      result.protectedFromDeletion++;
      continue;
    }
    try {
      await ctx.store.deleteFight(fight.id);
      result.deleted++;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      recordError(result, `Event ${eventId}: failed to delete fight ${fight.id}: ${reason}`);
    }
  }

  // Upserts
  for (const [key, target] of targets) {
    try {
      const existing = currentByKey.get(key);
      if (existing) {
        await updateExisting(existing, target, ctx, result);
        continue;
      }

      const { created } = await ctx.store.createFight({
        eventId,
        fighter1Id: target.fighterA,
        fighter2Id: target.fighterB,
        ...target.fields,
      });
      if (created) {
        result.created++;
        continue;
      }

      // A concurrent run inserted this pair first
      const raced = await ctx.store.getFightByFighterPairAndEvent(eventId, target.fighterA, target.fighterB);
      if (raced) await updateExisting(raced, target, ctx, result);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      recordError(result, `Event ${eventId}: ${target.label}: ${reason}`);
    }
  }

  return result;
}
