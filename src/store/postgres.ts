import { and, asc, eq, gte, or } from "drizzle-orm";
import type { Database } from "@/lib/db";
import { events, fighters, fights } from "./schema";
import type {
  CreateResult,
  EventFields,
  EventRecord,
  FightFields,
  FightRecord,
  FighterRecord,
  FighterUpdate,
  NewEvent,
  NewFight,
  NewFighter,
  Store,
} from "./types";

/**
 * Store backed by Postgres through drizzle.
 * Inserts use ON CONFLICT DO NOTHING on the natural keys; a lost race is
 * answered with the row the other writer created.
 */
export class PostgresStore implements Store {
  constructor(private readonly db: Database) {}

  // ── Events ──

  async getEventByUrl(sourceUrl: string): Promise<EventRecord | null> {
    const [row] = await this.db.select().from(events).where(eq(events.sourceUrl, sourceUrl)).limit(1);
    return row ?? null;
  }

  async createEvent(event: NewEvent): Promise<CreateResult> {
    const [row] = await this.db
      .insert(events)
      .values(event)
      .onConflictDoNothing({ target: events.sourceUrl })
      .returning({ id: events.id });
    if (row) return { id: row.id, created: true };

    const existing = await this.getEventByUrl(event.sourceUrl);
    if (!existing) throw new Error(`Event insert conflicted but no row exists for ${event.sourceUrl}`);
    return { id: existing.id, created: false };
  }

  async updateEvent(id: number, fields: Partial<EventFields>): Promise<void> {
    await this.db
      .update(events)
      .set({ ...fields, updatedAt: new Date() })
      .where(eq(events.id, id));
  }

  // ── Fighters ──

  async getFighterByUrl(sourceUrl: string): Promise<FighterRecord | null> {
    const [row] = await this.db.select().from(fighters).where(eq(fighters.sourceUrl, sourceUrl)).limit(1);
    return row ?? null;
  }

  async getFighterById(id: number): Promise<FighterRecord | null> {
    const [row] = await this.db.select().from(fighters).where(eq(fighters.id, id)).limit(1);
    return row ?? null;
  }

  async createFighter(fighter: NewFighter): Promise<CreateResult> {
    const [row] = await this.db
      .insert(fighters)
      .values(fighter)
      .onConflictDoNothing({ target: fighters.sourceUrl })
      .returning({ id: fighters.id });
    if (row) return { id: row.id, created: true };

    const existing = await this.getFighterByUrl(fighter.sourceUrl);
    if (!existing) throw new Error(`Fighter insert conflicted but no row exists for ${fighter.sourceUrl}`);
    return { id: existing.id, created: false };
  }

  async updateFighter(id: number, update: FighterUpdate): Promise<void> {
    await this.db
      .update(fighters)
      .set({ ...update, updatedAt: new Date() })
      .where(eq(fighters.id, id));
  }

  async getFightersToUpdate(recentSince: Date): Promise<FighterRecord[]> {
    return this.db
      .select()
      .from(fighters)
      .where(or(eq(fighters.needsUpdate, true), gte(fighters.lastFightDate, recentSince)))
      .orderBy(asc(fighters.id));
  }

  // ── Fights ──

  async getFightsByEvent(eventId: number): Promise<FightRecord[]> {
    return this.db.select().from(fights).where(eq(fights.eventId, eventId)).orderBy(asc(fights.id));
  }

  async getFightByFighterPairAndEvent(
    eventId: number,
    fighterA: number,
    fighterB: number,
  ): Promise<FightRecord | null> {
    const [row] = await this.db
      .select()
      .from(fights)
      .where(
        and(
          eq(fights.eventId, eventId),
          or(
            and(eq(fights.fighter1Id, fighterA), eq(fights.fighter2Id, fighterB)),
            and(eq(fights.fighter1Id, fighterB), eq(fights.fighter2Id, fighterA)),
          ),
        ),
      )
      .limit(1);
    return row ?? null;
  }

  async createFight(fight: NewFight): Promise<CreateResult> {
    // No conflict target: the pair index is on an expression
    const [row] = await this.db.insert(fights).values(fight).onConflictDoNothing().returning({ id: fights.id });
    if (row) return { id: row.id, created: true };

    const existing = await this.getFightByFighterPairAndEvent(fight.eventId, fight.fighter1Id, fight.fighter2Id);
    if (!existing) {
      throw new Error(`Fight insert conflicted but no row exists for event ${fight.eventId}`);
    }
    return { id: existing.id, created: false };
  }

  async updateFight(id: number, fields: Partial<FightFields>): Promise<void> {
    await this.db
      .update(fights)
      .set({ ...fields, updatedAt: new Date() })
      .where(eq(fights.id, id));
  }

  async deleteFight(id: number): Promise<void> {
    await this.db.delete(fights).where(eq(fights.id, id));
  }
}
