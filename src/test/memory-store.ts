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
} from "@/store/types";

export interface WriteOp {
  op: "create" | "update" | "delete";
  table: "events" | "fighters" | "fights";
  id: number;
}

const samePair = (fight: FightRecord, a: number, b: number) =>
  (fight.fighter1Id === a && fight.fighter2Id === b) || (fight.fighter1Id === b && fight.fighter2Id === a);

/**
 * In-process Store with the same uniqueness rules as the Postgres schema.
 * Every mutation is appended to `writes` so tests can assert idempotence.
 */
export class MemoryStore implements Store {
  readonly events = new Map<number, EventRecord>();
  readonly fighters = new Map<number, FighterRecord>();
  readonly fights = new Map<number, FightRecord>();
  readonly writes: WriteOp[] = [];
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  private record(op: WriteOp["op"], table: WriteOp["table"], id: number) {
    this.writes.push({ op, table, id });
  }

  clearWrites() {
    this.writes.length = 0;
  }

  async getEventByUrl(sourceUrl: string): Promise<EventRecord | null> {
    await Promise.resolve();
    return [...this.events.values()].find((e) => e.sourceUrl === sourceUrl) ?? null;
  }

  async createEvent(event: NewEvent): Promise<CreateResult> {
    const existing = await this.getEventByUrl(event.sourceUrl);
    if (existing) return { id: existing.id, created: false };
    const id = this.nextId++;
    const at = this.now();
    this.events.set(id, { ...event, id, createdAt: at, updatedAt: at });
    this.record("create", "events", id);
    return { id, created: true };
  }

  async updateEvent(id: number, fields: Partial<EventFields>): Promise<void> {
    const current = this.events.get(id);
    if (!current) throw new Error(`No event ${id}`);
    this.events.set(id, { ...current, ...fields, updatedAt: this.now() });
    this.record("update", "events", id);
  }

  async getFighterByUrl(sourceUrl: string): Promise<FighterRecord | null> {
    await Promise.resolve();
    return [...this.fighters.values()].find((f) => f.sourceUrl === sourceUrl) ?? null;
  }

  async getFighterById(id: number): Promise<FighterRecord | null> {
    await Promise.resolve();
    return this.fighters.get(id) ?? null;
  }

  async createFighter(fighter: NewFighter): Promise<CreateResult> {
    const existing = await this.getFighterByUrl(fighter.sourceUrl);
    if (existing) return { id: existing.id, created: false };
    const id = this.nextId++;
    const at = this.now();
    this.fighters.set(id, {
      nickname: null,
      age: null,
      dateOfBirth: null,
      heightCm: null,
      weightClass: null,
      lastWeighInKg: null,
      lastFightDate: null,
      born: null,
      headCoach: null,
      otherCoaches: null,
      affiliation: null,
      proMmaRecord: null,
      totalFights: null,
      currentStreak: null,
      imageUrl: null,
      ...fighter,
      id,
      createdAt: at,
      updatedAt: at,
    });
    this.record("create", "fighters", id);
    return { id, created: true };
  }

  async updateFighter(id: number, update: FighterUpdate): Promise<void> {
    const current = this.fighters.get(id);
    if (!current) throw new Error(`No fighter ${id}`);
    this.fighters.set(id, { ...current, ...update, updatedAt: this.now() });
    this.record("update", "fighters", id);
  }

  async getFightersToUpdate(recentSince: Date): Promise<FighterRecord[]> {
    await Promise.resolve();
    return [...this.fighters.values()].filter(
      (f) => f.needsUpdate || (f.lastFightDate !== null && f.lastFightDate >= recentSince),
    );
  }

  async getFightsByEvent(eventId: number): Promise<FightRecord[]> {
    await Promise.resolve();
    return [...this.fights.values()].filter((f) => f.eventId === eventId);
  }

  async getFightByFighterPairAndEvent(
    eventId: number,
    fighterA: number,
    fighterB: number,
  ): Promise<FightRecord | null> {
    const fights = await this.getFightsByEvent(eventId);
    return fights.find((f) => samePair(f, fighterA, fighterB)) ?? null;
  }

  async createFight(fight: NewFight): Promise<CreateResult> {
    const existing = await this.getFightByFighterPairAndEvent(fight.eventId, fight.fighter1Id, fight.fighter2Id);
    if (existing) return { id: existing.id, created: false };
    const id = this.nextId++;
    const at = this.now();
    this.fights.set(id, { ...fight, id, createdAt: at, updatedAt: at });
    this.record("create", "fights", id);
    return { id, created: true };
  }

  async updateFight(id: number, fields: Partial<FightFields>): Promise<void> {
    const current = this.fights.get(id);
    if (!current) throw new Error(`No fight ${id}`);
    this.fights.set(id, { ...current, ...fields, updatedAt: this.now() });
    this.record("update", "fights", id);
  }

  async deleteFight(id: number): Promise<void> {
    this.fights.delete(id);
    this.record("delete", "fights", id);
  }
}
