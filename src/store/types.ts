export const FIGHT_RESULTS = ["win", "loss", "draw", "no_contest", "cancelled", "unknown"] as const;
export type FightResult = (typeof FIGHT_RESULTS)[number];

export interface EventRecord {
  id: number;
  sourceUrl: string;
  name: string;
  scheduledAt: Date | null; // null when the listing date could not be parsed
  promotion: string | null;
  venue: string | null;
  location: string | null;
  broadcast: string | null;
  boutCount: number | null;
  imageUrl: string | null;
  contentHash: string;
  createdAt: Date;
  updatedAt: Date;
}

export type EventFields = Omit<EventRecord, "id" | "sourceUrl" | "createdAt" | "updatedAt">;
export type NewEvent = EventFields & { sourceUrl: string };

export interface FighterRecord {
  id: number;
  sourceUrl: string;
  name: string | null;
  nickname: string | null;
  age: number | null;
  dateOfBirth: Date | null;
  heightCm: number | null;
  weightClass: string | null;
  lastWeighInKg: number | null;
  lastFightDate: Date | null;
  born: string | null;
  headCoach: string | null;
  otherCoaches: string | null;
  affiliation: string | null;
  proMmaRecord: string | null; // "W-L-D" or "W-L-D-NC"
  totalFights: number | null;
  currentStreak: string | null;
  imageUrl: string | null;
  needsUpdate: boolean;
  contentHash: string | null; // null for stubs
  createdAt: Date;
  updatedAt: Date;
}

/** Fields filled from a fighter's profile page */
export type FighterProfileFields = Omit<
  FighterRecord,
  "id" | "sourceUrl" | "needsUpdate" | "contentHash" | "createdAt" | "updatedAt"
>;

export type NewFighter = Partial<FighterProfileFields> & {
  sourceUrl: string;
  name: string | null;
  needsUpdate: boolean;
  contentHash: string | null;
};

export type FighterUpdate = Partial<Omit<FighterRecord, "id" | "sourceUrl" | "createdAt" | "updatedAt">>;

export interface FightRecord {
  id: number;
  eventId: number;
  fighter1Id: number;
  fighter2Id: number;
  boutOrder: number | null;
  fightType: string | null;
  weightClass: string | null;
  finishMethod: string | null;
  finishDetails: string | null;
  rounds: number | null;
  minutesPerRound: number | null;
  result1: FightResult; // outcome for fighter1Id
  result2: FightResult;
  createdAt: Date;
  updatedAt: Date;
}

export type FightFields = Omit<FightRecord, "id" | "eventId" | "fighter1Id" | "fighter2Id" | "createdAt" | "updatedAt">;
export type NewFight = FightFields & { eventId: number; fighter1Id: number; fighter2Id: number };

/** Outcome of a conflict-safe insert: `created` is false when another writer got there first */
export interface CreateResult {
  id: number;
  created: boolean;
}

/**
 * Storage collaborator. Creates are conflict-safe on the natural keys
 * (event URL, fighter URL, event + unordered fighter pair).
 */
export interface Store {
  getEventByUrl(sourceUrl: string): Promise<EventRecord | null>;
  createEvent(event: NewEvent): Promise<CreateResult>;
  updateEvent(id: number, fields: Partial<EventFields>): Promise<void>;

  getFighterByUrl(sourceUrl: string): Promise<FighterRecord | null>;
  getFighterById(id: number): Promise<FighterRecord | null>;
  createFighter(fighter: NewFighter): Promise<CreateResult>;
  updateFighter(id: number, update: FighterUpdate): Promise<void>;
  /** Fighters flagged for refresh, or whose last fight is on/after `recentSince` */
  getFightersToUpdate(recentSince: Date): Promise<FighterRecord[]>;

  getFightsByEvent(eventId: number): Promise<FightRecord[]>;
  /** Matches either fighter order */
  getFightByFighterPairAndEvent(eventId: number, fighterA: number, fighterB: number): Promise<FightRecord | null>;
  createFight(fight: NewFight): Promise<CreateResult>;
  updateFight(id: number, fields: Partial<FightFields>): Promise<void>;
  deleteFight(id: number): Promise<void>;
}
