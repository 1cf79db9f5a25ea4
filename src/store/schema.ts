import { sql } from "drizzle-orm";
import {
  pgTable,
  serial,
  integer,
  text,
  real,
  boolean,
  timestamp,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { FIGHT_RESULTS } from "./types";

const timestamps = {
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
};

// ─── Events ───────────────────────────────────────────────────────────────────

export const events = pgTable(
  "events",
  {
    id: serial("id").primaryKey(),
    sourceUrl: text("source_url").notNull(),
    name: text("name").notNull(),
    scheduledAt: timestamp("scheduled_at", { withTimezone: true }),
    promotion: text("promotion"),
    venue: text("venue"),
    location: text("location"),
    broadcast: text("broadcast"),
    boutCount: integer("bout_count"),
    imageUrl: text("image_url"),
    contentHash: text("content_hash").notNull(),
    ...timestamps,
  },
  (t) => [uniqueIndex("events_source_url_idx").on(t.sourceUrl)]
);

// ─── Fighters ─────────────────────────────────────────────────────────────────

export const fighters = pgTable(
  "fighters",
  {
    id: serial("id").primaryKey(),
    sourceUrl: text("source_url").notNull(),
    name: text("name"),
    nickname: text("nickname"),
    age: integer("age"),
    dateOfBirth: timestamp("date_of_birth", { withTimezone: true }),
    heightCm: integer("height_cm"),
    weightClass: text("weight_class"),
    lastWeighInKg: real("last_weigh_in_kg"),
    lastFightDate: timestamp("last_fight_date", { withTimezone: true }),
    born: text("born"),
    headCoach: text("head_coach"),
    otherCoaches: text("other_coaches"),
    affiliation: text("affiliation"),
    proMmaRecord: text("pro_mma_record"), // "W-L-D[-NC]"
    totalFights: integer("total_fights"),
    currentStreak: text("current_streak"),
    imageUrl: text("image_url"),
    needsUpdate: boolean("needs_update").notNull().default(true),
    contentHash: text("content_hash"),
    ...timestamps,
  },
  (t) => [
    uniqueIndex("fighters_source_url_idx").on(t.sourceUrl),
    index("fighters_needs_update_idx").on(t.needsUpdate),
  ]
);

// ─── Fights ───────────────────────────────────────────────────────────────────
// One row per event per unordered fighter pair.

export const fights = pgTable(
  "fights",
  {
    id: serial("id").primaryKey(),
    eventId: integer("event_id")
      .notNull()
      .references(() => events.id, { onDelete: "cascade" }),
    fighter1Id: integer("fighter_1_id")
      .notNull()
      .references(() => fighters.id),
    fighter2Id: integer("fighter_2_id")
      .notNull()
      .references(() => fighters.id),
    boutOrder: integer("bout_order"),
    fightType: text("fight_type"),
    weightClass: text("weight_class"),
    finishMethod: text("finish_method"),
    finishDetails: text("finish_details"),
    rounds: integer("rounds"),
    minutesPerRound: integer("minutes_per_round"),
    result1: text("result_fighter_1", { enum: FIGHT_RESULTS }).notNull().default("unknown"),
    result2: text("result_fighter_2", { enum: FIGHT_RESULTS }).notNull().default("unknown"),
    ...timestamps,
  },
  (t) => [
    uniqueIndex("fights_event_pair_idx").on(
      t.eventId,
      sql`least(${t.fighter1Id}, ${t.fighter2Id})`,
      sql`greatest(${t.fighter1Id}, ${t.fighter2Id})`
    ),
    index("fights_event_idx").on(t.eventId),
  ]
);
