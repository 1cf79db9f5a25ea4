import { z } from "zod";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const booleanFlag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback ? "true" : "false")
    .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  SOURCE_BASE_URL: z.string().url().default("https://www.tapology.com"),
  PROMOTION_PATH: z
    .string()
    .startsWith("/")
    .default("/fightcenter/promotions/1-ultimate-fighting-championship-ufc"),
  DAYS_OFFSET: positiveInt(7),
  FIGHTER_RECENT_DAYS: positiveInt(7),
  CONCURRENT_REQUESTS: positiveInt(5),
  RETRY_ATTEMPTS: positiveInt(3),
  FETCH_PROFILES_ON_CREATE: booleanFlag(true),
  MAX_LISTING_PAGES: positiveInt(50),
  LIVE_WINDOW_HOURS: positiveInt(4),
});

/** Runtime knobs shared by every sync entry point. */
export interface SyncSettings {
  /** Origin of the listing site, no trailing slash */
  baseUrl: string;
  /** Absolute URL of the promotion's event listing */
  promotionUrl: string;
  /** Recent-events window is now ± this many days */
  daysOffset: number;
  /** Fighters whose last fight falls within this many days are refreshed */
  fighterRecentDays: number;
  concurrentRequests: number;
  retryAttempts: number;
  /** Fetch full profiles for newly created fighters instead of leaving stubs */
  fetchProfilesOnCreate: boolean;
  maxListingPages: number;
  liveWindowHours: number;
}

export interface AppConfig {
  databaseUrl: string | undefined;
  settings: SyncSettings;
}

/**
 * Parse configuration from environment variables.
 * Throws with every invalid variable listed when the environment is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  const baseUrl = e.SOURCE_BASE_URL.replace(/\/+$/, "");
  return {
    databaseUrl: e.DATABASE_URL,
    settings: {
      baseUrl,
      promotionUrl: `${baseUrl}${e.PROMOTION_PATH}`,
      daysOffset: e.DAYS_OFFSET,
      fighterRecentDays: e.FIGHTER_RECENT_DAYS,
      concurrentRequests: e.CONCURRENT_REQUESTS,
      retryAttempts: e.RETRY_ATTEMPTS,
      fetchProfilesOnCreate: e.FETCH_PROFILES_ON_CREATE,
      maxListingPages: e.MAX_LISTING_PAGES,
      liveWindowHours: e.LIVE_WINDOW_HOURS,
    },
  };
}

/** Defaults with no environment applied (used by tests and fallbacks). */
export function defaultSettings(overrides?: Partial<SyncSettings>): SyncSettings {
  return { ...loadConfig({}).settings, ...overrides };
}
