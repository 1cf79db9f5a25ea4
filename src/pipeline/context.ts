import type { Extractor } from "@/adapters/types";
import type { SyncSettings } from "@/lib/config";
import type { Store } from "@/store/types";
import type { ResolveOutcome } from "./fighter-resolver";

/** Collaborators an entry point is given */
export interface SyncDeps {
  store: Store;
  extract: Extractor;
  settings: SyncSettings;
  /** Clock; injectable for tests */
  now?: () => Date;
}

/**
 * Per-batch state shared by every unit of work in one run.
 * The fighter cache maps a normalized profile URL to its in-flight or settled resolution.
 */
export interface SyncContext {
  store: Store;
  extract: Extractor;
  settings: SyncSettings;
  now: () => Date;
  fighterCache: Map<string, Promise<ResolveOutcome>>;
}

/** Build a fresh context; call once per batch so nothing leaks between runs. */
export function createSyncContext(deps: SyncDeps): SyncContext {
  return {
    store: deps.store,
    extract: deps.extract,
    settings: deps.settings,
    now: deps.now ?? (() => new Date()),
    fighterCache: new Map(),
  };
}
