import { createExtractor } from "@/adapters/extractor";
import type { SyncDeps } from "@/pipeline/context";
import { PostgresStore } from "@/store/postgres";
import { loadConfig } from "./config";
import { createDb } from "./db";

export interface Runtime {
  deps: SyncDeps;
  close: () => Promise<void>;
}

/** Wire the Postgres store and HTTP extractor from environment configuration. */
export function openRuntime(env: NodeJS.ProcessEnv = process.env): Runtime {
  const config = loadConfig(env);
  const { db, close } = createDb(config.databaseUrl);
  return {
    deps: {
      store: new PostgresStore(db),
      extract: createExtractor({ retryAttempts: config.settings.retryAttempts }),
      settings: config.settings,
    },
    close,
  };
}
