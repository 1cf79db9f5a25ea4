import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@/store/schema";

export type Database = NodePgDatabase<typeof schema>;

export interface DbHandle {
  db: Database;
  /** Close the pool so CLI processes can exit */
  close: () => Promise<void>;
}

/** Open a pooled connection. Throws when no connection string is configured. */
export function createDb(databaseUrl: string | undefined): DbHandle {
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is not configured");
  }
  const pool = new pg.Pool({ connectionString: databaseUrl });
  return {
    db: drizzle(pool, { schema }),
    close: () => pool.end(),
  };
}
