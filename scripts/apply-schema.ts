/**
 * Create the events, fighters and fights tables if they do not exist.
 *
 * Usage: npm run db:apply-schema
 */
import "dotenv/config";
import { readFileSync } from "node:fs";
import pg from "pg";
import { loadConfig } from "../src/lib/config";

async function main() {
  const { databaseUrl } = loadConfig();
  if (!databaseUrl) {
    console.error("DATABASE_URL is not configured");
    process.exit(1);
  }

  const ddl = readFileSync(new URL("../src/store/schema.sql", import.meta.url), "utf8");
  const client = new pg.Client({ connectionString: databaseUrl });
  await client.connect();
  try {
    await client.query(ddl);
    console.log("Schema applied");
  } finally {
    await client.end();
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
