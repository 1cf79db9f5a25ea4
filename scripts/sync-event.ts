/**
 * Reconcile a single event page.
 *
 * Usage: npm run sync:event -- <event-url>
 */
import "dotenv/config";
import { openRuntime } from "../src/lib/runtime";
import { reconcileSingleEvent } from "../src/pipeline/sync";

async function main() {
  const url = process.argv[2];
  if (!url) {
    console.error("Usage: npm run sync:event -- <event-url>");
    process.exit(1);
  }

  const runtime = openRuntime();
  try {
    const result = await reconcileSingleEvent(runtime.deps, url);
    console.log(`${result.status}: ${url}`);
    if (result.fightCard) {
      const { created, updated, deleted, unchanged, skipped } = result.fightCard;
      console.log(`  fights: ${created} created, ${updated} updated, ${deleted} deleted, ${unchanged} unchanged, ${skipped} skipped`);
    }
    if (result.status === "error" || result.status === "fetch_failed" || result.status === "invalid") {
      process.exitCode = 1;
    }
  } finally {
    await runtime.close();
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
