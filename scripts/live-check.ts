/**
 * Reconcile the event in progress, if any. Meant to run every few minutes on event nights.
 *
 * Usage: npm run sync:live
 */
import "dotenv/config";
import { openRuntime } from "../src/lib/runtime";
import { checkLiveEvents } from "../src/pipeline/sync";

async function main() {
  const runtime = openRuntime();
  try {
    const result = await checkLiveEvents(runtime.deps);
    if (result.summary && result.summary.counts.error > 0) process.exitCode = 1;
  } finally {
    await runtime.close();
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
