/**
 * Reconcile events from the promotion listing.
 *
 * Usage: npm run sync:events -- [recent|upcoming|all]
 */
import "dotenv/config";
import type { DiscoveryMode } from "../src/adapters/tapology/discovery";
import { openRuntime } from "../src/lib/runtime";
import { reconcileRecentEvents } from "../src/pipeline/sync";

const MODES: readonly DiscoveryMode[] = ["recent", "upcoming", "all"];

function parseMode(arg: string | undefined): DiscoveryMode | null {
  if (arg === undefined) return "recent";
  return MODES.find((mode) => mode === arg) ?? null;
}

async function main() {
  const mode = parseMode(process.argv[2]);
  if (!mode) {
    console.error(`Unknown mode "${process.argv[2]}". Expected one of: ${MODES.join(", ")}`);
    process.exit(1);
  }

  const runtime = openRuntime();
  try {
    const summary = await reconcileRecentEvents(runtime.deps, { mode });
    for (const error of summary.errors) console.error(`  ${error}`);
    if (summary.counts.error > 0) process.exitCode = 1;
  } finally {
    await runtime.close();
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
