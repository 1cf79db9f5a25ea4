/**
 * Refresh fighters flagged for update or active in the last FIGHTER_RECENT_DAYS days.
 * Pass a fighter id to refresh just that fighter.
 *
 * Usage: npm run sync:fighters -- [fighter-id]
 */
import "dotenv/config";
import { openRuntime } from "../src/lib/runtime";
import { refreshFighter, updateFlaggedFighters } from "../src/pipeline/sync";

async function main() {
  const idArg = process.argv[2];
  const fighterId = idArg === undefined ? null : Number(idArg);
  if (fighterId !== null && !Number.isInteger(fighterId)) {
    console.error(`Invalid fighter id "${idArg}"`);
    process.exit(1);
  }

  const runtime = openRuntime();
  try {
    if (fighterId !== null) {
      const result = await refreshFighter(runtime.deps, fighterId);
      console.log(result ? `${result.status}: ${result.url}` : `Fighter ${fighterId} not found`);
      if (!result || result.status === "error") process.exitCode = 1;
      return;
    }

    const summary = await updateFlaggedFighters(runtime.deps);
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
