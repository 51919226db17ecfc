import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import { getDb, getSetting } from "@waypoint/core";
import type { PruneResult } from "@waypoint/core";
import { getEngine } from "./engine.js";

const DEFAULT_PRUNE_SCHEDULE = "30 3 * * *";

/** Trim archived snapshots down to `snapshots.max_per_goal` for every goal. */
export async function runPruneNow(): Promise<PruneResult> {
  const result = await getEngine().pruneSnapshots();
  console.log(
    `[scheduler] Snapshot prune complete: ${result.removed} removed across ${result.goals} goals`
  );
  return result;
}

/**
 * Start background scheduled jobs.
 * - Snapshot retention (`snapshots.prune_schedule`, default 3:30 AM)
 */
export function startScheduler(): ScheduledTask {
  const configured = getSetting(getDb(), "snapshots.prune_schedule");
  let schedule = configured ?? DEFAULT_PRUNE_SCHEDULE;
  if (!cron.validate(schedule)) {
    console.warn(`[scheduler] Invalid prune schedule "${schedule}", using ${DEFAULT_PRUNE_SCHEDULE}`);
    schedule = DEFAULT_PRUNE_SCHEDULE;
  }

  const task = cron.schedule(schedule, async () => {
    try {
      console.log("[scheduler] Running snapshot prune...");
      await runPruneNow();
    } catch (err) {
      console.error("[scheduler] Snapshot prune error:", err);
    }
  });

  console.log(`[scheduler] Background jobs scheduled (snapshot prune "${schedule}")`);
  return task;
}
