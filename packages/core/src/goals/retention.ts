import type { GoalGraph } from "./graph.js";

export const DEFAULT_MAX_SNAPSHOTS_PER_GOAL = 10;

export interface PruneResult {
  removed: number;
  goals: number;
}

/**
 * Trim each goal's archive of lock snapshots to the newest `maxPerGoal`.
 * The snapshot a locked goal currently holds is always kept. Revision
 * history is never touched.
 */
export function pruneSnapshots(
  graph: GoalGraph,
  maxPerGoal = DEFAULT_MAX_SNAPSHOTS_PER_GOAL
): PruneResult {
  const keep = Math.max(0, Math.floor(maxPerGoal));
  let removed = 0;
  let goals = 0;

  for (const goal of graph.allGoals()) {
    const archive = graph.snapshotsOf(goal.id);
    if (archive.length <= keep) continue;

    const pinned = goal.locked_snapshot?.id;
    const excess = archive.slice(0, archive.length - keep).filter((s) => s.id !== pinned);
    if (excess.length === 0) continue;

    for (const snapshot of excess) {
      if (graph.removeSnapshot(goal.id, snapshot.id)) removed++;
    }
    goals++;
  }

  if (removed > 0) {
    console.log(`[retention] Pruned ${removed} snapshots across ${goals} goals`);
  }
  return { removed, goals };
}
