import type { GoalGraph } from "./graph.js";
import type { Goal } from "./types.js";

/**
 * Effective completion of a goal, computed from the current graph:
 * - roadmap goals with steps: completed steps / total steps
 * - goals without subgoals: the stored value
 * - everything else: the mean over all leaf descendants, each leaf weighted
 *   equally whatever its depth
 */
export function computeProgress(graph: GoalGraph, goalId: string): number {
  const goal = graph.require(goalId);

  if (goal.has_sequential_steps) {
    const steps = graph.steps(goalId);
    if (steps.length > 0) return stepRatio(steps);
  }

  if (!graph.hasChildren(goalId)) return goal.progress;

  const leaves = graph.leaves(goalId);
  if (leaves.length === 0) return goal.progress;
  const total = leaves.reduce((sum, leaf) => sum + leafProgress(graph, leaf), 0);
  return total / leaves.length;
}

export function stepRatio(steps: Goal[]): number {
  if (steps.length === 0) return 0;
  const completed = steps.filter((s) => s.step_status === "completed").length;
  return completed / steps.length;
}

// A leaf that runs its own roadmap reports its step ratio.
function leafProgress(graph: GoalGraph, leaf: Goal): number {
  if (leaf.has_sequential_steps) {
    const steps = graph.steps(leaf.id);
    if (steps.length > 0) return stepRatio(steps);
  }
  return leaf.progress;
}
