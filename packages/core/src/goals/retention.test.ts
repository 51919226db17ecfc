import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { GoalGraph, newGoal } from "./graph.js";
import { pruneSnapshots } from "./retention.js";
import type { Goal, GoalSnapshot } from "./types.js";

describe("pruneSnapshots", () => {
  let graph: GoalGraph;

  function archive(goal: Goal, count: number): GoalSnapshot[] {
    return Array.from({ length: count }, (_, i) => {
      const snapshot: GoalSnapshot = {
        id: `${goal.title}-${i + 1}`,
        goal_id: goal.id,
        title: goal.title,
        body: "",
        progress: 0,
        rationale: "locked by user",
        captured_at: `2026-06-0${i + 1}T00:00:00.000Z`,
      };
      graph.archiveSnapshot(snapshot);
      return snapshot;
    });
  }

  beforeEach(() => {
    graph = new GoalGraph(() => new Date("2026-06-10T00:00:00.000Z"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps the newest snapshots per goal", () => {
    const goal = graph.insert(newGoal({ title: "essay" }, graph.now()), null);
    archive(goal, 3);

    expect(pruneSnapshots(graph, 1)).toEqual({ removed: 2, goals: 1 });
    expect(graph.snapshotsOf(goal.id).map((s) => s.id)).toEqual(["essay-3"]);
  });

  it("never removes the snapshot a locked goal holds", () => {
    const goal = graph.insert(newGoal({ title: "thesis" }, graph.now()), null);
    const [oldest] = archive(goal, 4);
    graph.update(goal.id, (g) => {
      g.is_locked = true;
      g.locked_snapshot = oldest ?? null;
    });

    expect(pruneSnapshots(graph, 2)).toEqual({ removed: 1, goals: 1 });
    expect(graph.snapshotsOf(goal.id).map((s) => s.id)).toEqual(["thesis-1", "thesis-3", "thesis-4"]);

    expect(pruneSnapshots(graph, 0)).toEqual({ removed: 2, goals: 1 });
    expect(graph.snapshotsOf(goal.id).map((s) => s.id)).toEqual(["thesis-1"]);
  });

  it("leaves goals under the limit alone", () => {
    const goal = graph.insert(newGoal({ title: "short" }, graph.now()), null);
    archive(goal, 2);
    expect(pruneSnapshots(graph, 10)).toEqual({ removed: 0, goals: 0 });
    expect(graph.revisionHistory(goal.id)).toEqual([]);
  });
});
