import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { getDbForTesting } from "../db/connection.js";
import type { DatabaseConnection } from "../db/connection.js";
import { initializeSchema } from "../db/schema.js";
import { GoalGraph, newGoal } from "./graph.js";
import { captureLock } from "./lifecycle.js";
import { pruneSnapshots } from "./retention.js";
import { GoalStore } from "./store.js";
import type { Goal } from "./types.js";

describe("GoalStore", () => {
  let db: DatabaseConnection;
  let store: GoalStore;
  let graph: GoalGraph;

  function add(title: string, parentId: string | null = null): Goal {
    return graph.insert(newGoal({ title }, graph.now()), parentId);
  }

  function count(table: "goals" | "goal_dependencies" | "goal_revisions" | "goal_snapshots"): number {
    return db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? -1;
  }

  beforeEach(() => {
    db = getDbForTesting();
    initializeSchema(db);
    store = new GoalStore(db);
    graph = new GoalGraph(() => new Date("2026-06-01T08:00:00.000Z"));
  });

  afterEach(() => {
    db.close();
  });

  it("round-trips goals, edges, revisions and snapshots", () => {
    const root = add("Write a novel");
    const child = add("Outline", root.id);
    const other = add("Learn to cook");
    graph.update(root.id, (g) => {
      g.emoji = "📚";
      g.target_metric = {
        label: "Words",
        baseline: 0,
        target: 80000,
        unit: null,
        window_days: 90,
        notes: null,
      };
      g.projections = [
        {
          id: "slice-1",
          title: "First act",
          detail: null,
          start: "2026-06-01T00:00:00.000Z",
          end: "2026-06-30T00:00:00.000Z",
          expected_delta: 20000,
          metric_unit: "words",
          confidence: 0.7,
          status: "upcoming",
        },
      ];
    });
    graph.addDependency(child.id, other.id, "start_to_start", "after the outline");
    graph.appendRevision(root.id, { summary: "Created" });
    captureLock(graph, root.id, "Worth keeping");
    graph.update(other.id, (g) => {
      g.has_sequential_steps = true;
    });
    const step = newGoal({ title: "Boil an egg" }, graph.now());
    step.step_status = "current";
    graph.insertStep(other.id, step);

    store.save(graph.takeChanges());
    const loaded = store.load();

    for (const goal of graph.allGoals()) {
      expect(loaded.require(goal.id)).toEqual(goal);
    }
    expect(loaded.size()).toBe(4);
    expect(loaded.children(root.id).map((g) => g.id)).toEqual([child.id]);
    expect(loaded.steps(other.id).map((g) => g.title)).toEqual(["Boil an egg"]);
    expect(loaded.topLevelGoals().map((g) => g.title)).toEqual(["Write a novel", "Learn to cook"]);
    expect(loaded.dependencies()).toEqual(graph.dependencies());
    expect(loaded.revisionHistory(root.id).map((r) => r.summary)).toEqual(["Created", "Locked"]);
    expect(loaded.snapshotsOf(root.id)).toEqual(graph.snapshotsOf(root.id));
    expect(loaded.require(root.id).locked_snapshot?.rationale).toBe("Worth keeping");
  });

  it("applies incremental changes", () => {
    const root = add("Root");
    const child = add("Child", root.id);
    const other = add("Other");
    const edge = graph.addDependency(child.id, other.id);
    graph.appendRevision(child.id, { summary: "Created" });
    store.save(graph.takeChanges());

    graph.update(root.id, (g) => {
      g.title = "Renamed root";
    });
    graph.removeDependency(edge.id);
    graph.delete(child.id);
    store.save(graph.takeChanges());

    const loaded = store.load();
    expect(loaded.require(root.id).title).toBe("Renamed root");
    expect(loaded.has(child.id)).toBe(false);
    expect(count("goals")).toBe(2);
    expect(count("goal_dependencies")).toBe(0);
    expect(count("goal_revisions")).toBe(0);
  });

  it("removes pruned snapshots", () => {
    const goal = add("Thesis");
    captureLock(graph, goal.id, "first");
    graph.update(goal.id, (g) => {
      g.is_locked = false;
      g.locked_snapshot = null;
    });
    captureLock(graph, goal.id, "second");
    store.save(graph.takeChanges());
    expect(count("goal_snapshots")).toBe(2);

    pruneSnapshots(graph, 1);
    store.save(graph.takeChanges());

    expect(count("goal_snapshots")).toBe(1);
    expect(store.load().snapshotsOf(goal.id).map((s) => s.rationale)).toEqual(["second"]);
  });

  it("falls back to empty values for malformed JSON columns", () => {
    const goal = add("Goal");
    store.save(graph.takeChanges());
    db.prepare<[string]>("UPDATE goals SET projections = 'not json', target_metric = '{}' WHERE id = ?").run(goal.id);

    const loaded = store.load().require(goal.id);
    expect(loaded.projections).toEqual([]);
    expect(loaded.target_metric).toBeNull();
  });
});
