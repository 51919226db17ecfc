import { describe, it, expect, beforeEach } from "vitest";
import { GoalGraph, newGoal } from "./graph.js";
import { computeProgress } from "./progress.js";
import {
  CycleError,
  GoalNotFoundError,
  LockedError,
  SelfDependencyError,
  ValidationError,
} from "./errors.js";
import type { Goal } from "./types.js";

describe("GoalGraph", () => {
  let current: Date;
  let graph: GoalGraph;

  function add(title: string, parentId: string | null = null, sortIndex?: number): Goal {
    return graph.insert(newGoal({ title }, graph.now()), parentId, sortIndex);
  }

  beforeEach(() => {
    current = new Date("2026-06-01T09:00:00.000Z");
    graph = new GoalGraph(() => current);
  });

  describe("insert", () => {
    it("appends siblings in insertion order", () => {
      const root = add("Root");
      const a = add("A", root.id);
      const b = add("B", root.id);

      expect(graph.children(root.id).map((g) => g.title)).toEqual(["A", "B"]);
      expect(a.sort_index).toBe(0);
      expect(b.sort_index).toBe(1);
      expect(graph.topLevelGoals().map((g) => g.id)).toEqual([root.id]);
    });

    it("places a goal with an explicit sort index among its siblings", () => {
      const root = add("Root");
      add("A", root.id);
      add("B", root.id);
      add("C", root.id, 0);

      expect(graph.children(root.id).map((g) => g.title)).toEqual(["A", "C", "B"]);
    });

    it("rejects an unknown parent", () => {
      expect(() => add("Orphan", "missing")).toThrow(GoalNotFoundError);
      expect(graph.size()).toBe(0);
    });

    it("returns copies that do not alias stored goals", () => {
      const root = add("Root");
      root.title = "Changed outside";
      expect(graph.require(root.id).title).toBe("Root");
    });
  });

  describe("traversal", () => {
    it("walks descendants pre-order and finds leaves", () => {
      const root = add("Root");
      const a = add("A", root.id);
      add("A1", a.id);
      add("B", root.id);

      expect(graph.descendants(root.id).map((g) => g.title)).toEqual(["A", "A1", "B"]);
      expect(graph.descendants(root.id, true).map((g) => g.title)).toEqual(["Root", "A", "A1", "B"]);
      expect(graph.leaves(root.id).map((g) => g.title)).toEqual(["A1", "B"]);
      expect(graph.leaves(a.id).map((g) => g.title)).toEqual(["A1"]);
    });

    it("treats a childless goal as its own leaf", () => {
      const solo = add("Solo");
      expect(graph.leaves(solo.id).map((g) => g.id)).toEqual([solo.id]);
      expect(graph.leaves("missing")).toEqual([]);
    });

    it("lists ancestors nearest first", () => {
      const root = add("Root");
      const a = add("A", root.id);
      const a1 = add("A1", a.id);
      expect(graph.ancestors(a1.id).map((g) => g.title)).toEqual(["A", "Root"]);
    });
  });

  describe("reparent", () => {
    it("rejects moving a goal under itself or its descendant", () => {
      const root = add("Root");
      const child = add("Child", root.id);
      const grandchild = add("Grandchild", child.id);

      expect(() => graph.reparent(root.id, grandchild.id)).toThrow(CycleError);
      expect(() => graph.reparent(root.id, root.id)).toThrow(CycleError);
      expect(graph.children(root.id).map((g) => g.id)).toEqual([child.id]);
    });

    it("moves a goal to the top level", () => {
      const root = add("Root");
      const child = add("Child", root.id);

      const moved = graph.reparent(child.id, null);

      expect(moved.parent_id).toBeNull();
      expect(graph.children(root.id)).toEqual([]);
      expect(graph.topLevelGoals().map((g) => g.title)).toEqual(["Root", "Child"]);
    });
  });

  describe("dependencies", () => {
    it("rejects self dependencies", () => {
      const a = add("A");
      expect(() => graph.addDependency(a.id, a.id)).toThrow(SelfDependencyError);
    });

    it("rejects an edge that closes a cycle", () => {
      const a = add("A");
      const b = add("B");
      const c = add("C");
      graph.addDependency(a.id, b.id);
      graph.addDependency(b.id, c.id);

      expect(() => graph.addDependency(c.id, a.id)).toThrow(CycleError);
      expect(() => graph.addDependency(b.id, a.id)).toThrow(CycleError);
      expect(graph.dependencies()).toHaveLength(2);
    });

    it("returns the existing edge for a repeated dependency", () => {
      const a = add("A");
      const b = add("B");
      const first = graph.addDependency(a.id, b.id, "start_to_start", "needs the draft");
      const again = graph.addDependency(a.id, b.id);

      expect(again.id).toBe(first.id);
      expect(again.kind).toBe("start_to_start");
      expect(graph.dependenciesOf(b.id).incoming.map((e) => e.id)).toEqual([first.id]);
      expect(graph.dependenciesOf(a.id).outgoing.map((e) => e.id)).toEqual([first.id]);
    });

    it("keeps dependency edges independent of ownership", () => {
      const root = add("Root");
      const child = add("Child", root.id);
      const edge = graph.addDependency(child.id, root.id);
      expect(graph.hasDependency(child.id, root.id)).toBe(true);
      expect(graph.removeDependency(edge.id)).toBe(true);
      expect(graph.removeDependency(edge.id)).toBe(false);
      expect(graph.hasDependency(child.id, root.id)).toBe(false);
    });

    it("rejects unknown endpoints", () => {
      const a = add("A");
      expect(() => graph.addDependency("missing", a.id)).toThrow(GoalNotFoundError);
    });
  });

  describe("delete", () => {
    it("removes the subtree pre-order with its edges", () => {
      const root = add("Root");
      const child = add("Child", root.id);
      add("Grandchild", child.id);
      const other = add("Other");
      graph.addDependency(child.id, other.id);

      const removed = graph.delete(root.id);

      expect(removed.map((g) => g.title)).toEqual(["Root", "Child", "Grandchild"]);
      expect(graph.has(child.id)).toBe(false);
      expect(graph.dependencies()).toEqual([]);
      expect(graph.topLevelGoals().map((g) => g.id)).toEqual([other.id]);
    });

    it("is a no-op for a missing goal", () => {
      expect(graph.delete("missing")).toEqual([]);
    });
  });

  describe("update", () => {
    it("rejects content changes on a locked goal", () => {
      const goal = add("Write the essay");
      graph.update(goal.id, (g) => {
        g.is_locked = true;
      });

      expect(() =>
        graph.update(goal.id, (g) => {
          g.title = "Rewritten";
        })
      ).toThrow(LockedError);
      expect(() =>
        graph.update(goal.id, (g) => {
          g.progress = 0.5;
        })
      ).toThrow(LockedError);

      const reopened = graph.update(goal.id, (g) => {
        g.is_locked = false;
        g.title = "Rewritten";
      });
      expect(reopened.title).toBe("Rewritten");
    });

    it("rejects structural edits", () => {
      const goal = add("Goal");
      expect(() =>
        graph.update(goal.id, (g) => {
          g.parent_id = "elsewhere";
        })
      ).toThrow(ValidationError);
    });

    it("rejects progress outside [0, 1]", () => {
      const goal = add("Goal");
      expect(() =>
        graph.update(goal.id, (g) => {
          g.progress = 1.5;
        })
      ).toThrow(ValidationError);
    });
  });

  describe("revisions", () => {
    it("never stamps a revision earlier than the previous one", () => {
      const goal = add("Goal");
      current = new Date("2026-06-02T00:00:00.000Z");
      graph.appendRevision(goal.id, { summary: "First" });
      current = new Date("2026-06-01T00:00:00.000Z");
      const second = graph.appendRevision(goal.id, { summary: "Second" });

      expect(second.created_at).toBe("2026-06-02T00:00:00.000Z");
      expect(graph.revisionHistory(goal.id).map((r) => r.summary)).toEqual(["First", "Second"]);
    });
  });

  describe("batch", () => {
    it("restores the previous state when the callback throws", () => {
      const root = add("Root");
      graph.takeChanges();

      expect(() =>
        graph.batch(() => {
          add("Child", root.id);
          graph.appendRevision(root.id, { summary: "Half done" });
          throw new Error("boom");
        })
      ).toThrow("boom");

      expect(graph.size()).toBe(1);
      expect(graph.children(root.id)).toEqual([]);
      expect(graph.revisionHistory(root.id)).toEqual([]);
      expect(graph.hasPendingChanges()).toBe(false);
    });
  });

  describe("change tracking", () => {
    it("collects changes once", () => {
      const goal = add("Goal");
      graph.appendRevision(goal.id, { summary: "Created" });

      const changes = graph.takeChanges();
      expect(changes.upsertedGoals.map((g) => g.id)).toEqual([goal.id]);
      expect(changes.appendedRevisions.map((r) => r.summary)).toEqual(["Created"]);

      expect(graph.hasPendingChanges()).toBe(false);
      expect(graph.takeChanges().upsertedGoals).toEqual([]);
    });

    it("keeps changes pending when the save callback throws", () => {
      const goal = add("Goal");

      expect(() =>
        graph.flushChanges(() => {
          throw new Error("disk full");
        })
      ).toThrow("disk full");
      expect(graph.hasPendingChanges()).toBe(true);

      const saved: string[] = [];
      graph.flushChanges((changes) => saved.push(...changes.upsertedGoals.map((g) => g.id)));
      expect(saved).toEqual([goal.id]);
      expect(graph.hasPendingChanges()).toBe(false);
    });

    it("drops pending work for goals deleted before saving", () => {
      const a = add("A");
      const b = add("B");
      graph.addDependency(a.id, b.id);
      graph.delete(a.id);

      const changes = graph.takeChanges();
      expect(changes.upsertedGoals.map((g) => g.id)).toEqual([b.id]);
      expect(changes.addedDependencies).toEqual([]);
      expect(changes.removedDependencyIds).toEqual([]);
      expect(changes.deletedGoalIds).toEqual([a.id]);
    });
  });

  describe("corrupted parent chains", () => {
    it("returns what it reaches when two goals are each other's parent", () => {
      const now = graph.now();
      const goal = (id: string, parentId: string, sortIndex: number, progress: number): Goal => ({
        ...newGoal({ title: id }, now),
        id,
        parent_id: parentId,
        sort_index: sortIndex,
        progress,
      });
      const broken = GoalGraph.fromSnapshot({
        goals: [goal("A", "B", 0, 0.2), goal("B", "A", 0, 0.4), goal("C", "B", 1, 0.6)],
        dependencies: [],
        revisions: [],
        snapshots: [],
      });

      expect(broken.descendants("A").map((g) => g.id)).toEqual(["B", "C"]);
      expect(broken.leaves("A").map((g) => g.id)).toEqual(["C"]);
      expect(broken.ancestors("A").map((g) => g.id)).toEqual(["B"]);
      expect(broken.ancestors("C").map((g) => g.id)).toEqual(["B", "A"]);
      expect(computeProgress(broken, "A")).toBe(0.6);
      expect(broken.topLevelGoals()).toEqual([]);
    });
  });

  describe("snapshots", () => {
    it("rebuilds an equivalent graph", () => {
      const root = add("Root");
      add("B", root.id, 1);
      add("A", root.id, 0);
      const other = add("Other");
      graph.addDependency(root.id, other.id);
      graph.appendRevision(root.id, { summary: "Created" });

      const copy = GoalGraph.fromSnapshot(graph.toSnapshot());

      expect(copy.children(root.id).map((g) => g.title)).toEqual(["A", "B"]);
      expect(copy.hasDependency(root.id, other.id)).toBe(true);
      expect(copy.revisionHistory(root.id).map((r) => r.summary)).toEqual(["Created"]);
      expect(copy.hasPendingChanges()).toBe(false);
    });
  });
});
