import { describe, it, expect, beforeEach, vi } from "vitest";
import { GoalGraph, newGoal } from "./graph.js";
import {
  applyBreakdown,
  formatNodeBody,
  normalizeExternalId,
  priorityForDifficulty,
} from "./breakdown.js";
import { InvalidBreakdownError } from "./errors.js";
import type { Goal } from "./types.js";

describe("normalizeExternalId", () => {
  it("lowercases and collapses separators", () => {
    expect(normalizeExternalId("  Research Vendors!! ")).toBe("research-vendors");
    expect(normalizeExternalId("--A__b--")).toBe("a-b");
    expect(normalizeExternalId("step_1.2")).toBe("step-1-2");
  });
});

describe("priorityForDifficulty", () => {
  it("maps difficulty to priority", () => {
    expect(priorityForDifficulty("Hard")).toBe("now");
    expect(priorityForDifficulty("medium")).toBe("next");
    expect(priorityForDifficulty("easy")).toBe("later");
    expect(priorityForDifficulty(undefined)).toBe("later");
  });
});

describe("formatNodeBody", () => {
  it("appends estimate and difficulty", () => {
    expect(
      formatNodeBody({ title: "Outline", description: "Draft outline", estimated_hours: 2, difficulty: "medium" })
    ).toBe("Draft outline\n\nEstimate: 2.0h • Difficulty: Medium");
  });

  it("returns the description alone without metadata", () => {
    expect(formatNodeBody({ title: "Outline", description: "Draft outline" })).toBe("Draft outline");
  });
});

describe("applyBreakdown", () => {
  let graph: GoalGraph;
  let parent: Goal;

  beforeEach(() => {
    graph = new GoalGraph(() => new Date("2026-06-01T00:00:00.000Z"));
    parent = graph.insert(
      newGoal({ title: "Launch a podcast", category: "Media", kind: "hybrid" }, graph.now()),
      null
    );
  });

  it("materializes nodes, order and dependencies", () => {
    const result = applyBreakdown(
      graph,
      {
        subtasks: [
          { id: "record", title: "Record pilot", description: "", difficulty: "hard", dependencies: ["plan"] },
          {
            id: "plan",
            title: "Plan episodes",
            description: "",
            children: [
              { id: "Topics", title: "Pick topics", description: "" },
              { id: "guests", title: "Invite guests", description: "", dependencies: ["topics"] },
            ],
          },
        ],
        recommended_order: ["plan", "record"],
        total_estimated_hours: 6,
      },
      parent.id
    );

    expect(graph.children(parent.id).map((g) => g.title)).toEqual(["Plan episodes", "Record pilot"]);
    expect(result.createdGoals.map((g) => g.title)).toEqual([
      "Record pilot",
      "Plan episodes",
      "Pick topics",
      "Invite guests",
    ]);
    expect(result.atomicTaskCount).toBe(3);
    expect(result.dependencyCount).toBe(2);
    expect(result.droppedDependencies).toEqual([]);
    expect(result.totalEstimatedHours).toBe(6);
    expect(Object.keys(result.assignedIdentifiers).sort()).toEqual(["guests", "plan", "record", "topics"]);

    const ids = result.assignedIdentifiers;
    expect(new Set(Object.values(ids)).size).toBe(result.createdGoals.length);
    expect(Object.values(ids).sort()).toEqual(result.createdGoals.map((g) => g.id).sort());
    expect(graph.hasDependency(ids.plan, ids.record)).toBe(true);
    expect(graph.hasDependency(ids.topics, ids.guests)).toBe(true);

    const record = graph.require(ids.record);
    expect(record.priority).toBe("now");
    expect(record.category).toBe("Media");
    expect(record.kind).toBe("hybrid");
    expect(record.is_atomic).toBe(true);
    expect(graph.require(ids.plan).has_been_broken_down).toBe(true);
    expect(graph.require(ids.plan).is_atomic).toBe(false);
    expect(graph.require(parent.id).has_been_broken_down).toBe(true);
  });

  it("falls back to the title slug for nodes without an id", () => {
    const result = applyBreakdown(
      graph,
      {
        subtasks: [{ title: "Write Script", description: "" }],
        recommended_order: [],
        total_estimated_hours: 0,
      },
      parent.id
    );
    expect(Object.keys(result.assignedIdentifiers)).toEqual(["write-script"]);
  });

  it("rejects duplicate ids without writing anything", () => {
    expect(() =>
      applyBreakdown(
        graph,
        {
          subtasks: [
            { id: "a", title: "A", description: "" },
            { id: "A", title: "Again", description: "" },
          ],
          recommended_order: [],
          total_estimated_hours: 0,
        },
        parent.id
      )
    ).toThrow(InvalidBreakdownError);
    expect(graph.size()).toBe(1);
    expect(graph.require(parent.id).has_been_broken_down).toBe(false);
  });

  it("rejects dependencies on unknown nodes", () => {
    expect(() =>
      applyBreakdown(
        graph,
        {
          subtasks: [{ id: "a", title: "A", description: "", dependencies: ["ghost"] }],
          recommended_order: [],
          total_estimated_hours: 0,
        },
        parent.id
      )
    ).toThrow('Node "a" depends on unknown node "ghost"');
    expect(graph.children(parent.id)).toEqual([]);
  });

  it("drops edges that would close a cycle", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const result = applyBreakdown(
      graph,
      {
        subtasks: [
          { id: "a", title: "A", description: "", dependencies: ["b"] },
          { id: "b", title: "B", description: "", dependencies: ["a"] },
          { id: "c", title: "C", description: "", dependencies: ["c"] },
        ],
        recommended_order: [],
        total_estimated_hours: 0,
      },
      parent.id
    );

    expect(result.dependencyCount).toBe(1);
    expect(result.droppedDependencies).toEqual([
      { prerequisite: "a", dependent: "b", reason: "would create a cycle" },
      { prerequisite: "c", dependent: "c", reason: "self dependency" },
    ]);
    expect(result.createdGoals).toHaveLength(3);
    expect(warn).toHaveBeenCalledWith("[breakdown] Dropped dependency a -> b: would create a cycle");
    warn.mockRestore();
  });
});
