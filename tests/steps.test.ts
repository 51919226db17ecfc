import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  ExternalServiceFailure,
  GoalEngine,
  InvalidTransitionError,
  LockedError,
  StepLimitExceeded,
  ValidationError,
} from "@waypoint/core";
import { FakeCalendarService } from "./helpers/fake-calendar.js";
import { FakeReasoningService } from "./helpers/fake-reasoning.js";
import { manualClock } from "./helpers/clock.js";

const NOW = "2026-06-01T08:00:00.000Z";

describe("sequential roadmaps", () => {
  let reasoning: FakeReasoningService;
  let engine: GoalEngine;

  function build(limits?: { hardLimit: number; softWarning: number }): GoalEngine {
    return new GoalEngine({
      reasoning,
      calendar: new FakeCalendarService(),
      clock: manualClock(NOW).now,
      limits,
    });
  }

  beforeEach(() => {
    reasoning = new FakeReasoningService();
    engine = build();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts with a proposed first step", async () => {
    const goal = await engine.createGoal({ title: "Write a novel", category: "Creative" });

    const step = await engine.startRoadmap(goal.id);

    expect(step).toMatchObject({
      title: "Step 1",
      body: "Guidance for step 1",
      category: "Creative",
      roadmap_id: goal.id,
      parent_id: null,
      step_status: "current",
      is_atomic: true,
      target_date: "2026-06-04T08:00:00.000Z",
    });
    expect(engine.goal(goal.id).has_sequential_steps).toBe(true);
    expect(engine.revisionHistory(goal.id).at(-1)).toMatchObject({
      summary: "Roadmap started",
      rationale: "First step: Step 1",
    });
  });

  it("warns past the soft limit and stops at the hard limit", async () => {
    engine = build({ hardLimit: 3, softWarning: 2 });
    const goal = await engine.createGoal({ title: "Write a novel" });
    await engine.startRoadmap(goal.id);

    const first = await engine.completeCurrentStep(goal.id);
    expect(first.completed_step).toMatchObject({ title: "Step 1", step_status: "completed", is_locked: true });
    expect(first.completed_step.locked_snapshot?.rationale).toBe("Step completed");
    expect(first.new_step?.title).toBe("Step 2");
    expect(first.goal_completed).toBe(false);
    expect(first.progress).toBe(0.5);
    expect(first.warnings).toEqual([
      {
        code: "step_soft_limit",
        message: "Roadmap has 2 of 3 steps; consider wrapping up or splitting the goal",
      },
    ]);
    expect(engine.goal(goal.id).progress).toBe(0.5);
    expect(engine.revisionHistory(goal.id).at(-1)).toMatchObject({
      summary: "Step completed: Step 1",
      rationale: "Next step: Step 2",
    });

    const second = await engine.completeCurrentStep(goal.id);
    expect(second.new_step?.title).toBe("Step 3");
    expect(second.progress).toBeCloseTo(2 / 3);
    expect(second.warnings.map((w) => w.message)).toEqual([
      "Roadmap has 3 of 3 steps; consider wrapping up or splitting the goal",
    ]);

    await expect(engine.completeCurrentStep(goal.id)).rejects.toBeInstanceOf(StepLimitExceeded);
    const steps = engine.graph.steps(goal.id);
    expect(steps.map((s) => s.step_status)).toEqual(["completed", "completed", "current"]);
    expect(reasoning.calls.filter((c) => c.method === "requestNextStep")).toHaveLength(3);
  });

  it("completes the goal on the final step", async () => {
    const goal = await engine.createGoal({ title: "Write a novel" });
    await engine.startRoadmap(goal.id, { title: "Submit the manuscript", isFinalStep: true });

    const result = await engine.completeCurrentStep(goal.id);

    expect(result.goal_completed).toBe(true);
    expect(result.new_step).toBeNull();
    expect(result.progress).toBe(1);
    expect(engine.goal(goal.id)).toMatchObject({ state: "completed", progress: 1, completed_at: NOW });
    expect(engine.graph.steps(goal.id)).toHaveLength(1);
    expect(engine.revisionHistory(goal.id).at(-1)).toMatchObject({
      summary: "Completed",
      rationale: "All sequential steps completed",
    });
    expect(reasoning.calls).toEqual([]);

    await expect(engine.completeCurrentStep(goal.id)).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it("skips a duplicate next step but still completes the current one", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const goal = await engine.createGoal({ title: "Write a novel" });
    await engine.startRoadmap(goal.id, { title: "Outline chapters" });
    reasoning.nextSteps = [{ title: "  OUTLINE chapters ", is_final_step: false }];

    const result = await engine.completeCurrentStep(goal.id);

    expect(result.new_step).toBeNull();
    expect(result.completed_step).toMatchObject({ title: "Outline chapters", step_status: "completed", is_locked: true });
    expect(result.warnings).toEqual([
      { code: "duplicate_step_title", message: 'Skipped duplicate step "OUTLINE chapters"' },
    ]);
    expect(engine.graph.steps(goal.id)).toHaveLength(1);
    expect(engine.revisionHistory(goal.id).at(-1)).toMatchObject({
      summary: "Step completed: Outline chapters",
      rationale: null,
    });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("keeps the current step when the next one cannot be proposed", async () => {
    const goal = await engine.createGoal({ title: "Write a novel" });
    await engine.startRoadmap(goal.id, { title: "Outline chapters" });
    const before = engine.revisionHistory(goal.id).length;
    reasoning.failing.add("requestNextStep");

    await expect(engine.completeCurrentStep(goal.id)).rejects.toBeInstanceOf(ExternalServiceFailure);

    const [step] = engine.graph.steps(goal.id);
    expect(step).toMatchObject({ step_status: "current", is_locked: false, completed_at: null });
    expect(engine.revisionHistory(goal.id)).toHaveLength(before);
  });

  it("keeps roadmaps and subgoals apart", async () => {
    const roadmap = await engine.createGoal({ title: "Write a novel" });
    await engine.startRoadmap(roadmap.id, { title: "Outline chapters" });

    await expect(engine.createGoal({ title: "Side quest", parentId: roadmap.id })).rejects.toBeInstanceOf(
      InvalidTransitionError
    );
    await expect(engine.breakDown(roadmap.id)).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(engine.startRoadmap(roadmap.id)).rejects.toBeInstanceOf(InvalidTransitionError);

    const parent = await engine.createGoal({ title: "Get fit" });
    await engine.createGoal({ title: "Run", parentId: parent.id });
    await expect(engine.startRoadmap(parent.id)).rejects.toBeInstanceOf(InvalidTransitionError);

    const locked = await engine.createGoal({ title: "Learn piano" });
    await engine.lock(locked.id);
    await expect(engine.startRoadmap(locked.id)).rejects.toBeInstanceOf(LockedError);
  });

  it("groups steps into sections", async () => {
    const goal = await engine.createGoal({ title: "Write a novel" });
    await engine.startRoadmap(goal.id, { title: "Outline chapters" });

    const updated = await engine.setRoadmapSections(goal.id, [{ title: " Drafting ", step_indices: [0] }]);

    expect(updated.roadmap_sections).toEqual([{ title: "Drafting", step_indices: [0] }]);
    await expect(
      engine.setRoadmapSections(goal.id, [{ title: "Editing", step_indices: [5] }])
    ).rejects.toBeInstanceOf(ValidationError);
  });
});
