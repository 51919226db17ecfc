import { addDays } from "date-fns";
import {
  DuplicateStepTitle,
  ExternalServiceFailure,
  InvalidTransitionError,
  LockedError,
  StepLimitExceeded,
  ValidationError,
  toWarning,
} from "./errors.js";
import type { EngineWarning } from "./errors.js";
import { newGoal } from "./graph.js";
import type { GoalGraph } from "./graph.js";
import { captureLock } from "./lifecycle.js";
import type { CounterSink } from "./lifecycle.js";
import { computeProgress } from "./progress.js";
import type { Goal, RoadmapSection } from "./types.js";
import type { NextStepProposal } from "../reasoning/schemas.js";
import { buildContext } from "../reasoning/types.js";
import type { ReasoningService } from "../reasoning/types.js";

export const STEP_HARD_LIMIT = 15;
export const STEP_SOFT_WARNING = 12;
export const DEFAULT_STEP_DAYS = 7;

export interface StepLimits {
  hardLimit: number;
  softWarning: number;
}

export interface StepEngineDeps {
  graph: GoalGraph;
  reasoning: ReasoningService;
  count?: CounterSink;
  limits?: Partial<StepLimits>;
}

export interface FirstStepInput {
  title: string;
  body?: string;
  daysFromNow?: number;
  isFinalStep?: boolean;
}

export interface StepAdvanceResult {
  completed_step: Goal;
  new_step: Goal | null;
  goal_completed: boolean;
  warnings: EngineWarning[];
  progress: number;
}

function normalizeTitle(title: string): string {
  return title.trim().toLocaleLowerCase();
}

/**
 * Linear roadmaps: steps move pending -> current -> completed, one current
 * step at a time. The next step is proposed by the reasoning service when the
 * current one completes.
 */
export class SequentialStepEngine {
  readonly limits: StepLimits;

  constructor(private readonly deps: StepEngineDeps) {
    this.limits = {
      hardLimit: deps.limits?.hardLimit ?? STEP_HARD_LIMIT,
      softWarning: deps.limits?.softWarning ?? STEP_SOFT_WARNING,
    };
  }

  private get graph(): GoalGraph {
    return this.deps.graph;
  }

  /**
   * Turn a goal into a roadmap with its first step. Without an explicit first
   * step the reasoning service proposes one.
   */
  async startRoadmap(goalId: string, first?: FirstStepInput): Promise<Goal> {
    const goal = this.assertCanStart(goalId);

    let proposal: NextStepProposal;
    if (first) {
      proposal = {
        title: first.title,
        guidance: first.body ?? null,
        days_from_now: first.daysFromNow ?? null,
        is_final_step: first.isFinalStep ?? false,
      };
    } else {
      try {
        proposal = await this.deps.reasoning.requestNextStep(
          goal,
          null,
          buildContext(this.graph.allGoals())
        );
      } catch (err) {
        throw ExternalServiceFailure.from("reasoning", err);
      }
    }
    if (!proposal.title.trim()) throw new ValidationError("Step title cannot be empty");

    this.assertCanStart(goalId);
    return this.graph.batch(() => {
      this.graph.update(goalId, (g) => {
        g.has_sequential_steps = true;
      });
      const step = this.createStep(goal, proposal);
      this.graph.appendRevision(goalId, {
        summary: "Roadmap started",
        rationale: `First step: ${step.title}`,
      });
      return step;
    });
  }

  /** Complete the current step and, unless it was the last, open the next one. */
  async completeCurrentStep(goalId: string): Promise<StepAdvanceResult> {
    const goal = this.graph.require(goalId);
    if (!goal.has_sequential_steps) {
      throw new InvalidTransitionError("Goal does not follow a sequential roadmap");
    }
    if (goal.state === "completed" || goal.state === "archived") {
      throw new InvalidTransitionError(`Roadmap of a ${goal.state} goal cannot advance`);
    }
    const steps = this.graph.steps(goalId);
    const current = steps.find((s) => s.step_status === "current");
    if (!current) throw new InvalidTransitionError("Roadmap has no current step");

    if (current.is_final_step) return this.finishRoadmap(goalId, current);

    if (steps.length >= this.limits.hardLimit) {
      this.deps.count?.("steps.limit_rejections", 1);
      throw new StepLimitExceeded(this.limits.hardLimit);
    }

    let proposal: NextStepProposal;
    try {
      proposal = await this.deps.reasoning.requestNextStep(
        goal,
        current,
        buildContext(this.graph.allGoals())
      );
    } catch (err) {
      throw ExternalServiceFailure.from("reasoning", err);
    }
    const title = proposal.title.trim();
    if (!title) {
      throw new ExternalServiceFailure("reasoning", "Proposed step has an empty title", true);
    }

    // The graph may have moved while the proposal was in flight.
    const latest = this.graph.steps(goalId);
    if (!latest.some((s) => s.id === current.id && s.step_status === "current")) {
      throw new InvalidTransitionError("Current step changed while the next step was being prepared");
    }
    const duplicate = latest.some((s) => normalizeTitle(s.title) === normalizeTitle(title));

    const warnings: EngineWarning[] = [];
    const outcome = this.graph.batch(() => {
      const completed = this.finishStep(current.id);
      let created: Goal | null = null;
      if (duplicate) {
        const skipped = new DuplicateStepTitle(title);
        warnings.push(toWarning(skipped));
        console.warn(`[steps] ${skipped.message} on roadmap ${goalId}`);
        this.deps.count?.("steps.duplicate_skipped", 1);
      } else {
        created = this.createStep(this.graph.require(goalId), { ...proposal, title });
      }
      this.syncStoredProgress(goalId);
      this.graph.appendRevision(goalId, {
        summary: `Step completed: ${completed.title}`,
        rationale: created ? `Next step: ${created.title}` : null,
      });
      return { completed, created };
    });

    const count = this.graph.steps(goalId).length;
    if (count >= this.limits.softWarning) {
      warnings.push({
        code: "step_soft_limit",
        message: `Roadmap has ${count} of ${this.limits.hardLimit} steps; consider wrapping up or splitting the goal`,
      });
    }
    this.deps.count?.("steps.completed", 1);

    return {
      completed_step: outcome.completed,
      new_step: outcome.created,
      goal_completed: false,
      warnings,
      progress: computeProgress(this.graph, goalId),
    };
  }

  /** Group steps under named sections. Indexes refer to the ordered step list. */
  setRoadmapSections(goalId: string, sections: RoadmapSection[]): Goal {
    const goal = this.graph.require(goalId);
    if (!goal.has_sequential_steps) {
      throw new InvalidTransitionError("Goal does not follow a sequential roadmap");
    }
    const stepCount = this.graph.steps(goalId).length;
    for (const section of sections) {
      if (!section.title.trim()) throw new ValidationError("Section title cannot be empty");
      for (const index of section.step_indices) {
        if (!Number.isInteger(index) || index < 0 || index >= stepCount) {
          throw new ValidationError(`Section "${section.title}" references missing step ${index}`);
        }
      }
    }
    return this.graph.update(goalId, (g) => {
      g.roadmap_sections = sections.map((s) => ({
        title: s.title.trim(),
        step_indices: [...s.step_indices],
      }));
    });
  }

  private assertCanStart(goalId: string): Goal {
    const goal = this.graph.require(goalId);
    if (goal.is_locked) throw new LockedError(goalId);
    if (goal.roadmap_id !== null) {
      throw new InvalidTransitionError("A roadmap step cannot start its own roadmap");
    }
    if (this.graph.hasChildren(goalId)) {
      throw new InvalidTransitionError("Goal already has subgoals; a roadmap replaces the dependency graph");
    }
    if (goal.has_sequential_steps || this.graph.steps(goalId).length > 0) {
      throw new InvalidTransitionError("Goal already follows a sequential roadmap");
    }
    return goal;
  }

  private finishRoadmap(goalId: string, current: Goal): StepAdvanceResult {
    const completed = this.graph.batch(() => {
      const step = this.finishStep(current.id);
      const now = this.graph.now().toISOString();
      this.graph.update(goalId, (g) => {
        if (!g.is_locked) g.progress = 1;
        g.state = "completed";
        g.completed_at = now;
      });
      this.graph.appendRevision(goalId, {
        summary: "Completed",
        rationale: "All sequential steps completed",
      });
      return step;
    });
    this.deps.count?.("steps.completed", 1);
    this.deps.count?.("goals.completed", 1);
    return {
      completed_step: completed,
      new_step: null,
      goal_completed: true,
      warnings: [],
      progress: computeProgress(this.graph, goalId),
    };
  }

  private finishStep(stepId: string): Goal {
    const now = this.graph.now().toISOString();
    this.graph.update(stepId, (s) => {
      s.step_status = "completed";
      s.completed_at = now;
      s.state = "completed";
      if (!s.is_locked) s.progress = 1;
    });
    return captureLock(this.graph, stepId, "Step completed");
  }

  private createStep(roadmap: Goal, proposal: NextStepProposal): Goal {
    const now = this.graph.now();
    const step = newGoal(
      {
        title: proposal.title.trim(),
        body: proposal.guidance ?? proposal.outcome ?? "",
        category: roadmap.category,
        priority: roadmap.priority,
        kind: roadmap.kind,
        targetDate: addDays(now, proposal.days_from_now ?? DEFAULT_STEP_DAYS).toISOString(),
      },
      now
    );
    step.step_status = "current";
    step.is_final_step = proposal.is_final_step;
    step.is_atomic = true;
    return this.graph.insertStep(roadmap.id, step);
  }

  // The stored scalar mirrors the step ratio for listings that read it directly.
  private syncStoredProgress(goalId: string): void {
    const goal = this.graph.require(goalId);
    if (goal.is_locked) return;
    const ratio = computeProgress(this.graph, goalId);
    this.graph.update(goalId, (g) => {
      g.progress = ratio;
    });
  }
}
