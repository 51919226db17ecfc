import type { DateHorizon, Goal, GoalState } from "../goals/types.js";
import type { TimelineEntry } from "../goals/timeline.js";
import type {
  ActivationPlan,
  DecompositionTree,
  NextStepProposal,
  RegenerationProposal,
  TimelineInsight,
} from "./schemas.js";

export interface GoalDigest {
  id: string;
  title: string;
  category: string;
  state: GoalState;
  progress: number;
  is_locked: boolean;
}

/** Portfolio summary handed to the reasoning service alongside a request. */
export interface ReasoningContext {
  goals: GoalDigest[];
}

/**
 * The external service that proposes breakdowns, framings, schedules and
 * roadmap steps. Every call may fail or time out independently of the graph;
 * the engine never retries.
 */
export interface ReasoningService {
  requestBreakdown(goal: Goal, context: ReasoningContext): Promise<DecompositionTree>;
  requestRegeneration(goal: Goal, context: ReasoningContext): Promise<RegenerationProposal>;
  requestActivationPlan(goal: Goal, allGoals: Goal[]): Promise<ActivationPlan>;
  requestNextStep(
    goal: Goal,
    completedStep: Goal | null,
    context: ReasoningContext
  ): Promise<NextStepProposal>;
  requestLockRationale(goal: Goal, context: ReasoningContext): Promise<string>;
  requestTimelineInsights(
    goal: Goal,
    entries: TimelineEntry[],
    horizon: DateHorizon,
    context: ReasoningContext
  ): Promise<TimelineInsight[]>;
}

export function buildContext(goals: Goal[]): ReasoningContext {
  return {
    goals: goals
      .filter((g) => g.roadmap_id === null)
      .map((g) => ({
        id: g.id,
        title: g.title,
        category: g.category,
        state: g.state,
        progress: g.progress,
        is_locked: g.is_locked,
      })),
  };
}
