import type { DatabaseConnection } from "../db/connection.js";
import { getIntSetting } from "../db/schema.js";
import { incrementCounter } from "../observability/counters.js";
import type { CalendarService } from "../calendar/types.js";
import type { ActivationPlan, DecompositionTree, FramingProposal } from "../reasoning/schemas.js";
import { buildContext } from "../reasoning/types.js";
import type { ReasoningService } from "../reasoning/types.js";
import { applyBreakdown } from "./breakdown.js";
import type { BreakdownResult } from "./breakdown.js";
import { ExternalServiceFailure, InvalidTransitionError, ValidationError } from "./errors.js";
import { applyFraming } from "./framing.js";
import { GoalGraph, newGoal } from "./graph.js";
import type { Clock } from "./graph.js";
import { GoalLifecycle } from "./lifecycle.js";
import type {
  ActivationResult,
  CompletionResult,
  CounterSink,
  DeactivationTarget,
} from "./lifecycle.js";
import { GraphMutex } from "./mutex.js";
import { computeProgress } from "./progress.js";
import { DEFAULT_MAX_SNAPSHOTS_PER_GOAL, pruneSnapshots } from "./retention.js";
import type { PruneResult } from "./retention.js";
import { STEP_HARD_LIMIT, STEP_SOFT_WARNING, SequentialStepEngine } from "./steps.js";
import type { FirstStepInput, StepAdvanceResult, StepLimits } from "./steps.js";
import { GoalStore } from "./store.js";
import { applyInsights, buildTimeline, isInHorizon } from "./timeline.js";
import type { TimelineEntry } from "./timeline.js";
import type {
  CreateGoalInput,
  DateHorizon,
  DependencyKind,
  Goal,
  GoalDependency,
  GoalRevision,
  GoalSnapshot,
  RoadmapSection,
  UpdateGoalInput,
} from "./types.js";

/** What an open engine can swap without reloading its graph. */
export interface EngineSettings {
  reasoning: ReasoningService;
  calendar: CalendarService;
  limits?: Partial<StepLimits>;
  maxSnapshotsPerGoal?: number;
}

export interface GoalEngineOptions extends EngineSettings {
  graph?: GoalGraph;
  store?: GoalStore | null;
  clock?: Clock;
  count?: CounterSink;
}

export interface GoalTreeNode {
  goal: Goal;
  progress: number;
  children: GoalTreeNode[];
}

export interface GoalDetail {
  goal: Goal;
  progress: number;
  children: Goal[];
  steps: Goal[];
  dependencies: { incoming: GoalDependency[]; outgoing: GoalDependency[] };
}

export interface TimelineRow {
  goal: Goal;
  entries: TimelineEntry[];
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function assertHorizon(horizon: DateHorizon): void {
  if (Number.isNaN(horizon.start.getTime()) || Number.isNaN(horizon.end.getTime())) {
    throw new ValidationError("Horizon bounds must be valid dates");
  }
  if (horizon.start > horizon.end) {
    throw new ValidationError("Horizon start must not be after its end");
  }
}

/**
 * Entry point for everything that reads or changes the goal graph.
 *
 * Writes are serialized through one mutex and, when a store is attached,
 * saved after each operation (also after one that failed part-way, so the
 * calendar links of a partial activation are not lost). Changes a failed save
 * could not write stay pending and go out with the next save. Reads go
 * straight to the in-memory graph.
 */
export class GoalEngine {
  readonly graph: GoalGraph;
  private readonly store: GoalStore | null;
  private readonly mutex = new GraphMutex();
  private readonly count: CounterSink;
  private reasoning: ReasoningService;
  private maxSnapshotsPerGoal: number;
  private lifecycleEngine: GoalLifecycle;
  private stepEngine: SequentialStepEngine;

  constructor(options: GoalEngineOptions) {
    this.store = options.store ?? null;
    this.graph = options.graph ?? this.store?.load(options.clock) ?? new GoalGraph(options.clock);
    this.count = options.count ?? (() => {});
    this.reasoning = options.reasoning;
    this.maxSnapshotsPerGoal = options.maxSnapshotsPerGoal ?? DEFAULT_MAX_SNAPSHOTS_PER_GOAL;
    this.lifecycleEngine = this.buildLifecycle(options);
    this.stepEngine = this.buildSteps(options);
  }

  /** Load the graph from SQLite and wire limits and counters from settings. */
  static open(
    db: DatabaseConnection,
    collaborators: { reasoning: ReasoningService; calendar: CalendarService; clock?: Clock }
  ): GoalEngine {
    return new GoalEngine({
      ...collaborators,
      ...GoalEngine.settingsFrom(db),
      store: new GoalStore(db),
      count: (key, delta = 1) => incrementCounter(db, key, delta),
    });
  }

  static settingsFrom(db: DatabaseConnection): Pick<EngineSettings, "limits" | "maxSnapshotsPerGoal"> {
    return {
      limits: {
        hardLimit: getIntSetting(db, "steps.hard_limit", STEP_HARD_LIMIT),
        softWarning: getIntSetting(db, "steps.soft_warning", STEP_SOFT_WARNING),
      },
      maxSnapshotsPerGoal: getIntSetting(db, "snapshots.max_per_goal", DEFAULT_MAX_SNAPSHOTS_PER_GOAL),
    };
  }

  get lifecycle(): GoalLifecycle {
    return this.lifecycleEngine;
  }

  get steps(): SequentialStepEngine {
    return this.stepEngine;
  }

  /**
   * Swap collaborators and limits after the writes queued so far have
   * finished. The graph and its store stay as they are.
   */
  reconfigure(settings: EngineSettings): Promise<void> {
    return this.mutex.runExclusive(() => {
      this.reasoning = settings.reasoning;
      this.maxSnapshotsPerGoal = settings.maxSnapshotsPerGoal ?? DEFAULT_MAX_SNAPSHOTS_PER_GOAL;
      this.lifecycleEngine = this.buildLifecycle(settings);
      this.stepEngine = this.buildSteps(settings);
    });
  }

  private buildLifecycle(settings: EngineSettings): GoalLifecycle {
    return new GoalLifecycle({
      graph: this.graph,
      reasoning: settings.reasoning,
      calendar: settings.calendar,
      count: this.count,
    });
  }

  private buildSteps(settings: EngineSettings): SequentialStepEngine {
    return new SequentialStepEngine({
      graph: this.graph,
      reasoning: settings.reasoning,
      count: this.count,
      limits: settings.limits,
    });
  }

  // --- reads ---

  topLevelGoals(): Goal[] {
    return this.graph.topLevelGoals();
  }

  goal(id: string): Goal {
    return this.graph.require(id);
  }

  detail(id: string): GoalDetail {
    return {
      goal: this.graph.require(id),
      progress: computeProgress(this.graph, id),
      children: this.graph.children(id),
      steps: this.graph.steps(id),
      dependencies: this.graph.dependenciesOf(id),
    };
  }

  descendants(id: string, includeSelf = false): Goal[] {
    this.graph.require(id);
    return this.graph.descendants(id, includeSelf);
  }

  progress(id: string): number {
    return computeProgress(this.graph, id);
  }

  /** Nested view of the subgoal tree under `id`, or of every top-level goal. */
  tree(id?: string): GoalTreeNode[] {
    const build = (goal: Goal, seen: Set<string>): GoalTreeNode => {
      seen.add(goal.id);
      return {
        goal,
        progress: computeProgress(this.graph, goal.id),
        children: this.graph
          .children(goal.id)
          .filter((child) => !seen.has(child.id))
          .map((child) => build(child, seen)),
      };
    };
    const roots = id === undefined ? this.graph.topLevelGoals() : [this.graph.require(id)];
    return roots.map((root) => build(root, new Set()));
  }

  revisionHistory(id: string): GoalRevision[] {
    this.graph.require(id);
    return this.graph.revisionHistory(id);
  }

  snapshots(id: string): GoalSnapshot[] {
    this.graph.require(id);
    return this.graph.snapshotsOf(id);
  }

  /**
   * Timeline of one goal over the horizon. With `enrich`, the reasoning
   * service annotates entries; if it fails the plain entries are returned.
   */
  async timelineEntries(
    id: string,
    horizon: DateHorizon,
    options: { enrich?: boolean } = {}
  ): Promise<TimelineEntry[]> {
    assertHorizon(horizon);
    const goal = this.graph.require(id);
    const entries = buildTimeline(goal, horizon);
    if (!options.enrich || entries.length === 0) return entries;

    try {
      const insights = await this.reasoning.requestTimelineInsights(
        goal,
        entries,
        horizon,
        buildContext(this.graph.allGoals())
      );
      return applyInsights(entries, insights);
    } catch (err) {
      console.warn(`[timeline] Enrichment unavailable for ${id}: ${errorMessage(err)}`);
      this.count("timeline.enrichment_failures", 1);
      return entries;
    }
  }

  /** Every non-step goal that belongs on the horizon, with its entries. */
  timeline(horizon: DateHorizon): TimelineRow[] {
    assertHorizon(horizon);
    return this.graph
      .allGoals()
      .filter((goal) => goal.roadmap_id === null && goal.state !== "archived")
      .flatMap((goal) => {
        const entries = buildTimeline(goal, horizon);
        return isInHorizon(goal, horizon, entries) ? [{ goal, entries }] : [];
      });
  }

  // --- writes ---

  createGoal(input: CreateGoalInput): Promise<Goal> {
    return this.write(() => {
      if (!input.title.trim()) throw new ValidationError("Title cannot be empty");
      const parentId = input.parentId ?? null;
      if (parentId !== null) {
        const parent = this.graph.require(parentId);
        if (parent.has_sequential_steps) {
          throw new InvalidTransitionError("Roadmap goals take steps, not subgoals");
        }
      }
      return this.graph.batch(() => {
        const goal = this.graph.insert(
          newGoal({ ...input, title: input.title.trim() }, this.graph.now()),
          parentId
        );
        this.graph.appendRevision(goal.id, { summary: "Created" });
        this.count("goals.created", 1);
        return this.graph.require(goal.id);
      });
    });
  }

  updateGoal(id: string, input: UpdateGoalInput): Promise<Goal> {
    return this.write(() => this.lifecycle.update(id, input));
  }

  setProgress(id: string, progress: number): Promise<Goal> {
    return this.write(() => this.lifecycle.setProgress(id, progress));
  }

  deleteGoal(id: string): Promise<Goal[]> {
    return this.write(() => this.lifecycle.delete(id));
  }

  reparent(id: string, newParentId: string | null): Promise<Goal> {
    return this.write(() => {
      if (newParentId !== null && this.graph.require(newParentId).has_sequential_steps) {
        throw new InvalidTransitionError("Roadmap goals take steps, not subgoals");
      }
      return this.graph.batch(() => {
        const moved = this.graph.reparent(id, newParentId);
        this.graph.appendRevision(id, {
          summary: newParentId === null ? "Moved to top level" : "Moved",
          rationale: newParentId,
        });
        return moved;
      });
    });
  }

  addDependency(
    prerequisiteId: string,
    dependentId: string,
    kind: DependencyKind = "finish_to_start",
    note: string | null = null
  ): Promise<GoalDependency> {
    return this.write(() => this.graph.addDependency(prerequisiteId, dependentId, kind, note));
  }

  removeDependency(edgeId: string): Promise<boolean> {
    return this.write(() => this.graph.removeDependency(edgeId));
  }

  /** Ask the reasoning service for a decomposition and materialize it. */
  breakDown(id: string): Promise<BreakdownResult> {
    return this.write(async () => {
      const goal = this.assertCanBreakDown(id);
      const tree = await this.requestBreakdown(goal);
      this.assertCanBreakDown(id);

      const result = this.graph.batch(() => {
        const applied = applyBreakdown(this.graph, tree, id);
        this.graph.appendRevision(id, {
          summary: "Broken down",
          rationale: `${applied.createdGoals.length} subgoals, ${applied.dependencyCount} dependencies`,
        });
        return applied;
      });
      this.count("breakdown.applied", 1);
      if (result.droppedDependencies.length > 0) {
        this.count("breakdown.dependencies_dropped", result.droppedDependencies.length);
      }
      return result;
    });
  }

  applyFraming(id: string, proposal: FramingProposal, referenceDate?: Date): Promise<Goal> {
    return this.write(() =>
      this.graph.batch(() => {
        applyFraming(this.graph, id, proposal, referenceDate);
        this.graph.appendRevision(id, { summary: "Framing updated" });
        return this.graph.require(id);
      })
    );
  }

  lock(id: string): Promise<Goal> {
    return this.write(() => this.lifecycle.lock(id));
  }

  unlock(id: string, reason: string): Promise<Goal> {
    return this.write(() => this.lifecycle.unlock(id, reason));
  }

  regenerate(id: string): Promise<Goal> {
    return this.write(() => this.lifecycle.regenerate(id));
  }

  /** Nothing is written until `confirmActivation`. */
  generatePlan(id: string): Promise<ActivationPlan> {
    return this.lifecycle.generatePlan(id);
  }

  confirmActivation(id: string, plan: ActivationPlan): Promise<ActivationResult> {
    return this.write(() => this.lifecycle.confirmActivation(id, plan));
  }

  activate(id: string): Promise<ActivationResult> {
    return this.write(() => this.lifecycle.activate(id));
  }

  deactivate(id: string, to: DeactivationTarget, rationale: string | null = null): Promise<Goal> {
    return this.write(() => this.lifecycle.deactivate(id, to, rationale));
  }

  complete(id: string): Promise<CompletionResult> {
    return this.write(() => this.lifecycle.complete(id));
  }

  startRoadmap(id: string, first?: FirstStepInput): Promise<Goal> {
    return this.write(() => this.steps.startRoadmap(id, first));
  }

  completeCurrentStep(id: string): Promise<StepAdvanceResult> {
    return this.write(() => this.steps.completeCurrentStep(id));
  }

  setRoadmapSections(id: string, sections: RoadmapSection[]): Promise<Goal> {
    return this.write(() => this.steps.setRoadmapSections(id, sections));
  }

  pruneSnapshots(maxPerGoal = this.maxSnapshotsPerGoal): Promise<PruneResult> {
    return this.write(() => {
      const result = pruneSnapshots(this.graph, maxPerGoal);
      if (result.removed > 0) this.count("snapshots.pruned", result.removed);
      return result;
    });
  }

  /** Resolves once every queued write has finished. */
  async idle(): Promise<void> {
    await this.mutex.runExclusive(() => undefined);
  }

  private async requestBreakdown(goal: Goal): Promise<DecompositionTree> {
    try {
      return await this.reasoning.requestBreakdown(goal, buildContext(this.graph.allGoals()));
    } catch (err) {
      throw ExternalServiceFailure.from("reasoning", err);
    }
  }

  private assertCanBreakDown(id: string): Goal {
    const goal = this.graph.require(id);
    if (goal.has_been_broken_down || this.graph.hasChildren(id)) {
      throw new InvalidTransitionError("Goal has already been broken down");
    }
    if (goal.has_sequential_steps) {
      throw new InvalidTransitionError("Roadmap goals advance step by step and cannot be broken down");
    }
    return goal;
  }

  private write<T>(operation: () => Promise<T> | T): Promise<T> {
    return this.mutex.runExclusive(async () => {
      let result: T;
      try {
        result = await operation();
      } catch (err) {
        try {
          this.persist();
        } catch (saveErr) {
          console.error(`[engine] Saving after a failed operation failed: ${errorMessage(saveErr)}`);
        }
        throw err;
      }
      this.persist();
      return result;
    });
  }

  private persist(): void {
    const store = this.store;
    if (!store || !this.graph.hasPendingChanges()) return;
    this.graph.flushChanges((changes) => store.save(changes));
  }
}
