import { addMinutes } from "date-fns";
import { ulid } from "ulid";
import {
  ExternalServiceFailure,
  InvalidTransitionError,
  LockedError,
  PartialActivationFailure,
  ValidationError,
} from "./errors.js";
import { contentOf } from "./graph.js";
import type { GoalGraph } from "./graph.js";
import { computeProgress } from "./progress.js";
import type { Goal, GoalSnapshot, GoalState, ScheduledEventLink, UpdateGoalInput } from "./types.js";
import type { CalendarService } from "../calendar/types.js";
import type { ActivationPlan, RegenerationProposal } from "../reasoning/schemas.js";
import { buildContext } from "../reasoning/types.js";
import type { ReasoningService } from "../reasoning/types.js";
import type { CounterKey, CounterSink } from "../observability/counters.js";

export const DEFAULT_LOCK_RATIONALE = "locked by user";

export type { CounterSink };

export type DeactivationTarget = Exclude<GoalState, "active">;

export interface LifecycleDeps {
  graph: GoalGraph;
  reasoning: ReasoningService;
  calendar: CalendarService;
  count?: CounterSink;
}

export interface ActivationResult {
  goal: Goal;
  links: ScheduledEventLink[];
  tips: string[];
}

export interface CompletionResult {
  goal: Goal;
  /** Aggregated progress of the parent after completion; null for top-level goals. */
  parentProgress: number | null;
}

const DEACTIVATION_SUMMARY: Record<DeactivationTarget, string> = {
  draft: "Deactivated",
  completed: "Completed",
  archived: "Archived",
};

const DEACTIVATION_COUNTERS: Record<DeactivationTarget, CounterKey> = {
  draft: "goals.deactivated",
  completed: "goals.completed",
  archived: "goals.archived",
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Lock a goal with a snapshot of its current content. Shared by user locks
 * and completed roadmap steps. Returns the goal unchanged if already locked.
 */
export function captureLock(graph: GoalGraph, goalId: string, rationale: string): Goal {
  const goal = graph.require(goalId);
  if (goal.is_locked) return goal;

  const snapshot: GoalSnapshot = {
    id: ulid(),
    goal_id: goalId,
    title: goal.title,
    body: goal.body,
    progress: computeProgress(graph, goalId),
    rationale,
    captured_at: graph.now().toISOString(),
  };
  return graph.batch(() => {
    graph.update(goalId, (g) => {
      g.is_locked = true;
      g.locked_snapshot = snapshot;
    });
    graph.archiveSnapshot(snapshot);
    graph.appendRevision(goalId, { summary: "Locked", rationale });
    return graph.require(goalId);
  });
}

/**
 * State machine for a goal: draft -> active -> completed | archived, with
 * active -> draft for deactivation and the lock flag as an overlay on any
 * state. Structural checks run before any write; calls to the reasoning and
 * calendar services happen before the graph is touched wherever the
 * operation allows it.
 */
export class GoalLifecycle {
  constructor(private readonly deps: LifecycleDeps) {}

  private get graph(): GoalGraph {
    return this.deps.graph;
  }

  private count(key: CounterKey): void {
    this.deps.count?.(key, 1);
  }

  private context() {
    return buildContext(this.graph.allGoals());
  }

  async lock(goalId: string): Promise<Goal> {
    const goal = this.graph.require(goalId);
    if (goal.is_locked) return goal;
    if (!goal.title.trim() && !goal.body.trim()) {
      throw new InvalidTransitionError("Goal has no content to lock");
    }

    let rationale = DEFAULT_LOCK_RATIONALE;
    try {
      const proposed = (await this.deps.reasoning.requestLockRationale(goal, this.context())).trim();
      if (proposed) rationale = proposed;
    } catch (err) {
      console.warn(`[lifecycle] Lock rationale unavailable for ${goalId}, using default: ${errorMessage(err)}`);
      this.count("lifecycle.lock_rationale_fallback");
    }

    const locked = captureLock(this.graph, goalId, rationale);
    this.count("goals.locked");
    return locked;
  }

  unlock(goalId: string, reason: string): Goal {
    const goal = this.graph.require(goalId);
    if (!goal.is_locked) return goal;

    const trimmed = reason.trim();
    return this.graph.batch(() => {
      this.graph.update(goalId, (g) => {
        g.is_locked = false;
        g.locked_snapshot = null;
      });
      this.graph.appendRevision(goalId, {
        summary: trimmed ? `Unlocked: ${trimmed}` : "Unlocked",
        rationale: trimmed || null,
      });
      this.count("goals.unlocked");
      return this.graph.require(goalId);
    });
  }

  async regenerate(goalId: string): Promise<Goal> {
    const goal = this.graph.require(goalId);
    if (goal.is_locked) throw new LockedError(goalId);

    let proposal: RegenerationProposal;
    try {
      proposal = await this.deps.reasoning.requestRegeneration(goal, this.context());
    } catch (err) {
      throw ExternalServiceFailure.from("reasoning", err);
    }

    const current = this.graph.require(goalId);
    if (current.is_locked) throw new LockedError(goalId);

    return this.graph.batch(() => {
      const before = contentOf(current);
      const updated = this.graph.update(goalId, (g) => {
        g.title = proposal.title;
        g.body = proposal.body;
      });
      this.graph.appendRevision(goalId, {
        summary: "Regenerated",
        rationale: "Refreshed framing from the reasoning service",
        before,
        after: contentOf(updated),
      });
      this.count("goals.regenerated");
      return this.graph.require(goalId);
    });
  }

  /** First phase of activation: ask for a schedule. Nothing is written. */
  async generatePlan(goalId: string): Promise<ActivationPlan> {
    const goal = this.graph.require(goalId);
    this.assertActivatable(goal);

    let plan: ActivationPlan;
    try {
      const portfolio = this.graph.allGoals().filter((g) => g.roadmap_id === null);
      plan = await this.deps.reasoning.requestActivationPlan(goal, portfolio);
    } catch (err) {
      throw ExternalServiceFailure.from("reasoning", err);
    }
    if (plan.events.length === 0) {
      throw new ExternalServiceFailure(
        "reasoning",
        "No suitable schedule was generated for this goal",
        true
      );
    }
    return plan;
  }

  /**
   * Second phase: create every session in the calendar, then mark the goal
   * active. Each link is recorded as proposed and flips to confirmed once the
   * calendar returns an id. If the calendar fails midway, the confirmed links
   * stay, the goal stays a draft and the caller gets the list of links that
   * were created.
   */
  async confirmActivation(goalId: string, plan: ActivationPlan): Promise<ActivationResult> {
    const goal = this.graph.require(goalId);
    this.assertActivatable(goal);
    if (plan.events.length === 0) {
      throw new ValidationError("No sessions selected for activation");
    }

    const confirmed: ScheduledEventLink[] = [];
    for (const event of plan.events) {
      const start = new Date(event.start);
      const link: ScheduledEventLink = {
        id: ulid(),
        event_id: null,
        title: event.title,
        start: start.toISOString(),
        end: addMinutes(start, event.duration_minutes).toISOString(),
        status: "proposed",
      };
      this.graph.update(goalId, (g) => {
        g.scheduled_events.push(link);
      });

      let eventId: string;
      try {
        eventId = await this.deps.calendar.createEvent({
          title: event.title,
          start,
          durationMinutes: event.duration_minutes,
          notes: event.notes ? `${event.notes}\n\nScheduled via Waypoint` : `Waypoint: ${goal.title}`,
        });
      } catch (err) {
        this.graph.update(goalId, (g) => {
          g.scheduled_events = g.scheduled_events.filter((l) => l.id !== link.id);
        });
        this.count("goals.activation_partial");
        console.error(
          `[lifecycle] Activation of ${goalId} stopped after ${confirmed.length}/${plan.events.length} sessions: ${errorMessage(err)}`
        );
        throw new PartialActivationFailure(confirmed, {
          cause: ExternalServiceFailure.from("calendar", err),
        });
      }

      const updated = this.graph.update(goalId, (g) => {
        const stored = g.scheduled_events.find((l) => l.id === link.id);
        if (stored) {
          stored.event_id = eventId;
          stored.status = "confirmed";
        }
      });
      const stored = updated.scheduled_events.find((l) => l.id === link.id);
      if (stored) confirmed.push(stored);
    }

    const activated = this.graph.batch(() => {
      const now = this.graph.now().toISOString();
      this.graph.update(goalId, (g) => {
        g.state = "active";
        g.activated_at = now;
      });
      this.graph.appendRevision(goalId, {
        summary: "Activated",
        rationale: `Scheduled ${confirmed.length} focus sessions`,
      });
      return this.graph.require(goalId);
    });
    this.count("goals.activated");
    return { goal: activated, links: confirmed, tips: plan.tips };
  }

  async activate(goalId: string): Promise<ActivationResult> {
    const plan = await this.generatePlan(goalId);
    return this.confirmActivation(goalId, plan);
  }

  /**
   * Move a goal out of the active state. Never blocked by the lock. Pending
   * calendar links are cancelled; calendar failures are logged, not raised.
   */
  async deactivate(goalId: string, to: DeactivationTarget, rationale: string | null = null): Promise<Goal> {
    const goal = this.graph.require(goalId);
    if (goal.state === to) return goal;
    this.assertTransition(goal.state, to);

    const cancelled = await this.cancelPendingLinks(goal);

    return this.graph.batch(() => {
      const now = this.graph.now().toISOString();
      this.graph.update(goalId, (g) => {
        g.scheduled_events = g.scheduled_events.map((l) =>
          cancelled.has(l.id) ? { ...l, status: "cancelled" } : l
        );
        g.state = to;
        if (to === "completed") g.completed_at = now;
      });
      this.graph.appendRevision(goalId, {
        summary: DEACTIVATION_SUMMARY[to],
        rationale,
      });
      this.count(DEACTIVATION_COUNTERS[to]);
      return this.graph.require(goalId);
    });
  }

  async complete(goalId: string): Promise<CompletionResult> {
    const goal = this.graph.require(goalId);
    if (goal.is_locked) throw new LockedError(goalId);
    if (goal.state !== "completed") this.assertTransition(goal.state, "completed");

    if (goal.state !== "completed") {
      const cancelled = await this.cancelPendingLinks(goal);
      this.graph.batch(() => {
        const now = this.graph.now().toISOString();
        this.graph.update(goalId, (g) => {
          g.scheduled_events = g.scheduled_events.map((l) =>
            cancelled.has(l.id) ? { ...l, status: "cancelled" } : l
          );
          g.progress = 1;
          g.state = "completed";
          g.completed_at = now;
        });
        this.graph.appendRevision(goalId, {
          summary: "Completed",
          rationale: "Goal marked as completed",
        });
      });
      this.count("goals.completed");
    }

    const completed = this.graph.require(goalId);
    return {
      goal: completed,
      parentProgress:
        completed.parent_id !== null ? computeProgress(this.graph, completed.parent_id) : null,
    };
  }

  /** Delete a goal with its subtree; calendar events of removed goals are cancelled first. */
  async delete(goalId: string): Promise<Goal[]> {
    if (!this.graph.has(goalId)) return [];
    const doomed = [
      ...this.graph.descendants(goalId, true),
      ...this.graph.descendants(goalId, true).flatMap((g) => this.graph.steps(g.id)),
    ];
    for (const goal of doomed) {
      for (const link of goal.scheduled_events) {
        if (link.event_id && link.status !== "cancelled") {
          await this.cancelEvent(link.event_id);
        }
      }
    }
    const removed = this.graph.delete(goalId);
    this.count("goals.deleted");
    return removed;
  }

  /** Plain edits. Title and body stay frozen while the goal is locked. */
  update(goalId: string, input: UpdateGoalInput): Goal {
    if (input.title !== undefined && !input.title.trim()) {
      throw new ValidationError("Title cannot be empty");
    }
    return this.graph.batch(() => {
      this.graph.update(goalId, (g) => {
        if (input.title !== undefined) g.title = input.title;
        if (input.body !== undefined) g.body = input.body;
        if (input.category !== undefined && input.category.trim()) g.category = input.category;
        if (input.priority !== undefined) g.priority = input.priority;
        if (input.targetDate !== undefined) g.target_date = input.targetDate;
        if (input.emoji !== undefined) g.emoji = input.emoji;
      });
      this.graph.appendRevision(goalId, { summary: "Goal updated", rationale: "Manual edit" });
      return this.graph.require(goalId);
    });
  }

  /** Set the stored progress of a leaf goal. Aggregated goals derive theirs. */
  setProgress(goalId: string, progress: number): Goal {
    if (!Number.isFinite(progress) || progress < 0 || progress > 1) {
      throw new ValidationError(`Progress must be within [0, 1], got ${progress}`);
    }
    const goal = this.graph.require(goalId);
    if (this.graph.hasChildren(goalId) || goal.has_sequential_steps) {
      throw new InvalidTransitionError("Progress of this goal is derived from its subgoals or steps");
    }
    if (goal.is_locked) throw new LockedError(goalId);
    return this.graph.batch(() => {
      this.graph.update(goalId, (g) => {
        g.progress = progress;
      });
      this.graph.appendRevision(goalId, {
        summary: `Progress set to ${Math.round(progress * 100)}%`,
        before: contentOf(goal),
        after: { ...contentOf(goal), progress },
      });
      return this.graph.require(goalId);
    });
  }

  private assertActivatable(goal: Goal): void {
    if (goal.is_locked) throw new LockedError(goal.id);
    if (goal.state !== "draft") {
      throw new InvalidTransitionError(`Only draft goals can be activated (goal is ${goal.state})`);
    }
  }

  private assertTransition(from: GoalState, to: GoalState): void {
    const allowed: Record<GoalState, GoalState[]> = {
      draft: ["active", "completed", "archived"],
      active: ["draft", "completed", "archived"],
      completed: ["archived"],
      archived: [],
    };
    if (!allowed[from].includes(to)) {
      throw new InvalidTransitionError(`Cannot move a ${from} goal to ${to}`);
    }
  }

  private async cancelPendingLinks(goal: Goal): Promise<Set<string>> {
    const cancelled = new Set<string>();
    for (const link of goal.scheduled_events) {
      if (link.status !== "proposed") continue;
      if (link.event_id) await this.cancelEvent(link.event_id);
      cancelled.add(link.id);
    }
    return cancelled;
  }

  private async cancelEvent(eventId: string): Promise<void> {
    try {
      await this.deps.calendar.cancelEvent(eventId);
    } catch (err) {
      console.warn(`[lifecycle] Could not cancel calendar event ${eventId}: ${errorMessage(err)}`);
      this.count("calendar.cancel_failures");
    }
  }
}
