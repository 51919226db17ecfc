import { addDays, addHours, areIntervalsOverlapping, differenceInCalendarDays, isWithinInterval } from "date-fns";
import type { TimelineInsight } from "../reasoning/schemas.js";
import type { DateHorizon, Goal, ScheduledEventStatus } from "./types.js";

export type TimelineEntryKind = "event" | "projection" | "phase" | "metric_checkpoint";

const KIND_ORDER: Record<TimelineEntryKind, number> = {
  event: 0,
  projection: 1,
  phase: 2,
  metric_checkpoint: 3,
};

const DEFAULT_SPAN_DAYS = 14;
const PLANNED_PHASE_DAYS = 3;
const HIGHLIGHT_LIMIT = 4;

export interface TimelineIntelligence {
  outcome_summary: string;
  highlights: string[];
  recommended_action: string | null;
  completion_likelihood: number | null;
  ready_to_complete: boolean;
}

export interface TimelineEntry {
  id: string;
  goal_id: string;
  goal_title: string;
  kind: TimelineEntryKind;
  title: string;
  detail: string | null;
  start: string;
  end: string;
  metric_summary: string | null;
  confidence: number | null;
  intelligence: TimelineIntelligence | null;
}

const EVENT_CONFIDENCE: Record<ScheduledEventStatus, number> = {
  confirmed: 0.95,
  proposed: 0.6,
  cancelled: 0.2,
};

const EVENT_HEADLINE: Record<ScheduledEventStatus, string> = {
  confirmed: "Confirmed session",
  proposed: "Proposed slot",
  cancelled: "Cancelled session",
};

const EVENT_DETAIL: Record<ScheduledEventStatus, string> = {
  confirmed: "Confirmed focus block",
  proposed: "Awaiting confirmation",
  cancelled: "Session cancelled",
};

function overlaps(horizon: DateHorizon, start: Date, end: Date): boolean {
  return areIntervalsOverlapping(
    { start: horizon.start, end: horizon.end },
    { start, end: end < start ? start : end },
    { inclusive: true }
  );
}

/**
 * Format a metric delta as "Δ2.5 kg body fat": at most one decimal, none for
 * whole numbers.
 */
export function formatMetric(
  delta: number | null,
  unit: string | null,
  label: string | null
): string | null {
  if (delta === null) return null;
  const value = new Intl.NumberFormat("en-US", {
    maximumFractionDigits: 1,
    minimumFractionDigits: Number.isInteger(delta) ? 0 : 1,
    useGrouping: false,
  }).format(delta);
  const unitText = unit ? ` ${unit}` : "";
  const labelText = label ? ` ${label.toLowerCase()}` : "";
  return `Δ${value}${unitText}${labelText}`.trim();
}

function metricDelta(target: number | null, baseline: number | null): number | null {
  if (target === null) return null;
  if (baseline === null) return target;
  return Math.abs(target - baseline);
}

function eventEntries(goal: Goal, horizon: DateHorizon): TimelineEntry[] {
  return goal.scheduled_events.flatMap((link) => {
    const start = new Date(link.start);
    const end = link.end ? new Date(link.end) : addHours(start, 1);
    if (!overlaps(horizon, start, end)) return [];
    return [
      {
        id: link.id,
        goal_id: goal.id,
        goal_title: goal.title,
        kind: "event" as const,
        title: EVENT_HEADLINE[link.status],
        detail: EVENT_DETAIL[link.status],
        start: start.toISOString(),
        end: end.toISOString(),
        metric_summary: null,
        confidence: EVENT_CONFIDENCE[link.status],
        intelligence: null,
      },
    ];
  });
}

function projectionEntries(goal: Goal, horizon: DateHorizon): TimelineEntry[] {
  return goal.projections.flatMap((projection) => {
    if (projection.status === "complete" || projection.status === "skipped") return [];
    const start = new Date(projection.start);
    const end = new Date(projection.end);
    if (!overlaps(horizon, start, end)) return [];
    return [
      {
        id: projection.id,
        goal_id: goal.id,
        goal_title: goal.title,
        kind: "projection" as const,
        title: projection.title,
        detail: projection.detail,
        start: start.toISOString(),
        end: end.toISOString(),
        metric_summary: formatMetric(
          projection.expected_delta,
          projection.metric_unit,
          goal.target_metric?.label ?? null
        ),
        confidence: projection.confidence,
        intelligence: null,
      },
    ];
  });
}

function phaseEntries(goal: Goal, horizon: DateHorizon): TimelineEntry[] {
  return goal.phases.flatMap((phase) => {
    const anchor = new Date(phase.started_at ?? goal.activated_at ?? goal.created_at);
    const planned = phase.status === "planned" ? PLANNED_PHASE_DAYS : 0;
    const rawEnd = phase.completed_at ? new Date(phase.completed_at) : addDays(anchor, planned);
    const end = rawEnd < anchor ? anchor : rawEnd;
    if (!overlaps(horizon, anchor, end)) return [];
    return [
      {
        id: phase.id,
        goal_id: goal.id,
        goal_title: goal.title,
        kind: "phase" as const,
        title: phase.title,
        detail: phase.summary || null,
        start: anchor.toISOString(),
        end: end.toISOString(),
        metric_summary: null,
        confidence: null,
        intelligence: null,
      },
    ];
  });
}

function metricCheckpoint(goal: Goal, horizon: DateHorizon): TimelineEntry[] {
  const metric = goal.target_metric;
  if (!metric || goal.projections.length > 0) return [];

  const horizonDays = Math.max(differenceInCalendarDays(horizon.end, horizon.start), 1);
  const anchor = new Date(goal.activated_at ?? goal.created_at);
  const at = addDays(anchor, metric.window_days ?? horizonDays);
  if (!isWithinInterval(at, { start: horizon.start, end: horizon.end })) return [];

  const summary = formatMetric(metricDelta(metric.target, metric.baseline), metric.unit, metric.label);
  return [
    {
      id: `${goal.id}:metric`,
      goal_id: goal.id,
      goal_title: goal.title,
      kind: "metric_checkpoint",
      title: summary ?? metric.label,
      detail: metric.notes,
      start: at.toISOString(),
      end: at.toISOString(),
      metric_summary: summary,
      confidence: null,
      intelligence: null,
    },
  ];
}

/** Milestones that depend on how the goal measures progress. */
function kindMilestones(goal: Goal, horizon: DateHorizon): TimelineEntry[] {
  switch (goal.kind) {
    case "event":
      return [];
    case "campaign":
    case "hybrid":
      return metricCheckpoint(goal, horizon);
    default: {
      const unreachable: never = goal.kind;
      throw new Error(`Unknown goal kind ${String(unreachable)}`);
    }
  }
}

/**
 * Project a goal onto the horizon: scheduled sessions, open projections,
 * phases and (for metric-driven goals) a checkpoint at the end of the
 * measurement window. Sorted by start, then event < projection < phase <
 * metric checkpoint.
 */
export function buildTimeline(goal: Goal, horizon: DateHorizon): TimelineEntry[] {
  const entries = [
    ...eventEntries(goal, horizon),
    ...projectionEntries(goal, horizon),
    ...phaseEntries(goal, horizon),
    ...kindMilestones(goal, horizon),
  ];
  return entries.sort(
    (a, b) =>
      new Date(a.start).getTime() - new Date(b.start).getTime() ||
      KIND_ORDER[a.kind] - KIND_ORDER[b.kind]
  );
}

/**
 * Whether the goal belongs on a timeline for this horizon even without
 * entries: its span (activation, or creation when never activated, to the
 * target date or a 14-day default) overlaps the horizon.
 */
export function isInHorizon(goal: Goal, horizon: DateHorizon, entries?: TimelineEntry[]): boolean {
  if ((entries ?? buildTimeline(goal, horizon)).length > 0) return true;
  const start = new Date(goal.activated_at ?? goal.created_at);
  const end = goal.target_date ? new Date(goal.target_date) : addDays(start, DEFAULT_SPAN_DAYS);
  return overlaps(horizon, start, end);
}

export function applyInsights(entries: TimelineEntry[], insights: TimelineInsight[]): TimelineEntry[] {
  const byEntry = new Map(insights.map((insight) => [insight.entry_id, insight]));
  return entries.map((entry) => {
    const insight = byEntry.get(entry.id);
    if (!insight) return entry;
    return {
      ...entry,
      intelligence: {
        outcome_summary: insight.outcome_summary,
        highlights: insight.highlights.slice(0, HIGHLIGHT_LIMIT),
        recommended_action: insight.recommended_action ?? null,
        completion_likelihood: insight.completion_likelihood ?? null,
        ready_to_complete: insight.ready_to_complete,
      },
    };
  });
}
