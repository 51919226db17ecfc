import { addDays } from "date-fns";
import { ulid } from "ulid";
import type { GoalGraph } from "./graph.js";
import type { FramingProposal } from "../reasoning/schemas.js";
import type { Goal, GoalPhase, GoalProjection } from "./types.js";

const DEFAULT_CONFIDENCE = 0.75;

export function clampConfidence(value: number | null | undefined): number {
  if (value === null || value === undefined || Number.isNaN(value)) return DEFAULT_CONFIDENCE;
  return Math.min(Math.max(value, 0.05), 0.99);
}

/**
 * Apply a framing proposal: kind, target metric, phases and roadmap slices.
 * Slices become projections dated relative to `referenceDate`. Sections the
 * proposal leaves out keep their current value, except the metric, which is
 * removed when absent.
 */
export function applyFraming(
  graph: GoalGraph,
  goalId: string,
  proposal: FramingProposal,
  referenceDate: Date = graph.now()
): Goal {
  return graph.update(goalId, (goal) => {
    if (proposal.kind) goal.kind = proposal.kind;

    const metric = proposal.target_metric;
    goal.target_metric = metric
      ? {
          label: metric.label,
          baseline: metric.baseline ?? null,
          target: metric.target ?? null,
          unit: metric.unit ?? null,
          window_days: metric.window_days ?? null,
          notes: metric.notes ?? null,
        }
      : null;

    if (proposal.phases) {
      goal.phases = [...proposal.phases]
        .sort((a, b) => a.order - b.order)
        .map(
          (p): GoalPhase => ({
            id: ulid(),
            title: p.title,
            summary: p.summary ?? "",
            order: p.order,
            status: "planned",
            started_at: null,
            completed_at: null,
          })
        );
    }

    if (proposal.roadmap_slices) {
      goal.projections = proposal.roadmap_slices.map((slice): GoalProjection => {
        const start = addDays(referenceDate, slice.start_offset_days);
        const rawEnd = addDays(referenceDate, slice.end_offset_days);
        const end = rawEnd < start ? start : rawEnd;
        return {
          id: ulid(),
          title: slice.title,
          detail: slice.detail ?? null,
          start: start.toISOString(),
          end: end.toISOString(),
          expected_delta: slice.expected_metric_delta ?? null,
          metric_unit: slice.metric_unit ?? null,
          confidence: clampConfidence(slice.confidence),
          status: "upcoming",
        };
      });
    }
  });
}
