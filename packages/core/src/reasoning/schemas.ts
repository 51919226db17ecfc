import { z } from "zod";

export interface DecompositionNode {
  id?: string | null;
  title: string;
  description: string;
  estimated_hours?: number | null;
  dependencies?: string[] | null;
  difficulty?: string | null;
  children?: DecompositionNode[] | null;
  is_atomic?: boolean | null;
}

export const decompositionNodeSchema: z.ZodType<DecompositionNode> = z.lazy(() =>
  z.object({
    id: z.string().nullish(),
    title: z.string().min(1),
    description: z.string(),
    estimated_hours: z.number().nonnegative().nullish(),
    dependencies: z.array(z.string()).nullish(),
    difficulty: z.string().nullish(),
    children: z.array(decompositionNodeSchema).nullish(),
    is_atomic: z.boolean().nullish(),
  })
);

export const decompositionTreeSchema = z.object({
  subtasks: z.array(decompositionNodeSchema),
  recommended_order: z.array(z.string()).default([]),
  total_estimated_hours: z.number().nonnegative().default(0),
});
export type DecompositionTree = z.infer<typeof decompositionTreeSchema>;

export const regenerationSchema = z.object({
  title: z.string().min(1),
  body: z.string(),
});
export type RegenerationProposal = z.infer<typeof regenerationSchema>;

export const proposedSessionSchema = z.object({
  title: z.string().min(1),
  start: z.string().datetime({ offset: true }),
  duration_minutes: z.number().int().positive(),
  notes: z.string().nullish(),
});
export type ProposedSession = z.infer<typeof proposedSessionSchema>;

export const activationPlanSchema = z.object({
  events: z.array(proposedSessionSchema),
  tips: z.array(z.string()).default([]),
});
export type ActivationPlan = z.infer<typeof activationPlanSchema>;

export const nextStepSchema = z.object({
  title: z.string().min(1),
  outcome: z.string().nullish(),
  guidance: z.string().nullish(),
  days_from_now: z.number().int().nonnegative().nullish(),
  is_final_step: z.boolean().default(false),
});
export type NextStepProposal = z.infer<typeof nextStepSchema>;

export const timelineInsightSchema = z.object({
  entry_id: z.string(),
  outcome_summary: z.string(),
  highlights: z.array(z.string()).default([]),
  recommended_action: z.string().nullish(),
  completion_likelihood: z.number().min(0).max(1).nullish(),
  ready_to_complete: z.boolean().default(false),
});
export type TimelineInsight = z.infer<typeof timelineInsightSchema>;

export const timelineInsightsSchema = z.object({
  insights: z.array(timelineInsightSchema),
});

export const targetMetricSchema = z.object({
  label: z.string().min(1),
  baseline: z.number().nullish(),
  target: z.number().nullish(),
  unit: z.string().nullish(),
  window_days: z.number().int().positive().nullish(),
  notes: z.string().nullish(),
});

export const framingSchema = z.object({
  kind: z.enum(["event", "campaign", "hybrid"]).nullish(),
  target_metric: targetMetricSchema.nullish(),
  phases: z
    .array(
      z.object({
        title: z.string().min(1),
        summary: z.string().nullish(),
        order: z.number().int(),
      })
    )
    .nullish(),
  roadmap_slices: z
    .array(
      z.object({
        title: z.string().min(1),
        detail: z.string().nullish(),
        start_offset_days: z.number().int(),
        end_offset_days: z.number().int(),
        expected_metric_delta: z.number().nullish(),
        metric_unit: z.string().nullish(),
        confidence: z.number().nullish(),
      })
    )
    .nullish(),
});
export type FramingProposal = z.infer<typeof framingSchema>;
