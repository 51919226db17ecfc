export type GoalState = "draft" | "active" | "completed" | "archived";
export type GoalPriority = "now" | "next" | "later";
export type GoalKind = "event" | "campaign" | "hybrid";
export type DependencyKind = "finish_to_start" | "start_to_start" | "finish_to_finish";
export type StepStatus = "pending" | "current" | "completed" | "unknown";
export type ScheduledEventStatus = "proposed" | "confirmed" | "cancelled";
export type ProjectionStatus = "upcoming" | "in_progress" | "complete" | "skipped";
export type PhaseStatus = "planned" | "active" | "completed";

export const GOAL_STATES: readonly GoalState[] = ["draft", "active", "completed", "archived"];
export const GOAL_PRIORITIES: readonly GoalPriority[] = ["now", "next", "later"];
export const GOAL_KINDS: readonly GoalKind[] = ["event", "campaign", "hybrid"];
export const DEPENDENCY_KINDS: readonly DependencyKind[] = [
  "finish_to_start",
  "start_to_start",
  "finish_to_finish",
];

/** Content captured when a goal is locked. */
export interface GoalSnapshot {
  id: string;
  goal_id: string;
  title: string;
  body: string;
  progress: number;
  rationale: string;
  captured_at: string;
}

export interface RevisionContent {
  title: string;
  body: string;
  progress: number;
}

export interface GoalRevision {
  id: string;
  goal_id: string;
  summary: string;
  rationale: string | null;
  before: RevisionContent | null;
  after: RevisionContent | null;
  created_at: string;
}

export interface TargetMetric {
  label: string;
  baseline: number | null;
  target: number | null;
  unit: string | null;
  window_days: number | null;
  notes: string | null;
}

export interface GoalProjection {
  id: string;
  title: string;
  detail: string | null;
  start: string;
  end: string;
  expected_delta: number | null;
  metric_unit: string | null;
  confidence: number;
  status: ProjectionStatus;
}

export interface GoalPhase {
  id: string;
  title: string;
  summary: string;
  order: number;
  status: PhaseStatus;
  started_at: string | null;
  completed_at: string | null;
}

export interface ScheduledEventLink {
  id: string;
  /** Identifier assigned by the calendar; null until creation is confirmed. */
  event_id: string | null;
  title: string;
  start: string;
  end: string;
  status: ScheduledEventStatus;
}

export interface RoadmapSection {
  title: string;
  step_indices: number[];
}

export interface Goal {
  id: string;
  title: string;
  body: string;
  category: string;
  priority: GoalPriority;
  progress: number;
  kind: GoalKind;
  parent_id: string | null;
  sort_index: number;
  state: GoalState;
  is_locked: boolean;
  locked_snapshot: GoalSnapshot | null;
  activated_at: string | null;
  completed_at: string | null;
  has_been_broken_down: boolean;
  is_atomic: boolean;
  has_sequential_steps: boolean;
  /** Owning roadmap goal when this goal is a sequential step. */
  roadmap_id: string | null;
  step_status: StepStatus | null;
  is_final_step: boolean;
  roadmap_sections: RoadmapSection[];
  target_date: string | null;
  emoji: string | null;
  target_metric: TargetMetric | null;
  projections: GoalProjection[];
  phases: GoalPhase[];
  scheduled_events: ScheduledEventLink[];
  created_at: string;
  updated_at: string;
}

export interface GoalDependency {
  id: string;
  prerequisite_id: string;
  dependent_id: string;
  kind: DependencyKind;
  note: string | null;
  created_at: string;
}

export interface CreateGoalInput {
  title: string;
  body?: string;
  category?: string;
  priority?: GoalPriority;
  kind?: GoalKind;
  parentId?: string | null;
  targetDate?: string | null;
  emoji?: string | null;
}

export interface UpdateGoalInput {
  title?: string;
  body?: string;
  category?: string;
  priority?: GoalPriority;
  targetDate?: string | null;
  emoji?: string | null;
}

export interface DateHorizon {
  start: Date;
  end: Date;
}

/** Full persisted state of a goal graph. */
export interface GraphSnapshot {
  goals: Goal[];
  dependencies: GoalDependency[];
  revisions: GoalRevision[];
  snapshots: GoalSnapshot[];
}

/** Mutations accumulated since the last save. */
export interface GraphChanges {
  upsertedGoals: Goal[];
  deletedGoalIds: string[];
  addedDependencies: GoalDependency[];
  removedDependencyIds: string[];
  appendedRevisions: GoalRevision[];
  appendedSnapshots: GoalSnapshot[];
  removedSnapshotIds: string[];
}
