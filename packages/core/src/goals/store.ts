import { z } from "zod";
import type { DatabaseConnection } from "../db/connection.js";
import { GoalGraph } from "./graph.js";
import type { Clock } from "./graph.js";
import { DEPENDENCY_KINDS, GOAL_KINDS, GOAL_PRIORITIES, GOAL_STATES } from "./types.js";
import type {
  Goal,
  GoalDependency,
  GoalRevision,
  GoalSnapshot,
  GraphChanges,
  GraphSnapshot,
  StepStatus,
} from "./types.js";

interface GoalRow {
  id: string;
  title: string;
  body: string;
  category: string;
  priority: string;
  progress: number;
  kind: string;
  parent_id: string | null;
  roadmap_id: string | null;
  sort_index: number;
  state: string;
  is_locked: number;
  locked_snapshot: string | null;
  activated_at: string | null;
  completed_at: string | null;
  has_been_broken_down: number;
  is_atomic: number;
  has_sequential_steps: number;
  step_status: string | null;
  is_final_step: number;
  roadmap_sections: string;
  target_date: string | null;
  emoji: string | null;
  target_metric: string | null;
  projections: string;
  phases: string;
  scheduled_events: string;
  created_at: string;
  updated_at: string;
}

interface DependencyRow {
  id: string;
  prerequisite_id: string;
  dependent_id: string;
  kind: string;
  note: string | null;
  created_at: string;
}

interface RevisionRow {
  id: string;
  goal_id: string;
  summary: string;
  rationale: string | null;
  before_content: string | null;
  after_content: string | null;
  created_at: string;
}

// JSON columns are validated on the way in; a malformed value falls back to empty.
const snapshotSchema = z.object({
  id: z.string(),
  goal_id: z.string(),
  title: z.string(),
  body: z.string(),
  progress: z.number(),
  rationale: z.string(),
  captured_at: z.string(),
});

const contentSchema = z.object({
  title: z.string(),
  body: z.string(),
  progress: z.number(),
});

const sectionsSchema = z.array(
  z.object({ title: z.string(), step_indices: z.array(z.number().int()) })
);

const metricSchema = z.object({
  label: z.string(),
  baseline: z.number().nullable(),
  target: z.number().nullable(),
  unit: z.string().nullable(),
  window_days: z.number().nullable(),
  notes: z.string().nullable(),
});

const projectionsSchema = z.array(
  z.object({
    id: z.string(),
    title: z.string(),
    detail: z.string().nullable(),
    start: z.string(),
    end: z.string(),
    expected_delta: z.number().nullable(),
    metric_unit: z.string().nullable(),
    confidence: z.number(),
    status: z.enum(["upcoming", "in_progress", "complete", "skipped"]),
  })
);

const phasesSchema = z.array(
  z.object({
    id: z.string(),
    title: z.string(),
    summary: z.string(),
    order: z.number(),
    status: z.enum(["planned", "active", "completed"]),
    started_at: z.string().nullable(),
    completed_at: z.string().nullable(),
  })
);

const eventsSchema = z.array(
  z.object({
    id: z.string(),
    event_id: z.string().nullable(),
    title: z.string(),
    start: z.string(),
    end: z.string(),
    status: z.enum(["proposed", "confirmed", "cancelled"]),
  })
);

const STEP_STATUSES: readonly StepStatus[] = ["pending", "current", "completed", "unknown"];

function parseJson<T>(
  raw: string | null,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T
): T {
  if (raw === null) return fallback;
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : fallback;
  } catch {
    return fallback;
  }
}

function oneOf<T extends string>(allowed: readonly T[], value: string | null, fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

function rowToGoal(row: GoalRow): Goal {
  return {
    id: row.id,
    title: row.title,
    body: row.body,
    category: row.category,
    priority: oneOf(GOAL_PRIORITIES, row.priority, "next"),
    progress: row.progress,
    kind: oneOf(GOAL_KINDS, row.kind, "campaign"),
    parent_id: row.parent_id,
    sort_index: row.sort_index,
    state: oneOf(GOAL_STATES, row.state, "draft"),
    is_locked: row.is_locked === 1,
    locked_snapshot: parseJson(row.locked_snapshot, snapshotSchema.nullable(), null),
    activated_at: row.activated_at,
    completed_at: row.completed_at,
    has_been_broken_down: row.has_been_broken_down === 1,
    is_atomic: row.is_atomic === 1,
    has_sequential_steps: row.has_sequential_steps === 1,
    roadmap_id: row.roadmap_id,
    step_status: row.step_status === null ? null : oneOf(STEP_STATUSES, row.step_status, "unknown"),
    is_final_step: row.is_final_step === 1,
    roadmap_sections: parseJson(row.roadmap_sections, sectionsSchema, []),
    target_date: row.target_date,
    emoji: row.emoji,
    target_metric: parseJson(row.target_metric, metricSchema.nullable(), null),
    projections: parseJson(row.projections, projectionsSchema, []),
    phases: parseJson(row.phases, phasesSchema, []),
    scheduled_events: parseJson(row.scheduled_events, eventsSchema, []),
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

function rowToDependency(row: DependencyRow): GoalDependency {
  return {
    id: row.id,
    prerequisite_id: row.prerequisite_id,
    dependent_id: row.dependent_id,
    kind: oneOf(DEPENDENCY_KINDS, row.kind, "finish_to_start"),
    note: row.note,
    created_at: row.created_at,
  };
}

function rowToRevision(row: RevisionRow): GoalRevision {
  return {
    id: row.id,
    goal_id: row.goal_id,
    summary: row.summary,
    rationale: row.rationale,
    before: parseJson(row.before_content, contentSchema.nullable(), null),
    after: parseJson(row.after_content, contentSchema.nullable(), null),
    created_at: row.created_at,
  };
}

const flag = (value: boolean) => (value ? 1 : 0);
const json = (value: unknown) => (value === null ? null : JSON.stringify(value));

/**
 * SQLite persistence for a goal graph: one bulk load on startup, then one
 * transaction per batch of changes.
 */
export class GoalStore {
  constructor(private db: DatabaseConnection) {}

  loadSnapshot(): GraphSnapshot {
    const goals = this.db
      .prepare<[], GoalRow>("SELECT * FROM goals ORDER BY sort_index ASC, created_at ASC")
      .all()
      .map(rowToGoal);
    const dependencies = this.db
      .prepare<[], DependencyRow>("SELECT * FROM goal_dependencies ORDER BY created_at ASC")
      .all()
      .map(rowToDependency);
    const revisions = this.db
      .prepare<[], RevisionRow>("SELECT * FROM goal_revisions ORDER BY created_at ASC, rowid ASC")
      .all()
      .map(rowToRevision);
    const snapshots = this.db
      .prepare<[], GoalSnapshot>(
        "SELECT id, goal_id, title, body, progress, rationale, captured_at FROM goal_snapshots ORDER BY captured_at ASC, rowid ASC"
      )
      .all();
    return { goals, dependencies, revisions, snapshots };
  }

  load(clock?: Clock): GoalGraph {
    return GoalGraph.fromSnapshot(this.loadSnapshot(), clock);
  }

  save(changes: GraphChanges): void {
    const upsertGoal = this.db.prepare(
      `INSERT INTO goals (
         id, title, body, category, priority, progress, kind, parent_id, roadmap_id,
         sort_index, state, is_locked, locked_snapshot, activated_at, completed_at,
         has_been_broken_down, is_atomic, has_sequential_steps, step_status, is_final_step,
         roadmap_sections, target_date, emoji, target_metric, projections, phases,
         scheduled_events, created_at, updated_at
       ) VALUES (
         @id, @title, @body, @category, @priority, @progress, @kind, @parent_id, @roadmap_id,
         @sort_index, @state, @is_locked, @locked_snapshot, @activated_at, @completed_at,
         @has_been_broken_down, @is_atomic, @has_sequential_steps, @step_status, @is_final_step,
         @roadmap_sections, @target_date, @emoji, @target_metric, @projections, @phases,
         @scheduled_events, @created_at, @updated_at
       )
       ON CONFLICT(id) DO UPDATE SET
         title = excluded.title, body = excluded.body, category = excluded.category,
         priority = excluded.priority, progress = excluded.progress, kind = excluded.kind,
         parent_id = excluded.parent_id, roadmap_id = excluded.roadmap_id,
         sort_index = excluded.sort_index, state = excluded.state,
         is_locked = excluded.is_locked, locked_snapshot = excluded.locked_snapshot,
         activated_at = excluded.activated_at, completed_at = excluded.completed_at,
         has_been_broken_down = excluded.has_been_broken_down, is_atomic = excluded.is_atomic,
         has_sequential_steps = excluded.has_sequential_steps, step_status = excluded.step_status,
         is_final_step = excluded.is_final_step, roadmap_sections = excluded.roadmap_sections,
         target_date = excluded.target_date, emoji = excluded.emoji,
         target_metric = excluded.target_metric, projections = excluded.projections,
         phases = excluded.phases, scheduled_events = excluded.scheduled_events,
         updated_at = excluded.updated_at`
    );
    const insertDependency = this.db.prepare(
      `INSERT INTO goal_dependencies (id, prerequisite_id, dependent_id, kind, note, created_at)
       VALUES (@id, @prerequisite_id, @dependent_id, @kind, @note, @created_at)
       ON CONFLICT(id) DO NOTHING`
    );
    const insertRevision = this.db.prepare(
      `INSERT INTO goal_revisions (id, goal_id, summary, rationale, before_content, after_content, created_at)
       VALUES (@id, @goal_id, @summary, @rationale, @before_content, @after_content, @created_at)
       ON CONFLICT(id) DO NOTHING`
    );
    const insertSnapshot = this.db.prepare(
      `INSERT INTO goal_snapshots (id, goal_id, title, body, progress, rationale, captured_at)
       VALUES (@id, @goal_id, @title, @body, @progress, @rationale, @captured_at)
       ON CONFLICT(id) DO NOTHING`
    );
    const deleteSnapshot = this.db.prepare<[string]>("DELETE FROM goal_snapshots WHERE id = ?");
    const deleteDependency = this.db.prepare<[string]>("DELETE FROM goal_dependencies WHERE id = ?");
    const deleteGoal = this.db.prepare<[string]>("DELETE FROM goals WHERE id = ?");

    const apply = this.db.transaction((batch: GraphChanges) => {
      for (const goal of batch.upsertedGoals) {
        upsertGoal.run({
          ...goal,
          is_locked: flag(goal.is_locked),
          locked_snapshot: json(goal.locked_snapshot),
          has_been_broken_down: flag(goal.has_been_broken_down),
          is_atomic: flag(goal.is_atomic),
          has_sequential_steps: flag(goal.has_sequential_steps),
          is_final_step: flag(goal.is_final_step),
          roadmap_sections: JSON.stringify(goal.roadmap_sections),
          target_metric: json(goal.target_metric),
          projections: JSON.stringify(goal.projections),
          phases: JSON.stringify(goal.phases),
          scheduled_events: JSON.stringify(goal.scheduled_events),
        });
      }
      for (const edge of batch.addedDependencies) insertDependency.run(edge);
      for (const revision of batch.appendedRevisions) {
        insertRevision.run({
          id: revision.id,
          goal_id: revision.goal_id,
          summary: revision.summary,
          rationale: revision.rationale,
          before_content: json(revision.before),
          after_content: json(revision.after),
          created_at: revision.created_at,
        });
      }
      for (const snapshot of batch.appendedSnapshots) insertSnapshot.run(snapshot);
      for (const id of batch.removedSnapshotIds) deleteSnapshot.run(id);
      for (const id of batch.removedDependencyIds) deleteDependency.run(id);
      for (const id of batch.deletedGoalIds) deleteGoal.run(id);
    });
    apply(changes);
  }
}
