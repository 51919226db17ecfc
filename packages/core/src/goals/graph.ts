import { ulid } from "ulid";
import {
  CycleError,
  GoalNotFoundError,
  LockedError,
  SelfDependencyError,
  ValidationError,
} from "./errors.js";
import type {
  CreateGoalInput,
  DependencyKind,
  Goal,
  GoalDependency,
  GoalRevision,
  GoalSnapshot,
  GraphChanges,
  GraphSnapshot,
  RevisionContent,
} from "./types.js";

export type Clock = () => Date;

interface GraphState {
  goals: Map<string, Goal>;
  /** parent id -> ordered child ids (subgoals only, never roadmap steps) */
  children: Map<string, string[]>;
  roots: string[];
  /** roadmap goal id -> ordered step ids */
  steps: Map<string, string[]>;
  edges: Map<string, GoalDependency>;
  /** prerequisite id -> edge ids */
  outgoing: Map<string, Set<string>>;
  /** dependent id -> edge ids */
  incoming: Map<string, Set<string>>;
  revisions: Map<string, GoalRevision[]>;
  snapshots: Map<string, GoalSnapshot[]>;
  pending: PendingChanges;
}

interface PendingChanges {
  dirtyGoals: Set<string>;
  deletedGoals: Set<string>;
  addedEdges: Map<string, GoalDependency>;
  removedEdges: Set<string>;
  revisions: GoalRevision[];
  addedSnapshots: Map<string, GoalSnapshot>;
  removedSnapshots: Set<string>;
}

function emptyPending(): PendingChanges {
  return {
    dirtyGoals: new Set(),
    deletedGoals: new Set(),
    addedEdges: new Map(),
    removedEdges: new Set(),
    revisions: [],
    addedSnapshots: new Map(),
    removedSnapshots: new Set(),
  };
}

function emptyState(): GraphState {
  return {
    goals: new Map(),
    children: new Map(),
    roots: [],
    steps: new Map(),
    edges: new Map(),
    outgoing: new Map(),
    incoming: new Map(),
    revisions: new Map(),
    snapshots: new Map(),
    pending: emptyPending(),
  };
}

/**
 * Build a draft goal with every field defaulted. The goal is not part of any
 * graph until it is passed to `GoalGraph.insert`.
 */
export function newGoal(input: CreateGoalInput, now: Date): Goal {
  const stamp = now.toISOString();
  return {
    id: ulid(),
    title: input.title,
    body: input.body ?? "",
    category: input.category ?? "General",
    priority: input.priority ?? "next",
    progress: 0,
    kind: input.kind ?? "campaign",
    parent_id: input.parentId ?? null,
    sort_index: 0,
    state: "draft",
    is_locked: false,
    locked_snapshot: null,
    activated_at: null,
    completed_at: null,
    has_been_broken_down: false,
    is_atomic: false,
    has_sequential_steps: false,
    roadmap_id: null,
    step_status: null,
    is_final_step: false,
    roadmap_sections: [],
    target_date: input.targetDate ?? null,
    emoji: input.emoji ?? null,
    target_metric: null,
    projections: [],
    phases: [],
    scheduled_events: [],
    created_at: stamp,
    updated_at: stamp,
  };
}

export function contentOf(goal: Goal): RevisionContent {
  return { title: goal.title, body: goal.body, progress: goal.progress };
}

/**
 * In-memory arena of goals with two independent edge tables: parent/child
 * ownership and typed dependencies. Both must stay acyclic; every insertion
 * checks reachability before it commits.
 *
 * Reads return copies. All writes go through the methods below, which record
 * what changed so a store can save incrementally (`takeChanges`).
 */
export class GoalGraph {
  private state: GraphState = emptyState();

  constructor(private readonly clock: Clock = () => new Date()) {}

  static fromSnapshot(snapshot: GraphSnapshot, clock?: Clock): GoalGraph {
    const graph = new GoalGraph(clock);
    graph.hydrate(snapshot);
    return graph;
  }

  now(): Date {
    return this.clock();
  }

  // --- reads ---

  has(id: string): boolean {
    return this.state.goals.has(id);
  }

  get(id: string): Goal | null {
    const goal = this.state.goals.get(id);
    return goal ? structuredClone(goal) : null;
  }

  require(id: string): Goal {
    const goal = this.get(id);
    if (!goal) throw new GoalNotFoundError(id);
    return goal;
  }

  size(): number {
    return this.state.goals.size;
  }

  allGoals(): Goal[] {
    return [...this.state.goals.values()].map((g) => structuredClone(g));
  }

  topLevelGoals(): Goal[] {
    return this.state.roots.map((id) => this.require(id));
  }

  children(id: string): Goal[] {
    return (this.state.children.get(id) ?? []).map((childId) => this.require(childId));
  }

  hasChildren(id: string): boolean {
    return (this.state.children.get(id)?.length ?? 0) > 0;
  }

  steps(roadmapId: string): Goal[] {
    return (this.state.steps.get(roadmapId) ?? []).map((stepId) => this.require(stepId));
  }

  /**
   * Pre-order traversal of the subgoal tree. A visited set guards against a
   * corrupted parent chain; the walk returns what it reached instead of looping.
   */
  descendants(id: string, includeSelf = false): Goal[] {
    return this.descendantIds(id, includeSelf).map((goalId) => this.require(goalId));
  }

  /** Nodes under `id` with no children. A childless goal is its own leaf. */
  leaves(id: string): Goal[] {
    if (!this.has(id)) return [];
    return this.descendantIds(id, true)
      .filter((goalId) => !this.hasChildren(goalId))
      .map((goalId) => this.require(goalId));
  }

  ancestors(id: string): Goal[] {
    const result: Goal[] = [];
    const seen = new Set<string>([id]);
    let current = this.state.goals.get(id)?.parent_id ?? null;
    while (current && !seen.has(current)) {
      seen.add(current);
      const goal = this.state.goals.get(current);
      if (!goal) break;
      result.push(structuredClone(goal));
      current = goal.parent_id;
    }
    return result;
  }

  dependency(edgeId: string): GoalDependency | null {
    const edge = this.state.edges.get(edgeId);
    return edge ? { ...edge } : null;
  }

  dependencies(): GoalDependency[] {
    return [...this.state.edges.values()].map((edge) => ({ ...edge }));
  }

  /** Edges where the goal is the dependent (incoming) or the prerequisite (outgoing). */
  dependenciesOf(id: string): { incoming: GoalDependency[]; outgoing: GoalDependency[] } {
    const pick = (ids: Set<string> | undefined) =>
      [...(ids ?? [])].flatMap((edgeId) => {
        const edge = this.state.edges.get(edgeId);
        return edge ? [{ ...edge }] : [];
      });
    return {
      incoming: pick(this.state.incoming.get(id)),
      outgoing: pick(this.state.outgoing.get(id)),
    };
  }

  hasDependency(prerequisiteId: string, dependentId: string): boolean {
    return this.findEdge(prerequisiteId, dependentId) !== null;
  }

  revisionHistory(id: string): GoalRevision[] {
    return (this.state.revisions.get(id) ?? []).map((r) => structuredClone(r));
  }

  snapshotsOf(id: string): GoalSnapshot[] {
    return (this.state.snapshots.get(id) ?? []).map((s) => ({ ...s }));
  }

  // --- structural writes ---

  /**
   * Add a goal under `parentId` (or at the top level). Without an explicit
   * `sortIndex` the goal is appended after its last sibling.
   */
  insert(goal: Goal, parentId: string | null = goal.parent_id, sortIndex?: number): Goal {
    if (this.state.goals.has(goal.id)) {
      throw new ValidationError(`Goal ${goal.id} already exists`);
    }
    if (parentId !== null) {
      if (!this.state.goals.has(parentId)) throw new GoalNotFoundError(parentId);
      if (parentId === goal.id || this.descendantIds(goal.id, false).includes(parentId)) {
        throw new CycleError(`Goal ${parentId} cannot own its own ancestor ${goal.id}`);
      }
    }

    const siblings = parentId === null ? this.state.roots : this.childList(parentId);
    const stored: Goal = {
      ...structuredClone(goal),
      parent_id: parentId,
      roadmap_id: null,
      sort_index: sortIndex ?? this.nextSortIndex(siblings),
    };
    this.state.goals.set(stored.id, stored);
    this.placeOrdered(siblings, stored);
    this.state.pending.dirtyGoals.add(stored.id);
    return structuredClone(stored);
  }

  /** Append a step to a roadmap goal's ordered step list. */
  insertStep(roadmapId: string, step: Goal): Goal {
    if (!this.state.goals.has(roadmapId)) throw new GoalNotFoundError(roadmapId);
    if (this.state.goals.has(step.id)) {
      throw new ValidationError(`Goal ${step.id} already exists`);
    }
    let list = this.state.steps.get(roadmapId);
    if (!list) {
      list = [];
      this.state.steps.set(roadmapId, list);
    }
    const stored: Goal = {
      ...structuredClone(step),
      parent_id: null,
      roadmap_id: roadmapId,
      sort_index: this.nextSortIndex(list),
    };
    this.state.goals.set(stored.id, stored);
    list.push(stored.id);
    this.state.pending.dirtyGoals.add(stored.id);
    return structuredClone(stored);
  }

  /** Move a goal under a new parent (or to the top level). */
  reparent(id: string, newParentId: string | null): Goal {
    const goal = this.mutable(id);
    if (goal.roadmap_id !== null) {
      throw new ValidationError("Roadmap steps cannot be reparented");
    }
    if (newParentId !== null) {
      if (!this.state.goals.has(newParentId)) throw new GoalNotFoundError(newParentId);
      if (newParentId === id || this.descendantIds(id, false).includes(newParentId)) {
        throw new CycleError(`Goal ${newParentId} is a descendant of ${id}`);
      }
    }
    if (goal.parent_id === newParentId) return structuredClone(goal);

    this.detach(goal);
    const siblings = newParentId === null ? this.state.roots : this.childList(newParentId);
    goal.parent_id = newParentId;
    goal.sort_index = this.nextSortIndex(siblings);
    goal.updated_at = this.now().toISOString();
    this.placeOrdered(siblings, goal);
    this.state.pending.dirtyGoals.add(id);
    return structuredClone(goal);
  }

  /**
   * Add a typed dependency edge. Rejects self-dependencies and any edge that
   * would close a cycle through existing dependency edges. Adding an edge
   * that already exists returns the existing one.
   */
  addDependency(
    prerequisiteId: string,
    dependentId: string,
    kind: DependencyKind = "finish_to_start",
    note: string | null = null
  ): GoalDependency {
    if (!this.state.goals.has(prerequisiteId)) throw new GoalNotFoundError(prerequisiteId);
    if (!this.state.goals.has(dependentId)) throw new GoalNotFoundError(dependentId);
    if (prerequisiteId === dependentId) throw new SelfDependencyError(prerequisiteId);

    const existing = this.findEdge(prerequisiteId, dependentId);
    if (existing) return { ...existing };

    if (this.dependencyReaches(dependentId, prerequisiteId)) {
      throw new CycleError(
        `Dependency ${prerequisiteId} -> ${dependentId} would create a cycle`
      );
    }

    const edge: GoalDependency = {
      id: ulid(),
      prerequisite_id: prerequisiteId,
      dependent_id: dependentId,
      kind,
      note,
      created_at: this.now().toISOString(),
    };
    this.indexEdge(edge);
    this.state.pending.addedEdges.set(edge.id, edge);
    return { ...edge };
  }

  removeDependency(edgeId: string): boolean {
    const edge = this.state.edges.get(edgeId);
    if (!edge) return false;
    this.unindexEdge(edge);
    if (!this.state.pending.addedEdges.delete(edgeId)) {
      this.state.pending.removedEdges.add(edgeId);
    }
    return true;
  }

  /**
   * Delete a goal, its subgoal subtree and any roadmap steps, pre-order.
   * Dependency edges touching a deleted goal go with it. Deleting a goal that
   * is already gone is a no-op returning an empty list.
   */
  delete(id: string): Goal[] {
    if (!this.state.goals.has(id)) return [];

    const doomed: string[] = [];
    const seen = new Set<string>();
    const visit = (goalId: string) => {
      if (seen.has(goalId) || !this.state.goals.has(goalId)) return;
      seen.add(goalId);
      doomed.push(goalId);
      for (const stepId of this.state.steps.get(goalId) ?? []) visit(stepId);
      for (const childId of this.state.children.get(goalId) ?? []) visit(childId);
    };
    visit(id);

    const removed = doomed.map((goalId) => this.require(goalId));
    const root = this.state.goals.get(id);
    if (root) this.detach(root);

    for (const goalId of doomed) {
      const edgeIds = [
        ...(this.state.incoming.get(goalId) ?? []),
        ...(this.state.outgoing.get(goalId) ?? []),
      ];
      for (const edgeId of edgeIds) this.removeDependency(edgeId);

      for (const snapshot of this.state.snapshots.get(goalId) ?? []) {
        if (!this.state.pending.addedSnapshots.delete(snapshot.id)) {
          this.state.pending.removedSnapshots.add(snapshot.id);
        }
      }

      this.state.goals.delete(goalId);
      this.state.children.delete(goalId);
      this.state.steps.delete(goalId);
      this.state.incoming.delete(goalId);
      this.state.outgoing.delete(goalId);
      this.state.revisions.delete(goalId);
      this.state.snapshots.delete(goalId);
      this.state.pending.dirtyGoals.delete(goalId);
      this.state.pending.deletedGoals.add(goalId);
    }
    this.state.pending.revisions = this.state.pending.revisions.filter(
      (r) => !seen.has(r.goal_id)
    );

    return removed;
  }

  // --- content writes ---

  /**
   * Apply `mutate` to a working copy of the goal and commit it. Locked goals
   * reject changes to title, body or progress unless the same mutation
   * clears the lock. Structural fields cannot be changed here.
   */
  update(id: string, mutate: (goal: Goal) => void): Goal {
    const current = this.mutable(id);
    const draft = structuredClone(current);
    mutate(draft);

    if (
      draft.id !== current.id ||
      draft.parent_id !== current.parent_id ||
      draft.roadmap_id !== current.roadmap_id ||
      draft.sort_index !== current.sort_index
    ) {
      throw new ValidationError("Structural fields can only change through graph operations");
    }
    if (!Number.isFinite(draft.progress) || draft.progress < 0 || draft.progress > 1) {
      throw new ValidationError(`Progress must be within [0, 1], got ${draft.progress}`);
    }
    const contentChanged =
      draft.title !== current.title ||
      draft.body !== current.body ||
      draft.progress !== current.progress;
    if (current.is_locked && draft.is_locked && contentChanged) {
      throw new LockedError(id);
    }

    draft.updated_at = this.now().toISOString();
    this.state.goals.set(id, draft);
    this.state.pending.dirtyGoals.add(id);
    return structuredClone(draft);
  }

  /**
   * Append an audit record. Timestamps never go backwards: a record stamped
   * earlier than the previous one takes the previous timestamp.
   */
  appendRevision(
    goalId: string,
    entry: {
      summary: string;
      rationale?: string | null;
      before?: RevisionContent | null;
      after?: RevisionContent | null;
    }
  ): GoalRevision {
    if (!this.state.goals.has(goalId)) throw new GoalNotFoundError(goalId);
    let history = this.state.revisions.get(goalId);
    if (!history) {
      history = [];
      this.state.revisions.set(goalId, history);
    }
    const stamp = this.now().toISOString();
    const last = history[history.length - 1];
    const revision: GoalRevision = {
      id: ulid(),
      goal_id: goalId,
      summary: entry.summary,
      rationale: entry.rationale ?? null,
      before: entry.before ?? null,
      after: entry.after ?? null,
      created_at: last && last.created_at > stamp ? last.created_at : stamp,
    };
    history.push(revision);
    this.state.pending.revisions.push(revision);
    return structuredClone(revision);
  }

  archiveSnapshot(snapshot: GoalSnapshot): void {
    if (!this.state.goals.has(snapshot.goal_id)) throw new GoalNotFoundError(snapshot.goal_id);
    let list = this.state.snapshots.get(snapshot.goal_id);
    if (!list) {
      list = [];
      this.state.snapshots.set(snapshot.goal_id, list);
    }
    list.push({ ...snapshot });
    this.state.pending.addedSnapshots.set(snapshot.id, { ...snapshot });
  }

  removeSnapshot(goalId: string, snapshotId: string): boolean {
    const list = this.state.snapshots.get(goalId);
    const idx = list?.findIndex((s) => s.id === snapshotId) ?? -1;
    if (!list || idx === -1) return false;
    list.splice(idx, 1);
    if (!this.state.pending.addedSnapshots.delete(snapshotId)) {
      this.state.pending.removedSnapshots.add(snapshotId);
    }
    return true;
  }

  // --- transactions & persistence ---

  /**
   * Run `fn` against the graph; if it throws, every change it made is
   * discarded and the graph returns to the state it had before the call.
   */
  batch<T>(fn: () => T): T {
    const saved = structuredClone(this.state);
    try {
      return fn();
    } catch (err) {
      this.state = saved;
      throw err;
    }
  }

  /** Collect and clear the mutations recorded since the previous call. */
  takeChanges(): GraphChanges {
    const changes = this.collectChanges();
    this.state.pending = emptyPending();
    return changes;
  }

  /**
   * Hand the recorded mutations to `save` and clear them once it returns.
   * When `save` throws they stay pending and go out with the next flush.
   */
  flushChanges(save: (changes: GraphChanges) => void): void {
    save(this.collectChanges());
    this.state.pending = emptyPending();
  }

  private collectChanges(): GraphChanges {
    const pending = this.state.pending;
    return {
      upsertedGoals: [...pending.dirtyGoals].flatMap((id) => {
        const goal = this.state.goals.get(id);
        return goal ? [structuredClone(goal)] : [];
      }),
      deletedGoalIds: [...pending.deletedGoals],
      addedDependencies: [...pending.addedEdges.values()].map((e) => ({ ...e })),
      removedDependencyIds: [...pending.removedEdges],
      appendedRevisions: pending.revisions.map((r) => structuredClone(r)),
      appendedSnapshots: [...pending.addedSnapshots.values()].map((s) => ({ ...s })),
      removedSnapshotIds: [...pending.removedSnapshots],
    };
  }

  hasPendingChanges(): boolean {
    const p = this.state.pending;
    return (
      p.dirtyGoals.size > 0 ||
      p.deletedGoals.size > 0 ||
      p.addedEdges.size > 0 ||
      p.removedEdges.size > 0 ||
      p.revisions.length > 0 ||
      p.addedSnapshots.size > 0 ||
      p.removedSnapshots.size > 0
    );
  }

  toSnapshot(): GraphSnapshot {
    return {
      goals: this.allGoals(),
      dependencies: this.dependencies(),
      revisions: [...this.state.revisions.values()].flat().map((r) => structuredClone(r)),
      snapshots: [...this.state.snapshots.values()].flat().map((s) => ({ ...s })),
    };
  }

  private hydrate(snapshot: GraphSnapshot): void {
    const state = emptyState();
    this.state = state;

    for (const goal of snapshot.goals) {
      state.goals.set(goal.id, structuredClone(goal));
    }
    const byOrder = [...state.goals.values()].sort(
      (a, b) => a.sort_index - b.sort_index || a.created_at.localeCompare(b.created_at)
    );
    for (const goal of byOrder) {
      if (goal.roadmap_id !== null && state.goals.has(goal.roadmap_id)) {
        let list = state.steps.get(goal.roadmap_id);
        if (!list) {
          list = [];
          state.steps.set(goal.roadmap_id, list);
        }
        list.push(goal.id);
      } else if (goal.parent_id !== null && state.goals.has(goal.parent_id)) {
        this.childList(goal.parent_id).push(goal.id);
      } else {
        goal.parent_id = null;
        state.roots.push(goal.id);
      }
    }

    for (const edge of snapshot.dependencies) {
      if (state.goals.has(edge.prerequisite_id) && state.goals.has(edge.dependent_id)) {
        this.indexEdge({ ...edge });
      }
    }

    const revisions = [...snapshot.revisions].sort((a, b) =>
      a.created_at.localeCompare(b.created_at)
    );
    for (const revision of revisions) {
      if (!state.goals.has(revision.goal_id)) continue;
      const list = state.revisions.get(revision.goal_id) ?? [];
      list.push(structuredClone(revision));
      state.revisions.set(revision.goal_id, list);
    }

    const snapshots = [...snapshot.snapshots].sort((a, b) =>
      a.captured_at.localeCompare(b.captured_at)
    );
    for (const snap of snapshots) {
      if (!state.goals.has(snap.goal_id)) continue;
      const list = state.snapshots.get(snap.goal_id) ?? [];
      list.push({ ...snap });
      state.snapshots.set(snap.goal_id, list);
    }
  }

  // --- internals ---

  private mutable(id: string): Goal {
    const goal = this.state.goals.get(id);
    if (!goal) throw new GoalNotFoundError(id);
    return goal;
  }

  private childList(parentId: string): string[] {
    let list = this.state.children.get(parentId);
    if (!list) {
      list = [];
      this.state.children.set(parentId, list);
    }
    return list;
  }

  private nextSortIndex(siblings: string[]): number {
    let max = -1;
    for (const id of siblings) {
      const goal = this.state.goals.get(id);
      if (goal && goal.sort_index > max) max = goal.sort_index;
    }
    return max + 1;
  }

  /** Insert keeping siblings ordered by sort_index; equal indexes keep arrival order. */
  private placeOrdered(siblings: string[], goal: Goal): void {
    const at = siblings.findIndex((id) => {
      const other = this.state.goals.get(id);
      return other !== undefined && other.sort_index > goal.sort_index;
    });
    if (at === -1) siblings.push(goal.id);
    else siblings.splice(at, 0, goal.id);
  }

  private detach(goal: Goal): void {
    const remove = (list: string[] | undefined) => {
      if (!list) return;
      const idx = list.indexOf(goal.id);
      if (idx !== -1) list.splice(idx, 1);
    };
    if (goal.roadmap_id !== null) remove(this.state.steps.get(goal.roadmap_id));
    else if (goal.parent_id !== null) remove(this.state.children.get(goal.parent_id));
    else remove(this.state.roots);
  }

  private descendantIds(id: string, includeSelf: boolean): string[] {
    const result: string[] = [];
    const visited = new Set<string>();
    const walk = (goalId: string, isRoot: boolean) => {
      if (visited.has(goalId)) return;
      visited.add(goalId);
      if (!isRoot || includeSelf) result.push(goalId);
      for (const childId of this.state.children.get(goalId) ?? []) walk(childId, false);
    };
    if (this.state.goals.has(id)) walk(id, true);
    return result;
  }

  /** True when `from` already reaches `to` by following dependency edges forward. */
  private dependencyReaches(from: string, to: string): boolean {
    const visited = new Set<string>();
    const stack = [from];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || visited.has(current)) continue;
      if (current === to) return true;
      visited.add(current);
      for (const edgeId of this.state.outgoing.get(current) ?? []) {
        const edge = this.state.edges.get(edgeId);
        if (edge && !visited.has(edge.dependent_id)) stack.push(edge.dependent_id);
      }
    }
    return false;
  }

  private findEdge(prerequisiteId: string, dependentId: string): GoalDependency | null {
    for (const edgeId of this.state.outgoing.get(prerequisiteId) ?? []) {
      const edge = this.state.edges.get(edgeId);
      if (edge && edge.dependent_id === dependentId) return edge;
    }
    return null;
  }

  private indexEdge(edge: GoalDependency): void {
    this.state.edges.set(edge.id, edge);
    const out = this.state.outgoing.get(edge.prerequisite_id) ?? new Set<string>();
    out.add(edge.id);
    this.state.outgoing.set(edge.prerequisite_id, out);
    const inc = this.state.incoming.get(edge.dependent_id) ?? new Set<string>();
    inc.add(edge.id);
    this.state.incoming.set(edge.dependent_id, inc);
  }

  private unindexEdge(edge: GoalDependency): void {
    this.state.edges.delete(edge.id);
    this.state.outgoing.get(edge.prerequisite_id)?.delete(edge.id);
    this.state.incoming.get(edge.dependent_id)?.delete(edge.id);
  }
}
