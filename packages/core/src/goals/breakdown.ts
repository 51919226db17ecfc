import { ulid } from "ulid";
import { CycleError, InvalidBreakdownError } from "./errors.js";
import { newGoal } from "./graph.js";
import type { GoalGraph } from "./graph.js";
import type { Goal, GoalPriority } from "./types.js";
import type { DecompositionNode, DecompositionTree } from "../reasoning/schemas.js";

export interface DroppedDependency {
  prerequisite: string;
  dependent: string;
  reason: string;
}

export interface BreakdownResult {
  createdGoals: Goal[];
  atomicTaskCount: number;
  dependencyCount: number;
  droppedDependencies: DroppedDependency[];
  /** external id -> id of the goal created for it */
  assignedIdentifiers: Record<string, string>;
  totalEstimatedHours: number;
}

interface NodeRecord {
  node: DecompositionNode;
  externalId: string;
  dependencies: string[];
  children: NodeRecord[];
  goalId: string | null;
}

/**
 * Lowercase, collapse every run of non-alphanumeric characters into a single
 * "-" and trim dashes from both ends.
 */
export function normalizeExternalId(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, "-")
    .replace(/^-+|-+$/g, "");
}

export function priorityForDifficulty(difficulty: string | null | undefined): GoalPriority {
  switch (difficulty?.trim().toLowerCase()) {
    case "hard":
      return "now";
    case "medium":
      return "next";
    default:
      return "later";
  }
}

export function formatNodeBody(node: DecompositionNode): string {
  const metadata: string[] = [];
  if (node.estimated_hours !== null && node.estimated_hours !== undefined) {
    metadata.push(`Estimate: ${node.estimated_hours.toFixed(1)}h`);
  }
  if (node.difficulty) {
    const label = node.difficulty
      .toLowerCase()
      .replace(/\b\p{L}/gu, (c) => c.toUpperCase());
    metadata.push(`Difficulty: ${label}`);
  }
  if (metadata.length === 0) return node.description;
  return `${node.description}\n\n${metadata.join(" • ")}`;
}

/**
 * Check the proposed tree before anything is written: external ids must be
 * unique and every declared dependency must name a node of the same tree.
 */
function indexTree(tree: DecompositionTree): { roots: NodeRecord[]; records: NodeRecord[] } {
  const records: NodeRecord[] = [];
  const seen = new Set<string>();

  const visit = (node: DecompositionNode): NodeRecord => {
    const externalId = normalizeExternalId(node.id ?? node.title) || ulid().toLowerCase();
    if (seen.has(externalId)) {
      throw new InvalidBreakdownError(`Duplicate node id "${externalId}" in breakdown`);
    }
    seen.add(externalId);

    const record: NodeRecord = {
      node,
      externalId,
      dependencies: [...new Set((node.dependencies ?? []).map(normalizeExternalId))],
      children: [],
      goalId: null,
    };
    records.push(record);
    record.children = (node.children ?? []).map(visit);
    return record;
  };

  const roots = tree.subtasks.map(visit);

  for (const record of records) {
    for (const dep of record.dependencies) {
      if (!seen.has(dep)) {
        throw new InvalidBreakdownError(
          `Node "${record.externalId}" depends on unknown node "${dep}"`
        );
      }
    }
  }

  return { roots, records };
}

/**
 * Materialize a proposed decomposition under `parentId`.
 *
 * Goals are created pre-order; top-level nodes take their sort index from the
 * recommended order (ties and unranked nodes keep tree order). Dependencies
 * resolve only once every node exists, and edges that would break the DAG
 * are dropped and logged. The caller is responsible for refusing goals that
 * were already broken down.
 */
export function applyBreakdown(
  graph: GoalGraph,
  tree: DecompositionTree,
  parentId: string
): BreakdownResult {
  const parent = graph.require(parentId);
  const { roots, records } = indexTree(tree);

  const rank = new Map<string, number>();
  tree.recommended_order.forEach((raw, i) => {
    const key = normalizeExternalId(raw);
    if (!rank.has(key)) rank.set(key, i);
  });
  const rankOf = (record: NodeRecord) =>
    rank.get(record.externalId) ?? rank.get(normalizeExternalId(record.node.title)) ?? Infinity;
  const ordered = roots
    .map((record, treeIndex) => ({ record, treeIndex }))
    .sort((a, b) => rankOf(a.record) - rankOf(b.record) || a.treeIndex - b.treeIndex);
  const rootSortIndex = new Map<NodeRecord, number>();
  ordered.forEach(({ record }, position) => rootSortIndex.set(record, position));

  return graph.batch(() => {
    const createdGoals: Goal[] = [];
    const assignedIdentifiers: Record<string, string> = {};
    let atomicTaskCount = 0;

    const build = (record: NodeRecord, ownerId: string, sortIndex: number) => {
      const atomic = record.node.is_atomic === true || record.children.length === 0;
      const goal = newGoal(
        {
          title: record.node.title,
          body: formatNodeBody(record.node),
          category: parent.category,
          priority: priorityForDifficulty(record.node.difficulty),
          kind: parent.kind,
        },
        graph.now()
      );
      goal.is_atomic = atomic;
      goal.has_been_broken_down = record.children.length > 0;

      const created = graph.insert(goal, ownerId, sortIndex);
      record.goalId = created.id;
      createdGoals.push(created);
      assignedIdentifiers[record.externalId] = created.id;
      if (atomic) atomicTaskCount++;

      record.children.forEach((child, i) => build(child, created.id, i));
    };

    for (const record of roots) {
      build(record, parentId, rootSortIndex.get(record) ?? 0);
    }

    const dropped: DroppedDependency[] = [];
    let dependencyCount = 0;
    for (const record of records) {
      if (record.goalId === null) continue;
      for (const dep of record.dependencies) {
        const prerequisiteId = assignedIdentifiers[dep];
        if (prerequisiteId === undefined) continue;
        if (prerequisiteId === record.goalId) {
          dropped.push({ prerequisite: dep, dependent: record.externalId, reason: "self dependency" });
          continue;
        }
        if (graph.hasDependency(prerequisiteId, record.goalId)) continue;
        try {
          graph.addDependency(prerequisiteId, record.goalId, "finish_to_start", null);
          dependencyCount++;
        } catch (err) {
          if (!(err instanceof CycleError)) throw err;
          dropped.push({ prerequisite: dep, dependent: record.externalId, reason: "would create a cycle" });
        }
      }
    }
    for (const d of dropped) {
      console.warn(`[breakdown] Dropped dependency ${d.prerequisite} -> ${d.dependent}: ${d.reason}`);
    }

    graph.update(parentId, (g) => {
      g.has_been_broken_down = true;
    });

    return {
      createdGoals: createdGoals.map((g) => graph.require(g.id)),
      atomicTaskCount,
      dependencyCount,
      droppedDependencies: dropped,
      assignedIdentifiers,
      totalEstimatedHours: tree.total_estimated_hours,
    };
  });
}
