import { Hono } from "hono";
import { z } from "zod";
import { addDays } from "date-fns";
import { activationPlanSchema, framingSchema } from "@waypoint/core";
import type { DateHorizon } from "@waypoint/core";
import { getEngine } from "../engine.js";

const DEFAULT_HORIZON_DAYS = 14;

const prioritySchema = z.enum(["now", "next", "later"]);
const kindSchema = z.enum(["event", "campaign", "hybrid"]);
const dependencyKindSchema = z.enum(["finish_to_start", "start_to_start", "finish_to_finish"]);

const createGoalSchema = z.object({
  title: z.string().min(1).max(500),
  body: z.string().max(10_000).optional(),
  category: z.string().min(1).max(100).optional(),
  priority: prioritySchema.optional(),
  kind: kindSchema.optional(),
  parent_id: z.string().nullable().optional(),
  target_date: z.string().datetime({ offset: true }).nullable().optional(),
  emoji: z.string().max(16).nullable().optional(),
});

const updateGoalSchema = z.object({
  title: z.string().min(1).max(500).optional(),
  body: z.string().max(10_000).optional(),
  category: z.string().min(1).max(100).optional(),
  priority: prioritySchema.optional(),
  target_date: z.string().datetime({ offset: true }).nullable().optional(),
  emoji: z.string().max(16).nullable().optional(),
});

const progressSchema = z.object({ progress: z.number().min(0).max(1) });
const moveSchema = z.object({ parent_id: z.string().nullable() });
const dependencySchema = z.object({
  prerequisite_id: z.string().min(1),
  kind: dependencyKindSchema.optional(),
  note: z.string().max(1000).nullable().optional(),
});
const unlockSchema = z.object({ reason: z.string().max(1000).default("") });
const activateSchema = z.object({ plan: activationPlanSchema.optional() });
const deactivateSchema = z.object({
  to: z.enum(["draft", "completed", "archived"]),
  rationale: z.string().max(1000).nullable().optional(),
});
const framingRequestSchema = framingSchema.extend({
  reference_date: z.string().datetime({ offset: true }).optional(),
});
const roadmapSchema = z.object({
  title: z.string().min(1).max(500).optional(),
  body: z.string().max(10_000).optional(),
  days_from_now: z.number().int().nonnegative().optional(),
  is_final_step: z.boolean().optional(),
});
const sectionsSchema = z.object({
  sections: z.array(
    z.object({
      title: z.string().min(1).max(200),
      step_indices: z.array(z.number().int().nonnegative()),
    })
  ),
});
const pruneSchema = z.object({ max_per_goal: z.number().int().nonnegative().optional() });

/** `start`/`end` query params; defaults to the next two weeks. */
export function parseHorizon(start: string | undefined, end: string | undefined): DateHorizon {
  const from = start ? new Date(start) : new Date();
  const to = end ? new Date(end) : addDays(from, DEFAULT_HORIZON_DAYS);
  return { start: from, end: to };
}

// Empty bodies are allowed on action routes that take no parameters.
async function readBody(c: { req: { text(): Promise<string> } }): Promise<unknown> {
  const raw = await c.req.text();
  return raw.trim() ? JSON.parse(raw) : {};
}

const goals = new Hono();

/**
 * GET /api/goals: Top-level goals with aggregated progress.
 * Query params: view=tree for the nested subgoal tree.
 */
goals.get("/api/goals", (c) => {
  const engine = getEngine();
  if (c.req.query("view") === "tree") {
    return c.json({ tree: engine.tree() });
  }
  const list = engine.topLevelGoals().map((goal) => ({ ...goal, progress: engine.progress(goal.id) }));
  return c.json({ goals: list, count: list.length });
});

// POST /api/goals
goals.post("/api/goals", async (c) => {
  const body: unknown = await c.req.json();
  const parsed = createGoalSchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: parsed.error.flatten() }, 400);
  }
  const goal = await getEngine().createGoal({
    title: parsed.data.title,
    body: parsed.data.body,
    category: parsed.data.category,
    priority: parsed.data.priority,
    kind: parsed.data.kind,
    parentId: parsed.data.parent_id,
    targetDate: parsed.data.target_date,
    emoji: parsed.data.emoji,
  });
  return c.json(goal, 201);
});

// GET /api/goals/:id: goal, progress, children, steps and dependencies
goals.get("/api/goals/:id", (c) => {
  return c.json(getEngine().detail(c.req.param("id")));
});

// PATCH /api/goals/:id
goals.patch("/api/goals/:id", async (c) => {
  const body: unknown = await c.req.json();
  const parsed = updateGoalSchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: parsed.error.flatten() }, 400);
  }
  const goal = await getEngine().updateGoal(c.req.param("id"), {
    title: parsed.data.title,
    body: parsed.data.body,
    category: parsed.data.category,
    priority: parsed.data.priority,
    targetDate: parsed.data.target_date,
    emoji: parsed.data.emoji,
  });
  return c.json(goal);
});

// DELETE /api/goals/:id: cascades to subgoals and steps
goals.delete("/api/goals/:id", async (c) => {
  const removed = await getEngine().deleteGoal(c.req.param("id"));
  return c.json({ deleted: removed.map((g) => g.id), count: removed.length });
});

goals.get("/api/goals/:id/descendants", (c) => {
  const includeSelf = c.req.query("include_self") === "true";
  const list = getEngine().descendants(c.req.param("id"), includeSelf);
  return c.json({ goals: list, count: list.length });
});

goals.get("/api/goals/:id/revisions", (c) => {
  const revisions = getEngine().revisionHistory(c.req.param("id"));
  return c.json({ revisions, count: revisions.length });
});

goals.get("/api/goals/:id/snapshots", (c) => {
  const snapshots = getEngine().snapshots(c.req.param("id"));
  return c.json({ snapshots, count: snapshots.length });
});

/**
 * GET /api/goals/:id/timeline: entries clipped to the horizon.
 * Query params: start, end (ISO dates), enrich=true to annotate entries.
 */
goals.get("/api/goals/:id/timeline", async (c) => {
  const horizon = parseHorizon(c.req.query("start"), c.req.query("end"));
  const entries = await getEngine().timelineEntries(c.req.param("id"), horizon, {
    enrich: c.req.query("enrich") === "true",
  });
  return c.json({
    start: horizon.start.toISOString(),
    end: horizon.end.toISOString(),
    entries,
  });
});

// GET /api/timeline: every goal that belongs on the horizon
goals.get("/api/timeline", (c) => {
  const horizon = parseHorizon(c.req.query("start"), c.req.query("end"));
  const rows = getEngine().timeline(horizon);
  return c.json({
    start: horizon.start.toISOString(),
    end: horizon.end.toISOString(),
    rows,
  });
});

goals.post("/api/goals/:id/progress", async (c) => {
  const body: unknown = await c.req.json();
  const parsed = progressSchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: parsed.error.flatten() }, 400);
  }
  return c.json(await getEngine().setProgress(c.req.param("id"), parsed.data.progress));
});

goals.post("/api/goals/:id/move", async (c) => {
  const body: unknown = await c.req.json();
  const parsed = moveSchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: parsed.error.flatten() }, 400);
  }
  return c.json(await getEngine().reparent(c.req.param("id"), parsed.data.parent_id));
});

// POST /api/goals/:id/dependencies: the goal in the path is the dependent
goals.post("/api/goals/:id/dependencies", async (c) => {
  const body: unknown = await c.req.json();
  const parsed = dependencySchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: parsed.error.flatten() }, 400);
  }
  const edge = await getEngine().addDependency(
    parsed.data.prerequisite_id,
    c.req.param("id"),
    parsed.data.kind,
    parsed.data.note ?? null
  );
  return c.json(edge, 201);
});

goals.delete("/api/dependencies/:edgeId", async (c) => {
  const removed = await getEngine().removeDependency(c.req.param("edgeId"));
  if (!removed) return c.json({ error: "Dependency not found" }, 404);
  return c.json({ ok: true });
});

goals.post("/api/goals/:id/breakdown", async (c) => {
  const result = await getEngine().breakDown(c.req.param("id"));
  return c.json(result, 201);
});

goals.post("/api/goals/:id/framing", async (c) => {
  const body: unknown = await c.req.json();
  const parsed = framingRequestSchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: parsed.error.flatten() }, 400);
  }
  const { reference_date, ...proposal } = parsed.data;
  const goal = await getEngine().applyFraming(
    c.req.param("id"),
    proposal,
    reference_date ? new Date(reference_date) : undefined
  );
  return c.json(goal);
});

goals.post("/api/goals/:id/lock", async (c) => {
  return c.json(await getEngine().lock(c.req.param("id")));
});

goals.post("/api/goals/:id/unlock", async (c) => {
  const parsed = unlockSchema.safeParse(await readBody(c));
  if (!parsed.success) {
    return c.json({ error: parsed.error.flatten() }, 400);
  }
  return c.json(await getEngine().unlock(c.req.param("id"), parsed.data.reason));
});

goals.post("/api/goals/:id/regenerate", async (c) => {
  return c.json(await getEngine().regenerate(c.req.param("id")));
});

// POST /api/goals/:id/plan: proposed sessions; nothing is scheduled yet
goals.post("/api/goals/:id/plan", async (c) => {
  return c.json(await getEngine().generatePlan(c.req.param("id")));
});

/**
 * POST /api/goals/:id/activate: schedule the given plan, or generate and
 * schedule one in a single call when no plan is sent.
 */
goals.post("/api/goals/:id/activate", async (c) => {
  const parsed = activateSchema.safeParse(await readBody(c));
  if (!parsed.success) {
    return c.json({ error: parsed.error.flatten() }, 400);
  }
  const engine = getEngine();
  const id = c.req.param("id");
  const result = parsed.data.plan
    ? await engine.confirmActivation(id, parsed.data.plan)
    : await engine.activate(id);
  return c.json(result);
});

goals.post("/api/goals/:id/deactivate", async (c) => {
  const body: unknown = await c.req.json();
  const parsed = deactivateSchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: parsed.error.flatten() }, 400);
  }
  const goal = await getEngine().deactivate(
    c.req.param("id"),
    parsed.data.to,
    parsed.data.rationale ?? null
  );
  return c.json(goal);
});

goals.post("/api/goals/:id/complete", async (c) => {
  return c.json(await getEngine().complete(c.req.param("id")));
});

// POST /api/goals/:id/roadmap: start a roadmap; without a title the first step is proposed
goals.post("/api/goals/:id/roadmap", async (c) => {
  const parsed = roadmapSchema.safeParse(await readBody(c));
  if (!parsed.success) {
    return c.json({ error: parsed.error.flatten() }, 400);
  }
  const { title, body, days_from_now, is_final_step } = parsed.data;
  const step = await getEngine().startRoadmap(
    c.req.param("id"),
    title ? { title, body, daysFromNow: days_from_now, isFinalStep: is_final_step } : undefined
  );
  return c.json(step, 201);
});

goals.post("/api/goals/:id/roadmap/advance", async (c) => {
  return c.json(await getEngine().completeCurrentStep(c.req.param("id")));
});

goals.put("/api/goals/:id/roadmap/sections", async (c) => {
  const body: unknown = await c.req.json();
  const parsed = sectionsSchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: parsed.error.flatten() }, 400);
  }
  return c.json(await getEngine().setRoadmapSections(c.req.param("id"), parsed.data.sections));
});

goals.post("/api/maintenance/prune", async (c) => {
  const parsed = pruneSchema.safeParse(await readBody(c));
  if (!parsed.success) {
    return c.json({ error: parsed.error.flatten() }, 400);
  }
  return c.json(await getEngine().pruneSnapshots(parsed.data.max_per_goal));
});

export default goals;
