import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createApp, getEngine, resetEngine } from "@waypoint/server";
import {
  closeDb,
  getDb,
  getSetting,
  initializeSchema,
  resetCalendarService,
  resetReasoningService,
  setCalendarService,
  setReasoningService,
  setSetting,
} from "@waypoint/core";
import { FakeCalendarService } from "./helpers/fake-calendar.js";
import { FakeReasoningService } from "./helpers/fake-reasoning.js";

let tempDir = "";
let app = createApp();
let reasoning = new FakeReasoningService();
let calendar = new FakeCalendarService();

async function post(url: string, body?: unknown): Promise<Response> {
  return await app.request(`http://localhost${url}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

async function createGoal(title: string): Promise<string> {
  const res = await post("/api/goals", { title });
  const body = (await res.json()) as { id: string };
  return body.id;
}

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "waypoint-server-test-"));
  process.env.WAYPOINT_DB_PATH = path.join(tempDir, "test.db");
  delete process.env.WAYPOINT_CORS_ORIGINS;
  closeDb();
  initializeSchema(getDb());
  reasoning = new FakeReasoningService();
  calendar = new FakeCalendarService();
  setReasoningService(reasoning);
  setCalendarService(calendar);
  resetEngine();
  app = createApp();
});

afterEach(() => {
  vi.restoreAllMocks();
  resetEngine();
  resetReasoningService();
  resetCalendarService();
  closeDb();
  delete process.env.WAYPOINT_DB_PATH;
  delete process.env.WAYPOINT_CORS_ORIGINS;
  if (tempDir && fs.existsSync(tempDir)) {
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
});

describe("settings", () => {
  it("masks secrets including short ones", async () => {
    const db = getDb();
    setSetting(db, "ai.api_key", "test-secret");
    setSetting(db, "calendar.token", "abcd");

    const res = await app.request("http://localhost/api/settings");
    expect(res.status).toBe(200);

    const body = (await res.json()) as Record<string, string>;
    expect(body["ai.api_key"]).toBe("te••••et");
    expect(body["calendar.token"]).toBe("••••");
    expect(body["steps.hard_limit"]).toBe("15");
  });

  it("ignores masked values on update and reloads the engine's limits", async () => {
    setSetting(getDb(), "ai.api_key", "test-secret");
    const engine = getEngine();
    expect(engine.steps.limits.hardLimit).toBe(15);

    const res = await app.request("http://localhost/api/settings", {
      method: "PATCH",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ "ai.api_key": "te••••et", "steps.hard_limit": "5" }),
    });

    expect(res.status).toBe(200);
    const body = (await res.json()) as Record<string, string>;
    expect(body["steps.hard_limit"]).toBe("5");
    expect(getSetting(getDb(), "ai.api_key")).toBe("test-secret");
    expect(getEngine()).toBe(engine);
    expect(engine.steps.limits.hardLimit).toBe(5);
  });

  it("applies a settings change after a running breakdown and keeps one writer", async () => {
    reasoning.delayMs = 50;
    reasoning.breakdown = {
      subtasks: [
        { id: "part-a", title: "Part A", description: "" },
        { id: "part-b", title: "Part B", description: "" },
      ],
      recommended_order: ["part-a", "part-b"],
      total_estimated_hours: 0,
    };
    const id = await createGoal("Write a novel");

    const first = post(`/api/goals/${id}/breakdown`);
    await vi.waitFor(() => expect(reasoning.calls).toHaveLength(1));
    const patched = await app.request("http://localhost/api/settings", {
      method: "PATCH",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ "steps.soft_warning": "11" }),
    });
    const second = await post(`/api/goals/${id}/breakdown`);

    expect(patched.status).toBe(200);
    expect((await first).status).toBe(201);
    expect(second.status).toBe(409);
    expect(getEngine().steps.limits.softWarning).toBe(11);
    const rows = getDb()
      .prepare("SELECT title FROM goals WHERE parent_id = ? ORDER BY sort_index")
      .all(id);
    expect(rows).toEqual([{ title: "Part A" }, { title: "Part B" }]);
  });
});

describe("database switch", () => {
  it("schedules into the calendar of the newly opened database", async () => {
    resetCalendarService();
    getEngine();
    closeDb();
    process.env.WAYPOINT_DB_PATH = path.join(tempDir, "second.db");
    initializeSchema(getDb());

    const id = await createGoal("Run a half marathon");
    const res = await post(`/api/goals/${id}/activate`);

    expect(res.status).toBe(200);
    const rows = getDb().prepare("SELECT title FROM calendar_events ORDER BY start_at").all();
    expect(rows).toEqual([{ title: "Kickoff session" }, { title: "Follow-up session" }]);
  });
});

describe("cors", () => {
  it("emits no headers by default", async () => {
    const res = await app.request("http://localhost/api/health", {
      headers: { origin: "http://elsewhere.test" },
    });
    expect(res.headers.get("access-control-allow-origin")).toBeNull();
  });

  it("allows configured origins only", async () => {
    process.env.WAYPOINT_CORS_ORIGINS = "http://localhost:5173, http://planner.test";
    app = createApp();

    const allowed = await app.request("http://localhost/api/health", {
      headers: { origin: "http://planner.test" },
    });
    const denied = await app.request("http://localhost/api/health", {
      headers: { origin: "http://elsewhere.test" },
    });

    expect(allowed.headers.get("access-control-allow-origin")).toBe("http://planner.test");
    expect(denied.headers.get("access-control-allow-origin")).toBeNull();
  });
});

describe("goal routes", () => {
  it("reports health", async () => {
    const res = await app.request("http://localhost/api/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", db: "connected" });
  });

  it("creates, lists and reads goals", async () => {
    const created = await post("/api/goals", { title: "Run a half marathon", priority: "now" });
    expect(created.status).toBe(201);
    const goal = (await created.json()) as { id: string; state: string; priority: string };
    expect(goal.state).toBe("draft");
    expect(goal.priority).toBe("now");

    const list = await app.request("http://localhost/api/goals");
    const listed = (await list.json()) as { goals: Array<{ id: string; progress: number }>; count: number };
    expect(listed.count).toBe(1);
    expect(listed.goals[0]).toMatchObject({ id: goal.id, progress: 0 });

    const detail = await app.request(`http://localhost/api/goals/${goal.id}`);
    expect(await detail.json()).toMatchObject({
      goal: { id: goal.id, title: "Run a half marathon" },
      progress: 0,
      children: [],
      steps: [],
      dependencies: { incoming: [], outgoing: [] },
    });
  });

  it("rejects invalid input", async () => {
    const empty = await post("/api/goals", { title: "" });
    expect(empty.status).toBe(400);

    const malformed = await app.request("http://localhost/api/goals", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{",
    });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({ error: "Invalid JSON in request body" });
  });

  it("maps engine errors to status codes", async () => {
    const missing = await app.request("http://localhost/api/goals/missing");
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "Goal missing not found", code: "not_found" });

    const id = await createGoal("Run a half marathon");
    expect((await post(`/api/goals/${id}/lock`)).status).toBe(200);
    const edit = await app.request(`http://localhost/api/goals/${id}`, {
      method: "PATCH",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ title: "Walk a 5k" }),
    });
    expect(edit.status).toBe(423);
    expect(await edit.json()).toEqual({ error: "Goal is locked and cannot be modified", code: "locked" });

    const inverted = await app.request(
      "http://localhost/api/timeline?start=2026-06-10T00:00:00Z&end=2026-06-01T00:00:00Z"
    );
    expect(inverted.status).toBe(400);
    expect(await inverted.json()).toMatchObject({ code: "validation" });

    const unknownEdge = await app.request("http://localhost/api/dependencies/nope", { method: "DELETE" });
    expect(unknownEdge.status).toBe(404);
  });

  it("reports which sessions were scheduled when activation stops midway", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    calendar.failOnCreate = 2;
    const id = await createGoal("Run a half marathon");

    const res = await post(`/api/goals/${id}/activate`);

    expect(res.status).toBe(502);
    const body = (await res.json()) as { code: string; succeeded: Array<{ event_id: string; status: string }> };
    expect(body.code).toBe("partial_activation_failure");
    expect(body.succeeded).toMatchObject([{ event_id: "evt-1", status: "confirmed" }]);

    const detail = (await (await app.request(`http://localhost/api/goals/${id}`)).json()) as {
      goal: { state: string };
    };
    expect(detail.goal.state).toBe("draft");
  });

  it("runs a roadmap over HTTP", async () => {
    const id = await createGoal("Write a novel");

    const started = await post(`/api/goals/${id}/roadmap`);
    expect(started.status).toBe(201);
    expect(await started.json()).toMatchObject({ title: "Step 1", step_status: "current" });

    const advanced = await post(`/api/goals/${id}/roadmap/advance`);
    expect(advanced.status).toBe(200);
    expect(await advanced.json()).toMatchObject({
      completed_step: { title: "Step 1" },
      new_step: { title: "Step 2" },
      goal_completed: false,
      progress: 0.5,
    });
  });

  it("links dependencies from the dependent goal", async () => {
    const first = await createGoal("Buy shoes");
    const second = await createGoal("Run a half marathon");

    const res = await post(`/api/goals/${second}/dependencies`, { prerequisite_id: first });
    expect(res.status).toBe(201);
    const edge = (await res.json()) as { id: string; prerequisite_id: string; dependent_id: string };
    expect(edge).toMatchObject({ prerequisite_id: first, dependent_id: second, kind: "finish_to_start" });

    const cycle = await post(`/api/goals/${first}/dependencies`, { prerequisite_id: second });
    expect(cycle.status).toBe(409);

    const removed = await app.request(`http://localhost/api/dependencies/${edge.id}`, { method: "DELETE" });
    expect(await removed.json()).toEqual({ ok: true });
  });

  it("prunes snapshots on demand", async () => {
    const res = await post("/api/maintenance/prune");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ removed: 0, goals: 0 });
  });
});
