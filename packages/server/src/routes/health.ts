import { Hono } from "hono";
import { getDb } from "@waypoint/core";

const health = new Hono();

health.get("/api/health", (c) => {
  try {
    const db = getDb();
    const result = db.prepare<[], { ok: number }>("SELECT 1 as ok").get();
    return c.json({
      status: "ok",
      db: result?.ok === 1 ? "connected" : "error",
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  } catch (err) {
    console.error("[health] Database check failed:", err);
    return c.json({ status: "error", db: "disconnected" }, 503);
  }
});

export default health;
