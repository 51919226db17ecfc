import { Hono } from "hono";
import { z } from "zod";
import {
  getDb,
  getAllSettings,
  setSetting,
  isSecretSetting,
  resetReasoningService,
} from "@waypoint/core";
import { reloadEngine } from "../engine.js";

const settingsPatchSchema = z.record(z.string(), z.string());

const MASK = "••••";

export function maskSecretValue(value: string): string {
  if (value.length === 0) return value;
  if (value.length <= 4) return MASK;
  return `${value.slice(0, 2)}${MASK}${value.slice(-2)}`;
}

function maskSecretSettings(settings: Record<string, string>): Record<string, string> {
  for (const key of Object.keys(settings)) {
    if (isSecretSetting(key)) {
      settings[key] = maskSecretValue(settings[key] ?? "");
    }
  }
  return settings;
}

const settings = new Hono();

// GET /api/settings
settings.get("/api/settings", (c) => {
  const db = getDb();
  return c.json(maskSecretSettings(getAllSettings(db)));
});

// PATCH /api/settings
settings.patch("/api/settings", async (c) => {
  const body: unknown = await c.req.json();
  const parsed = settingsPatchSchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: parsed.error.flatten() }, 400);
  }
  const db = getDb();
  let changed = false;
  for (const [key, value] of Object.entries(parsed.data)) {
    // Masked values come back from GET; never write them over the real secret
    if (value.includes(MASK)) continue;
    setSetting(db, key, value);
    changed = true;
  }
  if (changed) {
    // The AI provider is built from settings; limits and retention live on the engine
    resetReasoningService();
    await reloadEngine();
  }
  return c.json(maskSecretSettings(getAllSettings(db)));
});

export default settings;
