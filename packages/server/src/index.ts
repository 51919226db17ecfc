import { Hono } from "hono";
import { cors } from "hono/cors";
import { serve } from "@hono/node-server";
import { getDb, initializeSchema } from "@waypoint/core";
import { errorHandler } from "./middleware/error.js";
import goalsRoutes from "./routes/goals.js";
import settingsRoutes from "./routes/settings.js";
import healthRoutes from "./routes/health.js";
import { startScheduler } from "./scheduler.js";

export { getEngine, resetEngine, reloadEngine } from "./engine.js";
export { startScheduler, runPruneNow } from "./scheduler.js";

const DEFAULT_PORT = 3280;

function getAllowedCorsOrigins(): string[] {
  const raw = process.env.WAYPOINT_CORS_ORIGINS;
  if (!raw) return [];
  return raw
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

export function createApp(): Hono {
  const app = new Hono();

  const allowedCorsOrigins = getAllowedCorsOrigins();
  if (allowedCorsOrigins.length > 0) {
    const allowSet = new Set(allowedCorsOrigins);
    app.use(
      "*",
      cors({
        origin: (origin) => {
          if (!origin) return undefined;
          return allowSet.has(origin) ? origin : undefined;
        },
        allowMethods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
        allowHeaders: ["Content-Type", "Authorization"],
      })
    );
  }
  app.use("*", errorHandler);

  app.route("/", healthRoutes);
  app.route("/", goalsRoutes);
  app.route("/", settingsRoutes);

  return app;
}

function portFromEnv(): number {
  const parsed = Number.parseInt(process.env.WAYPOINT_PORT ?? "", 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_PORT;
}

export function startServer(
  port = portFromEnv(),
  host = process.env.WAYPOINT_HOST ?? "127.0.0.1"
): void {
  const db = getDb();
  initializeSchema(db);

  const app = createApp();

  startScheduler();

  console.log(`Waypoint server starting on http://${host}:${port}`);

  serve({
    fetch: app.fetch,
    port,
    hostname: host,
  }, (info) => {
    console.log(`Waypoint server listening on http://${host}:${info.port}`);
  });
}
