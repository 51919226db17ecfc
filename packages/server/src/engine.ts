import {
  getDb,
  initializeSchema,
  getReasoningService,
  getCalendarService,
  GoalEngine,
} from "@waypoint/core";
import type { DatabaseConnection } from "@waypoint/core";

let engine: GoalEngine | null = null;
let engineDb: DatabaseConnection | null = null;

/**
 * Engine for the current database. Reopened when the connection changes,
 * which happens when `closeDb()` is called or the db path is switched.
 */
export function getEngine(): GoalEngine {
  const db = getDb();
  if (engine && engineDb === db) return engine;

  initializeSchema(db);
  engine = GoalEngine.open(db, {
    reasoning: getReasoningService(db),
    calendar: getCalendarService(db),
  });
  engineDb = db;
  return engine;
}

export function resetEngine(): void {
  engine = null;
  engineDb = null;
}

/**
 * Re-read settings into the open engine. Writes already queued on it finish
 * first; the graph is kept, so there is never a second writer.
 */
export async function reloadEngine(): Promise<void> {
  const db = getDb();
  if (!engine || engineDb !== db) return;
  await engine.reconfigure({
    reasoning: getReasoningService(db),
    calendar: getCalendarService(db),
    ...GoalEngine.settingsFrom(db),
  });
}
