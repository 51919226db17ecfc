import {
  getDb,
  initializeSchema,
  getReasoningService,
  getCalendarService,
  GoalEngine,
} from "@waypoint/core";

export function openEngine(): GoalEngine {
  const db = getDb();
  initializeSchema(db);
  return GoalEngine.open(db, {
    reasoning: getReasoningService(db),
    calendar: getCalendarService(db),
  });
}

export function formatPercent(progress: number): string {
  return `${Math.round(progress * 100)}%`;
}

export function fail(prefix: string, err: unknown): never {
  console.error(`${prefix}: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
