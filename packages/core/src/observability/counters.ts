import type { DatabaseConnection } from "../db/connection.js";
import { getSetting } from "../db/schema.js";

/** Every counter the goal engine records, grouped by area before the dot. */
export const COUNTER_KEYS = [
  "goals.created",
  "goals.deleted",
  "goals.locked",
  "goals.unlocked",
  "goals.regenerated",
  "goals.activated",
  "goals.activation_partial",
  "goals.deactivated",
  "goals.completed",
  "goals.archived",
  "lifecycle.lock_rationale_fallback",
  "calendar.cancel_failures",
  "breakdown.applied",
  "breakdown.dependencies_dropped",
  "steps.completed",
  "steps.duplicate_skipped",
  "steps.limit_rejections",
  "timeline.enrichment_failures",
  "snapshots.pruned",
] as const;

export type CounterKey = (typeof COUNTER_KEYS)[number];

type AreaOf<K extends string> = K extends `${infer Area}.${string}` ? Area : never;
export type CounterArea = AreaOf<CounterKey>;

export type CounterSink = (key: CounterKey, delta?: number) => void;

export interface CounterRow {
  key: string;
  value: number;
  updated_at: string;
}

export function incrementCounter(
  db: DatabaseConnection,
  key: CounterKey,
  delta = 1
): void {
  if (!Number.isFinite(delta) || delta === 0) return;
  const now = new Date().toISOString().replace("T", " ").replace("Z", "");
  db
    .prepare<[string, number, string]>(
      `INSERT INTO observability_counters (key, value, updated_at)
       VALUES (?, ?, ?)
       ON CONFLICT(key) DO UPDATE
       SET value = observability_counters.value + excluded.value,
           updated_at = excluded.updated_at`
    )
    .run(key, Math.trunc(delta), now);

  if (getSetting(db, "observability.log_events") === "true") {
    console.log(`[observability] ${key} += ${Math.trunc(delta)}`);
  }
}

export function getCounter(db: DatabaseConnection, key: CounterKey): number {
  const row = db
    .prepare<[string], { value: number }>("SELECT value FROM observability_counters WHERE key = ?")
    .get(key);
  return row?.value ?? 0;
}

/** All recorded counters, or those of one area such as `goals` or `steps`. */
export function getCounters(db: DatabaseConnection, area?: CounterArea): CounterRow[] {
  if (area) {
    return db
      .prepare<[string], CounterRow>(
        "SELECT key, value, updated_at FROM observability_counters WHERE key LIKE ? ORDER BY key ASC"
      )
      .all(`${area}.%`);
  }
  return db
    .prepare<[], CounterRow>(
      "SELECT key, value, updated_at FROM observability_counters ORDER BY key ASC"
    )
    .all();
}
