import type { DatabaseConnection } from "./connection.js";

const SCHEMA_VERSION = 1;

const CREATE_TABLES = `
  CREATE TABLE IF NOT EXISTS goals (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    body TEXT NOT NULL DEFAULT '',
    category TEXT NOT NULL DEFAULT 'General',
    priority TEXT NOT NULL DEFAULT 'next'
      CHECK(priority IN ('now', 'next', 'later')),
    progress REAL NOT NULL DEFAULT 0
      CHECK(progress >= 0 AND progress <= 1),
    kind TEXT NOT NULL DEFAULT 'campaign'
      CHECK(kind IN ('event', 'campaign', 'hybrid')),
    parent_id TEXT,
    roadmap_id TEXT,
    sort_index INTEGER NOT NULL DEFAULT 0,
    state TEXT NOT NULL DEFAULT 'draft'
      CHECK(state IN ('draft', 'active', 'completed', 'archived')),
    is_locked INTEGER NOT NULL DEFAULT 0,
    locked_snapshot TEXT,
    activated_at TEXT,
    completed_at TEXT,
    has_been_broken_down INTEGER NOT NULL DEFAULT 0,
    is_atomic INTEGER NOT NULL DEFAULT 0,
    has_sequential_steps INTEGER NOT NULL DEFAULT 0,
    step_status TEXT
      CHECK(step_status IS NULL OR step_status IN ('pending', 'current', 'completed', 'unknown')),
    is_final_step INTEGER NOT NULL DEFAULT 0,
    roadmap_sections TEXT NOT NULL DEFAULT '[]',
    target_date TEXT,
    emoji TEXT,
    target_metric TEXT,
    projections TEXT NOT NULL DEFAULT '[]',
    phases TEXT NOT NULL DEFAULT '[]',
    scheduled_events TEXT NOT NULL DEFAULT '[]',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS goal_dependencies (
    id TEXT PRIMARY KEY,
    prerequisite_id TEXT NOT NULL REFERENCES goals(id) ON DELETE CASCADE,
    dependent_id TEXT NOT NULL REFERENCES goals(id) ON DELETE CASCADE,
    kind TEXT NOT NULL DEFAULT 'finish_to_start'
      CHECK(kind IN ('finish_to_start', 'start_to_start', 'finish_to_finish')),
    note TEXT,
    created_at TEXT NOT NULL,
    UNIQUE (prerequisite_id, dependent_id)
  );

  CREATE TABLE IF NOT EXISTS goal_revisions (
    id TEXT PRIMARY KEY,
    goal_id TEXT NOT NULL REFERENCES goals(id) ON DELETE CASCADE,
    summary TEXT NOT NULL,
    rationale TEXT,
    before_content TEXT,
    after_content TEXT,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS goal_snapshots (
    id TEXT PRIMARY KEY,
    goal_id TEXT NOT NULL REFERENCES goals(id) ON DELETE CASCADE,
    title TEXT NOT NULL,
    body TEXT NOT NULL,
    progress REAL NOT NULL,
    rationale TEXT NOT NULL,
    captured_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS calendar_events (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    start_at TEXT NOT NULL,
    duration_minutes INTEGER NOT NULL,
    notes TEXT,
    status TEXT NOT NULL DEFAULT 'scheduled'
      CHECK(status IN ('scheduled', 'cancelled')),
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    cancelled_at TEXT
  );

  CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS observability_counters (
    key TEXT PRIMARY KEY,
    value INTEGER NOT NULL DEFAULT 0,
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE INDEX IF NOT EXISTS idx_goals_parent ON goals(parent_id);
  CREATE INDEX IF NOT EXISTS idx_goals_roadmap ON goals(roadmap_id);
  CREATE INDEX IF NOT EXISTS idx_goals_state ON goals(state);
  CREATE INDEX IF NOT EXISTS idx_goal_dependencies_dependent ON goal_dependencies(dependent_id);
  CREATE INDEX IF NOT EXISTS idx_goal_revisions_goal ON goal_revisions(goal_id, created_at);
  CREATE INDEX IF NOT EXISTS idx_goal_snapshots_goal ON goal_snapshots(goal_id, captured_at);
  CREATE INDEX IF NOT EXISTS idx_calendar_events_start ON calendar_events(start_at);
`;

const DEFAULT_SETTINGS: Record<string, string> = {
  "ai.provider": "anthropic",
  "ai.api_key": "",
  "ai.model": "",
  "ai.timeout_ms": "30000",
  "steps.hard_limit": "15",
  "steps.soft_warning": "12",
  "snapshots.max_per_goal": "10",
  "snapshots.prune_schedule": "30 3 * * *",
  "observability.log_events": "false",
};

const SECRET_SETTING = /(api[_-]?key|token|secret|password)/i;

/** Settings whose values are never returned in full over the API. */
export function isSecretSetting(key: string): boolean {
  return SECRET_SETTING.test(key);
}

const initializedDbs = new WeakSet<DatabaseConnection>();

export function initializeSchema(db: DatabaseConnection): void {
  if (initializedDbs.has(db)) return;

  db.exec(CREATE_TABLES);

  const upsertSetting = db.prepare<[string, string]>(
    "INSERT OR IGNORE INTO settings (key, value) VALUES (?, ?)"
  );
  const seed = db.transaction(() => {
    for (const [key, value] of Object.entries(DEFAULT_SETTINGS)) {
      upsertSetting.run(key, value);
    }
    upsertSetting.run("schema_version", String(SCHEMA_VERSION));
  });
  seed();

  initializedDbs.add(db);
}

export function getSetting(db: DatabaseConnection, key: string): string | undefined {
  const row = db
    .prepare<[string], { value: string }>("SELECT value FROM settings WHERE key = ?")
    .get(key);
  return row?.value;
}

/** Numeric setting, or `fallback` when unset or not a positive integer. */
export function getIntSetting(db: DatabaseConnection, key: string, fallback: number): number {
  const raw = getSetting(db, key);
  if (raw === undefined) return fallback;
  const value = Number.parseInt(raw, 10);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

export function setSetting(db: DatabaseConnection, key: string, value: string): void {
  db.prepare<[string, string]>(
    "INSERT INTO settings (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value"
  ).run(key, value);
}

export function getAllSettings(db: DatabaseConnection): Record<string, string> {
  const rows = db
    .prepare<[], { key: string; value: string }>("SELECT key, value FROM settings")
    .all();
  const settings: Record<string, string> = {};
  for (const row of rows) {
    settings[row.key] = row.value;
  }
  return settings;
}
