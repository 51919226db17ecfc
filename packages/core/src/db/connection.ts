import Database from "better-sqlite3";
import os from "node:os";
import path from "node:path";
import fs from "node:fs";

export type DatabaseConnection = Database.Database;

/** Open connections keyed by absolute file path. */
const dbByPath = new Map<string, DatabaseConnection>();

const DEFAULT_DATA_DIR = path.join(os.homedir(), ".waypoint");
const DEFAULT_DB_PATH = path.join(DEFAULT_DATA_DIR, "waypoint.db");

/** Explicit path, then WAYPOINT_DB_PATH, then ~/.waypoint/waypoint.db; always absolute. */
export function resolveDbPath(dbPath?: string): string {
  return path.resolve(dbPath ?? process.env.WAYPOINT_DB_PATH ?? DEFAULT_DB_PATH);
}

// The CLI and a running server may share one file.
function configure(db: DatabaseConnection, file: boolean): DatabaseConnection {
  if (file) db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");
  return db;
}

/**
 * Shared connection for a database file. A connection closed directly with
 * `db.close()` rather than `closeDb()` is replaced by a fresh one.
 */
export function getDb(dbPath?: string): DatabaseConnection {
  const resolvedPath = resolveDbPath(dbPath);
  const existing = dbByPath.get(resolvedPath);
  if (existing?.open) return existing;

  fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });

  const db = configure(new Database(resolvedPath), true);
  dbByPath.set(resolvedPath, db);
  return db;
}

export function closeDb(dbPath?: string): void {
  const targets = dbPath ? [resolveDbPath(dbPath)] : [...dbByPath.keys()];
  for (const key of targets) {
    const db = dbByPath.get(key);
    if (db?.open) db.close();
    dbByPath.delete(key);
  }
}

export function getDbForTesting(): DatabaseConnection {
  return configure(new Database(":memory:"), false);
}
