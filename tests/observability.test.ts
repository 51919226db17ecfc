import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  getCounter,
  getCounters,
  getDbForTesting,
  incrementCounter,
  initializeSchema,
  setSetting,
} from "@waypoint/core";
import type { DatabaseConnection } from "@waypoint/core";

let db: DatabaseConnection;

beforeEach(() => {
  db = getDbForTesting();
  initializeSchema(db);
});

afterEach(() => {
  vi.restoreAllMocks();
  db.close();
});

describe("observability counters", () => {
  it("accumulates deltas per key", () => {
    incrementCounter(db, "goals.created");
    incrementCounter(db, "goals.created", 2);
    incrementCounter(db, "steps.completed", 0);

    expect(getCounter(db, "goals.created")).toBe(3);
    expect(getCounter(db, "steps.completed")).toBe(0);
  });

  it("lists counters by prefix", () => {
    incrementCounter(db, "goals.locked");
    incrementCounter(db, "goals.activated");
    incrementCounter(db, "steps.completed");

    expect(getCounters(db, "goals").map((row) => [row.key, row.value])).toEqual([
      ["goals.activated", 1],
      ["goals.locked", 1],
    ]);
    expect(getCounters(db)).toHaveLength(3);
  });

  it("echoes increments when event logging is on", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    incrementCounter(db, "goals.created");
    expect(log).not.toHaveBeenCalled();

    setSetting(db, "observability.log_events", "true");
    incrementCounter(db, "goals.created", 2);

    expect(log).toHaveBeenCalledWith("[observability] goals.created += 2");
  });
});
