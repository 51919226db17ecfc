import type { DatabaseConnection } from "../db/connection.js";
import { LocalCalendarService } from "./local.js";
import type { CalendarService } from "./types.js";

let service: CalendarService | null = null;
/** Connection the default calendar was built on; null for one set explicitly. */
let serviceDb: DatabaseConnection | null = null;

/**
 * Process-wide calendar. Defaults to the calendar kept in the local database,
 * rebuilt when a different connection asks for it.
 */
export function getCalendarService(db: DatabaseConnection): CalendarService {
  if (service && (serviceDb === null || serviceDb === db)) return service;
  service = new LocalCalendarService(db);
  serviceDb = db;
  return service;
}

export function setCalendarService(s: CalendarService): void {
  service = s;
  serviceDb = null;
}

export function resetCalendarService(): void {
  service = null;
  serviceDb = null;
}
