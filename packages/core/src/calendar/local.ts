import { ulid } from "ulid";
import type { DatabaseConnection } from "../db/connection.js";
import { ExternalServiceFailure } from "../goals/errors.js";
import type { CalendarEventInput, CalendarService } from "./types.js";

export interface CalendarEvent {
  id: string;
  title: string;
  start_at: string;
  duration_minutes: number;
  notes: string | null;
  status: "scheduled" | "cancelled";
  created_at: string;
  cancelled_at: string | null;
}

interface CalendarEventRow extends Omit<CalendarEvent, "status"> {
  status: string;
}

function rowToEvent(row: CalendarEventRow): CalendarEvent {
  return { ...row, status: row.status === "cancelled" ? "cancelled" : "scheduled" };
}

/** Calendar kept in the local database, for setups without an external calendar. */
export class LocalCalendarService implements CalendarService {
  constructor(private db: DatabaseConnection) {}

  async createEvent(input: CalendarEventInput): Promise<string> {
    if (Number.isNaN(input.start.getTime())) {
      throw new ExternalServiceFailure("calendar", "Event start is not a valid date", false);
    }
    if (!Number.isInteger(input.durationMinutes) || input.durationMinutes <= 0) {
      throw new ExternalServiceFailure("calendar", "Event duration must be a positive number of minutes", false);
    }
    const id = ulid();
    this.db
      .prepare<[string, string, string, number, string | null]>(
        "INSERT INTO calendar_events (id, title, start_at, duration_minutes, notes) VALUES (?, ?, ?, ?, ?)"
      )
      .run(id, input.title, input.start.toISOString(), input.durationMinutes, input.notes);
    return id;
  }

  async cancelEvent(eventId: string): Promise<void> {
    const result = this.db
      .prepare<[string, string]>(
        "UPDATE calendar_events SET status = 'cancelled', cancelled_at = ? WHERE id = ? AND status = 'scheduled'"
      )
      .run(new Date().toISOString(), eventId);
    if (result.changes === 0 && !this.getEvent(eventId)) {
      throw new ExternalServiceFailure("calendar", `Event ${eventId} not found`, false);
    }
  }

  getEvent(eventId: string): CalendarEvent | null {
    const row = this.db
      .prepare<[string], CalendarEventRow>("SELECT * FROM calendar_events WHERE id = ?")
      .get(eventId);
    return row ? rowToEvent(row) : null;
  }

  listEvents(range?: { from: Date; to: Date }): CalendarEvent[] {
    if (range) {
      return this.db
        .prepare<[string, string], CalendarEventRow>(
          "SELECT * FROM calendar_events WHERE start_at >= ? AND start_at <= ? ORDER BY start_at ASC"
        )
        .all(range.from.toISOString(), range.to.toISOString())
        .map(rowToEvent);
    }
    return this.db
      .prepare<[], CalendarEventRow>("SELECT * FROM calendar_events ORDER BY start_at ASC")
      .all()
      .map(rowToEvent);
  }
}
