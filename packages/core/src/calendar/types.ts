export interface CalendarEventInput {
  title: string;
  start: Date;
  durationMinutes: number;
  notes: string | null;
}

/** Calendar backend that receives the focus sessions of an activated goal. */
export interface CalendarService {
  /** Returns the backend's identifier for the created event. */
  createEvent(input: CalendarEventInput): Promise<string>;
  cancelEvent(eventId: string): Promise<void>;
}
