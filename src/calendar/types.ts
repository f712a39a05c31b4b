import { CalendarAccount } from '../types';

export type EventStatus = 'confirmed' | 'tentative' | 'cancelled';
export type EventTransparency = 'opaque' | 'transparent';

export interface CalendarEvent {
  id: string;
  title: string;
  start: Date;
  end: Date;
  /** Last modification on the calendar side; null when the provider does not report one. */
  updated_at: Date | null;
  status: EventStatus;
  transparency: EventTransparency;
  color_id?: string;
}

export interface EventSpec {
  title: string;
  start: Date;
  end: Date;
  color_id?: string;
}

/**
 * External calendar. Every method is safe to repeat and fails with
 * NotFoundExternalError, TransientExternalError or PermanentExternalError.
 */
export interface CalendarClient {
  /** Events overlapping `[rangeStart, rangeEnd]`; only task-like ones unless `includeAll`. */
  fetchEvents(
    account: CalendarAccount,
    rangeStart: Date,
    rangeEnd: Date,
    includeAll: boolean
  ): Promise<CalendarEvent[]>;
  createEvent(account: CalendarAccount, spec: EventSpec): Promise<CalendarEvent>;
  updateEvent(account: CalendarAccount, eventId: string, spec: Partial<EventSpec>): Promise<CalendarEvent>;
  deleteEvent(account: CalendarAccount, eventId: string): Promise<void>;
}

export interface SyncResult {
  created: number;
  updated: number;
  deleted: number;
}

/** Outcome of one account's pass. `failed` is set when the pass stopped early; counts are what it got done. */
export interface AccountSyncResult extends SyncResult {
  failed?: boolean;
  error?: string;
}
