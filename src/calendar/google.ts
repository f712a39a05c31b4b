import { z } from 'zod';
import { DateTime } from 'luxon';
import { CalendarAccount } from '../types';
import { FetchLike, JsonRequestOptions, request, requestJson } from '../http';
import { RetryPolicy, Sleep, withRetry } from '../retry';
import { CalendarClient, CalendarEvent, EventSpec, EventStatus, EventTransparency } from './types';
import { isTaskLike } from './classify';

export interface GoogleCalendarClientOptions {
  /** Returns a valid OAuth access token; obtaining and refreshing it happens elsewhere. */
  getAccessToken: () => Promise<string>;
  /** Zone used for all-day events and for event times sent to the API (default: UTC). */
  zone?: string;
  /** Duration of an event whose end is missing (default: 60). */
  defaultDurationMinutes?: number;
  retry?: Partial<RetryPolicy>;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
  /** Inject sleep for tests */
  sleep?: Sleep;
  baseUrl?: string;
}

const EventTimeSchema = z.object({
  dateTime: z.string().optional(),
  date: z.string().optional(),
  timeZone: z.string().optional(),
});

const GoogleEventSchema = z.object({
  id: z.string(),
  summary: z.string().optional(),
  start: EventTimeSchema.optional(),
  end: EventTimeSchema.optional(),
  colorId: z.string().optional(),
  updated: z.string().optional(),
  status: z.string().optional(),
  transparency: z.string().optional(),
});

const GoogleEventListSchema = z.object({
  items: z.array(GoogleEventSchema).optional(),
  nextPageToken: z.string().optional(),
});

type GoogleEvent = z.infer<typeof GoogleEventSchema>;
type GoogleEventTime = z.infer<typeof EventTimeSchema>;

const DEFAULT_BASE_URL = 'https://www.googleapis.com/calendar/v3';
const PAGE_SIZE = 250;

function parseStatus(value: string | undefined): EventStatus {
  return value === 'cancelled' || value === 'tentative' ? value : 'confirmed';
}

function parseTransparency(value: string | undefined): EventTransparency {
  return value === 'transparent' ? 'transparent' : 'opaque';
}

export class GoogleCalendarClient implements CalendarClient {
  private fetcher: FetchLike;
  private zone: string;
  private baseUrl: string;
  private defaultDurationMinutes: number;

  constructor(private opts: GoogleCalendarClientOptions) {
    this.fetcher = opts.fetcher ?? fetch;
    this.zone = opts.zone ?? 'UTC';
    this.baseUrl = opts.baseUrl ?? DEFAULT_BASE_URL;
    this.defaultDurationMinutes = opts.defaultDurationMinutes ?? 60;
  }

  async fetchEvents(
    account: CalendarAccount,
    rangeStart: Date,
    rangeEnd: Date,
    includeAll: boolean
  ): Promise<CalendarEvent[]> {
    const out: CalendarEvent[] = [];
    let pageToken: string | undefined;

    do {
      const page = await this.call('list events', (headers) =>
        requestJson(
          this.eventsUrl(account),
          GoogleEventListSchema,
          {
            headers,
            query: {
              timeMin: rangeStart.toISOString(),
              timeMax: rangeEnd.toISOString(),
              singleEvents: true,
              orderBy: 'startTime',
              maxResults: PAGE_SIZE,
              pageToken,
            },
          },
          this.fetcher
        )
      );

      for (const raw of page.items ?? []) {
        const event = this.toCalendarEvent(raw);
        if (event && (includeAll || isTaskLike(account, event))) {
          out.push(event);
        }
      }
      pageToken = page.nextPageToken;
    } while (pageToken);

    return out;
  }

  async createEvent(account: CalendarAccount, spec: EventSpec): Promise<CalendarEvent> {
    return this.writeEvent('create event', this.eventsUrl(account), {
      method: 'POST',
      body: this.toPayload(spec),
    });
  }

  async updateEvent(
    account: CalendarAccount,
    eventId: string,
    spec: Partial<EventSpec>
  ): Promise<CalendarEvent> {
    return this.writeEvent('update event', this.eventUrl(account, eventId), {
      method: 'PATCH',
      body: this.toPayload(spec),
    });
  }

  async deleteEvent(account: CalendarAccount, eventId: string): Promise<void> {
    await this.call('delete event', (headers) =>
      request(this.eventUrl(account, eventId), { method: 'DELETE', headers }, this.fetcher)
    );
  }

  // ===== HELPERS =====

  private async call<T>(label: string, fn: (headers: Record<string, string>) => Promise<T>): Promise<T> {
    return withRetry(
      async () => {
        const token = await this.opts.getAccessToken();
        return fn({ authorization: `Bearer ${token}` });
      },
      { ...this.opts.retry, label: `google calendar ${label}`, sleep: this.opts.sleep }
    );
  }

  private async writeEvent(label: string, url: string, init: JsonRequestOptions): Promise<CalendarEvent> {
    const raw = await this.call(label, (headers) =>
      requestJson(url, GoogleEventSchema, { ...init, headers }, this.fetcher)
    );
    const event = this.toCalendarEvent(raw);
    if (!event) {
      throw new Error(`Google returned event ${raw.id} without a start time`);
    }
    return event;
  }

  private eventsUrl(account: CalendarAccount): string {
    return `${this.baseUrl}/calendars/${encodeURIComponent(account.calendar_id)}/events`;
  }

  private eventUrl(account: CalendarAccount, eventId: string): string {
    return `${this.eventsUrl(account)}/${encodeURIComponent(eventId)}`;
  }

  private toPayload(spec: Partial<EventSpec>): Record<string, unknown> {
    const payload: Record<string, unknown> = {};
    if (spec.title !== undefined) payload.summary = spec.title;
    if (spec.start) payload.start = { dateTime: spec.start.toISOString(), timeZone: this.zone };
    if (spec.end) payload.end = { dateTime: spec.end.toISOString(), timeZone: this.zone };
    if (spec.color_id !== undefined) payload.colorId = spec.color_id;
    return payload;
  }

  private parseTime(time: GoogleEventTime | undefined): Date | null {
    if (time?.dateTime) {
      const dt = DateTime.fromISO(time.dateTime, { setZone: true });
      return dt.isValid ? dt.toJSDate() : null;
    }
    if (time?.date) {
      // all-day
      const dt = DateTime.fromISO(time.date, { zone: this.zone });
      return dt.isValid ? dt.toJSDate() : null;
    }
    return null;
  }

  private toCalendarEvent(raw: GoogleEvent): CalendarEvent | null {
    const start = this.parseTime(raw.start);
    if (!start) {
      return null;
    }
    const end =
      this.parseTime(raw.end) ?? new Date(start.getTime() + this.defaultDurationMinutes * 60_000);
    const updated = raw.updated ? DateTime.fromISO(raw.updated) : null;

    return {
      id: raw.id,
      title: raw.summary ?? '(No title)',
      start,
      end,
      updated_at: updated && updated.isValid ? updated.toJSDate() : null,
      status: parseStatus(raw.status),
      transparency: parseTransparency(raw.transparency),
      color_id: raw.colorId,
    };
  }
}
