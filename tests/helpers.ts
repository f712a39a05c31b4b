import {
  CalendarAccount,
  CalendarClient,
  CalendarEvent,
  Clock,
  EventSpec,
  Notifier,
  NotFoundExternalError,
  SendResult,
  isTaskLike,
} from '../src';

/** In-process calendar keyed by event id. Writes stamp `updated_at` from the clock. */
export class FakeCalendarClient implements CalendarClient {
  events = new Map<string, CalendarEvent>();
  fetchErrors = new Map<string, Error>();
  updates: Array<{ eventId: string; spec: Partial<EventSpec> }> = [];
  private seq = 0;

  constructor(private clock: Clock) {}

  add(event: Partial<CalendarEvent> & { id: string; title: string; start: Date }): CalendarEvent {
    const full: CalendarEvent = {
      end: new Date(event.start.getTime() + 60 * 60 * 1000),
      updated_at: this.clock.now(),
      status: 'confirmed',
      transparency: 'opaque',
      ...event,
    };
    this.events.set(full.id, full);
    return full;
  }

  async fetchEvents(
    account: CalendarAccount,
    rangeStart: Date,
    rangeEnd: Date,
    includeAll: boolean
  ): Promise<CalendarEvent[]> {
    const err = this.fetchErrors.get(account.owner_id);
    if (err) throw err;
    return [...this.events.values()].filter(
      (e) =>
        e.end.getTime() >= rangeStart.getTime() &&
        e.start.getTime() <= rangeEnd.getTime() &&
        (includeAll || isTaskLike(account, e))
    );
  }

  async createEvent(_account: CalendarAccount, spec: EventSpec): Promise<CalendarEvent> {
    this.seq++;
    return this.add({ id: `evt-new-${this.seq}`, ...spec });
  }

  async updateEvent(
    _account: CalendarAccount,
    eventId: string,
    spec: Partial<EventSpec>
  ): Promise<CalendarEvent> {
    const existing = this.events.get(eventId);
    if (!existing) throw new NotFoundExternalError(`Event ${eventId} not found`);
    this.updates.push({ eventId, spec });
    const updated: CalendarEvent = { ...existing, ...spec, updated_at: this.clock.now() };
    this.events.set(eventId, updated);
    return updated;
  }

  async deleteEvent(_account: CalendarAccount, eventId: string): Promise<void> {
    if (!this.events.delete(eventId)) throw new NotFoundExternalError(`Event ${eventId} not found`);
  }
}

/** Records every message; answers from a queue of results, then succeeds. */
export class FakeNotifier implements Notifier {
  sent: Array<{ recipientId: string; text: string }> = [];
  results: SendResult[] = [];

  async send(recipientId: string, text: string): Promise<SendResult> {
    this.sent.push({ recipientId, text });
    return this.results.shift() ?? { success: true, messageId: `msg-${this.sent.length}` };
  }
}

export const noSleep = async (): Promise<void> => undefined;

export function at(iso: string): Date {
  return new Date(iso);
}
