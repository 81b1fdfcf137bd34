import { google, type calendar_v3 } from 'googleapis';
import { z } from 'zod';
import { FetchError, describeError } from './errors.js';
import { Mutex } from './lock.js';
import type { CalendarEvent, EventStart } from './types.js';

export const CALENDAR_SCOPES = ['https://www.googleapis.com/auth/calendar.readonly'];

export type TimeWindow = {
  timeMin: Date;
  timeMax: Date;
  limit?: number;
};

export type FetchResult = { ok: true; events: CalendarEvent[] } | { ok: false; error: FetchError };

export interface TimeWindowCalendarClient {
  /** Events in `[timeMin, timeMax)`, ascending by start, recurring series expanded. Never rejects. */
  fetch(sourceId: string, window: TimeWindow): Promise<FetchResult>;
}

/** The slice of `calendar_v3.Resource$Events` this module calls. */
export interface EventsListApi {
  list(params: calendar_v3.Params$Resource$Events$List): Promise<{ data: calendar_v3.Schema$Events }>;
}

const eventDateTimeSchema = z.object({
  dateTime: z.string().nullish(),
  date: z.string().nullish(),
});

const rawEventSchema = z.object({
  id: z.string().min(1),
  summary: z.string().nullish(),
  description: z.string().nullish(),
  location: z.string().nullish(),
  htmlLink: z.string().nullish(),
  start: eventDateTimeSchema,
  end: eventDateTimeSchema.nullish(),
});

type RawEventTime = z.infer<typeof eventDateTimeSchema>;

function parseStart(raw: RawEventTime | null | undefined): EventStart | null {
  if (!raw) return null;
  if (raw.dateTime) {
    const at = new Date(raw.dateTime);
    return Number.isNaN(at.getTime()) ? null : { kind: 'instant', at };
  }
  if (raw.date && /^\d{4}-\d{2}-\d{2}$/.test(raw.date)) {
    return { kind: 'date', date: raw.date };
  }
  return null;
}

/** Maps a Google Calendar item to a {@link CalendarEvent}, or null when it lacks an id or usable start. */
export function toCalendarEvent(item: calendar_v3.Schema$Event): CalendarEvent | null {
  const parsed = rawEventSchema.safeParse(item);
  if (!parsed.success) return null;
  const raw = parsed.data;
  const start = parseStart(raw.start);
  if (!start) return null;
  return {
    id: raw.id,
    title: raw.summary || 'No Title',
    start,
    end: parseStart(raw.end),
    location: raw.location ?? null,
    description: raw.description ?? null,
    link: raw.htmlLink ?? null,
  };
}

/**
 * Resolves the Google auth client once and shares it between engines. The
 * resolution runs under a mutex so concurrent first ticks do not each build
 * and refresh their own credentials.
 */
export class SharedCalendarAuth {
  private readonly lock = new Mutex();
  private api: EventsListApi | null = null;

  constructor(private readonly keyFile: string) {}

  events(): Promise<EventsListApi> {
    return this.lock.run(async () => {
      if (this.api) return this.api;
      const auth = new google.auth.GoogleAuth({ keyFile: this.keyFile, scopes: CALENDAR_SCOPES });
      // warms GoogleAuth's cached client; later calls reuse it
      await auth.getClient();
      const calendar = google.calendar({ version: 'v3', auth });
      const api: EventsListApi = { list: params => calendar.events.list(params) };
      this.api = api;
      return api;
    });
  }
}

export class GoogleCalendarClient implements TimeWindowCalendarClient {
  constructor(private readonly resolveApi: () => Promise<EventsListApi>) {}

  async fetch(sourceId: string, window: TimeWindow): Promise<FetchResult> {
    try {
      const api = await this.resolveApi();
      const res = await api.list({
        calendarId: sourceId,
        timeMin: window.timeMin.toISOString(),
        timeMax: window.timeMax.toISOString(),
        singleEvents: true,
        orderBy: 'startTime',
        maxResults: window.limit,
      });
      const events: CalendarEvent[] = [];
      for (const item of res.data.items ?? []) {
        const event = toCalendarEvent(item);
        if (event) events.push(event);
        else console.warn('[calendar] Skipping malformed event', { sourceId, id: item.id ?? null });
      }
      return { ok: true, events };
    } catch (err) {
      const error = new FetchError(sourceId, { cause: err });
      console.error('[calendar] Calendar API error', { sourceId, err: describeError(err) });
      return { ok: false, error };
    }
  }
}
