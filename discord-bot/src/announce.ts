import type { TimeWindowCalendarClient } from './calendar.js';
import { ConfigurationError } from './errors.js';
import { endInstant, formatStart, renderAnnouncement, type TextLabels } from './format.js';
import { warnOnce } from './log.js';
import type { ChannelFanout, DeliveryOutcome } from './notify.js';
import type { AnnouncedEventStore } from './store.js';
import { TranslationCache, type Translator } from './translate.js';
import type { Audience, CalendarEvent, DisplayOptions, DomainName, MessagePayload } from './types.js';

/** Wording that differs between announcement domains. */
export type AnnouncementProfile = {
  labels: TextLabels;
  digestTitle: (span: string) => string;
  digestStartLabel: string;
  emoji: string;
  noun: string;
};

export const PROFILES: Record<DomainName, AnnouncementProfile> = {
  events: {
    labels: { heading: 'EVENT STARTING NOW', time: 'Time', location: 'Location', link: 'Link', notes: 'Notes' },
    digestTitle: span => `Your Schedule for the Next ${span}`,
    digestStartLabel: 'When',
    emoji: '🗓️',
    noun: 'events',
  },
  trains: {
    labels: { heading: 'TRAIN DEPARTING NOW', time: 'Departure Time', location: 'Location', link: 'Link', notes: 'Notes' },
    digestTitle: span => `Train Departures for the Next ${span}`,
    digestStartLabel: 'Departure',
    emoji: '🚂',
    noun: 'train departures',
  },
};

export type AnnouncementEngineOptions = {
  name: string;
  calendar: TimeWindowCalendarClient;
  calendarId?: string;
  store: AnnouncedEventStore;
  fanout: ChannelFanout;
  audiences: Audience[];
  translator: Translator;
  sourceLocale: string;
  profile: AnnouncementProfile;
  display: DisplayOptions;
  intervalMs: number;
  retentionMs: number;
  clock?: () => Date;
};

export type TickReport = {
  fetched: number;
  announced: string[];
  failures: DeliveryOutcome[];
  skipped?: 'unconfigured' | 'fetch-failed';
};

/**
 * "Announce now" mode: each tick looks at `[now, now + interval)` and posts every
 * event not yet announced to every audience.
 */
export class AnnouncementEngine {
  constructor(private readonly opts: AnnouncementEngineOptions) {}

  get name() {
    return this.opts.name;
  }

  private unconfigured(reason: string, report: TickReport): TickReport {
    const err = new ConfigurationError(`${this.opts.name}: ${reason}`);
    warnOnce(`${this.opts.name}:config:${reason}`, err.message);
    return { ...report, skipped: 'unconfigured' };
  }

  async tick(): Promise<TickReport> {
    const { calendar, calendarId, store, audiences, intervalMs } = this.opts;
    const report: TickReport = { fetched: 0, announced: [], failures: [] };

    if (!calendarId) return this.unconfigured('calendar id is not set', report);
    if (audiences.length === 0) return this.unconfigured('no announcement channels are configured', report);

    const now = (this.opts.clock ?? (() => new Date()))();
    const result = await calendar.fetch(calendarId, {
      timeMin: now,
      timeMax: new Date(now.getTime() + intervalMs),
    });
    if (!result.ok) return { ...report, skipped: 'fetch-failed' };
    report.fetched = result.events.length;

    const cache = new TranslationCache(this.opts.translator);
    for (const event of result.events) {
      if (store.has(event.id)) continue;
      for (const audience of audiences) {
        const payloads = await this.render(event, audience, cache);
        const outcome = await this.opts.fanout.deliver(audience.key, payloads);
        if (!outcome.ok) report.failures.push(outcome);
      }
      // marked even when some audiences failed
      store.add(event.id, endInstant(event));
      report.announced.push(event.id);
    }

    if (report.announced.length > 0) {
      // events still in the window stay, however long ago they started
      const stillListed = new Set(result.events.map(e => e.id));
      store.prune(new Date(now.getTime() - this.opts.retentionMs), stillListed);
      await store.save();
      console.log(`[${this.opts.name}] Announced ${report.announced.length} event(s)`, {
        ids: report.announced,
        failures: report.failures.length,
      });
    }
    return report;
  }

  private wantsTranslation(audience: Audience): audience is Audience & { locale: string } {
    return (
      this.opts.translator.enabled &&
      audience.locale !== undefined &&
      audience.locale !== this.opts.sourceLocale
    );
  }

  async render(event: CalendarEvent, audience: Audience, cache: TranslationCache): Promise<MessagePayload[]> {
    const start = formatStart(event.start, this.opts.display);
    const { labels } = this.opts.profile;
    if (!this.wantsTranslation(audience)) {
      return renderAnnouncement({ ...event, start }, labels);
    }
    const locale = audience.locale;
    const tr = (text: string) => cache.translate(text, locale);
    const [title, description, heading, time, location, link, notes] = await Promise.all([
      tr(event.title),
      event.description ? tr(event.description) : Promise.resolve(null),
      tr(labels.heading),
      tr(labels.time),
      tr(labels.location),
      tr(labels.link),
      tr(labels.notes),
    ]);
    return renderAnnouncement(
      { title, start, location: event.location, link: event.link, description },
      { heading, time, location, link, notes },
    );
  }
}
