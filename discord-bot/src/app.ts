import path from 'node:path';
import { AnnouncementEngine, PROFILES } from './announce.js';
import { GoogleCalendarClient, SharedCalendarAuth, type TimeWindowCalendarClient } from './calendar.js';
import type { AppConfig } from './config.js';
import { openDatabase, type StateDatabase } from './db.js';
import { warnOnce } from './log.js';
import { ChannelFanout, DiscordRestTransport, type Destination } from './notify.js';
import { OnDemandService, type DomainContext } from './ondemand.js';
import { ReconciliationEngine } from './reconcile.js';
import { PollScheduler, cadenceMs, type Cadence } from './scheduler.js';
import {
  JsonAnnouncedEventStore,
  JsonEventSnapshotStore,
  SqliteAnnouncedEventStore,
  SqliteEventSnapshotStore,
  type AnnouncedEventStore,
  type EventSnapshotStore,
} from './store.js';
import { LibreTranslator, passthroughTranslator, type Translator } from './translate.js';
import type { Audience, DomainName } from './types.js';

const HOUR = 3_600_000;

// Legacy file names kept so existing state carries over.
const STATE_FILES = {
  events: 'announced_events.json',
  trains: 'announced_train_events.json',
  summary: 'previous_events.json',
} as const;

export type App = {
  config: AppConfig;
  transport: DiscordRestTransport | null;
  announcers: Record<DomainName, AnnouncementEngine>;
  summary: ReconciliationEngine;
  onDemand: OnDemandService;
  schedulers: PollScheduler[];
  close(): Promise<void>;
};

export type AppDeps = {
  calendar?: TimeWindowCalendarClient;
  transport?: DiscordRestTransport | null;
  translator?: Translator;
  db?: StateDatabase;
};

function buildTranslator(config: AppConfig): Translator {
  const { enabled, url, apiKey, sourceLocale } = config.translation;
  if (!enabled) return passthroughTranslator;
  if (!url) {
    warnOnce('translation:url', 'TRANSLATION_ENABLED is set but TRANSLATE_URL is not; sending source text');
    return passthroughTranslator;
  }
  return new LibreTranslator({ url, apiKey, sourceLocale });
}

export async function buildApp(config: AppConfig, deps: AppDeps = {}): Promise<App> {
  for (const warning of config.warnings) console.error(warning);

  const transport =
    deps.transport !== undefined
      ? deps.transport
      : config.discord.token
        ? DiscordRestTransport.fromToken(config.discord.token)
        : null;
  if (!transport) console.warn('DISCORD_TOKEN not set; skipping notifications');

  const auth = new SharedCalendarAuth(config.google.serviceAccountFile);
  const calendar = deps.calendar ?? new GoogleCalendarClient(() => auth.events());
  const translator = deps.translator ?? buildTranslator(config);

  const db = config.state.backend === 'sqlite' ? (deps.db ?? openDatabase(config.state.dbPath)) : null;
  const announcedStore = async (name: DomainName): Promise<AnnouncedEventStore> =>
    db ? new SqliteAnnouncedEventStore(db, name) : JsonAnnouncedEventStore.open(path.join(config.state.dir, STATE_FILES[name]));
  const snapshotStore: EventSnapshotStore = db
    ? new SqliteEventSnapshotStore(db, 'summary')
    : new JsonEventSnapshotStore(path.join(config.state.dir, STATE_FILES.summary));

  const open = (channelId: string): Destination => {
    if (!transport) throw new Error('no Discord transport');
    return transport.channel(channelId);
  };
  const bound = (audiences: Audience[]) => (transport ? audiences : []);

  const display = config.display;
  const retentionMs = config.dedup.retentionHours * HOUR;
  const cadences: Record<DomainName, Cadence> = {
    events: { kind: 'interval', minutes: config.events.intervalMinutes },
    trains: { kind: 'interval', minutes: config.trains.intervalMinutes },
  };

  const buildDomain = async (name: DomainName) => {
    const audiences = bound(config[name].audiences);
    const fanout = new ChannelFanout(audiences, open);
    const store = await announcedStore(name);
    const context: DomainContext = { calendarId: config[name].calendarId, profile: PROFILES[name], fanout, store };
    const engine = new AnnouncementEngine({
      name,
      calendar,
      calendarId: config[name].calendarId,
      store,
      fanout,
      audiences,
      translator,
      sourceLocale: config.translation.sourceLocale,
      profile: PROFILES[name],
      display,
      intervalMs: cadenceMs(cadences[name]) ?? 60_000,
      retentionMs,
    });
    return { context, engine };
  };
  const events = await buildDomain('events');
  const trains = await buildDomain('trains');
  const domains: Record<DomainName, DomainContext> = { events: events.context, trains: trains.context };
  const announcers: Record<DomainName, AnnouncementEngine> = { events: events.engine, trains: trains.engine };

  const summary = new ReconciliationEngine({
    name: 'summary',
    calendar,
    calendarId: config.summary.calendarId,
    destination: transport && config.summary.channelId ? transport.channel(config.summary.channelId) : undefined,
    store: snapshotStore,
    display,
    // the count is what bounds the summary; the horizon only caps the query
    lookahead: { limit: config.summary.limit, horizonMs: 90 * 24 * HOUR },
  });

  const onDemand = new OnDemandService({ calendar, domains, display, dedup: config.dedup.onDemand });

  const schedulers = [
    new PollScheduler('events', cadences.events, () => announcers.events.tick()),
    new PollScheduler('trains', cadences.trains, () => announcers.trains.tick()),
    new PollScheduler(
      'summary',
      { kind: 'daily', times: config.summary.times, timezone: config.summary.timezone },
      () => summary.run(),
    ),
  ];

  return {
    config,
    transport,
    announcers,
    summary,
    onDemand,
    schedulers,
    async close() {
      await Promise.all(schedulers.map(s => s.stop()));
      if (db && !deps.db) db.close();
    },
  };
}
