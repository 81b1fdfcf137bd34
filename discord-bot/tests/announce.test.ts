import { beforeEach, describe, expect, it, vi } from 'vitest';
import { AnnouncementEngine, PROFILES, type AnnouncementEngineOptions } from '../src/announce.js';
import { resetWarnings } from '../src/log.js';
import { ChannelFanout } from '../src/notify.js';
import { passthroughTranslator } from '../src/translate.js';
import type { Audience } from '../src/types.js';
import {
  FakeCalendar,
  FakeDestination,
  FakeTranslator,
  MemoryAnnouncedStore,
  forbidden,
  timedEvent,
} from './fakes.js';

const NOW = new Date('2026-10-19T12:00:00Z');
const MINUTE = 60_000;

function setup(audiences: Audience[], overrides: Partial<AnnouncementEngineOptions> = {}) {
  const calendar = new FakeCalendar();
  const store = new MemoryAnnouncedStore();
  const destinations = new Map<string, FakeDestination>();
  const fanout = new ChannelFanout(audiences, channelId => {
    const d = new FakeDestination(channelId);
    destinations.set(channelId, d);
    return d;
  });
  const engine = new AnnouncementEngine({
    name: 'events',
    calendar,
    calendarId: 'cal-1',
    store,
    fanout,
    audiences,
    translator: passthroughTranslator,
    sourceLocale: 'en',
    profile: PROFILES.events,
    display: { utcOffsetMinutes: -120 },
    intervalMs: MINUTE,
    retentionMs: 96 * 60 * MINUTE,
    clock: () => NOW,
    ...overrides,
  });
  const dest = (channelId: string) => {
    const d = destinations.get(channelId);
    if (!d) throw new Error(`no destination ${channelId}`);
    return d;
  };
  return { calendar, store, engine, dest };
}

beforeEach(() => {
  resetWarnings();
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

describe('AnnouncementEngine', () => {
  const audiences: Audience[] = [
    { key: 'general', channelId: '100' },
    { key: 'backup', channelId: '200' },
  ];

  it('queries exactly one interval starting now', async () => {
    const { calendar, engine } = setup(audiences);
    await engine.tick();
    expect(calendar.calls).toEqual([
      { sourceId: 'cal-1', window: { timeMin: NOW, timeMax: new Date(NOW.getTime() + MINUTE) } },
    ]);
  });

  it('announces a new event once per audience and never again', async () => {
    const { calendar, store, engine, dest } = setup(audiences);
    calendar.events = [timedEvent('e1', 'Kickoff', new Date(NOW.getTime() + 30_000))];

    const first = await engine.tick();
    expect(first.announced).toEqual(['e1']);
    expect([...store.ids.keys()]).toEqual(['e1']);
    expect(store.saves).toBe(1);
    for (const channel of ['100', '200']) {
      expect(dest(channel).texts()).toHaveLength(1);
      expect(dest(channel).texts()[0]).toContain('Kickoff');
    }

    const second = await engine.tick();
    expect(second.announced).toEqual([]);
    expect(dest('100').texts()).toHaveLength(1);
    expect(dest('200').texts()).toHaveLength(1);
    expect(store.saves).toBe(1);
  });

  it('renders the announcement in the configured offset', async () => {
    const { calendar, engine, dest } = setup([audiences[0]]);
    calendar.events = [timedEvent('e1', 'Kickoff', new Date('2026-10-19T12:00:30Z'), { link: 'https://cal.example/e1' })];
    await engine.tick();
    expect(dest('100').texts()[0]).toBe(
      [
        '**EVENT STARTING NOW: Kickoff**',
        '---------------------------------',
        '**Time:** Monday, Oct 19 at 10:00 (UTC-2)',
        '**Link:** <https://cal.example/e1>',
      ].join('\n'),
    );
  });

  it('keeps delivering to other audiences when one fails', async () => {
    const { calendar, store, engine, dest } = setup(audiences);
    dest('100').failSend = forbidden('100');
    calendar.events = [timedEvent('e1', 'Kickoff', NOW)];

    const report = await engine.tick();
    expect(report.failures.map(f => f.audience)).toEqual(['general']);
    expect(dest('200').texts()).toHaveLength(1);
    expect(store.has('e1')).toBe(true);
  });

  it('announces a duplicated id only once within a tick', async () => {
    const { calendar, engine, dest } = setup([audiences[0]]);
    calendar.events = [timedEvent('e1', 'Kickoff', NOW), timedEvent('e1', 'Kickoff', NOW)];
    await engine.tick();
    expect(dest('100').texts()).toHaveLength(1);
  });

  it('treats a fetch failure as an empty tick', async () => {
    const { calendar, store, engine } = setup(audiences);
    calendar.failing = true;
    const report = await engine.tick();
    expect(report).toEqual({ fetched: 0, announced: [], failures: [], skipped: 'fetch-failed' });
    expect(store.saves).toBe(0);
  });

  it('idles and warns once when the calendar id is missing', async () => {
    const { calendar, engine } = setup(audiences, { calendarId: undefined });
    await engine.tick();
    await engine.tick();
    expect(calendar.calls).toHaveLength(0);
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith('events: calendar id is not set');
  });

  it('idles when no audiences are configured', async () => {
    const { calendar, engine } = setup([]);
    const report = await engine.tick();
    expect(report.skipped).toBe('unconfigured');
    expect(calendar.calls).toHaveLength(0);
  });

  it('evicts announced ids older than the retention window when saving', async () => {
    const { calendar, store, engine } = setup([audiences[0]]);
    store.add('ancient', new Date('2026-10-01T00:00:00Z'));
    calendar.events = [timedEvent('e1', 'Kickoff', NOW)];
    await engine.tick();
    expect(store.has('ancient')).toBe(false);
    expect(store.has('e1')).toBe(true);
  });

  it('announces a long-running event once even though it started before the retention window', async () => {
    const { calendar, store, engine, dest } = setup([audiences[0]]);
    calendar.events = [
      {
        id: 'conf',
        title: 'Conference',
        start: { kind: 'date', date: '2026-10-14' },
        end: { kind: 'date', date: '2026-10-21' },
      },
    ];
    await engine.tick();
    await engine.tick();
    await engine.tick();
    expect(dest('100').texts()).toHaveLength(1);
    expect(store.ids.get('conf')).toEqual(new Date('2026-10-21T00:00:00Z'));
  });

  it('keeps ids still returned by the calendar until they drop out of the window', async () => {
    const { calendar, store, engine, dest } = setup([audiences[0]]);
    // no end known, started well before the retention cutoff
    calendar.events = [timedEvent('hack', 'Hackathon', new Date('2026-10-10T09:00:00Z'))];
    await engine.tick();
    await engine.tick();
    expect(dest('100').texts()).toHaveLength(1);
    expect(store.has('hack')).toBe(true);

    calendar.events = [timedEvent('e2', 'Retro', NOW)];
    await engine.tick();
    expect(store.has('hack')).toBe(false);
    expect(store.has('e2')).toBe(true);
  });

  it('translates title, notes and labels only for audiences in another locale', async () => {
    const translator = new FakeTranslator();
    const { calendar, engine, dest } = setup(
      [
        { key: 'general', channelId: '100' },
        { key: 'espanol', channelId: '200', locale: 'es' },
        { key: 'english', channelId: '300', locale: 'en' },
      ],
      { translator },
    );
    calendar.events = [timedEvent('e1', 'Kickoff', NOW, { description: 'Bring snacks' })];
    await engine.tick();

    expect(dest('100').texts()[0]).toContain('**EVENT STARTING NOW: Kickoff**');
    expect(dest('300').texts()[0]).toContain('**EVENT STARTING NOW: Kickoff**');
    const spanish = dest('200').texts()[0];
    expect(spanish).toContain('**es:EVENT STARTING NOW: es:Kickoff**');
    expect(spanish).toContain('**es:Notes:** es:Bring snacks');
    expect(spanish).toContain('**es:Time:** Monday, Oct 19 at 10:00 (UTC-2)');
    expect(translator.calls.every(c => c.locale === 'es')).toBe(true);
  });
});
