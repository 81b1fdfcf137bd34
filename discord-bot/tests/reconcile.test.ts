import { beforeEach, describe, expect, it, vi } from 'vitest';
import { resetWarnings } from '../src/log.js';
import { ReconciliationEngine, SUMMARY_TITLE, type ReconciliationEngineOptions } from '../src/reconcile.js';
import type { EmbedPayload, EventSnapshot } from '../src/types.js';
import { FakeCalendar, FakeDestination, MemorySnapshotStore, forbidden, timedEvent } from './fakes.js';

const NOW = new Date('2026-10-19T13:00:00Z');

function setup(previous: EventSnapshot = {}, overrides: Partial<ReconciliationEngineOptions> = {}) {
  const calendar = new FakeCalendar();
  const destination = new FakeDestination('500');
  const store = new MemorySnapshotStore(previous);
  const engine = new ReconciliationEngine({
    name: 'summary',
    calendar,
    calendarId: 'cal-summary',
    destination,
    store,
    display: { utcOffsetMinutes: -120 },
    lookahead: { limit: 5, horizonMs: 24 * 3_600_000 },
    clock: () => NOW,
    ...overrides,
  });
  return { calendar, destination, store, engine };
}

function postedEmbed(destination: FakeDestination): EmbedPayload {
  const last = destination.sent.at(-1);
  if (!last || last.kind !== 'embed') throw new Error('no embed posted');
  return last.embed;
}

beforeEach(() => {
  resetWarnings();
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

describe('ReconciliationEngine', () => {
  it('strikes through a previous entry that is no longer in the calendar', async () => {
    const { destination, store, engine } = setup({ Standup: { title: 'Standup', start: '9am' } });

    const result = await engine.run();
    expect(result).toMatchObject({ status: 'posted', endedCount: 1, newCount: 0 });
    const embed = postedEmbed(destination);
    expect(embed.fields).toEqual([{ name: '~~Standup~~ (Ended)', value: '~~**Start:** 9am~~', inline: false }]);
    expect(store.current).toEqual({});
  });

  it('flags events not seen in the previous snapshot as new', async () => {
    const { calendar, destination, engine } = setup({ e1: { title: 'Standup', start: 'old label' } });
    calendar.events = [
      timedEvent('e1', 'Standup', new Date('2026-10-20T09:00:00Z'), { location: 'Room 1' }),
      timedEvent('e2', 'Retro', new Date('2026-10-20T15:00:00Z'), { link: 'https://cal.example/e2' }),
    ];
    await engine.run();

    const embed = postedEmbed(destination);
    expect(embed.title).toBe(SUMMARY_TITLE);
    expect(embed.description).toBe('Here are the next 2 events:');
    expect(embed.fields.map(f => f.name)).toEqual(['Standup', 'Retro (NEW)']);
    expect(embed.fields[0].value).toBe(
      '**Start:** Tuesday, Oct 20 at 07:00 (UTC-2)\n**Location:** Room 1\n**Link:** N/A',
    );
  });

  it('fetches the configured lookahead', async () => {
    const { calendar, engine } = setup();
    await engine.run();
    expect(calendar.calls[0].window).toEqual({
      timeMin: NOW,
      timeMax: new Date('2026-10-20T13:00:00Z'),
      limit: 5,
    });
  });

  it('persists the new snapshot keyed by event id', async () => {
    const { calendar, store, engine } = setup();
    calendar.events = [timedEvent('e9', 'Launch', new Date('2026-10-21T00:00:00Z'))];
    await engine.run();
    expect(store.current).toEqual({ e9: { title: 'Launch', start: 'Tuesday, Oct 20 at 22:00 (UTC-2)' } });
  });

  it('deletes only its own previous summary before posting', async () => {
    const { destination, engine } = setup();
    destination.history = [
      { id: 'u1', authorId: 'someone', embedTitles: [SUMMARY_TITLE], fromSelf: false },
      { id: 'b1', authorId: 'bot', embedTitles: ['Something else'], fromSelf: true },
      { id: 'b2', authorId: 'bot', embedTitles: [SUMMARY_TITLE], fromSelf: true },
    ];
    const result = await engine.run();
    expect(destination.deleted).toEqual(['b2']);
    expect(result).toMatchObject({ status: 'posted', replaced: true });
  });

  it('still posts when the old summary cannot be deleted', async () => {
    const { destination, engine } = setup();
    destination.history = [{ id: 'b2', authorId: 'bot', embedTitles: [SUMMARY_TITLE], fromSelf: true }];
    destination.failDelete = forbidden('500');
    const result = await engine.run();
    expect(result).toMatchObject({ status: 'posted', replaced: false });
    expect(destination.sent).toHaveLength(1);
  });

  it('saves the snapshot even when the post fails', async () => {
    const { calendar, destination, store, engine } = setup({ old: { title: 'Old', start: 's' } });
    calendar.events = [timedEvent('e1', 'New', NOW)];
    destination.failSend = forbidden('500');
    const result = await engine.run();
    expect(result).toEqual({ status: 'skipped', reason: 'send-failed' });
    expect(Object.keys(store.current)).toEqual(['e1']);
  });

  it('leaves the snapshot alone when the fetch fails', async () => {
    const { calendar, store, engine } = setup({ old: { title: 'Old', start: 's' } });
    calendar.failing = true;
    expect(await engine.run()).toEqual({ status: 'skipped', reason: 'fetch-failed' });
    expect(store.saved).toHaveLength(0);
  });

  it('idles when no destination is configured', async () => {
    const { calendar, engine } = setup({}, { destination: undefined });
    expect(await engine.run()).toEqual({ status: 'skipped', reason: 'unconfigured' });
    expect(calendar.calls).toHaveLength(0);
  });

  it('serializes overlapping runs', async () => {
    const { calendar, destination, engine } = setup();
    calendar.events = [timedEvent('e1', 'Only', NOW)];
    const [a, b] = await Promise.all([engine.run(), engine.run()]);
    expect(a).toMatchObject({ newCount: 1 });
    // the second run sees the first run's snapshot
    expect(b).toMatchObject({ newCount: 0 });
    expect(destination.sent).toHaveLength(2);
  });
});
