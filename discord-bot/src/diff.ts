import type { CalendarEvent, EventSnapshot, SnapshotEntry } from './types.js';

export type DiffResult = {
  current: { event: CalendarEvent; start: string; isNew: boolean }[];
  ended: ({ eventId: string } & SnapshotEntry)[];
  next: EventSnapshot;
};

/**
 * Compares a fetch against the previous snapshot. The event id is the only
 * identity used on both sides; titles are carried for display.
 */
export function computeDiff(
  previous: EventSnapshot,
  events: CalendarEvent[],
  formatStart: (event: CalendarEvent) => string,
): DiffResult {
  const current: DiffResult['current'] = [];
  const next: EventSnapshot = {};

  for (const event of events) {
    if (next[event.id]) continue; // same id twice in one fetch
    const start = formatStart(event);
    current.push({ event, start, isNew: !Object.hasOwn(previous, event.id) });
    next[event.id] = { title: event.title, start };
  }

  const ended = Object.entries(previous)
    .filter(([eventId]) => !Object.hasOwn(next, eventId))
    .map(([eventId, entry]) => ({ eventId, ...entry }));

  return { current, ended, next };
}
