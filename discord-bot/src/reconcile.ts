import type { TimeWindowCalendarClient } from './calendar.js';
import { computeDiff, type DiffResult } from './diff.js';
import { ConfigurationError, describeError } from './errors.js';
import { formatStart } from './format.js';
import { Mutex } from './lock.js';
import { warnOnce } from './log.js';
import type { Destination } from './notify.js';
import type { EventSnapshotStore } from './store.js';
import type { DisplayOptions, EmbedField, EmbedPayload } from './types.js';

export const SUMMARY_TITLE = 'Upcoming Calendar Events';
const SUMMARY_COLOR = 0xed4245;
const HISTORY_LOOKBACK = 10;

export type Lookahead = {
  limit: number;
  horizonMs: number;
};

export type ReconcileResult =
  | { status: 'posted'; messageId: string; newCount: number; endedCount: number; replaced: boolean }
  | { status: 'skipped'; reason: 'unconfigured' | 'fetch-failed' | 'send-failed' };

export type ReconciliationEngineOptions = {
  name: string;
  calendar: TimeWindowCalendarClient;
  calendarId?: string;
  destination?: Destination;
  store: EventSnapshotStore;
  display: DisplayOptions;
  lookahead: Lookahead;
  clock?: () => Date;
};

export function renderSummary(diff: DiffResult): EmbedPayload {
  const fields: EmbedField[] = diff.current.map(({ event, start, isNew }) => ({
    name: isNew ? `${event.title} (NEW)` : event.title,
    value: [
      `**Start:** ${start}`,
      `**Location:** ${event.location || 'No Location'}`,
      `**Link:** ${event.link || 'N/A'}`,
    ].join('\n'),
    inline: false,
  }));
  for (const ended of diff.ended) {
    fields.push({ name: `~~${ended.title}~~ (Ended)`, value: `~~**Start:** ${ended.start}~~`, inline: false });
  }
  return {
    title: SUMMARY_TITLE,
    description: `Here are the next ${diff.current.length} events:`,
    color: SUMMARY_COLOR,
    fields,
  };
}

/**
 * Keeps one live summary post per destination. Each run replaces the previous
 * post with a fresh one that flags new events and strikes through ended ones.
 */
export class ReconciliationEngine {
  // scheduled and manual runs share the snapshot; never let them interleave
  private readonly lock = new Mutex();

  constructor(private readonly opts: ReconciliationEngineOptions) {}

  get name() {
    return this.opts.name;
  }

  get destination() {
    return this.opts.destination;
  }

  run(lookahead: Lookahead = this.opts.lookahead): Promise<ReconcileResult> {
    return this.lock.run(() => this.reconcile(lookahead));
  }

  private async reconcile(lookahead: Lookahead): Promise<ReconcileResult> {
    const { calendar, calendarId, destination, store, display } = this.opts;
    if (!calendarId || !destination) {
      const err = new ConfigurationError(
        `${this.opts.name}: ${!calendarId ? 'calendar id is not set' : 'summary channel is not set'}`,
      );
      warnOnce(`${this.opts.name}:config:${err.message}`, err.message);
      return { status: 'skipped', reason: 'unconfigured' };
    }

    const now = (this.opts.clock ?? (() => new Date()))();
    const result = await calendar.fetch(calendarId, {
      timeMin: now,
      timeMax: new Date(now.getTime() + lookahead.horizonMs),
      limit: lookahead.limit,
    });
    if (!result.ok) return { status: 'skipped', reason: 'fetch-failed' };

    const previous = await store.load();
    const diff = computeDiff(previous, result.events, e => formatStart(e.start, display));
    const embed = renderSummary(diff);

    const replaced = await this.deletePrevious(destination);

    let messageId: string;
    try {
      messageId = await destination.send({ kind: 'embed', embed });
    } catch (err) {
      console.error(`[${this.opts.name}] Failed to post summary`, {
        channel_id: destination.channelId,
        err: describeError(err),
      });
      return { status: 'skipped', reason: 'send-failed' };
    } finally {
      await store.save(diff.next);
    }

    return {
      status: 'posted',
      messageId,
      newCount: diff.current.filter(c => c.isNew).length,
      endedCount: diff.ended.length,
      replaced,
    };
  }

  /** Deletes the last summary this bot posted, if it is within recent history. */
  private async deletePrevious(destination: Destination): Promise<boolean> {
    try {
      const recent = await destination.recent(HISTORY_LOOKBACK);
      const previous = recent.find(m => m.fromSelf && m.embedTitles.includes(SUMMARY_TITLE));
      if (!previous) return false;
      await destination.delete(previous.id);
      return true;
    } catch (err) {
      console.error(`[${this.opts.name}] Could not delete previous summary`, {
        channel_id: destination.channelId,
        err: describeError(err),
      });
      return false;
    }
  }
}
