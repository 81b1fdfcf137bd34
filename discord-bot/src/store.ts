import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { StateDatabase } from './db.js';
import { StateCorruptionError, describeError } from './errors.js';
import { Mutex } from './lock.js';
import type { EventSnapshot } from './types.js';

/**
 * Ids already announced by one engine. Reads and writes are in memory;
 * `save` persists the whole set.
 */
export interface AnnouncedEventStore {
  has(eventId: string): boolean;
  /** `endsAt` is when the event is over; the id becomes evictable after it. */
  add(eventId: string, endsAt: Date | null): void;
  /**
   * Drops ids whose end is before `cutoff`, except those in `keep`.
   * Ids without a known end are kept.
   */
  prune(cutoff: Date, keep?: ReadonlySet<string>): number;
  save(): Promise<void>;
  readonly size: number;
}

export interface EventSnapshotStore {
  load(): Promise<EventSnapshot>;
  save(snapshot: EventSnapshot): Promise<void>;
}

abstract class InMemoryAnnouncedSet implements AnnouncedEventStore {
  protected readonly ids = new Map<string, string | null>(); // id -> end ISO

  get size() {
    return this.ids.size;
  }

  has(eventId: string) {
    return this.ids.has(eventId);
  }

  add(eventId: string, endsAt: Date | null) {
    this.ids.set(eventId, endsAt ? endsAt.toISOString() : null);
  }

  prune(cutoff: Date, keep: ReadonlySet<string> = new Set()) {
    let removed = 0;
    for (const [id, endsAt] of this.ids) {
      if (keep.has(id)) continue;
      if (endsAt && new Date(endsAt).getTime() < cutoff.getTime()) {
        this.ids.delete(id);
        removed++;
      }
    }
    return removed;
  }

  abstract save(): Promise<void>;
}

// Older files hold a bare array of ids.
const announcedFileSchema = z.union([
  z.array(z.string()),
  z.record(z.string(), z.string().datetime({ offset: true }).nullable()),
]);

async function readJson(file: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }
  if (!raw.trim()) return undefined;
  return JSON.parse(raw);
}

function reportCorruption(file: string, cause: unknown) {
  const err = new StateCorruptionError(file, { cause });
  console.warn(err.message, { err: describeError(cause) });
}

// callers serialize writes per file
async function writeJson(file: string, data: unknown) {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(data, null, 2));
  await fs.rename(tmp, file);
}

export class JsonAnnouncedEventStore extends InMemoryAnnouncedSet {
  private readonly writes = new Mutex();

  private constructor(private readonly file: string) {
    super();
  }

  static async open(file: string): Promise<JsonAnnouncedEventStore> {
    const store = new JsonAnnouncedEventStore(file);
    try {
      const data = await readJson(file);
      if (data !== undefined) {
        const parsed = announcedFileSchema.parse(data);
        if (Array.isArray(parsed)) parsed.forEach(id => store.ids.set(id, null));
        else for (const [id, endsAt] of Object.entries(parsed)) store.ids.set(id, endsAt);
      }
    } catch (err) {
      reportCorruption(file, err);
      store.ids.clear();
    }
    return store;
  }

  save() {
    // each write takes the set as it is when the write starts
    return this.writes.run(() => writeJson(this.file, Object.fromEntries(this.ids)));
  }
}

const snapshotFileSchema = z.record(
  z.string(),
  z.union([z.string(), z.object({ title: z.string(), start: z.string() })]),
);

export function normalizeSnapshot(data: z.infer<typeof snapshotFileSchema>): EventSnapshot {
  const snapshot: EventSnapshot = {};
  for (const [key, value] of Object.entries(data)) {
    // title-keyed legacy entry: the title doubles as the id
    snapshot[key] = typeof value === 'string' ? { title: key, start: value } : value;
  }
  return snapshot;
}

export class JsonEventSnapshotStore implements EventSnapshotStore {
  private readonly writes = new Mutex();

  constructor(private readonly file: string) {}

  async load(): Promise<EventSnapshot> {
    try {
      const data = await readJson(this.file);
      return data === undefined ? {} : normalizeSnapshot(snapshotFileSchema.parse(data));
    } catch (err) {
      reportCorruption(this.file, err);
      return {};
    }
  }

  save(snapshot: EventSnapshot) {
    return this.writes.run(() => writeJson(this.file, snapshot));
  }
}

export class SqliteAnnouncedEventStore extends InMemoryAnnouncedSet {
  constructor(
    private readonly db: StateDatabase,
    private readonly engine: string,
  ) {
    super();
    const rows = db
      .prepare('SELECT event_id, ends_at FROM announced_events WHERE engine = ?')
      .all(engine) as { event_id: string; ends_at: string | null }[];
    for (const row of rows) this.ids.set(row.event_id, row.ends_at);
  }

  async save() {
    const del = this.db.prepare('DELETE FROM announced_events WHERE engine = ?');
    const ins = this.db.prepare(
      `INSERT INTO announced_events (engine, event_id, ends_at) VALUES (?, ?, ?)
       ON CONFLICT(engine, event_id) DO UPDATE SET ends_at = excluded.ends_at`,
    );
    const keep = [...this.ids];
    this.db.transaction(() => {
      del.run(this.engine);
      for (const [id, endsAt] of keep) ins.run(this.engine, id, endsAt);
    })();
  }
}

export class SqliteEventSnapshotStore implements EventSnapshotStore {
  constructor(
    private readonly db: StateDatabase,
    private readonly engine: string,
  ) {}

  async load(): Promise<EventSnapshot> {
    const rows = this.db
      .prepare('SELECT event_id, title, start_label FROM event_snapshots WHERE engine = ?')
      .all(this.engine) as { event_id: string; title: string; start_label: string }[];
    const snapshot: EventSnapshot = {};
    for (const row of rows) snapshot[row.event_id] = { title: row.title, start: row.start_label };
    return snapshot;
  }

  async save(snapshot: EventSnapshot) {
    const del = this.db.prepare('DELETE FROM event_snapshots WHERE engine = ?');
    const ins = this.db.prepare(
      'INSERT INTO event_snapshots (engine, event_id, title, start_label) VALUES (?, ?, ?, ?)',
    );
    this.db.transaction(() => {
      del.run(this.engine);
      for (const [id, entry] of Object.entries(snapshot)) ins.run(this.engine, id, entry.title, entry.start);
    })();
  }
}
