import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';

export type StateDatabase = Database.Database;

export function openDatabase(file: string): StateDatabase {
  if (file !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
    console.log(`Using DB at ${file}`);
  }
  const db = new Database(file);
  migrate(db);
  return db;
}

export function migrate(db: StateDatabase) {
  db.exec(`
    PRAGMA journal_mode = WAL;
    CREATE TABLE IF NOT EXISTS announced_events (
      engine TEXT NOT NULL,
      event_id TEXT NOT NULL,
      ends_at TEXT,
      announced_at TEXT DEFAULT (datetime('now')),
      PRIMARY KEY (engine, event_id)
    );

    CREATE TABLE IF NOT EXISTS event_snapshots (
      engine TEXT NOT NULL,
      event_id TEXT NOT NULL,
      title TEXT NOT NULL,
      start_label TEXT NOT NULL,
      PRIMARY KEY (engine, event_id)
    );
  `);
}
