// src/db/db.ts
import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync, existsSync } from 'fs';

/**
 * Open (creating if needed) a session's event cache database.
 *
 * @param dbPath - File path, or ':memory:' for tests
 * @returns Connection with the events schema applied
 */
export function openEventCacheDb(dbPath: string): Database.Database {
  const inMemory = dbPath === ':memory:';

  // Ensure cache directory exists
  if (!inMemory) {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db: Database.Database = new Database(dbPath, {
    verbose: process.env.NODE_ENV === 'development' ? console.log : undefined,
  });

  // WAL mode isn't available for in-memory databases
  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }

  db.exec(`
    -- Projection of the user's upcoming calendar events
    -- Timestamps are UTC "YYYY-MM-DD HH:MM:SS"; attendees is a JSON array
    CREATE TABLE IF NOT EXISTS events (
      id TEXT PRIMARY KEY,
      summary TEXT NOT NULL DEFAULT '',
      description TEXT NOT NULL DEFAULT '',
      start_time TEXT NOT NULL,
      end_time TEXT NOT NULL,
      location TEXT NOT NULL DEFAULT '',
      attendees TEXT NOT NULL DEFAULT '[]',
      status TEXT NOT NULL DEFAULT 'confirmed',
      html_link TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    -- Index on start_time for date-bucketed queries
    CREATE INDEX IF NOT EXISTS idx_events_start_time ON events(start_time);
  `);

  return db;
}
