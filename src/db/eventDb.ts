// src/db/eventDb.ts
import type Database from 'better-sqlite3';
import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { openEventCacheDb } from './db.js';
import type { TimezoneNormalizer } from '../lib/timezone.js';
import type { CachedEvent, CalendarEvent } from '../types/calendar.js';

/**
 * Thrown when a cache query is rejected or fails to run
 */
export class CacheQueryError extends Error {
  constructor(message: string, public readonly sql: string) {
    super(message);
    this.name = 'CacheQueryError';
  }
}

/**
 * Row shape as stored. Columns the query leaves out fall back to defaults so
 * a narrower SELECT still maps, but every row needs an id and both times.
 */
const eventRowSchema = z.object({
  id: z.string(),
  summary: z.string().nullish(),
  description: z.string().nullish(),
  start_time: z.string(),
  end_time: z.string(),
  location: z.string().nullish(),
  attendees: z.string().nullish(),
  status: z.string().nullish(),
  html_link: z.string().nullish(),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
});

type EventRow = z.infer<typeof eventRowSchema>;

const tableInfoSchema = z.object({
  name: z.string(),
  type: z.string(),
  notnull: z.number(),
  pk: z.number(),
});

const attendeesSchema = z.array(z.string());

/**
 * Prepared statements
 */
const UPSERT_SQL = `
  INSERT INTO events (
    id, summary, description, start_time, end_time, location,
    attendees, status, html_link, created_at, updated_at
  )
  VALUES (
    @id, @summary, @description, @start_time, @end_time, @location,
    @attendees, @status, @html_link, @now, @now
  )
  ON CONFLICT(id) DO UPDATE SET
    summary = excluded.summary,
    description = excluded.description,
    start_time = excluded.start_time,
    end_time = excluded.end_time,
    location = excluded.location,
    attendees = excluded.attendees,
    status = excluded.status,
    html_link = excluded.html_link,
    updated_at = excluded.updated_at
`;

const GET_BY_ID_SQL = `SELECT * FROM events WHERE id = ?`;

const LIST_ALL_SQL = `SELECT * FROM events ORDER BY start_time ASC`;

/**
 * Per-session SQLite projection of upcoming calendar events.
 *
 * The connection opens on first use and stays open until close().
 * The table is only ever rewritten from the provider; nothing written
 * here flows back to the calendar.
 */
export class EventCache {
  private db?: Database.Database;
  private closed = false;

  constructor(
    readonly dbPath: string,
    private readonly timezone: TimezoneNormalizer,
    private readonly logger: FastifyBaseLogger
  ) {}

  /**
   * Opens lazily. A closed cache stays closed so a late request can't
   * recreate the file after the session is disposed.
   */
  private connection(): Database.Database {
    if (this.closed) {
      throw new Error(`Event cache is closed: ${this.dbPath}`);
    }
    if (!this.db) {
      this.db = openEventCacheDb(this.dbPath);
    }
    return this.db;
  }

  /**
   * Insert or update events by id. created_at is kept from the first write.
   *
   * @returns Number of rows written (0 if the write failed)
   */
  upsertEvents(events: CalendarEvent[], now: Date = this.timezone.now()): number {
    if (events.length === 0) {
      return 0;
    }

    try {
      const db = this.connection();
      const write = db.transaction((batch: CalendarEvent[]) => this.writeRows(batch, now));
      return write(events);
    } catch (error) {
      this.logger.error({ err: error, count: events.length }, 'Failed to upsert cached events');
      return 0;
    }
  }

  /**
   * Remove every cached event
   */
  clear(): void {
    this.connection().prepare('DELETE FROM events').run();
  }

  /**
   * Full resync: swap the table contents for the given events atomically.
   * On failure the previous contents stay in place.
   *
   * @returns Number of rows written
   */
  replaceAll(events: CalendarEvent[], now: Date = this.timezone.now()): number {
    try {
      const db = this.connection();
      const swap = db.transaction((batch: CalendarEvent[]) => {
        db.prepare('DELETE FROM events').run();
        return this.writeRows(batch, now);
      });
      const written = swap(events);
      this.logger.debug({ written }, 'Event cache replaced');
      return written;
    } catch (error) {
      this.logger.error({ err: error, count: events.length }, 'Failed to replace cached events');
      return 0;
    }
  }

  getById(id: string): CachedEvent | null {
    const row = this.connection().prepare(GET_BY_ID_SQL).get(id);
    if (row === undefined) {
      return null;
    }
    return this.toCachedEvent(eventRowSchema.parse(row));
  }

  listAll(): CachedEvent[] {
    const rows = this.connection().prepare(LIST_ALL_SQL).all();
    return rows.map((row) => this.toCachedEvent(eventRowSchema.parse(row)));
  }

  /**
   * Run a generated read-only query against the cache.
   *
   * @param sql - A single SELECT statement
   * @returns Matching rows mapped to events; rows missing id or times are skipped
   * @throws CacheQueryError if the statement writes, is invalid or fails
   */
  query(sql: string): CachedEvent[] {
    let stmt: Database.Statement;
    try {
      stmt = this.connection().prepare(sql);
    } catch (error) {
      throw new CacheQueryError(
        `Invalid query: ${error instanceof Error ? error.message : String(error)}`,
        sql
      );
    }

    if (!stmt.readonly || !stmt.reader) {
      throw new CacheQueryError('Only read-only SELECT statements are allowed', sql);
    }

    let rows: unknown[];
    try {
      rows = stmt.all();
    } catch (error) {
      throw new CacheQueryError(
        `Query failed: ${error instanceof Error ? error.message : String(error)}`,
        sql
      );
    }

    const events: CachedEvent[] = [];
    for (const row of rows) {
      const parsed = eventRowSchema.safeParse(row);
      if (!parsed.success) {
        this.logger.warn({ sql }, 'Skipping query row that is not an event');
        continue;
      }
      try {
        events.push(this.toCachedEvent(parsed.data));
      } catch (error) {
        this.logger.warn({ err: error, id: parsed.data.id }, 'Skipping row with unreadable times');
      }
    }
    return events;
  }

  /**
   * Human-readable column list for prompting
   */
  describeSchema(): string {
    const columns = this.connection()
      .prepare('PRAGMA table_info(events)')
      .all()
      .map((row) => tableInfoSchema.parse(row));

    const lines = columns.map((column) => {
      const flags = [column.type];
      if (column.pk) flags.push('PRIMARY KEY');
      else if (column.notnull) flags.push('NOT NULL');
      return `- ${column.name} (${flags.join(', ')})`;
    });

    return [
      'Table: events',
      ...lines,
      'start_time, end_time, created_at and updated_at are UTC text "YYYY-MM-DD HH:MM:SS".',
      'attendees is a JSON array of email addresses stored as text.',
    ].join('\n');
  }

  close(): void {
    this.closed = true;
    if (this.db) {
      this.db.close();
      this.db = undefined;
    }
  }

  private writeRows(events: CalendarEvent[], now: Date): number {
    const stmt = this.connection().prepare(UPSERT_SQL);
    const timestamp = this.timezone.formatForStorage(now);
    let written = 0;

    for (const event of events) {
      const result = stmt.run({
        id: event.id,
        summary: event.summary,
        description: event.description,
        start_time: this.timezone.formatForStorage(event.start),
        end_time: this.timezone.formatForStorage(event.end),
        location: event.location,
        attendees: JSON.stringify(event.attendees),
        status: event.status,
        html_link: event.htmlLink,
        now: timestamp,
      });
      written += result.changes;
    }
    return written;
  }

  private toCachedEvent(row: EventRow): CachedEvent {
    const start = this.timezone.parseFromStorage(row.start_time);
    const end = this.timezone.parseFromStorage(row.end_time);

    return {
      id: row.id,
      summary: row.summary ?? '',
      description: row.description ?? '',
      location: row.location ?? '',
      start,
      end,
      allDay: false,
      attendees: parseAttendees(row.attendees),
      status: row.status ?? 'confirmed',
      htmlLink: row.html_link ?? '',
      createdAt: row.created_at ?? '',
      updatedAt: row.updated_at ?? '',
    };
  }
}

function parseAttendees(raw: string | null | undefined): string[] {
  if (!raw) {
    return [];
  }
  try {
    const parsed = attendeesSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}
