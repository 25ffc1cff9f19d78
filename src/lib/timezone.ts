// src/lib/timezone.ts
import { formatInTimeZone, fromZonedTime, getTimezoneOffset } from 'date-fns-tz';
import type { FastifyBaseLogger } from 'fastify';

const STORAGE_FORMAT = 'yyyy-MM-dd HH:mm:ss';

// "YYYY-MM-DD", "YYYY-MM-DD HH:MM" or "YYYY-MM-DD HH:MM:SS" (space or T), no offset
const NAIVE_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

/**
 * Returns true if the runtime recognizes the IANA timezone id
 */
export function isValidTimezone(timezone: string): boolean {
  if (!timezone) {
    return false;
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Split a zone-naive timestamp into an ISO local string ("YYYY-MM-DDTHH:MM:SS"),
 * or null if the input carries an offset or isn't a timestamp at all
 */
function naiveToIsoLocal(value: string): string | null {
  const match = NAIVE_TIMESTAMP.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, date, hours = '00', minutes = '00', seconds = '00'] = match;
  return `${date}T${hours}:${minutes}:${seconds}`;
}

function assertValid(date: Date, input: Date | string): Date {
  if (isNaN(date.getTime())) {
    throw new RangeError(`Invalid timestamp: ${String(input)}`);
  }
  return date;
}

/**
 * Per-session timezone context.
 *
 * Everything the assistant stores is UTC; everything it shows or accepts from
 * the user is wall-clock time in the selected zone. This class owns both
 * directions of that conversion.
 */
export class TimezoneNormalizer {
  private zone = 'UTC';

  constructor(
    timezone: string = 'UTC',
    private readonly logger?: FastifyBaseLogger,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.setTimezone(timezone);
  }

  get timezone(): string {
    return this.zone;
  }

  /**
   * Switch the session's zone.
   *
   * @param timezone - IANA id, e.g. "America/New_York"
   * @returns false (zone unchanged) if the id is unknown
   */
  setTimezone(timezone: string): boolean {
    if (!isValidTimezone(timezone)) {
      this.logger?.warn({ timezone, current: this.zone }, 'Ignoring invalid timezone');
      return false;
    }
    this.zone = timezone;
    return true;
  }

  now(): Date {
    return this.clock();
  }

  /**
   * Project an instant into the user's zone as "YYYY-MM-DD HH:MM:SS".
   * Zone-naive strings are read as UTC.
   */
  toUserZone(value: Date | string): string {
    return formatInTimeZone(this.readAsUtc(value), this.zone, STORAGE_FORMAT);
  }

  /**
   * Resolve user input to an absolute instant.
   * Zone-naive strings are read as wall-clock time in the user's zone.
   */
  toUtc(value: Date | string): Date {
    if (value instanceof Date) {
      return assertValid(value, value);
    }
    const local = naiveToIsoLocal(value);
    if (local) {
      return assertValid(fromZonedTime(local, this.zone), value);
    }
    return assertValid(new Date(value), value);
  }

  /**
   * Storage form: UTC "YYYY-MM-DD HH:MM:SS"
   */
  formatForStorage(value: Date | string): string {
    return formatInTimeZone(this.toUtc(value), 'UTC', STORAGE_FORMAT);
  }

  /**
   * Read a stored timestamp. Accepts the UTC storage form and, for rows
   * written by older versions, ISO-8601 with an offset.
   */
  parseFromStorage(value: string): Date {
    return this.readAsUtc(value);
  }

  /**
   * Human-readable time in the user's zone
   *
   * @param pattern - date-fns format pattern (default "yyyy-MM-dd hh:mm a")
   */
  formatForDisplay(value: Date | string, pattern: string = 'yyyy-MM-dd hh:mm a'): string {
    return formatInTimeZone(this.readAsUtc(value), this.zone, pattern);
  }

  /**
   * ISO-8601 with the user's offset, e.g. "2024-03-11T12:00:00-05:00"
   */
  toIsoInZone(value: Date | string): string {
    return formatInTimeZone(this.readAsUtc(value), this.zone, "yyyy-MM-dd'T'HH:mm:ssXXX");
  }

  /**
   * SQLite datetime() modifier that shifts UTC into the user's zone.
   *
   * SQLite takes one modifier per argument, so offsets that aren't whole
   * hours are expressed in minutes ("+330 minutes" for Asia/Kolkata).
   * The offset is taken at a single instant; ranges spanning a DST change
   * are bucketed with that one offset.
   */
  offsetModifier(at: Date = this.clock()): string {
    const totalMinutes = Math.round(getTimezoneOffset(this.zone, at) / 60000);
    const sign = totalMinutes < 0 ? '-' : '+';
    const magnitude = Math.abs(totalMinutes);

    if (magnitude % 60 === 0) {
      return `${sign}${magnitude / 60} hours`;
    }
    return `${sign}${magnitude} minutes`;
  }

  /**
   * Today's date ("YYYY-MM-DD") in the user's zone
   */
  today(at: Date = this.clock()): string {
    return formatInTimeZone(at, this.zone, 'yyyy-MM-dd');
  }

  private readAsUtc(value: Date | string): Date {
    if (value instanceof Date) {
      return assertValid(value, value);
    }
    const local = naiveToIsoLocal(value);
    if (local) {
      return assertValid(new Date(`${local}Z`), value);
    }
    return assertValid(new Date(value), value);
  }
}
