// src/utils/conflictDetector.ts

import type { FastifyBaseLogger } from 'fastify';
import type { CalendarProvider } from './calendarProvider.js';
import type { Conflict } from '../types/calendar.js';

interface TimeRange {
  start: Date;
  end: Date;
}

/**
 * Half-open overlap: ranges that only touch at an endpoint don't overlap
 */
export function rangesOverlap(a: TimeRange, b: TimeRange): boolean {
  return a.start.getTime() < b.end.getTime() && a.end.getTime() > b.start.getTime();
}

/**
 * Finds existing provider events that overlap a proposed time range
 */
export class ConflictDetector {
  constructor(
    private readonly provider: CalendarProvider,
    private readonly logger: FastifyBaseLogger
  ) {}

  /**
   * @param excludeId - Event being modified, so it doesn't conflict with itself
   * @returns Overlapping events, or [] if the provider can't be reached
   */
  async findConflicts(start: Date, end: Date, excludeId?: string): Promise<Conflict[]> {
    try {
      const candidates = await this.provider.listRange(start, end);

      return candidates
        .filter((event) => event.id !== excludeId)
        .filter((event) => rangesOverlap({ start, end }, event))
        .map((event) => ({
          id: event.id,
          summary: event.summary,
          start: event.start,
          end: event.end,
          location: event.location,
        }));
    } catch (error) {
      this.logger.warn({ err: error }, 'Conflict check failed, continuing without it');
      return [];
    }
  }
}
