// src/utils/calendarMutator.ts

import type { FastifyBaseLogger } from 'fastify';
import type { CalendarProvider } from './calendarProvider.js';
import type { CalendarEvent, EventWrite, MutationResult } from '../types/calendar.js';

/**
 * Changes to an existing event, already resolved to instants.
 * Absent keys are left as they are; empty strings clear the field.
 */
export type EventChanges = Partial<Omit<EventWrite, 'allDay'>>;

/**
 * Keep the original duration when only the start moves
 */
export function inferEnd(original: { start: Date; end: Date }, newStart: Date): Date {
  const duration = original.end.getTime() - original.start.getTime();
  return new Date(newStart.getTime() + duration);
}

/**
 * Apply changes on top of an existing event.
 * A new start or end turns an all-day event into a timed one.
 */
export function mergeChanges(original: CalendarEvent, changes: EventChanges): EventWrite {
  const start = changes.start ?? original.start;
  let end = changes.end ?? original.end;
  if (changes.start && !changes.end) {
    end = inferEnd(original, changes.start);
  }

  return {
    summary: changes.summary ?? original.summary,
    description: changes.description ?? original.description,
    location: changes.location ?? original.location,
    attendees: changes.attendees ?? original.attendees,
    start,
    end,
    allDay: original.allDay && !changes.start && !changes.end,
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Applies create/modify/cancel to the provider and reports a uniform result.
 * No retries: a provider error is returned as success: false.
 */
export class CalendarMutator {
  constructor(
    private readonly provider: CalendarProvider,
    private readonly logger: FastifyBaseLogger
  ) {}

  async create(input: EventWrite): Promise<MutationResult> {
    try {
      const created = await this.provider.insertEvent(input);
      this.logger.info({ eventId: created.id }, 'Event created');

      return {
        success: true,
        eventId: created.id,
        summary: created.summary,
        message: `Event '${created.summary}' created successfully`,
      };
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to create event');
      const detail = describeError(error);
      return { success: false, message: `Failed to create event: ${detail}`, error: detail };
    }
  }

  /**
   * Read the event, merge the changes over it and write it back.
   * Moving only the start keeps the original duration.
   */
  async modify(eventId: string, changes: EventChanges): Promise<MutationResult> {
    try {
      const original = await this.provider.getEvent(eventId);
      const updated = await this.provider.updateEvent(eventId, mergeChanges(original, changes));
      this.logger.info({ eventId, fields: Object.keys(changes) }, 'Event updated');

      return {
        success: true,
        eventId: updated.id,
        summary: updated.summary,
        message: `Event '${updated.summary}' updated successfully`,
      };
    } catch (error) {
      this.logger.error({ err: error, eventId }, 'Failed to modify event');
      const detail = describeError(error);
      return { success: false, eventId, message: `Failed to modify event: ${detail}`, error: detail };
    }
  }

  async cancel(eventId: string): Promise<MutationResult> {
    try {
      const existing = await this.provider.getEvent(eventId);
      await this.provider.deleteEvent(eventId);
      this.logger.info({ eventId }, 'Event cancelled');

      return {
        success: true,
        eventId,
        summary: existing.summary,
        message: `Event '${existing.summary}' cancelled successfully`,
      };
    } catch (error) {
      this.logger.error({ err: error, eventId }, 'Failed to cancel event');
      const detail = describeError(error);
      return { success: false, eventId, message: `Failed to cancel event: ${detail}`, error: detail };
    }
  }
}
