// src/utils/eventSyncService.ts

import type { FastifyBaseLogger } from 'fastify';
import type { CalendarProvider } from './calendarProvider.js';
import type { EventCache } from '../db/eventDb.js';
import type { CalendarEvent } from '../types/calendar.js';

export interface ResyncResult {
  fetched: number;
  written: number;
  events: CalendarEvent[];
}

/**
 * Mirror the provider's upcoming events into the session cache.
 *
 * Fetches first and only then swaps the cache contents, so a failed fetch
 * leaves the previous projection in place.
 *
 * @param limit - Number of upcoming events to mirror
 * @returns Sync statistics plus the fetched events (empty if the fetch failed)
 */
export async function resyncEventCache(
  provider: CalendarProvider,
  cache: EventCache,
  limit: number,
  logger: FastifyBaseLogger
): Promise<ResyncResult> {
  let events: CalendarEvent[];
  try {
    events = await provider.listUpcoming(limit);
  } catch (error) {
    logger.warn({ err: error }, 'Resync fetch failed, keeping cached events');
    return { fetched: 0, written: 0, events: [] };
  }

  const written = cache.replaceAll(events);
  logger.info({ fetched: events.length, written }, 'Event cache resynced');

  return { fetched: events.length, written, events };
}
