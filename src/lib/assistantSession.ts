// src/lib/assistantSession.ts
import { join } from 'path';
import { rmSync } from 'fs';
import type { FastifyBaseLogger } from 'fastify';
import type { OAuth2Client } from 'google-auth-library';
import type { AppConfig } from '../config/env.js';
import type { CompletionClient } from './llm.js';
import { TimezoneNormalizer } from './timezone.js';
import { createCalendarAssistant, type AssistantHooks, type CalendarAssistant } from './assistant.js';
import { EventCache } from '../db/eventDb.js';
import { GoogleCalendarProvider } from '../utils/calendarProvider.js';

/**
 * Everything one signed-in user's requests run against
 */
export interface AssistantSession {
  assistant: CalendarAssistant;
  timezone: TimezoneNormalizer;
  cache: EventCache;
  logger: FastifyBaseLogger;
}

export type SessionFactory = (
  auth: OAuth2Client,
  sessionId: string,
  logger: FastifyBaseLogger
) => Promise<AssistantSession>;

export interface SessionFactoryOptions {
  config: Pick<AppConfig, 'cacheDir' | 'syncEventLimit' | 'google'>;
  client: CompletionClient;
  hooks?: AssistantHooks;
  /** Fixed zone instead of the calendar's own setting */
  timezone?: string;
}

/**
 * Cache file for a session
 */
export function cachePathFor(cacheDir: string, sessionId: string): string {
  return join(cacheDir, `events-${sessionId}.db`);
}

/**
 * Build the session factory used after login.
 *
 * Each session gets the calendar's timezone (UTC if it can't be read), its
 * own cache file and a logger bound to the session, and starts with a full
 * resync.
 */
export function createSessionFactory(options: SessionFactoryOptions): SessionFactory {
  const { config, client, hooks } = options;

  return async (auth, sessionId, parentLogger) => {
    const logger = parentLogger.child({ sessionId: sessionId.slice(0, 8) });
    const timezone = new TimezoneNormalizer('UTC', logger);
    const provider = new GoogleCalendarProvider(auth, config.google.calendarId, timezone);

    if (options.timezone) {
      timezone.setTimezone(options.timezone);
    } else {
      try {
        timezone.setTimezone(await provider.getTimezone());
      } catch (error) {
        logger.warn({ err: error }, 'Could not read calendar timezone, using UTC');
      }
    }

    const cache = new EventCache(cachePathFor(config.cacheDir, sessionId), timezone, logger);
    const assistant = createCalendarAssistant({
      client,
      provider,
      cache,
      timezone,
      logger,
      syncLimit: config.syncEventLimit,
      hooks,
    });

    await assistant.resync();
    logger.info({ timezone: timezone.timezone }, 'Assistant session ready');

    return { assistant, timezone, cache, logger };
  };
}

/**
 * Close the session's cache and delete its files
 */
export function disposeAssistantSession(session: AssistantSession): void {
  session.cache.close();

  if (session.cache.dbPath === ':memory:') {
    return;
  }
  for (const suffix of ['', '-wal', '-shm']) {
    rmSync(`${session.cache.dbPath}${suffix}`, { force: true });
  }
  session.logger.info('Assistant session disposed');
}
