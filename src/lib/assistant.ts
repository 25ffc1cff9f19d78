// src/lib/assistant.ts

import type { FastifyBaseLogger } from 'fastify';
import type { CompletionClient } from './llm.js';
import type { TimezoneNormalizer } from './timezone.js';
import { CacheQueryError, type EventCache } from '../db/eventDb.js';
import { IntentClassifier } from '../parsers/intentClassifier.js';
import { ActionParser } from '../parsers/actionParser.js';
import { QueryTranslator } from '../parsers/queryTranslator.js';
import type { CalendarProvider } from '../utils/calendarProvider.js';
import { ConflictDetector } from '../utils/conflictDetector.js';
import { CalendarMutator, mergeChanges, type EventChanges } from '../utils/calendarMutator.js';
import { ResultValidator } from '../utils/resultValidator.js';
import { Responder } from '../utils/responder.js';
import { resyncEventCache } from '../utils/eventSyncService.js';
import type {
  ActionKind,
  AssistantTurn,
  CachedEvent,
  CalendarEvent,
  EventView,
  Intent,
  MutationResult,
} from '../types/calendar.js';

export const GOODBYE = 'Goodbye!';
export const INVALID_RANGE = 'The end time must be after the start time.';

/**
 * Optional observers, used for metrics
 */
export interface AssistantHooks {
  onIntent?(intent: Intent): void;
  onMutation?(action: ActionKind, success: boolean): void;
}

export interface AssistantComponents {
  provider: CalendarProvider;
  cache: EventCache;
  timezone: TimezoneNormalizer;
  classifier: IntentClassifier;
  parser: ActionParser;
  translator: QueryTranslator;
  detector: ConflictDetector;
  mutator: CalendarMutator;
  validator: ResultValidator;
  responder: Responder;
  logger: FastifyBaseLogger;
  syncLimit: number;
  hooks?: AssistantHooks;
}

function couldNotUnderstand(reason: string): string {
  return `Sorry, I couldn't understand that request: ${reason}`;
}

/**
 * Routes one utterance through classification, extraction, the provider
 * and the cache, and produces the reply for that turn.
 */
export class CalendarAssistant {
  constructor(private readonly c: AssistantComponents) {}

  get timezone(): TimezoneNormalizer {
    return this.c.timezone;
  }

  async handle(utterance: string): Promise<AssistantTurn> {
    const intent = await this.c.classifier.classify(utterance);
    this.c.hooks?.onIntent?.(intent);
    this.c.logger.info({ intent }, 'Handling request');

    switch (intent) {
      case 'quit':
        return { intent, response: GOODBYE, events: [] };
      case 'create':
        return this.handleCreate(utterance);
      case 'modify':
        return this.handleModify(utterance);
      case 'cancel':
        return this.handleCancel(utterance);
      case 'query':
        return this.handleQuery(utterance);
    }
  }

  /**
   * Live upcoming events from the provider, or [] if it can't be reached
   */
  async listUpcoming(): Promise<CalendarEvent[]> {
    try {
      return await this.c.provider.listUpcoming(this.c.syncLimit);
    } catch (error) {
      this.c.logger.warn({ err: error }, 'Could not fetch upcoming events');
      return [];
    }
  }

  /**
   * Rebuild the cache from the provider
   */
  async resync(): Promise<CalendarEvent[]> {
    const result = await resyncEventCache(
      this.c.provider,
      this.c.cache,
      this.c.syncLimit,
      this.c.logger
    );
    return result.events;
  }

  toView(event: CalendarEvent): EventView {
    return {
      id: event.id,
      summary: event.summary,
      start: this.c.timezone.toIsoInZone(event.start),
      end: this.c.timezone.toIsoInZone(event.end),
      location: event.location,
      description: event.description,
    };
  }

  private async handleQuery(utterance: string): Promise<AssistantTurn> {
    const { cache, timezone, translator, responder, logger } = this.c;
    const live = await this.listUpcoming();

    let schema: string;
    try {
      schema = cache.describeSchema();
    } catch (error) {
      logger.warn({ err: error }, 'Cache unavailable, answering from live events');
      return this.answerFromLive(utterance, live);
    }

    const sql = await translator.toQuery(
      utterance,
      schema,
      timezone.offsetModifier(),
      timezone.today()
    );

    if (!sql) {
      return this.answerFromLive(utterance, live);
    }

    let matches: CalendarEvent[];
    try {
      matches = cache.query(sql);
    } catch (error) {
      if (!(error instanceof CacheQueryError)) {
        throw error;
      }
      logger.warn({ err: error, sql }, 'Cache query failed, answering from live events');
      return this.answerFromLive(utterance, live);
    }

    logger.info({ sql, matches: matches.length }, 'Cache query executed');
    return {
      intent: 'query',
      response: await responder.respond(utterance, matches),
      events: matches.map((event) => this.toView(event)),
      query: sql,
    };
  }

  private async answerFromLive(utterance: string, live: CalendarEvent[]): Promise<AssistantTurn> {
    return {
      intent: 'query',
      response: await this.c.responder.answer(utterance, live),
      events: live.map((event) => this.toView(event)),
    };
  }

  private async handleCreate(utterance: string): Promise<AssistantTurn> {
    const { parser, timezone, detector, responder, mutator } = this.c;

    const extraction = await parser.extractCreate(utterance, timezone.today());
    if (!extraction.ok) {
      return this.reply('create', couldNotUnderstand(extraction.reason));
    }
    const payload = extraction.payload;

    let start: Date;
    let end: Date;
    try {
      start = timezone.toUtc(payload.start);
      end = timezone.toUtc(payload.end);
    } catch (error) {
      return this.reply('create', couldNotUnderstand(describeError(error)));
    }

    if (start.getTime() >= end.getTime()) {
      return this.reply('create', INVALID_RANGE);
    }

    const conflicts = await detector.findConflicts(start, end);
    if (conflicts.length > 0) {
      const message = await responder.describeConflicts(
        utterance,
        { summary: payload.summary, start, end },
        conflicts
      );
      return this.reply('create', message);
    }

    const result = await mutator.create({
      summary: payload.summary,
      description: payload.description,
      location: payload.location,
      attendees: payload.attendees,
      start,
      end,
      allDay: false,
    });

    return this.finishMutation('create', utterance, result);
  }

  private async handleModify(utterance: string): Promise<AssistantTurn> {
    const { parser, timezone, detector, responder, mutator, provider, logger } = this.c;
    const live = await this.listUpcoming();

    const extraction = await parser.extractModify(utterance, live);
    if (!extraction.ok) {
      return this.reply('modify', couldNotUnderstand(extraction.reason));
    }
    const payload = extraction.payload;

    const changes: EventChanges = {};
    if (payload.summary !== undefined) changes.summary = payload.summary;
    if (payload.description !== undefined) changes.description = payload.description;
    if (payload.location !== undefined) changes.location = payload.location;
    if (payload.attendees !== undefined) changes.attendees = payload.attendees;
    try {
      if (payload.start !== undefined) changes.start = timezone.toUtc(payload.start);
      if (payload.end !== undefined) changes.end = timezone.toUtc(payload.end);
    } catch (error) {
      return this.reply('modify', couldNotUnderstand(describeError(error)));
    }

    if (changes.start || changes.end) {
      let original = live.find((event) => event.id === payload.eventId) ?? null;
      if (!original) {
        try {
          original = await provider.getEvent(payload.eventId);
        } catch (error) {
          logger.warn({ err: error, eventId: payload.eventId }, 'Could not read event before modify');
        }
      }

      // Without the original, only a fully specified range can be checked
      const range = original
        ? mergeChanges(original, changes)
        : changes.start && changes.end
          ? { start: changes.start, end: changes.end, summary: changes.summary ?? 'Event' }
          : null;

      if (range) {
        if (range.start.getTime() >= range.end.getTime()) {
          return this.reply('modify', INVALID_RANGE);
        }

        const conflicts = await detector.findConflicts(range.start, range.end, payload.eventId);
        if (conflicts.length > 0) {
          const message = await responder.describeConflicts(utterance, range, conflicts);
          return this.reply('modify', message);
        }
      }
    }

    const result = await mutator.modify(payload.eventId, changes);
    return this.finishMutation('modify', utterance, result, payload.eventId);
  }

  private async handleCancel(utterance: string): Promise<AssistantTurn> {
    const live = await this.listUpcoming();

    const extraction = await this.c.parser.extractCancel(utterance, live);
    if (!extraction.ok) {
      return this.reply('cancel', couldNotUnderstand(extraction.reason));
    }

    const result = await this.c.mutator.cancel(extraction.payload.eventId);
    return this.finishMutation('cancel', utterance, result, extraction.payload.eventId);
  }

  /**
   * Resync after a successful mutation, then check the cached result
   * against the request. A mismatch is reported, not rolled back.
   */
  private async finishMutation(
    action: ActionKind,
    utterance: string,
    result: MutationResult,
    requestedId?: string
  ): Promise<AssistantTurn> {
    this.c.hooks?.onMutation?.(action, result.success);

    if (!result.success) {
      const response = result.error
        ? `${result.message} Error details: ${result.error}`
        : result.message;
      return this.reply(action, response);
    }

    const fresh = await this.resync();
    const eventId = result.eventId ?? requestedId;

    let cached: CachedEvent | null = null;
    let cacheReadable = true;
    try {
      cached = eventId ? this.c.cache.getById(eventId) : null;
    } catch (error) {
      cacheReadable = false;
      this.c.logger.warn({ err: error, eventId }, 'Cache unavailable, skipping validation');
    }

    let response = result.message;
    if (cacheReadable && (cached || action === 'cancel')) {
      const verdict = await this.c.validator.validate(utterance, action, cached);
      if (!verdict.valid) {
        response = `${result.message} Warning: ${verdict.message}`;
      }
    }

    return {
      intent: action,
      response,
      events: fresh.map((event) => this.toView(event)),
    };
  }

  private reply(intent: Intent, response: string): AssistantTurn {
    return { intent, response, events: [] };
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface AssistantOptions {
  client: CompletionClient;
  provider: CalendarProvider;
  cache: EventCache;
  timezone: TimezoneNormalizer;
  logger: FastifyBaseLogger;
  syncLimit: number;
  hooks?: AssistantHooks;
}

/**
 * Wire the pipeline components around one completion client
 */
export function createCalendarAssistant(options: AssistantOptions): CalendarAssistant {
  const { client, provider, timezone, logger } = options;

  return new CalendarAssistant({
    ...options,
    classifier: new IntentClassifier(client, logger),
    parser: new ActionParser(client, timezone, logger),
    translator: new QueryTranslator(client, logger),
    detector: new ConflictDetector(provider, logger),
    mutator: new CalendarMutator(provider, logger),
    validator: new ResultValidator(client, timezone, logger),
    responder: new Responder(client, timezone, logger),
  });
}
