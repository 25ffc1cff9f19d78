// src/parsers/actionParser.ts

import type { FastifyBaseLogger } from 'fastify';
import type { z } from 'zod';
import { compareTwoStrings } from 'string-similarity';
import { stripCodeFences, type CompletionClient } from '../lib/llm.js';
import type { TimezoneNormalizer } from '../lib/timezone.js';
import {
  EVENT_MATCH_THRESHOLD,
  LLM_MAX_TOKENS,
  LLM_TEMPERATURE,
  MAX_EVENTS_FOR_PARSER,
} from '../config/assistant.js';
import { cancelActionSchema, createActionSchema, modifyActionSchema } from './actionSchemas.js';
import type {
  CalendarEvent,
  CancelPayload,
  CreatePayload,
  ExtractionResult,
  ModifyPayload,
} from '../types/calendar.js';

const SYSTEM_PROMPT =
  'You are a calendar event parser. Return ONLY valid JSON, no explanations, no markdown, just the JSON object.';

type JsonResult<T> = { ok: true; data: T } | { ok: false; reason: string };

/**
 * Turns free-text requests into structured create/modify/cancel payloads.
 *
 * Never throws: every failure comes back as { ok: false, reason }.
 */
export class ActionParser {
  constructor(
    private readonly client: CompletionClient,
    private readonly timezone: TimezoneNormalizer,
    private readonly logger: FastifyBaseLogger
  ) {}

  /**
   * Extract a new event.
   *
   * @param currentDate - Today in the user's zone ("YYYY-MM-DD"), used to resolve relative dates
   */
  async extractCreate(
    utterance: string,
    currentDate: string
  ): Promise<ExtractionResult<CreatePayload>> {
    const prompt = `Extract event details from this query to create a calendar event.

Current date: ${currentDate}

User query: "${utterance}"

Return a JSON object with:
- summary: Event title/name
- start_time: Start time in format "YYYY-MM-DD HH:MM" (24-hour format). Use the CURRENT DATE or calculate relative dates (today, tomorrow) based on the current date provided.
- end_time: End time in format "YYYY-MM-DD HH:MM" (24-hour format, default to 1 hour after start_time if not specified)
- description: Event description (optional, empty string if not provided)
- location: Event location (optional, empty string if not provided)
- attendees: List of email addresses (optional, empty list if not provided)

IMPORTANT:
- Always use the current date provided to calculate relative dates like "tomorrow"
- Always provide both start_time and end_time. If end_time is not specified, default to 1 hour after start_time.
- Return ONLY valid JSON.`;

    const result = await this.requestJson(prompt, createActionSchema);
    if (!result.ok) {
      return result;
    }

    const data = result.data;
    return {
      ok: true,
      payload: {
        kind: 'create',
        summary: data.summary?.trim() || 'Event',
        start: data.start_time,
        end: data.end_time,
        description: data.description ?? '',
        location: data.location ?? '',
        attendees: data.attendees ?? [],
      },
    };
  }

  /**
   * Extract which event to change and the fields to change.
   * Fields the model leaves null are omitted from the payload.
   */
  async extractModify(
    utterance: string,
    knownEvents: CalendarEvent[]
  ): Promise<ExtractionResult<ModifyPayload>> {
    const prompt = `Extract modification details from this query.

Available events:
${this.formatKnownEvents(knownEvents)}

User query: "${utterance}"

Return a JSON object with:
- event_id: ID of event to modify (from available events or user description)
- summary: New title (optional, null if not changing)
- start_time: New start time in format "YYYY-MM-DD HH:MM" (optional, null if not changing)
- end_time: New end time in format "YYYY-MM-DD HH:MM" (optional, null if not changing)
- description: New description (optional, null if not changing)
- location: New location (optional, null if not changing)
- attendees: New list of emails (optional, null if not changing)

Return ONLY valid JSON.`;

    const result = await this.requestJson(prompt, modifyActionSchema);
    if (!result.ok) {
      return result;
    }

    const data = result.data;
    if (!data.event_id) {
      return { ok: false, reason: 'Could not identify which event to modify' };
    }

    const payload: ModifyPayload = {
      kind: 'modify',
      eventId: this.resolveEventId(data.event_id, knownEvents),
    };

    // The provider requires a title, so an empty summary means "keep it"
    if (data.summary) payload.summary = data.summary;
    if (data.start_time) payload.start = data.start_time;
    if (data.end_time) payload.end = data.end_time;
    if (data.description != null) payload.description = data.description;
    if (data.location != null) payload.location = data.location;
    if (data.attendees != null) payload.attendees = data.attendees;

    return { ok: true, payload };
  }

  async extractCancel(
    utterance: string,
    knownEvents: CalendarEvent[]
  ): Promise<ExtractionResult<CancelPayload>> {
    const prompt = `Extract event to cancel from this query.

Available events:
${this.formatKnownEvents(knownEvents)}

User query: "${utterance}"

Return a JSON object with:
- event_id: ID of event to cancel (from available events or user description)

Return ONLY valid JSON.`;

    const result = await this.requestJson(prompt, cancelActionSchema);
    if (!result.ok) {
      return result;
    }

    if (!result.data.event_id) {
      return { ok: false, reason: 'Could not identify which event to cancel' };
    }

    return {
      ok: true,
      payload: {
        kind: 'cancel',
        eventId: this.resolveEventId(result.data.event_id, knownEvents),
      },
    };
  }

  /**
   * Map a model-supplied reference onto a known event id.
   * Exact ids win; otherwise the closest summary above the similarity
   * threshold; otherwise the raw value is passed through.
   */
  resolveEventId(reference: string, knownEvents: CalendarEvent[]): string {
    if (knownEvents.some((event) => event.id === reference)) {
      return reference;
    }

    const needle = reference.toLowerCase();
    let bestId: string | null = null;
    let bestScore = EVENT_MATCH_THRESHOLD;

    for (const event of knownEvents) {
      const score = compareTwoStrings(needle, event.summary.toLowerCase());
      if (score > bestScore) {
        bestScore = score;
        bestId = event.id;
      }
    }

    if (bestId) {
      this.logger.debug({ reference, eventId: bestId, score: bestScore }, 'Resolved event by title');
      return bestId;
    }
    return reference;
  }

  /**
   * "- <id>: <summary> on <YYYY-MM-DD hh:mm AM/PM>" per event, user zone
   */
  formatKnownEvents(knownEvents: CalendarEvent[]): string {
    if (knownEvents.length === 0) {
      return 'No events found.';
    }
    return knownEvents
      .slice(0, MAX_EVENTS_FOR_PARSER)
      .map(
        (event) =>
          `- ${event.id}: ${event.summary} on ${this.timezone.formatForDisplay(event.start)}`
      )
      .join('\n');
  }

  private async requestJson<S extends z.ZodTypeAny>(
    prompt: string,
    schema: S
  ): Promise<JsonResult<z.infer<S>>> {
    let raw: string;
    try {
      raw = await this.client.complete({
        system: SYSTEM_PROMPT,
        prompt,
        temperature: LLM_TEMPERATURE,
        maxTokens: LLM_MAX_TOKENS,
      });
    } catch (error) {
      this.logger.error({ err: error }, 'Action extraction call failed');
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }

    const content = stripCodeFences(raw);
    if (!content) {
      return { ok: false, reason: 'Empty response from LLM' };
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      this.logger.warn({ raw }, 'Action extraction returned invalid JSON');
      return {
        ok: false,
        reason: `Invalid JSON response: ${error instanceof Error ? error.message : String(error)}`,
      };
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'response'}: ${issue.message}`)
        .join('; ');
      this.logger.warn({ issues: parsed.error.issues }, 'Action extraction failed validation');
      return { ok: false, reason: `Invalid response: ${details}` };
    }

    return { ok: true, data: parsed.data };
  }
}
