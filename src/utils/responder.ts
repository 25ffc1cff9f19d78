// src/utils/responder.ts

import type { FastifyBaseLogger } from 'fastify';
import type { CompletionClient } from '../lib/llm.js';
import type { TimezoneNormalizer } from '../lib/timezone.js';
import {
  LLM_MAX_TOKENS,
  LLM_TEMPERATURE,
  MAX_EVENTS_FOR_QA,
  MAX_EVENTS_FOR_RESPONSE,
} from '../config/assistant.js';
import type { CalendarEvent, Conflict } from '../types/calendar.js';

const ASSISTANT_PROMPT =
  'You are a helpful calendar assistant. Provide natural, conversational responses.';

export const CONFLICT_FALLBACK =
  'I found a scheduling conflict. You already have an event at that time.';

/**
 * Plain fallback when the model can't produce a reply
 */
export function fallbackReply(eventCount: number): string {
  if (eventCount > 0) {
    return `Found ${eventCount} event(s) matching your query.`;
  }
  return "I don't see any events matching your request.";
}

/**
 * Writes conversational replies about events
 */
export class Responder {
  constructor(
    private readonly client: CompletionClient,
    private readonly timezone: TimezoneNormalizer,
    private readonly logger: FastifyBaseLogger
  ) {}

  /**
   * Reply to a question from cache query results
   */
  async respond(utterance: string, events: CalendarEvent[]): Promise<string> {
    const lines = events.slice(0, MAX_EVENTS_FOR_RESPONSE).map((event) => {
      const day = this.timezone.formatForDisplay(event.start, 'MMMM dd');
      const from = this.timezone.formatForDisplay(event.start, 'hh:mm a');
      const to = this.timezone.formatForDisplay(event.end, 'hh:mm a');
      const at = event.location ? ` at ${event.location}` : '';
      return `- ${event.summary} on ${day} from ${from} to ${to}${at}`;
    });

    const prompt = `User asked: "${utterance}"

Query results:
${lines.length > 0 ? lines.join('\n') : 'No events found.'}

Generate a natural, conversational response to the user's question based on these results. Be concise and friendly.`;

    return this.reply(prompt, events.length);
  }

  /**
   * Answer a question straight from the live event list, used when the
   * cache query can't be produced or run
   */
  async answer(utterance: string, events: CalendarEvent[]): Promise<string> {
    const lines = events
      .slice(0, MAX_EVENTS_FOR_QA)
      .map(
        (event) =>
          `- ${event.summary} on ${this.timezone.formatForDisplay(event.start, "MMMM dd 'at' hh:mm a")}`
      );

    const prompt = `Answer this question about calendar events:

User question: "${utterance}"

Events:
${lines.length > 0 ? lines.join('\n') : 'No events found.'}

Provide a clear, concise answer.`;

    return this.reply(prompt, events.length);
  }

  /**
   * Tell the user the proposed time clashes with existing events
   */
  async describeConflicts(
    utterance: string,
    proposed: { summary: string; start: Date; end: Date },
    conflicts: Conflict[]
  ): Promise<string> {
    const conflictLines = conflicts.map(
      (conflict) =>
        `- ${conflict.summary || 'Event'} from ${this.timezone.formatForDisplay(conflict.start)} to ${this.timezone.formatForDisplay(conflict.end, 'hh:mm a')}`
    );

    const prompt = `User requested: "${utterance}"

Proposed event: ${proposed.summary} from ${this.timezone.formatForDisplay(proposed.start)} to ${this.timezone.formatForDisplay(proposed.end)}

Conflicting events:
${conflictLines.join('\n')}

Generate a friendly, conversational message informing the user about the scheduling conflict. Be concise and helpful.`;

    try {
      const text = await this.complete(prompt);
      return text || CONFLICT_FALLBACK;
    } catch (error) {
      this.logger.warn({ err: error }, 'Conflict message generation failed');
      return CONFLICT_FALLBACK;
    }
  }

  private async reply(prompt: string, eventCount: number): Promise<string> {
    try {
      const text = await this.complete(prompt);
      return text || fallbackReply(eventCount);
    } catch (error) {
      this.logger.warn({ err: error }, 'Reply generation failed, using fallback');
      return fallbackReply(eventCount);
    }
  }

  private async complete(prompt: string): Promise<string> {
    const text = await this.client.complete({
      system: ASSISTANT_PROMPT,
      prompt,
      temperature: LLM_TEMPERATURE,
      maxTokens: LLM_MAX_TOKENS,
    });
    return text.trim();
  }
}
