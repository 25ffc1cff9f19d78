// src/utils/resultValidator.ts

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { stripCodeFences, type CompletionClient } from '../lib/llm.js';
import type { TimezoneNormalizer } from '../lib/timezone.js';
import { VALIDATION_MAX_TOKENS, VALIDATION_TEMPERATURE } from '../config/assistant.js';
import type { ActionKind, CalendarEvent, ValidationOutcome } from '../types/calendar.js';

const SYSTEM_PROMPT = 'You are a validation agent. Return only valid JSON.';

const verdictSchema = z.object({
  valid: z.boolean(),
  message: z.string().default(''),
});

/**
 * Post-mutation check: does the cached result match what the user asked for?
 *
 * Advisory only. Any failure inside the check reports valid so it never
 * blocks a mutation that already happened.
 */
export class ResultValidator {
  constructor(
    private readonly client: CompletionClient,
    private readonly timezone: TimezoneNormalizer,
    private readonly logger: FastifyBaseLogger
  ) {}

  /**
   * @param event - The cached event after the mutation, or null if it's gone
   */
  async validate(
    utterance: string,
    action: ActionKind,
    event: CalendarEvent | null
  ): Promise<ValidationOutcome> {
    const eventInfo = event
      ? `Summary: ${event.summary || 'N/A'}, Start: ${this.timezone.formatForDisplay(event.start)}, End: ${this.timezone.formatForDisplay(event.end)}`
      : 'Event not found or was deleted';

    const prompt = `User requested: "${utterance}"
Action performed: ${action}
Result in database: ${eventInfo}

Check if the action result matches what the user requested. Return JSON:
{"valid": true/false, "message": "explanation"}

If the result doesn't match the user's request, set valid to false.`;

    try {
      const raw = await this.client.complete({
        system: SYSTEM_PROMPT,
        prompt,
        temperature: VALIDATION_TEMPERATURE,
        maxTokens: VALIDATION_MAX_TOKENS,
      });

      const verdict = verdictSchema.parse(JSON.parse(stripCodeFences(raw)));
      if (!verdict.valid) {
        this.logger.warn({ action, message: verdict.message }, 'Mutation result did not match request');
      }
      return verdict;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.debug({ err: error }, 'Validation check failed, treating as valid');
      return { valid: true, message: `Validation error: ${detail}` };
    }
  }
}
