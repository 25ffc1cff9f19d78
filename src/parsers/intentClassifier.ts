// src/parsers/intentClassifier.ts

import type { FastifyBaseLogger } from 'fastify';
import type { CompletionClient } from '../lib/llm.js';
import { INTENT_MAX_TOKENS, INTENT_TEMPERATURE } from '../config/assistant.js';
import { INTENTS, type Intent } from '../types/calendar.js';

const SYSTEM_PROMPT = 'You are an intent classifier. Return only the intent word.';

function buildPrompt(utterance: string): string {
  return `Classify the user's intent into one of these categories:
- 'query': User wants information about events (e.g., "show events", "what's on my calendar", "events tomorrow")
- 'create': User wants to create a new event (e.g., "schedule a meeting", "create event", "add appointment")
- 'modify': User wants to modify an existing event (e.g., "change time", "update event", "reschedule")
- 'cancel': User wants to cancel/delete an event (e.g., "cancel meeting", "delete event", "remove appointment")
- 'quit': User wants to stop/exit/quit the application (e.g., "quit", "exit", "stop", "bye", "goodbye", "I'm done")

User query: "${utterance}"

Return ONLY one word: query, create, modify, cancel, or quit`;
}

function isIntent(value: string): value is Intent {
  return INTENTS.some((intent) => intent === value);
}

/**
 * Normalize raw model output: trim, lowercase, drop surrounding quotes
 * and trailing punctuation ("Create." -> "create")
 */
export function normalizeIntent(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/^['"`]+|['"`]+$/g, '')
    .replace(/[.!?,;:]+$/, '')
    .trim();
}

/**
 * Classifies an utterance into one of the assistant's intents.
 * Anything unrecognized, including model errors, is treated as a query.
 */
export class IntentClassifier {
  constructor(
    private readonly client: CompletionClient,
    private readonly logger: FastifyBaseLogger
  ) {}

  async classify(utterance: string): Promise<Intent> {
    try {
      const raw = await this.client.complete({
        system: SYSTEM_PROMPT,
        prompt: buildPrompt(utterance),
        temperature: INTENT_TEMPERATURE,
        maxTokens: INTENT_MAX_TOKENS,
      });

      const intent = normalizeIntent(raw);
      if (isIntent(intent)) {
        return intent;
      }

      this.logger.debug({ raw }, 'Unrecognized intent, defaulting to query');
      return 'query';
    } catch (error) {
      this.logger.warn({ err: error }, 'Intent classification failed, defaulting to query');
      return 'query';
    }
  }
}
