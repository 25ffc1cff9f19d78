// src/parsers/queryTranslator.ts

import type { FastifyBaseLogger } from 'fastify';
import { stripCodeFences, type CompletionClient } from '../lib/llm.js';
import { LLM_MAX_TOKENS, LLM_TEMPERATURE } from '../config/assistant.js';

const SYSTEM_PROMPT = 'You are a SQL query generator. Return ONLY valid SQL, no explanations.';

/**
 * Add days to a "YYYY-MM-DD" string, calendar arithmetic only
 */
export function shiftDate(isoDate: string, days: number): string {
  const date = new Date(`${isoDate}T00:00:00Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}

/**
 * Build the translation prompt. Examples compare user-local dates against
 * literal dates derived from userToday, never against SQLite's 'now'.
 */
export function buildQueryPrompt(
  utterance: string,
  schemaDescription: string,
  modifier: string,
  userToday: string
): string {
  const localDate = `date(datetime(start_time, '${modifier}'))`;
  const localTime = `time(datetime(start_time, '${modifier}'))`;
  const tomorrow = shiftDate(userToday, 1);
  const weekEnd = shiftDate(userToday, 7);

  return `Convert this natural language query to SQL for the events table.

Schema:
${schemaDescription}

User query: "${utterance}"

Return ONLY a valid SQL SELECT query. Use SQLite syntax.
IMPORTANT:
- Always select whole rows with SELECT * FROM events
- Timestamps are stored in UTC format (YYYY-MM-DD HH:MM:SS) in the database
- Use datetime() with timezone modifier '${modifier}' to convert UTC to user timezone
- Then use date() to extract date part for comparisons
- Current date in user timezone: ${userToday}
- Compare against literal dates; do not use 'now'

Examples:
- "show all events" -> SELECT * FROM events ORDER BY start_time
- "events today" -> SELECT * FROM events WHERE ${localDate} = '${userToday}' ORDER BY start_time
- "events tomorrow" -> SELECT * FROM events WHERE ${localDate} = '${tomorrow}' ORDER BY start_time
- "events tomorrow after 5pm" -> SELECT * FROM events WHERE ${localDate} = '${tomorrow}' AND ${localTime} > '17:00:00' ORDER BY start_time
- "meetings with john" -> SELECT * FROM events WHERE attendees LIKE '%john%' ORDER BY start_time
- "events this week" -> SELECT * FROM events WHERE ${localDate} >= '${userToday}' AND ${localDate} <= '${weekEnd}' ORDER BY start_time

SQL query:`;
}

/**
 * Translates questions about the calendar into SQL over the event cache
 */
export class QueryTranslator {
  constructor(
    private readonly client: CompletionClient,
    private readonly logger: FastifyBaseLogger
  ) {}

  /**
   * @param modifier - SQLite offset modifier for the user's zone, e.g. "-5 hours"
   * @param userToday - Today in the user's zone ("YYYY-MM-DD")
   * @returns SQL text, or null if no query could be produced
   */
  async toQuery(
    utterance: string,
    schemaDescription: string,
    modifier: string,
    userToday: string
  ): Promise<string | null> {
    try {
      const raw = await this.client.complete({
        system: SYSTEM_PROMPT,
        prompt: buildQueryPrompt(utterance, schemaDescription, modifier, userToday),
        temperature: LLM_TEMPERATURE,
        maxTokens: LLM_MAX_TOKENS,
      });

      const sql = stripCodeFences(raw);
      if (!sql) {
        this.logger.warn('Query translation returned nothing');
        return null;
      }

      this.logger.debug({ sql }, 'Translated query');
      return sql;
    } catch (error) {
      this.logger.warn({ err: error }, 'Query translation failed');
      return null;
    }
  }
}
