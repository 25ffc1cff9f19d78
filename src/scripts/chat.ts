#!/usr/bin/env node
// src/scripts/chat.ts
/**
 * Terminal Chat
 * Talk to the calendar assistant from the command line
 *
 * Usage:
 *   node dist/src/scripts/chat.js
 *
 * Environment Variables:
 *   GOOGLE_REFRESH_TOKEN - Refresh token for the calendar to manage
 *   (plus the server's own configuration: Google client, AI provider, CACHE_DIR)
 */

import { createInterface, type Interface } from 'readline/promises';
import { stdin as input, stdout as output } from 'process';
import pino from 'pino';
import { loadConfig, loadEnvFile } from '../config/env.js';
import { COMMON_TIMEZONES } from '../config/assistant.js';
import { createCompletionClient } from '../lib/llm.js';
import { createRefreshTokenClient } from '../lib/googleAuth.js';
import { isValidTimezone } from '../lib/timezone.js';
import { generateSessionId } from '../lib/sessionRegistry.js';
import {
  createSessionFactory,
  disposeAssistantSession,
  type AssistantSession,
} from '../lib/assistantSession.js';

async function chooseTimezone(rl: Interface): Promise<string> {
  for (;;) {
    const answer = (
      await rl.question('Timezone (e.g. America/New_York, "list" for common zones, Enter for UTC): ')
    ).trim();

    if (!answer) {
      return 'UTC';
    }
    if (answer.toLowerCase() === 'list') {
      for (const [id, label] of COMMON_TIMEZONES) {
        console.log(`  ${id.padEnd(22)} ${label}`);
      }
      continue;
    }
    if (isValidTimezone(answer)) {
      return answer;
    }
    console.log(`Unknown timezone: ${answer}`);
  }
}

function printCachedEvents(session: AssistantSession): void {
  const events = session.cache.listAll();
  console.log(`\n[Chat] ${events.length} event(s) cached (${session.timezone.timezone}):`);

  for (const event of events) {
    const start = session.timezone.formatForDisplay(event.start);
    const end = session.timezone.formatForDisplay(event.end);
    console.log(`  - ${event.summary}: ${start} -> ${end}`);
  }
}

async function chat() {
  loadEnvFile();

  const refreshToken = process.env.GOOGLE_REFRESH_TOKEN;
  if (!refreshToken) {
    throw new Error('GOOGLE_REFRESH_TOKEN environment variable is required');
  }

  const config = loadConfig();
  const logger = pino({ level: process.env.LOG_LEVEL || 'warn' });
  const rl = createInterface({ input, output });

  try {
    const timezone = await chooseTimezone(rl);
    console.log(`[Chat] Using timezone ${timezone}. Syncing calendar...`);

    const createSession = createSessionFactory({
      config,
      client: createCompletionClient(config.ai),
      timezone,
    });
    const session = await createSession(
      createRefreshTokenClient(config.google, refreshToken),
      generateSessionId(),
      logger
    );

    try {
      printCachedEvents(session);
      console.log('\nAsk about your calendar, or say "quit" to exit.');

      for (;;) {
        const utterance = (await rl.question('\nYou: ')).trim();
        if (!utterance) {
          continue;
        }

        const turn = await session.assistant.handle(utterance);
        console.log(`Assistant: ${turn.response}`);
        if (turn.query) {
          console.log(`  [query] ${turn.query}`);
        }
        if (turn.intent === 'quit') {
          break;
        }
      }
    } finally {
      disposeAssistantSession(session);
    }
  } finally {
    rl.close();
  }
}

chat().catch((error) => {
  console.error('[Chat] Error:', error);
  process.exit(1);
});
