// src/routes/assistantRoutes.ts
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { requireSession } from '../middleware/session.js';
import type { SpeechSynthesizer } from '../utils/speech.js';

export interface AssistantRouteOptions {
  /** null when speech synthesis isn't configured */
  speech: Pick<SpeechSynthesizer, 'synthesize'> | null;
}

const queryBodySchema = z.object({
  query: z.string().trim().min(1, 'Empty query'),
});

const timezoneBodySchema = z.object({
  timezone: z.string().trim().min(1, 'timezone is required'),
});

const speechBodySchema = z.object({
  text: z.string().trim().min(1, 'No text provided'),
});

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Register the assistant API routes
 */
export async function assistantRoutes(
  fastify: FastifyInstance,
  options: AssistantRouteOptions
): Promise<void> {
  /**
   * POST /api/query
   * Run one utterance through the assistant
   */
  fastify.post('/api/query', async (request, reply) => {
    const parsed = queryBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({
        success: false,
        error: 'Empty query',
        details: parsed.error.issues,
      });
    }

    const session = requireSession(request, reply);
    if (!session) {
      return reply;
    }

    try {
      const turn = await session.assistant.handle(parsed.data.query);
      return {
        success: true,
        response: turn.response,
        intent: turn.intent,
        events: turn.events,
        ...(turn.query ? { query: turn.query } : {}),
      };
    } catch (error) {
      fastify.log.error({ err: error }, 'Error handling query');
      return reply.code(500).send({ success: false, error: errorMessage(error) });
    }
  });

  /**
   * GET /api/events
   * Upcoming events straight from the calendar
   */
  fastify.get('/api/events', async (request, reply) => {
    const session = requireSession(request, reply);
    if (!session) {
      return reply;
    }

    try {
      const events = await session.assistant.listUpcoming();
      return {
        success: true,
        events: events.map((event) => session.assistant.toView(event)),
      };
    } catch (error) {
      fastify.log.error({ err: error }, 'Error fetching events');
      return reply.code(500).send({ success: false, error: errorMessage(error) });
    }
  });

  /**
   * PUT /api/timezone
   * Change the session's timezone
   */
  fastify.put('/api/timezone', async (request, reply) => {
    const parsed = timezoneBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({
        success: false,
        error: 'Invalid request body',
        details: parsed.error.issues,
      });
    }

    const session = requireSession(request, reply);
    if (!session) {
      return reply;
    }

    const { timezone } = parsed.data;
    if (!session.timezone.setTimezone(timezone)) {
      return reply.code(400).send({
        success: false,
        error: `Invalid timezone: ${timezone}`,
        timezone: session.timezone.timezone,
      });
    }

    session.logger.info({ timezone }, 'Timezone updated');
    return { success: true, timezone: session.timezone.timezone };
  });

  /**
   * POST /api/tts
   * Speak a reply; returns MP3 bytes
   */
  fastify.post('/api/tts', async (request, reply) => {
    const parsed = speechBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({
        success: false,
        error: 'No text provided',
        details: parsed.error.issues,
      });
    }

    const session = requireSession(request, reply);
    if (!session) {
      return reply;
    }

    if (!options.speech) {
      return reply.code(503).send({
        success: false,
        error: 'TTS not configured. Set AI_PROVIDER=openai and AI_API_KEY to enable it.',
      });
    }

    try {
      const audio = await options.speech.synthesize(parsed.data.text);
      if (audio.length === 0) {
        return reply.code(500).send({ success: false, error: 'Generated audio is empty' });
      }

      return reply.header('Content-Type', 'audio/mpeg').send(audio);
    } catch (error) {
      fastify.log.error({ err: error }, 'Error generating audio');
      return reply.code(500).send({
        success: false,
        error: `Failed to generate audio: ${errorMessage(error)}`,
      });
    }
  });
}
