// src/routes/authRoutes.ts
import type { FastifyInstance } from 'fastify';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import type { AppConfig } from '../config/env.js';
import type { OAuthFlow } from '../lib/googleAuth.js';
import { generateSessionId, type SessionRegistry } from '../lib/sessionRegistry.js';
import type { AssistantSession, SessionFactory } from '../lib/assistantSession.js';
import { SESSION_COOKIE, readSignedCookie } from '../middleware/session.js';

const STATE_COOKIE = 'oauth_state';

export interface AuthRouteOptions {
  config: Pick<AppConfig, 'nodeEnv' | 'sessionTtlMs'>;
  oauth: OAuthFlow;
  registry: SessionRegistry<AssistantSession>;
  sessionFactory: SessionFactory;
}

const callbackQuerySchema = z.object({
  code: z.string().optional(),
  state: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

/**
 * Register authentication routes
 */
export async function authRoutes(fastify: FastifyInstance, options: AuthRouteOptions): Promise<void> {
  const { config, oauth, registry, sessionFactory } = options;
  const secure = config.nodeEnv === 'production';

  /**
   * GET /
   * Session summary, or the login flow if there is none
   */
  fastify.get('/', async (request, reply) => {
    if (!request.assistantSession) {
      return reply.redirect('/login');
    }
    return { authenticated: true, timezone: request.assistantSession.timezone.timezone };
  });

  /**
   * GET /login
   * Initiate OAuth flow - redirect to Google authorization page
   */
  fastify.get('/login', async (_request, reply) => {
    try {
      // Generate CSRF state token
      const state = randomBytes(32).toString('hex');

      reply.setCookie(STATE_COOKIE, state, {
        httpOnly: true,
        secure,
        sameSite: 'lax',
        maxAge: 600, // 10 minutes
        signed: true,
        path: '/',
      });

      fastify.log.info('Redirecting to Google OAuth');
      return reply.redirect(oauth.authorizeUrl(state));
    } catch (error) {
      fastify.log.error({ err: error }, 'Error initiating OAuth flow');
      return reply.code(500).send({ error: 'Failed to initiate login' });
    }
  });

  /**
   * GET /auth/callback
   * Handle OAuth callback from Google and start an assistant session
   */
  fastify.get('/auth/callback', async (request, reply) => {
    const parsed = callbackQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: 'Invalid callback parameters', details: parsed.error.issues });
    }
    const query = parsed.data;

    if (query.error) {
      fastify.log.warn({ error: query.error }, 'OAuth error from Google');
      return reply.code(403).send({
        error: query.error,
        description: query.error_description ?? 'Authorization denied',
      });
    }

    // Verify CSRF state token
    const storedState = readSignedCookie(request, STATE_COOKIE);
    if (!storedState || storedState !== query.state) {
      fastify.log.warn({ receivedState: query.state }, 'CSRF state mismatch');
      return reply.code(400).send({ error: 'Invalid state parameter' });
    }

    if (!query.code) {
      fastify.log.warn('Missing code in callback');
      return reply.code(400).send({ error: 'No authorization code provided' });
    }

    reply.clearCookie(STATE_COOKIE, { path: '/' });

    try {
      const auth = await oauth.exchangeCode(query.code);

      const sessionId = generateSessionId();
      const session = await sessionFactory(auth, sessionId, fastify.log);
      registry.create(session, sessionId);

      reply.setCookie(SESSION_COOKIE, sessionId, {
        httpOnly: true,
        secure,
        sameSite: 'lax',
        maxAge: Math.floor(config.sessionTtlMs / 1000),
        signed: true,
        path: '/',
      });

      fastify.log.info({ sessionId: sessionId.slice(0, 8) }, 'Session created successfully');
      return reply.redirect('/');
    } catch (error) {
      fastify.log.error({ err: error }, 'Error handling OAuth callback');
      return reply.code(500).send({ error: 'Authentication failed' });
    }
  });

  /**
   * GET /logout
   * Drop the session and its cache, then back to login
   */
  fastify.get('/logout', async (request, reply) => {
    if (request.sessionId) {
      const deleted = registry.delete(request.sessionId);
      fastify.log.info({ sessionId: request.sessionId.slice(0, 8), deleted }, 'Session deleted');
    }

    reply.clearCookie(SESSION_COOKIE, { path: '/' });
    return reply.redirect('/login');
  });

  /**
   * GET /api/auth/status
   */
  fastify.get('/api/auth/status', async (request) => {
    const session = request.assistantSession;
    return session
      ? { authenticated: true, timezone: session.timezone.timezone }
      : { authenticated: false };
  });
}
