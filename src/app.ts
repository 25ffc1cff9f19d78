// src/app.ts
import Fastify from 'fastify';
import cookie from '@fastify/cookie';
import { assistantRoutes } from './routes/assistantRoutes.js';
import { authRoutes } from './routes/authRoutes.js';
import metricsPlugin from './plugins/metrics.js';
import sessionSweeperPlugin from './plugins/sessionSweeper.js';
import { createSessionMiddleware } from './middleware/session.js';
import { loadConfig, loadEnvFile, type AppConfig } from './config/env.js';
import { createCompletionClient, type CompletionClient } from './lib/llm.js';
import { GoogleOAuthFlow, type OAuthFlow } from './lib/googleAuth.js';
import { SessionRegistry } from './lib/sessionRegistry.js';
import {
  createSessionFactory,
  disposeAssistantSession,
  type AssistantSession,
  type SessionFactory,
} from './lib/assistantSession.js';
import { createSpeechSynthesizer } from './utils/speech.js';
import type { AssistantRouteOptions } from './routes/assistantRoutes.js';

export interface BuildAppOptions {
  config?: AppConfig;
  /** Completion client shared by every session (built from config.ai otherwise) */
  client?: CompletionClient;
  oauth?: OAuthFlow;
  sessionFactory?: SessionFactory;
  registry?: SessionRegistry<AssistantSession>;
  speech?: AssistantRouteOptions['speech'];
}

/**
 * Build and configure Fastify application
 *
 * @returns Configured Fastify instance
 */
export async function buildApp(options: BuildAppOptions = {}) {
  const config = options.config ?? loadConfig();

  const fastify = Fastify({
    logger:
      config.nodeEnv === 'development'
        ? {
            level: config.logLevel,
            transport: {
              target: 'pino-pretty',
              options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            },
          }
        : {
            level: config.logLevel,
          },
  });

  await fastify.register(cookie, {
    secret: config.cookieSecret,
    parseOptions: {
      httpOnly: true,
      secure: config.nodeEnv === 'production',
      sameSite: 'lax',
    },
  });

  const registry =
    options.registry ??
    new SessionRegistry<AssistantSession>({
      ttlMs: config.sessionTtlMs,
      dispose: disposeAssistantSession,
    });

  // Register session middleware (global - runs on every request)
  fastify.addHook('onRequest', createSessionMiddleware(registry));

  fastify.get('/health', async () => {
    return { status: 'ok', sessions: registry.size, timestamp: new Date().toISOString() };
  });

  await fastify.register(metricsPlugin);
  await fastify.register(sessionSweeperPlugin, { registry });

  const sessionFactory =
    options.sessionFactory ??
    createSessionFactory({
      config,
      client: options.client ?? createCompletionClient(config.ai),
      hooks: fastify.metrics.hooks,
    });

  await fastify.register(authRoutes, {
    config,
    oauth: options.oauth ?? new GoogleOAuthFlow(config.google),
    registry,
    sessionFactory,
  });
  await fastify.register(assistantRoutes, {
    speech: options.speech === undefined ? createSpeechSynthesizer(config) : options.speech,
  });

  return fastify;
}

/**
 * Start the application server
 */
async function start() {
  try {
    loadEnvFile();
    const config = loadConfig();
    const fastify = await buildApp({ config });

    await fastify.listen({ port: config.port, host: config.host });

    fastify.log.info(`Server listening on ${config.host}:${config.port}`);
  } catch (err) {
    console.error('Error starting server:', err);
    process.exit(1);
  }
}

// Start server if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  void start();
}
