// src/plugins/sessionSweeper.ts
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import type { SessionRegistry } from '../lib/sessionRegistry.js';
import { SESSION_SWEEP_INTERVAL_MS } from '../config/assistant.js';

export interface SessionSweeperOptions {
  registry: Pick<SessionRegistry<unknown>, 'sweep' | 'clear' | 'size'>;
  intervalMs?: number;
}

/**
 * Session Sweeper Plugin
 * Evicts idle sessions on a timer and drops all of them on shutdown
 */
async function sessionSweeperPlugin(fastify: FastifyInstance, options: SessionSweeperOptions) {
  const { registry, intervalMs = SESSION_SWEEP_INTERVAL_MS } = options;

  const interval = setInterval(() => {
    const evicted = registry.sweep();
    if (evicted > 0) {
      fastify.log.info({ evicted, remaining: registry.size }, 'Expired sessions evicted');
    }
  }, intervalMs);
  interval.unref();

  fastify.addHook('onClose', async () => {
    clearInterval(interval);
    registry.clear();
  });

  fastify.log.info({ intervalMs }, 'Session sweeper started');
}

export default fp(sessionSweeperPlugin, {
  name: 'session-sweeper',
});
