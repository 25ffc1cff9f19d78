// src/plugins/metrics.ts
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { register, collectDefaultMetrics, Gauge, Counter, Histogram } from 'prom-client';
import type { AssistantHooks } from '../lib/assistant.js';

export interface AssistantMetrics {
  intentsTotal: Counter<'intent'>;
  mutationsTotal: Counter<'action' | 'status'>;
  /** Hooks that feed the counters from an assistant */
  hooks: AssistantHooks;
}

declare module 'fastify' {
  interface FastifyInstance {
    metrics: AssistantMetrics;
  }
}

/**
 * Metrics Plugin
 * Exposes Prometheus metrics at /metrics endpoint
 * Includes default Node.js metrics and the assistant's own counters
 */
async function metricsPlugin(fastify: FastifyInstance) {
  collectDefaultMetrics({
    register,
    prefix: 'calendar_assistant_',
  });

  const heapGauge = new Gauge({
    name: 'calendar_assistant_heap_usage_bytes',
    help: 'Current heap memory usage in bytes',
    registers: [register],
  });

  const httpRequestDuration = new Histogram({
    name: 'calendar_assistant_http_request_duration_seconds',
    help: 'HTTP request duration in seconds',
    labelNames: ['method', 'route', 'status_code'],
    registers: [register],
  });

  const httpRequestsTotal = new Counter({
    name: 'calendar_assistant_http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'route', 'status_code'],
    registers: [register],
  });

  const intentsTotal = new Counter({
    name: 'calendar_assistant_intents_total',
    help: 'Utterances handled, by classified intent',
    labelNames: ['intent'] as const,
    registers: [register],
  });

  const mutationsTotal = new Counter({
    name: 'calendar_assistant_mutations_total',
    help: 'Calendar mutations attempted, by action and outcome',
    labelNames: ['action', 'status'] as const,
    registers: [register],
  });

  heapGauge.set(process.memoryUsage().heapUsed);

  const heapInterval = setInterval(() => {
    heapGauge.set(process.memoryUsage().heapUsed);
  }, 10000);

  fastify.addHook('onResponse', async (request, reply) => {
    const labels = {
      method: request.method,
      route: request.routeOptions.url || request.url,
      status_code: reply.statusCode.toString(),
    };

    httpRequestDuration.observe(labels, reply.elapsedTime / 1000);
    httpRequestsTotal.inc(labels);
  });

  fastify.get('/metrics', async (_request, reply) => {
    reply.header('Content-Type', register.contentType);
    return register.metrics();
  });

  const metrics: AssistantMetrics = {
    intentsTotal,
    mutationsTotal,
    hooks: {
      onIntent: (intent) => intentsTotal.inc({ intent }),
      onMutation: (action, success) =>
        mutationsTotal.inc({ action, status: success ? 'success' : 'failure' }),
    },
  };
  fastify.decorate('metrics', metrics);

  fastify.addHook('onClose', async () => {
    clearInterval(heapInterval);
  });

  fastify.log.info('Metrics plugin registered - /metrics endpoint available');
}

export default fp(metricsPlugin, {
  name: 'metrics-plugin',
});
