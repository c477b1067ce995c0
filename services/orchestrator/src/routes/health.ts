import type { FastifyInstance } from 'fastify';

import { COLLABORATOR_NAMES, type CollaboratorName } from '../config';
import type { AppContext } from '../types';

const DOWNSTREAM_PROBE_TIMEOUT_MS = 2_000;

export const SERVICE_NAME = 'workflow-orchestrator';
export const SERVICE_VERSION = '0.1.0';

export const registerHealthRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    const { readiness } = ctx;
    try {
      readiness.store = await ctx.store.ping();
    } catch (error) {
      request.log.warn({ err: error }, 'Execution store ping failed');
      readiness.store = false;
    }

    const components: Record<string, boolean> = {
      store: readiness.store,
      events: readiness.events
    };
    ctx.metrics.readinessGauge.set({ component: 'store' }, readiness.store ? 1 : 0);
    ctx.metrics.readinessGauge.set({ component: 'events' }, readiness.events ? 1 : 0);

    const allReady = Object.values(components).every(Boolean);
    if (!allReady) {
      return reply.status(503).send({ status: 'not_ready', components });
    }
    return { status: 'ready', components };
  });

  app.get('/metrics', async (request, reply) => {
    reply.header('Content-Type', ctx.metrics.register.contentType);
    return ctx.metrics.register.metrics();
  });

  app.get('/service-info', async () => ({
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    workflows: ctx.catalog.listActive().map((definition) => ({
      id: definition.id,
      name: definition.name,
      estimatedDurationMs: definition.estimatedDurationMs
    })),
    integrations: [...COLLABORATOR_NAMES],
    features: ['signature-gated-steps', 'execution-status-tracking', 'event-triggers', 'lifecycle-events']
  }));

  app.get('/health/downstream', async (request, reply) => {
    const probe = async (name: CollaboratorName): Promise<[CollaboratorName, 'up' | 'down']> => {
      try {
        const healthy = await ctx.collaborators.health[name](AbortSignal.timeout(DOWNSTREAM_PROBE_TIMEOUT_MS));
        return [name, healthy ? 'up' : 'down'];
      } catch (error) {
        request.log.debug({ err: error, service: name }, 'Downstream health probe failed');
        return [name, 'down'];
      }
    };

    const results = await Promise.all(COLLABORATOR_NAMES.map(probe));
    const services: Record<string, 'up' | 'down'> = {};
    for (const [name, state] of results) {
      services[name] = state;
    }

    const healthy = results.every(([, state]) => state === 'up');
    return reply.status(healthy ? 200 : 503).send({ status: healthy ? 'ok' : 'degraded', services });
  });
};
