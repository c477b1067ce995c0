import cors from '@fastify/cors';
import { createEventPublisher, type EventPublisherHandle } from '@orchestra/event-bus';
import fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import IORedis from 'ioredis';

import { createCollaborators, type CollaboratorSet, type FetchLike } from './clients';
import type { OrchestratorConfig } from './config';
import { mapErrorToResponse } from './errors';
import { createLogger } from './logger';
import { createMetrics } from './metrics';
import { registerExecutionRoutes } from './routes/executions';
import { registerHealthRoutes } from './routes/health';
import { registerOnboardingRoutes } from './routes/onboarding';
import { registerTriggerRoutes } from './routes/triggers';
import { registerWorkflowRoutes } from './routes/workflows';
import type { AppContext } from './types';
import { WorkflowCatalog } from './workflow/catalog';
import { MemoryExecutionStore, RedisExecutionStore, type ExecutionStore } from './workflow/executionStore';
import { WorkflowExecutor } from './workflow/executor';
import { createPipelineRegistry } from './workflow/pipelines';
import type { PipelineRegistry } from './workflow/runtime';
import { ExecutionStatusReporter } from './workflow/statusReporter';
import { EventTriggerService } from './workflow/triggers';
import type { WorkflowDefinition } from './workflow/types';
import { WorkflowEventPublisher } from './workflow/workflowEvents';

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
}

/** Replaceable collaborators; anything left out is built from the config. */
export interface AppDependencies {
  collaborators?: CollaboratorSet;
  store?: ExecutionStore;
  eventPublisher?: EventPublisherHandle;
  fetchImpl?: FetchLike;
  definitions?: readonly WorkflowDefinition[];
  pipelines?: PipelineRegistry;
  now?: () => Date;
  generateId?: () => string;
}

const createStore = (config: OrchestratorConfig, logger: FastifyBaseLogger): ExecutionStore => {
  if (config.storeMode === 'redis' && config.redisUrl) {
    const client = new IORedis(config.redisUrl, { maxRetriesPerRequest: 2 });
    client.on('error', (err) => {
      logger.error({ err }, 'Execution store Redis error');
    });
    return new RedisExecutionStore(client, { ownsClient: true });
  }
  return new MemoryExecutionStore();
};

const createPublisher = (config: OrchestratorConfig): EventPublisherHandle =>
  createEventPublisher({
    mode: config.events.mode,
    queueName: config.events.queueName,
    redisUrl: config.redisUrl,
    proxy: config.events.proxyUrl
      ? { url: config.events.proxyUrl, token: config.events.proxyToken ?? undefined }
      : undefined
  });

export const createApp = async (config: OrchestratorConfig, deps: AppDependencies = {}): Promise<CreateAppResult> => {
  const app = fastify({ logger: createLogger(config.logLevel) });
  await app.register(cors, { origin: true, credentials: true });

  const metrics = createMetrics();

  const collaborators =
    deps.collaborators ??
    createCollaborators(config.collaborators, {
      fetchImpl: deps.fetchImpl,
      onCall: (service, outcome) => metrics.downstreamCalls.inc({ service, outcome })
    });
  const store = deps.store ?? createStore(config, app.log);
  const publisher = deps.eventPublisher ?? createPublisher(config);

  const catalog = new WorkflowCatalog(deps.definitions);
  const events = new WorkflowEventPublisher({ publish: publisher.publish, logger: app.log, metrics });
  const executor = new WorkflowExecutor({
    catalog,
    pipelines: deps.pipelines ?? createPipelineRegistry(),
    store,
    collaborators: collaborators.clients,
    events,
    logger: app.log,
    metrics,
    ttlMs: config.executionTtlMs,
    now: deps.now,
    generateId: deps.generateId
  });

  const readiness = {
    store: true,
    events: true
  };
  metrics.readinessGauge.set({ component: 'store' }, 1);
  metrics.readinessGauge.set({ component: 'events' }, 1);

  const ctx: AppContext = {
    config,
    metrics,
    readiness,
    catalog,
    store,
    collaborators,
    events,
    executor,
    statusReporter: new ExecutionStatusReporter(store, catalog, deps.now),
    triggers: new EventTriggerService(executor, deps.now)
  };

  registerHealthRoutes(app, ctx);
  registerWorkflowRoutes(app, ctx);
  registerExecutionRoutes(app, ctx);
  registerTriggerRoutes(app, ctx);
  registerOnboardingRoutes(app, ctx);

  app.setErrorHandler((error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    reply.status(mapped.statusCode).send(mapped.body);
  });

  app.addHook('onClose', async () => {
    readiness.events = false;
    await events.drain();
    await publisher.close();
    await store.close();
  });

  return { app, ctx };
};
