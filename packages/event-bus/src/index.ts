import { Queue, type ConnectionOptions, type JobsOptions, type QueueOptions } from 'bullmq';
import {
  EventPublisher,
  EventPublisherHandleBase,
  EventPublisherProxyOptions,
  WorkflowEventEnvelope,
  normalizeWorkflowEvent
} from './core';
import { createEventProxyPublisher } from './httpPublisher';

export type WorkflowEventJobData = {
  envelope: WorkflowEventEnvelope;
};

export type PublishEventOptions = {
  jobName?: string;
  jobOptions?: JobsOptions;
};

export type BullQueueLike<T> = {
  add: (name: string, data: T, opts?: JobsOptions) => Promise<unknown>;
  close: () => Promise<void>;
};

export type EventPublisherHandle = EventPublisherHandleBase<
  BullQueueLike<WorkflowEventJobData>,
  PublishEventOptions
>;

export type EventsMode = 'inline' | 'redis' | 'http';

export type EventPublisherOptions = {
  mode?: EventsMode;
  queue?: BullQueueLike<WorkflowEventJobData>;
  queueName?: string;
  queueOptions?: Omit<QueueOptions, 'connection'>;
  redisUrl?: string | null;
  proxy?: EventPublisherProxyOptions;
  fetchImpl?: typeof fetch;
};

export const DEFAULT_EVENT_QUEUE_NAME = 'orchestrator_workflow_events';

/**
 * Builds a publisher for workflow events.
 *
 * - `inline` normalizes and returns the envelope without delivering it anywhere.
 * - `redis` enqueues `{ envelope }` on a BullMQ queue, using the envelope topic as job name.
 * - `http` posts the envelope to an event proxy.
 *
 * When `mode` is omitted an injected queue implies `redis`, a proxy URL implies `http`,
 * and everything else runs inline.
 */
export function createEventPublisher(options: EventPublisherOptions = {}): EventPublisherHandle {
  const mode: EventsMode =
    options.mode ?? (options.queue ? 'redis' : options.proxy?.url ? 'http' : 'inline');

  if (mode === 'http') {
    return createEventProxyPublisher<PublishEventOptions>({
      proxy: options.proxy,
      fetchImpl: options.fetchImpl
    });
  }

  let closed = false;

  if (mode === 'inline') {
    const publish: EventPublisher<PublishEventOptions> = async (event) => {
      if (closed) {
        throw new Error('Event publisher is closed');
      }
      return normalizeWorkflowEvent(event);
    };

    const close = async () => {
      closed = true;
    };

    return { publish, close, queue: null } satisfies EventPublisherHandle;
  }

  const queue = options.queue ?? createBullQueue(options);

  const publish: EventPublisher<PublishEventOptions> = async (event, overrides) => {
    if (closed) {
      throw new Error('Event publisher is closed');
    }
    const envelope = normalizeWorkflowEvent(event);
    await queue.add(overrides?.jobName ?? envelope.topic, { envelope }, overrides?.jobOptions);
    return envelope;
  };

  const close = async () => {
    if (closed) {
      return;
    }
    closed = true;
    if (!options.queue) {
      await queue.close();
    }
  };

  return { publish, close, queue } satisfies EventPublisherHandle;
}

function createBullQueue(options: EventPublisherOptions): BullQueueLike<WorkflowEventJobData> {
  const connection = options.redisUrl ? parseRedisConnection(options.redisUrl) : undefined;
  if (!connection) {
    throw new Error('Redis event mode requires a redis:// or rediss:// REDIS_URL');
  }
  return new Queue<WorkflowEventJobData>(options.queueName ?? DEFAULT_EVENT_QUEUE_NAME, {
    ...(options.queueOptions ?? {}),
    connection
  });
}

type RedisConnectionFields = {
  host: string;
  port: number;
  username?: string;
  password?: string;
  db?: number;
  tls?: Record<string, never>;
};

export function parseRedisConnection(connectionString: string): ConnectionOptions | undefined {
  const trimmed = connectionString.trim();
  if (!trimmed || trimmed.toLowerCase() === 'inline') {
    return undefined;
  }

  let url: URL;
  try {
    url = new URL(trimmed.includes('://') ? trimmed : `redis://${trimmed}`);
  } catch {
    return undefined;
  }

  if (url.protocol !== 'redis:' && url.protocol !== 'rediss:') {
    return undefined;
  }

  const connection: RedisConnectionFields = {
    host: url.hostname,
    port: url.port ? Number(url.port) : 6379
  };

  if (url.username) {
    connection.username = decodeURIComponent(url.username);
  }
  if (url.password) {
    connection.password = decodeURIComponent(url.password);
  }

  const pathname = url.pathname.replace(/^\//, '');
  if (pathname) {
    const db = Number(pathname);
    if (!Number.isNaN(db)) {
      connection.db = db;
    }
  }

  if (url.protocol === 'rediss:') {
    connection.tls = {};
  }

  return connection;
}

export { createEventProxyPublisher, type EventProxyPublisherOptions } from './httpPublisher';

export {
  EVENT_TOPICS,
  WORKFLOW_EVENT_SOURCE,
  WORKFLOW_EVENT_VERSION,
  jsonValueSchema,
  normalizeWorkflowEvent,
  redactErrorMessage,
  redactEventData,
  resolveEventTopic,
  validateWorkflowEvent,
  workflowEventEnvelopeSchema,
  type EventPublisher,
  type EventPublisherProxyOptions,
  type EventTopic,
  type JsonValue,
  type WorkflowEventEnvelope,
  type WorkflowEventInput
} from './core';
