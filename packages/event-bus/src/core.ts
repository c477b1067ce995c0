import { randomUUID } from 'node:crypto';
import { z } from 'zod';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema)
  ])
);

export const WORKFLOW_EVENT_SOURCE = 'orchestrator';
export const WORKFLOW_EVENT_VERSION = '1.0';

export const EVENT_TOPICS = {
  events: 'workflow-events',
  status: 'workflow-status',
  errors: 'workflow-errors'
} as const;

export type EventTopic = (typeof EVENT_TOPICS)[keyof typeof EVENT_TOPICS];

export const workflowEventEnvelopeSchema = z
  .object({
    id: z.string().uuid(),
    type: z.literal('workflow_event'),
    eventType: z.string().min(1, 'eventType is required'),
    workflowId: z.string().min(1, 'workflowId is required'),
    executionId: z.string().min(1, 'executionId is required'),
    topic: z.enum([EVENT_TOPICS.events, EVENT_TOPICS.status, EVENT_TOPICS.errors]),
    source: z.string().min(1),
    version: z.string().min(1),
    occurredAt: z
      .string()
      .min(1, 'occurredAt is required')
      .refine((value) => !Number.isNaN(Date.parse(value)), {
        message: 'occurredAt must be an ISO-8601 timestamp'
      }),
    correlationId: z.string().min(1).optional(),
    data: z.record(jsonValueSchema)
  })
  .strict();

export type WorkflowEventEnvelope = z.infer<typeof workflowEventEnvelopeSchema>;

export type WorkflowEventInput = {
  eventType: string;
  workflowId: string;
  executionId: string;
  data?: Record<string, unknown>;
  correlationId?: string;
  id?: string;
  occurredAt?: string | Date;
};

export type EventPublisher<TOptions = unknown> = (
  event: WorkflowEventInput,
  options?: TOptions
) => Promise<WorkflowEventEnvelope>;

export type EventPublisherHandleBase<TQueue, TOptions = unknown> = {
  publish: EventPublisher<TOptions>;
  close: () => Promise<void>;
  queue: TQueue | null;
};

export type EventPublisherProxyOptions = {
  url?: string;
  token?: string | (() => string | Promise<string>);
  headers?: Record<string, string>;
};

const SENSITIVE_KEYS = new Set(
  ['signature', 'validationId', 'privateKey', 'secret', 'token', 'password', 'apiKey', 'internalId', 'systemId'].map(
    (key) => key.toLowerCase()
  )
);

const SENSITIVE_PATTERNS: RegExp[] = [
  /signature:\s*[A-Za-z0-9+/=]+/gi,
  /token:\s*[A-Za-z0-9\-_]+/gi,
  /key:\s*[A-Za-z0-9+/=]+/gi,
  /password:\s*\S+/gi,
  /secret:\s*\S+/gi
];

export function resolveEventTopic(eventType: string): EventTopic {
  switch (eventType) {
    case 'workflow_status_update':
      return EVENT_TOPICS.status;
    case 'workflow_error':
      return EVENT_TOPICS.errors;
    default:
      return EVENT_TOPICS.events;
  }
}

export function redactErrorMessage(message: string): string {
  return SENSITIVE_PATTERNS.reduce((current, pattern) => current.replace(pattern, '[REDACTED]'), message);
}

function toJsonValue(value: unknown, depth: number): JsonValue | undefined {
  if (value === null) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (depth > 8) {
    return '[Truncated]';
  }
  if (Array.isArray(value)) {
    return value.map((entry) => toJsonValue(entry, depth + 1) ?? null);
  }
  if (typeof value === 'object') {
    const result: Record<string, JsonValue> = {};
    for (const [key, entry] of Object.entries(value)) {
      const converted = toJsonValue(entry, depth + 1);
      if (converted !== undefined) {
        result[key] = converted;
      }
    }
    return result;
  }
  return undefined;
}

/**
 * Drops top-level sensitive keys and scrubs credential-looking fragments out of
 * `error` strings. Nested objects are converted to plain JSON but otherwise kept.
 */
export function redactEventData(data: Record<string, unknown> | undefined): Record<string, JsonValue> {
  const sanitized: Record<string, JsonValue> = {};
  if (!data) {
    return sanitized;
  }
  for (const [key, value] of Object.entries(data)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      continue;
    }
    const converted = toJsonValue(value, 0);
    if (converted === undefined) {
      continue;
    }
    sanitized[key] =
      typeof converted === 'string' && (key === 'error' || key === 'errorMessage')
        ? redactErrorMessage(converted)
        : converted;
  }
  return sanitized;
}

export function normalizeWorkflowEvent(input: WorkflowEventInput): WorkflowEventEnvelope {
  const occurredAt =
    input.occurredAt instanceof Date ? input.occurredAt.toISOString() : input.occurredAt ?? new Date().toISOString();

  const candidate: Record<string, unknown> = {
    id: input.id ?? randomUUID(),
    type: 'workflow_event',
    eventType: input.eventType,
    workflowId: input.workflowId,
    executionId: input.executionId,
    topic: resolveEventTopic(input.eventType),
    source: WORKFLOW_EVENT_SOURCE,
    version: WORKFLOW_EVENT_VERSION,
    occurredAt,
    data: redactEventData(input.data)
  };
  if (input.correlationId) {
    candidate.correlationId = input.correlationId;
  }

  const result = workflowEventEnvelopeSchema.safeParse(candidate);
  if (!result.success) {
    throw new Error(result.error.errors.map((issue) => issue.message).join('; '));
  }
  return result.data;
}

export function validateWorkflowEvent(envelope: unknown): WorkflowEventEnvelope {
  return workflowEventEnvelopeSchema.parse(envelope);
}

export function normalizeStringValue(value: unknown): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export async function resolveProxyToken(candidate: EventPublisherProxyOptions['token']): Promise<string | null> {
  if (typeof candidate === 'function') {
    return normalizeStringValue(await candidate());
  }
  return normalizeStringValue(candidate);
}

export function headerHasName(headers: Record<string, string>, name: string): boolean {
  const lower = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === lower);
}
