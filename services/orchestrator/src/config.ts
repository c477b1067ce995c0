import { z } from 'zod';
import { integerVar, loadEnvConfig, stringVar, urlVar, type EnvSource } from '@orchestra/shared';

export const COLLABORATOR_NAMES = [
  'signature',
  'multisig',
  'payment',
  'ledger',
  'user',
  'marketplace',
  'treasury',
  'notification',
  'identity'
] as const;

export type CollaboratorName = (typeof COLLABORATOR_NAMES)[number];

export interface CollaboratorConfig {
  baseUrl: string;
  timeoutMs: number;
  retries: number;
}

export type StoreMode = 'memory' | 'redis';
export type EventsMode = 'inline' | 'redis' | 'http';

export interface OrchestratorConfig {
  host: string;
  port: number;
  logLevel: string;
  executionTtlMs: number;
  storeMode: StoreMode;
  redisUrl: string | null;
  events: {
    mode: EventsMode;
    queueName: string;
    proxyUrl: string | null;
    proxyToken: string | null;
  };
  collaborators: Record<CollaboratorName, CollaboratorConfig>;
}

// Signature checks fail fast; identity verification is a slow external dependency.
const COLLABORATOR_DEFAULTS: Record<CollaboratorName, CollaboratorConfig> = {
  signature: { baseUrl: 'http://127.0.0.1:5101', timeoutMs: 1_000, retries: 0 },
  multisig: { baseUrl: 'http://127.0.0.1:5101', timeoutMs: 10_000, retries: 1 },
  payment: { baseUrl: 'http://127.0.0.1:5102', timeoutMs: 5_000, retries: 2 },
  ledger: { baseUrl: 'http://127.0.0.1:5103', timeoutMs: 3_000, retries: 2 },
  user: { baseUrl: 'http://127.0.0.1:5104', timeoutMs: 10_000, retries: 2 },
  marketplace: { baseUrl: 'http://127.0.0.1:5105', timeoutMs: 10_000, retries: 2 },
  treasury: { baseUrl: 'http://127.0.0.1:5106', timeoutMs: 15_000, retries: 2 },
  notification: { baseUrl: 'http://127.0.0.1:5107', timeoutMs: 5_000, retries: 2 },
  identity: { baseUrl: 'http://127.0.0.1:5108', timeoutMs: 30_000, retries: 2 }
};

export const DEFAULT_EXECUTION_TTL_MS = 24 * 60 * 60 * 1000;

const envName = (name: CollaboratorName, suffix: string) => `${name.toUpperCase()}_SERVICE_${suffix}`;

const collaboratorShape: z.ZodRawShape = {};
for (const name of COLLABORATOR_NAMES) {
  collaboratorShape[envName(name, 'URL')] = urlVar({ defaultValue: COLLABORATOR_DEFAULTS[name].baseUrl });
  collaboratorShape[envName(name, 'TIMEOUT_MS')] = integerVar({
    defaultValue: COLLABORATOR_DEFAULTS[name].timeoutMs,
    min: 1,
    max: 120_000
  });
}

const envSchema = z.object({
  ORCHESTRATOR_HOST: stringVar({ defaultValue: '0.0.0.0' }),
  ORCHESTRATOR_PORT: integerVar({ defaultValue: 4600, min: 0, max: 65_535 }),
  ORCHESTRATOR_LOG_LEVEL: stringVar({
    defaultValue: 'info',
    lowercase: true,
    allowed: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']
  }),
  ORCHESTRATOR_EXECUTION_TTL_MS: integerVar({ defaultValue: DEFAULT_EXECUTION_TTL_MS, min: 1_000 }),
  ORCHESTRATOR_STORE_MODE: stringVar({ defaultValue: 'memory', lowercase: true, allowed: ['memory', 'redis'] }),
  ORCHESTRATOR_EVENTS_MODE: stringVar({
    defaultValue: 'inline',
    lowercase: true,
    allowed: ['inline', 'redis', 'http']
  }),
  ORCHESTRATOR_EVENT_QUEUE_NAME: stringVar({ defaultValue: 'orchestrator_workflow_events' }),
  ORCHESTRATOR_EVENT_PROXY_URL: urlVar(),
  ORCHESTRATOR_EVENT_PROXY_TOKEN: stringVar(),
  REDIS_URL: stringVar()
});

const collaboratorSchema = z.object(collaboratorShape);

function pickString(values: Record<string, unknown>, key: string, fallback: string): string {
  const value = values[key];
  return typeof value === 'string' ? value : fallback;
}

function pickNumber(values: Record<string, unknown>, key: string, fallback: number): number {
  const value = values[key];
  return typeof value === 'number' ? value : fallback;
}

function isStoreMode(value: string): value is StoreMode {
  return value === 'memory' || value === 'redis';
}

function isEventsMode(value: string): value is EventsMode {
  return value === 'inline' || value === 'redis' || value === 'http';
}

export const loadConfig = (env: EnvSource = process.env): OrchestratorConfig => {
  const base = loadEnvConfig(envSchema, { env, context: 'orchestrator' });
  const collaboratorValues = loadEnvConfig(collaboratorSchema, { env, context: 'orchestrator' });

  const storeModeValue = base.ORCHESTRATOR_STORE_MODE ?? 'memory';
  const eventsModeValue = base.ORCHESTRATOR_EVENTS_MODE ?? 'inline';
  const storeMode: StoreMode = isStoreMode(storeModeValue) ? storeModeValue : 'memory';
  const eventsMode: EventsMode = isEventsMode(eventsModeValue) ? eventsModeValue : 'inline';
  const redisUrl = base.REDIS_URL ?? null;

  if ((storeMode === 'redis' || eventsMode === 'redis') && !redisUrl) {
    throw new Error('REDIS_URL is required when the store or event mode is redis');
  }
  if (eventsMode === 'http' && !base.ORCHESTRATOR_EVENT_PROXY_URL) {
    throw new Error('ORCHESTRATOR_EVENT_PROXY_URL is required when ORCHESTRATOR_EVENTS_MODE=http');
  }

  const resolve = (name: CollaboratorName): CollaboratorConfig => {
    const defaults = COLLABORATOR_DEFAULTS[name];
    return {
      baseUrl: pickString(collaboratorValues, envName(name, 'URL'), defaults.baseUrl),
      timeoutMs: pickNumber(collaboratorValues, envName(name, 'TIMEOUT_MS'), defaults.timeoutMs),
      retries: defaults.retries
    };
  };

  const collaborators: Record<CollaboratorName, CollaboratorConfig> = {
    signature: resolve('signature'),
    multisig: resolve('multisig'),
    payment: resolve('payment'),
    ledger: resolve('ledger'),
    user: resolve('user'),
    marketplace: resolve('marketplace'),
    treasury: resolve('treasury'),
    notification: resolve('notification'),
    identity: resolve('identity')
  };

  return {
    host: base.ORCHESTRATOR_HOST ?? '0.0.0.0',
    port: base.ORCHESTRATOR_PORT ?? 4600,
    logLevel: base.ORCHESTRATOR_LOG_LEVEL ?? 'info',
    executionTtlMs: base.ORCHESTRATOR_EXECUTION_TTL_MS ?? DEFAULT_EXECUTION_TTL_MS,
    storeMode,
    redisUrl,
    events: {
      mode: eventsMode,
      queueName: base.ORCHESTRATOR_EVENT_QUEUE_NAME ?? 'orchestrator_workflow_events',
      proxyUrl: base.ORCHESTRATOR_EVENT_PROXY_URL ?? null,
      proxyToken: base.ORCHESTRATOR_EVENT_PROXY_TOKEN ?? null
    },
    collaborators
  };
};
