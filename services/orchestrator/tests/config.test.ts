import assert from 'node:assert/strict';
import { test } from 'node:test';

import { DEFAULT_EXECUTION_TTL_MS, loadConfig } from '../src/config';

test('loadConfig applies defaults and per-collaborator policies', () => {
  const config = loadConfig({});

  assert.equal(config.host, '0.0.0.0');
  assert.equal(config.port, 4600);
  assert.equal(config.logLevel, 'info');
  assert.equal(config.executionTtlMs, DEFAULT_EXECUTION_TTL_MS);
  assert.equal(config.storeMode, 'memory');
  assert.equal(config.redisUrl, null);
  assert.deepEqual(config.events, {
    mode: 'inline',
    queueName: 'orchestrator_workflow_events',
    proxyUrl: null,
    proxyToken: null
  });

  assert.deepEqual(config.collaborators.signature, {
    baseUrl: 'http://127.0.0.1:5101',
    timeoutMs: 1_000,
    retries: 0
  });
  assert.equal(config.collaborators.identity.timeoutMs, 30_000);
  assert.equal(config.collaborators.payment.retries, 2);
  assert.equal(config.collaborators.multisig.retries, 1);
});

test('loadConfig reads collaborator overrides from the environment', () => {
  const config = loadConfig({
    PAYMENT_SERVICE_URL: 'http://payments.internal:8080',
    PAYMENT_SERVICE_TIMEOUT_MS: '2500',
    ORCHESTRATOR_LOG_LEVEL: 'DEBUG',
    ORCHESTRATOR_PORT: '5000'
  });

  assert.equal(config.collaborators.payment.baseUrl, 'http://payments.internal:8080');
  assert.equal(config.collaborators.payment.timeoutMs, 2_500);
  assert.equal(config.logLevel, 'debug');
  assert.equal(config.port, 5000);
});

test('loadConfig requires REDIS_URL for the redis store', () => {
  assert.throws(
    () => loadConfig({ ORCHESTRATOR_STORE_MODE: 'redis' }),
    /REDIS_URL is required when the store or event mode is redis/
  );

  const config = loadConfig({ ORCHESTRATOR_STORE_MODE: 'redis', REDIS_URL: 'redis://127.0.0.1:6379' });
  assert.equal(config.storeMode, 'redis');
  assert.equal(config.redisUrl, 'redis://127.0.0.1:6379');
});

test('loadConfig requires a proxy url for http events', () => {
  assert.throws(
    () => loadConfig({ ORCHESTRATOR_EVENTS_MODE: 'http' }),
    /ORCHESTRATOR_EVENT_PROXY_URL is required/
  );
});

test('loadConfig rejects an unknown log level', () => {
  assert.throws(() => loadConfig({ ORCHESTRATOR_LOG_LEVEL: 'verbose' }));
});
