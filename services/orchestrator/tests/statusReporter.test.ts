import assert from 'node:assert/strict';
import { test } from 'node:test';

import { ExecutionNotFoundError } from '../src/errors';
import { WORKFLOW_IDS, WorkflowCatalog } from '../src/workflow/catalog';
import { MemoryExecutionStore } from '../src/workflow/executionStore';
import { computeProgress, ExecutionStatusReporter, safeResults } from '../src/workflow/statusReporter';
import type { WorkflowExecutionContext } from '../src/workflow/types';

const context = (overrides: Partial<WorkflowExecutionContext> = {}): WorkflowExecutionContext => ({
  executionId: 'exec-1',
  workflowId: WORKFLOW_IDS.payment,
  inputs: {},
  metadata: { priority: '5' },
  triggeredBy: 'api',
  startedAt: '2026-01-01T00:00:00.000Z',
  completedAt: null,
  status: 'RUNNING',
  results: {},
  highlights: [],
  completedSteps: 0,
  totalSteps: 4,
  currentStep: 'Validate transaction with ledger',
  error: null,
  ...overrides
});

test('progress is the share of finished steps and only reaches 100 on success', () => {
  assert.equal(computeProgress(context()), 0);
  assert.equal(computeProgress(context({ completedSteps: 1 })), 25);
  assert.equal(computeProgress(context({ completedSteps: 2, totalSteps: 3 })), 66);
  assert.equal(computeProgress(context({ completedSteps: 4, status: 'FAILED' })), 99);
  assert.equal(computeProgress(context({ completedSteps: 4, status: 'SUCCESS' })), 100);
  assert.equal(computeProgress(context({ totalSteps: 0 })), 0);
  assert.equal(computeProgress(context({ totalSteps: 0, status: 'SUCCESS' })), 100);
});

test('only allow-listed result keys are exposed', () => {
  assert.deepEqual(
    safeResults({
      paymentId: 'pay-1',
      transactionId: 'txn-1',
      signatureValidationId: 'sig-val-1',
      ledgerValidationId: 'ledger-val-1',
      s3Etag: 'etag-1',
      ingestConfirmed: false
    }),
    { paymentId: 'pay-1', transactionId: 'txn-1', s3Etag: 'etag-1', ingestConfirmed: false }
  );
});

test('a running execution reports its current step and elapsed time', async () => {
  const store = new MemoryExecutionStore();
  await store.put('exec-1', context({ completedSteps: 1, results: { signatureValidationId: 'sig-val-1' } }), 60_000);
  const reporter = new ExecutionStatusReporter(store, new WorkflowCatalog(), () => new Date('2026-01-01T00:00:02.500Z'));

  assert.deepEqual(await reporter.getStatus('exec-1'), {
    executionId: 'exec-1',
    workflowId: WORKFLOW_IDS.payment,
    status: 'RUNNING',
    currentStep: 'Validate transaction with ledger',
    progress: 25,
    startedAt: '2026-01-01T00:00:00.000Z',
    completedAt: null,
    durationMs: 2_500,
    estimatedCompletion: '2026-01-01T00:00:05.000Z',
    highlights: [],
    results: {},
    errorMessage: null
  });
  assert.equal(await reporter.getProgress('exec-1'), 25);
});

test('terminal executions report their outcome', async () => {
  const store = new MemoryExecutionStore();
  await store.put(
    'exec-ok',
    context({
      executionId: 'exec-ok',
      status: 'SUCCESS',
      completedSteps: 4,
      currentStep: null,
      completedAt: '2026-01-01T00:00:01.200Z',
      results: { paymentId: 'pay-1', signatureValidationId: 'sig-val-1' }
    }),
    60_000
  );
  await store.put(
    'exec-failed',
    context({
      executionId: 'exec-failed',
      status: 'FAILED',
      currentStep: null,
      completedAt: '2026-01-01T00:00:00.300Z',
      error: { kind: 'business', step: 'validate-ledger', message: 'Ledger validation failed: Insufficient funds' }
    }),
    60_000
  );
  const reporter = new ExecutionStatusReporter(store, new WorkflowCatalog());

  const succeeded = await reporter.getStatus('exec-ok');
  assert.equal(succeeded.currentStep, 'Completed');
  assert.equal(succeeded.progress, 100);
  assert.equal(succeeded.durationMs, 1_200);
  assert.deepEqual(succeeded.results, { paymentId: 'pay-1' });

  const failed = await reporter.getStatus('exec-failed');
  assert.equal(failed.currentStep, 'Failed');
  assert.equal(failed.progress, 0);
  assert.equal(failed.durationMs, 300);
  assert.equal(failed.errorMessage, 'Ledger validation failed: Insufficient funds');
});

test('an unknown workflow has no completion estimate', async () => {
  const store = new MemoryExecutionStore();
  await store.put('exec-1', context({ workflowId: 'retired-workflow' }), 60_000);
  const reporter = new ExecutionStatusReporter(store, new WorkflowCatalog(), () => new Date('2026-01-01T00:00:00.000Z'));

  assert.equal((await reporter.getStatus('exec-1')).estimatedCompletion, null);
});

test('missing and expired executions are not found', async () => {
  let now = 0;
  const store = new MemoryExecutionStore({ now: () => now });
  await store.put('exec-1', context(), 1_000);
  const reporter = new ExecutionStatusReporter(store, new WorkflowCatalog());

  await assert.rejects(() => reporter.getStatus('exec-missing'), ExecutionNotFoundError);

  now = 1_000;
  await assert.rejects(
    () => reporter.getProgress('exec-1'),
    (error: unknown) => {
      assert.ok(error instanceof ExecutionNotFoundError);
      assert.equal(error.message, 'Execution exec-1 not found or expired');
      return true;
    }
  );
});
