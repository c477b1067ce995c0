import assert from 'node:assert/strict';
import { test } from 'node:test';

import { ServiceClientError } from '../src/clients';
import type { OrderCreationRequest } from '../src/clients/marketplace';
import { WorkflowValidationError } from '../src/errors';
import { WORKFLOW_IDS } from '../src/workflow/catalog';
import { DEFAULT_PIPELINES, createPipelineRegistry } from '../src/workflow/pipelines';
import type { PipelineOutcome, WorkflowPipeline } from '../src/workflow/runtime';
import type { WorkflowExecutionContext } from '../src/workflow/types';
import {
  createFakeCollaborators,
  paymentRequest,
  signedFields,
  silentLogger,
  type FakeCollaborators
} from './helpers/orchestratorTestUtils';

const registry = createPipelineRegistry();

const pipelineFor = (workflowId: string): WorkflowPipeline => {
  const pipeline = registry.get(workflowId);
  assert.ok(pipeline, `no pipeline for ${workflowId}`);
  return pipeline;
};

interface PipelineRun {
  outcome: PipelineOutcome;
  context: WorkflowExecutionContext;
  snapshots: WorkflowExecutionContext[];
}

async function runPipeline(
  workflowId: string,
  inputs: Record<string, unknown>,
  fake: FakeCollaborators,
  signal?: AbortSignal
): Promise<PipelineRun> {
  const pipeline = pipelineFor(workflowId);
  const context: WorkflowExecutionContext = {
    executionId: 'exec-1',
    workflowId,
    inputs,
    metadata: {},
    triggeredBy: 'test',
    startedAt: '2026-01-01T00:00:00.000Z',
    completedAt: null,
    status: 'RUNNING',
    results: {},
    highlights: [],
    completedSteps: 0,
    totalSteps: pipeline.steps.length,
    currentStep: null,
    error: null
  };
  const snapshots: WorkflowExecutionContext[] = [];
  const outcome = await pipeline.run({
    context,
    services: fake.clients,
    logger: silentLogger,
    checkpoint: async (snapshot) => {
      snapshots.push(structuredClone(snapshot));
    },
    now: () => new Date('2026-01-01T00:00:00.000Z'),
    signal
  });
  return { outcome, context, snapshots };
}

const statuses = (context: WorkflowExecutionContext) => context.highlights.map((highlight) => highlight.status);

test('every cataloged workflow has exactly one pipeline', () => {
  assert.deepEqual(registry.workflowIds().sort(), Object.values(WORKFLOW_IDS).sort());
  assert.throws(() => createPipelineRegistry([...DEFAULT_PIPELINES, DEFAULT_PIPELINES[0]]), /Duplicate pipeline/);
});

test('payment: a validly signed request runs every step in order', async () => {
  const fake = createFakeCollaborators();
  const { outcome, context } = await runPipeline(WORKFLOW_IDS.payment, { paymentRequest: paymentRequest() }, fake);

  assert.deepEqual(fake.calls, [
    'signature.validateRequest',
    'ledger.validateTransaction',
    'payment.processPayment',
    'signature.validateResult'
  ]);
  assert.equal(outcome.ok, true);
  assert.deepEqual(context.results, {
    signatureValidationId: 'sig-val-1',
    ledgerValidationId: 'ledger-val-1',
    paymentId: 'pay-1',
    transactionId: 'txn-1'
  });
  assert.equal(context.completedSteps, 4);
  assert.equal(context.currentStep, null);
  assert.deepEqual(statuses(context), ['SUCCESS', 'SUCCESS', 'SUCCESS', 'SUCCESS']);
  if (outcome.ok) {
    assert.deepEqual(outcome.completion, {
      eventType: 'payment_completed',
      data: { paymentId: 'pay-1', transactionId: 'txn-1', amount: 100, status: 'Completed' }
    });
  }
});

test('payment: a corrupted signature stops before the payment collaborator', async () => {
  const fake = createFakeCollaborators({
    signature: {
      validateRequest: async (request) =>
        request.signature === 'corrupted'
          ? { isValid: false, validationId: '', message: 'Signature verification failed', metadata: {} }
          : { isValid: true, validationId: 'sig-val-1', message: '', metadata: {} }
    }
  });
  const { outcome, context } = await runPipeline(
    WORKFLOW_IDS.payment,
    { paymentRequest: paymentRequest({ signature: 'corrupted' }) },
    fake
  );

  assert.deepEqual(outcome, {
    ok: false,
    failure: {
      kind: 'authorization',
      step: 'validate-request-signature',
      message: 'Invalid signature: Signature verification failed'
    }
  });
  assert.equal(fake.count('payment.processPayment'), 0);
  assert.equal(fake.count('ledger.validateTransaction'), 0);
  assert.deepEqual(statuses(context), ['FAILED']);
  assert.equal(context.completedSteps, 0);
});

test('payment: a ledger rejection is a business failure', async () => {
  const fake = createFakeCollaborators({
    ledger: {
      validateTransaction: async () => ({ isValid: false, validationId: '', message: 'Insufficient funds' })
    }
  });
  const { outcome } = await runPipeline(WORKFLOW_IDS.payment, { paymentRequest: paymentRequest() }, fake);

  assert.deepEqual(outcome, {
    ok: false,
    failure: { kind: 'business', step: 'validate-ledger', message: 'Ledger validation failed: Insufficient funds' }
  });
  assert.equal(fake.count('payment.processPayment'), 0);
});

test('payment: collaborator errors are classified by status', async () => {
  const unavailable = createFakeCollaborators({
    payment: {
      processPayment: async () => {
        throw new ServiceClientError('Payment gateway down', { service: 'payment', statusCode: 503, code: 'HTTP_ERROR' });
      }
    }
  });
  const down = await runPipeline(WORKFLOW_IDS.payment, { paymentRequest: paymentRequest() }, unavailable);
  assert.deepEqual(down.outcome, {
    ok: false,
    failure: { kind: 'infrastructure', step: 'process-payment', message: 'payment unavailable: Payment gateway down' }
  });
  assert.equal(unavailable.count('signature.validateResult'), 0);

  const duplicate = createFakeCollaborators({
    payment: {
      processPayment: async () => {
        throw new ServiceClientError('Duplicate payment', { service: 'payment', statusCode: 409, code: 'HTTP_ERROR' });
      }
    }
  });
  const rejected = await runPipeline(WORKFLOW_IDS.payment, { paymentRequest: paymentRequest() }, duplicate);
  assert.deepEqual(rejected.outcome, {
    ok: false,
    failure: { kind: 'business', step: 'process-payment', message: 'payment rejected the request: Duplicate payment' }
  });
});

test('payment: input parsing names each malformed field', () => {
  const pipeline = pipelineFor(WORKFLOW_IDS.payment);

  assert.deepEqual(pipeline.parseInputs({ paymentRequest: paymentRequest() }), []);
  assert.deepEqual(pipeline.parseInputs({ paymentRequest: paymentRequest({ amount: -5 }) }), [
    'paymentRequest.amount: Number must be greater than 0'
  ]);
});

test('payment: running a pipeline on unchecked inputs throws before any step', async () => {
  const fake = createFakeCollaborators();

  await assert.rejects(
    () => runPipeline(WORKFLOW_IDS.payment, { paymentRequest: paymentRequest({ amount: -5 }) }, fake),
    (error: unknown) => {
      assert.ok(error instanceof WorkflowValidationError);
      assert.deepEqual(error.errors, ['paymentRequest.amount: Number must be greater than 0']);
      return true;
    }
  );
  assert.deepEqual(fake.calls, []);
});

test('onboarding: a failed ingest confirmation does not fail the workflow', async () => {
  const fake = createFakeCollaborators({
    multisig: {
      ingest: async () => {
        throw new ServiceClientError('Ingest backlog', { service: 'multisig', statusCode: 500, code: 'HTTP_ERROR' });
      }
    }
  });
  const { outcome, context } = await runPipeline(WORKFLOW_IDS.onboarding, { userRegistration: { userId: 'u1' } }, fake);

  assert.equal(outcome.ok, true);
  assert.deepEqual(statuses(context), ['SUCCESS', 'SUCCESS', 'SUCCESS', 'SUCCESS', 'SKIPPED']);
  assert.equal(context.completedSteps, 5);
  assert.deepEqual(context.results, {
    multisigId: 'ms-1',
    chainId: 'chain-7',
    address: '0xabc',
    s3Key: 'multisig/u1.json',
    s3Etag: 'etag-1',
    userId: 'u1',
    operationId: 'exec-1'
  });
  assert.equal('ingestConfirmed' in context.results, false);
});

test('onboarding: a clean run confirms ingestion and emits the storage details', async () => {
  const fake = createFakeCollaborators();
  const { outcome, context } = await runPipeline(WORKFLOW_IDS.onboarding, { userRegistration: { userId: 'u1' } }, fake);

  assert.deepEqual(fake.calls, [
    'user.getUser',
    'multisig.generate',
    'multisig.persist',
    'multisig.publishSets',
    'multisig.ingest'
  ]);
  assert.equal(context.results.ingestConfirmed, true);
  assert.ok(outcome.ok);
  assert.deepEqual(outcome.completion, {
    eventType: 'onboarding_completed',
    data: {
      userId: 'u1',
      multisig: { id: 'ms-1', chainId: 'chain-7', address: '0xabc' },
      storage: { key: 'multisig/u1.json', etag: 'etag-1' }
    }
  });
});

test('onboarding: a missing profile is tolerated but empty artifacts are fatal', async () => {
  const fake = createFakeCollaborators({
    user: {
      getUser: async () => {
        throw new ServiceClientError('User not found', { service: 'user', statusCode: 404, code: 'HTTP_ERROR' });
      }
    },
    multisig: {
      generate: async () => ({})
    }
  });
  const { outcome, context } = await runPipeline(WORKFLOW_IDS.onboarding, { userRegistration: { userId: 'u1' } }, fake);

  assert.deepEqual(outcome, {
    ok: false,
    failure: {
      kind: 'business',
      step: 'generate-multisig',
      message: 'Multisig artifact generation returned an empty result'
    }
  });
  assert.deepEqual(statuses(context), ['SKIPPED', 'FAILED']);
  assert.equal(fake.count('multisig.persist'), 0);
});

test('onboarding: the user index key is derived from the registration', () => {
  const onboarding = pipelineFor(WORKFLOW_IDS.onboarding);
  assert.deepEqual(onboarding.secondaryKeys({ userRegistration: { userId: ' u1 ' } }), ['onboarding_user:u1']);
  assert.deepEqual(onboarding.secondaryKeys({}), []);
  assert.deepEqual(pipelineFor(WORKFLOW_IDS.payment).secondaryKeys({ paymentRequest: paymentRequest() }), []);
});

test('listing: records listing and token ids', async () => {
  const fake = createFakeCollaborators();
  const { outcome, context } = await runPipeline(
    WORKFLOW_IDS.listing,
    {
      listingRequest: {
        tokenId: 'token-9',
        sellerId: 'seller-1',
        quantity: 10,
        basePrice: 2.5,
        pricingModel: 'fixed',
        listingType: 'sale',
        ...signedFields()
      }
    },
    fake
  );

  assert.equal(outcome.ok, true);
  assert.deepEqual(context.results, { signatureValidationId: 'sig-val-1', listingId: 'listing-1', tokenId: 'token-9' });
});

test('order: a signed order is checked against the listing and then created', async () => {
  const orders: OrderCreationRequest[] = [];
  const fake = createFakeCollaborators({
    marketplace: {
      createOrder: async (request) => {
        orders.push(request);
        return { orderId: 'order-7', listingId: request.listingId, status: 'Pending' };
      }
    }
  });
  const { outcome, context } = await runPipeline(
    WORKFLOW_IDS.order,
    {
      orderRequest: {
        listingId: 'listing-1',
        buyerId: 'buyer-1',
        sellerId: 'seller-1',
        quantity: 3,
        totalAmount: 30,
        ...signedFields()
      }
    },
    fake
  );

  assert.deepEqual(fake.calls, [
    'signature.validateRequest',
    'marketplace.validateListing',
    'marketplace.createOrder'
  ]);
  assert.deepEqual(orders, [
    {
      listingId: 'listing-1',
      buyerId: 'buyer-1',
      sellerId: 'seller-1',
      quantity: 3,
      totalAmount: 30,
      escrowRequired: false,
      signatureValidationId: 'sig-val-1',
      listingValidationId: 'listing-val-1'
    }
  ]);
  assert.deepEqual(context.results, {
    signatureValidationId: 'sig-val-1',
    listingValidationId: 'listing-val-1',
    orderId: 'order-7',
    listingId: 'listing-1'
  });
  assert.deepEqual(outcome, {
    ok: true,
    completion: {
      eventType: 'order_created',
      data: { orderId: 'order-7', listingId: 'listing-1', buyerId: 'buyer-1', totalAmount: 30, escrowRequired: false }
    }
  });
});

test('order: an unavailable listing stops before the order is created', async () => {
  const fake = createFakeCollaborators({
    marketplace: {
      validateListing: async () => ({ isValid: false, validationId: '', message: 'Insufficient quantity' })
    }
  });
  const { outcome } = await runPipeline(
    WORKFLOW_IDS.order,
    {
      orderRequest: {
        listingId: 'listing-1',
        buyerId: 'buyer-1',
        sellerId: 'seller-1',
        quantity: 3,
        totalAmount: 30,
        ...signedFields()
      }
    },
    fake
  );

  assert.deepEqual(outcome, {
    ok: false,
    failure: { kind: 'business', step: 'validate-listing', message: 'Listing validation failed: Insufficient quantity' }
  });
  assert.equal(fake.count('marketplace.createOrder'), 0);
});

test('escrow: a release is signed by the seller and completes the order', async () => {
  const signers: string[] = [];
  const fake = createFakeCollaborators({
    signature: {
      validateRequest: async (request) => {
        signers.push(request.accountId);
        return { isValid: true, validationId: 'sig-val-1', message: '', metadata: {} };
      }
    }
  });
  const escrowRequest = (action: string) => ({
    escrowId: 'escrow-1',
    orderId: 'order-1',
    action,
    buyerId: 'buyer-1',
    sellerId: 'seller-1',
    ...signedFields()
  });

  const released = await runPipeline(WORKFLOW_IDS.escrow, { escrowRequest: escrowRequest('release') }, fake);
  assert.deepEqual(released.context.results, {
    signatureValidationId: 'sig-val-1',
    escrowId: 'escrow-1',
    orderId: 'order-1',
    action: 'release',
    orderStatus: 'Completed'
  });

  const cancelled = await runPipeline(WORKFLOW_IDS.escrow, { escrowRequest: escrowRequest('cancel') }, fake);
  assert.equal(cancelled.context.results.orderStatus, 'Cancelled');
  assert.deepEqual(signers, ['seller-1', 'buyer-1']);
});

test('analytics: runs without a signature gate and records the report', async () => {
  const fake = createFakeCollaborators();
  const { outcome, context } = await runPipeline(
    WORKFLOW_IDS.analytics,
    { analyticsRequest: { requestId: 'req-1' } },
    fake
  );

  assert.equal(outcome.ok, true);
  assert.equal(fake.calls.some((call) => call.startsWith('signature.')), false);
  assert.deepEqual(context.results, {
    requestId: 'req-1',
    analyticsType: 'market_trends',
    reportId: 'report-1',
    totalDataPoints: 42
  });
});

test('analytics: an unsuccessful aggregation stops the report', async () => {
  const fake = createFakeCollaborators({
    marketplace: {
      aggregateAnalytics: async () => ({ success: false, aggregatedData: null, totalDataPoints: 0 })
    }
  });
  const { outcome } = await runPipeline(WORKFLOW_IDS.analytics, { analyticsRequest: { requestId: 'req-1' } }, fake);

  assert.deepEqual(outcome, {
    ok: false,
    failure: { kind: 'business', step: 'aggregate-analytics', message: 'Analytics aggregation failed' }
  });
  assert.equal(fake.count('marketplace.generateReport'), 0);
});

test('treasury: the placeholder step records the operation id', async () => {
  const fake = createFakeCollaborators();
  const named = await runPipeline(WORKFLOW_IDS.treasury, { treasuryOperation: { operationId: 'op-1' } }, fake);
  assert.deepEqual(named.context.results, { operationId: 'op-1' });

  const anonymous = await runPipeline(WORKFLOW_IDS.treasury, { treasuryOperation: {} }, fake);
  assert.deepEqual(anonymous.context.results, { operationId: 'exec-1' });
  assert.deepEqual(fake.calls, []);
});

test('every step writes a checkpoint the store can read back', async () => {
  const fake = createFakeCollaborators();
  const { snapshots, context } = await runPipeline(WORKFLOW_IDS.listing, {
    listingRequest: {
      tokenId: 'token-9',
      sellerId: 'seller-1',
      quantity: 1,
      basePrice: 1,
      pricingModel: 'fixed',
      listingType: 'sale',
      ...signedFields()
    }
  }, fake);

  assert.deepEqual(
    snapshots.map((snapshot) => [snapshot.currentStep, snapshot.completedSteps]),
    [
      ['Validate request signature', 0],
      ['Validate request signature', 1],
      ['Create listing', 1],
      ['Create listing', 2]
    ]
  );
  assert.deepEqual(snapshots.at(-1)?.results, context.results);
});

test('an aborted signal cancels before the next step', async () => {
  const fake = createFakeCollaborators();
  const controller = new AbortController();
  controller.abort();
  const { outcome } = await runPipeline(
    WORKFLOW_IDS.payment,
    { paymentRequest: paymentRequest() },
    fake,
    controller.signal
  );

  assert.deepEqual(outcome, {
    ok: false,
    failure: { kind: 'cancelled', step: 'validate-request-signature', message: 'Execution cancelled' }
  });
  assert.deepEqual(fake.calls, []);
});
