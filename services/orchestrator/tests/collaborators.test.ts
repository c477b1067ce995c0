import assert from 'node:assert/strict';
import { once } from 'node:events';
import http from 'node:http';
import type { IncomingMessage } from 'node:http';
import { after, before, test } from 'node:test';

import { createCollaborators, type CallOutcome, type CollaboratorSet } from '../src/clients';
import type { CollaboratorConfig, CollaboratorName } from '../src/config';

interface RecordedRequest {
  method: string;
  url: string;
  body: unknown;
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

const responses: Record<string, unknown> = {
  'POST /api/signatures/validate-request': { isValid: true, validationId: 'sig-val-1' },
  'POST /api/ledger/transactions/validate': { isValid: false, validationId: '', message: 'Insufficient funds' },
  'POST /api/payments/process': { paymentId: 'pay-1', transactionId: 'txn-1', status: 'Completed', signature: 'sig' },
  'GET /api/users/user%201': { id: 'user 1', email: 'user1@example.test', tier: 'gold' },
  'POST /internal/multisig/publish-sets': { key: 'multisig/u1.json', etag: 'etag-1' },
  'POST /api/listings/listing%2F1/validate': { isValid: true, validationId: 'listing-val-1' },
  'PUT /api/orders/order-1/status': { orderId: 'order-1', status: 'Completed' },
  'GET /api/treasury/operations/op-1/status': { operationId: 'op-1', status: 'Pending', completedAt: null },
  'POST /api/notifications/send': { notificationId: 'n-1', status: 'Sent' },
  'POST /api/kyc/basic': { kycId: 'kyc-1', status: 'Approved' }
};

const recorded: RecordedRequest[] = [];
let server: http.Server;
let collaborators: CollaboratorSet;
const outcomes: Array<[string, CallOutcome]> = [];

before(async () => {
  server = http.createServer(async (req, res) => {
    const method = req.method ?? 'GET';
    const url = req.url ?? '/';
    const raw = await readBody(req);
    recorded.push({ method, url, body: raw ? JSON.parse(raw) : null });

    if (url === '/health') {
      res.statusCode = 200;
      res.end();
      return;
    }

    const payload = responses[`${method} ${url}`];
    res.setHeader('Content-Type', 'application/json');
    if (payload === undefined) {
      res.statusCode = 404;
      res.end(JSON.stringify({ error: `No route for ${method} ${url}` }));
      return;
    }
    res.statusCode = 200;
    res.end(JSON.stringify(payload));
  });

  server.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }

  const entry: CollaboratorConfig = { baseUrl: `http://127.0.0.1:${address.port}/`, timeoutMs: 1_000, retries: 0 };
  const config: Record<CollaboratorName, CollaboratorConfig> = {
    signature: entry,
    multisig: entry,
    payment: entry,
    ledger: entry,
    user: entry,
    marketplace: entry,
    treasury: entry,
    notification: entry,
    identity: entry
  };
  collaborators = createCollaborators(config, {
    onCall: (service, outcome) => outcomes.push([service, outcome])
  });
});

after(async () => {
  server.closeAllConnections();
  server.close();
  await once(server, 'close');
});

const lastRequest = (): RecordedRequest => {
  const request = recorded.at(-1);
  assert.ok(request, 'expected a recorded request');
  return request;
};

test('signature client posts the signed request and fills response defaults', async () => {
  const result = await collaborators.clients.signature.validateRequest({
    accountId: 'acct-1',
    operation: 'payment',
    operationData: { amount: 100 },
    nonce: 'nonce-1',
    sequenceNumber: 4,
    timestamp: '2026-01-01T00:00:00.000Z',
    signature: 'test-signature',
    algorithm: 'ed25519'
  });

  assert.deepEqual(result, { isValid: true, validationId: 'sig-val-1', message: '', metadata: {} });
  assert.deepEqual(lastRequest(), {
    method: 'POST',
    url: '/api/signatures/validate-request',
    body: {
      accountId: 'acct-1',
      operation: 'payment',
      operationData: { amount: 100 },
      nonce: 'nonce-1',
      sequenceNumber: 4,
      timestamp: '2026-01-01T00:00:00.000Z',
      signature: 'test-signature',
      algorithm: 'ed25519'
    }
  });
});

test('ledger rejections come back as data, not errors', async () => {
  const result = await collaborators.clients.ledger.validateTransaction({
    operation: 'payment',
    amount: 100,
    fromAccount: 'a',
    toAccount: 'b',
    signatureValidationId: 'sig-val-1'
  });
  assert.deepEqual(result, { isValid: false, validationId: '', message: 'Insufficient funds' });
});

test('path parameters are encoded', async () => {
  const user = await collaborators.clients.user.getUser('user 1');
  assert.equal(user.id, 'user 1');
  assert.equal(user.tier, 'gold');
  assert.equal(lastRequest().url, '/api/users/user%201');

  const check = await collaborators.clients.marketplace.validateListing('listing/1', {
    quantity: 2,
    buyerId: 'buyer-1',
    signatureValidationId: 'sig-val-1'
  });
  assert.equal(check.validationId, 'listing-val-1');
  assert.equal(lastRequest().url, '/api/listings/listing%2F1/validate');
});

test('order status updates use PUT', async () => {
  const update = await collaborators.clients.marketplace.updateOrderStatus('order-1', {
    escrowId: 'escrow-1',
    newStatus: 'Completed',
    escrowAction: 'release',
    signatureValidationId: 'sig-val-1'
  });
  assert.deepEqual(update, { orderId: 'order-1', status: 'Completed' });
  assert.equal(lastRequest().method, 'PUT');
});

test('boundary clients decode their responses', async () => {
  const published = await collaborators.clients.multisig.publishSets({ userId: 'u1' });
  assert.deepEqual(published, { key: 'multisig/u1.json', etag: 'etag-1' });

  const status = await collaborators.clients.treasury.getOperationStatus('op-1');
  assert.deepEqual(status, { operationId: 'op-1', status: 'Pending', completedAt: null });

  const notification = await collaborators.clients.notification.send({ userId: 'u1', type: 'welcome', data: {} });
  assert.equal(notification.notificationId, 'n-1');

  const kyc = await collaborators.clients.identity.performBasicKyc({ userId: 'u1', documents: {} });
  assert.deepEqual(kyc, { kycId: 'kyc-1', status: 'Approved', results: {} });
});

test('health probes and call outcomes are reported per collaborator', async () => {
  assert.equal(await collaborators.health.payment(), true);

  outcomes.length = 0;
  await assert.rejects(() =>
    collaborators.clients.treasury.executeOperation({
      operationId: 'op-2',
      operationType: 'transfer',
      amount: 10,
      signatureValidationId: 'sig-val-1',
      parameters: {}
    })
  );
  assert.deepEqual(outcomes, [['treasury', 'client_error']]);
});
