import assert from 'node:assert/strict';
import { test } from 'node:test';

import { DEFAULT_WORKFLOW_DEFINITIONS, WORKFLOW_IDS, WorkflowCatalog, validateInputs } from '../src/workflow/catalog';
import type { WorkflowDefinition } from '../src/workflow/types';

test('listActive returns every cataloged workflow', () => {
  const catalog = new WorkflowCatalog();
  const ids = catalog.listActive().map((definition) => definition.id);
  assert.deepEqual(ids, [
    'payment-processing-zero-trust',
    'user-onboarding-optimized',
    'treasury-operations-secure',
    'marketplace-listing-creation',
    'marketplace-order-processing',
    'marketplace-escrow-management',
    'marketplace-analytics-processing'
  ]);
});

test('get returns null for an unknown workflow', () => {
  const catalog = new WorkflowCatalog();
  assert.equal(catalog.get('no-such-workflow'), null);
  assert.equal(catalog.get(WORKFLOW_IDS.payment)?.name, 'Zero-Trust Payment Processing');
});

test('validate names the missing input and is repeatable', () => {
  const catalog = new WorkflowCatalog();
  const first = catalog.validate(WORKFLOW_IDS.payment, {});
  const second = catalog.validate(WORKFLOW_IDS.payment, {});

  assert.deepEqual(first, {
    isValid: false,
    errors: ['Required input missing: paymentRequest'],
    estimatedDurationMs: 5_000
  });
  assert.deepEqual(second, first);
});

test('validate reports unknown and inactive workflows', () => {
  const inactive: WorkflowDefinition = {
    id: 'retired-flow',
    name: 'Retired',
    description: 'No longer offered',
    estimatedDurationMs: 1_000,
    inputs: [],
    active: false
  };
  const catalog = new WorkflowCatalog([...DEFAULT_WORKFLOW_DEFINITIONS, inactive]);

  assert.deepEqual(catalog.validate('missing-flow', {}), {
    isValid: false,
    errors: ['Workflow not found: missing-flow']
  });
  assert.deepEqual(catalog.validate('retired-flow', {}), {
    isValid: false,
    errors: ['Workflow is not active: retired-flow']
  });
  assert.equal(
    catalog.listActive().some((definition) => definition.id === 'retired-flow'),
    false
  );
});

test('validateInputs reports every missing field and type mismatches', () => {
  const definition: WorkflowDefinition = {
    id: 'multi-input',
    name: 'Multi input',
    description: 'Several inputs',
    estimatedDurationMs: 2_000,
    inputs: [
      { name: 'first', type: 'object', required: true, description: 'first' },
      { name: 'second', type: 'string', required: true, description: 'second' },
      { name: 'third', type: 'number', required: false, description: 'third' }
    ],
    active: true
  };

  assert.deepEqual(validateInputs(definition, {}).errors, [
    'Required input missing: first',
    'Required input missing: second'
  ]);
  assert.deepEqual(validateInputs(definition, { first: [], second: 'ok', third: 'nope' }).errors, [
    'Input first must be of type object',
    'Input third must be of type number'
  ]);
  assert.equal(validateInputs(definition, { first: {}, second: 'ok' }).isValid, true);
});

test('catalog definitions are frozen', () => {
  const catalog = new WorkflowCatalog();
  const definition = catalog.get(WORKFLOW_IDS.listing);
  assert.ok(definition);
  assert.equal(Object.isFrozen(definition), true);
});

test('duplicate definitions are rejected', () => {
  assert.throws(
    () => new WorkflowCatalog([DEFAULT_WORKFLOW_DEFINITIONS[0], DEFAULT_WORKFLOW_DEFINITIONS[0]]),
    /Duplicate workflow definition: payment-processing-zero-trust/
  );
});
