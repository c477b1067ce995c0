import type { ValidationResult, WorkflowDefinition, WorkflowInputDefinition, WorkflowInputType } from './types';

export const WORKFLOW_IDS = {
  payment: 'payment-processing-zero-trust',
  onboarding: 'user-onboarding-optimized',
  treasury: 'treasury-operations-secure',
  listing: 'marketplace-listing-creation',
  order: 'marketplace-order-processing',
  escrow: 'marketplace-escrow-management',
  analytics: 'marketplace-analytics-processing'
} as const;

const objectInput = (name: string, description: string): WorkflowInputDefinition => ({
  name,
  type: 'object',
  required: true,
  description
});

export const DEFAULT_WORKFLOW_DEFINITIONS: readonly WorkflowDefinition[] = [
  {
    id: WORKFLOW_IDS.payment,
    name: 'Zero-Trust Payment Processing',
    description: 'Signed payment validated by the ledger, executed, and checked against a signed result',
    estimatedDurationMs: 5_000,
    inputs: [objectInput('paymentRequest', 'Signed payment request')],
    active: true
  },
  {
    id: WORKFLOW_IDS.onboarding,
    name: 'Optimized User Onboarding',
    description: 'Provisions, persists and publishes a multisig artifact set for a new user',
    estimatedDurationMs: 10_000,
    inputs: [objectInput('userRegistration', 'Registration payload carrying the user id')],
    active: true
  },
  {
    id: WORKFLOW_IDS.treasury,
    name: 'Secure Treasury Operations',
    description: 'Records a treasury operation request',
    estimatedDurationMs: 15_000,
    inputs: [objectInput('treasuryOperation', 'Treasury operation request')],
    active: true
  },
  {
    id: WORKFLOW_IDS.listing,
    name: 'Marketplace Listing Creation',
    description: 'Creates a marketplace listing from a seller-signed request',
    estimatedDurationMs: 3_000,
    inputs: [objectInput('listingRequest', 'Seller-signed listing request')],
    active: true
  },
  {
    id: WORKFLOW_IDS.order,
    name: 'Marketplace Order Processing',
    description: 'Checks listing availability and creates an order from a buyer-signed request',
    estimatedDurationMs: 5_000,
    inputs: [objectInput('orderRequest', 'Buyer-signed order request')],
    active: true
  },
  {
    id: WORKFLOW_IDS.escrow,
    name: 'Marketplace Escrow Management',
    description: 'Releases or cancels the escrow of an order',
    estimatedDurationMs: 7_000,
    inputs: [objectInput('escrowRequest', 'Signed escrow action')],
    active: true
  },
  {
    id: WORKFLOW_IDS.analytics,
    name: 'Marketplace Analytics Processing',
    description: 'Collects, aggregates and reports marketplace analytics',
    estimatedDurationMs: 10_000,
    inputs: [objectInput('analyticsRequest', 'Analytics report request')],
    active: true
  }
];

function matchesType(value: unknown, type: WorkflowInputType): boolean {
  switch (type) {
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
  }
}

/** Validates an input bag against a definition. Pure: same arguments, same answer. */
export function validateInputs(definition: WorkflowDefinition, inputs: Record<string, unknown>): ValidationResult {
  const errors: string[] = [];
  for (const input of definition.inputs) {
    const value = inputs[input.name];
    if (value === undefined || value === null) {
      if (input.required) {
        errors.push(`Required input missing: ${input.name}`);
      }
      continue;
    }
    if (!matchesType(value, input.type)) {
      errors.push(`Input ${input.name} must be of type ${input.type}`);
    }
  }
  return {
    isValid: errors.length === 0,
    errors,
    estimatedDurationMs: definition.estimatedDurationMs
  };
}

/** Immutable registry of workflow definitions, built once and passed to its consumers. */
export class WorkflowCatalog {
  private readonly definitions: ReadonlyMap<string, WorkflowDefinition>;

  constructor(definitions: readonly WorkflowDefinition[] = DEFAULT_WORKFLOW_DEFINITIONS) {
    const entries = new Map<string, WorkflowDefinition>();
    for (const definition of definitions) {
      if (entries.has(definition.id)) {
        throw new Error(`Duplicate workflow definition: ${definition.id}`);
      }
      entries.set(definition.id, Object.freeze({ ...definition, inputs: Object.freeze([...definition.inputs]) }));
    }
    this.definitions = entries;
  }

  listActive(): WorkflowDefinition[] {
    return [...this.definitions.values()].filter((definition) => definition.active);
  }

  get(workflowId: string): WorkflowDefinition | null {
    return this.definitions.get(workflowId) ?? null;
  }

  validate(workflowId: string, inputs: Record<string, unknown>): ValidationResult {
    const definition = this.get(workflowId);
    if (!definition) {
      return { isValid: false, errors: [`Workflow not found: ${workflowId}`] };
    }
    if (!definition.active) {
      return { isValid: false, errors: [`Workflow is not active: ${workflowId}`] };
    }
    return validateInputs(definition, inputs);
  }
}
