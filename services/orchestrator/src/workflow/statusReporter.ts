import { ExecutionNotFoundError } from '../errors';
import type { WorkflowCatalog } from './catalog';
import type { ExecutionStore } from './executionStore';
import type { StepHighlight, WorkflowExecutionContext, WorkflowStatus } from './types';

/** Result keys that may leave the service; validation ids and signatures never do. */
export const SAFE_RESULT_KEYS = [
  'paymentId',
  'transactionId',
  'operationId',
  'userId',
  'accountId',
  'listingId',
  'orderId',
  'escrowId',
  'tokenId',
  'reportId',
  'multisigId',
  'chainId',
  'address',
  's3Key',
  's3Etag',
  'requestId',
  'analyticsType',
  'totalDataPoints',
  'action',
  'orderStatus',
  'ingestConfirmed'
] as const;

export function safeResults(results: Record<string, unknown>): Record<string, unknown> {
  const exposed: Record<string, unknown> = {};
  for (const key of SAFE_RESULT_KEYS) {
    if (results[key] !== undefined) {
      exposed[key] = results[key];
    }
  }
  return exposed;
}

/** 100 only once the execution succeeded; otherwise the share of finished steps, capped at 99. */
export function computeProgress(context: WorkflowExecutionContext): number {
  if (context.status === 'SUCCESS') {
    return 100;
  }
  if (context.totalSteps <= 0) {
    return 0;
  }
  const share = Math.floor((100 * context.completedSteps) / context.totalSteps);
  return Math.min(99, Math.max(0, share));
}

export interface ExecutionStatusView {
  executionId: string;
  workflowId: string;
  status: WorkflowStatus;
  currentStep: string | null;
  progress: number;
  startedAt: string;
  completedAt: string | null;
  durationMs: number;
  estimatedCompletion: string | null;
  highlights: StepHighlight[];
  results: Record<string, unknown>;
  errorMessage: string | null;
}

function describeCurrentStep(context: WorkflowExecutionContext): string | null {
  switch (context.status) {
    case 'SUCCESS':
      return 'Completed';
    case 'FAILED':
      return 'Failed';
    case 'RUNNING':
      return context.currentStep;
  }
}

export class ExecutionStatusReporter {
  constructor(
    private readonly store: ExecutionStore,
    private readonly catalog: WorkflowCatalog,
    private readonly now: () => Date = () => new Date()
  ) {}

  async getStatus(executionId: string): Promise<ExecutionStatusView> {
    const context = await this.load(executionId);
    const startedAt = new Date(context.startedAt);
    const endedAt = context.completedAt ? new Date(context.completedAt) : this.now();
    const estimatedDurationMs = this.catalog.get(context.workflowId)?.estimatedDurationMs;

    return {
      executionId: context.executionId,
      workflowId: context.workflowId,
      status: context.status,
      currentStep: describeCurrentStep(context),
      progress: computeProgress(context),
      startedAt: context.startedAt,
      completedAt: context.completedAt,
      durationMs: Math.max(0, endedAt.getTime() - startedAt.getTime()),
      estimatedCompletion:
        estimatedDurationMs === undefined ? null : new Date(startedAt.getTime() + estimatedDurationMs).toISOString(),
      highlights: context.highlights,
      results: safeResults(context.results),
      errorMessage: context.error?.message ?? null
    };
  }

  async getProgress(executionId: string): Promise<number> {
    return computeProgress(await this.load(executionId));
  }

  private async load(executionId: string): Promise<WorkflowExecutionContext> {
    const context = await this.store.get(executionId);
    if (!context) {
      throw new ExecutionNotFoundError(executionId);
    }
    return context;
  }
}
