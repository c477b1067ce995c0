import { randomUUID } from 'node:crypto';

import type { FastifyBaseLogger } from 'fastify';

import type { Collaborators } from '../clients';
import { WorkflowInfrastructureError, WorkflowValidationError } from '../errors';
import type { OrchestratorMetrics } from '../metrics';
import type { WorkflowCatalog } from './catalog';
import type { ExecutionStore } from './executionStore';
import type { PipelineOutcome, PipelineRegistry } from './runtime';
import { safeResults } from './statusReporter';
import type { StepFailure, ValidationResult, WorkflowExecutionContext } from './types';
import type { WorkflowEventPublisher } from './workflowEvents';

export interface WorkflowExecutorOptions {
  catalog: WorkflowCatalog;
  pipelines: PipelineRegistry;
  store: ExecutionStore;
  collaborators: Collaborators;
  events: WorkflowEventPublisher;
  logger: FastifyBaseLogger;
  metrics?: OrchestratorMetrics;
  ttlMs: number;
  now?: () => Date;
  generateId?: () => string;
}

export interface ExecuteRequest {
  workflowId: string;
  inputs: Record<string, unknown>;
  triggeredBy: string;
  context?: Record<string, string>;
  priority?: number;
  description?: string;
  correlationId?: string;
}

export interface ExecutionResult {
  executionId: string;
  workflowId: string;
  status: 'SUCCESS' | 'FAILED';
  startedAt: string;
  completedAt: string;
  estimatedCompletion: string;
  message: string;
  results: Record<string, unknown>;
  error?: StepFailure;
}

const DISPATCH_STEP = 'dispatch';
const FINALIZE_STEP = 'finalize';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs a workflow to a terminal state within the calling request. Validation happens
 * before anything is stored or called; every failure after that is converted into a
 * terminal `FAILED` context and a `workflow_failed` event here and nowhere else.
 */
export class WorkflowExecutor {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(private readonly options: WorkflowExecutorOptions) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;

    const missing = options.catalog
      .listActive()
      .map((definition) => definition.id)
      .filter((workflowId) => !options.pipelines.get(workflowId));
    if (missing.length > 0) {
      throw new Error(`No pipeline registered for workflows: ${missing.join(', ')}`);
    }
  }

  /** The exact precondition `execute` enforces: declared inputs first, then the pipeline's payload schema. */
  validate(workflowId: string, inputs: Record<string, unknown>): ValidationResult {
    const validation = this.options.catalog.validate(workflowId, inputs);
    const pipeline = this.options.pipelines.get(workflowId);
    if (!validation.isValid || !pipeline) {
      return validation;
    }
    const errors = pipeline.parseInputs(inputs);
    return errors.length > 0 ? { ...validation, isValid: false, errors } : validation;
  }

  async execute(request: ExecuteRequest, signal?: AbortSignal): Promise<ExecutionResult> {
    const { catalog, pipelines, store, events, ttlMs, metrics } = this.options;

    const validation = this.validate(request.workflowId, request.inputs);
    const definition = catalog.get(request.workflowId);
    const pipeline = pipelines.get(request.workflowId);
    if (!validation.isValid || !definition || !pipeline) {
      const errors = validation.errors.length > 0 ? validation.errors : [`Workflow not found: ${request.workflowId}`];
      throw new WorkflowValidationError(`Invalid request for workflow ${request.workflowId}`, errors);
    }

    const executionId = this.generateId();
    const started = this.now();
    const logger = this.options.logger.child({ executionId, workflowId: definition.id });

    const metadata: Record<string, string> = { ...(request.context ?? {}) };
    metadata.priority = String(request.priority ?? 5);
    if (request.description) {
      metadata.description = request.description;
    }
    if (request.correlationId) {
      metadata.correlationId = request.correlationId;
    }

    const context: WorkflowExecutionContext = {
      executionId,
      workflowId: definition.id,
      inputs: request.inputs,
      metadata,
      triggeredBy: request.triggeredBy,
      startedAt: started.toISOString(),
      completedAt: null,
      status: 'RUNNING',
      results: {},
      highlights: [],
      completedSteps: 0,
      totalSteps: pipeline.steps.length,
      currentStep: null,
      error: null
    };

    await store.put(executionId, context, ttlMs);

    logger.info({ triggeredBy: request.triggeredBy }, 'Workflow execution started');
    events.publish(definition.id, executionId, 'workflow_started', { triggeredBy: request.triggeredBy }, request.correlationId);

    let outcome: PipelineOutcome;
    try {
      for (const secondaryKey of pipeline.secondaryKeys(request.inputs)) {
        await store.putIndex(secondaryKey, executionId, ttlMs);
      }
      outcome = await pipeline.run({
        context,
        services: this.options.collaborators,
        logger,
        checkpoint: (snapshot) => store.put(executionId, snapshot, ttlMs),
        now: this.now,
        signal
      });
    } catch (error) {
      logger.error({ err: error }, 'Workflow pipeline raised an unexpected error');
      outcome = {
        ok: false,
        failure: {
          kind: 'infrastructure',
          step: DISPATCH_STEP,
          message: describeError(error)
        }
      };
    }

    const completed = this.now();
    context.completedAt = completed.toISOString();
    context.currentStep = null;
    context.status = outcome.ok ? 'SUCCESS' : 'FAILED';
    context.error = outcome.ok ? null : outcome.failure;
    try {
      await store.put(executionId, context, ttlMs);
    } catch (error) {
      logger.error({ err: error }, 'Failed to persist the terminal execution state');
      const failure: StepFailure = { kind: 'infrastructure', step: FINALIZE_STEP, message: describeError(error) };
      context.status = 'FAILED';
      context.error = failure;
      outcome = { ok: false, failure };
    }

    const durationSeconds = Math.max(0, completed.getTime() - started.getTime()) / 1000;
    metrics?.workflowExecutions.inc({ workflow: definition.id, status: context.status });
    metrics?.workflowDuration.observe({ workflow: definition.id, status: context.status }, durationSeconds);

    const estimatedCompletion = new Date(started.getTime() + definition.estimatedDurationMs).toISOString();
    const base = {
      executionId,
      workflowId: definition.id,
      startedAt: context.startedAt,
      completedAt: context.completedAt,
      estimatedCompletion,
      results: safeResults(context.results)
    };

    if (!outcome.ok) {
      const { failure } = outcome;
      events.publish(
        definition.id,
        executionId,
        'workflow_failed',
        { step: failure.step, kind: failure.kind, error: failure.message },
        request.correlationId
      );

      if (failure.kind === 'infrastructure') {
        logger.error({ step: failure.step, reason: failure.message }, 'Workflow execution failed');
        throw new WorkflowInfrastructureError(executionId, failure);
      }

      logger.warn({ step: failure.step, kind: failure.kind, reason: failure.message }, 'Workflow execution failed');
      return {
        ...base,
        status: 'FAILED',
        message: `Workflow failed at ${failure.step}: ${failure.message}`,
        error: failure
      };
    }

    events.publish(definition.id, executionId, outcome.completion.eventType, outcome.completion.data, request.correlationId);
    events.publish(
      definition.id,
      executionId,
      'workflow_completed',
      { durationMs: Math.round(durationSeconds * 1000) },
      request.correlationId
    );
    logger.info({ durationMs: Math.round(durationSeconds * 1000) }, 'Workflow execution completed');

    return {
      ...base,
      status: 'SUCCESS',
      message: `${definition.name} completed`
    };
  }
}
