import type { FastifyBaseLogger } from 'fastify';
import type { z } from 'zod';

import type { Collaborators } from '../clients';
import { WorkflowValidationError } from '../errors';
import { classifyError, fail, type StepResult } from './result';
import type { StepFailure, StepHighlight, WorkflowExecutionContext } from './types';

export interface StepScope<TInput, TState> {
  input: TInput;
  state: TState;
  executionId: string;
  services: Collaborators;
  logger: FastifyBaseLogger;
  signal?: AbortSignal;
}

export interface StepOutput {
  results?: Record<string, unknown>;
  message?: string;
}

export interface PipelineStep<TInput, TState> {
  name: string;
  label: string;
  /** A non-fatal step logs its failure and lets the pipeline continue. */
  fatal: boolean;
  run(scope: StepScope<TInput, TState>): Promise<StepResult<StepOutput>>;
}

export interface CompletionEvent {
  eventType: string;
  data: Record<string, unknown>;
}

export interface PipelineDefinition<TInput, TState> {
  workflowId: string;
  inputKey: string;
  inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  createState(input: TInput): TState;
  steps: PipelineStep<TInput, TState>[];
  secondaryKeys?(input: TInput): string[];
  /** Records closing results on the context and names the domain completion event. */
  finalize(input: TInput, state: TState, context: WorkflowExecutionContext): CompletionEvent;
}

export interface PipelineRunArgs {
  context: WorkflowExecutionContext;
  services: Collaborators;
  logger: FastifyBaseLogger;
  checkpoint(context: WorkflowExecutionContext): Promise<void>;
  now(): Date;
  signal?: AbortSignal;
}

export type PipelineOutcome = { ok: true; completion: CompletionEvent } | { ok: false; failure: StepFailure };

export interface PipelineStepInfo {
  name: string;
  label: string;
  fatal: boolean;
}

/** A pipeline with its input and state types sealed inside, as stored in the registry. */
export interface WorkflowPipeline {
  workflowId: string;
  steps: readonly PipelineStepInfo[];
  /** Checks the payload shape without side effects; an empty list means `run` may start. */
  parseInputs(inputs: Record<string, unknown>): string[];
  secondaryKeys(inputs: Record<string, unknown>): string[];
  run(args: PipelineRunArgs): Promise<PipelineOutcome>;
}

function describeIssues(inputKey: string, error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = [inputKey, ...issue.path].join('.');
    return `${path}: ${issue.message}`;
  });
}

export function definePipeline<TInput, TState>(definition: PipelineDefinition<TInput, TState>): WorkflowPipeline {
  const steps = definition.steps.map(({ name, label, fatal }) => ({ name, label, fatal }));

  const run = async (args: PipelineRunArgs): Promise<PipelineOutcome> => {
    const { context, logger, signal } = args;
    const log = logger.child({ executionId: context.executionId, workflowId: definition.workflowId });

    const record = async (highlight: StepHighlight) => {
      context.highlights.push(highlight);
      await args.checkpoint(context);
    };

    const parsed = definition.inputSchema.safeParse(context.inputs[definition.inputKey]);
    if (!parsed.success) {
      throw new WorkflowValidationError(
        `Invalid request for workflow ${definition.workflowId}`,
        describeIssues(definition.inputKey, parsed.error)
      );
    }

    const input = parsed.data;
    const state = definition.createState(input);
    const scope: StepScope<TInput, TState> = {
      input,
      state,
      executionId: context.executionId,
      services: args.services,
      logger: log,
      signal
    };

    for (const step of definition.steps) {
      if (signal?.aborted) {
        return { ok: false, failure: { kind: 'cancelled', step: step.name, message: 'Execution cancelled' } };
      }

      context.currentStep = step.label;
      await args.checkpoint(context);

      const started = args.now();
      let result: StepResult<StepOutput>;
      try {
        result = await step.run(scope);
      } catch (error) {
        const classified = classifyError(error, signal);
        result = fail(classified.kind, classified.message);
      }
      const durationMs = Math.max(0, args.now().getTime() - started.getTime());

      if (result.ok) {
        Object.assign(context.results, result.value.results ?? {});
        context.completedSteps += 1;
        await record({
          step: step.name,
          label: step.label,
          status: 'SUCCESS',
          startedAt: started.toISOString(),
          durationMs,
          message: result.value.message
        });
        log.debug({ step: step.name, durationMs }, 'Workflow step succeeded');
        continue;
      }

      if (!step.fatal && result.kind !== 'cancelled') {
        context.completedSteps += 1;
        await record({
          step: step.name,
          label: step.label,
          status: 'SKIPPED',
          startedAt: started.toISOString(),
          durationMs,
          message: result.message
        });
        log.warn({ step: step.name, kind: result.kind, reason: result.message }, 'Non-fatal workflow step failed');
        continue;
      }

      await record({
        step: step.name,
        label: step.label,
        status: 'FAILED',
        startedAt: started.toISOString(),
        durationMs,
        message: result.message
      });
      log.debug({ step: step.name, kind: result.kind }, 'Workflow step failed');
      return { ok: false, failure: { kind: result.kind, step: step.name, message: result.message } };
    }

    context.currentStep = null;
    return { ok: true, completion: definition.finalize(input, state, context) };
  };

  return {
    workflowId: definition.workflowId,
    steps,
    parseInputs(inputs) {
      const parsed = definition.inputSchema.safeParse(inputs[definition.inputKey]);
      return parsed.success ? [] : describeIssues(definition.inputKey, parsed.error);
    },
    secondaryKeys(inputs) {
      if (!definition.secondaryKeys) {
        return [];
      }
      const parsed = definition.inputSchema.safeParse(inputs[definition.inputKey]);
      return parsed.success ? definition.secondaryKeys(parsed.data) : [];
    },
    run
  };
}

export class PipelineRegistry {
  private readonly pipelines = new Map<string, WorkflowPipeline>();

  constructor(pipelines: readonly WorkflowPipeline[]) {
    for (const pipeline of pipelines) {
      if (this.pipelines.has(pipeline.workflowId)) {
        throw new Error(`Duplicate pipeline for workflow ${pipeline.workflowId}`);
      }
      this.pipelines.set(pipeline.workflowId, pipeline);
    }
  }

  get(workflowId: string): WorkflowPipeline | null {
    return this.pipelines.get(workflowId) ?? null;
  }

  workflowIds(): string[] {
    return [...this.pipelines.keys()];
  }
}
