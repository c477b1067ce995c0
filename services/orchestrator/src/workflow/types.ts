import { z } from 'zod';

export const WORKFLOW_STATUSES = ['RUNNING', 'SUCCESS', 'FAILED'] as const;
export type WorkflowStatus = (typeof WORKFLOW_STATUSES)[number];

export const STEP_FAILURE_KINDS = ['validation', 'authorization', 'business', 'infrastructure', 'cancelled'] as const;
export type StepFailureKind = (typeof STEP_FAILURE_KINDS)[number];

export type WorkflowInputType = 'object' | 'string' | 'number' | 'boolean';

export interface WorkflowInputDefinition {
  name: string;
  type: WorkflowInputType;
  required: boolean;
  description: string;
}

export interface WorkflowDefinition {
  id: string;
  name: string;
  description: string;
  estimatedDurationMs: number;
  inputs: readonly WorkflowInputDefinition[];
  active: boolean;
}

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  estimatedDurationMs?: number;
}

export const stepFailureSchema = z.object({
  kind: z.enum(STEP_FAILURE_KINDS),
  step: z.string(),
  message: z.string()
});

export type StepFailure = z.infer<typeof stepFailureSchema>;

export const stepHighlightSchema = z.object({
  step: z.string(),
  label: z.string(),
  status: z.enum(['SUCCESS', 'FAILED', 'SKIPPED']),
  startedAt: z.string(),
  durationMs: z.number(),
  message: z.string().optional()
});

export type StepHighlight = z.infer<typeof stepHighlightSchema>;

export const executionContextSchema = z.object({
  executionId: z.string().min(1),
  workflowId: z.string().min(1),
  inputs: z.record(z.unknown()),
  metadata: z.record(z.string()),
  triggeredBy: z.string(),
  startedAt: z.string(),
  completedAt: z.string().nullable(),
  status: z.enum(WORKFLOW_STATUSES),
  results: z.record(z.unknown()),
  highlights: z.array(stepHighlightSchema),
  completedSteps: z.number().int().nonnegative(),
  totalSteps: z.number().int().nonnegative(),
  currentStep: z.string().nullable(),
  error: stepFailureSchema.nullable()
});

/**
 * State of one execution. Created `RUNNING` by the executor, mutated only by the
 * pipeline that owns the execution id, and finalized exactly once.
 */
export type WorkflowExecutionContext = z.infer<typeof executionContextSchema>;
