import { ZodError } from 'zod';

import type { StepFailure } from './workflow/types';

export class WorkflowValidationError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[]) {
    super(message);
    this.name = 'WorkflowValidationError';
    this.errors = errors;
  }
}

export class ExecutionNotFoundError extends Error {
  readonly executionId: string;

  constructor(executionId: string) {
    super(`Execution ${executionId} not found or expired`);
    this.name = 'ExecutionNotFoundError';
    this.executionId = executionId;
  }
}

/** Raised once an execution has ended on an infrastructure fault; the failure is already announced. */
export class WorkflowInfrastructureError extends Error {
  readonly executionId: string;
  readonly failure: StepFailure;

  constructor(executionId: string, failure: StepFailure) {
    super(`Workflow execution ${executionId} failed at ${failure.step}: ${failure.message}`);
    this.name = 'WorkflowInfrastructureError';
    this.executionId = executionId;
    this.failure = failure;
  }
}

export interface ErrorResponse {
  statusCode: number;
  body: {
    error: string;
    message: string;
    details?: unknown;
    executionId?: string;
  };
}

function clientStatusCode(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('statusCode' in error)) {
    return null;
  }
  const { statusCode } = error;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500 ? statusCode : null;
}

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof WorkflowValidationError) {
    return {
      statusCode: 400,
      body: { error: 'InvalidRequest', message: error.message, details: { errors: error.errors } }
    };
  }

  if (error instanceof ExecutionNotFoundError) {
    return {
      statusCode: 404,
      body: { error: 'ExecutionNotFound', message: error.message }
    };
  }

  if (error instanceof WorkflowInfrastructureError) {
    return {
      statusCode: 500,
      body: { error: 'InternalServerError', message: 'Workflow execution failed', executionId: error.executionId }
    };
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      body: { error: 'InvalidRequest', message: 'Request validation failed', details: error.flatten() }
    };
  }

  const statusCode = clientStatusCode(error);
  if (statusCode !== null) {
    return {
      statusCode,
      body: {
        error: 'InvalidRequest',
        message: error instanceof Error ? error.message : 'Invalid request'
      }
    };
  }

  return {
    statusCode: 500,
    body: { error: 'InternalServerError', message: 'Unexpected error' }
  };
};
