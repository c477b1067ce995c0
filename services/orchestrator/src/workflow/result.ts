import { ServiceClientError } from '../clients/serviceClient';
import type { StepFailureKind } from './types';

export type StepResult<T> =
  | { ok: true; value: T }
  | { ok: false; kind: StepFailureKind; message: string };

export const ok = <T>(value: T): StepResult<T> => ({ ok: true, value });

export const fail = <T = never>(kind: StepFailureKind, message: string): StepResult<T> => ({
  ok: false,
  kind,
  message
});

/**
 * Maps an error thrown by a collaborator client onto a failure kind. Collaborator
 * rejections (4xx) are business failures; anything that says nothing about the
 * request itself is infrastructure.
 */
export function classifyError(error: unknown, signal?: AbortSignal): { kind: StepFailureKind; message: string } {
  if (signal?.aborted) {
    return { kind: 'cancelled', message: 'Execution cancelled' };
  }
  if (error instanceof ServiceClientError) {
    if (error.code === 'ABORTED') {
      return { kind: 'cancelled', message: `${error.service} call cancelled` };
    }
    if (error.code === 'HTTP_ERROR' && error.statusCode >= 400 && error.statusCode < 500) {
      return { kind: 'business', message: `${error.service} rejected the request: ${error.message}` };
    }
    return { kind: 'infrastructure', message: `${error.service} unavailable: ${error.message}` };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { kind: 'infrastructure', message };
}
