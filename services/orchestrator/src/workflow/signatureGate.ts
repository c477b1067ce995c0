import { z } from 'zod';

import { fail, ok } from './result';
import type { PipelineStep } from './runtime';

/** Replay-protection fields every signed request carries. */
export const signedRequestFields = {
  nonce: z.string().min(1),
  sequenceNumber: z.number().int().nonnegative(),
  timestamp: z.string().min(1),
  signature: z.string().min(1),
  algorithm: z.string().min(1)
};

export interface SignedRequest {
  nonce: string;
  sequenceNumber: number;
  timestamp: string;
  signature: string;
  algorithm: string;
}

/** Pipeline state that threads the validation id of the request signature to later steps. */
export interface SignatureTrail {
  signatureValidationId: string;
}

export interface RequestSignatureGateOptions<TInput> {
  operation: string;
  accountId: (input: TInput) => string;
}

export function requestSignatureGate<TInput extends SignedRequest, TState extends SignatureTrail>(
  options: RequestSignatureGateOptions<TInput>
): PipelineStep<TInput, TState> {
  return {
    name: 'validate-request-signature',
    label: 'Validate request signature',
    fatal: true,
    async run({ input, state, services, signal }) {
      const validation = await services.signature.validateRequest(
        {
          accountId: options.accountId(input),
          operation: options.operation,
          operationData: input,
          nonce: input.nonce,
          sequenceNumber: input.sequenceNumber,
          timestamp: input.timestamp,
          signature: input.signature,
          algorithm: input.algorithm
        },
        signal
      );

      if (!validation.isValid) {
        return fail('authorization', `Invalid signature: ${validation.message || 'rejected by signature service'}`);
      }

      state.signatureValidationId = validation.validationId;
      return ok({
        results: { signatureValidationId: validation.validationId },
        message: 'Request signature verified'
      });
    }
  };
}

export interface SignedResult {
  data: unknown;
  signature: string;
}

export interface ResultSignatureGateOptions<TState> {
  signingService: string;
  /** The downstream response to check; `null` when the producing step left nothing behind. */
  result: (state: TState) => SignedResult | null;
  /** Results that may only be recorded once the response is trusted. */
  onVerified?: (state: TState) => Record<string, unknown>;
}

export function resultSignatureGate<TInput, TState extends SignatureTrail>(
  options: ResultSignatureGateOptions<TState>
): PipelineStep<TInput, TState> {
  return {
    name: 'validate-result-signature',
    label: 'Validate result signature',
    fatal: true,
    async run({ state, services, signal }) {
      const result = options.result(state);
      if (!result) {
        return fail('business', `${options.signingService} produced no result to verify`);
      }

      const validation = await services.signature.validateResult(
        {
          originalValidationId: state.signatureValidationId,
          resultData: result.data,
          resultSignature: result.signature,
          signingService: options.signingService
        },
        signal
      );

      if (!validation.isValid) {
        return fail('authorization', `Invalid result signature: ${validation.message || 'rejected by signature service'}`);
      }

      return ok({
        results: options.onVerified?.(state) ?? {},
        message: `${options.signingService} result signature verified`
      });
    }
  };
}
