import { z } from 'zod';

import type { ServiceClient } from './serviceClient';

export interface RequestSignatureValidation {
  accountId: string;
  operation: string;
  operationData: unknown;
  nonce: string;
  sequenceNumber: number;
  timestamp: string;
  signature: string;
  algorithm: string;
}

export interface ResultSignatureValidation {
  originalValidationId: string;
  resultData: unknown;
  resultSignature: string;
  signingService: string;
}

export interface DualSignatureValidation {
  accountId: string;
  operation: string;
  operationData: unknown;
  classicSignature: string;
  quantumSignature: string;
  nonce: string;
  sequenceNumber: number;
  timestamp: string;
}

export const signatureValidationResultSchema = z.object({
  isValid: z.boolean(),
  validationId: z.string().default(''),
  message: z.string().default(''),
  metadata: z.record(z.unknown()).default({})
});

export type SignatureValidationResult = z.infer<typeof signatureValidationResultSchema>;

export interface SignatureServiceClient {
  validateRequest(request: RequestSignatureValidation, signal?: AbortSignal): Promise<SignatureValidationResult>;
  validateResult(request: ResultSignatureValidation, signal?: AbortSignal): Promise<SignatureValidationResult>;
  validateDual(request: DualSignatureValidation, signal?: AbortSignal): Promise<SignatureValidationResult>;
}

export class HttpSignatureServiceClient implements SignatureServiceClient {
  constructor(private readonly http: ServiceClient) {}

  validateRequest(request: RequestSignatureValidation, signal?: AbortSignal) {
    return this.http.post('/api/signatures/validate-request', {
      body: request,
      schema: signatureValidationResultSchema,
      signal
    });
  }

  validateResult(request: ResultSignatureValidation, signal?: AbortSignal) {
    return this.http.post('/api/signatures/validate-result', {
      body: request,
      schema: signatureValidationResultSchema,
      signal
    });
  }

  validateDual(request: DualSignatureValidation, signal?: AbortSignal) {
    return this.http.post('/api/signatures/validate-dual', {
      body: request,
      schema: signatureValidationResultSchema,
      signal
    });
  }
}
