import { z } from 'zod';

import type { ServiceClient } from './serviceClient';

export interface TreasuryOperationRequest {
  operationId: string;
  operationType: string;
  amount: number;
  signatureValidationId: string;
  parameters: Record<string, unknown>;
}

export const treasuryOperationResultSchema = z.object({
  operationId: z.string().min(1),
  status: z.string(),
  executedAt: z.string().optional()
});

export type TreasuryOperationResult = z.infer<typeof treasuryOperationResultSchema>;

export const treasuryOperationStatusSchema = z.object({
  operationId: z.string().min(1),
  status: z.string(),
  createdAt: z.string().optional(),
  completedAt: z.string().nullable().optional()
});

export type TreasuryOperationStatus = z.infer<typeof treasuryOperationStatusSchema>;

export interface TreasuryServiceClient {
  executeOperation(request: TreasuryOperationRequest, signal?: AbortSignal): Promise<TreasuryOperationResult>;
  getOperationStatus(operationId: string, signal?: AbortSignal): Promise<TreasuryOperationStatus>;
}

export class HttpTreasuryServiceClient implements TreasuryServiceClient {
  constructor(private readonly http: ServiceClient) {}

  executeOperation(request: TreasuryOperationRequest, signal?: AbortSignal) {
    return this.http.post('/api/treasury/operations', {
      body: request,
      schema: treasuryOperationResultSchema,
      signal
    });
  }

  getOperationStatus(operationId: string, signal?: AbortSignal) {
    return this.http.get(`/api/treasury/operations/${encodeURIComponent(operationId)}/status`, {
      schema: treasuryOperationStatusSchema,
      signal
    });
  }
}
