import { z } from 'zod';

import type { ServiceClient } from './serviceClient';

export interface LedgerTransactionValidation {
  operation: string;
  amount: number;
  fromAccount: string;
  toAccount: string;
  signatureValidationId: string;
}

export const ledgerValidationResultSchema = z.object({
  isValid: z.boolean(),
  validationId: z.string().default(''),
  message: z.string().default('')
});

export type LedgerValidationResult = z.infer<typeof ledgerValidationResultSchema>;

export interface LedgerServiceClient {
  validateTransaction(request: LedgerTransactionValidation, signal?: AbortSignal): Promise<LedgerValidationResult>;
}

export class HttpLedgerServiceClient implements LedgerServiceClient {
  constructor(private readonly http: ServiceClient) {}

  validateTransaction(request: LedgerTransactionValidation, signal?: AbortSignal) {
    return this.http.post('/api/ledger/transactions/validate', {
      body: request,
      schema: ledgerValidationResultSchema,
      signal
    });
  }
}
