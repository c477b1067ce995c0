import { z } from 'zod';

import type { ServiceClient } from './serviceClient';

export interface PaymentProcessingRequest {
  paymentId: string;
  amount: number;
  fromAccountId: string;
  toAccountId: string;
  signatureValidationId: string;
}

export const paymentProcessingResultSchema = z.object({
  paymentId: z.string().min(1),
  transactionId: z.string().min(1),
  status: z.string().default(''),
  processedAt: z.string().optional(),
  signature: z.string().default('')
});

export type PaymentProcessingResult = z.infer<typeof paymentProcessingResultSchema>;

export interface PaymentServiceClient {
  processPayment(request: PaymentProcessingRequest, signal?: AbortSignal): Promise<PaymentProcessingResult>;
}

export class HttpPaymentServiceClient implements PaymentServiceClient {
  constructor(private readonly http: ServiceClient) {}

  processPayment(request: PaymentProcessingRequest, signal?: AbortSignal) {
    return this.http.post('/api/payments/process', {
      body: request,
      schema: paymentProcessingResultSchema,
      signal
    });
  }
}
