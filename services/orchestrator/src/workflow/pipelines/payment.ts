import { z } from 'zod';

import type { PaymentProcessingResult } from '../../clients/payment';
import { WORKFLOW_IDS } from '../catalog';
import { fail, ok } from '../result';
import { definePipeline } from '../runtime';
import { requestSignatureGate, resultSignatureGate, signedRequestFields, type SignatureTrail } from '../signatureGate';

export const paymentRequestSchema = z.object({
  paymentId: z.string().min(1),
  amount: z.number().positive(),
  fromAccountId: z.string().min(1),
  toAccountId: z.string().min(1),
  userId: z.string().optional(),
  ...signedRequestFields
});

export type PaymentRequest = z.infer<typeof paymentRequestSchema>;

interface PaymentState extends SignatureTrail {
  ledgerValidationId: string | null;
  payment: PaymentProcessingResult | null;
}

export const paymentPipeline = definePipeline<PaymentRequest, PaymentState>({
  workflowId: WORKFLOW_IDS.payment,
  inputKey: 'paymentRequest',
  inputSchema: paymentRequestSchema,
  createState: () => ({ signatureValidationId: '', ledgerValidationId: null, payment: null }),
  steps: [
    requestSignatureGate<PaymentRequest, PaymentState>({
      operation: 'payment',
      accountId: (input) => input.fromAccountId
    }),
    {
      name: 'validate-ledger',
      label: 'Validate transaction with ledger',
      fatal: true,
      async run({ input, state, services, signal }) {
        const validation = await services.ledger.validateTransaction(
          {
            operation: 'payment',
            amount: input.amount,
            fromAccount: input.fromAccountId,
            toAccount: input.toAccountId,
            signatureValidationId: state.signatureValidationId
          },
          signal
        );
        if (!validation.isValid) {
          return fail('business', `Ledger validation failed: ${validation.message}`);
        }
        state.ledgerValidationId = validation.validationId;
        return ok({ results: { ledgerValidationId: validation.validationId }, message: 'Ledger accepted transaction' });
      }
    },
    {
      name: 'process-payment',
      label: 'Execute payment',
      fatal: true,
      async run({ input, state, services, signal }) {
        state.payment = await services.payment.processPayment(
          {
            paymentId: input.paymentId,
            amount: input.amount,
            fromAccountId: input.fromAccountId,
            toAccountId: input.toAccountId,
            signatureValidationId: state.signatureValidationId
          },
          signal
        );
        return ok({ message: `Payment ${state.payment.paymentId} processed` });
      }
    },
    resultSignatureGate<PaymentRequest, PaymentState>({
      signingService: 'payment-gateway',
      result: (state) => (state.payment ? { data: state.payment, signature: state.payment.signature } : null),
      onVerified: (state) => ({
        paymentId: state.payment?.paymentId,
        transactionId: state.payment?.transactionId
      })
    })
  ],
  finalize: (input, state) => ({
    eventType: 'payment_completed',
    data: {
      paymentId: state.payment?.paymentId ?? input.paymentId,
      transactionId: state.payment?.transactionId ?? null,
      amount: input.amount,
      status: state.payment?.status ?? null
    }
  })
});
