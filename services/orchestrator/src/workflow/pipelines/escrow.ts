import { z } from 'zod';

import type { OrderStatusUpdateResult } from '../../clients/marketplace';
import { WORKFLOW_IDS } from '../catalog';
import { fail, ok } from '../result';
import { definePipeline } from '../runtime';
import { requestSignatureGate, signedRequestFields, type SignatureTrail } from '../signatureGate';

export const escrowRequestSchema = z.object({
  escrowId: z.string().min(1),
  orderId: z.string().min(1),
  action: z.string().min(1),
  buyerId: z.string().min(1),
  sellerId: z.string().min(1),
  amount: z.number().nonnegative().optional(),
  reason: z.string().optional(),
  ...signedRequestFields
});

export type EscrowRequest = z.infer<typeof escrowRequestSchema>;

interface EscrowState extends SignatureTrail {
  update: OrderStatusUpdateResult | null;
}

/** Releasing funds is the seller's call; every other action is signed by the buyer. */
export const escrowSigner = (input: Pick<EscrowRequest, 'action' | 'buyerId' | 'sellerId'>): string =>
  input.action === 'release' ? input.sellerId : input.buyerId;

export const escrowOrderStatus = (action: string): string => (action === 'release' ? 'Completed' : 'Cancelled');

export const escrowPipeline = definePipeline<EscrowRequest, EscrowState>({
  workflowId: WORKFLOW_IDS.escrow,
  inputKey: 'escrowRequest',
  inputSchema: escrowRequestSchema,
  createState: () => ({ signatureValidationId: '', update: null }),
  steps: [
    requestSignatureGate<EscrowRequest, EscrowState>({
      operation: 'escrow_management',
      accountId: escrowSigner
    }),
    {
      name: 'verify-order',
      label: 'Verify order state',
      fatal: true,
      async run({ input, state, services, signal }) {
        const verification = await services.marketplace.verifyOrder(
          input.orderId,
          {
            escrowId: input.escrowId,
            action: input.action,
            buyerId: input.buyerId,
            sellerId: input.sellerId,
            signatureValidationId: state.signatureValidationId
          },
          signal
        );
        if (!verification.isValid) {
          return fail('business', `Order verification failed: ${verification.message}`);
        }
        return ok({ message: `Order ${input.orderId} verified for ${input.action}` });
      }
    },
    {
      name: 'update-order-status',
      label: 'Update order and escrow status',
      fatal: true,
      async run({ input, state, services, signal }) {
        const update = await services.marketplace.updateOrderStatus(
          input.orderId,
          {
            escrowId: input.escrowId,
            newStatus: escrowOrderStatus(input.action),
            escrowAction: input.action,
            signatureValidationId: state.signatureValidationId
          },
          signal
        );
        state.update = update;
        return ok({
          results: {
            escrowId: input.escrowId,
            orderId: input.orderId,
            action: input.action,
            orderStatus: update.status
          },
          message: `Order ${input.orderId} moved to ${update.status}`
        });
      }
    }
  ],
  finalize: (input, state) => ({
    eventType: 'escrow_updated',
    data: {
      escrowId: input.escrowId,
      orderId: input.orderId,
      action: input.action,
      orderStatus: state.update?.status ?? escrowOrderStatus(input.action)
    }
  })
});
