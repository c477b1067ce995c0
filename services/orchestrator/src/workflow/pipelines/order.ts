import { z } from 'zod';

import type { OrderCreationResult } from '../../clients/marketplace';
import { WORKFLOW_IDS } from '../catalog';
import { fail, ok } from '../result';
import { definePipeline } from '../runtime';
import { requestSignatureGate, signedRequestFields, type SignatureTrail } from '../signatureGate';

export const orderRequestSchema = z.object({
  orderId: z.string().optional(),
  listingId: z.string().min(1),
  buyerId: z.string().min(1),
  sellerId: z.string().min(1),
  quantity: z.number().positive(),
  totalAmount: z.number().nonnegative(),
  escrowRequired: z.boolean().default(false),
  ...signedRequestFields
});

export type OrderRequest = z.infer<typeof orderRequestSchema>;

interface OrderState extends SignatureTrail {
  listingValidationId: string;
  order: OrderCreationResult | null;
}

export const orderPipeline = definePipeline<OrderRequest, OrderState>({
  workflowId: WORKFLOW_IDS.order,
  inputKey: 'orderRequest',
  inputSchema: orderRequestSchema,
  createState: () => ({ signatureValidationId: '', listingValidationId: '', order: null }),
  steps: [
    requestSignatureGate<OrderRequest, OrderState>({
      operation: 'order_creation',
      accountId: (input) => input.buyerId
    }),
    {
      name: 'validate-listing',
      label: 'Validate listing availability',
      fatal: true,
      async run({ input, state, services, signal }) {
        const validation = await services.marketplace.validateListing(
          input.listingId,
          { quantity: input.quantity, buyerId: input.buyerId, signatureValidationId: state.signatureValidationId },
          signal
        );
        if (!validation.isValid) {
          return fail('business', `Listing validation failed: ${validation.message}`);
        }
        state.listingValidationId = validation.validationId;
        return ok({
          results: { listingValidationId: validation.validationId },
          message: `Listing ${input.listingId} available`
        });
      }
    },
    {
      name: 'create-order',
      label: 'Create order',
      fatal: true,
      async run({ input, state, services, signal }) {
        const order = await services.marketplace.createOrder(
          {
            listingId: input.listingId,
            buyerId: input.buyerId,
            sellerId: input.sellerId,
            quantity: input.quantity,
            totalAmount: input.totalAmount,
            escrowRequired: input.escrowRequired,
            signatureValidationId: state.signatureValidationId,
            listingValidationId: state.listingValidationId
          },
          signal
        );
        state.order = order;
        return ok({
          results: { orderId: order.orderId, listingId: order.listingId || input.listingId },
          message: `Order ${order.orderId} created`
        });
      }
    }
  ],
  finalize: (input, state) => ({
    eventType: 'order_created',
    data: {
      orderId: state.order?.orderId ?? null,
      listingId: input.listingId,
      buyerId: input.buyerId,
      totalAmount: input.totalAmount,
      escrowRequired: input.escrowRequired
    }
  })
});
