import { z } from 'zod';

import type { ListingCreationResult } from '../../clients/marketplace';
import { WORKFLOW_IDS } from '../catalog';
import { ok } from '../result';
import { definePipeline } from '../runtime';
import { requestSignatureGate, signedRequestFields, type SignatureTrail } from '../signatureGate';

export const listingRequestSchema = z.object({
  listingId: z.string().optional(),
  tokenId: z.string().min(1),
  sellerId: z.string().min(1),
  quantity: z.number().positive(),
  basePrice: z.number().nonnegative(),
  pricingModel: z.string().min(1),
  listingType: z.string().min(1),
  ...signedRequestFields
});

export type ListingRequest = z.infer<typeof listingRequestSchema>;

interface ListingState extends SignatureTrail {
  listing: ListingCreationResult | null;
}

export const listingPipeline = definePipeline<ListingRequest, ListingState>({
  workflowId: WORKFLOW_IDS.listing,
  inputKey: 'listingRequest',
  inputSchema: listingRequestSchema,
  createState: () => ({ signatureValidationId: '', listing: null }),
  steps: [
    requestSignatureGate<ListingRequest, ListingState>({
      operation: 'listing_creation',
      accountId: (input) => input.sellerId
    }),
    {
      name: 'create-listing',
      label: 'Create listing',
      fatal: true,
      async run({ input, state, services, signal }) {
        const listing = await services.marketplace.createListing(
          {
            tokenId: input.tokenId,
            sellerId: input.sellerId,
            quantity: input.quantity,
            basePrice: input.basePrice,
            pricingModel: input.pricingModel,
            listingType: input.listingType,
            signatureValidationId: state.signatureValidationId
          },
          signal
        );
        state.listing = listing;
        return ok({
          results: { listingId: listing.listingId, tokenId: listing.tokenId || input.tokenId },
          message: `Listing ${listing.listingId} created`
        });
      }
    }
  ],
  finalize: (input, state) => ({
    eventType: 'listing_created',
    data: {
      listingId: state.listing?.listingId ?? null,
      tokenId: state.listing?.tokenId || input.tokenId,
      sellerId: input.sellerId,
      quantity: input.quantity
    }
  })
});
