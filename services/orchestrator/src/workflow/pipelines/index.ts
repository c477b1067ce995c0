import { PipelineRegistry, type WorkflowPipeline } from '../runtime';
import { analyticsPipeline } from './analytics';
import { escrowPipeline } from './escrow';
import { listingPipeline } from './listing';
import { onboardingPipeline } from './onboarding';
import { orderPipeline } from './order';
import { paymentPipeline } from './payment';
import { treasuryPipeline } from './treasury';

export const DEFAULT_PIPELINES: readonly WorkflowPipeline[] = [
  paymentPipeline,
  onboardingPipeline,
  treasuryPipeline,
  listingPipeline,
  orderPipeline,
  escrowPipeline,
  analyticsPipeline
];

export const createPipelineRegistry = (pipelines: readonly WorkflowPipeline[] = DEFAULT_PIPELINES) =>
  new PipelineRegistry(pipelines);

export { onboardingIndexKey } from './onboarding';
export { escrowOrderStatus, escrowSigner } from './escrow';
