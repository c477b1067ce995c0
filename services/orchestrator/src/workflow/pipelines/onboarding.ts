import { z } from 'zod';

import type { ArtifactBag } from '../../clients/multisig';
import type { UserProfile } from '../../clients/user';
import { WORKFLOW_IDS } from '../catalog';
import { fail, ok } from '../result';
import { definePipeline } from '../runtime';

export const userRegistrationSchema = z
  .object({
    userId: z.string().trim().min(1, 'userId is required for onboarding')
  })
  .passthrough();

export type UserRegistration = z.infer<typeof userRegistrationSchema>;

interface OnboardingState {
  profile: UserProfile | null;
  artifacts: ArtifactBag | null;
  persisted: ArtifactBag | null;
  published: ArtifactBag | null;
}

export const onboardingIndexKey = (userId: string) => `onboarding_user:${userId}`;

function pick(bag: ArtifactBag | null, key: string): string | number | null {
  const value = bag?.[key];
  return typeof value === 'string' || typeof value === 'number' ? value : null;
}

function definedEntries(entries: Record<string, string | number | null>): Record<string, string | number> {
  const result: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== null) {
      result[key] = value;
    }
  }
  return result;
}

export const onboardingPipeline = definePipeline<UserRegistration, OnboardingState>({
  workflowId: WORKFLOW_IDS.onboarding,
  inputKey: 'userRegistration',
  inputSchema: userRegistrationSchema,
  createState: () => ({ profile: null, artifacts: null, persisted: null, published: null }),
  secondaryKeys: (input) => [onboardingIndexKey(input.userId)],
  steps: [
    {
      name: 'fetch-user-profile',
      label: 'Fetch user profile',
      fatal: false,
      async run({ input, state, services, signal }) {
        state.profile = await services.user.getUser(input.userId, signal);
        return ok({ message: `Profile loaded for ${input.userId}` });
      }
    },
    {
      name: 'generate-multisig',
      label: 'Generate multisig artifacts',
      fatal: true,
      async run({ input, state, services, signal }) {
        const artifacts = await services.multisig.generate({ userId: input.userId }, signal);
        if (Object.keys(artifacts).length === 0) {
          return fail('business', 'Multisig artifact generation returned an empty result');
        }
        state.artifacts = artifacts;
        return ok({ message: 'Multisig artifacts generated' });
      }
    },
    {
      name: 'persist-multisig',
      label: 'Persist multisig artifacts',
      fatal: true,
      async run({ state, services, signal }) {
        if (!state.artifacts) {
          return fail('business', 'No multisig artifacts to persist');
        }
        state.persisted = await services.multisig.persist(state.artifacts, signal);
        return ok({
          results: definedEntries({
            multisigId: pick(state.persisted, 'id'),
            chainId: pick(state.persisted, 'chainId'),
            address: pick(state.persisted, 'address')
          }),
          message: 'Multisig artifacts persisted'
        });
      }
    },
    {
      name: 'publish-multisig',
      label: 'Publish artifacts to object storage',
      fatal: true,
      async run({ state, services, signal }) {
        if (!state.artifacts) {
          return fail('business', 'No multisig artifacts to publish');
        }
        state.published = await services.multisig.publishSets(state.artifacts, signal);
        return ok({
          results: definedEntries({
            s3Key: pick(state.published, 'key'),
            s3Etag: pick(state.published, 'etag')
          }),
          message: 'Multisig artifacts published'
        });
      }
    },
    {
      name: 'ingest-publication',
      label: 'Confirm published object',
      fatal: false,
      async run({ state, services, signal }) {
        const payload = definedEntries({
          key: pick(state.published, 'key'),
          idempotencyKey: pick(state.published, 'idempotencyKey')
        });
        if (Object.keys(payload).length === 0) {
          return ok({ message: 'Nothing published to confirm' });
        }
        await services.multisig.ingest(payload, signal);
        return ok({ results: { ingestConfirmed: true }, message: 'Published object confirmed' });
      }
    }
  ],
  finalize: (input, _state, context) => {
    context.results.userId = input.userId;
    context.results.operationId = context.executionId;
    return {
      eventType: 'onboarding_completed',
      data: {
        userId: input.userId,
        multisig: {
          id: context.results.multisigId ?? null,
          chainId: context.results.chainId ?? null,
          address: context.results.address ?? null
        },
        storage: {
          key: context.results.s3Key ?? null,
          etag: context.results.s3Etag ?? null
        }
      }
    };
  }
});
