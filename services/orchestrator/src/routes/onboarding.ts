import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { ExecutionNotFoundError, mapErrorToResponse } from '../errors';
import { WORKFLOW_IDS } from '../workflow/catalog';
import { onboardingIndexKey } from '../workflow/pipelines';
import type { AppContext } from '../types';
import { abortOnDisconnect } from './requestSignal';

const runBodySchema = z.object({
  userId: z.string().trim().min(1, 'userId is required')
});

const statusParamsSchema = z.object({
  id: z.string().trim().min(1)
});

export const registerOnboardingRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.post('/onboarding/run', async (request, reply) => {
    const body = runBodySchema.safeParse(request.body);
    if (!body.success) {
      const mapped = mapErrorToResponse(body.error);
      return reply.status(mapped.statusCode).send(mapped.body);
    }

    try {
      return await ctx.executor.execute(
        {
          workflowId: WORKFLOW_IDS.onboarding,
          inputs: { userRegistration: { userId: body.data.userId } },
          triggeredBy: 'orchestrator'
        },
        abortOnDisconnect(reply)
      );
    } catch (error) {
      const mapped = mapErrorToResponse(error);
      if (mapped.statusCode >= 500) {
        request.log.error({ err: error }, 'Onboarding run failed');
      }
      return reply.status(mapped.statusCode).send(mapped.body);
    }
  });

  app.get('/onboarding/status/:id', async (request, reply) => {
    const params = statusParamsSchema.safeParse(request.params);
    if (!params.success) {
      const mapped = mapErrorToResponse(params.error);
      return reply.status(mapped.statusCode).send(mapped.body);
    }

    try {
      const { id } = params.data;
      const indexed = await ctx.store.getByIndex(onboardingIndexKey(id));
      const executionId = indexed ?? id;
      const status = await ctx.statusReporter.getStatus(executionId);
      if (status.workflowId !== WORKFLOW_IDS.onboarding) {
        throw new ExecutionNotFoundError(id);
      }
      return status;
    } catch (error) {
      const mapped = mapErrorToResponse(error);
      return reply.status(mapped.statusCode).send(mapped.body);
    }
  });
};
