import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { mapErrorToResponse } from '../errors';
import type { AppContext } from '../types';

const executionParamsSchema = z.object({
  executionId: z.string().trim().min(1)
});

export const registerExecutionRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/executions/:executionId/status', async (request, reply) => {
    const params = executionParamsSchema.safeParse(request.params);
    if (!params.success) {
      const mapped = mapErrorToResponse(params.error);
      return reply.status(mapped.statusCode).send(mapped.body);
    }

    try {
      return await ctx.statusReporter.getStatus(params.data.executionId);
    } catch (error) {
      const mapped = mapErrorToResponse(error);
      return reply.status(mapped.statusCode).send(mapped.body);
    }
  });

  app.get('/executions/:executionId/progress', async (request, reply) => {
    const params = executionParamsSchema.safeParse(request.params);
    if (!params.success) {
      const mapped = mapErrorToResponse(params.error);
      return reply.status(mapped.statusCode).send(mapped.body);
    }

    try {
      const progress = await ctx.statusReporter.getProgress(params.data.executionId);
      return reply.type('application/json').send(JSON.stringify(progress));
    } catch (error) {
      const mapped = mapErrorToResponse(error);
      return reply.status(mapped.statusCode).send(mapped.body);
    }
  });
};
