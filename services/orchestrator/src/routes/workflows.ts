import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { mapErrorToResponse } from '../errors';
import type { AppContext } from '../types';
import { abortOnDisconnect } from './requestSignal';

const workflowParamsSchema = z.object({
  workflowId: z.string().trim().min(1)
});

const inputsSchema = z.record(z.unknown());

const validateBodySchema = z.object({
  inputs: inputsSchema.default({})
});

export const executeBodySchema = z.object({
  inputs: inputsSchema,
  triggeredBy: z.string().trim().min(1).default('api'),
  context: z.record(z.string()).default({}),
  description: z.string().trim().optional(),
  priority: z.number().int().min(1).max(10).default(5)
});

export const registerWorkflowRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/workflows', async () => ({ workflows: ctx.catalog.listActive() }));

  app.post('/workflows/:workflowId/validate', async (request, reply) => {
    const params = workflowParamsSchema.safeParse(request.params);
    const body = validateBodySchema.safeParse(request.body ?? {});
    if (!params.success || !body.success) {
      const mapped = mapErrorToResponse(params.success ? body.error : params.error);
      return reply.status(mapped.statusCode).send(mapped.body);
    }

    return ctx.executor.validate(params.data.workflowId, body.data.inputs);
  });

  app.post('/workflows/:workflowId/execute', async (request, reply) => {
    const params = workflowParamsSchema.safeParse(request.params);
    const body = executeBodySchema.safeParse(request.body);
    if (!params.success || !body.success) {
      const mapped = mapErrorToResponse(params.success ? body.error : params.error);
      return reply.status(mapped.statusCode).send(mapped.body);
    }

    try {
      return await ctx.executor.execute(
        {
          workflowId: params.data.workflowId,
          inputs: body.data.inputs,
          triggeredBy: body.data.triggeredBy,
          context: body.data.context,
          description: body.data.description,
          priority: body.data.priority
        },
        abortOnDisconnect(reply)
      );
    } catch (error) {
      const mapped = mapErrorToResponse(error);
      if (mapped.statusCode >= 500) {
        request.log.error({ err: error }, 'Workflow execution failed');
      }
      return reply.status(mapped.statusCode).send(mapped.body);
    }
  });
};
