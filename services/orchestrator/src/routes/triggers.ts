import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { mapErrorToResponse } from '../errors';
import type { AppContext } from '../types';
import { abortOnDisconnect } from './requestSignal';

const triggerBodySchema = z.object({
  eventType: z.string().trim().min(1),
  source: z.string().trim().min(1),
  eventData: z.record(z.unknown()).default({}),
  headers: z.record(z.string()).default({}),
  correlationId: z.string().trim().min(1).optional()
});

export const registerTriggerRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.post('/triggers/event', async (request, reply) => {
    const body = triggerBodySchema.safeParse(request.body);
    if (!body.success) {
      const mapped = mapErrorToResponse(body.error);
      return reply.status(mapped.statusCode).send(mapped.body);
    }

    try {
      return await ctx.triggers.handle(body.data, abortOnDisconnect(reply));
    } catch (error) {
      const mapped = mapErrorToResponse(error);
      if (mapped.statusCode >= 500) {
        request.log.error({ err: error, eventType: body.data.eventType }, 'Event trigger failed');
      }
      return reply.status(mapped.statusCode).send(mapped.body);
    }
  });
};
