import type { FastifyReply } from 'fastify';

/** An abort signal that fires when the client goes away before the response is written. */
export const abortOnDisconnect = (reply: FastifyReply): AbortSignal => {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort(new Error('Client disconnected'));
    }
  });
  return controller.signal;
};
