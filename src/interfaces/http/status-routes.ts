import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { DispatcherStatus } from '../../infrastructure/notifications/index.js';
import type { TailerSnapshot } from '../../infrastructure/tailer/index.js';

export interface StatusRoutesOptions {
  dispatcherStatus: () => DispatcherStatus;
  tailers: () => TailerSnapshot[];
}

/**
 * Status API routes.
 *
 * GET /health: liveness.
 * GET /status: dispatcher retry state, queue depth and tailer positions.
 */
async function statusRoutes(fastify: FastifyInstance, opts: StatusRoutesOptions): Promise<void> {
  fastify.get('/health', async (_request, reply) => {
    return reply.status(200).send({ status: 'ok' });
  });

  fastify.get('/status', async (_request, reply) => {
    return reply.status(200).send({
      dispatcher: opts.dispatcherStatus(),
      tailers: opts.tailers(),
    });
  });
}

export default fp(statusRoutes, {
  name: 'status-routes',
  fastify: '5.x',
});
