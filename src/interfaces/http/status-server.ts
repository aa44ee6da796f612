import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import statusRoutes, { type StatusRoutesOptions } from './status-routes.js';

/**
 * Builds the Fastify instance serving the status routes.
 * The caller decides whether and where to listen().
 */
export async function buildStatusServer(
  log: Logger,
  opts: StatusRoutesOptions,
): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = log.child({ component: 'status' });
  const fastify = Fastify({ loggerInstance });
  await fastify.register(statusRoutes, opts);
  return fastify;
}
