import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import healthRoutes from './health-routes.js';
import type { ConsumerHealth } from '../../infrastructure/worker/index.js';

/**
 * Builds the consumer's health server. `logLevel` null disables request logging.
 */
export async function buildHealthServer(
  probe: () => ConsumerHealth,
  logLevel: string | null,
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: logLevel === null ? false : { level: logLevel },
  });

  await fastify.register(healthRoutes, { probe });
  return fastify;
}
