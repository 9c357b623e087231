import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';
import type { ConsumerHealth } from '../../infrastructure/worker/index.js';

export interface HealthRoutesOptions {
  probe: () => ConsumerHealth;
}

/**
 * Consumer health route.
 *
 * GET /health — loop state and counters; 200 while polling, 503 otherwise.
 */
async function healthRoutes(fastify: FastifyInstance, options: HealthRoutesOptions): Promise<void> {
  fastify.get('/health', async (_request, reply: FastifyReply) => {
    const health = options.probe();
    return reply.status(health.state === 'polling' ? 200 : 503).send(health);
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
