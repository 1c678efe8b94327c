import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { getHealth } from '../../application/health.js';

/**
 * Observability routes.
 *
 * GET /api/v1/metrics  cumulative pipeline counters, last error, last cycle
 * GET /api/v1/health  liveness summary; 503 while degraded
 */
async function metricsRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/metrics',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(fastify.pipeline.getStats());
    },
  );

  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const pipeline = fastify.pipeline;
      const health = getHealth(
        pipeline.getStats(),
        pipeline.getSnapshot(),
        Date.now(),
        pipeline.pollIntervalMs,
      );

      fastify.log.debug({ status: health.status, state: health.state }, 'Health endpoint hit');

      return reply.status(health.status === 'degraded' ? 503 : 200).send(health);
    },
  );
}

export default fp(metricsRoutes, {
  name: 'metrics-routes',
  dependencies: ['pipeline'],
  fastify: '5.x',
});
