import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * Snapshot routes for the presentation layer.
 *
 * GET  /api/v1/snapshot  the full current snapshot
 * GET  /api/v1/recommendations  ranked recommendations only
 * POST /api/v1/store/clear  queue an ingestion store reset
 */
async function snapshotRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/snapshot',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const snapshot = fastify.pipeline.getSnapshot();
      if (snapshot === null) {
        return reply.status(503).send({ error: 'Snapshot not yet available' });
      }
      return reply.status(200).send(snapshot);
    },
  );

  fastify.get(
    '/api/v1/recommendations',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const snapshot = fastify.pipeline.getSnapshot();
      if (snapshot === null) {
        return reply.status(503).send({ error: 'Snapshot not yet available' });
      }
      return reply.status(200).send({
        cycle_sequence_number: snapshot.cycle_sequence_number,
        cycle_timestamp: snapshot.cycle_timestamp,
        data: snapshot.recommendations,
      });
    },
  );

  /**
   * The store has a single writer, so the reset is applied by the
   * next cycle rather than here. The current snapshot is unaffected.
   */
  fastify.post(
    '/api/v1/store/clear',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      fastify.pipeline.requestClear();
      fastify.log.info('Ingestion store clear requested');
      return reply.status(202).send({ status: 'accepted' });
    },
  );
}

export default fp(snapshotRoutes, {
  name: 'snapshot-routes',
  dependencies: ['pipeline'],
  fastify: '5.x',
});
