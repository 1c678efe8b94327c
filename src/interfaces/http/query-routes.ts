import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { MAGNITUDE_BUCKETS } from '../../domain/index.js';
import { listEvents, getEvent } from '../../application/query-events.js';
import { snapshotToCsv } from '../../application/export-csv.js';

const NOT_READY = { error: 'Snapshot not yet available' } as const;

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values, `NaN` for non-integers.
 */
function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/**
 * Read-only event query routes over the current snapshot.
 *
 * GET /api/v1/events  paginated event list with filters
 * GET /api/v1/events.csv  CSV export of every event in the snapshot
 * GET /api/v1/events/:id  single event by ID
 */
async function queryRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * GET /api/v1/events
   *
   * Query params: limit, offset, magnitude_bucket, cluster_id
   */
  fastify.get(
    '/api/v1/events',
    async (
      request: FastifyRequest<{
        Querystring: {
          limit?: string;
          offset?: string;
          magnitude_bucket?: string;
          cluster_id?: string;
        };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      const limit = safeInt(q.limit);
      const offset = safeInt(q.offset);

      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }
      if (offset !== undefined && Number.isNaN(offset)) {
        return reply.status(400).send({ error: 'offset must be an integer' });
      }

      const bucket = MAGNITUDE_BUCKETS.find((b) => b === q.magnitude_bucket);
      if (q.magnitude_bucket !== undefined && bucket === undefined) {
        return reply
          .status(400)
          .send({ error: `magnitude_bucket must be one of: ${MAGNITUDE_BUCKETS.join(', ')}` });
      }

      const snapshot = fastify.pipeline.getSnapshot();
      if (snapshot === null) {
        return reply.status(503).send(NOT_READY);
      }

      const result = listEvents(snapshot, {
        limit,
        offset,
        magnitude_bucket: bucket,
        cluster_id: q.cluster_id,
      });

      return reply.status(200).send(result);
    },
  );

  /**
   * GET /api/v1/events.csv
   */
  fastify.get(
    '/api/v1/events.csv',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const snapshot = fastify.pipeline.getSnapshot();
      if (snapshot === null) {
        return reply.status(503).send(NOT_READY);
      }

      return reply
        .status(200)
        .type('text/csv; charset=utf-8')
        .header('Content-Disposition', `attachment; filename="events-${snapshot.cycle_sequence_number}.csv"`)
        .send(snapshotToCsv(snapshot));
    },
  );

  /**
   * GET /api/v1/events/:id
   */
  fastify.get(
    '/api/v1/events/:id',
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const snapshot = fastify.pipeline.getSnapshot();
      if (snapshot === null) {
        return reply.status(503).send(NOT_READY);
      }

      const event = getEvent(snapshot, request.params.id);
      if (event === null) {
        return reply.status(404).send({ error: 'Event not found' });
      }

      return reply.status(200).send(event);
    },
  );
}

export default fp(queryRoutes, {
  name: 'query-routes',
  dependencies: ['pipeline'],
  fastify: '5.x',
});
