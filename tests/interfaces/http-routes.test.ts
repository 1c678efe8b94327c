import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import pino from 'pino';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../src/server.js';
import { PipelineOrchestrator } from '../../src/application/pipeline-orchestrator.js';
import type { FetchResult } from '../../src/application/feed-schema.js';
import { FetchError, createDefaultRules } from '../../src/domain/index.js';
import { HOUR_MS, fakePipelineLog, makeRawEvent } from '../rules/helpers.js';

function buildOrchestrator(fetch: () => Promise<FetchResult>) {
  return new PipelineOrchestrator({
    feed: { fetch },
    rules: createDefaultRules({
      magnitudeThresholds: [4, 5, 6, 7],
      minClusterEventsAboveModerate: 1,
      rateSpikePerHour: 120,
      rateSpikeMinEvents: 5,
    }),
    transform: {
      magnitudeThresholds: [4, 5, 6, 7],
      clusterRadiusKm: 50,
      clusterWindowSeconds: 86_400,
      timelineBinSeconds: 900,
    },
    pollIntervalSeconds: 60,
    retentionWindowSeconds: 604_800,
    maxBackoffSeconds: 600,
    log: fakePipelineLog(),
  });
}

describe('HTTP routes', () => {
  let app: FastifyInstance;
  let orchestrator: PipelineOrchestrator;
  let fetch: Mock<() => Promise<FetchResult>>;

  beforeEach(async () => {
    const now = Date.now();
    fetch = vi.fn<() => Promise<FetchResult>>().mockResolvedValue({
      ok: true,
      skipped: 0,
      events: [
        makeRawEvent({
          event_id: 'a',
          magnitude: 6.0,
          observed_at: now - 2 * HOUR_MS,
          place: '12 km E of Town, Region',
          location: { latitude: 35.0, longitude: 139.0, depth_km: 10 },
        }),
        makeRawEvent({
          event_id: 'b',
          magnitude: 3.0,
          observed_at: now - HOUR_MS,
          location: { latitude: 35.02, longitude: 139.02, depth_km: 12 },
        }),
      ],
    });
    orchestrator = buildOrchestrator(fetch);
    app = await buildServer({ orchestrator, log: pino({ level: 'silent' }) });
  });

  afterEach(async () => {
    await app.close();
  });

  describe('before the first snapshot', () => {
    it.each([
      '/api/v1/snapshot',
      '/api/v1/recommendations',
      '/api/v1/events',
      '/api/v1/events.csv',
      '/api/v1/events/a',
    ])('GET %s returns 503', async (url) => {
      const res = await app.inject({ method: 'GET', url });
      expect(res.statusCode).toBe(503);
      expect(res.json()).toEqual({ error: 'Snapshot not yet available' });
    });

    it('GET /api/v1/health reports starting', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/health' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ status: 'starting', state: 'idle', cycle_sequence_number: null });
    });
  });

  describe('after a published cycle', () => {
    beforeEach(async () => {
      await orchestrator.runCycle();
    });

    it('GET /api/v1/snapshot returns the whole snapshot', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/snapshot' });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.cycle_sequence_number).toBe(1);
      expect(body.events).toHaveLength(2);
      expect(body.derived_features.clusters[0].cluster_id).toBe('cluster:a');
    });

    it('GET /api/v1/recommendations returns ranked recommendations', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/recommendations' });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.cycle_sequence_number).toBe(1);
      expect(body.data).toHaveLength(1);
      expect(body.data[0].rule_id).toBe('cluster-elevated-risk');
      expect(body.data[0].subject_ids).toEqual(['cluster:a']);
    });

    it('GET /api/v1/events paginates', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/events?limit=1&offset=1' });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.data.map((e: { event_id: string }) => e.event_id)).toEqual(['a']);
      expect(body.pagination).toEqual({ limit: 1, offset: 1, count: 1, total: 2 });
    });

    it('GET /api/v1/events filters by magnitude bucket', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/events?magnitude_bucket=strong' });
      expect(res.statusCode).toBe(200);
      expect(res.json().data.map((e: { event_id: string }) => e.event_id)).toEqual(['a']);
    });

    it('GET /api/v1/events rejects a non-integer limit', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/events?limit=abc' });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'limit must be an integer' });
    });

    it('GET /api/v1/events rejects an unknown magnitude bucket', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/events?magnitude_bucket=huge' });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: 'magnitude_bucket must be one of: minor, light, moderate, strong, major',
      });
    });

    it('GET /api/v1/events/:id returns one event or 404', async () => {
      const found = await app.inject({ method: 'GET', url: '/api/v1/events/b' });
      expect(found.statusCode).toBe(200);
      expect(found.json()).toMatchObject({ event_id: 'b', cluster_id: 'cluster:a', magnitude_bucket: 'minor' });

      const missing = await app.inject({ method: 'GET', url: '/api/v1/events/zzz' });
      expect(missing.statusCode).toBe(404);
      expect(missing.json()).toEqual({ error: 'Event not found' });
    });

    it('GET /api/v1/events.csv exports CSV', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/events.csv' });
      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(res.headers['content-disposition']).toBe('attachment; filename="events-1.csv"');

      const lines = res.body.split('\r\n');
      expect(lines[0]).toBe(
        'event_id,observed_at,place,magnitude,magnitude_bucket,latitude,longitude,depth_km,depth_bucket,cluster_id,status,tsunami,url',
      );
      expect(lines).toHaveLength(4);
      expect(lines[2]).toContain('a,');
      expect(lines[2]).toContain('"12 km E of Town, Region"');
    });

    it('GET /api/v1/metrics returns pipeline counters', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/metrics' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        state: 'idle',
        cycles_started: 1,
        cycles_published: 1,
        fetch_errors: 0,
        processing_errors: 0,
        store_size: 2,
      });
    });

    it('GET /api/v1/health reports ok', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/health' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ status: 'ok', cycle_sequence_number: 1, consecutive_fetch_failures: 0 });
    });

    it('GET /api/v1/health returns 503 after a failed cycle', async () => {
      fetch.mockResolvedValueOnce({
        ok: false,
        error: new FetchError('transient', 'http_status', 'Feed responded with HTTP 503', { status: 503 }),
      });
      await orchestrator.runCycle();

      const res = await app.inject({ method: 'GET', url: '/api/v1/health' });
      expect(res.statusCode).toBe(503);
      expect(res.json()).toMatchObject({
        status: 'degraded',
        cycle_sequence_number: 1,
        consecutive_fetch_failures: 1,
        last_error: { kind: 'transient', message: 'Feed responded with HTTP 503' },
      });
    });

    it('POST /api/v1/store/clear queues a reset for the next cycle', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/v1/store/clear' });
      expect(res.statusCode).toBe(202);
      expect(res.json()).toEqual({ status: 'accepted' });
      expect(orchestrator.getStats().store_size).toBe(2);

      fetch.mockResolvedValueOnce({ ok: true, skipped: 0, events: [] });
      await orchestrator.runCycle();

      expect(orchestrator.getStats().store_size).toBe(0);
      expect(orchestrator.getSnapshot()?.events).toEqual([]);
    });
  });
});
