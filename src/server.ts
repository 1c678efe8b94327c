import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { PipelineOrchestrator } from './application/index.js';
import { pipelinePlugin } from './infrastructure/index.js';
import {
  queryRoutes,
  snapshotRoutes,
  metricsRoutes,
} from './interfaces/http/index.js';

export interface BuildServerOptions {
  orchestrator: PipelineOrchestrator;
  log: FastifyBaseLogger;
}

/**
 * Builds the Fastify app without listening.
 *
 * Order:
 * 1) Pipeline plugin (decorates `fastify.pipeline`)
 * 2) HTTP routes
 */
export async function buildServer(opts: BuildServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ loggerInstance: opts.log });

  await fastify.register(pipelinePlugin, { orchestrator: opts.orchestrator });

  await fastify.register(snapshotRoutes);
  await fastify.register(queryRoutes);
  await fastify.register(metricsRoutes);

  return fastify;
}
