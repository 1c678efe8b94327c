import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { PipelineOrchestrator } from '../../application/pipeline-orchestrator.js';

export interface PipelinePluginOptions {
  orchestrator: PipelineOrchestrator;
}

/**
 * Fastify plugin that exposes the pipeline orchestrator to routes.
 *
 * - Decorates `fastify.pipeline` for use by downstream plugins/routes.
 * - Stops the timer loop on close, waiting for an in-flight cycle.
 */
async function pipelinePlugin(fastify: FastifyInstance, opts: PipelinePluginOptions): Promise<void> {
  fastify.decorate('pipeline', opts.orchestrator);

  fastify.addHook('onClose', async () => {
    await opts.orchestrator.stop();
    fastify.log.info('Pipeline stopped');
  });
}

export default fp(pipelinePlugin, {
  name: 'pipeline',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.pipeline` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    pipeline: PipelineOrchestrator;
  }
}
