export { default as pipelinePlugin } from './pipeline-plugin.js';
export type { PipelinePluginOptions } from './pipeline-plugin.js';
export { createOrchestrator } from './create-orchestrator.js';
