export { HttpFeedClient } from './feed/index.js';
export type { HttpFeedClientOptions } from './feed/index.js';
export { loadPipelineConfig } from './config/pipeline-config.js';
export { parseSimpleYaml } from './config/simple-yaml.js';
export { pipelinePlugin, createOrchestrator } from './pipeline/index.js';
export type { PipelinePluginOptions } from './pipeline/index.js';
export {
  loadNotificationConfig,
  createNotificationDispatcher,
  createRecommendationNotifier,
} from './notifications/index.js';
export type { NotificationConfig, RecommendationNotificationPayload } from './notifications/index.js';
