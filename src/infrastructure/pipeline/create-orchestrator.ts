import type { PipelineConfig, FeedSource, PipelineLog } from '../../application/index.js';
import { PipelineOrchestrator } from '../../application/index.js';
import { createDefaultRules } from '../../domain/index.js';
import { HttpFeedClient } from '../feed/index.js';

/**
 * Wires an orchestrator from validated configuration.
 *
 * `feed` overrides the HTTP client (tests, replay tooling).
 */
export function createOrchestrator(
  config: PipelineConfig,
  log: PipelineLog,
  feed?: FeedSource,
): PipelineOrchestrator {
  return new PipelineOrchestrator({
    feed: feed ?? new HttpFeedClient({
      url: config.feedUrl,
      timeoutMs: config.fetchTimeoutSeconds * 1000,
      log,
    }),
    rules: createDefaultRules({
      magnitudeThresholds: config.magnitudeThresholds,
      minClusterEventsAboveModerate: config.minClusterEventsAboveModerate,
      rateSpikePerHour: config.rateSpikePerHour,
      rateSpikeMinEvents: config.rateSpikeMinEvents,
    }),
    transform: {
      magnitudeThresholds: config.magnitudeThresholds,
      clusterRadiusKm: config.clusterRadiusKm,
      clusterWindowSeconds: config.clusterWindowSeconds,
      timelineBinSeconds: config.timelineBinSeconds,
    },
    pollIntervalSeconds: config.pollIntervalSeconds,
    retentionWindowSeconds: config.retentionWindowSeconds,
    maxBackoffSeconds: config.maxBackoffSeconds,
    log,
  });
}
