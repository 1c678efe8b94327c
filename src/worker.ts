import pino from 'pino';
import {
  loadPipelineConfig,
  createOrchestrator,
  loadNotificationConfig,
  createNotificationDispatcher,
  createRecommendationNotifier,
} from './infrastructure/index.js';
import { ConfigError } from './domain/index.js';

/**
 * Headless pipeline process: polls the feed and publishes snapshots
 * without an HTTP surface. Recommendations still reach the
 * notification channels, and every cycle is logged.
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

async function main(): Promise<void> {
  const config = loadPipelineConfig();
  const orchestrator = createOrchestrator(config, log);

  const notifConfig = loadNotificationConfig();
  const dispatch = createNotificationDispatcher(notifConfig, log);
  orchestrator.onPublish(createRecommendationNotifier(notifConfig, dispatch));

  orchestrator.onPublish((snapshot) => {
    log.info(
      {
        cycle: snapshot.cycle_sequence_number,
        events: snapshot.events.length,
        clusters: snapshot.derived_features.clusters.length,
        recommendations: snapshot.recommendations.map((r) => `${r.severity}:${r.rule_id}`),
      },
      'Snapshot published',
    );
  });

  // Graceful shutdown on SIGINT / SIGTERM
  const shutdown = (): void => {
    log.info('Shutting down worker...');
    orchestrator.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Worker stop failed');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  orchestrator.start();
  log.info({ feedUrl: config.feedUrl, pollIntervalSeconds: config.pollIntervalSeconds }, 'Worker started');
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    log.fatal({ issues: err.issues }, err.message);
  } else {
    log.fatal({ err }, 'Worker crashed');
  }
  process.exit(1);
});
