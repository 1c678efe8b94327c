import pino from 'pino';

import {
  loadPipelineConfig,
  createOrchestrator,
  loadNotificationConfig,
  createNotificationDispatcher,
  createRecommendationNotifier,
} from './infrastructure/index.js';
import { ConfigError } from './domain/index.js';
import { buildServer } from './server.js';

/**
 * Bootstrap the pipeline and its HTTP surface.
 *
 * Order:
 * 1) Configuration (fail fast on invalid values)
 * 2) Orchestrator + Fastify app
 * 3) Notification channels
 * 4) listen()
 * 5) Start the polling loop
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

async function main(): Promise<void> {

  // --------------------------------------------------
  // Configuration
  // --------------------------------------------------

  const config = loadPipelineConfig();
  log.info({ config }, 'Pipeline config loaded');

  // --------------------------------------------------
  // Pipeline + HTTP Interface
  // --------------------------------------------------

  const orchestrator = createOrchestrator(config, log);
  const fastify = await buildServer({ orchestrator, log });

  // --------------------------------------------------
  // Notification Channels
  // --------------------------------------------------

  const notifConfig = loadNotificationConfig();

  log.info(
    { min_severity: notifConfig.min_severity, slack_enabled: notifConfig.slack.enabled },
    'Notification config loaded',
  );

  const dispatch = createNotificationDispatcher(notifConfig, log);
  orchestrator.onPublish(createRecommendationNotifier(notifConfig, dispatch));

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  const host = process.env['HOST'] ?? '0.0.0.0';
  const port = Number(process.env['PORT'] ?? 3000);

  await fastify.listen({ host, port });

  orchestrator.start();

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down server...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    log.fatal({ issues: err.issues }, err.message);
  } else {
    log.fatal({ err }, 'Fatal: failed to start server');
  }
  process.exit(1);
});
