import type { Logger } from 'pino';
import type { Recommendation, Snapshot } from '../../domain/index.js';
import { SEVERITY_RANK } from '../../domain/index.js';
import type { NotificationConfig } from './config.js';
import type { NotificationChannel, RecommendationNotificationPayload } from './payload.js';
import { toNotificationPayload } from './payload.js';
import { createSlackChannel } from './slack.js';

/**
 * Builds the enabled channels once and returns a fire-and-forget
 * dispatch function. Channels are independent: a rejection from one is
 * logged and never reaches the others or the caller.
 */
export function createNotificationDispatcher(
  config: NotificationConfig,
  log: Logger,
  channels: readonly NotificationChannel[] = enabledChannels(config, log),
) {
  log.info({ channels: channels.map((c) => c.name) }, 'Notification channels ready');

  return (payload: RecommendationNotificationPayload): void => {
    for (const channel of channels) {
      void channel.send(payload).catch((err: unknown) => {
        log.warn({ err, channel: channel.name, rule_id: payload.rule_id }, 'Notification dispatch failed');
      });
    }
  };
}

function enabledChannels(config: NotificationConfig, log: Logger): NotificationChannel[] {
  const slack = createSlackChannel(config.slack, log);
  return slack === null ? [] : [slack];
}

/** Identity of a recommendation across cycles. */
export function recommendationFingerprint(rec: Recommendation): string {
  return `${rec.rule_id}|${rec.subject_ids.join(',')}`;
}

/**
 * Recommendations in `next` at or above `minSeverity` whose fingerprint
 * was absent from `previous`. Recommendations are recomputed every
 * cycle, so this is what keeps an ongoing condition from re-alerting.
 */
export function newlyRaised(
  next: Snapshot,
  previous: Snapshot | null,
  minSeverity: NotificationConfig['min_severity'],
): Recommendation[] {
  const seen = new Set((previous?.recommendations ?? []).map(recommendationFingerprint));
  return next.recommendations.filter((rec) =>
    SEVERITY_RANK[rec.severity] >= SEVERITY_RANK[minSeverity]
    && !seen.has(recommendationFingerprint(rec)));
}

/**
 * Builds a publish listener that dispatches newly raised recommendations.
 */
export function createRecommendationNotifier(
  config: NotificationConfig,
  dispatch: (payload: RecommendationNotificationPayload) => void,
) {
  return (next: Snapshot, previous: Snapshot | null): void => {
    for (const rec of newlyRaised(next, previous, config.min_severity)) {
      dispatch(toNotificationPayload(rec, next.cycle_sequence_number));
    }
  };
}
