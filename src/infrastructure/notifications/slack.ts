import type { Logger } from 'pino';
import type { RationaleCondition } from '../../domain/index.js';
import type { NotificationConfig } from './config.js';
import type { NotificationChannel, RecommendationNotificationPayload } from './payload.js';

type MrkdwnText = { type: 'mrkdwn'; text: string };

export type SlackBlock =
  | { type: 'header'; text: { type: 'plain_text'; text: string } }
  | { type: 'section'; text: MrkdwnText }
  | { type: 'context'; elements: MrkdwnText[] };

/** Incoming-webhook body: `text` is the fallback shown in push notifications. */
export interface SlackMessage {
  text: string;
  blocks: SlackBlock[];
}

/** One rationale line, e.g. "`magnitude` (ev-1): 7.1 >= 7". */
export function formatCondition(condition: RationaleCondition): string {
  const subject = condition.subject_id ?? 'window';
  return `\`${condition.feature}\` (${subject}): ${condition.observed} ${condition.operator} ${condition.threshold}`;
}

export function buildSlackMessage(payload: RecommendationNotificationPayload): SlackMessage {
  const title = `[${payload.severity.toUpperCase()}] ${payload.action}`;
  const subjects = payload.subject_ids.map((id) => `\`${id}\``).join(', ');
  const conditions = payload.rationale.length > 0
    ? payload.rationale.map((c) => `• ${formatCondition(c)}`).join('\n')
    : '_none recorded_';

  return {
    text: `${title}: ${payload.summary}`,
    blocks: [
      { type: 'header', text: { type: 'plain_text', text: title } },
      { type: 'section', text: { type: 'mrkdwn', text: `>${payload.summary}` } },
      { type: 'section', text: { type: 'mrkdwn', text: `*Subjects:* ${subjects}` } },
      { type: 'section', text: { type: 'mrkdwn', text: `*Conditions:*\n${conditions}` } },
      {
        type: 'context',
        elements: [{
          type: 'mrkdwn',
          text: `Rule \`${payload.rule_id}\` | Cycle ${payload.cycle_sequence_number} | ${payload.generated_at}`,
        }],
      },
    ],
  };
}

/**
 * Slack incoming-webhook channel, or `null` when Slack is disabled or
 * has no webhook URL configured.
 */
export function createSlackChannel(
  config: NotificationConfig['slack'],
  log: Logger,
): NotificationChannel | null {
  if (!config.enabled) {
    log.debug('Slack channel disabled');
    return null;
  }
  if (!config.webhook_url) {
    log.warn('Slack enabled but webhook_url is empty, channel disabled');
    return null;
  }

  const webhookUrl = config.webhook_url;
  return {
    name: 'slack',
    async send(payload) {
      const response = await fetch(webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(buildSlackMessage(payload)),
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new Error(`Slack webhook returned HTTP ${response.status}`);
      }

      log.info(
        { rule_id: payload.rule_id, severity: payload.severity, subject_ids: payload.subject_ids },
        'Slack notification sent',
      );
    },
  };
}
