import type { RationaleCondition, Recommendation, Severity } from '../../domain/index.js';

/** What a channel receives for one newly raised recommendation. */
export interface RecommendationNotificationPayload {
  rule_id: string;
  action: string;
  severity: Severity;
  summary: string;
  subject_ids: readonly string[];
  rationale: readonly RationaleCondition[];
  cycle_sequence_number: number;
  generated_at: string; // ISO-8601
}

/**
 * A delivery target for recommendation notifications.
 *
 * `send` rejects on delivery failure; the dispatcher logs it.
 */
export interface NotificationChannel {
  readonly name: string;
  send(payload: RecommendationNotificationPayload): Promise<void>;
}

export function toNotificationPayload(
  recommendation: Recommendation,
  cycleSequenceNumber: number,
): RecommendationNotificationPayload {
  return {
    rule_id: recommendation.rule_id,
    action: recommendation.action,
    severity: recommendation.severity,
    summary: recommendation.summary,
    subject_ids: recommendation.subject_ids,
    rationale: recommendation.rationale,
    cycle_sequence_number: cycleSequenceNumber,
    generated_at: new Date(recommendation.generated_at).toISOString(),
  };
}
