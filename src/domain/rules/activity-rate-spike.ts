import type { DerivedFeatureSet } from '../features.js';
import type { Rule, RuleResult } from './types.js';
import { byEventId, compare, condition, latestObservedAt } from './conditions.js';

const RULE_ID = 'activity-rate-spike';

/**
 * Activity rate spike rule.
 *
 * Triggers when events new in the last cycle interval arrive at or
 * above `ratePerHour`, provided at least `minEvents` of them exist.
 * The count floor keeps a short interval with two events from
 * extrapolating into a spike.
 */
export function createActivityRateSpikeRule(
  ratePerHour: number = 120,
  minEvents: number = 5,
): Rule {
  return {
    id: RULE_ID,
    name: 'Activity Rate Spike',
    description: `Triggers when new events arrive at >=${ratePerHour}/h with at least ${minEvents} new events`,
    severity: 'medium',

    evaluate(derived: DerivedFeatureSet): RuleResult {
      const { new_event_rate_per_hour: rate, new_event_count: count } = derived.aggregates;

      if (!compare(rate, '>=', ratePerHour) || !compare(count, '>=', minEvents)) {
        return { triggered: false, rule_id: RULE_ID };
      }

      const fresh = derived.events.filter((e) => e.is_new).sort(byEventId);

      return {
        triggered: true,
        rule_id: RULE_ID,
        recommendation: {
          rule_id: RULE_ID,
          action: 'review-regional-activity',
          subject_ids: fresh.map((e) => e.event_id),
          severity: 'medium',
          rationale: [
            condition('new_event_rate_per_hour', null, '>=', ratePerHour, rate),
            condition('new_event_count', null, '>=', minEvents, count),
          ],
          summary: `Activity spike: ${count} new events at ${rate} events/h (threshold ${ratePerHour}/h)`,
          latest_observed_at: latestObservedAt(fresh),
          generated_at: derived.generated_at,
        },
      };
    },
  };
}
