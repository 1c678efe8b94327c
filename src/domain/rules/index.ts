import type { Rule, RuleThresholds } from './types.js';
import { createMajorEventRule } from './major-event.js';
import { createClusterElevatedRiskRule } from './cluster-elevated-risk.js';
import { createIsolatedStrongEventRule } from './isolated-strong-event.js';
import { createActivityRateSpikeRule } from './activity-rate-spike.js';
import { createNotableIsolatedEventRule } from './notable-isolated-event.js';

export type {
  Rule,
  RuleResult,
  Recommendation,
  RationaleCondition,
  ComparisonOperator,
  Severity,
  RuleThresholds,
} from './types.js';
export { SEVERITY_RANK } from './types.js';
export { createMajorEventRule } from './major-event.js';
export { createClusterElevatedRiskRule } from './cluster-elevated-risk.js';
export { createIsolatedStrongEventRule } from './isolated-strong-event.js';
export { createActivityRateSpikeRule } from './activity-rate-spike.js';
export { createNotableIsolatedEventRule } from './notable-isolated-event.js';

/**
 * The fixed, ordered rule list evaluated every cycle.
 */
export function createDefaultRules(thresholds: RuleThresholds): Rule[] {
  const [light, moderate, strong, major] = thresholds.magnitudeThresholds;
  return [
    createMajorEventRule(major),
    createClusterElevatedRiskRule(moderate, thresholds.minClusterEventsAboveModerate),
    createIsolatedStrongEventRule(strong),
    createActivityRateSpikeRule(thresholds.rateSpikePerHour, thresholds.rateSpikeMinEvents),
    createNotableIsolatedEventRule(light, strong),
  ];
}
