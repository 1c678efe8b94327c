import type { DerivedFeatureSet } from '../features.js';

/** Severity levels for recommendations, ordered low → critical. */
export type Severity = 'low' | 'medium' | 'high' | 'critical';

export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3,
};

export type ComparisonOperator = '>' | '>=' | '<' | '<=' | '==' | '!=';

/**
 * One comparison that held when a rule fired.
 *
 * `observed` and `threshold` are the literal values the predicate
 * compared, so a rationale can be re-checked against the feature set.
 */
export interface RationaleCondition {
  readonly feature: string;
  /** Event or cluster the value belongs to; `null` for window aggregates. */
  readonly subject_id: string | null;
  readonly operator: ComparisonOperator;
  readonly threshold: number;
  readonly observed: number;
}

export interface Recommendation {
  readonly rule_id: string;
  readonly action: string;
  readonly subject_ids: readonly string[]; // sorted
  readonly severity: Severity;
  readonly rationale: readonly RationaleCondition[];
  /** Human-readable one-liner for logs and notifications. */
  readonly summary: string;
  /** Newest `observed_at` among the subjects; secondary sort key. */
  readonly latest_observed_at: number;
  readonly generated_at: number; // epoch ms
}

/**
 * Result of evaluating a single rule against a feature set.
 *
 * `triggered === false` means the rule had nothing to report.
 */
export type RuleResult =
  | { readonly triggered: false; readonly rule_id: string }
  | { readonly triggered: true; readonly rule_id: string; readonly recommendation: Recommendation };

/**
 * A rule is a pure, deterministic predicate over one cycle's features.
 *
 * It keeps no state between cycles and emits at most one
 * recommendation per evaluation.
 */
export interface Rule {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly severity: Severity;
  evaluate(derived: DerivedFeatureSet): RuleResult;
}

/**
 * Breakpoints and limits the default rules are built from.
 *
 * `magnitudeThresholds` are the lower bounds of light, moderate,
 * strong and major, in that order.
 */
export interface RuleThresholds {
  readonly magnitudeThresholds: readonly [number, number, number, number];
  readonly minClusterEventsAboveModerate: number;
  readonly rateSpikePerHour: number;
  readonly rateSpikeMinEvents: number;
}
