import type { EventFeatures } from '../features.js';
import type { ComparisonOperator, RationaleCondition } from './types.js';

export const HOUR_SECONDS = 3600;
export const DAY_SECONDS = 24 * HOUR_SECONDS;

/**
 * Compares an observed value against a threshold using the specified operator.
 */
export function compare(observed: number, operator: ComparisonOperator, threshold: number): boolean {
  switch (operator) {
    case '>':  return observed > threshold;
    case '>=': return observed >= threshold;
    case '<':  return observed < threshold;
    case '<=': return observed <= threshold;
    case '==': return observed === threshold;
    case '!=': return observed !== threshold;
  }
}

export function condition(
  feature: string,
  subject_id: string | null,
  operator: ComparisonOperator,
  threshold: number,
  observed: number,
): RationaleCondition {
  return { feature, subject_id, operator, threshold, observed };
}

/** Age of an event at `now` in seconds; future-dated events are age 0. */
export function ageSeconds(event: EventFeatures, now: number): number {
  return Math.max(0, now - event.observed_at) / 1000;
}

export function byEventId(a: { event_id: string }, b: { event_id: string }): number {
  if (a.event_id < b.event_id) return -1;
  if (a.event_id > b.event_id) return 1;
  return 0;
}

export function latestObservedAt(events: readonly EventFeatures[]): number {
  let latest = 0;
  for (const e of events) {
    if (e.observed_at > latest) latest = e.observed_at;
  }
  return latest;
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
