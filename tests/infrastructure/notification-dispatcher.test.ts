import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  createNotificationDispatcher,
  createRecommendationNotifier,
  newlyRaised,
  recommendationFingerprint,
} from '../../src/infrastructure/notifications/dispatcher.js';
import type { RecommendationNotificationPayload } from '../../src/infrastructure/notifications/payload.js';
import type { NotificationConfig } from '../../src/infrastructure/notifications/config.js';
import type { Recommendation, Severity, Snapshot } from '../../src/domain/index.js';
import { FIXED_NOW, fakeLogger, makeDerived } from '../rules/helpers.js';

const samplePayload: RecommendationNotificationPayload = {
  rule_id: 'major-event',
  action: 'alert-regional-operations',
  severity: 'critical',
  summary: 'Major event: 1 event at or above magnitude 7 in the last 24h (max 7.1)',
  subject_ids: ['ev-1'],
  rationale: [{ feature: 'magnitude', subject_id: 'ev-1', operator: '>=', threshold: 7, observed: 7.1 }],
  cycle_sequence_number: 4,
  generated_at: '2026-02-18T12:00:00.000Z',
};

const defaultConfig: NotificationConfig = {
  min_severity: 'high',
  slack: { enabled: false, webhook_url: '' },
};

function fakeChannel(name: string) {
  return { name, send: vi.fn<(payload: RecommendationNotificationPayload) => Promise<void>>().mockResolvedValue(undefined) };
}

function rec(rule_id: string, severity: Severity, subject_ids: string[]): Recommendation {
  return {
    rule_id,
    action: 'monitor',
    subject_ids,
    severity,
    rationale: [],
    summary: `${rule_id} summary`,
    latest_observed_at: FIXED_NOW,
    generated_at: FIXED_NOW,
  };
}

function snapshotWith(recommendations: Recommendation[], sequence = 1): Snapshot {
  return {
    events: [],
    derived_features: makeDerived(),
    recommendations,
    cycle_timestamp: FIXED_NOW,
    cycle_sequence_number: sequence,
  };
}

describe('createNotificationDispatcher', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  it('sends the payload to every channel', () => {
    const first = fakeChannel('first');
    const second = fakeChannel('second');
    const dispatch = createNotificationDispatcher(defaultConfig, log, [first, second]);

    dispatch(samplePayload);

    expect(first.send).toHaveBeenCalledWith(samplePayload);
    expect(second.send).toHaveBeenCalledWith(samplePayload);
    expect(log.info).toHaveBeenCalledWith({ channels: ['first', 'second'] }, 'Notification channels ready');
  });

  it('logs a rejecting channel without affecting the others', async () => {
    const failing = fakeChannel('failing');
    failing.send.mockRejectedValueOnce(new Error('webhook down'));
    const healthy = fakeChannel('healthy');
    const dispatch = createNotificationDispatcher(defaultConfig, log, [failing, healthy]);

    dispatch(samplePayload);

    await vi.waitFor(() => {
      expect(log.warn).toHaveBeenCalledWith(
        expect.objectContaining({ err: expect.any(Error), channel: 'failing', rule_id: 'major-event' }),
        'Notification dispatch failed',
      );
    });
    expect(healthy.send).toHaveBeenCalledOnce();
  });

  it('builds no channels when Slack is disabled', () => {
    const dispatch = createNotificationDispatcher(defaultConfig, log);

    dispatch(samplePayload);

    expect(log.info).toHaveBeenCalledWith({ channels: [] }, 'Notification channels ready');
  });

  it('builds the Slack channel when enabled', () => {
    createNotificationDispatcher(
      { ...defaultConfig, slack: { enabled: true, webhook_url: 'https://hooks.slack.com/x' } },
      log,
    );

    expect(log.info).toHaveBeenCalledWith({ channels: ['slack'] }, 'Notification channels ready');
  });
});

describe('recommendationFingerprint', () => {
  it('combines rule id and subjects', () => {
    expect(recommendationFingerprint(rec('major-event', 'critical', ['a', 'b']))).toBe('major-event|a,b');
  });
});

describe('newlyRaised', () => {
  it('returns everything at or above the minimum severity on the first publish', () => {
    const next = snapshotWith([
      rec('major-event', 'critical', ['a']),
      rec('cluster-elevated-risk', 'high', ['cluster:b']),
      rec('activity-rate-spike', 'medium', ['c']),
    ]);

    expect(newlyRaised(next, null, 'high').map((r) => r.rule_id)).toEqual(['major-event', 'cluster-elevated-risk']);
  });

  it('skips recommendations already present in the previous snapshot', () => {
    const previous = snapshotWith([rec('major-event', 'critical', ['a'])], 1);
    const next = snapshotWith([
      rec('major-event', 'critical', ['a']),
      rec('isolated-strong-event', 'high', ['d']),
    ], 2);

    expect(newlyRaised(next, previous, 'high').map((r) => r.rule_id)).toEqual(['isolated-strong-event']);
  });

  it('treats a changed subject list as new', () => {
    const previous = snapshotWith([rec('major-event', 'critical', ['a'])], 1);
    const next = snapshotWith([rec('major-event', 'critical', ['a', 'b'])], 2);

    expect(newlyRaised(next, previous, 'critical')).toHaveLength(1);
  });
});

describe('createRecommendationNotifier', () => {
  it('dispatches one payload per newly raised recommendation', () => {
    const dispatch = vi.fn();
    const notify = createRecommendationNotifier({ ...defaultConfig, min_severity: 'low' }, dispatch);

    notify(snapshotWith([rec('notable-isolated-event', 'low', ['e'])], 9), null);

    expect(dispatch).toHaveBeenCalledOnce();
    expect(dispatch).toHaveBeenCalledWith({
      rule_id: 'notable-isolated-event',
      action: 'monitor',
      severity: 'low',
      summary: 'notable-isolated-event summary',
      subject_ids: ['e'],
      rationale: [],
      cycle_sequence_number: 9,
      generated_at: '2026-02-18T12:00:00.000Z',
    });
  });

  it('dispatches nothing when the recommendations are unchanged', () => {
    const dispatch = vi.fn();
    const notify = createRecommendationNotifier(defaultConfig, dispatch);
    const recs = [rec('major-event', 'critical', ['a'])];

    notify(snapshotWith(recs, 2), snapshotWith(recs, 1));

    expect(dispatch).not.toHaveBeenCalled();
  });
});
