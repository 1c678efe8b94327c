import type { RawEvent, Rule, Snapshot } from '../domain/index.js';
import { FetchError, ProcessingError } from '../domain/index.js';
import type { FetchResult } from './feed-schema.js';
import type { FeedSource } from './feed-source.js';
import { IngestionStore } from './ingestion-store.js';
import type { UpsertResult } from './ingestion-store.js';
import { derive } from './transform-engine.js';
import type { TransformOptions } from './transform-engine.js';
import { evaluateRules } from './analysis-engine.js';
import { SnapshotStore, deepFreeze } from './snapshot-store.js';

export type PipelineState = 'idle' | 'fetching' | 'processing' | 'published';

export type CycleOutcome = 'published' | 'fetch_failed' | 'processing_failed';

export interface CycleError {
  readonly kind: 'transient' | 'permanent' | 'processing';
  readonly message: string;
  readonly at: number; // epoch ms
}

/** Counters for one cycle, logged and kept as `last_cycle`. */
export interface CycleReport {
  readonly sequence: number;
  readonly outcome: CycleOutcome;
  readonly started_at: number;
  readonly fetched: number;
  readonly skipped: number;
  readonly added: number;
  readonly revised: number;
  readonly unchanged: number;
  readonly evicted: number;
  readonly recommendations: number;
  readonly duration_ms: number;
  readonly error: CycleError | null;
}

export interface PipelineStats {
  readonly state: PipelineState;
  readonly cycles_started: number;
  readonly cycles_published: number;
  readonly fetch_errors: number;
  readonly processing_errors: number;
  readonly consecutive_fetch_failures: number;
  readonly store_size: number;
  readonly last_error: CycleError | null;
  readonly last_cycle: CycleReport | null;
}

/** Minimal logger interface accepted by the orchestrator. */
export type PipelineLog = {
  debug: (obj: Record<string, unknown>, msg: string) => void;
  info: (obj: Record<string, unknown>, msg: string) => void;
  warn: (obj: Record<string, unknown>, msg: string) => void;
  error: (obj: Record<string, unknown>, msg: string) => void;
};

export type PublishListener = (next: Snapshot, previous: Snapshot | null) => void;

export type OrchestratorOptions = Readonly<{
  feed: FeedSource;
  rules: readonly Rule[];
  transform: Omit<TransformOptions, 'cycleIntervalSeconds'>;
  pollIntervalSeconds: number;
  retentionWindowSeconds: number;
  maxBackoffSeconds: number;
  log: PipelineLog;
  store?: IngestionStore;
  nowFn?: () => number; // epoch ms
}>;

/** Store changes made by a cycle's ingest and evict steps. */
interface StoreChanges extends UpsertResult {
  readonly evicted: number;
}

type FetchSuccess = Extract<FetchResult, { ok: true }>;

const NO_STORE_CHANGES: StoreChanges = { added: 0, revised: 0, unchanged: 0, evicted: 0 };

/**
 * Drives the fetch → ingest → transform → analyze → publish cycle.
 *
 * State machine: idle → fetching → processing → published → idle, with
 * fetching → idle on a FetchError and processing → idle on a processing
 * fault. A failed cycle keeps the previous snapshot.
 *
 * Cycles never overlap. `runCycle()` during a running cycle returns the
 * in-flight cycle's promise, and the timer loop only schedules the next
 * cycle after the current one settles. This keeps the ingestion store
 * single-writer.
 */
export class PipelineOrchestrator {
  private readonly feed: FeedSource;
  private readonly rules: readonly Rule[];
  private readonly transform: TransformOptions;
  private readonly intervalMs: number;
  private readonly retentionMs: number;
  private readonly maxBackoffMs: number;
  private readonly log: PipelineLog;
  private readonly store: IngestionStore;
  private readonly nowFn: () => number;
  private readonly snapshots = new SnapshotStore();
  private readonly listeners = new Set<PublishListener>();

  private state: PipelineState = 'idle';
  private cyclesStarted = 0;
  private fetchErrors = 0;
  private processingErrors = 0;
  private consecutiveFetchFailures = 0;
  private lastError: CycleError | null = null;
  private lastCycle: CycleReport | null = null;
  private clearRequested = false;

  private inFlight: Promise<CycleReport> | null = null;
  private running = false;
  private loopPromise: Promise<void> | null = null;
  private wake: (() => void) | null = null;

  constructor(opts: OrchestratorOptions) {
    if (!Number.isFinite(opts.pollIntervalSeconds) || opts.pollIntervalSeconds <= 0) {
      throw new Error('pollIntervalSeconds must be a positive number');
    }
    this.feed = opts.feed;
    this.rules = opts.rules;
    this.transform = { ...opts.transform, cycleIntervalSeconds: opts.pollIntervalSeconds };
    this.intervalMs = opts.pollIntervalSeconds * 1000;
    this.retentionMs = opts.retentionWindowSeconds * 1000;
    this.maxBackoffMs = Math.max(opts.maxBackoffSeconds * 1000, this.intervalMs);
    this.log = opts.log;
    this.store = opts.store ?? new IngestionStore();
    this.nowFn = opts.nowFn ?? (() => Date.now());
  }

  // ----- read side -----

  /** Current snapshot, or `null` before the first successful cycle. */
  getSnapshot(): Snapshot | null {
    return this.snapshots.get();
  }

  getState(): PipelineState {
    return this.state;
  }

  getStats(): PipelineStats {
    return {
      state: this.state,
      cycles_started: this.cyclesStarted,
      cycles_published: this.snapshots.get()?.cycle_sequence_number ?? 0,
      fetch_errors: this.fetchErrors,
      processing_errors: this.processingErrors,
      consecutive_fetch_failures: this.consecutiveFetchFailures,
      store_size: this.store.size,
      last_error: this.lastError,
      last_cycle: this.lastCycle,
    };
  }

  get pollIntervalMs(): number {
    return this.intervalMs;
  }

  /** Registers a listener called after every publish. Returns an unsubscribe function. */
  onPublish(listener: PublishListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Queues a store reset. Applied by the next cycle that reaches
   * processing, so the store keeps a single writer.
   */
  requestClear(): void {
    this.clearRequested = true;
  }

  // ----- scheduling -----

  /** Starts the timer loop. The first cycle runs immediately. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.log.info({ interval_ms: this.intervalMs }, 'Pipeline started');
    this.loopPromise = this.loop();
  }

  /**
   * Stops scheduling and waits for an in-flight cycle to finish.
   * No cycle is interrupted mid-mutation.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.wake?.();
    await this.loopPromise;
    this.loopPromise = null;
    this.log.info({ cycles_started: this.cyclesStarted }, 'Pipeline stopped');
  }

  /**
   * Delay before the next cycle, measured from when the last one started.
   *
   * Consecutive fetch failures double the interval each time, up to
   * `maxBackoffSeconds`. A cycle that overran its slot is followed
   * immediately (delay 0) rather than skipped.
   */
  nextDelayMs(cycleStartedAt: number): number {
    const exponent = Math.min(this.consecutiveFetchFailures, 30);
    const slot = Math.min(this.intervalMs * 2 ** exponent, this.maxBackoffMs);
    return Math.max(0, cycleStartedAt + slot - this.nowFn());
  }

  private async loop(): Promise<void> {
    while (this.running) {
      try {
        const report = await this.runCycle();
        if (!this.running) break;
        await this.sleep(this.nextDelayMs(report.started_at));
      } catch (err: unknown) {
        this.log.error({ err }, 'Pipeline loop error, retrying next interval');
        if (!this.running) break;
        await this.sleep(this.intervalMs);
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  // ----- cycle -----

  /** Runs one cycle, or joins the one already running. */
  runCycle(): Promise<CycleReport> {
    if (this.inFlight !== null) return this.inFlight;

    const cycle = this.executeCycle().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async executeCycle(): Promise<CycleReport> {
    const startedAt = this.nowFn();
    const sequence = ++this.cyclesStarted;

    this.transition('fetching');
    const result = await this.fetchFeed();

    if (!result.ok) {
      return this.failFetch(sequence, startedAt, result.error);
    }

    this.consecutiveFetchFailures = 0;
    this.transition('processing');

    // Ingest and evict are kept even when a later step fails, so the
    // report counts what the store actually absorbed.
    const now = this.nowFn();
    let changes = NO_STORE_CHANGES;
    let snapshot: Snapshot;
    try {
      changes = this.applyToStore(result.events, now);
      snapshot = this.buildSnapshot(now);
    } catch (err: unknown) {
      return this.failProcessing(sequence, startedAt, result, changes, err);
    }

    const previous = this.snapshots.publish(snapshot);
    this.transition('published');

    const report = this.finish({
      sequence,
      outcome: 'published',
      started_at: startedAt,
      fetched: result.events.length,
      skipped: result.skipped,
      ...changes,
      recommendations: snapshot.recommendations.length,
      error: null,
    });

    this.log.info(
      { ...report, cycle_sequence_number: snapshot.cycle_sequence_number },
      'Cycle published',
    );
    for (const rec of snapshot.recommendations) {
      this.log.debug(
        { rule_id: rec.rule_id, severity: rec.severity, subject_ids: rec.subject_ids },
        `Recommendation: [${rec.rule_id}] ${rec.summary}`,
      );
    }

    this.notify(snapshot, previous);
    this.transition('idle');
    return report;
  }

  private async fetchFeed(): Promise<FetchResult> {
    try {
      return await this.feed.fetch();
    } catch (err: unknown) {
      // FeedSource contracts to report failures, but an implementation bug must not kill the loop.
      const message = err instanceof Error ? err.message : String(err);
      return {
        ok: false,
        error: new FetchError('transient', 'network', `Feed source threw: ${message}`, { cause: err }),
      };
    }
  }

  /**
   * Applies a queued clear, then ingests and evicts. The transform and
   * analyze steps that follow are synchronous too, so nothing else
   * touches the store in between.
   */
  private applyToStore(events: readonly RawEvent[], now: number): StoreChanges {
    if (this.clearRequested) {
      const cleared = this.store.clear();
      this.clearRequested = false;
      this.log.info({ cleared }, 'Ingestion store cleared on request');
    }

    const upsert = stage('ingest', () => this.store.upsert(events, now));
    const evicted = stage('evict', () => this.store.evict(now - this.retentionMs));
    return { ...upsert, evicted };
  }

  /** Transform, analyze, and freeze the next snapshot from the store's current contents. */
  private buildSnapshot(now: number): Snapshot {
    const view = this.store.snapshotView();
    const derived = stage('transform', () => derive(view, this.transform, now));
    const { recommendations } = stage('analyze', () => evaluateRules(derived, this.rules));

    const previousSequence = this.snapshots.get()?.cycle_sequence_number ?? 0;
    return deepFreeze({
      events: view,
      derived_features: derived,
      recommendations,
      cycle_timestamp: now,
      cycle_sequence_number: previousSequence + 1,
    });
  }

  private failFetch(sequence: number, startedAt: number, error: FetchError): CycleReport {
    this.fetchErrors++;
    this.consecutiveFetchFailures++;
    const cycleError: CycleError = { kind: error.kind, message: error.message, at: this.nowFn() };
    this.lastError = cycleError;
    this.transition('idle');

    const report = this.finish({
      sequence,
      outcome: 'fetch_failed',
      started_at: startedAt,
      fetched: 0,
      skipped: 0,
      ...NO_STORE_CHANGES,
      recommendations: 0,
      error: cycleError,
    });

    this.log.warn(
      {
        err: error,
        kind: error.kind,
        reason: error.reason,
        status: error.status,
        consecutive_failures: this.consecutiveFetchFailures,
      },
      `Feed fetch failed (${error.kind}), keeping previous snapshot`,
    );
    return report;
  }

  private failProcessing(
    sequence: number,
    startedAt: number,
    result: FetchSuccess,
    changes: StoreChanges,
    err: unknown,
  ): CycleReport {
    this.processingErrors++;
    const wrapped = err instanceof ProcessingError ? err : new ProcessingError('snapshot', err);
    const cycleError: CycleError = { kind: 'processing', message: wrapped.message, at: this.nowFn() };
    this.lastError = cycleError;
    this.transition('idle');

    const report = this.finish({
      sequence,
      outcome: 'processing_failed',
      started_at: startedAt,
      fetched: result.events.length,
      skipped: result.skipped,
      ...changes,
      recommendations: 0,
      error: cycleError,
    });

    this.log.error(
      { err: wrapped, stage: wrapped.stage, ...changes, store_size: this.store.size },
      'Cycle processing failed, keeping previous snapshot',
    );
    return report;
  }

  private finish(partial: Omit<CycleReport, 'duration_ms'>): CycleReport {
    const report: CycleReport = { ...partial, duration_ms: this.nowFn() - partial.started_at };
    this.lastCycle = report;
    return report;
  }

  private notify(next: Snapshot, previous: Snapshot | null): void {
    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (err: unknown) {
        this.log.warn({ err }, 'Publish listener failed');
      }
    }
  }

  private transition(next: PipelineState): void {
    this.log.debug({ from: this.state, to: next }, 'Pipeline state transition');
    this.state = next;
  }
}

/** Runs one processing step, tagging any failure with the step name. */
function stage<T>(name: string, fn: () => T): T {
  try {
    return fn();
  } catch (err: unknown) {
    throw new ProcessingError(name, err);
  }
}
