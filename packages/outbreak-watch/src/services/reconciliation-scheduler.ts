/**
 * Reconciliation Scheduler
 *
 * Recurring fetch → parse → publish → reconcile loop.
 *
 * STATES:
 *   idle → fetching → parsing → reconciling → sleeping → idle …
 *   any → stopped
 *
 * FAILURE POLICY:
 * - Fetch failure or timeout (after retries): the tick is skipped, nothing changes
 * - ParseError / EmptySnapshotError: the tick is skipped, the previously
 *   published snapshot stays current
 * - Notifier failures are absorbed per subscription by the reconciler
 *
 * A cycle is never aborted by a refresh request; `requestRefresh()` only
 * shortens the sleep that follows.
 */

import type { Snapshot } from '../core/types.js';
import type { OutbreakWatchConfig } from '../core/config.js';
import {
  EmptySnapshotError,
  FetchTimeoutError,
  ParseError,
  errorMessage,
} from '../core/errors.js';
import type { Notifier } from '../core/notifier.js';
import type { SnapshotParser } from '../ingestion/snapshot-parser.js';
import { RetryExecutor, RetryExhaustedError, createRetryExecutor } from '../resilience/retry.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type { SnapshotHolder } from './snapshot-holder.js';
import { reconcile, type ReconcileReport, type ReconcileStore } from './reconciler.js';

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Time source. `sleep` resolves after `ms` or as soon as `signal` aborts.
 */
export interface Clock {
  now(): Date;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const done = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal?.addEventListener('abort', done, { once: true });
    });
  }
}

/**
 * Source of raw snapshot bytes
 */
export interface SnapshotFetcher {
  /** Where the bytes come from, for logs and errors */
  readonly location: string;
  fetch(signal: AbortSignal): Promise<Uint8Array>;
}

// ============================================================================
// Scheduler
// ============================================================================

export type SchedulerState =
  | 'idle'
  | 'fetching'
  | 'parsing'
  | 'reconciling'
  | 'sleeping'
  | 'stopped';

export type RefreshOutcome = 'woken' | 'queued' | 'stopped';

export type TickResult =
  | {
      readonly status: 'published';
      readonly snapshot: Snapshot;
      /** null when the tick ran without reconciliation */
      readonly report: ReconcileReport | null;
    }
  | { readonly status: 'fetch_failed'; readonly error: Error }
  | { readonly status: 'parse_failed'; readonly error: ParseError | EmptySnapshotError }
  | { readonly status: 'error'; readonly error: Error }
  | { readonly status: 'stopped' };

export type TransitionListener = (from: SchedulerState, to: SchedulerState) => void;

export interface ReconciliationSchedulerOptions {
  readonly fetcher: SnapshotFetcher;
  readonly parser: SnapshotParser;
  readonly store: ReconcileStore;
  readonly notifier: Notifier;
  readonly holder: SnapshotHolder;
  readonly schedule: OutbreakWatchConfig['schedule'];
  readonly clock?: Clock;
  /** Defaults to exponential backoff built from `schedule` */
  readonly retry?: RetryExecutor;
  readonly logger?: Logger;
  readonly onTransition?: TransitionListener;
}

export class ReconciliationScheduler {
  private readonly clock: Clock;
  private readonly retry: RetryExecutor;
  private readonly log: Logger;

  private currentState: SchedulerState = 'idle';
  private loop: Promise<void> | null = null;
  private inFlight: Promise<TickResult> | null = null;
  private wakeController: AbortController | null = null;
  private readonly stopController = new AbortController();
  private refreshPending = false;

  constructor(private readonly options: ReconciliationSchedulerOptions) {
    this.clock = options.clock ?? new SystemClock();
    this.log = options.logger ?? createLogger({ module: 'scheduler' });
    this.retry =
      options.retry ??
      createRetryExecutor(
        {
          maxAttempts: options.schedule.fetchAttempts,
          initialDelayMs: options.schedule.retryDelayMs,
        },
        (ms, signal) => this.clock.sleep(ms, signal)
      );
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  get running(): boolean {
    return this.loop !== null && !this.stopController.signal.aborted;
  }

  /**
   * Start the recurring loop; the first cycle runs immediately
   */
  start(): void {
    if (this.loop || this.stopController.signal.aborted) {
      return;
    }
    this.log.info('Scheduler started', {
      source: this.options.fetcher.location,
      intervalMs: this.options.schedule.intervalMs,
    });
    this.loop = this.runLoop();
  }

  /**
   * Stop the loop, abandoning any in-flight fetch. Resolves once the loop has exited.
   */
  async stop(): Promise<void> {
    if (this.currentState === 'stopped') {
      return;
    }
    this.stopController.abort();
    this.wakeController?.abort();

    await this.loop;
    await this.inFlight;

    this.loop = null;
    this.transition('stopped');
    this.log.info('Scheduler stopped');
  }

  /**
   * Run one cycle now. Joins the in-flight cycle when there is one.
   *
   * With `reconcile: false` the snapshot is fetched and published but no
   * subscription is diffed or notified (one-shot queries).
   */
  runTick(options: { readonly reconcile?: boolean } = {}): Promise<TickResult> {
    return this.startCycle(
      this.currentState === 'sleeping' ? 'sleeping' : 'idle',
      options.reconcile ?? true
    );
  }

  /**
   * Non-blocking wake. Ends a sleep at once, or marks a refresh so the sleep
   * after the current cycle is skipped.
   */
  requestRefresh(): RefreshOutcome {
    if (this.stopController.signal.aborted) {
      return 'stopped';
    }
    if (this.inFlight) {
      this.refreshPending = true;
      return 'queued';
    }
    if (this.wakeController) {
      this.wakeController.abort();
      return 'woken';
    }

    // Not looping: run a single cycle in the background
    this.runTick().catch((error: unknown) => {
      this.log.error('Background refresh failed', { error: errorMessage(error) });
    });
    return 'woken';
  }

  // --------------------------------------------------------------------------
  // Private Helpers
  // --------------------------------------------------------------------------

  private async runLoop(): Promise<void> {
    const { intervalMs } = this.options.schedule;

    while (!this.stopController.signal.aborted) {
      const startedAt = this.clock.now().getTime();
      await this.startCycle('sleeping', true);
      if (this.stopController.signal.aborted) break;

      if (this.refreshPending) {
        this.refreshPending = false;
        this.transition('idle');
        continue;
      }

      const remaining = Math.max(0, intervalMs - (this.clock.now().getTime() - startedAt));
      this.wakeController = new AbortController();
      await this.clock.sleep(remaining, this.wakeController.signal);
      this.wakeController = null;

      if (!this.stopController.signal.aborted) {
        this.transition('idle');
      }
    }
  }

  private startCycle(resumeState: 'idle' | 'sleeping', withReconcile: boolean): Promise<TickResult> {
    if (this.inFlight) {
      return this.inFlight;
    }
    if (this.stopController.signal.aborted) {
      return Promise.resolve({ status: 'stopped' });
    }

    const tick = this.cycle(resumeState, withReconcile).finally(() => {
      this.inFlight = null;
      if (!this.refreshPending) return;
      if (this.wakeController) {
        // Queued during a manual tick while the loop slept
        this.refreshPending = false;
        this.wakeController.abort();
      } else if (!this.loop) {
        this.refreshPending = false;
      }
    });
    this.inFlight = tick;
    return tick;
  }

  private async cycle(resumeState: 'idle' | 'sleeping', withReconcile: boolean): Promise<TickResult> {
    try {
      return await this.fetchParseReconcile(withReconcile);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.log.error('Reconciliation cycle failed', { error: err.message });
      return { status: 'error', error: err };
    } finally {
      if (!this.stopController.signal.aborted) {
        this.transition(resumeState);
      }
    }
  }

  private async fetchParseReconcile(withReconcile: boolean): Promise<TickResult> {
    const { fetcher } = this.options;
    const stopSignal = this.stopController.signal;

    this.transition('fetching');
    let bytes: Uint8Array;
    try {
      bytes = await this.retry.execute(() => this.fetchWithTimeout(), stopSignal);
    } catch (error) {
      if (stopSignal.aborted) return { status: 'stopped' };
      const cause = error instanceof RetryExhaustedError ? error.lastError : toError(error);
      this.log.warn('Snapshot fetch failed, skipping tick', {
        source: fetcher.location,
        error: cause.message,
        attempts: error instanceof RetryExhaustedError ? error.attempts.length : 1,
      });
      return { status: 'fetch_failed', error: cause };
    }
    const fetchedAt = this.clock.now();

    this.transition('parsing');
    let snapshot: Snapshot;
    try {
      snapshot = this.options.parser.parse(bytes, { fetchedAt });
    } catch (error) {
      if (error instanceof ParseError || error instanceof EmptySnapshotError) {
        this.log.warn('Snapshot rejected, keeping previous snapshot', {
          source: fetcher.location,
          error: error.message,
        });
        return { status: 'parse_failed', error };
      }
      throw error;
    }

    if (snapshot.warnings.length > 0) {
      this.log.info('Snapshot parsed with warnings', {
        regions: snapshot.entries.size,
        warnings: snapshot.warnings.length,
      });
    }

    this.options.holder.publish(snapshot);
    this.log.info('Snapshot published', {
      regions: snapshot.entries.size,
      timestamp: snapshot.timestamp.toISOString(),
    });

    if (!withReconcile) {
      return { status: 'published', snapshot, report: null };
    }

    this.transition('reconciling');
    const report = await reconcile(
      this.options.store,
      snapshot,
      this.options.notifier,
      this.log
    );
    return { status: 'published', snapshot, report };
  }

  /**
   * One fetch attempt bounded by `fetchTimeoutMs`. A fetcher that ignores the
   * abort signal is abandoned when the timeout fires.
   */
  private async fetchWithTimeout(): Promise<Uint8Array> {
    const { fetcher } = this.options;
    const timeoutMs = this.options.schedule.fetchTimeoutMs;
    const stopSignal = this.stopController.signal;

    const fetchController = new AbortController();
    const timerController = new AbortController();
    const abortFetch = (): void => fetchController.abort();
    stopSignal.addEventListener('abort', abortFetch, { once: true });

    const timeout = new Promise<never>((_, reject) => {
      this.clock.sleep(timeoutMs, timerController.signal).then(() => {
        if (timerController.signal.aborted) return;
        // Reject before aborting so the timeout settles the race first
        reject(new FetchTimeoutError(fetcher.location, timeoutMs));
        fetchController.abort();
      }, reject);
    });

    const download = fetcher.fetch(fetchController.signal);
    download.catch((error: unknown) => {
      if (fetchController.signal.aborted) {
        this.log.debug('Abandoned fetch settled', { error: errorMessage(error) });
      }
    });

    try {
      return await Promise.race([download, timeout]);
    } finally {
      timerController.abort();
      stopSignal.removeEventListener('abort', abortFetch);
    }
  }

  private transition(next: SchedulerState): void {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    this.log.debug('Scheduler state', { from: previous, to: next });
    this.options.onTransition?.(previous, next);
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
