/**
 * Reconciler
 *
 * Diffs every subscription against a Snapshot and dispatches notifications
 * for the ones that changed. A baseline is recorded only after the Notifier
 * confirms delivery, so a failed delivery is retried on the next snapshot and
 * a confirmed one is never repeated for the same figures.
 */

import type { Region, Snapshot, Subscription, MetricSet } from '../core/types.js';
import { regionLabel } from '../core/types.js';
import { NotifyDeliveryError, RegionDataNotFoundError, errorMessage } from '../core/errors.js';
import type { Notifier } from '../core/notifier.js';
import { mergeBaseline, metricsChanged } from '../core/notifier.js';
import { metricsFor } from '../aggregation/aggregator.js';
import { createLogger, type Logger } from '../core/utils/logger.js';

/**
 * The part of the Subscription Store the reconciler reads and writes
 */
export interface ReconcileStore {
  /** Reload subscriptions other processes may have added or removed */
  refresh(): Promise<void>;
  allSubscriptions(): Subscription[];
  recordNotified(subscriberId: string, region: Region, metrics: MetricSet): Promise<boolean>;
}

export interface ReconcileFailure {
  readonly subscriberId: string;
  readonly region: Region;
  readonly reason: string;
}

export interface ReconcileReport {
  readonly notified: number;
  readonly unchanged: number;
  readonly failed: number;
  /** Subscriptions whose region has no data in the snapshot */
  readonly missing: number;
  readonly failures: readonly ReconcileFailure[];
}

const defaultLogger = createLogger({ module: 'reconciler' });

export async function reconcile(
  store: ReconcileStore,
  snapshot: Snapshot,
  notifier: Notifier,
  log: Logger = defaultLogger
): Promise<ReconcileReport> {
  let notified = 0;
  let unchanged = 0;
  let missing = 0;
  const failures: ReconcileFailure[] = [];

  await store.refresh();
  for (const { subscriberId, region, lastNotified } of store.allSubscriptions()) {
    let current: MetricSet;
    try {
      current = metricsFor(snapshot, region);
    } catch (error) {
      if (error instanceof RegionDataNotFoundError) {
        missing++;
        log.debug('Region absent from snapshot', { subscriberId, region: regionLabel(region) });
        continue;
      }
      throw error;
    }

    if (!metricsChanged(lastNotified, current)) {
      unchanged++;
      continue;
    }

    let reason: string | null = null;
    try {
      const outcome = await notifier.notify(subscriberId, region, lastNotified, current);
      if (!outcome.delivered) reason = outcome.reason;
    } catch (error) {
      const failure = new NotifyDeliveryError(subscriberId, region, errorMessage(error), {
        cause: error,
      });
      reason = failure.message;
    }

    if (reason !== null) {
      log.warn('Notification not delivered', {
        subscriberId,
        region: regionLabel(region),
        reason,
      });
      failures.push({ subscriberId, region, reason });
      continue;
    }

    try {
      await store.recordNotified(subscriberId, region, mergeBaseline(lastNotified, current));
      notified++;
    } catch (error) {
      // Delivered but not recorded: the next snapshot will notify again
      const reasonText = `baseline not saved: ${errorMessage(error)}`;
      log.error('Failed to record notification baseline', {
        subscriberId,
        region: regionLabel(region),
        error: errorMessage(error),
      });
      failures.push({ subscriberId, region, reason: reasonText });
    }
  }

  const report: ReconcileReport = {
    notified,
    unchanged,
    failed: failures.length,
    missing,
    failures,
  };
  log.info('Reconciliation complete', {
    notified,
    unchanged,
    failed: failures.length,
    missing,
  });
  return report;
}
