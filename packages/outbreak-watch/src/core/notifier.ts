/**
 * Notifier boundary
 *
 * The reconciliation loop hands each changed subscription to a Notifier.
 * Delivery (chat message, webhook, email) lives outside the core; the
 * loop only needs to know whether delivery was confirmed.
 */

import type { MetricField, MetricSet, MetricValue, Region } from './types.js';
import { METRIC_FIELDS, regionLabel } from './types.js';
import { createLogger, type Logger } from './utils/logger.js';

export type NotifyOutcome =
  | { readonly delivered: true }
  | { readonly delivered: false; readonly reason: string };

export interface Notifier {
  /**
   * Deliver an update. A rejected promise counts as a failed delivery.
   */
  notify(
    subscriberId: string,
    region: Region,
    previous: MetricSet | null,
    current: MetricSet
  ): Promise<NotifyOutcome>;
}

// ============================================================================
// Change detection
// ============================================================================

export interface FieldChange {
  readonly field: MetricField;
  readonly previous: MetricValue;
  readonly current: number;
  /** current − previous; null when there is no previous value */
  readonly delta: number | null;
}

/**
 * Fields known in `current` that differ from `previous`.
 *
 * A field that went from known to unknown is not a change, and `asOf` is
 * never compared.
 */
export function describeChanges(previous: MetricSet | null, current: MetricSet): FieldChange[] {
  const changes: FieldChange[] = [];
  for (const field of METRIC_FIELDS) {
    const now = current[field];
    if (now === null) continue;
    const before = previous ? previous[field] : null;
    if (before === now) continue;
    changes.push({
      field,
      previous: before,
      current: now,
      delta: before === null ? null : now - before,
    });
  }
  return changes;
}

export function metricsChanged(previous: MetricSet | null, current: MetricSet): boolean {
  return previous === null || describeChanges(previous, current).length > 0;
}

/**
 * Baseline to record after a delivery: current known values, previous values
 * where current is unknown
 */
export function mergeBaseline(previous: MetricSet | null, current: MetricSet): MetricSet {
  if (!previous) return current;
  return Object.freeze({
    confirmed: current.confirmed ?? previous.confirmed,
    deaths: current.deaths ?? previous.deaths,
    recovered: current.recovered ?? previous.recovered,
    active: current.active ?? previous.active,
    incidentRate: current.incidentRate ?? previous.incidentRate,
    asOf: current.asOf,
  });
}

// ============================================================================
// Presentation
// ============================================================================

export const FIELD_LABELS: Readonly<Record<MetricField, string>> = {
  confirmed: 'Confirmed',
  deaths: 'Deaths',
  recovered: 'Recovered',
  active: 'Active',
  incidentRate: 'Incident rate',
};

export function formatCount(value: number): string {
  return String(value).replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

export function formatMetric(field: MetricField, value: MetricValue): string {
  if (value === null) return 'unknown';
  return field === 'incidentRate' ? value.toFixed(2) : formatCount(value);
}

/**
 * Signed delta (`+200`, `-3`, `±0`)
 */
export function formatDelta(field: MetricField, delta: number): string {
  if (delta === 0) return '±0';
  const sign = delta > 0 ? '+' : '-';
  return `${sign}${formatMetric(field, Math.abs(delta))}`;
}

/**
 * Multi-line update text, one line per metric
 *
 * @example
 * ```
 * Update for Ontario, Canada
 * Confirmed: 1,200 (+200)
 * Deaths: 12
 * ```
 */
export function formatUpdateMessage(
  region: Region,
  previous: MetricSet | null,
  current: MetricSet
): string {
  const deltas = new Map(describeChanges(previous, current).map((c) => [c.field, c.delta]));
  const lines = [`Update for ${regionLabel(region)}`];
  for (const field of METRIC_FIELDS) {
    const value = current[field];
    if (value === null) continue;
    const delta = deltas.get(field);
    const suffix =
      delta === undefined || delta === null ? '' : ` (${formatDelta(field, delta)})`;
    lines.push(`${FIELD_LABELS[field]}: ${formatMetric(field, value)}${suffix}`);
  }
  return lines.join('\n');
}

// ============================================================================
// Log Notifier
// ============================================================================

/**
 * Notifier that writes each update to the structured log
 */
export class LogNotifier implements Notifier {
  constructor(private readonly log: Logger = createLogger({ module: 'notifier' })) {}

  async notify(
    subscriberId: string,
    region: Region,
    previous: MetricSet | null,
    current: MetricSet
  ): Promise<NotifyOutcome> {
    this.log.info(formatUpdateMessage(region, previous, current), {
      subscriberId,
      region: regionLabel(region),
      asOf: current.asOf.toISOString(),
    });
    return { delivered: true };
  }
}
