/**
 * Outbreak Watch Core Types
 *
 * Shared value types for regions, metric sets, snapshots, rankings and
 * subscriptions. Everything here is a plain readonly value; behaviour lives
 * in the catalog, parser, aggregator and store modules.
 */

// ============================================================================
// Regions
// ============================================================================

/**
 * A country, or a province/state within a country.
 *
 * `province` is the empty string for the country-level aggregate.
 */
export interface Region {
  readonly country: string;
  readonly province: string;
}

/**
 * Stable identifier used for ordering and map keys.
 *
 * `"Canada"` for a country, `"Canada/Ontario"` for a province.
 */
export function regionId(region: Region): string {
  return region.province ? `${region.country}/${region.province}` : region.country;
}

/**
 * Human-readable label (`"Ontario, Canada"`).
 */
export function regionLabel(region: Region): string {
  return region.province ? `${region.province}, ${region.country}` : region.country;
}

export function isCountryLevel(region: Region): boolean {
  return region.province === '';
}

export function sameRegion(a: Region, b: Region): boolean {
  return a.country === b.country && a.province === b.province;
}

/**
 * Locale-independent ordering by region identifier (UTF-16 code units).
 */
export function compareRegions(a: Region, b: Region): number {
  const left = regionId(a);
  const right = regionId(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

// ============================================================================
// Metrics
// ============================================================================

/**
 * `null` marks a value the upstream source did not report or that failed to
 * parse. Unknown is never the same as zero.
 */
export type MetricValue = number | null;

export const COUNT_FIELDS = ['confirmed', 'deaths', 'recovered', 'active'] as const;

export type CountField = (typeof COUNT_FIELDS)[number];

export const METRIC_FIELDS = [...COUNT_FIELDS, 'incidentRate'] as const;

export type MetricField = (typeof METRIC_FIELDS)[number];

export interface MetricSet {
  readonly confirmed: MetricValue;
  readonly deaths: MetricValue;
  readonly recovered: MetricValue;
  readonly active: MetricValue;
  /** Cases per 100,000 population */
  readonly incidentRate: MetricValue;
  readonly asOf: Date;
}

// ============================================================================
// Snapshots
// ============================================================================

export type ParseWarningCode =
  | 'unresolved_region'
  | 'missing_country'
  | 'invalid_number'
  | 'negative_active'
  | 'merged_duplicate'
  | 'invalid_timestamp';

export interface ParseWarning {
  /** 1-based line of the record in the source (header is line 1) */
  readonly line: number;
  readonly code: ParseWarningCode;
  readonly message: string;
}

export interface SnapshotEntry {
  readonly region: Region;
  readonly metrics: MetricSet;
}

/**
 * One fetched-and-parsed dataset, replaced by the next successful fetch.
 * Read-only by type; the entry map and dates are not deep-frozen.
 */
export interface Snapshot {
  /** Latest upstream update among rows, or the fetch time */
  readonly timestamp: Date;
  readonly fetchedAt: Date;
  /** Keyed by {@link regionId} */
  readonly entries: ReadonlyMap<string, SnapshotEntry>;
  readonly warnings: readonly ParseWarning[];
}

// ============================================================================
// Derived views
// ============================================================================

export interface RankingEntry {
  readonly region: Region;
  readonly confirmed: number;
  /** 1-based position in the full ordering */
  readonly position: number;
}

export interface RegionMetrics {
  readonly region: Region;
  readonly metrics: MetricSet;
  /** False when a province contributing to a roll-up had an unknown count */
  readonly complete: boolean;
  readonly source: 'reported' | 'rollup';
}

export interface AggregateTotals {
  readonly metrics: MetricSet;
  readonly complete: boolean;
  /** Country-level regions that contributed at least one unknown count */
  readonly incompleteRegions: readonly Region[];
  readonly regionCount: number;
}

// ============================================================================
// Subscriptions
// ============================================================================

export interface Subscription {
  readonly subscriberId: string;
  readonly region: Region;
  readonly lastNotified: MetricSet | null;
}
