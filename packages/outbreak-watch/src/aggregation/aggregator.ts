/**
 * Aggregator
 *
 * Pure, deterministic views over a Snapshot: per-region metrics with
 * province roll-up, global totals and confirmed-count rankings.
 *
 * DOUBLE COUNTING: a country appears in totals and rankings exactly once,
 * either through its own country-level row or, when the upstream source only
 * reports provinces, through the roll-up of those provinces. Province rows are
 * never added on top of a country-level row.
 *
 * UNKNOWN VALUES: a rolled-up field is unknown when any province lacks it, so
 * a missing province never reads as a drop. Global totals sum the known
 * values and list the countries they could not count in full.
 */

import type {
  AggregateTotals,
  CountField,
  MetricSet,
  MetricValue,
  RankingEntry,
  Region,
  RegionMetrics,
  Snapshot,
} from '../core/types.js';
import { COUNT_FIELDS, compareRegions, isCountryLevel, regionId } from '../core/types.js';
import { RegionDataNotFoundError } from '../core/errors.js';

// ============================================================================
// Region metrics
// ============================================================================

/**
 * Metrics for one region, rolled up from provinces when the snapshot has no
 * country-level row.
 *
 * @throws RegionDataNotFoundError when the snapshot has nothing for the region
 */
export function regionMetrics(snapshot: Snapshot, region: Region): RegionMetrics {
  const entry = snapshot.entries.get(regionId(region));
  if (entry) {
    return { region: entry.region, metrics: entry.metrics, complete: true, source: 'reported' };
  }

  if (!isCountryLevel(region)) {
    throw new RegionDataNotFoundError(region);
  }

  const provinces = provinceRows(snapshot, region);
  if (provinces.length === 0) {
    throw new RegionDataNotFoundError(region);
  }

  const { sums, complete } = sumCounts(provinces);
  const rolledUp = { ...sums };
  for (const field of COUNT_FIELDS) {
    if (provinces.some((metrics) => metrics[field] === null)) rolledUp[field] = null;
  }
  const asOf = provinces.reduce(
    (latest, metrics) => (metrics.asOf > latest ? metrics.asOf : latest),
    provinces[0]?.asOf ?? snapshot.timestamp
  );

  return {
    region,
    metrics: Object.freeze({ ...rolledUp, incidentRate: null, asOf }),
    complete,
    source: 'rollup',
  };
}

export function metricsFor(snapshot: Snapshot, region: Region): MetricSet {
  return regionMetrics(snapshot, region).metrics;
}

/**
 * Every country present in the snapshot, directly or through its provinces,
 * in region-id order
 */
export function countryRegions(snapshot: Snapshot): Region[] {
  const countries = new Map<string, Region>();
  for (const { region } of snapshot.entries.values()) {
    if (!countries.has(region.country)) {
      countries.set(region.country, { country: region.country, province: '' });
    }
  }
  return [...countries.values()].sort(compareRegions);
}

// ============================================================================
// Global totals
// ============================================================================

export function globalTotals(snapshot: Snapshot): AggregateTotals {
  const countries = countryRegions(snapshot);
  const rows: MetricSet[] = [];
  const incompleteRegions: Region[] = [];

  for (const country of countries) {
    const reported = snapshot.entries.get(regionId(country));
    const countryRows = reported ? [reported.metrics] : provinceRows(snapshot, country);
    rows.push(...countryRows);
    if (!sumCounts(countryRows).complete) {
      incompleteRegions.push(country);
    }
  }

  const { sums } = sumCounts(rows);
  return {
    metrics: Object.freeze({ ...sums, incidentRate: null, asOf: snapshot.timestamp }),
    complete: incompleteRegions.length === 0,
    incompleteRegions,
    regionCount: countries.length,
  };
}

/**
 * Countries reporting at least one confirmed case
 */
export function affectedCountryCount(snapshot: Snapshot): number {
  return countryRegions(snapshot).filter((country) => {
    const confirmed = metricsFor(snapshot, country).confirmed;
    return confirmed !== null && confirmed > 0;
  }).length;
}

// ============================================================================
// Rankings
// ============================================================================

/**
 * Full country ordering: confirmed descending, region id ascending on ties.
 * Countries with an unknown confirmed count are not ranked.
 */
export function rankedCountries(snapshot: Snapshot): RankingEntry[] {
  const candidates: Array<{ region: Region; confirmed: number }> = [];
  for (const country of countryRegions(snapshot)) {
    const confirmed = metricsFor(snapshot, country).confirmed;
    if (confirmed !== null) candidates.push({ region: country, confirmed });
  }
  return order(candidates);
}

/**
 * One page of the country ranking; positions are absolute
 */
export function rank(snapshot: Snapshot, limit: number, start = 1): RankingEntry[] {
  return page(rankedCountries(snapshot), limit, start);
}

export function rankProvinces(snapshot: Snapshot, limit: number, start = 1): RankingEntry[] {
  const candidates: Array<{ region: Region; confirmed: number }> = [];
  for (const { region, metrics } of snapshot.entries.values()) {
    if (!isCountryLevel(region) && metrics.confirmed !== null) {
      candidates.push({ region, confirmed: metrics.confirmed });
    }
  }
  return page(order(candidates), limit, start);
}

/**
 * Position of a country in the full ranking, or null when unranked
 */
export function rankOf(snapshot: Snapshot, region: Region): number | null {
  if (!isCountryLevel(region)) return null;
  const id = regionId(region);
  const entry = rankedCountries(snapshot).find((candidate) => regionId(candidate.region) === id);
  return entry ? entry.position : null;
}

// ============================================================================
// Helpers
// ============================================================================

function provinceRows(snapshot: Snapshot, country: Region): MetricSet[] {
  const rows: MetricSet[] = [];
  for (const candidate of snapshot.entries.values()) {
    if (candidate.region.country === country.country && !isCountryLevel(candidate.region)) {
      rows.push(candidate.metrics);
    }
  }
  return rows;
}

function sumCounts(sets: readonly MetricSet[]): {
  sums: Record<CountField, MetricValue>;
  complete: boolean;
} {
  const sums: Record<CountField, MetricValue> = {
    confirmed: null,
    deaths: null,
    recovered: null,
    active: null,
  };
  let complete = true;

  for (const metrics of sets) {
    for (const field of COUNT_FIELDS) {
      const value = metrics[field];
      if (value === null) {
        complete = false;
        continue;
      }
      sums[field] = (sums[field] ?? 0) + value;
    }
  }

  return { sums, complete };
}

function order(candidates: Array<{ region: Region; confirmed: number }>): RankingEntry[] {
  return candidates
    .sort((a, b) => b.confirmed - a.confirmed || compareRegions(a.region, b.region))
    .map((candidate, index) => ({ ...candidate, position: index + 1 }));
}

function page(ordered: readonly RankingEntry[], limit: number, start: number): RankingEntry[] {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`limit must be a positive integer, got ${limit}`);
  }
  if (!Number.isInteger(start) || start < 1) {
    throw new RangeError(`start must be a positive integer, got ${start}`);
  }
  return ordered.slice(start - 1, start - 1 + limit);
}
