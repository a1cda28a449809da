/**
 * Snapshot Parser
 *
 * Turns raw tabular bytes from the upstream source into a read-only
 * Snapshot keyed by canonical region.
 *
 * SCHEMA DRIFT: the upstream source has renamed and reordered its columns
 * over time ("Province/State" vs "Province_State", "Incidence_Rate" vs
 * "Incident_Rate"), so columns are located by normalized header name and
 * never by position.
 *
 * PARTIAL DATA: rows whose region cannot be resolved, and numeric cells that
 * fail to parse, become warnings. Only an unreadable input (ParseError) or a
 * snapshot without a single usable region (EmptySnapshotError) fails the call.
 */

import type {
  CountField,
  MetricSet,
  MetricValue,
  ParseWarning,
  ParseWarningCode,
  Region,
  Snapshot,
  SnapshotEntry,
} from '../core/types.js';
import { regionId, regionLabel } from '../core/types.js';
import { EmptySnapshotError, ParseError, UnknownRegionError } from '../core/errors.js';
import type { RegionCatalog } from '../registry/region-catalog.js';
import { parseCsvRecords, type CsvRecord } from './csv.js';

// ============================================================================
// Column identification
// ============================================================================

export const COLUMN_KEYS = [
  'country',
  'province',
  'confirmed',
  'deaths',
  'recovered',
  'active',
  'incidentRate',
  'lastUpdate',
] as const;

export type ColumnKey = (typeof COLUMN_KEYS)[number];

/**
 * Normalized header names accepted for each column, in preference order
 */
export const COLUMN_SYNONYMS: Readonly<Record<ColumnKey, readonly string[]>> = {
  country: ['country_region', 'country', 'country_or_region'],
  province: ['province_state', 'province', 'state'],
  confirmed: ['confirmed', 'cases', 'total_cases'],
  deaths: ['deaths', 'total_deaths'],
  recovered: ['recovered', 'total_recovered'],
  active: ['active', 'active_cases'],
  incidentRate: ['incident_rate', 'incidence_rate'],
  lastUpdate: ['last_update', 'updated', 'lastupdate'],
};

const REQUIRED_COLUMNS: readonly ColumnKey[] = ['country', 'confirmed'];

export function normalizeHeader(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export type ColumnMap = Readonly<Partial<Record<ColumnKey, number>>>;

/**
 * Locate known columns in a header row
 */
export function identifyColumns(header: readonly string[]): ColumnMap {
  const positions = new Map<string, number>();
  header.forEach((name, index) => {
    const key = normalizeHeader(name);
    if (!positions.has(key)) positions.set(key, index);
  });

  const columns: Partial<Record<ColumnKey, number>> = {};
  for (const column of COLUMN_KEYS) {
    for (const synonym of COLUMN_SYNONYMS[column]) {
      const index = positions.get(synonym);
      if (index !== undefined) {
        columns[column] = index;
        break;
      }
    }
  }
  return columns;
}

// ============================================================================
// Parser
// ============================================================================

export interface ParseOptions {
  /** When the bytes were fetched; fallback snapshot timestamp (default: now) */
  readonly fetchedAt?: Date;
}

interface RegionAccumulator {
  readonly region: Region;
  readonly firstLine: number;
  confirmed: MetricValue;
  deaths: MetricValue;
  recovered: MetricValue;
  reportedActive: MetricValue;
  incidentRate: MetricValue;
  lastUpdate: Date | null;
  rows: number;
}

export class SnapshotParser {
  constructor(private readonly catalog: RegionCatalog) {}

  /**
   * Parse raw snapshot bytes
   *
   * @throws ParseError when the input is not UTF-8 CSV with a usable header
   * @throws EmptySnapshotError when no row resolves to a catalogued region
   */
  parse(raw: Uint8Array | string, options: ParseOptions = {}): Snapshot {
    const fetchedAt = options.fetchedAt ?? new Date();
    const records = parseCsvRecords(decode(raw));

    const [header, ...rows] = records;
    if (!header) {
      throw new ParseError('Snapshot is empty');
    }

    const columns = identifyColumns(header.fields);
    const missing = REQUIRED_COLUMNS.filter((column) => columns[column] === undefined);
    if (missing.length > 0) {
      throw new ParseError(
        `Snapshot header lacks required column(s): ${missing.join(', ')} ` +
          `(found: ${header.fields.map((f) => f.trim()).join(', ')})`
      );
    }

    const warnings: ParseWarning[] = [];
    const warn = (line: number, code: ParseWarningCode, message: string): void => {
      warnings.push(Object.freeze({ line, code, message }));
    };

    const accumulators = new Map<string, RegionAccumulator>();
    for (const record of rows) {
      this.readRow(record, columns, accumulators, warn);
    }

    if (accumulators.size === 0) {
      throw new EmptySnapshotError(rows.length, warnings.length);
    }

    let latestUpdate: Date | null = null;
    for (const acc of accumulators.values()) {
      if (acc.lastUpdate && (!latestUpdate || acc.lastUpdate > latestUpdate)) {
        latestUpdate = acc.lastUpdate;
      }
    }
    const timestamp = latestUpdate ?? fetchedAt;

    const entries = new Map<string, SnapshotEntry>();
    for (const [id, acc] of accumulators) {
      entries.set(
        id,
        Object.freeze({ region: acc.region, metrics: finalizeMetrics(acc, timestamp, warn) })
      );
    }

    return Object.freeze({
      timestamp,
      fetchedAt,
      entries,
      warnings: Object.freeze(warnings),
    });
  }

  private readRow(
    record: CsvRecord,
    columns: ColumnMap,
    accumulators: Map<string, RegionAccumulator>,
    warn: (line: number, code: ParseWarningCode, message: string) => void
  ): void {
    const cell = (column: ColumnKey): string => {
      const index = columns[column];
      return index === undefined ? '' : (record.fields[index] ?? '').trim();
    };

    const countryName = cell('country');
    if (countryName === '') {
      warn(record.line, 'missing_country', 'Row has no country value');
      return;
    }

    let region: Region;
    try {
      region = this.catalog.resolveParts(countryName, cell('province'));
    } catch (error) {
      if (error instanceof UnknownRegionError) {
        warn(record.line, 'unresolved_region', `Unresolved region "${error.query}"`);
        return;
      }
      throw error;
    }

    const count = (column: CountField): MetricValue => {
      const value = parseCount(cell(column));
      if (value === 'invalid') {
        warn(record.line, 'invalid_number', `Invalid ${column} value "${cell(column)}"`);
        return null;
      }
      return value;
    };

    const rate = parseRate(cell('incidentRate'));
    if (rate === 'invalid') {
      warn(record.line, 'invalid_number', `Invalid incident rate "${cell('incidentRate')}"`);
    }

    const updated = parseTimestamp(cell('lastUpdate'));
    if (updated === 'invalid') {
      warn(record.line, 'invalid_timestamp', `Invalid last update "${cell('lastUpdate')}"`);
    }

    const row = {
      confirmed: count('confirmed'),
      deaths: count('deaths'),
      recovered: count('recovered'),
      reportedActive: count('active'),
      incidentRate: rate === 'invalid' ? null : rate,
      lastUpdate: updated === 'invalid' ? null : updated,
    };

    const id = regionId(region);
    const existing = accumulators.get(id);
    if (!existing) {
      accumulators.set(id, { region, firstLine: record.line, rows: 1, ...row });
      return;
    }

    if (existing.rows === 1) {
      warn(
        record.line,
        'merged_duplicate',
        `Multiple rows for ${regionLabel(region)}; counts are summed`
      );
    }
    existing.rows += 1;
    existing.confirmed = addKnown(existing.confirmed, row.confirmed);
    existing.deaths = addKnown(existing.deaths, row.deaths);
    existing.recovered = addKnown(existing.recovered, row.recovered);
    existing.reportedActive = addKnown(existing.reportedActive, row.reportedActive);
    existing.incidentRate = null;
    if (row.lastUpdate && (!existing.lastUpdate || row.lastUpdate > existing.lastUpdate)) {
      existing.lastUpdate = row.lastUpdate;
    }
  }
}

// ============================================================================
// Field parsing
// ============================================================================

function decode(raw: Uint8Array | string): string {
  if (typeof raw === 'string') {
    return raw.startsWith('\uFEFF') ? raw.slice(1) : raw;
  }
  try {
    // BOM is consumed by the decoder
    return new TextDecoder('utf-8', { fatal: true }).decode(raw);
  } catch (error) {
    throw new ParseError('Snapshot is not valid UTF-8', { cause: error });
  }
}

/**
 * Non-negative integer count; empty → unknown
 */
export function parseCount(raw: string): MetricValue | 'invalid' {
  if (raw === '') return null;
  if (!/^\d+(\.0+)?$/.test(raw)) return 'invalid';
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : 'invalid';
}

/**
 * Non-negative finite rational; empty → unknown
 */
export function parseRate(raw: string): MetricValue | 'invalid' {
  if (raw === '') return null;
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 ? value : 'invalid';
}

const US_SHORT_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4}) (\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Accepts epoch seconds/milliseconds, ISO-8601, `YYYY-MM-DD HH:MM:SS` and
 * `M/D/YY H:MM`; values without a zone are UTC.
 */
export function parseTimestamp(raw: string): Date | null | 'invalid' {
  if (raw === '') return null;

  if (/^\d+$/.test(raw)) {
    const value = Number(raw);
    const date = new Date(raw.length <= 10 ? value * 1000 : value);
    return Number.isNaN(date.getTime()) ? 'invalid' : date;
  }

  const short = US_SHORT_DATE.exec(raw);
  if (short) {
    const [, month, day, year, hour, minute, second] = short;
    const fullYear = year && year.length === 2 ? 2000 + Number(year) : Number(year);
    const date = new Date(
      Date.UTC(fullYear, Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second ?? 0))
    );
    return Number.isNaN(date.getTime()) ? 'invalid' : date;
  }

  let iso = raw.replace(' ', 'T');
  if (/T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/.test(iso)) {
    iso += 'Z';
  }
  const parsed = Date.parse(iso);
  return Number.isNaN(parsed) ? 'invalid' : new Date(parsed);
}

function addKnown(a: MetricValue, b: MetricValue): MetricValue {
  return a === null || b === null ? null : a + b;
}

function finalizeMetrics(
  acc: RegionAccumulator,
  snapshotTime: Date,
  warn: (line: number, code: ParseWarningCode, message: string) => void
): MetricSet {
  let active: MetricValue = acc.reportedActive;
  if (acc.confirmed !== null && acc.deaths !== null && acc.recovered !== null) {
    const derived = acc.confirmed - acc.deaths - acc.recovered;
    if (derived < 0) {
      warn(
        acc.firstLine,
        'negative_active',
        `Deaths plus recovered exceed confirmed for ${regionLabel(acc.region)}`
      );
      active = null;
    } else {
      active = derived;
    }
  }

  return Object.freeze({
    confirmed: acc.confirmed,
    deaths: acc.deaths,
    recovered: acc.recovered,
    active,
    incidentRate: acc.incidentRate,
    asOf: acc.lastUpdate ?? snapshotTime,
  });
}
