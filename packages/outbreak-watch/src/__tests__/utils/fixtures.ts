/**
 * Test fixtures: a small region catalog, CSV builders and metric helpers
 */

import type { MetricSet, Region, Snapshot } from '../../core/types.js';
import {
  RegionCatalog,
  type AliasDefinition,
  type CatalogDefinition,
} from '../../registry/region-catalog.js';
import { SnapshotParser } from '../../ingestion/snapshot-parser.js';

export const TEST_CATALOG: CatalogDefinition = {
  countries: [
    { name: 'Canada', code: 'CA', provinces: ['Ontario', 'Quebec', 'British Columbia'] },
    { name: 'France', code: 'FR' },
    { name: 'Georgia', code: 'GE' },
    { name: 'Germany', code: 'DE' },
    { name: 'India', code: 'IN', provinces: ['Kerala', 'Punjab'] },
    { name: 'Italy', code: 'IT' },
    { name: 'Pakistan', code: 'PK', provinces: ['Punjab', 'Sindh'] },
    { name: 'Taiwan', code: 'TW' },
    {
      name: 'United States',
      code: 'US',
      provinces: ['California', 'Georgia', 'New York', 'Washington'],
    },
  ],
};

export const TEST_ALIASES: AliasDefinition = {
  aliases: {
    USA: 'United States',
    'Taiwan*': 'Taiwan',
    NY: 'United States/New York',
    BC: 'Canada/British Columbia',
  },
};

export function createTestCatalog(): RegionCatalog {
  return RegionCatalog.fromDefinitions(TEST_CATALOG, TEST_ALIASES);
}

export const country = (name: string): Region => ({ country: name, province: '' });
export const province = (countryName: string, name: string): Region => ({
  country: countryName,
  province: name,
});

// ============================================================================
// CSV builders
// ============================================================================

export const CSV_HEADER =
  'Province_State,Country_Region,Last_Update,Confirmed,Deaths,Recovered,Active,Incident_Rate';

export interface RowInput {
  readonly country: string;
  readonly province?: string;
  readonly lastUpdate?: string;
  readonly confirmed?: number | string;
  readonly deaths?: number | string;
  readonly recovered?: number | string;
  readonly active?: number | string;
  readonly incidentRate?: number | string;
}

export function csvRow(input: RowInput): string {
  const cells = [
    input.province,
    input.country,
    input.lastUpdate,
    input.confirmed,
    input.deaths,
    input.recovered,
    input.active,
    input.incidentRate,
  ];
  return cells.map((cell) => quote(cell === undefined ? '' : String(cell))).join(',');
}

export function csv(...rows: readonly RowInput[]): string {
  return [CSV_HEADER, ...rows.map(csvRow)].join('\n') + '\n';
}

function quote(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export const FETCHED_AT = new Date('2020-04-02T00:00:00Z');

export function parseSnapshot(content: string, catalog = createTestCatalog()): Snapshot {
  return new SnapshotParser(catalog).parse(content, { fetchedAt: FETCHED_AT });
}

// ============================================================================
// Metrics
// ============================================================================

export function metricSet(values: Partial<MetricSet> = {}): MetricSet {
  return {
    confirmed: null,
    deaths: null,
    recovered: null,
    active: null,
    incidentRate: null,
    asOf: new Date('2020-04-01T00:00:00Z'),
    ...values,
  };
}
