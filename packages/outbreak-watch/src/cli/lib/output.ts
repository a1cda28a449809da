/**
 * Output Formatting for CLI Commands
 *
 * Provides consistent output formatting across all CLI commands.
 * Supports: table (human) and json (machine-readable)
 *
 * @module cli/lib/output
 */

import { COUNT_FIELDS, regionLabel, type RankingEntry } from '../../core/types.js';
import { FIELD_LABELS, formatCount, formatMetric } from '../../core/notifier.js';
import type {
  CommandError,
  RankingView,
  StatusView,
  SubscriptionsView,
  SummaryView,
} from '../../serving/outbreak-watch-service.js';

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right' | 'center';
  readonly formatter?: (value: unknown) => string;
}

/**
 * Format data as a table
 */
export function formatTable<T extends Record<string, unknown>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const cell = (row: T, col: TableColumn): string => {
    const value = row[col.key];
    return col.formatter ? col.formatter(value) : String(value ?? '');
  };

  // Calculate column widths
  const widths = columns.map((col) => {
    if (col.width) return col.width;
    const maxDataWidth = Math.max(...data.map((row) => cell(row, col).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i] ?? col.header.length, col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns
      .map((col, i) => {
        const formatted = cell(row, col);
        return padCell(formatted, widths[i] ?? formatted.length, col.align ?? 'left');
      })
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Pad a cell value to the specified width
 */
function padCell(value: string, width: number, align: 'left' | 'right' | 'center'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;

  switch (align) {
    case 'right':
      return truncated.padStart(width);
    case 'center': {
      const padding = width - truncated.length;
      const leftPad = Math.floor(padding / 2);
      return ' '.repeat(leftPad) + truncated + ' '.repeat(padding - leftPad);
    }
    default:
      return truncated.padEnd(width);
  }
}

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

// ============================================================================
// Domain renderers
// ============================================================================

type RankingRow = {
  readonly position: number;
  readonly region: string;
  readonly confirmed: number;
};

const RANKING_COLUMNS: readonly TableColumn[] = [
  { key: 'position', header: '#', align: 'right' },
  { key: 'region', header: 'Region' },
  {
    key: 'confirmed',
    header: 'Confirmed',
    align: 'right',
    formatter: (value) => (typeof value === 'number' ? formatCount(value) : '-'),
  },
];

export function formatRankingTable(entries: readonly RankingEntry[]): string {
  const rows: RankingRow[] = entries.map((entry) => ({
    position: entry.position,
    region: regionLabel(entry.region),
    confirmed: entry.confirmed,
  }));
  return formatTable(rows, RANKING_COLUMNS);
}

export function renderSummary(view: SummaryView): string {
  const lines = [
    `Snapshot: ${view.snapshotTime.toISOString()}`,
    `Countries reporting: ${view.countryCount} (${view.affectedCountries} with confirmed cases)`,
    '',
    ...COUNT_FIELDS.map(
      (field) => `${FIELD_LABELS[field]}: ${formatMetric(field, view.totals[field])}`
    ),
  ];
  if (view.incompleteRegions.length > 0) {
    lines.push(`Incomplete totals: ${view.incompleteRegions.map(regionLabel).join(', ')}`);
  }
  lines.push(
    '',
    'Top countries:',
    formatRankingTable(view.topCountries),
    '',
    'Top provinces:',
    formatRankingTable(view.topProvinces)
  );
  return lines.join('\n');
}

export function renderRanking(view: RankingView): string {
  if (view.entries.length === 0) {
    return `No countries ranked from position ${view.start} (${view.totalRanked} ranked)`;
  }
  const last = view.start + view.entries.length - 1;
  return [
    `Countries by confirmed cases, ${view.start}-${last} of ${view.totalRanked}`,
    formatRankingTable(view.entries),
  ].join('\n');
}

export function renderStatus(view: StatusView): string {
  const { metrics } = view;
  const lines = [regionLabel(view.region)];
  for (const field of COUNT_FIELDS) {
    lines.push(`${FIELD_LABELS[field]}: ${formatMetric(field, metrics[field])}`);
  }
  if (metrics.incidentRate !== null) {
    lines.push(`${FIELD_LABELS.incidentRate}: ${formatMetric('incidentRate', metrics.incidentRate)}`);
  }
  if (view.countryRank !== null) {
    lines.push(`Rank: #${view.countryRank}`);
  }
  lines.push(`As of: ${metrics.asOf.toISOString()}`);
  if (view.source === 'rollup') {
    lines.push(
      view.complete
        ? 'Summed from province rows'
        : 'Summed from province rows; some provinces did not report every field'
    );
  }
  return lines.join('\n');
}

export function renderSubscriptions(view: SubscriptionsView): string {
  if (view.regions.length === 0) {
    return `${view.subscriberId} has no subscriptions`;
  }
  return [
    `${view.subscriberId} watches ${view.regions.length} of ${view.limit} regions:`,
    ...view.regions.map((region) => `  - ${regionLabel(region)}`),
  ].join('\n');
}

export function renderCommandError(error: CommandError): string {
  // Ambiguity messages already list the candidates
  if (!error.suggestions || error.suggestions.length === 0 || error.code === 'AMBIGUOUS_REGION') {
    return error.message;
  }
  return `${error.message}\nDid you mean: ${error.suggestions.join(', ')}?`;
}

// ============================================================================
// Console
// ============================================================================

/**
 * Print output to console
 */
export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Print error to stderr
 */
export function printError(message: string): void {
  console.error(`Error: ${message}`);
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(`Success: ${message}`);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.warn(`Warning: ${message}`);
}
