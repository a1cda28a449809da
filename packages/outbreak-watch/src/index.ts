/**
 * Outbreak Watch
 *
 * Periodically fetched per-region case-count snapshots, global aggregates
 * and rankings, and change notifications for subscribed regions.
 *
 * @packageDocumentation
 */

// Core types and errors
export * from './core/types.js';
export * from './core/errors.js';
export { DEFAULT_CONFIG, createConfig } from './core/config.js';
export type { OutbreakWatchConfig, DeepPartial } from './core/config.js';
export { Logger, logger, createLogger } from './core/utils/logger.js';
export type { LogLevel, LogMetadata } from './core/utils/logger.js';
export { FileLock } from './core/utils/file-lock.js';
export type { FileLockOptions } from './core/utils/file-lock.js';

// Region catalog
export { RegionCatalog, normalizeRegionName } from './registry/region-catalog.js';
export type {
  AliasDefinition,
  CatalogDefinition,
  CatalogSources,
  CountryDefinition,
} from './registry/region-catalog.js';

// Ingestion
export { SnapshotParser, identifyColumns, normalizeHeader } from './ingestion/snapshot-parser.js';
export type { ParseOptions } from './ingestion/snapshot-parser.js';

// Aggregation
export {
  affectedCountryCount,
  globalTotals,
  metricsFor,
  rank,
  rankOf,
  rankProvinces,
  rankedCountries,
  regionMetrics,
} from './aggregation/aggregator.js';

// Subscriptions and notification
export { SubscriptionStore } from './persistence/subscription-store.js';
export type { SubscribeOutcome, SubscriptionStoreOptions } from './persistence/subscription-store.js';
export {
  LogNotifier,
  describeChanges,
  formatUpdateMessage,
  mergeBaseline,
  metricsChanged,
} from './core/notifier.js';
export type { FieldChange, Notifier, NotifyOutcome } from './core/notifier.js';

// Scheduling
export { SnapshotHolder } from './services/snapshot-holder.js';
export { reconcile } from './services/reconciler.js';
export type { ReconcileFailure, ReconcileReport, ReconcileStore } from './services/reconciler.js';
export { ReconciliationScheduler, SystemClock } from './services/reconciliation-scheduler.js';
export type {
  Clock,
  RefreshOutcome,
  SchedulerState,
  SnapshotFetcher,
  TickResult,
  TransitionListener,
} from './services/reconciliation-scheduler.js';
export { RetryExecutor, RetryExhaustedError, createRetryExecutor } from './resilience/retry.js';
export type { RetryConfig } from './resilience/retry.js';

// Snapshot sources
export {
  FileSnapshotFetcher,
  HttpSnapshotFetcher,
  createSnapshotFetcher,
} from './acquisition/index.js';

// Command surface
export {
  OutbreakWatchService,
  createOutbreakWatch,
  storePath,
} from './serving/outbreak-watch-service.js';
export type {
  CommandError,
  CommandErrorCode,
  CommandResult,
  CreateOutbreakWatchOptions,
  OutbreakWatchRuntime,
  RankingView,
  StatusView,
  SubscribeView,
  SubscriptionsView,
  SummaryView,
} from './serving/outbreak-watch-service.js';
