/**
 * OutbreakWatchService - Command Surface
 *
 * The operations a chat front end (or the CLI) calls: summary, ranking,
 * region status, subscribe / unsubscribe and manual refresh.
 *
 * ARCHITECTURE PRINCIPLE: Composition over reimplementation.
 * This facade delegates to:
 * - RegionCatalog for name resolution
 * - SnapshotHolder + Aggregator for read-only queries
 * - SubscriptionStore for subscriber state
 * - ReconciliationScheduler for refresh requests
 *
 * Every operation returns a CommandResult and never throws. Inputs are
 * validated with zod before anything else runs.
 *
 * @example
 * ```typescript
 * const { service, scheduler } = await createOutbreakWatch(config, {
 *   notifier: new LogNotifier(),
 * });
 * scheduler.start();
 *
 * const status = service.getStatus('ontario');
 * if (status.success) {
 *   console.log(status.data.metrics.confirmed);
 * }
 * ```
 */

import { join, isAbsolute } from 'node:path';
import { z } from 'zod';
import type {
  MetricSet,
  RankingEntry,
  Region,
  RegionMetrics,
  Snapshot,
} from '../core/types.js';
import { regionLabel, isCountryLevel } from '../core/types.js';
import type { OutbreakWatchConfig } from '../core/config.js';
import {
  AmbiguousRegionError,
  ConfigurationError,
  RegionDataNotFoundError,
  StoreLockError,
  SubscriptionLimitError,
  UnknownRegionError,
  errorMessage,
} from '../core/errors.js';
import type { Notifier } from '../core/notifier.js';
import { formatZodError } from '../core/utils/validation.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { RegionCatalog } from '../registry/region-catalog.js';
import { SnapshotParser } from '../ingestion/snapshot-parser.js';
import {
  affectedCountryCount,
  globalTotals,
  rank,
  rankOf,
  rankProvinces,
  rankedCountries,
  regionMetrics,
} from '../aggregation/aggregator.js';
import { SubscriptionStore, type SubscribeOutcome } from '../persistence/subscription-store.js';
import { SnapshotHolder } from '../services/snapshot-holder.js';
import {
  ReconciliationScheduler,
  type Clock,
  type RefreshOutcome,
  type SnapshotFetcher,
  type TransitionListener,
} from '../services/reconciliation-scheduler.js';
import { createSnapshotFetcher } from '../acquisition/index.js';

// ============================================================================
// Results
// ============================================================================

export type CommandErrorCode =
  | 'INVALID_INPUT'
  | 'UNKNOWN_REGION'
  | 'AMBIGUOUS_REGION'
  | 'NO_DATA'
  | 'REGION_NOT_IN_SNAPSHOT'
  | 'SUBSCRIPTION_LIMIT'
  | 'NOT_SUBSCRIBED'
  | 'STORE_BUSY'
  | 'INTERNAL';

export interface CommandError {
  readonly code: CommandErrorCode;
  readonly message: string;
  /** Alternative region names the caller may offer */
  readonly suggestions?: readonly string[];
}

export type CommandResult<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: CommandError };

export interface SummaryView {
  readonly totals: MetricSet;
  readonly complete: boolean;
  readonly incompleteRegions: readonly Region[];
  readonly countryCount: number;
  /** Countries with at least one confirmed case */
  readonly affectedCountries: number;
  readonly topCountries: readonly RankingEntry[];
  readonly topProvinces: readonly RankingEntry[];
  readonly snapshotTime: Date;
}

export interface RankingView {
  readonly entries: readonly RankingEntry[];
  readonly totalRanked: number;
  readonly start: number;
  readonly limit: number;
  readonly snapshotTime: Date;
}

export interface StatusView extends RegionMetrics {
  /** Position in the country ranking; null for provinces and unranked countries */
  readonly countryRank: number | null;
  readonly snapshotTime: Date;
}

export interface SubscribeView {
  readonly region: Region;
  readonly outcome: SubscribeOutcome;
}

export interface SubscriptionsView {
  readonly subscriberId: string;
  readonly regions: readonly Region[];
  readonly limit: number;
}

// ============================================================================
// Input validation
// ============================================================================

const CONTROL_CHARACTERS = /[\u0000-\u001F\u007F]/;

const RegionQuerySchema = z
  .string()
  .refine((value) => !CONTROL_CHARACTERS.test(value), 'Region must not contain control characters')
  .transform((value) => value.trim())
  .pipe(
    z
      .string()
      .min(1, 'Region must not be empty')
      .max(100, 'Region must be at most 100 characters')
  );

const SubscriberIdSchema = z
  .string()
  .trim()
  .min(1, 'Subscriber id must not be empty')
  .max(128, 'Subscriber id must be at most 128 characters');

const StartSchema = z.number().int('start must be an integer').min(1, 'start must be at least 1');

// ============================================================================
// Service
// ============================================================================

export interface OutbreakWatchServiceDeps {
  readonly config: OutbreakWatchConfig;
  readonly catalog: RegionCatalog;
  readonly store: SubscriptionStore;
  readonly holder: SnapshotHolder;
  readonly scheduler: Pick<ReconciliationScheduler, 'requestRefresh'>;
  readonly logger?: Logger;
}

export class OutbreakWatchService {
  private readonly config: OutbreakWatchConfig;
  private readonly catalog: RegionCatalog;
  private readonly store: SubscriptionStore;
  private readonly holder: SnapshotHolder;
  private readonly scheduler: Pick<ReconciliationScheduler, 'requestRefresh'>;
  private readonly log: Logger;
  private readonly limitSchema: z.ZodNumber;

  constructor(deps: OutbreakWatchServiceDeps) {
    this.config = deps.config;
    this.catalog = deps.catalog;
    this.store = deps.store;
    this.holder = deps.holder;
    this.scheduler = deps.scheduler;
    this.log = deps.logger ?? createLogger({ module: 'service' });
    this.limitSchema = z
      .number()
      .int('limit must be an integer')
      .min(1, 'limit must be at least 1')
      .max(deps.config.ranking.maxLimit, `limit must be at most ${deps.config.ranking.maxLimit}`);
  }

  /**
   * Global totals with the leading countries and provinces
   */
  getSummary(): CommandResult<SummaryView> {
    return this.run<SummaryView>('getSummary', () => {
      const snapshot = this.requireSnapshot();
      if (!snapshot.success) return snapshot;

      const data = snapshot.data;
      const totals = globalTotals(data);
      const topCount = this.config.ranking.summaryTopCount;
      return ok({
        totals: totals.metrics,
        complete: totals.complete,
        incompleteRegions: totals.incompleteRegions,
        countryCount: totals.regionCount,
        affectedCountries: affectedCountryCount(data),
        topCountries: rank(data, topCount),
        topProvinces: rankProvinces(data, topCount),
        snapshotTime: data.timestamp,
      });
    });
  }

  /**
   * One page of the country ranking
   */
  getRanking(limit: number = this.config.ranking.defaultLimit, start = 1): CommandResult<RankingView> {
    return this.run<RankingView>('getRanking', () => {
      const limitInput = this.limitSchema.safeParse(limit);
      if (!limitInput.success) return invalid(formatZodError(limitInput.error));
      const startInput = StartSchema.safeParse(start);
      if (!startInput.success) return invalid(formatZodError(startInput.error));

      const snapshot = this.requireSnapshot();
      if (!snapshot.success) return snapshot;

      return ok({
        entries: rank(snapshot.data, limitInput.data, startInput.data),
        totalRanked: rankedCountries(snapshot.data).length,
        start: startInput.data,
        limit: limitInput.data,
        snapshotTime: snapshot.data.timestamp,
      });
    });
  }

  getStatus(regionQuery: string): CommandResult<StatusView> {
    return this.run<StatusView>('getStatus', () => {
      const region = this.resolveRegion(regionQuery);
      if (!region.success) return region;
      const snapshot = this.requireSnapshot();
      if (!snapshot.success) return snapshot;

      const metrics = regionMetrics(snapshot.data, region.data);
      return ok({
        ...metrics,
        countryRank: isCountryLevel(region.data) ? rankOf(snapshot.data, region.data) : null,
        snapshotTime: snapshot.data.timestamp,
      });
    });
  }

  async subscribeRegion(
    subscriberId: string,
    regionQuery: string
  ): Promise<CommandResult<SubscribeView>> {
    return this.runAsync<SubscribeView>('subscribeRegion', async () => {
      const subscriber = SubscriberIdSchema.safeParse(subscriberId);
      if (!subscriber.success) return invalid(formatZodError(subscriber.error));
      const region = this.resolveRegion(regionQuery);
      if (!region.success) return region;

      const outcome = await this.store.subscribe(subscriber.data, region.data);
      this.log.info('Subscribe', {
        subscriberId: subscriber.data,
        region: regionLabel(region.data),
        outcome,
      });
      return ok({ region: region.data, outcome });
    });
  }

  async unsubscribeRegion(
    subscriberId: string,
    regionQuery: string
  ): Promise<CommandResult<{ readonly region: Region }>> {
    return this.runAsync<{ readonly region: Region }>('unsubscribeRegion', async () => {
      const subscriber = SubscriberIdSchema.safeParse(subscriberId);
      if (!subscriber.success) return invalid(formatZodError(subscriber.error));
      const region = this.resolveRegion(regionQuery);
      if (!region.success) return region;

      const removed = await this.store.unsubscribe(subscriber.data, region.data);
      if (!removed) {
        return fail('NOT_SUBSCRIBED', `${subscriber.data} is not subscribed to ${regionLabel(region.data)}`);
      }
      this.log.info('Unsubscribe', { subscriberId: subscriber.data, region: regionLabel(region.data) });
      return ok({ region: region.data });
    });
  }

  listSubscriptions(subscriberId: string): CommandResult<SubscriptionsView> {
    return this.run<SubscriptionsView>('listSubscriptions', () => {
      const subscriber = SubscriberIdSchema.safeParse(subscriberId);
      if (!subscriber.success) return invalid(formatZodError(subscriber.error));
      return ok({
        subscriberId: subscriber.data,
        regions: this.store.listFor(subscriber.data),
        limit: this.config.subscriptions.maxPerSubscriber,
      });
    });
  }

  /**
   * Ask the scheduler for an early cycle; returns without waiting for it
   */
  forceRefresh(): CommandResult<{ readonly outcome: RefreshOutcome }> {
    return this.run<{ readonly outcome: RefreshOutcome }>('forceRefresh', () => ok({ outcome: this.scheduler.requestRefresh() }));
  }

  // --------------------------------------------------------------------------
  // Private Helpers
  // --------------------------------------------------------------------------

  private requireSnapshot(): CommandResult<Snapshot> {
    const snapshot = this.holder.current();
    return snapshot ? ok(snapshot) : fail('NO_DATA', 'No snapshot has been loaded yet');
  }

  private resolveRegion(query: string): CommandResult<Region> {
    const input = RegionQuerySchema.safeParse(query);
    if (!input.success) return invalid(formatZodError(input.error));
    return ok(this.catalog.resolve(input.data));
  }

  private run<T>(operation: string, fn: () => CommandResult<T>): CommandResult<T> {
    try {
      return fn();
    } catch (error) {
      return this.toFailure(operation, error);
    }
  }

  private async runAsync<T>(
    operation: string,
    fn: () => Promise<CommandResult<T>>
  ): Promise<CommandResult<T>> {
    try {
      return await fn();
    } catch (error) {
      return this.toFailure(operation, error);
    }
  }

  private toFailure(operation: string, error: unknown): CommandResult<never> {
    if (error instanceof UnknownRegionError) {
      return fail(
        'UNKNOWN_REGION',
        error.message,
        this.catalog.suggest(error.query).map(regionLabel)
      );
    }
    if (error instanceof AmbiguousRegionError) {
      return fail('AMBIGUOUS_REGION', error.message, error.candidates.map(regionLabel));
    }
    if (error instanceof RegionDataNotFoundError) {
      return fail('REGION_NOT_IN_SNAPSHOT', error.message);
    }
    if (error instanceof SubscriptionLimitError) {
      return fail('SUBSCRIPTION_LIMIT', error.message);
    }
    if (error instanceof StoreLockError) {
      return fail('STORE_BUSY', 'The subscription store is busy, try again');
    }

    this.log.error('Command failed', { operation, error: errorMessage(error) });
    return fail('INTERNAL', `${operation} failed due to an internal error`);
  }
}

function ok<T>(data: T): CommandResult<T> {
  return { success: true, data };
}

function fail(
  code: CommandErrorCode,
  message: string,
  suggestions?: readonly string[]
): CommandResult<never> {
  const error: CommandError =
    suggestions && suggestions.length > 0 ? { code, message, suggestions } : { code, message };
  return { success: false, error };
}

function invalid(message: string): CommandResult<never> {
  return fail('INVALID_INPUT', message);
}

// ============================================================================
// Wiring
// ============================================================================

export interface OutbreakWatchRuntime {
  readonly service: OutbreakWatchService;
  readonly scheduler: ReconciliationScheduler;
  readonly store: SubscriptionStore;
  readonly catalog: RegionCatalog;
  readonly holder: SnapshotHolder;
}

export interface CreateOutbreakWatchOptions {
  readonly notifier: Notifier;
  /** Overrides the fetcher built from `config.source.location` */
  readonly fetcher?: SnapshotFetcher;
  readonly clock?: Clock;
  readonly onTransition?: TransitionListener;
}

/**
 * Resolve the store file against the storage directory
 */
export function storePath(config: OutbreakWatchConfig): string {
  const file = config.subscriptions.storeFile;
  return isAbsolute(file) ? file : join(config.storageDir, file);
}

/**
 * Load the catalog, open the store and wire the scheduler and service
 *
 * @throws CatalogLoadError | StoreCorruptionError | ConfigurationError (no source)
 */
export async function createOutbreakWatch(
  config: OutbreakWatchConfig,
  options: CreateOutbreakWatchOptions
): Promise<OutbreakWatchRuntime> {
  const fetcher = options.fetcher ?? fetcherFromConfig(config);
  const catalog = await RegionCatalog.load(config.catalog);
  const store = await SubscriptionStore.open(storePath(config), {
    maxPerSubscriber: config.subscriptions.maxPerSubscriber,
  });
  const holder = new SnapshotHolder();

  const scheduler = new ReconciliationScheduler({
    fetcher,
    parser: new SnapshotParser(catalog),
    store,
    notifier: options.notifier,
    holder,
    schedule: config.schedule,
    clock: options.clock,
    onTransition: options.onTransition,
  });

  const service = new OutbreakWatchService({ config, catalog, store, holder, scheduler });
  return { service, scheduler, store, catalog, holder };
}

function fetcherFromConfig(config: OutbreakWatchConfig): SnapshotFetcher {
  if (!config.source.location) {
    throw new ConfigurationError('No snapshot source configured (source.location)');
  }
  return createSnapshotFetcher(config.source.location, {
    userAgent: config.source.userAgent,
    fetchTimeoutMs: config.schedule.fetchTimeoutMs,
  });
}
