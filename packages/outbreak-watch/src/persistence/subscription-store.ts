/**
 * Subscription Store - Durable Subscriber State
 *
 * Owns every (subscriber, region) subscription and its last-notified
 * baseline. The only durable component of the system.
 *
 * ARCHITECTURE:
 * - One JSON document on disk (see SubscriptionStoreFile)
 * - Atomic writes with temp file + rename
 * - Every mutation serialized through a single-writer queue, and across
 *   processes through `<path>.lock`
 * - A mutation re-reads the file under the lock and applies itself to what
 *   is on disk, so a CLI process and a running service never overwrite each
 *   other's changes
 * - In-memory state swapped only after the file write succeeds, so readers
 *   never observe a state that is not on disk
 *
 * CORRUPTION: a file that exists but cannot be read, parsed or validated
 * raises StoreCorruptionError. The store never starts empty over it;
 * `SubscriptionStore.recover()` moves the file aside on operator request.
 */

import { readFile, rename } from 'node:fs/promises';
import { z } from 'zod';
import type { MetricSet, Region, Subscription } from '../core/types.js';
import { compareRegions, regionId, regionLabel, sameRegion } from '../core/types.js';
import { StoreCorruptionError, SubscriptionLimitError, errorMessage } from '../core/errors.js';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';
import { formatZodError } from '../core/utils/validation.js';
import { FileLock, type FileLockOptions } from '../core/utils/file-lock.js';
import { WriteQueue } from '../core/utils/write-queue.js';
import { logger } from '../core/utils/logger.js';

// ============================================================================
// File schema
// ============================================================================

const MetricValueSchema = z.number().nonnegative().nullable();

const StoredMetricSetSchema = z.object({
  confirmed: MetricValueSchema,
  deaths: MetricValueSchema,
  recovered: MetricValueSchema,
  active: MetricValueSchema,
  incidentRate: MetricValueSchema,
  asOf: z.string().datetime(),
});

const StoredSubscriptionSchema = z.object({
  region: z.object({
    country: z.string().min(1),
    province: z.string(),
  }),
  lastNotified: StoredMetricSetSchema.nullable(),
});

// Subscriber ids are data, not object keys, so any string round-trips
const StoredSubscriberSchema = z.object({
  subscriberId: z.string().min(1),
  subscriptions: z.array(StoredSubscriptionSchema),
});

const SubscriptionStoreFileSchema = z.object({
  version: z.literal(1),
  updatedAt: z.string().datetime(),
  subscribers: z.array(StoredSubscriberSchema),
});

export type SubscriptionStoreFile = z.infer<typeof SubscriptionStoreFileSchema>;
type StoredMetricSet = z.infer<typeof StoredMetricSetSchema>;

// ============================================================================
// Subscription Store
// ============================================================================

interface Entry {
  readonly region: Region;
  readonly lastNotified: MetricSet | null;
}

type State = ReadonlyMap<string, readonly Entry[]>;

/** Next state to write (null: nothing changed) and the caller's result */
type Change<T> = { readonly next: State | null; readonly result: T };

export interface SubscriptionStoreOptions {
  /** Maximum regions per subscriber (default: 10) */
  readonly maxPerSubscriber?: number;
  readonly lock?: FileLockOptions;
}

export type SubscribeOutcome = 'created' | 'exists';

export class SubscriptionStore {
  private readonly queue = new WriteQueue();
  private readonly lock: FileLock;
  private readonly maxPerSubscriber: number;

  private constructor(
    readonly path: string,
    private state: State,
    options: SubscriptionStoreOptions
  ) {
    this.maxPerSubscriber = options.maxPerSubscriber ?? 10;
    this.lock = new FileLock(path, options.lock);
  }

  /**
   * Open the store at `path`; a missing file is a first start
   *
   * @throws StoreCorruptionError when the file exists but is not a valid store
   */
  static async open(
    path: string,
    options: SubscriptionStoreOptions = {}
  ): Promise<SubscriptionStore> {
    const state = await loadState(path);
    if (!state) {
      logger.info('Subscription store not found, starting empty', { path });
      return new SubscriptionStore(path, new Map(), options);
    }
    logger.info('Subscription store loaded', {
      path,
      subscribers: state.size,
    });
    return new SubscriptionStore(path, state, options);
  }

  /**
   * Move a corrupt store file aside to `<path>.corrupt-<timestamp>`
   *
   * @returns Backup path, or null when there was no file
   */
  static async recover(path: string, now: Date = new Date()): Promise<string | null> {
    const backupPath = `${path}.corrupt-${now.toISOString().replace(/[:.]/g, '-')}`;
    try {
      await rename(path, backupPath);
    } catch (error) {
      if (isNotFoundError(error)) return null;
      throw error;
    }
    logger.warn('Subscription store moved aside', { path, backupPath });
    return backupPath;
  }

  // --------------------------------------------------------------------------
  // Mutations
  // --------------------------------------------------------------------------

  /**
   * Watch a region; idempotent
   *
   * @throws SubscriptionLimitError when the subscriber is at the cap
   */
  subscribe(subscriberId: string, region: Region): Promise<SubscribeOutcome> {
    return this.mutate<SubscribeOutcome>((state) => {
      const current = state.get(subscriberId) ?? [];
      if (current.some((entry) => sameRegion(entry.region, region))) {
        return { next: null, result: 'exists' };
      }
      if (current.length >= this.maxPerSubscriber) {
        throw new SubscriptionLimitError(subscriberId, this.maxPerSubscriber);
      }

      const next = new Map(state);
      next.set(subscriberId, [...current, { region: copyRegion(region), lastNotified: null }]);
      logger.debug('Subscription created', { subscriberId, region: regionLabel(region) });
      return { next, result: 'created' };
    });
  }

  /**
   * @returns true when a subscription was removed
   */
  unsubscribe(subscriberId: string, region: Region): Promise<boolean> {
    return this.mutate<boolean>((state) => {
      const current = state.get(subscriberId);
      if (!current?.some((entry) => sameRegion(entry.region, region))) {
        return { next: null, result: false };
      }

      const remaining = current.filter((entry) => !sameRegion(entry.region, region));
      const next = new Map(state);
      if (remaining.length === 0) {
        next.delete(subscriberId);
      } else {
        next.set(subscriberId, remaining);
      }
      return { next, result: true };
    });
  }

  /**
   * Store the baseline that was just delivered
   *
   * @returns false when the subscription no longer exists (it stays removed)
   */
  recordNotified(subscriberId: string, region: Region, metrics: MetricSet): Promise<boolean> {
    return this.mutate<boolean>((state) => {
      const current = state.get(subscriberId);
      if (!current?.some((entry) => sameRegion(entry.region, region))) {
        return { next: null, result: false };
      }

      const next = new Map(state);
      next.set(
        subscriberId,
        current.map((entry) =>
          sameRegion(entry.region, region) ? { region: entry.region, lastNotified: metrics } : entry
        )
      );
      return { next, result: true };
    });
  }

  /**
   * Pick up changes other processes wrote since the last read
   *
   * @throws StoreCorruptionError when the file has become invalid
   */
  refresh(): Promise<void> {
    return this.queue.run(async () => {
      this.state = (await loadState(this.path)) ?? new Map<string, readonly Entry[]>();
    });
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  /**
   * Regions watched by a subscriber, in subscription order
   */
  listFor(subscriberId: string): Region[] {
    return (this.state.get(subscriberId) ?? []).map((entry) => entry.region);
  }

  /**
   * Every subscription, ordered by subscriber id then region id
   */
  allSubscriptions(): Subscription[] {
    const subscriberIds = [...this.state.keys()].sort(compareCodeUnits);
    const result: Subscription[] = [];
    for (const subscriberId of subscriberIds) {
      const entries = [...(this.state.get(subscriberId) ?? [])].sort((a, b) =>
        compareRegions(a.region, b.region)
      );
      for (const entry of entries) {
        result.push({ subscriberId, region: entry.region, lastNotified: entry.lastNotified });
      }
    }
    return result;
  }

  get subscriberCount(): number {
    return this.state.size;
  }

  /** Resolves once every queued mutation has settled */
  async flush(): Promise<void> {
    await this.queue.drain();
  }

  // --------------------------------------------------------------------------
  // Private Helpers
  // --------------------------------------------------------------------------

  /**
   * Apply `change` to the state on disk under the cross-process lock
   */
  private mutate<T>(change: (state: State) => Change<T>): Promise<T> {
    return this.queue.run(() =>
      this.lock.withLock(async () => {
        const latest = (await loadState(this.path)) ?? new Map<string, readonly Entry[]>();
        const { next, result } = change(latest);
        if (next) {
          await atomicWriteJSON(this.path, serialize(next, new Date()));
        }
        this.state = next ?? latest;
        return result;
      })
    );
  }
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Read and validate the file at `path`
 *
 * @returns null when there is no file
 * @throws StoreCorruptionError when it exists but is not a valid store
 */
async function loadState(path: string): Promise<State | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFoundError(error)) return null;
    throw new StoreCorruptionError(
      `Cannot read subscription store ${path}: ${errorMessage(error)}`,
      path,
      { cause: error }
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new StoreCorruptionError(
      `Subscription store ${path} is not valid JSON: ${errorMessage(error)}`,
      path,
      { cause: error }
    );
  }

  const parsed = SubscriptionStoreFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StoreCorruptionError(
      `Subscription store ${path} failed validation: ${formatZodError(parsed.error)}`,
      path
    );
  }
  return deserialize(parsed.data, path);
}

function serialize(state: State, updatedAt: Date): SubscriptionStoreFile {
  const subscribers = [...state.keys()].sort(compareCodeUnits).map((subscriberId) => ({
    subscriberId,
    subscriptions: (state.get(subscriberId) ?? []).map((entry) => ({
      region: copyRegion(entry.region),
      lastNotified: entry.lastNotified ? serializeMetrics(entry.lastNotified) : null,
    })),
  }));
  return { version: 1, updatedAt: updatedAt.toISOString(), subscribers };
}

function serializeMetrics(metrics: MetricSet): StoredMetricSet {
  return {
    confirmed: metrics.confirmed,
    deaths: metrics.deaths,
    recovered: metrics.recovered,
    active: metrics.active,
    incidentRate: metrics.incidentRate,
    asOf: metrics.asOf.toISOString(),
  };
}

function deserialize(file: SubscriptionStoreFile, path: string): State {
  const state = new Map<string, readonly Entry[]>();
  const subscriberIds = new Set<string>();
  for (const { subscriberId, subscriptions } of file.subscribers) {
    if (subscriberIds.has(subscriberId)) {
      throw new StoreCorruptionError(
        `Subscription store ${path} lists subscriber ${subscriberId} twice`,
        path
      );
    }
    subscriberIds.add(subscriberId);
    const seen = new Set<string>();
    const entries: Entry[] = [];
    for (const item of subscriptions) {
      const id = regionId(item.region);
      if (seen.has(id)) {
        throw new StoreCorruptionError(
          `Subscription store ${path} lists ${id} twice for ${subscriberId}`,
          path
        );
      }
      seen.add(id);
      entries.push({
        region: copyRegion(item.region),
        lastNotified: item.lastNotified
          ? Object.freeze({ ...item.lastNotified, asOf: new Date(item.lastNotified.asOf) })
          : null,
      });
    }
    if (entries.length > 0) state.set(subscriberId, entries);
  }
  return state;
}

function copyRegion(region: Region): Region {
  return Object.freeze({ country: region.country, province: region.province });
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function isNotFoundError(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
