/**
 * Outbreak Watch Error Types
 *
 * Every error raised by the core derives from OutbreakWatchError and carries a
 * stable `code` plus a `recoverable` flag:
 *
 * - Region lookup errors surface to the caller as structured command errors.
 * - Fetch and parse errors degrade to "keep the previous snapshot, try again
 *   next tick" inside the scheduler.
 * - StoreCorruptionError is fatal at startup. The operator must run
 *   `outbreak-watch store recover` before the service starts again.
 */

import type { Region } from './types.js';
import { regionLabel } from './types.js';

export type OutbreakWatchErrorCode =
  | 'UNKNOWN_REGION'
  | 'AMBIGUOUS_REGION'
  | 'CATALOG_LOAD'
  | 'PARSE'
  | 'EMPTY_SNAPSHOT'
  | 'REGION_DATA_NOT_FOUND'
  | 'FETCH'
  | 'FETCH_TIMEOUT'
  | 'NOTIFY_DELIVERY'
  | 'SUBSCRIPTION_LIMIT'
  | 'STORE_CORRUPTION'
  | 'STORE_LOCKED'
  | 'CONFIGURATION';

/**
 * Base class for all core errors
 */
export abstract class OutbreakWatchError extends Error {
  abstract readonly code: OutbreakWatchErrorCode;
  abstract readonly recoverable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ============================================================================
// Region catalog
// ============================================================================

export class UnknownRegionError extends OutbreakWatchError {
  readonly code = 'UNKNOWN_REGION' as const;
  readonly recoverable = true;

  constructor(public readonly query: string) {
    super(`Unknown region: "${query}"`);
  }
}

export class AmbiguousRegionError extends OutbreakWatchError {
  readonly code = 'AMBIGUOUS_REGION' as const;
  readonly recoverable = true;

  constructor(
    public readonly query: string,
    public readonly candidates: readonly Region[]
  ) {
    super(
      `Region "${query}" matches ${candidates.length} regions: ` +
        candidates.map(regionLabel).join('; ')
    );
  }
}

export class CatalogLoadError extends OutbreakWatchError {
  readonly code = 'CATALOG_LOAD' as const;
  readonly recoverable = false;

  constructor(
    message: string,
    public readonly sourcePath: string | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

// ============================================================================
// Snapshot ingestion
// ============================================================================

export class ParseError extends OutbreakWatchError {
  readonly code = 'PARSE' as const;
  readonly recoverable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class EmptySnapshotError extends OutbreakWatchError {
  readonly code = 'EMPTY_SNAPSHOT' as const;
  readonly recoverable = true;

  constructor(
    public readonly rowCount: number,
    public readonly warningCount: number
  ) {
    super(
      `Snapshot contains no valid region (${rowCount} rows, ${warningCount} warnings)`
    );
  }
}

export class RegionDataNotFoundError extends OutbreakWatchError {
  readonly code = 'REGION_DATA_NOT_FOUND' as const;
  readonly recoverable = true;

  constructor(public readonly region: Region) {
    super(`No data for ${regionLabel(region)} in the current snapshot`);
  }
}

// ============================================================================
// Transport
// ============================================================================

export class FetchError extends OutbreakWatchError {
  readonly code: 'FETCH' | 'FETCH_TIMEOUT' = 'FETCH';
  readonly recoverable = true;

  constructor(
    message: string,
    public readonly location: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class FetchTimeoutError extends FetchError {
  override readonly code = 'FETCH_TIMEOUT' as const;

  constructor(
    location: string,
    public readonly timeoutMs: number
  ) {
    super(`Fetch timed out after ${timeoutMs}ms: ${location}`, location);
  }
}

// ============================================================================
// Delivery and persistence
// ============================================================================

export class NotifyDeliveryError extends OutbreakWatchError {
  readonly code = 'NOTIFY_DELIVERY' as const;
  readonly recoverable = true;

  constructor(
    public readonly subscriberId: string,
    public readonly region: Region,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Delivery to ${subscriberId} for ${regionLabel(region)} failed: ${reason}`, options);
  }
}

export class SubscriptionLimitError extends OutbreakWatchError {
  readonly code = 'SUBSCRIPTION_LIMIT' as const;
  readonly recoverable = true;

  constructor(
    public readonly subscriberId: string,
    public readonly limit: number
  ) {
    super(`Subscriber ${subscriberId} already watches ${limit} regions`);
  }
}

export class StoreCorruptionError extends OutbreakWatchError {
  readonly code = 'STORE_CORRUPTION' as const;
  readonly recoverable = false;

  constructor(
    message: string,
    public readonly storePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Another process held the store lock for the whole acquisition window
 */
export class StoreLockError extends OutbreakWatchError {
  readonly code = 'STORE_LOCKED' as const;
  readonly recoverable = true;

  constructor(
    public readonly lockPath: string,
    public readonly attempts: number
  ) {
    super(`Could not lock ${lockPath} after ${attempts} attempts`);
  }
}

// ============================================================================
// Configuration
// ============================================================================

export class ConfigurationError extends OutbreakWatchError {
  readonly code = 'CONFIGURATION' as const;
  readonly recoverable = false;

  constructor(
    message: string,
    public readonly configPath: string | null = null
  ) {
    super(message);
  }
}

// ============================================================================
// Type guards
// ============================================================================

export function isOutbreakWatchError(error: unknown): error is OutbreakWatchError {
  return error instanceof OutbreakWatchError;
}

export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError;
}

/**
 * Errors the scheduler absorbs by skipping the tick
 */
export function isSnapshotFailure(
  error: unknown
): error is ParseError | EmptySnapshotError | FetchError {
  return (
    error instanceof ParseError ||
    error instanceof EmptySnapshotError ||
    error instanceof FetchError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
