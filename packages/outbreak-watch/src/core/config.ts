/**
 * Outbreak Watch Configuration
 *
 * Default configuration for the OutbreakWatchService facade and the
 * reconciliation scheduler. Every duration, path and limit the core uses
 * comes from here; nothing inside the core is hardcoded.
 *
 * TYPE SAFETY: All configuration is strongly typed and immutable.
 */

// ============================================================================
// Outbreak Watch Configuration
// ============================================================================

export interface OutbreakWatchConfig {
  /** Directory for the subscription store and recovery backups */
  readonly storageDir: string;

  /** Upstream snapshot source */
  readonly source: {
    /** http(s) URL or local file path of the tabular snapshot; null = not configured */
    readonly location: string | null;
    readonly userAgent: string;
  };

  /** Reconciliation loop timing */
  readonly schedule: {
    /** Interval between ticks in milliseconds (default: 20 minutes) */
    readonly intervalMs: number;
    /** Bound on a single fetch attempt in milliseconds */
    readonly fetchTimeoutMs: number;
    /** Fetch attempts per tick before the tick is skipped */
    readonly fetchAttempts: number;
    /** Delay before the first fetch retry; doubles per attempt */
    readonly retryDelayMs: number;
  };

  /** Region catalog sources (null = bundled data files) */
  readonly catalog: {
    readonly regionsPath: string | null;
    readonly aliasesPath: string | null;
  };

  readonly subscriptions: {
    /** Store file name, relative to storageDir unless absolute */
    readonly storeFile: string;
    /** Maximum regions one subscriber may watch */
    readonly maxPerSubscriber: number;
  };

  readonly ranking: {
    readonly defaultLimit: number;
    readonly maxLimit: number;
    /** Entries shown per list in the summary */
    readonly summaryTopCount: number;
  };
}

/**
 * Default configuration
 *
 * - 20-minute polling interval, 2-minute fetch timeout
 * - 3 fetch attempts per tick with 2s initial backoff
 * - 10 watched regions per subscriber
 */
export const DEFAULT_CONFIG: OutbreakWatchConfig = {
  storageDir: '.outbreak-watch',
  source: {
    location: null,
    userAgent: 'outbreak-watch/0.1 (+subscription-feed)',
  },
  schedule: {
    intervalMs: 20 * 60 * 1000,
    fetchTimeoutMs: 120_000,
    fetchAttempts: 3,
    retryDelayMs: 2_000,
  },
  catalog: {
    regionsPath: null,
    aliasesPath: null,
  },
  subscriptions: {
    storeFile: 'subscriptions.json',
    maxPerSubscriber: 10,
  },
  ranking: {
    defaultLimit: 6,
    maxLimit: 25,
    summaryTopCount: 3,
  },
};

/**
 * Deep partial type for nested configuration objects
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

/**
 * Create custom configuration by merging with defaults
 *
 * @param overrides - Partial configuration to override defaults (supports deep partial)
 * @returns Full configuration with overrides applied
 */
export function createConfig(
  overrides: DeepPartial<OutbreakWatchConfig> = {}
): OutbreakWatchConfig {
  return {
    storageDir: overrides.storageDir ?? DEFAULT_CONFIG.storageDir,
    source: {
      ...DEFAULT_CONFIG.source,
      ...overrides.source,
    },
    schedule: {
      ...DEFAULT_CONFIG.schedule,
      ...overrides.schedule,
    },
    catalog: {
      ...DEFAULT_CONFIG.catalog,
      ...overrides.catalog,
    },
    subscriptions: {
      ...DEFAULT_CONFIG.subscriptions,
      ...overrides.subscriptions,
    },
    ranking: {
      ...DEFAULT_CONFIG.ranking,
      ...overrides.ranking,
    },
  };
}
