/**
 * Outbreak Watch CLI Configuration Management
 *
 * Loads configuration from .outbreak-watchrc (YAML) with environment variable
 * overrides and defaults from core/config.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (OUTBREAK_WATCH_*)
 * 3. Config file (.outbreak-watchrc or --config path)
 * 4. Default values
 *
 * Relative paths in a config file are resolved against the file's directory;
 * relative paths from the environment or flags against the working directory.
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  DEFAULT_CONFIG,
  createConfig,
  type DeepPartial,
  type OutbreakWatchConfig,
} from '../../core/config.js';
import { ConfigurationError, errorMessage } from '../../core/errors.js';
import { formatZodError } from '../../core/utils/validation.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Core configuration handed to createOutbreakWatch */
  readonly core: OutbreakWatchConfig;

  // Runtime overrides (from CLI flags)
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const PositiveInt = z.number().int().positive();

/**
 * Config file structure (YAML)
 */
const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    storage_dir: z.string().min(1).optional(),
    source: z
      .object({
        location: z.string().min(1).optional(),
        user_agent: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    schedule: z
      .object({
        interval_ms: PositiveInt.optional(),
        fetch_timeout_ms: PositiveInt.optional(),
        fetch_attempts: PositiveInt.optional(),
        retry_delay_ms: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
    catalog: z
      .object({
        regions: z.string().min(1).optional(),
        aliases: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    subscriptions: z
      .object({
        store_file: z.string().min(1).optional(),
        max_per_subscriber: PositiveInt.optional(),
      })
      .strict()
      .optional(),
    ranking: z
      .object({
        default_limit: PositiveInt.optional(),
        max_limit: PositiveInt.optional(),
        summary_top_count: PositiveInt.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.outbreak-watchrc',
  '.outbreak-watchrc.yaml',
  '.outbreak-watchrc.yml',
  '.outbreak-watchrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 */
function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON
    raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${errorMessage(error)}`, filePath);
  }

  // An empty YAML document parses to null
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid config file ${filePath}: ${formatZodError(parsed.error)}`,
      filePath
    );
  }
  return parsed.data;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory the config file search starts from (default: process.cwd()) */
  cwd?: string;
  /** Environment (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  overrides?: {
    source?: string;
    storageDir?: string;
    json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigurationError on an unreadable or invalid file, environment value or combination
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const getEnvVar = (name: string): string | undefined => {
    const value = env[`OUTBREAK_WATCH_${name}`];
    return value === undefined || value === '' ? undefined : value;
  };
  const getEnvNumber = (name: string): number | undefined => {
    const value = getEnvVar(name);
    if (value === undefined) return undefined;
    const parsed = /^\d+$/.test(value.trim()) ? parseInt(value, 10) : NaN;
    if (!(parsed > 0)) {
      throw new ConfigurationError(`OUTBREAK_WATCH_${name} must be a positive integer, got "${value}"`);
    }
    return parsed;
  };

  // Find config file
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar('CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const fileDir = configPath ? dirname(configPath) : cwd;
  const fromFile = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : resolvePath(fileDir, path);
  const fromCwd = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : resolvePath(cwd, path);

  // Merge configuration layers
  const overrides: DeepPartial<OutbreakWatchConfig> = {
    storageDir:
      fromCwd(options.overrides?.storageDir) ??
      fromCwd(getEnvVar('STORAGE_DIR')) ??
      fromFile(fileConfig.storage_dir) ??
      resolve(cwd, DEFAULT_CONFIG.storageDir),
    source: {
      location:
        sourceLocation(cwd, options.overrides?.source) ??
        sourceLocation(cwd, getEnvVar('SOURCE')) ??
        sourceLocation(fileDir, fileConfig.source?.location) ??
        DEFAULT_CONFIG.source.location,
      userAgent: fileConfig.source?.user_agent ?? DEFAULT_CONFIG.source.userAgent,
    },
    schedule: {
      intervalMs:
        getEnvNumber('INTERVAL_MS') ??
        fileConfig.schedule?.interval_ms ??
        DEFAULT_CONFIG.schedule.intervalMs,
      fetchTimeoutMs:
        getEnvNumber('FETCH_TIMEOUT_MS') ??
        fileConfig.schedule?.fetch_timeout_ms ??
        DEFAULT_CONFIG.schedule.fetchTimeoutMs,
      fetchAttempts: fileConfig.schedule?.fetch_attempts ?? DEFAULT_CONFIG.schedule.fetchAttempts,
      retryDelayMs: fileConfig.schedule?.retry_delay_ms ?? DEFAULT_CONFIG.schedule.retryDelayMs,
    },
    catalog: {
      regionsPath:
        fromCwd(getEnvVar('REGIONS')) ??
        fromFile(fileConfig.catalog?.regions) ??
        DEFAULT_CONFIG.catalog.regionsPath,
      aliasesPath:
        fromCwd(getEnvVar('ALIASES')) ??
        fromFile(fileConfig.catalog?.aliases) ??
        DEFAULT_CONFIG.catalog.aliasesPath,
    },
    subscriptions: {
      storeFile: fileConfig.subscriptions?.store_file ?? DEFAULT_CONFIG.subscriptions.storeFile,
      maxPerSubscriber:
        fileConfig.subscriptions?.max_per_subscriber ??
        DEFAULT_CONFIG.subscriptions.maxPerSubscriber,
    },
    ranking: {
      defaultLimit: fileConfig.ranking?.default_limit ?? DEFAULT_CONFIG.ranking.defaultLimit,
      maxLimit: fileConfig.ranking?.max_limit ?? DEFAULT_CONFIG.ranking.maxLimit,
      summaryTopCount:
        fileConfig.ranking?.summary_top_count ?? DEFAULT_CONFIG.ranking.summaryTopCount,
    },
  };

  const core = createConfig(overrides);
  if (core.ranking.defaultLimit > core.ranking.maxLimit) {
    throw new ConfigurationError(
      `ranking.default_limit (${core.ranking.defaultLimit}) exceeds ranking.max_limit (${core.ranking.maxLimit})`,
      configPath
    );
  }

  return {
    core,
    json: options.overrides?.json ?? false,
    configPath,
  };
}

function resolvePath(base: string, path: string): string {
  return isAbsolute(path) ? path : resolve(base, path);
}

/**
 * URLs pass through; file paths are made absolute
 */
function sourceLocation(base: string, location: string | undefined): string | undefined {
  if (location === undefined) return undefined;
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(location) ? location : resolvePath(base, location);
}
