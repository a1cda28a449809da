/**
 * CLI Configuration Tests
 *
 * File discovery, layer precedence and path resolution.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { findConfigFile, loadConfig } from '../../../cli/lib/config.js';
import { ConfigurationError } from '../../../core/errors.js';
import { DEFAULT_CONFIG } from '../../../core/config.js';

const FILE_CONFIG = `
storage_dir: state
source:
  location: data/daily.csv
schedule:
  interval_ms: 60000
ranking:
  default_limit: 3
`;

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'outbreak-watch-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults without a config file', async () => {
    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config.configPath).toBeNull();
    expect(config.json).toBe(false);
    expect(config.core.storageDir).toBe(join(dir, '.outbreak-watch'));
    expect(config.core.source.location).toBeNull();
    expect(config.core.schedule).toEqual(DEFAULT_CONFIG.schedule);
  });

  it('should resolve file paths against the config file directory', async () => {
    await writeFile(join(dir, '.outbreak-watchrc'), FILE_CONFIG);
    const nested = join(dir, 'nested', 'deeper');
    await mkdir(nested, { recursive: true });

    const config = await loadConfig({ cwd: nested, env: {} });

    expect(config.configPath).toBe(join(dir, '.outbreak-watchrc'));
    expect(config.core.storageDir).toBe(join(dir, 'state'));
    expect(config.core.source.location).toBe(join(dir, 'data', 'daily.csv'));
    expect(config.core.schedule.intervalMs).toBe(60_000);
    expect(config.core.ranking.defaultLimit).toBe(3);
    expect(config.core.ranking.maxLimit).toBe(25);
  });

  it('should let environment variables override the file and flags override both', async () => {
    await writeFile(join(dir, '.outbreak-watchrc'), FILE_CONFIG);
    const env = {
      OUTBREAK_WATCH_INTERVAL_MS: '5000',
      OUTBREAK_WATCH_SOURCE: 'https://example.test/daily.csv',
      OUTBREAK_WATCH_STORAGE_DIR: 'from-env',
    };

    const fromEnv = await loadConfig({ cwd: dir, env });
    const fromFlags = await loadConfig({
      cwd: dir,
      env,
      overrides: { source: 'flag.csv', json: true },
    });

    expect(fromEnv.core.schedule.intervalMs).toBe(5_000);
    expect(fromEnv.core.source.location).toBe('https://example.test/daily.csv');
    expect(fromEnv.core.storageDir).toBe(join(dir, 'from-env'));
    expect(fromFlags.core.source.location).toBe(join(dir, 'flag.csv'));
    expect(fromFlags.json).toBe(true);
  });

  it('should read an explicit JSON config file', async () => {
    const path = join(dir, 'custom.json');
    await writeFile(path, JSON.stringify({ subscriptions: { max_per_subscriber: 4 } }));

    const config = await loadConfig({ cwd: dir, env: {}, configPath: 'custom.json' });

    expect(config.configPath).toBe(path);
    expect(config.core.subscriptions.maxPerSubscriber).toBe(4);
  });

  it('should accept an empty config file', async () => {
    await writeFile(join(dir, '.outbreak-watchrc'), '');

    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config.core.ranking).toEqual(DEFAULT_CONFIG.ranking);
  });

  it('should reject a malformed environment number', async () => {
    await expect(
      loadConfig({ cwd: dir, env: { OUTBREAK_WATCH_INTERVAL_MS: 'soon' } })
    ).rejects.toThrow('OUTBREAK_WATCH_INTERVAL_MS must be a positive integer, got "soon"');
  });

  it('should reject unknown keys in the file', async () => {
    const path = join(dir, '.outbreak-watchrc');
    await writeFile(path, 'bogus: 1\n');

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toThrow(
      `Invalid config file ${path}: Unrecognized key(s) in object: 'bogus'`
    );
  });

  it('should reject a default limit above the maximum', async () => {
    await writeFile(join(dir, '.outbreak-watchrc'), 'ranking:\n  default_limit: 30\n');

    const error = await loadConfig({ cwd: dir, env: {} }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      message: 'ranking.default_limit (30) exceeds ranking.max_limit (25)',
    });
  });

  it('should reject a missing explicit config file', async () => {
    await expect(loadConfig({ cwd: dir, env: {}, configPath: 'nope.yaml' })).rejects.toThrow(
      `Config file not found: ${join(dir, 'nope.yaml')}`
    );
  });
});

describe('findConfigFile', () => {
  it('should return null when no directory up the tree has one', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'outbreak-watch-find-'));
    try {
      expect(findConfigFile(dir)).toBeNull();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
