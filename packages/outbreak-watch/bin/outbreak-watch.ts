#!/usr/bin/env tsx
/**
 * Outbreak Watch CLI Entry Point
 *
 * Runs the reconciliation loop, answers one-shot case-count queries and
 * manages region subscriptions.
 *
 * @module outbreak-watch-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadConfig, type CLIConfig } from '../src/cli/lib/config.js';
import { EXIT_CODES, type ExitCode } from '../src/cli/lib/exit-codes.js';
import { runCommand } from '../src/cli/commands/run.js';
import { rankCommand, statusCommand, summaryCommand } from '../src/cli/commands/query.js';
import {
  subscribeCommand,
  subscriptionsCommand,
  unsubscribeCommand,
} from '../src/cli/commands/subscriptions.js';
import { storeRecoverCommand } from '../src/cli/commands/store.js';

export { EXIT_CODES, type ExitCode };

// ============================================================================
// Global State
// ============================================================================

let globalConfig: CLIConfig | null = null;

function getConfig(): CLIConfig {
  if (!globalConfig) {
    throw new Error('Configuration not initialized');
  }
  return globalConfig;
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

async function finish(result: Promise<ExitCode>): Promise<void> {
  const exitCode = await result;
  if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('outbreak-watch')
    .description('Case-count snapshots, rankings and per-region change notifications')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .outbreak-watchrc)')
    .option('--source <location>', 'Snapshot URL or file path')
    .option('--storage-dir <path>', 'Directory for the subscription store')
    .hook('preAction', async (thisCommand) => {
      const options = thisCommand.opts<{
        json?: boolean;
        config?: string;
        source?: string;
        storageDir?: string;
      }>();
      try {
        globalConfig = await loadConfig({
          configPath: options.config,
          overrides: {
            json: options.json,
            source: options.source,
            storageDir: options.storageDir,
          },
        });
      } catch (error) {
        console.error(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  // ============================================================================
  // Service
  // ============================================================================

  program
    .command('run')
    .description('Run the reconciliation loop until interrupted (SIGHUP refreshes early)')
    .action(async () => {
      await finish(runCommand(getConfig()));
    });

  // ============================================================================
  // Queries
  // ============================================================================

  program
    .command('summary')
    .description('Global totals with the leading countries and provinces')
    .action(async () => {
      await finish(summaryCommand(getConfig()));
    });

  program
    .command('rank')
    .description('Countries ranked by confirmed cases')
    .option('--limit <n>', 'Entries per page', parsePositiveInt)
    .option('--start <n>', 'First position to show', parsePositiveInt)
    .action(async (options: { limit?: number; start?: number }) => {
      await finish(rankCommand(getConfig(), { limit: options.limit, start: options.start }));
    });

  program
    .command('status <region>')
    .description('Current figures for one country or province')
    .action(async (region: string) => {
      await finish(statusCommand(getConfig(), region));
    });

  // ============================================================================
  // Subscriptions
  // ============================================================================

  program
    .command('subscribe <subscriber> <region>')
    .description('Watch a region for changes')
    .action(async (subscriber: string, region: string) => {
      await finish(subscribeCommand(getConfig(), subscriber, region));
    });

  program
    .command('unsubscribe <subscriber> <region>')
    .description('Stop watching a region')
    .action(async (subscriber: string, region: string) => {
      await finish(unsubscribeCommand(getConfig(), subscriber, region));
    });

  program
    .command('subscriptions <subscriber>')
    .description('List the regions a subscriber watches')
    .action(async (subscriber: string) => {
      await finish(subscriptionsCommand(getConfig(), subscriber));
    });

  // ============================================================================
  // Store Maintenance
  // ============================================================================

  const store = program.command('store').description('Subscription store maintenance');

  store
    .command('recover')
    .description('Move a corrupt subscription store aside so the service can start empty')
    .action(async () => {
      await finish(storeRecoverCommand(getConfig()));
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
