/**
 * Query Commands
 *
 * One-shot reads against a freshly fetched snapshot. Subscriptions are not
 * reconciled and nobody is notified.
 *
 * Usage:
 *   outbreak-watch summary
 *   outbreak-watch rank [--limit <n>] [--start <n>]
 *   outbreak-watch status <region>
 *
 * @module cli/commands/query
 */

import type { OutbreakWatchRuntime } from '../../serving/outbreak-watch-service.js';
import type { CLIConfig } from '../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { printError, renderRanking, renderStatus, renderSummary } from '../lib/output.js';
import { emitResult, openRuntime, reportStartupFailure, type RuntimeOptions } from '../lib/runtime.js';

export interface RankOptions {
  readonly limit?: number;
  readonly start?: number;
}

export function summaryCommand(config: CLIConfig, options: RuntimeOptions = {}): Promise<ExitCode> {
  return withSnapshot(config, options, (runtime) =>
    emitResult(config, runtime.service.getSummary(), renderSummary)
  );
}

export function rankCommand(
  config: CLIConfig,
  rankOptions: RankOptions,
  options: RuntimeOptions = {}
): Promise<ExitCode> {
  return withSnapshot(config, options, (runtime) =>
    emitResult(
      config,
      runtime.service.getRanking(rankOptions.limit, rankOptions.start),
      renderRanking
    )
  );
}

export function statusCommand(
  config: CLIConfig,
  region: string,
  options: RuntimeOptions = {}
): Promise<ExitCode> {
  return withSnapshot(config, options, (runtime) =>
    emitResult(config, runtime.service.getStatus(region), renderStatus)
  );
}

async function withSnapshot(
  config: CLIConfig,
  options: RuntimeOptions,
  query: (runtime: OutbreakWatchRuntime) => ExitCode
): Promise<ExitCode> {
  let runtime: OutbreakWatchRuntime;
  try {
    runtime = await openRuntime(config, options);
  } catch (error) {
    return reportStartupFailure(error);
  }

  try {
    const tick = await runtime.scheduler.runTick({ reconcile: false });
    switch (tick.status) {
      case 'published':
        return query(runtime);
      case 'stopped':
        printError('Snapshot load was cancelled');
        return EXIT_CODES.ERRORS;
      default:
        printError(`Could not load snapshot: ${tick.error.message}`);
        return EXIT_CODES.ERRORS;
    }
  } finally {
    await runtime.scheduler.stop();
  }
}
