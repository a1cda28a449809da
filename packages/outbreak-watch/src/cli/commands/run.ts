/**
 * Run Command
 *
 * Starts the reconciliation loop and keeps it running until SIGINT or
 * SIGTERM. SIGHUP asks for an early refresh.
 *
 * Usage:
 *   outbreak-watch run [--source <location>]
 *
 * @module cli/commands/run
 */

import { createLogger } from '../../core/utils/logger.js';
import type { OutbreakWatchRuntime } from '../../serving/outbreak-watch-service.js';
import type { CLIConfig } from '../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { openRuntime, reportStartupFailure, type RuntimeOptions } from '../lib/runtime.js';

const log = createLogger({ module: 'cli:run' });

export interface RunOptions extends RuntimeOptions {
  /** Stops the loop when aborted, in addition to SIGINT / SIGTERM */
  readonly signal?: AbortSignal;
}

export async function runCommand(config: CLIConfig, options: RunOptions = {}): Promise<ExitCode> {
  const { signal, ...runtimeOptions } = options;

  let runtime: OutbreakWatchRuntime;
  try {
    runtime = await openRuntime(config, runtimeOptions);
  } catch (error) {
    return reportStartupFailure(error);
  }

  const onRefresh = (): void => {
    const result = runtime.service.forceRefresh();
    if (result.success) {
      log.info('Refresh requested', { outcome: result.data.outcome });
    }
  };
  process.on('SIGHUP', onRefresh);

  runtime.scheduler.start();
  try {
    const reason = await waitForShutdown(signal);
    log.info('Shutting down', { reason });
  } finally {
    process.off('SIGHUP', onRefresh);
    await runtime.scheduler.stop();
    await runtime.store.flush();
  }
  return EXIT_CODES.SUCCESS;
}

function waitForShutdown(signal: AbortSignal | undefined): Promise<string> {
  return new Promise((resolve) => {
    const finish = (reason: string): void => {
      process.off('SIGINT', onInterrupt);
      process.off('SIGTERM', onTerminate);
      signal?.removeEventListener('abort', onAbort);
      resolve(reason);
    };
    const onInterrupt = (): void => finish('SIGINT');
    const onTerminate = (): void => finish('SIGTERM');
    const onAbort = (): void => finish('aborted');

    if (signal?.aborted) {
      resolve('aborted');
      return;
    }
    process.once('SIGINT', onInterrupt);
    process.once('SIGTERM', onTerminate);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
