/**
 * Runtime wiring for CLI commands
 *
 * Long-running and query commands get the full runtime (catalog, store,
 * scheduler, service). Subscription commands only touch the catalog and the
 * store, so they work without a configured snapshot source.
 *
 * @module cli/lib/runtime
 */

import { LogNotifier } from '../../core/notifier.js';
import { errorMessage, StoreCorruptionError } from '../../core/errors.js';
import { RegionCatalog } from '../../registry/region-catalog.js';
import { SubscriptionStore } from '../../persistence/subscription-store.js';
import { SnapshotHolder } from '../../services/snapshot-holder.js';
import {
  OutbreakWatchService,
  createOutbreakWatch,
  storePath,
  type CommandResult,
  type CreateOutbreakWatchOptions,
  type OutbreakWatchRuntime,
} from '../../serving/outbreak-watch-service.js';
import type { CLIConfig } from './config.js';
import { EXIT_CODES, exitCodeFor, type ExitCode } from './exit-codes.js';
import { formatJson, printError, printOutput, renderCommandError } from './output.js';

export type RuntimeOptions = Partial<CreateOutbreakWatchOptions>;

export function openRuntime(
  config: CLIConfig,
  options: RuntimeOptions = {}
): Promise<OutbreakWatchRuntime> {
  return createOutbreakWatch(config.core, {
    ...options,
    notifier: options.notifier ?? new LogNotifier(),
  });
}

/**
 * Service without a scheduler; refresh requests report 'stopped'
 */
export async function openOfflineService(config: CLIConfig): Promise<OutbreakWatchService> {
  const catalog = await RegionCatalog.load(config.core.catalog);
  const store = await SubscriptionStore.open(storePath(config.core), {
    maxPerSubscriber: config.core.subscriptions.maxPerSubscriber,
  });
  return new OutbreakWatchService({
    config: config.core,
    catalog,
    store,
    holder: new SnapshotHolder(),
    scheduler: { requestRefresh: () => 'stopped' },
  });
}

/**
 * Print a startup failure and pick the exit code
 */
export function reportStartupFailure(error: unknown): ExitCode {
  printError(errorMessage(error));
  if (error instanceof StoreCorruptionError) {
    printError(
      `Move the damaged file aside with "outbreak-watch store recover" (${error.storePath})`
    );
  }
  return exitCodeFor(error);
}

/**
 * Print a command result as text or JSON
 */
export function emitResult<T>(
  config: CLIConfig,
  result: CommandResult<T>,
  render: (data: T) => string
): ExitCode {
  if (result.success) {
    printOutput(config.json ? formatJson(result.data) : render(result.data));
    return EXIT_CODES.SUCCESS;
  }
  if (config.json) {
    printOutput(formatJson({ error: result.error }));
  } else {
    printError(renderCommandError(result.error));
  }
  return EXIT_CODES.ERRORS;
}
