/**
 * Subscription Commands
 *
 * Usage:
 *   outbreak-watch subscribe <subscriber> <region>
 *   outbreak-watch unsubscribe <subscriber> <region>
 *   outbreak-watch subscriptions <subscriber>
 *
 * @module cli/commands/subscriptions
 */

import { regionLabel } from '../../core/types.js';
import type { OutbreakWatchService } from '../../serving/outbreak-watch-service.js';
import type { CLIConfig } from '../lib/config.js';
import type { ExitCode } from '../lib/exit-codes.js';
import { renderSubscriptions } from '../lib/output.js';
import { emitResult, openOfflineService, reportStartupFailure } from '../lib/runtime.js';

export async function subscribeCommand(
  config: CLIConfig,
  subscriberId: string,
  region: string
): Promise<ExitCode> {
  return withService(config, async (service) =>
    emitResult(config, await service.subscribeRegion(subscriberId, region), (view) =>
      view.outcome === 'created'
        ? `Success: ${subscriberId.trim()} now watches ${regionLabel(view.region)}`
        : `${subscriberId.trim()} already watches ${regionLabel(view.region)}`
    )
  );
}

export async function unsubscribeCommand(
  config: CLIConfig,
  subscriberId: string,
  region: string
): Promise<ExitCode> {
  return withService(config, async (service) =>
    emitResult(
      config,
      await service.unsubscribeRegion(subscriberId, region),
      (view) => `Success: ${subscriberId.trim()} no longer watches ${regionLabel(view.region)}`
    )
  );
}

export async function subscriptionsCommand(
  config: CLIConfig,
  subscriberId: string
): Promise<ExitCode> {
  return withService(config, async (service) =>
    emitResult(config, service.listSubscriptions(subscriberId), renderSubscriptions)
  );
}

async function withService(
  config: CLIConfig,
  run: (service: OutbreakWatchService) => Promise<ExitCode>
): Promise<ExitCode> {
  let service: OutbreakWatchService;
  try {
    service = await openOfflineService(config);
  } catch (error) {
    return reportStartupFailure(error);
  }
  return run(service);
}
