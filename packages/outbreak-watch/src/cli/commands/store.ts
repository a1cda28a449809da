/**
 * Store Maintenance Commands
 *
 * Usage:
 *   outbreak-watch store recover
 *
 * @module cli/commands/store
 */

import { errorMessage } from '../../core/errors.js';
import { SubscriptionStore } from '../../persistence/subscription-store.js';
import { storePath } from '../../serving/outbreak-watch-service.js';
import type { CLIConfig } from '../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, printError, printOutput, printSuccess } from '../lib/output.js';

/**
 * Move the store file aside so the next start begins empty
 */
export async function storeRecoverCommand(
  config: CLIConfig,
  now: Date = new Date()
): Promise<ExitCode> {
  const path = storePath(config.core);
  let backupPath: string | null;
  try {
    backupPath = await SubscriptionStore.recover(path, now);
  } catch (error) {
    printError(`Cannot move ${path} aside: ${errorMessage(error)}`);
    return EXIT_CODES.ERRORS;
  }

  if (config.json) {
    printOutput(formatJson({ path, backupPath }));
  } else if (backupPath === null) {
    printOutput(`No subscription store at ${path}`);
  } else {
    printSuccess(`Moved ${path} to ${backupPath}`);
  }
  return EXIT_CODES.SUCCESS;
}
