/**
 * Process exit codes shared by every command
 *
 * @module cli/lib/exit-codes
 */

import {
  CatalogLoadError,
  ConfigurationError,
  StoreCorruptionError,
} from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map a startup failure to its exit code
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigurationError || error instanceof CatalogLoadError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (error instanceof StoreCorruptionError) {
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  return EXIT_CODES.ERRORS;
}
