import { readFile } from 'node:fs/promises';
import { FetchError, errorMessage } from '../core/errors.js';
import type { SnapshotFetcher } from '../services/reconciliation-scheduler.js';

/**
 * Reads a snapshot from a local CSV file (mirrors, offline runs)
 */
export class FileSnapshotFetcher implements SnapshotFetcher {
  constructor(readonly location: string) {}

  async fetch(signal: AbortSignal): Promise<Uint8Array> {
    try {
      return new Uint8Array(await readFile(this.location, { signal }));
    } catch (error) {
      throw new FetchError(
        `Cannot read snapshot file ${this.location}: ${errorMessage(error)}`,
        this.location,
        undefined,
        { cause: error }
      );
    }
  }
}
