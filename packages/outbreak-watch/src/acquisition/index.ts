import { fileURLToPath } from 'node:url';
import type { OutbreakWatchConfig } from '../core/config.js';
import type { SnapshotFetcher } from '../services/reconciliation-scheduler.js';
import { FileSnapshotFetcher } from './file-snapshot-fetcher.js';
import { HttpSnapshotFetcher } from './http-snapshot-fetcher.js';

export { FileSnapshotFetcher } from './file-snapshot-fetcher.js';
export { HttpSnapshotFetcher, type HttpSnapshotFetcherConfig } from './http-snapshot-fetcher.js';

/**
 * Pick a fetcher by location: http(s) URLs go over the network, `file:` URLs
 * and bare paths are read from disk.
 */
export function createSnapshotFetcher(
  location: string,
  options: Pick<OutbreakWatchConfig['source'], 'userAgent'> &
    Pick<OutbreakWatchConfig['schedule'], 'fetchTimeoutMs'>
): SnapshotFetcher {
  if (/^https?:\/\//i.test(location)) {
    return new HttpSnapshotFetcher({
      url: location,
      userAgent: options.userAgent,
      timeoutMs: options.fetchTimeoutMs,
    });
  }
  if (location.startsWith('file:')) {
    return new FileSnapshotFetcher(fileURLToPath(location));
  }
  return new FileSnapshotFetcher(location);
}
