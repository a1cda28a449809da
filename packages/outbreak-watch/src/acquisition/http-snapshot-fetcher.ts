/**
 * HTTP snapshot fetcher
 *
 * Downloads the upstream CSV with native fetch. Retry and the timeout bound
 * are applied by the scheduler; this class only maps transport outcomes to
 * FetchError / FetchTimeoutError.
 */

import { FetchError, FetchTimeoutError } from '../core/errors.js';
import type { SnapshotFetcher } from '../services/reconciliation-scheduler.js';

export interface HttpSnapshotFetcherConfig {
  readonly url: string;
  readonly userAgent: string;
  /** Reported in FetchTimeoutError when the signal aborts */
  readonly timeoutMs: number;
}

export class HttpSnapshotFetcher implements SnapshotFetcher {
  constructor(private readonly config: HttpSnapshotFetcherConfig) {}

  get location(): string {
    return this.config.url;
  }

  async fetch(signal: AbortSignal): Promise<Uint8Array> {
    const { url, userAgent, timeoutMs } = this.config;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': userAgent,
          Accept: 'text/csv, text/plain;q=0.9, */*;q=0.1',
        },
        redirect: 'follow',
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw new FetchTimeoutError(url, timeoutMs);
      }
      throw new FetchError(
        `Network error fetching ${url}: ${error instanceof Error ? error.message : String(error)}`,
        url,
        undefined,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new FetchError(
        `HTTP ${response.status} ${response.statusText} from ${url}`,
        url,
        response.status
      );
    }

    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      if (signal.aborted) {
        throw new FetchTimeoutError(url, timeoutMs);
      }
      throw new FetchError(`Failed to read body from ${url}`, url, response.status, {
        cause: error,
      });
    }
  }
}
