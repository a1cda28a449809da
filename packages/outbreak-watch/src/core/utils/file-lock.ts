/**
 * Cross-process file lock
 *
 * `<path>.lock` created with O_CREAT | O_EXCL. Held only around a
 * read-modify-write, so a lock older than `staleMs` belongs to a writer that
 * died mid-update and is broken.
 */

import { mkdir, open, stat, unlink, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import { StoreLockError, errorMessage } from '../errors.js';
import { logger } from './logger.js';

export interface FileLockOptions {
  /** Acquisition attempts before giving up (default: 50) */
  readonly maxRetries?: number;
  /** Base delay between attempts, jittered up to 2x (default: 100) */
  readonly retryDelayMs?: number;
  /** Age after which an existing lock is considered abandoned (default: 30s) */
  readonly staleMs?: number;
}

export class FileLock {
  readonly lockPath: string;
  private lockHandle: FileHandle | null = null;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly staleMs: number;

  constructor(filePath: string, options: FileLockOptions = {}) {
    this.lockPath = `${filePath}.lock`;
    this.maxRetries = options.maxRetries ?? 50;
    this.retryDelayMs = options.retryDelayMs ?? 100;
    this.staleMs = options.staleMs ?? 30_000;
  }

  /**
   * @throws StoreLockError when the lock stays taken for every attempt
   */
  async acquire(): Promise<void> {
    if (this.lockHandle) {
      throw new Error(`Lock ${this.lockPath} is already held`);
    }
    await mkdir(dirname(this.lockPath), { recursive: true });

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      let handle: FileHandle | null = null;
      try {
        handle = await open(this.lockPath, 'wx');
      } catch (error) {
        if (!hasCode(error, 'EEXIST')) throw error;
      }

      if (handle) {
        this.lockHandle = handle;
        try {
          await handle.writeFile(`${process.pid}\n`);
        } catch (error) {
          await this.release();
          throw error;
        }
        return;
      }

      if (await this.breakIfStale()) continue;
      if (attempt < this.maxRetries) {
        const delay = this.retryDelayMs * (1 + Math.random());
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
    throw new StoreLockError(this.lockPath, this.maxRetries);
  }

  /**
   * Close the handle first, then remove the lock file
   */
  async release(): Promise<void> {
    const handle = this.lockHandle;
    if (!handle) return;
    this.lockHandle = null;

    try {
      await handle.close();
    } catch (error) {
      logger.warn('Failed to close lock handle', {
        lockPath: this.lockPath,
        error: errorMessage(error),
      });
    }
    try {
      await unlink(this.lockPath);
    } catch (error) {
      if (!hasCode(error, 'ENOENT')) throw error;
    }
  }

  /**
   * Run `task` while holding the lock
   */
  async withLock<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      await this.release();
    }
  }

  private async breakIfStale(): Promise<boolean> {
    try {
      const info = await stat(this.lockPath);
      if (Date.now() - info.mtimeMs < this.staleMs) return false;
      await unlink(this.lockPath);
      logger.warn('Removed stale lock', { lockPath: this.lockPath });
      return true;
    } catch (error) {
      // Released between our open and stat
      if (hasCode(error, 'ENOENT')) return true;
      throw error;
    }
  }
}

function hasCode(error: unknown, code: string): boolean {
  return error !== null && typeof error === 'object' && 'code' in error && error.code === code;
}
