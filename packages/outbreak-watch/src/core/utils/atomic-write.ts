/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename so that a crash during a write leaves either the
 * old file or the new file on disk, never a partial one. Rename is atomic on
 * POSIX filesystems when source and target share a directory.
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

let tempCounter = 0;

/**
 * Atomically write string data to file
 *
 * @example
 * ```typescript
 * await atomicWriteFile('/var/lib/outbreak-watch/subscriptions.json', body);
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp + counter keeps concurrent writers off each other's temp files
  tempCounter += 1;
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.${tempCounter}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch(() => {
      /* temp file may never have been created */
    });
    throw error;
  }
}

/**
 * Atomically write JSON data to file
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  const json = JSON.stringify(data, null, space);
  await atomicWriteFile(filePath, `${json}\n`, 'utf-8');
}
