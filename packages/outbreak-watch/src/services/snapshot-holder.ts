/**
 * Holds the current Snapshot. Publishing swaps the reference; readers that
 * already took a snapshot keep a consistent view of it.
 */

import type { Snapshot } from '../core/types.js';

export class SnapshotHolder {
  private snapshot: Snapshot | null = null;

  current(): Snapshot | null {
    return this.snapshot;
  }

  /**
   * @returns The snapshot that was replaced
   */
  publish(snapshot: Snapshot): Snapshot | null {
    const previous = this.snapshot;
    this.snapshot = snapshot;
    return previous;
  }
}
