import { describe, it, expect } from 'vitest';
import { WriteQueue } from '../../../../core/utils/write-queue.js';

describe('WriteQueue', () => {
  it('should run tasks one at a time in submission order', async () => {
    const queue = new WriteQueue();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = queue.run(async () => {
      events.push('first:start');
      await firstGate;
      events.push('first:end');
      return 1;
    });
    const second = queue.run(async () => {
      events.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(queue.size).toBe(2);
    releaseFirst();

    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
    await queue.drain();
    expect(queue.size).toBe(0);
  });

  it('should keep draining after a task fails', async () => {
    const queue = new WriteQueue();

    const failing = queue.run(async () => {
      throw new Error('disk full');
    });
    const next = queue.run(async () => 'written');

    await expect(failing).rejects.toThrow('disk full');
    await expect(next).resolves.toBe('written');
  });
});
