/**
 * Unit Tests for the Serial Queue
 */

import { describe, it, expect } from 'vitest';
import { SerialQueue } from './serial-queue.js';

describe('SerialQueue', () => {
  it('should run jobs one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    const job = (name: string) => async (): Promise<string> => {
      events.push(`start ${name}`);
      await Promise.resolve();
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([queue.run(job('a')), queue.run(job('b'))]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('should keep running after a failed job', async () => {
    const queue = new SerialQueue();

    const failed = queue.run(() => {
      throw new Error('boom');
    });
    const next = queue.run(() => 42);

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
    expect(queue.size).toBe(0);
  });
});
