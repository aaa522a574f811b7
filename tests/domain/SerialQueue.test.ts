import { describe, it, expect } from 'vitest';
import { SerialQueue } from '../../src/domain/shared/SerialQueue.js';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('SerialQueue', () => {
  it('should run tasks one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];

    const task = (name: string, ms: number) => async () => {
      events.push(`start ${name}`);
      await delay(ms);
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([
      queue.run(task('slow', 20)),
      queue.run(task('fast', 1)),
    ]);

    expect(results).toEqual(['slow', 'fast']);
    expect(events).toEqual(['start slow', 'end slow', 'start fast', 'end fast']);
  });

  it('should keep running after a task fails', async () => {
    const queue = new SerialQueue();

    const failed = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 'still runs');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('still runs');
  });
});
