import { describe, it, expect } from 'vitest';
import { chunk, runWithConcurrency } from '../utils/pool.js';

describe('chunk', () => {
  it('should split into consecutive groups with a shorter tail', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('should return no chunks for an empty list', () => {
    expect(chunk([], 3)).toEqual([]);
  });
});

describe('runWithConcurrency', () => {
  it('should visit every item exactly once', async () => {
    const seen: number[] = [];

    await runWithConcurrency([10, 20, 30, 40], 2, async (item, index) => {
      seen[index] = item;
    });

    expect(seen).toEqual([10, 20, 30, 40]);
  });

  it('should stop handing out items after the first failure', async () => {
    const started: number[] = [];

    await expect(
      runWithConcurrency([1, 2, 3, 4, 5], 1, async item => {
        started.push(item);
        if (item === 2) throw new Error('batch 2 failed');
      })
    ).rejects.toThrow('batch 2 failed');
    expect(started).toEqual([1, 2]);
  });

  it('should reject a pool size below one', async () => {
    await expect(runWithConcurrency([1], 0, async () => {})).rejects.toThrow('Concurrency must be at least 1 (got 0)');
  });
});
