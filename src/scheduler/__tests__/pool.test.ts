import { describe, it, expect } from 'vitest';
import { runPool } from '../pool';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('runPool', () => {
  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;

    await runPool([5, 1, 4, 2, 3, 1, 2], 3, async (ms) => {
      active++;
      peak = Math.max(peak, active);
      await delay(ms);
      active--;
    });

    expect(peak).toBe(3);
  });

  it('keeps results in input order', async () => {
    const results = await runPool([30, 10, 20], 3, async (ms, index) => {
      await delay(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:10', '2:20']);
  });

  it('still makes progress with a limit below one', async () => {
    const results = await runPool(['a', 'b'], 0, async (item) => item.toUpperCase());

    expect(results).toEqual(['A', 'B']);
  });

  it('resolves immediately for no items', async () => {
    await expect(runPool([], 4, async () => 1)).resolves.toEqual([]);
  });
});
