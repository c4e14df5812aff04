import { describe, expect, it } from 'vitest';
import { runWithConcurrency } from './pool.js';

const tick = () => new Promise<void>(resolve => setTimeout(resolve, 1));

describe('runWithConcurrency', () => {
  it('keeps input order even when later items finish first', async () => {
    const delays = [5, 1, 3];
    const results = await runWithConcurrency(delays, 3, async (delay, index) => {
      await new Promise(resolve => setTimeout(resolve, delay));
      return index * 10;
    });
    expect(results).toEqual([0, 10, 20]);
  });

  it('never exceeds the limit', async () => {
    let active = 0;
    let peak = 0;
    await runWithConcurrency([1, 2, 3, 4, 5], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      active--;
    });
    expect(peak).toBe(2);
  });

  it('runs strictly sequentially with a limit of one', async () => {
    const order: string[] = [];
    await runWithConcurrency(['a', 'b'], 1, async item => {
      order.push(`start:${item}`);
      await tick();
      order.push(`end:${item}`);
    });
    expect(order).toEqual(['start:a', 'end:a', 'start:b', 'end:b']);
  });

  it('rejects invalid limits', async () => {
    await expect(runWithConcurrency([1], 0, async x => x)).rejects.toThrow(RangeError);
  });
});
