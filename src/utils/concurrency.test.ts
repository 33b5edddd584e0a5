import { describe, it, expect } from 'vitest';
import { chunk, mapWithConcurrency } from './concurrency.js';

describe('mapWithConcurrency', () => {
  it('should keep input order', async () => {
    const result = await mapWithConcurrency([30, 10, 20], 3, async (value, index) => {
      await new Promise(resolve => setTimeout(resolve, value));
      return `${index}:${value}`;
    });

    expect(result).toEqual(['0:30', '1:10', '2:20']);
  });

  it('should never exceed the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency(Array.from({ length: 12 }, (_, i) => i), 4, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(resolve => setTimeout(resolve, 1));
      inFlight--;
    });

    expect(peak).toBe(4);
  });

  it('should handle an empty input', async () => {
    expect(await mapWithConcurrency([], 5, async value => value)).toEqual([]);
  });
});

describe('chunk', () => {
  it('should split into fixed-size slices', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });
});
