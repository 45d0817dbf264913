// Back-pressure and fairness integration tests

import { describe, it, expect } from 'vitest';
import { merge } from '../../src';
import { counter, createProbe, flush, fromValues } from '../helpers/sources';

function numbers(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i);
}

describe('Back-pressure Integration', () => {
  describe('TC-BP-001: Read-ahead bound', () => {
    it('should stop pulling a lone fast source one value ahead of the buffer', async () => {
      const probe = createProbe();
      const merged = merge([fromValues(numbers(100), probe)]);

      await expect(merged.next()).resolves.toEqual({ done: false, value: 0 });
      await flush();
      // 0 delivered, 1 buffered, 2 held
      expect(probe.produced).toBe(3);

      await expect(merged.next()).resolves.toEqual({ done: false, value: 1 });
      await flush();
      expect(probe.produced).toBe(4);

      await merged.return();
    });

    it('should bound read-ahead by the number of active sources', async () => {
      const a = createProbe();
      const b = createProbe();
      const merged = merge([fromValues(numbers(100), a), fromValues(numbers(100), b)]);

      await merged.next();
      await flush();

      // One delivered, two buffered, one held per source
      expect(a.produced + b.produced).toBe(5);
      await merged.return();
    });
  });

  describe('TC-BP-002: Fairness under equal speed', () => {
    it('should not starve any of three equally fast sources', async () => {
      const merged = merge([counter('a'), counter('b'), counter('c')]);
      const counts = new Map<string, number>();

      let taken = 0;
      for await (const value of merged) {
        const label = value.charAt(0);
        counts.set(label, (counts.get(label) ?? 0) + 1);
        if (++taken === 300) {
          break;
        }
      }

      for (const label of ['a', 'b', 'c']) {
        expect(counts.get(label) ?? 0).toBeGreaterThanOrEqual(50);
      }
    });
  });
});
