/**
 * Unit tests for utilization-projector module
 */

import { describe, it, expect } from 'vitest';
import { normalizeUtilization, projectUtilization, SKU_DOWNGRADE_FACTOR } from '@/lib/utilization-projector';
import type { UtilizationSample } from '@/types/rightsizing';

function createSample(overrides: Partial<UtilizationSample> = {}): UtilizationSample {
  return { cpuAvg: 20, cpuMax: 35, memAvg: 40, memMax: 55, ...overrides };
}

describe('utilization-projector', () => {
  describe('projectUtilization', () => {
    it('should scale each metric by currentCapacity / newCapacity and round', () => {
      // 4 → 3 instances: ×4/3
      expect(projectUtilization(createSample(), 4, 3)).toEqual({
        cpuAvg: 27,
        cpuMax: 47,
        memAvg: 53,
        memMax: 73,
      });
    });

    it('should clamp projections to 100', () => {
      expect(projectUtilization(createSample(), 4, 2)).toEqual({
        cpuAvg: 40,
        cpuMax: 70,
        memAvg: 80,
        memMax: 100,
      });
    });

    it('should apply the SKU factor on the same capacity', () => {
      expect(projectUtilization(createSample({ cpuAvg: 10, cpuMax: 20, memAvg: 20, memMax: 30 }), 4, 4, SKU_DOWNGRADE_FACTOR)).toEqual({
        cpuAvg: 20,
        cpuMax: 40,
        memAvg: 40,
        memMax: 60,
      });
    });

    it('should combine SKU factor and capacity change', () => {
      // 4 × 2 / 2 = ×4
      expect(projectUtilization(createSample(), 4, 2, 2)).toEqual({
        cpuAvg: 80,
        cpuMax: 100,
        memAvg: 100,
        memMax: 100,
      });
    });

    it('should return the input unchanged when nothing changes', () => {
      const sample = createSample({ cpuAvg: 12, cpuMax: 61 });
      expect(projectUtilization(sample, 3, 3)).toEqual(sample);
    });

    it('should never project below the current value when shrinking', () => {
      const sample = createSample({ cpuAvg: 1, cpuMax: 2, memAvg: 3, memMax: 4 });
      const projected = projectUtilization(sample, 5, 4);
      expect(projected.cpuAvg).toBeGreaterThanOrEqual(sample.cpuAvg);
      expect(projected.memMax).toBeGreaterThanOrEqual(sample.memMax);
    });

    it('should not increase as the new capacity grows', () => {
      const sample = createSample({ cpuAvg: 17, cpuMax: 43, memAvg: 29, memMax: 71 });
      const metrics = ['cpuAvg', 'cpuMax', 'memAvg', 'memMax'] as const;

      for (const skuFactor of [1, SKU_DOWNGRADE_FACTOR]) {
        for (let currentCapacity = 1; currentCapacity <= 9; currentCapacity++) {
          let previous = projectUtilization(sample, currentCapacity, 1, skuFactor);
          for (let newCapacity = 2; newCapacity <= 11; newCapacity++) {
            const projected = projectUtilization(sample, currentCapacity, newCapacity, skuFactor);
            for (const metric of metrics) {
              expect(projected[metric]).toBeLessThanOrEqual(previous[metric]);
            }
            previous = projected;
          }
        }
      }
    });
  });

  describe('normalizeUtilization', () => {
    it('should pass through valid values', () => {
      expect(normalizeUtilization({ cpuAvg: 10, cpuMax: 20, memAvg: 30, memMax: 40 })).toEqual({
        sample: { cpuAvg: 10, cpuMax: 20, memAvg: 30, memMax: 40 },
        missing: [],
      });
    });

    it('should treat missing and null metrics as 0 and report them', () => {
      expect(normalizeUtilization({ cpuAvg: 15, memAvg: null })).toEqual({
        sample: { cpuAvg: 15, cpuMax: 0, memAvg: 0, memMax: 0 },
        missing: ['cpuMax', 'memAvg', 'memMax'],
      });
    });

    it('should treat non-finite values as missing', () => {
      const { sample, missing } = normalizeUtilization({ cpuAvg: Number.NaN, cpuMax: Infinity, memAvg: 5, memMax: 6 });
      expect(sample.cpuAvg).toBe(0);
      expect(sample.cpuMax).toBe(0);
      expect(missing).toEqual(['cpuAvg', 'cpuMax']);
    });

    it('should clamp out-of-range values', () => {
      expect(normalizeUtilization({ cpuAvg: -5, cpuMax: 140, memAvg: 50, memMax: 100 }).sample).toEqual({
        cpuAvg: 0,
        cpuMax: 100,
        memAvg: 50,
        memMax: 100,
      });
    });
  });
});
