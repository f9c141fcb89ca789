/**
 * Unit tests for option-generator module
 */

import { describe, it, expect } from 'vitest';
import { generateOptions, InvalidCapacityError } from '@/lib/option-generator';
import { normalizeUtilization } from '@/lib/utilization-projector';
import type { OptimizationOption, OptionKind, RawUtilization } from '@/types/rightsizing';
import { createResource, createTestCostModel, LIGHT_LOAD, MODERATE_LOAD } from './rightsizing-fixtures';

function byKind(options: OptimizationOption[], kind: OptionKind): OptimizationOption {
  const option = options.find(o => o.kind === kind);
  if (!option) throw new Error(`missing option ${kind}`);
  return option;
}

function sampleOf(raw: RawUtilization) {
  return normalizeUtilization(raw).sample;
}

describe('option-generator', () => {
  const costModel = createTestCostModel();

  describe('candidate enumeration', () => {
    it('should list all five kinds for a downgradable SKU with capacity > 2', () => {
      const options = generateOptions(createResource(), sampleOf(MODERATE_LOAD), costModel);
      expect(options.map(o => o.kind)).toEqual(['CURRENT', 'SCALE_DOWN_1', 'SCALE_DOWN_50', 'SKU_DOWNGRADE', 'COMBINED']);
    });

    it('should skip SCALE_DOWN_50 at capacity 2', () => {
      const options = generateOptions(createResource({ capacity: 2 }), sampleOf(LIGHT_LOAD), costModel);
      expect(options.map(o => o.kind)).toEqual(['CURRENT', 'SCALE_DOWN_1', 'SKU_DOWNGRADE', 'COMBINED']);
      expect(byKind(options, 'SCALE_DOWN_1').configuration.capacity).toBe(1);
      expect(byKind(options, 'COMBINED').configuration).toEqual({ tier: 'Premium', skuName: 'P2', capacity: 1 });
    });

    it('should offer only SKU options at capacity 1', () => {
      const options = generateOptions(createResource({ capacity: 1 }), sampleOf(LIGHT_LOAD), costModel);
      expect(options.map(o => o.kind)).toEqual(['CURRENT', 'SKU_DOWNGRADE', 'COMBINED']);
    });

    it('should offer no SKU options for the smallest SKU', () => {
      const options = generateOptions(createResource({ skuName: 'P1' }), sampleOf(LIGHT_LOAD), costModel);
      expect(options.map(o => o.kind)).toEqual(['CURRENT', 'SCALE_DOWN_1', 'SCALE_DOWN_50']);
    });

    it('should offer only CURRENT for a single instance of the smallest SKU', () => {
      const options = generateOptions(createResource({ skuName: 'P1', capacity: 1 }), sampleOf(LIGHT_LOAD), costModel);
      expect(options).toHaveLength(1);
      expect(options[0]).toMatchObject({ kind: 'CURRENT', riskLevel: 'NONE', confidence: 100, monthlySavings: 0 });
    });

    it('should round halved capacity up', () => {
      const options = generateOptions(createResource({ capacity: 5 }), sampleOf(LIGHT_LOAD), costModel);
      expect(byKind(options, 'SCALE_DOWN_50').configuration.capacity).toBe(3);
      expect(byKind(options, 'COMBINED').configuration.capacity).toBe(3);
    });

    it('should keep every candidate at capacity >= 1', () => {
      for (const capacity of [1, 2, 3, 4, 9]) {
        const options = generateOptions(createResource({ capacity }), sampleOf(LIGHT_LOAD), costModel);
        expect(options.every(o => o.configuration.capacity >= 1)).toBe(true);
      }
    });
  });

  describe('moderate load on P3 x4', () => {
    const options = generateOptions(createResource(), sampleOf(MODERATE_LOAD), costModel);

    it('should describe the current configuration', () => {
      expect(byKind(options, 'CURRENT')).toMatchObject({
        configuration: { tier: 'Premium', skuName: 'P3', capacity: 4 },
        description: 'Keep current configuration - No changes',
        monthlyCost: 2336,
        monthlySavings: 0,
        riskLevel: 'NONE',
      });
    });

    it('should rate removing one instance LOW', () => {
      expect(byKind(options, 'SCALE_DOWN_1')).toMatchObject({
        configuration: { capacity: 3 },
        projected: { cpuAvg: 27, cpuMax: 47, memAvg: 53, memMax: 73 },
        riskLevel: 'LOW',
        confidence: 85,
        monthlyCost: 1752,
        monthlySavings: 584,
      });
    });

    it('should rate halving HIGH', () => {
      expect(byKind(options, 'SCALE_DOWN_50')).toMatchObject({
        configuration: { capacity: 2 },
        projected: { cpuAvg: 40, cpuMax: 70, memAvg: 80, memMax: 100 },
        riskLevel: 'HIGH',
        confidence: 50,
        monthlySavings: 1168,
      });
    });

    it('should project the SKU downgrade with the SKU factor', () => {
      expect(byKind(options, 'SKU_DOWNGRADE')).toMatchObject({
        configuration: { tier: 'Premium', skuName: 'P2', capacity: 4 },
        projected: { cpuAvg: 40, cpuMax: 70, memAvg: 80, memMax: 100 },
        riskLevel: 'HIGH',
        confidence: 45,
        monthlyCost: 1168,
        monthlySavings: 1168,
      });
    });

    it('should project the combined change from the current capacity', () => {
      expect(byKind(options, 'COMBINED')).toMatchObject({
        configuration: { tier: 'Premium', skuName: 'P2', capacity: 2 },
        projected: { cpuAvg: 80, cpuMax: 100, memAvg: 100, memMax: 100 },
        riskLevel: 'HIGH',
        monthlyCost: 584,
        monthlySavings: 1752,
      });
    });
  });

  describe('pricing', () => {
    it('should compute savings against the current cost', () => {
      const options = generateOptions(createResource({ tier: 'Standard', skuName: 'S3', capacity: 3 }), sampleOf(LIGHT_LOAD), costModel);
      const current = byKind(options, 'CURRENT').monthlyCost;
      for (const option of options) {
        expect(option.monthlySavings).toBe(current - option.monthlyCost);
      }
    });

    it('should flag estimated prices', () => {
      const options = generateOptions(createResource({ tier: 'Mystery', skuName: 'X1', capacity: 3 }), sampleOf(LIGHT_LOAD), costModel);
      expect(options.map(o => o.kind)).toEqual(['CURRENT', 'SCALE_DOWN_1', 'SCALE_DOWN_50']);
      expect(options.every(o => o.costEstimated)).toBe(true);
      expect(byKind(options, 'SCALE_DOWN_1').monthlySavings).toBe(100);
    });
  });

  describe('missing metrics', () => {
    it('should lower confidence of every non-CURRENT option', () => {
      const options = generateOptions(createResource(), sampleOf(LIGHT_LOAD), costModel, { missingMetricCount: 1 });
      expect(byKind(options, 'CURRENT').confidence).toBe(100);
      expect(byKind(options, 'SCALE_DOWN_1').confidence).toBe(75);
      expect(byKind(options, 'SKU_DOWNGRADE').confidence).toBe(70);
    });
  });

  describe('invalid capacity', () => {
    it.each([0, -1, 2.5, Number.NaN])('should throw InvalidCapacityError for capacity %s', (capacity) => {
      expect(() => generateOptions(createResource({ capacity }), sampleOf(LIGHT_LOAD), costModel)).toThrow(InvalidCapacityError);
    });
  });
});
