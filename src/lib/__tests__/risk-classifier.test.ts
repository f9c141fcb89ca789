/**
 * Unit tests for risk-classifier module
 */

import { describe, it, expect } from 'vitest';
import { classifyRisk } from '@/lib/risk-classifier';
import type { UtilizationSample } from '@/types/rightsizing';

function sample(cpuMax: number, memMax: number): UtilizationSample {
  return { cpuAvg: Math.round(cpuMax / 2), cpuMax, memAvg: Math.round(memMax / 2), memMax };
}

describe('risk-classifier', () => {
  const calm = sample(30, 40);

  it('should rate CURRENT as NONE with full confidence', () => {
    expect(classifyRisk('CURRENT', sample(99, 99), sample(99, 99))).toEqual({ riskLevel: 'NONE', confidence: 100 });
  });

  describe('capacity-only changes', () => {
    it('should rate comfortable projections LOW', () => {
      expect(classifyRisk('SCALE_DOWN_1', calm, sample(47, 73))).toEqual({ riskLevel: 'LOW', confidence: 85 });
    });

    it('should rate projected CPU above 80 MEDIUM', () => {
      expect(classifyRisk('SCALE_DOWN_1', calm, sample(81, 50))).toEqual({ riskLevel: 'MEDIUM', confidence: 70 });
    });

    it('should rate projected memory above 85 MEDIUM', () => {
      expect(classifyRisk('SCALE_DOWN_50', calm, sample(50, 86))).toEqual({ riskLevel: 'MEDIUM', confidence: 70 });
    });

    it('should rate projected CPU above 90 HIGH', () => {
      expect(classifyRisk('SCALE_DOWN_50', calm, sample(91, 50))).toEqual({ riskLevel: 'HIGH', confidence: 50 });
    });

    it('should rate projected memory above 95 HIGH', () => {
      expect(classifyRisk('SCALE_DOWN_1', calm, sample(50, 96))).toEqual({ riskLevel: 'HIGH', confidence: 50 });
    });

    it('should treat the thresholds themselves as inside the lower band', () => {
      expect(classifyRisk('SCALE_DOWN_1', calm, sample(80, 85)).riskLevel).toBe('LOW');
      expect(classifyRisk('SCALE_DOWN_1', calm, sample(90, 95)).riskLevel).toBe('MEDIUM');
    });

    it('should not apply the saturated-memory rule', () => {
      expect(classifyRisk('SCALE_DOWN_1', sample(30, 92), sample(40, 60))).toEqual({ riskLevel: 'LOW', confidence: 85 });
    });
  });

  describe('SKU changes', () => {
    it('should use lower confidence than capacity-only changes', () => {
      expect(classifyRisk('SKU_DOWNGRADE', calm, sample(40, 60))).toEqual({ riskLevel: 'LOW', confidence: 80 });
      expect(classifyRisk('SKU_DOWNGRADE', calm, sample(85, 60))).toEqual({ riskLevel: 'MEDIUM', confidence: 60 });
      expect(classifyRisk('COMBINED', calm, sample(95, 60))).toEqual({ riskLevel: 'HIGH', confidence: 45 });
    });

    it('should rate any downgrade HIGH when current memory is saturated', () => {
      expect(classifyRisk('SKU_DOWNGRADE', sample(20, 91), sample(40, 60))).toEqual({ riskLevel: 'HIGH', confidence: 30 });
      expect(classifyRisk('COMBINED', sample(20, 91), sample(40, 60))).toEqual({ riskLevel: 'HIGH', confidence: 30 });
    });

    it('should not treat exactly 90% current memory as saturated', () => {
      expect(classifyRisk('SKU_DOWNGRADE', sample(20, 90), sample(40, 60)).riskLevel).toBe('LOW');
    });
  });

  describe('missing metrics', () => {
    it('should lower confidence by 10 per missing metric', () => {
      expect(classifyRisk('SCALE_DOWN_1', calm, sample(47, 73), { missingMetricCount: 2 })).toEqual({
        riskLevel: 'LOW',
        confidence: 65,
      });
    });

    it('should not lower confidence below 10', () => {
      expect(classifyRisk('SKU_DOWNGRADE', sample(20, 95), sample(40, 60), { missingMetricCount: 4 }).confidence).toBe(10);
    });

    it('should leave CURRENT at full confidence', () => {
      expect(classifyRisk('CURRENT', calm, calm, { missingMetricCount: 4 }).confidence).toBe(100);
    });
  });
});
