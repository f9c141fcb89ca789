/**
 * Utilization Projector
 * Linear approximation of utilization after a capacity or SKU change.
 *
 * Load is assumed to spread evenly over total provisioned capacity, so utilization
 * scales inversely with (instances × per-instance resources). This is an estimate,
 * not a measurement; reports must label it as such.
 */

import {
  UTILIZATION_METRICS,
  type RawUtilization,
  type UtilizationMetric,
  type UtilizationSample,
} from '@/types/rightsizing';

/** One SKU step down halves per-instance resources */
export const SKU_DOWNGRADE_FACTOR = 2;

export const PROJECTION_DISCLAIMER =
  'Projected utilization is a linear approximation (load ÷ provisioned capacity), not a measured value.';

function clampPercent(value: number): number {
  return Math.min(100, Math.max(0, value));
}

/**
 * Project each metric independently:
 *   clamp(round(value × currentCapacity × skuFactor / newCapacity), 0, 100)
 */
export function projectUtilization(
  current: UtilizationSample,
  currentCapacity: number,
  newCapacity: number,
  skuFactor: number = 1
): UtilizationSample {
  const ratio = (currentCapacity * skuFactor) / newCapacity;

  return {
    cpuAvg: clampPercent(Math.round(current.cpuAvg * ratio)),
    cpuMax: clampPercent(Math.round(current.cpuMax * ratio)),
    memAvg: clampPercent(Math.round(current.memAvg * ratio)),
    memMax: clampPercent(Math.round(current.memMax * ratio)),
  };
}

/**
 * Clamp raw collaborator values to 0-100. Missing or non-finite values become 0
 * and are reported back so callers can lower confidence.
 */
export function normalizeUtilization(raw: RawUtilization): {
  sample: UtilizationSample;
  missing: UtilizationMetric[];
} {
  const sample: UtilizationSample = { cpuAvg: 0, cpuMax: 0, memAvg: 0, memMax: 0 };
  const missing: UtilizationMetric[] = [];

  for (const metric of UTILIZATION_METRICS) {
    const value = raw[metric];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      missing.push(metric);
      continue;
    }
    sample[metric] = clampPercent(value);
  }

  return { sample, missing };
}
