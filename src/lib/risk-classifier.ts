/**
 * Risk Classifier
 * Rates a candidate configuration by projected headroom. First matching rule wins.
 */

import type { OptionKind, RiskAssessment, UtilizationSample } from '@/types/rightsizing';

export const RISK_THRESHOLDS = {
  /** Current max memory above this makes any SKU downgrade HIGH risk */
  saturatedMemory: 90,
  highCpu: 90,
  highMemory: 95,
  mediumCpu: 80,
  mediumMemory: 85,
} as const;

// Confidence per outcome; SKU changes carry more uncertainty than instance count changes
const CONFIDENCE = {
  saturatedDowngrade: 30,
  high: { capacity: 50, sku: 45 },
  medium: { capacity: 70, sku: 60 },
  low: { capacity: 85, sku: 80 },
} as const;

const MISSING_METRIC_PENALTY = 10;
const MIN_CONFIDENCE = 10;

export interface ClassifyRiskOptions {
  /** Metrics the collaborator could not supply (treated as 0) */
  missingMetricCount?: number;
}

export function changesSku(kind: OptionKind): boolean {
  return kind === 'SKU_DOWNGRADE' || kind === 'COMBINED';
}

function applyPenalty(confidence: number, missingMetricCount: number): number {
  if (missingMetricCount <= 0) return confidence;
  return Math.max(MIN_CONFIDENCE, confidence - missingMetricCount * MISSING_METRIC_PENALTY);
}

export function classifyRisk(
  kind: OptionKind,
  current: UtilizationSample,
  projected: UtilizationSample,
  options: ClassifyRiskOptions = {}
): RiskAssessment {
  if (kind === 'CURRENT') {
    return { riskLevel: 'NONE', confidence: 100 };
  }

  const missing = options.missingMetricCount ?? 0;
  const variant = changesSku(kind) ? 'sku' : 'capacity';

  if (current.memMax > RISK_THRESHOLDS.saturatedMemory && changesSku(kind)) {
    return { riskLevel: 'HIGH', confidence: applyPenalty(CONFIDENCE.saturatedDowngrade, missing) };
  }

  if (projected.cpuMax > RISK_THRESHOLDS.highCpu || projected.memMax > RISK_THRESHOLDS.highMemory) {
    return { riskLevel: 'HIGH', confidence: applyPenalty(CONFIDENCE.high[variant], missing) };
  }

  if (projected.cpuMax > RISK_THRESHOLDS.mediumCpu || projected.memMax > RISK_THRESHOLDS.mediumMemory) {
    return { riskLevel: 'MEDIUM', confidence: applyPenalty(CONFIDENCE.medium[variant], missing) };
  }

  return { riskLevel: 'LOW', confidence: applyPenalty(CONFIDENCE.low[variant], missing) };
}
