/**
 * Option Generator
 * Enumerates structurally valid candidate configurations for one resource.
 */

import {
  OPTION_DESCRIPTIONS,
  type CandidateConfiguration,
  type OptimizationOption,
  type OptionKind,
  type ResourceConfiguration,
  type UtilizationSample,
} from '@/types/rightsizing';
import type { CostModel } from './cost-model';
import { classifyRisk } from './risk-classifier';
import { projectUtilization, SKU_DOWNGRADE_FACTOR } from './utilization-projector';

export class InvalidCapacityError extends Error {
  resourceId: string;
  capacity: number;

  constructor(resourceId: string, capacity: number) {
    super(`Resource ${resourceId} has invalid capacity ${capacity}; expected an integer >= 1`);
    this.name = 'InvalidCapacityError';
    this.resourceId = resourceId;
    this.capacity = capacity;
  }
}

export interface GenerateOptionsParams {
  missingMetricCount?: number;
}

interface CandidateSpec {
  kind: OptionKind;
  configuration: CandidateConfiguration;
  skuFactor: number;
}

export function halveCapacity(capacity: number): number {
  return Math.ceil(capacity / 2);
}

function enumerateCandidates(config: ResourceConfiguration, costModel: CostModel): CandidateSpec[] {
  const { tier, skuName, capacity } = config;
  const candidates: CandidateSpec[] = [
    { kind: 'CURRENT', configuration: { tier, skuName, capacity }, skuFactor: 1 },
  ];

  if (capacity > 1) {
    candidates.push({
      kind: 'SCALE_DOWN_1',
      configuration: { tier, skuName, capacity: capacity - 1 },
      skuFactor: 1,
    });
  }

  // capacity 2 halves to 1, which SCALE_DOWN_1 already covers
  if (capacity > 2) {
    candidates.push({
      kind: 'SCALE_DOWN_50',
      configuration: { tier, skuName, capacity: halveCapacity(capacity) },
      skuFactor: 1,
    });
  }

  const downgrade = costModel.downgradeOf(tier, skuName);
  if (downgrade) {
    candidates.push({
      kind: 'SKU_DOWNGRADE',
      configuration: { ...downgrade, capacity },
      skuFactor: SKU_DOWNGRADE_FACTOR,
    });
    candidates.push({
      kind: 'COMBINED',
      configuration: { ...downgrade, capacity: halveCapacity(capacity) },
      skuFactor: SKU_DOWNGRADE_FACTOR,
    });
  }

  return candidates;
}

/**
 * Build every candidate for a resource, CURRENT first.
 * Throws InvalidCapacityError when capacity is not a positive integer.
 */
export function generateOptions(
  config: ResourceConfiguration,
  utilization: UtilizationSample,
  costModel: CostModel,
  params: GenerateOptionsParams = {}
): OptimizationOption[] {
  if (!Number.isInteger(config.capacity) || config.capacity < 1) {
    throw new InvalidCapacityError(config.id, config.capacity);
  }

  const currentQuote = costModel.quote(config.tier, config.skuName, config.capacity);

  return enumerateCandidates(config, costModel).map(candidate => {
    const { kind, configuration, skuFactor } = candidate;
    const projected = projectUtilization(utilization, config.capacity, configuration.capacity, skuFactor);
    const risk = classifyRisk(kind, utilization, projected, {
      missingMetricCount: params.missingMetricCount,
    });
    const quote = kind === 'CURRENT'
      ? currentQuote
      : costModel.quote(configuration.tier, configuration.skuName, configuration.capacity);

    return {
      kind,
      configuration,
      description: OPTION_DESCRIPTIONS[kind],
      riskLevel: risk.riskLevel,
      confidence: risk.confidence,
      projected,
      monthlyCost: quote.monthlyCost,
      monthlySavings: kind === 'CURRENT' ? 0 : currentQuote.monthlyCost - quote.monthlyCost,
      costEstimated: quote.estimated,
    };
  });
}
