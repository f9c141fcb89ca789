/**
 * Recommendation Builder
 * Packages one resource's current state, every candidate and the strategy's pick.
 */

import type {
  CleanupCandidate,
  OptimizationOption,
  Recommendation,
  ResourceConfiguration,
  ResourceSnapshot,
  StrategyName,
} from '@/types/rightsizing';
import { describePriceSource, type CostModel } from './cost-model';
import { generateOptions } from './option-generator';
import { changesSku } from './risk-classifier';
import { selectOption } from './strategy-selector';
import { normalizeUtilization } from './utilization-projector';

export const MEMORY_WARNING_THRESHOLDS = {
  critical: 90,
  pressure: 80,
} as const;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Memory warnings for a selection that shrinks per-instance memory.
 */
export function buildMemoryWarnings(currentMemMax: number, selected: OptimizationOption): string[] {
  if (!changesSku(selected.kind)) return [];

  if (currentMemMax > MEMORY_WARNING_THRESHOLDS.critical) {
    return [
      `CRITICAL MEMORY WARNING: current memory utilization is very high (${currentMemMax}% max)`,
      'SKU downgrade will halve available memory per instance; high risk of out-of-memory errors',
      'Consider capacity reduction instead, or investigate application memory usage first',
    ];
  }

  if (currentMemMax > MEMORY_WARNING_THRESHOLDS.pressure) {
    return [
      `MEMORY PRESSURE WARNING: current memory utilization is elevated (${currentMemMax}% max)`,
      'SKU downgrade will reduce available memory significantly; monitor memory closely after the change',
    ];
  }

  return [];
}

/**
 * Implementation guidance for the selected option's risk level.
 */
export function describeImplementationRisk(option: OptimizationOption): string[] {
  switch (option.riskLevel) {
    case 'NONE':
      return ['No change recommended'];
    case 'LOW':
      return [
        'LOW RISK - safe to implement with minimal performance impact',
        'Projected utilization stays well within safe thresholds',
      ];
    case 'MEDIUM': {
      const lines = [
        'MEDIUM RISK - monitor performance after implementation',
        'Implement during a low-traffic period and keep a rollback plan ready',
      ];
      if (option.projected.memMax > 85) {
        lines.push(`Projected memory max is ${option.projected.memMax}% - monitor memory usage closely`);
      }
      return lines;
    }
    case 'HIGH': {
      const lines = [
        'HIGH RISK - careful evaluation recommended',
        'Projected utilization is near capacity limits; consider a gradual rollout',
      ];
      if (option.projected.memMax >= 95) {
        lines.push(`Projected memory at ${option.projected.memMax}% - review alternative options`);
      }
      return lines;
    }
  }
}

// ============================================================
// Implementation Commands
// ============================================================

export const COMMAND_PLACEHOLDERS = {
  resourceGroup: '<resource-group>',
  subscriptionId: '<subscription-id>',
} as const;

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function planTarget(resource: ResourceConfiguration): string {
  return [
    `--name ${shellQuote(resource.name)}`,
    `--resource-group ${shellQuote(resource.resourceGroup ?? COMMAND_PLACEHOLDERS.resourceGroup)}`,
    `--subscription ${shellQuote(resource.subscriptionId ?? COMMAND_PLACEHOLDERS.subscriptionId)}`,
  ].join(' ');
}

/**
 * `az` command that applies the selected option. Undefined when nothing changes.
 * A missing resource group or subscription is left as a placeholder.
 */
export function buildImplementationCommand(
  resource: ResourceConfiguration,
  selected: OptimizationOption
): string | undefined {
  if (selected.kind === 'CURRENT') return undefined;
  const { skuName, capacity } = selected.configuration;
  return `az appservice plan update ${planTarget(resource)} --sku ${skuName} --number-of-workers ${capacity}`;
}

export function buildDeleteCommand(resource: ResourceConfiguration): string {
  return `az appservice plan delete ${planTarget(resource)} --yes`;
}

export function buildRecommendation(
  snapshot: ResourceSnapshot,
  strategy: StrategyName,
  costModel: CostModel
): Recommendation {
  const resource = snapshot.configuration;
  const { sample, missing } = normalizeUtilization(snapshot.utilization);
  const dataQualityNotes: string[] = [];

  if (missing.length > 0) {
    dataQualityNotes.push(
      `Missing utilization metrics (${missing.join(', ')}) treated as 0%; confidence reduced`
    );
  }

  const options = generateOptions(resource, sample, costModel, {
    missingMetricCount: missing.length,
  });

  const currentQuote = costModel.quote(resource.tier, resource.skuName, resource.capacity);
  const currentNote = describePriceSource(currentQuote);
  if (currentNote) {
    dataQualityNotes.push(currentNote);
    console.warn(`[RecommendationBuilder] ${resource.name}: ${currentNote}`);
  }

  const selectedOption = selectOption(options, strategy);
  if (selectedOption.kind !== 'CURRENT' && selectedOption.costEstimated) {
    const { tier, skuName, capacity } = selectedOption.configuration;
    const selectedNote = describePriceSource(costModel.quote(tier, skuName, capacity));
    if (selectedNote && selectedNote !== currentNote) {
      dataQualityNotes.push(selectedNote);
      console.warn(`[RecommendationBuilder] ${resource.name}: ${selectedNote}`);
    }
  }

  const current = options[0];
  const monthlySavings = selectedOption.monthlySavings;

  return {
    resource,
    utilization: sample,
    missingMetrics: missing,
    workloads: snapshot.workloads,
    options,
    selectedOption,
    strategy,
    currentMonthlyCost: current.monthlyCost,
    monthlySavings,
    annualSavings: round2(monthlySavings * 12),
    warnings: buildMemoryWarnings(sample.memMax, selectedOption),
    dataQualityNotes,
    implementationCommand: buildImplementationCommand(resource, selectedOption),
  };
}

/**
 * A resource hosting no workloads. Removing it saves its full monthly cost.
 */
export function buildCleanupCandidate(snapshot: ResourceSnapshot, costModel: CostModel): CleanupCandidate {
  const resource = snapshot.configuration;
  const { sample } = normalizeUtilization(snapshot.utilization);
  const quote = costModel.quote(resource.tier, resource.skuName, resource.capacity);
  const notes: string[] = [];

  const priceNote = describePriceSource(quote);
  if (priceNote) {
    notes.push(priceNote);
    console.warn(`[RecommendationBuilder] ${resource.name}: ${priceNote}`);
  }

  if (sample.cpuMax > 0 || sample.memMax > 0) {
    notes.push('Reports utilization but hosts no workloads; it may run scale-to-zero workloads. Verify before deleting');
  }

  return {
    resource,
    utilization: sample,
    monthlyCost: quote.monthlyCost,
    annualCost: round2(quote.monthlyCost * 12),
    costEstimated: quote.estimated,
    notes,
    deleteCommand: buildDeleteCommand(resource),
  };
}

export function isEmptyResource(snapshot: ResourceSnapshot): boolean {
  return snapshot.workloads !== undefined && snapshot.workloads.total === 0;
}
