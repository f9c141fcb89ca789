/**
 * Rightsizing Engine
 * One batch pass: collect utilization, build per-resource recommendations,
 * then aggregate findings once over the complete collection.
 */

import type {
  CleanupCandidate,
  RawUtilization,
  Recommendation,
  ResourceConfiguration,
  ResourceSnapshot,
  RightsizingPolicy,
  RightsizingResult,
  RightsizingSummary,
  SkippedResource,
  StrategyName,
  WorkloadSummary,
} from '@/types/rightsizing';
import type { CostModel } from './cost-model';
import { aggregateFindings } from './impact-aggregator';
import { InvalidCapacityError } from './option-generator';
import { buildCleanupCandidate, buildRecommendation, isEmptyResource } from './recommendation-builder';
import { DEFAULT_RIGHTSIZING_CONFIG } from './rightsizing-config';
import { Semaphore } from './semaphore';

// ============================================================
// Collaborator Boundary
// ============================================================

export interface UtilizationReading {
  utilization: RawUtilization;
  workloads?: WorkloadSummary;
}

/**
 * Supplies trailing-window utilization for a resource. Implementations should
 * stop work when the signal aborts.
 */
export interface UtilizationSource {
  fetchUtilization(resource: ResourceConfiguration, signal: AbortSignal): Promise<UtilizationReading>;
}

/**
 * Serves readings from snapshots already in memory.
 */
export class StaticUtilizationSource implements UtilizationSource {
  private readings = new Map<string, UtilizationReading>();

  constructor(snapshots: ResourceSnapshot[]) {
    for (const snapshot of snapshots) {
      this.readings.set(snapshot.configuration.id, {
        utilization: snapshot.utilization,
        workloads: snapshot.workloads,
      });
    }
  }

  async fetchUtilization(resource: ResourceConfiguration, signal: AbortSignal): Promise<UtilizationReading> {
    if (signal.aborted) {
      throw new Error(`Fetch aborted for ${resource.id}`);
    }
    const reading = this.readings.get(resource.id);
    if (!reading) {
      throw new Error(`No utilization data for ${resource.id}`);
    }
    return reading;
  }
}

export class UtilizationFetchTimeoutError extends Error {
  resourceId: string;
  timeoutMs: number;

  constructor(resourceId: string, timeoutMs: number) {
    super(`Utilization fetch for ${resourceId} timed out after ${timeoutMs}ms`);
    this.name = 'UtilizationFetchTimeoutError';
    this.resourceId = resourceId;
    this.timeoutMs = timeoutMs;
  }
}

// ============================================================
// Per-Resource Analysis
// ============================================================

export type ResourceAnalysis =
  | { type: 'recommendation'; recommendation: Recommendation }
  | { type: 'cleanup'; cleanup: CleanupCandidate };

/**
 * Resources hosting no workloads bypass option generation and become cleanup candidates.
 */
export function analyzeResource(
  snapshot: ResourceSnapshot,
  strategy: StrategyName,
  costModel: CostModel
): ResourceAnalysis {
  if (isEmptyResource(snapshot)) {
    return { type: 'cleanup', cleanup: buildCleanupCandidate(snapshot, costModel) };
  }
  return { type: 'recommendation', recommendation: buildRecommendation(snapshot, strategy, costModel) };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function summarize(recommendations: Recommendation[], cleanups: CleanupCandidate[]): RightsizingSummary {
  const opportunities = recommendations.filter(r => r.monthlySavings > 0);
  const wasted = cleanups.filter(c => c.monthlyCost > 0);

  const currentMonthlySpend =
    opportunities.reduce((sum, r) => sum + r.currentMonthlyCost, 0) +
    wasted.reduce((sum, c) => sum + c.monthlyCost, 0);
  const monthlySavings =
    opportunities.reduce((sum, r) => sum + r.monthlySavings, 0) +
    wasted.reduce((sum, c) => sum + c.monthlyCost, 0);

  return {
    currentMonthlySpend: round2(currentMonthlySpend),
    recommendedMonthlySpend: round2(currentMonthlySpend - monthlySavings),
    monthlySavings: round2(monthlySavings),
    annualSavings: round2(monthlySavings * 12),
    savingsPercent: currentMonthlySpend > 0 ? round2((monthlySavings / currentMonthlySpend) * 100) : 0,
    opportunityCount: opportunities.length + wasted.length,
    analyzedCount: recommendations.length + cleanups.length,
  };
}

// ============================================================
// Batch Pass
// ============================================================

export interface RunRightsizingOptions {
  costModel: CostModel;
  generatedAt?: string;
  lookbackDays?: number;
  /** Resources already dropped upstream (failed fetches) */
  skipped?: SkippedResource[];
}

export function runRightsizingAnalysis(
  snapshots: ResourceSnapshot[],
  policy: RightsizingPolicy,
  options: RunRightsizingOptions
): RightsizingResult {
  const recommendations: Recommendation[] = [];
  const cleanups: CleanupCandidate[] = [];
  const skipped: SkippedResource[] = [...(options.skipped ?? [])];

  for (const snapshot of snapshots) {
    const { configuration } = snapshot;
    try {
      const analysis = analyzeResource(snapshot, policy.strategy, options.costModel);
      if (analysis.type === 'cleanup') {
        cleanups.push(analysis.cleanup);
      } else {
        recommendations.push(analysis.recommendation);
      }
    } catch (error) {
      if (!(error instanceof InvalidCapacityError)) throw error;
      console.warn(`[RightsizingEngine] Skipping ${configuration.name}: ${error.message}`);
      skipped.push({ resourceId: configuration.id, name: configuration.name, reason: error.message });
    }
  }

  return {
    generatedAt: options.generatedAt ?? new Date().toISOString(),
    strategy: policy.strategy,
    thresholds: policy.thresholds,
    lookbackDays: options.lookbackDays ?? DEFAULT_RIGHTSIZING_CONFIG.lookbackDays,
    recommendations,
    cleanups,
    findings: aggregateFindings(recommendations, policy.thresholds, cleanups),
    skipped,
    summary: summarize(recommendations, cleanups),
  };
}

// ============================================================
// Bounded Collection
// ============================================================

async function fetchWithTimeout(
  source: UtilizationSource,
  resource: ResourceConfiguration,
  timeoutMs: number
): Promise<UtilizationReading> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new UtilizationFetchTimeoutError(resource.id, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([source.fetchUtilization(resource, controller.signal), timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export interface CollectAndAnalyzeOptions extends Omit<RunRightsizingOptions, 'skipped'> {
  concurrency?: number;
  timeoutMs?: number;
}

/**
 * Fetch utilization for every resource (bounded, time-limited), then run one
 * analysis pass. A failed fetch lands in `skipped` without stalling the rest.
 */
export async function collectAndAnalyze(
  inventory: ResourceConfiguration[],
  source: UtilizationSource,
  policy: RightsizingPolicy,
  options: CollectAndAnalyzeOptions
): Promise<RightsizingResult> {
  const semaphore = new Semaphore(options.concurrency ?? DEFAULT_RIGHTSIZING_CONFIG.concurrency);
  const timeoutMs = options.timeoutMs ?? DEFAULT_RIGHTSIZING_CONFIG.fetchTimeoutMs;

  const results = await Promise.allSettled(
    inventory.map(resource => semaphore.run(() => fetchWithTimeout(source, resource, timeoutMs)))
  );

  const snapshots: ResourceSnapshot[] = [];
  const skipped: SkippedResource[] = [];

  results.forEach((result, index) => {
    const configuration = inventory[index];
    if (result.status === 'fulfilled') {
      snapshots.push({ configuration, ...result.value });
      return;
    }
    const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
    console.warn(`[RightsizingEngine] Utilization fetch failed for ${configuration.name}: ${reason}`);
    skipped.push({ resourceId: configuration.id, name: configuration.name, reason });
  });

  return runRightsizingAnalysis(snapshots, policy, {
    costModel: options.costModel,
    generatedAt: options.generatedAt,
    lookbackDays: options.lookbackDays,
    skipped,
  });
}
