/**
 * Compute Rightsizing Types
 * Candidate configurations, risk ratings and savings findings for tiered compute resources
 */

// ============================================================
// Resource Snapshot (collaborator input)
// ============================================================

export interface ResourceConfiguration {
  /** Stable resource identifier (e.g. ARM resource id) */
  id: string;
  /** Display name */
  name: string;
  /** Pricing tier, e.g. "PremiumV3" */
  tier: string;
  /** SKU name within the tier, e.g. "P2v3" */
  skuName: string;
  /** Number of provisioned instances (integer >= 1) */
  capacity: number;
  location: string;
  resourceGroup?: string;
  subscriptionId?: string;
}

export type UtilizationMetric = 'cpuAvg' | 'cpuMax' | 'memAvg' | 'memMax';

export const UTILIZATION_METRICS: readonly UtilizationMetric[] = ['cpuAvg', 'cpuMax', 'memAvg', 'memMax'];

// Percentages over the trailing window, clamped to 0-100
export type UtilizationSample = Record<UtilizationMetric, number>;

// As handed over by the metrics collaborator; a missing value is null/undefined
export type RawUtilization = Partial<Record<UtilizationMetric, number | null>>;

export interface WorkloadSummary {
  total: number;
  running: number;
}

export interface ResourceSnapshot {
  configuration: ResourceConfiguration;
  utilization: RawUtilization;
  /** Apps hosted on the resource; undefined when the collaborator did not count them */
  workloads?: WorkloadSummary;
}

// ============================================================
// Options & Risk
// ============================================================

export type OptionKind = 'CURRENT' | 'SCALE_DOWN_1' | 'SCALE_DOWN_50' | 'SKU_DOWNGRADE' | 'COMBINED';

export type RiskLevel = 'NONE' | 'LOW' | 'MEDIUM' | 'HIGH';

export const RISK_LEVEL_ORDER: Record<RiskLevel, number> = {
  NONE: 0,
  LOW: 1,
  MEDIUM: 2,
  HIGH: 3,
};

export const OPTION_DESCRIPTIONS: Record<OptionKind, string> = {
  CURRENT: 'Keep current configuration - No changes',
  SCALE_DOWN_1: 'Reduce capacity by 1 instance',
  SCALE_DOWN_50: 'Reduce capacity by 50%',
  SKU_DOWNGRADE: 'Downgrade SKU tier (half resources per instance)',
  COMBINED: 'Downgrade SKU + reduce capacity',
};

export interface CandidateConfiguration {
  tier: string;
  skuName: string;
  capacity: number;
}

export interface RiskAssessment {
  riskLevel: RiskLevel;
  /** 0-100 */
  confidence: number;
}

export interface OptimizationOption extends RiskAssessment {
  kind: OptionKind;
  configuration: CandidateConfiguration;
  description: string;
  projected: UtilizationSample;
  monthlyCost: number;
  /** Relative to the CURRENT option's cost */
  monthlySavings: number;
  /** Price came from a fallback instead of a registered catalog entry */
  costEstimated: boolean;
}

// ============================================================
// Strategy
// ============================================================

export type StrategyName = 'aggressive' | 'balanced' | 'conservative';

export interface StrategyProfile {
  name: StrategyName;
  /** Highest risk level a selectable option may carry */
  riskCeiling: RiskLevel;
  maxProjectedCpu: number;
  maxProjectedMemory: number;
  target: string;
  riskTolerance: string;
  bestFor: string;
}

export const STRATEGY_PROFILES: Record<StrategyName, StrategyProfile> = {
  aggressive: {
    name: 'aggressive',
    riskCeiling: 'HIGH',
    maxProjectedCpu: 90,
    maxProjectedMemory: 95,
    target: 'Maximum cost savings (85-90% max CPU utilization)',
    riskTolerance: 'Medium to High',
    bestFor: 'Non-critical workloads, test/dev environments',
  },
  balanced: {
    name: 'balanced',
    riskCeiling: 'MEDIUM',
    maxProjectedCpu: 85,
    maxProjectedMemory: 90,
    target: 'Balanced savings and safety (75-80% max CPU utilization)',
    riskTolerance: 'Low to Medium',
    bestFor: 'Most production workloads',
  },
  conservative: {
    name: 'conservative',
    riskCeiling: 'LOW',
    maxProjectedCpu: 70,
    maxProjectedMemory: 75,
    target: 'Safe optimizations (60-70% max CPU utilization)',
    riskTolerance: 'Low only',
    bestFor: 'Production workloads, traffic growth expected',
  },
};

export const DEFAULT_STRATEGY: StrategyName = 'balanced';

// ============================================================
// Recommendations & Findings
// ============================================================

export interface Recommendation {
  resource: ResourceConfiguration;
  utilization: UtilizationSample;
  missingMetrics: UtilizationMetric[];
  workloads?: WorkloadSummary;
  /** CURRENT is always first */
  options: OptimizationOption[];
  selectedOption: OptimizationOption;
  strategy: StrategyName;
  currentMonthlyCost: number;
  monthlySavings: number;
  annualSavings: number;
  warnings: string[];
  dataQualityNotes: string[];
  /** CLI command that applies the selected option; absent when CURRENT is kept */
  implementationCommand?: string;
}

/** A resource hosting no workloads; deleting it saves its full cost */
export interface CleanupCandidate {
  resource: ResourceConfiguration;
  utilization: UtilizationSample;
  monthlyCost: number;
  annualCost: number;
  costEstimated: boolean;
  notes: string[];
  deleteCommand: string;
}

export type SavingsBand = 'HIGH' | 'MEDIUM' | 'LOW';

export const BAND_SEVERITY: Record<SavingsBand, number> = {
  HIGH: 2,
  MEDIUM: 3,
  LOW: 4,
};

export interface SavingsThresholds {
  medium: number;
  high: number;
}

export const DEFAULT_SAVINGS_THRESHOLDS: SavingsThresholds = {
  medium: 2000,
  high: 10000,
};

export interface Finding {
  band: SavingsBand;
  /** Lower is more urgent */
  severity: number;
  title: string;
  details: string;
  nextStep: string;
  monthlySavings: number;
  annualSavings: number;
  resourceIds: string[];
  recommendations: Recommendation[];
  cleanups: CleanupCandidate[];
}

// ============================================================
// Batch Result
// ============================================================

export interface RightsizingPolicy {
  strategy: StrategyName;
  thresholds: SavingsThresholds;
}

export interface SkippedResource {
  resourceId: string;
  name: string;
  reason: string;
}

export interface RightsizingSummary {
  /** Current spend of resources with a savings opportunity */
  currentMonthlySpend: number;
  recommendedMonthlySpend: number;
  monthlySavings: number;
  annualSavings: number;
  savingsPercent: number;
  opportunityCount: number;
  analyzedCount: number;
}

export interface RightsizingResult {
  generatedAt: string;
  strategy: StrategyName;
  thresholds: SavingsThresholds;
  lookbackDays: number;
  recommendations: Recommendation[];
  cleanups: CleanupCandidate[];
  findings: Finding[];
  skipped: SkippedResource[];
  summary: RightsizingSummary;
}

// ============================================================
// Pricing Catalog
// ============================================================

export interface SkuTierEntry {
  /** SKU priced when the tier is known but the SKU is not */
  defaultSku: string;
  /** SKU name → monthly cost of one instance */
  skus: Record<string, number>;
  /** SKU name → the SKU one step down (half the resources per instance) */
  downgrades: Record<string, string>;
}

export interface SkuCatalog {
  currency: string;
  /** Per-instance monthly estimate for SKUs matching nothing in the catalog */
  flatEstimateUnitCost: number;
  tiers: Record<string, SkuTierEntry>;
}
