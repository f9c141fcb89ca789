/**
 * Strategy Selector
 * Picks the best candidate for an optimization strategy, falling back to CURRENT.
 */

import {
  DEFAULT_STRATEGY,
  RISK_LEVEL_ORDER,
  STRATEGY_PROFILES,
  type OptimizationOption,
  type OptionKind,
  type StrategyName,
  type StrategyProfile,
} from '@/types/rightsizing';

// Lower is less disruptive to apply
const CHANGE_WEIGHT: Record<OptionKind, number> = {
  CURRENT: 0,
  SCALE_DOWN_1: 1,
  SCALE_DOWN_50: 1,
  SKU_DOWNGRADE: 2,
  COMBINED: 3,
};

// Final tiebreak so equal candidates always resolve the same way
const KIND_ORDER: Record<OptionKind, number> = {
  CURRENT: 0,
  SCALE_DOWN_1: 1,
  SCALE_DOWN_50: 2,
  SKU_DOWNGRADE: 3,
  COMBINED: 4,
};

export function isStrategyName(value: string): value is StrategyName {
  return Object.prototype.hasOwnProperty.call(STRATEGY_PROFILES, value);
}

/**
 * Map a free-form strategy name to a known strategy. Unknown names become 'balanced'.
 */
export function resolveStrategy(name: string | undefined | null): StrategyName {
  const normalized = (name ?? '').trim().toLowerCase();
  if (normalized === '') return DEFAULT_STRATEGY;
  if (isStrategyName(normalized)) return normalized;

  console.warn(`[StrategySelector] Unknown optimization strategy '${name}', using '${DEFAULT_STRATEGY}'`);
  return DEFAULT_STRATEGY;
}

export function getStrategyProfile(strategy: StrategyName): StrategyProfile {
  return STRATEGY_PROFILES[strategy];
}

/**
 * Whether a non-CURRENT option passes the strategy's filter.
 */
export function isSelectable(option: OptimizationOption, profile: StrategyProfile): boolean {
  if (option.kind === 'CURRENT') return false;
  if (option.monthlySavings <= 0) return false;
  if (RISK_LEVEL_ORDER[option.riskLevel] > RISK_LEVEL_ORDER[profile.riskCeiling]) return false;
  return (
    option.projected.cpuMax <= profile.maxProjectedCpu &&
    option.projected.memMax <= profile.maxProjectedMemory
  );
}

/**
 * Ranking: higher savings, then lower projected max memory, then lower projected
 * max CPU, then the less disruptive change.
 */
export function compareOptions(a: OptimizationOption, b: OptimizationOption): number {
  return (
    b.monthlySavings - a.monthlySavings ||
    a.projected.memMax - b.projected.memMax ||
    a.projected.cpuMax - b.projected.cpuMax ||
    CHANGE_WEIGHT[a.kind] - CHANGE_WEIGHT[b.kind] ||
    KIND_ORDER[a.kind] - KIND_ORDER[b.kind]
  );
}

export function selectOption(options: OptimizationOption[], strategy: StrategyName): OptimizationOption {
  const current = options.find(option => option.kind === 'CURRENT');
  if (!current) {
    throw new Error('Option list has no CURRENT entry');
  }

  const profile = getStrategyProfile(strategy);
  const qualifying = options.filter(option => isSelectable(option, profile));
  if (qualifying.length === 0) return current;

  return [...qualifying].sort(compareOptions)[0];
}
