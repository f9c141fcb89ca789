/**
 * Rightsizing Configuration
 * Environment-driven policy and collaborator limits
 */

import {
  DEFAULT_SAVINGS_THRESHOLDS,
  DEFAULT_STRATEGY,
  type SavingsThresholds,
  type StrategyName,
} from '@/types/rightsizing';
import { resolveStrategy } from './strategy-selector';

export interface RightsizingConfig {
  strategy: StrategyName;
  thresholds: SavingsThresholds;
  /** Max concurrent utilization fetches */
  concurrency: number;
  /** Per-resource fetch timeout */
  fetchTimeoutMs: number;
  /** Trailing utilization window, shown in reports */
  lookbackDays: number;
}

export type EnvSource = Record<string, string | undefined>;

export const DEFAULT_RIGHTSIZING_CONFIG: RightsizingConfig = {
  strategy: DEFAULT_STRATEGY,
  thresholds: { ...DEFAULT_SAVINGS_THRESHOLDS },
  concurrency: 4,
  fetchTimeoutMs: 30000,
  lookbackDays: 7,
};

// ============================================================
// Parsing Helpers
// ============================================================

function readNumber(env: EnvSource, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    console.warn(`[RightsizingConfig] Invalid ${key}='${raw}', using ${fallback}`);
    return fallback;
  }
  return value;
}

function readInteger(env: EnvSource, key: string, fallback: number, min: number): number {
  const value = readNumber(env, key, fallback, min);
  if (!Number.isInteger(value)) {
    console.warn(`[RightsizingConfig] ${key} must be an integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Validate a threshold pair. Returns the defaults when medium exceeds high.
 */
export function normalizeThresholds(thresholds: SavingsThresholds): SavingsThresholds {
  if (thresholds.medium > thresholds.high) {
    console.warn(
      `[RightsizingConfig] Medium threshold ${thresholds.medium} exceeds high threshold ${thresholds.high}, using defaults`
    );
    return { ...DEFAULT_SAVINGS_THRESHOLDS };
  }
  return thresholds;
}

// ============================================================
// Public API
// ============================================================

export function getRightsizingConfig(env: EnvSource = process.env): RightsizingConfig {
  const defaults = DEFAULT_RIGHTSIZING_CONFIG;

  return {
    strategy: resolveStrategy(env.OPTIMIZATION_STRATEGY),
    thresholds: normalizeThresholds({
      medium: readNumber(env, 'MEDIUM_COST_THRESHOLD', defaults.thresholds.medium, 0),
      high: readNumber(env, 'HIGH_COST_THRESHOLD', defaults.thresholds.high, 0),
    }),
    concurrency: readInteger(env, 'RIGHTSIZING_CONCURRENCY', defaults.concurrency, 1),
    fetchTimeoutMs: readInteger(env, 'RIGHTSIZING_FETCH_TIMEOUT_MS', defaults.fetchTimeoutMs, 1),
    lookbackDays: defaults.lookbackDays,
  };
}
