/**
 * Cost Model
 * Table-driven monthly pricing for (tier, SKU, capacity) and the "one step down" SKU table.
 */

import type { CandidateConfiguration, SkuCatalog, SkuTierEntry } from '@/types/rightsizing';

/**
 * Where a price came from.
 *   catalog       → exact (tier, SKU) entry
 *   sku-match     → SKU registered under a single other tier
 *   tier-default  → tier known, SKU not; priced as the tier's default SKU
 *   flat-estimate → nothing matched
 */
export type PriceSource = 'catalog' | 'sku-match' | 'tier-default' | 'flat-estimate';

export interface CostQuote {
  tier: string;
  skuName: string;
  capacity: number;
  unitCost: number;
  monthlyCost: number;
  source: PriceSource;
  /** True for every source other than 'catalog' */
  estimated: boolean;
}

export interface CostModel {
  currency: string;
  quote(tier: string, skuName: string, capacity: number): CostQuote;
  cost(tier: string, skuName: string, capacity: number): number;
  /** The registered SKU one step down, or null when there is none */
  downgradeOf(tier: string, skuName: string): Omit<CandidateConfiguration, 'capacity'> | null;
}

interface IndexedTier {
  name: string;
  entry: SkuTierEntry;
  /** lowercase SKU → canonical SKU */
  skus: Map<string, string>;
}

interface ResolvedSku {
  tier: IndexedTier;
  skuName: string;
  source: 'catalog' | 'sku-match';
}

function normalizeKey(value: string): string {
  return value.trim().toLowerCase();
}

function indexCatalog(catalog: SkuCatalog): {
  tiers: Map<string, IndexedTier>;
  skuOwners: Map<string, IndexedTier[]>;
} {
  const tiers = new Map<string, IndexedTier>();
  const skuOwners = new Map<string, IndexedTier[]>();

  for (const [tierName, entry] of Object.entries(catalog.tiers)) {
    const skus = new Map<string, string>();
    for (const skuName of Object.keys(entry.skus)) {
      skus.set(normalizeKey(skuName), skuName);
    }
    const indexed: IndexedTier = { name: tierName, entry, skus };
    tiers.set(normalizeKey(tierName), indexed);

    for (const key of skus.keys()) {
      const owners = skuOwners.get(key) ?? [];
      owners.push(indexed);
      skuOwners.set(key, owners);
    }
  }

  return { tiers, skuOwners };
}

export function createCostModel(catalog: SkuCatalog): CostModel {
  const { tiers, skuOwners } = indexCatalog(catalog);

  function resolve(tier: string, skuName: string): ResolvedSku | null {
    const skuKey = normalizeKey(skuName);
    const indexedTier = tiers.get(normalizeKey(tier));
    const exact = indexedTier?.skus.get(skuKey);
    if (indexedTier && exact) {
      return { tier: indexedTier, skuName: exact, source: 'catalog' };
    }

    const owners = skuOwners.get(skuKey) ?? [];
    if (owners.length === 1) {
      const owner = owners[0];
      const canonical = owner.skus.get(skuKey);
      if (canonical) {
        return { tier: owner, skuName: canonical, source: 'sku-match' };
      }
    }

    return null;
  }

  function quote(tier: string, skuName: string, capacity: number): CostQuote {
    const instances = Math.max(0, capacity);
    const resolved = resolve(tier, skuName);

    let unitCost: number;
    let source: PriceSource;

    if (resolved) {
      unitCost = resolved.tier.entry.skus[resolved.skuName] ?? catalog.flatEstimateUnitCost;
      source = resolved.source;
    } else {
      const indexedTier = tiers.get(normalizeKey(tier));
      const defaultPrice = indexedTier?.entry.skus[indexedTier.entry.defaultSku];
      if (defaultPrice !== undefined) {
        unitCost = defaultPrice;
        source = 'tier-default';
      } else {
        unitCost = catalog.flatEstimateUnitCost;
        source = 'flat-estimate';
      }
    }

    return {
      tier,
      skuName,
      capacity: instances,
      unitCost,
      monthlyCost: unitCost * instances,
      source,
      estimated: source !== 'catalog',
    };
  }

  function downgradeOf(tier: string, skuName: string): Omit<CandidateConfiguration, 'capacity'> | null {
    const resolved = resolve(tier, skuName);
    if (!resolved) return null;

    const target = resolved.tier.entry.downgrades[resolved.skuName];
    if (!target) return null;

    return { tier: resolved.tier.name, skuName: target };
  }

  return {
    currency: catalog.currency,
    quote,
    cost: (tier, skuName, capacity) => quote(tier, skuName, capacity).monthlyCost,
    downgradeOf,
  };
}

/**
 * Human-readable explanation for a non-catalog price, or null for catalog prices.
 */
export function describePriceSource(quote: CostQuote): string | null {
  switch (quote.source) {
    case 'catalog':
      return null;
    case 'sku-match':
      return `Tier '${quote.tier}' has no entry for SKU '${quote.skuName}'; priced by SKU name from another tier (${quote.unitCost}/instance)`;
    case 'tier-default':
      return `Unknown SKU '${quote.tier}/${quote.skuName}'; priced as the tier's default SKU (${quote.unitCost}/instance)`;
    case 'flat-estimate':
      return `Unknown SKU '${quote.tier}/${quote.skuName}'; using a flat estimate of ${quote.unitCost}/instance`;
  }
}
