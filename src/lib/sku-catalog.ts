/**
 * SKU Catalog Loader
 * Reads the pricing and downgrade tables from JSON and validates them.
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { SkuCatalog } from '@/types/rightsizing';

export const DEFAULT_SKU_CATALOG_PATH = fileURLToPath(new URL('../../data/sku-catalog.json', import.meta.url));

export class SkuCatalogError extends Error {
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'SkuCatalogError';
    this.issues = issues;
  }
}

const tierSchema = z
  .object({
    defaultSku: z.string().min(1),
    skus: z.record(z.string().min(1), z.number().finite().nonnegative()),
    downgrades: z.record(z.string().min(1), z.string().min(1)).default({}),
  })
  .superRefine((tier, ctx) => {
    if (!(tier.defaultSku in tier.skus)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaultSku'],
        message: `default SKU ${tier.defaultSku} has no price`,
      });
    }
    for (const [from, to] of Object.entries(tier.downgrades)) {
      if (!(from in tier.skus) || !(to in tier.skus)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['downgrades', from],
          message: `downgrade ${from} → ${to} references an unpriced SKU`,
        });
      }
    }
  });

const catalogSchema = z.object({
  currency: z.string().min(1).default('USD'),
  flatEstimateUnitCost: z.number().finite().nonnegative(),
  tiers: z.record(z.string().min(1), tierSchema),
});

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}

export function parseSkuCatalog(raw: unknown): SkuCatalog {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    throw new SkuCatalogError(`Invalid SKU catalog: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export async function loadSkuCatalog(filePath: string = DEFAULT_SKU_CATALOG_PATH): Promise<SkuCatalog> {
  const content = await readFile(filePath, 'utf-8');

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SkuCatalogError(`SKU catalog ${filePath} is not valid JSON: ${message}`);
  }

  return parseSkuCatalog(raw);
}
