/**
 * Snapshot Parser
 * Validates an inventory + utilization snapshot document.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { ResourceSnapshot } from '@/types/rightsizing';
import { formatZodIssues } from './sku-catalog';

export class SnapshotValidationError extends Error {
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'SnapshotValidationError';
    this.issues = issues;
  }
}

const metricSchema = z.number().finite().nullable().optional();

const resourceSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).optional(),
  tier: z.string().min(1),
  skuName: z.string().min(1),
  capacity: z.number().int().min(1),
  location: z.string().min(1),
  resourceGroup: z.string().min(1).optional(),
  subscriptionId: z.string().min(1).optional(),
  utilization: z
    .object({
      cpuAvg: metricSchema,
      cpuMax: metricSchema,
      memAvg: metricSchema,
      memMax: metricSchema,
    })
    .default({}),
  workloads: z
    .object({
      total: z.number().int().nonnegative(),
      running: z.number().int().nonnegative(),
    })
    .refine(w => w.running <= w.total, { message: 'running workloads exceed total' })
    .optional(),
});

const snapshotDocumentSchema = z
  .object({
    resources: z.array(resourceSchema),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    doc.resources.forEach((resource, index) => {
      if (seen.has(resource.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['resources', index, 'id'],
          message: `duplicate resource id ${resource.id}`,
        });
      }
      seen.add(resource.id);
    });
  });

export function parseResourceSnapshots(raw: unknown): ResourceSnapshot[] {
  const parsed = snapshotDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    throw new SnapshotValidationError(`Invalid resource snapshot: ${issues.join('; ')}`, issues);
  }

  return parsed.data.resources.map(resource => ({
    configuration: {
      id: resource.id,
      name: resource.name ?? resource.id,
      tier: resource.tier,
      skuName: resource.skuName,
      capacity: resource.capacity,
      location: resource.location,
      resourceGroup: resource.resourceGroup,
      subscriptionId: resource.subscriptionId,
    },
    utilization: resource.utilization,
    workloads: resource.workloads,
  }));
}

export async function loadResourceSnapshots(filePath: string): Promise<ResourceSnapshot[]> {
  const content = await readFile(filePath, 'utf-8');

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SnapshotValidationError(`Snapshot ${filePath} is not valid JSON: ${message}`);
  }

  return parseResourceSnapshots(raw);
}
