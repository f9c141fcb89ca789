#!/usr/bin/env tsx
/**
 * Compute Rightsizing Report
 *
 * Usage:
 *   npx tsx scripts/rightsizing-report.ts --input <snapshot.json> [options]
 *
 * Options:
 *   --input <file>        Snapshot document (required)
 *   --strategy <name>     aggressive | balanced | conservative (default: OPTIMIZATION_STRATEGY or balanced)
 *   --medium <n>          MEDIUM savings band threshold, $/month (default: 2000)
 *   --high <n>            HIGH savings band threshold, $/month (default: 10000)
 *   --concurrency <n>     Max concurrent utilization fetches (default: 4)
 *   --json <file>         Also write the full result as JSON
 *   --help                Show this help message
 *
 * Progress goes to stderr, the report to stdout.
 */

import { writeFile } from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import { createCostModel } from '../src/lib/cost-model';
import { collectAndAnalyze, StaticUtilizationSource } from '../src/lib/rightsizing-engine';
import { getRightsizingConfig, normalizeThresholds } from '../src/lib/rightsizing-config';
import { formatRightsizingReport } from '../src/lib/rightsizing-report';
import { loadSkuCatalog } from '../src/lib/sku-catalog';
import { loadResourceSnapshots, SnapshotValidationError } from '../src/lib/snapshot-parser';
import { resolveStrategy } from '../src/lib/strategy-selector';

interface CliArgs {
  input?: string;
  strategy?: string;
  medium?: number;
  high?: number;
  concurrency?: number;
  jsonPath?: string;
  showHelp: boolean;
}

class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function parseNumberFlag(flag: string, value: string | undefined, integer: boolean): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new CliUsageError(`${flag} expects a non-negative number (got '${value ?? ''}')`);
  }
  if (integer && (!Number.isInteger(parsed) || parsed < 1)) {
    throw new CliUsageError(`${flag} expects an integer >= 1 (got '${value}')`);
  }
  return parsed;
}

function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = { showHelp: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--help':
        result.showHelp = true;
        return result;
      case '--input':
        result.input = next;
        i++;
        break;
      case '--strategy':
        result.strategy = next;
        i++;
        break;
      case '--medium':
        result.medium = parseNumberFlag(arg, next, false);
        i++;
        break;
      case '--high':
        result.high = parseNumberFlag(arg, next, false);
        i++;
        break;
      case '--concurrency':
        result.concurrency = parseNumberFlag(arg, next, true);
        i++;
        break;
      case '--json':
        result.jsonPath = next;
        i++;
        break;
      default:
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

function printHelp(): void {
  console.info('Usage: npx tsx scripts/rightsizing-report.ts --input <snapshot.json> [--strategy <name>]');
  console.info('       [--medium <n>] [--high <n>] [--concurrency <n>] [--json <file>]');
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.showHelp) {
    printHelp();
    return;
  }
  if (!args.input) {
    throw new CliUsageError('--input <file> is required');
  }

  const config = getRightsizingConfig(process.env);
  const strategy = args.strategy !== undefined ? resolveStrategy(args.strategy) : config.strategy;
  const thresholds = normalizeThresholds({
    medium: args.medium ?? config.thresholds.medium,
    high: args.high ?? config.thresholds.high,
  });

  const inputPath = path.resolve(process.cwd(), args.input);
  console.error(chalk.cyan(`[rightsizing] loading snapshot ${inputPath}`));
  const [catalog, snapshots] = await Promise.all([loadSkuCatalog(), loadResourceSnapshots(inputPath)]);

  console.error(
    chalk.gray(`[rightsizing] resources=${snapshots.length} strategy=${strategy} concurrency=${args.concurrency ?? config.concurrency}`)
  );

  const result = await collectAndAnalyze(
    snapshots.map(snapshot => snapshot.configuration),
    new StaticUtilizationSource(snapshots),
    { strategy, thresholds },
    {
      costModel: createCostModel(catalog),
      concurrency: args.concurrency ?? config.concurrency,
      timeoutMs: config.fetchTimeoutMs,
      lookbackDays: config.lookbackDays,
    }
  );

  if (result.skipped.length > 0) {
    console.error(chalk.yellow(`[rightsizing] skipped ${result.skipped.length} resource(s)`));
  }

  process.stdout.write(`${formatRightsizingReport(result)}\n`);

  if (args.jsonPath) {
    const jsonPath = path.resolve(process.cwd(), args.jsonPath);
    await writeFile(jsonPath, JSON.stringify(result, null, 2), 'utf-8');
    console.error(chalk.gray(`[rightsizing] result-json=${jsonPath}`));
  }

  console.error(
    chalk.green(
      `[rightsizing] done: ${result.summary.opportunityCount} opportunities, ` +
        `$${result.summary.monthlySavings}/month potential savings`
    )
  );
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : 'Unknown fatal error';
  console.error(chalk.red(`[rightsizing] fatal: ${message}`));
  if (error instanceof SnapshotValidationError) {
    for (const issue of error.issues) {
      console.error(chalk.red(`  - ${issue}`));
    }
  }
  if (error instanceof CliUsageError) {
    printHelp();
  }
  process.exitCode = 1;
});
