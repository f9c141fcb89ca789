/**
 * Rightsizing Report
 * Plain-text terminal rendering of a RightsizingResult.
 */

import { getStrategyProfile } from './strategy-selector';
import { describeImplementationRisk } from './recommendation-builder';
import { formatUsd } from './impact-aggregator';
import { PROJECTION_DISCLAIMER } from './utilization-projector';
import type {
  CleanupCandidate,
  OptimizationOption,
  Recommendation,
  ResourceConfiguration,
  RightsizingResult,
} from '@/types/rightsizing';

export const TOP_OPPORTUNITY_COUNT = 5;

const RULE = '━'.repeat(60);

export const REPORT_SECTIONS = {
  configuration: 'ANALYSIS CONFIGURATION',
  summary: 'COST SAVINGS SUMMARY',
  topOpportunities: 'TOP SAVINGS OPPORTUNITIES',
  recommendations: 'RIGHTSIZING RECOMMENDATIONS',
  cleanups: 'EMPTY RESOURCES (Cleanup Opportunities)',
  findings: 'FINDINGS',
  skipped: 'SKIPPED RESOURCES',
  notes: 'NOTES',
} as const;

function heading(lines: string[], title: string): void {
  lines.push('');
  lines.push(title);
  lines.push(RULE);
}

function describeResource(resource: ResourceConfiguration): string {
  return resource.resourceGroup ? `${resource.name} (${resource.resourceGroup})` : resource.name;
}

function savingsPercent(savings: number, cost: number): number {
  return cost > 0 ? Math.floor((savings / cost) * 100) : 0;
}

function formatOptionRow(option: OptimizationOption, selected: OptimizationOption): string {
  const marker = option.kind === selected.kind ? '>' : ' ';
  const { skuName, capacity } = option.configuration;
  const price = `${formatUsd(option.monthlyCost)}/mo${option.costEstimated ? '*' : ''}`;
  return [
    `  ${marker} ${option.kind.padEnd(13)}`,
    `${skuName} x${capacity}`,
    `CPU ${option.projected.cpuMax}% max`,
    `Mem ${option.projected.memMax}% max`,
    `Risk ${option.riskLevel} (${option.confidence}%)`,
    price,
    `Savings ${formatUsd(option.monthlySavings)}`,
  ].join(' | ');
}

function renderRecommendation(lines: string[], rec: Recommendation): void {
  const { resource, utilization, selectedOption } = rec;
  const target = selectedOption.configuration;

  lines.push('');
  lines.push(`Resource: ${describeResource(resource)}`);
  lines.push(`  Current: ${resource.tier} ${resource.skuName} x${resource.capacity} - ${formatUsd(rec.currentMonthlyCost)}/month`);
  if (rec.workloads) {
    lines.push(`  Workloads: ${rec.workloads.running}/${rec.workloads.total} running`);
  }
  lines.push(
    `  Utilization: CPU ${utilization.cpuAvg}% avg, ${utilization.cpuMax}% max | ` +
      `Memory ${utilization.memAvg}% avg, ${utilization.memMax}% max`
  );

  if (selectedOption.kind === 'CURRENT') {
    lines.push(`  Recommendation (${rec.strategy}): keep current configuration`);
  } else {
    lines.push(
      `  Recommendation (${rec.strategy}): ${selectedOption.kind} - ${selectedOption.description}`
    );
    lines.push(
      `    Target: ${target.tier} ${target.skuName} x${target.capacity} - ${formatUsd(selectedOption.monthlyCost)}/month`
    );
    lines.push(
      `    Savings: ${formatUsd(rec.monthlySavings)}/month ` +
        `(${savingsPercent(rec.monthlySavings, rec.currentMonthlyCost)}%), ${formatUsd(rec.annualSavings)}/year`
    );
  }

  lines.push('  Options:');
  for (const option of rec.options) {
    lines.push(formatOptionRow(option, selectedOption));
  }

  lines.push(`  Implementation risk (confidence ${selectedOption.confidence}%):`);
  for (const line of describeImplementationRisk(selectedOption)) {
    lines.push(`    - ${line}`);
  }

  for (const warning of rec.warnings) {
    lines.push(`  WARNING: ${warning}`);
  }
  if (rec.implementationCommand) {
    lines.push('  Implementation command:');
    lines.push(`    ${rec.implementationCommand}`);
  }
  for (const note of rec.dataQualityNotes) {
    lines.push(`  Data quality: ${note}`);
  }
}

function renderCleanup(lines: string[], cleanup: CleanupCandidate): void {
  const { resource } = cleanup;
  lines.push('');
  lines.push(`Resource: ${describeResource(resource)}`);
  lines.push(`  Current: ${resource.tier} ${resource.skuName} x${resource.capacity}`);
  lines.push(
    `  Cost: ${formatUsd(cleanup.monthlyCost)}/month waste (${formatUsd(cleanup.annualCost)}/year)` +
      (cleanup.costEstimated ? ' *' : '')
  );
  lines.push('  No workloads deployed; delete if no longer needed');
  for (const note of cleanup.notes) {
    lines.push(`  Note: ${note}`);
  }
  lines.push('  Delete command:');
  lines.push(`    ${cleanup.deleteCommand}`);
}

type Opportunity = { resource: ResourceConfiguration; savings: number; cost: number; action: string; detail: string };

function topOpportunities(result: RightsizingResult): Opportunity[] {
  const fromRecommendations = result.recommendations
    .filter(rec => rec.monthlySavings > 0)
    .map((rec): Opportunity => ({
      resource: rec.resource,
      savings: rec.monthlySavings,
      cost: rec.currentMonthlyCost,
      action: rec.selectedOption.kind,
      detail: `CPU: ${rec.utilization.cpuAvg}% avg, ${rec.utilization.cpuMax}% max`,
    }));
  const fromCleanups = result.cleanups
    .filter(cleanup => cleanup.monthlyCost > 0)
    .map((cleanup): Opportunity => ({
      resource: cleanup.resource,
      savings: cleanup.monthlyCost,
      cost: cleanup.monthlyCost,
      action: 'DELETE',
      detail: 'EMPTY (no workloads)',
    }));

  return [...fromRecommendations, ...fromCleanups]
    .sort((a, b) => b.savings - a.savings || a.resource.id.localeCompare(b.resource.id))
    .slice(0, TOP_OPPORTUNITY_COUNT);
}

export function formatRightsizingReport(result: RightsizingResult): string {
  const lines: string[] = [];
  const profile = getStrategyProfile(result.strategy);
  const { summary } = result;

  lines.push('COMPUTE RIGHTSIZING REPORT');
  lines.push(`Generated: ${result.generatedAt}`);

  heading(lines, REPORT_SECTIONS.configuration);
  lines.push(`• Optimization Strategy: ${result.strategy}`);
  lines.push(`  Target: ${profile.target}`);
  lines.push(`  Risk Tolerance: ${profile.riskTolerance}`);
  lines.push(`  Best For: ${profile.bestFor}`);
  lines.push(`• Analysis Period: ${result.lookbackDays} days of utilization metrics`);
  lines.push(
    `• Savings Bands: HIGH >= ${formatUsd(result.thresholds.high)}/month, ` +
      `MEDIUM >= ${formatUsd(result.thresholds.medium)}/month`
  );

  heading(lines, REPORT_SECTIONS.summary);
  lines.push(`• Current Monthly Spend: ${formatUsd(summary.currentMonthlySpend)} (resources with savings opportunities)`);
  lines.push(`• Potential Monthly Savings: ${formatUsd(summary.monthlySavings)} (${summary.savingsPercent}% reduction)`);
  lines.push(`• Potential Annual Savings: ${formatUsd(summary.annualSavings)}`);
  lines.push(`• Recommended Monthly Spend: ${formatUsd(summary.recommendedMonthlySpend)}`);
  lines.push(`• Optimization Opportunities: ${summary.opportunityCount} of ${summary.analyzedCount} analyzed resources`);

  heading(lines, REPORT_SECTIONS.topOpportunities);
  const top = topOpportunities(result);
  if (top.length === 0) {
    lines.push('No savings opportunities found.');
  }
  for (const item of top) {
    lines.push(
      `• ${item.resource.name} - ${formatUsd(item.savings)}/month (${savingsPercent(item.savings, item.cost)}% savings)`
    );
    lines.push(`  Current: ${item.resource.skuName} x${item.resource.capacity} | ${item.detail}`);
    lines.push(`  Action: ${item.action}`);
  }

  heading(lines, REPORT_SECTIONS.recommendations);
  if (result.recommendations.length === 0) {
    lines.push('No resources analyzed.');
  }
  for (const rec of result.recommendations) {
    renderRecommendation(lines, rec);
  }

  heading(lines, REPORT_SECTIONS.cleanups);
  if (result.cleanups.length === 0) {
    lines.push('No empty resources found.');
  }
  for (const cleanup of result.cleanups) {
    renderCleanup(lines, cleanup);
  }

  heading(lines, REPORT_SECTIONS.findings);
  if (result.findings.length === 0) {
    lines.push('No findings.');
  }
  for (const finding of result.findings) {
    lines.push('');
    lines.push(`[Severity ${finding.severity}] ${finding.title}`);
    for (const detail of finding.details.split('\n')) {
      lines.push(detail === '' ? '' : `  ${detail}`);
    }
    lines.push(`  Next step: ${finding.nextStep}`);
  }

  if (result.skipped.length > 0) {
    heading(lines, REPORT_SECTIONS.skipped);
    for (const skipped of result.skipped) {
      lines.push(`• ${skipped.name} (${skipped.resourceId}): ${skipped.reason}`);
    }
  }

  heading(lines, REPORT_SECTIONS.notes);
  lines.push(`1. ${PROJECTION_DISCLAIMER}`);
  lines.push('2. Risk levels:');
  lines.push('   • LOW: safe to implement, minimal performance impact');
  lines.push('   • MEDIUM: monitor closely after implementation; apply during low traffic');
  lines.push('   • HIGH: requires careful evaluation; consider a gradual rollout');
  lines.push('3. Prices are best-effort list-price estimates; values marked * come from fallback pricing.');
  lines.push('4. Set OPTIMIZATION_STRATEGY (aggressive, balanced, conservative) to change the strategy.');
  lines.push('5. Test changes outside production first and monitor for 24-48 hours afterwards.');

  return lines.join('\n');
}
