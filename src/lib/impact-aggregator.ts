/**
 * Impact Aggregator
 * Groups recommendations and cleanup candidates into savings-banded findings.
 */

import {
  BAND_SEVERITY,
  type CleanupCandidate,
  type Finding,
  type Recommendation,
  type ResourceConfiguration,
  type SavingsBand,
  type SavingsThresholds,
} from '@/types/rightsizing';

export const MAX_FINDING_DETAIL_ITEMS = 20;

const BAND_ORDER: SavingsBand[] = ['HIGH', 'MEDIUM', 'LOW'];

const NEXT_STEPS: Record<SavingsBand, string> = {
  HIGH:
    'Review the detailed report and prioritize LOW-risk recommendations first. Delete empty resources that are no longer needed. ' +
    'For underutilized resources, rightsize to a smaller SKU or consolidate workloads onto fewer resources.',
  MEDIUM:
    'Review the detailed report and prioritize LOW-risk recommendations first. ' +
    'Consider consolidating workloads or rightsizing these resources during the next planned change.',
  LOW:
    'Lower-priority optimizations by savings amount; LOW-risk recommendations can be applied safely. ' +
    'Address LOW-risk items first, then MEDIUM-risk items during regular maintenance windows.',
};

type BandMember =
  | { type: 'recommendation'; item: Recommendation; monthlySavings: number }
  | { type: 'cleanup'; item: CleanupCandidate; monthlySavings: number };

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function formatUsd(value: number): string {
  const rounded = round2(value);
  return Number.isInteger(rounded) ? `$${rounded}` : `$${rounded.toFixed(2)}`;
}

/**
 * HIGH at or above `high`, MEDIUM at or above `medium`, LOW below.
 */
export function classifySavingsBand(monthlySavings: number, thresholds: SavingsThresholds): SavingsBand {
  if (monthlySavings >= thresholds.high) return 'HIGH';
  if (monthlySavings >= thresholds.medium) return 'MEDIUM';
  return 'LOW';
}

function memberResource(member: BandMember): ResourceConfiguration {
  return member.item.resource;
}

function describeResource(resource: ResourceConfiguration): string {
  return resource.resourceGroup ? `${resource.name} (${resource.resourceGroup})` : resource.name;
}

function describeMember(member: BandMember): string {
  const resource = memberResource(member);
  const header = `• ${describeResource(resource)}: ${formatUsd(member.monthlySavings)}/month savings`;
  const current = `  Current: ${resource.skuName} x${resource.capacity}`;

  if (member.type === 'cleanup') {
    return `${header} - Remove empty resource\n${current} | EMPTY (no workloads)`;
  }

  const { selectedOption, utilization } = member.item;
  const { configuration } = selectedOption;
  return [
    `${header} - Risk: ${selectedOption.riskLevel}`,
    `${current} | CPU: ${utilization.cpuAvg}% avg, ${utilization.cpuMax}% max`,
    `  Recommended: ${configuration.skuName} x${configuration.capacity} (${selectedOption.kind})`,
  ].join('\n');
}

function describeRange(band: SavingsBand, thresholds: SavingsThresholds): string {
  switch (band) {
    case 'HIGH':
      return `>= ${formatUsd(thresholds.high)}/month each`;
    case 'MEDIUM':
      return `${formatUsd(thresholds.medium)}-${formatUsd(thresholds.high)}/month each`;
    case 'LOW':
      return `< ${formatUsd(thresholds.medium)}/month each`;
  }
}

function buildFinding(band: SavingsBand, members: BandMember[], thresholds: SavingsThresholds): Finding {
  const sorted = [...members].sort(
    (a, b) => b.monthlySavings - a.monthlySavings || memberResource(a).id.localeCompare(memberResource(b).id)
  );
  const monthlySavings = round2(sorted.reduce((sum, m) => sum + m.monthlySavings, 0));
  const annualSavings = round2(monthlySavings * 12);
  const count = sorted.length;
  const noun = count === 1 ? 'resource' : 'resources';

  const listed = sorted.slice(0, MAX_FINDING_DETAIL_ITEMS).map(describeMember);
  if (count > MAX_FINDING_DETAIL_ITEMS) {
    listed.push(`… and ${count - MAX_FINDING_DETAIL_ITEMS} more`);
  }

  const details = [
    `Found ${count} ${noun} with ${band} potential savings (${describeRange(band, thresholds)}).`,
    `Total potential savings: ${formatUsd(monthlySavings)}/month (${formatUsd(annualSavings)}/year)`,
    'Review implementation risk for each recommendation before proceeding.',
    '',
    'Affected resources:',
    ...listed,
  ].join('\n');

  return {
    band,
    severity: BAND_SEVERITY[band],
    title: `${band} Savings: Compute Rightsizing (${count} ${noun}, ${formatUsd(monthlySavings)}/month potential savings)`,
    details,
    nextStep: NEXT_STEPS[band],
    monthlySavings,
    annualSavings,
    resourceIds: sorted.map(m => memberResource(m).id),
    recommendations: sorted.flatMap(m => (m.type === 'recommendation' ? [m.item] : [])),
    cleanups: sorted.flatMap(m => (m.type === 'cleanup' ? [m.item] : [])),
  };
}

/**
 * Band every item with savings > 0. Items with no savings are left out and
 * empty bands produce no finding. Findings come back HIGH, MEDIUM, LOW.
 */
export function aggregateFindings(
  recommendations: Recommendation[],
  thresholds: SavingsThresholds,
  cleanups: CleanupCandidate[] = []
): Finding[] {
  const members: BandMember[] = [
    ...recommendations.map((item): BandMember => ({ type: 'recommendation', item, monthlySavings: item.monthlySavings })),
    ...cleanups.map((item): BandMember => ({ type: 'cleanup', item, monthlySavings: item.monthlyCost })),
  ];

  const bands = new Map<SavingsBand, BandMember[]>();
  for (const member of members) {
    if (member.monthlySavings <= 0) continue;
    const band = classifySavingsBand(member.monthlySavings, thresholds);
    const bucket = bands.get(band) ?? [];
    bucket.push(member);
    bands.set(band, bucket);
  }

  return BAND_ORDER.flatMap(band => {
    const bucket = bands.get(band);
    return bucket && bucket.length > 0 ? [buildFinding(band, bucket, thresholds)] : [];
  });
}
