/**
 * Cost Diff Computer
 *
 * Compares a baseline snapshot with a new one. The absolute delta is the
 * plain difference of the two totals and is never re-derived from the
 * per-resource list.
 */

import { DataError } from '../errors/index.js';
import type { CostDelta, CostSnapshot, PercentChange, ResourceDelta } from './types.js';

export function emptySnapshot(currency: string): CostSnapshot {
  return { currency, totalMonthlyCost: 0, resources: {} };
}

export function percentChange(baseline: number, next: number): PercentChange {
  if (baseline === 0) {
    return next === 0 ? { kind: 'percent', value: 0 } : { kind: 'new' };
  }
  return { kind: 'percent', value: ((next - baseline) / Math.abs(baseline)) * 100 };
}

function compareResources(a: ResourceDelta, b: ResourceDelta): number {
  const byMagnitude = Math.abs(b.absolute) - Math.abs(a.absolute);
  if (byMagnitude !== 0) return byMagnitude;
  return a.address < b.address ? -1 : a.address > b.address ? 1 : 0;
}

export function diff(baseline: CostSnapshot, next: CostSnapshot, folder: string): CostDelta {
  if (baseline.currency !== next.currency) {
    throw new DataError(
      `Currency mismatch for ${folder}: baseline is ${baseline.currency}, new is ${next.currency}`
    );
  }

  const addresses = new Set([...Object.keys(baseline.resources), ...Object.keys(next.resources)]);
  const resources: ResourceDelta[] = [];

  for (const address of addresses) {
    const inBaseline = address in baseline.resources;
    const inNext = address in next.resources;
    const before = inBaseline ? baseline.resources[address] : 0;
    const after = inNext ? next.resources[address] : 0;
    const absolute = after - before;

    resources.push({
      address,
      baseline: before,
      next: after,
      absolute,
      change: !inBaseline ? 'added' : !inNext ? 'removed' : absolute === 0 ? 'unchanged' : 'changed',
    });
  }

  resources.sort(compareResources);

  return {
    folder,
    currency: next.currency,
    baselineTotal: baseline.totalMonthlyCost,
    newTotal: next.totalMonthlyCost,
    absolute: next.totalMonthlyCost - baseline.totalMonthlyCost,
    percent: percentChange(baseline.totalMonthlyCost, next.totalMonthlyCost),
    resources,
  };
}

/**
 * A delta counts as zero when it rounds to 0.00 in the currency's
 * minor unit, i.e. when the comment would show no change.
 */
export function isZeroDelta(delta: Pick<CostDelta, 'absolute'>): boolean {
  return Math.round(Math.abs(delta.absolute) * 100) === 0;
}
