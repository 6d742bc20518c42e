/**
 * Cost data model
 */

import { z } from 'zod';

export interface CostSnapshot {
  /** ISO 4217 code */
  currency: string;
  totalMonthlyCost: number;
  /** resource address -> monthly cost */
  resources: Record<string, number>;
}

export type PercentChange =
  | { kind: 'percent'; value: number }
  /** baseline was 0 and the new total is not */
  | { kind: 'new' };

export type ResourceChange = 'added' | 'removed' | 'changed' | 'unchanged';

export interface ResourceDelta {
  address: string;
  baseline: number;
  next: number;
  absolute: number;
  change: ResourceChange;
}

export interface CostDelta {
  folder: string;
  currency: string;
  baselineTotal: number;
  newTotal: number;
  /** Always newTotal - baselineTotal */
  absolute: number;
  percent: PercentChange;
  /** Sorted by |absolute| descending, then address */
  resources: ResourceDelta[];
}

// ============================================================================
// Schemas (artifact validation)
// ============================================================================

export const CostSnapshotSchema = z.object({
  currency: z.string().min(1),
  totalMonthlyCost: z.number().finite(),
  resources: z.record(z.string(), z.number().finite()),
});

const PercentChangeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('percent'), value: z.number().finite() }),
  z.object({ kind: z.literal('new') }),
]);

const ResourceDeltaSchema = z.object({
  address: z.string(),
  baseline: z.number().finite(),
  next: z.number().finite(),
  absolute: z.number().finite(),
  change: z.enum(['added', 'removed', 'changed', 'unchanged']),
});

export const CostDeltaSchema = z.object({
  folder: z.string().min(1),
  currency: z.string().min(1),
  baselineTotal: z.number().finite(),
  newTotal: z.number().finite(),
  absolute: z.number().finite(),
  percent: PercentChangeSchema,
  resources: z.array(ResourceDeltaSchema),
});
