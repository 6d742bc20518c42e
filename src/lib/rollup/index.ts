/**
 * Rollup Module
 *
 * Provides:
 * - Loading of per-folder delta artifacts with per-folder error isolation
 * - Deterministic aggregation into one cost rollup
 */

export {
  aggregate,
  loadDeltaArtifacts,
  type AggregateOptions,
  type LoadedArtifacts,
  type RollupReport,
  type SkippedFolder,
  type WeightedPercent,
} from './aggregator.js';
