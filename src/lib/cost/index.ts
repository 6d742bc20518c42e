/**
 * Cost Module
 *
 * Provides:
 * - Infracost breakdown parsing into cost snapshots
 * - Snapshot diffing with per-resource deltas
 * - Per-folder artifact persistence for later runs
 */

export {
  CostSnapshotSchema,
  CostDeltaSchema,
  type CostSnapshot,
  type CostDelta,
  type PercentChange,
  type ResourceChange,
  type ResourceDelta,
} from './types.js';

export { diff, emptySnapshot, isZeroDelta, percentChange } from './diff.js';

export {
  InfracostCli,
  createInfracostCli,
  parseInfracostJson,
  type InfracostCliOptions,
} from './infracost.js';

export {
  ArtifactStore,
  createArtifactStore,
  folderSlug,
  parseDeltaArtifact,
  serializeArtifact,
  BASELINE_FILE,
  NEW_FILE,
  DELTA_FILE,
  ROLLUP_JSON_FILE,
  ROLLUP_MARKDOWN_FILE,
  RAW_INFRACOST_FILE,
} from './artifacts.js';
