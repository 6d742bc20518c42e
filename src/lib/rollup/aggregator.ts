/**
 * Rollup Aggregator
 *
 * Combines the per-folder cost deltas left by merge runs into one
 * report. Folders are ordered by path so identical inputs always give
 * byte-identical output.
 */

import { readdir, readFile, stat } from 'fs/promises';
import { join } from 'path';
import { DELTA_FILE, isZeroDelta, parseDeltaArtifact, type CostDelta } from '../cost/index.js';
import { ConfigurationError, DataError, describeError } from '../errors/index.js';
import type { Logger } from '../logging/index.js';

// ============================================================================
// Types
// ============================================================================

export type WeightedPercent =
  | { kind: 'percent'; value: number }
  /** every baseline was 0 */
  | { kind: 'not-applicable' };

export interface SkippedFolder {
  folder: string;
  reason: string;
}

export interface RollupReport {
  currency: string;
  folders: CostDelta[];
  grandTotalAbsolute: number;
  grandTotalBaseline: number;
  grandTotalNew: number;
  weightedPercent: WeightedPercent;
  /** Folders whose delta is non-zero */
  changedCount: number;
  unchangedCount: number;
  skipped: SkippedFolder[];
}

export interface LoadedArtifacts {
  deltas: CostDelta[];
  skipped: SkippedFolder[];
}

export interface AggregateOptions {
  /** Expected currency; defaults to the first folder's */
  currency?: string;
  /** Skips found while loading, carried into the report */
  skipped?: SkippedFolder[];
}

// ============================================================================
// Loading
// ============================================================================

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Read `<inputDir>/<any>/delta.json` (and `<inputDir>/delta.json`).
 * Unreadable folders are reported in `skipped`, never thrown.
 *
 * @throws {ConfigurationError} when inputDir itself doesn't exist
 */
export async function loadDeltaArtifacts(inputDir: string, logger?: Logger): Promise<LoadedArtifacts> {
  if (!(await isDirectory(inputDir))) {
    throw new ConfigurationError(`Rollup input directory does not exist: ${inputDir}`);
  }

  const entries = (await readdir(inputDir, { withFileTypes: true })).sort((a, b) =>
    compareText(a.name, b.name)
  );

  const candidates: Array<{ label: string; path: string }> = [];
  if (entries.some(e => e.isFile() && e.name === DELTA_FILE)) {
    candidates.push({ label: '.', path: join(inputDir, DELTA_FILE) });
  }
  for (const entry of entries) {
    if (entry.isDirectory()) {
      candidates.push({ label: entry.name, path: join(inputDir, entry.name, DELTA_FILE) });
    }
  }

  const deltas: CostDelta[] = [];
  const skipped: SkippedFolder[] = [];

  for (const candidate of candidates) {
    let content: string;
    try {
      content = await readFile(candidate.path, 'utf-8');
    } catch {
      const reason = `missing ${DELTA_FILE}`;
      logger?.warn(`Skipping ${candidate.label}: ${reason}`);
      skipped.push({ folder: candidate.label, reason });
      continue;
    }

    try {
      deltas.push(parseDeltaArtifact(candidate.path, content));
    } catch (error) {
      const reason = describeError(error);
      logger?.warn(`Skipping ${candidate.label}: ${reason}`);
      skipped.push({ folder: candidate.label, reason });
    }
  }

  return { deltas, skipped };
}

// ============================================================================
// Aggregation
// ============================================================================

/**
 * @throws {DataError} when no folder is usable
 */
export function aggregate(folderArtifacts: CostDelta[], options: AggregateOptions = {}): RollupReport {
  const skipped: SkippedFolder[] = [...(options.skipped ?? [])];
  const sorted = [...folderArtifacts].sort((a, b) => compareText(a.folder, b.folder));

  const currency = options.currency ?? sorted[0]?.currency;
  const folders: CostDelta[] = [];
  const seen = new Set<string>();

  for (const delta of sorted) {
    if (seen.has(delta.folder)) {
      skipped.push({ folder: delta.folder, reason: 'duplicate folder' });
      continue;
    }
    if (delta.currency !== currency) {
      skipped.push({
        folder: delta.folder,
        reason: `currency ${delta.currency} does not match ${currency}`,
      });
      continue;
    }
    seen.add(delta.folder);
    folders.push(delta);
  }

  if (folders.length === 0 || currency === undefined) {
    throw new DataError('No readable cost artifacts to roll up');
  }

  let grandTotalAbsolute = 0;
  let grandTotalBaseline = 0;
  let grandTotalNew = 0;
  let changedCount = 0;

  for (const delta of folders) {
    grandTotalAbsolute += delta.absolute;
    grandTotalBaseline += delta.baselineTotal;
    grandTotalNew += delta.newTotal;
    if (!isZeroDelta(delta)) changedCount++;
  }

  return {
    currency,
    folders,
    grandTotalAbsolute,
    grandTotalBaseline,
    grandTotalNew,
    weightedPercent:
      grandTotalBaseline === 0
        ? { kind: 'not-applicable' }
        : { kind: 'percent', value: (grandTotalAbsolute / grandTotalBaseline) * 100 },
    changedCount,
    unchangedCount: folders.length - changedCount,
    skipped: skipped.sort((a, b) => compareText(a.folder, b.folder)),
  };
}
