/**
 * Cost Artifact Store
 *
 * Per-folder cost files that merge runs leave behind for later PR runs
 * (as a baseline) and for the scheduled rollup:
 *
 *   <root>/<folder-slug>/baseline.json
 *   <root>/<folder-slug>/new.json
 *   <root>/<folder-slug>/delta.json
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { DataError, formatZodIssues } from '../errors/index.js';
import type { Logger } from '../logging/index.js';
import { CostDeltaSchema, CostSnapshotSchema, type CostDelta, type CostSnapshot } from './types.js';

export const BASELINE_FILE = 'baseline.json';
export const NEW_FILE = 'new.json';
export const DELTA_FILE = 'delta.json';
export const ROLLUP_JSON_FILE = 'rollup.json';
export const ROLLUP_MARKDOWN_FILE = 'rollup.md';
export const RAW_INFRACOST_FILE = 'infracost.json';

export function folderSlug(folder: string): string {
  const slug = folder
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-|-$/g, '');
  return slug || 'root';
}

/** Serialized form; stable key order for byte-identical re-runs */
export function serializeArtifact(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export class ArtifactStore {
  private rootDir: string;
  private logger?: Logger;

  constructor(rootDir: string, logger?: Logger) {
    this.rootDir = rootDir;
    this.logger = logger;
  }

  folderDir(folder: string): string {
    return join(this.rootDir, folderSlug(folder));
  }

  async ensureFolder(folder: string): Promise<string> {
    const dir = this.folderDir(folder);
    await mkdir(dir, { recursive: true });
    return dir;
  }

  /**
   * Last persisted "new" snapshot for a folder, i.e. the cost of what
   * was deployed by the previous merge run
   */
  async readLatestSnapshot(folder: string): Promise<CostSnapshot | null> {
    return this.readSnapshotFile(join(this.folderDir(folder), NEW_FILE));
  }

  async readSnapshotFile(path: string): Promise<CostSnapshot | null> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new DataError(`Cannot read cost snapshot ${path}`, { cause: error });
    }
    return parseJsonWith(path, content, raw => {
      const parsed = CostSnapshotSchema.safeParse(raw);
      if (!parsed.success) {
        throw new DataError(`Malformed cost snapshot ${path}: ${formatZodIssues(parsed.error)}`);
      }
      return parsed.data;
    });
  }

  async writeRun(folder: string, baseline: CostSnapshot, next: CostSnapshot, delta: CostDelta): Promise<string> {
    const dir = await this.ensureFolder(folder);
    await writeFile(join(dir, BASELINE_FILE), serializeArtifact(baseline));
    await writeFile(join(dir, NEW_FILE), serializeArtifact(next));
    await writeFile(join(dir, DELTA_FILE), serializeArtifact(delta));
    this.logger?.info(`Wrote cost artifacts for "${folder}" to ${dir}`);
    return dir;
  }

  async writeRollup(json: unknown, markdown: string): Promise<{ jsonPath: string; markdownPath: string }> {
    await mkdir(this.rootDir, { recursive: true });
    const jsonPath = join(this.rootDir, ROLLUP_JSON_FILE);
    const markdownPath = join(this.rootDir, ROLLUP_MARKDOWN_FILE);
    await writeFile(jsonPath, serializeArtifact(json));
    await writeFile(markdownPath, markdown);
    this.logger?.info(`Wrote rollup to ${jsonPath}`);
    return { jsonPath, markdownPath };
  }
}

/**
 * Parse and validate one delta artifact
 *
 * @throws {DataError} on invalid JSON or shape
 */
export function parseDeltaArtifact(path: string, content: string): CostDelta {
  return parseJsonWith(path, content, raw => {
    const parsed = CostDeltaSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DataError(`Malformed cost delta ${path}: ${formatZodIssues(parsed.error)}`);
    }
    return parsed.data;
  });
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function parseJsonWith<T>(path: string, content: string, validate: (raw: unknown) => T): T {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new DataError(`Invalid JSON in ${path}`, { cause: error });
  }
  return validate(raw);
}

export function createArtifactStore(rootDir: string, logger?: Logger): ArtifactStore {
  return new ArtifactStore(rootDir, logger);
}
