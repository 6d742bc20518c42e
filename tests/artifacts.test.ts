/**
 * Cost Artifact Store Tests
 */

import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import {
  ArtifactStore,
  createArtifactStore,
  diff,
  folderSlug,
  parseDeltaArtifact,
  serializeArtifact,
  type CostSnapshot,
} from '../src/lib/cost/index.js';
import { DataError } from '../src/lib/errors/index.js';

const TEST_DIR = './test-artifacts';

const baseline: CostSnapshot = { currency: 'USD', totalMonthlyCost: 40, resources: { 'aws_instance.web': 40 } };
const next: CostSnapshot = {
  currency: 'USD',
  totalMonthlyCost: 55,
  resources: { 'aws_instance.web': 40, 'aws_eip.ip': 15 },
};

describe('folderSlug', () => {
  it('turns folder paths into directory names', () => {
    expect(folderSlug('infra/prod')).toBe('infra-prod');
    expect(folderSlug('Infra/Prod_EU ')).toBe('infra-prod-eu');
    expect(folderSlug('.')).toBe('root');
  });
});

describe('ArtifactStore', () => {
  let store: ArtifactStore;

  beforeEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
    store = createArtifactStore(TEST_DIR);
  });

  afterAll(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
  });

  it('writes baseline, new and delta files for a folder', async () => {
    const delta = diff(baseline, next, 'infra/prod');

    const dir = await store.writeRun('infra/prod', baseline, next, delta);

    expect(dir).toBe(join(TEST_DIR, 'infra-prod'));
    expect(await readFile(join(dir, 'baseline.json'), 'utf-8')).toBe(serializeArtifact(baseline));
    expect(await readFile(join(dir, 'new.json'), 'utf-8')).toBe(serializeArtifact(next));
    expect(parseDeltaArtifact('delta.json', await readFile(join(dir, 'delta.json'), 'utf-8'))).toEqual(delta);
  });

  it('reads back the last persisted snapshot', async () => {
    await store.writeRun('infra/prod', baseline, next, diff(baseline, next, 'infra/prod'));

    expect(await store.readLatestSnapshot('infra/prod')).toEqual(next);
  });

  it('returns null when a folder has no snapshot yet', async () => {
    expect(await store.readLatestSnapshot('infra/staging')).toBeNull();
  });

  it('rejects a malformed snapshot', async () => {
    const dir = await store.ensureFolder('infra/prod');
    await writeFile(join(dir, 'new.json'), JSON.stringify({ currency: 'USD', totalMonthlyCost: 'lots' }));

    await expect(store.readLatestSnapshot('infra/prod')).rejects.toThrow(DataError);
  });

  it('writes rollup files at the root', async () => {
    const paths = await store.writeRollup({ ok: true }, '# rollup\n');

    expect(paths).toEqual({
      jsonPath: join(TEST_DIR, 'rollup.json'),
      markdownPath: join(TEST_DIR, 'rollup.md'),
    });
    expect(await readFile(paths.jsonPath, 'utf-8')).toBe('{\n  "ok": true\n}\n');
    expect(await readFile(paths.markdownPath, 'utf-8')).toBe('# rollup\n');
  });
});

describe('parseDeltaArtifact', () => {
  it('rejects invalid JSON', () => {
    expect(() => parseDeltaArtifact('x/delta.json', '{')).toThrow('Invalid JSON in x/delta.json');
  });

  it('rejects a delta without a folder', () => {
    expect(() => parseDeltaArtifact('x/delta.json', '{"currency":"USD"}')).toThrow(DataError);
  });
});

describe('ArtifactStore folder layout', () => {
  it('keeps each folder in its own directory', async () => {
    const store = new ArtifactStore(TEST_DIR);
    await mkdir(TEST_DIR, { recursive: true });
    expect(store.folderDir('.')).toBe(join(TEST_DIR, 'root'));
    expect(store.folderDir('network/vpc')).toBe(join(TEST_DIR, 'network-vpc'));
  });
});
