/**
 * ManifestBuilder Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, unlinkSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { buildManifest, datasetDigest, parseManifest, verifyManifest } from './ManifestBuilder.js';

const HELLO_SHA = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';
const ABC_SHA = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

describe('ManifestBuilder', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'insight-manifest-'));
    mkdirSync(join(dir, 'banks'));
    writeFileSync(join(dir, 'essay.md'), 'hello');
    writeFileSync(join(dir, 'banks', 'two.json'), 'abc');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const inputs = [
    { path: 'essay.md', category: 'essay' as const },
    { path: 'banks/two.json', category: 'bank' as const }
  ];

  it('lists files in path order with hashes and sizes', () => {
    const manifest = buildManifest(dir, inputs, {
      datasetName: 'test-set',
      datasetVersion: 'v2',
      now: new Date('2025-01-15T08:00:00.000Z')
    });

    expect(manifest.manifest_version).toBe('1.0');
    expect(manifest.generated_at).toBe('2025-01-15T08:00:00.000Z');
    expect(manifest.dataset_name).toBe('test-set');
    expect(manifest.total_files).toBe(2);
    expect(manifest.total_bytes).toBe(8);
    expect(manifest.files).toEqual([
      { path: 'banks/two.json', filename: 'two.json', category: 'bank', sha256: ABC_SHA, bytes: 3 },
      { path: 'essay.md', filename: 'essay.md', category: 'essay', sha256: HELLO_SHA, bytes: 5 }
    ]);
    expect(manifest.dataset_digest).toBe('08c1475211c391bbe4ce90af37a55102ded7518e1f7ca6e4ab165d76312bc48c');
  });

  it('computes the same digest regardless of input order', () => {
    const forward = datasetDigest([{ path: 'a', sha256: ABC_SHA }, { path: 'b', sha256: HELLO_SHA }]);
    const backward = datasetDigest([{ path: 'b', sha256: HELLO_SHA }, { path: 'a', sha256: ABC_SHA }]);
    expect(forward).toBe(backward);
  });

  it('verifies an untouched archive', () => {
    const manifest = buildManifest(dir, inputs, { datasetName: 'test-set', datasetVersion: 'v2' });
    const round = parseManifest(JSON.stringify(manifest));

    expect(verifyManifest(round, dir)).toEqual({
      valid: true,
      mismatched: [],
      missing: [],
      digestMatches: true
    });
  });

  it('reports edited and missing files', () => {
    const manifest = buildManifest(dir, inputs, { datasetName: 'test-set', datasetVersion: 'v2' });
    writeFileSync(join(dir, 'essay.md'), 'hellO');
    unlinkSync(join(dir, 'banks', 'two.json'));

    const result = verifyManifest(manifest, dir);

    expect(result.valid).toBe(false);
    expect(result.mismatched).toEqual(['essay.md']);
    expect(result.missing).toEqual(['banks/two.json']);
    expect(result.digestMatches).toBe(true);
  });

  it('flags a tampered digest', () => {
    const manifest = buildManifest(dir, inputs, { datasetName: 'test-set', datasetVersion: 'v2' });
    const result = verifyManifest({ ...manifest, dataset_digest: '0'.repeat(64) }, dir);

    expect(result.digestMatches).toBe(false);
    expect(result.valid).toBe(false);
  });

  it('rejects a manifest with the wrong shape', () => {
    expect(() => parseManifest('{"manifest_version": "1.0"}')).toThrow();
  });
});
