/**
 * ManifestBuilder - File-level integrity manifest for an archive release.
 *
 * Every file is listed with its SHA-256 and size. The dataset digest is the
 * SHA-256 over one `path:sha256\n` line per file in path order, so it only
 * changes when a file is added, removed, renamed or edited.
 */

import { createHash } from 'crypto';
import { existsSync, readFileSync, statSync } from 'fs';
import { basename, join } from 'path';
import { z } from 'zod';
import type { DocumentKind } from '../core/types.js';

export const MANIFEST_VERSION = '1.0';

const ManifestFileSchema = z.object({
  path: z.string(),
  filename: z.string(),
  category: z.enum(['bank', 'essay', 'prompt']),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  bytes: z.number().int().nonnegative()
});

const ManifestSchema = z.object({
  manifest_version: z.string(),
  generated_at: z.string(),
  dataset_name: z.string(),
  dataset_version: z.string(),
  dataset_digest: z.string(),
  total_files: z.number().int().nonnegative(),
  total_bytes: z.number().int().nonnegative(),
  files: z.array(ManifestFileSchema)
});

export type ManifestFile = z.infer<typeof ManifestFileSchema>;
export type Manifest = z.infer<typeof ManifestSchema>;

export interface ManifestInput {
  /** Path relative to the archive root, `/` separated */
  path: string;
  category: DocumentKind;
}

export interface ManifestOptions {
  datasetName: string;
  datasetVersion: string;
  now?: Date;
}

export interface ManifestVerification {
  valid: boolean;
  /** Files whose hash or size no longer matches */
  mismatched: string[];
  missing: string[];
  digestMatches: boolean;
}

export function hashFile(path: string): string {
  return createHash('sha256').update(readFileSync(path)).digest('hex');
}

/**
 * Digest over the (path, hash) pairs of the files, in path order.
 */
export function datasetDigest(files: Array<Pick<ManifestFile, 'path' | 'sha256'>>): string {
  const hasher = createHash('sha256');
  const sorted = [...files].sort((a, b) => comparePaths(a.path, b.path));
  for (const file of sorted) {
    hasher.update(`${file.path}:${file.sha256}\n`, 'utf8');
  }
  return hasher.digest('hex');
}

function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function buildManifest(root: string, inputs: ManifestInput[], options: ManifestOptions): Manifest {
  const files: ManifestFile[] = [...inputs]
    .sort((a, b) => comparePaths(a.path, b.path))
    .map(input => {
      const absolute = join(root, input.path);
      return {
        path: input.path,
        filename: basename(input.path),
        category: input.category,
        sha256: hashFile(absolute),
        bytes: statSync(absolute).size
      };
    });

  return {
    manifest_version: MANIFEST_VERSION,
    generated_at: (options.now ?? new Date()).toISOString(),
    dataset_name: options.datasetName,
    dataset_version: options.datasetVersion,
    dataset_digest: datasetDigest(files),
    total_files: files.length,
    total_bytes: files.reduce((sum, file) => sum + file.bytes, 0),
    files
  };
}

/**
 * Parse a manifest read back from disk. Throws a ZodError on a bad shape.
 */
export function parseManifest(text: string): Manifest {
  return ManifestSchema.parse(JSON.parse(text));
}

export function verifyManifest(manifest: Manifest, root: string): ManifestVerification {
  const mismatched: string[] = [];
  const missing: string[] = [];

  for (const file of manifest.files) {
    const absolute = join(root, file.path);
    if (!existsSync(absolute)) {
      missing.push(file.path);
      continue;
    }
    if (statSync(absolute).size !== file.bytes || hashFile(absolute) !== file.sha256) {
      mismatched.push(file.path);
    }
  }

  const digestMatches = datasetDigest(manifest.files) === manifest.dataset_digest;

  return {
    valid: mismatched.length === 0 && missing.length === 0 && digestMatches,
    mismatched,
    missing,
    digestMatches
  };
}
