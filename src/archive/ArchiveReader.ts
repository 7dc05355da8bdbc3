/**
 * ArchiveReader - Loads archive files from disk.
 *
 * Bad JSON inside a file is reported as an issue on its document;
 * only I/O failures throw.
 */

import { readFileSync } from 'fs';
import { relative, resolve, sep } from 'path';
import { glob } from 'glob';
import { ArchiveParseError } from '../core/errors.js';
import type { ArchiveDocument } from '../core/types.js';
import { isBundle, parseArchiveText, splitBundle } from './ArchiveParser.js';

export const DEFAULT_ARCHIVE_PATTERNS = ['**/*.md', '**/*.json', '**/*.txt'];

export interface ArchiveReaderOptions {
  quiet?: boolean;
}

export class ArchiveReader {
  private quiet: boolean;

  constructor(options: ArchiveReaderOptions = {}) {
    this.quiet = options.quiet ?? false;
  }

  /**
   * Read one file. A file holding `=== path ===` delimiters yields one
   * document per bundled file.
   */
  readFile(path: string, displayPath: string = path): ArchiveDocument[] {
    const text = this.readText(path);
    if (isBundle(text)) {
      return this.parseBundle(text, displayPath);
    }
    return [parseArchiveText(displayPath, text)];
  }

  /**
   * Read a bundle file; records are named by their delimiter paths.
   */
  readBundle(path: string, displayPath: string = path): ArchiveDocument[] {
    return this.parseBundle(this.readText(path), displayPath);
  }

  /**
   * Read every matching file under a directory, in path order. Document
   * paths are relative to the directory, with forward slashes.
   */
  async readDirectory(dir: string, patterns: string[] = DEFAULT_ARCHIVE_PATTERNS): Promise<ArchiveDocument[]> {
    const root = resolve(dir);
    const files = new Set<string>();
    for (const pattern of patterns) {
      const matches = await glob(pattern, {
        cwd: root,
        nodir: true,
        absolute: true,
        ignore: ['**/node_modules/**', '**/generation-logs/**']
      });
      for (const match of matches) files.add(match);
    }

    const documents: ArchiveDocument[] = [];
    for (const file of [...files].sort()) {
      const display = relative(root, file).split(sep).join('/');
      documents.push(...this.readFile(file, display));
    }

    if (!this.quiet) {
      const banks = documents.reduce((sum, doc) => sum + doc.banks.length, 0);
      console.log(`[ArchiveReader] Read ${documents.length} document(s), ${banks} bank(s) from ${root}`);
    }
    return documents;
  }

  private parseBundle(text: string, bundle: string): ArchiveDocument[] {
    return splitBundle(text).map(record => ({ ...parseArchiveText(record.path, record.content), bundle }));
  }

  private readText(path: string): string {
    try {
      return readFileSync(path, 'utf-8');
    } catch (error) {
      throw new ArchiveParseError(path, error instanceof Error ? error.message : String(error));
    }
  }
}
