/**
 * Shared CLI helpers: configuration, archive loading and failure output.
 */

import { existsSync, statSync } from 'fs';
import { resolve } from 'path';
import chalk from 'chalk';
import type { Ora } from 'ora';
import { ArchiveReader } from '../archive/ArchiveReader.js';
import { ConfigLoader, validateConfig } from '../config/ConfigLoader.js';
import type { KitConfiguration } from '../config/types.js';
import { ConfigurationError } from '../core/errors.js';
import { getSanitizer } from '../core/OutputSanitizer.js';
import { isBankNumber, type ArchiveDocument, type BankNumber } from '../core/types.js';
import type { SourcedBank } from '../dedupe/DuplicateDetector.js';

export interface GlobalOptions {
  config?: string;
  dataDir?: string;
  json?: boolean;
}

/**
 * Load and check the configuration. --data-dir overrides the file.
 */
export function loadKitConfig(options: GlobalOptions, check: { requireApiKey?: boolean } = {}): KitConfiguration {
  const { config } = new ConfigLoader().load({ path: options.config, loadDotenv: true });
  if (options.dataDir) {
    config.dataDir = options.dataDir;
  }

  const problems = validateConfig(config, check);
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return config;
}

export interface LoadedDocument {
  document: ArchiveDocument;
  /** File on disk the document can be rewritten at; null for bundle records */
  file: string | null;
}

/**
 * Read every path: directories through the configured patterns, files directly.
 * Falls back to the configured archive root when no paths are given.
 */
export async function collectDocuments(
  paths: string[],
  config: KitConfiguration,
  quiet: boolean
): Promise<LoadedDocument[]> {
  const reader = new ArchiveReader({ quiet });
  const targets = paths.length > 0 ? paths : [config.archive.root];
  const loaded: LoadedDocument[] = [];

  for (const target of targets) {
    if (!existsSync(target)) {
      throw new Error(`Path not found: ${target}`);
    }
    if (statSync(target).isDirectory()) {
      const documents = await reader.readDirectory(target, config.archive.patterns);
      for (const document of documents) {
        loaded.push({ document, file: document.bundle === undefined ? resolve(target, document.path) : null });
      }
    } else {
      for (const document of reader.readFile(target)) {
        loaded.push({ document, file: document.bundle === undefined ? resolve(target) : null });
      }
    }
  }
  return loaded;
}

export function sourcedBanks(documents: ArchiveDocument[]): SourcedBank[] {
  return documents.flatMap(document =>
    document.banks.map(bank => ({ path: document.path, tier: document.tier, bank }))
  );
}

export function parseBankNumber(value: string): BankNumber {
  const number = Number(value);
  if (!isBankNumber(number)) {
    throw new Error(`"${value}" is not a bank number (1-9, 11, 22, 33, 44)`);
  }
  return number;
}

export function parsePositiveInteger(value: string, label: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${label} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function today(): string {
  return new Date().toISOString().slice(0, 10);
}

/**
 * Stop the spinner with a failure line, print the error and exit 1.
 */
export function fail(spinner: Ora, label: string, error: unknown): never {
  spinner.fail(chalk.red(label));
  console.error(describeError(error));
  process.exit(1);
}

/**
 * Error text for the terminal with secrets redacted.
 */
export function describeError(error: unknown): string {
  const sanitizer = getSanitizer();
  return error instanceof Error ? sanitizer.sanitizeError(error).message : sanitizer.sanitize(String(error));
}
