/**
 * Configuration Types
 *
 * Shape of insight-bank.yaml and its defaults.
 */

import type { Provider } from '../providers/types.js';

export const LINT_RULES = [
  'category-size',
  'entry-length',
  'whitespace',
  'artifact',
  'duplicate-entry',
  'absolute-claim',
  'jargon',
  'master-reduction'
] as const;

export type LintRule = (typeof LINT_RULES)[number];

export interface ArchiveConfig {
  /** Directory scanned when a command is given no paths */
  root: string;
  /** Glob patterns, relative to the root */
  patterns: string[];
  /** Source name for written banks; {number} is replaced */
  sourceTemplate: string;
}

export interface LintConfig {
  minChars: number;
  maxChars: number;
  minEntries: number;
  maxEntries: number;
  disabledRules: LintRule[];
}

export interface DedupeConfig {
  /** Similarity (0-1) at or above which two entries count as near duplicates */
  nearThreshold: number;
}

export interface GenerationConfig {
  provider: Provider;
  model: string;
  /** Base URL for the ollama provider */
  endpoint: string;
  maxTokens: number;
  temperature: number;
  maxAttempts: number;
  batchSize: number;
  logResponses: boolean;
  /** Only ever read from the environment */
  apiKey?: string;
}

export interface CatalogConfig {
  /** Relative paths resolve against dataDir */
  sqlitePath: string;
  enableWAL: boolean;
}

export interface ExportConfig {
  datasetName: string;
  datasetVersion: string;
}

export interface KitConfiguration {
  version: string;
  dataDir: string;
  archive: ArchiveConfig;
  lint: LintConfig;
  dedupe: DedupeConfig;
  generation: GenerationConfig;
  catalog: CatalogConfig;
  export: ExportConfig;
}

export const DEFAULT_KIT_CONFIGURATION: KitConfiguration = {
  version: '1.0',
  dataDir: './data',
  archive: {
    root: './content',
    patterns: ['**/*.md', '**/*.json'],
    sourceTemplate: 'NumberMessages_Complete_{number}'
  },
  lint: {
    minChars: 20,
    maxChars: 320,
    minEntries: 15,
    maxEntries: 20,
    disabledRules: []
  },
  dedupe: {
    nearThreshold: 0.95
  },
  generation: {
    provider: 'claude',
    model: 'claude-sonnet-4-20250514',
    endpoint: 'http://localhost:11434',
    maxTokens: 8192,
    temperature: 0.7,
    maxAttempts: 3,
    batchSize: 15,
    logResponses: true
  },
  catalog: {
    sqlitePath: 'catalog.db',
    enableWAL: true
  },
  export: {
    datasetName: 'numerology-insight-banks',
    datasetVersion: 'v1'
  }
};
