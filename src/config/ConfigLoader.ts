/**
 * Configuration Loader
 *
 * Loads insight-bank.yaml, merges it over the defaults and applies
 * environment overrides.
 */

import { readFileSync, writeFileSync, existsSync } from 'fs';
import { join, dirname, isAbsolute, resolve } from 'path';
import { config as loadDotenv } from 'dotenv';
import { ConfigurationError } from '../core/errors.js';
import { PROVIDERS, type Provider } from '../providers/types.js';
import {
  DEFAULT_KIT_CONFIGURATION,
  LINT_RULES,
  type KitConfiguration,
  type LintRule
} from './types.js';

export const CONFIG_FILE_NAMES = [
  'insight-bank.yaml',
  'insight-bank.yml',
  '.insight-bank.yaml',
  '.insight-bank.yml'
];

interface YamlFrame {
  container: Record<string, unknown>;
  indent: number;
  parent?: Record<string, unknown>;
  key?: string;
  array?: unknown[];
}

/**
 * Minimal YAML reader for our config structure
 * Supports:
 * - Key-value pairs
 * - Nested objects (indentation-based)
 * - Block arrays (dash prefix) and inline arrays
 * - Strings, numbers, booleans, null
 * - Comments (# prefix)
 */
export function parseYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: YamlFrame[] = [{ container: result, indent: -1 }];

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const indent = line.search(/\S/);
    const isItem = trimmed === '-' || trimmed.startsWith('- ');

    while (stack.length > 1) {
      const top = stack[stack.length - 1];
      if (indent > top.indent) break;
      // A block array may sit at the same indent as its key
      if (isItem && indent === top.indent && (top.array || Object.keys(top.container).length === 0)) break;
      stack.pop();
    }
    const frame = stack[stack.length - 1];

    if (isItem) {
      // Array item belongs to the key that opened the current frame
      if (!frame.array && frame.parent && frame.key !== undefined) {
        frame.array = [];
        frame.parent[frame.key] = frame.array;
      }
      frame.array?.push(parseValue(trimmed.substring(1).trim()));
      continue;
    }

    const colonIndex = trimmed.indexOf(':');
    if (colonIndex === -1) continue;

    const key = trimmed.substring(0, colonIndex).trim();
    const valueStr = trimmed.substring(colonIndex + 1).trim();

    if (valueStr === '') {
      const nested: Record<string, unknown> = {};
      frame.container[key] = nested;
      stack.push({ container: nested, indent, parent: frame.container, key });
    } else {
      frame.container[key] = parseValue(valueStr);
    }
  }

  return result;
}

/**
 * Parse a YAML scalar or inline array
 */
function parseValue(str: string): unknown {
  if ((str.startsWith('"') && str.endsWith('"') && str.length >= 2) ||
      (str.startsWith("'") && str.endsWith("'") && str.length >= 2)) {
    return str.slice(1, -1);
  }

  if (str === 'true') return true;
  if (str === 'false') return false;
  if (str === 'null' || str === '~' || str === '') return null;

  const num = Number(str);
  if (!isNaN(num)) return num;

  if (str.startsWith('[') && str.endsWith(']')) {
    const inner = str.slice(1, -1).trim();
    if (inner === '') return [];
    return inner.split(',').map(s => parseValue(s.trim()));
  }

  return str;
}

export interface LoadOptions {
  /** Explicit config path; skips the directory search */
  path?: string;
  /** Where the directory search starts */
  cwd?: string;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Load a .env file from cwd before reading the environment */
  loadDotenv?: boolean;
}

export interface LoadedConfiguration {
  config: KitConfiguration;
  /** File the configuration came from, null when only defaults applied */
  path: string | null;
}

/**
 * ConfigLoader class
 *
 * Handles loading and saving YAML configuration files.
 */
export class ConfigLoader {
  /**
   * Load configuration from file (if any) and environment
   */
  load(options: LoadOptions = {}): LoadedConfiguration {
    const cwd = options.cwd ?? process.cwd();

    if (options.loadDotenv) {
      loadDotenv({ path: join(cwd, '.env') });
    }
    const env = options.env ?? process.env;

    const explicitPath = options.path ?? env.INSIGHT_BANK_CONFIG;
    let path: string | null = null;
    if (explicitPath) {
      path = isAbsolute(explicitPath) ? explicitPath : resolve(cwd, explicitPath);
    } else {
      path = this.findConfigFile(cwd);
    }

    const raw = path ? this.loadYaml(path) : {};
    const config = this.applyEnvironment(this.parseRawConfig(raw), env);
    return { config, path };
  }

  /**
   * Load configuration from a YAML file
   */
  loadYaml(path: string): Record<string, unknown> {
    if (!existsSync(path)) {
      throw new ConfigurationError([`Configuration file not found: ${path}`]);
    }

    const content = readFileSync(path, 'utf-8');
    return parseYaml(content);
  }

  /**
   * Save configuration to a YAML file
   */
  saveYaml(path: string, config: KitConfiguration): void {
    writeFileSync(path, this.generateYaml(config), 'utf-8');
  }

  /**
   * Generate YAML content from configuration
   */
  generateYaml(config: KitConfiguration): string {
    let yaml = `# Insight Bank Kit Configuration
# Version: ${config.version}

version: "${config.version}"
dataDir: "${config.dataDir}"

# Archive layout
archive:
  root: "${config.archive.root}"
  sourceTemplate: "${config.archive.sourceTemplate}"
  patterns:
`;
    for (const pattern of config.archive.patterns) {
      yaml += `    - "${pattern}"\n`;
    }

    yaml += `
# Content quality rules
lint:
  minChars: ${config.lint.minChars}
  maxChars: ${config.lint.maxChars}
  minEntries: ${config.lint.minEntries}
  maxEntries: ${config.lint.maxEntries}
`;
    if (config.lint.disabledRules.length === 0) {
      yaml += `  disabledRules: []\n`;
    } else {
      yaml += `  disabledRules:\n`;
      for (const rule of config.lint.disabledRules) {
        yaml += `    - ${rule}\n`;
      }
    }

    yaml += `
# Duplicate detection
dedupe:
  nearThreshold: ${config.dedupe.nearThreshold}

# LLM generation (API key comes from ANTHROPIC_API_KEY)
generation:
  provider: ${config.generation.provider}
  model: "${config.generation.model}"
  endpoint: "${config.generation.endpoint}"
  maxTokens: ${config.generation.maxTokens}
  temperature: ${config.generation.temperature}
  maxAttempts: ${config.generation.maxAttempts}
  batchSize: ${config.generation.batchSize}
  logResponses: ${config.generation.logResponses}

# SQLite insight catalog
catalog:
  sqlitePath: "${config.catalog.sqlitePath}"
  enableWAL: ${config.catalog.enableWAL}

# Release manifest
export:
  datasetName: "${config.export.datasetName}"
  datasetVersion: "${config.export.datasetVersion}"
`;

    return yaml;
  }

  /**
   * Find configuration file in the start directory and its parents
   */
  findConfigFile(startDir?: string): string | null {
    let currentDir = startDir || process.cwd();

    // Search up to 10 levels
    for (let i = 0; i < 10; i++) {
      for (const name of CONFIG_FILE_NAMES) {
        const configPath = join(currentDir, name);
        if (existsSync(configPath)) {
          return configPath;
        }
      }

      const parentDir = dirname(currentDir);
      if (parentDir === currentDir) {
        break;
      }
      currentDir = parentDir;
    }

    return null;
  }

  /**
   * Parse raw YAML config to typed configuration, falling back to defaults
   */
  parseRawConfig(raw: Record<string, unknown>): KitConfiguration {
    const defaults = DEFAULT_KIT_CONFIGURATION;

    return {
      version: typeof raw.version === 'string' || typeof raw.version === 'number'
        ? String(raw.version)
        : defaults.version,
      dataDir: this.getString(raw, 'dataDir', defaults.dataDir),

      archive: {
        root: this.getString(raw.archive, 'root', defaults.archive.root),
        patterns: this.getStringArray(raw.archive, 'patterns', defaults.archive.patterns),
        sourceTemplate: this.getString(raw.archive, 'sourceTemplate', defaults.archive.sourceTemplate)
      },

      lint: {
        minChars: this.getNumber(raw.lint, 'minChars', defaults.lint.minChars),
        maxChars: this.getNumber(raw.lint, 'maxChars', defaults.lint.maxChars),
        minEntries: this.getNumber(raw.lint, 'minEntries', defaults.lint.minEntries),
        maxEntries: this.getNumber(raw.lint, 'maxEntries', defaults.lint.maxEntries),
        disabledRules: this.getStringArray(raw.lint, 'disabledRules', defaults.lint.disabledRules)
          .filter((rule): rule is LintRule => LINT_RULES.some(known => known === rule))
      },

      dedupe: {
        nearThreshold: this.getNumber(raw.dedupe, 'nearThreshold', defaults.dedupe.nearThreshold)
      },

      generation: {
        provider: this.getProvider(raw.generation, defaults.generation.provider),
        model: this.getString(raw.generation, 'model', defaults.generation.model),
        endpoint: this.getString(raw.generation, 'endpoint', defaults.generation.endpoint),
        maxTokens: this.getNumber(raw.generation, 'maxTokens', defaults.generation.maxTokens),
        temperature: this.getNumber(raw.generation, 'temperature', defaults.generation.temperature),
        maxAttempts: this.getNumber(raw.generation, 'maxAttempts', defaults.generation.maxAttempts),
        batchSize: this.getNumber(raw.generation, 'batchSize', defaults.generation.batchSize),
        logResponses: this.getBoolean(raw.generation, 'logResponses', defaults.generation.logResponses)
      },

      catalog: {
        sqlitePath: this.getString(raw.catalog, 'sqlitePath', defaults.catalog.sqlitePath),
        enableWAL: this.getBoolean(raw.catalog, 'enableWAL', defaults.catalog.enableWAL)
      },

      export: {
        datasetName: this.getString(raw.export, 'datasetName', defaults.export.datasetName),
        datasetVersion: this.getString(raw.export, 'datasetVersion', defaults.export.datasetVersion)
      }
    };
  }

  /**
   * Environment variables win over the file
   */
  applyEnvironment(config: KitConfiguration, env: NodeJS.ProcessEnv): KitConfiguration {
    return {
      ...config,
      dataDir: env.INSIGHT_BANK_DATA_DIR || config.dataDir,
      generation: {
        ...config.generation,
        model: env.INSIGHT_BANK_MODEL || config.generation.model,
        apiKey: env.ANTHROPIC_API_KEY || config.generation.apiKey
      }
    };
  }

  private getProvider(obj: unknown, defaultValue: Provider): Provider {
    const value = this.getString(obj, 'provider', defaultValue);
    const match = PROVIDERS.find(provider => provider === value);
    return match ?? defaultValue;
  }

  /**
   * Get nested boolean value with default
   */
  private getBoolean(obj: unknown, key: string, defaultValue: boolean): boolean {
    const value = this.getField(obj, key);
    if (typeof value === 'boolean') return value;
    if (value === 'true') return true;
    if (value === 'false') return false;
    return defaultValue;
  }

  /**
   * Get nested number value with default
   */
  private getNumber(obj: unknown, key: string, defaultValue: number): number {
    const value = this.getField(obj, key);
    if (typeof value === 'number') return value;
    if (typeof value === 'string') {
      const parsed = Number(value);
      if (!isNaN(parsed)) return parsed;
    }
    return defaultValue;
  }

  /**
   * Get nested string value with default
   */
  private getString(obj: unknown, key: string, defaultValue: string): string {
    const value = this.getField(obj, key);
    if (typeof value === 'string') return value;
    return defaultValue;
  }

  /**
   * Get nested string array with default
   */
  private getStringArray(obj: unknown, key: string, defaultValue: string[]): string[] {
    const value = this.getField(obj, key);
    if (Array.isArray(value)) {
      return value.filter((v): v is string => typeof v === 'string');
    }
    return defaultValue;
  }

  private getField(obj: unknown, key: string): unknown {
    if (!obj || typeof obj !== 'object' || Array.isArray(obj)) return undefined;
    return Object.entries(obj).find(([name]) => name === key)?.[1];
  }
}

/**
 * Check a configuration for values that would break later commands
 */
export function validateConfig(
  config: KitConfiguration,
  options: { requireApiKey?: boolean } = {}
): string[] {
  const errors: string[] = [];

  if (options.requireApiKey && config.generation.provider === 'claude' && !config.generation.apiKey) {
    errors.push('ANTHROPIC_API_KEY environment variable is required for generation');
  }

  if (config.lint.minChars < 0 || config.lint.maxChars <= config.lint.minChars) {
    errors.push('lint.maxChars must be greater than lint.minChars (and minChars non-negative)');
  }

  if (config.lint.minEntries < 1 || config.lint.maxEntries < config.lint.minEntries) {
    errors.push('lint.minEntries must be at least 1 and not above lint.maxEntries');
  }

  if (config.dedupe.nearThreshold <= 0 || config.dedupe.nearThreshold > 1) {
    errors.push('dedupe.nearThreshold must be between 0 and 1');
  }

  if (!Number.isInteger(config.generation.maxAttempts) || config.generation.maxAttempts < 1) {
    errors.push('generation.maxAttempts must be a positive integer');
  }

  if (!Number.isInteger(config.generation.batchSize) || config.generation.batchSize < 1) {
    errors.push('generation.batchSize must be a positive integer');
  }

  if (config.generation.temperature < 0 || config.generation.temperature > 1) {
    errors.push('generation.temperature must be between 0 and 1');
  }

  return errors;
}

/**
 * Resolve a path from the configuration against its data directory
 */
export function resolveDataPath(config: KitConfiguration, path: string): string {
  return isAbsolute(path) ? path : join(config.dataDir, path);
}
