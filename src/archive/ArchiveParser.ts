/**
 * Archive Parser
 *
 * Pure functions that turn archive text into ArchiveDocuments:
 * bundle splitting, file name conventions, and markdown/JSON extraction.
 */

import { basename, extname } from 'path';
import { SOURCE_TIERS } from '../core/constants.js';
import {
  isBankNumber,
  type ArchiveDocument,
  type BankIssue,
  type BankNumber,
  type NumberInsightBank,
  type SourceTier
} from '../core/types.js';
import { parseBankJson } from '../schema/BankSchema.js';

// ==========================================
// BUNDLES
// ==========================================

export interface BundleRecord {
  path: string;
  content: string;
}

const BUNDLE_DELIMITER = /^=== (.+?) ===\s*$/;

export function isBundle(text: string): boolean {
  return text.split(/\r?\n/).some(line => BUNDLE_DELIMITER.test(line));
}

/**
 * Split a bundle on `=== <path> ===` lines. Text before the first
 * delimiter is dropped.
 */
export function splitBundle(text: string): BundleRecord[] {
  const records: BundleRecord[] = [];
  let current: { path: string; lines: string[] } | null = null;

  for (const line of text.split(/\r?\n/)) {
    const match = BUNDLE_DELIMITER.exec(line);
    if (match) {
      if (current) {
        records.push({ path: current.path, content: current.lines.join('\n').trim() });
      }
      current = { path: match[1].trim(), lines: [] };
    } else if (current) {
      current.lines.push(line);
    }
  }
  if (current) {
    records.push({ path: current.path, content: current.lines.join('\n').trim() });
  }

  return records;
}

// ==========================================
// FILE NAMES
// ==========================================

export interface ArchiveFileName {
  /** Stem without tier suffix or extension */
  source: string;
  tier: SourceTier;
  number?: BankNumber;
  extension: string;
}

/**
 * `NumberMessages_Complete_7_advanced.md` -> source NumberMessages_Complete_7,
 * tier advanced, number 7. The number is the last all-digit token that is a
 * bank number.
 */
export function parseArchiveFileName(name: string): ArchiveFileName {
  const file = basename(name);
  const extension = extname(file).toLowerCase();
  let stem = extension ? file.slice(0, -extension.length) : file;

  let tier: SourceTier = 'original';
  for (const candidate of SOURCE_TIERS) {
    const suffix = `_${candidate}`;
    if (stem.toLowerCase().endsWith(suffix)) {
      tier = candidate;
      stem = stem.slice(0, -suffix.length);
      break;
    }
  }

  let number: BankNumber | undefined;
  for (const token of stem.split(/[_\-\s.]+/)) {
    if (!/^\d+$/.test(token)) continue;
    const value = Number(token);
    if (isBankNumber(value)) number = value;
  }

  return { source: stem, tier, number, extension };
}

// ==========================================
// NUMBERS IN TITLES
// ==========================================

const NUMBER_WORDS: Record<string, BankNumber> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  eleven: 11,
  'twenty-two': 22,
  'twenty two': 22,
  'thirty-three': 33,
  'thirty three': 33,
  'forty-four': 44,
  'forty four': 44
};

/**
 * "Number 2", "number five", "Master Number 11" -> the bank number.
 */
export function numberFromTitle(title: string): BankNumber | undefined {
  const match = /\bnumber\s+(\d+|[a-z]+(?:[\s-][a-z]+)?)/i.exec(title);
  if (!match) return undefined;

  const token = match[1].toLowerCase();
  if (/^\d+$/.test(token)) {
    const value = Number(token);
    return isBankNumber(value) ? value : undefined;
  }
  return NUMBER_WORDS[token] ?? NUMBER_WORDS[token.split(/[\s-]/)[0]];
}

// ==========================================
// JSON EXTRACTION
// ==========================================

/**
 * JSON bodies inside markdown: fenced blocks tagged json, or bare fences
 * whose body starts with `{`. Without fences, the outermost object span.
 */
export function extractJsonBlocks(text: string): string[] {
  const blocks: string[] = [];
  const fence = /```([A-Za-z0-9_-]*)[^\n]*\n([\s\S]*?)```/g;

  let match: RegExpExecArray | null;
  while ((match = fence.exec(text)) !== null) {
    const language = match[1].toLowerCase();
    const body = match[2].trim();
    if (language === 'json' || (language === '' && body.startsWith('{'))) {
      blocks.push(body);
    }
  }
  if (blocks.length > 0) {
    return blocks;
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start && /^\{\s*"/.test(text.slice(start))) {
    blocks.push(text.slice(start, end + 1));
  }
  return blocks;
}

/**
 * Markdown exports sometimes escape brackets; retry with them unescaped.
 */
function parseJsonBody(body: string, fallbackNumber?: BankNumber): { banks: NumberInsightBank[]; issues: BankIssue[] } {
  const first = parseBankJson(body, { fallbackNumber });
  const unparseable = first.issues.some(issue => issue.code === 'invalid_json');
  if (unparseable && /\\[[\]]/.test(body)) {
    const retry = parseBankJson(body.replace(/\\\[/g, '[').replace(/\\\]/g, ']'), { fallbackNumber });
    if (!retry.issues.some(issue => issue.code === 'invalid_json')) {
      return retry;
    }
  }
  return first;
}

// ==========================================
// DOCUMENTS
// ==========================================

function firstLine(text: string, pattern: RegExp): string | undefined {
  for (const line of text.split(/\r?\n/)) {
    const match = pattern.exec(line);
    if (match) return match[1].trim();
  }
  return undefined;
}

function isPromptDocument(path: string, title?: string): boolean {
  return /prompt/i.test(basename(path)) || (title !== undefined && /\bprompt\b/i.test(title));
}

/**
 * Classify and read one markdown file.
 */
export function parseMarkdownDocument(path: string, text: string): ArchiveDocument {
  const name = parseArchiveFileName(path);
  const title = firstLine(text, /^#\s+(.+)$/);
  const heading = firstLine(text, /^##\s+(.+)$/);

  const base = {
    path,
    title,
    heading,
    source: name.source,
    tier: name.tier
  };

  if (isPromptDocument(path, title)) {
    return { ...base, kind: 'prompt', number: name.number, banks: [], issues: [] };
  }

  const blocks = extractJsonBlocks(text);
  if (blocks.length === 0) {
    const number = name.number ?? (title ? numberFromTitle(title) : undefined) ??
      (heading ? numberFromTitle(heading) : undefined);
    return { ...base, kind: 'essay', number, banks: [], issues: [] };
  }

  const banks: NumberInsightBank[] = [];
  const issues: BankIssue[] = [];
  for (const block of blocks) {
    const result = parseJsonBody(block, name.number);
    banks.push(...result.banks);
    issues.push(...result.issues);
  }

  return {
    ...base,
    kind: 'bank',
    number: banks[0]?.number ?? name.number,
    banks,
    issues
  };
}

/**
 * Read a bare JSON bank file.
 */
export function parseJsonDocument(path: string, text: string): ArchiveDocument {
  const name = parseArchiveFileName(path);
  const result = parseJsonBody(text, name.number);
  return {
    path,
    kind: 'bank',
    source: name.source,
    tier: name.tier,
    number: result.banks[0]?.number ?? name.number,
    banks: result.banks,
    issues: result.issues
  };
}

/**
 * Dispatch on extension; anything that is not JSON is read as markdown.
 */
export function parseArchiveText(path: string, text: string): ArchiveDocument {
  return extname(path).toLowerCase() === '.json'
    ? parseJsonDocument(path, text)
    : parseMarkdownDocument(path, text);
}
