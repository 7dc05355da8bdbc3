/**
 * ContentLinter - Quality rules for bank entries.
 *
 * Structural problems are the schema's job; these rules look at the text:
 * size, spacing, leftover LLM artifacts, repeats, overclaiming, jargon and
 * master numbers described as reducing.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { INSIGHT_CATEGORIES } from '../core/constants.js';
import {
  isMasterNumber,
  type ArchiveDocument,
  type InsightCategory,
  type IssueSeverity,
  type NumberInsightBank
} from '../core/types.js';
import { DEFAULT_KIT_CONFIGURATION, type LintConfig, type LintRule } from '../config/types.js';
import { normalizeForComparison } from '../dedupe/TextSimilarity.js';
import { findArtifacts } from '../normalize/Artifacts.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// ==========================================
// TYPES
// ==========================================

export interface LintFinding {
  rule: LintRule;
  severity: IssueSeverity;
  message: string;
  number: number;
  category?: InsightCategory;
  index?: number;
  path?: string;
  text?: string;
}

export interface LintReport {
  findings: LintFinding[];
  errorCount: number;
  warningCount: number;
}

export interface LintOptions extends Partial<LintConfig> {
  /** Attached to every finding */
  path?: string;
}

// ==========================================
// LEXICON
// ==========================================

const LexiconSchema = z.object({
  buzzwords: z.array(z.string()),
  buzzPhrases: z.array(z.string()),
  absoluteClaims: z.array(z.string())
});

export type Lexicon = z.infer<typeof LexiconSchema>;

let cachedLexicon: Lexicon | null = null;

export function loadLexicon(): Lexicon {
  if (!cachedLexicon) {
    const raw: unknown = JSON.parse(readFileSync(join(__dirname, 'lexicon.json'), 'utf-8'));
    cachedLexicon = LexiconSchema.parse(raw);
  }
  return cachedLexicon;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Lexicon terms found in text, matched on word boundaries.
 */
export function findTerms(text: string, terms: string[]): string[] {
  return terms.filter(term => new RegExp(`\\b${escapeRegExp(term)}\\b`, 'i').test(text));
}

/**
 * Buzz phrases and buzzwords found in text. A buzzword that only occurs
 * inside a matched phrase is counted as part of that phrase.
 */
export function findJargon(text: string, lexicon: Pick<Lexicon, 'buzzPhrases' | 'buzzwords'>): string[] {
  const found: string[] = [];
  const spans: Array<[number, number]> = [];

  for (const phrase of lexicon.buzzPhrases) {
    const matches = [...text.matchAll(new RegExp(`\\b${escapeRegExp(phrase)}\\b`, 'gi'))];
    if (matches.length === 0) continue;
    found.push(phrase);
    for (const match of matches) {
      const start = match.index ?? 0;
      spans.push([start, start + match[0].length]);
    }
  }

  for (const word of lexicon.buzzwords) {
    const matches = [...text.matchAll(new RegExp(`\\b${escapeRegExp(word)}\\b`, 'gi'))];
    const outside = matches.some(match => {
      const start = match.index ?? 0;
      return !spans.some(([from, to]) => start >= from && start < to);
    });
    if (outside) found.push(word);
  }

  return found;
}

// ==========================================
// MASTER NUMBERS
// ==========================================

const DIGIT_WORDS: Record<number, string> = { 2: 'two', 4: 'four', 6: 'six', 8: 'eight' };

function digitSum(value: number): number {
  return String(value).split('').reduce((sum, digit) => sum + Number(digit), 0);
}

/**
 * "11 reduces to 2", "22/4", "33 = 6" and the like.
 */
export function describesMasterReduction(text: string, master: number): boolean {
  const digit = digitSum(master);
  const target = `(?:${digit}|${DIGIT_WORDS[digit] ?? digit})`;
  const patterns = [
    new RegExp(
      `\\b${master}\\b[^.]{0,20}?\\b(?:reduces?|reducing|reduced|boils? down|breaks? down|simplifies|simplified)\\s+(?:down\\s+)?(?:in)?to\\s+(?:a\\s+|the\\s+)?${target}\\b`,
      'i'
    ),
    new RegExp(`\\b${master}\\s*\\/\\s*${digit}\\b`),
    new RegExp(`\\b${master}\\s*(?:=|->|→)\\s*${digit}\\b`)
  ];
  return patterns.some(pattern => pattern.test(text));
}

// ==========================================
// LINTING
// ==========================================

function resolveOptions(options: LintOptions): LintConfig {
  const defaults = DEFAULT_KIT_CONFIGURATION.lint;
  return {
    minChars: options.minChars ?? defaults.minChars,
    maxChars: options.maxChars ?? defaults.maxChars,
    minEntries: options.minEntries ?? defaults.minEntries,
    maxEntries: options.maxEntries ?? defaults.maxEntries,
    disabledRules: options.disabledRules ?? defaults.disabledRules
  };
}

function summarize(findings: LintFinding[]): LintReport {
  return {
    findings,
    errorCount: findings.filter(f => f.severity === 'error').length,
    warningCount: findings.filter(f => f.severity === 'warning').length
  };
}

export function lintBank(bank: NumberInsightBank, options: LintOptions = {}): LintReport {
  const config = resolveOptions(options);
  const lexicon = loadLexicon();
  const enabled = (rule: LintRule): boolean => !config.disabledRules.includes(rule);

  const findings: LintFinding[] = [];
  const seen = new Map<string, { category: InsightCategory; index: number }>();

  for (const category of INSIGHT_CATEGORIES) {
    const entries = bank.categories[category];
    const base = { number: bank.number, category, path: options.path };

    if (enabled('category-size') && (entries.length < config.minEntries || entries.length > config.maxEntries)) {
      findings.push({
        ...base,
        rule: 'category-size',
        severity: 'warning',
        message: `"${category}" has ${entries.length} entries (expected ${config.minEntries}-${config.maxEntries})`
      });
    }

    entries.forEach((text, index) => {
      const at = { ...base, index, text };
      const length = text.trim().length;

      if (enabled('entry-length')) {
        if (length < config.minChars) {
          findings.push({
            ...at,
            rule: 'entry-length',
            severity: 'warning',
            message: `Entry is ${length} characters (minimum ${config.minChars})`
          });
        } else if (length > config.maxChars) {
          findings.push({
            ...at,
            rule: 'entry-length',
            severity: 'warning',
            message: `Entry is ${length} characters (maximum ${config.maxChars})`
          });
        }
      }

      if (enabled('whitespace') && (text !== text.trim() || /\s{2,}|[\t\n\r]/.test(text))) {
        findings.push({ ...at, rule: 'whitespace', severity: 'warning', message: 'Entry has stray whitespace' });
      }

      if (enabled('artifact')) {
        const artifacts = findArtifacts(text);
        if (artifacts.length > 0) {
          findings.push({
            ...at,
            rule: 'artifact',
            severity: 'error',
            message: `Entry contains LLM artifacts: ${artifacts.join(', ')}`
          });
        }
      }

      const normalized = normalizeForComparison(text);
      const first = seen.get(normalized);
      if (first) {
        if (enabled('duplicate-entry')) {
          findings.push({
            ...at,
            rule: 'duplicate-entry',
            severity: 'warning',
            message: `Entry repeats ${first.category}[${first.index}]`
          });
        }
      } else {
        seen.set(normalized, { category, index });
      }

      if (enabled('absolute-claim')) {
        const claims = findTerms(text, lexicon.absoluteClaims);
        if (claims.length > 0) {
          findings.push({
            ...at,
            rule: 'absolute-claim',
            severity: 'error',
            message: `Entry makes an absolute claim ("${claims[0]}")`
          });
        }
      }

      if (enabled('jargon')) {
        const terms = findJargon(text, lexicon);
        if (terms.length >= 2) {
          findings.push({
            ...at,
            rule: 'jargon',
            severity: 'warning',
            message: `Entry leans on buzzwords: ${terms.join(', ')}`
          });
        }
      }

      if (enabled('master-reduction') && isMasterNumber(bank.number) && describesMasterReduction(text, bank.number)) {
        findings.push({
          ...at,
          rule: 'master-reduction',
          severity: 'warning',
          message: `Entry reduces master number ${bank.number} to ${digitSum(bank.number)}`
        });
      }
    });
  }

  return summarize(findings);
}

/**
 * Lint every bank in the documents, tagging findings with the document path.
 */
export function lintDocuments(documents: ArchiveDocument[], options: LintOptions = {}): LintReport {
  const findings: LintFinding[] = [];
  for (const document of documents) {
    for (const bank of document.banks) {
      findings.push(...lintBank(bank, { ...options, path: document.path }).findings);
    }
  }
  return summarize(findings);
}
