/**
 * Insight Bank Core Types
 *
 * Central type definitions for insight banks and the archive that holds them.
 */

import {
  BANK_NUMBERS,
  CATEGORY_ALIASES,
  INSIGHT_CATEGORIES,
  MASTER_NUMBERS,
  SOURCE_TIERS
} from './constants.js';

// ==========================================
// BANK TYPES
// ==========================================

export type BankNumber = (typeof BANK_NUMBERS)[number];

export type InsightCategory = (typeof INSIGHT_CATEGORIES)[number];

export type SourceTier = (typeof SOURCE_TIERS)[number];

export type CategoryMap = Record<InsightCategory, string[]>;

/**
 * Metadata describing how a bank was produced. Nothing downstream depends on
 * these values; they are carried through for provenance.
 */
export interface GenerationInfo {
  date?: string;
  timeContext?: string;
  theme?: string;
  batchSize?: number;
  model?: string;
  /** Any other keys found in the source, kept verbatim */
  extra: Record<string, unknown>;
}

export interface NumberInsightBank {
  number: BankNumber;
  generationInfo?: GenerationInfo;
  categories: CategoryMap;
}

// ==========================================
// ISSUE TYPES
// ==========================================

export type IssueSeverity = 'error' | 'warning';

export type BankIssueCode =
  | 'invalid_json'
  | 'invalid_json_shape'
  | 'invalid_number'
  | 'missing_category'
  | 'empty_category'
  | 'non_string_entry'
  | 'empty_entry'
  | 'unknown_category'
  | 'invalid_generation_info';

export interface BankIssue {
  code: BankIssueCode;
  severity: IssueSeverity;
  message: string;
  number?: number;
  category?: string;
  index?: number;
}

// ==========================================
// ARCHIVE TYPES
// ==========================================

export type DocumentKind = 'bank' | 'essay' | 'prompt';

export interface ArchiveDocument {
  path: string;
  kind: DocumentKind;
  title?: string;
  heading?: string;
  /** File name stem without tier suffix or extension */
  source: string;
  tier: SourceTier;
  /** Number the document is about, when one can be determined */
  number?: BankNumber;
  banks: NumberInsightBank[];
  issues: BankIssue[];
  /** Bundle file the document was read from, when it came from one */
  bundle?: string;
}

/**
 * A single entry with enough context to locate it again.
 */
export interface LocatedEntry {
  text: string;
  number: BankNumber;
  category: InsightCategory;
  index: number;
  path: string;
  tier: SourceTier;
}

// ==========================================
// GUARDS
// ==========================================

export function isBankNumber(value: unknown): value is BankNumber {
  return typeof value === 'number' && BANK_NUMBERS.some(n => n === value);
}

export function isMasterNumber(value: number): boolean {
  return MASTER_NUMBERS.some(n => n === value);
}

export function isInsightCategory(value: string): value is InsightCategory {
  return INSIGHT_CATEGORIES.some(c => c === value);
}

/**
 * Map a raw category key to its canonical form, or undefined when unknown.
 */
export function canonicalCategory(key: string): InsightCategory | undefined {
  if (isInsightCategory(key)) return key;
  return CATEGORY_ALIASES[key];
}

export function emptyCategoryMap(): CategoryMap {
  return {
    insight: [],
    reflection: [],
    contemplation: [],
    manifestation: [],
    challenge: [],
    physical_practice: [],
    shadow: [],
    archetype: [],
    energy_check: [],
    numerical_context: [],
    astrological_context: [],
    mental_wellness: []
  };
}

/**
 * Copy a bank so callers can change the copy without touching the original.
 */
export function cloneBank(bank: NumberInsightBank): NumberInsightBank {
  const categories = emptyCategoryMap();
  for (const category of INSIGHT_CATEGORIES) {
    categories[category] = [...bank.categories[category]];
  }
  return {
    number: bank.number,
    generationInfo: bank.generationInfo
      ? { ...bank.generationInfo, extra: { ...bank.generationInfo.extra } }
      : undefined,
    categories
  };
}

/**
 * Flatten banks into located entries, in canonical category order.
 */
export function locateEntries(
  banks: NumberInsightBank[],
  path: string,
  tier: SourceTier
): LocatedEntry[] {
  const entries: LocatedEntry[] = [];
  for (const bank of banks) {
    for (const category of INSIGHT_CATEGORIES) {
      bank.categories[category].forEach((text, index) => {
        entries.push({ text, number: bank.number, category, index, path, tier });
      });
    }
  }
  return entries;
}

export function emptyCategoryCounts(): Record<InsightCategory, number> {
  return {
    insight: 0,
    reflection: 0,
    contemplation: 0,
    manifestation: 0,
    challenge: 0,
    physical_practice: 0,
    shadow: 0,
    archetype: 0,
    energy_check: 0,
    numerical_context: 0,
    astrological_context: 0,
    mental_wellness: 0
  };
}
