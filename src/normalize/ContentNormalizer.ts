/**
 * ContentNormalizer - Cleans bank entries before they are stored or shipped.
 *
 * Category aliases are already canonical once a bank has been read through
 * the schema; this pass works on entry text only.
 */

import { INSIGHT_CATEGORIES } from '../core/constants.js';
import { cloneBank, type InsightCategory, type NumberInsightBank } from '../core/types.js';
import { stripArtifacts } from './Artifacts.js';

export interface NormalizationChanges {
  artifactsRemoved: number;
  quotesStraightened: number;
  whitespaceFixed: number;
  emptyDropped: number;
}

export interface NormalizationResult {
  bank: NumberInsightBank;
  changes: NormalizationChanges;
  /** Categories that held entries before cleaning and hold none after */
  emptiedCategories: InsightCategory[];
}

export interface EntryNormalization {
  /** null when nothing is left after cleaning */
  text: string | null;
  artifacts: number;
  quotes: boolean;
  whitespace: boolean;
}

export function normalizeEntry(text: string): EntryNormalization {
  const stripped = stripArtifacts(text);

  const quoted = stripped.text
    .replace(/[‘’‚‛]/g, "'")
    .replace(/[“”„‟]/g, '"');

  const spaced = quoted
    .replace(/\s+/g, ' ')
    .replace(/ +([.,;:!?])/g, '$1')
    .trim();

  return {
    text: spaced === '' ? null : spaced,
    artifacts: stripped.removed,
    quotes: quoted !== stripped.text,
    whitespace: spaced !== quoted
  };
}

export function emptyChanges(): NormalizationChanges {
  return { artifactsRemoved: 0, quotesStraightened: 0, whitespaceFixed: 0, emptyDropped: 0 };
}

/**
 * Add the counts of `source` into `target`.
 */
export function addChanges(target: NormalizationChanges, source: NormalizationChanges): void {
  target.artifactsRemoved += source.artifactsRemoved;
  target.quotesStraightened += source.quotesStraightened;
  target.whitespaceFixed += source.whitespaceFixed;
  target.emptyDropped += source.emptyDropped;
}

export function totalChanges(changes: NormalizationChanges): number {
  return changes.artifactsRemoved + changes.quotesStraightened + changes.whitespaceFixed + changes.emptyDropped;
}

/**
 * Return a cleaned copy of the bank and what changed. A category whose
 * entries were all artifacts comes back empty and is listed in
 * `emptiedCategories`; such a bank no longer validates.
 */
export function normalizeBank(bank: NumberInsightBank): NormalizationResult {
  const result = cloneBank(bank);
  const changes = emptyChanges();
  const emptiedCategories: InsightCategory[] = [];

  for (const category of INSIGHT_CATEGORIES) {
    const cleaned: string[] = [];
    for (const entry of bank.categories[category]) {
      const normalized = normalizeEntry(entry);
      changes.artifactsRemoved += normalized.artifacts;
      if (normalized.quotes) changes.quotesStraightened++;
      if (normalized.whitespace) changes.whitespaceFixed++;
      if (normalized.text === null) {
        changes.emptyDropped++;
      } else {
        cleaned.push(normalized.text);
      }
    }
    if (cleaned.length === 0 && bank.categories[category].length > 0) {
      emptiedCategories.push(category);
    }
    result.categories[category] = cleaned;
  }

  return { bank: result, changes, emptiedCategories };
}
