/**
 * RuntimeBundle - One merged bank per number, ready for an app to load.
 */

import { INSIGHT_CATEGORIES } from '../core/constants.js';
import {
  emptyCategoryCounts,
  emptyCategoryMap,
  type BankNumber,
  type CategoryMap,
  type InsightCategory,
  type NumberInsightBank
} from '../core/types.js';
import { normalizeForComparison } from '../dedupe/TextSimilarity.js';

export const BUNDLE_VERSION = '1.0';

export interface RuntimeBundleEntry {
  number: BankNumber;
  total: number;
  counts: Record<InsightCategory, number>;
  categories: CategoryMap;
  /** Banks merged into this entry */
  sourceBanks: number;
}

export interface RuntimeBundle {
  version: string;
  numbers: BankNumber[];
  totalEntries: number;
  /** Entries dropped because the same text was already present */
  droppedDuplicates: number;
  banks: RuntimeBundleEntry[];
}

export function categoryCounts(categories: CategoryMap): Record<InsightCategory, number> {
  const counts = emptyCategoryCounts();
  for (const category of INSIGHT_CATEGORIES) {
    counts[category] = categories[category].length;
  }
  return counts;
}

/**
 * Merge banks per number. Entries keep input order; a text already present
 * in the same number and category (after normalization) is dropped.
 */
export function buildRuntimeBundle(banks: NumberInsightBank[]): RuntimeBundle {
  const merged = new Map<BankNumber, { categories: CategoryMap; seen: Set<string>; sourceBanks: number }>();
  let droppedDuplicates = 0;

  for (const bank of banks) {
    let target = merged.get(bank.number);
    if (!target) {
      target = { categories: emptyCategoryMap(), seen: new Set(), sourceBanks: 0 };
      merged.set(bank.number, target);
    }
    target.sourceBanks++;

    for (const category of INSIGHT_CATEGORIES) {
      for (const text of bank.categories[category]) {
        const key = `${category}\u0000${normalizeForComparison(text)}`;
        if (target.seen.has(key)) {
          droppedDuplicates++;
          continue;
        }
        target.seen.add(key);
        target.categories[category].push(text);
      }
    }
  }

  const entries: RuntimeBundleEntry[] = [...merged.entries()]
    .sort(([a], [b]) => a - b)
    .map(([number, { categories, sourceBanks }]) => {
      const counts = categoryCounts(categories);
      return {
        number,
        total: INSIGHT_CATEGORIES.reduce((sum, category) => sum + counts[category], 0),
        counts,
        categories,
        sourceBanks
      };
    });

  return {
    version: BUNDLE_VERSION,
    numbers: entries.map(entry => entry.number),
    totalEntries: entries.reduce((sum, entry) => sum + entry.total, 0),
    droppedDuplicates,
    banks: entries
  };
}

/**
 * JSON form of the bundle, keyed by number with snake_case category keys.
 */
export function serializeRuntimeBundle(bundle: RuntimeBundle): Record<string, unknown> {
  const banks: Record<string, unknown> = {};
  for (const entry of bundle.banks) {
    banks[String(entry.number)] = {
      total: entry.total,
      counts: entry.counts,
      ...entry.categories
    };
  }
  return {
    bundle_version: bundle.version,
    numbers: bundle.numbers,
    total_entries: bundle.totalEntries,
    banks
  };
}
