/**
 * DuplicateDetector - Finds exact and near-duplicate entries across banks.
 *
 * Exact duplicates share the hash of their normalized text. Near duplicates
 * are distinct normalized texts whose similarity ratio reaches the threshold.
 * When entries collide, the keeper is the one from the highest tier
 * (original > advanced > multiplied), then the first seen.
 */

import { INSIGHT_CATEGORIES } from '../core/constants.js';
import { cloneBank, type LocatedEntry, type NumberInsightBank, type SourceTier } from '../core/types.js';
import {
  characterBound,
  countCharacters,
  hashText,
  lengthBound,
  normalizeForComparison,
  similarityRatio,
  type CharCounts
} from './TextSimilarity.js';

export interface SourcedBank {
  path: string;
  tier: SourceTier;
  bank: NumberInsightBank;
}

export interface ExactDuplicateGroup {
  hash: string;
  keeper: LocatedEntry;
  duplicates: LocatedEntry[];
}

export interface NearDuplicatePair {
  similarity: number;
  keeper: LocatedEntry;
  duplicate: LocatedEntry;
}

export interface DuplicateReport {
  totalEntries: number;
  /** Entries left after both kinds of removal */
  uniqueEntries: number;
  exactGroups: ExactDuplicateGroup[];
  nearPairs: NearDuplicatePair[];
  exactDuplicateCount: number;
  nearDuplicateCount: number;
  /** uniqueEntries / totalEntries, 1 for an empty archive */
  uniquenessScore: number;
}

export interface DuplicateRemoval {
  entry: LocatedEntry;
  reason: 'exact' | 'near';
  keptText: string;
  similarity: number;
}

export interface EliminationResult {
  banks: SourcedBank[];
  removals: DuplicateRemoval[];
  /** Duplicates left in place because removing them would empty a category */
  retained: DuplicateRemoval[];
  report: DuplicateReport;
}

export interface DuplicateDetectorOptions {
  nearThreshold?: number;
  quiet?: boolean;
}

const TIER_PRIORITY: Record<SourceTier, number> = {
  original: 3,
  advanced: 2,
  multiplied: 1
};

interface IndexedEntry {
  entry: LocatedEntry;
  /** Position of the owning bank in the input list */
  source: number;
  normalized: string;
  hash: string;
}

interface Analysis {
  report: DuplicateReport;
  removals: Array<{ target: IndexedEntry; reason: 'exact' | 'near'; kept: IndexedEntry; similarity: number }>;
}

function entryKey(source: number, category: string, index: number): string {
  return `${source}:${category}:${index}`;
}

export class DuplicateDetector {
  private nearThreshold: number;
  private quiet: boolean;

  constructor(options: DuplicateDetectorOptions = {}) {
    this.nearThreshold = options.nearThreshold ?? 0.95;
    this.quiet = options.quiet ?? false;
  }

  analyze(banks: SourcedBank[]): DuplicateReport {
    return this.run(banks).report;
  }

  /**
   * Return copies of the banks with duplicates removed. Inputs are untouched.
   * A category is never emptied: when every entry in it is a duplicate, its
   * first entry stays and is reported under `retained`.
   */
  eliminate(banks: SourcedBank[]): EliminationResult {
    const { report, removals } = this.run(banks);

    const removed = new Set(
      removals.map(r => entryKey(r.target.source, r.target.entry.category, r.target.entry.index))
    );

    banks.forEach((sourced, source) => {
      for (const category of INSIGHT_CATEGORIES) {
        const entries = sourced.bank.categories[category];
        if (entries.length > 0 && entries.every((_text, index) => removed.has(entryKey(source, category, index)))) {
          removed.delete(entryKey(source, category, 0));
        }
      }
    });

    const cleaned = banks.map((sourced, source) => {
      const bank = cloneBank(sourced.bank);
      for (const category of INSIGHT_CATEGORIES) {
        bank.categories[category] = sourced.bank.categories[category].filter(
          (_text, index) => !removed.has(entryKey(source, category, index))
        );
      }
      return { path: sourced.path, tier: sourced.tier, bank };
    });

    const toRemoval = (r: Analysis['removals'][number]): DuplicateRemoval => ({
      entry: r.target.entry,
      reason: r.reason,
      keptText: r.kept.entry.text,
      similarity: r.similarity
    });
    const applied = removals.filter(r => removed.has(entryKey(r.target.source, r.target.entry.category, r.target.entry.index)));
    const retained = removals.filter(r => !removed.has(entryKey(r.target.source, r.target.entry.category, r.target.entry.index)));

    if (!this.quiet) {
      console.log(`[DuplicateDetector] Removed ${applied.length} duplicate(s) from ${banks.length} bank(s)`);
      if (retained.length > 0) {
        console.log(`[DuplicateDetector] Kept ${retained.length} duplicate(s) so no category is left empty`);
      }
    }

    return {
      banks: cleaned,
      removals: applied.map(toRemoval),
      retained: retained.map(toRemoval),
      report
    };
  }

  /**
   * Pick the entry to keep: highest tier, then first in input order.
   */
  private chooseKeeper(entries: IndexedEntry[]): IndexedEntry {
    let best = entries[0];
    for (const candidate of entries) {
      if (TIER_PRIORITY[candidate.entry.tier] > TIER_PRIORITY[best.entry.tier]) {
        best = candidate;
      }
    }
    return best;
  }

  private run(banks: SourcedBank[]): Analysis {
    const entries: IndexedEntry[] = [];
    banks.forEach((sourced, source) => {
      for (const category of INSIGHT_CATEGORIES) {
        sourced.bank.categories[category].forEach((text, index) => {
          const normalized = normalizeForComparison(text);
          entries.push({
            entry: {
              text,
              number: sourced.bank.number,
              category,
              index,
              path: sourced.path,
              tier: sourced.tier
            },
            source,
            normalized,
            hash: hashText(normalized)
          });
        });
      }
    });

    // Exact duplicates
    const byHash = new Map<string, IndexedEntry[]>();
    for (const entry of entries) {
      const group = byHash.get(entry.hash);
      if (group) {
        group.push(entry);
      } else {
        byHash.set(entry.hash, [entry]);
      }
    }

    const removals: Analysis['removals'] = [];
    const exactGroups: ExactDuplicateGroup[] = [];
    const representatives: IndexedEntry[] = [];

    for (const [hash, group] of byHash) {
      const keeper = this.chooseKeeper(group);
      representatives.push(keeper);
      if (group.length < 2) continue;

      const duplicates = group.filter(entry => entry !== keeper);
      exactGroups.push({ hash, keeper: keeper.entry, duplicates: duplicates.map(d => d.entry) });
      for (const duplicate of duplicates) {
        removals.push({ target: duplicate, reason: 'exact', kept: keeper, similarity: 1 });
      }
    }

    // Near duplicates among distinct texts
    const nearPairs: NearDuplicatePair[] = [];
    const removedHashes = new Set<string>();
    const counts: CharCounts[] = representatives.map(r => countCharacters(r.normalized));
    let nearDuplicateCount = 0;

    for (let i = 0; i < representatives.length; i++) {
      for (let j = i + 1; j < representatives.length; j++) {
        const first = representatives[i];
        const second = representatives[j];
        const length = first.normalized.length + second.normalized.length;

        if (lengthBound(first.normalized, second.normalized) < this.nearThreshold) continue;
        if (characterBound(counts[i], counts[j], length) < this.nearThreshold) continue;

        const similarity = similarityRatio(first.normalized, second.normalized);
        if (similarity < this.nearThreshold) continue;

        const keeper = this.chooseKeeper([first, second]);
        const duplicate = keeper === first ? second : first;
        nearPairs.push({ similarity, keeper: keeper.entry, duplicate: duplicate.entry });

        if (removedHashes.has(first.hash) || removedHashes.has(second.hash)) continue;
        removedHashes.add(duplicate.hash);
        nearDuplicateCount++;
        removals.push({ target: duplicate, reason: 'near', kept: keeper, similarity });
      }
    }

    const exactDuplicateCount = exactGroups.reduce((sum, group) => sum + group.duplicates.length, 0);
    const totalEntries = entries.length;
    const uniqueEntries = totalEntries - exactDuplicateCount - nearDuplicateCount;

    return {
      report: {
        totalEntries,
        uniqueEntries,
        exactGroups,
        nearPairs,
        exactDuplicateCount,
        nearDuplicateCount,
        uniquenessScore: totalEntries === 0 ? 1 : uniqueEntries / totalEntries
      },
      removals
    };
  }
}
