/**
 * CoverageReport - Which numbers and categories the archive actually covers.
 */

import { BANK_NUMBERS, INSIGHT_CATEGORIES } from '../core/constants.js';
import { emptyCategoryCounts, type BankNumber, type InsightCategory, type NumberInsightBank } from '../core/types.js';

export interface NumberCoverage {
  number: BankNumber;
  banks: number;
  counts: Record<InsightCategory, number>;
  total: number;
  missingCategories: InsightCategory[];
}

export interface CoverageReport {
  numbers: NumberCoverage[];
  missingNumbers: BankNumber[];
  /** Every bank number present with all twelve categories filled */
  complete: boolean;
}

export function coverageReport(banks: NumberInsightBank[]): CoverageReport {
  const numbers: NumberCoverage[] = [];
  const missingNumbers: BankNumber[] = [];

  for (const number of BANK_NUMBERS) {
    const matching = banks.filter(bank => bank.number === number);
    if (matching.length === 0) {
      missingNumbers.push(number);
      continue;
    }

    const counts = emptyCategoryCounts();
    for (const bank of matching) {
      for (const category of INSIGHT_CATEGORIES) {
        counts[category] += bank.categories[category].length;
      }
    }

    numbers.push({
      number,
      banks: matching.length,
      counts,
      total: INSIGHT_CATEGORIES.reduce((sum, category) => sum + counts[category], 0),
      missingCategories: INSIGHT_CATEGORIES.filter(category => counts[category] === 0)
    });
  }

  return {
    numbers,
    missingNumbers,
    complete: missingNumbers.length === 0 && numbers.every(n => n.missingCategories.length === 0)
  };
}
