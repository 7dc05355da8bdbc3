/**
 * Test fixtures shared by the module tests.
 */

import { INSIGHT_CATEGORIES } from '../core/constants.js';
import { emptyCategoryMap, type BankNumber, type NumberInsightBank } from '../core/types.js';

/**
 * Entry text used by makeBank. Distinct per number, category and index.
 */
export function fixtureEntry(number: number, category: string, index: number): string {
  return `Number ${number} ${category.replace(/_/g, ' ')} entry ${index + 1}: notice one small thing you can adjust today.`;
}

export function makeBank(number: BankNumber, perCategory: number = 15): NumberInsightBank {
  const categories = emptyCategoryMap();
  for (const category of INSIGHT_CATEGORIES) {
    for (let i = 0; i < perCategory; i++) {
      categories[category].push(fixtureEntry(number, category, i));
    }
  }
  return {
    number,
    generationInfo: {
      date: '2025-01-15',
      timeContext: 'morning',
      theme: 'steady beginnings',
      batchSize: perCategory,
      extra: {}
    },
    categories
  };
}

/**
 * Flat-layout JSON object for a bank built by makeBank.
 */
export function makeRawBank(number: number, perCategory: number = 2): Record<string, unknown> {
  const raw: Record<string, unknown> = {
    number,
    generation_info: { date: '2025-01-15', time_context: 'morning', theme: 'steady beginnings', batch_size: perCategory }
  };
  for (const category of INSIGHT_CATEGORIES) {
    const entries: string[] = [];
    for (let i = 0; i < perCategory; i++) {
      entries.push(fixtureEntry(number, category, i));
    }
    raw[category] = entries;
  }
  return raw;
}
