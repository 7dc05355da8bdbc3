/**
 * InsightSelector - Picks the day's insights for a number.
 *
 * Relevance combines profile keyword matches with coaching features
 * (concrete verbs, a time frame, a specific object) and penalties for
 * prayer phrasing, stacked spiritual buzzwords and long entries. Candidates
 * are then taken in score order with a bonus for each new source and
 * category. Ties break on a hash of date, number and id, so the same day
 * always yields the same picks.
 */

import type { BankNumber, InsightCategory } from '../core/types.js';
import { hashText } from '../dedupe/TextSimilarity.js';
import { numberProfile } from '../numerology/NumerologyCalculator.js';

export interface SelectableInsight {
  id: string;
  number: BankNumber;
  category: InsightCategory;
  text: string;
  source: string;
}

export interface SelectionOptions {
  number: BankNumber;
  /** YYYY-MM-DD */
  date: string;
  count?: number;
  categories?: InsightCategory[];
}

export interface ScoredInsight<T extends SelectableInsight = SelectableInsight> {
  insight: T;
  relevance: number;
  /** Relevance and diversity bonus combined, as seen when the entry was considered */
  score: number;
  tieBreak: string;
}

const RELEVANCE_WEIGHT = 0.7;
const DIVERSITY_WEIGHT = 0.3;
const KEYWORD_WEIGHT = 0.6;
const ACCEPT_SCORE = 0.4;
const MIN_ACCEPTED = 3;

const ACTION_VERBS = /\b(notice|choose|try|write|plan|schedule|ask|pick|set|breathe|focus|start|practice)\b/i;
const TIME_CONTEXT = /\b(today|this (morning|afternoon|week)|right now|at your own pace|in your (work|relationships|practice))\b/i;
const SPECIFIC_OBJECT = /\b(one|a|the)\s+(task|step|call|note|message|timer|block|habit|goal)\b/i;
const INCENSE = /\b(divine|sacred|mystical|universe|loving[- ]kindness)\b/gi;

/**
 * Score adjustments for how concrete and actionable an entry reads.
 */
export function coachFeatureScore(text: string): number {
  let score = 0;

  if (ACTION_VERBS.test(text)) score += 0.15;
  if (TIME_CONTEXT.test(text)) score += 0.1;
  if (SPECIFIC_OBJECT.test(text)) score += 0.1;
  if (text.startsWith('May ')) score -= 0.2;
  if ((text.match(INCENSE) ?? []).length >= 2) score -= 0.2;

  const sentences = text.split('.').filter(part => part.length > 0).length;
  if (sentences > 2) score -= 0.1 * (sentences - 2);

  return score;
}

/**
 * Share of the keywords that appear in the text, case-insensitive.
 */
export function keywordScore(text: string, keywords: string[]): number {
  if (keywords.length === 0) return 0;
  const lower = text.toLowerCase();
  const matches = keywords.filter(keyword => lower.includes(keyword.toLowerCase())).length;
  return matches / keywords.length;
}

export function relevanceScore(text: string, keywords: string[]): number {
  const raw = keywordScore(text, keywords) * KEYWORD_WEIGHT + coachFeatureScore(text);
  return Math.min(1, Math.max(0, raw));
}

export class InsightSelector {
  select<T extends SelectableInsight>(entries: T[], options: SelectionOptions): ScoredInsight<T>[] {
    const count = options.count ?? 3;
    if (count <= 0) return [];

    const keywords = numberProfile(options.number).keywords;
    const allowed = options.categories ? new Set(options.categories) : null;

    const ranked = entries
      .filter(entry => entry.number === options.number)
      .filter(entry => allowed === null || allowed.has(entry.category))
      .map(insight => {
        const relevance = relevanceScore(insight.text, keywords);
        return {
          insight,
          relevance,
          score: relevance,
          tieBreak: hashText(`${options.date}|${options.number}|${insight.id}`)
        };
      })
      .sort((a, b) => b.relevance - a.relevance || compare(a.tieBreak, b.tieBreak));

    const selected: ScoredInsight<T>[] = [];
    const usedSources = new Set<string>();
    const usedCategories = new Set<string>();

    for (const candidate of ranked) {
      if (selected.length >= count) break;

      let bonus = 0;
      if (!usedSources.has(candidate.insight.source)) {
        bonus += 0.2;
        usedSources.add(candidate.insight.source);
      }
      if (!usedCategories.has(candidate.insight.category)) {
        bonus += 0.1;
        usedCategories.add(candidate.insight.category);
      }

      const score = candidate.relevance * RELEVANCE_WEIGHT + bonus * DIVERSITY_WEIGHT;
      if (score > ACCEPT_SCORE || selected.length < MIN_ACCEPTED) {
        selected.push({ ...candidate, score });
      }
    }

    // Top up from the ranking when too few cleared the bar
    for (const candidate of ranked) {
      if (selected.length >= count) break;
      if (!selected.some(s => s.insight.id === candidate.insight.id)) {
        selected.push({ ...candidate, score: candidate.relevance * RELEVANCE_WEIGHT });
      }
    }

    return selected;
  }
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
