/**
 * Content Normalizer Tests
 */

import { describe, it, expect } from 'vitest';
import { emptyCategoryMap, type NumberInsightBank } from '../core/types.js';
import { makeBank } from '../testing/fixtures.js';
import { findArtifacts, stripArtifacts } from './Artifacts.js';
import { addChanges, emptyChanges, normalizeBank, normalizeEntry, totalChanges } from './ContentNormalizer.js';

describe('Artifacts', () => {
  it('names the artifacts present', () => {
    expect(findArtifacts('Rest well oai_citation:3 tonight【4†source】')).toEqual(['citation', 'source-marker']);
    expect(findArtifacts('Plain text with no markers.')).toEqual([]);
  });

  it('keeps link labels and drops URLs', () => {
    expect(stripArtifacts('Read [the guide](https://example.com/guide) or https://example.com/x today')).toEqual({
      text: 'Read the guide or  today',
      removed: 2
    });
  });
});

describe('normalizeEntry', () => {
  it('cleans artifacts, quotes and spacing', () => {
    expect(normalizeEntry('  Your “yes” matters oai_citation:1 .  ')).toEqual({
      text: 'Your "yes" matters.',
      artifacts: 1,
      quotes: true,
      whitespace: true
    });
  });

  it('reports entries that clean down to nothing', () => {
    expect(normalizeEntry('【12†source】').text).toBeNull();
  });

  it('leaves clean text alone', () => {
    expect(normalizeEntry('Already clean.')).toEqual({
      text: 'Already clean.',
      artifacts: 0,
      quotes: false,
      whitespace: false
    });
  });
});

describe('normalizeBank', () => {
  it('returns a cleaned copy with counts', () => {
    const categories = emptyCategoryMap();
    categories.insight = ['Lead  with care.', '【1†source】', 'It’s your turn.'];
    categories.shadow = ['Notice control oai_citation:7'];
    const bank: NumberInsightBank = { number: 1, categories };

    const result = normalizeBank(bank);

    expect(result.bank.categories.insight).toEqual(['Lead with care.', "It's your turn."]);
    expect(result.bank.categories.shadow).toEqual(['Notice control']);
    expect(result.changes).toEqual({
      artifactsRemoved: 2,
      quotesStraightened: 1,
      whitespaceFixed: 2,
      emptyDropped: 1
    });
    expect(totalChanges(result.changes)).toBe(6);
    expect(result.emptiedCategories).toEqual([]);
    expect(bank.categories.insight).toHaveLength(3);
  });

  it('lists categories left with no entries', () => {
    const bank = makeBank(4, 2);
    bank.categories.shadow = ['https://example.com/a', '【1†source】'];

    const result = normalizeBank(bank);

    expect(result.bank.categories.shadow).toEqual([]);
    expect(result.emptiedCategories).toEqual(['shadow']);
    expect(result.changes.emptyDropped).toBe(2);
  });
});

describe('addChanges', () => {
  it('sums counts into the target', () => {
    const totals = emptyChanges();
    addChanges(totals, { artifactsRemoved: 2, quotesStraightened: 1, whitespaceFixed: 0, emptyDropped: 1 });
    addChanges(totals, { artifactsRemoved: 1, quotesStraightened: 0, whitespaceFixed: 3, emptyDropped: 0 });

    expect(totals).toEqual({ artifactsRemoved: 3, quotesStraightened: 1, whitespaceFixed: 3, emptyDropped: 1 });
  });
});
