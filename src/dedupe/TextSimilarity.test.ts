/**
 * Text Similarity Tests
 */

import { describe, it, expect } from 'vitest';
import {
  characterBound,
  countCharacters,
  lengthBound,
  matchingCharacters,
  normalizeForComparison,
  similarityRatio
} from './TextSimilarity.js';

describe('normalizeForComparison', () => {
  it('collapses whitespace, unifies punctuation and lower-cases', () => {
    expect(normalizeForComparison('  Your “Inner” Voice —\tit’s   Wise ')).toBe("your 'inner' voice - it's wise");
  });
});

describe('similarityRatio', () => {
  it('matches known ratios', () => {
    expect(similarityRatio('abcd', 'bcde')).toBe(0.75);
    expect(similarityRatio('tide', 'diet')).toBe(0.25);
    expect(similarityRatio('abc', 'xyz')).toBe(0);
    expect(similarityRatio('', '')).toBe(1);
  });

  it('scores a one-character difference', () => {
    const a = 'take a slow breath and notice how your shoulders feel right now.';
    const b = 'take a slow breath and notice how your shoulders feel right now!';
    expect(matchingCharacters(a, b)).toBe(63);
    expect(similarityRatio(a, b)).toBeCloseTo(0.984375, 10);
  });

  it('skips characters that dominate long strings', () => {
    const pairs = Array(40).fill('ab').join(' ');
    const a = 'x'.repeat(150) + pairs;
    const b = 'y'.repeat(150) + pairs;
    expect(b.length).toBe(269);
    expect(similarityRatio(a, b)).toBe(0);
  });
});

describe('bounds', () => {
  it('never undercut the real ratio', () => {
    const a = 'notice your breath before you answer';
    const b = 'notice your breathing before answering';
    const ratio = similarityRatio(a, b);

    expect(lengthBound(a, b)).toBeGreaterThanOrEqual(ratio);
    expect(characterBound(countCharacters(a), countCharacters(b), a.length + b.length)).toBeGreaterThanOrEqual(ratio);
  });

  it('reads length differences', () => {
    expect(lengthBound('aaaa', 'aa')).toBeCloseTo(4 / 6, 10);
  });
});
