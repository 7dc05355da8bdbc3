/**
 * Content Linter Tests
 */

import { describe, it, expect } from 'vitest';
import type { ArchiveDocument } from '../core/types.js';
import { makeBank } from '../testing/fixtures.js';
import { describesMasterReduction, findJargon, findTerms, lintBank, lintDocuments, loadLexicon } from './ContentLinter.js';

function flawedBank() {
  const bank = makeBank(2, 15);
  bank.categories.insight[0] = 'Too short.';
  bank.categories.insight[1] = 'Breathe  slowly and let the day unfold at its own pace.';
  bank.categories.insight[2] = 'Rest is productive too oai_citation:2 so plan for it.';
  bank.categories.insight[3] = bank.categories.reflection[0];
  bank.categories.insight[4] = 'This path is guaranteed to bring you love this year.';
  bank.categories.insight[5] = 'Your cosmic journey invites divine timing in small choices.';
  return bank;
}

describe('lintBank', () => {
  it('passes a clean bank', () => {
    const report = lintBank(makeBank(11, 15));

    expect(report).toEqual({ findings: [], errorCount: 0, warningCount: 0 });
  });

  it('flags categories outside the size bounds', () => {
    const report = lintBank(makeBank(3, 14));

    expect(report.warningCount).toBe(12);
    expect(report.findings[0].message).toBe('"insight" has 14 entries (expected 15-20)');
    expect(lintBank(makeBank(3, 14), { minEntries: 10 }).findings).toEqual([]);
  });

  it('reports each text rule with its location', () => {
    const report = lintBank(flawedBank(), { path: 'bank.md' });

    expect(report.findings.map(f => [f.rule, f.category, f.index])).toEqual([
      ['entry-length', 'insight', 0],
      ['whitespace', 'insight', 1],
      ['artifact', 'insight', 2],
      ['absolute-claim', 'insight', 4],
      ['jargon', 'insight', 5],
      ['duplicate-entry', 'reflection', 0]
    ]);
    expect(report.findings.map(f => f.message)).toEqual([
      'Entry is 10 characters (minimum 20)',
      'Entry has stray whitespace',
      'Entry contains LLM artifacts: citation',
      'Entry makes an absolute claim ("guaranteed")',
      'Entry leans on buzzwords: divine timing, cosmic',
      'Entry repeats insight[3]'
    ]);
    expect(report.findings.every(f => f.path === 'bank.md')).toBe(true);
    expect(report.errorCount).toBe(2);
    expect(report.warningCount).toBe(4);
  });

  it('skips disabled rules', () => {
    const report = lintBank(flawedBank(), { disabledRules: ['artifact', 'jargon'] });

    expect(report.errorCount).toBe(1);
    expect(report.findings.map(f => f.rule)).not.toContain('jargon');
  });

  it('flags master numbers described as reducing', () => {
    const master = makeBank(22, 15);
    master.categories.numerical_context[0] = 'Remember that 22/4 energy asks for patient building.';
    const single = makeBank(4, 15);
    single.categories.numerical_context[0] = 'Remember that 22/4 energy asks for patient building.';

    const report = lintBank(master);

    expect(report.findings).toHaveLength(1);
    expect(report.findings[0].rule).toBe('master-reduction');
    expect(report.findings[0].message).toBe('Entry reduces master number 22 to 4');
    expect(lintBank(single).findings).toEqual([]);
  });
});

describe('describesMasterReduction', () => {
  it('recognizes common phrasings', () => {
    expect(describesMasterReduction('Your 11 reduces to 2 when you rest.', 11)).toBe(true);
    expect(describesMasterReduction('33 simplifies down to six in practice', 33)).toBe(true);
    expect(describesMasterReduction('44 = 8 in daily work', 44)).toBe(true);
    expect(describesMasterReduction('Eleven reduces to two', 11)).toBe(false);
    expect(describesMasterReduction('11 stays 11, whole and intact.', 11)).toBe(false);
  });
});

describe('lexicon', () => {
  it('loads from disk and matches on word boundaries', () => {
    const lexicon = loadLexicon();

    expect(lexicon.absoluteClaims).toContain('destined');
    expect(findTerms('A secure routine helps.', lexicon.absoluteClaims)).toEqual([]);
    expect(findTerms('You were destined for this.', lexicon.absoluteClaims)).toEqual(['destined']);
  });

  it('counts a buzzword inside a buzz phrase once', () => {
    const lexicon = loadLexicon();

    expect(findJargon('Trust divine timing while you finish one small task today.', lexicon)).toEqual(['divine timing']);
    expect(findJargon('Divine timing meets a divine pause.', lexicon)).toEqual(['divine timing', 'divine']);
  });

  it('does not flag a single buzz phrase as jargon', () => {
    const bank = makeBank(7, 15);
    bank.categories.insight[0] = 'Trust divine timing while you finish one small task today.';

    expect(lintBank(bank).findings).toEqual([]);
  });
});

describe('lintDocuments', () => {
  it('aggregates findings across documents', () => {
    const documents: ArchiveDocument[] = [
      { path: 'a.md', kind: 'bank', source: 'a', tier: 'original', banks: [makeBank(3, 14)], issues: [] },
      { path: 'b.md', kind: 'essay', source: 'b', tier: 'original', banks: [], issues: [] },
      { path: 'c.json', kind: 'bank', source: 'c', tier: 'original', banks: [flawedBank()], issues: [] }
    ];

    const report = lintDocuments(documents);

    expect(report.warningCount).toBe(16);
    expect(report.errorCount).toBe(2);
    expect(report.findings[0].path).toBe('a.md');
    expect(report.findings[12].path).toBe('c.json');
  });
});
