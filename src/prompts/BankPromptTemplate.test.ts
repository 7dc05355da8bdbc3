/**
 * Bank Prompt Template Tests
 */

import { describe, it, expect } from 'vitest';
import { INSIGHT_CATEGORIES } from '../core/constants.js';
import { makeBank } from '../testing/fixtures.js';
import { parseMarkdownDocument } from '../archive/ArchiveParser.js';
import { buildBankPrompt, buildRetryMessage, isPersona, renderPromptTemplate } from './BankPromptTemplate.js';

describe('buildBankPrompt', () => {
  it('describes every category and the output shape', () => {
    const { system } = buildBankPrompt({ number: 7, batchSize: 18 });

    for (const category of INSIGHT_CATEGORIES) {
      expect(system).toContain(`- ${category}: `);
      expect(system).toContain(`  "${category}": ["...", "..."]`);
    }
    expect(system).toContain('Write exactly 18 entries for every category.');
    expect(system).toContain('  "number": 7,');
    expect(system).toContain('Master numbers (11, 22, 33, 44) are never reduced.');
  });

  it('names the number profile and context in the user message', () => {
    const { user } = buildBankPrompt({ number: 22, theme: 'long projects', timeContext: 'evening' });

    expect(user.split('\n')).toEqual([
      'Write the insight bank for number 22: The Master Builder (Vision / Construction).',
      'Keywords: vision, builder, legacy, practical, foundation, scale, discipline',
      'Theme: long projects',
      'Time context: evening',
      'Entries per category: 15'
    ]);
  });

  it('adds up to two examples per category', () => {
    const { user } = buildBankPrompt({ number: 3, examples: makeBank(3, 5) });
    const exampleLines = user.split('\n').filter(line => line.startsWith('- '));

    expect(exampleLines).toHaveLength(24);
    expect(exampleLines[0]).toBe(
      '- insight: "Number 3 insight entry 1: notice one small thing you can adjust today."'
    );
  });

  it('switches voice by persona', () => {
    expect(buildBankPrompt({ number: 1, persona: 'oracle' }).system).toContain('Speak as The Oracle');
    expect(buildBankPrompt({ number: 1 }).system).toContain('warm, practical voice');
    expect(isPersona('mindfulness-coach')).toBe(true);
    expect(isPersona('Oracle')).toBe(false);
  });
});

describe('buildRetryMessage', () => {
  it('lists the problems', () => {
    expect(buildRetryMessage(['Missing category "shadow"'])).toBe(
      'The previous reply could not be used:\n- Missing category "shadow"\n\nReply again with the complete JSON object only.'
    );
  });
});

describe('renderPromptTemplate', () => {
  it('renders markdown the archive reads as a prompt', () => {
    const markdown = renderPromptTemplate({ number: 5 });
    const doc = parseMarkdownDocument('prompt_5.md', markdown);

    expect(markdown.startsWith('# Insight Bank Generation Prompt: Number 5\n')).toBe(true);
    expect(markdown).toContain('`NumberMessages_Complete_5_original.md`');
    expect(doc.kind).toBe('prompt');
  });
});
