/**
 * Bank Schema Tests
 */

import { describe, it, expect } from 'vitest';
import { INSIGHT_CATEGORIES } from '../core/constants.js';
import { makeBank, makeRawBank } from '../testing/fixtures.js';
import { parseBankJson, serializeBank, stringifyBank, validateBankDocument } from './BankSchema.js';

describe('validateBankDocument', () => {
  it('accepts a flat bank with all twelve categories', () => {
    const result = validateBankDocument(makeRawBank(7));

    expect(result.valid).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.banks).toHaveLength(1);
    expect(result.banks[0].number).toBe(7);
    expect(result.banks[0].categories.insight).toHaveLength(2);
    expect(result.banks[0].generationInfo).toEqual({
      date: '2025-01-15',
      timeContext: 'morning',
      theme: 'steady beginnings',
      batchSize: 2,
      extra: {}
    });
  });

  it('accepts the wrapped layout', () => {
    const flat = makeRawBank(3);
    const categories: Record<string, unknown> = {};
    for (const category of INSIGHT_CATEGORIES) categories[category] = flat[category];

    const result = validateBankDocument({ number: 3, categories });

    expect(result.valid).toBe(true);
    expect(result.banks[0].number).toBe(3);
    expect(result.banks[0].generationInfo).toBeUndefined();
  });

  it('accepts the keyed layout with several banks', () => {
    const first = makeRawBank(2);
    const second = makeRawBank(11);
    delete first.number;
    delete second.number;

    const result = validateBankDocument({ '2': first, '11': second });

    expect(result.valid).toBe(true);
    expect(result.banks.map(bank => bank.number)).toEqual([2, 11]);
  });

  it('rejects numbers outside the bank set', () => {
    const result = validateBankDocument(makeRawBank(10));

    expect(result.valid).toBe(false);
    expect(result.banks).toEqual([]);
    expect(result.issues).toEqual([
      {
        code: 'invalid_number',
        severity: 'error',
        message: 'Number 10 is not a bank number (1-9, 11, 22, 33, 44)'
      }
    ]);
  });

  it('uses the fallback number when the bank has none', () => {
    const raw = makeRawBank(5);
    delete raw.number;

    expect(validateBankDocument(raw).issues[0].message).toBe('Bank has no number');
    expect(validateBankDocument(raw, { fallbackNumber: 5 }).banks[0].number).toBe(5);
  });

  it('reports missing and empty categories', () => {
    const raw = makeRawBank(4);
    delete raw.shadow;
    raw.archetype = [];

    const result = validateBankDocument(raw);

    expect(result.valid).toBe(false);
    expect(result.issues.map(issue => issue.code)).toEqual(['missing_category', 'empty_category']);
    expect(result.issues[0].category).toBe('shadow');
    expect(result.issues[1].category).toBe('archetype');
  });

  it('reports non-string and blank entries with their index', () => {
    const raw = makeRawBank(6);
    raw.insight = ['A perfectly good entry about the number six.', 42, '   '];

    const result = validateBankDocument(raw);

    expect(result.issues).toEqual([
      {
        code: 'non_string_entry',
        severity: 'error',
        message: 'Entry 1 in "insight" is not a string',
        number: 6,
        category: 'insight',
        index: 1
      },
      {
        code: 'empty_entry',
        severity: 'error',
        message: 'Entry 2 in "insight" is blank',
        number: 6,
        category: 'insight',
        index: 2
      }
    ]);
  });

  it('maps aliases and warns about unknown categories', () => {
    const raw = makeRawBank(8);
    raw.astrological = raw.astrological_context;
    delete raw.astrological_context;
    raw.affirmation = ['Something outside the twelve categories.'];

    const result = validateBankDocument(raw);

    expect(result.valid).toBe(true);
    expect(result.banks[0].categories.astrological_context).toHaveLength(2);
    expect(result.issues).toEqual([
      {
        code: 'unknown_category',
        severity: 'warning',
        message: 'Unknown category "affirmation" ignored',
        number: 8,
        category: 'affirmation'
      }
    ]);
  });

  it('keeps extra generation_info keys and warns on bad types', () => {
    const raw = makeRawBank(9);
    raw.generation_info = { date: '2025-02-01', batch_size: '18', tool: 'manual' };

    const ok = validateBankDocument(raw);
    expect(ok.banks[0].generationInfo).toEqual({
      date: '2025-02-01',
      batchSize: 18,
      extra: { tool: 'manual' }
    });

    raw.generation_info = { theme: 7 };
    const bad = validateBankDocument(raw);
    expect(bad.valid).toBe(true);
    expect(bad.issues[0].code).toBe('invalid_generation_info');
    expect(bad.issues[0].message).toContain('generation_info.theme');
    expect(bad.banks[0].generationInfo).toEqual({ extra: { theme: 7 } });
  });

  it('rejects non-object documents', () => {
    expect(validateBankDocument([1, 2, 3]).issues[0].code).toBe('invalid_json_shape');
    expect(validateBankDocument('text').valid).toBe(false);
  });
});

describe('parseBankJson', () => {
  it('turns syntax errors into an issue', () => {
    const result = parseBankJson('{ "number": 1, ');

    expect(result.valid).toBe(false);
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0].code).toBe('invalid_json');
  });
});

describe('serializeBank', () => {
  it('writes the flat layout in canonical order', () => {
    const bank = makeBank(22, 1);
    const out = serializeBank(bank);

    expect(Object.keys(out)).toEqual(['number', 'generation_info', ...INSIGHT_CATEGORIES]);
    expect(out.generation_info).toEqual({
      date: '2025-01-15',
      time_context: 'morning',
      theme: 'steady beginnings',
      batch_size: 1
    });
  });

  it('round trips through validation', () => {
    const bank = makeBank(33, 3);
    const result = parseBankJson(stringifyBank(bank));

    expect(result.valid).toBe(true);
    expect(result.banks[0]).toEqual(bank);
  });
});
