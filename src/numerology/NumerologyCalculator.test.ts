/**
 * Numerology Calculator Tests
 */

import { describe, it, expect } from 'vitest';
import { BANK_NUMBERS } from '../core/constants.js';
import {
  LETTER_VALUES,
  expressionNumber,
  lifePathNumber,
  numberProfile,
  personalityNumber,
  reduceNumber,
  soulUrgeNumber
} from './NumerologyCalculator.js';

describe('reduceNumber', () => {
  it('keeps single digits and reduction masters', () => {
    expect(reduceNumber(7)).toBe(7);
    expect(reduceNumber(11)).toBe(11);
    expect(reduceNumber(22)).toBe(22);
    expect(reduceNumber(33)).toBe(33);
  });

  it('sums digits repeatedly', () => {
    expect(reduceNumber(1990)).toBe(1);
    expect(reduceNumber(29)).toBe(11);
    expect(reduceNumber(44)).toBe(8);
    expect(reduceNumber(99)).toBe(9);
    expect(reduceNumber(0)).toBe(0);
  });
});

describe('lifePathNumber', () => {
  it('reduces year, month and day separately', () => {
    expect(lifePathNumber('1990-07-15')).toBe(5);
    expect(lifePathNumber('1985-11-29')).toBe(9);
    expect(lifePathNumber('2000-09-11')).toBe(22);
  });

  it('rejects malformed or impossible dates', () => {
    expect(() => lifePathNumber('15/07/1990')).toThrow(RangeError);
    expect(() => lifePathNumber('2023-02-30')).toThrow('no such day');
  });
});

describe('name numbers', () => {
  it('uses Pythagorean letter values', () => {
    expect(LETTER_VALUES.A).toBe(1);
    expect(LETTER_VALUES.R).toBe(9);
    expect(LETTER_VALUES.Z).toBe(8);
  });

  it('computes expression, soul urge and personality', () => {
    expect(expressionNumber('John Smith')).toBe(8);
    expect(soulUrgeNumber('John Smith')).toBe(6);
    expect(personalityNumber('John Smith')).toBe(11);
  });

  it('ignores accents and punctuation', () => {
    expect(expressionNumber("Zoë O'Neil")).toBe(expressionNumber('Zoe ONeil'));
  });

  it('returns null without the needed letters', () => {
    expect(expressionNumber('123 !?')).toBeNull();
    expect(soulUrgeNumber('Lynn')).toBeNull();
  });
});

describe('numberProfile', () => {
  it('has a profile for every bank number', () => {
    for (const number of BANK_NUMBERS) {
      expect(numberProfile(number).number).toBe(number);
    }
  });

  it('marks master numbers', () => {
    expect(numberProfile(22)).toMatchObject({ archetype: 'The Master Builder', master: true });
    expect(numberProfile(4).master).toBe(false);
    expect(numberProfile(1).keywords).toContain('leadership');
  });
});
