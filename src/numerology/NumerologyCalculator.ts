/**
 * Numerology Calculator
 *
 * Pythagorean letter values and digit reduction. Reduction stops at the
 * master numbers 11, 22 and 33; 44 exists as a bank but reduces like any
 * other sum.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { REDUCTION_MASTERS } from '../core/constants.js';
import { isMasterNumber, type BankNumber } from '../core/types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// ==========================================
// LETTERS
// ==========================================

const LETTER_GROUPS = ['AJS', 'BKT', 'CLU', 'DMV', 'ENW', 'FOX', 'GPY', 'HQZ', 'IR'];

export const LETTER_VALUES: Readonly<Record<string, number>> = Object.fromEntries(
  LETTER_GROUPS.flatMap((letters, index) => letters.split('').map((letter): [string, number] => [letter, index + 1]))
);

const VOWELS = new Set(['A', 'E', 'I', 'O', 'U']);

/**
 * Upper-case A-Z letters of a name, accents stripped.
 */
function nameLetters(name: string): string[] {
  return name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toUpperCase()
    .split('')
    .filter(char => LETTER_VALUES[char] !== undefined);
}

function letterSum(letters: string[]): number {
  return letters.reduce((sum, letter) => sum + (LETTER_VALUES[letter] ?? 0), 0);
}

// ==========================================
// REDUCTION
// ==========================================

function isReductionMaster(value: number): boolean {
  return REDUCTION_MASTERS.some(master => master === value);
}

function digitSum(value: number): number {
  return String(value).split('').reduce((sum, digit) => sum + Number(digit), 0);
}

/**
 * Sum digits until a single digit or a master number remains.
 * 0 stays 0; any other input never reduces to 0.
 */
export function reduceNumber(value: number): number {
  let current = Math.abs(Math.trunc(value));
  if (current === 0) return 0;

  while (current > 9 && !isReductionMaster(current)) {
    current = digitSum(current);
  }
  return current === 0 ? 9 : current;
}

// ==========================================
// CORE NUMBERS
// ==========================================

/**
 * Life path from an ISO date (YYYY-MM-DD): year, month and day are reduced
 * separately, summed, then reduced.
 */
export function lifePathNumber(isoDate: string): number {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(isoDate.trim());
  if (!match) {
    throw new RangeError(`Invalid date "${isoDate}" (expected YYYY-MM-DD)`);
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new RangeError(`Invalid date "${isoDate}" (no such day)`);
  }

  return reduceNumber(reduceNumber(year) + reduceNumber(month) + reduceNumber(day));
}

/**
 * Expression (destiny) number from every letter of the full name.
 */
export function expressionNumber(name: string): number | null {
  const letters = nameLetters(name);
  return letters.length === 0 ? null : reduceNumber(letterSum(letters));
}

/**
 * Soul urge (heart's desire) number from the vowels A E I O U.
 */
export function soulUrgeNumber(name: string): number | null {
  const vowels = nameLetters(name).filter(letter => VOWELS.has(letter));
  return vowels.length === 0 ? null : reduceNumber(letterSum(vowels));
}

/**
 * Personality number from the consonants.
 */
export function personalityNumber(name: string): number | null {
  const consonants = nameLetters(name).filter(letter => !VOWELS.has(letter));
  return consonants.length === 0 ? null : reduceNumber(letterSum(consonants));
}

// ==========================================
// PROFILES
// ==========================================

const NumberProfileSchema = z.object({
  number: z.number().int(),
  archetype: z.string(),
  theme: z.string(),
  energy: z.string(),
  keywords: z.array(z.string()),
  supportingNumbers: z.array(z.number().int())
});

export type NumberProfile = z.infer<typeof NumberProfileSchema> & { master: boolean };

let profiles: Map<number, NumberProfile> | null = null;

function loadProfiles(): Map<number, NumberProfile> {
  if (!profiles) {
    const raw: unknown = JSON.parse(readFileSync(join(__dirname, 'number-profiles.json'), 'utf-8'));
    const parsed = z.array(NumberProfileSchema).parse(raw);
    profiles = new Map(parsed.map(profile => [profile.number, { ...profile, master: isMasterNumber(profile.number) }]));
  }
  return profiles;
}

export function numberProfile(number: BankNumber): NumberProfile {
  const profile = loadProfiles().get(number);
  if (!profile) {
    throw new Error(`No profile for number ${number}`);
  }
  return profile;
}
