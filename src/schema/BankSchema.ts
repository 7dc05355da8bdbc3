/**
 * Bank Schema
 *
 * Structural validation for insight bank JSON. Three layouts are read:
 *
 *   flat     { number, generation_info?, insight: [...], ... }
 *   wrapped  { number, generation_info?, categories: { insight: [...], ... } }
 *   keyed    { "2": { insight: [...], ... }, "5": { ... } }
 *
 * Only the flat layout is ever written.
 */

import { z } from 'zod';
import { INSIGHT_CATEGORIES } from '../core/constants.js';
import {
  canonicalCategory,
  emptyCategoryMap,
  isBankNumber,
  type BankIssue,
  type BankNumber,
  type GenerationInfo,
  type NumberInsightBank
} from '../core/types.js';

// ==========================================
// SCHEMAS
// ==========================================

const GenerationInfoSchema = z
  .object({
    date: z.string().optional(),
    time_context: z.string().optional(),
    theme: z.string().optional(),
    batch_size: z
      .union([z.number().int().positive(), z.string().regex(/^\d+$/).transform(Number)])
      .optional(),
    model: z.string().optional()
  })
  .passthrough();

const GENERATION_INFO_KEYS = ['date', 'time_context', 'theme', 'batch_size', 'model'];

/** Top-level keys that describe a bank rather than hold entries */
const METADATA_KEYS = ['number', 'generation_info', 'categories', 'title', 'source', 'persona'];

export interface BankValidationResult {
  banks: NumberInsightBank[];
  issues: BankIssue[];
  /** At least one bank and no error issues */
  valid: boolean;
}

export interface ValidateOptions {
  /** Number to use when a flat bank carries none (e.g. taken from its file name) */
  fallbackNumber?: BankNumber;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toBankNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value.trim());
  return undefined;
}

// ==========================================
// VALIDATION
// ==========================================

/**
 * Parse JSON text and validate it. Syntax errors become an `invalid_json` issue.
 */
export function parseBankJson(text: string, options: ValidateOptions = {}): BankValidationResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      banks: [],
      issues: [{ code: 'invalid_json', severity: 'error', message: `Invalid JSON: ${message}` }],
      valid: false
    };
  }
  return validateBankDocument(raw, options);
}

/**
 * Validate an already-parsed JSON value holding one or more banks.
 */
export function validateBankDocument(raw: unknown, options: ValidateOptions = {}): BankValidationResult {
  const issues: BankIssue[] = [];
  const banks: NumberInsightBank[] = [];

  if (!isRecord(raw)) {
    issues.push({ code: 'invalid_json_shape', severity: 'error', message: 'Expected a JSON object' });
    return { banks, issues, valid: false };
  }

  const keys = Object.keys(raw);
  const keyed = keys.length > 0 && keys.every(key => /^\d+$/.test(key));

  if (keyed) {
    for (const key of keys) {
      const body = raw[key];
      if (!isRecord(body)) {
        issues.push({
          code: 'invalid_json_shape',
          severity: 'error',
          message: `Bank "${key}" must be an object`,
          number: Number(key)
        });
        continue;
      }
      const entries = isRecord(body.categories) ? body.categories : body;
      const bank = readBank(Number(key), entries, issues, body.generation_info);
      if (bank) banks.push(bank);
    }
  } else {
    let numberValue: unknown = raw.number;
    if (numberValue === undefined && options.fallbackNumber !== undefined) {
      numberValue = options.fallbackNumber;
    }
    const body = isRecord(raw.categories) ? raw.categories : raw;
    const bank = readBank(numberValue, body, issues, raw.generation_info);
    if (bank) banks.push(bank);
  }

  const valid = banks.length > 0 && !issues.some(issue => issue.severity === 'error');
  return { banks, issues, valid };
}

/**
 * Read one bank body. Returns undefined when the bank has any error.
 */
function readBank(
  numberValue: unknown,
  body: Record<string, unknown>,
  issues: BankIssue[],
  generationInfoValue: unknown = body.generation_info
): NumberInsightBank | undefined {
  const errorsBefore = issues.filter(issue => issue.severity === 'error').length;

  const parsedNumber = toBankNumber(numberValue);
  if (numberValue === undefined) {
    issues.push({ code: 'invalid_number', severity: 'error', message: 'Bank has no number' });
    return undefined;
  }
  if (parsedNumber === undefined || !isBankNumber(parsedNumber)) {
    issues.push({
      code: 'invalid_number',
      severity: 'error',
      message: `Number ${JSON.stringify(numberValue)} is not a bank number (1-9, 11, 22, 33, 44)`
    });
    return undefined;
  }
  const number = parsedNumber;

  const categories = emptyCategoryMap();
  const seen = new Set<string>();

  for (const [key, value] of Object.entries(body)) {
    if (METADATA_KEYS.includes(key)) continue;

    const category = canonicalCategory(key);
    if (!category) {
      issues.push({
        code: 'unknown_category',
        severity: 'warning',
        message: `Unknown category "${key}" ignored`,
        number,
        category: key
      });
      continue;
    }
    if (!Array.isArray(value)) {
      issues.push({
        code: 'invalid_json_shape',
        severity: 'error',
        message: `Category "${key}" must be an array`,
        number,
        category
      });
      seen.add(category);
      continue;
    }

    seen.add(category);
    value.forEach((entry: unknown, index: number) => {
      if (typeof entry !== 'string') {
        issues.push({
          code: 'non_string_entry',
          severity: 'error',
          message: `Entry ${index} in "${category}" is not a string`,
          number,
          category,
          index
        });
      } else if (entry.trim() === '') {
        issues.push({
          code: 'empty_entry',
          severity: 'error',
          message: `Entry ${index} in "${category}" is blank`,
          number,
          category,
          index
        });
      } else {
        categories[category].push(entry);
      }
    });
  }

  for (const category of INSIGHT_CATEGORIES) {
    if (!seen.has(category)) {
      issues.push({
        code: 'missing_category',
        severity: 'error',
        message: `Missing category "${category}"`,
        number,
        category
      });
    } else if (categories[category].length === 0 && !issues.some(
      issue => issue.number === number && issue.category === category && issue.severity === 'error'
    )) {
      issues.push({
        code: 'empty_category',
        severity: 'error',
        message: `Category "${category}" is empty`,
        number,
        category
      });
    }
  }

  const generationInfo = readGenerationInfo(generationInfoValue, number, issues);

  const errorsAfter = issues.filter(issue => issue.severity === 'error').length;
  if (errorsAfter > errorsBefore) {
    return undefined;
  }
  return { number, generationInfo, categories };
}

function readGenerationInfo(
  value: unknown,
  number: number,
  issues: BankIssue[]
): GenerationInfo | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    issues.push({
      code: 'invalid_generation_info',
      severity: 'warning',
      message: 'generation_info is not an object',
      number
    });
    return undefined;
  }

  const extra: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!GENERATION_INFO_KEYS.includes(key)) extra[key] = entry;
  }

  const parsed = GenerationInfoSchema.safeParse(value);
  if (!parsed.success) {
    for (const problem of parsed.error.issues) {
      issues.push({
        code: 'invalid_generation_info',
        severity: 'warning',
        message: `generation_info.${problem.path.join('.')}: ${problem.message}`,
        number
      });
    }
    return { extra: { ...value } };
  }

  const info: GenerationInfo = { extra };
  if (parsed.data.date !== undefined) info.date = parsed.data.date;
  if (parsed.data.time_context !== undefined) info.timeContext = parsed.data.time_context;
  if (parsed.data.theme !== undefined) info.theme = parsed.data.theme;
  if (parsed.data.batch_size !== undefined) info.batchSize = parsed.data.batch_size;
  if (parsed.data.model !== undefined) info.model = parsed.data.model;
  return info;
}

// ==========================================
// SERIALIZATION
// ==========================================

/**
 * Flat snake_case layout in canonical category order.
 */
export function serializeBank(bank: NumberInsightBank): Record<string, unknown> {
  const out: Record<string, unknown> = { number: bank.number };

  if (bank.generationInfo) {
    const info = bank.generationInfo;
    const generation: Record<string, unknown> = {};
    if (info.date !== undefined) generation.date = info.date;
    if (info.timeContext !== undefined) generation.time_context = info.timeContext;
    if (info.theme !== undefined) generation.theme = info.theme;
    if (info.batchSize !== undefined) generation.batch_size = info.batchSize;
    if (info.model !== undefined) generation.model = info.model;
    Object.assign(generation, info.extra);
    out.generation_info = generation;
  }

  for (const category of INSIGHT_CATEGORIES) {
    out[category] = [...bank.categories[category]];
  }
  return out;
}

export function stringifyBank(bank: NumberInsightBank): string {
  return JSON.stringify(serializeBank(bank), null, 2);
}
