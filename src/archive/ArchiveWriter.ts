/**
 * ArchiveWriter - Writes banks back in the archive layout.
 *
 * Layout: `<Source>_original.md` holding a title, a heading and the bank
 * as a fenced JSON block.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { extname, join } from 'path';
import { DEFAULT_SOURCE_TEMPLATE } from '../core/constants.js';
import { ArchiveParseError, BankValidationError } from '../core/errors.js';
import type { NumberInsightBank, SourceTier } from '../core/types.js';
import { serializeBank, stringifyBank, validateBankDocument } from '../schema/BankSchema.js';
import { extractJsonBlocks } from './ArchiveParser.js';

export interface WriteBankOptions {
  /** Source stem; `{number}` is replaced. Defaults to NumberMessages_Complete_{number} */
  source?: string;
  tier?: SourceTier;
  title?: string;
  force?: boolean;
}

export function renderBankMarkdown(bank: NumberInsightBank, title: string): string {
  return [
    `# ${title}`,
    '',
    `## Number ${bank.number} Insight Bank`,
    '',
    '```json',
    stringifyBank(bank),
    '```',
    ''
  ].join('\n');
}

export function bankFileName(bank: NumberInsightBank, options: WriteBankOptions = {}): string {
  const source = (options.source ?? DEFAULT_SOURCE_TEMPLATE).replace(/\{number\}/g, String(bank.number));
  return `${source}_${options.tier ?? 'original'}.md`;
}

export class ArchiveWriter {
  /**
   * Write a bank into dir. Returns the written path.
   */
  writeBankMarkdown(dir: string, bank: NumberInsightBank, options: WriteBankOptions = {}): string {
    const path = join(dir, bankFileName(bank, options));
    if (existsSync(path) && !options.force) {
      throw new ArchiveParseError(path, 'file already exists (use force to overwrite)');
    }

    const title = options.title ?? `Number ${bank.number} Messages`;
    mkdirSync(dir, { recursive: true });
    writeFileSync(path, renderBankMarkdown(bank, title), 'utf-8');
    return path;
  }

  /**
   * Replace the banks held by an existing archive file. JSON files are
   * rewritten whole; markdown keeps its prose and only its JSON blocks change.
   * Throws BankValidationError, leaving the file untouched, when a bank would
   * not validate once written.
   */
  rewriteFile(path: string, banks: NumberInsightBank[]): void {
    if (banks.length === 0) {
      throw new ArchiveParseError(path, 'no banks to write');
    }

    const errors = banks
      .flatMap(bank => validateBankDocument(serializeBank(bank)).issues)
      .filter(issue => issue.severity === 'error');
    if (errors.length > 0) {
      throw new BankValidationError(path, errors);
    }

    if (extname(path).toLowerCase() === '.json') {
      writeFileSync(path, stringifyBanks(path, banks) + '\n', 'utf-8');
      return;
    }

    const text = readText(path);
    const blocks = extractJsonBlocks(text);
    let replacements: string[];
    if (blocks.length === banks.length) {
      replacements = banks.map(bank => stringifyBank(bank));
    } else if (blocks.length === 1) {
      replacements = [stringifyBanks(path, banks)];
    } else {
      throw new ArchiveParseError(path, `holds ${blocks.length} JSON block(s) for ${banks.length} bank(s)`);
    }

    let output = '';
    let cursor = 0;
    blocks.forEach((block, index) => {
      const at = text.indexOf(block, cursor);
      if (at === -1) {
        throw new ArchiveParseError(path, 'JSON block moved while rewriting');
      }
      output += text.slice(cursor, at) + replacements[index];
      cursor = at + block.length;
    });
    output += text.slice(cursor);

    writeFileSync(path, output, 'utf-8');
  }
}

/**
 * One bank in the flat layout, several in the keyed layout.
 */
function stringifyBanks(path: string, banks: NumberInsightBank[]): string {
  if (banks.length === 1) {
    return stringifyBank(banks[0]);
  }
  const keyed: Record<string, unknown> = {};
  for (const bank of banks) {
    const key = String(bank.number);
    if (key in keyed) {
      throw new ArchiveParseError(path, `two banks for number ${key} cannot share a keyed file`);
    }
    keyed[key] = serializeBank(bank);
  }
  return JSON.stringify(keyed, null, 2);
}

function readText(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ArchiveParseError(path, error instanceof Error ? error.message : String(error));
  }
}
