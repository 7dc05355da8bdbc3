/**
 * ArchiveReader / ArchiveWriter Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ArchiveParseError, BankValidationError } from '../core/errors.js';
import { makeBank, makeRawBank } from '../testing/fixtures.js';
import { ArchiveReader } from './ArchiveReader.js';
import { ArchiveWriter, bankFileName } from './ArchiveWriter.js';

describe('ArchiveReader', () => {
  let dir: string;
  let reader: ArchiveReader;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'insight-archive-'));
    reader = new ArchiveReader({ quiet: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a directory in path order with relative paths', async () => {
    mkdirSync(join(dir, 'banks'));
    writeFileSync(join(dir, 'banks', 'Complete_2.json'), JSON.stringify(makeRawBank(2)));
    writeFileSync(join(dir, 'essay.md'), '# Number Two\n\nText.');
    writeFileSync(join(dir, 'ignored.yaml'), 'a: 1');

    const docs = await reader.readDirectory(dir);

    expect(docs.map(doc => doc.path)).toEqual(['banks/Complete_2.json', 'essay.md']);
    expect(docs.map(doc => doc.kind)).toEqual(['bank', 'essay']);
    expect(docs[1].number).toBe(2);
  });

  it('expands bundles into one document per record', () => {
    const bundle = [
      '=== Source_3_original.md ===',
      '```json',
      JSON.stringify(makeRawBank(3)),
      '```',
      '=== Notes_5.md ===',
      '# Notes',
      ''
    ].join('\n');
    const path = join(dir, 'bundle.txt');
    writeFileSync(path, bundle);

    const viaFile = reader.readFile(path);
    const viaBundle = reader.readBundle(path);

    expect(viaFile.map(doc => doc.path)).toEqual(['Source_3_original.md', 'Notes_5.md']);
    expect(viaBundle.map(doc => doc.kind)).toEqual(['bank', 'essay']);
    expect(viaBundle[1].number).toBe(5);
    expect(viaFile[0].bundle).toBe(path);
  });

  it('throws ArchiveParseError for unreadable files', () => {
    expect(() => reader.readFile(join(dir, 'missing.md'))).toThrow(ArchiveParseError);
  });
});

describe('ArchiveWriter', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'insight-writer-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('names files from the source template', () => {
    const bank = makeBank(11, 1);
    expect(bankFileName(bank)).toBe('NumberMessages_Complete_11_original.md');
    expect(bankFileName(bank, { source: 'Oracle_{number}', tier: 'advanced' })).toBe('Oracle_11_advanced.md');
  });

  it('writes markdown the reader reads back', () => {
    const writer = new ArchiveWriter();
    const bank = makeBank(7, 2);

    const path = writer.writeBankMarkdown(dir, bank);
    const text = readFileSync(path, 'utf-8');
    const [doc] = new ArchiveReader({ quiet: true }).readFile(path);

    expect(text.split('\n').slice(0, 5)).toEqual([
      '# Number 7 Messages',
      '',
      '## Number 7 Insight Bank',
      '',
      '```json'
    ]);
    expect(doc.kind).toBe('bank');
    expect(doc.banks[0]).toEqual(bank);
  });

  it('refuses to overwrite unless forced', () => {
    const writer = new ArchiveWriter();
    const bank = makeBank(1, 1);
    writer.writeBankMarkdown(dir, bank);

    expect(() => writer.writeBankMarkdown(dir, bank)).toThrow(/already exists/);
    expect(() => writer.writeBankMarkdown(dir, bank, { force: true })).not.toThrow();
  });

  it('rewrites the JSON block of a markdown file and keeps its prose', () => {
    const writer = new ArchiveWriter();
    const path = join(dir, 'Two_original.md');
    writeFileSync(path, ['# Two', '', 'Intro prose.', '', '```json', JSON.stringify(makeRawBank(2)), '```', '', 'Closing prose.', ''].join('\n'));

    const smaller = makeBank(2, 1);
    writer.rewriteFile(path, [smaller]);

    const text = readFileSync(path, 'utf-8');
    const [doc] = new ArchiveReader({ quiet: true }).readFile(path);
    expect(text.startsWith('# Two\n\nIntro prose.\n\n```json\n{')).toBe(true);
    expect(text.endsWith('```\n\nClosing prose.\n')).toBe(true);
    expect(doc.banks).toEqual([smaller]);
  });

  it('refuses to rewrite a file with a bank that would not validate', () => {
    const writer = new ArchiveWriter();
    const path = join(dir, 'Five_original.json');
    const original = JSON.stringify(makeRawBank(5));
    writeFileSync(path, original);

    const emptied = makeBank(5, 1);
    emptied.categories.shadow = [];

    expect(() => writer.rewriteFile(path, [emptied])).toThrow(BankValidationError);
    expect(() => writer.rewriteFile(path, [emptied])).toThrow(/Category "shadow" is empty/);
    expect(readFileSync(path, 'utf-8')).toBe(original);
  });

  it('writes several banks to a JSON file in the keyed layout', () => {
    const writer = new ArchiveWriter();
    const path = join(dir, 'pair.json');
    writeFileSync(path, '{}');

    writer.rewriteFile(path, [makeBank(3, 1), makeBank(4, 1)]);

    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    expect(Object.keys(parsed ?? {})).toEqual(['3', '4']);
    const [doc] = new ArchiveReader({ quiet: true }).readFile(path);
    expect(doc.banks.map(bank => bank.number)).toEqual([3, 4]);
  });
});
