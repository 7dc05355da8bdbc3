/**
 * Prompt Command
 *
 * Print the paste-ready generation prompt for a number.
 */

import { Command } from 'commander';
import { writeFileSync } from 'fs';
import chalk from 'chalk';
import { ArchiveReader } from '../../archive/ArchiveReader.js';
import type { NumberInsightBank } from '../../core/types.js';
import { PERSONAS, isPersona, renderPromptTemplate, type Persona } from '../../prompts/BankPromptTemplate.js';
import { parseBankNumber, parsePositiveInteger } from '../shared.js';

interface PromptOptions {
  theme?: string;
  time?: string;
  batch?: string;
  persona?: string;
  examples?: string;
  out?: string;
}

/**
 * First bank for the number in an examples file, if any.
 */
export function loadExampleBank(path: string, number: number): NumberInsightBank | undefined {
  const documents = new ArchiveReader({ quiet: true }).readFile(path);
  return documents.flatMap(document => document.banks).find(bank => bank.number === number);
}

export function parsePersona(value: string | undefined): Persona | undefined {
  if (value === undefined) return undefined;
  if (!isPersona(value)) {
    throw new Error(`Unknown persona "${value}" (expected one of: ${PERSONAS.join(', ')})`);
  }
  return value;
}

export const promptCommand = new Command('prompt')
  .description('Print the generation prompt for a number')
  .argument('<number>', 'Bank number (1-9, 11, 22, 33, 44)')
  .option('--theme <theme>', 'Theme for the new entries')
  .option('--time <context>', 'Time of day or season the entries speak to')
  .option('-b, --batch <size>', 'Entries per category')
  .option('-p, --persona <persona>', `Voice (${PERSONAS.join(', ')})`)
  .option('-e, --examples <file>', 'Existing bank file to take tone examples from')
  .option('-o, --out <file>', 'Write to a file instead of stdout')
  .action((numberArg: string, options: PromptOptions) => {
    try {
      const number = parseBankNumber(numberArg);
      const text = renderPromptTemplate({
        number,
        theme: options.theme,
        timeContext: options.time,
        batchSize: options.batch !== undefined ? parsePositiveInteger(options.batch, 'Batch size') : undefined,
        persona: parsePersona(options.persona),
        examples: options.examples ? loadExampleBank(options.examples, number) : undefined
      });

      if (options.out) {
        writeFileSync(options.out, text, 'utf-8');
        console.log(chalk.green(`Prompt written to ${options.out}`));
      } else {
        console.log(text);
      }
    } catch (error) {
      console.error(chalk.red('Prompt failed'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
