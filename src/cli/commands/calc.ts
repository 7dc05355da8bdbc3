/**
 * Calc Command
 *
 * Numerology calculations: life path, expression, soul urge, personality.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { isBankNumber } from '../../core/types.js';
import {
  expressionNumber,
  lifePathNumber,
  numberProfile,
  personalityNumber,
  soulUrgeNumber
} from '../../numerology/NumerologyCalculator.js';

interface CalcOptions {
  json?: boolean;
}

function report(kind: string, input: string, value: number | null, options: CalcOptions): void {
  const profile = value !== null && isBankNumber(value) ? numberProfile(value) : undefined;

  if (options.json) {
    console.log(JSON.stringify({
      kind,
      input,
      number: value,
      archetype: profile?.archetype ?? null,
      keywords: profile?.keywords ?? [],
      master: profile?.master ?? false
    }, null, 2));
    return;
  }

  if (value === null) {
    console.log(chalk.yellow(`No ${kind} number: "${input}" has no letters to count`));
    return;
  }

  console.log(`${chalk.dim(`${kind}:`)} ${chalk.white(String(value))}` + (profile?.master ? chalk.cyan(' (master)') : ''));
  if (profile) {
    console.log(chalk.dim('Archetype:'), profile.archetype);
    console.log(chalk.dim('Keywords:'), profile.keywords.join(', '));
  }
}

function nameCommand(name: string, kind: string, calculate: (input: string) => number | null): Command {
  return new Command(name)
    .description(`Calculate the ${kind} number of a name`)
    .argument('<name...>', 'Full name')
    .option('--json', 'Print the result as JSON', false)
    .action((parts: string[], options: CalcOptions) => {
      const input = parts.join(' ');
      report(kind, input, calculate(input), options);
    });
}

const lifePathCommand = new Command('life-path')
  .description('Calculate the life path number of a birth date')
  .argument('<date>', 'Birth date (YYYY-MM-DD)')
  .option('--json', 'Print the result as JSON', false)
  .action((date: string, options: CalcOptions) => {
    try {
      report('Life path', date, lifePathNumber(date), options);
    } catch (error) {
      console.error(chalk.red(error instanceof Error ? error.message : String(error)));
      process.exit(1);
    }
  });

export const calcCommand = new Command('calc')
  .description('Numerology calculations')
  .addCommand(lifePathCommand)
  .addCommand(nameCommand('expression', 'Expression', expressionNumber))
  .addCommand(nameCommand('soul-urge', 'Soul urge', soulUrgeNumber))
  .addCommand(nameCommand('personality', 'Personality', personalityNumber));
