#!/usr/bin/env node
/**
 * Insight Bank CLI
 *
 * Command-line interface for checking, cleaning, generating and exporting
 * numerology insight banks.
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { validateCommand } from './commands/validate.js';
import { lintCommand } from './commands/lint.js';
import { dedupeCommand } from './commands/dedupe.js';
import { normalizeCommand } from './commands/normalize.js';
import { statsCommand } from './commands/stats.js';
import { manifestCommand } from './commands/manifest.js';
import { exportCommand } from './commands/export.js';
import { promptCommand } from './commands/prompt.js';
import { generateCommand } from './commands/generate.js';
import { catalogCommand } from './commands/catalog.js';
import { calcCommand } from './commands/calc.js';

const program = new Command();

program
  .name('insight-bank')
  .description('Validate, clean, generate and export numerology insight banks')
  .version('0.1.0');

program.addCommand(initCommand);
program.addCommand(validateCommand);
program.addCommand(lintCommand);
program.addCommand(dedupeCommand);
program.addCommand(normalizeCommand);
program.addCommand(statsCommand);
program.addCommand(manifestCommand);
program.addCommand(exportCommand);
program.addCommand(promptCommand);
program.addCommand(generateCommand);
program.addCommand(catalogCommand);
program.addCommand(calcCommand);

program.parse();
