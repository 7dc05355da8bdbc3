/**
 * Normalize Command
 *
 * Strip LLM artifacts, fix whitespace and quotes, and drop empty entries.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { ArchiveWriter } from '../../archive/ArchiveWriter.js';
import { BankValidationError } from '../../core/errors.js';
import type { InsightCategory } from '../../core/types.js';
import {
  addChanges,
  emptyChanges,
  normalizeBank,
  totalChanges,
  type NormalizationChanges
} from '../../normalize/ContentNormalizer.js';
import { collectDocuments, fail, loadKitConfig, type GlobalOptions } from '../shared.js';

interface NormalizeOptions extends GlobalOptions {
  write?: boolean;
}

interface FileChanges {
  path: string;
  changes: NormalizationChanges;
  emptied: InsightCategory[];
  written: boolean;
  /** Why the file was not written back */
  skipped?: string;
}

export const normalizeCommand = new Command('normalize')
  .description('Clean up entry text in insight banks')
  .argument('[paths...]', 'Files or directories (defaults to the archive root)')
  .option('-c, --config <path>', 'Configuration file')
  .option('-w, --write', 'Write the cleaned banks back', false)
  .option('--json', 'Print the changes as JSON', false)
  .action(async (paths: string[], options: NormalizeOptions) => {
    const spinner = ora('Normalizing banks...').start();

    try {
      const config = loadKitConfig(options);
      const loaded = await collectDocuments(paths, config, options.json === true);
      const writer = new ArchiveWriter();

      const files: FileChanges[] = [];
      const totals = emptyChanges();

      for (const { document, file } of loaded) {
        if (document.banks.length === 0) continue;

        const changes = emptyChanges();
        const emptied: InsightCategory[] = [];
        const banks = document.banks.map(bank => {
          const result = normalizeBank(bank);
          addChanges(changes, result.changes);
          emptied.push(...result.emptiedCategories);
          return result.bank;
        });
        if (totalChanges(changes) === 0) continue;

        addChanges(totals, changes);

        const entry: FileChanges = { path: document.path, changes, emptied, written: false };
        if (options.write) {
          if (file === null || document.issues.some(issue => issue.severity === 'error')) {
            entry.skipped = 'cannot be rewritten in place';
          } else {
            try {
              writer.rewriteFile(file, banks);
              entry.written = true;
            } catch (error) {
              if (!(error instanceof BankValidationError)) throw error;
              entry.skipped = error.message;
            }
          }
        }
        files.push(entry);
      }

      spinner.succeed(`${totalChanges(totals)} change(s) in ${files.length} document(s)`);

      if (options.json) {
        console.log(JSON.stringify({ totals, files }, null, 2));
        return;
      }

      for (const entry of files) {
        const { changes } = entry;
        console.log(
          `${chalk.cyan(entry.path)}: ${changes.artifactsRemoved} artifact(s), ` +
          `${changes.quotesStraightened} quote(s), ${changes.whitespaceFixed} whitespace, ` +
          `${changes.emptyDropped} empty` + (entry.written ? chalk.green(' (written)') : '')
        );
        if (entry.emptied.length > 0) {
          console.log(chalk.yellow(`  left empty: ${entry.emptied.join(', ')}`));
        }
        if (entry.skipped) {
          console.log(chalk.yellow(`  not written: ${entry.skipped}`));
        }
      }
      if (!options.write && files.length > 0) {
        console.log();
        console.log(chalk.dim('Run with --write to save the changes.'));
      }
    } catch (error) {
      fail(spinner, 'Normalization failed', error);
    }
  });
