/**
 * Export Command
 *
 * Merge the archive's valid banks into one runtime bundle file.
 */

import { Command } from 'commander';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { buildRuntimeBundle, serializeRuntimeBundle } from '../../export/RuntimeBundle.js';
import { collectDocuments, fail, loadKitConfig, type GlobalOptions } from '../shared.js';

interface ExportOptions extends GlobalOptions {
  out: string;
}

export const exportCommand = new Command('export')
  .description('Write a runtime bundle with one merged bank per number')
  .argument('[dir]', 'Archive directory (defaults to the archive root)')
  .requiredOption('-o, --out <file>', 'Bundle file to write')
  .option('-c, --config <path>', 'Configuration file')
  .option('--json', 'Print a summary as JSON', false)
  .action(async (dir: string | undefined, options: ExportOptions) => {
    const spinner = ora('Building runtime bundle...').start();

    try {
      const config = loadKitConfig(options);
      const loaded = await collectDocuments(dir ? [dir] : [], config, options.json === true);

      // Only documents without errors make it into the bundle
      const skipped = loaded.filter(({ document }) => document.issues.some(issue => issue.severity === 'error'));
      const banks = loaded
        .filter(({ document }) => !document.issues.some(issue => issue.severity === 'error'))
        .flatMap(({ document }) => document.banks);

      const bundle = buildRuntimeBundle(banks);
      mkdirSync(dirname(options.out), { recursive: true });
      writeFileSync(options.out, JSON.stringify(serializeRuntimeBundle(bundle), null, 2) + '\n', 'utf-8');

      spinner.succeed(`Bundle written to ${options.out}`);

      const summary = {
        out: options.out,
        numbers: bundle.numbers,
        totalEntries: bundle.totalEntries,
        droppedDuplicates: bundle.droppedDuplicates,
        skippedDocuments: skipped.map(({ document }) => document.path)
      };

      if (options.json) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }

      console.log();
      console.log(chalk.dim('Numbers:'), chalk.white(bundle.numbers.join(', ') || '(none)'));
      console.log(chalk.dim('Entries:'), chalk.white(bundle.totalEntries.toString()));
      console.log(chalk.dim('Duplicates dropped:'), chalk.white(bundle.droppedDuplicates.toString()));
      for (const path of summary.skippedDocuments) {
        console.log(chalk.yellow(`Skipped ${path}: has validation errors`));
      }
    } catch (error) {
      fail(spinner, 'Export failed', error);
    }
  });
