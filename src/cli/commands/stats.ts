/**
 * Stats Command
 *
 * Summarize the archive: documents, coverage per number and duplicates.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { DuplicateDetector } from '../../dedupe/DuplicateDetector.js';
import { coverageReport } from '../../export/CoverageReport.js';
import { collectDocuments, fail, loadKitConfig, sourcedBanks, type GlobalOptions } from '../shared.js';

export const statsCommand = new Command('stats')
  .description('Display archive statistics')
  .argument('[dir]', 'Archive directory (defaults to the archive root)')
  .option('-c, --config <path>', 'Configuration file')
  .option('--json', 'Print statistics as JSON', false)
  .action(async (dir: string | undefined, options: GlobalOptions) => {
    const spinner = ora('Gathering statistics...').start();

    try {
      const config = loadKitConfig(options);
      const quiet = options.json === true;
      const documents = (await collectDocuments(dir ? [dir] : [], config, quiet)).map(l => l.document);

      const kinds = { bank: 0, essay: 0, prompt: 0 };
      for (const document of documents) {
        kinds[document.kind]++;
      }

      const banks = sourcedBanks(documents);
      const coverage = coverageReport(banks.map(b => b.bank));
      const duplicates = new DuplicateDetector({ nearThreshold: config.dedupe.nearThreshold, quiet: true }).analyze(banks);

      spinner.succeed('Statistics gathered');

      if (options.json) {
        console.log(JSON.stringify({
          documents: kinds,
          banks: banks.length,
          coverage,
          duplicates: {
            totalEntries: duplicates.totalEntries,
            uniqueEntries: duplicates.uniqueEntries,
            exactDuplicates: duplicates.exactDuplicateCount,
            nearDuplicates: duplicates.nearDuplicateCount,
            uniquenessScore: duplicates.uniquenessScore
          }
        }, null, 2));
        return;
      }

      console.log();
      console.log(chalk.cyan('Insight Archive Statistics'));
      console.log(chalk.dim('─'.repeat(40)));
      console.log();
      console.log(chalk.dim('Bank documents:'), chalk.white(kinds.bank.toString()));
      console.log(chalk.dim('Essays:'), chalk.white(kinds.essay.toString()));
      console.log(chalk.dim('Prompts:'), chalk.white(kinds.prompt.toString()));
      console.log(chalk.dim('Banks:'), chalk.white(banks.length.toString()));
      console.log();

      for (const number of coverage.numbers) {
        const missing = number.missingCategories.length > 0
          ? chalk.yellow(` missing: ${number.missingCategories.join(', ')}`)
          : '';
        console.log(`${chalk.white(String(number.number).padStart(2))}  ${number.total} entries in ${number.banks} bank(s)${missing}`);
      }
      if (coverage.missingNumbers.length > 0) {
        console.log(chalk.yellow(`No banks for: ${coverage.missingNumbers.join(', ')}`));
      }

      console.log();
      console.log(chalk.dim('Entries:'), chalk.white(duplicates.totalEntries.toString()));
      console.log(chalk.dim('Exact duplicates:'), chalk.white(duplicates.exactDuplicateCount.toString()));
      console.log(chalk.dim('Near duplicates:'), chalk.white(duplicates.nearDuplicateCount.toString()));
      console.log(chalk.dim('Uniqueness:'), chalk.white(`${(duplicates.uniquenessScore * 100).toFixed(1)}%`));
      console.log();
    } catch (error) {
      fail(spinner, 'Failed to gather statistics', error);
    }
  });
