/**
 * Lint Command
 *
 * Report content quality problems in insight banks.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { lintDocuments } from '../../lint/ContentLinter.js';
import { collectDocuments, fail, loadKitConfig, type GlobalOptions } from '../shared.js';

export const lintCommand = new Command('lint')
  .description('Check insight bank content against the quality rules')
  .argument('[paths...]', 'Files or directories (defaults to the archive root)')
  .option('-c, --config <path>', 'Configuration file')
  .option('--json', 'Print findings as JSON', false)
  .action(async (paths: string[], options: GlobalOptions) => {
    const spinner = ora('Linting banks...').start();

    try {
      const config = loadKitConfig(options);
      const loaded = await collectDocuments(paths, config, options.json === true);
      const report = lintDocuments(loaded.map(l => l.document), config.lint);

      const summary = `${report.errorCount} error(s), ${report.warningCount} warning(s)`;
      if (report.errorCount > 0) {
        spinner.fail(chalk.red(summary));
      } else if (report.warningCount > 0) {
        spinner.warn(chalk.yellow(summary));
      } else {
        spinner.succeed('No lint findings');
      }

      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        for (const finding of report.findings) {
          let where = `${finding.path ?? ''} #${finding.number}`;
          if (finding.category) where += ` ${finding.category}`;
          if (finding.index !== undefined) where += `[${finding.index}]`;
          const level = finding.severity === 'error' ? chalk.red('error  ') : chalk.yellow('warning');
          console.log(`${level} ${chalk.dim(finding.rule)} ${where}: ${finding.message}`);
        }
      }

      if (report.errorCount > 0) {
        process.exit(1);
      }
    } catch (error) {
      fail(spinner, 'Lint failed', error);
    }
  });
