/**
 * Validate Command
 *
 * Check that every bank in the archive parses and holds the twelve categories.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { collectDocuments, fail, loadKitConfig, type GlobalOptions } from '../shared.js';

interface ValidateOptions extends GlobalOptions {
  strict?: boolean;
}

export const validateCommand = new Command('validate')
  .description('Validate the structure of insight banks')
  .argument('[paths...]', 'Files or directories (defaults to the archive root)')
  .option('-c, --config <path>', 'Configuration file')
  .option('--strict', 'Treat warnings as failures', false)
  .option('--json', 'Print the report as JSON', false)
  .action(async (paths: string[], options: ValidateOptions) => {
    const spinner = ora('Validating banks...').start();

    try {
      const config = loadKitConfig(options);
      const loaded = await collectDocuments(paths, config, options.json === true);

      const reports = loaded
        .map(({ document }) => ({
          path: document.path,
          kind: document.kind,
          banks: document.banks.map(bank => bank.number),
          errors: document.issues.filter(issue => issue.severity === 'error'),
          warnings: document.issues.filter(issue => issue.severity === 'warning')
        }))
        .filter(report => report.kind === 'bank');

      const errorCount = reports.reduce((sum, r) => sum + r.errors.length, 0);
      const warningCount = reports.reduce((sum, r) => sum + r.warnings.length, 0);
      const bankCount = reports.reduce((sum, r) => sum + r.banks.length, 0);
      const failed = errorCount > 0 || (options.strict === true && warningCount > 0);

      if (failed) {
        spinner.fail(chalk.red(`${errorCount} error(s), ${warningCount} warning(s) in ${reports.length} bank document(s)`));
      } else {
        spinner.succeed(`${bankCount} bank(s) valid across ${reports.length} document(s)`);
      }

      if (options.json) {
        console.log(JSON.stringify({ valid: !failed, bankCount, errorCount, warningCount, documents: reports }, null, 2));
      } else {
        for (const report of reports) {
          if (report.errors.length === 0 && report.warnings.length === 0) continue;
          console.log();
          console.log(chalk.cyan(report.path));
          for (const issue of report.errors) {
            console.log(`  ${chalk.red('error')}   ${issue.message}`);
          }
          for (const issue of report.warnings) {
            console.log(`  ${chalk.yellow('warning')} ${issue.message}`);
          }
        }
      }

      if (failed) {
        process.exit(1);
      }
    } catch (error) {
      fail(spinner, 'Validation failed', error);
    }
  });
