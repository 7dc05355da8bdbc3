/**
 * Dedupe Command
 *
 * Find exact and near-duplicate entries across the archive, optionally
 * removing them from the files in place.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { ArchiveWriter } from '../../archive/ArchiveWriter.js';
import { BankValidationError } from '../../core/errors.js';
import type { NumberInsightBank } from '../../core/types.js';
import { DuplicateDetector, type SourcedBank } from '../../dedupe/DuplicateDetector.js';
import { collectDocuments, fail, loadKitConfig, type GlobalOptions, type LoadedDocument } from '../shared.js';

interface DedupeOptions extends GlobalOptions {
  write?: boolean;
  threshold?: string;
}

export const dedupeCommand = new Command('dedupe')
  .description('Find duplicate entries across the archive')
  .argument('[dir]', 'Archive directory (defaults to the archive root)')
  .option('-c, --config <path>', 'Configuration file')
  .option('-t, --threshold <ratio>', 'Near-duplicate similarity threshold (0-1)')
  .option('-w, --write', 'Remove duplicates from the files', false)
  .option('--json', 'Print the report as JSON', false)
  .action(async (dir: string | undefined, options: DedupeOptions) => {
    const spinner = ora('Scanning for duplicates...').start();

    try {
      const config = loadKitConfig(options);
      const threshold = options.threshold !== undefined ? Number(options.threshold) : config.dedupe.nearThreshold;
      if (!(threshold > 0 && threshold <= 1)) {
        throw new Error(`Threshold must be between 0 and 1, got "${options.threshold}"`);
      }

      const quiet = options.json === true;
      const loaded = await collectDocuments(dir ? [dir] : [], config, quiet);

      // Remember which document each bank came from
      const owners: LoadedDocument[] = [];
      const sourced: SourcedBank[] = [];
      for (const entry of loaded) {
        for (const bank of entry.document.banks) {
          owners.push(entry);
          sourced.push({ path: entry.document.path, tier: entry.document.tier, bank });
        }
      }

      spinner.text = `Comparing entries in ${sourced.length} bank(s)...`;
      const detector = new DuplicateDetector({ nearThreshold: threshold, quiet });
      const result = detector.eliminate(sourced);
      const { report } = result;

      spinner.succeed(
        `${report.exactDuplicateCount} exact and ${report.nearDuplicateCount} near duplicate(s) ` +
        `in ${report.totalEntries} entries (uniqueness ${(report.uniquenessScore * 100).toFixed(1)}%)`
      );

      let written: string[] = [];
      if (options.write && result.removals.length > 0) {
        written = writeCleaned(owners, result.banks.map(b => b.bank), new Set(result.removals.map(r => r.entry.path)));
      }

      if (options.json) {
        console.log(JSON.stringify({ report, removals: result.removals, retained: result.retained, written }, null, 2));
        return;
      }

      for (const removal of result.removals) {
        const { entry } = removal;
        const label = removal.reason === 'exact'
          ? chalk.red('exact')
          : chalk.yellow(`near ${removal.similarity.toFixed(3)}`);
        console.log(`${label} ${chalk.cyan(entry.path)} #${entry.number} ${entry.category}[${entry.index}]`);
        console.log(chalk.dim(`  removed: ${entry.text}`));
        console.log(chalk.dim(`  kept:    ${removal.keptText}`));
      }

      for (const kept of result.retained) {
        const { entry } = kept;
        console.log(
          `${chalk.dim('kept')} ${chalk.cyan(entry.path)} #${entry.number} ${entry.category}[${entry.index}]` +
          chalk.dim(' (last entry in its category)')
        );
      }

      if (options.write) {
        console.log();
        console.log(chalk.green(`Rewrote ${written.length} file(s)`));
      } else if (result.removals.length > 0) {
        console.log();
        console.log(chalk.dim('Run with --write to remove them.'));
      }
    } catch (error) {
      fail(spinner, 'Duplicate scan failed', error);
    }
  });

/**
 * Rewrite each touched file with its cleaned banks. Returns written paths.
 */
function writeCleaned(owners: LoadedDocument[], cleaned: NumberInsightBank[], touched: Set<string>): string[] {
  const writer = new ArchiveWriter();
  const byDocument = new Map<LoadedDocument, NumberInsightBank[]>();

  owners.forEach((owner, index) => {
    const banks = byDocument.get(owner) ?? [];
    banks.push(cleaned[index]);
    byDocument.set(owner, banks);
  });

  const written: string[] = [];
  for (const [owner, banks] of byDocument) {
    if (!touched.has(owner.document.path)) continue;
    if (owner.file === null || owner.document.issues.some(issue => issue.severity === 'error')) {
      console.log(chalk.yellow(`Skipped ${owner.document.path}: cannot be rewritten in place`));
      continue;
    }
    try {
      writer.rewriteFile(owner.file, banks);
      written.push(owner.file);
    } catch (error) {
      if (!(error instanceof BankValidationError)) throw error;
      console.log(chalk.yellow(`Skipped ${owner.document.path}: ${error.message}`));
    }
  }
  return written;
}
