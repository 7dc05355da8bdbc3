/**
 * Catalog Command
 *
 * Load banks into the SQLite insight catalog and pick entries from it.
 */

import { Command } from 'commander';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { InsightCatalog } from '../../catalog/InsightCatalog.js';
import { InsightSelector } from '../../catalog/InsightSelector.js';
import { resolveDataPath } from '../../config/ConfigLoader.js';
import type { KitConfiguration } from '../../config/types.js';
import { isInsightCategory, type InsightCategory } from '../../core/types.js';
import {
  collectDocuments,
  fail,
  loadKitConfig,
  parseBankNumber,
  parsePositiveInteger,
  today,
  type GlobalOptions
} from '../shared.js';

interface PickOptions extends GlobalOptions {
  date?: string;
  count: string;
  category?: string[];
  fresh?: boolean;
  mark?: boolean;
}

function openCatalog(config: KitConfiguration): InsightCatalog {
  const sqlitePath = resolveDataPath(config, config.catalog.sqlitePath);
  mkdirSync(dirname(sqlitePath), { recursive: true });
  return new InsightCatalog({ sqlitePath, enableWAL: config.catalog.enableWAL });
}

function parseCategories(values: string[] | undefined): InsightCategory[] | undefined {
  if (!values || values.length === 0) return undefined;
  return values.map(value => {
    if (!isInsightCategory(value)) {
      throw new Error(`Unknown category "${value}"`);
    }
    return value;
  });
}

const importCommand = new Command('import')
  .description('Import banks from the archive into the catalog')
  .argument('[paths...]', 'Files or directories (defaults to the archive root)')
  .option('-c, --config <path>', 'Configuration file')
  .option('-d, --data-dir <path>', 'Data directory path')
  .option('--json', 'Print counts as JSON', false)
  .action(async (paths: string[], options: GlobalOptions) => {
    const spinner = ora('Importing banks...').start();

    try {
      const config = loadKitConfig(options);
      const loaded = await collectDocuments(paths, config, options.json === true);
      const catalog = openCatalog(config);

      let added = 0;
      let skipped = 0;
      let skippedDocuments = 0;
      try {
        for (const { document } of loaded) {
          if (document.issues.some(issue => issue.severity === 'error')) {
            skippedDocuments++;
            continue;
          }
          for (const bank of document.banks) {
            const result = catalog.importBank(bank, document.source);
            added += result.added;
            skipped += result.skipped;
          }
        }
      } finally {
        catalog.close();
      }

      spinner.succeed(`Imported ${added} new entries (${skipped} already stored)`);
      if (options.json) {
        console.log(JSON.stringify({ added, skipped, skippedDocuments }, null, 2));
      } else if (skippedDocuments > 0) {
        console.log(chalk.yellow(`Skipped ${skippedDocuments} document(s) with validation errors`));
      }
    } catch (error) {
      fail(spinner, 'Import failed', error);
    }
  });

const pickCommand = new Command('pick')
  .description("Pick the day's insights for a number")
  .argument('<number>', 'Bank number (1-9, 11, 22, 33, 44)')
  .option('-c, --config <path>', 'Configuration file')
  .option('-d, --data-dir <path>', 'Data directory path')
  .option('--date <date>', 'Day to pick for (YYYY-MM-DD)', today())
  .option('-n, --count <count>', 'Number of insights', '3')
  .option('--category <category...>', 'Restrict to these categories')
  .option('--fresh', 'Leave out entries already served on or after the date', false)
  .option('--mark', 'Record the picks as served on the date', false)
  .option('--json', 'Print picks as JSON', false)
  .action((numberArg: string, options: PickOptions) => {
    const spinner = ora('Picking insights...').start();

    try {
      const number = parseBankNumber(numberArg);
      const date = options.date ?? today();
      const count = parsePositiveInteger(options.count, 'Count');
      const categories = parseCategories(options.category);

      const config = loadKitConfig(options);
      const catalog = openCatalog(config);

      try {
        const entries = catalog.list({ number, notServedSince: options.fresh ? date : undefined });
        const picks = new InsightSelector().select(entries, { number, date, count, categories });

        if (options.mark) {
          for (const pick of picks) {
            catalog.markServed(pick.insight.id, date);
          }
        }

        spinner.succeed(`Picked ${picks.length} of ${entries.length} insight(s) for number ${number} on ${date}`);

        if (options.json) {
          console.log(JSON.stringify(picks.map(pick => ({
            id: pick.insight.id,
            category: pick.insight.category,
            text: pick.insight.text,
            source: pick.insight.source,
            relevance: pick.relevance,
            score: pick.score
          })), null, 2));
        } else {
          for (const pick of picks) {
            console.log();
            console.log(chalk.cyan(pick.insight.category), chalk.dim(`${pick.insight.id} score ${pick.score.toFixed(3)}`));
            console.log(`  ${pick.insight.text}`);
          }
        }
      } finally {
        catalog.close();
      }
    } catch (error) {
      fail(spinner, 'Pick failed', error);
    }
  });

const catalogStatsCommand = new Command('stats')
  .description('Display catalog statistics')
  .option('-c, --config <path>', 'Configuration file')
  .option('-d, --data-dir <path>', 'Data directory path')
  .option('--json', 'Print statistics as JSON', false)
  .action((options: GlobalOptions) => {
    const spinner = ora('Gathering catalog statistics...').start();

    try {
      const config = loadKitConfig(options);
      const catalog = openCatalog(config);
      const stats = catalog.stats();
      catalog.close();

      spinner.succeed('Statistics gathered');

      if (options.json) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }

      console.log();
      console.log(chalk.dim('Entries:'), chalk.white(stats.total.toString()));
      console.log(chalk.dim('Sources:'), chalk.white(stats.sources.toString()));
      console.log(chalk.dim('Served at least once:'), chalk.white(stats.served.toString()));
      console.log();
      for (const [number, total] of Object.entries(stats.byNumber)) {
        console.log(`${number.padStart(2)}  ${total}`);
      }
      console.log();
    } catch (error) {
      fail(spinner, 'Failed to gather catalog statistics', error);
    }
  });

export const catalogCommand = new Command('catalog')
  .description('Manage the SQLite insight catalog')
  .addCommand(importCommand)
  .addCommand(pickCommand)
  .addCommand(catalogStatsCommand);
