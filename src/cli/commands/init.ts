/**
 * Init Command
 *
 * Write a starter insight-bank.yaml and create the data and archive directories.
 */

import { Command } from 'commander';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { CONFIG_FILE_NAMES, ConfigLoader } from '../../config/ConfigLoader.js';
import { DEFAULT_KIT_CONFIGURATION, type KitConfiguration } from '../../config/types.js';

interface InitOptions {
  dataDir?: string;
  archive?: string;
  force?: boolean;
}

export const initCommand = new Command('init')
  .description('Create insight-bank.yaml and the working directories')
  .option('-d, --data-dir <path>', 'Data directory path', DEFAULT_KIT_CONFIGURATION.dataDir)
  .option('-a, --archive <path>', 'Archive directory', DEFAULT_KIT_CONFIGURATION.archive.root)
  .option('-f, --force', 'Overwrite an existing configuration', false)
  .action((options: InitOptions) => {
    const spinner = ora('Initializing insight bank workspace...').start();

    try {
      const configPath = join(process.cwd(), CONFIG_FILE_NAMES[0]);
      if (existsSync(configPath) && !options.force) {
        spinner.warn(`${CONFIG_FILE_NAMES[0]} already exists. Use --force to overwrite.`);
        return;
      }

      const config: KitConfiguration = {
        ...DEFAULT_KIT_CONFIGURATION,
        dataDir: options.dataDir ?? DEFAULT_KIT_CONFIGURATION.dataDir,
        archive: {
          ...DEFAULT_KIT_CONFIGURATION.archive,
          root: options.archive ?? DEFAULT_KIT_CONFIGURATION.archive.root
        }
      };

      mkdirSync(config.dataDir, { recursive: true });
      mkdirSync(config.archive.root, { recursive: true });
      new ConfigLoader().saveYaml(configPath, config);

      spinner.succeed(chalk.green('Workspace initialized'));
      console.log();
      console.log(chalk.dim('Configuration:'), configPath);
      console.log(chalk.dim('Data directory:'), config.dataDir);
      console.log(chalk.dim('Archive:'), config.archive.root);
      console.log();
      console.log(chalk.cyan('Next steps:'));
      console.log('  insight-bank prompt 7 > prompt.md');
      console.log('  insight-bank validate');
    } catch (error) {
      spinner.fail(chalk.red('Initialization failed'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
