/**
 * Manifest Command
 *
 * Write a SHA-256 manifest of the archive, or verify one.
 */

import { Command } from 'commander';
import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import chalk from 'chalk';
import ora from 'ora';
import type { DocumentKind } from '../../core/types.js';
import { buildManifest, parseManifest, verifyManifest, type ManifestInput } from '../../export/ManifestBuilder.js';
import { collectDocuments, fail, loadKitConfig, type GlobalOptions } from '../shared.js';

interface ManifestOptions extends GlobalOptions {
  out?: string;
  verify?: string;
}

const KIND_RANK: Record<DocumentKind, number> = { bank: 3, prompt: 2, essay: 1 };

export const manifestCommand = new Command('manifest')
  .description('Write or verify the archive manifest')
  .argument('[dir]', 'Archive directory (defaults to the archive root)')
  .option('-c, --config <path>', 'Configuration file')
  .option('-d, --data-dir <path>', 'Data directory path')
  .option('-o, --out <file>', 'Manifest path (defaults to <dataDir>/MANIFEST.json)')
  .option('--verify <file>', 'Verify the archive against an existing manifest')
  .option('--json', 'Print the result as JSON', false)
  .action(async (dir: string | undefined, options: ManifestOptions) => {
    const spinner = ora(options.verify ? 'Verifying manifest...' : 'Building manifest...').start();

    try {
      const config = loadKitConfig(options);
      const root = resolve(dir ?? config.archive.root);

      if (options.verify) {
        const manifest = parseManifest(readFileSync(options.verify, 'utf-8'));
        const result = verifyManifest(manifest, root);

        if (result.valid) {
          spinner.succeed(`${manifest.total_files} file(s) match ${manifest.dataset_name} ${manifest.dataset_version}`);
        } else {
          spinner.fail(chalk.red('Archive does not match the manifest'));
        }

        if (options.json) {
          console.log(JSON.stringify(result, null, 2));
        } else {
          for (const path of result.mismatched) console.log(`${chalk.red('changed')} ${path}`);
          for (const path of result.missing) console.log(`${chalk.red('missing')} ${path}`);
          if (!result.digestMatches) console.log(chalk.red('Dataset digest does not match the file list'));
        }

        if (!result.valid) {
          process.exit(1);
        }
        return;
      }

      const loaded = await collectDocuments([root], config, options.json === true);

      // One entry per file; a bundle takes the highest kind among its records
      const files = new Map<string, DocumentKind>();
      for (const { document } of loaded) {
        const path = document.bundle ?? document.path;
        const current = files.get(path);
        if (current === undefined || KIND_RANK[document.kind] > KIND_RANK[current]) {
          files.set(path, document.kind);
        }
      }
      const inputs: ManifestInput[] = [...files].map(([path, category]) => ({ path, category }));

      const manifest = buildManifest(root, inputs, {
        datasetName: config.export.datasetName,
        datasetVersion: config.export.datasetVersion
      });

      const out = options.out ?? join(config.dataDir, 'MANIFEST.json');
      mkdirSync(dirname(out), { recursive: true });
      writeFileSync(out, JSON.stringify(manifest, null, 2) + '\n', 'utf-8');

      spinner.succeed(`Manifest written to ${out}`);

      if (options.json) {
        console.log(JSON.stringify(manifest, null, 2));
      } else {
        console.log();
        console.log(chalk.dim('Files:'), chalk.white(manifest.total_files.toString()));
        console.log(chalk.dim('Bytes:'), chalk.white(manifest.total_bytes.toString()));
        console.log(chalk.dim('Digest:'), chalk.white(manifest.dataset_digest));
      }
    } catch (error) {
      fail(spinner, 'Manifest failed', error);
    }
  });
