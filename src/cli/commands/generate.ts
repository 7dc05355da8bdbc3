/**
 * Generate Command
 *
 * Ask the configured LLM for a new bank and save it into the archive.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { ArchiveWriter } from '../../archive/ArchiveWriter.js';
import { validateConfig } from '../../config/ConfigLoader.js';
import { ConfigurationError } from '../../core/errors.js';
import { PROVIDERS, type Provider } from '../../providers/types.js';
import { ProviderFactory } from '../../providers/ProviderFactory.js';
import { BankGenerator } from '../../generation/BankGenerator.js';
import { GenerationLogger } from '../../generation/GenerationLogger.js';
import { PERSONAS } from '../../prompts/BankPromptTemplate.js';
import { stringifyBank } from '../../schema/BankSchema.js';
import {
  fail,
  loadKitConfig,
  parseBankNumber,
  parsePositiveInteger,
  today,
  type GlobalOptions
} from '../shared.js';
import { loadExampleBank, parsePersona } from './prompt.js';

interface GenerateOptions extends GlobalOptions {
  theme?: string;
  time?: string;
  batch?: string;
  persona?: string;
  examples?: string;
  provider?: string;
  model?: string;
  outDir?: string;
  source?: string;
  force?: boolean;
  dryRun?: boolean;
}

function parseProvider(value: string): Provider {
  const provider = PROVIDERS.find(p => p === value);
  if (!provider) {
    throw new Error(`Unknown provider "${value}" (expected one of: ${PROVIDERS.join(', ')})`);
  }
  return provider;
}

export const generateCommand = new Command('generate')
  .description('Generate a new insight bank with an LLM')
  .argument('<number>', 'Bank number (1-9, 11, 22, 33, 44)')
  .option('-c, --config <path>', 'Configuration file')
  .option('-d, --data-dir <path>', 'Data directory path')
  .option('--theme <theme>', 'Theme for the new entries')
  .option('--time <context>', 'Time of day or season the entries speak to')
  .option('-b, --batch <size>', 'Entries per category')
  .option('-p, --persona <persona>', `Voice (${PERSONAS.join(', ')})`)
  .option('-e, --examples <file>', 'Existing bank file to take tone examples from')
  .option('--provider <name>', `LLM provider (${PROVIDERS.join(', ')})`)
  .option('-m, --model <model>', 'Model name')
  .option('--out-dir <dir>', 'Directory to write the bank into (defaults to the archive root)')
  .option('-s, --source <name>', 'Source name for the file; {number} is replaced')
  .option('-f, --force', 'Overwrite an existing file', false)
  .option('--dry-run', 'Print the bank instead of writing it', false)
  .option('--json', 'Print the result as JSON', false)
  .action(async (numberArg: string, options: GenerateOptions) => {
    const spinner = ora('Preparing generation...').start();

    try {
      const number = parseBankNumber(numberArg);
      const config = loadKitConfig(options);
      if (options.provider) config.generation.provider = parseProvider(options.provider);
      if (options.model) config.generation.model = options.model;

      const problems = validateConfig(config, { requireApiKey: true });
      if (problems.length > 0) {
        throw new ConfigurationError(problems);
      }

      const client = ProviderFactory.createClient({
        provider: config.generation.provider,
        model: config.generation.model,
        apiKey: config.generation.apiKey,
        apiEndpoint: config.generation.endpoint,
        maxTokens: config.generation.maxTokens
      });

      const quiet = options.json === true;
      const generator = new BankGenerator({
        client,
        maxAttempts: config.generation.maxAttempts,
        maxTokens: config.generation.maxTokens,
        temperature: config.generation.temperature,
        logger: config.generation.logResponses ? new GenerationLogger({ dataDir: config.dataDir, quiet }) : undefined,
        quiet
      });

      spinner.text = `Generating bank for number ${number} with ${client.name} (${client.model})...`;
      const result = await generator.generate({
        number,
        theme: options.theme,
        timeContext: options.time,
        batchSize: options.batch !== undefined
          ? parsePositiveInteger(options.batch, 'Batch size')
          : config.generation.batchSize,
        persona: parsePersona(options.persona),
        examples: options.examples ? loadExampleBank(options.examples, number) : undefined,
        date: today()
      });

      let written: string | null = null;
      if (!options.dryRun) {
        written = new ArchiveWriter().writeBankMarkdown(options.outDir ?? config.archive.root, result.bank, {
          source: options.source ?? config.archive.sourceTemplate,
          force: options.force
        });
      }

      spinner.succeed(
        `Generated number ${number} in ${result.attempts} attempt(s)` + (written ? ` and wrote ${written}` : '')
      );

      if (options.json) {
        console.log(JSON.stringify({ written, attempts: result.attempts, model: result.model, changes: result.changes }, null, 2));
      } else if (options.dryRun) {
        console.log(stringifyBank(result.bank));
      } else {
        console.log(chalk.dim('Model:'), result.model);
        console.log(chalk.dim('Attempts:'), result.attempts);
      }
    } catch (error) {
      fail(spinner, 'Generation failed', error);
    }
  });
