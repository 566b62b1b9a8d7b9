import * as fs from 'node:fs';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { input } from '@inquirer/prompts';
import chalk from 'chalk';
import ora from 'ora';
import { z } from 'zod';
import { PineconeVectorStore } from './adapters/PineconeVectorStore';
import type { PineconeCloud } from './adapters/PineconeVectorStore';
import { ConfigurationError, errorMessage } from './core/errors';
import { logger as defaultLogger } from './core/logger';
import type { Logger } from './core/logger';
import { IngestHandler } from './core/ingest-handler';
import { DEFAULT_CONFIG_PATH, defaultStoreConfig, loadStoreConfig } from './core/store-config';
import type { StoreConfig } from './core/store-config';
import { createVectorStore, resolveStoreType } from './core/vector-store-factory';
import { VectorStoreManager } from './core/vector-store-manager';
import { VectorStoreSwitcher } from './core/vector-store-switcher';
import type { QueryFilters } from './ports/VectorStore';

export interface GlobalOptions {
  config?: string;
  store?: string;
}

export interface CliDependencies {
  logger?: Logger;
  openSwitcher?: (options: GlobalOptions) => Promise<VectorStoreSwitcher>;
}

/**
 * Uses the configuration file when present, defaults otherwise; `--store`
 * overrides the file's `store_type`.
 */
export async function openSwitcher(options: GlobalOptions, logger: Logger = defaultLogger): Promise<VectorStoreSwitcher> {
  const configPath = options.config ?? process.env.VECTOR_STORE_CONFIG ?? DEFAULT_CONFIG_PATH;

  let config: StoreConfig;
  if (options.config || fs.existsSync(configPath)) {
    config = await loadStoreConfig(configPath);
  } else {
    config = defaultStoreConfig();
  }

  if (options.store) {
    config = { ...config, store_type: resolveStoreType(options.store) };
  }

  return new VectorStoreSwitcher(config, (storeType, storeConf) => createVectorStore(storeType, storeConf, { logger }));
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function isJsonObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Filter syntax is checked by the backend; only the outer shape is checked here
function parseJsonObject<T extends object>(value: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new InvalidArgumentError('Not valid JSON.');
  }
  const result = z.custom<T>(isJsonObject).safeParse(parsed);
  if (!result.success) {
    throw new InvalidArgumentError('Expected a JSON object.');
  }
  return result.data;
}

function parseList(value: string): string[] {
  return value.split(',').map((item) => item.trim()).filter(Boolean);
}

export function createProgram(deps: CliDependencies = {}): Command {
  const logger = deps.logger ?? defaultLogger;
  const open = deps.openSwitcher ?? ((options: GlobalOptions) => openSwitcher(options, logger));
  const program = new Command();

  program
    .name('vector-switch')
    .description('One interface over Chroma and Pinecone collections')
    .version('1.0.0')
    .option('-c, --config <path>', 'path to the store configuration file')
    .option('-s, --store <type>', 'backend to use instead of the configured store_type')
    .exitOverride();

  const withStore = async (action: (manager: VectorStoreManager, switcher: VectorStoreSwitcher) => Promise<void>) => {
    const switcher = await open(program.opts<GlobalOptions>());
    try {
      await action(new VectorStoreManager(switcher.active, logger), switcher);
    } finally {
      await switcher.close();
    }
  };

  program
    .command('info')
    .description('Show collection or index statistics')
    .action(() => withStore(async (manager) => {
      await manager.getInfo();
    }));

  program
    .command('search')
    .description('Find the documents closest to a query')
    .argument('<query>', 'query text')
    .option('-k, --top-k <n>', 'number of results', parseInteger, 3)
    .option('--where <json>', 'metadata filter', parseJsonObject<NonNullable<QueryFilters['where']>>)
    .option('--where-document <json>', 'document text filter (Chroma only)', parseJsonObject<NonNullable<QueryFilters['whereDocument']>>)
    .action((query: string, options: { topK: number } & QueryFilters) => withStore(async (manager) => {
      await manager.search(query, options.topK, { where: options.where, whereDocument: options.whereDocument });
    }));

  program
    .command('query')
    .description('Ask questions about your documents interactively')
    .option('-k, --top-k <n>', 'number of results', parseInteger, 3)
    .action((options: { topK: number }) => withStore(async (manager) => {
      logger.info('🤖 Ask your question (type exit to quit)');

      while (true) {
        const question = await input({
          message: chalk.cyan('Question:'),
          validate: (value) => value.length > 0 || 'Please enter a question'
        });

        if (question.toLowerCase() === 'exit') break;

        const spinner = ora('🔍 Searching...').start();
        try {
          const results = await manager.search(question, options.topK);
          spinner.succeed(`Found ${results.length} results`);
        } catch (error) {
          spinner.stop();
          logger.error(`Error: ${errorMessage(error)}`);
        }
      }
    }));

  program
    .command('ingest')
    .description('Add text files from a file or directory')
    .argument('<path>', 'file or directory')
    .option('--ext <list>', 'comma-separated extensions', parseList, ['.txt'])
    .option('--chunk-size <n>', 'split files into paragraph chunks of about n characters', parseInteger)
    .action((pathName: string, options: { ext: string[]; chunkSize?: number }) => withStore(async (_manager, switcher) => {
      const spinner = ora('📚 Document ingestion started').start();
      try {
        const summary = await new IngestHandler(switcher.active, logger).run(pathName, {
          extensions: options.ext,
          chunkSize: options.chunkSize,
        });
        spinner.succeed(`✅ Ingested ${summary.documents} documents from ${summary.files} files`);
      } catch (error) {
        spinner.fail();
        throw error;
      }
    }));

  program
    .command('delete')
    .description('Delete documents by id')
    .argument('<ids...>', 'document ids')
    .action((ids: string[]) => withStore(async (_manager, switcher) => {
      await switcher.active.deleteDocuments(ids);
    }));

  program
    .command('seed')
    .description('Load the bundled sample documents')
    .action(() => withStore(async (manager) => {
      const count = await manager.setupWithSampleData();
      logger.success(`✅ Loaded ${count} sample documents`);
    }));

  program
    .command('create-index')
    .description('Create the Pinecone index when it does not exist')
    .addOption(new Option('--cloud <cloud>', 'cloud provider').choices(['aws', 'gcp', 'azure']))
    .option('--region <region>', 'cloud region')
    .option('--dimension <n>', 'vector dimension', parseInteger)
    .action((options: { cloud?: PineconeCloud; region?: string; dimension?: number }) => withStore(async (_manager, switcher) => {
      const store = switcher.active;
      if (!(store instanceof PineconeVectorStore)) {
        throw new ConfigurationError(`create-index only applies to Pinecone, active store is ${store.storeType}`);
      }
      await store.createIndex(options);
    }));

  return program;
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const logger = deps.logger ?? defaultLogger;
  try {
    await createProgram(deps).parseAsync(argv);
    return 0;
  } catch (error) {
    // commander has already printed its own usage errors
    if (error instanceof CommanderError) return error.exitCode;
    logger.error(`Error: ${errorMessage(error)}`);
    return 1;
  }
}
