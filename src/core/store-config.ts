import * as fs from 'node:fs/promises';
import { z } from 'zod';
import type { StoreType } from '../ports/VectorStore';
import { ConfigurationError, ValidationError, errorMessage } from './errors';

export const DEFAULT_CONFIG_PATH = './store_conf.json';

export const chromaConfigSchema = z
  .object({
    collection_name: z.string().min(1).optional(),
    url: z.string().url().optional(),
    embedding_provider: z.enum(['local', 'openai']).default('local'),
    embedding_model: z.string().min(1).optional(),
    openai_api_key: z.string().min(1).optional(),
  })
  .strict();

export const pineconeConfigSchema = z
  .object({
    index_name: z.string().min(1).optional(),
    api_key: z.string().min(1).optional(),
    key_file: z.string().min(1).optional(),
    embedding_model: z.string().min(1).optional(),
    cloud: z.enum(['aws', 'gcp', 'azure']).optional(),
    region: z.string().min(1).optional(),
    dimension: z.number().int().positive().optional(),
  })
  .strict();

export type ChromaConfig = z.infer<typeof chromaConfigSchema>;
export type PineconeConfig = z.infer<typeof pineconeConfigSchema>;

export type BackendOptions = Record<string, unknown>;

// Backend blocks stay unparsed until selected, so an unused block never fails loading
export const storeConfigSchema = z.object({
  store_type: z.string().min(1),
  chromadb: z.record(z.unknown()).optional(),
  pinecone: z.record(z.unknown()).optional(),
});

export type StoreConfig = z.infer<typeof storeConfigSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseStoreConfig(raw: unknown, source: string = 'store config'): StoreConfig {
  const result = storeConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid configuration in ${source}: ${formatIssues(result.error)}`, result.error);
  }
  return result.data;
}

/**
 * Reads and validates the JSON configuration naming the active backend.
 */
export async function loadStoreConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<StoreConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Configuration file not found: ${configPath}`, error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`Error parsing JSON configuration file ${configPath}: ${errorMessage(error)}`, error);
  }

  return parseStoreConfig(raw, configPath);
}

export function defaultStoreConfig(storeType: StoreType = 'chromadb'): StoreConfig {
  return { store_type: storeType, chromadb: {}, pinecone: {} };
}

export function getBackendConfig(config: StoreConfig, storeType: StoreType): BackendOptions {
  const block = config[storeType];
  if (!block) {
    throw new ConfigurationError(`Configuration for '${storeType}' not found`);
  }
  return block;
}
