import { z } from 'zod';
import { ChromaVectorStore } from '../adapters/ChromaVectorStore';
import { DEFAULT_LOCAL_MODEL, LocalEmbedder } from '../adapters/LocalEmbedder';
import { DEFAULT_OPENAI_MODEL, OpenAiEmbedder } from '../adapters/OpenAiEmbedder';
import { PineconeVectorStore } from '../adapters/PineconeVectorStore';
import type { Embedder } from '../ports/Embedder';
import type { StoreType, VectorStore } from '../ports/VectorStore';
import { ConfigurationError, ValidationError } from './errors';
import { logger as defaultLogger } from './logger';
import type { Logger } from './logger';
import { chromaConfigSchema, formatIssues, pineconeConfigSchema } from './store-config';
import type { BackendOptions, ChromaConfig, PineconeConfig } from './store-config';

export const SUPPORTED_STORE_TYPES: readonly StoreType[] = ['chromadb', 'pinecone'];

const STORE_ALIASES = new Map<string, StoreType>([
  ['chromadb', 'chromadb'],
  ['chroma', 'chromadb'],
  ['local', 'chromadb'],
  ['pinecone', 'pinecone'],
  ['cloud', 'pinecone'],
]);

export interface FactoryDependencies {
  logger?: Logger;
}

export type StoreFactory = (storeType: string, storeConf?: BackendOptions) => VectorStore;

/**
 * Maps a backend name (case-insensitive, aliases included) to its store type.
 */
export function resolveStoreType(name: string): StoreType {
  const storeType = STORE_ALIASES.get(name.trim().toLowerCase());
  if (!storeType) {
    throw new ConfigurationError(
      `Unsupported store type: ${name}. Supported types: ${SUPPORTED_STORE_TYPES.map((type) => `'${type}'`).join(', ')}`
    );
  }
  return storeType;
}

function parseBlock<T extends z.ZodTypeAny>(schema: T, storeConf: BackendOptions, storeType: StoreType): z.output<T> {
  const result = schema.safeParse(storeConf);
  if (!result.success) {
    throw new ValidationError(`Invalid ${storeType} configuration: ${formatIssues(result.error)}`, result.error);
  }
  return result.data;
}

function createEmbedder(conf: ChromaConfig, logger: Logger): Embedder {
  if (conf.embedding_provider === 'openai') {
    return new OpenAiEmbedder(conf.embedding_model ?? DEFAULT_OPENAI_MODEL, conf.openai_api_key);
  }
  return new LocalEmbedder(conf.embedding_model ?? DEFAULT_LOCAL_MODEL, logger);
}

function createChromaStore(conf: ChromaConfig, logger: Logger): ChromaVectorStore {
  return new ChromaVectorStore({
    collectionName: conf.collection_name,
    url: conf.url,
    embedder: createEmbedder(conf, logger),
    logger,
  });
}

function createPineconeStore(conf: PineconeConfig, logger: Logger): PineconeVectorStore {
  return new PineconeVectorStore({
    apiKey: conf.api_key,
    keyFile: conf.key_file,
    indexName: conf.index_name,
    embeddingModel: conf.embedding_model,
    cloud: conf.cloud,
    region: conf.region,
    dimension: conf.dimension,
    logger,
  });
}

/**
 * Builds the adapter for `storeType` from a snake_case parameter block, the
 * same shape as the backend's block in the configuration file.
 */
export function createVectorStore(
  storeType: string,
  storeConf: BackendOptions = {},
  deps: FactoryDependencies = {}
): VectorStore {
  const type = resolveStoreType(storeType);
  const logger = deps.logger ?? defaultLogger;

  switch (type) {
    case 'chromadb':
      return createChromaStore(parseBlock(chromaConfigSchema, storeConf, type), logger);
    case 'pinecone':
      return createPineconeStore(parseBlock(pineconeConfigSchema, storeConf, type), logger);
  }
}
