import * as fs from 'node:fs';
import { Pinecone } from '@pinecone-database/pinecone';
import type { Index } from '@pinecone-database/pinecone';
import { z } from 'zod';
import type {
  CollectionInfo,
  DocumentMetadata,
  QueryFilters,
  QueryResult,
  VectorStore,
} from '../ports/VectorStore';
import { BackendError, ConfigurationError, ValidationError, errorMessage } from '../core/errors';
import { logger as defaultLogger } from '../core/logger';
import type { Logger } from '../core/logger';
import { toDocumentMetadata, validateDocuments, validateIds, validateTopK } from '../core/validation';

export type PineconeCloud = 'aws' | 'gcp' | 'azure';

export const DEFAULT_INDEX_NAME = 'my-index';
export const DEFAULT_KEY_FILE = './pinecone_key.json';
export const DEFAULT_PINECONE_MODEL = 'multilingual-e5-large';

// Document text is stored beside the caller's metadata under this key
const TEXT_KEY = 'text';

// Inference accepts at most 96 inputs per embed call
export const EMBED_BATCH_SIZE = 96;

export interface PineconeVectorStoreOptions {
  apiKey?: string;
  keyFile?: string;
  indexName?: string;
  embeddingModel?: string;
  cloud?: PineconeCloud;
  region?: string;
  dimension?: number;
  logger?: Logger;
}

export interface CreateIndexOptions {
  cloud?: PineconeCloud;
  region?: string;
  dimension?: number;
}

const keyFileSchema = z.object({ pinecone_api_key: z.string().min(1) });

/**
 * Reads `{ "pinecone_api_key": "..." }` from a JSON key file.
 */
export function loadApiKey(keyFile: string): string {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(keyFile, 'utf-8'));
    return keyFileSchema.parse(raw).pinecone_api_key;
  } catch (error) {
    throw new ConfigurationError(`Error loading API key from ${keyFile}: ${errorMessage(error)}`, error);
  }
}

function resolveApiKey(options: PineconeVectorStoreOptions): string {
  if (options.apiKey) return options.apiKey;

  const keyFile = options.keyFile ?? DEFAULT_KEY_FILE;
  if (options.keyFile || fs.existsSync(keyFile)) {
    return loadApiKey(keyFile);
  }
  if (process.env.PINECONE_API_KEY) {
    return process.env.PINECONE_API_KEY;
  }
  throw new ConfigurationError(
    `No Pinecone API key: pass apiKey, provide ${keyFile} or set PINECONE_API_KEY`
  );
}

export class PineconeVectorStore implements VectorStore {
  readonly storeType = 'pinecone' as const;
  readonly indexName: string;
  readonly embeddingModel: string;
  private readonly cloud: PineconeCloud;
  private readonly region: string;
  private readonly dimension: number;
  private readonly logger: Logger;
  private readonly client: Pinecone;
  private index: Promise<Index | null> | null = null;

  constructor(options: PineconeVectorStoreOptions = {}) {
    this.indexName = options.indexName ?? DEFAULT_INDEX_NAME;
    this.embeddingModel = options.embeddingModel ?? DEFAULT_PINECONE_MODEL;
    this.cloud = options.cloud ?? 'aws';
    this.region = options.region ?? 'us-east-1';
    this.dimension = options.dimension ?? 1024;
    this.logger = options.logger ?? defaultLogger;
    this.client = new Pinecone({ apiKey: resolveApiKey(options) });
  }

  private async hasIndex(): Promise<boolean> {
    const { indexes } = await this.client.listIndexes();
    return (indexes ?? []).some((model) => model.name === this.indexName);
  }

  // A missing index is looked up again on the next call
  private async getIndex(): Promise<Index | null> {
    if (!this.index) {
      this.index = this.resolveIndex().catch((error: unknown) => {
        this.index = null;
        throw error;
      });
    }
    const index = await this.index;
    if (!index) {
      this.index = null;
    }
    return index;
  }

  private async resolveIndex(): Promise<Index | null> {
    if (await this.hasIndex()) {
      return this.client.index(this.indexName);
    }
    this.logger.warning(`Index '${this.indexName}' does not exist. Call createIndex() to create it.`);
    return null;
  }

  private async run<T>(operation: string, action: (index: Index) => Promise<T>): Promise<T> {
    try {
      const index = await this.getIndex();
      if (!index) {
        throw new Error(`Index '${this.indexName}' not initialized. Call createIndex() first.`);
      }
      return await action(index);
    } catch (error) {
      this.logger.error(`Error during Pinecone ${operation}: ${errorMessage(error)}`);
      throw new BackendError('Pinecone', operation, error);
    }
  }

  private async embed(texts: string[], inputType: 'passage' | 'query'): Promise<number[][]> {
    const response = await this.client.inference.embed(this.embeddingModel, texts, {
      inputType,
      truncate: 'END',
    });
    return response.data.map((embedding) => {
      if ('values' in embedding && Array.isArray(embedding.values)) {
        return embedding.values;
      }
      throw new Error(`${this.embeddingModel} returned an embedding without dense values`);
    });
  }

  /**
   * Creates a serverless cosine index when none exists and attaches it.
   */
  async createIndex(options: CreateIndexOptions = {}): Promise<void> {
    try {
      if (!(await this.hasIndex())) {
        await this.client.createIndex({
          name: this.indexName,
          dimension: options.dimension ?? this.dimension,
          metric: 'cosine',
          spec: {
            serverless: {
              cloud: options.cloud ?? this.cloud,
              region: options.region ?? this.region,
            },
          },
          waitUntilReady: true,
          suppressConflicts: true,
        });
        this.logger.success(`Created index: ${this.indexName}`);
      }
      this.index = Promise.resolve(this.client.index(this.indexName));
    } catch (error) {
      this.logger.error(`Error creating Pinecone index: ${errorMessage(error)}`);
      throw new BackendError('Pinecone', 'create index', error);
    }
  }

  async addDocuments(documents: string[], ids: string[], metadatas?: DocumentMetadata[]): Promise<void> {
    validateDocuments(documents, ids, metadatas);
    if (documents.length === 0) return;

    await this.run('add', async (index) => {
      for (let start = 0; start < documents.length; start += EMBED_BATCH_SIZE) {
        const end = start + EMBED_BATCH_SIZE;
        const embeddings = await this.embed(documents.slice(start, end), 'passage');
        const records = ids.slice(start, end).map((id, i) => ({
          id,
          values: embeddings[i],
          metadata: { ...(metadatas?.[start + i] ?? {}), [TEXT_KEY]: documents[start + i] },
        }));
        await index.upsert(records);
      }
    });
    this.logger.success(`Successfully added ${documents.length} documents to Pinecone`);
  }

  async query(queryText: string, topK: number = 5, filters?: QueryFilters): Promise<QueryResult[]> {
    validateTopK(topK);
    if (filters?.whereDocument) {
      throw new ValidationError('Pinecone does not support document text filters (whereDocument)');
    }
    if (topK === 0) return [];

    const response = await this.run('query', async (index) => {
      const [vector] = await this.embed([queryText], 'query');
      return index.query({
        vector,
        topK,
        includeMetadata: true,
        filter: filters?.where,
      });
    });

    return (response.matches ?? []).map((match) => {
      const text = match.metadata?.[TEXT_KEY];
      return {
        id: match.id,
        document: typeof text === 'string' ? text : '',
        score: match.score ?? 0,
        metadata: toDocumentMetadata(match.metadata, [TEXT_KEY]),
      };
    });
  }

  /** Pinecone ignores ids it does not hold. */
  async deleteDocuments(ids: string[]): Promise<void> {
    validateIds(ids);
    if (ids.length === 0) return;

    await this.run('delete', (index) => index.deleteMany(ids));
    this.logger.success(`Successfully deleted ${ids.length} documents from Pinecone`);
  }

  async getCollectionInfo(): Promise<CollectionInfo> {
    let index: Index | null;
    try {
      index = await this.getIndex();
    } catch (error) {
      this.logger.error(`Error during Pinecone describe index: ${errorMessage(error)}`);
      throw new BackendError('Pinecone', 'describe index', error);
    }

    if (!index) {
      return {
        name: this.indexName,
        type: 'Pinecone',
        status: 'not_initialized',
        exists: false,
      };
    }

    const stats = await this.run('describe index', (ready) => ready.describeIndexStats());
    return {
      name: this.indexName,
      type: 'Pinecone',
      status: 'initialized',
      total_vector_count: stats.totalRecordCount ?? 0,
      dimension: stats.dimension ?? 0,
      index_fullness: stats.indexFullness ?? 0,
      embedding_model: this.embeddingModel,
    };
  }

  async close(): Promise<void> {
    // The SDK holds no open connection; drop the cached handle
    this.index = null;
  }
}
