import { ChromaClient } from 'chromadb';
import type { Collection, IEmbeddingFunction } from 'chromadb';
import type { Embedder } from '../ports/Embedder';
import type {
  CollectionInfo,
  DocumentMetadata,
  QueryFilters,
  QueryResult,
  VectorStore,
} from '../ports/VectorStore';
import { BackendError, errorMessage } from '../core/errors';
import { IngestHandler } from '../core/ingest-handler';
import type { IngestOptions, IngestSummary } from '../core/ingest-handler';
import { logger as defaultLogger } from '../core/logger';
import type { Logger } from '../core/logger';
import { toDocumentMetadata, validateDocuments, validateIds, validateTopK } from '../core/validation';
import { LocalEmbedder } from './LocalEmbedder';

export const DEFAULT_CHROMA_URL = 'http://localhost:8000';
export const DEFAULT_COLLECTION_NAME = 'documents';

export interface ChromaVectorStoreOptions {
  collectionName?: string;
  url?: string;
  embedder?: Embedder;
  logger?: Logger;
}

/**
 * Lets Chroma embed documents and query texts through an {@link Embedder}.
 */
export class EmbedderFunction implements IEmbeddingFunction {
  constructor(private readonly embedder: Embedder) {}

  async generate(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];
    for (const text of texts) {
      embeddings.push(await this.embedder.getEmbeddings(text));
    }
    return embeddings;
  }
}

export class ChromaVectorStore implements VectorStore {
  readonly storeType = 'chromadb' as const;
  readonly collectionName: string;
  readonly url: string;
  private readonly embedder: Embedder;
  private readonly logger: Logger;
  private collection: Promise<Collection> | null = null;

  constructor(options: ChromaVectorStoreOptions = {}) {
    this.collectionName = options.collectionName ?? DEFAULT_COLLECTION_NAME;
    this.url = options.url ?? process.env.CHROMA_URL ?? DEFAULT_CHROMA_URL;
    this.logger = options.logger ?? defaultLogger;
    this.embedder = options.embedder ?? new LocalEmbedder(undefined, this.logger);
  }

  // Concurrent first calls share one getOrCreateCollection round trip
  private getCollection(): Promise<Collection> {
    if (!this.collection) {
      this.collection = this.connect().catch((error: unknown) => {
        this.collection = null;
        throw error;
      });
    }
    return this.collection;
  }

  private async connect(): Promise<Collection> {
    const client = new ChromaClient({ path: this.url });
    return client.getOrCreateCollection({
      name: this.collectionName,
      embeddingFunction: new EmbedderFunction(this.embedder),
    });
  }

  private async run<T>(operation: string, action: (collection: Collection) => Promise<T>): Promise<T> {
    try {
      const collection = await this.getCollection();
      return await action(collection);
    } catch (error) {
      this.logger.error(`Error during ChromaDB ${operation}: ${errorMessage(error)}`);
      throw new BackendError('ChromaDB', operation, error);
    }
  }

  async addDocuments(documents: string[], ids: string[], metadatas?: DocumentMetadata[]): Promise<void> {
    validateDocuments(documents, ids, metadatas);
    if (documents.length === 0) return;

    await this.run('add', (collection) => collection.add({ ids, documents, metadatas }));
    this.logger.success(`Successfully added ${documents.length} documents to ChromaDB`);
  }

  async query(queryText: string, topK: number = 5, filters?: QueryFilters): Promise<QueryResult[]> {
    validateTopK(topK);
    if (topK === 0) return [];

    const response = await this.run('query', (collection) =>
      collection.query({
        queryTexts: [queryText],
        nResults: topK,
        where: filters?.where,
        whereDocument: filters?.whereDocument,
      })
    );

    const ids = response.ids?.[0] ?? [];
    return ids.map((id, i) => {
      const distance = response.distances?.[0]?.[i];
      return {
        id,
        document: response.documents?.[0]?.[i] ?? '',
        // Chroma reports distances; lower means closer
        score: typeof distance === 'number' ? 1 - distance : 0,
        metadata: toDocumentMetadata(response.metadatas?.[0]?.[i]),
      };
    });
  }

  /** Ids Chroma does not hold are ignored. */
  async deleteDocuments(ids: string[]): Promise<void> {
    validateIds(ids);
    if (ids.length === 0) return;

    await this.run('delete', (collection) => collection.delete({ ids }));
    this.logger.success(`Successfully deleted ${ids.length} documents from ChromaDB`);
  }

  async getCollectionInfo(): Promise<CollectionInfo> {
    const count = await this.run('count', (collection) => collection.count());
    return {
      name: this.collectionName,
      type: 'ChromaDB',
      document_count: count,
      url: this.url,
      embedding_model: this.embedder.modelName,
    };
  }

  async loadDocumentsFromDirectory(directoryPath: string, options?: IngestOptions): Promise<IngestSummary> {
    return new IngestHandler(this, this.logger).run(directoryPath, options);
  }

  async close(): Promise<void> {
    this.collection = null;
    await this.embedder.close();
  }
}
