import type { Where, WhereDocument } from 'chromadb';

export type StoreType = 'chromadb' | 'pinecone';

export type MetadataValue = string | number | boolean;

export type DocumentMetadata = Record<string, MetadataValue>;

export interface QueryResult {
  id: string;
  document: string;
  score: number;
  metadata: DocumentMetadata;
}

/**
 * `where` is a metadata filter in the operator language Chroma and Pinecone
 * share ($eq, $in, $and, ...). `whereDocument` filters on document text and
 * only Chroma supports it.
 */
export interface QueryFilters {
  where?: Where;
  whereDocument?: WhereDocument;
}

export type CollectionInfo = Record<string, MetadataValue>;

export interface VectorStore {
  readonly storeType: StoreType;
  addDocuments(documents: string[], ids: string[], metadatas?: DocumentMetadata[]): Promise<void>;
  query(queryText: string, topK?: number, filters?: QueryFilters): Promise<QueryResult[]>;
  deleteDocuments(ids: string[]): Promise<void>;
  getCollectionInfo(): Promise<CollectionInfo>;
  close(): Promise<void>;
}
