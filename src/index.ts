export type {
  CollectionInfo,
  DocumentMetadata,
  MetadataValue,
  QueryFilters,
  QueryResult,
  StoreType,
  VectorStore,
} from './ports/VectorStore';
export type { Embedder } from './ports/Embedder';
export { ChromaVectorStore, EmbedderFunction } from './adapters/ChromaVectorStore';
export type { ChromaVectorStoreOptions } from './adapters/ChromaVectorStore';
export { PineconeVectorStore, loadApiKey } from './adapters/PineconeVectorStore';
export type { CreateIndexOptions, PineconeCloud, PineconeVectorStoreOptions } from './adapters/PineconeVectorStore';
export { LocalEmbedder } from './adapters/LocalEmbedder';
export { OpenAiEmbedder } from './adapters/OpenAiEmbedder';
export { BackendError, ConfigurationError, ValidationError, VectorStoreError } from './core/errors';
export { logger, silentLogger } from './core/logger';
export type { Logger } from './core/logger';
export { createVectorStore, resolveStoreType, SUPPORTED_STORE_TYPES } from './core/vector-store-factory';
export type { StoreFactory } from './core/vector-store-factory';
export { defaultStoreConfig, getBackendConfig, loadStoreConfig, parseStoreConfig } from './core/store-config';
export type { BackendOptions, StoreConfig } from './core/store-config';
export { VectorStoreSwitcher } from './core/vector-store-switcher';
export { VectorStoreManager } from './core/vector-store-manager';
export { IngestHandler, chunkByParagraphs } from './core/ingest-handler';
export type { IngestOptions, IngestSummary } from './core/ingest-handler';
