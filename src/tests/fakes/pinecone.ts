import { cosine, embedText } from './embedding';

type RecordMetadata = Record<string, string | number | boolean | string[]>;

interface PineconeRecord {
  id: string;
  values: number[];
  metadata?: RecordMetadata;
}

function matchesFilter(metadata: RecordMetadata | undefined, filter?: Record<string, unknown>): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([key, value]) => metadata?.[key] === value);
}

/**
 * In-process stand-in for a Pinecone index; scores are cosine similarity.
 */
export class FakeIndex {
  readonly records = new Map<string, PineconeRecord>();
  readonly upsertSizes: number[] = [];
  failWith: Error | null = null;

  constructor(readonly name: string, readonly dimension: number) {}

  private check(): void {
    if (this.failWith) throw this.failWith;
  }

  async upsert(records: PineconeRecord[]): Promise<void> {
    this.check();
    this.upsertSizes.push(records.length);
    records.forEach((record) => this.records.set(record.id, record));
  }

  async query(options: { vector: number[]; topK: number; includeMetadata?: boolean; filter?: Record<string, unknown> }) {
    this.check();
    const matches = [...this.records.values()]
      .filter((record) => matchesFilter(record.metadata, options.filter))
      .map((record) => ({
        id: record.id,
        score: cosine(options.vector, record.values),
        metadata: options.includeMetadata ? record.metadata : undefined,
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, options.topK);
    return { matches, namespace: '' };
  }

  async deleteMany(ids: string[]): Promise<void> {
    this.check();
    ids.forEach((id) => this.records.delete(id));
  }

  async describeIndexStats() {
    this.check();
    return { dimension: this.dimension, indexFullness: 0, totalRecordCount: this.records.size, namespaces: {} };
  }
}

export const pineconeService = {
  indexes: new Map<string, FakeIndex>(),
  apiKeys: [] as string[],
  createCalls: [] as Record<string, unknown>[],
  embedCalls: [] as { model: string; inputs: string[]; params?: Record<string, string> }[],
  listError: null as Error | null,
  reset(): void {
    this.indexes.clear();
    this.apiKeys = [];
    this.createCalls = [];
    this.embedCalls = [];
    this.listError = null;
  },
};

export class FakePinecone {
  readonly inference = {
    embed: async (model: string, inputs: string[], params?: Record<string, string>) => {
      pineconeService.embedCalls.push({ model, inputs, params });
      return { model, data: inputs.map((input) => ({ values: embedText(input) })), usage: { totalTokens: 0 } };
    },
  };

  constructor(config: { apiKey: string }) {
    pineconeService.apiKeys.push(config.apiKey);
  }

  async listIndexes() {
    if (pineconeService.listError) throw pineconeService.listError;
    return { indexes: [...pineconeService.indexes.values()].map((index) => ({ name: index.name })) };
  }

  async createIndex(options: { name: string; dimension: number }): Promise<void> {
    pineconeService.createCalls.push(options);
    if (!pineconeService.indexes.has(options.name)) {
      pineconeService.indexes.set(options.name, new FakeIndex(options.name, options.dimension));
    }
  }

  index(name: string): FakeIndex {
    const index = pineconeService.indexes.get(name);
    if (!index) throw new Error(`fake index ${name} does not exist`);
    return index;
  }
}
