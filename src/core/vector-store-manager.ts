import * as fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { CollectionInfo, QueryFilters, QueryResult, VectorStore } from '../ports/VectorStore';
import { ValidationError } from './errors';
import { logger as defaultLogger } from './logger';
import type { Logger } from './logger';
import { formatIssues } from './store-config';

export const SAMPLE_DATA_PATH = fileURLToPath(new URL('../../data/sample-documents.json', import.meta.url));

const DOCUMENT_PREVIEW_LENGTH = 1000;

const sampleDocumentsSchema = z.array(
  z.object({
    id: z.string().min(1),
    text: z.string().min(1),
    metadata: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
  })
);

function preview(text: string): string {
  return text.length > DOCUMENT_PREVIEW_LENGTH ? `${text.slice(0, DOCUMENT_PREVIEW_LENGTH)}...` : text;
}

export class VectorStoreManager {
  constructor(private readonly store: VectorStore, private readonly logger: Logger = defaultLogger) {}

  async search(query: string, topK: number = 3, filters?: QueryFilters): Promise<QueryResult[]> {
    const results = await this.store.query(query, topK, filters);

    this.logger.info(`\nSearch results for: '${query}'`);
    this.logger.info('-'.repeat(50));

    if (results.length === 0) {
      this.logger.warning('No matching documents found');
    }

    results.forEach((result, index) => {
      this.logger.success(`${index + 1}. Score: ${result.score.toFixed(4)}`);
      this.logger.info(`   ID: ${result.id}`);
      this.logger.info(`   Document: ${preview(result.document)}`);
      this.logger.source(`   Metadata: ${JSON.stringify(result.metadata)}`);
    });

    return results;
  }

  async getInfo(): Promise<CollectionInfo> {
    const info = await this.store.getCollectionInfo();

    this.logger.info('\nVector Store Information:');
    this.logger.info('-'.repeat(30));
    for (const [key, value] of Object.entries(info)) {
      this.logger.info(`${key}: ${value}`);
    }

    return info;
  }

  /**
   * Loads the bundled sample documents into the store.
   */
  async setupWithSampleData(samplePath: string = SAMPLE_DATA_PATH): Promise<number> {
    const raw: unknown = JSON.parse(await fs.readFile(samplePath, 'utf-8'));
    const parsed = sampleDocumentsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`Invalid sample data in ${samplePath}: ${formatIssues(parsed.error)}`, parsed.error);
    }

    const samples = parsed.data;
    await this.store.addDocuments(
      samples.map((sample) => sample.text),
      samples.map((sample) => sample.id),
      samples.map((sample) => sample.metadata)
    );
    return samples.length;
  }
}
