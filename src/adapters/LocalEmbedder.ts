import { pipeline } from '@huggingface/transformers';
import type { FeatureExtractionPipeline } from '@huggingface/transformers';
import type { Embedder } from '../ports/Embedder';
import { logger as defaultLogger } from '../core/logger';
import type { Logger } from '../core/logger';

export const DEFAULT_LOCAL_MODEL = 'Xenova/all-MiniLM-L6-v2';

export class LocalEmbedder implements Embedder {
  private model: FeatureExtractionPipeline | null = null;
  private readonly logger: Logger;

  constructor(public readonly modelName: string = DEFAULT_LOCAL_MODEL, logger?: Logger) {
    this.logger = logger ?? defaultLogger;
  }

  private async initializeModel(): Promise<FeatureExtractionPipeline> {
    if (!this.model) {
      this.logger.info(`🤖 Loading local embedding model ${this.modelName}...`);
      this.model = await pipeline('feature-extraction', this.modelName) as FeatureExtractionPipeline;
      this.logger.success('✅ Local embedding model loaded successfully');
    }
    return this.model;
  }

  async getEmbeddings(text: string): Promise<number[]> {
    const model = await this.initializeModel();

    try {
      // Mean pooling with normalization
      const result = await model(text, {
        pooling: 'mean',
        normalize: true
      });

      return Array.from(result.data, (value) => Number(value));
    } catch (error) {
      throw new Error(`Failed to generate embeddings: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  async close(): Promise<void> {
    this.model = null;
  }
}
