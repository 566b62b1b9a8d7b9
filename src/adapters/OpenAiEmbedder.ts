import OpenAI from 'openai';
import type { Embedder } from '../ports/Embedder';
import { ConfigurationError } from '../core/errors';

export const DEFAULT_OPENAI_MODEL = 'text-embedding-3-small';

export class OpenAiEmbedder implements Embedder {
    private readonly client: OpenAI;

    constructor(public readonly modelName: string = DEFAULT_OPENAI_MODEL, apiKey?: string) {
        const key = apiKey ?? process.env.OPENAI_API_KEY;
        if (!key) {
            throw new ConfigurationError('OPENAI_API_KEY is not set');
        }
        this.client = new OpenAI({ apiKey: key });
    }

    async getEmbeddings(text: string): Promise<number[]> {
        const response = await this.client.embeddings.create({
            model: this.modelName,
            input: text
        });
        const [first] = response.data;
        if (!first) {
            throw new Error(`No embedding returned by ${this.modelName}`);
        }
        return first.embedding;
    }

    async close(): Promise<void> {}
}
