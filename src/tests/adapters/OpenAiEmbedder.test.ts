import { OpenAiEmbedder } from '../../adapters/OpenAiEmbedder';
import { ConfigurationError } from '../../core/errors';

const { createEmbedding, clientOptions } = vi.hoisted(() => ({
  createEmbedding: vi.fn(),
  clientOptions: new Array<{ apiKey: string }>(),
}));

vi.mock('openai', () => ({
  default: class {
    readonly embeddings = { create: createEmbedding };

    constructor(options: { apiKey: string }) {
      clientOptions.push(options);
    }
  },
}));

describe('OpenAiEmbedder', () => {
  beforeEach(() => {
    clientOptions.length = 0;
    vi.stubEnv('OPENAI_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('fails without an API key', () => {
    expect(() => new OpenAiEmbedder()).toThrow(ConfigurationError);
    expect(() => new OpenAiEmbedder()).toThrow('OPENAI_API_KEY is not set');
  });

  it('uses the key passed in', () => {
    new OpenAiEmbedder(undefined, 'test-key');

    expect(clientOptions).toEqual([{ apiKey: 'test-key' }]);
  });

  it('falls back to OPENAI_API_KEY', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-env-key');

    new OpenAiEmbedder();

    expect(clientOptions).toEqual([{ apiKey: 'test-env-key' }]);
  });

  it('returns the first embedding for the text', async () => {
    createEmbedding.mockResolvedValue({ data: [{ embedding: [0.1, 0.2, 0.3] }] });
    const embedder = new OpenAiEmbedder('text-embedding-3-large', 'test-key');

    const embedding = await embedder.getEmbeddings('Can I change my seat?');

    expect(embedding).toEqual([0.1, 0.2, 0.3]);
    expect(createEmbedding).toHaveBeenCalledWith({ model: 'text-embedding-3-large', input: 'Can I change my seat?' });
  });

  it('fails when the API returns no embedding', async () => {
    createEmbedding.mockResolvedValue({ data: [] });
    const embedder = new OpenAiEmbedder(undefined, 'test-key');

    await expect(embedder.getEmbeddings('text')).rejects.toThrow('No embedding returned by text-embedding-3-small');
  });
});
