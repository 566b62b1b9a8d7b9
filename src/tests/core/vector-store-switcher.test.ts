import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigurationError } from '../../core/errors';
import type { BackendOptions, StoreConfig } from '../../core/store-config';
import { resolveStoreType } from '../../core/vector-store-factory';
import { VectorStoreSwitcher } from '../../core/vector-store-switcher';
import { MemoryStore } from '../fakes/memory-store';

vi.mock('@huggingface/transformers', () => ({ pipeline: vi.fn() }));

const config: StoreConfig = {
  store_type: 'chroma',
  chromadb: { label: 'local-docs' },
  pinecone: { label: 'cloud-docs' },
};

function createFactory() {
  const built: MemoryStore[] = [];
  const factory = vi.fn((storeType: string, storeConf: BackendOptions = {}) => {
    const label = typeof storeConf.label === 'string' ? storeConf.label : storeType;
    const store = new MemoryStore(resolveStoreType(storeType), label);
    built.push(store);
    return store;
  });
  return { built, factory };
}

describe('VectorStoreSwitcher', () => {
  it('builds the backend named by store_type', () => {
    const { built, factory } = createFactory();

    const switcher = new VectorStoreSwitcher(config, factory);

    expect(switcher.activeType).toBe('chromadb');
    expect(switcher.active).toBe(built[0]);
    expect(factory).toHaveBeenCalledWith('chromadb', { label: 'local-docs' });
  });

  it('rejects an unknown store_type', () => {
    const { factory } = createFactory();

    expect(() => new VectorStoreSwitcher({ ...config, store_type: 'weaviate' }, factory)).toThrow(ConfigurationError);
    expect(factory).not.toHaveBeenCalled();
  });

  it('swaps to the other backend and closes the previous one', async () => {
    const { built, factory } = createFactory();
    const switcher = new VectorStoreSwitcher(config, factory);

    const next = await switcher.switchBackend('Pinecone');

    expect(next).toBe(built[1]);
    expect(switcher.active).toBe(next);
    expect(switcher.activeType).toBe('pinecone');
    expect(factory).toHaveBeenLastCalledWith('pinecone', { label: 'cloud-docs' });
    expect(built[0].closed).toBe(true);
    expect(built[1].closed).toBe(false);
  });

  it('keeps the active backend when switching to the same type', async () => {
    const { built, factory } = createFactory();
    const switcher = new VectorStoreSwitcher(config, factory);

    const same = await switcher.switchBackend('local');

    expect(same).toBe(built[0]);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(built[0].closed).toBe(false);
  });

  it('does not copy or touch documents when switching', async () => {
    const { built, factory } = createFactory();
    const switcher = new VectorStoreSwitcher(config, factory);
    await switcher.active.addDocuments(['Refunds take seven days'], ['refund']);

    await switcher.switchBackend('pinecone');

    expect(await switcher.active.getCollectionInfo()).toEqual({ name: 'cloud-docs', type: 'Memory', document_count: 0 });
    expect([...built[0].documents.keys()]).toEqual(['refund']);
    expect(built[0].documents.get('refund')).toEqual({ text: 'Refunds take seven days', metadata: {} });
  });

  it('leaves the current backend active when the target has no block', async () => {
    const { built, factory } = createFactory();
    const switcher = new VectorStoreSwitcher({ store_type: 'chromadb', chromadb: {} }, factory);

    await expect(switcher.switchBackend('pinecone')).rejects.toThrow("Configuration for 'pinecone' not found");

    expect(switcher.active).toBe(built[0]);
    expect(built[0].closed).toBe(false);
  });

  it('leaves the current backend active when the target cannot be built', async () => {
    const { built, factory } = createFactory();
    const switcher = new VectorStoreSwitcher(config, factory);
    factory.mockImplementationOnce(() => {
      throw new ConfigurationError('No Pinecone API key');
    });

    await expect(switcher.switchBackend('pinecone')).rejects.toThrow('No Pinecone API key');

    expect(switcher.active).toBe(built[0]);
    expect(built[0].closed).toBe(false);
  });

  it('rejects an unknown backend name', async () => {
    const { factory } = createFactory();
    const switcher = new VectorStoreSwitcher(config, factory);

    await expect(switcher.switchBackend('weaviate')).rejects.toThrow(
      "Unsupported store type: weaviate. Supported types: 'chromadb', 'pinecone'"
    );
  });

  it('closes the active backend', async () => {
    const { built, factory } = createFactory();
    const switcher = new VectorStoreSwitcher(config, factory);

    await switcher.close();

    expect(built[0].closed).toBe(true);
  });

  describe('fromFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'switcher-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('reads the active backend from a configuration file', async () => {
      const configPath = path.join(dir, 'store_conf.json');
      fs.writeFileSync(configPath, JSON.stringify({ ...config, store_type: 'pinecone' }));
      const { factory } = createFactory();

      const switcher = await VectorStoreSwitcher.fromFile(configPath, factory);

      expect(switcher.activeType).toBe('pinecone');
      expect(factory).toHaveBeenCalledWith('pinecone', { label: 'cloud-docs' });
    });
  });
});
