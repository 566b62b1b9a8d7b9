import type { StoreType, VectorStore } from '../ports/VectorStore';
import { createVectorStore, resolveStoreType } from './vector-store-factory';
import type { StoreFactory } from './vector-store-factory';
import { DEFAULT_CONFIG_PATH, getBackendConfig, loadStoreConfig } from './store-config';
import type { StoreConfig } from './store-config';

/**
 * Holds the active backend named by a {@link StoreConfig} and swaps it on
 * request. Data is never copied between backends.
 */
export class VectorStoreSwitcher {
  private store: VectorStore;

  constructor(private readonly config: StoreConfig, private readonly factory: StoreFactory = createVectorStore) {
    this.store = this.build(resolveStoreType(config.store_type));
  }

  static async fromFile(configPath: string = DEFAULT_CONFIG_PATH, factory?: StoreFactory): Promise<VectorStoreSwitcher> {
    return new VectorStoreSwitcher(await loadStoreConfig(configPath), factory);
  }

  get active(): VectorStore {
    return this.store;
  }

  get activeType(): StoreType {
    return this.store.storeType;
  }

  private build(storeType: StoreType): VectorStore {
    return this.factory(storeType, getBackendConfig(this.config, storeType));
  }

  /**
   * The new backend is built before the current one is closed, so a failed
   * switch leaves the current backend active.
   */
  async switchBackend(name: string): Promise<VectorStore> {
    const storeType = resolveStoreType(name);
    if (storeType === this.store.storeType) {
      return this.store;
    }

    const next = this.build(storeType);
    const previous = this.store;
    this.store = next;
    await previous.close();
    return next;
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}
