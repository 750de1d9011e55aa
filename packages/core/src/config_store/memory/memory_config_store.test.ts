import { MemoryConfigStore } from './memory_config_store';

describe('MemoryConfigStore', () => {
  it('should return null until something is stored', async () => {
    expect(await new MemoryConfigStore().loadConfig()).toBeNull();
  });

  it('should copy saved documents', async () => {
    const store = new MemoryConfigStore();
    const config = { paths: { specs: 'specs' } };

    await store.saveConfig(config);
    config.paths.specs = 'mutated';

    expect(await store.loadConfig()).toEqual({ paths: { specs: 'specs' } });
  });

  it('should clear stored configuration', async () => {
    const store = new MemoryConfigStore();
    store.setConfig({ projectName: 'demo' });
    store.clear();

    expect(await store.loadConfig()).toBeNull();
  });
});
