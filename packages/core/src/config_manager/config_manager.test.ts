import { ConfigManager, DEFAULT_CONFIG, resolveConfig } from './config_manager';
import { MemoryConfigStore } from '../config_store/memory';
import { ConfigValidationError } from '../errors';

describe('ConfigManager', () => {
  let store: MemoryConfigStore;
  let manager: ConfigManager;

  beforeEach(() => {
    store = new MemoryConfigStore();
    manager = new ConfigManager(store);
  });

  describe('loadConfig', () => {
    it('should return defaults when no configuration exists', async () => {
      const config = await manager.loadConfig();

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(config.paths.specs).toBe('specs');
      expect(config.numbering).toEqual({ width: 3, maxAttempts: 5 });
      expect(config.git.createBranches).toBe(true);
    });

    it('should merge a partial document over the defaults', async () => {
      store.setConfig({
        projectName: 'billing',
        paths: { specs: 'docs/specs' },
        numbering: { width: 4 },
        git: { createBranches: false },
      });

      const config = await manager.loadConfig();

      expect(config.projectName).toBe('billing');
      expect(config.paths).toEqual({
        specs: 'docs/specs',
        plans: 'plans',
        tasks: 'tasks',
        memory: 'memory',
        templates: 'templates',
      });
      expect(config.numbering).toEqual({ width: 4, maxAttempts: 5 });
      expect(config.git.createBranches).toBe(false);
    });

    it('should reject schema violations naming the failing fields', async () => {
      store.setConfig({ numbering: { width: 0 }, git: { createBranches: 'yes' } });

      const error = await manager.loadConfig().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConfigValidationError);
      if (!(error instanceof ConfigValidationError)) return;
      expect(error.code).toBe('INVALID_CONFIG');
      expect(error.configPath).toBe('memory:config.json');
      expect(error.problems).toEqual([
        'numbering.width must be >= 1',
        'git.createBranches must be boolean',
      ]);
    });

    it('should name unknown properties', async () => {
      store.setConfig({ colour: 'red' });

      await expect(manager.loadConfig()).rejects.toThrow(
        'Invalid configuration in memory:config.json: (root) must NOT have additional properties: colour'
      );
    });

    it('should reject documents that are not objects', async () => {
      store.setConfig(['specs']);

      await expect(manager.loadConfig()).rejects.toThrow('(root) must be object');
    });

    it('should reject directories outside the project', async () => {
      store.setConfig({ paths: { specs: '../outside' } });

      await expect(manager.loadConfig()).rejects.toThrow(
        'paths.specs: path traversal not allowed: ../outside'
      );
    });
  });

  describe('saveConfig', () => {
    it('should persist valid documents', async () => {
      await manager.saveConfig({ projectName: 'demo', numbering: { maxAttempts: 8 } });

      expect(await store.loadConfig()).toEqual({ projectName: 'demo', numbering: { maxAttempts: 8 } });
      expect((await manager.loadConfig()).numbering.maxAttempts).toBe(8);
    });

    it('should refuse invalid documents without writing them', async () => {
      await expect(manager.saveConfig({ numbering: { width: 1.5 } })).rejects.toThrow(
        'numbering.width must be integer'
      );
      expect(await store.loadConfig()).toBeNull();
    });
  });

  describe('getPaths', () => {
    it('should return the resolved directory layout', async () => {
      store.setConfig({ paths: { memory: '.memory' } });

      expect((await manager.getPaths()).memory).toBe('.memory');
    });
  });

  describe('resolveConfig', () => {
    it('should not share nested objects with the defaults', () => {
      const config = resolveConfig({});
      config.paths.specs = 'changed';

      expect(DEFAULT_CONFIG.paths.specs).toBe('specs');
    });
  });
});
