import { ProjectInitializer } from './project_initializer';
import { MemoryFileLister } from '../file_lister/memory/memory_file_lister';
import { MemoryFileWriter } from '../file_writer/memory/memory_file_writer';
import { MemoryConfigStore } from '../config_store/memory/memory_config_store';
import { DEFAULT_TEMPLATES } from '../template_provider';
import { DEFAULT_CONTEXT_DOCUMENT } from '../context_store';
import { ConfigValidationError } from '../errors';

describe('ProjectInitializer', () => {
  let lister: MemoryFileLister;
  let configStore: MemoryConfigStore;
  let initializer: ProjectInitializer;

  beforeEach(() => {
    lister = new MemoryFileLister();
    configStore = new MemoryConfigStore();
    initializer = new ProjectInitializer({
      lister,
      writer: new MemoryFileWriter(lister),
      configStore,
    });
  });

  it('should scaffold config, directories, context and templates', async () => {
    const result = await initializer.initialize({ projectName: 'billing' });

    expect(result.alreadyInitialized).toBe(false);
    expect(result.config.projectName).toBe('billing');
    expect(result.created).toEqual([
      'memory:config.json',
      'specs',
      'plans',
      'tasks',
      'memory',
      'templates',
      'memory/context.md',
      'templates/spec.md',
      'templates/plan.md',
      'templates/task.md',
    ]);
    expect(await configStore.loadConfig()).toMatchObject({ version: '1.0', projectName: 'billing' });
    expect(await lister.read('memory/context.md')).toBe(DEFAULT_CONTEXT_DOCUMENT);
    expect(await lister.read('templates/task.md')).toBe(DEFAULT_TEMPLATES.task);
    expect(await lister.listChildren('', { entryType: 'directory' }))
      .toEqual(['memory', 'plans', 'specs', 'tasks', 'templates']);
  });

  it('should report initialization state', async () => {
    expect(await initializer.isInitialized()).toBe(false);

    await initializer.initialize();

    expect(await initializer.isInitialized()).toBe(true);
  });

  it('should only create missing pieces on a second run', async () => {
    await initializer.initialize({ projectName: 'billing' });
    lister.removeFile('templates/plan.md');

    const result = await initializer.initialize({ projectName: 'ignored' });

    expect(result.alreadyInitialized).toBe(true);
    expect(result.config.projectName).toBe('billing');
    expect(result.created).toEqual(['templates/plan.md']);
  });

  it('should keep an edited context document', async () => {
    lister.addFile('memory/context.md', '# Notes\n');

    await initializer.initialize();

    expect(await lister.read('memory/context.md')).toBe('# Notes\n');
  });

  it('should honour configured paths', async () => {
    configStore.setConfig({ paths: { specs: 'docs/specs', templates: '.specpulse/templates' } });

    const result = await initializer.initialize();

    expect(result.alreadyInitialized).toBe(true);
    expect(result.created).toContain('docs/specs');
    expect(result.created).toContain('.specpulse/templates/spec.md');
    expect(result.created).not.toContain('specs');
  });

  it('should reject an empty project name', async () => {
    const error = await initializer.initialize({ projectName: '' }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(await initializer.isInitialized()).toBe(false);
  });
});
