/**
 * In-memory stand-in for DependencyInjectionService, used by command tests.
 * Wires the real core modules over the memory backends.
 */

import {
  Allocator,
  Config,
  Features,
  History,
  Project,
  Registry,
  Templates,
  Tracker,
  Validator,
} from '@specpulse/core';
import {
  MemoryConfigStore,
  MemoryContextStore,
  MemoryFileLister,
  MemoryFileWriter,
  MemoryGitModule,
  MemoryProgressHistoryStore,
} from '@specpulse/core/memory';
import type { DependencyInjectionService } from '../services/dependency-injection';

type CommandServices = Pick<
  DependencyInjectionService,
  | 'getFeatureManager'
  | 'getProgressTracker'
  | 'getProgressHistory'
  | 'getArtifactValidator'
  | 'createProjectInitializer'
>;

export type MemoryServices = CommandServices & {
  lister: MemoryFileLister;
  git: MemoryGitModule;
  context: MemoryContextStore;
  configStore: MemoryConfigStore;
  /** ms since epoch seen by progress history; tests move it forward */
  clock: { now: number };
};

export type MemoryServicesOptions = {
  files?: Record<string, string>;
  directories?: string[];
  git?: MemoryGitModule;
};

export function createMemoryServices(options: MemoryServicesOptions = {}): MemoryServices {
  const lister = new MemoryFileLister({ files: options.files ?? {}, directories: options.directories ?? [] });
  const writer = new MemoryFileWriter(lister);
  const registry = new Registry.ArtifactRegistry({ lister });
  const git = options.git ?? new MemoryGitModule();
  const context = new MemoryContextStore();
  const configStore = new MemoryConfigStore();
  const historyStore = new MemoryProgressHistoryStore();
  const clock = { now: Date.UTC(2026, 0, 1) };
  const config = Config.resolveConfig({});

  const featureManager = new Features.FeatureManager({
    config,
    lister,
    writer,
    registry,
    allocator: new Allocator.IdAllocator({ registry, writer }),
    context,
    templates: new Templates.TemplateProvider({ lister, templatesDir: config.paths.templates }),
    git,
    now: () => new Date(clock.now),
  });
  const tracker = new Tracker.ProgressTracker({ lister });
  const history = new History.ProgressHistory(historyStore, () => clock.now);
  const validator = new Validator.ArtifactValidator({ lister });

  return {
    lister,
    git,
    context,
    configStore,
    clock,
    getFeatureManager: async () => featureManager,
    getProgressTracker: () => tracker,
    getProgressHistory: async () => history,
    getArtifactValidator: () => validator,
    createProjectInitializer: () => new Project.ProjectInitializer({ lister, writer, configStore }),
  };
}
