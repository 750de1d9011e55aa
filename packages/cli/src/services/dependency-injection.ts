import * as path from 'path';
import {
  Config,
  Registry,
  Allocator,
  Features,
  Templates,
  Tracker,
  History,
  Validator,
  Project,
  Git,
} from '@specpulse/core';
import {
  FsFileLister,
  FsFileWriter,
  FsConfigStore,
  FsContextStore,
  FsProgressHistoryStore,
  createConfigManager,
  createLocalGitModule,
  requireProjectRoot,
} from '@specpulse/core/fs';

/**
 * Dependency Injection Service for the SpecPulse CLI
 *
 * Builds the core modules over the filesystem backends once per process.
 * Commands ask for what they need; nothing touches disk until they do.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private projectRoot: string | null = null;
  private config: Config.SpecPulseConfig | null = null;
  private lister: FsFileLister | null = null;
  private writer: FsFileWriter | null = null;
  private registry: Registry.ArtifactRegistry | null = null;
  private gitModule: Git.IGitModule | null = null;
  private featureManager: Features.FeatureManager | null = null;
  private progressTracker: Tracker.ProgressTracker | null = null;
  private progressHistory: History.ProgressHistory | null = null;
  private artifactValidator: Validator.ArtifactValidator | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Resets the singleton instance (useful for testing)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Project root found by walking up from the working directory.
   * @throws NotInitializedError when no `.specpulse/` exists above cwd
   */
  getProjectRoot(): string {
    if (!this.projectRoot) {
      this.projectRoot = requireProjectRoot(process.cwd());
    }
    return this.projectRoot;
  }

  async getConfig(): Promise<Config.SpecPulseConfig> {
    if (!this.config) {
      this.config = await createConfigManager(this.getProjectRoot()).loadConfig();
    }
    return this.config;
  }

  getFileLister(): FsFileLister {
    if (!this.lister) {
      this.lister = new FsFileLister({ cwd: this.getProjectRoot() });
    }
    return this.lister;
  }

  getFileWriter(): FsFileWriter {
    if (!this.writer) {
      this.writer = new FsFileWriter({ cwd: this.getProjectRoot() });
    }
    return this.writer;
  }

  getArtifactRegistry(): Registry.ArtifactRegistry {
    if (!this.registry) {
      this.registry = new Registry.ArtifactRegistry({ lister: this.getFileLister() });
    }
    return this.registry;
  }

  getGitModule(): Git.IGitModule {
    if (!this.gitModule) {
      this.gitModule = createLocalGitModule(this.getProjectRoot());
    }
    return this.gitModule;
  }

  async getFeatureManager(): Promise<Features.FeatureManager> {
    if (this.featureManager) {
      return this.featureManager;
    }

    const config = await this.getConfig();
    const lister = this.getFileLister();
    const writer = this.getFileWriter();
    const registry = this.getArtifactRegistry();

    this.featureManager = new Features.FeatureManager({
      config,
      lister,
      writer,
      registry,
      allocator: new Allocator.IdAllocator({
        registry,
        writer,
        maxAttempts: config.numbering.maxAttempts,
      }),
      context: new FsContextStore(this.absolute(config.paths.memory)),
      templates: new Templates.TemplateProvider({
        lister,
        templatesDir: config.paths.templates,
      }),
      git: this.getGitModule(),
    });
    return this.featureManager;
  }

  getProgressTracker(): Tracker.ProgressTracker {
    if (!this.progressTracker) {
      this.progressTracker = new Tracker.ProgressTracker({ lister: this.getFileLister() });
    }
    return this.progressTracker;
  }

  async getProgressHistory(): Promise<History.ProgressHistory> {
    if (!this.progressHistory) {
      const config = await this.getConfig();
      this.progressHistory = new History.ProgressHistory(
        new FsProgressHistoryStore(this.absolute(config.paths.memory))
      );
    }
    return this.progressHistory;
  }

  getArtifactValidator(): Validator.ArtifactValidator {
    if (!this.artifactValidator) {
      this.artifactValidator = new Validator.ArtifactValidator({ lister: this.getFileLister() });
    }
    return this.artifactValidator;
  }

  /**
   * Initializer for a project rooted at `targetRoot`. Not cached: init runs
   * before any project root exists to be discovered.
   */
  createProjectInitializer(targetRoot: string): Project.ProjectInitializer {
    return new Project.ProjectInitializer({
      lister: new FsFileLister({ cwd: targetRoot }),
      writer: new FsFileWriter({ cwd: targetRoot }),
      configStore: new FsConfigStore(targetRoot),
    });
  }

  private absolute(projectPath: string): string {
    return path.join(this.getProjectRoot(), projectPath);
  }
}
