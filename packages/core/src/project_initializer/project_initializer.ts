/**
 * ProjectInitializer - scaffolds a SpecPulse project
 *
 * Works through FileLister/FileWriter, so the same code initializes a real
 * directory or an in-memory tree.
 */

import type { FileLister } from '../file_lister';
import type { FileWriter } from '../file_writer';
import { ConfigManager } from '../config_manager';
import type { SpecPulseConfig } from '../config_manager';
import type { ConfigStore } from '../config_store';
import { DEFAULT_TEMPLATES } from '../template_provider';
import type { TemplateKind } from '../template_provider';
import { CONTEXT_FILE_NAME, DEFAULT_CONTEXT_DOCUMENT } from '../context_store';
import { joinPosix } from '../utils/path_guard';
import { createLogger } from '../logger';
import type {
  InitProjectOptions,
  IProjectInitializer,
  ProjectInitializerDependencies,
  ProjectInitResult,
} from './project_initializer.types';

const logger = createLogger('[ProjectInitializer] ');

const TEMPLATE_KINDS: readonly TemplateKind[] = ['spec', 'plan', 'task'];

export class ProjectInitializer implements IProjectInitializer {
  private readonly lister: FileLister;
  private readonly writer: FileWriter;
  private readonly configStore: ConfigStore;
  private readonly configManager: ConfigManager;

  constructor(dependencies: ProjectInitializerDependencies) {
    this.lister = dependencies.lister;
    this.writer = dependencies.writer;
    this.configStore = dependencies.configStore;
    this.configManager = new ConfigManager(dependencies.configStore);
  }

  async isInitialized(): Promise<boolean> {
    return (await this.configStore.loadConfig()) !== null;
  }

  async initialize(options: InitProjectOptions = {}): Promise<ProjectInitResult> {
    const created: string[] = [];
    const alreadyInitialized = await this.isInitialized();

    let config: SpecPulseConfig = await this.configManager.loadConfig();
    if (!alreadyInitialized) {
      config = { ...config, projectName: options.projectName ?? config.projectName };
      await this.configManager.saveConfig(config);
      created.push(this.configStore.location);
    }

    const { specs, plans, tasks, memory, templates } = config.paths;
    for (const dir of [specs, plans, tasks, memory, templates]) {
      if (!(await this.lister.exists(dir))) {
        await this.writer.ensureDirectory(dir);
        created.push(dir);
      }
    }

    const contextPath = joinPosix(memory, CONTEXT_FILE_NAME);
    if (await this.writer.reserveFile(contextPath, DEFAULT_CONTEXT_DOCUMENT)) {
      created.push(contextPath);
    }

    for (const kind of TEMPLATE_KINDS) {
      const templatePath = joinPosix(templates, `${kind}.md`);
      if (await this.writer.reserveFile(templatePath, DEFAULT_TEMPLATES[kind])) {
        created.push(templatePath);
      }
    }

    logger.info(alreadyInitialized
      ? `Project already initialized; created ${created.length} missing item(s)`
      : `Initialized project ${config.projectName}`);
    return { config, alreadyInitialized, created };
  }
}
