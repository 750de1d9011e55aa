import type { FileLister } from '../file_lister';
import type { FileWriter } from '../file_writer';
import type { SpecPulseConfig } from '../config_manager';
import type { ConfigStore } from '../config_store';

export type InitProjectOptions = {
  /** Defaults to the configured (or default) project name */
  projectName?: string;
};

export type ProjectInitResult = {
  config: SpecPulseConfig;
  /** True when a config file was already present; nothing was overwritten */
  alreadyInitialized: boolean;
  /** What this run created, in order: the config location, then project-relative paths */
  created: string[];
};

/**
 * ProjectInitializer Dependencies - Facade + Dependency Injection Pattern
 */
export type ProjectInitializerDependencies = {
  lister: FileLister;
  writer: FileWriter;
  configStore: ConfigStore;
};

/**
 * Public interface for project initialization.
 */
export interface IProjectInitializer {
  /**
   * Checks whether the config store holds a document.
   */
  isInitialized(): Promise<boolean>;

  /**
   * Creates the configuration, the directory tree, the context document and
   * editable copies of the default templates. Safe to run again: existing
   * files are left alone and only missing pieces are created.
   */
  initialize(options?: InitProjectOptions): Promise<ProjectInitResult>;
}
