/**
 * SpecPulse Configuration Types
 *
 * `SpecPulseConfigFile` is what `.specpulse/config.json` may contain; every
 * field is optional. `SpecPulseConfig` is the same document with defaults
 * applied.
 */

export type PathsConfig = {
  specs: string;
  plans: string;
  tasks: string;
  memory: string;
  templates: string;
};

export type NumberingConfig = {
  /** Minimum digits in rendered artifact numbers */
  width: number;
  /** Reservation attempts before an allocation gives up */
  maxAttempts: number;
};

export type GitConfig = {
  createBranches: boolean;
};

export type SpecPulseConfig = {
  version: string;
  projectName: string;
  paths: PathsConfig;
  numbering: NumberingConfig;
  git: GitConfig;
};

export type SpecPulseConfigFile = {
  version?: string;
  projectName?: string;
  paths?: Partial<PathsConfig>;
  numbering?: Partial<NumberingConfig>;
  git?: Partial<GitConfig>;
};

/**
 * IConfigManager interface
 *
 * Provides typed access to SpecPulse project configuration.
 */
export interface IConfigManager {
  /**
   * Load configuration with defaults applied. A missing file yields defaults.
   * @throws ConfigValidationError for invalid JSON or schema violations
   */
  loadConfig(): Promise<SpecPulseConfig>;

  /**
   * Validate and persist a configuration document.
   * @throws ConfigValidationError when the document is invalid
   */
  saveConfig(config: SpecPulseConfigFile): Promise<void>;

  /**
   * Shortcut for the resolved directory layout.
   */
  getPaths(): Promise<PathsConfig>;
}
