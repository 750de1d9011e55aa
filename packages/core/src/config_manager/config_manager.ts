/**
 * ConfigManager - Project Configuration Manager
 *
 * Provides typed access to `.specpulse/config.json`. Documents are validated
 * with ajv against `config.schema.json`, then merged over the defaults.
 *
 * Uses ConfigStore abstraction for backend-agnostic persistence.
 */

import type { ErrorObject } from 'ajv';
import type { ConfigStore } from '../config_store/config_store';
import type {
  IConfigManager,
  PathsConfig,
  SpecPulseConfig,
  SpecPulseConfigFile,
} from './config_manager.types';
import { SchemaValidationCache } from '../schemas/schema_cache';
import { ConfigValidationError } from '../errors';
import { unsafePathReason } from '../utils/path_guard';
import { DEFAULT_NUMBER_WIDTH } from '../utils/id_generator';
import { DEFAULT_MAX_ATTEMPTS } from '../id_allocator/id_allocator';
import { createLogger } from '../logger';
import configSchema from './config.schema.json';

const logger = createLogger('[ConfigManager] ');

export const CONFIG_VERSION = '1.0';

export const DEFAULT_CONFIG: SpecPulseConfig = {
  version: CONFIG_VERSION,
  projectName: 'specpulse-project',
  paths: {
    specs: 'specs',
    plans: 'plans',
    tasks: 'tasks',
    memory: 'memory',
    templates: 'templates',
  },
  numbering: {
    width: DEFAULT_NUMBER_WIDTH,
    maxAttempts: DEFAULT_MAX_ATTEMPTS,
  },
  git: {
    createBranches: true,
  },
};

function describeError(error: ErrorObject): string {
  const field = error.instancePath ? error.instancePath.slice(1).replace(/\//g, '.') : '(root)';
  const extra = error.keyword === 'additionalProperties'
    ? `: ${String(error.params['additionalProperty'])}`
    : '';
  return `${field} ${error.message ?? 'is invalid'}${extra}`;
}

/**
 * Validates a parsed document against the config schema and the path rules.
 * @returns the document narrowed to SpecPulseConfigFile
 * @throws ConfigValidationError listing every failing field
 */
export function validateConfigDocument(raw: unknown, location: string): SpecPulseConfigFile {
  const validate = SchemaValidationCache.getValidatorFromSchema<SpecPulseConfigFile>(configSchema);
  if (!validate(raw)) {
    throw new ConfigValidationError(location, (validate.errors ?? []).map(describeError));
  }

  const problems: string[] = [];
  for (const [key, value] of Object.entries(raw.paths ?? {})) {
    const reason = value === undefined ? null : unsafePathReason(value);
    if (reason) {
      problems.push(`paths.${key}: ${reason}`);
    }
  }
  if (problems.length > 0) {
    throw new ConfigValidationError(location, problems);
  }
  return raw;
}

/**
 * Applies defaults to a validated document.
 */
export function resolveConfig(file: SpecPulseConfigFile): SpecPulseConfig {
  return {
    version: file.version ?? DEFAULT_CONFIG.version,
    projectName: file.projectName ?? DEFAULT_CONFIG.projectName,
    paths: { ...DEFAULT_CONFIG.paths, ...file.paths },
    numbering: { ...DEFAULT_CONFIG.numbering, ...file.numbering },
    git: { ...DEFAULT_CONFIG.git, ...file.git },
  };
}

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * import { FsConfigStore } from '@specpulse/core/fs';
 * const configManager = new ConfigManager(new FsConfigStore('/path/to/project'));
 *
 * // Test usage
 * import { MemoryConfigStore } from '@specpulse/core/memory';
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ paths: { specs: 'docs/specs' } });
 * const configManager = new ConfigManager(configStore);
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  async loadConfig(): Promise<SpecPulseConfig> {
    const raw = await this.configStore.loadConfig();
    if (raw === null) {
      logger.debug(`No configuration at ${this.configStore.location}; using defaults`);
      return resolveConfig({});
    }
    return resolveConfig(validateConfigDocument(raw, this.configStore.location));
  }

  async saveConfig(config: SpecPulseConfigFile): Promise<void> {
    validateConfigDocument(config, this.configStore.location);
    await this.configStore.saveConfig(config);
  }

  async getPaths(): Promise<PathsConfig> {
    const config = await this.loadConfig();
    return config.paths;
  }
}
