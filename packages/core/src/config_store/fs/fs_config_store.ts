/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Handles persistence of `.specpulse/config.json`.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ConfigStore } from '../config_store';
import type { SpecPulseConfigFile } from '../../config_manager';
import { ConfigManager } from '../../config_manager';
import { ConfigValidationError } from '../../errors';
import { SPECPULSE_DIR } from '../../utils/project_discovery';
import { errnoCode, errorMessage } from '../../utils/errno';

export const CONFIG_FILE_NAME = 'config.json';

/**
 * Filesystem-based ConfigStore implementation.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore('/path/to/project');
 * const raw = await store.loadConfig(); // null when the file is missing
 * ```
 */
export class FsConfigStore implements ConfigStore {
  readonly location: string;

  constructor(projectRootPath: string) {
    this.location = path.join(projectRootPath, SPECPULSE_DIR, CONFIG_FILE_NAME);
  }

  async loadConfig(): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.location, 'utf-8');
    } catch (error: unknown) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      const message = errorMessage(error);
      throw new ConfigValidationError(this.location, [`cannot be read: ${message}`]);
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error: unknown) {
      const message = errorMessage(error);
      throw new ConfigValidationError(this.location, [`invalid JSON: ${message}`]);
    }
  }

  async saveConfig(config: SpecPulseConfigFile): Promise<void> {
    await fs.mkdir(path.dirname(this.location), { recursive: true });
    await fs.writeFile(this.location, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  }
}

/**
 * Create a ConfigManager backed by the project's config.json.
 */
export function createConfigManager(projectRoot: string): ConfigManager {
  return new ConfigManager(new FsConfigStore(projectRoot));
}
