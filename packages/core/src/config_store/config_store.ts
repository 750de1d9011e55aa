/**
 * ConfigStore Interface
 *
 * Abstraction for config.json persistence. The store only moves documents
 * in and out; ConfigManager validates them and applies defaults.
 *
 * Implementations:
 * - FsConfigStore: Filesystem-based (.specpulse/config.json)
 * - MemoryConfigStore: In-memory (tests, embedding)
 */

import type { SpecPulseConfigFile } from '../config_manager/config_manager.types';

export interface ConfigStore {
  /**
   * Where the document lives, used in error messages.
   */
  readonly location: string;

  /**
   * Load the raw configuration document.
   *
   * @returns the parsed document, or null when none exists
   * @throws ConfigValidationError when the document exists but is not valid JSON
   */
  loadConfig(): Promise<unknown>;

  /**
   * Persist a configuration document.
   */
  saveConfig(config: SpecPulseConfigFile): Promise<void>;
}
