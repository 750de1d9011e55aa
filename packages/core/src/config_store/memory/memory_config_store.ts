/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from '../config_store';
import type { SpecPulseConfigFile } from '../../config_manager';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ numbering: { width: 4 } });
 * const manager = new ConfigManager(configStore);
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  readonly location = 'memory:config.json';
  private config: unknown = null;

  async loadConfig(): Promise<unknown> {
    return this.config;
  }

  async saveConfig(config: SpecPulseConfigFile): Promise<void> {
    this.config = structuredClone(config);
  }

  /**
   * Set a raw document directly. Accepts anything so tests can store invalid input.
   */
  setConfig(config: unknown): void {
    this.config = config;
  }

  /**
   * Clear stored configuration.
   */
  clear(): void {
    this.config = null;
  }
}
