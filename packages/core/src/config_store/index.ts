/**
 * ConfigStore - Configuration persistence abstraction
 *
 * This module only exports the interface. For implementations, use:
 * - @specpulse/core/fs for FsConfigStore and createConfigManager
 * - @specpulse/core/memory for MemoryConfigStore
 */

export type { ConfigStore } from './config_store';
