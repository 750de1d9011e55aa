/**
 * Filesystem-dependent implementations
 *
 * This module exports all implementations that require filesystem access.
 * Use @specpulse/core/memory for in-memory alternatives.
 */

// FileLister + FileWriter
export { FsFileLister } from './file_lister/fs';
export type { FsFileListerOptions } from './file_lister/fs';
export { FsFileWriter } from './file_writer/fs';
export type { FsFileWriterOptions } from './file_writer/fs';

// ConfigStore + ConfigManager Factories
export {
  FsConfigStore,
  CONFIG_FILE_NAME,
  // Factory with explicit projectRoot (for DI containers)
  createConfigManager,
} from './config_store/fs';

// ContextStore
export { FsContextStore } from './context_store/fs';

// ProgressHistoryStore
export { FsProgressHistoryStore, HISTORY_FILE_NAME } from './progress_history/fs';

// Local git (spawns the git CLI)
export { createLocalGitModule, createExecCommand } from './git/local';

// Project Discovery (filesystem-based project root detection)
export {
  SPECPULSE_DIR,
  PROJECT_ROOT_ENV,
  findProjectRoot,
  requireProjectRoot,
  getSpecpulsePath,
} from './utils/project_discovery';
