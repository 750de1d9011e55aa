/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for tests and for embedding the core without touching disk.
 */

// FileLister + FileWriter
export { MemoryFileLister } from './file_lister/memory';
export type { MemoryFileListerOptions } from './file_lister/memory';
export { MemoryFileWriter } from './file_writer/memory';

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';

// ContextStore
export { MemoryContextStore } from './context_store/memory';

// ProgressHistoryStore
export { MemoryProgressHistoryStore } from './progress_history/memory';

// GitModule
export { MemoryGitModule } from './git/memory';
export type { MemoryGitModuleOptions } from './git/memory';
