/**
 * FileLister Interface
 *
 * Read side of the project filesystem. The artifact registry, progress tracker
 * and validator only ever see this interface, so they run unchanged against
 * a real project (FsFileLister) or an in-memory one (MemoryFileLister).
 *
 * @module file_lister
 */

import type { ChildListOptions, FileListOptions, FileStats } from './file_lister.types';

/**
 * Interface for listing and reading project files.
 *
 * @example
 * ```typescript
 * // Filesystem backend (CLI)
 * import { FsFileLister } from '@specpulse/core/fs';
 * const lister = new FsFileLister({ cwd: '/path/to/project' });
 *
 * // Memory backend (tests)
 * import { MemoryFileLister } from '@specpulse/core/memory';
 * const lister = new MemoryFileLister({ files: { 'specs/001-auth/spec-001.md': '# Spec' } });
 *
 * const names = await lister.listChildren('specs/001-auth', { entryType: 'file' });
 * ```
 */
export interface FileLister {
  /**
   * Lists files matching glob patterns, relative to the project root.
   */
  list(patterns: string[], options?: FileListOptions): Promise<string[]>;

  /**
   * Lists the names of the immediate children of a directory, sorted.
   * A missing or unreadable directory yields an empty array.
   */
  listChildren(dirPath: string, options?: ChildListOptions): Promise<string[]>;

  /**
   * Checks if a file or directory exists.
   */
  exists(filePath: string): Promise<boolean>;

  /**
   * Reads file content as UTF-8.
   * @throws FileListerError if the file doesn't exist or can't be read
   */
  read(filePath: string): Promise<string>;

  /**
   * Gets file statistics.
   * @throws FileListerError if the file doesn't exist
   */
  stat(filePath: string): Promise<FileStats>;
}
