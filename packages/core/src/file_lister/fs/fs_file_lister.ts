/**
 * FsFileLister - Filesystem-based FileLister implementation
 *
 * Uses fast-glob for pattern matching and fs/promises for file operations.
 * Used by the CLI.
 *
 * @module file_lister/fs/fs_file_lister
 */

import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { FileLister } from '../file_lister';
import type { ChildListOptions, FileListOptions, FileStats, FsFileListerOptions } from '../file_lister.types';
import { FileListerError } from '../file_lister.errors';
import { unsafePathReason } from '../../utils/path_guard';

/**
 * Filesystem-based FileLister implementation.
 *
 * @example
 * ```typescript
 * const lister = new FsFileLister({ cwd: '/path/to/project' });
 * const specs = await lister.list(['specs/*\/spec-*.md']);
 * const features = await lister.listChildren('specs', { entryType: 'directory' });
 * ```
 */
export class FsFileLister implements FileLister {
  private readonly cwd: string;

  constructor(options: FsFileListerOptions) {
    this.cwd = options.cwd;
  }

  async list(patterns: string[], options?: FileListOptions): Promise<string[]> {
    for (const pattern of patterns) {
      this.validatePath(pattern, 'pattern');
    }

    const fgOptions: Parameters<typeof fg>[1] = {
      cwd: this.cwd,
      ignore: options?.ignore ?? [],
      onlyFiles: options?.onlyFiles ?? true,
      dot: true,
    };

    if (options?.maxDepth !== undefined) {
      fgOptions.deep = options.maxDepth;
    }

    const files = await fg(patterns, fgOptions);
    return files.sort();
  }

  async listChildren(dirPath: string, options?: ChildListOptions): Promise<string[]> {
    this.validatePath(dirPath, 'path');

    const entryType = options?.entryType ?? 'all';
    const names = await fg('*', {
      cwd: path.join(this.cwd, dirPath),
      deep: 1,
      dot: true,
      suppressErrors: true,
      onlyFiles: entryType === 'file',
      onlyDirectories: entryType === 'directory',
    });
    return names.sort();
  }

  async exists(filePath: string): Promise<boolean> {
    this.validatePath(filePath, 'path');

    try {
      await fs.access(path.join(this.cwd, filePath));
      return true;
    } catch {
      return false;
    }
  }

  async read(filePath: string): Promise<string> {
    this.validatePath(filePath, 'path');

    try {
      return await fs.readFile(path.join(this.cwd, filePath), 'utf-8');
    } catch (err: unknown) {
      throw FileListerError.fromSystemError(err, filePath, 'Read');
    }
  }

  async stat(filePath: string): Promise<FileStats> {
    this.validatePath(filePath, 'path');

    try {
      const stats = await fs.stat(path.join(this.cwd, filePath));
      return {
        size: stats.size,
        mtime: stats.mtimeMs,
        isFile: stats.isFile(),
      };
    } catch (err: unknown) {
      throw FileListerError.fromSystemError(err, filePath, 'Stat');
    }
  }

  private validatePath(filePath: string, label: 'path' | 'pattern'): void {
    const reason = unsafePathReason(filePath);
    if (reason) {
      throw FileListerError.unsafePath(filePath, reason, label);
    }
  }
}
