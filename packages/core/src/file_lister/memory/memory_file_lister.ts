/**
 * MemoryFileLister - In-memory FileLister
 *
 * Simulates a project tree with a Map of files plus a set of directories.
 * Parent directories of every file exist implicitly.
 *
 * @module file_lister/memory/memory_file_lister
 */

import picomatch from 'picomatch';
import type { FileLister } from '../file_lister';
import type { ChildListOptions, FileListOptions, FileStats, MemoryFileListerOptions } from '../file_lister.types';
import { FileListerError } from '../file_lister.errors';
import { toPosixPath } from '../../utils/path_guard';

function matchPatterns(patterns: string[], filePaths: string[]): string[] {
  const isMatch = picomatch(patterns, { dot: true });
  return filePaths.filter(filePath => isMatch(filePath));
}

function filterIgnored(filePaths: string[], ignorePatterns: string[]): string[] {
  if (!ignorePatterns.length) return filePaths;
  const isIgnored = picomatch(ignorePatterns, { dot: true });
  return filePaths.filter(filePath => !isIgnored(filePath));
}

function parentDirectories(filePath: string): string[] {
  const parts = filePath.split('/');
  const parents: string[] = [];
  for (let i = 1; i < parts.length; i++) {
    parents.push(parts.slice(0, i).join('/'));
  }
  return parents;
}

/**
 * In-memory FileLister.
 *
 * @example
 * ```typescript
 * const lister = new MemoryFileLister({
 *   files: { 'tasks/001-auth/task-001.md': '- [x] T001: Schema' },
 *   directories: ['specs/002-empty'],
 * });
 *
 * await lister.listChildren('specs', { entryType: 'directory' }); // ['002-empty']
 * ```
 */
export class MemoryFileLister implements FileLister {
  private readonly files: Map<string, string>;
  private readonly directories: Set<string>;
  private readonly stats: Map<string, FileStats>;

  constructor(options: MemoryFileListerOptions = {}) {
    const entries = options.files instanceof Map
      ? Array.from(options.files.entries())
      : Object.entries(options.files ?? {});
    this.files = new Map(entries.map(([filePath, content]) => [toPosixPath(filePath), content]));
    this.directories = new Set((options.directories ?? []).map(toPosixPath));
    this.stats = options.stats ?? new Map();
  }

  async list(patterns: string[], options?: FileListOptions): Promise<string[]> {
    const candidates = options?.onlyFiles === false
      ? [...this.files.keys(), ...this.allDirectories()]
      : Array.from(this.files.keys());

    let matched = matchPatterns(patterns, candidates);
    if (options?.ignore?.length) {
      matched = filterIgnored(matched, options.ignore);
    }
    if (options?.maxDepth !== undefined) {
      const maxDepth = options.maxDepth;
      matched = matched.filter(filePath => filePath.split('/').length <= maxDepth);
    }
    return matched.sort();
  }

  async listChildren(dirPath: string, options?: ChildListOptions): Promise<string[]> {
    const dir = toPosixPath(dirPath);
    const entryType = options?.entryType ?? 'all';
    const names = new Set<string>();

    if (entryType !== 'directory') {
      for (const filePath of this.files.keys()) {
        const name = this.childName(dir, filePath);
        if (name !== null && !name.includes('/')) names.add(name);
      }
    }
    if (entryType !== 'file') {
      for (const directory of this.allDirectories()) {
        const name = this.childName(dir, directory);
        if (name !== null && !name.includes('/')) names.add(name);
      }
    }

    return Array.from(names).sort();
  }

  async exists(filePath: string): Promise<boolean> {
    return this.hasEntry(filePath);
  }

  async read(filePath: string): Promise<string> {
    const content = this.files.get(toPosixPath(filePath));
    if (content === undefined) {
      throw FileListerError.notFound(filePath);
    }
    return content;
  }

  async stat(filePath: string): Promise<FileStats> {
    const normalized = toPosixPath(filePath);
    const explicitStats = this.stats.get(normalized);
    if (explicitStats) {
      return explicitStats;
    }

    const content = this.files.get(normalized);
    if (content !== undefined) {
      return { size: content.length, mtime: Date.now(), isFile: true };
    }
    if (this.allDirectories().has(normalized)) {
      return { size: 0, mtime: Date.now(), isFile: false };
    }
    throw FileListerError.notFound(filePath);
  }

  // ============================================
  // Testing utilities
  // ============================================

  /**
   * Synchronous existence check, so writers can test-and-set without yielding.
   */
  hasEntry(filePath: string): boolean {
    const normalized = toPosixPath(filePath);
    return this.files.has(normalized) || this.allDirectories().has(normalized);
  }

  addFile(filePath: string, content: string): void {
    this.files.set(toPosixPath(filePath), content);
  }

  addDirectory(dirPath: string): void {
    this.directories.add(toPosixPath(dirPath));
  }

  removeFile(filePath: string): boolean {
    const normalized = toPosixPath(filePath);
    this.stats.delete(normalized);
    return this.files.delete(normalized);
  }

  /**
   * Returns all file paths, sorted.
   */
  listPaths(): string[] {
    return Array.from(this.files.keys()).sort();
  }

  private allDirectories(): Set<string> {
    const all = new Set<string>();
    for (const directory of this.directories) {
      all.add(directory);
      for (const parent of parentDirectories(directory)) all.add(parent);
    }
    for (const filePath of this.files.keys()) {
      for (const parent of parentDirectories(filePath)) all.add(parent);
    }
    return all;
  }

  private childName(dir: string, entryPath: string): string | null {
    if (dir === '') return entryPath;
    const prefix = `${dir}/`;
    return entryPath.startsWith(prefix) ? entryPath.slice(prefix.length) : null;
  }
}
