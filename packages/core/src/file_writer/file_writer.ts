/**
 * FileWriter Interface
 *
 * Write side of the project filesystem. The two reserve operations are
 * create-if-absent and atomic: when several writers race for the same path,
 * exactly one gets `true`, and a reserved file is never observed half-written.
 *
 * @module file_writer
 */

/**
 * Interface for creating project files and directories.
 *
 * @example
 * ```typescript
 * import { FsFileWriter } from '@specpulse/core/fs';
 * const writer = new FsFileWriter({ cwd: '/path/to/project' });
 *
 * if (!(await writer.reserveFile('specs/001-auth/spec-001.md', '# Spec'))) {
 *   // someone else took spec-001, try the next number
 * }
 * ```
 */
export interface FileWriter {
  /**
   * Creates the file with the given content unless the path already exists.
   * Missing parent directories are created.
   * @returns true when this call created the file, false when it already existed
   */
  reserveFile(filePath: string, content: string): Promise<boolean>;

  /**
   * Creates the directory unless the path already exists.
   * Missing parent directories are created.
   * @returns true when this call created the directory, false when it already existed
   */
  reserveDirectory(dirPath: string): Promise<boolean>;

  /**
   * Creates the directory and its parents if missing.
   */
  ensureDirectory(dirPath: string): Promise<void>;

  /**
   * Writes (or replaces) a file, creating parent directories.
   */
  writeFile(filePath: string, content: string): Promise<void>;

  /**
   * Deletes a file; a missing file is not an error.
   */
  removeFile(filePath: string): Promise<void>;
}

/**
 * Options for FsFileWriter.
 */
export type FsFileWriterOptions = {
  /** Project root; every path handed to the writer is relative to it */
  cwd: string;
};
