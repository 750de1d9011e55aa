/**
 * FsFileWriter - Filesystem-based FileWriter implementation
 *
 * Files are reserved by writing a hidden temp file next to the target and
 * hard-linking it into place; link(2) fails with EEXIST when the target exists,
 * so the winner's file appears complete or not at all. Directories are reserved
 * with a non-recursive mkdir.
 *
 * @module file_writer/fs/fs_file_writer
 */

import { randomBytes } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { FileWriter, FsFileWriterOptions } from '../file_writer';
import { FileWriterError } from '../file_writer.errors';
import { unsafePathReason } from '../../utils/path_guard';
import { errnoCode } from '../../utils/errno';

export class FsFileWriter implements FileWriter {
  private readonly cwd: string;

  constructor(options: FsFileWriterOptions) {
    this.cwd = options.cwd;
  }

  async reserveFile(filePath: string, content: string): Promise<boolean> {
    const target = this.resolve(filePath);
    await this.mkdirp(path.dirname(target), filePath);

    const tempPath = this.tempPathFor(target);
    try {
      await fs.writeFile(tempPath, content, { encoding: 'utf-8', flag: 'wx' });
      await fs.link(tempPath, target);
      return true;
    } catch (err: unknown) {
      if (errnoCode(err) === 'EEXIST') {
        return false;
      }
      throw this.wrap(err, filePath);
    } finally {
      await fs.rm(tempPath, { force: true });
    }
  }

  async reserveDirectory(dirPath: string): Promise<boolean> {
    const target = this.resolve(dirPath);
    await this.mkdirp(path.dirname(target), dirPath);

    try {
      await fs.mkdir(target);
      return true;
    } catch (err: unknown) {
      if (errnoCode(err) === 'EEXIST') {
        return false;
      }
      throw this.wrap(err, dirPath);
    }
  }

  async ensureDirectory(dirPath: string): Promise<void> {
    await this.mkdirp(this.resolve(dirPath), dirPath);
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    const target = this.resolve(filePath);
    await this.mkdirp(path.dirname(target), filePath);

    const tempPath = this.tempPathFor(target);
    try {
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, target);
    } catch (err: unknown) {
      await fs.rm(tempPath, { force: true });
      throw this.wrap(err, filePath);
    }
  }

  async removeFile(filePath: string): Promise<void> {
    const target = this.resolve(filePath);
    try {
      await fs.rm(target, { force: true });
    } catch (err: unknown) {
      throw this.wrap(err, filePath);
    }
  }

  private resolve(filePath: string): string {
    const reason = unsafePathReason(filePath);
    if (reason) {
      throw FileWriterError.unsafePath(filePath, reason);
    }
    return path.join(this.cwd, filePath);
  }

  private async mkdirp(absoluteDir: string, filePath: string): Promise<void> {
    try {
      await fs.mkdir(absoluteDir, { recursive: true });
    } catch (err: unknown) {
      throw this.wrap(err, filePath);
    }
  }

  private tempPathFor(target: string): string {
    const suffix = `${process.pid}.${randomBytes(6).toString('hex')}`;
    return path.join(path.dirname(target), `.${path.basename(target)}.${suffix}.tmp`);
  }

  private wrap(err: unknown, filePath: string): FileWriterError {
    return FileWriterError.fromSystemError(err, filePath);
  }
}
