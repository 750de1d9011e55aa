/**
 * MemoryFileWriter - In-memory FileWriter
 *
 * Writes into a MemoryFileLister so reads observe every write. Each reserve
 * checks and inserts without yielding, which makes it atomic on the event loop.
 *
 * @module file_writer/memory/memory_file_writer
 */

import type { FileWriter } from '../file_writer';
import { FileWriterError } from '../file_writer.errors';
import type { MemoryFileLister } from '../../file_lister/memory/memory_file_lister';
import { unsafePathReason } from '../../utils/path_guard';

export class MemoryFileWriter implements FileWriter {
  constructor(private readonly lister: MemoryFileLister) {}

  async reserveFile(filePath: string, content: string): Promise<boolean> {
    this.validatePath(filePath);
    if (this.lister.hasEntry(filePath)) {
      return false;
    }
    this.lister.addFile(filePath, content);
    return true;
  }

  async reserveDirectory(dirPath: string): Promise<boolean> {
    this.validatePath(dirPath);
    if (this.lister.hasEntry(dirPath)) {
      return false;
    }
    this.lister.addDirectory(dirPath);
    return true;
  }

  async ensureDirectory(dirPath: string): Promise<void> {
    this.validatePath(dirPath);
    this.lister.addDirectory(dirPath);
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    this.validatePath(filePath);
    this.lister.addFile(filePath, content);
  }

  async removeFile(filePath: string): Promise<void> {
    this.validatePath(filePath);
    this.lister.removeFile(filePath);
  }

  private validatePath(filePath: string): void {
    const reason = unsafePathReason(filePath);
    if (reason) {
      throw FileWriterError.unsafePath(filePath, reason);
    }
  }
}
