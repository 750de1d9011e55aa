import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FsFileWriter } from './fs_file_writer';
import { FileWriterError } from '../file_writer.errors';

describe('FsFileWriter', () => {
  let tempDir: string;
  let writer: FsFileWriter;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-file-writer-test-'));
    writer = new FsFileWriter({ cwd: tempDir });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('reserveFile()', () => {
    it('should create the file and its parents', async () => {
      const created = await writer.reserveFile('specs/001-auth/spec-001.md', '# Spec');

      expect(created).toBe(true);
      expect(await fs.readFile(path.join(tempDir, 'specs/001-auth/spec-001.md'), 'utf-8')).toBe('# Spec');
    });

    it('should return false and keep the original content when the file exists', async () => {
      await writer.reserveFile('spec-001.md', 'first');

      expect(await writer.reserveFile('spec-001.md', 'second')).toBe(false);
      expect(await fs.readFile(path.join(tempDir, 'spec-001.md'), 'utf-8')).toBe('first');
    });

    it('should leave no temp files behind', async () => {
      await writer.reserveFile('plans/plan-001.md', 'x');
      await writer.reserveFile('plans/plan-001.md', 'y');

      expect(await fs.readdir(path.join(tempDir, 'plans'))).toEqual(['plan-001.md']);
    });

    it('should let exactly one of several racing callers win', async () => {
      const results = await Promise.all(
        Array.from({ length: 8 }, (_, i) => writer.reserveFile('tasks/task-001.md', `writer ${i}`))
      );

      expect(results.filter(Boolean)).toHaveLength(1);
      const winner = results.indexOf(true);
      expect(await fs.readFile(path.join(tempDir, 'tasks/task-001.md'), 'utf-8')).toBe(`writer ${winner}`);
    });

    it('should reject paths that escape the project root', async () => {
      await expect(writer.reserveFile('../outside.md', 'x')).rejects.toBeInstanceOf(FileWriterError);
      await expect(writer.reserveFile('../outside.md', 'x')).rejects.toMatchObject({ code: 'INVALID_PATH' });
    });
  });

  describe('reserveDirectory()', () => {
    it('should create the directory once', async () => {
      expect(await writer.reserveDirectory('specs/001-auth')).toBe(true);
      expect(await writer.reserveDirectory('specs/001-auth')).toBe(false);

      const stats = await fs.stat(path.join(tempDir, 'specs/001-auth'));
      expect(stats.isDirectory()).toBe(true);
    });

    it('should return false when a file occupies the path', async () => {
      await writer.writeFile('specs/001-auth', 'not a dir');
      expect(await writer.reserveDirectory('specs/001-auth')).toBe(false);
    });
  });

  describe('ensureDirectory() / writeFile()', () => {
    it('should be idempotent and overwrite files', async () => {
      await writer.ensureDirectory('memory');
      await writer.ensureDirectory('memory');
      await writer.writeFile('memory/context.md', 'one');
      await writer.writeFile('memory/context.md', 'two');

      expect(await fs.readFile(path.join(tempDir, 'memory/context.md'), 'utf-8')).toBe('two');
      expect(await fs.readdir(path.join(tempDir, 'memory'))).toEqual(['context.md']);
    });
  });

  describe('removeFile()', () => {
    it('should delete files and ignore missing ones', async () => {
      await writer.writeFile('specs/.spec-001.claim', '');
      await writer.removeFile('specs/.spec-001.claim');
      await writer.removeFile('specs/.spec-001.claim');

      expect(await fs.readdir(path.join(tempDir, 'specs'))).toEqual([]);
    });
  });
});
