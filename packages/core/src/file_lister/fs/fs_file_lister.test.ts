import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FsFileLister } from './fs_file_lister';
import { FileListerError } from '../file_lister.errors';

describe('FsFileLister', () => {
  let tempDir: string;
  let lister: FsFileLister;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-file-lister-test-'));
    lister = new FsFileLister({ cwd: tempDir });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function createFile(relativePath: string, content: string = '') {
    const fullPath = path.join(tempDir, relativePath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, content, 'utf-8');
  }

  describe('list()', () => {
    it('should return files matching glob patterns, sorted', async () => {
      await createFile('specs/001-auth/spec-002.md');
      await createFile('specs/001-auth/spec-001.md');
      await createFile('plans/001-auth/plan-001.md');

      const files = await lister.list(['specs/**/*.md']);
      expect(files).toEqual(['specs/001-auth/spec-001.md', 'specs/001-auth/spec-002.md']);
    });

    it('should exclude files matching ignore patterns', async () => {
      await createFile('tasks/001-auth/task-001.md');
      await createFile('tasks/001-auth/notes.md');

      const files = await lister.list(['tasks/**/*.md'], { ignore: ['**/notes.md'] });
      expect(files).toEqual(['tasks/001-auth/task-001.md']);
    });

    it('should reject patterns with path traversal', async () => {
      await expect(lister.list(['../**/*.md'])).rejects.toThrow(FileListerError);
    });
  });

  describe('listChildren()', () => {
    it('should list immediate children filtered by entry type', async () => {
      await createFile('specs/001-auth/spec-001.md');
      await createFile('specs/README.md');
      await fs.mkdir(path.join(tempDir, 'specs', '002-billing'), { recursive: true });

      expect(await lister.listChildren('specs', { entryType: 'directory' })).toEqual(['001-auth', '002-billing']);
      expect(await lister.listChildren('specs', { entryType: 'file' })).toEqual(['README.md']);
      expect(await lister.listChildren('specs')).toEqual(['001-auth', '002-billing', 'README.md']);
    });

    it('should return an empty array for a missing directory', async () => {
      expect(await lister.listChildren('does-not-exist')).toEqual([]);
    });
  });

  describe('exists()', () => {
    it('should report files and directories', async () => {
      await createFile('specs/001-auth/spec-001.md', '# Spec');

      expect(await lister.exists('specs/001-auth/spec-001.md')).toBe(true);
      expect(await lister.exists('specs/001-auth')).toBe(true);
      expect(await lister.exists('specs/002-missing')).toBe(false);
    });
  });

  describe('read()', () => {
    it('should return file content', async () => {
      await createFile('memory/context.md', '# Context');
      expect(await lister.read('memory/context.md')).toBe('# Context');
    });

    it('should throw FILE_NOT_FOUND for missing files', async () => {
      await expect(lister.read('missing.md')).rejects.toMatchObject({
        code: 'FILE_NOT_FOUND',
        filePath: 'missing.md',
      });
    });

    it('should throw INVALID_PATH for absolute paths', async () => {
      await expect(lister.read(path.join(tempDir, 'x.md'))).rejects.toMatchObject({ code: 'INVALID_PATH' });
    });
  });

  describe('stat()', () => {
    it('should return size and type', async () => {
      await createFile('a.md', 'hello');

      const stats = await lister.stat('a.md');
      expect(stats.size).toBe(5);
      expect(stats.isFile).toBe(true);
      expect(typeof stats.mtime).toBe('number');
    });

    it('should throw FILE_NOT_FOUND for missing files', async () => {
      await expect(lister.stat('missing.md')).rejects.toMatchObject({ code: 'FILE_NOT_FOUND' });
    });
  });
});
