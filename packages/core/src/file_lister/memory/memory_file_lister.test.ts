import { MemoryFileLister } from './memory_file_lister';
import { FileListerError } from '../file_lister.errors';

describe('MemoryFileLister', () => {
  it('should accept files as Map or Record', async () => {
    const fromMap = new MemoryFileLister({ files: new Map([['a.md', 'A']]) });
    const fromRecord = new MemoryFileLister({ files: { 'a.md': 'A' } });

    expect(await fromMap.read('a.md')).toBe('A');
    expect(await fromRecord.read('a.md')).toBe('A');
  });

  describe('list()', () => {
    it('should filter with glob patterns and ignore patterns', async () => {
      const lister = new MemoryFileLister({
        files: {
          'tasks/001-auth/task-001.md': '',
          'tasks/001-auth/AUTH-T001.md': '',
          'specs/001-auth/spec-001.md': '',
        },
      });

      expect(await lister.list(['tasks/**/*.md'], { ignore: ['**/AUTH-*'] })).toEqual([
        'tasks/001-auth/task-001.md',
      ]);
    });
  });

  describe('listChildren()', () => {
    const lister = new MemoryFileLister({
      files: {
        'specs/001-auth/spec-001.md': '',
        'specs/README.md': '',
      },
      directories: ['specs/002-empty', 'plans/001-auth'],
    });

    it('should list implicit and explicit directories', async () => {
      expect(await lister.listChildren('specs', { entryType: 'directory' })).toEqual(['001-auth', '002-empty']);
    });

    it('should list only direct files', async () => {
      expect(await lister.listChildren('specs', { entryType: 'file' })).toEqual(['README.md']);
    });

    it('should list top-level entries for the root', async () => {
      expect(await lister.listChildren('')).toEqual(['plans', 'specs']);
    });

    it('should return an empty array for a missing directory', async () => {
      expect(await lister.listChildren('tasks')).toEqual([]);
    });
  });

  describe('exists() / read() / stat()', () => {
    it('should treat parent directories of files as existing', async () => {
      const lister = new MemoryFileLister({ files: { 'specs/001-auth/spec-001.md': '# S' } });

      expect(await lister.exists('specs/001-auth')).toBe(true);
      expect(await lister.exists('specs/001-auth/')).toBe(true);
      expect(await lister.exists('specs/002')).toBe(false);
      expect(await lister.stat('specs/001-auth')).toMatchObject({ isFile: false });
    });

    it('should throw FILE_NOT_FOUND for missing files', async () => {
      const lister = new MemoryFileLister();

      await expect(lister.read('x.md')).rejects.toBeInstanceOf(FileListerError);
      await expect(lister.stat('x.md')).rejects.toMatchObject({ code: 'FILE_NOT_FOUND' });
    });

    it('should generate stats from content', async () => {
      const lister = new MemoryFileLister({ files: { 'a.md': 'abc' } });
      expect(await lister.stat('a.md')).toMatchObject({ size: 3, isFile: true });
    });
  });

  describe('testing utilities', () => {
    it('should add and remove files', async () => {
      const lister = new MemoryFileLister();
      lister.addFile('b.md', 'B');
      lister.addFile('a.md', 'A');
      lister.addDirectory('empty');

      expect(lister.listPaths()).toEqual(['a.md', 'b.md']);
      expect(await lister.exists('empty')).toBe(true);
      expect(lister.removeFile('a.md')).toBe(true);
      expect(await lister.exists('a.md')).toBe(false);
    });
  });
});
