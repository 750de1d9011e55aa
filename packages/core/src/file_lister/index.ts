export type { FileLister } from './file_lister';
export { FileListerError } from './file_lister.errors';
export type { FileListerErrorCode } from './file_lister.errors';
export type {
  ChildEntryType,
  ChildListOptions,
  FileListOptions,
  FileStats,
  FsFileListerOptions,
  MemoryFileListerOptions,
} from './file_lister.types';
