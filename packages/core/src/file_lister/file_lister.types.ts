/**
 * Glob listing knobs. Feature scans use `onlyFiles: false` to pick up empty
 * feature directories, and `maxDepth` to stay out of nested folders.
 */
export type FileListOptions = {
  ignore?: string[];
  /** Default: true */
  onlyFiles?: boolean;
  /** Path segments below the lister root; unlimited when omitted */
  maxDepth?: number;
};

export type ChildEntryType = 'file' | 'directory' | 'all';

export type ChildListOptions = {
  /** Default: 'all' */
  entryType?: ChildEntryType;
};

/**
 * What the tracker and validator need to know about one artifact on disk.
 */
export type FileStats = {
  size: number;
  /** ms since epoch */
  mtime: number;
  isFile: boolean;
};

export type FsFileListerOptions = {
  /** Project root every path and pattern is resolved against */
  cwd: string;
};

/**
 * Seed tree for MemoryFileLister. Keys are project-relative paths; backslashes
 * are normalized. Parents of every seeded path exist implicitly.
 */
export type MemoryFileListerOptions = {
  files?: Map<string, string> | Record<string, string>;
  /** Empty directories, e.g. a feature folder with no artifacts yet */
  directories?: string[];
  /** Fixed stats per path; otherwise derived from the content and Date.now() */
  stats?: Map<string, FileStats>;
};
