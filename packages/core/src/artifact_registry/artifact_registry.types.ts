import type { FileLister } from '../file_lister';

/**
 * Kinds of numbered artifacts in a SpecPulse project.
 */
export type ArtifactKind = 'feature' | 'specification' | 'plan' | 'task-list' | 'service-task';

/**
 * Whether an artifact is stored as a file or a directory.
 */
export type EntryType = 'file' | 'directory';

/**
 * Top-level project directory an artifact kind lives under.
 */
export type ArtifactArea = 'specs' | 'plans' | 'tasks';

export type ArtifactKindDefinition = {
  area: ArtifactArea;
  /** Literal name prefix before the number; service tasks build theirs from the service code */
  prefix: string;
  entryType: EntryType;
  extension: string;
};

/**
 * A numbered artifact identity, e.g. { kind: 'specification', prefix: 'spec-', number: 3, width: 3 }.
 */
export type ArtifactId = {
  kind: ArtifactKind;
  prefix: string;
  number: number;
  width: number;
};

/**
 * One child of a root whose name matched the artifact pattern.
 */
export type ArtifactEntry = {
  number: number;
  name: string;
  /** Project-relative path */
  path: string;
};

export type MalformedArtifactWarning = {
  type: 'MalformedArtifactWarning';
  message: string;
  path: string;
  /** Unknown dependencies of the same file, folded into this warning */
  missing?: string[];
};

export type AmbiguousLatestWarning = {
  type: 'AmbiguousLatestWarning';
  message: string;
  path: string;
  /** All names sharing the highest number */
  candidates: string[];
};

export type DanglingDependencyWarning = {
  type: 'DanglingDependencyWarning';
  message: string;
  path: string;
  /** Referenced task ids that exist nowhere in the feature */
  missing: string[];
};

/**
 * Soft problems reported alongside a best-effort result.
 */
export type ArtifactWarning =
  | MalformedArtifactWarning
  | AmbiguousLatestWarning
  | DanglingDependencyWarning;

/**
 * The highest-numbered artifact under a root.
 */
export type LatestArtifact = ArtifactEntry & {
  warnings: ArtifactWarning[];
};

export type RegistryListOptions = {
  /** Which children count as artifacts. Default: 'file' */
  entryType?: EntryType;
};

/**
 * ArtifactRegistry Dependencies - Facade + Dependency Injection Pattern
 */
export type ArtifactRegistryDependencies = {
  lister: FileLister;
};

/**
 * ArtifactRegistry Interface - read-only view of the numbers in use under a root.
 */
export interface IArtifactRegistry {
  /**
   * Matching children of `root`, sorted by number then name.
   * A missing root yields an empty list.
   */
  listEntries(root: string, prefix: string, width: number, options?: RegistryListOptions): Promise<ArtifactEntry[]>;

  /**
   * Numbers currently in use under `root` for `prefix`.
   */
  listNumbers(root: string, prefix: string, width: number, options?: RegistryListOptions): Promise<Set<number>>;

  /**
   * The highest-numbered artifact, or null when there is none.
   */
  latest(root: string, prefix: string, width: number, options?: RegistryListOptions): Promise<LatestArtifact | null>;
}
