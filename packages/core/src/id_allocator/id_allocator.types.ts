import type { ArtifactId, ArtifactKind, EntryType, IArtifactRegistry } from '../artifact_registry';
import type { FileWriter } from '../file_writer';

/**
 * Initial content of a reserved file, or a function rendering it for the
 * name being attempted (e.g. a template that embeds the artifact id).
 */
export type ArtifactContent = string | ((artifact: { name: string; number: number }) => string);

/**
 * What to allocate and where.
 */
export type AllocationRequest = {
  kind: ArtifactKind;
  /** Project-relative directory the artifact is created in */
  root: string;
  /** Literal name prefix ('spec-', 'AUTH-T', '' for features) */
  prefix: string;
  /** Zero-padding width. Default: 3 */
  width?: number;
  /** Caller-chosen number; never silently replaced */
  explicit?: number;
  /** Appended as '-{slug}' after the number (feature directories) */
  slug?: string;
  /** Appended after number and slug ('.md') */
  extension?: string;
  /** Default: 'file' */
  entryType?: EntryType;
  /** Content a reserved file is created with */
  content?: ArtifactContent;
  /** Further roots whose numbers also count as taken */
  siblingRoots?: string[];
};

/**
 * A reserved artifact; the entry exists on disk when this is returned.
 */
export type AllocatedArtifact = {
  id: ArtifactId;
  name: string;
  /** Project-relative path */
  path: string;
  /** Reservation attempts used (1 when uncontended) */
  attempts: number;
};

/**
 * IdAllocator Dependencies - Facade + Dependency Injection Pattern
 */
export type IdAllocatorDependencies = {
  registry: IArtifactRegistry;
  writer: FileWriter;
  /** Reservation attempts before ContentionError. Default: 5 */
  maxAttempts?: number;
};

/**
 * IdAllocator Interface - hands out unused artifact numbers safely under concurrency.
 */
export interface IIdAllocator {
  allocate(request: AllocationRequest): Promise<AllocatedArtifact>;
}
