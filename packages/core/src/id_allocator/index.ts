// Types
export type {
  AllocationRequest,
  ArtifactContent,
  AllocatedArtifact,
  IdAllocatorDependencies,
  IIdAllocator,
} from './id_allocator.types';

// Errors
export { InvalidNameError, InvalidNumberError, CollisionError, ContentionError } from './id_allocator.errors';

// Implementation
export { IdAllocator, DEFAULT_MAX_ATTEMPTS } from './id_allocator';
