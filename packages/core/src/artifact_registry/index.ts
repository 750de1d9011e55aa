// Types
export type {
  ArtifactKind,
  ArtifactArea,
  ArtifactKindDefinition,
  ArtifactId,
  ArtifactEntry,
  ArtifactWarning,
  MalformedArtifactWarning,
  AmbiguousLatestWarning,
  DanglingDependencyWarning,
  EntryType,
  LatestArtifact,
  RegistryListOptions,
  ArtifactRegistryDependencies,
  IArtifactRegistry,
} from './artifact_registry.types';

// Implementation
export { ArtifactRegistry, ARTIFACT_KINDS, prefixForKind, artifactNamePattern } from './artifact_registry';
