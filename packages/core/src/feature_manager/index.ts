// Types
export type {
  ArtifactFileKind,
  CreateArtifactOptions,
  CreatedArtifact,
  CurrentArtifact,
  FeatureChange,
  FeatureDirectory,
  FeatureManagerDependencies,
  FeaturePaths,
  FeatureSummary,
  IFeatureManager,
  InitFeatureOptions,
  ResolvedFeature,
  TaskStatusChange,
  UpdateTaskStatusOptions,
} from './feature_manager.types';

// Implementation
export { FeatureManager } from './feature_manager';
