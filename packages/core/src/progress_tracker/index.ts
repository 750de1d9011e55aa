export type {
  TaskFileProgress,
  FeatureProgress,
  ProgressTrackerDependencies,
  IProgressTracker,
} from './progress_tracker.types';

export type { TaskFileRef } from './progress_tracker';
export { ProgressTracker, classifyTaskFile } from './progress_tracker';
