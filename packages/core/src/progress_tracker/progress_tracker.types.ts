import type { ArtifactWarning } from '../artifact_registry';
import type { FileLister } from '../file_lister';
import type { ParseIssue, ProgressSnapshot, TaskRecord } from '../progress_calculator';

/**
 * Progress of one task-list file.
 */
export type TaskFileProgress = {
  name: string;
  /** Project-relative path */
  path: string;
  kind: 'task-list' | 'service-task';
  number: number;
  /** Service code for service-scoped task lists */
  service?: string;
  records: TaskRecord[];
  issues: ParseIssue[];
  snapshot: ProgressSnapshot;
};

/**
 * Progress of every task list under one feature's task directory.
 */
export type FeatureProgress = {
  root: string;
  files: TaskFileProgress[];
  snapshot: ProgressSnapshot;
  /** At most one warning per file */
  warnings: ArtifactWarning[];
};

/**
 * ProgressTracker Dependencies - Facade + Dependency Injection Pattern
 */
export type ProgressTrackerDependencies = {
  lister: FileLister;
};

export interface IProgressTracker {
  /**
   * Parses every task list under `tasksRoot`; malformed files become warnings.
   */
  track(tasksRoot: string): Promise<FeatureProgress>;
}
