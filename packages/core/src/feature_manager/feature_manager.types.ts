import type {
  ArtifactId,
  ArtifactKind,
  ArtifactWarning,
  IArtifactRegistry,
  LatestArtifact,
} from '../artifact_registry';
import type { AllocatedArtifact, IIdAllocator } from '../id_allocator';
import type { ContextStore } from '../context_store';
import type { FileLister } from '../file_lister';
import type { FileWriter } from '../file_writer';
import type { IGitModule } from '../git';
import type { ITemplateProvider } from '../template_provider';
import type { SpecPulseConfig } from '../config_manager';
import type { TaskStatus } from '../progress_calculator';

/**
 * A feature: one `{NNN}-{slug}` directory under specs/, mirrored under plans/ and tasks/.
 */
export type FeatureDirectory = {
  id: ArtifactId;
  slug: string;
  dirName: string;
  /** ISO-8601 */
  createdAt: string;
  /** Set when a branch was created or checked out for the feature */
  branch?: string;
};

export type FeaturePaths = {
  specs: string;
  plans: string;
  tasks: string;
};

export type FeatureSummary = FeatureDirectory & {
  counts: { specs: number; plans: number; tasks: number };
};

export type InitFeatureOptions = {
  explicitId?: number;
  /** Overrides config.git.createBranches */
  createBranch?: boolean;
};

export type FeatureChange = {
  feature: FeatureDirectory;
  paths: FeaturePaths;
  /** Reservation attempts used; 0 when nothing was allocated */
  attempts: number;
  /** Non-fatal problems, e.g. git failures */
  notices: string[];
};

export type ResolvedFeature = {
  feature: FeatureDirectory;
  source: 'explicit' | 'context' | 'latest';
  warnings: ArtifactWarning[];
};

export type ArtifactFileKind = Exclude<ArtifactKind, 'feature'>;

export type CreateArtifactOptions = {
  /** Feature number, directory name or slug; defaults to the active feature */
  feature?: string;
  explicit?: number;
  /** Upper-case service code, required for service-task */
  service?: string;
  title?: string;
};

export type CreatedArtifact = {
  kind: ArtifactFileKind;
  feature: FeatureDirectory;
  artifact: AllocatedArtifact;
  template: 'project' | 'builtin';
  warnings: ArtifactWarning[];
};

export type CurrentArtifact = {
  kind: ArtifactFileKind;
  feature: FeatureDirectory;
  artifact: LatestArtifact | null;
  warnings: ArtifactWarning[];
};

export type UpdateTaskStatusOptions = {
  /** Feature number, directory name or slug; defaults to the active feature */
  feature?: string;
};

export type TaskStatusChange = {
  feature: FeatureDirectory;
  taskId: string;
  /** Task list that holds the task */
  path: string;
  line: number;
  previous: TaskStatus;
  status: TaskStatus;
  /** False when the task already had this status and nothing was written */
  changed: boolean;
  warnings: ArtifactWarning[];
};

/**
 * FeatureManager Dependencies - Facade + Dependency Injection Pattern
 */
export type FeatureManagerDependencies = {
  config: SpecPulseConfig;
  lister: FileLister;
  writer: FileWriter;
  registry: IArtifactRegistry;
  allocator: IIdAllocator;
  context: ContextStore;
  templates: ITemplateProvider;
  /** Omit to disable branch handling entirely */
  git?: IGitModule;
  now?: () => Date;
};

export interface IFeatureManager {
  initFeature(name: string, options?: InitFeatureOptions): Promise<FeatureChange>;
  continueFeature(identifier: string): Promise<FeatureChange>;
  listFeatures(): Promise<FeatureSummary[]>;
  resolveFeature(identifier?: string): Promise<ResolvedFeature>;
  createArtifact(kind: ArtifactFileKind, options?: CreateArtifactOptions): Promise<CreatedArtifact>;
  currentArtifact(kind: ArtifactFileKind, options?: { feature?: string; service?: string }): Promise<CurrentArtifact>;
  updateTaskStatus(taskId: string, status: TaskStatus, options?: UpdateTaskStatusOptions): Promise<TaskStatusChange>;
  pathsFor(feature: FeatureDirectory): FeaturePaths;
}
