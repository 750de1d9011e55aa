import type { FileLister } from '../file_lister';
import type { FeaturePaths } from '../feature_manager';

export type DocumentKind = 'specification' | 'plan' | 'task-list';

export type ValidationStatus = 'valid' | 'warning' | 'invalid';

export type ValidationFinding = {
  severity: 'error' | 'warning';
  message: string;
  /** 1-based line, when the finding points at one */
  line?: number;
};

export type Clarification = {
  line: number;
  text: string;
};

export type DocumentValidationResult = {
  /** Project-relative path */
  path: string;
  kind: DocumentKind;
  status: ValidationStatus;
  /** Required headings that are absent, e.g. '## User Stories' */
  missingSections: string[];
  clarifications: Clarification[];
  findings: ValidationFinding[];
};

export type FeatureValidationResult = {
  feature: string;
  status: ValidationStatus;
  documents: DocumentValidationResult[];
  /** Problems with the feature as a whole, e.g. no specification yet */
  findings: ValidationFinding[];
};

/**
 * ArtifactValidator Dependencies - Facade + Dependency Injection Pattern
 */
export type ArtifactValidatorDependencies = {
  lister: FileLister;
};

export interface IArtifactValidator {
  /**
   * Validates every specification, plan and task list of a feature.
   * Content problems become findings; nothing is thrown for them.
   */
  validateFeature(feature: string, paths: FeaturePaths): Promise<FeatureValidationResult>;
}
