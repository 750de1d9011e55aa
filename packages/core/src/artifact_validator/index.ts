export type {
  ArtifactValidatorDependencies,
  Clarification,
  DocumentKind,
  DocumentValidationResult,
  FeatureValidationResult,
  IArtifactValidator,
  ValidationFinding,
  ValidationStatus,
} from './artifact_validator.types';
export { ArtifactValidator } from './artifact_validator';
export { CLARIFICATION_MARKER, REQUIRED_SECTIONS, validateDocument } from './document_rules';
