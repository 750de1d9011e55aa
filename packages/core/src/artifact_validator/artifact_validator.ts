/**
 * ArtifactValidator - section checks for a feature's documents
 */

import type { FileLister } from '../file_lister';
import type { FeaturePaths } from '../feature_manager';
import { joinPosix } from '../utils/path_guard';
import { createLogger } from '../logger';
import { errorMessage } from '../utils/errno';
import { statusOf, validateDocument } from './document_rules';
import type {
  ArtifactValidatorDependencies,
  DocumentKind,
  DocumentValidationResult,
  FeatureValidationResult,
  IArtifactValidator,
  ValidationFinding,
} from './artifact_validator.types';

const logger = createLogger('[ArtifactValidator] ');

const DOCUMENT_FILES: ReadonlyArray<{ kind: DocumentKind; area: keyof FeaturePaths; pattern: RegExp }> = [
  { kind: 'specification', area: 'specs', pattern: /^spec-\d+\.md$/ },
  { kind: 'plan', area: 'plans', pattern: /^plan-\d+\.md$/ },
  { kind: 'task-list', area: 'tasks', pattern: /^(?:task-\d+|[A-Z]+-T\d+)\.md$/ },
];

export class ArtifactValidator implements IArtifactValidator {
  private readonly lister: FileLister;

  constructor(dependencies: ArtifactValidatorDependencies) {
    this.lister = dependencies.lister;
  }

  async validateFeature(feature: string, paths: FeaturePaths): Promise<FeatureValidationResult> {
    const documents: DocumentValidationResult[] = [];
    const findings: ValidationFinding[] = [];

    for (const { kind, area, pattern } of DOCUMENT_FILES) {
      const root = paths[area];
      const names = (await this.lister.listChildren(root, { entryType: 'file' }))
        .filter(name => pattern.test(name));

      if (names.length === 0 && kind !== 'task-list') {
        findings.push({ severity: 'warning', message: `No ${kind === 'plan' ? 'plans' : 'specifications'} found in ${root}` });
      }

      for (const name of names) {
        documents.push(await this.validateFile(kind, joinPosix(root, name)));
      }
    }

    const status = statusOf([...findings, ...documents.flatMap(document => document.findings)]);
    return { feature, status, documents, findings };
  }

  private async validateFile(kind: DocumentKind, path: string): Promise<DocumentValidationResult> {
    try {
      return validateDocument(kind, path, await this.lister.read(path));
    } catch (error: unknown) {
      const reason = errorMessage(error);
      logger.warn(`Could not read ${path}: ${reason}`);
      return {
        path,
        kind,
        status: 'invalid',
        missingSections: [],
        clarifications: [],
        findings: [{ severity: 'error', message: `Could not be read: ${reason}` }],
      };
    }
  }
}
