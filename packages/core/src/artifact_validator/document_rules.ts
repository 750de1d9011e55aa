import { parse } from '../progress_calculator';
import type {
  Clarification,
  DocumentKind,
  DocumentValidationResult,
  ValidationFinding,
  ValidationStatus,
} from './artifact_validator.types';

export const REQUIRED_SECTIONS: Readonly<Record<DocumentKind, readonly string[]>> = {
  'specification': ['Requirements', 'User Stories', 'Acceptance Criteria'],
  'plan': ['Architecture', 'Technology Stack', 'Implementation Phases'],
  'task-list': ['Tasks'],
};

export const CLARIFICATION_MARKER = '[NEEDS CLARIFICATION]';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function hasSection(content: string, section: string): boolean {
  return new RegExp(`^##\\s+${escapeRegExp(section)}\\b`, 'im').test(content);
}

function findClarifications(content: string): Clarification[] {
  const clarifications: Clarification[] = [];
  content.split(/\r?\n/).forEach((text, index) => {
    if (text.includes(CLARIFICATION_MARKER)) {
      clarifications.push({ line: index + 1, text: text.trim() });
    }
  });
  return clarifications;
}

export function statusOf(findings: readonly ValidationFinding[]): ValidationStatus {
  if (findings.some(finding => finding.severity === 'error')) return 'invalid';
  if (findings.length > 0) return 'warning';
  return 'valid';
}

/**
 * Checks one document: required `##` headings, unresolved clarification
 * markers and, for task lists, that the parser finds at least one task.
 */
export function validateDocument(kind: DocumentKind, path: string, content: string): DocumentValidationResult {
  const findings: ValidationFinding[] = [];

  const missingSections = REQUIRED_SECTIONS[kind]
    .filter(section => !hasSection(content, section))
    .map(section => `## ${section}`);
  if (missingSections.length > 0) {
    findings.push({ severity: 'error', message: `Missing sections: ${missingSections.join(', ')}` });
  }

  if (kind === 'task-list') {
    const { records, issues } = parse(content);
    if (records.length === 0) {
      findings.push({ severity: 'error', message: 'No task entries found' });
    }
    for (const issue of issues) {
      findings.push({ severity: 'warning', message: issue.message, line: issue.line });
    }
  }

  const clarifications = findClarifications(content);
  if (clarifications.length > 0) {
    findings.push({
      severity: 'warning',
      message: `${clarifications.length} item(s) need clarification`,
      line: clarifications[0]?.line,
    });
  }

  return { path, kind, status: statusOf(findings), missingSections, clarifications, findings };
}
