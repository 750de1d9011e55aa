import type { TemplateKind } from './template_provider.types';

const SPEC_TEMPLATE = `# Specification {{ARTIFACT_ID}}: {{TITLE}}

<!-- FEATURE_ID: {{FEATURE_ID}} -->
<!-- FEATURE_NAME: {{FEATURE_NAME}} -->
<!-- CREATED: {{DATE}} -->

## Description

[NEEDS CLARIFICATION] What problem does {{FEATURE_NAME}} solve, and for whom?

## Requirements

### Functional Requirements

- FR-001: [NEEDS CLARIFICATION] First requirement

### Non-Functional Requirements

- **Performance**: [NEEDS CLARIFICATION]
- **Security**: [NEEDS CLARIFICATION]

## User Stories

- As a [role], I want [capability] so that [benefit].

## Acceptance Criteria

- Given [precondition], when [action], then [expected outcome].
`;

const PLAN_TEMPLATE = `# Implementation Plan {{ARTIFACT_ID}}: {{TITLE}}

<!-- FEATURE_ID: {{FEATURE_ID}} -->
<!-- FEATURE_NAME: {{FEATURE_NAME}} -->
<!-- CREATED: {{DATE}} -->

## Architecture

[NEEDS CLARIFICATION] High-level design for {{FEATURE_NAME}}.

## Technology Stack

- **Runtime**: [NEEDS CLARIFICATION]
- **Storage**: [NEEDS CLARIFICATION]

## Implementation Phases

### Phase 1: Foundation

- Set up the module structure.

### Phase 2: Core Features

- Implement the functional requirements.

### Phase 3: Hardening

- Tests, documentation and rollout.
`;

const TASK_TEMPLATE = `# Task List {{ARTIFACT_ID}}: {{TITLE}}

<!-- FEATURE_ID: {{FEATURE_ID}} -->
<!-- FEATURE_NAME: {{FEATURE_NAME}} -->
<!-- SERVICE: {{SERVICE}} -->
<!-- CREATED: {{DATE}} -->

Status markers: \`[ ]\` pending, \`[>]\` in progress, \`[!]\` blocked, \`[x]\` done.

## Tasks

- [ ] T001: {{TITLE}}
- [ ] T002: Write tests for {{FEATURE_NAME}} (depends on: T001)
`;

export const DEFAULT_TEMPLATES: Readonly<Record<TemplateKind, string>> = {
  spec: SPEC_TEMPLATE,
  plan: PLAN_TEMPLATE,
  task: TASK_TEMPLATE,
};
