import { createMemoryServices } from '../../testing/memory-services';
import type { MemoryServices } from '../../testing/memory-services';

let mockServices: MemoryServices;

jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: () => mockServices
  }
}));

import { ValidateCommand } from './validate-command';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

const SPEC = '# Spec\n\n## Requirements\n\n## User Stories\n\n## Acceptance Criteria\n';
const PLAN = '# Plan\n\n## Architecture\n\n## Technology Stack\n\n## Implementation Phases\n';
const TASKS = '## Tasks\n- [x] T001: Done\n';

function loggedLines(): string[] {
  return mockConsoleLog.mock.calls.map(call => String(call[0]));
}

function commandFor(files: Record<string, string>): ValidateCommand {
  mockServices = createMemoryServices({ files });
  return new ValidateCommand();
}

describe('ValidateCommand', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should report a complete feature as valid', async () => {
    const command = commandFor({
      'specs/001-auth/spec-001.md': SPEC,
      'plans/001-auth/plan-001.md': PLAN,
      'tasks/001-auth/task-001.md': TASKS,
    });

    await command.execute({});

    expect(loggedLines()).toEqual([
      '🔍 Validating 001-auth',
      '   ✅ specs/001-auth/spec-001.md',
      '   ✅ plans/001-auth/plan-001.md',
      '   ✅ tasks/001-auth/task-001.md',
      '   Overall: ✅ valid',
    ]);
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('should list warnings without failing', async () => {
    const command = commandFor({
      'specs/001-auth/spec-001.md': SPEC.replace('# Spec\n', '# Spec\n[NEEDS CLARIFICATION] who signs in?\n'),
    });

    await command.execute({ verbose: true });

    expect(loggedLines()).toEqual([
      '🔍 Validating 001-auth',
      '   ⚠️  No plans found in plans/001-auth',
      '   ⚠️  specs/001-auth/spec-001.md',
      '      - 1 item(s) need clarification (line 2)',
      '      ? line 2: [NEEDS CLARIFICATION] who signs in?',
      '   Overall: ⚠️  warning',
    ]);
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('should exit 1 when a document is invalid', async () => {
    const command = commandFor({
      'specs/001-auth/spec-001.md': SPEC,
      'plans/001-auth/plan-001.md': PLAN,
      'tasks/001-auth/task-001.md': '# Tasks without entries\n',
    });

    await command.execute({});

    expect(loggedLines()).toContain('   ❌ tasks/001-auth/task-001.md');
    expect(loggedLines()).toContain('      - Missing sections: ## Tasks');
    expect(loggedLines()).toContain('      - No task entries found');
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  it('should validate the requested feature as JSON', async () => {
    const command = commandFor({
      'specs/001-auth/spec-001.md': SPEC,
      'specs/002-billing/spec-001.md': '# Billing\n',
    });

    await command.execute({ feature: 'auth', json: true });

    const output = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
    expect(output.success).toBe(true);
    expect(output.data.feature).toBe('001-auth');
    expect(output.data.status).toBe('warning');
    expect(output.data.documents).toHaveLength(1);
  });

  it('should fail for an unknown feature', async () => {
    const command = commandFor({ 'specs/001-auth/spec-001.md': SPEC });

    await command.execute({ feature: '9' });

    expect(mockConsoleError).toHaveBeenCalledWith('❌ Feature not found: 9');
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });
});
