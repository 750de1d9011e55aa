import { createMemoryServices } from '../../testing/memory-services';
import type { MemoryServices } from '../../testing/memory-services';

let mockServices: MemoryServices;

jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: () => mockServices
  }
}));

import { StatusCommand, formatDuration } from './status-command';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleWarn = jest.spyOn(console, 'warn').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

const HOUR = 3_600_000;

const TASK_LIST = [
  '## Tasks',
  '- [x] T001: Schema',
  '- [>] T002: API (depends on: T001)',
  '- [ ] T003: UI (depends on: T009)',
  '',
].join('\n');

function loggedLines(): string[] {
  return mockConsoleLog.mock.calls.map(call => String(call[0]));
}

describe('StatusCommand', () => {
  let statusCommand: StatusCommand;

  beforeEach(() => {
    jest.clearAllMocks();
    mockServices = createMemoryServices({
      files: {
        'specs/001-auth/spec-001.md': '# Spec',
        'tasks/001-auth/task-001.md': TASK_LIST,
        'tasks/001-auth/AUTH-T001.md': '- [x] AUTH-T001: Token store\n',
      },
    });
    statusCommand = new StatusCommand();
  });

  it('should print the snapshot, a line per file and the dangling dependency', async () => {
    await statusCommand.execute({});

    expect(loggedLines()).toEqual([
      '📊 Feature 001-auth',
      '   Progress: 2/4 (50.0%)',
      '   ✅ 2 done  🔄 1 in progress  ⛔ 0 blocked  ⏳ 1 pending',
      '   AUTH-T001.md  1/1 (100.0%)',
      '   task-001.md   1/3 (33.3%)',
      '   ETA: not enough history yet',
    ]);
    expect(mockConsoleWarn).toHaveBeenCalledTimes(1);
    expect(mockConsoleWarn).toHaveBeenCalledWith('⚠️  tasks/001-auth/task-001.md depends on unknown task(s): T009');
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('should estimate completion from the recorded history', async () => {
    await statusCommand.execute({ quiet: true });

    mockServices.lister.addFile('tasks/001-auth/task-001.md', TASK_LIST.replace('- [>] T002', '- [x] T002'));
    mockServices.clock.now += HOUR;
    await statusCommand.execute({});

    expect(loggedLines()[1]).toBe('   Progress: 3/4 (75.0%)');
    expect(loggedLines()).toContain('   ETA: ~1h 0m');
  });

  it('should report a finished feature as complete', async () => {
    mockServices = createMemoryServices({
      files: { 'tasks/003-done/task-001.md': '- [ ] T001: Only task\n' },
      directories: ['specs/003-done'],
    });
    statusCommand = new StatusCommand();
    await statusCommand.execute({ feature: '3', quiet: true });

    mockServices.lister.addFile('tasks/003-done/task-001.md', '- [x] T001: Only task\n');
    mockServices.clock.now += HOUR;
    await statusCommand.execute({ feature: '3' });

    expect(loggedLines()).toContain('   ETA: complete');
  });

  it('should list task records with --verbose', async () => {
    await statusCommand.execute({ verbose: true });

    expect(loggedLines()).toContain('      AUTH-T001 [done] Token store');
  });

  it('should explain an empty task directory', async () => {
    mockServices = createMemoryServices({ directories: ['specs/002-billing'] });
    statusCommand = new StatusCommand();

    await statusCommand.execute({});

    expect(loggedLines()).toEqual([
      '📊 Feature 002-billing',
      `   No tasks yet. Run 'specpulse task new'.`,
    ]);
  });

  it('should output JSON', async () => {
    await statusCommand.execute({ json: true });

    const output = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
    expect(output.success).toBe(true);
    expect(output.data.feature).toBe('001-auth');
    expect(output.data.source).toBe('latest');
    expect(output.data.snapshot).toEqual({
      total: 4,
      completed: 2,
      inProgress: 1,
      blocked: 0,
      pending: 1,
      percentage: 50,
    });
    expect(output.data.files.map((file: { name: string }) => file.name)).toEqual(['AUTH-T001.md', 'task-001.md']);
    expect(output.data.etaMs).toBeNull();
    expect(output.data.warnings).toHaveLength(1);
    expect(mockConsoleWarn).not.toHaveBeenCalled();
  });

  it('should fail when there are no features', async () => {
    mockServices = createMemoryServices();
    statusCommand = new StatusCommand();

    await statusCommand.execute({});

    expect(mockConsoleError).toHaveBeenCalledWith(
      `❌ No features found under specs/. Run 'specpulse feature init <name>' first.`
    );
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });
});

describe('formatDuration', () => {
  it('should keep the two largest units', () => {
    expect(formatDuration(30_000)).toBe('<1m');
    expect(formatDuration(5 * 60_000)).toBe('5m');
    expect(formatDuration(90 * 60_000)).toBe('1h 30m');
    expect(formatDuration(26 * HOUR)).toBe('1d 2h');
  });
});
