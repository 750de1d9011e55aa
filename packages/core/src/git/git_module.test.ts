import { GitModule } from './git_module';
import {
  BranchAlreadyExistsError,
  BranchNotFoundError,
  GitCommandError,
  InvalidBranchNameError,
} from './errors';
import type { ExecCommand, ExecResult } from './types';

function result(exitCode: number, stdout = '', stderr = ''): ExecResult {
  return { exitCode, stdout, stderr };
}

describe('GitModule', () => {
  let execCommand: jest.MockedFunction<ExecCommand>;
  let git: GitModule;

  beforeEach(() => {
    execCommand = jest.fn<ReturnType<ExecCommand>, Parameters<ExecCommand>>();
    git = new GitModule({ repoRoot: '/repo', execCommand });
  });

  describe('isRepository', () => {
    it('should run git in the repository root', async () => {
      execCommand.mockResolvedValue(result(0, 'true\n'));

      expect(await git.isRepository()).toBe(true);
      expect(execCommand).toHaveBeenCalledWith('git', ['rev-parse', '--is-inside-work-tree'], { cwd: '/repo' });
    });

    it('should return false when git fails', async () => {
      execCommand.mockResolvedValue(result(128, '', 'fatal: not a git repository'));

      expect(await git.isRepository()).toBe(false);
    });
  });

  describe('getCurrentBranch', () => {
    it('should return the trimmed branch name', async () => {
      execCommand.mockResolvedValue(result(0, 'main\n'));

      expect(await git.getCurrentBranch()).toBe('main');
    });

    it('should reject a detached HEAD', async () => {
      execCommand.mockResolvedValue(result(0, 'HEAD\n'));

      await expect(git.getCurrentBranch()).rejects.toThrow('In detached HEAD state');
    });

    it('should include stderr in the error', async () => {
      execCommand.mockResolvedValue(result(128, '', 'fatal: not a git repository\n'));

      await expect(git.getCurrentBranch()).rejects.toThrow(
        'Failed to get current branch: fatal: not a git repository'
      );
    });
  });

  describe('createBranch', () => {
    it('should create and switch to a new branch', async () => {
      execCommand
        .mockResolvedValueOnce(result(0, ''))
        .mockResolvedValueOnce(result(0, '', "Switched to a new branch '001-user-auth'"));

      await git.createBranch('001-user-auth');

      expect(execCommand).toHaveBeenNthCalledWith(1, 'git', ['branch', '--list', '001-user-auth'], { cwd: '/repo' });
      expect(execCommand).toHaveBeenNthCalledWith(2, 'git', ['checkout', '-b', '001-user-auth'], { cwd: '/repo' });
    });

    it('should refuse an existing branch', async () => {
      execCommand.mockResolvedValueOnce(result(0, '  001-user-auth\n'));

      await expect(git.createBranch('001-user-auth')).rejects.toBeInstanceOf(BranchAlreadyExistsError);
      expect(execCommand).toHaveBeenCalledTimes(1);
    });

    it('should surface checkout failures', async () => {
      execCommand
        .mockResolvedValueOnce(result(0, ''))
        .mockResolvedValueOnce(result(1, '', 'error: cannot lock ref'));

      await expect(git.createBranch('001-user-auth')).rejects.toBeInstanceOf(GitCommandError);
    });

    it.each(['', '-rf', 'two words', 'a..b', 'feature.lock', 'x~1'])(
      'should reject %j without running git',
      async (name) => {
        await expect(git.createBranch(name)).rejects.toBeInstanceOf(InvalidBranchNameError);
        expect(execCommand).not.toHaveBeenCalled();
      }
    );
  });

  describe('checkoutBranch', () => {
    it('should check out an existing branch', async () => {
      execCommand
        .mockResolvedValueOnce(result(0, '  002-billing\n'))
        .mockResolvedValueOnce(result(0));

      await git.checkoutBranch('002-billing');

      expect(execCommand).toHaveBeenLastCalledWith('git', ['checkout', '002-billing'], { cwd: '/repo' });
    });

    it('should throw BranchNotFoundError for a missing branch', async () => {
      execCommand.mockResolvedValueOnce(result(0, ''));

      const error = await git.checkoutBranch('404-missing').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(BranchNotFoundError);
      expect(error).toHaveProperty('code', 'BRANCH_NOT_FOUND');
      expect(error).toHaveProperty('branchName', '404-missing');
    });
  });
});
