/**
 * GitModule - Branch operations over the git CLI
 *
 * Exposes semantic methods instead of raw git commands. Commands run through
 * an injected execCommand so tests never spawn git.
 *
 * @module git_module
 */

import type { ExecCommand, ExecResult, GitModuleDependencies, IGitModule } from './types';
import {
  BranchAlreadyExistsError,
  BranchNotFoundError,
  GitCommandError,
  InvalidBranchNameError,
} from './errors';
import { branchNameProblem } from './branch_name';
import { createLogger } from '../logger';

const logger = createLogger('[GitModule] ');

/**
 * @example
 * ```typescript
 * const git = new GitModule({ repoRoot: '/path/to/project', execCommand });
 * if (await git.isRepository()) {
 *   await git.createBranch('001-user-auth');
 * }
 * ```
 */
export class GitModule implements IGitModule {
  private readonly repoRoot: string;
  private readonly execCommand: ExecCommand;

  constructor(dependencies: GitModuleDependencies) {
    this.repoRoot = dependencies.repoRoot;
    this.execCommand = dependencies.execCommand;
  }

  private async execGit(args: string[]): Promise<ExecResult> {
    return this.execCommand('git', args, { cwd: this.repoRoot });
  }

  private assertValidBranchName(branchName: string): void {
    const problem = branchNameProblem(branchName);
    if (problem) {
      throw new InvalidBranchNameError(branchName, problem);
    }
  }

  async isRepository(): Promise<boolean> {
    const result = await this.execGit(['rev-parse', '--is-inside-work-tree']);
    return result.exitCode === 0 && result.stdout.trim() === 'true';
  }

  /**
   * @throws GitCommandError outside a repository or in detached HEAD state
   */
  async getCurrentBranch(): Promise<string> {
    const result = await this.execGit(['rev-parse', '--abbrev-ref', 'HEAD']);

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to get current branch', result.stderr, 'rev-parse');
    }

    const branch = result.stdout.trim();
    if (branch === 'HEAD') {
      throw new GitCommandError('In detached HEAD state');
    }
    return branch;
  }

  async branchExists(branchName: string): Promise<boolean> {
    this.assertValidBranchName(branchName);
    const result = await this.execGit(['branch', '--list', branchName]);

    if (result.exitCode !== 0) {
      return false;
    }
    return result.stdout.trim().length > 0;
  }

  /**
   * @throws BranchAlreadyExistsError when the branch exists
   * @throws GitCommandError when git refuses
   */
  async createBranch(branchName: string): Promise<void> {
    if (await this.branchExists(branchName)) {
      throw new BranchAlreadyExistsError(branchName);
    }

    const result = await this.execGit(['checkout', '-b', branchName]);
    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to create branch ${branchName}`, result.stderr, 'checkout');
    }

    logger.debug(`Created and checked out branch: ${branchName}`);
  }

  /**
   * @throws BranchNotFoundError when the branch does not exist
   * @throws GitCommandError when git refuses (e.g. uncommitted conflicts)
   */
  async checkoutBranch(branchName: string): Promise<void> {
    if (!(await this.branchExists(branchName))) {
      throw new BranchNotFoundError(branchName);
    }

    const result = await this.execGit(['checkout', branchName]);
    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to checkout branch ${branchName}`, result.stderr, 'checkout');
    }

    logger.debug(`Checked out branch: ${branchName}`);
  }
}
