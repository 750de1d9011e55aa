/**
 * Custom Error Classes for GitModule
 *
 * Typed exceptions for git operations. Feature commands treat all of them as
 * warnings; nothing in the ledger depends on git.
 */

import { SpecPulseError } from '../errors';

/**
 * Base error class for all Git-related errors
 */
export class GitError extends SpecPulseError {
  constructor(message: string, code = 'GIT_ERROR') {
    super(message, code);
  }
}

/**
 * Error thrown when a Git command fails
 */
export class GitCommandError extends GitError {
  public readonly stderr: string;
  public readonly command?: string | undefined;

  constructor(message: string, stderr: string = '', command?: string | undefined) {
    super(stderr.trim() ? `${message}: ${stderr.trim()}` : message, 'GIT_COMMAND_FAILED');
    this.stderr = stderr;
    this.command = command;
  }
}

/**
 * Error thrown when a branch does not exist
 */
export class BranchNotFoundError extends GitError {
  public readonly branchName: string;

  constructor(branchName: string) {
    super(`Branch not found: ${branchName}`, 'BRANCH_NOT_FOUND');
    this.branchName = branchName;
  }
}

/**
 * Error thrown when trying to create a branch that already exists
 */
export class BranchAlreadyExistsError extends GitError {
  public readonly branchName: string;

  constructor(branchName: string) {
    super(`Branch already exists: ${branchName}`, 'BRANCH_EXISTS');
    this.branchName = branchName;
  }
}

/**
 * Error thrown before running git when a branch name is unusable
 */
export class InvalidBranchNameError extends GitError {
  public readonly branchName: string;

  constructor(branchName: string, reason: string) {
    super(`Invalid branch name "${branchName}": ${reason}`, 'INVALID_BRANCH_NAME');
    this.branchName = branchName;
  }
}
