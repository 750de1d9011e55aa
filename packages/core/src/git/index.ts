/**
 * GitModule - Branch operations for feature workflows
 *
 * For implementations, use:
 * - @specpulse/core/fs for createLocalGitModule and createExecCommand
 * - @specpulse/core/memory for MemoryGitModule
 *
 * @module git
 */

export { GitModule } from './git_module';
export { branchNameProblem } from './branch_name';

export type {
  ExecCommand,
  ExecOptions,
  ExecResult,
  GitModuleDependencies,
  IGitModule,
} from './types';

export {
  GitError,
  GitCommandError,
  BranchNotFoundError,
  BranchAlreadyExistsError,
  InvalidBranchNameError,
} from './errors';
