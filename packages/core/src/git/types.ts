/**
 * Type Definitions for GitModule
 */

/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
};

/**
 * Result of executing a shell command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type ExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

/**
 * Dependencies required by GitModule
 */
export type GitModuleDependencies = {
  /** Directory git runs in */
  repoRoot: string;
  /** Function to execute shell commands */
  execCommand: ExecCommand;
};

/**
 * The branch operations feature commands need.
 */
export interface IGitModule {
  /** True when repoRoot is inside a work tree; never throws */
  isRepository(): Promise<boolean>;
  getCurrentBranch(): Promise<string>;
  branchExists(branchName: string): Promise<boolean>;
  /** Creates the branch and switches to it */
  createBranch(branchName: string): Promise<void>;
  checkoutBranch(branchName: string): Promise<void>;
}
