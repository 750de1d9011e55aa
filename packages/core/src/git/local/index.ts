/**
 * Local git - spawns the git CLI
 *
 * @module git/local
 */

import { GitModule } from '../git_module';
import { createExecCommand } from './exec_command';

export { createExecCommand } from './exec_command';

/**
 * GitModule running git in `repoRoot`.
 */
export function createLocalGitModule(repoRoot: string): GitModule {
  return new GitModule({ repoRoot, execCommand: createExecCommand(repoRoot) });
}
