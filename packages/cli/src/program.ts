import { Command } from 'commander';
import { Logger } from '@specpulse/core';
import { logLevelFor } from './base/base-command';
import { registerInitCommands } from './commands/init/init';
import { registerFeatureCommands } from './commands/feature/feature';
import { registerArtifactCommands } from './commands/artifact/artifact';
import { registerStatusCommands } from './commands/status/status';
import { registerValidateCommands } from './commands/validate/validate';

export const VERSION = '0.1.0';

/**
 * Builds the `specpulse` program with every command registered.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('specpulse')
    .description('Numbered specs, plans and task lists with progress tracking')
    .version(VERSION)
    .hook('preAction', (_program, actionCommand) => {
      const opts = actionCommand.opts();
      Logger.setLogLevel(logLevelFor({
        json: opts['json'] === true,
        verbose: opts['verbose'] === true,
        quiet: opts['quiet'] === true,
      }));
    });

  registerInitCommands(program);
  registerFeatureCommands(program);
  registerArtifactCommands(program);
  registerStatusCommands(program);
  registerValidateCommands(program);

  return program;
}
