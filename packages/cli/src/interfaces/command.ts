import type { Command } from 'commander';

/**
 * Output flags shared by every leaf command (see withOutputOptions).
 * `--json` wins over the other two.
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * A command group that attaches itself to the root program.
 */
export interface ICommand {
  register(program: Command): void;
}
