import { Command } from 'commander';
import { InitCommand } from './init-command';

/**
 * Registers the init command
 */
export function registerInitCommands(program: Command): void {
  new InitCommand().register(program);
}
