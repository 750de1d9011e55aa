import { Command } from 'commander';
import { ValidateCommand } from './validate-command';

/**
 * Registers the validate command
 */
export function registerValidateCommands(program: Command): void {
  new ValidateCommand().register(program);
}
