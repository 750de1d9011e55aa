import { Command } from 'commander';
import { FeatureCommand } from './feature-command';

/**
 * Registers feature init/continue/list
 */
export function registerFeatureCommands(program: Command): void {
  new FeatureCommand().register(program);
}
