import { Command } from 'commander';
import { ArtifactCommand } from './artifact-command';

/**
 * Registers `spec`, `plan` and `task`
 */
export function registerArtifactCommands(program: Command): void {
  new ArtifactCommand('spec').register(program);
  new ArtifactCommand('plan').register(program);
  new ArtifactCommand('task').register(program);
}
