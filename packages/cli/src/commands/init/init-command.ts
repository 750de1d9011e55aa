import * as path from 'path';
import { Command } from 'commander';
import { BaseCommand, withOutputOptions } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Init Command Options interface
 */
export interface InitCommandOptions extends BaseCommandOptions { }

/**
 * InitCommand - scaffolds `.specpulse/config.json` and the directory tree
 * in the current directory. Running it again only fills in what is missing.
 */
export class InitCommand extends BaseCommand<InitCommandOptions> {

  register(program: Command): void {
    withOutputOptions(
      program
        .command('init [name]')
        .description('Initialize a SpecPulse project in the current directory')
    ).action(async (name: string | undefined, options: InitCommandOptions) => {
      await this.execute(name, options);
    });
  }

  async execute(name: string | undefined, options: InitCommandOptions): Promise<void> {
    try {
      const projectRoot = process.cwd();
      const initializer = this.dependencyService.createProjectInitializer(projectRoot);
      const projectName = name ?? (path.basename(projectRoot) || undefined);
      const result = await initializer.initialize({ projectName });

      this.handleSuccess({ projectRoot, ...result }, options, () => {
        if (result.alreadyInitialized) {
          console.log(`✅ Project "${result.config.projectName}" already initialized; created ${result.created.length} missing item(s)`);
        } else {
          console.log(`✅ Initialized SpecPulse project "${result.config.projectName}" in ${projectRoot}`);
        }
        for (const created of result.created) {
          console.log(`   + ${created}`);
        }
        if (!result.alreadyInitialized) {
          console.log(`💡 Next: specpulse feature init <name>`);
        }
      });
    } catch (error) {
      this.handleError(error, options);
    }
  }
}
