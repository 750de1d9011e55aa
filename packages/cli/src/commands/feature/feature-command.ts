import { Command } from 'commander';
import type { Features } from '@specpulse/core';
import { BaseCommand, withOutputOptions } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface FeatureInitOptions extends BaseCommandOptions {
  id?: string;
  /** False when --no-branch is given */
  branch?: boolean;
}

export interface FeatureCommandOptions extends BaseCommandOptions { }

/**
 * FeatureCommand - create, resume and list numbered feature directories.
 */
export class FeatureCommand extends BaseCommand<FeatureCommandOptions> {

  register(program: Command): void {
    const feature = program
      .command('feature')
      .description('Create, continue and list features');

    withOutputOptions(
      feature
        .command('init <name>')
        .description('Create a numbered feature under specs/, plans/ and tasks/')
        .option('--id <number>', 'Use this feature number instead of the next free one')
        .option('--no-branch', 'Do not create a git branch for the feature')
    ).action(async (name: string, options: FeatureInitOptions) => {
      await this.executeInit(name, options);
    });

    withOutputOptions(
      feature
        .command('continue <feature>')
        .description('Make an existing feature active (by number, directory name or slug)')
    ).action(async (identifier: string, options: FeatureCommandOptions) => {
      await this.executeContinue(identifier, options);
    });

    withOutputOptions(
      feature
        .command('list')
        .description('List features with their artifact counts')
    ).action(async (options: FeatureCommandOptions) => {
      await this.executeList(options);
    });
  }

  async executeInit(name: string, options: FeatureInitOptions): Promise<void> {
    try {
      const explicitId = this.parseExplicitId(options.id);
      const featureManager = await this.dependencyService.getFeatureManager();
      const change = await featureManager.initFeature(name, {
        explicitId,
        createBranch: options.branch === false ? false : undefined,
      });

      this.handleSuccess(change, options, () => {
        console.log(`✅ Feature ${change.feature.dirName} created`);
        this.printChange(change);
      });
      this.printWarnings(change.notices, options);
    } catch (error) {
      this.handleError(error, options);
    }
  }

  async executeContinue(identifier: string, options: FeatureCommandOptions): Promise<void> {
    try {
      const featureManager = await this.dependencyService.getFeatureManager();
      const change = await featureManager.continueFeature(identifier);

      this.handleSuccess(change, options, () => {
        console.log(`✅ Switched to feature ${change.feature.dirName}`);
        this.printChange(change);
      });
      this.printWarnings(change.notices, options);
    } catch (error) {
      this.handleError(error, options);
    }
  }

  async executeList(options: FeatureCommandOptions): Promise<void> {
    try {
      const featureManager = await this.dependencyService.getFeatureManager();
      const features = await featureManager.listFeatures();

      this.handleSuccess(features, options, () => {
        if (features.length === 0) {
          console.log(`No features found. Run 'specpulse feature init <name>' first.`);
          return;
        }
        console.log(`📁 Features (${features.length}):`);
        for (const feature of features) {
          const { specs, plans, tasks } = feature.counts;
          console.log(`   ${feature.dirName}  specs: ${specs}  plans: ${plans}  tasks: ${tasks}`);
        }
      });
    } catch (error) {
      this.handleError(error, options);
    }
  }

  private printChange(change: Features.FeatureChange): void {
    console.log(`   Specs: ${change.paths.specs}`);
    console.log(`   Plans: ${change.paths.plans}`);
    console.log(`   Tasks: ${change.paths.tasks}`);
    if (change.feature.branch) {
      console.log(`   Branch: ${change.feature.branch}`);
    }
  }
}
