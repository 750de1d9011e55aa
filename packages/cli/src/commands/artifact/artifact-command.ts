import { Command } from 'commander';
import type { Features, Progress } from '@specpulse/core';
import { BaseCommand, withOutputOptions } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Document families exposed as top-level commands.
 */
export type ArtifactCommandName = 'spec' | 'plan' | 'task';

export interface ArtifactNewOptions extends BaseCommandOptions {
  feature?: string;
  id?: string;
  title?: string;
  /** task only */
  service?: string;
}

export interface ArtifactCurrentOptions extends BaseCommandOptions {
  feature?: string;
  /** task only */
  service?: string;
}

export interface TaskStatusOptions extends BaseCommandOptions {
  feature?: string;
}

/** `task <verb> <id>` subcommands and the status each one sets. */
const TASK_STATUS_VERBS: ReadonlyArray<[string, Progress.TaskStatus, string]> = [
  ['start', 'in-progress', 'Mark a task as in progress'],
  ['done', 'done', 'Mark a task as done'],
  ['block', 'blocked', 'Mark a task as blocked'],
  ['reopen', 'pending', 'Mark a task as pending again'],
];

const DESCRIPTIONS: Record<ArtifactCommandName, string> = {
  spec: 'specification',
  plan: 'implementation plan',
  task: 'task list',
};

/**
 * ArtifactCommand - `spec`, `plan` and `task` with `new` and `current`;
 * `task` also has `start`, `done`, `block` and `reopen`.
 * One instance serves one document family.
 */
export class ArtifactCommand extends BaseCommand<ArtifactNewOptions> {

  constructor(private readonly name: ArtifactCommandName) {
    super();
  }

  register(program: Command): void {
    const noun = DESCRIPTIONS[this.name];
    const group = program
      .command(this.name)
      .description(`Create and inspect ${noun}s`);

    const create = group
      .command('new')
      .description(`Create the next numbered ${noun} in a feature`)
      .option('--feature <feature>', 'Feature number, directory name or slug (default: active feature)')
      .option('--id <number>', 'Use this number instead of the next free one')
      .option('--title <title>', 'Title placed in the template');
    if (this.name === 'task') {
      create.option('--service <code>', 'Create a service task list such as AUTH-T001.md');
    }
    withOutputOptions(create).action(async (options: ArtifactNewOptions) => {
      await this.executeNew(options);
    });

    const current = group
      .command('current')
      .description(`Show the latest ${noun} of a feature`)
      .option('--feature <feature>', 'Feature number, directory name or slug (default: active feature)');
    if (this.name === 'task') {
      current.option('--service <code>', 'Look at service task lists for this code');
    }
    withOutputOptions(current).action(async (options: ArtifactCurrentOptions) => {
      await this.executeCurrent(options);
    });

    if (this.name === 'task') {
      for (const [verb, status, description] of TASK_STATUS_VERBS) {
        const edit = group
          .command(`${verb} <taskId>`)
          .description(description)
          .option('--feature <feature>', 'Feature number, directory name or slug (default: active feature)');
        withOutputOptions(edit).action(async (taskId: string, options: TaskStatusOptions) => {
          await this.executeSetStatus(taskId, status, options);
        });
      }
    }
  }

  async executeNew(options: ArtifactNewOptions): Promise<void> {
    try {
      const explicit = this.parseExplicitId(options.id);
      const featureManager = await this.dependencyService.getFeatureManager();
      const created = await featureManager.createArtifact(this.kindFor(options.service), {
        feature: options.feature,
        explicit,
        service: options.service,
        title: options.title,
      });

      this.handleSuccess(created, options, () => {
        console.log(`✅ Created ${created.artifact.name} in ${created.feature.dirName}`);
        console.log(`   Path: ${created.artifact.path}`);
        console.log(`   Template: ${created.template}`);
      });
      this.printWarnings(created.warnings, options);
    } catch (error) {
      this.handleError(error, options);
    }
  }

  async executeCurrent(options: ArtifactCurrentOptions): Promise<void> {
    try {
      const featureManager = await this.dependencyService.getFeatureManager();
      const current = await featureManager.currentArtifact(this.kindFor(options.service), {
        feature: options.feature,
        service: options.service,
      });

      this.handleSuccess(current, options, () => {
        if (!current.artifact) {
          console.log(`No ${DESCRIPTIONS[this.name]} yet in ${current.feature.dirName}. Run 'specpulse ${this.name} new'.`);
          return;
        }
        console.log(`📄 ${current.artifact.name} (${current.feature.dirName})`);
        console.log(`   Path: ${current.artifact.path}`);
      });
      this.printWarnings(current.warnings, options);
    } catch (error) {
      this.handleError(error, options);
    }
  }

  async executeSetStatus(taskId: string, status: Progress.TaskStatus, options: TaskStatusOptions): Promise<void> {
    try {
      const featureManager = await this.dependencyService.getFeatureManager();
      const change = await featureManager.updateTaskStatus(taskId, status, { feature: options.feature });

      this.handleSuccess(change, options, () => {
        if (change.changed) {
          console.log(`✅ ${change.taskId}: ${change.previous} → ${change.status}`);
        } else {
          console.log(`ℹ️  ${change.taskId} is already ${change.status}`);
        }
        console.log(`   Path: ${change.path}:${change.line}`);
      });
      this.printWarnings(change.warnings, options);
    } catch (error) {
      this.handleError(error, options);
    }
  }

  private kindFor(service: string | undefined): Features.ArtifactFileKind {
    switch (this.name) {
      case 'spec':
        return 'specification';
      case 'plan':
        return 'plan';
      case 'task':
        return service ? 'service-task' : 'task-list';
    }
  }
}
