import { Command } from 'commander';
import { Progress } from '@specpulse/core';
import type { Tracker } from '@specpulse/core';
import { BaseCommand, withOutputOptions } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Status Command Options interface
 */
export interface StatusCommandOptions extends BaseCommandOptions {
  feature?: string;
}

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

/**
 * Renders a duration in milliseconds as its two largest units.
 */
export function formatDuration(ms: number): string {
  if (ms < MINUTE) return '<1m';
  const days = Math.floor(ms / DAY);
  const hours = Math.floor((ms % DAY) / HOUR);
  const minutes = Math.floor((ms % HOUR) / MINUTE);
  if (days > 0) return `${days}d ${hours}h`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  return `${minutes}m`;
}

function formatSnapshot(snapshot: Progress.ProgressSnapshot): string {
  return `${snapshot.completed}/${snapshot.total} (${snapshot.percentage.toFixed(1)}%)`;
}

/**
 * StatusCommand - task progress of one feature, with an ETA once
 * enough history has been recorded.
 */
export class StatusCommand extends BaseCommand<StatusCommandOptions> {

  register(program: Command): void {
    withOutputOptions(
      program
        .command('status')
        .description('Show task progress for a feature')
        .option('--feature <feature>', 'Feature number, directory name or slug (default: active feature)')
    ).action(async (options: StatusCommandOptions) => {
      await this.execute(options);
    });
  }

  async execute(options: StatusCommandOptions): Promise<void> {
    try {
      const featureManager = await this.dependencyService.getFeatureManager();
      const tracker = this.dependencyService.getProgressTracker();
      const history = await this.dependencyService.getProgressHistory();

      const resolved = await featureManager.resolveFeature(options.feature);
      const paths = featureManager.pathsFor(resolved.feature);
      const progress = await tracker.track(paths.tasks);
      const samples = await history.record(resolved.feature.dirName, progress.snapshot);
      const etaMs = Progress.estimateCompletion(samples, progress.snapshot.total);

      const data = {
        feature: resolved.feature.dirName,
        source: resolved.source,
        snapshot: progress.snapshot,
        files: progress.files.map(file => ({
          name: file.name,
          path: file.path,
          service: file.service,
          snapshot: file.snapshot,
        })),
        etaMs,
        warnings: [...resolved.warnings, ...progress.warnings],
      };

      this.handleSuccess(data, options, () => this.render(resolved.feature.dirName, progress, etaMs, options));
      this.printWarnings(data.warnings, options);
    } catch (error) {
      this.handleError(error, options);
    }
  }

  private render(
    feature: string,
    progress: Tracker.FeatureProgress,
    etaMs: number | null,
    options: StatusCommandOptions
  ): void {
    const { snapshot } = progress;
    console.log(`📊 Feature ${feature}`);
    if (snapshot.total === 0) {
      console.log(`   No tasks yet. Run 'specpulse task new'.`);
      return;
    }

    console.log(`   Progress: ${formatSnapshot(snapshot)}`);
    console.log(`   ✅ ${snapshot.completed} done  🔄 ${snapshot.inProgress} in progress  ⛔ ${snapshot.blocked} blocked  ⏳ ${snapshot.pending} pending`);

    const width = Math.max(...progress.files.map(file => file.name.length));
    for (const file of progress.files) {
      console.log(`   ${file.name.padEnd(width)}  ${formatSnapshot(file.snapshot)}`);
      if (options.verbose) {
        for (const record of file.records) {
          console.log(`      ${record.taskId} [${record.status}]${record.title ? ` ${record.title}` : ''}`);
        }
      }
    }

    if (etaMs === null) {
      console.log(`   ETA: not enough history yet`);
    } else if (etaMs === 0) {
      console.log(`   ETA: complete`);
    } else {
      console.log(`   ETA: ~${formatDuration(etaMs)}`);
    }
  }
}
