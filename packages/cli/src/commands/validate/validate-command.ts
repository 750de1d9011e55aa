import { Command } from 'commander';
import type { Validator } from '@specpulse/core';
import { BaseCommand, withOutputOptions } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface ValidateCommandOptions extends BaseCommandOptions {
  feature?: string;
}

const STATUS_ICONS: Record<Validator.ValidationStatus, string> = {
  valid: '✅',
  warning: '⚠️ ',
  invalid: '❌',
};

function formatFinding(finding: Validator.ValidationFinding): string {
  return finding.line === undefined ? finding.message : `${finding.message} (line ${finding.line})`;
}

/**
 * ValidateCommand - checks a feature's documents for their required sections.
 * Exits with status 1 when any document is invalid.
 */
export class ValidateCommand extends BaseCommand<ValidateCommandOptions> {

  register(program: Command): void {
    withOutputOptions(
      program
        .command('validate')
        .description('Check specs, plans and task lists for required sections')
        .option('--feature <feature>', 'Feature number, directory name or slug (default: active feature)')
    ).action(async (options: ValidateCommandOptions) => {
      await this.execute(options);
    });
  }

  async execute(options: ValidateCommandOptions): Promise<void> {
    try {
      const featureManager = await this.dependencyService.getFeatureManager();
      const validator = this.dependencyService.getArtifactValidator();

      const resolved = await featureManager.resolveFeature(options.feature);
      const result = await validator.validateFeature(
        resolved.feature.dirName,
        featureManager.pathsFor(resolved.feature)
      );

      this.handleSuccess(result, options, () => this.render(result, options));
      this.printWarnings(resolved.warnings, options);

      if (result.status === 'invalid') {
        process.exit(1);
      }
    } catch (error) {
      this.handleError(error, options);
    }
  }

  private render(result: Validator.FeatureValidationResult, options: ValidateCommandOptions): void {
    console.log(`🔍 Validating ${result.feature}`);
    for (const finding of result.findings) {
      console.log(`   ⚠️  ${formatFinding(finding)}`);
    }
    for (const document of result.documents) {
      console.log(`   ${STATUS_ICONS[document.status]} ${document.path}`);
      for (const finding of document.findings) {
        console.log(`      - ${formatFinding(finding)}`);
      }
      if (options.verbose) {
        for (const clarification of document.clarifications) {
          console.log(`      ? line ${clarification.line}: ${clarification.text}`);
        }
      }
    }
    console.log(`   Overall: ${STATUS_ICONS[result.status]} ${result.status}`);
  }
}
