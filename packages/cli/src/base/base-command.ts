/**
 * Base Command Class for the SpecPulse CLI
 *
 * Provides common output and error handling across all commands.
 */

import { Command } from 'commander';
import { Allocator, Errors, Logger } from '@specpulse/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

/**
 * Adds the global output flags every command accepts.
 */
export function withOutputOptions(command: Command): Command {
  return command
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Enable verbose output with detailed information')
    .option('--quiet', 'Suppress non-essential output');
}

/**
 * Core diagnostics level for one invocation; null leaves the environment in charge.
 */
export function logLevelFor(options: BaseCommandOptions): Logger.LogLevel | null {
  if (options.json || options.quiet) return 'error';
  if (options.verbose) return 'debug';
  return null;
}

type Warning = { message: string; path?: string };

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  /**
   * Prints a failure and exits with status 1.
   */
  protected handleError(error: unknown, options: TOptions): void {
    const message = error instanceof Error ? error.message : String(error);

    if (options.json) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        ...(error instanceof Errors.SpecPulseError ? { code: error.code } : {}),
        exitCode: 1
      }, null, 2));
    } else {
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (options.verbose && error instanceof Error && error.stack) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(1);
  }

  /**
   * Prints a result: the JSON envelope, or the human rendering unless quiet.
   */
  protected handleSuccess(data: unknown, options: TOptions, render: () => void): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
      return;
    }
    if (!options.quiet) {
      render();
    }
  }

  /**
   * Prints warnings to stderr, at most one line per file.
   */
  protected printWarnings(warnings: ReadonlyArray<Warning | string>, options: TOptions): void {
    if (options.json) return;

    const seen = new Set<string>();
    for (const warning of warnings) {
      const message = typeof warning === 'string' ? warning : warning.message;
      const key = typeof warning === 'string' || !warning.path ? message : warning.path;
      if (seen.has(key)) continue;
      seen.add(key);
      console.warn(`⚠️  ${message}`);
    }
  }

  /**
   * Parses an `--id` flag value.
   * @throws InvalidNumberError for anything but a positive integer
   */
  protected parseExplicitId(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    if (!/^\d+$/.test(value) || Number(value) < 1) {
      throw new Allocator.InvalidNumberError(value);
    }
    return Number(value);
  }
}
