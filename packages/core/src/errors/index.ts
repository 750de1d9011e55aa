/**
 * Common error types for SpecPulse core.
 *
 * Every hard failure raised by the library extends SpecPulseError so the CLI
 * can branch on `code` without importing each class.
 */

export class SpecPulseError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Raised when a command needs an initialized project and none was found.
 */
export class NotInitializedError extends SpecPulseError {
  constructor(public readonly searchedFrom: string) {
    super(
      `SpecPulse not initialized (searched from ${searchedFrom}). Run 'specpulse init' first.`,
      'NOT_INITIALIZED'
    );
  }
}

/**
 * Raised when a feature identifier (number or slug) matches no feature directory.
 */
export class FeatureNotFoundError extends SpecPulseError {
  constructor(public readonly identifier: string, message: string = `Feature not found: ${identifier}`) {
    super(message, 'FEATURE_NOT_FOUND');
  }
}

/**
 * Raised for unreadable or schema-invalid configuration files.
 */
export class ConfigValidationError extends SpecPulseError {
  constructor(
    public readonly configPath: string,
    public readonly problems: string[]
  ) {
    super(`Invalid configuration in ${configPath}: ${problems.join('; ')}`, 'INVALID_CONFIG');
  }
}

/**
 * Raised when no task list of a feature contains the requested task id.
 */
export class TaskNotFoundError extends SpecPulseError {
  constructor(public readonly taskId: string, public readonly feature: string) {
    super(`Task ${taskId} not found in the task lists of ${feature}`, 'TASK_NOT_FOUND');
  }
}
