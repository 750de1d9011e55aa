import { SpecPulseError } from '../errors';

/**
 * A human-supplied name (feature name, service code) is unusable.
 */
export class InvalidNameError extends SpecPulseError {
  constructor(public readonly input: string, reason: string) {
    super(`Invalid name "${input}": ${reason}`, 'INVALID_NAME');
  }
}

/**
 * An explicit artifact number is not a positive integer.
 */
export class InvalidNumberError extends SpecPulseError {
  constructor(public readonly input: number | string) {
    super(`Invalid artifact number "${input}": must be a positive integer`, 'INVALID_NUMBER');
  }
}

/**
 * An explicit artifact number is already taken, either by an artifact or by
 * the claim file of an allocation in progress (or one that was interrupted).
 */
export class CollisionError extends SpecPulseError {
  constructor(
    public readonly path: string,
    public readonly number: number,
    public readonly heldByClaim: boolean = false
  ) {
    super(
      heldByClaim
        ? `Artifact number ${number} is held by the claim file ${path}. ` +
          'If no other specpulse command is running, an interrupted one left it behind; delete it and retry'
        : `Artifact number ${number} is already taken by ${path}`,
      'COLLISION'
    );
  }
}

/**
 * Automatic allocation lost every reservation race it was allowed to retry.
 */
export class ContentionError extends SpecPulseError {
  constructor(
    public readonly root: string,
    public readonly attempts: number
  ) {
    super(
      `Could not reserve a new artifact number under ${root || '.'} after ${attempts} attempts; retry the command`,
      'CONTENTION'
    );
  }
}
