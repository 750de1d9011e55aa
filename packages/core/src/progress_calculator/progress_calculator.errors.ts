import { SpecPulseError } from '../errors';

/**
 * The task exists but its status cannot be rewritten in place, e.g. a YAML
 * flow mapping such as `- {id: T1, status: done}`.
 */
export class TaskEditError extends SpecPulseError {
  constructor(public readonly taskId: string, reason: string) {
    super(`Cannot update ${taskId}: ${reason}`, 'TASK_EDIT_FAILED');
  }
}
