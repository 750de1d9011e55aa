// Types
export type {
  TaskStatus,
  TaskRecord,
  ParseIssue,
  ParseResult,
  ProgressSnapshot,
  ProgressSample,
  DanglingDependency,
  TaskStatusEdit,
} from './progress_calculator.types';

// Implementation
export {
  parse,
  aggregate,
  combine,
  estimateCompletion,
  findDanglingDependencies,
} from './progress_calculator';
export { STATUS_MARKERS, STATUS_SYMBOLS } from './task_parser';
export { setTaskStatus } from './task_editor';
export { TaskEditError } from './progress_calculator.errors';
