/**
 * Four-state task status shared by the list and YAML task formats.
 */
export type TaskStatus = 'pending' | 'in-progress' | 'blocked' | 'done';

/**
 * One task recognized in a task document. Recomputed on every scan, never stored.
 */
export type TaskRecord = {
  taskId: string;
  status: TaskStatus;
  /** Referenced task ids, de-duplicated, in order of appearance */
  dependsOn: string[];
  /** Non-status bracket annotations such as 'P' or 'S' */
  tags: string[];
  title?: string;
  format: 'list' | 'yaml';
  /** 1-based line the task starts on */
  line: number;
};

/**
 * Something the parser noticed but tolerated.
 */
export type ParseIssue = {
  line: number;
  message: string;
};

export type ParseResult = {
  records: TaskRecord[];
  issues: ParseIssue[];
};

export type ProgressSnapshot = {
  total: number;
  completed: number;
  inProgress: number;
  blocked: number;
  pending: number;
  /** completed / total * 100, one decimal; 0 when total is 0 */
  percentage: number;
};

/**
 * Result of rewriting one task's status inside its document.
 */
export type TaskStatusEdit = {
  document: string;
  previous: TaskStatus;
  /** 1-based line that now carries the status */
  line: number;
};

/**
 * A point in a feature's progress history.
 */
export type ProgressSample = {
  /** ms since epoch */
  timestamp: number;
  completed: number;
  total: number;
};

/**
 * A task whose dependencies name ids that exist nowhere in the corpus.
 */
export type DanglingDependency = {
  taskId: string;
  missing: string[];
};
