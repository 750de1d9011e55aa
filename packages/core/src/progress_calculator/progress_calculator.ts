/**
 * ProgressCalculator - pure functions over task documents.
 *
 * parse() turns text into TaskRecords, aggregate() counts them, and
 * estimateCompletion() projects an ETA from sampled history. Nothing here
 * touches the filesystem; ProgressTracker feeds it file contents.
 */

import type {
  DanglingDependency,
  ProgressSample,
  ProgressSnapshot,
  TaskRecord,
} from './progress_calculator.types';

export { parse } from './task_parser';

/**
 * Rounds to one decimal place.
 */
function roundOneDecimal(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Counts records per status. An empty list yields a zero snapshot.
 */
export function aggregate(records: readonly TaskRecord[]): ProgressSnapshot {
  const snapshot: ProgressSnapshot = {
    total: records.length,
    completed: 0,
    inProgress: 0,
    blocked: 0,
    pending: 0,
    percentage: 0,
  };

  for (const record of records) {
    switch (record.status) {
      case 'done':
        snapshot.completed++;
        break;
      case 'in-progress':
        snapshot.inProgress++;
        break;
      case 'blocked':
        snapshot.blocked++;
        break;
      case 'pending':
        snapshot.pending++;
        break;
    }
  }

  if (snapshot.total > 0) {
    snapshot.percentage = roundOneDecimal((100 * snapshot.completed) / snapshot.total);
  }
  return snapshot;
}

/**
 * Adds several snapshots together, recomputing the percentage.
 */
export function combine(snapshots: readonly ProgressSnapshot[]): ProgressSnapshot {
  const sum = snapshots.reduce(
    (acc, snapshot) => ({
      total: acc.total + snapshot.total,
      completed: acc.completed + snapshot.completed,
      inProgress: acc.inProgress + snapshot.inProgress,
      blocked: acc.blocked + snapshot.blocked,
      pending: acc.pending + snapshot.pending,
      percentage: 0,
    }),
    { total: 0, completed: 0, inProgress: 0, blocked: 0, pending: 0, percentage: 0 }
  );
  sum.percentage = sum.total > 0 ? roundOneDecimal((100 * sum.completed) / sum.total) : 0;
  return sum;
}

/**
 * Estimates the milliseconds until all tasks are done, from the velocity between
 * the first and last sample. Returns null when there is no forward progress to
 * extrapolate (fewer than two samples, no elapsed time, or velocity <= 0).
 *
 * @param total - task count to finish; defaults to the last sample's total
 */
export function estimateCompletion(history: readonly ProgressSample[], total?: number): number | null {
  if (history.length < 2) {
    return null;
  }

  const ordered = [...history].sort((a, b) => a.timestamp - b.timestamp);
  const first = ordered[0];
  const last = ordered[ordered.length - 1];
  if (!first || !last) {
    return null;
  }

  const elapsed = last.timestamp - first.timestamp;
  if (elapsed <= 0) {
    return null;
  }

  const velocity = (last.completed - first.completed) / elapsed;
  if (velocity <= 0) {
    return null;
  }

  const remaining = (total ?? last.total) - last.completed;
  if (remaining <= 0) {
    return 0;
  }
  return Math.round(remaining / velocity);
}

/**
 * Lists tasks whose dependencies reference ids not in `knownIds`.
 */
export function findDanglingDependencies(
  records: readonly TaskRecord[],
  knownIds: Iterable<string>
): DanglingDependency[] {
  const known = new Set(knownIds);
  const dangling: DanglingDependency[] = [];
  for (const record of records) {
    const missing = record.dependsOn.filter(id => !known.has(id));
    if (missing.length > 0) {
      dangling.push({ taskId: record.taskId, missing });
    }
  }
  return dangling;
}
