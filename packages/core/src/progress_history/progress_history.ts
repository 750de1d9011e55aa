import type { ProgressSample, ProgressSnapshot } from '../progress_calculator';
import type { ProgressHistoryStore } from './progress_history.types';

/** Samples kept per feature. */
export const HISTORY_LIMIT = 50;

/**
 * Narrows parsed JSON to a ProgressSample.
 */
export function isProgressSample(value: unknown): value is ProgressSample {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'timestamp' in value && typeof value.timestamp === 'number' &&
    'completed' in value && typeof value.completed === 'number' &&
    'total' in value && typeof value.total === 'number'
  );
}

/**
 * Appends a sample when completed or total changed since the last one,
 * keeping at most `limit` samples.
 */
export function appendSample(
  history: readonly ProgressSample[],
  sample: ProgressSample,
  limit: number = HISTORY_LIMIT
): ProgressSample[] {
  const last = history[history.length - 1];
  if (last && last.completed === sample.completed && last.total === sample.total) {
    return [...history];
  }
  return [...history, sample].slice(-limit);
}

/**
 * ProgressHistory - records snapshots over time so status can estimate an ETA.
 */
export class ProgressHistory {
  constructor(
    private readonly store: ProgressHistoryStore,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Records the snapshot for a feature and returns the resulting history.
   */
  async record(featureKey: string, snapshot: ProgressSnapshot): Promise<ProgressSample[]> {
    const history = await this.store.load(featureKey);
    const updated = appendSample(history, {
      timestamp: this.now(),
      completed: snapshot.completed,
      total: snapshot.total,
    });
    if (updated.length !== history.length || updated[updated.length - 1] !== history[history.length - 1]) {
      await this.store.save(featureKey, updated);
    }
    return updated;
  }
}
