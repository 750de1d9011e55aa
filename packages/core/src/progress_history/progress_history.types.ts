import type { ProgressSample } from '../progress_calculator';

/**
 * On-disk shape of progress-history.json.
 */
export type ProgressHistoryFile = {
  version: 1;
  /** Keyed by feature directory name ('001-user-auth') */
  features: Record<string, ProgressSample[]>;
};

/**
 * Interface for progress history persistence.
 *
 * Implementations:
 * - FsProgressHistoryStore: {memory}/progress-history.json
 * - MemoryProgressHistoryStore: in-memory for tests
 */
export interface ProgressHistoryStore {
  /**
   * Samples for a feature, oldest first; empty when none were recorded.
   */
  load(featureKey: string): Promise<ProgressSample[]>;

  save(featureKey: string, samples: ProgressSample[]): Promise<void>;
}
