import type { ProgressSample } from '../../progress_calculator';
import type { ProgressHistoryStore } from '../progress_history.types';

/**
 * In-memory ProgressHistoryStore for tests.
 */
export class MemoryProgressHistoryStore implements ProgressHistoryStore {
  private readonly features = new Map<string, ProgressSample[]>();

  async load(featureKey: string): Promise<ProgressSample[]> {
    return [...(this.features.get(featureKey) ?? [])];
  }

  async save(featureKey: string, samples: ProgressSample[]): Promise<void> {
    this.features.set(featureKey, [...samples]);
  }
}
