import type { ActiveFeature, ContextStore } from '../context_store.types';
import { parseActiveFeature, updateActiveFeature } from '../context_document';

/**
 * In-memory ContextStore. Keeps the rendered document so tests can assert on it.
 */
export class MemoryContextStore implements ContextStore {
  private content: string | null;

  constructor(content: string | null = null) {
    this.content = content;
  }

  async getActiveFeature(): Promise<ActiveFeature | null> {
    return this.content === null ? null : parseActiveFeature(this.content);
  }

  async setActiveFeature(feature: ActiveFeature): Promise<void> {
    this.content = updateActiveFeature(this.content, feature);
  }

  getContent(): string | null {
    return this.content;
  }
}
