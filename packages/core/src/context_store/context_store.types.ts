/**
 * The feature commands act on when none is named explicitly.
 */
export type ActiveFeature = {
  /** Zero-padded feature number, e.g. "001" */
  featureId: string;
  featureName: string;
  /** Feature directory name, e.g. "001-user-auth" */
  directory: string;
  /** ISO-8601 timestamp of the last switch */
  updatedAt: string;
};

/**
 * Persistence for the active feature pointer.
 *
 * Implementations:
 * - FsContextStore: `{memory}/context.md`
 * - MemoryContextStore: In-memory (tests)
 */
export interface ContextStore {
  /**
   * @returns the active feature, or null when none is recorded
   */
  getActiveFeature(): Promise<ActiveFeature | null>;

  /**
   * Records the active feature, leaving the rest of the document intact.
   */
  setActiveFeature(feature: ActiveFeature): Promise<void>;
}
