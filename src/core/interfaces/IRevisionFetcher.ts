import type { PinnedRevision } from '../entities/DerivationSpec.js';

/**
 * IRevisionFetcher - Materializes repository revisions as store snapshots
 */
export interface IRevisionFetcher {
  /**
   * Root of the repository containing `directory`.
   */
  findRepositoryRoot(directory: string): Promise<string>;

  /**
   * Resolve `revision` to a commit and copy that tree into the store.
   */
  fetch(repositoryRoot: string, revision: string): Promise<PinnedRevision>;
}
