import { Revision } from 'perf-types'

/**
 * The version control operations the performance test needs.
 */
export interface Vcs {
  /**
   * Lists revisions that touched `pathInRepo`, newest first, at most `limit` of them.
   */
  listRevisions(repoRoot: string, pathInRepo: string, limit: number): Promise<Revision[]>
  /**
   * Updates the working tree to `revision`, discarding local changes.
   */
  checkout(repoRoot: string, revision: Revision): Promise<void>
  /**
   * Reverts all files to their state at `revision`, without moving the working directory parent.
   */
  revert(repoRoot: string, revision: Revision): Promise<void>
  /**
   * Deletes all untracked (including ignored) files.
   */
  purge(repoRoot: string): Promise<void>
}
