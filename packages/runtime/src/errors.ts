// Runtime error types

import { PermsyncError, type Email, type RepositoryKey } from '@permsync/protocol';

/**
 * A (repository, email) pair that appears more than once in a reduced result.
 */
export type DuplicatePair = {
  repository: RepositoryKey;
  email: Email;
  count: number;
};

/**
 * The reducer emitted ambiguous output. Indicates a bug in the reduction itself,
 * so the run is aborted rather than emitting the data.
 */
export class ResolutionInvariantError extends PermsyncError {
  readonly duplicates: DuplicatePair[];

  constructor(duplicates: DuplicatePair[]) {
    const sample = duplicates
      .slice(0, 5)
      .map((d) => `${d.repository.projectKey}/${d.repository.repoSlug} ${d.email} (x${d.count})`)
      .join(', ');
    super(
      'RESOLUTION_INVARIANT_VIOLATION',
      `Internal consistency error: ${duplicates.length} (repository, email) pair(s) resolved more than once: ${sample}`
    );
    this.name = 'ResolutionInvariantError';
    this.duplicates = duplicates;
  }
}
