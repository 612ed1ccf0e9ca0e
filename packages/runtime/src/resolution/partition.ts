// Partitioning by repository
//
// Grants for different repositories never interact, so each repository can be
// expanded and reduced on its own. Memberships are not partitioned.

import {
  compareRepositoryKeys,
  repositoryKeyId,
  type GroupGrant,
  type RepositoryKey,
} from '@permsync/protocol';
import type { NormalizedDirectGrant } from './normalize.js';

export type RepositoryPartition = {
  repository: RepositoryKey;
  directGrants: NormalizedDirectGrant[];
  groupGrants: GroupGrant[];
};

/**
 * Split grants into one partition per repository, ordered by repository.
 */
export function partitionByRepository(
  directGrants: readonly NormalizedDirectGrant[],
  groupGrants: readonly GroupGrant[]
): RepositoryPartition[] {
  const partitions = new Map<string, RepositoryPartition>();

  const partitionFor = (repository: RepositoryKey): RepositoryPartition => {
    const id = repositoryKeyId(repository);
    let partition = partitions.get(id);
    if (!partition) {
      partition = { repository, directGrants: [], groupGrants: [] };
      partitions.set(id, partition);
    }
    return partition;
  };

  for (const grant of directGrants) {
    partitionFor(grant.repository).directGrants.push(grant);
  }
  for (const grant of groupGrants) {
    partitionFor(grant.repository).groupGrants.push(grant);
  }

  return Array.from(partitions.values()).sort((a, b) =>
    compareRepositoryKeys(a.repository, b.repository)
  );
}
