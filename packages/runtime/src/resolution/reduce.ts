// Strongest-wins reduction
//
// Merges every candidate for a (repository, email) pair into exactly one effective
// permission. Only the winner's provenance is kept.

import {
  compareCodeUnits,
  comparePermissionLevels,
  compareRepositoryKeys,
  type EffectivePermission,
} from '@permsync/protocol';
import type { NormalizedDirectGrant } from './normalize.js';

/**
 * Reducer signature, so alternative strategies can be plugged into the engine.
 */
export type CandidateReducer = (candidates: readonly EffectivePermission[]) => EffectivePermission[];

/**
 * Turn normalized direct grants into candidates.
 */
export function directCandidates(grants: readonly NormalizedDirectGrant[]): EffectivePermission[] {
  return grants.map((grant) => ({
    repository: grant.repository,
    email: grant.email,
    permission: grant.permission,
    source: 'direct',
  }));
}

/**
 * Order candidates so that the winner sorts first:
 * 1. Higher permission rank
 * 2. Direct before group
 * 3. Lexicographically smaller source principal
 */
export function compareCandidates(a: EffectivePermission, b: EffectivePermission): number {
  const byRank = comparePermissionLevels(b.permission, a.permission);
  if (byRank !== 0) return byRank;

  if (a.source !== b.source) {
    return a.source === 'direct' ? -1 : 1;
  }

  return compareCodeUnits(a.sourcePrincipal ?? '', b.sourcePrincipal ?? '');
}

/**
 * Output order: repository, then email.
 */
export function compareEffectivePermissions(a: EffectivePermission, b: EffectivePermission): number {
  return compareRepositoryKeys(a.repository, b.repository) || compareCodeUnits(a.email, b.email);
}

/**
 * Key identifying the (repository, email) pair of a permission.
 */
export function pairKey(permission: Pick<EffectivePermission, 'repository' | 'email'>): string {
  return JSON.stringify([permission.repository.projectKey, permission.repository.repoSlug, permission.email]);
}

/**
 * Select one winner per (repository, email).
 * The result does not depend on the order of the candidates.
 */
export const reduceCandidates: CandidateReducer = (candidates) => {
  const winners = new Map<string, EffectivePermission>();

  for (const candidate of candidates) {
    const key = pairKey(candidate);
    const current = winners.get(key);
    if (!current || compareCandidates(candidate, current) < 0) {
      winners.set(key, candidate);
    }
  }

  return Array.from(winners.values(), toOutput).sort(compareEffectivePermissions);
};

function toOutput(winner: EffectivePermission): EffectivePermission {
  const output: EffectivePermission = {
    repository: winner.repository,
    email: winner.email,
    permission: winner.permission,
    source: winner.source,
  };
  if (winner.source === 'group' && winner.sourcePrincipal !== undefined) {
    output.sourcePrincipal = winner.sourcePrincipal;
  }
  return output;
}
