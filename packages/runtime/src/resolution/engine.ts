// Resolution engine
//
// Entry point for one resolution run: normalize → expand → reduce → validate.
// Synchronous and pure. Per-row problems become diagnostics; only a broken
// uniqueness invariant turns the result into an error.

import type { Diagnostic, EffectivePermission, ResolutionInput } from '@permsync/protocol';
import { ResolutionInvariantError } from '../errors.js';
import { normalizeIdentities } from './normalize.js';
import { buildMembershipIndex, expandGroupGrants } from './expand.js';
import { compareEffectivePermissions, directCandidates, reduceCandidates, type CandidateReducer } from './reduce.js';
import { partitionByRepository } from './partition.js';
import { validateResolution } from './validate.js';

export type ResolutionStats = {
  repositories: number;
  directCandidates: number;
  groupCandidates: number;
  effectivePermissions: number;
};

export type ResolutionSuccess = {
  ok: true;
  permissions: EffectivePermission[];
  diagnostics: Diagnostic[];
  stats: ResolutionStats;
};

export type ResolutionFailure = {
  ok: false;
  error: ResolutionInvariantError;
  diagnostics: Diagnostic[];
};

export type ResolutionResult = ResolutionSuccess | ResolutionFailure;

export type ResolveOptions = {
  /**
   * Replaces the strongest-wins reducer. Exists for experimenting with strategies;
   * whatever it returns still goes through validation.
   */
  reducer?: CandidateReducer;
};

/**
 * Resolve raw grants into exactly one effective permission per (repository, email).
 *
 * @example
 * const result = resolvePermissions({ directGrants, groupGrants, memberships });
 * if (!result.ok) throw result.error;
 */
export function resolvePermissions(input: ResolutionInput, options: ResolveOptions = {}): ResolutionResult {
  const reduce = options.reducer ?? reduceCandidates;

  const { normalized, diagnostics: normalizeDiagnostics } = normalizeIdentities(input);
  const index = buildMembershipIndex(normalized.memberships);
  const partitions = partitionByRepository(normalized.directGrants, normalized.groupGrants);

  const diagnostics: Diagnostic[] = [...normalizeDiagnostics];
  const permissions: EffectivePermission[] = [];
  let directCount = 0;
  let groupCount = 0;

  for (const partition of partitions) {
    const direct = directCandidates(partition.directGrants);
    const expanded = expandGroupGrants(partition.groupGrants, index);

    directCount += direct.length;
    groupCount += expanded.candidates.length;
    diagnostics.push(...expanded.diagnostics);
    permissions.push(...reduce([...direct, ...expanded.candidates]));
  }

  permissions.sort(compareEffectivePermissions);

  const validation = validateResolution(input, permissions);
  diagnostics.push(...validation.diagnostics);

  if (validation.duplicates.length > 0) {
    return {
      ok: false,
      error: new ResolutionInvariantError(validation.duplicates),
      diagnostics,
    };
  }

  return {
    ok: true,
    permissions,
    diagnostics,
    stats: {
      repositories: partitions.length,
      directCandidates: directCount,
      groupCandidates: groupCount,
      effectivePermissions: permissions.length,
    },
  };
}
