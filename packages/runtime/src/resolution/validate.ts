// Validation pass
//
// Sanity checks on reduced output before it is handed off.

import {
  compareRepositoryKeys,
  repositoryKeyId,
  type EffectivePermission,
  type RepositoryKey,
  type ResolutionInput,
  type ZeroOutputRepositoryDiagnostic,
} from '@permsync/protocol';
import type { DuplicatePair } from '../errors.js';
import { compareEffectivePermissions, pairKey } from './reduce.js';

export type ValidationResult = {
  /** Pairs that occur more than once; any entry makes the result unusable */
  duplicates: DuplicatePair[];

  /** Repositories that had grants but produced no effective permission */
  diagnostics: ZeroOutputRepositoryDiagnostic[];
};

/**
 * Find (repository, email) pairs that occur more than once.
 */
export function findDuplicatePairs(permissions: readonly EffectivePermission[]): DuplicatePair[] {
  const counts = new Map<string, { permission: EffectivePermission; count: number }>();
  for (const permission of permissions) {
    const key = pairKey(permission);
    const entry = counts.get(key);
    if (entry) {
      entry.count++;
    } else {
      counts.set(key, { permission, count: 1 });
    }
  }

  return Array.from(counts.values())
    .filter((entry) => entry.count > 1)
    .sort((a, b) => compareEffectivePermissions(a.permission, b.permission))
    .map(({ permission, count }) => ({
      repository: permission.repository,
      email: permission.email,
      count,
    }));
}

/**
 * Repositories present in the grant input with no effective permission in the output.
 */
export function findZeroOutputRepositories(
  input: ResolutionInput,
  permissions: readonly EffectivePermission[]
): ZeroOutputRepositoryDiagnostic[] {
  const inputRepositories = new Map<string, RepositoryKey>();
  for (const grant of [...input.directGrants, ...input.groupGrants]) {
    inputRepositories.set(repositoryKeyId(grant.repository), grant.repository);
  }

  const covered = new Set(permissions.map((p) => repositoryKeyId(p.repository)));

  return Array.from(inputRepositories.entries())
    .filter(([id]) => !covered.has(id))
    .map(([, repository]) => repository)
    .sort(compareRepositoryKeys)
    .map((repository) => ({
      kind: 'zero-output-repository',
      severity: 'warning',
      repository,
    }));
}

/**
 * Run all checks on a reduced result.
 */
export function validateResolution(
  input: ResolutionInput,
  permissions: readonly EffectivePermission[]
): ValidationResult {
  return {
    duplicates: findDuplicatePairs(permissions),
    diagnostics: findZeroOutputRepositories(input, permissions),
  };
}
