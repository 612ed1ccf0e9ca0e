// Determinism checking
//
// Re-runs resolution over reordered copies of the same input and compares the
// produced sets. Output must not depend on input order.

import type { EffectivePermission, ResolutionInput } from '@permsync/protocol';
import { resolvePermissions, type ResolutionResult, type ResolveOptions } from './engine.js';
import { pairKey } from './reduce.js';

/**
 * Options for determinism checking
 */
export type DeterminismCheckOptions = ResolveOptions & {
  /**
   * Number of permutations to evaluate, including the original order (default: 3)
   */
  iterations?: number;
};

/**
 * Result of a determinism check
 */
export type DeterminismCheckResult = {
  isDeterministic: boolean;

  /**
   * Number of iterations performed
   */
  iterations: number;

  /**
   * Human-readable differences against the first iteration (empty if deterministic)
   */
  differences: string[];

  /**
   * Result for the input in its original order
   */
  baseline: ResolutionResult;
};

/**
 * Deterministic reordering of every input array.
 * 0 is the identity, 1 reverses, higher values rotate by that many positions.
 */
export function permuteInput(input: ResolutionInput, permutation: number): ResolutionInput {
  return {
    directGrants: reorder(input.directGrants, permutation),
    groupGrants: reorder(input.groupGrants, permutation),
    memberships: reorder(input.memberships, permutation),
  };
}

function reorder<T>(items: readonly T[], permutation: number): T[] {
  if (permutation === 0 || items.length < 2) return [...items];
  if (permutation === 1) return [...items].reverse();
  const offset = permutation % items.length;
  return [...items.slice(offset), ...items.slice(0, offset)];
}

/**
 * Check that resolution yields the same permission set regardless of input order.
 */
export function checkResolutionDeterminism(
  input: ResolutionInput,
  options: DeterminismCheckOptions = {}
): DeterminismCheckResult {
  const { iterations = 3, ...resolveOptions } = options;
  const count = Math.max(1, iterations);

  const baseline = resolvePermissions(input, resolveOptions);
  const expected = describeResult(baseline);
  const differences: string[] = [];

  for (let i = 1; i < count; i++) {
    const actual = describeResult(resolvePermissions(permuteInput(input, i), resolveOptions));
    differences.push(...compareDescriptions(expected, actual, i));
  }

  return {
    isDeterministic: differences.length === 0,
    iterations: count,
    differences,
    baseline,
  };
}

function describeResult(result: ResolutionResult): Map<string, string> {
  const described = new Map<string, string>();
  if (!result.ok) {
    described.set('error', result.error.message);
    return described;
  }
  for (const permission of result.permissions) {
    described.set(pairKey(permission), describePermission(permission));
  }
  return described;
}

function describePermission(permission: EffectivePermission): string {
  const origin = permission.source === 'group' ? `group:${permission.sourcePrincipal ?? ''}` : 'direct';
  return `${permission.permission} (${origin})`;
}

function compareDescriptions(
  expected: Map<string, string>,
  actual: Map<string, string>,
  iteration: number
): string[] {
  const differences: string[] = [];

  for (const [key, value] of expected) {
    const other = actual.get(key);
    if (other === undefined) {
      differences.push(`Iteration ${iteration}: missing ${key}`);
    } else if (other !== value) {
      differences.push(`Iteration ${iteration}: ${key} resolved to ${other}, expected ${value}`);
    }
  }

  for (const key of actual.keys()) {
    if (!expected.has(key)) {
      differences.push(`Iteration ${iteration}: unexpected ${key}`);
    }
  }

  return differences;
}
