// Group expansion
//
// A relational join of group grants with memberships. Produces one candidate per
// (group grant, member); no strength comparison happens here.

import type { EffectivePermission, EmptyGroupDiagnostic, GroupGrant } from '@permsync/protocol';
import type { NormalizedMembership } from './normalize.js';

/**
 * Group name → distinct members. Built once per resolution run and discarded with it.
 */
export type MembershipIndex = ReadonlyMap<string, readonly NormalizedMembership[]>;

export type ExpandResult = {
  candidates: EffectivePermission[];
  diagnostics: EmptyGroupDiagnostic[];
};

/**
 * Index memberships by exact group name.
 * Repeated rows for the same (group, email) collapse to the first one.
 */
export function buildMembershipIndex(memberships: readonly NormalizedMembership[]): MembershipIndex {
  const index = new Map<string, NormalizedMembership[]>();
  const seen = new Set<string>();

  for (const membership of memberships) {
    const key = JSON.stringify([membership.groupName, membership.email]);
    if (seen.has(key)) continue;
    seen.add(key);

    const members = index.get(membership.groupName);
    if (members) {
      members.push(membership);
    } else {
      index.set(membership.groupName, [membership]);
    }
  }

  return index;
}

/**
 * Expand group grants into per-user candidates.
 *
 * A group with no known members yields no candidates and one informational
 * diagnostic per (repository, group).
 */
export function expandGroupGrants(
  groupGrants: readonly GroupGrant[],
  index: MembershipIndex
): ExpandResult {
  const candidates: EffectivePermission[] = [];
  const diagnostics: EmptyGroupDiagnostic[] = [];
  const reportedEmpty = new Set<string>();

  for (const grant of groupGrants) {
    const groupName = grant.principal.name;
    const members = index.get(groupName) ?? [];

    if (members.length === 0) {
      const key = JSON.stringify([grant.repository.projectKey, grant.repository.repoSlug, groupName]);
      if (!reportedEmpty.has(key)) {
        reportedEmpty.add(key);
        diagnostics.push({
          kind: 'empty-group',
          severity: 'info',
          repository: grant.repository,
          groupName,
        });
      }
      continue;
    }

    for (const member of members) {
      candidates.push({
        repository: grant.repository,
        email: member.email,
        permission: grant.permission,
        source: 'group',
        sourcePrincipal: groupName,
      });
    }
  }

  return { candidates, diagnostics };
}
