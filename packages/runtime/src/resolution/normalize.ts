// Identity normalization
//
// Reduces raw grant and membership records to a canonical per-email view.
// Email is the only identity key: it is trimmed and lower-cased, and usernames are
// never used for matching. Rows without a usable email are excluded and reported.

import type {
  Diagnostic,
  Email,
  GroupGrant,
  PermissionLevel,
  RepositoryKey,
  ResolutionInput,
} from '@permsync/protocol';

/**
 * A direct grant whose email has been validated and normalized.
 */
export type NormalizedDirectGrant = {
  repository: RepositoryKey;
  email: Email;
  principalName: string;
  permission: PermissionLevel;
};

/**
 * A membership whose email has been validated and normalized.
 */
export type NormalizedMembership = {
  groupName: string;
  userIdentifier: string;
  email: Email;
};

export type NormalizedInput = {
  directGrants: NormalizedDirectGrant[];
  groupGrants: GroupGrant[];
  memberships: NormalizedMembership[];
};

export type NormalizeResult = {
  normalized: NormalizedInput;
  diagnostics: Diagnostic[];
};

/**
 * Canonical form of an email address.
 *
 * @returns The trimmed, lower-cased email, or undefined if nothing is left
 */
export function normalizeEmail(raw: string | null | undefined): Email | undefined {
  const email = raw?.trim().toLowerCase();
  return email ? email : undefined;
}

/**
 * Normalize identities across all input records.
 *
 * Group grants pass through unchanged: group names are matched exactly.
 */
export function normalizeIdentities(input: ResolutionInput): NormalizeResult {
  const diagnostics: Diagnostic[] = [];
  const directGrants: NormalizedDirectGrant[] = [];
  const memberships: NormalizedMembership[] = [];

  for (const grant of input.directGrants) {
    const email = normalizeEmail(grant.principal.email);
    if (!email) {
      diagnostics.push({
        kind: 'skipped-missing-email',
        severity: 'warning',
        record: 'direct-grant',
        repository: grant.repository,
        principalName: grant.principal.name,
      });
      continue;
    }
    directGrants.push({
      repository: grant.repository,
      email,
      principalName: grant.principal.name,
      permission: grant.permission,
    });
  }

  for (const membership of input.memberships) {
    const email = normalizeEmail(membership.email);
    if (!email) {
      diagnostics.push({
        kind: 'skipped-missing-email',
        severity: 'warning',
        record: 'membership',
        groupName: membership.groupName,
        userIdentifier: membership.userIdentifier,
      });
      continue;
    }
    memberships.push({
      groupName: membership.groupName,
      userIdentifier: membership.userIdentifier,
      email,
    });
  }

  return {
    normalized: {
      directGrants,
      groupGrants: [...input.groupGrants],
      memberships,
    },
    diagnostics,
  };
}
