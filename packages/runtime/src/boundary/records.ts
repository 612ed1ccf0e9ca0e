// Row ↔ record conversion
//
// Validates tabular rows and translates source permission names into canonical
// levels. Rows that cannot be used are excluded and reported, never thrown.

import {
  DirectGrantRowSchema,
  EffectivePermissionRowSchema,
  GroupGrantRowSchema,
  MembershipRowSchema,
  parseRow,
  translateSourcePermission,
  type CsvRow,
  type Diagnostic,
  type DirectGrant,
  type EffectivePermission,
  type EffectivePermissionRow,
  type GroupGrant,
  type Membership,
  type PermissionLevel,
  type RawGrantTables,
  type ResolutionInput,
  type TableName,
} from '@permsync/protocol';

export type RecordsResult = {
  input: ResolutionInput;
  diagnostics: Diagnostic[];
};

/**
 * Convert the three raw input tables into resolution input.
 */
export function recordsFromRows(tables: RawGrantTables): RecordsResult {
  const diagnostics: Diagnostic[] = [];
  const directGrants: DirectGrant[] = [];
  const groupGrants: GroupGrant[] = [];
  const memberships: Membership[] = [];

  for (const row of tables.directGrants) {
    const parsed = parseRow(DirectGrantRowSchema, row.values);
    if (!parsed.success) {
      diagnostics.push(invalidRow('direct-grants', row, parsed.reason));
      continue;
    }
    const permission = translate('direct-grants', row, parsed.data.permission, diagnostics);
    if (!permission) continue;

    const { email, principal_name: name } = parsed.data;
    directGrants.push({
      repository: { projectKey: parsed.data.project_key, repoSlug: parsed.data.repo_slug },
      principal: email ? { kind: 'user', name, email } : { kind: 'user', name },
      permission,
    });
  }

  for (const row of tables.groupGrants) {
    const parsed = parseRow(GroupGrantRowSchema, row.values);
    if (!parsed.success) {
      diagnostics.push(invalidRow('group-grants', row, parsed.reason));
      continue;
    }
    const permission = translate('group-grants', row, parsed.data.permission, diagnostics);
    if (!permission) continue;

    groupGrants.push({
      repository: { projectKey: parsed.data.project_key, repoSlug: parsed.data.repo_slug },
      principal: { kind: 'group', name: parsed.data.principal_name },
      permission,
    });
  }

  for (const row of tables.memberships) {
    const parsed = parseRow(MembershipRowSchema, row.values);
    if (!parsed.success) {
      diagnostics.push(invalidRow('memberships', row, parsed.reason));
      continue;
    }
    const { group, user_identifier: userIdentifier, email } = parsed.data;
    memberships.push(email ? { groupName: group, userIdentifier, email } : { groupName: group, userIdentifier });
  }

  return { input: { directGrants, groupGrants, memberships }, diagnostics };
}

/**
 * Row form of an effective permission.
 */
export function toEffectivePermissionRow(permission: EffectivePermission): EffectivePermissionRow {
  return {
    project_key: permission.repository.projectKey,
    repo_slug: permission.repository.repoSlug,
    email: permission.email,
    permission: permission.permission,
    source: permission.source,
    source_principal: permission.source === 'group' ? (permission.sourcePrincipal ?? '') : '',
  };
}

export type EffectivePermissionsResult = {
  permissions: EffectivePermission[];
  invalid: Array<{ line: number; reason: string }>;
};

/**
 * Parse rows of the effective permissions table, as consumed by apply.
 * Emails are lower-cased so they match the identity mapping.
 */
export function effectivePermissionsFromRows(rows: readonly CsvRow[]): EffectivePermissionsResult {
  const permissions: EffectivePermission[] = [];
  const invalid: Array<{ line: number; reason: string }> = [];

  for (const row of rows) {
    const parsed = parseRow(EffectivePermissionRowSchema, row.values);
    if (!parsed.success) {
      invalid.push({ line: row.line, reason: parsed.reason });
      continue;
    }
    const permission = translateSourcePermission(parsed.data.permission);
    if (!permission) {
      invalid.push({ line: row.line, reason: `permission: unknown value "${parsed.data.permission}"` });
      continue;
    }

    const base = {
      repository: { projectKey: parsed.data.project_key, repoSlug: parsed.data.repo_slug },
      email: parsed.data.email.toLowerCase(),
      permission,
    };
    permissions.push(
      parsed.data.source === 'group' && parsed.data.source_principal
        ? { ...base, source: 'group', sourcePrincipal: parsed.data.source_principal }
        : { ...base, source: parsed.data.source }
    );
  }

  return { permissions, invalid };
}

function translate(
  table: TableName,
  row: CsvRow,
  raw: string,
  diagnostics: Diagnostic[]
): PermissionLevel | undefined {
  const permission = translateSourcePermission(raw);
  if (!permission) {
    diagnostics.push({ kind: 'unknown-permission', severity: 'warning', table, line: row.line, permission: raw });
  }
  return permission;
}

function invalidRow(table: TableName, row: CsvRow, reason: string): Diagnostic {
  return { kind: 'invalid-row', severity: 'warning', table, line: row.line, reason };
}
