// Tests for row ↔ record conversion

import { describe, it, expect } from 'vitest';
import { parseCsv } from '@permsync/protocol';
import { effectivePermissionsFromRows, recordsFromRows, toEffectivePermissionRow } from './records.js';

const repo = { projectKey: 'PROJ', repoSlug: 'repo1' };

describe('recordsFromRows', () => {
  it('translates source permission names into levels', () => {
    const { input, diagnostics } = recordsFromRows({
      directGrants: parseCsv(
        'project_key,repo_slug,principal_type,principal_name,email,permission\n' +
          'PROJ,repo1,user,alice,Alice@Example.com,REPO_WRITE\n' +
          'PROJ,repo1,user,ghost,,repo_admin\n'
      ).rows,
      groupGrants: parseCsv(
        'project_key,repo_slug,principal_type,principal_name,permission\nPROJ,repo1,group,devs,ADMIN\n'
      ).rows,
      memberships: parseCsv('group,user_identifier,email\ndevs,bob,bob@example.com\ndevs,carol,\n').rows,
    });

    expect(diagnostics).toEqual([]);
    expect(input.directGrants).toEqual([
      { repository: repo, principal: { kind: 'user', name: 'alice', email: 'Alice@Example.com' }, permission: 'WRITE' },
      { repository: repo, principal: { kind: 'user', name: 'ghost' }, permission: 'ADMIN' },
    ]);
    expect(input.groupGrants).toEqual([
      { repository: repo, principal: { kind: 'group', name: 'devs' }, permission: 'ADMIN' },
    ]);
    expect(input.memberships).toEqual([
      { groupName: 'devs', userIdentifier: 'bob', email: 'bob@example.com' },
      { groupName: 'devs', userIdentifier: 'carol' },
    ]);
  });

  it('reports unknown permissions and invalid rows with their line numbers', () => {
    const { input, diagnostics } = recordsFromRows({
      directGrants: parseCsv(
        'project_key,repo_slug,principal_type,principal_name,email,permission\n' +
          ',repo1,user,alice,alice@example.com,REPO_READ\n' +
          'PROJ,repo1,user,bob,bob@example.com,PROJECT_CREATE\n'
      ).rows,
      groupGrants: parseCsv(
        'project_key,repo_slug,principal_type,principal_name,permission\nPROJ,repo1,user,devs,REPO_READ\n'
      ).rows,
      memberships: parseCsv('group,user_identifier,email\n,dave,dave@example.com\n').rows,
    });

    expect(input).toEqual({ directGrants: [], groupGrants: [], memberships: [] });
    expect(diagnostics).toEqual([
      {
        kind: 'invalid-row',
        severity: 'warning',
        table: 'direct-grants',
        line: 2,
        reason: 'project_key: must not be empty',
      },
      {
        kind: 'unknown-permission',
        severity: 'warning',
        table: 'direct-grants',
        line: 3,
        permission: 'PROJECT_CREATE',
      },
      {
        kind: 'invalid-row',
        severity: 'warning',
        table: 'group-grants',
        line: 2,
        reason: 'principal_type: must be "group"',
      },
      {
        kind: 'invalid-row',
        severity: 'warning',
        table: 'memberships',
        line: 2,
        reason: 'group: must not be empty',
      },
    ]);
  });
});

describe('effective permission rows', () => {
  it('omits the source principal for direct grants', () => {
    expect(
      toEffectivePermissionRow({ repository: repo, email: 'a@example.com', permission: 'READ', source: 'direct' })
    ).toEqual({
      project_key: 'PROJ',
      repo_slug: 'repo1',
      email: 'a@example.com',
      permission: 'READ',
      source: 'direct',
      source_principal: '',
    });
  });

  it('reads rows back into permissions', () => {
    const { rows } = parseCsv(
      'project_key,repo_slug,email,permission,source,source_principal\n' +
        'PROJ,repo1,A@Example.com,ADMIN,group,devs\n' +
        'PROJ,repo1,b@example.com,WRITE,direct,\n' +
        'PROJ,repo1,c@example.com,OWNER,direct,\n' +
        'PROJ,repo1,d@example.com,READ,inherited,\n'
    );

    const { permissions, invalid } = effectivePermissionsFromRows(rows);

    expect(permissions).toEqual([
      { repository: repo, email: 'a@example.com', permission: 'ADMIN', source: 'group', sourcePrincipal: 'devs' },
      { repository: repo, email: 'b@example.com', permission: 'WRITE', source: 'direct' },
    ]);
    expect(invalid.map((entry) => entry.line)).toEqual([4, 5]);
    expect(invalid[0]?.reason).toBe('permission: unknown value "OWNER"');
  });
});
