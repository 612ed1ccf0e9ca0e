// Tests for grant extraction

import { describe, it, expect } from 'vitest';
import { createInMemoryGrantSource, SourceRequestError, type GrantSource } from '@permsync/repositories';
import { extractGrants } from './extract.js';
import { createCapturingLogger } from '../logging.js';

function sampleSource() {
  return createInMemoryGrantSource({
    projects: [
      {
        key: 'PROJ',
        repositories: [
          {
            slug: 'repo1',
            userPermissions: [
              { user: { name: 'alice', slug: 'alice', emailAddress: 'alice@example.com' }, permission: 'REPO_WRITE' },
              { user: { name: 'bob', slug: 'bob' }, permission: 'REPO_READ' },
            ],
            groupPermissions: [
              { groupName: 'web', permission: 'REPO_WRITE' },
              { groupName: 'Admins', permission: 'REPO_ADMIN' },
            ],
          },
          { slug: 'repo2', groupPermissions: [{ groupName: 'web', permission: 'REPO_READ' }] },
        ],
      },
      { key: 'OTHER', repositories: [{ slug: 'tools' }] },
    ],
    groups: {
      web: [{ name: 'bob', slug: 'bob' }, { name: 'carol', emailAddress: 'carol@example.com' }],
      Admins: [{ name: 'dave', slug: 'dave' }],
    },
    users: [{ name: 'bob', slug: 'bob', emailAddress: 'bob@example.com' }],
  });
}

describe('extractGrants', () => {
  it('writes direct grants, group grants and sorted group members', async () => {
    const source = sampleSource();

    const { tables, counts } = await extractGrants(source);

    expect(tables.directGrants).toEqual([
      {
        project_key: 'PROJ',
        repo_slug: 'repo1',
        principal_type: 'user',
        principal_name: 'alice',
        email: 'alice@example.com',
        permission: 'REPO_WRITE',
      },
      {
        project_key: 'PROJ',
        repo_slug: 'repo1',
        principal_type: 'user',
        principal_name: 'bob',
        email: 'bob@example.com',
        permission: 'REPO_READ',
      },
    ]);
    expect(tables.groupGrants.map((row) => `${row.repo_slug}:${row.principal_name}:${row.permission}`)).toEqual([
      'repo1:web:REPO_WRITE',
      'repo1:Admins:REPO_ADMIN',
      'repo2:web:REPO_READ',
    ]);
    expect(tables.memberships).toEqual([
      { group: 'Admins', user_identifier: 'dave', email: '' },
      { group: 'web', user_identifier: 'bob', email: 'bob@example.com' },
      { group: 'web', user_identifier: 'carol', email: 'carol@example.com' },
    ]);
    expect(counts).toEqual({
      projects: 2,
      repositories: 3,
      directGrants: 2,
      groupGrants: 3,
      groups: 2,
      memberships: 3,
      emailLookups: 2,
    });
  });

  it('looks up each user without an email once', async () => {
    const source = sampleSource();

    await extractGrants(source);

    expect(source.lookups).toEqual(['bob', 'dave']);
  });

  it('restricts to the given projects and repositories', async () => {
    const { counts } = await extractGrants(sampleSource(), { projectKeys: ['PROJ'], repoSlugs: ['repo2'] });

    expect(counts.projects).toBe(1);
    expect(counts.repositories).toBe(1);
    expect(counts.directGrants).toBe(0);
    expect(counts.groups).toBe(1);
  });

  it('keeps going when a user lookup fails', async () => {
    const base = sampleSource();
    const source: GrantSource = {
      ...base,
      async findUser(nameOrSlug: string) {
        throw new SourceRequestError(`Server error looking up ${nameOrSlug}`, { url: 'memory://users', status: 500 });
      },
    };
    const logger = createCapturingLogger();

    const { tables } = await extractGrants(source, { logger });

    expect(tables.directGrants[1]?.email).toBe('');
    const warnings = logger.entries.filter((entry) => entry.level === 'warn');
    expect(warnings.map((entry) => [entry.message, entry.data])).toEqual([
      ['User lookup failed', { user: 'bob', error: 'Server error looking up bob' }],
      ['User lookup failed', { user: 'dave', error: 'Server error looking up dave' }],
    ]);
  });
});
