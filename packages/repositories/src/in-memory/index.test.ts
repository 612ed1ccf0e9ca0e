// Tests for the in-memory collaborators

import { describe, it, expect } from 'vitest';
import {
  createIdentityMap,
  createInMemoryCollaboratorTarget,
  createInMemoryGrantSource,
} from './index.js';
import { TargetRequestError } from '../errors.js';

describe('createIdentityMap', () => {
  it('resolves emails case-insensitively and ignores incomplete pairs', () => {
    const map = createIdentityMap([
      [' Alice@Example.com ', 'alice-gh'],
      ['bob@example.com', ''],
      ['', 'nobody'],
    ]);

    expect(map.size).toBe(1);
    expect(map.resolve('alice@example.com')).toBe('alice-gh');
    expect(map.resolve('ALICE@EXAMPLE.COM')).toBe('alice-gh');
    expect(map.resolve('bob@example.com')).toBeUndefined();
  });

  it('keeps the last login for a repeated email', () => {
    const map = createIdentityMap([
      ['a@example.com', 'first'],
      ['A@example.com', 'second'],
    ]);
    expect(map.resolve('a@example.com')).toBe('second');
  });
});

describe('createInMemoryGrantSource', () => {
  it('filters projects and repositories and records user lookups', async () => {
    const source = createInMemoryGrantSource({
      projects: [
        { key: 'A', repositories: [{ slug: 'one' }, { slug: 'two' }] },
        { key: 'B', repositories: [{ slug: 'three' }] },
      ],
      users: [{ name: 'alice', emailAddress: 'alice@example.com' }],
    });

    const keys: string[] = [];
    for await (const project of source.listProjects(['A'])) keys.push(project.key);
    const slugs: string[] = [];
    for await (const repo of source.listRepositories('A', ['two'])) slugs.push(repo.slug);

    expect(keys).toEqual(['A']);
    expect(slugs).toEqual(['two']);
    expect(await source.findUser('alice')).toEqual({ name: 'alice', emailAddress: 'alice@example.com' });
    expect(source.lookups).toEqual(['alice']);
  });
});

describe('createInMemoryCollaboratorTarget', () => {
  it('records writes and updates current permissions', async () => {
    const target = createInMemoryCollaboratorTarget({ repositories: ['acme/r'] });

    await target.setCollaboratorPermission('acme/r', 'alice', 'push');

    expect(await target.getCollaboratorPermission('acme/r', 'alice')).toBe('push');
    expect(target.writes).toEqual([{ fullName: 'acme/r', login: 'alice', permission: 'push' }]);
  });

  it('fails writes to unknown repositories and failing logins', async () => {
    const target = createInMemoryCollaboratorTarget({ repositories: ['acme/r'], failingLogins: ['ghost'] });

    await expect(target.setCollaboratorPermission('acme/x', 'alice', 'pull')).rejects.toBeInstanceOf(
      TargetRequestError
    );
    await expect(target.setCollaboratorPermission('acme/r', 'ghost', 'pull')).rejects.toThrow(
      'Validation failed for ghost'
    );
    expect(target.writes).toEqual([]);
  });
});
