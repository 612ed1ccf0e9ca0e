// Tests for grant application

import { describe, it, expect } from 'vitest';
import type { EffectivePermission } from '@permsync/protocol';
import { createIdentityMap, createInMemoryCollaboratorTarget } from '@permsync/repositories';
import { applyEffectivePermissions, defaultTargetName } from './applier.js';
import { createCapturingLogger } from '../logging.js';

const repo1 = { projectKey: 'PROJ', repoSlug: 'repo1' };
const repo2 = { projectKey: 'PROJ', repoSlug: 'repo2' };

const identity = createIdentityMap([
  ['alice@example.com', 'alice-gh'],
  ['bob@example.com', 'bob-gh'],
]);

function permission(email: string, level: EffectivePermission['permission'], repository = repo1): EffectivePermission {
  return { repository, email, permission: level, source: 'direct' };
}

describe('defaultTargetName', () => {
  it('joins project key and slug under the organization', () => {
    expect(defaultTargetName('acme', repo1)).toBe('acme/PROJ-repo1');
  });
});

describe('applyEffectivePermissions', () => {
  it('grants missing permissions and leaves matching ones alone', async () => {
    const target = createInMemoryCollaboratorTarget({
      repositories: ['acme/PROJ-repo1'],
      collaborators: { 'acme/PROJ-repo1': { 'alice-gh': 'push' } },
    });

    const summary = await applyEffectivePermissions(
      target,
      [permission('alice@example.com', 'WRITE'), permission('bob@example.com', 'ADMIN')],
      { org: 'acme', identity }
    );

    expect(target.writes).toEqual([{ fullName: 'acme/PROJ-repo1', login: 'bob-gh', permission: 'admin' }]);
    expect(summary).toMatchObject({ granted: 1, unchanged: 1, planned: 0, skipped: 0, failed: 0, dryRun: false });
  });

  it('upgrades a weaker existing permission', async () => {
    const target = createInMemoryCollaboratorTarget({
      repositories: ['acme/PROJ-repo1'],
      collaborators: { 'acme/PROJ-repo1': { 'alice-gh': 'pull' } },
    });

    await applyEffectivePermissions(target, [permission('alice@example.com', 'ADMIN')], { org: 'acme', identity });

    expect(target.permissions.get('acme/PROJ-repo1')?.get('alice-gh')).toBe('admin');
  });

  it('writes nothing in dry-run mode', async () => {
    const target = createInMemoryCollaboratorTarget({ repositories: ['acme/PROJ-repo1'] });

    const summary = await applyEffectivePermissions(target, [permission('alice@example.com', 'READ')], {
      org: 'acme',
      identity,
      dryRun: true,
    });

    expect(target.writes).toEqual([]);
    expect(summary.planned).toBe(1);
    expect(summary.results).toEqual([
      { fullName: 'acme/PROJ-repo1', email: 'alice@example.com', login: 'alice-gh', permission: 'pull', outcome: 'planned' },
    ]);
  });

  it('skips unmapped emails unless a default login is configured', async () => {
    const target = createInMemoryCollaboratorTarget({ repositories: ['acme/PROJ-repo1'] });
    const unmapped = [permission('carol@example.com', 'WRITE')];

    const skipped = await applyEffectivePermissions(target, unmapped, { org: 'acme', identity });
    expect(skipped.skipped).toBe(1);
    expect(target.writes).toEqual([]);

    const defaulted = await applyEffectivePermissions(target, unmapped, {
      org: 'acme',
      identity,
      defaultLogin: 'migration-bot',
    });
    expect(defaulted.granted).toBe(1);
    expect(target.writes).toEqual([{ fullName: 'acme/PROJ-repo1', login: 'migration-bot', permission: 'push' }]);
  });

  it('counts every entry of an inaccessible repository as failed', async () => {
    const target = createInMemoryCollaboratorTarget({ repositories: ['acme/PROJ-repo2'] });
    const logger = createCapturingLogger();

    const summary = await applyEffectivePermissions(
      target,
      [
        permission('bob@example.com', 'READ', repo2),
        permission('alice@example.com', 'READ'),
        permission('bob@example.com', 'READ'),
      ],
      { org: 'acme', identity, logger }
    );

    expect(summary.failed).toBe(2);
    expect(summary.granted).toBe(1);
    expect(summary.results.map((r) => `${r.fullName}:${r.email}:${r.outcome}`)).toEqual([
      'acme/PROJ-repo1:alice@example.com:failed',
      'acme/PROJ-repo1:bob@example.com:failed',
      'acme/PROJ-repo2:bob@example.com:granted',
    ]);
    const errors = logger.entries.filter((entry) => entry.level === 'error');
    expect(errors.map((entry) => [entry.message, entry.data])).toEqual([
      ['Cannot access repository', { repository: 'acme/PROJ-repo1', error: 'not found' }],
    ]);
  });

  it('continues after a failed write', async () => {
    const target = createInMemoryCollaboratorTarget({
      repositories: ['acme/PROJ-repo1'],
      failingLogins: ['alice-gh'],
    });

    const summary = await applyEffectivePermissions(
      target,
      [permission('alice@example.com', 'WRITE'), permission('bob@example.com', 'WRITE')],
      { org: 'acme', identity }
    );

    expect(summary.failed).toBe(1);
    expect(summary.granted).toBe(1);
    expect(summary.results[0]).toMatchObject({ login: 'alice-gh', outcome: 'failed', reason: 'Validation failed for alice-gh' });
  });

  it('uses a custom target name', async () => {
    const target = createInMemoryCollaboratorTarget({ repositories: ['acme/repo1'] });

    await applyEffectivePermissions(target, [permission('bob@example.com', 'READ')], {
      org: 'acme',
      identity,
      targetName: (org, repository) => `${org}/${repository.repoSlug}`,
    });

    expect(target.writes).toEqual([{ fullName: 'acme/repo1', login: 'bob-gh', permission: 'pull' }]);
  });
});
