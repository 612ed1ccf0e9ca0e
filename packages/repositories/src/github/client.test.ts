// Tests for the GitHub collaborator target

import { describe, it, expect } from 'vitest';
import { createGitHubClient } from './client.js';
import { TargetRequestError } from '../errors.js';
import { createFetchStub } from '../testing/fetch-stub.js';

const API = 'https://api.github.com';

describe('GitHubClient', () => {
  describe('repositoryExists', () => {
    it('is true for a visible repository and false on 404', async () => {
      const stub = createFetchStub({ [`${API}/repos/acme/PROJ-repo1`]: { body: { full_name: 'acme/PROJ-repo1' } } });
      const client = createGitHubClient({ token: 'test-token' }, { fetch: stub.fetch });

      expect(await client.repositoryExists('acme/PROJ-repo1')).toBe(true);
      expect(await client.repositoryExists('acme/missing')).toBe(false);
    });

    it('raises on other failures', async () => {
      const stub = createFetchStub({ [`${API}/repos/acme/locked`]: { status: 403, body: { message: 'Forbidden' } } });
      const client = createGitHubClient({ token: 'test-token' }, { fetch: stub.fetch });

      await expect(client.repositoryExists('acme/locked')).rejects.toBeInstanceOf(TargetRequestError);
    });
  });

  describe('getCollaboratorPermission', () => {
    it('prefers the role name over the folded permission', async () => {
      const stub = createFetchStub({
        [`${API}/repos/acme/r/collaborators/alice/permission`]: {
          body: { permission: 'write', role_name: 'maintain' },
        },
        [`${API}/repos/acme/r/collaborators/bob/permission`]: { body: { permission: 'read' } },
      });
      const client = createGitHubClient({ token: 'test-token' }, { fetch: stub.fetch });

      expect(await client.getCollaboratorPermission('acme/r', 'alice')).toBe('maintain');
      expect(await client.getCollaboratorPermission('acme/r', 'bob')).toBe('pull');
    });

    it('returns null for non-collaborators', async () => {
      const stub = createFetchStub({
        [`${API}/repos/acme/r/collaborators/carol/permission`]: { body: { permission: 'none' } },
      });
      const client = createGitHubClient({ token: 'test-token' }, { fetch: stub.fetch });

      expect(await client.getCollaboratorPermission('acme/r', 'carol')).toBeNull();
      expect(await client.getCollaboratorPermission('acme/r', 'unknown')).toBeNull();
    });
  });

  describe('setCollaboratorPermission', () => {
    it('sends a PUT with the permission', async () => {
      const stub = createFetchStub({ [`PUT ${API}/repos/acme/r/collaborators/alice`]: { status: 204 } });
      const client = createGitHubClient({ token: 'test-token' }, { fetch: stub.fetch });

      await client.setCollaboratorPermission('acme/r', 'alice', 'push');

      expect(stub.requests).toHaveLength(1);
      expect(stub.requests[0]).toMatchObject({
        url: `${API}/repos/acme/r/collaborators/alice`,
        method: 'PUT',
        body: '{"permission":"push"}',
      });
      expect(stub.requests[0].headers.authorization).toBe('Bearer test-token');
      expect(stub.requests[0].headers['content-type']).toBe('application/json');
    });

    it('raises a TargetRequestError carrying the status', async () => {
      const stub = createFetchStub({
        [`PUT ${API}/repos/acme/r/collaborators/ghost`]: { status: 422, body: { message: 'Validation Failed' } },
      });
      const client = createGitHubClient({ token: 'test-token' }, { fetch: stub.fetch });

      const error = await client.setCollaboratorPermission('acme/r', 'ghost', 'pull').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TargetRequestError);
      expect(error instanceof TargetRequestError && error.status).toBe(422);
    });
  });

  it('uses a GitHub Enterprise API URL', async () => {
    const stub = createFetchStub({
      'https://github.example.com/api/v3/repos/acme/r': { body: { full_name: 'acme/r' } },
    });
    const client = createGitHubClient(
      { token: 'test-token', apiUrl: 'https://github.example.com/api/v3/' },
      { fetch: stub.fetch }
    );

    expect(await client.repositoryExists('acme/r')).toBe(true);
  });

  it('requires a token', () => {
    expect(() => createGitHubClient({ token: '' })).toThrow('GitHub token is required');
  });
});
