// In-memory collaborator implementations for development and testing
//
// Useful for:
// - Running the extract and apply phases without a Bitbucket or GitHub server
// - Fast unit testing of the orchestration code
//
// Data does not persist between restarts.

import type { TargetPermission } from '@permsync/protocol';
import type {
  GrantSource,
  SourceGroupPermission,
  SourceProject,
  SourceRepository,
  SourceUser,
  SourceUserPermission,
} from '../interfaces/grant-source.js';
import type { CollaboratorTarget } from '../interfaces/collaborator-target.js';
import type { IdentityMap } from '../interfaces/identity-map.js';
import { SourceRequestError, TargetRequestError } from '../errors.js';

// --- Identity map ---

/**
 * Build an identity map from (email, login) pairs.
 * Emails are trimmed and lower-cased; pairs with an empty side are ignored.
 * A later pair for the same email replaces an earlier one.
 */
export function createIdentityMap(entries: Iterable<readonly [string, string]>): IdentityMap {
  const logins = new Map<string, string>();
  for (const [rawEmail, rawLogin] of entries) {
    const email = rawEmail.trim().toLowerCase();
    const login = rawLogin.trim();
    if (email && login) {
      logins.set(email, login);
    }
  }

  return {
    resolve(email: string) {
      return logins.get(email.trim().toLowerCase());
    },
    get size() {
      return logins.size;
    },
  };
}

// --- Grant source ---

export type InMemoryRepository = {
  slug: string;
  userPermissions?: SourceUserPermission[];
  groupPermissions?: SourceGroupPermission[];
};

export type InMemoryProject = {
  key: string;
  name?: string;
  repositories: InMemoryRepository[];
};

export type InMemoryGrantSourceData = {
  projects: InMemoryProject[];

  /** Group name → members */
  groups?: Record<string, SourceUser[]>;

  /** Users returned by findUser, matched on name or slug */
  users?: SourceUser[];
};

/**
 * Create a GrantSource over fixed data.
 * `lookups` records every findUser call.
 */
export function createInMemoryGrantSource(
  data: InMemoryGrantSourceData
): GrantSource & { lookups: string[] } {
  const lookups: string[] = [];

  const findRepository = (projectKey: string, repoSlug: string): InMemoryRepository => {
    const repo = data.projects
      .find((p) => p.key === projectKey)
      ?.repositories.find((r) => r.slug === repoSlug);
    if (!repo) {
      throw new SourceRequestError(`Repository not found: ${projectKey}/${repoSlug}`, {
        url: `memory://${projectKey}/${repoSlug}`,
        status: 404,
      });
    }
    return repo;
  };

  return {
    lookups,

    async *listProjects(projectKeys?: readonly string[]): AsyncIterable<SourceProject> {
      for (const project of data.projects) {
        if (projectKeys && projectKeys.length > 0 && !projectKeys.includes(project.key)) continue;
        yield { key: project.key, name: project.name };
      }
    },

    async *listRepositories(projectKey: string, repoSlugs?: readonly string[]): AsyncIterable<SourceRepository> {
      const project = data.projects.find((p) => p.key === projectKey);
      for (const repo of project?.repositories ?? []) {
        if (repoSlugs && repoSlugs.length > 0 && !repoSlugs.includes(repo.slug)) continue;
        yield { projectKey, slug: repo.slug };
      }
    },

    async *listRepositoryUserPermissions(projectKey: string, repoSlug: string) {
      yield* findRepository(projectKey, repoSlug).userPermissions ?? [];
    },

    async *listRepositoryGroupPermissions(projectKey: string, repoSlug: string) {
      yield* findRepository(projectKey, repoSlug).groupPermissions ?? [];
    },

    async *listGroupMembers(groupName: string) {
      yield* data.groups?.[groupName] ?? [];
    },

    async findUser(nameOrSlug: string) {
      lookups.push(nameOrSlug);
      return data.users?.find((u) => u.name === nameOrSlug || u.slug === nameOrSlug) ?? null;
    },
  };
}

// --- Collaborator target ---

export type CollaboratorWrite = {
  fullName: string;
  login: string;
  permission: TargetPermission;
};

export type InMemoryCollaboratorTargetData = {
  /** Full names of existing repositories */
  repositories: string[];

  /** Full name → login → current permission */
  collaborators?: Record<string, Record<string, TargetPermission>>;

  /** Logins whose writes fail, to exercise error handling */
  failingLogins?: string[];
};

/**
 * Create a CollaboratorTarget over mutable in-memory state.
 * `writes` records every successful setCollaboratorPermission call.
 */
export function createInMemoryCollaboratorTarget(
  data: InMemoryCollaboratorTargetData
): CollaboratorTarget & {
  writes: CollaboratorWrite[];
  permissions: Map<string, Map<string, TargetPermission>>;
} {
  const repositories = new Set(data.repositories);
  const failing = new Set(data.failingLogins ?? []);
  const permissions = new Map<string, Map<string, TargetPermission>>();
  for (const [fullName, byLogin] of Object.entries(data.collaborators ?? {})) {
    permissions.set(fullName, new Map(Object.entries(byLogin)));
  }
  const writes: CollaboratorWrite[] = [];

  return {
    writes,
    permissions,

    async repositoryExists(fullName: string) {
      return repositories.has(fullName);
    },

    async getCollaboratorPermission(fullName: string, login: string) {
      return permissions.get(fullName)?.get(login) ?? null;
    },

    async setCollaboratorPermission(fullName: string, login: string, permission: TargetPermission) {
      if (!repositories.has(fullName)) {
        throw new TargetRequestError(`Repository not found: ${fullName}`, {
          url: `memory://${fullName}`,
          status: 404,
        });
      }
      if (failing.has(login)) {
        throw new TargetRequestError(`Validation failed for ${login}`, {
          url: `memory://${fullName}/collaborators/${login}`,
          status: 422,
        });
      }
      let byLogin = permissions.get(fullName);
      if (!byLogin) {
        byLogin = new Map();
        permissions.set(fullName, byLogin);
      }
      byLogin.set(login, permission);
      writes.push({ fullName, login, permission });
    },
  };
}
