/**
 * A project in the source system.
 */
export type SourceProject = {
  key: string;
  name?: string;
};

/**
 * A repository in the source system.
 */
export type SourceRepository = {
  projectKey: string;
  slug: string;
  name?: string;
};

/**
 * A user as reported by the source system. Email is only present for
 * callers with sufficient rights, so it may need a separate lookup.
 */
export type SourceUser = {
  name?: string;
  slug?: string;
  emailAddress?: string;
  displayName?: string;
};

/**
 * A permission granted directly to a user on a repository.
 * The permission keeps the source system's own name (e.g. REPO_WRITE).
 */
export type SourceUserPermission = {
  user: SourceUser;
  permission: string;
};

/**
 * A permission granted to a group on a repository.
 */
export type SourceGroupPermission = {
  groupName: string;
  permission: string;
};

/**
 * Read-only access to the grants held by a source system.
 *
 * List operations are paginated by the implementation and exposed as async iterables,
 * so callers never see page boundaries.
 */
export interface GrantSource {
  /**
   * List projects, optionally restricted to the given keys
   */
  listProjects(projectKeys?: readonly string[]): AsyncIterable<SourceProject>;

  /**
   * List repositories of a project, optionally restricted to the given slugs
   */
  listRepositories(projectKey: string, repoSlugs?: readonly string[]): AsyncIterable<SourceRepository>;

  /**
   * List permissions granted directly to users on a repository
   */
  listRepositoryUserPermissions(projectKey: string, repoSlug: string): AsyncIterable<SourceUserPermission>;

  /**
   * List permissions granted to groups on a repository
   */
  listRepositoryGroupPermissions(projectKey: string, repoSlug: string): AsyncIterable<SourceGroupPermission>;

  /**
   * List the members of a group
   */
  listGroupMembers(groupName: string): AsyncIterable<SourceUser>;

  /**
   * Look up a user's details by name or slug
   * @returns The user, or null if no user matches
   */
  findUser(nameOrSlug: string): Promise<SourceUser | null>;
}

/**
 * Email of a source user, if the source reported one.
 */
export function sourceUserEmail(user: SourceUser | null | undefined): string | undefined {
  return user?.emailAddress || undefined;
}

/**
 * Identifier of a source user (name, then slug).
 */
export function sourceUserIdentifier(user: SourceUser): string {
  return user.name || user.slug || '';
}
