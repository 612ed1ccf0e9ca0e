// Bitbucket Data Center grant source
//
// Reads projects, repositories, repository permissions and group members through
// the REST 1.0 API. Requires admin-level credentials for email addresses and
// group membership.

import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import { formatIssues } from '@permsync/protocol';
import type {
  GrantSource,
  SourceGroupPermission,
  SourceProject,
  SourceRepository,
  SourceUser,
  SourceUserPermission,
} from '../interfaces/grant-source.js';
import { SourceRequestError, hasStatus } from '../errors.js';

export const BitbucketConfigSchema = z
  .object({
    baseUrl: z.string().url(),
    token: z.string().min(1).optional(),
    username: z.string().min(1).optional(),
    password: z.string().optional(),
    /** Pause between requests, for servers with aggressive rate limits */
    rateLimitSleepMs: z.number().nonnegative().default(0),
    pageSize: z.number().int().positive().max(1000).default(100),
  })
  .refine((config) => config.token || (config.username && config.password !== undefined), {
    message: 'Either a token or a username and password is required',
  });

export type BitbucketConfig = z.input<typeof BitbucketConfigSchema>;

export type BitbucketClientOptions = {
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
};

const PageSchema = z.object({
  values: z.array(z.unknown()).default([]),
  isLastPage: z.boolean().default(false),
  nextPageStart: z.number().int().nullish(),
});

const UserSchema = z
  .object({
    name: z.string().optional(),
    slug: z.string().optional(),
    emailAddress: z.string().optional(),
    displayName: z.string().optional(),
  })
  .passthrough();

const ProjectSchema = z.object({ key: z.string(), name: z.string().optional() }).passthrough();

const RepositorySchema = z.object({ slug: z.string(), name: z.string().optional() }).passthrough();

const UserPermissionSchema = z.object({ user: UserSchema, permission: z.string() }).passthrough();

const GroupPermissionSchema = z
  .object({
    group: z.object({ name: z.string().optional(), slug: z.string().optional() }).passthrough(),
    permission: z.string(),
  })
  .passthrough();

type QueryParams = Record<string, string | number>;

/**
 * GrantSource backed by the Bitbucket Data Center REST API.
 *
 * @example
 * ```typescript
 * const source = createBitbucketClient({ baseUrl: 'https://bitbucket.example.com', token });
 * for await (const project of source.listProjects(['PROJ'])) {
 *   // ...
 * }
 * ```
 */
export class BitbucketClient implements GrantSource {
  private readonly base: string;
  private readonly headers: Record<string, string>;
  private readonly rateLimitSleepMs: number;
  private readonly pageSize: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: BitbucketConfig, options: BitbucketClientOptions = {}) {
    const parsed = BitbucketConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new SourceRequestError(`Invalid Bitbucket configuration: ${formatIssues(parsed.error)}`, {
        url: config.baseUrl,
      });
    }
    const cfg = parsed.data;

    this.base = cfg.baseUrl.replace(/\/+$/, '');
    this.rateLimitSleepMs = cfg.rateLimitSleepMs;
    this.pageSize = cfg.pageSize;
    this.fetchFn = options.fetch ?? fetch;
    this.headers = { Accept: 'application/json' };

    if (cfg.token) {
      this.headers.Authorization = `Bearer ${cfg.token}`;
    } else if (cfg.username) {
      const basic = Buffer.from(`${cfg.username}:${cfg.password ?? ''}`).toString('base64');
      this.headers.Authorization = `Basic ${basic}`;
    }
  }

  async *listProjects(projectKeys?: readonly string[]): AsyncIterable<SourceProject> {
    const keys = projectKeys && projectKeys.length > 0 ? new Set(projectKeys) : null;
    for await (const project of this.paginate('/rest/api/1.0/projects', ProjectSchema)) {
      if (keys && !keys.has(project.key)) continue;
      yield { key: project.key, name: project.name };
    }
  }

  async *listRepositories(
    projectKey: string,
    repoSlugs?: readonly string[]
  ): AsyncIterable<SourceRepository> {
    const slugs = repoSlugs && repoSlugs.length > 0 ? new Set(repoSlugs) : null;
    const path = `/rest/api/1.0/projects/${encodeURIComponent(projectKey)}/repos`;
    for await (const repo of this.paginate(path, RepositorySchema)) {
      if (slugs && !slugs.has(repo.slug)) continue;
      yield { projectKey, slug: repo.slug, name: repo.name };
    }
  }

  async *listRepositoryUserPermissions(
    projectKey: string,
    repoSlug: string
  ): AsyncIterable<SourceUserPermission> {
    const path = `${repositoryPath(projectKey, repoSlug)}/permissions/users`;
    for await (const entry of this.paginate(path, UserPermissionSchema)) {
      yield { user: toSourceUser(entry.user), permission: entry.permission };
    }
  }

  async *listRepositoryGroupPermissions(
    projectKey: string,
    repoSlug: string
  ): AsyncIterable<SourceGroupPermission> {
    const path = `${repositoryPath(projectKey, repoSlug)}/permissions/groups`;
    for await (const entry of this.paginate(path, GroupPermissionSchema)) {
      const groupName = entry.group.name || entry.group.slug || '';
      yield { groupName, permission: entry.permission };
    }
  }

  async *listGroupMembers(groupName: string): AsyncIterable<SourceUser> {
    const path = '/rest/api/1.0/admin/groups/more-members';
    for await (const user of this.paginate(path, UserSchema, { context: groupName })) {
      yield toSourceUser(user);
    }
  }

  /**
   * Look up a user by slug, falling back to a filtered search on 404.
   */
  async findUser(nameOrSlug: string): Promise<SourceUser | null> {
    try {
      const body = await this.get(`/rest/api/1.0/users/${encodeURIComponent(nameOrSlug)}`);
      return toSourceUser(this.parse(UserSchema, body, `/rest/api/1.0/users/${nameOrSlug}`));
    } catch (error) {
      if (!hasStatus(error, 404)) {
        throw error;
      }
    }

    for await (const user of this.paginate('/rest/api/1.0/users', UserSchema, { filter: nameOrSlug })) {
      if (user.name === nameOrSlug || user.slug === nameOrSlug) {
        return toSourceUser(user);
      }
    }
    return null;
  }

  /**
   * Iterate over every value of a paged resource.
   */
  private async *paginate<T>(
    path: string,
    itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params: QueryParams = {}
  ): AsyncGenerator<T> {
    let start = 0;

    while (true) {
      const body = await this.get(path, { ...params, limit: this.pageSize, start });
      const page = this.parse(PageSchema, body, path);

      for (const value of page.values) {
        yield this.parse(itemSchema, value, path);
      }

      if (page.isLastPage) break;

      if (page.nextPageStart !== undefined && page.nextPageStart !== null) {
        start = page.nextPageStart;
      } else if (page.values.length > 0) {
        // Some endpoints omit nextPageStart
        start += page.values.length;
      } else {
        break;
      }
    }
  }

  private async get(path: string, params: QueryParams = {}): Promise<unknown> {
    if (this.rateLimitSleepMs > 0) {
      await sleep(this.rateLimitSleepMs);
    }

    const query = new URLSearchParams(
      Object.entries(params).map<[string, string]>(([key, value]) => [key, String(value)])
    ).toString();
    const url = `${this.base}${path}${query ? `?${query}` : ''}`;

    let response: Response;
    try {
      response = await this.fetchFn(url, { method: 'GET', headers: this.headers });
    } catch (error) {
      throw new SourceRequestError(
        `Bitbucket GET ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        { url }
      );
    }

    if (!response.ok) {
      const text = await response.text();
      throw new SourceRequestError(
        `Bitbucket GET ${url} failed: ${response.status} - ${text.slice(0, 500)}`,
        { url, status: response.status }
      );
    }

    return response.json();
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, path: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new SourceRequestError(
        `Unexpected Bitbucket response from ${path}: ${formatIssues(result.error)}`,
        { url: `${this.base}${path}` }
      );
    }
    return result.data;
  }
}

function repositoryPath(projectKey: string, repoSlug: string): string {
  return `/rest/api/1.0/projects/${encodeURIComponent(projectKey)}/repos/${encodeURIComponent(repoSlug)}`;
}

function toSourceUser(user: z.infer<typeof UserSchema>): SourceUser {
  return {
    name: user.name,
    slug: user.slug,
    emailAddress: user.emailAddress,
    displayName: user.displayName,
  };
}

/**
 * Create a Bitbucket Data Center grant source.
 */
export function createBitbucketClient(
  config: BitbucketConfig,
  options: BitbucketClientOptions = {}
): BitbucketClient {
  return new BitbucketClient(config, options);
}
