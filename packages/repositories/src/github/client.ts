// GitHub collaborator target
//
// Reads and writes repository collaborator permissions through the REST API.
// Works against github.com and GitHub Enterprise Server (apiUrl = https://host/api/v3).

import { z } from 'zod';
import { formatIssues, normalizeTargetPermission, type TargetPermission } from '@permsync/protocol';
import type { CollaboratorTarget } from '../interfaces/collaborator-target.js';
import { TargetRequestError } from '../errors.js';

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

export const GitHubConfigSchema = z.object({
  token: z.string().min(1, 'GitHub token is required'),
  apiUrl: z.string().url().default(DEFAULT_GITHUB_API_URL),
});

export type GitHubConfig = z.input<typeof GitHubConfigSchema>;

export type GitHubClientOptions = {
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
};

const CollaboratorPermissionSchema = z
  .object({
    permission: z.string(),
    role_name: z.string().optional(),
  })
  .passthrough();

/**
 * CollaboratorTarget backed by the GitHub REST API.
 */
export class GitHubClient implements CollaboratorTarget {
  private readonly base: string;
  private readonly headers: Record<string, string>;
  private readonly fetchFn: typeof fetch;

  constructor(config: GitHubConfig, options: GitHubClientOptions = {}) {
    const parsed = GitHubConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new TargetRequestError(`Invalid GitHub configuration: ${formatIssues(parsed.error)}`, {
        url: config.apiUrl ?? DEFAULT_GITHUB_API_URL,
      });
    }
    const cfg = parsed.data;
    this.base = cfg.apiUrl.replace(/\/+$/, '');
    this.fetchFn = options.fetch ?? fetch;
    this.headers = {
      Accept: 'application/vnd.github+json',
      Authorization: `Bearer ${cfg.token}`,
      'X-GitHub-Api-Version': '2022-11-28',
    };
  }

  async repositoryExists(fullName: string): Promise<boolean> {
    const response = await this.request('GET', repoPath(fullName));
    if (response.status === 404) {
      return false;
    }
    await this.ensureOk(response, 'GET', repoPath(fullName));
    return true;
  }

  async getCollaboratorPermission(fullName: string, login: string): Promise<TargetPermission | null> {
    const path = `${repoPath(fullName)}/collaborators/${encodeURIComponent(login)}/permission`;
    const response = await this.request('GET', path);
    if (response.status === 404) {
      return null;
    }
    await this.ensureOk(response, 'GET', path);

    const parsed = CollaboratorPermissionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new TargetRequestError(`Unexpected GitHub response from ${path}`, {
        url: `${this.base}${path}`,
        status: response.status,
      });
    }

    // role_name distinguishes maintain/triage, which `permission` folds into write/read
    const reported = parsed.data.role_name ?? parsed.data.permission;
    return normalizeTargetPermission(reported) ?? null;
  }

  async setCollaboratorPermission(
    fullName: string,
    login: string,
    permission: TargetPermission
  ): Promise<void> {
    const path = `${repoPath(fullName)}/collaborators/${encodeURIComponent(login)}`;
    const response = await this.request('PUT', path, { permission });
    await this.ensureOk(response, 'PUT', path);
  }

  private async request(method: 'GET' | 'PUT', path: string, body?: unknown): Promise<Response> {
    const url = `${this.base}${path}`;
    try {
      return await this.fetchFn(url, {
        method,
        headers: body === undefined ? this.headers : { ...this.headers, 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (error) {
      throw new TargetRequestError(
        `GitHub ${method} ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        { url }
      );
    }
  }

  private async ensureOk(response: Response, method: string, path: string): Promise<void> {
    if (response.ok) return;
    const url = `${this.base}${path}`;
    const text = await response.text();
    throw new TargetRequestError(`GitHub ${method} ${url} failed: ${response.status} - ${text.slice(0, 500)}`, {
      url,
      status: response.status,
    });
  }
}

function repoPath(fullName: string): string {
  const [owner, repo] = fullName.split('/');
  return `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo ?? '')}`;
}

/**
 * Create a GitHub collaborator target.
 */
export function createGitHubClient(config: GitHubConfig, options: GitHubClientOptions = {}): GitHubClient {
  return new GitHubClient(config, options);
}
