// Grant extraction
//
// Walks the source system and produces the three grant tables: direct user
// grants, group grants, and the members of every group referenced by a grant.

import { compareCodeUnits, errorMessage, type DirectGrantRow, type MembershipRow } from '@permsync/protocol';
import {
  sourceUserEmail,
  sourceUserIdentifier,
  type bundle,
  type GrantSource,
  type SourceUser,
} from '@permsync/repositories';
import { silentLogger, type Logger } from '../logging.js';

export type ExtractOptions = {
  /** Restrict to these project keys (all projects when empty) */
  projectKeys?: readonly string[];

  /** Restrict to these repository slugs within each project (all when empty) */
  repoSlugs?: readonly string[];

  logger?: Logger;
};

export type ExtractResult = {
  tables: bundle.GrantTables;
  counts: {
    projects: number;
    repositories: number;
    directGrants: number;
    groupGrants: number;
    groups: number;
    memberships: number;
    emailLookups: number;
  };
};

/**
 * Extract every grant visible to the source client.
 *
 * Users reported without an email are looked up once per run. A failed lookup
 * leaves the email empty; resolution later reports such rows.
 */
export async function extractGrants(source: GrantSource, options: ExtractOptions = {}): Promise<ExtractResult> {
  const logger = options.logger ?? silentLogger;
  const tables: bundle.GrantTables = { directGrants: [], groupGrants: [], memberships: [] };
  const groupNames = new Set<string>();
  const emails = new Map<string, string>();
  let projectCount = 0;
  let repositoryCount = 0;

  const resolveEmail = async (user: SourceUser): Promise<string> => {
    const reported = sourceUserEmail(user);
    if (reported) return reported;

    const key = user.slug || user.name;
    if (!key) return '';

    const cached = emails.get(key);
    if (cached !== undefined) return cached;

    let email = '';
    try {
      email = sourceUserEmail(await source.findUser(key)) ?? '';
    } catch (error) {
      logger.warn('User lookup failed', { user: key, error: errorMessage(error) });
    }
    if (!email) {
      logger.debug('No email found for user', { user: key });
    }
    emails.set(key, email);
    return email;
  };

  for await (const project of source.listProjects(options.projectKeys)) {
    projectCount++;
    logger.info('Scanning project', { project: project.key });

    for await (const repository of source.listRepositories(project.key, options.repoSlugs)) {
      repositoryCount++;
      logger.debug('Scanning repository', { project: project.key, repository: repository.slug });

      for await (const entry of source.listRepositoryUserPermissions(project.key, repository.slug)) {
        const row: DirectGrantRow = {
          project_key: project.key,
          repo_slug: repository.slug,
          principal_type: 'user',
          principal_name: sourceUserIdentifier(entry.user),
          email: await resolveEmail(entry.user),
          permission: entry.permission,
        };
        tables.directGrants.push(row);
      }

      for await (const entry of source.listRepositoryGroupPermissions(project.key, repository.slug)) {
        groupNames.add(entry.groupName);
        tables.groupGrants.push({
          project_key: project.key,
          repo_slug: repository.slug,
          principal_type: 'group',
          principal_name: entry.groupName,
          permission: entry.permission,
        });
      }
    }
  }

  const sortedGroups = Array.from(groupNames).sort(compareCodeUnits);
  for (const groupName of sortedGroups) {
    logger.debug('Listing group members', { group: groupName });
    for await (const user of source.listGroupMembers(groupName)) {
      const row: MembershipRow = {
        group: groupName,
        user_identifier: sourceUserIdentifier(user),
        email: await resolveEmail(user),
      };
      tables.memberships.push(row);
    }
  }

  const counts = {
    projects: projectCount,
    repositories: repositoryCount,
    directGrants: tables.directGrants.length,
    groupGrants: tables.groupGrants.length,
    groups: sortedGroups.length,
    memberships: tables.memberships.length,
    emailLookups: emails.size,
  };
  logger.info('Extraction complete', counts);

  return { tables, counts };
}
