// Effective permissions - the resolved output

import type { Email } from './common.js';
import type { PermissionLevel } from './permissions.js';
import type { RepositoryKey } from './repositories.js';

/**
 * Where a winning permission came from.
 */
export type PermissionSource = 'direct' | 'group';

/**
 * The single resolved permission a user holds on a repository.
 * Exactly one exists per (repository, email) in a resolution result.
 */
export type EffectivePermission = {
  repository: RepositoryKey;
  email: Email;
  permission: PermissionLevel;
  source: PermissionSource;

  /**
   * Group that produced the winning level. Omitted when source is 'direct'.
   */
  sourcePrincipal?: string;
};
