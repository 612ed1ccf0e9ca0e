// Grant records - raw input to resolution

import type { Email } from './common.js';
import type { PermissionLevel } from './permissions.js';
import type { GroupPrincipal, UserPrincipal } from './principals.js';
import type { RepositoryKey } from './repositories.js';

/**
 * A permission assigned directly to a user on a repository.
 * A grant whose principal has no email cannot be resolved and is reported.
 */
export type DirectGrant = {
  repository: RepositoryKey;
  principal: UserPrincipal;
  permission: PermissionLevel;
};

/**
 * A permission assigned to a group on a repository.
 */
export type GroupGrant = {
  repository: RepositoryKey;
  principal: GroupPrincipal;
  permission: PermissionLevel;
};

/**
 * One user belonging to one group.
 */
export type Membership = {
  groupName: string;
  userIdentifier: string;
  email?: Email;
};

/**
 * Everything one resolution run consumes.
 */
export type ResolutionInput = {
  directGrants: readonly DirectGrant[];
  groupGrants: readonly GroupGrant[];
  memberships: readonly Membership[];
};
