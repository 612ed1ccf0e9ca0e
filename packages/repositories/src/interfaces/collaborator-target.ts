import type { TargetPermission } from '@permsync/protocol';

/**
 * Write access to repository collaborators in the target system.
 *
 * Repositories are addressed by full name ("org/repo"), users by login.
 */
export interface CollaboratorTarget {
  /**
   * Whether the repository exists and is visible to the caller
   */
  repositoryExists(fullName: string): Promise<boolean>;

  /**
   * Current permission of a user on a repository
   * @returns The permission, or null if the user is not a collaborator
   */
  getCollaboratorPermission(fullName: string, login: string): Promise<TargetPermission | null>;

  /**
   * Add the user as a collaborator, or update their permission.
   * Setting the same permission twice is a no-op.
   */
  setCollaboratorPermission(fullName: string, login: string, permission: TargetPermission): Promise<void>;
}
