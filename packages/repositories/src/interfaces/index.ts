// Collaborator interfaces
export type {
  GrantSource,
  SourceProject,
  SourceRepository,
  SourceUser,
  SourceUserPermission,
  SourceGroupPermission,
} from './grant-source.js';
export { sourceUserEmail, sourceUserIdentifier } from './grant-source.js';
export type { CollaboratorTarget } from './collaborator-target.js';
export type { IdentityMap } from './identity-map.js';
