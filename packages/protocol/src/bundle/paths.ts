// Bundle file names and column layouts
// Defines the files exchanged between the extract, expand and apply phases

/**
 * Default output directory for all phases
 */
export const DEFAULT_OUTPUT_DIR = 'out';

/**
 * Files written by extract and expand
 */
export const BUNDLE_FILES = {
  DIRECT_GRANTS: 'repo_user_permissions.csv',
  GROUP_GRANTS: 'repo_group_permissions.csv',
  MEMBERSHIPS: 'group_members.csv',
  EFFECTIVE_PERMISSIONS: 'effective_repo_user_permissions.csv',
  DIAGNOSTICS: 'diagnostics.ndjson',
} as const;

/**
 * Column layout of each table, in file order
 */
export const TABLE_COLUMNS = {
  DIRECT_GRANTS: ['project_key', 'repo_slug', 'principal_type', 'principal_name', 'email', 'permission'],
  GROUP_GRANTS: ['project_key', 'repo_slug', 'principal_type', 'principal_name', 'permission'],
  MEMBERSHIPS: ['group', 'user_identifier', 'email'],
  EFFECTIVE_PERMISSIONS: ['project_key', 'repo_slug', 'email', 'permission', 'source', 'source_principal'],
  IDENTITY_MAPPING: ['email', 'github_login'],
} as const;

/**
 * Build a path to a bundle file inside an output directory
 */
export function bundleFilePath(dir: string, file: string): string {
  return dir ? `${dir.replace(/\/+$/, '')}/${file}` : file;
}
