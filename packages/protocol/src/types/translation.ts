// Translation tables between the source system, the canonical levels and the target system

import type { PermissionLevel } from './permissions.js';
import { isPermissionLevel } from './permissions.js';

/**
 * Bitbucket Data Center repository permission names.
 */
export const SOURCE_PERMISSION_MAP: Readonly<Record<string, PermissionLevel>> = {
  REPO_READ: 'READ',
  REPO_WRITE: 'WRITE',
  REPO_ADMIN: 'ADMIN',
};

/**
 * Translate a source permission name to a canonical level.
 * Canonical names are accepted as-is. Matching ignores case and surrounding whitespace.
 *
 * @returns The canonical level, or undefined when the name has no translation
 */
export function translateSourcePermission(raw: string): PermissionLevel | undefined {
  const name = raw.trim().toUpperCase();
  if (isPermissionLevel(name)) {
    return name;
  }
  return SOURCE_PERMISSION_MAP[name];
}

/**
 * Repository permissions understood by the GitHub collaborators API.
 */
export type TargetPermission = 'pull' | 'triage' | 'push' | 'maintain' | 'admin';

export const TARGET_PERMISSION_MAP: Readonly<Record<PermissionLevel, TargetPermission>> = {
  READ: 'pull',
  WRITE: 'push',
  ADMIN: 'admin',
};

export function toTargetPermission(level: PermissionLevel): TargetPermission {
  return TARGET_PERMISSION_MAP[level];
}

/**
 * Normalize a permission as reported by the target (role names such as 'write')
 * to the names accepted when granting (such as 'push').
 *
 * @returns The normalized permission, or undefined for 'none' and unknown names
 */
export function normalizeTargetPermission(reported: string): TargetPermission | undefined {
  switch (reported) {
    case 'admin':
      return 'admin';
    case 'maintain':
      return 'maintain';
    case 'write':
    case 'push':
      return 'push';
    case 'triage':
      return 'triage';
    case 'read':
    case 'pull':
      return 'pull';
    default:
      return undefined;
  }
}
