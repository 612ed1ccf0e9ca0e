// Permission levels and the total order over them

/**
 * Canonical permission levels, weakest first.
 */
export const PERMISSION_LEVELS = ['READ', 'WRITE', 'ADMIN'] as const;

export type PermissionLevel = (typeof PERMISSION_LEVELS)[number];

/**
 * Explicit rank per level. "Strongest wins" means the highest rank.
 * Never compare level names as strings: 'ADMIN' < 'READ' < 'WRITE' alphabetically.
 */
export const PERMISSION_RANK: Readonly<Record<PermissionLevel, number>> = {
  READ: 0,
  WRITE: 1,
  ADMIN: 2,
};

export function isPermissionLevel(value: string): value is PermissionLevel {
  return (PERMISSION_LEVELS as readonly string[]).includes(value);
}

/**
 * Compare two levels by rank. Negative when a is weaker than b.
 */
export function comparePermissionLevels(a: PermissionLevel, b: PermissionLevel): number {
  return PERMISSION_RANK[a] - PERMISSION_RANK[b];
}
