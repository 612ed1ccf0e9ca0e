// Repository keys - the grouping key used throughout resolution

/**
 * Identifies a repository in the source system.
 * Immutable; two keys are equal when both fields are equal.
 */
export type RepositoryKey = {
  readonly projectKey: string;
  readonly repoSlug: string;
};

/**
 * Canonical string form of a repository key, e.g. '["PROJ","repo1"]'.
 * Suitable as a Map key: distinct keys never share an id, even when a field contains "/".
 */
export function repositoryKeyId(key: RepositoryKey): string {
  return JSON.stringify([key.projectKey, key.repoSlug]);
}

/**
 * Order repository keys by project key, then slug.
 * Uses code-unit comparison so the order does not depend on the host locale.
 */
export function compareRepositoryKeys(a: RepositoryKey, b: RepositoryKey): number {
  return compareCodeUnits(a.projectKey, b.projectKey) || compareCodeUnits(a.repoSlug, b.repoSlug);
}

/**
 * Locale-independent string comparison.
 */
export function compareCodeUnits(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
