// Grant application
//
// Pushes effective permissions to the target system as repository collaborators.
// Idempotent: a user who already holds the desired permission is left alone.
// Individual failures are logged and counted; they never abort the run.

import {
  compareCodeUnits,
  errorMessage,
  toTargetPermission,
  type EffectivePermission,
  type RepositoryKey,
  type TargetPermission,
} from '@permsync/protocol';
import type { CollaboratorTarget, IdentityMap } from '@permsync/repositories';
import { silentLogger, type Logger } from '../logging.js';

/**
 * Target repository name for a source repository: ORG/PROJECTKEY-slug
 */
export function defaultTargetName(org: string, repository: RepositoryKey): string {
  return `${org}/${repository.projectKey}-${repository.repoSlug}`;
}

export type ApplyOutcome = 'granted' | 'unchanged' | 'planned' | 'skipped' | 'failed';

/**
 * What happened to one effective permission
 */
export type ApplyEntryResult = {
  fullName: string;
  email: string;
  login?: string;
  permission: TargetPermission;
  outcome: ApplyOutcome;
  reason?: string;
};

export type ApplySummary = {
  granted: number;
  unchanged: number;

  /** Writes a dry run would have made */
  planned: number;

  skipped: number;
  failed: number;
  dryRun: boolean;
  results: ApplyEntryResult[];
};

export type ApplyOptions = {
  /** Target organization */
  org: string;

  /** Email → login mapping */
  identity: IdentityMap;

  /** Login used for emails missing from the mapping; such entries are skipped without one */
  defaultLogin?: string;

  /** Log intended writes without making them */
  dryRun?: boolean;

  /** Overrides the ORG/PROJECTKEY-slug naming convention */
  targetName?: (org: string, repository: RepositoryKey) => string;

  logger?: Logger;
};

/**
 * Apply effective permissions to the target, one repository at a time in name order.
 */
export async function applyEffectivePermissions(
  target: CollaboratorTarget,
  permissions: readonly EffectivePermission[],
  options: ApplyOptions
): Promise<ApplySummary> {
  const logger = options.logger ?? silentLogger;
  const dryRun = options.dryRun ?? false;
  const nameFor = options.targetName ?? defaultTargetName;
  const results: ApplyEntryResult[] = [];

  const byRepository = new Map<string, EffectivePermission[]>();
  for (const permission of permissions) {
    const fullName = nameFor(options.org, permission.repository);
    const entries = byRepository.get(fullName);
    if (entries) {
      entries.push(permission);
    } else {
      byRepository.set(fullName, [permission]);
    }
  }

  const fullNames = Array.from(byRepository.keys()).sort(compareCodeUnits);
  for (const fullName of fullNames) {
    const entries = byRepository.get(fullName) ?? [];
    logger.info('Processing repository', { repository: fullName, entries: entries.length });

    const access = await checkRepository(target, fullName);
    if (!access.ok) {
      logger.error('Cannot access repository', { repository: fullName, error: access.reason });
      for (const entry of entries) {
        results.push({
          fullName,
          email: entry.email,
          permission: toTargetPermission(entry.permission),
          outcome: 'failed',
          reason: access.reason,
        });
      }
      continue;
    }

    for (const entry of entries) {
      results.push(await applyEntry(target, fullName, entry, options, dryRun, logger));
    }
  }

  const count = (outcome: ApplyOutcome) => results.filter((r) => r.outcome === outcome).length;
  const summary: ApplySummary = {
    granted: count('granted'),
    unchanged: count('unchanged'),
    planned: count('planned'),
    skipped: count('skipped'),
    failed: count('failed'),
    dryRun,
    results,
  };

  logger.info('Apply complete', {
    granted: summary.granted,
    unchanged: summary.unchanged,
    planned: summary.planned,
    skipped: summary.skipped,
    failed: summary.failed,
    dryRun,
  });

  return summary;
}

async function checkRepository(
  target: CollaboratorTarget,
  fullName: string
): Promise<{ ok: true } | { ok: false; reason: string }> {
  try {
    return (await target.repositoryExists(fullName)) ? { ok: true } : { ok: false, reason: 'not found' };
  } catch (error) {
    return { ok: false, reason: errorMessage(error) };
  }
}

async function applyEntry(
  target: CollaboratorTarget,
  fullName: string,
  entry: EffectivePermission,
  options: ApplyOptions,
  dryRun: boolean,
  logger: Logger
): Promise<ApplyEntryResult> {
  const permission = toTargetPermission(entry.permission);
  const base = { fullName, email: entry.email, permission };

  let login = options.identity.resolve(entry.email);
  if (!login) {
    if (!options.defaultLogin) {
      logger.warn('No login mapped for email, skipping', { email: entry.email, repository: fullName });
      return { ...base, outcome: 'skipped', reason: 'no login mapped' };
    }
    login = options.defaultLogin;
    logger.warn('No login mapped for email, using default login', { email: entry.email, login });
  }

  let current: TargetPermission | null = null;
  try {
    current = await target.getCollaboratorPermission(fullName, login);
  } catch (error) {
    // Treated as not yet a collaborator
    logger.debug('Could not read current permission', { repository: fullName, login, error: errorMessage(error) });
  }

  if (current === permission) {
    logger.info('Permission already set', { repository: fullName, login, permission });
    return { ...base, login, outcome: 'unchanged' };
  }

  if (dryRun) {
    logger.info('Dry run: would set permission', { repository: fullName, login, permission, email: entry.email });
    return { ...base, login, outcome: 'planned' };
  }

  try {
    await target.setCollaboratorPermission(fullName, login, permission);
    logger.info('Granted permission', { repository: fullName, login, permission });
    return { ...base, login, outcome: 'granted' };
  } catch (error) {
    const reason = errorMessage(error);
    logger.error('Failed to set permission', { repository: fullName, login, permission, error: reason });
    return { ...base, login, outcome: 'failed', reason };
  }
}
