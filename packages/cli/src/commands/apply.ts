// permsync apply
//
// Grants effective permissions on GitHub repositories.

import { z } from 'zod';
import { BUNDLE_FILES, DEFAULT_OUTPUT_DIR, bundleFilePath } from '@permsync/protocol';
import { bundle, createGitHubClient, createIdentityMap } from '@permsync/repositories';
import { applyEffectivePermissions, effectivePermissionsFromRows } from '@permsync/runtime';
import { ConfigError, EXIT_FAILURE, EXIT_OK, parseFlags } from '../config.js';
import type { Command } from '../context.js';
import { parseFlagValues } from './args.js';

export const ApplyFlagsSchema = z.object({
  token: z.string().optional(),
  org: z.string({ required_error: 'is required' }).trim().min(1, 'must not be empty'),
  'api-url': z.string().url().optional(),
  'effective-csv': z.string().min(1).default(bundleFilePath(DEFAULT_OUTPUT_DIR, BUNDLE_FILES.EFFECTIVE_PERMISSIONS)),
  'mapping-csv': z.string().min(1).optional(),
  'default-missing': z.string().trim().min(1).optional(),
  'dry-run': z.boolean().default(false),
});

export type ApplyFlags = z.infer<typeof ApplyFlagsSchema>;

export const applyCommand: Command = async (args, context) => {
  const values = parseFlagValues('apply', args, {
    token: { type: 'string' },
    org: { type: 'string' },
    'api-url': { type: 'string' },
    'effective-csv': { type: 'string' },
    'mapping-csv': { type: 'string' },
    'default-missing': { type: 'string' },
    'dry-run': { type: 'boolean' },
  });
  const flags = parseFlags(ApplyFlagsSchema, values, 'apply');
  const { logger } = context;

  const token = flags.token ?? context.env.githubToken;
  if (!token) {
    throw new ConfigError('apply: --token (or GITHUB_TOKEN / GH_TOKEN) is required');
  }

  const rows = await bundle.readCsvTable(context.reader, flags['effective-csv']);
  const { permissions, invalid } = effectivePermissionsFromRows(rows);
  for (const entry of invalid) {
    logger.warn('Skipping invalid effective permission row', { line: entry.line, reason: entry.reason });
  }
  logger.info('Loaded effective permissions', { rows: permissions.length });

  const identity = flags['mapping-csv']
    ? await bundle.readIdentityMapping(context.reader, flags['mapping-csv'])
    : createIdentityMap([]);
  if (identity.size === 0 && !flags['default-missing']) {
    logger.warn('No email to login mappings and no default login; every entry will be skipped');
  }

  const target = createGitHubClient({ token, apiUrl: flags['api-url'] }, { fetch: context.fetch });
  const summary = await applyEffectivePermissions(target, permissions, {
    org: flags.org,
    identity,
    defaultLogin: flags['default-missing'],
    dryRun: flags['dry-run'],
    logger,
  });

  return summary.failed > 0 ? EXIT_FAILURE : EXIT_OK;
};
