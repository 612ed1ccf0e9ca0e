// permsync expand
//
// Resolves the grant tables into one effective permission per user and repository.

import { z } from 'zod';
import {
  BUNDLE_FILES,
  DEFAULT_OUTPUT_DIR,
  bundleFilePath,
  type Diagnostic,
  type ResolutionInput,
} from '@permsync/protocol';
import { bundle } from '@permsync/repositories';
import {
  checkResolutionDeterminism,
  logDiagnostics,
  recordsFromRows,
  resolvePermissions,
  toEffectivePermissionRow,
  type ResolutionResult,
} from '@permsync/runtime';
import { EXIT_FAILURE, EXIT_OK, parseFlags } from '../config.js';
import type { Command, CommandContext } from '../context.js';
import { parseFlagValues } from './args.js';

const requiredPath = z.string({ required_error: 'is required' }).min(1, 'must not be empty');

export const ExpandFlagsSchema = z.object({
  'user-permissions': requiredPath,
  'group-permissions': requiredPath,
  'group-members': requiredPath,
  output: z.string().min(1).default(bundleFilePath(DEFAULT_OUTPUT_DIR, BUNDLE_FILES.EFFECTIVE_PERMISSIONS)),
  diagnostics: z.string().min(1).optional(),
  'check-determinism': z.boolean().default(false),
  'dry-run': z.boolean().default(false),
});

export type ExpandFlags = z.infer<typeof ExpandFlagsSchema>;

export const expandCommand: Command = async (args, context) => {
  const values = parseFlagValues('expand', args, {
    'user-permissions': { type: 'string' },
    'group-permissions': { type: 'string' },
    'group-members': { type: 'string' },
    output: { type: 'string' },
    diagnostics: { type: 'string' },
    'check-determinism': { type: 'boolean' },
    'dry-run': { type: 'boolean' },
  });
  const flags = parseFlags(ExpandFlagsSchema, values, 'expand');
  const { logger } = context;

  const tables = await bundle.readGrantTables(context.reader, {
    directGrants: flags['user-permissions'],
    groupGrants: flags['group-permissions'],
    memberships: flags['group-members'],
  });
  logger.info('Loaded grant tables', {
    directGrants: tables.directGrants.length,
    groupGrants: tables.groupGrants.length,
    memberships: tables.memberships.length,
  });

  const records = recordsFromRows(tables);
  const result = resolve(records.input, flags['check-determinism'], context);
  if (!result) return EXIT_FAILURE;

  const diagnostics: Diagnostic[] = [...records.diagnostics, ...result.diagnostics];
  logDiagnostics(logger, diagnostics);

  if (!result.ok) {
    logger.error(result.error.message, { code: result.error.code, duplicates: result.error.duplicates.length });
    await writeDiagnosticsFile(flags, diagnostics, context);
    return EXIT_FAILURE;
  }

  logger.info('Resolved effective permissions', { ...result.stats, diagnostics: diagnostics.length });

  if (flags['dry-run']) {
    logger.info('Dry run: not writing files', { output: flags.output });
    return EXIT_OK;
  }

  await bundle.writeEffectivePermissions(context.writer, flags.output, result.permissions.map(toEffectivePermissionRow));
  logger.info('Wrote effective permissions', { path: flags.output, rows: result.permissions.length });
  await writeDiagnosticsFile(flags, diagnostics, context);
  return EXIT_OK;
};

/**
 * Run resolution, optionally verifying that input order does not matter.
 * Returns undefined when the determinism check fails.
 */
function resolve(
  input: ResolutionInput,
  checkDeterminism: boolean,
  { logger }: CommandContext
): ResolutionResult | undefined {
  if (!checkDeterminism) {
    return resolvePermissions(input);
  }

  const check = checkResolutionDeterminism(input);
  if (!check.isDeterministic) {
    for (const difference of check.differences) {
      logger.error(difference);
    }
    logger.error('Resolution depends on input order', { differences: check.differences.length });
    return undefined;
  }
  logger.info('Determinism check passed', { iterations: check.iterations });
  return check.baseline;
}

async function writeDiagnosticsFile(
  flags: ExpandFlags,
  diagnostics: readonly Diagnostic[],
  { writer, logger }: CommandContext
): Promise<void> {
  if (!flags.diagnostics || flags['dry-run']) return;
  await bundle.writeDiagnostics(writer, flags.diagnostics, diagnostics);
  logger.info('Wrote diagnostics', { path: flags.diagnostics, count: diagnostics.length });
}
