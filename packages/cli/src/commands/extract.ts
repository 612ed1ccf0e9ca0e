// permsync extract
//
// Reads grants from Bitbucket Data Center and writes the three grant tables.

import { z } from 'zod';
import { DEFAULT_OUTPUT_DIR } from '@permsync/protocol';
import { bundle, createBitbucketClient } from '@permsync/repositories';
import { extractGrants } from '@permsync/runtime';
import { ConfigError, EXIT_OK, parseFlags } from '../config.js';
import type { Command } from '../context.js';
import { parseFlagValues } from './args.js';

export const ExtractFlagsSchema = z.object({
  'base-url': z.string({ required_error: 'is required' }).url(),
  token: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  /** Seconds */
  'rate-limit-sleep': z.coerce.number().nonnegative().default(0),
  'output-dir': z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  project: z.array(z.string()).default([]),
  repo: z.array(z.string()).default([]),
  'dry-run': z.boolean().default(false),
});

export type ExtractFlags = z.infer<typeof ExtractFlagsSchema>;

export const extractCommand: Command = async (args, context) => {
  const values = parseFlagValues('extract', args, {
    'base-url': { type: 'string' },
    token: { type: 'string' },
    username: { type: 'string' },
    password: { type: 'string' },
    'rate-limit-sleep': { type: 'string' },
    'output-dir': { type: 'string' },
    project: { type: 'string', multiple: true },
    repo: { type: 'string', multiple: true },
    'dry-run': { type: 'boolean' },
  });
  const flags = parseFlags(ExtractFlagsSchema, values, 'extract');
  const { logger } = context;

  const token = flags.token ?? (flags.username ? undefined : context.env.bitbucketToken);
  if (flags.token && flags.username) {
    throw new ConfigError('extract: --token and --username cannot be combined');
  }
  if (!token && !flags.username) {
    throw new ConfigError('extract: --token (or BITBUCKET_TOKEN) or --username is required');
  }
  if (flags.username && flags.password === undefined) {
    throw new ConfigError('extract: --password is required with --username');
  }

  const source = createBitbucketClient(
    {
      baseUrl: flags['base-url'],
      token,
      username: flags.username,
      password: flags.password,
      rateLimitSleepMs: Math.round(flags['rate-limit-sleep'] * 1000),
    },
    { fetch: context.fetch }
  );

  const { tables, counts } = await extractGrants(source, {
    projectKeys: flags.project,
    repoSlugs: flags.repo,
    logger,
  });

  if (flags['dry-run']) {
    logger.info('Dry run: not writing files', { outputDir: flags['output-dir'], ...counts });
    return EXIT_OK;
  }

  const summary = await bundle.writeGrantTables(context.writer, flags['output-dir'], tables);
  logger.info('Wrote grant tables', { files: summary.files });
  return EXIT_OK;
};
