// CLI configuration
//
// Command-line flags take precedence; a few settings fall back to the environment.

import { z } from 'zod';
import { PermsyncError, formatIssues } from '@permsync/protocol';
import type { LogLevel } from '@permsync/runtime';

/**
 * Bad flags or environment. Aborts the command with exit code 2.
 */
export class ConfigError extends PermsyncError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
    this.name = 'ConfigError';
  }
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG_ERROR = 2;

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((value) => value || undefined);

const LogLevelSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['debug', 'info', 'warn', 'error']));

export const EnvSchema = z
  .object({
    BITBUCKET_TOKEN: optionalSecret,
    GITHUB_TOKEN: optionalSecret,
    GH_TOKEN: optionalSecret,
    LOG_LEVEL: LogLevelSchema.optional(),
  })
  .transform((env) => ({
    bitbucketToken: env.BITBUCKET_TOKEN,
    // GITHUB_TOKEN wins when both are set
    githubToken: env.GITHUB_TOKEN ?? env.GH_TOKEN,
    logLevel: env.LOG_LEVEL ?? 'info',
  }));

export type EnvConfig = {
  bitbucketToken?: string;
  githubToken?: string;
  logLevel: LogLevel;
};

/**
 * Read settings from environment variables.
 *
 * @throws ConfigError if a variable has an unusable value
 */
export function loadEnv(env: Readonly<Record<string, string | undefined>>): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Validate parsed flags against a schema.
 *
 * @throws ConfigError listing every problem
 */
export function parseFlags<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, values: unknown, command: string): T {
  const parsed = schema.safeParse(values);
  if (!parsed.success) {
    throw new ConfigError(`Invalid options for ${command}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}
