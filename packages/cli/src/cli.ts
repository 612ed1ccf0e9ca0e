// Command dispatch for the permsync CLI

import { isPermsyncError, errorMessage } from '@permsync/protocol';
import { consoleLogger, createLevelLogger, type Logger } from '@permsync/runtime';
import { ConfigError, EXIT_CONFIG_ERROR, EXIT_FAILURE, EXIT_OK, loadEnv } from './config.js';
import type { CliContext, Command } from './context.js';
import { applyCommand, expandCommand, extractCommand } from './commands/index.js';

export const COMMANDS: Readonly<Record<string, Command>> = {
  extract: extractCommand,
  expand: expandCommand,
  apply: applyCommand,
};

export const USAGE = `Usage: permsync <command> [options]

Migrate repository permissions from Bitbucket Data Center to GitHub.

Commands:
  extract   Extract Bitbucket permissions to CSV files
            --base-url URL (--token TOKEN | --username USER --password PASS)
            [--rate-limit-sleep SECONDS] [--output-dir out] [--project KEY]... [--repo SLUG]... [--dry-run]

  expand    Resolve group permissions into effective per-user permissions
            --user-permissions FILE --group-permissions FILE --group-members FILE
            [--output out/effective_repo_user_permissions.csv] [--diagnostics FILE]
            [--check-determinism] [--dry-run]

  apply     Grant effective permissions on GitHub repositories named ORG/PROJECTKEY-slug
            --org ORG [--token TOKEN] [--api-url URL] [--effective-csv FILE]
            [--mapping-csv FILE] [--default-missing LOGIN] [--dry-run]

Environment:
  BITBUCKET_TOKEN          token for extract when --token is not given
  GITHUB_TOKEN, GH_TOKEN   token for apply when --token is not given
  LOG_LEVEL                debug, info, warn or error (default: info)`;

/**
 * Run one CLI invocation.
 *
 * @returns The process exit code
 */
export async function runCli(argv: readonly string[], context: CliContext): Promise<number> {
  const [name, ...args] = argv;

  if (!name || name === '--help' || name === '-h' || name === 'help') {
    context.print(USAGE);
    return EXIT_OK;
  }

  const command = COMMANDS[name];
  if (!command) {
    context.print(`Unknown command: ${name}\n\n${USAGE}`);
    return EXIT_CONFIG_ERROR;
  }

  if (args.includes('--help') || args.includes('-h')) {
    context.print(USAGE);
    return EXIT_OK;
  }

  let logger: Logger = context.logger ?? consoleLogger;
  try {
    const env = loadEnv(context.env);
    logger = context.logger ?? createLevelLogger(env.logLevel);
    return await command(args, {
      env,
      reader: context.reader,
      writer: context.writer,
      logger,
      fetch: context.fetch,
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message, { code: error.code });
      context.print('Run "permsync --help" for usage.');
      return EXIT_CONFIG_ERROR;
    }
    if (isPermsyncError(error)) {
      logger.error(error.message, { code: error.code });
      return EXIT_FAILURE;
    }
    logger.error(`${name} failed: ${errorMessage(error)}`, {
      stack: error instanceof Error ? error.stack : undefined,
    });
    return EXIT_FAILURE;
  }
}
