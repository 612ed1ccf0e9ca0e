// What a command runs against. The entry point wires real files and the network;
// tests pass in-memory stand-ins.

import type { bundle } from '@permsync/repositories';
import type { Logger } from '@permsync/runtime';
import type { EnvConfig } from './config.js';

export type CliContext = {
  /** Environment variables, usually process.env */
  env: Readonly<Record<string, string | undefined>>;

  reader: bundle.BundleReader;
  writer: bundle.BundleWriter;

  /** Used instead of a console logger at LOG_LEVEL */
  logger?: Logger;

  /** Passed to the HTTP clients (default: global fetch) */
  fetch?: typeof fetch;

  /** Prints usage text */
  print: (text: string) => void;
};

export type CommandContext = {
  env: EnvConfig;
  reader: bundle.BundleReader;
  writer: bundle.BundleWriter;
  logger: Logger;
  fetch?: typeof fetch;
};

/**
 * A subcommand. Resolves to the process exit code.
 */
export type Command = (args: string[], context: CommandContext) => Promise<number>;
