// Flag parsing shared by the subcommands

import { parseArgs, type ParseArgsConfig } from 'node:util';
import { errorMessage } from '@permsync/protocol';
import { ConfigError } from '../config.js';

export type FlagOptions = NonNullable<ParseArgsConfig['options']>;

/**
 * Parse the flags of a subcommand. Positionals and unknown flags are rejected.
 *
 * @throws ConfigError if the arguments do not match the options
 */
export function parseFlagValues(command: string, args: string[], options: FlagOptions): Record<string, unknown> {
  try {
    const { values } = parseArgs({ args, options, strict: true, allowPositionals: false });
    return { ...values };
  } catch (error) {
    throw new ConfigError(`${command}: ${errorMessage(error)}`);
  }
}
