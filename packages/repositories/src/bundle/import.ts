// Bundle reading.
// Loads the tables exchanged between phases. Rows come back unvalidated, with
// their line numbers, so the caller can report each bad row precisely.

import {
  ValidationError,
  errorMessage,
  parseCsv,
  parseRow,
  IdentityMappingRowSchema,
  type CsvRow,
  type RawGrantTables,
} from '@permsync/protocol';
import type { IdentityMap } from '../interfaces/identity-map.js';
import { createIdentityMap } from '../in-memory/index.js';
import type { BundleReader, GrantTablePaths } from './types.js';

/**
 * Read a CSV table.
 *
 * @throws ValidationError if the file does not exist or is not valid CSV
 */
export async function readCsvTable(reader: BundleReader, path: string): Promise<CsvRow[]> {
  if (!(await reader.exists(path))) {
    throw new ValidationError(`Missing bundle file: ${path}`, { field: path });
  }
  const content = await reader.readFile(path);
  try {
    return parseCsv(content).rows;
  } catch (error) {
    throw new ValidationError(`${path}: ${errorMessage(error)}`, { field: path });
  }
}

/**
 * Read the direct grant, group grant and membership tables.
 */
export async function readGrantTables(
  reader: BundleReader,
  paths: GrantTablePaths
): Promise<RawGrantTables> {
  const [directGrants, groupGrants, memberships] = await Promise.all([
    readCsvTable(reader, paths.directGrants),
    readCsvTable(reader, paths.groupGrants),
    readCsvTable(reader, paths.memberships),
  ]);
  return { directGrants, groupGrants, memberships };
}

/**
 * Read an email → login mapping table (columns: email, github_login).
 * Rows with an empty email or login are ignored.
 */
export async function readIdentityMapping(reader: BundleReader, path: string): Promise<IdentityMap> {
  const rows = await readCsvTable(reader, path);
  const entries: Array<[string, string]> = [];
  for (const row of rows) {
    const parsed = parseRow(IdentityMappingRowSchema, row.values);
    if (parsed.success) {
      entries.push([parsed.data.email, parsed.data.github_login]);
    }
  }
  return createIdentityMap(entries);
}
