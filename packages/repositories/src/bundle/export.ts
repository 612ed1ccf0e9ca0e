// Bundle writing.
// Writes the phase tables in their canonical column layout.

import {
  BUNDLE_FILES,
  TABLE_COLUMNS,
  bundleFilePath,
  stringifyCsv,
  stringifyNdjson,
  type Diagnostic,
  type EffectivePermissionRow,
} from '@permsync/protocol';
import type { BundleWriter, ExportSummary, GrantTables } from './types.js';

/**
 * Write the three extract-phase tables into a directory.
 */
export async function writeGrantTables(
  writer: BundleWriter,
  dir: string,
  tables: GrantTables
): Promise<ExportSummary> {
  const files = [
    bundleFilePath(dir, BUNDLE_FILES.DIRECT_GRANTS),
    bundleFilePath(dir, BUNDLE_FILES.GROUP_GRANTS),
    bundleFilePath(dir, BUNDLE_FILES.MEMBERSHIPS),
  ];

  await writer.writeFile(files[0], stringifyCsv(TABLE_COLUMNS.DIRECT_GRANTS, tables.directGrants));
  await writer.writeFile(files[1], stringifyCsv(TABLE_COLUMNS.GROUP_GRANTS, tables.groupGrants));
  await writer.writeFile(files[2], stringifyCsv(TABLE_COLUMNS.MEMBERSHIPS, tables.memberships));

  return {
    files,
    directGrantCount: tables.directGrants.length,
    groupGrantCount: tables.groupGrants.length,
    membershipCount: tables.memberships.length,
    exportedAt: new Date().toISOString(),
  };
}

/**
 * Write the effective permissions table.
 */
export async function writeEffectivePermissions(
  writer: BundleWriter,
  path: string,
  rows: readonly EffectivePermissionRow[]
): Promise<void> {
  await writer.writeFile(path, stringifyCsv(TABLE_COLUMNS.EFFECTIVE_PERMISSIONS, rows));
}

/**
 * Write diagnostics as NDJSON, one per line.
 */
export async function writeDiagnostics(
  writer: BundleWriter,
  path: string,
  diagnostics: readonly Diagnostic[]
): Promise<void> {
  await writer.writeFile(path, stringifyNdjson(diagnostics));
}
