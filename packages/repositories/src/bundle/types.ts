// Bundle file system abstractions for reading and writing the phase tables.
// Allows testing without touching the local filesystem.

import type { DirectGrantRow, GroupGrantRow, MembershipRow } from '@permsync/protocol';

/**
 * Abstraction for writing bundle files.
 */
export interface BundleWriter {
  /**
   * Write a file with the given content.
   * Creates parent directories as needed.
   */
  writeFile(path: string, content: string): Promise<void>;

  /**
   * Check if a path exists.
   */
  exists(path: string): Promise<boolean>;
}

/**
 * Abstraction for reading bundle files.
 */
export interface BundleReader {
  /**
   * Check if a path exists.
   */
  exists(path: string): Promise<boolean>;

  /**
   * Read a file as text.
   */
  readFile(path: string): Promise<string>;
}

/**
 * The three tables written by the extract phase.
 */
export type GrantTables = {
  directGrants: DirectGrantRow[];
  groupGrants: GroupGrantRow[];
  memberships: MembershipRow[];
};

/**
 * Locations of the three input tables of the expand phase.
 */
export type GrantTablePaths = {
  directGrants: string;
  groupGrants: string;
  memberships: string;
};

/**
 * Summary of a write operation.
 */
export type ExportSummary = {
  files: string[];
  directGrantCount: number;
  groupGrantCount: number;
  membershipCount: number;
  exportedAt: string;
};
