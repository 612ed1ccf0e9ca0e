// Row schemas for the tabular files exchanged between phases
//
// Rows hold the source system's own permission names; translation to canonical
// levels happens when rows become records, not here.

import { z } from 'zod';
import type { CsvRow } from '../bundle/csv.js';

const requiredText = z.string().trim().min(1, 'must not be empty');
const optionalText = z.string().trim().default('');

export const DirectGrantRowSchema = z.object({
  project_key: requiredText,
  repo_slug: requiredText,
  principal_type: z
    .string()
    .trim()
    .toLowerCase()
    .default('user')
    .refine((value) => value === '' || value === 'user', 'must be "user"')
    .transform((): 'user' => 'user'),
  principal_name: optionalText,
  email: optionalText,
  permission: requiredText,
});

export type DirectGrantRow = z.infer<typeof DirectGrantRowSchema>;

export const GroupGrantRowSchema = z.object({
  project_key: requiredText,
  repo_slug: requiredText,
  principal_type: z
    .string()
    .trim()
    .toLowerCase()
    .default('group')
    .refine((value) => value === '' || value === 'group', 'must be "group"')
    .transform((): 'group' => 'group'),
  // Group names are matched exactly downstream; only surrounding whitespace is dropped here
  principal_name: requiredText,
  permission: requiredText,
});

export type GroupGrantRow = z.infer<typeof GroupGrantRowSchema>;

export const MembershipRowSchema = z.object({
  group: requiredText,
  user_identifier: optionalText,
  email: optionalText,
});

export type MembershipRow = z.infer<typeof MembershipRowSchema>;

export const EffectivePermissionRowSchema = z.object({
  project_key: requiredText,
  repo_slug: requiredText,
  email: requiredText,
  permission: requiredText,
  source: z.enum(['direct', 'group']),
  source_principal: optionalText,
});

export type EffectivePermissionRow = z.infer<typeof EffectivePermissionRowSchema>;

export const IdentityMappingRowSchema = z.object({
  email: optionalText,
  github_login: optionalText,
});

export type IdentityMappingRow = z.infer<typeof IdentityMappingRowSchema>;

/**
 * Result of validating one row
 */
export type RowParseResult<T> = { success: true; data: T } | { success: false; reason: string };

/**
 * Validate a raw row against a schema, flattening zod issues into one reason string.
 */
export function parseRow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  values: Record<string, string>
): RowParseResult<T> {
  const result = schema.safeParse(values);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, reason: formatIssues(result.error) };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Unvalidated rows of the three resolution input tables, with their line numbers
 */
export type RawGrantTables = {
  directGrants: readonly CsvRow[];
  groupGrants: readonly CsvRow[];
  memberships: readonly CsvRow[];
};
