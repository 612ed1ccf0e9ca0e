// Diagnostics - recoverable problems reported alongside resolution output

import type { RepositoryKey } from './repositories.js';

export type DiagnosticSeverity = 'info' | 'warning';

/**
 * A direct grant or membership row without a usable email.
 */
export type SkippedMissingEmailDiagnostic = {
  kind: 'skipped-missing-email';
  severity: 'warning';
  record: 'direct-grant' | 'membership';
  repository?: RepositoryKey;
  principalName?: string;
  groupName?: string;
  userIdentifier?: string;
};

/**
 * A group granted on a repository that has no known members.
 */
export type EmptyGroupDiagnostic = {
  kind: 'empty-group';
  severity: 'info';
  repository: RepositoryKey;
  groupName: string;
};

/**
 * A repository that had input grants but produced no effective permission.
 */
export type ZeroOutputRepositoryDiagnostic = {
  kind: 'zero-output-repository';
  severity: 'warning';
  repository: RepositoryKey;
};

/**
 * A source permission name with no canonical translation.
 */
export type UnknownPermissionDiagnostic = {
  kind: 'unknown-permission';
  severity: 'warning';
  table: TableName;
  line: number;
  permission: string;
};

/**
 * A tabular row that failed its schema.
 */
export type InvalidRowDiagnostic = {
  kind: 'invalid-row';
  severity: 'warning';
  table: TableName;
  line: number;
  reason: string;
};

export type TableName = 'direct-grants' | 'group-grants' | 'memberships';

export type Diagnostic =
  | SkippedMissingEmailDiagnostic
  | EmptyGroupDiagnostic
  | ZeroOutputRepositoryDiagnostic
  | UnknownPermissionDiagnostic
  | InvalidRowDiagnostic;

export type DiagnosticKind = Diagnostic['kind'];

/**
 * One-line human-readable rendering, used for operator logs.
 */
export function describeDiagnostic(diagnostic: Diagnostic): string {
  switch (diagnostic.kind) {
    case 'skipped-missing-email':
      return diagnostic.record === 'direct-grant'
        ? `Skipping direct grant without email for ${diagnostic.principalName ?? '<unknown>'} on ${formatRepository(diagnostic.repository)}`
        : `Skipping member ${diagnostic.userIdentifier ?? '<unknown>'} of group ${diagnostic.groupName ?? '<unknown>'} without email`;
    case 'empty-group':
      return `Group ${diagnostic.groupName} has permissions on ${formatRepository(diagnostic.repository)} but no known members`;
    case 'zero-output-repository':
      return `Repository ${formatRepository(diagnostic.repository)} had grants but produced no effective permissions`;
    case 'unknown-permission':
      return `Unknown permission "${diagnostic.permission}" in ${diagnostic.table} line ${diagnostic.line}`;
    case 'invalid-row':
      return `Invalid row in ${diagnostic.table} line ${diagnostic.line}: ${diagnostic.reason}`;
  }
}

function formatRepository(repository: RepositoryKey | undefined): string {
  return repository ? `${repository.projectKey}/${repository.repoSlug}` : '<unknown repository>';
}
