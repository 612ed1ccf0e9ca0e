// Collaborator request errors

import { PermsyncError } from '@permsync/protocol';

/**
 * A request to the source system failed or returned an unexpected body.
 */
export class SourceRequestError extends PermsyncError {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, options: { url: string; status?: number }) {
    super('SOURCE_REQUEST_ERROR', message);
    this.name = 'SourceRequestError';
    this.url = options.url;
    this.status = options.status;
  }
}

/**
 * A request to the target system failed or returned an unexpected body.
 */
export class TargetRequestError extends PermsyncError {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, options: { url: string; status?: number }) {
    super('TARGET_REQUEST_ERROR', message);
    this.name = 'TargetRequestError';
    this.url = options.url;
    this.status = options.status;
  }
}

/**
 * Whether an error is a request error with the given HTTP status.
 */
export function hasStatus(error: unknown, status: number): boolean {
  return (
    (error instanceof SourceRequestError || error instanceof TargetRequestError) &&
    error.status === status
  );
}
