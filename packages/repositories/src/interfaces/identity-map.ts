import type { Email, Login } from '@permsync/protocol';

/**
 * Mapping from source-system email to target-system login.
 * Lookups are case-insensitive on the email.
 */
export interface IdentityMap {
  /**
   * Login for an email
   * @returns The login, or undefined if the email is not mapped
   */
  resolve(email: Email): Login | undefined;

  /**
   * Number of mapped emails
   */
  readonly size: number;
}
