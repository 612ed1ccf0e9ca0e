// Principals - entities that can hold a grant

import type { Email } from './common.js';

/**
 * A user in the source system. The email may be missing at extraction time.
 */
export type UserPrincipal = {
  kind: 'user';
  name: string;
  email?: Email;
};

/**
 * A group in the source system. Group names are matched exactly, never normalized.
 */
export type GroupPrincipal = {
  kind: 'group';
  name: string;
};

export type Principal = UserPrincipal | GroupPrincipal;

export type PrincipalKind = Principal['kind'];
