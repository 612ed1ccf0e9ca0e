// Common types used across the protocol

/**
 * Email address, the only identity key shared by the source and target systems.
 * Always trimmed and lower-cased once it has passed the identity normalizer.
 */
export type Email = string;

/**
 * Login of an account in the target system
 */
export type Login = string;
