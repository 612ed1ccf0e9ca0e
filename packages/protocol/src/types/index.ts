// Re-export all protocol types

export * from './common.js';
export * from './repositories.js';
export * from './permissions.js';
export * from './translation.js';
export * from './principals.js';
export * from './grants.js';
export * from './effective.js';
export * from './diagnostics.js';
