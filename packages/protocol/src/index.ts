// @permsync/protocol
// Data model, permission order, row schemas and tabular codecs shared by every package

export * from './types/index.js';

// Row schemas
export * from './validation/rows.js';

// Bundle codecs and file layout
export * from './bundle/csv.js';
export * from './bundle/ndjson.js';
export * from './bundle/paths.js';

// Errors
export * from './errors.js';
