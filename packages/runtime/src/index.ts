// @permsync/runtime
// Resolution engine and the orchestration of the extract, expand and apply phases.
//
// Key concepts:
// - Resolution is a pure, synchronous transform: raw grants in, one permission per user and repository out
// - Per-row problems become diagnostics; only a broken uniqueness invariant is an error
// - Extraction and application talk to collaborators through the interfaces in @permsync/repositories

export * from './errors.js';
export * from './logging.js';
export * from './resolution/index.js';
export * from './boundary/index.js';
export * from './extraction/index.js';
export * from './apply/index.js';
