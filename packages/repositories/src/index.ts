// @permsync/repositories
// Collaborator interfaces and implementations for the source and target systems.
//
// Key concepts:
// - Interfaces define WHAT the phases need from each system, not HOW it is reached
// - Bitbucket and GitHub implementations talk REST; in-memory ones back tests
// - Bundle helpers move the phase tables to and from disk

export * from './interfaces/index.js';
export * from './errors.js';
export * from './in-memory/index.js';
export * from './bitbucket/client.js';
export * from './github/client.js';
export * as bundle from './bundle/index.js';
