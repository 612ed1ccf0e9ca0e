// @permsync/cli
// The permsync command line: extract from Bitbucket, expand groups, apply to GitHub.

export * from './config.js';
export * from './context.js';
export * from './cli.js';
export * from './commands/index.js';
