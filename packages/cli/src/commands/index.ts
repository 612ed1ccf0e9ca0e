export * from './args.js';
export * from './extract.js';
export * from './expand.js';
export * from './apply.js';
