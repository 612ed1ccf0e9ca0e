// Bundle reading and writing for the tables exchanged between phases.

export * from './types.js';
export * from './export.js';
export * from './import.js';
export * from './fs.js';
