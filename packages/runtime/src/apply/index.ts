export * from './applier.js';
