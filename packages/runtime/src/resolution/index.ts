// Resolution - turns raw grants into effective permissions

export * from './normalize.js';
export * from './expand.js';
export * from './reduce.js';
export * from './partition.js';
export * from './validate.js';
export * from './engine.js';
export * from './determinism.js';
