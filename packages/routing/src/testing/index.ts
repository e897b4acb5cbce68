export * from './in-memory-cluster.js';
export * from './manual-clock.js';
