export * from './schema.js';
export * from './dump.js';
export * from './load.js';
