/**
 * Complex-level algorithms built from the Euler operators
 */

export * from './construct.js';
export * from './primitives.js';
export * from './genus.js';
export * from './handles.js';
export * from './refine.js';
export * from './dual.js';
