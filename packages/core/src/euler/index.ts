/**
 * Euler operators
 *
 * Each operator comes in two forms: `applyX(tx, ...)` edits inside an open
 * transaction (for composing operators), and `x(complex, ...)` runs it as its
 * own validated transaction.
 */

export * from './edges.js';
export * from './faces.js';
export * from './holes.js';
export * from './handle.js';
export * from './volumes.js';
