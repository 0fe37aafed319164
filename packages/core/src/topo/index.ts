/**
 * Cell complex topology module
 *
 * - handles.ts: Branded identifiers and orientation
 * - registry.ts: Identifier allocation and liveness
 * - incidence.ts: Oriented boundary/co-boundary records
 * - Complex.ts: The owning complex and its transactions
 * - orbits.ts: Guarded, restartable traversal queries
 * - validate.ts: Invariant checks and reports
 */

export * from './handles.js';
export * from './errors.js';
export * from './expect.js';
export * from './registry.js';
export * from './incidence.js';
export * from './components.js';
export * from './navigation.js';
export * from './transaction.js';
export * from './Complex.js';
export * from './orbits.js';
export * from './validate.js';
