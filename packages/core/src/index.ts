/**
 * @topocell/core - oriented cell complex kernel
 *
 * ## Primary API
 * - Complex: owns the cells and runs every edit as a validated transaction
 * - Euler operators: splitEdge, splitFace, createHandle and friends
 * - Orbits: guarded traversal around vertices, edges and faces
 *
 * ## Building blocks
 * - topo: identifiers, registry, incidence graph, validation
 * - algorithms: construction, refinement, duals, classification
 * - dump: plain-data serialization of a complex
 * - num: point payloads
 */

// =============================================================================
// Topology core
// =============================================================================
export * from './topo/index.js';

// =============================================================================
// Euler operators
// =============================================================================
export * from './euler/index.js';

// =============================================================================
// Complex-level algorithms
// =============================================================================
export * from './algorithms/index.js';

// =============================================================================
// Serialization
// =============================================================================
export * from './dump/index.js';

// =============================================================================
// Point payloads
// =============================================================================
export {
  vec3,
  type Vec3,
  ZERO3,
  add3,
  mul3,
  centroid3,
  averagePoints,
} from './num/vec3.js';
