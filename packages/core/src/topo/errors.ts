/**
 * Complex Error Types
 *
 * Typed errors for every way a topology query or edit can be refused.
 * None of them is recovered internally: operators roll back and rethrow.
 */

import type { CellId } from './handles.js';

/**
 * Names of the manifold invariants a committed complex satisfies
 *
 * - incidenceConsistency: boundary and co-boundary records mirror each other
 * - boundaryCycle: edges have two ends, faces a simple closed cycle, volumes a closed shell
 * - radialOrder: edges carry one or two faces, vertices a single fan
 * - eulerCharacteristic: counted χ matches the tracked components, genus and holes
 * - danglingReference: no record names a dead cell
 */
export type InvariantName =
  | 'incidenceConsistency'
  | 'boundaryCycle'
  | 'radialOrder'
  | 'eulerCharacteristic'
  | 'danglingReference';

/**
 * Base class for complex errors
 */
export abstract class ComplexError extends Error {
  /** Cells the error is about, for callers deciding whether to retry */
  readonly cells: readonly CellId[];

  constructor(message: string, cells: readonly CellId[] = []) {
    super(message);
    this.name = this.constructor.name;
    this.cells = cells;
  }
}

/**
 * The identifier was never allocated, or its cell has been destroyed
 */
export class UnknownCellError extends ComplexError {
  constructor(id: CellId, message = `Unknown cell ${id}`) {
    super(message, [id]);
  }
}

/**
 * A cell was destroyed while an incidence record still names it
 */
export class DanglingReferenceError extends ComplexError {
  constructor(id: CellId, message = `Cell ${id} is still referenced`) {
    super(message, [id]);
  }
}

/**
 * A cell of the wrong dimension was passed where a specific kind is required
 */
export class DimensionMismatchError extends ComplexError {}

/**
 * An edit was attempted while another one is in flight, or a traversal
 * observed a complex that changed underneath it
 */
export class ConcurrentMutationError extends ComplexError {}

/**
 * A primitive link/unlink would break bidirectional consistency
 */
export class InvariantViolationError extends ComplexError {}

/**
 * Semantic failure of an Euler operator
 *
 * Raised directly (with `invariant` set) when post-edit validation fails;
 * its subclasses report precondition failures.
 */
export class TopologyError extends ComplexError {
  readonly invariant?: InvariantName;

  constructor(message: string, cells: readonly CellId[] = [], invariant?: InvariantName) {
    super(message, cells);
    this.invariant = invariant;
  }
}

/**
 * split_face vertices are not both on the face, coincide, or are already joined
 */
export class InvalidSplitError extends TopologyError {}

/**
 * The faces do not share exactly one edge
 */
export class NotAdjacentError extends TopologyError {}

/**
 * Boundaries cannot be joined: different lengths, or not a hole loop
 */
export class IncompatibleBoundaryError extends TopologyError {}

/**
 * The result would contain a face under 3 edges, a self-loop or a
 * non-manifold vertex or edge
 */
export class DegenerateTopologyError extends TopologyError {}

/**
 * Removing the cell would orphan a higher-dimensional cell
 */
export class CellInUseError extends TopologyError {}

/**
 * A dump does not have the expected shape, or names cells inconsistently
 */
export class DumpFormatError extends ComplexError {
  /** One line per problem, as `path: message` */
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}
