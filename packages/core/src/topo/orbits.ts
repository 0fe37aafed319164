/**
 * Orbit traversal
 *
 * Read-only queries over the neighbourhood of a cell. Every query returns an
 * Orbit: a lazy, finite iterable that can be iterated any number of times
 * (each `for...of` restarts from the beginning). An orbit refuses to start or
 * resume while an operator is in flight, or after the complex has committed
 * an edit since the current iteration started.
 */

import {
  type CellId,
  type Dimension,
  type EdgeId,
  type FaceId,
  type Orientation,
  type VertexId,
  compareCellIds,
} from './handles.js';
import type { Complex } from './Complex.js';
import { ConcurrentMutationError, InvariantViolationError } from './errors.js';
import {
  canonicalFaceDarts,
  collectHoleLoops,
  dartFace,
  dartHead,
  dartTail,
  freeDart,
  holeLoopFrom,
  vertexFan,
} from './navigation.js';

/**
 * A corner of a face boundary: the vertex a dart leaves, and the dart
 */
export interface FaceCorner {
  readonly vertex: VertexId;
  readonly edge: EdgeId;
  readonly orientation: Orientation;
}

/**
 * What an orbit watches to detect edits
 */
export interface OrbitHost {
  readonly version: number;
  readonly isMutating: boolean;
  readonly options: { readonly maxTraversalSteps: number };
}

/**
 * Restartable, guarded traversal
 */
export class Orbit<T> implements Iterable<T> {
  constructor(
    private readonly complex: OrbitHost,
    private readonly description: string,
    private readonly walk: () => Iterable<T>
  ) {}

  *[Symbol.iterator](): Iterator<T> {
    this.check();
    const version = this.complex.version;
    const limit = this.complex.options.maxTraversalSteps;
    let steps = 0;
    for (const item of this.walk()) {
      if (++steps > limit) {
        throw new InvariantViolationError(`${this.description} exceeded ${limit} steps`);
      }
      yield item;
      this.check(version);
    }
  }

  toArray(): T[] {
    return Array.from(this);
  }

  private check(version?: number): void {
    if (this.complex.isMutating) {
      throw new ConcurrentMutationError(`Cannot traverse ${this.description} while an operator is in flight`);
    }
    if (version !== undefined && version !== this.complex.version) {
      throw new ConcurrentMutationError(`${this.description} is stale: the complex changed during traversal`);
    }
  }
}

function orbit<T>(complex: OrbitHost, description: string, walk: () => Iterable<T>): Orbit<T> {
  return new Orbit<T>(complex, description, walk);
}

// ============================================================================
// Around a vertex
// ============================================================================

/**
 * Faces around a vertex, counter-clockwise; for a boundary vertex from one
 * side of the gap to the other
 */
export function vertexStar<P>(complex: Complex<P>, vertex: VertexId): Orbit<FaceId> {
  const v = complex.expectVertex(vertex);
  return orbit(complex, `star of ${complex.describe(v)}`, function* () {
    for (const dart of vertexFan(complex.incidence, v).darts) {
      const face = dartFace(complex.incidence, dart);
      if (face !== null) yield face;
    }
  });
}

/**
 * Edges around a vertex, in the same order as `vertexStar`
 */
export function vertexEdges<P>(complex: Complex<P>, vertex: VertexId): Orbit<EdgeId> {
  const v = complex.expectVertex(vertex);
  return orbit(complex, `edges of ${complex.describe(v)}`, function* () {
    for (const dart of vertexFan(complex.incidence, v).darts) yield dart.edge;
  });
}

/**
 * Neighbouring vertices, in the same order as `vertexEdges`
 */
export function vertexRing<P>(complex: Complex<P>, vertex: VertexId): Orbit<VertexId> {
  const v = complex.expectVertex(vertex);
  return orbit(complex, `ring of ${complex.describe(v)}`, function* () {
    for (const dart of vertexFan(complex.incidence, v).darts) yield dartHead(complex.incidence, dart);
  });
}

// ============================================================================
// Around an edge or a face
// ============================================================================

/**
 * The one or two faces on an edge, the +1 side first
 */
export function edgeRing<P>(complex: Complex<P>, edge: EdgeId): Orbit<FaceId> {
  const e = complex.expectEdge(edge);
  return orbit(complex, `faces of ${complex.describe(e)}`, function* () {
    for (const orientation of [1, -1] as const) {
      const face = dartFace(complex.incidence, { edge: e, orientation });
      if (face !== null) yield face;
    }
  });
}

/**
 * Corners of a face, starting at its minimal-identifier vertex
 */
export function faceBoundary<P>(complex: Complex<P>, face: FaceId): Orbit<FaceCorner> {
  const f = complex.expectFace(face);
  return orbit(complex, `boundary of ${complex.describe(f)}`, function* () {
    for (const dart of canonicalFaceDarts(complex.incidence, f)) {
      yield { vertex: dartTail(complex.incidence, dart), edge: dart.edge, orientation: dart.orientation };
    }
  });
}

/**
 * Faces across each edge of a face, in boundary order
 *
 * Hole edges contribute nothing; a face sharing several edges appears once
 * per shared edge.
 */
export function faceRing<P>(complex: Complex<P>, face: FaceId): Orbit<FaceId> {
  const f = complex.expectFace(face);
  return orbit(complex, `neighbours of ${complex.describe(f)}`, function* () {
    for (const dart of canonicalFaceDarts(complex.incidence, f)) {
      const across = dartFace(complex.incidence, { edge: dart.edge, orientation: dart.orientation === 1 ? -1 : 1 });
      if (across !== null) yield across;
    }
  });
}

// ============================================================================
// Star and link
// ============================================================================

function upwardClosure<P>(complex: Complex<P>, cells: Iterable<CellId>): Set<CellId> {
  const result = new Set<CellId>();
  const pending = [...cells];
  for (let cell = pending.pop(); cell !== undefined; cell = pending.pop()) {
    if (result.has(cell)) continue;
    result.add(cell);
    for (const parent of complex.coboundaryOf(cell)) pending.push(parent);
  }
  return result;
}

function downwardClosure<P>(complex: Complex<P>, cells: Iterable<CellId>): Set<CellId> {
  const result = new Set<CellId>();
  const pending = [...cells];
  for (let cell = pending.pop(); cell !== undefined; cell = pending.pop()) {
    if (result.has(cell)) continue;
    result.add(cell);
    for (const child of complex.boundaryOf(cell)) pending.push(child);
  }
  return result;
}

function byDimensionThenId<P>(complex: Complex<P>, cells: Iterable<CellId>): CellId[] {
  const dimension = (id: CellId): Dimension => complex.dimensionOf(id);
  return [...cells].sort((a, b) => dimension(a) - dimension(b) || compareCellIds(a, b));
}

/**
 * The cell and every cell it lies on the boundary of, directly or not
 */
export function star<P>(complex: Complex<P>, cell: CellId): Orbit<CellId> {
  complex.get(cell);
  return orbit(complex, `star of ${complex.describe(cell)}`, () =>
    byDimensionThenId(complex, upwardClosure(complex, [cell]))
  );
}

/**
 * Closure of the star minus the star of the closure
 */
export function link<P>(complex: Complex<P>, cell: CellId): Orbit<CellId> {
  complex.get(cell);
  return orbit(complex, `link of ${complex.describe(cell)}`, () => {
    const closedStar = downwardClosure(complex, upwardClosure(complex, [cell]));
    const starOfClosure = upwardClosure(complex, downwardClosure(complex, [cell]));
    return byDimensionThenId(
      complex,
      [...closedStar].filter((id) => !starOfClosure.has(id))
    );
  });
}

// ============================================================================
// Hole loops
// ============================================================================

/**
 * Every boundary loop as an ordered list of edges
 */
export function holeLoops<P>(complex: Complex<P>): Orbit<EdgeId[]> {
  return orbit(complex, 'hole loops', function* () {
    const loops = collectHoleLoops(complex.incidence, complex.edges(), complex.options.maxTraversalSteps);
    for (const loop of loops) yield loop.map((dart) => dart.edge);
  });
}

/**
 * Edges of the hole loop through `edge`, starting with it; empty when the
 * edge has a face on both sides
 */
export function holeLoop<P>(complex: Complex<P>, edge: EdgeId): Orbit<EdgeId> {
  const e = complex.expectEdge(edge);
  return orbit(complex, `hole loop of ${complex.describe(e)}`, function* () {
    const start = freeDart(complex.incidence, e);
    if (start === null) return;
    for (const dart of holeLoopFrom(complex.incidence, start, complex.options.maxTraversalSteps)) {
      yield dart.edge;
    }
  });
}
