/**
 * Holes
 *
 * Removing a face leaves its boundary as a hole loop: edges with a face on
 * one side only. A hole is a valid persistent state; closeHole fills it again.
 */

import type { EdgeId, FaceId } from '../topo/handles.js';
import type { Complex } from '../topo/Complex.js';
import type { EditTransaction } from '../topo/transaction.js';
import { CellInUseError, DegenerateTopologyError, IncompatibleBoundaryError } from '../topo/errors.js';
import { canonicalFaceDarts, dartTail, freeDart, holeLoopFrom, isBoundaryEdge, isBoundaryVertex } from '../topo/navigation.js';
import { expectEdge, expectFace, volumeSides } from './common.js';

/**
 * Remove a face, leaving its boundary as a new hole loop
 *
 * @returns The loop's edges, starting at the minimal-identifier vertex
 * @throws CellInUseError if the face bounds a volume
 * @throws DegenerateTopologyError if the face already touches a hole
 */
export function applyCreateHole<P>(tx: EditTransaction<P>, faceId: FaceId): EdgeId[] {
  const graph = tx.graph;
  const face = expectFace(graph, faceId);
  const sides = volumeSides(graph, face);
  if (sides.length > 0) {
    throw new CellInUseError(`${graph.describe(face)} bounds ${graph.describe(sides[0].cell)}`, [face, sides[0].cell]);
  }

  const darts = canonicalFaceDarts(graph, face);
  for (const dart of darts) {
    if (isBoundaryEdge(graph, dart.edge)) {
      throw new DegenerateTopologyError(
        `${graph.describe(face)} already borders a hole along ${graph.describe(dart.edge)}`,
        [face, dart.edge]
      );
    }
    const vertex = dartTail(graph, dart);
    if (isBoundaryVertex(graph, vertex)) {
      throw new DegenerateTopologyError(
        `${graph.describe(face)} already touches a hole at ${graph.describe(vertex)}`,
        [face, vertex]
      );
    }
  }

  tx.relink(face, []);
  tx.destroyCell(face);
  tx.adjustCounters({ holes: 1 });
  return darts.map((dart) => dart.edge);
}

export function createHole<P>(complex: Complex<P>, face: FaceId): EdgeId[] {
  return complex.mutate('createHole', (tx) => applyCreateHole(tx, face));
}

/**
 * Remove a face; the inverse of `closeHole`
 */
export function deleteFace<P>(complex: Complex<P>, face: FaceId): EdgeId[] {
  return complex.mutate('deleteFace', (tx) => applyCreateHole(tx, face));
}

/**
 * Fill a hole loop with a new face
 *
 * `edges` must be exactly the edges of one hole loop, in any order. The new
 * face follows the loop from the first edge given.
 *
 * @throws IncompatibleBoundaryError if the edges are not one hole loop
 */
export function applyCloseHole<P>(tx: EditTransaction<P>, edges: readonly EdgeId[], payload?: P): FaceId {
  const graph = tx.graph;
  if (edges.length < 3) {
    throw new DegenerateTopologyError(`A hole loop needs at least 3 edges, got ${edges.length}`, [...edges]);
  }
  const first = expectEdge(graph, edges[0]);
  for (const edge of edges) expectEdge(graph, edge);

  const start = freeDart(graph, first);
  if (start === null) {
    throw new IncompatibleBoundaryError(`${graph.describe(first)} is not on a hole`, [first]);
  }
  const loop = holeLoopFrom(graph, start, tx.maxTraversalSteps);
  const given = new Set<EdgeId>(edges);
  if (given.size !== edges.length || loop.length !== edges.length || !loop.every((dart) => given.has(dart.edge))) {
    throw new IncompatibleBoundaryError(
      `The ${edges.length} edges given are not the hole loop through ${graph.describe(first)} (${loop.length} edges)`,
      [...edges]
    );
  }

  const face = tx.createFace(loop, payload);
  tx.adjustCounters({ holes: -1 });
  return face;
}

export function closeHole<P>(complex: Complex<P>, edges: readonly EdgeId[], payload?: P): FaceId {
  return complex.mutate('closeHole', (tx) => applyCloseHole(tx, edges, payload));
}
