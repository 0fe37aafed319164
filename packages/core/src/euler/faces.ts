/**
 * Face splitting and merging
 *
 * splitFace cuts a face in two along a new edge between two of its
 * vertices; mergeFaces and deleteEdge remove such an edge again. None of them
 * changes χ, genus or holes.
 */

import { type EdgeId, type FaceId, type VertexId } from '../topo/handles.js';
import type { Complex } from '../topo/Complex.js';
import type { EditTransaction } from '../topo/transaction.js';
import { CellInUseError, DegenerateTopologyError, InvalidSplitError, NotAdjacentError } from '../topo/errors.js';
import { type Dart, dartFace, dartTail, edgeEnds, edgesBetween, faceDarts, rotate } from '../topo/navigation.js';
import { expectEdge, expectFace, expectVertex, sameSides, volumeSides } from './common.js';

export interface SplitFaceResult {
  /** The new edge, running from the first vertex to the second */
  edge: EdgeId;
  /** The new face on the second-to-first side */
  face: FaceId;
}

interface SplitSite {
  face: FaceId;
  v1: VertexId;
  v2: VertexId;
  darts: Dart[];
  /** Positions of `v1` and `v2` among the face's dart tails */
  i: number;
  j: number;
}

function locateSplit<P>(tx: EditTransaction<P>, faceId: FaceId, v1Id: VertexId, v2Id: VertexId): SplitSite {
  const graph = tx.graph;
  const face = expectFace(graph, faceId);
  const v1 = expectVertex(graph, v1Id);
  const v2 = expectVertex(graph, v2Id);
  if (v1 === v2) {
    throw new InvalidSplitError(`Cannot split ${graph.describe(face)} at a single vertex ${graph.describe(v1)}`, [face, v1]);
  }

  const darts = faceDarts(graph, face);
  const tails = darts.map((dart) => dartTail(graph, dart));
  const i = tails.indexOf(v1);
  const j = tails.indexOf(v2);
  if (i < 0 || j < 0) {
    const missing = i < 0 ? v1 : v2;
    throw new InvalidSplitError(`${graph.describe(missing)} is not on ${graph.describe(face)}`, [face, missing]);
  }
  return { face, v1, v2, darts, i, j };
}

function cutAt<P>(tx: EditTransaction<P>, site: SplitSite, payload: P | undefined): SplitFaceResult {
  const graph = tx.graph;
  const { face, darts, i, j } = site;
  const n = darts.length;
  const kept = rotate(darts, i).slice(0, (j - i + n) % n);
  const given = rotate(darts, j).slice(0, (i - j + n) % n);

  const edge = tx.createEdge(site.v1, site.v2);
  tx.setFaceDarts(face, [...kept, { edge, orientation: -1 }]);
  const created = tx.createFace([...given, { edge, orientation: 1 }], payload);

  for (const side of volumeSides(graph, face)) {
    const index = graph.boundaryRefs(side.cell).findIndex((ref) => ref.cell === face);
    tx.link(side.cell, created, side.orientation, index + 1);
  }

  return { edge, face: created };
}

/**
 * Split a face with a new edge from `v1` to `v2`
 *
 * The original face keeps the boundary from `v1` to `v2` and uses the new edge
 * backwards; the new face takes the rest and inherits the original's volumes.
 *
 * @throws InvalidSplitError if the vertices coincide, are not both on the
 * face, or are already joined by an edge
 */
export function applySplitFace<P>(
  tx: EditTransaction<P>,
  faceId: FaceId,
  v1Id: VertexId,
  v2Id: VertexId,
  payload?: P
): SplitFaceResult {
  const graph = tx.graph;
  const site = locateSplit(tx, faceId, v1Id, v2Id);
  const { face, v1, v2 } = site;
  const joining = edgesBetween(graph, v1, v2).concat(edgesBetween(graph, v2, v1));
  if (joining.length > 0) {
    throw new InvalidSplitError(
      `${graph.describe(v1)} and ${graph.describe(v2)} are already joined by ${graph.describe(joining[0])}`,
      [face, v1, v2, ...joining]
    );
  }
  return cutAt(tx, site, payload);
}

/**
 * Split a face like {@link applySplitFace}, even between vertices that are
 * already joined
 *
 * The new edge may then run parallel to an existing one; the caller splits
 * it before the transaction commits.
 */
export function applyCutFace<P>(
  tx: EditTransaction<P>,
  faceId: FaceId,
  v1Id: VertexId,
  v2Id: VertexId,
  payload?: P
): SplitFaceResult {
  return cutAt(tx, locateSplit(tx, faceId, v1Id, v2Id), payload);
}

export function splitFace<P>(
  complex: Complex<P>,
  face: FaceId,
  v1: VertexId,
  v2: VertexId,
  payload?: P
): SplitFaceResult {
  return complex.mutate('splitFace', (tx) => applySplitFace(tx, face, v1, v2, payload));
}

/**
 * Merge two faces sharing exactly one edge; the first face survives
 *
 * @throws NotAdjacentError unless the faces share exactly one edge
 * @throws CellInUseError if the faces bound different volumes
 * @throws DegenerateTopologyError if the merged boundary would not be simple
 */
export function applyMergeFaces<P>(tx: EditTransaction<P>, f1Id: FaceId, f2Id: FaceId): FaceId {
  const graph = tx.graph;
  const f1 = expectFace(graph, f1Id);
  const f2 = expectFace(graph, f2Id);
  if (f1 === f2) {
    throw new NotAdjacentError(`Cannot merge ${graph.describe(f1)} with itself`, [f1]);
  }

  const darts1 = faceDarts(graph, f1);
  const darts2 = faceDarts(graph, f2);
  const shared = darts1.filter((dart) => darts2.some((other) => other.edge === dart.edge));
  if (shared.length !== 1) {
    throw new NotAdjacentError(
      `${graph.describe(f1)} and ${graph.describe(f2)} share ${shared.length} edges, not 1`,
      [f1, f2, ...shared.map((dart) => dart.edge)]
    );
  }
  if (!sameSides(volumeSides(graph, f1), volumeSides(graph, f2))) {
    throw new CellInUseError(`${graph.describe(f1)} and ${graph.describe(f2)} bound different volumes`, [f1, f2]);
  }

  const edge = shared[0].edge;
  const after = (darts: Dart[]): Dart[] => {
    const index = darts.findIndex((dart) => dart.edge === edge);
    return rotate(darts, index + 1).slice(0, darts.length - 1);
  };
  const merged = [...after(darts1), ...after(darts2)];

  const tails = merged.map((dart) => dartTail(graph, dart));
  if (new Set(tails).size !== tails.length) {
    throw new DegenerateTopologyError(
      `Merging ${graph.describe(f1)} and ${graph.describe(f2)} would visit a vertex twice`,
      [f1, f2, edge]
    );
  }

  for (const side of volumeSides(graph, f2)) tx.unlink(side.cell, f2);
  tx.relink(f2, []);
  tx.setFaceDarts(f1, merged);
  const [start, end] = edgeEnds(graph, edge);
  tx.unlink(edge, start);
  tx.unlink(edge, end);
  tx.destroyCell(edge);
  tx.destroyCell(f2);

  return f1;
}

export function mergeFaces<P>(complex: Complex<P>, f1: FaceId, f2: FaceId): FaceId {
  return complex.mutate('mergeFaces', (tx) => applyMergeFaces(tx, f1, f2));
}

/**
 * Remove an edge with a face on both sides, merging the faces
 *
 * The face using the edge backwards survives, so this undoes `splitFace`.
 *
 * @throws CellInUseError for an edge on a hole
 */
export function applyDeleteEdge<P>(tx: EditTransaction<P>, edgeId: EdgeId): FaceId {
  const graph = tx.graph;
  const edge = expectEdge(graph, edgeId);
  const backward = dartFace(graph, { edge, orientation: -1 });
  const forward = dartFace(graph, { edge, orientation: 1 });
  if (backward === null || forward === null) {
    throw new CellInUseError(`${graph.describe(edge)} lies on a hole; close the hole first`, [edge]);
  }
  return applyMergeFaces(tx, backward, forward);
}

export function deleteEdge<P>(complex: Complex<P>, edge: EdgeId): FaceId {
  return complex.mutate('deleteEdge', (tx) => applyDeleteEdge(tx, edge));
}
