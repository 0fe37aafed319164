/**
 * Edge subdivision and its inverse
 *
 * splitEdge inserts a vertex inside an edge; deleteVertex removes a vertex of
 * degree 2 by joining its two edges. Neither changes χ, genus or holes.
 */

import { type EdgeId, type FaceId, type Orientation, type VertexId, flip } from '../topo/handles.js';
import type { IncidenceReader } from '../topo/incidence.js';
import type { Complex } from '../topo/Complex.js';
import type { EditTransaction } from '../topo/transaction.js';
import { CellInUseError, DegenerateTopologyError } from '../topo/errors.js';
import {
  type Dart,
  dartHead,
  dartTail,
  edgeEnds,
  edgeFaces,
  faceDarts,
  freeDart,
  holeLoopFrom,
  outgoingDarts,
} from '../topo/navigation.js';
import { expectEdge, expectVertex } from './common.js';

export interface SplitEdgeResult {
  /** The vertex inserted inside the edge */
  vertex: VertexId;
  /** The new edge from the inserted vertex to the old end */
  edge: EdgeId;
}

/**
 * Insert a vertex inside an edge
 *
 * The edge keeps its start and now ends at the new vertex; a new edge runs
 * from the new vertex to the old end. Every face on the edge gains the new
 * dart next to the old one.
 */
export function applySplitEdge<P>(tx: EditTransaction<P>, edgeId: EdgeId, payload?: P): SplitEdgeResult {
  const graph = tx.graph;
  const edge = expectEdge(graph, edgeId);
  const [, end] = edgeEnds(graph, edge);
  const faces = graph.coboundaryRefs(edge);

  const vertex = tx.createVertex(payload, end);
  tx.unlink(edge, end);
  tx.link(edge, vertex, 1);
  const created = tx.createEdge(vertex, end);

  for (const ref of faces) {
    const index = graph.boundaryRefs(ref.cell).findIndex((use) => use.cell === edge);
    // +1 runs start→end, so the new dart follows the old one; -1 precedes it
    tx.link(ref.cell, created, ref.orientation, ref.orientation === 1 ? index + 1 : index);
  }

  return { vertex, edge: created };
}

export function splitEdge<P>(complex: Complex<P>, edge: EdgeId, payload?: P): SplitEdgeResult {
  return complex.mutate('splitEdge', (tx) => applySplitEdge(tx, edge, payload));
}

/**
 * Replace the adjacent darts of `survivor` and `removed` in a face by one
 * dart of `survivor`, which will run from `start`
 */
function joinDarts(
  graph: IncidenceReader,
  face: FaceId,
  survivor: EdgeId,
  removed: EdgeId,
  start: VertexId
): Dart[] {
  const darts = faceDarts(graph, face);
  const n = darts.length;
  const s = darts.findIndex((dart) => dart.edge === survivor);
  const r = darts.findIndex((dart) => dart.edge === removed);
  let first: Dart;
  let second: Dart;
  if (s >= 0 && r === (s + 1) % n) {
    [first, second] = [darts[s], darts[r]];
  } else if (r >= 0 && s === (r + 1) % n) {
    [first, second] = [darts[r], darts[s]];
  } else {
    throw new DegenerateTopologyError(
      `${graph.describe(face)} does not pass through ${graph.describe(survivor)} and ${graph.describe(removed)} in turn`,
      [face, survivor, removed]
    );
  }
  const orientation: Orientation = dartTail(graph, first) === start ? 1 : -1;

  const joined: Dart[] = [];
  for (let i = 0; i < n; i++) {
    if (i === r) continue;
    joined.push(i === s ? { edge: survivor, orientation } : darts[i]);
  }
  return joined;
}

/**
 * Remove a vertex of degree 2, joining its two edges into one
 *
 * The edge that ends at the vertex survives (the first one when both or
 * neither do) and is returned; the other edge is destroyed.
 */
export function applyDeleteVertex<P>(tx: EditTransaction<P>, vertexId: VertexId): EdgeId {
  const graph = tx.graph;
  const vertex = expectVertex(graph, vertexId);
  const outgoing = outgoingDarts(graph, vertex);
  if (outgoing.length !== 2) {
    throw new CellInUseError(
      `Cannot delete ${graph.describe(vertex)}: it has ${outgoing.length} edges, not 2`,
      [vertex, ...outgoing.map((dart) => dart.edge)]
    );
  }

  // an outgoing dart of -1 means the vertex is that edge's end
  const survivorIndex = outgoing[0].orientation === -1 || outgoing[1].orientation !== -1 ? 0 : 1;
  const survivor = outgoing[survivorIndex].edge;
  const removed = outgoing[1 - survivorIndex].edge;
  const kept = dartHead(graph, outgoing[survivorIndex]);
  const far = dartHead(graph, outgoing[1 - survivorIndex]);
  if (far === kept) {
    throw new DegenerateTopologyError(
      `Deleting ${graph.describe(vertex)} would leave a self-loop at ${graph.describe(far)}`,
      [vertex, survivor, removed]
    );
  }

  const vertexSide: Orientation = flip(outgoing[survivorIndex].orientation);
  const start = vertexSide === -1 ? far : kept;

  const faces = edgeFaces(graph, survivor);
  const stray = edgeFaces(graph, removed).filter((face) => !faces.includes(face));
  if (stray.length > 0) {
    throw new DegenerateTopologyError(
      `${graph.describe(stray[0])} uses ${graph.describe(removed)} but not ${graph.describe(survivor)}`,
      [vertex, ...stray]
    );
  }

  const plans = faces.map((face) => {
    const darts = joinDarts(graph, face, survivor, removed, start);
    if (darts.length < 3) {
      throw new DegenerateTopologyError(
        `Deleting ${graph.describe(vertex)} would leave ${graph.describe(face)} with ${darts.length} edges`,
        [vertex, face]
      );
    }
    return { face, darts };
  });

  const hole = freeDart(graph, survivor);
  if (hole !== null) {
    const length = holeLoopFrom(graph, hole, tx.maxTraversalSteps).length - 1;
    if (length < 3) {
      throw new DegenerateTopologyError(
        `Deleting ${graph.describe(vertex)} would leave a hole loop of ${length} edges`,
        [vertex, survivor, removed]
      );
    }
  }

  for (const plan of plans) tx.relink(plan.face, []);
  tx.unlink(survivor, vertex);
  tx.unlink(removed, vertex);
  tx.unlink(removed, far);
  tx.link(survivor, far, vertexSide, vertexSide === -1 ? 0 : undefined);
  tx.destroyCell(removed);
  tx.destroyCell(vertex);
  for (const plan of plans) tx.setFaceDarts(plan.face, plan.darts);

  return survivor;
}

export function deleteVertex<P>(complex: Complex<P>, vertex: VertexId): EdgeId {
  return complex.mutate('deleteVertex', (tx) => applyDeleteVertex(tx, vertex));
}
