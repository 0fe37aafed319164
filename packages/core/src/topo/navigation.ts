/**
 * Dart navigation over the incidence graph
 *
 * A dart is an edge used in one direction. Faces own the darts on their
 * boundary; an edge with a single face has one free dart, which lies on a
 * hole loop. These helpers derive half-edge style navigation (next/prev in a
 * face, rotation around a vertex, walking a hole) from the generic incidence
 * records. They read the raw graph and are used by operators, validation and
 * the public orbit queries alike.
 */

import {
  type CellId,
  type EdgeId,
  type FaceId,
  type Orientation,
  type VertexId,
  asEdgeId,
  asFaceId,
  asVertexId,
  compareCellIds,
  flip,
} from './handles.js';
import type { IncidenceReader } from './incidence.js';
import { InvariantViolationError } from './errors.js';

/**
 * An edge traversed in one direction: +1 runs start→end
 */
export interface Dart {
  readonly edge: EdgeId;
  readonly orientation: Orientation;
}

export function reverseDart(dart: Dart): Dart {
  return { edge: dart.edge, orientation: flip(dart.orientation) };
}

export function sameDart(a: Dart, b: Dart): boolean {
  return a.edge === b.edge && a.orientation === b.orientation;
}

// ============================================================================
// Edges and darts
// ============================================================================

/**
 * Start and end vertex of an edge
 */
export function edgeEnds(graph: IncidenceReader, edge: EdgeId): [VertexId, VertexId] {
  let start: CellId | undefined;
  let end: CellId | undefined;
  for (const ref of graph.boundaryRefs(edge)) {
    if (ref.orientation === -1) start = ref.cell;
    else end = ref.cell;
  }
  if (start === undefined || end === undefined) {
    throw new InvariantViolationError(`${graph.describe(edge)} does not have two end vertices`, [edge]);
  }
  return [asVertexId(start), asVertexId(end)];
}

export function dartTail(graph: IncidenceReader, dart: Dart): VertexId {
  const [start, end] = edgeEnds(graph, dart.edge);
  return dart.orientation === 1 ? start : end;
}

export function dartHead(graph: IncidenceReader, dart: Dart): VertexId {
  const [start, end] = edgeEnds(graph, dart.edge);
  return dart.orientation === 1 ? end : start;
}

/**
 * Face owning a dart, or null for a free dart
 */
export function dartFace(graph: IncidenceReader, dart: Dart): FaceId | null {
  for (const ref of graph.coboundaryRefs(dart.edge)) {
    if (ref.orientation === dart.orientation) return asFaceId(ref.cell);
  }
  return null;
}

export function edgeFaces(graph: IncidenceReader, edge: EdgeId): FaceId[] {
  return graph.coboundaryRefs(edge).map((ref) => asFaceId(ref.cell));
}

export function isBoundaryEdge(graph: IncidenceReader, edge: EdgeId): boolean {
  return graph.coboundarySize(edge) === 1;
}

/**
 * The unowned dart of a boundary edge, or null if the edge is not on a hole
 */
export function freeDart(graph: IncidenceReader, edge: EdgeId): Dart | null {
  const refs = graph.coboundaryRefs(edge);
  if (refs.length !== 1) return null;
  return { edge, orientation: flip(refs[0].orientation) };
}

// ============================================================================
// Faces
// ============================================================================

export function faceDarts(graph: IncidenceReader, face: FaceId): Dart[] {
  return graph.boundaryRefs(face).map((ref) => ({ edge: asEdgeId(ref.cell), orientation: ref.orientation }));
}

export function faceVertices(graph: IncidenceReader, face: FaceId): VertexId[] {
  return faceDarts(graph, face).map((dart) => dartTail(graph, dart));
}

/**
 * Face darts rotated to start at the dart leaving the minimal-identifier vertex
 */
export function canonicalFaceDarts(graph: IncidenceReader, face: FaceId): Dart[] {
  const darts = faceDarts(graph, face);
  if (darts.length === 0) return darts;
  const tails = darts.map((dart) => dartTail(graph, dart));
  let best = 0;
  for (let i = 1; i < tails.length; i++) {
    if (compareCellIds(tails[i], tails[best]) < 0) best = i;
  }
  return rotate(darts, best);
}

function indexOfDart(graph: IncidenceReader, darts: readonly Dart[], face: FaceId, dart: Dart): number {
  const index = darts.findIndex((candidate) => sameDart(candidate, dart));
  if (index < 0) {
    throw new InvariantViolationError(
      `${graph.describe(face)} does not own dart ${graph.describe(dart.edge)}/${dart.orientation}`,
      [face, dart.edge]
    );
  }
  return index;
}

export function nextDart(graph: IncidenceReader, face: FaceId, dart: Dart): Dart {
  const darts = faceDarts(graph, face);
  const index = indexOfDart(graph, darts, face, dart);
  return darts[(index + 1) % darts.length];
}

export function prevDart(graph: IncidenceReader, face: FaceId, dart: Dart): Dart {
  const darts = faceDarts(graph, face);
  const index = indexOfDart(graph, darts, face, dart);
  return darts[(index - 1 + darts.length) % darts.length];
}

/**
 * Rotate a list so that `start` comes first
 */
export function rotate<T>(items: readonly T[], start: number): T[] {
  const n = items.length;
  if (n === 0) return [];
  const offset = ((start % n) + n) % n;
  return items.slice(offset).concat(items.slice(0, offset));
}

// ============================================================================
// Vertices
// ============================================================================

/**
 * Darts leaving a vertex, in co-boundary order
 */
export function outgoingDarts(graph: IncidenceReader, vertex: VertexId): Dart[] {
  // a vertex bounds an edge with -1 as its start: the outgoing dart then runs +1
  return graph.coboundaryRefs(vertex).map((ref) => ({ edge: asEdgeId(ref.cell), orientation: flip(ref.orientation) }));
}

export function vertexDegree(graph: IncidenceReader, vertex: VertexId): number {
  return graph.coboundarySize(vertex);
}

/**
 * Next outgoing dart counter-clockwise around its tail, crossing the face
 * that owns `dart`; null when `dart` is free
 */
export function rotateCcw(graph: IncidenceReader, dart: Dart): Dart | null {
  const face = dartFace(graph, dart);
  if (face === null) return null;
  return reverseDart(prevDart(graph, face, dart));
}

/**
 * Next outgoing dart clockwise around its tail; null at a boundary gap
 */
export function rotateCw(graph: IncidenceReader, dart: Dart): Dart | null {
  const incoming = reverseDart(dart);
  const face = dartFace(graph, incoming);
  if (face === null) return null;
  return nextDart(graph, face, incoming);
}

/**
 * The outgoing darts around a vertex in counter-clockwise order
 *
 * For a boundary vertex the fan starts just after the gap and ends with the
 * free dart leading along the hole; `closed` is false.
 */
export interface VertexFan {
  readonly darts: Dart[];
  readonly closed: boolean;
}

export function vertexFan(graph: IncidenceReader, vertex: VertexId): VertexFan {
  const outgoing = outgoingDarts(graph, vertex);
  if (outgoing.length === 0) return { darts: [], closed: false };
  // A valid fan visits every incident edge once; more steps mean a broken rotation
  const limit = outgoing.length;

  const first = outgoing[0];
  let start = first;
  let closed = false;
  for (let step = 0; step <= limit; step++) {
    const previous = rotateCw(graph, start);
    if (previous === null) break;
    if (sameDart(previous, first)) {
      closed = true;
      break;
    }
    start = previous;
  }

  const darts: Dart[] = [start];
  let current = start;
  for (let step = 0; step < limit; step++) {
    const following = rotateCcw(graph, current);
    if (following === null || sameDart(following, start)) break;
    darts.push(following);
    current = following;
  }
  return { darts, closed };
}

export function isBoundaryVertex(graph: IncidenceReader, vertex: VertexId): boolean {
  return outgoingDarts(graph, vertex).some((dart) => isBoundaryEdge(graph, dart.edge));
}

/**
 * Edges joining two vertices
 */
export function edgesBetween(graph: IncidenceReader, a: VertexId, b: VertexId): EdgeId[] {
  const result: EdgeId[] = [];
  for (const dart of outgoingDarts(graph, a)) {
    if (dartHead(graph, dart) === b) result.push(dart.edge);
  }
  return result;
}

// ============================================================================
// Hole loops
// ============================================================================

/**
 * The free dart that continues a hole loop after `dart`
 */
export function nextFreeDart(graph: IncidenceReader, dart: Dart): Dart | null {
  const head = dartHead(graph, dart);
  for (const candidate of outgoingDarts(graph, head)) {
    if (graph.coboundarySize(candidate.edge) === 1 && dartFace(graph, candidate) === null) {
      return candidate;
    }
  }
  return null;
}

/**
 * Walk the hole loop through a free dart
 *
 * @throws InvariantViolationError if the loop does not close within `maxSteps`
 */
export function holeLoopFrom(graph: IncidenceReader, start: Dart, maxSteps: number): Dart[] {
  const loop: Dart[] = [start];
  let current = start;
  for (let step = 0; step < maxSteps; step++) {
    const following = nextFreeDart(graph, current);
    if (following === null) {
      throw new InvariantViolationError(`Hole loop through ${graph.describe(start.edge)} is open`, [start.edge]);
    }
    if (sameDart(following, start)) return loop;
    loop.push(following);
    current = following;
  }
  throw new InvariantViolationError(`Hole loop through ${graph.describe(start.edge)} does not close`, [start.edge]);
}

/**
 * Every hole loop reachable from the given edges, each starting at the first
 * free dart met in iteration order
 */
export function collectHoleLoops(graph: IncidenceReader, edges: Iterable<EdgeId>, maxSteps: number): Dart[][] {
  const loops: Dart[][] = [];
  const visited = new Set<EdgeId>();
  for (const edge of edges) {
    if (visited.has(edge)) continue;
    const start = freeDart(graph, edge);
    if (start === null) continue;
    const loop = holeLoopFrom(graph, start, maxSteps);
    for (const dart of loop) visited.add(dart.edge);
    loops.push(loop);
  }
  return loops;
}
