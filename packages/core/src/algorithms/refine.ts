/**
 * Topological refinement
 *
 * Each refinement is a composition of splitEdge and splitFace run as a
 * single transaction: it either applies to the whole complex or not at all.
 * New vertices get payloads from an optional interpolator over the payloads
 * of the vertices they are derived from.
 */

import type { EdgeId, FaceId, VertexId } from '../topo/handles.js';
import type { Complex } from '../topo/Complex.js';
import type { EditTransaction } from '../topo/transaction.js';
import { expectFace } from '../topo/expect.js';
import { canonicalFaceDarts, dartTail, edgeEnds, edgesBetween, faceVertices, rotate } from '../topo/navigation.js';
import { applySplitEdge } from '../euler/edges.js';
import { applyCutFace, applySplitFace } from '../euler/faces.js';

/**
 * Payload for a derived vertex from the payloads of its sources
 */
export type Interpolator<P> = (payloads: (P | undefined)[]) => P | undefined;

export interface RefineOptions<P> {
  interpolate?: Interpolator<P>;
}

function interpolateVertices<P>(
  tx: EditTransaction<P>,
  vertices: readonly VertexId[],
  interpolate: Interpolator<P> | undefined
): P | undefined {
  return interpolate ? interpolate(vertices.map((vertex) => tx.payloadOf(vertex))) : undefined;
}

function splitAllEdges<P>(
  tx: EditTransaction<P>,
  edges: readonly EdgeId[],
  interpolate: Interpolator<P> | undefined
): Map<EdgeId, VertexId> {
  const midpoints = new Map<EdgeId, VertexId>();
  for (const edge of edges) {
    const payload = interpolateVertices(tx, edgeEnds(tx.graph, edge), interpolate);
    midpoints.set(edge, applySplitEdge(tx, edge, payload).vertex);
  }
  return midpoints;
}

/**
 * Split every edge once
 *
 * @returns The inserted vertex for each original edge
 */
export function subdivideEdges<P>(complex: Complex<P>, options: RefineOptions<P> = {}): Map<EdgeId, VertexId> {
  return complex.mutate('subdivideEdges', (tx) => splitAllEdges(tx, complex.edges(), options.interpolate));
}

/**
 * Index of a face vertex from which a fan of diagonals can be drawn: one
 * with no edge to any vertex of the face other than its two neighbours
 */
function fanApex<P>(tx: EditTransaction<P>, vertices: readonly VertexId[]): number {
  const n = vertices.length;
  for (let k = 0; k < n; k++) {
    let clear = true;
    for (let step = 2; step < n - 1 && clear; step++) {
      const other = vertices[(k + step) % n];
      if (edgesBetween(tx.graph, vertices[k], other).length > 0 || edgesBetween(tx.graph, other, vertices[k]).length > 0) {
        clear = false;
      }
    }
    if (clear) return k;
  }
  return -1;
}

export interface TriangulateFaceResult {
  /** The centre vertex */
  vertex: VertexId;
  /** The triangles around the centre, the original face first */
  faces: FaceId[];
}

function applyTriangulateFace<P>(tx: EditTransaction<P>, faceId: FaceId, payload: P | undefined): TriangulateFaceResult {
  const face = expectFace(tx.graph, faceId);
  const corners = faceVertices(tx.graph, face);
  // corners[0] and corners[2] may already be joined; the cut is split at once
  const cut = applyCutFace(tx, face, corners[0], corners[2]);
  const center = applySplitEdge(tx, cut.edge, payload).vertex;

  const faces: FaceId[] = [face, applySplitFace(tx, face, center, corners[1]).face];
  let rest = cut.face;
  for (let i = 3; i < corners.length; i++) {
    faces.push(rest);
    rest = applySplitFace(tx, rest, center, corners[i]).face;
  }
  faces.push(rest);
  return { vertex: center, faces };
}

/**
 * Split a face into triangles around a new centre vertex, one per corner
 *
 * The centre's payload is interpolated from the face's corners.
 */
export function triangulateFace<P>(
  complex: Complex<P>,
  face: FaceId,
  options: RefineOptions<P> = {}
): TriangulateFaceResult {
  return complex.mutate('triangulateFace', (tx) => {
    const corners = faceVertices(tx.graph, expectFace(tx.graph, face));
    return applyTriangulateFace(tx, face, interpolateVertices(tx, corners, options.interpolate));
  });
}

/**
 * Split every face of more than 3 edges into triangles
 *
 * A face is fanned from one of its vertices when some vertex has no edge to
 * the face's other non-neighbouring vertices; otherwise it gets a centre
 * vertex as in {@link triangulateFace}.
 *
 * @returns All faces of the result that were created by the split
 */
export function triangulate<P>(complex: Complex<P>, options: RefineOptions<P> = {}): FaceId[] {
  return complex.mutate('triangulate', (tx) => {
    const created: FaceId[] = [];
    for (const face of complex.faces()) {
      const vertices = faceVertices(tx.graph, face);
      if (vertices.length <= 3) continue;
      const apex = fanApex(tx, vertices);
      if (apex < 0) {
        const payload = interpolateVertices(tx, vertices, options.interpolate);
        created.push(...applyTriangulateFace(tx, face, payload).faces.slice(1));
        continue;
      }
      const ordered = rotate(vertices, apex);
      let rest = face;
      for (let j = 2; j < ordered.length - 1; j++) {
        rest = applySplitFace(tx, rest, ordered[0], ordered[j]).face;
        created.push(rest);
      }
    }
    return created;
  });
}

export interface CatmullClarkResult {
  /** Inserted vertex for each original edge */
  edgePoints: Map<EdgeId, VertexId>;
  /** Inserted vertex for each original face */
  facePoints: Map<FaceId, VertexId>;
}

/**
 * One step of Catmull-Clark refinement (topology only)
 *
 * Every edge gets an edge point and every face a face point joined to the
 * edge points around it, so an n-gon becomes n quads. Face points are
 * interpolated from the face's original vertices, edge points from the
 * edge's ends.
 */
export function catmullClark<P>(complex: Complex<P>, options: RefineOptions<P> = {}): CatmullClarkResult {
  return complex.mutate('catmullClark', (tx) => {
    const faces = complex.faces();
    const corners = new Map(faces.map((face) => [face, faceVertices(tx.graph, face)]));
    const edgePoints = splitAllEdges(tx, complex.edges(), options.interpolate);
    const inserted = new Set(edgePoints.values());
    const facePoints = new Map<FaceId, VertexId>();

    for (const face of faces) {
      // edge points in boundary order, starting after an original vertex
      const midpoints = canonicalFaceDarts(tx.graph, face)
        .map((dart) => dartTail(tx.graph, dart))
        .filter((vertex) => inserted.has(vertex));
      const n = midpoints.length;

      const cut = applySplitFace(tx, face, midpoints[n - 1], midpoints[0]);
      const payload = interpolateVertices(tx, corners.get(face) ?? [], options.interpolate);
      const center = applySplitEdge(tx, cut.edge, payload).vertex;
      facePoints.set(face, center);

      let rest = cut.face;
      for (let i = 1; i < n - 1; i++) {
        rest = applySplitFace(tx, rest, center, midpoints[i]).face;
      }
    }

    return { edgePoints, facePoints };
  });
}
