/**
 * Poincaré dual of a closed 2-complex
 *
 * Each face becomes a vertex, each edge an edge crossing it, and each vertex
 * the face bounded by the edges dual to its star. The dual edge of `e` runs
 * from the face using `e` backwards to the face using it forwards, so the
 * dual is oriented consistently with the original.
 */

import type { EdgeId, FaceId, VertexId } from '../topo/handles.js';
import { asFaceId, asVertexId } from '../topo/handles.js';
import type { Complex, ComplexOptions } from '../topo/Complex.js';
import { DegenerateTopologyError, DumpFormatError, IncompatibleBoundaryError } from '../topo/errors.js';
import { dartFace, vertexFan } from '../topo/navigation.js';
import type { ComplexDump, DumpCell, DumpIncidence } from '../dump/schema.js';
import { buildComplex } from '../dump/load.js';

export interface DualComplex<P> {
  complex: Complex<P>;
  /** Dual vertex of each original face */
  vertexOfFace: Map<FaceId, VertexId>;
  /** Dual face of each original vertex */
  faceOfVertex: Map<VertexId, FaceId>;
}

/**
 * Build the dual of a closed surface complex
 *
 * Payloads of original faces move to their dual vertices and payloads of
 * original vertices to their dual faces.
 *
 * @throws IncompatibleBoundaryError if the complex has holes or volumes
 * @throws DegenerateTopologyError if a vertex has fewer than 3 edges
 */
export function dual<P>(complex: Complex<P>, options?: ComplexOptions): DualComplex<P> {
  if (complex.holes > 0 || complex.cellCount(3) > 0) {
    throw new IncompatibleBoundaryError(
      `Only closed surfaces have a dual here (holes=${complex.holes}, volumes=${complex.cellCount(3)})`
    );
  }
  const graph = complex.incidence;
  const cells: DumpCell<P>[] = [];
  const incidences: DumpIncidence[] = [];

  const faces = complex.faces();
  faces.forEach((face, index) => {
    const payload = complex.payload(face);
    cells.push(payload === undefined ? { id: index, dimension: 0 } : { id: index, dimension: 0, payload });
  });
  const vertexIndex = new Map(faces.map((face, index) => [face, index]));
  const dualVertex = (face: FaceId | null): number => {
    const index = face === null ? undefined : vertexIndex.get(face);
    if (index === undefined) {
      throw new IncompatibleBoundaryError('An edge has no face on one side');
    }
    return index;
  };

  let nextId = faces.length;
  const edgeIndex = new Map<EdgeId, number>();
  for (const edge of complex.edges()) {
    const id = nextId++;
    edgeIndex.set(edge, id);
    cells.push({ id, dimension: 1 });
    incidences.push(
      { parent: id, child: dualVertex(dartFace(graph, { edge, orientation: -1 })), orientation: -1 },
      { parent: id, child: dualVertex(dartFace(graph, { edge, orientation: 1 })), orientation: 1 }
    );
  }

  const vertices = complex.vertices();
  const faceIndex = new Map<VertexId, number>();
  for (const vertex of vertices) {
    const fan = vertexFan(graph, vertex);
    if (fan.darts.length < 3) {
      throw new DegenerateTopologyError(
        `${complex.describe(vertex)} has ${fan.darts.length} edges; its dual face would be degenerate`,
        [vertex]
      );
    }
    const id = nextId++;
    faceIndex.set(vertex, id);
    const payload = complex.payload(vertex);
    cells.push(payload === undefined ? { id, dimension: 2 } : { id, dimension: 2, payload });
    for (const dart of fan.darts) {
      const edge = edgeIndex.get(dart.edge);
      if (edge === undefined) {
        throw new DumpFormatError(`No dual edge for ${complex.describe(dart.edge)}`);
      }
      incidences.push({ parent: id, child: edge, orientation: dart.orientation });
    }
  }

  const dump: ComplexDump<P> = { cells, incidences };
  const built = buildComplex(dump, options);
  const lookup = (id: number) => {
    const mapped = built.ids.get(id);
    if (mapped === undefined) {
      throw new DumpFormatError(`Cell ${id} was not created`);
    }
    return mapped;
  };

  return {
    complex: built.complex,
    vertexOfFace: new Map(faces.map((face, index) => [face, asVertexId(lookup(index))])),
    faceOfVertex: new Map(vertices.map((vertex) => {
      const id = faceIndex.get(vertex);
      if (id === undefined) {
        throw new DumpFormatError(`No dual face for ${complex.describe(vertex)}`);
      }
      return [vertex, asFaceId(lookup(id))];
    })),
  };
}
