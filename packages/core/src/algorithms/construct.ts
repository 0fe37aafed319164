/**
 * Polygon-soup construction
 *
 * Builds a complex from polygons given as cycles of vertex indices. Edges
 * are identified by their vertex pair and run in the direction of the first
 * polygon that uses them; each polygon must use a shared edge in the
 * opposite direction from its neighbour.
 */

import { type FaceId, type VertexId, asFaceId, asVertexId } from '../topo/handles.js';
import type { Complex, ComplexOptions } from '../topo/Complex.js';
import { DegenerateTopologyError, DumpFormatError } from '../topo/errors.js';
import type { ComplexDump, DumpCell, DumpIncidence } from '../dump/schema.js';
import { buildComplex } from '../dump/load.js';

export interface PolygonComplex<P> {
  complex: Complex<P>;
  /** Vertex `i` of the input */
  vertices: VertexId[];
  /** Face of polygon `i` of the input */
  faces: FaceId[];
}

export interface FromPolygonsOptions<P> {
  /** Payload per polygon */
  facePayloads?: readonly (P | undefined)[];
  complex?: ComplexOptions;
}

interface SoupEdge {
  id: number;
  start: number;
}

/**
 * Build a complex from a polygon soup
 *
 * @param vertexPayloads Payload per vertex index; the vertex count is the
 * larger of its length and the highest index used plus one
 * @throws DumpFormatError for negative or non-integer indices
 * @throws DegenerateTopologyError for a polygon under 3 vertices or one
 * repeating a vertex
 * @throws InvariantViolationError if two polygons use an edge in the same
 * direction
 * @throws TopologyError if the polygons do not otherwise form a manifold
 */
export function fromPolygons<P>(
  polygons: readonly (readonly number[])[],
  vertexPayloads: readonly (P | undefined)[] = [],
  options: FromPolygonsOptions<P> = {}
): PolygonComplex<P> {
  let vertexCount = vertexPayloads.length;
  polygons.forEach((polygon, index) => {
    if (polygon.length < 3) {
      throw new DegenerateTopologyError(`Polygon ${index} has ${polygon.length} vertices`);
    }
    if (new Set(polygon).size !== polygon.length) {
      throw new DegenerateTopologyError(`Polygon ${index} repeats a vertex`);
    }
    for (const vertex of polygon) {
      if (!Number.isInteger(vertex) || vertex < 0) {
        throw new DumpFormatError(`Polygon ${index} has invalid vertex index ${vertex}`);
      }
      vertexCount = Math.max(vertexCount, vertex + 1);
    }
  });

  const cells: DumpCell<P>[] = [];
  const incidences: DumpIncidence[] = [];
  for (let i = 0; i < vertexCount; i++) {
    const payload = vertexPayloads[i];
    cells.push(payload === undefined ? { id: i, dimension: 0 } : { id: i, dimension: 0, payload });
  }

  const edges = new Map<string, SoupEdge>();
  let nextId = vertexCount;
  const edgeOf = (a: number, b: number): SoupEdge => {
    const key = a < b ? `${a}:${b}` : `${b}:${a}`;
    let edge = edges.get(key);
    if (!edge) {
      edge = { id: nextId++, start: a };
      edges.set(key, edge);
      cells.push({ id: edge.id, dimension: 1 });
      incidences.push({ parent: edge.id, child: a, orientation: -1 }, { parent: edge.id, child: b, orientation: 1 });
    }
    return edge;
  };

  const faceDarts = polygons.map((polygon) =>
    polygon.map((a, i) => {
      const b = polygon[(i + 1) % polygon.length];
      const edge = edgeOf(a, b);
      return { edge: edge.id, orientation: edge.start === a ? 1 : -1 } as const;
    })
  );

  const faceIds: number[] = [];
  faceDarts.forEach((darts, index) => {
    const id = nextId++;
    faceIds.push(id);
    const payload = options.facePayloads?.[index];
    cells.push(payload === undefined ? { id, dimension: 2 } : { id, dimension: 2, payload });
    for (const dart of darts) {
      incidences.push({ parent: id, child: dart.edge, orientation: dart.orientation });
    }
  });

  const dump: ComplexDump<P> = { cells, incidences };
  const { complex, ids } = buildComplex(dump, options.complex);
  const lookup = (id: number) => {
    const mapped = ids.get(id);
    if (mapped === undefined) {
      throw new DumpFormatError(`Cell ${id} was not created`);
    }
    return mapped;
  };

  return {
    complex,
    vertices: Array.from({ length: vertexCount }, (_, i) => asVertexId(lookup(i))),
    faces: faceIds.map((id) => asFaceId(lookup(id))),
  };
}
