/**
 * Dimension checks for identifiers passed in by callers
 */

import {
  type CellId,
  type Dimension,
  type EdgeId,
  type FaceId,
  type VertexId,
  type VolumeId,
  asEdgeId,
  asFaceId,
  asVertexId,
  asVolumeId,
  dimensionName,
} from './handles.js';
import type { IncidenceReader } from './incidence.js';
import { DimensionMismatchError } from './errors.js';

function expectDimension(graph: IncidenceReader, id: CellId, dimension: Dimension): CellId {
  const actual = graph.dimensionOf(id);
  if (actual !== dimension) {
    throw new DimensionMismatchError(
      `Expected a ${dimensionName(dimension)}, got ${dimensionName(actual)} ${graph.describe(id)}`,
      [id]
    );
  }
  return id;
}

/**
 * @throws UnknownCellError for a dead identifier
 * @throws DimensionMismatchError for another kind of cell
 */
export function expectVertex(graph: IncidenceReader, id: CellId): VertexId {
  return asVertexId(expectDimension(graph, id, 0));
}

export function expectEdge(graph: IncidenceReader, id: CellId): EdgeId {
  return asEdgeId(expectDimension(graph, id, 1));
}

export function expectFace(graph: IncidenceReader, id: CellId): FaceId {
  return asFaceId(expectDimension(graph, id, 2));
}

export function expectVolume(graph: IncidenceReader, id: CellId): VolumeId {
  return asVolumeId(expectDimension(graph, id, 3));
}
