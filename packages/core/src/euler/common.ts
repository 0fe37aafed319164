/**
 * Shared precondition helpers for Euler operators
 */

import type { FaceId } from '../topo/handles.js';
import type { IncidenceReader, IncidenceRef } from '../topo/incidence.js';

export { expectEdge, expectFace, expectVertex, expectVolume } from '../topo/expect.js';

/**
 * Volumes bounded by a face, with the orientation each uses it with
 */
export function volumeSides(graph: IncidenceReader, face: FaceId): IncidenceRef[] {
  return graph.coboundaryRefs(face);
}

export function sameSides(a: readonly IncidenceRef[], b: readonly IncidenceRef[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((ref) => b.some((other) => other.cell === ref.cell && other.orientation === ref.orientation));
}
