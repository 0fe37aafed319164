/**
 * Handle attachment sequences
 */

import type { FaceId } from '../topo/handles.js';
import type { Complex } from '../topo/Complex.js';
import { DegenerateTopologyError } from '../topo/errors.js';
import { faceVertices } from '../topo/navigation.js';
import { type CreateHandleResult, applyCreateHandle } from '../euler/handle.js';

/**
 * First pair of faces (in identifier order) that a handle can join: equal
 * boundary length, no shared vertex, no volume
 */
export function findHandlePair<P>(complex: Complex<P>): [FaceId, FaceId] | null {
  const graph = complex.incidence;
  const candidates = complex.faces().filter((face) => graph.coboundarySize(face) === 0);
  const vertices = new Map(candidates.map((face) => [face, new Set(faceVertices(graph, face))]));

  for (let i = 0; i < candidates.length; i++) {
    const a = vertices.get(candidates[i]);
    if (!a) continue;
    for (let j = i + 1; j < candidates.length; j++) {
      const b = vertices.get(candidates[j]);
      if (!b || b.size !== a.size) continue;
      if ([...a].every((vertex) => !b.has(vertex))) {
        return [candidates[i], candidates[j]];
      }
    }
  }
  return null;
}

/**
 * Attach `count` handles, each between the first suitable pair of faces
 *
 * All handles are attached in one transaction.
 *
 * @throws DegenerateTopologyError when no suitable pair is left
 */
export function addHandles<P>(complex: Complex<P>, count: number): CreateHandleResult[] {
  return complex.mutate('addHandles', (tx) => {
    const results: CreateHandleResult[] = [];
    for (let i = 0; i < count; i++) {
      const pair = findHandlePair(complex);
      if (pair === null) {
        throw new DegenerateTopologyError(`No pair of faces left for handle ${i + 1} of ${count}`);
      }
      results.push(applyCreateHandle(tx, pair[0], pair[1]));
    }
    return results;
  });
}
