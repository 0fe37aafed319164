/**
 * Handle attachment
 *
 * Two faces with boundaries of equal length are removed and their boundaries
 * joined by a tube of quads. On one component this adds a handle (genus +1);
 * across two components it joins them into one. Either way χ drops by 2.
 */

import type { EdgeId, FaceId, VertexId } from '../topo/handles.js';
import type { Complex } from '../topo/Complex.js';
import type { EditTransaction } from '../topo/transaction.js';
import { CellInUseError, DegenerateTopologyError, IncompatibleBoundaryError } from '../topo/errors.js';
import { type Dart, canonicalFaceDarts, dartTail } from '../topo/navigation.js';
import { expectFace, volumeSides } from './common.js';

export interface CreateHandleOptions {
  /**
   * Rotation of the second boundary: vertex `i` of the first face joins
   * vertex `offset - i` of the second (both counted from the face's
   * minimal-identifier vertex)
   */
  offset?: number;
}

const DEFAULT_HANDLE_OPTIONS: Required<CreateHandleOptions> = {
  offset: 0,
};

export interface CreateHandleResult {
  /** The connecting edges; edge `i` leaves vertex `i` of the first face */
  edges: EdgeId[];
  /** The tube's quads; quad `i` holds edge `i` of the first face */
  faces: FaceId[];
}

function mod(value: number, n: number): number {
  return ((value % n) + n) % n;
}

/**
 * Remove two faces and join their boundaries with a tube of quads
 *
 * @throws DegenerateTopologyError if the faces are the same or share a vertex
 * @throws CellInUseError if either face bounds a volume
 * @throws IncompatibleBoundaryError if the boundaries differ in length or
 * the offset is not an integer
 */
export function applyCreateHandle<P>(
  tx: EditTransaction<P>,
  f1Id: FaceId,
  f2Id: FaceId,
  options: CreateHandleOptions = {}
): CreateHandleResult {
  const opts = { ...DEFAULT_HANDLE_OPTIONS, ...options };
  const graph = tx.graph;
  const f1 = expectFace(graph, f1Id);
  const f2 = expectFace(graph, f2Id);
  if (!Number.isInteger(opts.offset)) {
    throw new IncompatibleBoundaryError(`Handle offset must be an integer, got ${opts.offset}`, [f1, f2]);
  }
  if (f1 === f2) {
    throw new DegenerateTopologyError(`Cannot attach a handle from ${graph.describe(f1)} to itself; split it first`, [f1]);
  }
  for (const face of [f1, f2]) {
    const sides = volumeSides(graph, face);
    if (sides.length > 0) {
      throw new CellInUseError(`${graph.describe(face)} bounds ${graph.describe(sides[0].cell)}`, [face, sides[0].cell]);
    }
  }

  const first = canonicalFaceDarts(graph, f1);
  const second = canonicalFaceDarts(graph, f2);
  const n = first.length;
  if (second.length !== n) {
    throw new IncompatibleBoundaryError(
      `${graph.describe(f1)} has ${n} edges but ${graph.describe(f2)} has ${second.length}`,
      [f1, f2]
    );
  }

  const a = first.map((dart) => dartTail(graph, dart));
  const secondTails = second.map((dart) => dartTail(graph, dart));
  const common = a.filter((vertex) => secondTails.includes(vertex));
  if (common.length > 0) {
    throw new DegenerateTopologyError(
      `${graph.describe(f1)} and ${graph.describe(f2)} share ${graph.describe(common[0])}`,
      [f1, f2, ...common]
    );
  }
  // vertex i of the first face meets b(i); the second face's dart from b(i+1) to b(i)
  const b = (i: number): VertexId => secondTails[mod(opts.offset - i, n)];
  const back = (i: number): Dart => second[mod(opts.offset - i - 1, n)];

  const joinsComponents = !tx.sameComponent(a[0], secondTails[0]);

  tx.relink(f1, []);
  tx.relink(f2, []);
  tx.destroyCell(f1);
  tx.destroyCell(f2);

  const edges: EdgeId[] = [];
  for (let i = 0; i < n; i++) {
    edges.push(tx.createEdge(a[i], b(i)));
  }
  const faces: FaceId[] = [];
  for (let i = 0; i < n; i++) {
    faces.push(
      tx.createFace([
        first[i],
        { edge: edges[(i + 1) % n], orientation: 1 },
        back(i),
        { edge: edges[i], orientation: -1 },
      ])
    );
  }

  if (joinsComponents) {
    tx.joinComponents(a[0], secondTails[0]);
    tx.adjustCounters({ components: -1 });
  } else {
    tx.adjustCounters({ genus: 1 });
  }

  return { edges, faces };
}

export function createHandle<P>(
  complex: Complex<P>,
  f1: FaceId,
  f2: FaceId,
  options?: CreateHandleOptions
): CreateHandleResult {
  return complex.mutate('createHandle', (tx) => applyCreateHandle(tx, f1, f2, options));
}
