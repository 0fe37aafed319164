/**
 * Volumes (3-cells)
 *
 * A volume is bounded by a closed, connected, genus-0 shell of faces. Each
 * side of a face bounds at most one volume.
 */

import type { CellId, FaceId, Orientation, VolumeId } from '../topo/handles.js';
import type { Complex } from '../topo/Complex.js';
import type { EditTransaction } from '../topo/transaction.js';
import { CellInUseError, DegenerateTopologyError, IncompatibleBoundaryError } from '../topo/errors.js';
import { ComponentForest } from '../topo/components.js';
import { dartTail, faceDarts } from '../topo/navigation.js';
import { expectFace, expectVolume, volumeSides } from './common.js';

/**
 * Bound a new volume by the given faces
 *
 * @param orientation +1 when the faces point out of the volume
 * @throws IncompatibleBoundaryError if the faces do not close up
 * @throws DegenerateTopologyError if the shell is disconnected, not a
 * sphere, or repeats a face
 * @throws CellInUseError if a face side already bounds a volume
 */
export function applyAttachVolume<P>(
  tx: EditTransaction<P>,
  faceIds: readonly FaceId[],
  orientation: Orientation = 1,
  payload?: P
): VolumeId {
  const graph = tx.graph;
  const faces = faceIds.map((id) => expectFace(graph, id));
  if (faces.length === 0) {
    throw new IncompatibleBoundaryError('A volume needs at least one face');
  }
  if (new Set(faces).size !== faces.length) {
    throw new DegenerateTopologyError('A face appears twice in the shell', [...faces]);
  }
  for (const face of faces) {
    const taken = volumeSides(graph, face).find((side) => side.orientation === orientation);
    if (taken) {
      throw new CellInUseError(
        `This side of ${graph.describe(face)} already bounds ${graph.describe(taken.cell)}`,
        [face, taken.cell]
      );
    }
  }

  // closed: every edge used once in each direction
  const uses = new Map<CellId, number[]>();
  const vertices = new Set<CellId>();
  const index = new Map<FaceId, number>();
  const forest = new ComponentForest();
  const firstFaceOfEdge = new Map<CellId, FaceId>();
  let components = faces.length;
  for (const face of faces) index.set(face, forest.add());
  for (const face of faces) {
    for (const dart of faceDarts(graph, face)) {
      vertices.add(dartTail(graph, dart));
      const list = uses.get(dart.edge) ?? [];
      list.push(dart.orientation);
      uses.set(dart.edge, list);

      const other = firstFaceOfEdge.get(dart.edge);
      const mine = index.get(face);
      const theirs = other === undefined ? undefined : index.get(other);
      if (mine !== undefined && theirs !== undefined && forest.union(mine, theirs) !== null) {
        components--;
      } else if (other === undefined) {
        firstFaceOfEdge.set(dart.edge, face);
      }
    }
  }
  const open = [...uses].filter(([, list]) => list.length !== 2 || list[0] + list[1] !== 0).map(([edge]) => edge);
  if (open.length > 0) {
    throw new IncompatibleBoundaryError(`The faces do not form a closed shell: ${open.length} open edges`, open);
  }
  if (components !== 1) {
    throw new DegenerateTopologyError(`The shell has ${components} components`, [...faces]);
  }
  const chi = vertices.size - uses.size + faces.length;
  if (chi !== 2) {
    throw new DegenerateTopologyError(`The shell has Euler characteristic ${chi}, not 2`, [...faces]);
  }

  return tx.createVolume(
    faces.map((face) => ({ cell: face, orientation })),
    payload
  );
}

export function attachVolume<P>(
  complex: Complex<P>,
  faces: readonly FaceId[],
  orientation: Orientation = 1,
  payload?: P
): VolumeId {
  return complex.mutate('attachVolume', (tx) => applyAttachVolume(tx, faces, orientation, payload));
}

/**
 * Remove a volume, leaving its faces in place
 */
export function applyDeleteVolume<P>(tx: EditTransaction<P>, volumeId: VolumeId): void {
  const volume = expectVolume(tx.graph, volumeId);
  tx.relink(volume, []);
  tx.destroyCell(volume);
}

export function deleteVolume<P>(complex: Complex<P>, volume: VolumeId): void {
  complex.mutate('deleteVolume', (tx) => applyDeleteVolume(tx, volume));
}
