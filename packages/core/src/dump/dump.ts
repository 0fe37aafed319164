/**
 * Dump a complex to plain data
 */

import type { Complex } from '../topo/Complex.js';
import type { ComplexDump, DumpCell, DumpIncidence } from './schema.js';

/**
 * Enumerate every cell (vertices first, then edges, faces and volumes) and
 * every incidence in boundary order
 */
export function dumpComplex<P>(complex: Complex<P>): ComplexDump<P> {
  const cells: DumpCell<P>[] = [];
  const incidences: DumpIncidence[] = [];

  for (const dimension of [0, 1, 2, 3] as const) {
    for (const id of complex.allCells(dimension)) {
      const payload = complex.payload(id);
      cells.push(payload === undefined ? { id, dimension } : { id, dimension, payload });
      for (const ref of complex.boundaryRefs(id)) {
        incidences.push({ parent: id, child: ref.cell, orientation: ref.orientation });
      }
    }
  }

  return { cells, incidences };
}
