/**
 * Load a complex from a dump
 *
 * The whole load is one transaction validated over the entire complex. The
 * tracked components and holes are counted; the genus follows from χ and is
 * rejected unless it is a non-negative integer.
 */

import type { z } from 'zod';
import { type CellId, asEdgeId } from '../topo/handles.js';
import { Complex, type ComplexOptions } from '../topo/Complex.js';
import { DumpFormatError, TopologyError } from '../topo/errors.js';
import { collectHoleLoops, edgeEnds } from '../topo/navigation.js';
import { countComponents, firstError, validateComplex } from '../topo/validate.js';
import { type ComplexDump, complexDumpSchema } from './schema.js';

export interface LoadResult<P> {
  complex: Complex<P>;
  /** Dump identifier → identifier in the new complex */
  ids: Map<number, CellId>;
}

/**
 * Build a complex from a dump already known to have the right shape
 *
 * @throws DumpFormatError for duplicate or unknown identifiers
 * @throws TopologyError naming the invariant the dump violates
 */
export function buildComplex<P>(dump: ComplexDump<P>, options: ComplexOptions = {}): LoadResult<P> {
  const complex = new Complex<P>(options);
  const ids = new Map<number, CellId>();

  complex.mutate(
    'load',
    (tx) => {
      for (const cell of dump.cells) {
        if (ids.has(cell.id)) {
          throw new DumpFormatError(`Cell ${cell.id} appears twice`);
        }
        ids.set(cell.id, cell.dimension === 0 ? tx.createVertex(cell.payload) : tx.createCell(cell.dimension, cell.payload));
      }

      const resolve = (id: number): CellId => {
        const mapped = ids.get(id);
        if (mapped === undefined) {
          throw new DumpFormatError(`Incidence names unknown cell ${id}`);
        }
        return mapped;
      };
      for (const incidence of dump.incidences) {
        tx.link(resolve(incidence.parent), resolve(incidence.child), incidence.orientation);
      }

      const structure = firstError(validateComplex(complex, { checkEuler: false }));
      if (structure) {
        throw new TopologyError(
          `Dump breaks ${structure.invariant}: ${structure.message}`,
          structure.subject === undefined ? [] : [structure.subject],
          structure.invariant
        );
      }

      for (const edge of complex.edges()) {
        const [start, end] = edgeEnds(complex.incidence, edge);
        tx.joinComponents(start, end);
      }
      const components = countComponents(complex);
      const holes = collectHoleLoops(
        complex.incidence,
        complex.allCells(1).map(asEdgeId),
        complex.options.maxTraversalSteps
      ).length;
      const chi = complex.cellCount(0) - complex.cellCount(1) + complex.cellCount(2);
      const twiceGenus = 2 * components - holes - chi;
      if (twiceGenus < 0 || twiceGenus % 2 !== 0) {
        throw new TopologyError(
          `Dump has χ=${chi} with ${components} components and ${holes} holes: genus ${twiceGenus / 2} is not a non-negative integer`,
          [],
          'eulerCharacteristic'
        );
      }
      tx.setCounters({ components, genus: twiceGenus / 2, holes });
    },
    'full'
  );

  return { complex, ids };
}

/**
 * Validate untrusted data against the dump schema and build a complex from it
 *
 * @param payload Schema for cell payloads (`z.unknown()` to accept any)
 * @throws DumpFormatError if the data is not a dump
 */
export function loadComplex<P>(input: unknown, payload: z.ZodType<P>, options: ComplexOptions = {}): LoadResult<P> {
  const result = complexDumpSchema(payload).safeParse(input);
  if (!result.success) {
    throw new DumpFormatError(
      'Not a complex dump',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return buildComplex<P>(result.data, options);
}
