/**
 * Tests for dumping and loading complexes
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { dumpComplex } from './dump.js';
import { buildComplex, loadComplex } from './load.js';
import { type ComplexDump, ComplexDumpSchema } from './schema.js';
import { fromPolygons } from '../algorithms/construct.js';
import { cube } from '../algorithms/primitives.js';
import { createHole } from '../euler/holes.js';
import { DumpFormatError, TopologyError } from '../topo/errors.js';

describe('dumpComplex', () => {
  it('lists cells by dimension and incidences in boundary order', () => {
    const { complex } = fromPolygons([[0, 1, 2]]);
    const dump = dumpComplex(complex);

    expect(dump.cells).toEqual([
      { id: 0, dimension: 0 },
      { id: 1, dimension: 0 },
      { id: 2, dimension: 0 },
      { id: 3, dimension: 1 },
      { id: 4, dimension: 1 },
      { id: 5, dimension: 1 },
      { id: 6, dimension: 2 },
    ]);
    expect(dump.incidences).toEqual([
      { parent: 3, child: 0, orientation: -1 },
      { parent: 3, child: 1, orientation: 1 },
      { parent: 4, child: 1, orientation: -1 },
      { parent: 4, child: 2, orientation: 1 },
      { parent: 5, child: 2, orientation: -1 },
      { parent: 5, child: 0, orientation: 1 },
      { parent: 6, child: 3, orientation: 1 },
      { parent: 6, child: 4, orientation: 1 },
      { parent: 6, child: 5, orientation: 1 },
    ]);
    expect(ComplexDumpSchema.safeParse(dump).success).toBe(true);
  });

  it('includes payloads', () => {
    const { complex } = cube();
    const dump = dumpComplex(complex);
    expect(dump.cells[6]).toEqual({ id: 6, dimension: 0, payload: [1, 1, 1] });
    expect(dump.cells[8]).toEqual({ id: 8, dimension: 1 });
  });
});

describe('loadComplex', () => {
  const point = z.tuple([z.number(), z.number(), z.number()]);

  it('round-trips a fresh complex', () => {
    const { complex } = cube();
    const dump = dumpComplex(complex);
    const { complex: loaded } = loadComplex(JSON.parse(JSON.stringify(dump)), point);

    expect(dumpComplex(loaded)).toEqual(dump);
    expect(loaded.stats()).toEqual(complex.stats());
  });

  it('renumbers around destroyed cells and then stays put', () => {
    const { complex } = cube();
    createHole(complex, complex.faces()[1]);

    const first = loadComplex(dumpComplex(complex), point);
    expect(first.ids.get(22)).toBe(21);
    expect(first.complex.holes).toBe(1);
    expect(first.complex.genus).toBe(0);

    const again = dumpComplex(first.complex);
    expect(dumpComplex(loadComplex(again, point).complex)).toEqual(again);
  });

  it('rejects data that is not a dump', () => {
    let caught: unknown;
    try {
      loadComplex({ cells: 'none', incidences: [] }, z.unknown());
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DumpFormatError);
    if (!(caught instanceof DumpFormatError)) return;
    expect(caught.issues).toHaveLength(1);
    expect(caught.issues[0]).toMatch(/^cells: /);
  });

  it('checks payloads against their schema', () => {
    let caught: unknown;
    try {
      loadComplex({ cells: [{ id: 0, dimension: 0, payload: 'origin' }], incidences: [] }, point);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DumpFormatError);
    if (!(caught instanceof DumpFormatError)) return;
    expect(caught.issues[0]).toMatch(/^cells\.0\.payload: /);
  });

  it('rejects unknown keys', () => {
    expect(() => loadComplex({ cells: [], incidences: [], version: 2 }, z.unknown())).toThrow(DumpFormatError);
  });

  it('rejects duplicate and unknown identifiers', () => {
    expect(() =>
      buildComplex({
        cells: [
          { id: 0, dimension: 0 },
          { id: 0, dimension: 0 },
        ],
        incidences: [],
      })
    ).toThrow('Cell 0 appears twice');

    expect(() =>
      buildComplex({
        cells: [
          { id: 0, dimension: 0 },
          { id: 1, dimension: 1 },
        ],
        incidences: [{ parent: 1, child: 7, orientation: 1 }],
      })
    ).toThrow('Incidence names unknown cell 7');
  });

  it('rejects a dump that breaks an invariant', () => {
    const wire: ComplexDump = {
      cells: [
        { id: 0, dimension: 0 },
        { id: 1, dimension: 0 },
        { id: 2, dimension: 0 },
        { id: 3, dimension: 1 },
        { id: 4, dimension: 1 },
        { id: 5, dimension: 1 },
      ],
      incidences: [
        { parent: 3, child: 0, orientation: -1 },
        { parent: 3, child: 1, orientation: 1 },
        { parent: 4, child: 1, orientation: -1 },
        { parent: 4, child: 2, orientation: 1 },
        { parent: 5, child: 2, orientation: -1 },
        { parent: 5, child: 0, orientation: 1 },
      ],
    };
    expect(() => buildComplex(wire)).toThrow(TopologyError);
    expect(() => buildComplex(wire)).toThrow(
      'Dump breaks radialOrder: Darts around v0 form more than one fan (1 of 2 reached)'
    );
  });

  it('loads an empty dump', () => {
    const { complex } = buildComplex({ cells: [], incidences: [] });
    expect(complex.stats().vertices).toBe(0);
    expect(complex.components).toBe(0);
  });
});
