/**
 * Operator inverse laws and refusals over whole complexes
 */

import { describe, it, expect } from 'vitest';
import {
  type Complex,
  DegenerateTopologyError,
  InvalidSplitError,
  NotAdjacentError,
  UnknownCellError,
  catmullClark,
  closeHole,
  createHole,
  cube,
  deleteVertex,
  dumpComplex,
  faceVertices,
  mergeFaces,
  polygonDisk,
  splitEdge,
  splitFace,
  tetrahedron,
  torus,
} from '../../src/index.js';
import { edge, expectValid, face, vertex } from '../fixtures/complexes.js';

function expectUnchanged<P>(complex: Complex<P>, edit: () => unknown): void {
  const before = dumpComplex(complex);
  const version = complex.version;
  expect(edit).toThrow();
  expect(dumpComplex(complex)).toEqual(before);
  expect(complex.version).toBe(version);
}

describe('inverse laws', () => {
  const complexes = {
    tetrahedron: () => tetrahedron().complex,
    cube: () => cube().complex,
    torus: () => torus(3, 4).complex,
    disk: () => polygonDisk(6).complex,
    'refined cube': () => {
      const { complex } = cube();
      catmullClark(complex);
      return complex;
    },
  };

  for (const [name, build] of Object.entries(complexes)) {
    it(`deleteVertex undoes splitEdge on every edge of the ${name}`, () => {
      const complex = build();
      const before = dumpComplex(complex);
      for (const id of complex.edges()) {
        const { vertex: inserted } = splitEdge(complex, id);
        expect(deleteVertex(complex, inserted)).toBe(id);
        expect(dumpComplex(complex)).toEqual(before);
      }
      expectValid(complex);
    });

    it(`mergeFaces undoes splitFace on every face of the ${name}`, () => {
      const complex = build();
      const before = dumpComplex(complex);
      for (const id of complex.faces()) {
        const corners = faceVertices(complex.incidence, id);
        if (corners.length < 4) continue;
        const { face: created } = splitFace(complex, id, corners[0], corners[2]);
        expect(mergeFaces(complex, id, created)).toBe(id);
        expect(dumpComplex(complex)).toEqual(before);
      }
    });
  }

  it('closeHole refills every face of a cube', () => {
    const { complex } = cube();
    for (const id of complex.faces()) {
      const loop = createHole(complex, id);
      expect(complex.holes).toBe(1);
      const filled = closeHole(complex, loop);
      expect(faceVertices(complex.incidence, filled)).toHaveLength(4);
      expect(complex.holes).toBe(0);
      expectValid(complex);
    }
    expect(complex.stats()).toMatchObject({ vertices: 8, edges: 12, faces: 6 });
  });
});

describe('a tetrahedron edited step by step', () => {
  // e4 0→1; f10 = 0 1 2
  it('keeps χ through a split edge and a split face', () => {
    const { complex } = tetrahedron();
    const { vertex: v14, edge: e15 } = splitEdge(complex, edge(complex, 4));
    expect([v14, e15]).toEqual([14, 15]);
    expect(complex.stats()).toMatchObject({ vertices: 5, edges: 7, faces: 4, eulerCharacteristic: 2 });

    const cut = splitFace(complex, face(complex, 10), v14, vertex(complex, 2));
    expect(cut).toEqual({ edge: 16, face: 17 });
    expect(faceVertices(complex.incidence, face(complex, 10))).toEqual([14, 1, 2]);
    expect(faceVertices(complex.incidence, cut.face)).toEqual([2, 0, 14]);
    expect(complex.stats()).toMatchObject({ vertices: 5, edges: 8, faces: 5, eulerCharacteristic: 2 });
    expectValid(complex);
  });
});

describe('refused edits change nothing', () => {
  it('leaves the complex as it was', () => {
    const { complex } = cube();
    expectUnchanged(complex, () => splitFace(complex, face(complex, 22), vertex(complex, 0), vertex(complex, 1)));
    expectUnchanged(complex, () => mergeFaces(complex, face(complex, 20), face(complex, 21)));
    expectUnchanged(complex, () => deleteVertex(complex, vertex(complex, 0)));
    expectUnchanged(complex, () => closeHole(complex, [8, 9, 10, 11].map((id) => edge(complex, id))));
  });

  it('names the reason', () => {
    const { complex } = cube();
    expect(() => splitFace(complex, face(complex, 22), vertex(complex, 0), vertex(complex, 0))).toThrow(
      InvalidSplitError
    );
    expect(() => mergeFaces(complex, face(complex, 20), face(complex, 21))).toThrow(NotAdjacentError);
    const triangle = polygonDisk(3).complex;
    expect(() => deleteVertex(triangle, vertex(triangle, 0))).toThrow(DegenerateTopologyError);
  });

  it('rejects identifiers of destroyed cells', () => {
    const { complex } = cube();
    const { vertex: inserted, edge: created } = splitEdge(complex, edge(complex, 8));
    deleteVertex(complex, inserted);
    expect(() => splitEdge(complex, created)).toThrow(UnknownCellError);
    expect(() => splitFace(complex, face(complex, 20), inserted, vertex(complex, 2))).toThrow(UnknownCellError);
  });
});
