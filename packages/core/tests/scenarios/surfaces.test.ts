/**
 * Building surfaces of higher genus and carrying them through refinement,
 * duality and dumps
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  averagePoints,
  catmullClark,
  classifySurface,
  closeHole,
  createHandle,
  createHole,
  cube,
  dual,
  dumpComplex,
  edgeEnds,
  holeLoops,
  loadComplex,
  triangulate,
} from '../../src/index.js';
import { expectValid, face } from '../fixtures/complexes.js';

describe('from a cube to a torus', () => {
  it('attaches a handle between opposite faces', () => {
    const { complex } = cube();
    const { edges } = createHandle(complex, face(complex, 20), face(complex, 21));

    expect(edges.map((id) => edgeEnds(complex.incidence, id))).toEqual([
      [0, 4],
      [3, 7],
      [2, 6],
      [1, 5],
    ]);
    expect(classifySurface(complex)).toEqual({
      components: 1,
      genus: 1,
      holes: 0,
      eulerCharacteristic: 0,
      closed: true,
      name: 'torus',
    });
    expectValid(complex);
  });

  it('opens and closes a hole in the torus', () => {
    const { complex } = cube();
    createHandle(complex, face(complex, 20), face(complex, 21));
    const loop = createHole(complex, face(complex, 23));

    expect(classifySurface(complex).name).toBe('genus-1 surface with 1 hole');
    expect(holeLoops(complex).toArray()).toHaveLength(1);

    closeHole(complex, loop);
    expect(classifySurface(complex).name).toBe('torus');
    expectValid(complex);
  });

  it('refines, dualizes and reloads the torus', () => {
    const { complex } = cube();
    createHandle(complex, face(complex, 20), face(complex, 21));
    catmullClark(complex, { interpolate: averagePoints });
    expect(complex.stats()).toMatchObject({ vertices: 32, edges: 64, faces: 32, genus: 1 });
    expectValid(complex);

    const dualTorus = dual(complex).complex;
    expect(dualTorus.stats()).toMatchObject({ vertices: 32, edges: 64, faces: 32 });
    expect(classifySurface(dualTorus).name).toBe('torus');

    const point = z.tuple([z.number(), z.number(), z.number()]);
    const reloaded = loadComplex(JSON.parse(JSON.stringify(dumpComplex(complex))), point).complex;
    expect(reloaded.stats()).toEqual(complex.stats());
    expect(classifySurface(reloaded).name).toBe('torus');
  });

  it('triangulates the refined torus', () => {
    const { complex } = cube();
    createHandle(complex, face(complex, 20), face(complex, 21));
    catmullClark(complex);
    const created = triangulate(complex);
    expect(created).toHaveLength(32);
    expect(complex.stats()).toMatchObject({ edges: 96, faces: 64, eulerCharacteristic: 0 });
    expectValid(complex);
  });
});
