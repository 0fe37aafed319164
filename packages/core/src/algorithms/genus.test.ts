import { describe, it, expect } from 'vitest';
import { classifySurface, computeGenus, eulerCharacteristic } from './genus.js';
import { addHandles } from './handles.js';
import { cube, polygonDisk, torus } from './primitives.js';
import { createHole } from '../euler/holes.js';
import { Complex } from '../topo/Complex.js';
import { face, twoTetrahedra } from '../../tests/fixtures/complexes.js';

describe('classifySurface', () => {
  it('names the basic surfaces', () => {
    expect(classifySurface(cube().complex).name).toBe('sphere');
    expect(classifySurface(polygonDisk(4).complex).name).toBe('disk');
    expect(classifySurface(torus(3, 3).complex).name).toBe('torus');
    expect(classifySurface(new Complex()).name).toBe('empty');
  });

  it('reports every count', () => {
    expect(classifySurface(torus(4, 3).complex)).toEqual({
      components: 1,
      genus: 1,
      holes: 0,
      eulerCharacteristic: 0,
      closed: true,
      name: 'torus',
    });
  });

  it('names surfaces with holes', () => {
    const { complex } = cube();
    createHole(complex, face(complex, 21));
    createHole(complex, face(complex, 20));
    expect(classifySurface(complex).name).toBe('annulus');
    expect(classifySurface(complex).closed).toBe(false);
  });

  it('names higher genus', () => {
    const { complex } = cube();
    addHandles(complex, 2);
    expect(classifySurface(complex).name).toBe('genus-2 surface');
    createHole(complex, face(complex, 23));
    expect(classifySurface(complex).name).toBe('genus-2 surface with 1 hole');
  });

  it('counts components instead of naming', () => {
    const complex = twoTetrahedra();
    expect(classifySurface(complex).name).toBe('2 components');
    expect(eulerCharacteristic(complex)).toBe(4);
    expect(computeGenus(complex)).toBe(0);
  });
});
