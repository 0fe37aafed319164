import { describe, it, expect } from 'vitest';
import { addHandles, findHandlePair } from './handles.js';
import { cube, tetrahedron } from './primitives.js';
import { dumpComplex } from '../dump/dump.js';
import { attachVolume } from '../euler/volumes.js';
import { DegenerateTopologyError } from '../topo/errors.js';
import { expectValid } from '../../tests/fixtures/complexes.js';

describe('findHandlePair', () => {
  it('takes the first disjoint pair in identifier order', () => {
    expect(findHandlePair(cube().complex)).toEqual([20, 21]);
  });

  it('finds nothing when every pair of faces touches', () => {
    expect(findHandlePair(tetrahedron().complex)).toBeNull();
  });

  it('skips faces bounding a volume', () => {
    const { complex } = cube();
    attachVolume(complex, complex.faces());
    expect(findHandlePair(complex)).toBeNull();
  });
});

describe('addHandles', () => {
  it('adds handles one after another', () => {
    const { complex } = cube();
    const results = addHandles(complex, 2);
    expect(results).toHaveLength(2);
    expect(complex.stats()).toMatchObject({ genus: 2, eulerCharacteristic: -2 });
    expectValid(complex);
  });

  it('adds nothing when a pair runs out', () => {
    const { complex } = tetrahedron();
    const before = dumpComplex(complex);
    expect(() => addHandles(complex, 1)).toThrow(DegenerateTopologyError);
    expect(() => addHandles(complex, 1)).toThrow('No pair of faces left for handle 1 of 1');
    expect(dumpComplex(complex)).toEqual(before);
    expect(complex.genus).toBe(0);
  });
});
