import { describe, it, expect } from 'vitest';
import { attachVolume, deleteVolume } from './volumes.js';
import { splitFace } from './faces.js';
import { cube, torus } from '../algorithms/primitives.js';
import { dumpComplex } from '../dump/dump.js';
import { CellInUseError, DegenerateTopologyError, IncompatibleBoundaryError } from '../topo/errors.js';
import { expectValid, face, twoTetrahedra, vertex } from '../../tests/fixtures/complexes.js';

describe('attachVolume', () => {
  it('bounds a volume by a closed shell', () => {
    const { complex } = cube();
    const volume = attachVolume(complex, complex.faces());

    expect(volume).toBe(26);
    expect(complex.boundaryRefs(volume)).toHaveLength(6);
    expect(complex.coboundaryRefs(face(complex, 20))).toEqual([{ cell: 26, orientation: 1 }]);
    expect(complex.stats()).toMatchObject({ volumes: 1, eulerCharacteristic: 1 });
    expectValid(complex);
  });

  it('allows one volume on each side of a face', () => {
    const { complex } = cube();
    attachVolume(complex, complex.faces());
    expect(() => attachVolume(complex, complex.faces())).toThrow(CellInUseError);
    expect(() => attachVolume(complex, complex.faces())).toThrow('This side of f20 already bounds c26');

    attachVolume(complex, complex.faces(), -1);
    expect(complex.stats()).toMatchObject({ volumes: 2, eulerCharacteristic: 0 });
    expectValid(complex);
  });

  it('refuses an open shell', () => {
    const { complex } = cube();
    expect(() => attachVolume(complex, complex.faces().slice(1))).toThrow(IncompatibleBoundaryError);
    expect(() => attachVolume(complex, [])).toThrow('A volume needs at least one face');
  });

  it('refuses a repeated face', () => {
    const { complex } = cube();
    const faces = complex.faces();
    expect(() => attachVolume(complex, [...faces, faces[0]])).toThrow('A face appears twice in the shell');
  });

  it('refuses a shell that is not a sphere', () => {
    const { complex } = torus(3, 4);
    expect(() => attachVolume(complex, complex.faces())).toThrow(DegenerateTopologyError);
    expect(() => attachVolume(complex, complex.faces())).toThrow('The shell has Euler characteristic 0, not 2');
  });

  it('refuses a disconnected shell', () => {
    const complex = twoTetrahedra();
    expect(() => attachVolume(complex, complex.faces())).toThrow('The shell has 2 components');
  });

  it('passes a face split on to the new face', () => {
    const { complex } = cube();
    const volume = attachVolume(complex, complex.faces());
    const { face: created } = splitFace(complex, face(complex, 22), vertex(complex, 0), vertex(complex, 5));

    expect(complex.boundaryOf(volume)).toEqual([20, 21, 22, created, 23, 24, 25]);
    expectValid(complex);
  });
});

describe('deleteVolume', () => {
  it('leaves the faces in place', () => {
    const { complex } = cube();
    const before = dumpComplex(complex);
    deleteVolume(complex, attachVolume(complex, complex.faces()));
    expect(dumpComplex(complex)).toEqual(before);
  });
});
