import { describe, it, expect, vi, afterEach } from 'vitest';
import { Complex } from './Complex.js';
import { SLOT_SPACE, asCellId } from './handles.js';
import {
  ConcurrentMutationError,
  DimensionMismatchError,
  InvalidSplitError,
  TopologyError,
  UnknownCellError,
} from './errors.js';
import { cube, tetrahedron } from '../algorithms/primitives.js';
import { applySplitEdge, deleteVertex, splitEdge } from '../euler/edges.js';
import { splitFace } from '../euler/faces.js';
import { dumpComplex } from '../dump/dump.js';
import { vec3 } from '../num/vec3.js';

describe('Complex', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('lookups', () => {
    it('reports counts of a built complex', () => {
      const { complex } = cube();
      expect(complex.stats()).toEqual({
        vertices: 8,
        edges: 12,
        faces: 6,
        volumes: 0,
        components: 1,
        genus: 0,
        holes: 0,
        eulerCharacteristic: 2,
      });
      expect(complex.vertices()).toHaveLength(8);
      expect(complex.faces()[0]).toBe(20);
    });

    it('narrows identifiers by dimension', () => {
      const { complex } = cube();
      expect(complex.expectEdge(asCellId(8))).toBe(8);
      expect(() => complex.expectVertex(asCellId(8))).toThrow(DimensionMismatchError);
      expect(() => complex.expectVertex(asCellId(8))).toThrow('Expected a vertex, got edge e8');
      expect(() => complex.get(asCellId(999))).toThrow(UnknownCellError);
    });

    it('reads payloads and replaces them in a transaction', () => {
      const { complex } = cube();
      const v0 = complex.expectVertex(asCellId(0));
      expect(complex.payload(v0)).toEqual([0, 0, 0]);
      const version = complex.version;
      complex.setPayload(v0, vec3(9, 9, 9));
      expect(complex.payload(v0)).toEqual([9, 9, 9]);
      expect(complex.version).toBe(version + 1);
    });
  });

  describe('mutate', () => {
    it('bumps the version on commit only', () => {
      const { complex } = tetrahedron();
      const before = complex.version;
      splitEdge(complex, complex.expectEdge(asCellId(4)));
      expect(complex.version).toBe(before + 1);

      const f10 = complex.expectFace(asCellId(10));
      const v0 = complex.expectVertex(asCellId(0));
      expect(() => splitFace(complex, f10, v0, v0)).toThrow(InvalidSplitError);
      expect(complex.version).toBe(before + 1);
    });

    it('rolls back a failed validation and names the invariant', () => {
      const complex = new Complex();
      let caught: unknown;
      try {
        complex.mutate('seed', (tx) => tx.createVertex());
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(TopologyError);
      if (!(caught instanceof TopologyError)) return;
      expect(caught.message).toBe('seed would break radialOrder: v0 has no edges');
      expect(caught.invariant).toBe('radialOrder');
      expect(caught.cells).toEqual([0]);
      expect(complex.cellCount(0)).toBe(0);
      expect(complex.version).toBe(0);
    });

    it('restores the exact state after a counter fault', () => {
      const { complex } = tetrahedron();
      const before = dumpComplex(complex);
      const edge = complex.expectEdge(asCellId(4));

      expect(() =>
        complex.mutate('broken', (tx) => {
          applySplitEdge(tx, edge);
          tx.adjustCounters({ holes: 1 });
        })
      ).toThrow('broken would break eulerCharacteristic: V - E + F - C is 2, expected 1 for c=1 g=0 h=1');

      expect(dumpComplex(complex)).toEqual(before);
      expect(complex.holes).toBe(0);
      expect(splitEdge(complex, edge).vertex).toBe(14);
    });

    it('refuses a nested edit', () => {
      const { complex } = cube();
      expect(() => complex.mutate('outer', () => complex.mutate('inner', () => 1))).toThrow(ConcurrentMutationError);
      expect(() => complex.mutate('outer', () => complex.mutate('inner', () => 1))).toThrow(
        'Cannot start inner while outer is in flight'
      );
      expect(complex.isMutating).toBe(false);
    });

    it('runs full validation when asked', () => {
      const { complex } = cube({ validation: 'full' });
      expect(complex.options.validation).toBe('full');
      const { vertex } = splitEdge(complex, complex.expectEdge(asCellId(8)));
      expect(complex.has(vertex)).toBe(true);
      expect(complex.mutate('noop', () => 'done', 'local')).toBe('done');
    });
  });

  describe('identifiers', () => {
    it('rejects an identifier after its cell is destroyed and reuses the slot', () => {
      const { complex } = tetrahedron();
      const { vertex } = splitEdge(complex, complex.expectEdge(asCellId(4)));
      deleteVertex(complex, vertex);

      expect(complex.has(vertex)).toBe(false);
      expect(() => complex.expectVertex(vertex)).toThrow(UnknownCellError);

      const again = splitEdge(complex, complex.expectEdge(asCellId(4)));
      expect(again.vertex).toBe(SLOT_SPACE + 14);
      expect(complex.describe(again.vertex)).toBe('v14#1');
      expect(complex.has(vertex)).toBe(false);
    });
  });

  describe('logging', () => {
    it('logs commits and rollbacks when verbose', () => {
      const { complex } = tetrahedron({ verbose: true });
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      splitEdge(complex, complex.expectEdge(asCellId(4)));
      expect(log).toHaveBeenLastCalledWith('[topocell] splitEdge committed: V=5 E=7 F=4 C=0 χ=2');

      const f10 = complex.expectFace(asCellId(10));
      const v0 = complex.expectVertex(asCellId(0));
      expect(() => splitFace(complex, f10, v0, v0)).toThrow(InvalidSplitError);
      expect(log).toHaveBeenLastCalledWith('[topocell] splitFace rolled back: Cannot split f10 at a single vertex v0');
      expect(log).toHaveBeenCalledTimes(2);
    });

    it('stays quiet by default', () => {
      const { complex } = tetrahedron();
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      splitEdge(complex, complex.expectEdge(asCellId(4)));
      expect(log).not.toHaveBeenCalled();
    });
  });
});
