import { describe, it, expect } from 'vitest';
import { asCellId, asVertexId } from './handles.js';
import { ConcurrentMutationError, InvariantViolationError, UnknownCellError } from './errors.js';
import {
  edgeRing,
  faceBoundary,
  faceRing,
  holeLoop,
  holeLoops,
  link,
  star,
  vertexEdges,
  vertexRing,
  vertexStar,
} from './orbits.js';
import { cube, polygonDisk } from '../algorithms/primitives.js';
import { splitEdge } from '../euler/edges.js';

describe('orbits', () => {
  describe('around a closed vertex', () => {
    const { complex } = cube();
    const v0 = complex.expectVertex(asCellId(0));

    it('lists faces, edges and neighbours in one rotation', () => {
      expect(vertexStar(complex, v0).toArray()).toEqual([22, 25, 20]);
      expect(vertexEdges(complex, v0).toArray()).toEqual([11, 17, 8]);
      expect(vertexRing(complex, v0).toArray()).toEqual([1, 4, 3]);
    });

    it('restarts on every iteration', () => {
      const orbit = vertexStar(complex, v0);
      expect([...orbit]).toEqual([...orbit]);
    });

    it('computes star and link', () => {
      expect(star(complex, v0).toArray()).toEqual([0, 8, 11, 17, 20, 22, 25]);
      expect(link(complex, v0).toArray()).toEqual([1, 2, 3, 4, 5, 7, 9, 10, 12, 15, 16, 19]);
      expect(star(complex, asCellId(8)).toArray()).toEqual([8, 20, 25]);
    });
  });

  describe('around edges and faces', () => {
    const { complex } = cube();

    it('puts the +1 side first', () => {
      expect(edgeRing(complex, complex.expectEdge(asCellId(8))).toArray()).toEqual([20, 25]);
    });

    it('walks a face boundary from its smallest vertex', () => {
      const top = faceBoundary(complex, complex.expectFace(asCellId(21))).toArray();
      expect(top.map((corner) => corner.vertex)).toEqual([4, 5, 6, 7]);
      expect(top[0]).toEqual({ vertex: 4, edge: 12, orientation: 1 });

      const front = faceBoundary(complex, complex.expectFace(asCellId(22))).toArray();
      expect(front.map((corner) => corner.vertex)).toEqual([0, 1, 5, 4]);
      expect(front[0]).toEqual({ vertex: 0, edge: 11, orientation: -1 });
    });

    it('lists faces across each edge', () => {
      expect(faceRing(complex, complex.expectFace(asCellId(22))).toArray()).toEqual([20, 23, 21, 25]);
    });

    it('finds no hole loops on a closed surface', () => {
      expect(holeLoops(complex).toArray()).toEqual([]);
      expect(holeLoop(complex, complex.expectEdge(asCellId(8))).toArray()).toEqual([]);
    });
  });

  describe('on a disk', () => {
    const { complex } = polygonDisk(4);

    it('opens the fan at the boundary', () => {
      const v0 = complex.expectVertex(asCellId(0));
      expect(vertexStar(complex, v0).toArray()).toEqual([8]);
      expect(vertexRing(complex, v0).toArray()).toEqual([1, 3]);
      expect(edgeRing(complex, complex.expectEdge(asCellId(4))).toArray()).toEqual([8]);
    });

    it('lists hole loops', () => {
      expect(holeLoops(complex).toArray()).toEqual([[4, 7, 6, 5]]);
      expect(holeLoop(complex, complex.expectEdge(asCellId(6))).toArray()).toEqual([6, 5, 4, 7]);
    });
  });

  describe('guards', () => {
    it('rejects a dead start cell', () => {
      const { complex } = cube();
      expect(() => vertexStar(complex, asVertexId(asCellId(999)))).toThrow(UnknownCellError);
      expect(() => star(complex, asCellId(999))).toThrow(UnknownCellError);
    });

    it('refuses to run while an operator is in flight', () => {
      const { complex } = cube();
      const orbit = vertexStar(complex, complex.expectVertex(asCellId(0)));
      expect(() => complex.mutate('peek', () => orbit.toArray())).toThrow(ConcurrentMutationError);
      expect(() => complex.mutate('peek', () => orbit.toArray())).toThrow(
        'Cannot traverse star of v0 while an operator is in flight'
      );
    });

    it('detects an edit between steps', () => {
      const { complex } = cube();
      const iterator = vertexStar(complex, complex.expectVertex(asCellId(0)))[Symbol.iterator]();
      expect(iterator.next().value).toBe(22);
      splitEdge(complex, complex.expectEdge(asCellId(8)));
      expect(() => iterator.next()).toThrow('star of v0 is stale: the complex changed during traversal');
    });

    it('stops at the step limit', () => {
      const { complex } = cube({ maxTraversalSteps: 2 });
      const orbit = vertexStar(complex, complex.expectVertex(asCellId(0)));
      expect(() => orbit.toArray()).toThrow(InvariantViolationError);
      expect(() => orbit.toArray()).toThrow('star of v0 exceeded 2 steps');
    });
  });
});
