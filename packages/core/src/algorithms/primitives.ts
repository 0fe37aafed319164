/**
 * Primitive complexes with point payloads
 */

import type { ComplexOptions } from '../topo/Complex.js';
import { type Vec3, vec3 } from '../num/vec3.js';
import { DegenerateTopologyError } from '../topo/errors.js';
import { type PolygonComplex, fromPolygons } from './construct.js';

/**
 * Tetrahedron: 4 vertices, 6 edges, 4 triangles (a sphere)
 */
export function tetrahedron(options?: ComplexOptions): PolygonComplex<Vec3> {
  const points = [vec3(1, 1, 1), vec3(1, -1, -1), vec3(-1, 1, -1), vec3(-1, -1, 1)];
  const triangles = [
    [0, 1, 2],
    [0, 3, 1],
    [0, 2, 3],
    [1, 3, 2],
  ];
  return fromPolygons(triangles, points, { complex: options });
}

/**
 * Unit cube: 8 vertices, 12 edges, 6 quads (a sphere)
 *
 * Faces in order: bottom, top, front, right, back, left.
 */
export function cube(options?: ComplexOptions): PolygonComplex<Vec3> {
  const points = [
    vec3(0, 0, 0),
    vec3(1, 0, 0),
    vec3(1, 1, 0),
    vec3(0, 1, 0),
    vec3(0, 0, 1),
    vec3(1, 0, 1),
    vec3(1, 1, 1),
    vec3(0, 1, 1),
  ];
  const quads = [
    [0, 3, 2, 1],
    [4, 5, 6, 7],
    [0, 1, 5, 4],
    [1, 2, 6, 5],
    [2, 3, 7, 6],
    [3, 0, 4, 7],
  ];
  return fromPolygons(quads, points, { complex: options });
}

/**
 * A single n-gon: a disk with one hole loop around it
 */
export function polygonDisk(n: number, options?: ComplexOptions): PolygonComplex<Vec3> {
  if (!Number.isInteger(n) || n < 3) {
    throw new DegenerateTopologyError(`A polygon needs at least 3 sides, got ${n}`);
  }
  const points = Array.from({ length: n }, (_, i) => {
    const angle = (2 * Math.PI * i) / n;
    return vec3(Math.cos(angle), Math.sin(angle), 0);
  });
  return fromPolygons(
    [points.map((_, i) => i)],
    points,
    { complex: options }
  );
}

/**
 * Torus of m × n quads (m rings around the tube axis, n around the tube)
 */
export function torus(m: number, n: number, options?: ComplexOptions): PolygonComplex<Vec3> {
  if (!Number.isInteger(m) || !Number.isInteger(n) || m < 3 || n < 3) {
    throw new DegenerateTopologyError(`A torus grid needs at least 3 × 3 quads, got ${m} × ${n}`);
  }
  const major = 2;
  const minor = 1;
  const index = (i: number, j: number): number => (i % m) * n + (j % n);

  const points: Vec3[] = [];
  for (let i = 0; i < m; i++) {
    const u = (2 * Math.PI * i) / m;
    for (let j = 0; j < n; j++) {
      const v = (2 * Math.PI * j) / n;
      const ring = major + minor * Math.cos(v);
      points.push(vec3(ring * Math.cos(u), ring * Math.sin(u), minor * Math.sin(v)));
    }
  }

  const quads: number[][] = [];
  for (let i = 0; i < m; i++) {
    for (let j = 0; j < n; j++) {
      quads.push([index(i, j), index(i + 1, j), index(i + 1, j + 1), index(i, j + 1)]);
    }
  }
  return fromPolygons(quads, points, { complex: options });
}
