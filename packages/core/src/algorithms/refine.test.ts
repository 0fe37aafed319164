import { describe, it, expect } from 'vitest';
import { catmullClark, subdivideEdges, triangulate, triangulateFace } from './refine.js';
import { fromPolygons } from './construct.js';
import { classifySurface } from './genus.js';
import { cube, polygonDisk, tetrahedron, torus } from './primitives.js';
import { averagePoints } from '../num/vec3.js';
import { faceVertices, vertexDegree } from '../topo/navigation.js';
import { edge, expectValid, face, vertex } from '../../tests/fixtures/complexes.js';

describe('subdivideEdges', () => {
  it('splits every edge once', () => {
    const { complex } = tetrahedron();
    const midpoints = subdivideEdges(complex, { interpolate: averagePoints });

    expect(midpoints.size).toBe(6);
    expect(complex.stats()).toMatchObject({ vertices: 10, edges: 12, faces: 4, eulerCharacteristic: 2 });
    // e4 runs from (1,1,1) to (1,-1,-1)
    const mid = midpoints.get(edge(complex, 4));
    expect(mid === undefined ? undefined : complex.payload(mid)).toEqual([1, 0, 0]);
    expectValid(complex);
  });

  it('leaves payloads empty without an interpolator', () => {
    const { complex } = tetrahedron();
    const midpoints = subdivideEdges(complex);
    for (const vertex of midpoints.values()) {
      expect(complex.payload(vertex)).toBeUndefined();
    }
  });
});

describe('triangulate', () => {
  it('fans every quad of a cube', () => {
    const { complex } = cube();
    const created = triangulate(complex);

    expect(created).toHaveLength(6);
    expect(complex.stats()).toMatchObject({ vertices: 8, edges: 18, faces: 12, eulerCharacteristic: 2 });
    for (const id of complex.faces()) {
      expect(faceVertices(complex.incidence, id)).toHaveLength(3);
    }
    expectValid(complex);
  });

  it('leaves triangles alone', () => {
    const { complex } = tetrahedron();
    expect(triangulate(complex)).toEqual([]);
    expect(complex.stats().edges).toBe(6);
  });

  it('keeps a torus a torus', () => {
    const { complex } = torus(3, 4);
    triangulate(complex);
    expect(complex.stats()).toMatchObject({ faces: 24, edges: 36 });
    expect(classifySurface(complex).name).toBe('torus');
  });
});

/**
 * Seven-vertex torus in which every pair of vertices is joined, with four
 * triangles merged into the hexagon 6 0 1 4 3 2: each corner of the hexagon
 * has an edge to one of its non-neighbours.
 */
function hexagonTorus() {
  const triangles: number[][] = [];
  for (let i = 1; i <= 5; i++) triangles.push([i, (i + 1) % 7, (i + 3) % 7]);
  for (let i = 2; i <= 6; i++) triangles.push([i, (i + 3) % 7, (i + 2) % 7]);
  return fromPolygons([[6, 0, 1, 4, 3, 2], ...triangles]).complex;
}

describe('triangulateFace', () => {
  it('splits a face around a new centre', () => {
    const { complex } = cube();
    const result = triangulateFace(complex, face(complex, 22), { interpolate: averagePoints });

    expect(result).toEqual({ vertex: 28, faces: [22, 31, 27, 33] });
    expect(result.faces.map((id) => faceVertices(complex.incidence, id))).toEqual([
      [28, 0, 1],
      [1, 5, 28],
      [28, 5, 4],
      [4, 0, 28],
    ]);
    expect(complex.payload(result.vertex)).toEqual([0.5, 0, 0.5]);
    expect(complex.stats()).toMatchObject({ vertices: 9, edges: 16, faces: 9, eulerCharacteristic: 2 });
    expectValid(complex);
  });

  it('splits a triangle into three', () => {
    const { complex } = tetrahedron();
    const { vertex: center, faces } = triangulateFace(complex, face(complex, 10));
    expect(faces).toHaveLength(3);
    expect(vertexDegree(complex.incidence, center)).toBe(3);
    expect(complex.stats()).toMatchObject({ vertices: 5, edges: 9, faces: 6, eulerCharacteristic: 2 });
    expectValid(complex);
  });
});

describe('triangulate with joined corners', () => {
  it('builds the torus with no free corner on the hexagon', () => {
    const complex = hexagonTorus();
    expect(complex.stats()).toMatchObject({ vertices: 7, edges: 18, faces: 11, eulerCharacteristic: 0 });
    expectValid(complex);
  });

  it('gives such a face a centre vertex', () => {
    const complex = hexagonTorus();
    const created = triangulate(complex);

    expect(created).toHaveLength(5);
    expect(vertexDegree(complex.incidence, vertex(complex, 36))).toBe(6);
    for (const id of complex.faces()) {
      expect(faceVertices(complex.incidence, id)).toHaveLength(3);
    }
    expect(complex.stats()).toMatchObject({ vertices: 8, edges: 24, faces: 16, eulerCharacteristic: 0 });
    expect(classifySurface(complex).name).toBe('torus');
    expectValid(complex);
  });
});

describe('catmullClark', () => {
  it('turns every face of a cube into quads', () => {
    const { complex } = cube();
    const result = catmullClark(complex, { interpolate: averagePoints });

    expect(result.edgePoints.size).toBe(12);
    expect(result.facePoints.size).toBe(6);
    expect(complex.stats()).toMatchObject({ vertices: 26, edges: 48, faces: 24, eulerCharacteristic: 2 });
    for (const id of complex.faces()) {
      expect(faceVertices(complex.incidence, id)).toHaveLength(4);
    }
    expectValid(complex);
  });

  it('places new points at averages', () => {
    const { complex } = cube();
    const result = catmullClark(complex, { interpolate: averagePoints });
    const bottom = result.facePoints.get(face(complex, 20));
    const e8 = result.edgePoints.get(edge(complex, 8));
    expect(bottom === undefined ? undefined : complex.payload(bottom)).toEqual([0.5, 0.5, 0]);
    expect(e8 === undefined ? undefined : complex.payload(e8)).toEqual([0, 0.5, 0]);
  });

  it('refines triangles and boundaries', () => {
    const tetra = tetrahedron().complex;
    catmullClark(tetra);
    expect(tetra.stats()).toMatchObject({ vertices: 14, edges: 24, faces: 12 });

    const disk = polygonDisk(4).complex;
    catmullClark(disk);
    expect(disk.stats()).toMatchObject({ vertices: 9, edges: 12, faces: 4, holes: 1 });
    expectValid(disk);
  });

  it('refines repeatedly, then triangulates', () => {
    const { complex } = cube();
    catmullClark(complex);
    catmullClark(complex);
    expect(complex.stats()).toMatchObject({ vertices: 98, edges: 192, faces: 96 });

    const { complex: once } = cube();
    catmullClark(once);
    triangulate(once);
    expect(once.stats()).toMatchObject({ edges: 72, faces: 48 });
    expectValid(once);
  });
});
