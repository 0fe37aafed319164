/**
 * 3D points as cell payloads
 *
 * Vectors are represented as tuples [number, number, number]. The complex
 * never reads them; primitives attach them to vertices and refinement uses
 * `averagePoints` to place the vertices it creates.
 */

export type Vec3 = [number, number, number];

/**
 * Create a 3D vector
 */
export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

/**
 * Zero vector
 */
export const ZERO3: Vec3 = [0, 0, 0];

/**
 * Add two vectors: a + b
 */
export function add3(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

/**
 * Multiply vector by scalar: v * s
 */
export function mul3(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

/**
 * Centroid of a set of points (the origin for an empty set)
 */
export function centroid3(points: readonly Vec3[]): Vec3 {
  if (points.length === 0) return [0, 0, 0];
  return mul3(points.reduce(add3, ZERO3), 1 / points.length);
}

/**
 * Payload interpolator for refinement: the centroid of the known points
 */
export function averagePoints(points: readonly (Vec3 | undefined)[]): Vec3 | undefined {
  const known = points.filter((point): point is Vec3 => point !== undefined);
  return known.length === 0 ? undefined : centroid3(known);
}
