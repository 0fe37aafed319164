/**
 * Branded handle types for cell-complex topology
 *
 * Every cell is addressed by a CellId: a safe integer packing a slot index
 * (low 24 bits) and a generation counter (the rest). Slots are recycled after
 * a cell is destroyed; the generation makes every identifier that outlived
 * its cell detectably stale.
 *
 * Collaborators should treat CellIds as opaque tokens: they compare and hash
 * like numbers but are not dense array indices.
 */

/**
 * Handle to any cell in a complex
 */
export type CellId = number & { readonly __brand: `CellId` };

/**
 * Handle to a 0-cell
 */
export type VertexId = CellId & { readonly __dimension: 0 };

/**
 * Handle to a 1-cell
 * An edge is bounded by a start vertex and an end vertex.
 */
export type EdgeId = CellId & { readonly __dimension: 1 };

/**
 * Handle to a 2-cell
 * A face is bounded by a cycle of oriented edges.
 */
export type FaceId = CellId & { readonly __dimension: 2 };

/**
 * Handle to a 3-cell (volumetric variant)
 * A volume is bounded by a closed shell of oriented faces.
 */
export type VolumeId = CellId & { readonly __dimension: 3 };

/**
 * Cell dimensions
 */
export const Dimension = {
  Vertex: 0,
  Edge: 1,
  Face: 2,
  Volume: 3,
} as const;

export type Dimension = (typeof Dimension)[keyof typeof Dimension];

export const DIMENSIONS: readonly Dimension[] = [
  Dimension.Vertex,
  Dimension.Edge,
  Dimension.Face,
  Dimension.Volume,
];

const DIMENSION_NAMES = ['vertex', 'edge', 'face', 'volume'] as const;
const DIMENSION_PREFIXES = ['v', 'e', 'f', 'c'] as const;

export type DimensionName = (typeof DIMENSION_NAMES)[number];

export function dimensionName(dimension: Dimension): DimensionName {
  return DIMENSION_NAMES[dimension];
}

/**
 * Orientation of an incidence: +1 follows the child's own direction,
 * -1 runs against it
 */
export type Orientation = 1 | -1;

export function flip(orientation: Orientation): Orientation {
  return orientation === 1 ? -1 : 1;
}

/** Number of addressable slots */
export const SLOT_SPACE = 2 ** 24;

/** Generations at or above this value retire the slot */
export const MAX_GENERATION = 2 ** 28;

/**
 * Pack a slot and generation into a CellId
 */
export function encodeCellId(slot: number, generation: number): CellId {
  return asCellId(generation * SLOT_SPACE + slot);
}

export function slotOf(id: CellId): number {
  return id % SLOT_SPACE;
}

export function generationOf(id: CellId): number {
  return Math.floor(id / SLOT_SPACE);
}

/**
 * Total order on identifiers, used for canonical starting points
 */
export function compareCellIds(a: CellId, b: CellId): number {
  return a - b;
}

/**
 * Cast a number to a CellId
 * @internal Use with caution - only when reading from known valid sources
 */
export function asCellId(id: number): CellId {
  return id as CellId;
}

/**
 * Cast a CellId to a VertexId
 * @internal Callers must have checked the dimension
 */
export function asVertexId(id: CellId): VertexId {
  return id as VertexId;
}

/**
 * Cast a CellId to an EdgeId
 * @internal Callers must have checked the dimension
 */
export function asEdgeId(id: CellId): EdgeId {
  return id as EdgeId;
}

/**
 * Cast a CellId to a FaceId
 * @internal Callers must have checked the dimension
 */
export function asFaceId(id: CellId): FaceId {
  return id as FaceId;
}

/**
 * Cast a CellId to a VolumeId
 * @internal Callers must have checked the dimension
 */
export function asVolumeId(id: CellId): VolumeId {
  return id as VolumeId;
}

/**
 * Short human-readable label for messages, e.g. `f12#3` (slot 12, generation 3)
 */
export function formatCellId(id: CellId, dimension?: Dimension): string {
  const prefix = dimension === undefined ? '#' : DIMENSION_PREFIXES[dimension];
  const generation = generationOf(id);
  return generation === 0 ? `${prefix}${slotOf(id)}` : `${prefix}${slotOf(id)}#${generation}`;
}
