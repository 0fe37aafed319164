/**
 * Incidence Graph
 *
 * Oriented boundary/co-boundary relations between cells of adjacent
 * dimension. One representation serves every dimension:
 *
 * - boundary: ordered list of (child, orientation) one dimension below
 *   (edge: [start -1, end +1]; face: cyclic oriented edges; volume: oriented faces)
 * - co-boundary: map of parent → orientation one dimension above
 *
 * Every primitive updates both sides or neither. The graph refuses edits that
 * would create a duplicate or contradictory pairing and never repairs
 * anything on its own; keeping the result a manifold is the operators' job.
 */

import {
  type CellId,
  type Dimension,
  type Orientation,
  slotOf,
} from './handles.js';
import { InvariantViolationError } from './errors.js';

/**
 * One side of an incidence pairing
 */
export interface IncidenceRef {
  readonly cell: CellId;
  readonly orientation: Orientation;
}

/**
 * The slice of the registry the graph needs
 */
export interface CellLookup {
  resolve(id: CellId): number;
  dimensionOf(id: CellId): Dimension;
  describe(id: CellId): string;
}

/**
 * Read side of the graph, as handed to traversal and validation code
 */
export interface IncidenceReader {
  boundaryRefs(id: CellId): readonly IncidenceRef[];
  boundaryOf(id: CellId): CellId[];
  coboundaryRefs(id: CellId): IncidenceRef[];
  coboundaryOf(id: CellId): ReadonlySet<CellId>;
  coboundarySize(id: CellId): number;
  orientationOf(parent: CellId, child: CellId): Orientation | undefined;
  dimensionOf(id: CellId): Dimension;
  describe(id: CellId): string;
}

const EMPTY_REFS: readonly IncidenceRef[] = Object.freeze([]);

/**
 * IncidenceGraph - oriented incidence records keyed by registry slot
 */
export class IncidenceGraph implements IncidenceReader {
  private _boundary: (IncidenceRef[] | undefined)[] = [];
  private _coboundary: (Map<CellId, Orientation> | undefined)[] = [];

  constructor(private readonly cells: CellLookup) {}

  // ==========================================================================
  // Reads
  // ==========================================================================

  boundaryRefs(id: CellId): readonly IncidenceRef[] {
    return this._boundary[this.cells.resolve(id)] ?? EMPTY_REFS;
  }

  boundaryOf(id: CellId): CellId[] {
    return this.boundaryRefs(id).map((ref) => ref.cell);
  }

  coboundaryRefs(id: CellId): IncidenceRef[] {
    const map = this._coboundary[this.cells.resolve(id)];
    if (!map) return [];
    return Array.from(map, ([cell, orientation]) => ({ cell, orientation }));
  }

  coboundaryOf(id: CellId): ReadonlySet<CellId> {
    const map = this._coboundary[this.cells.resolve(id)];
    return new Set(map ? map.keys() : []);
  }

  coboundarySize(id: CellId): number {
    return this._coboundary[this.cells.resolve(id)]?.size ?? 0;
  }

  /**
   * Orientation with which `parent` uses `child`, if it does
   */
  orientationOf(parent: CellId, child: CellId): Orientation | undefined {
    return this._coboundary[this.cells.resolve(child)]?.get(parent);
  }

  hasIncidences(id: CellId): boolean {
    const index = slotOf(id);
    return (this._boundary[index]?.length ?? 0) > 0 || (this._coboundary[index]?.size ?? 0) > 0;
  }

  dimensionOf(id: CellId): Dimension {
    return this.cells.dimensionOf(id);
  }

  describe(id: CellId): string {
    return this.cells.describe(id);
  }

  // ==========================================================================
  // Primitive edits
  // ==========================================================================

  /**
   * Pair `parent` with `child` on both sides
   *
   * @param at Position in the parent's boundary (default: append)
   * @throws InvariantViolationError on a duplicate or contradictory pairing
   */
  link(parent: CellId, child: CellId, orientation: Orientation, at?: number): void {
    const parentIndex = this.cells.resolve(parent);
    const childIndex = this.cells.resolve(child);
    this.checkDimensions(parent, child);

    const cob = this._coboundary[childIndex];
    if (cob?.has(parent)) {
      throw new InvariantViolationError(
        `${this.describe(parent)} already has ${this.describe(child)} on its boundary`,
        [parent, child]
      );
    }

    const boundary = this._boundary[parentIndex] ?? [];
    this.checkClaim(parent, child, orientation, boundary);

    const position = at ?? boundary.length;
    if (position < 0 || position > boundary.length) {
      throw new InvariantViolationError(
        `Position ${position} is outside the boundary of ${this.describe(parent)}`,
        [parent]
      );
    }
    boundary.splice(position, 0, { cell: child, orientation });
    this._boundary[parentIndex] = boundary;
    this.coboundaryMap(childIndex).set(parent, orientation);
  }

  /**
   * Remove the pairing of `parent` and `child` on both sides
   *
   * @returns The removed reference and its former boundary position
   */
  unlink(parent: CellId, child: CellId): { ref: IncidenceRef; index: number } {
    const parentIndex = this.cells.resolve(parent);
    const childIndex = this.cells.resolve(child);

    const boundary = this._boundary[parentIndex];
    const index = boundary ? boundary.findIndex((ref) => ref.cell === child) : -1;
    if (!boundary || index < 0) {
      throw new InvariantViolationError(
        `${this.describe(child)} is not on the boundary of ${this.describe(parent)}`,
        [parent, child]
      );
    }

    const [ref] = boundary.splice(index, 1);
    this._coboundary[childIndex]?.delete(parent);
    return { ref, index };
  }

  /**
   * Replace the whole ordered boundary of `parent`
   *
   * All checks run before anything changes, so a refused relink leaves the
   * graph untouched.
   */
  relink(parent: CellId, refs: readonly IncidenceRef[]): void {
    const parentIndex = this.cells.resolve(parent);
    const seen = new Set<CellId>();
    for (const ref of refs) {
      this.cells.resolve(ref.cell);
      this.checkDimensions(parent, ref.cell);
      if (seen.has(ref.cell)) {
        throw new InvariantViolationError(
          `${this.describe(ref.cell)} appears twice on the boundary of ${this.describe(parent)}`,
          [parent, ref.cell]
        );
      }
      seen.add(ref.cell);
    }
    const accepted: IncidenceRef[] = [];
    for (const ref of refs) {
      this.checkClaim(parent, ref.cell, ref.orientation, accepted);
      accepted.push(ref);
    }

    for (const old of this._boundary[parentIndex] ?? EMPTY_REFS) {
      this._coboundary[slotOf(old.cell)]?.delete(parent);
    }
    this._boundary[parentIndex] = refs.map((ref) => ({ cell: ref.cell, orientation: ref.orientation }));
    for (const ref of refs) {
      this.coboundaryMap(slotOf(ref.cell)).set(parent, ref.orientation);
    }
  }

  /**
   * Snapshot the records of the given cells
   *
   * @returns A function restoring exactly the captured state
   */
  capture(ids: readonly CellId[]): () => void {
    const saved = ids.map((id) => {
      const index = slotOf(id);
      const boundary = this._boundary[index];
      const coboundary = this._coboundary[index];
      return {
        index,
        boundary: boundary ? boundary.slice() : undefined,
        coboundary: coboundary ? new Map(coboundary) : undefined,
      };
    });
    return () => {
      for (const entry of saved) {
        this._boundary[entry.index] = entry.boundary;
        this._coboundary[entry.index] = entry.coboundary;
      }
    };
  }

  // ==========================================================================
  // Checks
  // ==========================================================================

  private checkDimensions(parent: CellId, child: CellId): void {
    const parentDimension = this.cells.dimensionOf(parent);
    const childDimension = this.cells.dimensionOf(child);
    if (childDimension !== parentDimension - 1) {
      throw new InvariantViolationError(
        `${this.describe(child)} cannot bound ${this.describe(parent)}: dimensions ${childDimension} and ${parentDimension}`,
        [parent, child]
      );
    }
  }

  /**
   * Refuse a pairing that contradicts an existing one
   *
   * - an edge has one start (-1) and one end (+1)
   * - a dart (edge, orientation) belongs to at most one face
   * - a side (face, orientation) belongs to at most one volume
   */
  private checkClaim(
    parent: CellId,
    child: CellId,
    orientation: Orientation,
    parentBoundary: readonly IncidenceRef[]
  ): void {
    const parentDimension = this.cells.dimensionOf(parent);
    if (parentDimension === 1) {
      if (parentBoundary.length >= 2 || parentBoundary.some((ref) => ref.orientation === orientation)) {
        throw new InvariantViolationError(
          `${this.describe(parent)} already has its ${orientation === 1 ? 'end' : 'start'} vertex`,
          [parent, child]
        );
      }
      return;
    }

    const claims = this._coboundary[slotOf(child)];
    if (!claims) return;
    for (const [other, otherOrientation] of claims) {
      if (other !== parent && otherOrientation === orientation) {
        throw new InvariantViolationError(
          `${this.describe(child)} is already used with orientation ${orientation} by ${this.describe(other)}`,
          [parent, child, other]
        );
      }
    }
  }

  private coboundaryMap(index: number): Map<CellId, Orientation> {
    let map = this._coboundary[index];
    if (!map) {
      map = new Map();
      this._coboundary[index] = map;
    }
    return map;
  }
}
