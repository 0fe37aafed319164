/**
 * Cell Registry
 *
 * Owns the cells of one complex and hands out their identifiers. Storage is
 * struct-of-arrays (typed arrays grown by doubling) keyed by slot; destroyed
 * slots go on a free stack and are reused under a new generation, so an
 * identifier held past its cell's lifetime is always detected.
 *
 * The registry knows nothing about incidences. The owning complex supplies
 * an `isReferenced` check so that destroy can refuse cells that are still
 * named by an incidence record.
 */

import {
  type CellId,
  type Dimension,
  DIMENSIONS,
  MAX_GENERATION,
  SLOT_SPACE,
  encodeCellId,
  generationOf,
  slotOf,
  formatCellId,
} from './handles.js';
import { DanglingReferenceError, InvariantViolationError, UnknownCellError } from './errors.js';

/**
 * Slot flags
 */
const enum SlotFlags {
  NONE = 0,
  LIVE = 1 << 0,
  /** Generation exhausted: the slot is never handed out again */
  RETIRED = 1 << 1,
}

/**
 * Slot table - one entry per slot ever allocated
 */
interface SlotTable {
  dimension: Uint8Array;
  generation: Uint32Array;
  flags: Uint8Array;
  count: number;
}

// Default initial capacity for the slot table
const DEFAULT_INITIAL_CAPACITY = 64;

function createSlotTable(capacity: number = DEFAULT_INITIAL_CAPACITY): SlotTable {
  return {
    dimension: new Uint8Array(capacity),
    generation: new Uint32Array(capacity),
    flags: new Uint8Array(capacity),
    count: 0,
  };
}

function growTypedArray(arr: Uint8Array, minSize: number): Uint8Array;
function growTypedArray(arr: Uint32Array, minSize: number): Uint32Array;
function growTypedArray(arr: Uint8Array | Uint32Array, minSize: number): Uint8Array | Uint32Array {
  const newSize = Math.max(minSize, arr.length * 2);
  const grown = arr instanceof Uint8Array ? new Uint8Array(newSize) : new Uint32Array(newSize);
  grown.set(arr);
  return grown;
}

/**
 * Read-only snapshot of a cell
 */
export interface CellView<P> {
  readonly id: CellId;
  readonly dimension: Dimension;
  readonly payload: P | undefined;
}

/**
 * Result of allocating a slot, needed to undo the allocation exactly
 */
export interface Allocation {
  readonly id: CellId;
  /** true when the slot came off the free stack */
  readonly reused: boolean;
}

/**
 * Result of destroying a cell, needed to undo the destruction exactly
 */
export interface Destruction<P> {
  readonly id: CellId;
  readonly payload: P | undefined;
  /** false when the slot was retired instead of freed */
  readonly freed: boolean;
}

export interface RegistryOptions {
  /** Whether an incidence record still names the cell */
  isReferenced?: (id: CellId) => boolean;
  /** Initial slot capacity */
  initialCapacity?: number;
}

/**
 * CellRegistry - identifier allocation and liveness for one complex
 */
export class CellRegistry<P = unknown> {
  private _slots: SlotTable;
  private _payloads: (P | undefined)[] = [];
  private _free: number[] = [];
  private _live: number[] = [0, 0, 0, 0];
  private readonly _isReferenced: (id: CellId) => boolean;

  constructor(options: RegistryOptions = {}) {
    this._slots = createSlotTable(options.initialCapacity);
    this._isReferenced = options.isReferenced ?? (() => false);
  }

  // ==========================================================================
  // Allocation
  // ==========================================================================

  /**
   * Allocate a fresh identifier with empty incidence records
   */
  create(dimension: Dimension, payload?: P): CellId {
    return this.allocate(dimension, payload).id;
  }

  /**
   * Allocate a slot, reusing a freed one when available
   */
  allocate(dimension: Dimension, payload?: P): Allocation {
    const reused = this._free.length > 0;
    const slot = reused ? this._free.pop() : undefined;
    const index = slot ?? this.appendSlot();

    this._slots.dimension[index] = dimension;
    this._slots.flags[index] = SlotFlags.LIVE;
    this._payloads[index] = payload;
    this._live[dimension]++;

    return { id: encodeCellId(index, this._slots.generation[index]), reused };
  }

  /**
   * Undo an allocation, returning the slot to the exact state it had before
   */
  release(allocation: Allocation): void {
    const index = this.resolve(allocation.id);
    this._live[this._slots.dimension[index]]--;
    this._slots.flags[index] = SlotFlags.NONE;
    this._payloads[index] = undefined;

    if (!allocation.reused && index === this._slots.count - 1) {
      this._slots.count--;
      this._payloads.length = this._slots.count;
    } else {
      this._free.push(index);
    }
  }

  /**
   * Destroy a cell and free its identifier for reuse under a new generation
   *
   * @throws DanglingReferenceError if an incidence record still names the cell
   */
  destroy(id: CellId): Destruction<P> {
    const index = this.resolve(id);
    if (this._isReferenced(id)) {
      throw new DanglingReferenceError(id, `Cannot destroy ${this.describe(id)}: still referenced by an incidence record`);
    }

    const payload = this._payloads[index];
    const nextGeneration = this._slots.generation[index] + 1;
    const freed = nextGeneration < MAX_GENERATION;

    this._live[this._slots.dimension[index]]--;
    this._payloads[index] = undefined;
    this._slots.generation[index] = nextGeneration;
    if (freed) {
      this._slots.flags[index] = SlotFlags.NONE;
      this._free.push(index);
    } else {
      this._slots.flags[index] = SlotFlags.RETIRED;
    }

    return { id, payload, freed };
  }

  /**
   * Undo a destruction. Must run in reverse order of the edits that followed it.
   */
  restore(destruction: Destruction<P>): void {
    const index = slotOf(destruction.id);
    if (destruction.freed) {
      const top = this._free.pop();
      if (top !== index) {
        throw new InvariantViolationError(
          `Cannot restore ${formatCellId(destruction.id)}: its slot is no longer free`,
          [destruction.id]
        );
      }
    }
    this._slots.generation[index] = generationOf(destruction.id);
    this._slots.flags[index] = SlotFlags.LIVE;
    this._payloads[index] = destruction.payload;
    this._live[this._slots.dimension[index]]++;
  }

  private appendSlot(): number {
    const index = this._slots.count;
    if (index >= SLOT_SPACE) {
      throw new RangeError(`Cell registry is full (${SLOT_SPACE} slots)`);
    }
    if (index >= this._slots.flags.length) {
      const capacity = index + 1;
      this._slots.dimension = growTypedArray(this._slots.dimension, capacity);
      this._slots.generation = growTypedArray(this._slots.generation, capacity);
      this._slots.flags = growTypedArray(this._slots.flags, capacity);
    }
    this._slots.count++;
    return index;
  }

  // ==========================================================================
  // Lookup
  // ==========================================================================

  /**
   * Resolve an identifier to its slot
   *
   * @throws UnknownCellError for unallocated, destroyed or stale identifiers
   */
  resolve(id: CellId): number {
    if (!this.has(id)) {
      throw new UnknownCellError(id, `Unknown cell ${formatCellId(id)}: never allocated or already destroyed`);
    }
    return slotOf(id);
  }

  has(id: CellId): boolean {
    if (!Number.isSafeInteger(id) || id < 0) return false;
    const index = slotOf(id);
    return (
      index < this._slots.count &&
      (this._slots.flags[index] & SlotFlags.LIVE) !== 0 &&
      this._slots.generation[index] === generationOf(id)
    );
  }

  get(id: CellId): CellView<P> {
    const index = this.resolve(id);
    return Object.freeze({
      id,
      dimension: this.slotDimension(index),
      payload: this._payloads[index],
    });
  }

  dimensionOf(id: CellId): Dimension {
    return this.slotDimension(this.resolve(id));
  }

  payloadOf(id: CellId): P | undefined {
    return this._payloads[this.resolve(id)];
  }

  /**
   * Replace a cell's payload, returning the previous one
   */
  setPayload(id: CellId, payload: P | undefined): P | undefined {
    const index = this.resolve(id);
    const previous = this._payloads[index];
    this._payloads[index] = payload;
    return previous;
  }

  /**
   * Label for messages, e.g. `e4`
   */
  describe(id: CellId): string {
    return this.has(id) ? formatCellId(id, this.slotDimension(slotOf(id))) : formatCellId(id);
  }

  private slotDimension(index: number): Dimension {
    const dimension = DIMENSIONS[this._slots.dimension[index]];
    if (dimension === undefined) {
      throw new InvariantViolationError(`Slot ${index} has no valid dimension`);
    }
    return dimension;
  }

  // ==========================================================================
  // Enumeration and statistics
  // ==========================================================================

  liveCount(dimension: Dimension): number {
    return this._live[dimension];
  }

  get totalLive(): number {
    return this._live[0] + this._live[1] + this._live[2] + this._live[3];
  }

  /** Number of slots ever handed out (live, free or retired) */
  get slotCount(): number {
    return this._slots.count;
  }

  /**
   * Iterate live cells of one dimension (or all), in slot order
   */
  *cells(dimension?: Dimension): Generator<CellId> {
    for (let index = 0; index < this._slots.count; index++) {
      if ((this._slots.flags[index] & SlotFlags.LIVE) === 0) continue;
      if (dimension !== undefined && this._slots.dimension[index] !== dimension) continue;
      yield encodeCellId(index, this._slots.generation[index]);
    }
  }
}
