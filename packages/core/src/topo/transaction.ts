/**
 * Edit transactions
 *
 * Every structural change to a complex runs inside one transaction. Each
 * primitive edit records how to undo itself in a journal; if the operator
 * throws or post-edit validation fails, the journal is replayed backwards
 * and the complex is exactly as it was before the operator started.
 */

import {
  type CellId,
  type Dimension,
  type EdgeId,
  type FaceId,
  type Orientation,
  type VertexId,
  type VolumeId,
  asEdgeId,
  asFaceId,
  asVertexId,
  asVolumeId,
  slotOf,
} from './handles.js';
import type { CellRegistry } from './registry.js';
import type { IncidenceGraph, IncidenceReader, IncidenceRef } from './incidence.js';
import type { ComponentForest } from './components.js';
import type { Dart } from './navigation.js';

/**
 * Topological quantities the complex tracks instead of recomputing
 */
export interface TopologyCounters {
  /** Connected components */
  components: number;
  /** Total number of handles over all components */
  genus: number;
  /** Boundary loops */
  holes: number;
}

/**
 * Mutable state of one complex, shared with its transactions
 */
export interface ComplexState<P> {
  readonly registry: CellRegistry<P>;
  readonly graph: IncidenceGraph;
  readonly forest: ComponentForest;
  /** Component token per vertex slot */
  readonly componentTokens: number[];
  counters: TopologyCounters;
}

/**
 * Undo log of one transaction
 */
export class Journal {
  private _entries: Array<() => void> = [];

  record(undo: () => void): void {
    this._entries.push(undo);
  }

  get size(): number {
    return this._entries.length;
  }

  /**
   * Undo every recorded edit, newest first
   */
  rollback(): void {
    const entries = this._entries;
    this._entries = [];
    for (let i = entries.length - 1; i >= 0; i--) {
      entries[i]();
    }
  }
}

/**
 * EditTransaction - the only write access to a complex
 */
export class EditTransaction<P> {
  private readonly _touched = new Set<CellId>();

  constructor(
    private readonly state: ComplexState<P>,
    private readonly journal: Journal,
    /** Upper bound on the steps of any walk an operator makes */
    readonly maxTraversalSteps: number
  ) {}

  /** Read access to the graph as it stands mid-edit */
  get graph(): IncidenceReader {
    return this.state.graph;
  }

  get counters(): Readonly<TopologyCounters> {
    return this.state.counters;
  }

  /** Cells whose records this transaction changed */
  get touched(): ReadonlySet<CellId> {
    return this._touched;
  }

  touch(...ids: CellId[]): void {
    for (const id of ids) this._touched.add(id);
  }

  // ==========================================================================
  // Cells
  // ==========================================================================

  createCell(dimension: Dimension, payload?: P): CellId {
    const allocation = this.state.registry.allocate(dimension, payload);
    this.journal.record(() => this.state.registry.release(allocation));
    this._touched.add(allocation.id);
    return allocation.id;
  }

  /**
   * Create a vertex, in the component of `sibling` or in a new component
   */
  createVertex(payload?: P, sibling?: VertexId): VertexId {
    const vertex = asVertexId(this.createCell(0, payload));
    if (sibling !== undefined) {
      this.state.componentTokens[slotOf(vertex)] = this.state.componentTokens[slotOf(sibling)];
    } else {
      const token = this.state.forest.add();
      this.journal.record(() => this.state.forest.removeLast(token));
      this.state.componentTokens[slotOf(vertex)] = token;
    }
    return vertex;
  }

  createEdge(start: VertexId, end: VertexId): EdgeId {
    const edge = asEdgeId(this.createCell(1));
    this.link(edge, start, -1);
    this.link(edge, end, 1);
    return edge;
  }

  createFace(darts: readonly Dart[], payload?: P): FaceId {
    const face = asFaceId(this.createCell(2, payload));
    this.relink(face, darts.map((dart) => ({ cell: dart.edge, orientation: dart.orientation })));
    return face;
  }

  createVolume(sides: readonly IncidenceRef[], payload?: P): VolumeId {
    const volume = asVolumeId(this.createCell(3, payload));
    this.relink(volume, sides);
    return volume;
  }

  /**
   * Destroy a cell whose records are already empty
   */
  destroyCell(id: CellId): void {
    const destruction = this.state.registry.destroy(id);
    this.journal.record(() => this.state.registry.restore(destruction));
  }

  payloadOf(id: CellId): P | undefined {
    return this.state.registry.payloadOf(id);
  }

  setPayload(id: CellId, payload: P | undefined): void {
    const previous = this.state.registry.setPayload(id, payload);
    this.journal.record(() => {
      this.state.registry.setPayload(id, previous);
    });
  }

  // ==========================================================================
  // Incidences
  // ==========================================================================

  link(parent: CellId, child: CellId, orientation: Orientation, at?: number): void {
    const restore = this.state.graph.capture([parent, child]);
    this.state.graph.link(parent, child, orientation, at);
    this.journal.record(restore);
    this._touched.add(parent);
    this._touched.add(child);
  }

  unlink(parent: CellId, child: CellId): number {
    const restore = this.state.graph.capture([parent, child]);
    const { index } = this.state.graph.unlink(parent, child);
    this.journal.record(restore);
    this._touched.add(parent);
    this._touched.add(child);
    return index;
  }

  /**
   * Replace the ordered boundary of `parent`
   */
  relink(parent: CellId, refs: readonly IncidenceRef[]): void {
    const previous = this.state.graph.boundaryOf(parent);
    const affected = [parent, ...previous, ...refs.map((ref) => ref.cell)];
    const restore = this.state.graph.capture(affected);
    this.state.graph.relink(parent, refs);
    this.journal.record(restore);
    for (const id of affected) this._touched.add(id);
  }

  setFaceDarts(face: FaceId, darts: readonly Dart[]): void {
    this.relink(face, darts.map((dart) => ({ cell: dart.edge, orientation: dart.orientation })));
  }

  /**
   * Unlink a cell from everything below and above it
   */
  isolate(id: CellId): void {
    if (this.state.graph.boundaryRefs(id).length > 0) {
      this.relink(id, []);
    }
    for (const parent of this.state.graph.coboundaryOf(id)) {
      this.unlink(parent, id);
    }
  }

  // ==========================================================================
  // Tracked counters
  // ==========================================================================

  adjustCounters(delta: Partial<TopologyCounters>): void {
    const previous = { ...this.state.counters };
    this.state.counters = {
      components: previous.components + (delta.components ?? 0),
      genus: previous.genus + (delta.genus ?? 0),
      holes: previous.holes + (delta.holes ?? 0),
    };
    this.journal.record(() => {
      this.state.counters = previous;
    });
  }

  setCounters(counters: TopologyCounters): void {
    const previous = this.state.counters;
    this.state.counters = { ...counters };
    this.journal.record(() => {
      this.state.counters = previous;
    });
  }

  sameComponent(a: VertexId, b: VertexId): boolean {
    const tokens = this.state.componentTokens;
    return this.state.forest.same(tokens[slotOf(a)], tokens[slotOf(b)]);
  }

  /**
   * Record that the components of `a` and `b` are now one
   *
   * @returns true if they were separate
   */
  joinComponents(a: VertexId, b: VertexId): boolean {
    const tokens = this.state.componentTokens;
    const record = this.state.forest.union(tokens[slotOf(a)], tokens[slotOf(b)]);
    if (record === null) return false;
    this.journal.record(() => this.state.forest.revert(record));
    return true;
  }
}
