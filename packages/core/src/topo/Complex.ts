/**
 * Complex - the owner of one cell complex
 *
 * Holds the registry, the incidence graph, component bookkeeping and the
 * tracked topological counters. All reads go through this class; all writes
 * go through `mutate`, which runs an edit as one journaled transaction:
 *
 *   complex.mutate('splitEdge', (tx) => { ... })
 *
 * The edit either commits with every invariant holding, or is rolled back and
 * its error rethrown.
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
} from './handles.js';
import { expectEdge, expectFace, expectVertex, expectVolume } from './expect.js';
import { CellRegistry, type CellView } from './registry.js';
import { IncidenceGraph, type IncidenceReader, type IncidenceRef } from './incidence.js';
import { ComponentForest } from './components.js';
import { EditTransaction, Journal, type ComplexState, type TopologyCounters } from './transaction.js';
import { ConcurrentMutationError, TopologyError } from './errors.js';
import {
  type ValidationOptions,
  type ValidationReport,
  type ValidationTarget,
  firstError,
  validateCells,
  validateComplex,
} from './validate.js';

/**
 * How much of the complex is checked after each operator
 */
export type ValidationMode = 'local' | 'full';

/**
 * Complex options
 */
export interface ComplexOptions {
  /** Validate touched cells only, or the whole complex, after each operator */
  validation?: ValidationMode;
  /** Log every commit and rollback */
  verbose?: boolean;
  /** Upper bound on the steps of any traversal */
  maxTraversalSteps?: number;
  /** Initial slot capacity of the registry */
  initialCapacity?: number;
}

export const DEFAULT_COMPLEX_OPTIONS: Required<ComplexOptions> = {
  validation: 'local',
  verbose: false,
  maxTraversalSteps: 1_000_000,
  initialCapacity: 64,
};

/**
 * Counts of a complex at one moment
 */
export interface ComplexStats {
  vertices: number;
  edges: number;
  faces: number;
  volumes: number;
  components: number;
  genus: number;
  holes: number;
  /** V - E + F - C */
  eulerCharacteristic: number;
}

const LOG_PREFIX = '[topocell]';

export class Complex<P = unknown> implements ValidationTarget {
  readonly options: Readonly<Required<ComplexOptions>>;

  private readonly state: ComplexState<P>;
  private _version = 0;
  private _activeOperation: string | null = null;

  constructor(options: ComplexOptions = {}) {
    this.options = Object.freeze({ ...DEFAULT_COMPLEX_OPTIONS, ...options });

    let graph: IncidenceGraph | undefined;
    const registry = new CellRegistry<P>({
      initialCapacity: this.options.initialCapacity,
      isReferenced: (id) => graph?.hasIncidences(id) ?? false,
    });
    graph = new IncidenceGraph(registry);

    this.state = {
      registry,
      graph,
      forest: new ComponentForest(),
      componentTokens: [],
      counters: { components: 0, genus: 0, holes: 0 },
    };
  }

  // ==========================================================================
  // Editing
  // ==========================================================================

  /**
   * Run an edit as one transaction
   *
   * @throws ConcurrentMutationError if another edit is in flight
   * @throws TopologyError naming the invariant when validation fails
   */
  mutate<T>(operation: string, edit: (tx: EditTransaction<P>) => T, validation?: ValidationMode): T {
    if (this._activeOperation !== null) {
      throw new ConcurrentMutationError(`Cannot start ${operation} while ${this._activeOperation} is in flight`);
    }
    this._activeOperation = operation;

    const journal = new Journal();
    const tx = new EditTransaction(this.state, journal, this.options.maxTraversalSteps);
    try {
      const result = edit(tx);

      const report =
        (validation ?? this.options.validation) === 'full'
          ? validateComplex(this, { maxLoopIterations: this.options.maxTraversalSteps })
          : validateCells(this, tx.touched, { maxLoopIterations: this.options.maxTraversalSteps });
      const issue = firstError(report);
      if (issue) {
        throw new TopologyError(
          `${operation} would break ${issue.invariant}: ${issue.message}`,
          issue.subject === undefined ? issue.related ?? [] : [issue.subject, ...(issue.related ?? [])],
          issue.invariant
        );
      }

      this._version++;
      this.log(`${operation} committed: ${this.describeCounts()}`);
      return result;
    } catch (err) {
      journal.rollback();
      this.log(`${operation} rolled back: ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    } finally {
      this._activeOperation = null;
    }
  }

  /** Incremented by every committed edit */
  get version(): number {
    return this._version;
  }

  get isMutating(): boolean {
    return this._activeOperation !== null;
  }

  /**
   * Replace a cell's payload outside an operator
   */
  setPayload(id: CellId, payload: P | undefined): void {
    this.mutate('setPayload', (tx) => tx.setPayload(id, payload));
  }

  // ==========================================================================
  // Cells
  // ==========================================================================

  get(id: CellId): CellView<P> {
    return this.state.registry.get(id);
  }

  has(id: CellId): boolean {
    return this.state.registry.has(id);
  }

  dimensionOf(id: CellId): Dimension {
    return this.state.registry.dimensionOf(id);
  }

  payload(id: CellId): P | undefined {
    return this.state.registry.payloadOf(id);
  }

  describe(id: CellId): string {
    return this.state.registry.describe(id);
  }

  /**
   * Live cells of one dimension (or all), in identifier slot order
   */
  allCells(dimension?: Dimension): CellId[] {
    return Array.from(this.state.registry.cells(dimension));
  }

  vertices(): VertexId[] {
    return this.allCells(0).map(asVertexId);
  }

  edges(): EdgeId[] {
    return this.allCells(1).map(asEdgeId);
  }

  faces(): FaceId[] {
    return this.allCells(2).map(asFaceId);
  }

  volumes(): VolumeId[] {
    return this.allCells(3).map(asVolumeId);
  }

  cellCount(dimension: Dimension): number {
    return this.state.registry.liveCount(dimension);
  }

  /**
   * Narrow an identifier to a vertex
   *
   * @throws UnknownCellError for a dead identifier
   * @throws DimensionMismatchError for another kind of cell
   */
  expectVertex(id: CellId): VertexId {
    return expectVertex(this.state.graph, id);
  }

  expectEdge(id: CellId): EdgeId {
    return expectEdge(this.state.graph, id);
  }

  expectFace(id: CellId): FaceId {
    return expectFace(this.state.graph, id);
  }

  expectVolume(id: CellId): VolumeId {
    return expectVolume(this.state.graph, id);
  }

  // ==========================================================================
  // Incidences
  // ==========================================================================

  /** Read-only view of the incidence graph */
  get incidence(): IncidenceReader {
    return this.state.graph;
  }

  boundaryOf(id: CellId): CellId[] {
    return this.state.graph.boundaryOf(id);
  }

  boundaryRefs(id: CellId): readonly IncidenceRef[] {
    return this.state.graph.boundaryRefs(id);
  }

  coboundaryOf(id: CellId): ReadonlySet<CellId> {
    return this.state.graph.coboundaryOf(id);
  }

  coboundaryRefs(id: CellId): IncidenceRef[] {
    return this.state.graph.coboundaryRefs(id);
  }

  orientationOf(parent: CellId, child: CellId): Orientation | undefined {
    return this.state.graph.orientationOf(parent, child);
  }

  // ==========================================================================
  // Topological counts
  // ==========================================================================

  get counters(): Readonly<TopologyCounters> {
    return this.state.counters;
  }

  get components(): number {
    return this.state.counters.components;
  }

  get genus(): number {
    return this.state.counters.genus;
  }

  get holes(): number {
    return this.state.counters.holes;
  }

  /**
   * V - E + F - C from live counts
   */
  eulerCharacteristic(): number {
    const registry = this.state.registry;
    return registry.liveCount(0) - registry.liveCount(1) + registry.liveCount(2) - registry.liveCount(3);
  }

  stats(): ComplexStats {
    return {
      vertices: this.cellCount(0),
      edges: this.cellCount(1),
      faces: this.cellCount(2),
      volumes: this.cellCount(3),
      ...this.state.counters,
      eulerCharacteristic: this.eulerCharacteristic(),
    };
  }

  /**
   * Full validation report of the current state
   */
  validate(options: ValidationOptions = {}): ValidationReport {
    return validateComplex(this, { maxLoopIterations: this.options.maxTraversalSteps, ...options });
  }

  // ==========================================================================
  // Logging
  // ==========================================================================

  private describeCounts(): string {
    const s = this.stats();
    return `V=${s.vertices} E=${s.edges} F=${s.faces} C=${s.volumes} χ=${s.eulerCharacteristic}`;
  }

  private log(message: string): void {
    if (this.options.verbose) {
      console.log(`${LOG_PREFIX} ${message}`);
    }
  }
}
