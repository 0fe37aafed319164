/**
 * Cell complex validation
 *
 * Checks the manifold invariants of a complex and reports every violation:
 * - Reference issues (records naming dead cells, unmirrored pairings)
 * - Boundary issues (edge endpoints, face cycles, volume shells)
 * - Radial issues (edges with the wrong number of faces, vertices whose
 *   darts do not form a single fan)
 * - Euler bookkeeping (counted χ, components and holes against tracked values)
 *
 * The same per-cell checks back the local validation that runs after every
 * operator; the whole-complex pass is used by `validation: 'full'`, the bulk
 * loader and tests.
 */

import { type CellId, type Dimension, type EdgeId, type VertexId, asEdgeId, asFaceId, asVertexId, asVolumeId } from './handles.js';
import type { IncidenceReader } from './incidence.js';
import type { TopologyCounters } from './transaction.js';
import { InvariantViolationError, type InvariantName } from './errors.js';
import { ComponentForest } from './components.js';
import {
  collectHoleLoops,
  dartHead,
  dartTail,
  edgeEnds,
  faceDarts,
  outgoingDarts,
  isBoundaryVertex,
  vertexDegree,
  vertexFan,
} from './navigation.js';

/**
 * Types of validation issues
 */
export type ValidationIssueKind =
  | 'unknownReference'
  | 'mirrorMismatch'
  | 'dimensionMismatch'
  | 'edgeEndpoints'
  | 'selfLoop'
  | 'shortCycle'
  | 'brokenCycle'
  | 'repeatedVertex'
  | 'openShell'
  | 'wireEdge'
  | 'nonManifoldEdge'
  | 'isolatedVertex'
  | 'nonManifoldVertex'
  | 'lowValence'
  | 'openHoleLoop'
  | 'eulerMismatch'
  | 'componentMismatch'
  | 'holeMismatch';

/**
 * Severity levels for validation issues
 */
export type ValidationSeverity = 'error' | 'warning' | 'info';

/**
 * A single validation issue
 */
export interface ValidationIssue {
  kind: ValidationIssueKind;
  /** Invariant the issue belongs to */
  invariant: InvariantName;
  severity: ValidationSeverity;
  message: string;
  /** Cell where the issue was found (absent for whole-complex issues) */
  subject?: CellId;
  /** Other cells involved */
  related?: CellId[];
}

/**
 * Complete validation report
 */
export interface ValidationReport {
  /** Whether the complex is valid (no errors) */
  isValid: boolean;
  issues: ValidationIssue[];
  errorCount: number;
  warningCount: number;
  infoCount: number;
}

/**
 * Validation options
 */
export interface ValidationOptions {
  /** Compare counted χ, components and holes against the tracked values */
  checkEuler?: boolean;
  /** Warn about interior vertices of degree below 3 */
  checkLowValence?: boolean;
  /** Maximum steps when walking a hole loop */
  maxLoopIterations?: number;
}

export const DEFAULT_VALIDATION_OPTIONS: Required<ValidationOptions> = {
  checkEuler: true,
  checkLowValence: false,
  maxLoopIterations: 10000,
};

/**
 * What validation reads from a complex
 */
export interface ValidationTarget {
  readonly incidence: IncidenceReader;
  readonly counters: Readonly<TopologyCounters>;
  has(id: CellId): boolean;
  allCells(dimension?: Dimension): CellId[];
  cellCount(dimension: Dimension): number;
}

function createReport(): ValidationReport {
  return {
    isValid: true,
    issues: [],
    errorCount: 0,
    warningCount: 0,
    infoCount: 0,
  };
}

function addIssue(report: ValidationReport, issue: ValidationIssue): void {
  report.issues.push(issue);

  if (issue.severity === 'error') {
    report.errorCount++;
    report.isValid = false;
  } else if (issue.severity === 'warning') {
    report.warningCount++;
  } else {
    report.infoCount++;
  }
}

function error(
  report: ValidationReport,
  invariant: InvariantName,
  kind: ValidationIssueKind,
  message: string,
  subject?: CellId,
  related?: CellId[]
): void {
  addIssue(report, { kind, invariant, severity: 'error', message, subject, related });
}

/**
 * Validate a whole complex
 */
export function validateComplex(target: ValidationTarget, options: ValidationOptions = {}): ValidationReport {
  const opts = { ...DEFAULT_VALIDATION_OPTIONS, ...options };
  const report = createReport();

  for (const id of target.allCells()) {
    checkCell(target, id, report, opts);
  }

  if (opts.checkEuler && report.isValid) {
    checkEulerCharacteristic(target, report);
    checkComponentsAndHoles(target, report, opts);
  }

  return report;
}

/**
 * Validate the neighbourhood of the given cells
 *
 * Dead cells in `cells` are skipped; records that still name them are found
 * through their live neighbours.
 */
export function validateCells(
  target: ValidationTarget,
  cells: Iterable<CellId>,
  options: ValidationOptions = {}
): ValidationReport {
  const opts = { ...DEFAULT_VALIDATION_OPTIONS, ...options };
  const report = createReport();

  for (const id of expandNeighbourhood(target, cells)) {
    checkCell(target, id, report, opts);
  }

  if (opts.checkEuler && report.isValid) {
    checkEulerCharacteristic(target, report);
  }

  return report;
}

/**
 * Check if a complex is valid (convenience function)
 */
export function isValidComplex(target: ValidationTarget, options?: ValidationOptions): boolean {
  return validateComplex(target, options).isValid;
}

export function firstError(report: ValidationReport): ValidationIssue | undefined {
  return report.issues.find((issue) => issue.severity === 'error');
}

/**
 * Touched cells plus the cells one step above and below them
 */
function expandNeighbourhood(target: ValidationTarget, cells: Iterable<CellId>): Set<CellId> {
  const graph = target.incidence;
  const result = new Set<CellId>();
  const add = (id: CellId): void => {
    if (target.has(id)) result.add(id);
  };

  for (const id of cells) {
    if (!target.has(id)) continue;
    result.add(id);
    for (const child of graph.boundaryOf(id)) {
      add(child);
      // a face's vertices sit two levels down
      if (graph.dimensionOf(id) === 2 && target.has(child)) {
        for (const vertex of graph.boundaryOf(child)) add(vertex);
      }
    }
    for (const parent of graph.coboundaryOf(id)) add(parent);
  }
  return result;
}

// ============================================================================
// Per-cell checks
// ============================================================================

function checkCell(
  target: ValidationTarget,
  id: CellId,
  report: ValidationReport,
  opts: Required<ValidationOptions>
): void {
  if (!checkReferences(target, id, report)) return;

  try {
    switch (target.incidence.dimensionOf(id)) {
      case 0:
        checkVertex(target, asVertexId(id), report, opts);
        break;
      case 1:
        checkEdge(target, asEdgeId(id), report);
        break;
      case 2:
        checkFace(target, id, report);
        break;
      case 3:
        checkVolume(target, id, report);
        break;
    }
  } catch (err) {
    // a neighbour's record is malformed; report it against this cell
    if (!(err instanceof InvariantViolationError)) throw err;
    error(report, 'boundaryCycle', 'brokenCycle', err.message, id, [...err.cells]);
  }
}

/**
 * Liveness, dimension and mirroring of both record sides
 *
 * @returns false if the structural checks cannot run on this cell
 */
function checkReferences(target: ValidationTarget, id: CellId, report: ValidationReport): boolean {
  const graph = target.incidence;
  const dimension = graph.dimensionOf(id);
  const before = report.errorCount;

  for (const ref of graph.boundaryRefs(id)) {
    if (!target.has(ref.cell)) {
      error(report, 'danglingReference', 'unknownReference', `${graph.describe(id)} names dead cell ${graph.describe(ref.cell)} in its boundary`, id, [ref.cell]);
      continue;
    }
    if (graph.dimensionOf(ref.cell) !== dimension - 1) {
      error(report, 'incidenceConsistency', 'dimensionMismatch', `${graph.describe(ref.cell)} cannot bound ${graph.describe(id)}`, id, [ref.cell]);
      continue;
    }
    if (graph.orientationOf(id, ref.cell) !== ref.orientation) {
      error(report, 'incidenceConsistency', 'mirrorMismatch', `${graph.describe(ref.cell)} does not mirror its use by ${graph.describe(id)}`, id, [ref.cell]);
    }
  }

  for (const ref of graph.coboundaryRefs(id)) {
    if (!target.has(ref.cell)) {
      error(report, 'danglingReference', 'unknownReference', `${graph.describe(id)} names dead cell ${graph.describe(ref.cell)} in its co-boundary`, id, [ref.cell]);
      continue;
    }
    const mirrored = graph.boundaryRefs(ref.cell).some((back) => back.cell === id && back.orientation === ref.orientation);
    if (!mirrored) {
      error(report, 'incidenceConsistency', 'mirrorMismatch', `${graph.describe(ref.cell)} does not list ${graph.describe(id)} on its boundary`, id, [ref.cell]);
    }
  }

  return report.errorCount === before;
}

function checkVertex(
  target: ValidationTarget,
  vertex: VertexId,
  report: ValidationReport,
  opts: Required<ValidationOptions>
): void {
  const graph = target.incidence;
  const degree = vertexDegree(graph, vertex);
  if (degree === 0) {
    error(report, 'radialOrder', 'isolatedVertex', `${graph.describe(vertex)} has no edges`, vertex);
    return;
  }

  const fan = vertexFan(graph, vertex);
  if (fan.darts.length !== degree) {
    error(
      report,
      'radialOrder',
      'nonManifoldVertex',
      `Darts around ${graph.describe(vertex)} form more than one fan (${fan.darts.length} of ${degree} reached)`,
      vertex,
      outgoingDarts(graph, vertex).map((dart) => dart.edge)
    );
    return;
  }

  if (opts.checkLowValence && degree < 3 && !isBoundaryVertex(graph, vertex)) {
    addIssue(report, {
      kind: 'lowValence',
      invariant: 'radialOrder',
      severity: 'warning',
      message: `Interior ${graph.describe(vertex)} has degree ${degree}`,
      subject: vertex,
    });
  }
}

function checkEdge(target: ValidationTarget, edge: EdgeId, report: ValidationReport): void {
  const graph = target.incidence;
  const refs = graph.boundaryRefs(edge);
  const hasStart = refs.some((ref) => ref.orientation === -1);
  const hasEnd = refs.some((ref) => ref.orientation === 1);
  if (refs.length !== 2 || !hasStart || !hasEnd) {
    error(report, 'boundaryCycle', 'edgeEndpoints', `${graph.describe(edge)} needs one start and one end vertex`, edge);
    return;
  }
  if (refs[0].cell === refs[1].cell) {
    error(report, 'boundaryCycle', 'selfLoop', `${graph.describe(edge)} starts and ends at ${graph.describe(refs[0].cell)}`, edge);
    return;
  }

  const faces = graph.coboundaryRefs(edge);
  if (faces.length === 0) {
    error(report, 'radialOrder', 'wireEdge', `${graph.describe(edge)} bounds no face`, edge);
  } else if (faces.length > 2 || (faces.length === 2 && faces[0].orientation === faces[1].orientation)) {
    error(
      report,
      'radialOrder',
      'nonManifoldEdge',
      `${graph.describe(edge)} is used by ${faces.length} faces without opposite orientations`,
      edge,
      faces.map((ref) => ref.cell)
    );
  }
}

function checkFace(target: ValidationTarget, id: CellId, report: ValidationReport): void {
  const graph = target.incidence;
  const face = asFaceId(id);
  const darts = faceDarts(graph, face);
  if (darts.length < 3) {
    error(report, 'boundaryCycle', 'shortCycle', `${graph.describe(face)} has ${darts.length} edges`, face);
    return;
  }

  const seen = new Set<VertexId>();
  for (let i = 0; i < darts.length; i++) {
    const next = darts[(i + 1) % darts.length];
    const head = dartHead(graph, darts[i]);
    if (head !== dartTail(graph, next)) {
      error(
        report,
        'boundaryCycle',
        'brokenCycle',
        `${graph.describe(face)} boundary breaks between ${graph.describe(darts[i].edge)} and ${graph.describe(next.edge)}`,
        face,
        [darts[i].edge, next.edge]
      );
      return;
    }
    if (seen.has(head)) {
      error(report, 'boundaryCycle', 'repeatedVertex', `${graph.describe(face)} visits ${graph.describe(head)} twice`, face, [head]);
      return;
    }
    seen.add(head);
  }
}

function checkVolume(target: ValidationTarget, id: CellId, report: ValidationReport): void {
  const graph = target.incidence;
  const volume = asVolumeId(id);
  const sides = graph.boundaryRefs(volume);
  // every edge of a closed shell is used once in each direction
  const uses = new Map<CellId, number[]>();
  for (const side of sides) {
    for (const dart of faceDarts(graph, asFaceId(side.cell))) {
      const list = uses.get(dart.edge) ?? [];
      list.push(side.orientation * dart.orientation);
      uses.set(dart.edge, list);
    }
  }
  const open: CellId[] = [];
  for (const [edge, list] of uses) {
    if (list.length !== 2 || list[0] + list[1] !== 0) open.push(edge);
  }
  if (sides.length === 0 || open.length > 0) {
    error(report, 'boundaryCycle', 'openShell', `${graph.describe(volume)} shell is not closed`, volume, open);
  }
}

// ============================================================================
// Euler bookkeeping
// ============================================================================

/**
 * V − E + F − C against 2c − 2g − h − C
 */
function checkEulerCharacteristic(target: ValidationTarget, report: ValidationReport): void {
  const { components, genus, holes } = target.counters;
  const volumes = target.cellCount(3);
  const counted = target.cellCount(0) - target.cellCount(1) + target.cellCount(2) - volumes;
  const expected = 2 * components - 2 * genus - holes - volumes;
  if (counted !== expected) {
    error(
      report,
      'eulerCharacteristic',
      'eulerMismatch',
      `V - E + F - C is ${counted}, expected ${expected} for c=${components} g=${genus} h=${holes}`
    );
  }
}

function checkComponentsAndHoles(
  target: ValidationTarget,
  report: ValidationReport,
  opts: Required<ValidationOptions>
): void {
  const components = countComponents(target);
  if (components !== target.counters.components) {
    error(report, 'eulerCharacteristic', 'componentMismatch', `Found ${components} components, tracked ${target.counters.components}`);
  }

  let holes: number;
  try {
    holes = collectHoleLoops(target.incidence, target.allCells(1).map(asEdgeId), opts.maxLoopIterations).length;
  } catch (err) {
    if (!(err instanceof InvariantViolationError)) throw err;
    error(report, 'radialOrder', 'openHoleLoop', err.message, err.cells[0], [...err.cells]);
    return;
  }
  if (holes !== target.counters.holes) {
    error(report, 'eulerCharacteristic', 'holeMismatch', `Found ${holes} hole loops, tracked ${target.counters.holes}`);
  }
}

/**
 * Number of connected components of the vertex-edge graph
 */
export function countComponents(target: ValidationTarget): number {
  const vertices = target.allCells(0);
  const index = new Map<CellId, number>();
  const forest = new ComponentForest();
  for (const vertex of vertices) index.set(vertex, forest.add());

  let components = vertices.length;
  for (const id of target.allCells(1)) {
    const [start, end] = edgeEnds(target.incidence, asEdgeId(id));
    const a = index.get(start);
    const b = index.get(end);
    if (a !== undefined && b !== undefined && forest.union(a, b) !== null) {
      components--;
    }
  }
  return components;
}
