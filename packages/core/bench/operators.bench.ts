/**
 * Operator benchmarks
 *
 * Single operators and their inverses, validated locally and over the whole
 * complex, to show what full validation costs per edit.
 */

import {
  type Complex,
  type ValidationMode,
  type Vec3,
  catmullClark,
  cube,
  deleteVertex,
  splitEdge,
} from '../src/index.js';
import { runBenchmark, printResult, type BenchmarkResult } from './utils.js';

function refinedCube(validation: ValidationMode): Complex<Vec3> {
  const { complex } = cube({ validation });
  catmullClark(complex);
  catmullClark(complex);
  return complex;
}

function benchmarkSplitAndJoin(validation: ValidationMode): BenchmarkResult {
  return runBenchmark(
    `split+join every edge (${validation})`,
    () => refinedCube(validation),
    (complex) => {
      for (const edge of complex.edges()) {
        const { vertex } = splitEdge(complex, edge);
        deleteVertex(complex, vertex);
      }
    },
    { iterations: validation === 'full' ? 3 : 10 }
  );
}

/**
 * Run every operator benchmark and print the results
 */
export function runOperatorBenchmarks(): BenchmarkResult[] {
  console.log('='.repeat(60));
  console.log('OPERATOR BENCHMARKS');
  console.log('='.repeat(60));
  console.log('');

  const results = [benchmarkSplitAndJoin('local'), benchmarkSplitAndJoin('full')];
  for (const result of results) printResult(result);
  return results;
}
