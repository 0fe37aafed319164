/**
 * Refinement benchmarks
 *
 * Catmull-Clark and triangulation on complexes of growing size. Each level
 * of Catmull-Clark multiplies the face count by 4 on a quad mesh, so the
 * timings should grow roughly linearly with the number of cells touched.
 */

import {
  type Complex,
  type Vec3,
  averagePoints,
  catmullClark,
  cube,
  subdivideEdges,
  torus,
  triangulate,
} from '../src/index.js';
import { runBenchmark, printResult, type BenchmarkResult } from './utils.js';

// ============================================================================
// Helpers
// ============================================================================

function refinedCube(levels: number): Complex<Vec3> {
  const { complex } = cube();
  for (let i = 0; i < levels; i++) {
    catmullClark(complex, { interpolate: averagePoints });
  }
  return complex;
}

// ============================================================================
// Benchmarks
// ============================================================================

function benchmarkCatmullClark(): BenchmarkResult[] {
  const results: BenchmarkResult[] = [];
  for (const levels of [0, 1, 2, 3]) {
    const faces = 6 * 4 ** levels;
    results.push(
      runBenchmark(
        `catmullClark (${faces} quads)`,
        () => refinedCube(levels),
        (complex) => {
          catmullClark(complex, { interpolate: averagePoints });
        },
        { iterations: levels >= 3 ? 5 : 20 }
      )
    );
  }
  return results;
}

function benchmarkTriangulate(): BenchmarkResult {
  return runBenchmark(
    'triangulate torus 24×12',
    () => torus(24, 12).complex,
    (complex) => {
      triangulate(complex);
    }
  );
}

function benchmarkSubdivideEdges(): BenchmarkResult {
  return runBenchmark(
    'subdivideEdges torus 24×12',
    () => torus(24, 12).complex,
    (complex) => {
      subdivideEdges(complex, { interpolate: averagePoints });
    }
  );
}

/**
 * Run every refinement benchmark and print the results
 */
export function runRefineBenchmarks(): BenchmarkResult[] {
  console.log('='.repeat(60));
  console.log('REFINEMENT BENCHMARKS');
  console.log('='.repeat(60));
  console.log('');

  const results = [...benchmarkCatmullClark(), benchmarkTriangulate(), benchmarkSubdivideEdges()];
  for (const result of results) printResult(result);
  return results;
}
