/**
 * Kernel benchmarks
 *
 * Usage:
 *   npm run bench            - Run all benchmarks
 *
 * Or run directly:
 *   npx tsx bench/index.ts
 */

import { runOperatorBenchmarks } from './operators.bench.js';
import { runRefineBenchmarks } from './refine.bench.js';
import { summarizeResults, type BenchmarkResult } from './utils.js';

// ============================================================================
// Main Entry Point
// ============================================================================

export function runAllBenchmarks(): void {
  console.log('');
  console.log(`Date: ${new Date().toISOString()}`);
  console.log(`Node: ${process.version}`);
  console.log('');

  const allResults: BenchmarkResult[] = [...runOperatorBenchmarks(), ...runRefineBenchmarks()];

  console.log('='.repeat(60));
  console.log('OVERALL SUMMARY');
  console.log('='.repeat(60));
  console.log('');
  console.log(summarizeResults(allResults));
  console.log('');

  const slowest = allResults.reduce((a, b) => (a.avgMs > b.avgMs ? a : b));
  const fastest = allResults.reduce((a, b) => (a.avgMs < b.avgMs ? a : b));
  console.log(`  Fastest: ${fastest.name} (${fastest.avgMs.toFixed(3)} ms avg)`);
  console.log(`  Slowest: ${slowest.name} (${slowest.avgMs.toFixed(3)} ms avg)`);
  console.log('');
}

runAllBenchmarks();

export { runOperatorBenchmarks } from './operators.bench.js';
export { runRefineBenchmarks } from './refine.bench.js';
export * from './utils.js';
