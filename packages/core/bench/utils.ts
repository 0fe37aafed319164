/**
 * Timing helpers for the kernel benchmarks
 *
 * Operators edit the complex they run on, so every timed iteration gets a
 * fresh input from an untimed `setup`.
 */

/**
 * Result of a benchmark run
 */
export interface BenchmarkResult {
  name: string;
  iterations: number;
  /** Total time in milliseconds */
  totalMs: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
  stdDevMs: number;
  /** Operations per second (based on average) */
  opsPerSec: number;
}

export interface BenchmarkOptions {
  /** Number of iterations (default: 20) */
  iterations?: number;
  /** Number of warmup iterations (default: 2) */
  warmup?: number;
  /** Whether to log progress (default: false) */
  verbose?: boolean;
}

const DEFAULT_OPTIONS: Required<BenchmarkOptions> = {
  iterations: 20,
  warmup: 2,
  verbose: false,
};

/**
 * Time `fn` on inputs built by `setup`
 */
export function runBenchmark<T>(
  name: string,
  setup: () => T,
  fn: (input: T) => void,
  options?: BenchmarkOptions
): BenchmarkResult {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  if (opts.verbose) {
    console.log(`[${name}] ${opts.warmup} warmup + ${opts.iterations} timed iterations`);
  }
  for (let i = 0; i < opts.warmup; i++) {
    fn(setup());
  }

  const times: number[] = [];
  for (let i = 0; i < opts.iterations; i++) {
    const input = setup();
    const start = performance.now();
    fn(input);
    times.push(performance.now() - start);
  }

  const totalMs = times.reduce((a, b) => a + b, 0);
  const avgMs = totalMs / opts.iterations;
  const variance = times.reduce((sum, t) => sum + (t - avgMs) ** 2, 0) / opts.iterations;

  return {
    name,
    iterations: opts.iterations,
    totalMs,
    avgMs,
    minMs: Math.min(...times),
    maxMs: Math.max(...times),
    stdDevMs: Math.sqrt(variance),
    opsPerSec: 1000 / avgMs,
  };
}

export function formatResult(result: BenchmarkResult): string {
  return [
    `Benchmark: ${result.name}`,
    `  Iterations: ${result.iterations}`,
    `  Average:    ${result.avgMs.toFixed(3)} ms`,
    `  Min:        ${result.minMs.toFixed(3)} ms`,
    `  Max:        ${result.maxMs.toFixed(3)} ms`,
    `  Std Dev:    ${result.stdDevMs.toFixed(3)} ms`,
  ].join('\n');
}

export function printResult(result: BenchmarkResult): void {
  console.log(formatResult(result));
  console.log('');
}

/**
 * Markdown table of results
 */
export function summarizeResults(results: BenchmarkResult[]): string {
  const width = Math.max(9, ...results.map((r) => r.name.length));
  const header = `| ${'Benchmark'.padEnd(width)} | Avg (ms) | Min (ms) | Max (ms) | Ops/sec |`;
  const separator = `|${'-'.repeat(width + 2)}|----------|----------|----------|---------|`;
  const rows = results.map(
    (r) =>
      `| ${r.name.padEnd(width)} | ${r.avgMs.toFixed(3).padStart(8)} | ${r.minMs.toFixed(3).padStart(8)} | ${r.maxMs.toFixed(3).padStart(8)} | ${r.opsPerSec.toFixed(1).padStart(7)} |`
  );
  return [header, separator, ...rows].join('\n');
}
