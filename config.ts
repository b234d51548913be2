export interface IndexConfig {
  maxPoints: number;
  benchmarkPoints: number;
  benchmarkQueries: number;
  // largest count * queries the benchmark's linear scan may run
  benchmarkMaxWork: number;
}

export const DEFAULT_CONFIG: IndexConfig = {
  maxPoints: 100_000,
  benchmarkPoints: 2000,
  benchmarkQueries: 200,
  benchmarkMaxWork: 10_000_000,
};

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw ?? fallback);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export function readConfig(env: Record<string, string | undefined> = process.env): IndexConfig {
  return {
    maxPoints: positiveInt(env.KD_MAX_POINTS, DEFAULT_CONFIG.maxPoints),
    benchmarkPoints: positiveInt(env.KD_BENCHMARK_DEFAULT_POINTS, DEFAULT_CONFIG.benchmarkPoints),
    benchmarkQueries: positiveInt(env.KD_BENCHMARK_DEFAULT_QUERIES, DEFAULT_CONFIG.benchmarkQueries),
    benchmarkMaxWork: positiveInt(env.KD_BENCHMARK_MAX_WORK, DEFAULT_CONFIG.benchmarkMaxWork),
  };
}
