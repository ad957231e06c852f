export { formatScorecard, type ViewOptions } from './scorecard-viewer.js';
export {
  TREND_POINTS,
  TREND_THRESHOLD,
  buildHistoryReport,
  formatHistoryReport,
  trendOf,
  type DimensionSummary,
  type HistoryEntry,
  type HistoryReport,
  type Trend,
} from './history-report.js';
export {
  BENCHMARKS_FILE,
  DEFAULT_BENCHMARKS,
  IMPROVEMENT_TIPS,
  benchmarkStatus,
  compareToBenchmarks,
  formatBenchmark,
  loadBenchmarks,
  type BenchmarkComparison,
  type BenchmarkStandards,
  type BenchmarkStatus,
  type Comparison,
  type DimensionComparison,
  type LoadedBenchmarks,
} from './benchmark.js';
