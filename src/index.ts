/**
 * ollama-bench public API
 */

export { OllamaClient, parseGenerateChunk } from './api/ollama-client.js';
export type { FetchLike, GenerateStreamSource, OllamaClientOptions } from './api/ollama-client.js';
export { GenerationStatsCollector } from './api/stats-collector.js';
export type { Clock, GenerationTiming } from './api/stats-collector.js';

export { loadConfig, validateConfig, interpolateEnvVars } from './config/loader.js';
export * from './config/defaults.js';

export { BenchmarkRunner } from './core/benchmark-runner.js';
export type {
  BenchmarkPlan,
  BenchmarkRunnerEvents,
  BenchmarkRunnerOptions,
  IterationInfo,
  MetricsSource,
  SnapshotSource,
} from './core/benchmark-runner.js';
export { RunAggregator, summarizeRuns } from './core/run-aggregator.js';
export type { RunAggregatorOptions } from './core/run-aggregator.js';
export { StreamingMetricsCollector } from './core/streaming-metrics-collector.js';
export type { StreamingMetricsCollectorOptions } from './core/streaming-metrics-collector.js';

export * from './monitoring/index.js';

export { saveReport, loadReport, parseReport } from './report/report-store.js';
export {
  formatMemoryUsage,
  renderAnalysisReport,
  renderPeakTable,
  renderSummaryTable,
  renderTable,
} from './report/console-report.js';

export * from './types/index.js';
export * from './utils/errors.js';
export { createLogger, lazyLog, resolveLogLevel } from './utils/logger.js';
export type { CreateLoggerOptions, Logger, LogLevel } from './utils/logger.js';
