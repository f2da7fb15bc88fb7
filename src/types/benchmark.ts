/**
 * Benchmark domain types
 *
 * Field names mirror the persisted report format (snake_case) so that a
 * report written by one session can be read back by the analyzer verbatim.
 */

/**
 * Marker written into a snapshot when the tracked server process has exited
 */
export const PROCESS_NOT_FOUND = 'not found';

/**
 * Point-in-time host and server-process resource measurement
 */
export interface ResourceSnapshot {
  /** Epoch seconds */
  readonly timestamp: number;
  readonly system_cpu_percent: number;
  readonly system_ram_used_gb: number;
  readonly system_temp_celsius: number | null;
  readonly ollama_process_cpu_percent?: number;
  readonly ollama_process_ram_rss_gb?: number;
  readonly ollama_process_status?: string;
}

/**
 * Timing and throughput of a single streaming generation request
 */
export interface GenerationMetrics {
  readonly prompt: string;
  readonly response_text: string;
  /** null when the stream produced no chunk at all */
  readonly time_to_first_token_s: number | null;
  readonly total_latency_s: number;
  readonly tokens_generated: number;
  readonly tokens_per_second: number;
  /** Final chunk as sent by the server (token counts, server-side durations) */
  readonly raw_metadata: Readonly<Record<string, unknown>>;
}

/**
 * One benchmark iteration: metrics plus the snapshots bracketing the request
 */
export interface RunRecord {
  /** ISO-8601 */
  readonly run_timestamp: string;
  readonly llm_metrics: GenerationMetrics;
  readonly resource_snapshots: readonly ResourceSnapshot[];
}

/**
 * Per-model mean statistics, derived from RunRecords on demand
 */
export interface ModelSummary {
  total_runs: number;
  total_latency_s: number;
  time_to_first_token_s: number;
  tokens_per_second: number;
}

export interface ReportMetadata {
  report_generated: string;
  test_models: string[];
  /** Iterations that failed and were skipped, per model */
  failed_runs: Record<string, number>;
}

/**
 * Complete output of a benchmarking session
 */
export interface BenchmarkReport {
  metadata: ReportMetadata;
  summary_by_model: Record<string, ModelSummary>;
  raw_results: Record<string, readonly RunRecord[]>;
}

/**
 * Peak (max) resource usage observed for a model
 */
export interface PeakResourceUsage {
  max_system_cpu: number;
  max_ollama_cpu: number;
  max_ollama_ram_gb: number;
}
