/**
 * Run Aggregator
 *
 * Accumulates per-run records keyed by model and derives per-model mean
 * statistics. Resource usage is deliberately not averaged here; peak
 * analysis is the job of the resource analyzer, which works from the raw
 * records alone.
 */

import { DURATION_DECIMALS } from '../config/defaults.js';
import type {
  BenchmarkReport,
  GenerationMetrics,
  ModelSummary,
  ResourceSnapshot,
  RunRecord,
} from '../types/benchmark.js';
import { roundTo, safeAverage } from '../utils/math-helpers.js';

/**
 * Mean statistics over a sequence of runs (4 decimals)
 *
 * TTFT is averaged over the runs that have one; with none, it is 0.
 */
export function summarizeRuns(runs: readonly RunRecord[]): ModelSummary {
  const latencies = runs.map((run) => run.llm_metrics.total_latency_s);
  const ttfts = runs.flatMap((run) =>
    run.llm_metrics.time_to_first_token_s === null ? [] : [run.llm_metrics.time_to_first_token_s]
  );
  const throughputs = runs.map((run) => run.llm_metrics.tokens_per_second);

  return {
    total_runs: runs.length,
    total_latency_s: roundTo(safeAverage(latencies), DURATION_DECIMALS),
    time_to_first_token_s: roundTo(safeAverage(ttfts), DURATION_DECIMALS),
    tokens_per_second: roundTo(safeAverage(throughputs), DURATION_DECIMALS),
  };
}

export interface RunAggregatorOptions {
  /** Wall clock used for run and report timestamps */
  now?: () => Date;
}

export class RunAggregator {
  private readonly results = new Map<string, RunRecord[]>();
  private readonly failures = new Map<string, number>();
  private readonly now: () => Date;

  constructor(options: RunAggregatorOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Append one completed run. Pure in-memory accumulation; never rejects input.
   */
  public addRun(
    model: string,
    metrics: GenerationMetrics,
    snapshots: readonly ResourceSnapshot[]
  ): RunRecord {
    const record: RunRecord = Object.freeze({
      run_timestamp: this.now().toISOString(),
      llm_metrics: metrics,
      resource_snapshots: Object.freeze([...snapshots]),
    });

    this.runsFor(model).push(record);
    return record;
  }

  /**
   * Count an iteration that failed and was skipped
   */
  public recordFailure(model: string): void {
    this.runsFor(model);
    this.failures.set(model, (this.failures.get(model) ?? 0) + 1);
  }

  /**
   * Mean statistics for one model; a model without runs yields total_runs 0
   */
  public summarize(model: string): ModelSummary {
    return summarizeRuns(this.results.get(model) ?? []);
  }

  public getRuns(model: string): readonly RunRecord[] {
    return this.results.get(model) ?? [];
  }

  /**
   * Models in first-seen order
   */
  public get models(): string[] {
    return [...this.results.keys()];
  }

  /**
   * Build the full report: summaries, raw records and metadata
   */
  public finalize(): BenchmarkReport {
    const summaryByModel: BenchmarkReport['summary_by_model'] = {};
    const rawResults: BenchmarkReport['raw_results'] = {};
    const failedRuns: Record<string, number> = {};

    for (const [model, runs] of this.results) {
      summaryByModel[model] = summarizeRuns(runs);
      rawResults[model] = [...runs];
      const failures = this.failures.get(model);
      if (failures !== undefined) {
        failedRuns[model] = failures;
      }
    }

    return {
      metadata: {
        report_generated: this.now().toISOString(),
        test_models: this.models,
        failed_runs: failedRuns,
      },
      summary_by_model: summaryByModel,
      raw_results: rawResults,
    };
  }

  private runsFor(model: string): RunRecord[] {
    let runs = this.results.get(model);
    if (!runs) {
      runs = [];
      this.results.set(model, runs);
    }
    return runs;
  }
}
