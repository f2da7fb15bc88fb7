/**
 * Benchmark Runner
 *
 * Drives a session: for every model and iteration, snapshot resources,
 * run one streaming generation, snapshot again, and record the run.
 * Server failures skip the iteration; anything else aborts the session.
 */

import { EventEmitter } from 'eventemitter3';
import { setTimeout as sleepMs } from 'node:timers/promises';
import type { Logger } from 'pino';
import type {
  BenchmarkReport,
  GenerationMetrics,
  ModelSummary,
  ResourceSnapshot,
  RunRecord,
} from '../types/benchmark.js';
import type { BenchmarkConfig } from '../types/schemas/config.js';
import { ServerError, ServerUnavailableError } from '../utils/errors.js';
import { RunAggregator } from './run-aggregator.js';

export interface MetricsSource {
  generate(modelId: string, prompt: string): Promise<GenerationMetrics>;
}

export interface SnapshotSource {
  snapshot(): Promise<ResourceSnapshot>;
}

export type BenchmarkPlan = Pick<
  BenchmarkConfig,
  'models_to_test' | 'test_prompt' | 'iterations' | 'pacing_delay_ms'
>;

export interface IterationInfo {
  model: string;
  /** 1-based */
  iteration: number;
  iterations: number;
}

/**
 * Runner events
 */
export interface BenchmarkRunnerEvents {
  'run:start': (info: IterationInfo) => void;
  'run:complete': (info: IterationInfo, record: RunRecord) => void;
  'run:failed': (info: IterationInfo, error: ServerError | ServerUnavailableError) => void;
  'model:complete': (model: string, summary: ModelSummary) => void;
}

export interface BenchmarkRunnerOptions {
  collector: MetricsSource;
  sampler: SnapshotSource;
  aggregator?: RunAggregator;
  /** Pause between iterations */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

function isServerFailure(error: unknown): error is ServerError | ServerUnavailableError {
  return error instanceof ServerError || error instanceof ServerUnavailableError;
}

export class BenchmarkRunner extends EventEmitter<BenchmarkRunnerEvents> {
  private readonly collector: MetricsSource;
  private readonly sampler: SnapshotSource;
  private readonly aggregator: RunAggregator;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger?: Logger;

  constructor(
    private readonly plan: BenchmarkPlan,
    options: BenchmarkRunnerOptions
  ) {
    super();
    this.collector = options.collector;
    this.sampler = options.sampler;
    this.aggregator = options.aggregator ?? new RunAggregator();
    this.sleep = options.sleep ?? (async (ms) => { await sleepMs(ms); });
    this.logger = options.logger;
  }

  /**
   * Run every iteration for every model, in configuration order
   *
   * The pacing delay separates consecutive iterations; none follows the last.
   */
  public async run(): Promise<BenchmarkReport> {
    const { models_to_test: models, iterations } = this.plan;
    const totalIterations = models.length * iterations;
    let completed = 0;

    this.logger?.info({ models, iterations }, 'Benchmark session started');

    for (const model of models) {
      this.logger?.info({ model }, 'Benchmarking model');

      for (let iteration = 1; iteration <= iterations; iteration++) {
        await this.runIteration({ model, iteration, iterations });
        completed++;

        if (completed < totalIterations && this.plan.pacing_delay_ms > 0) {
          await this.sleep(this.plan.pacing_delay_ms);
        }
      }

      const summary = this.aggregator.summarize(model);
      this.logger?.info({ model, ...summary }, 'Model complete');
      this.emit('model:complete', model, summary);
    }

    const report = this.aggregator.finalize();
    this.logger?.info({ failedRuns: report.metadata.failed_runs }, 'Benchmark session finished');
    return report;
  }

  private async runIteration(info: IterationInfo): Promise<void> {
    this.emit('run:start', info);
    this.logger?.debug({ ...info }, 'Iteration started');

    try {
      const before = await this.sampler.snapshot();
      const metrics = await this.collector.generate(info.model, this.plan.test_prompt);
      const after = await this.sampler.snapshot();

      const record = this.aggregator.addRun(info.model, metrics, [before, after]);
      this.logger?.info(
        {
          ...info,
          ttftS: metrics.time_to_first_token_s,
          latencyS: metrics.total_latency_s,
          tokensPerSecond: metrics.tokens_per_second,
        },
        'Iteration complete'
      );
      this.emit('run:complete', info, record);
    } catch (error) {
      if (!isServerFailure(error)) {
        throw error;
      }
      this.aggregator.recordFailure(info.model);
      this.logger?.error({ ...info, err: error }, 'Iteration failed; skipping');
      this.emit('run:failed', info, error);
    }
  }
}
