import { describe, it, expect } from 'vitest';
import { RunAggregator, summarizeRuns } from '@/core/run-aggregator.js';
import type { GenerationMetrics, ResourceSnapshot } from '@/types/benchmark.js';
import { BenchmarkReportSchema } from '@/types/schemas/report.js';

function metrics(overrides: Partial<GenerationMetrics> = {}): GenerationMetrics {
  return {
    prompt: 'p',
    response_text: 'r',
    time_to_first_token_s: 0.5,
    total_latency_s: 2,
    tokens_generated: 40,
    tokens_per_second: 20,
    raw_metadata: { done: true, eval_count: 40 },
    ...overrides,
  };
}

const SNAPSHOT: ResourceSnapshot = {
  timestamp: 1_700_000_000,
  system_cpu_percent: 12.5,
  system_ram_used_gb: 7.25,
  system_temp_celsius: null,
};

describe('RunAggregator', () => {
  it('should average latency, TTFT and throughput per model', () => {
    const aggregator = new RunAggregator();
    aggregator.addRun('m', metrics({ total_latency_s: 2, time_to_first_token_s: 0.1, tokens_per_second: 10 }), []);
    aggregator.addRun('m', metrics({ total_latency_s: 3, time_to_first_token_s: 0.2, tokens_per_second: 20 }), []);
    aggregator.addRun('m', metrics({ total_latency_s: 4, time_to_first_token_s: 0.3, tokens_per_second: 30 }), []);

    expect(aggregator.summarize('m')).toEqual({
      total_runs: 3,
      total_latency_s: 3,
      time_to_first_token_s: 0.2,
      tokens_per_second: 20,
    });
  });

  it('should round means to 4 decimals', () => {
    const aggregator = new RunAggregator();
    aggregator.addRun('m', metrics({ total_latency_s: 1 }), []);
    aggregator.addRun('m', metrics({ total_latency_s: 1 }), []);
    aggregator.addRun('m', metrics({ total_latency_s: 2 }), []);

    expect(aggregator.summarize('m').total_latency_s).toBe(1.3333);
  });

  it('should average TTFT only over runs that have one', () => {
    const summary = summarizeRuns([
      { run_timestamp: 't', llm_metrics: metrics({ time_to_first_token_s: null }), resource_snapshots: [] },
      { run_timestamp: 't', llm_metrics: metrics({ time_to_first_token_s: 0.4 }), resource_snapshots: [] },
    ]);

    expect(summary.time_to_first_token_s).toBe(0.4);
    expect(summary.total_runs).toBe(2);
  });

  it('should summarize a model without runs as zero', () => {
    const aggregator = new RunAggregator();

    expect(aggregator.summarize('unknown')).toEqual({
      total_runs: 0,
      total_latency_s: 0,
      time_to_first_token_s: 0,
      tokens_per_second: 0,
    });
  });

  it('should stamp and freeze run records', () => {
    const aggregator = new RunAggregator({ now: () => new Date('2025-01-02T03:04:05.000Z') });
    const before = { ...SNAPSHOT, system_cpu_percent: 10 };
    const after = { ...SNAPSHOT, system_cpu_percent: 85 };

    const record = aggregator.addRun('m', metrics(), [before, after]);

    expect(record.run_timestamp).toBe('2025-01-02T03:04:05.000Z');
    expect(record.resource_snapshots).toEqual([before, after]);
    expect(Object.isFrozen(record)).toBe(true);
    expect(aggregator.getRuns('m')).toEqual([record]);
  });

  it('should keep models in first-seen order', () => {
    const aggregator = new RunAggregator();
    aggregator.addRun('b', metrics(), []);
    aggregator.recordFailure('a');
    aggregator.addRun('b', metrics(), []);

    expect(aggregator.models).toEqual(['b', 'a']);
  });

  it('should finalize a report with summaries, raw runs and failures', () => {
    const aggregator = new RunAggregator({ now: () => new Date('2025-01-02T03:04:05.000Z') });
    aggregator.addRun('llama3.2:3b', metrics(), [SNAPSHOT, SNAPSHOT]);
    aggregator.recordFailure('llama3.2:3b');
    aggregator.recordFailure('qwen2.5:7b');
    aggregator.recordFailure('qwen2.5:7b');

    const report = aggregator.finalize();

    expect(report.metadata).toEqual({
      report_generated: '2025-01-02T03:04:05.000Z',
      test_models: ['llama3.2:3b', 'qwen2.5:7b'],
      failed_runs: { 'llama3.2:3b': 1, 'qwen2.5:7b': 2 },
    });
    expect(report.summary_by_model['llama3.2:3b']?.total_runs).toBe(1);
    expect(report.summary_by_model['qwen2.5:7b']?.total_runs).toBe(0);
    expect(report.raw_results['qwen2.5:7b']).toEqual([]);
  });

  it('should leave failed_runs empty when nothing failed', () => {
    const aggregator = new RunAggregator();
    aggregator.addRun('m', metrics(), []);

    expect(aggregator.finalize().metadata.failed_runs).toEqual({});
  });

  it('should reproduce the summaries from a persisted report', () => {
    const aggregator = new RunAggregator();
    aggregator.addRun('m', metrics({ total_latency_s: 1.25, time_to_first_token_s: 0.2 }), [SNAPSHOT]);
    aggregator.addRun('m', metrics({ total_latency_s: 1.75, time_to_first_token_s: null }), [SNAPSHOT]);
    const report = aggregator.finalize();

    const restored = BenchmarkReportSchema.parse(JSON.parse(JSON.stringify(report)));

    for (const [model, runs] of Object.entries(restored.raw_results)) {
      expect(summarizeRuns(runs)).toEqual(report.summary_by_model[model]);
    }
    expect(restored.raw_results['m']?.[1]?.llm_metrics.time_to_first_token_s).toBeNull();
  });
});
