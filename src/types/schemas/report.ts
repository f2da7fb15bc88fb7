/**
 * Zod schemas for the persisted benchmark report
 *
 * The analyzer reads reports produced by earlier sessions; these schemas are
 * the contract between the two sides.
 */

import { z } from 'zod';

export const ResourceSnapshotSchema = z.object({
  timestamp: z.number(),
  system_cpu_percent: z.number(),
  system_ram_used_gb: z.number(),
  system_temp_celsius: z.number().nullable(),
  ollama_process_cpu_percent: z.number().optional(),
  ollama_process_ram_rss_gb: z.number().optional(),
  ollama_process_status: z.string().optional(),
});

export const GenerationMetricsSchema = z.object({
  prompt: z.string(),
  response_text: z.string(),
  time_to_first_token_s: z.number().nullable(),
  total_latency_s: z.number(),
  tokens_generated: z.number().int().nonnegative(),
  tokens_per_second: z.number().nonnegative(),
  raw_metadata: z.record(z.unknown()),
});

export const RunRecordSchema = z.object({
  run_timestamp: z.string(),
  llm_metrics: GenerationMetricsSchema,
  resource_snapshots: z.array(ResourceSnapshotSchema),
});

export const ModelSummarySchema = z.object({
  total_runs: z.number().int().nonnegative(),
  total_latency_s: z.number(),
  time_to_first_token_s: z.number(),
  tokens_per_second: z.number(),
});

export const BenchmarkReportSchema = z.object({
  metadata: z.object({
    report_generated: z.string(),
    test_models: z.array(z.string()),
    failed_runs: z.record(z.number().int().nonnegative()).default({}),
  }),
  summary_by_model: z.record(ModelSummarySchema),
  raw_results: z.record(z.array(RunRecordSchema)),
});

