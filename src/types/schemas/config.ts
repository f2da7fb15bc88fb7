/**
 * Benchmark configuration schema
 *
 * Mirrors the structure of config/benchmark.yaml. Only the five session keys
 * are required; everything else falls back to the defaults.
 */

import { z } from 'zod';
import {
  DEFAULT_LOG_LEVEL,
  DEFAULT_PACING_DELAY_MS,
  DEFAULT_PROCESS_MATCH,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_SENSOR_COMMAND,
  DEFAULT_SENSOR_PRIORITY_LABELS,
  DEFAULT_SENSOR_TIMEOUT_MS,
} from '../../config/defaults.js';

export const SensorsConfigSchema = z.object({
  /** Hardware-sensor query tool */
  command: z.string().min(1).default(DEFAULT_SENSOR_COMMAND),
  /** Upper bound on a single sensor query */
  timeout_ms: z.number().int().positive().default(DEFAULT_SENSOR_TIMEOUT_MS),
  /** Label keywords tried in order before the hottest-sensor fallback */
  priority_labels: z.array(z.string().min(1)).default([...DEFAULT_SENSOR_PRIORITY_LABELS]),
});

export const BenchmarkConfigSchema = z.object({
  models_to_test: z.array(z.string().min(1)).min(1),
  test_prompt: z.string().min(1),
  iterations: z.number().int().positive(),
  output_file: z.string().min(1),
  ollama_host: z.string().url(),
  pacing_delay_ms: z.number().int().nonnegative().default(DEFAULT_PACING_DELAY_MS),
  request_timeout_ms: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  process_match: z.string().min(1).default(DEFAULT_PROCESS_MATCH),
  sensors: SensorsConfigSchema.default({}),
  log_level: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default(DEFAULT_LOG_LEVEL),
});

export type BenchmarkConfig = z.infer<typeof BenchmarkConfigSchema>;

/**
 * Keys whose absence aborts a session before any run
 */
export const REQUIRED_CONFIG_KEYS = [
  'models_to_test',
  'test_prompt',
  'iterations',
  'output_file',
  'ollama_host',
] as const;
