/**
 * Default values for optional configuration keys
 */

export const DEFAULT_CONFIG_PATH = 'config/benchmark.yaml';
export const DEFAULT_REPORT_PATH = 'benchmark_results.json';

/** Settle time between iterations so the previous request's CPU load drains */
export const DEFAULT_PACING_DELAY_MS = 1000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 300_000;

/** Case-insensitive substring identifying the inference-server process */
export const DEFAULT_PROCESS_MATCH = 'ollama';

export const DEFAULT_SENSOR_COMMAND = 'sensors';
export const DEFAULT_SENSOR_TIMEOUT_MS = 5000;

/**
 * Sensor label keywords, most specific first: Intel package, AMD control and
 * die temperatures, first core, generic CPU, ARM SoC thermal zone.
 */
export const DEFAULT_SENSOR_PRIORITY_LABELS: readonly string[] = [
  'Package id 0',
  'Tctl',
  'Tdie',
  'Core 0',
  'CPU',
  'cpu_thermal',
];

export const DEFAULT_LOG_LEVEL = 'info';

/** Decimal places for durations in metrics and summaries */
export const DURATION_DECIMALS = 4;
/** Decimal places for per-request tokens/second */
export const THROUGHPUT_DECIMALS = 2;
