#!/usr/bin/env node

/**
 * Benchmark session CLI
 *
 * Runs every configured model for the configured number of iterations
 * against a local Ollama server and writes the JSON report.
 *
 * Usage:
 *   ollama-bench [--config <path>] [--output <path>]
 */

import { DEFAULT_CONFIG_PATH } from '../config/defaults.js';
import { loadConfig } from '../config/loader.js';
import { OllamaClient } from '../api/ollama-client.js';
import { BenchmarkRunner } from '../core/benchmark-runner.js';
import { StreamingMetricsCollector } from '../core/streaming-metrics-collector.js';
import { ResourceSampler } from '../monitoring/resource-sampler.js';
import { TemperatureReader } from '../monitoring/temperature-reader.js';
import { renderSummaryTable } from '../report/console-report.js';
import { saveReport } from '../report/report-store.js';
import { isBenchError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

interface CLIArgs {
  config: string;
  output?: string;
  help: boolean;
}

function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = { config: DEFAULT_CONFIG_PATH, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--config':
      case '--output':
        if (nextArg === undefined || nextArg.startsWith('--')) {
          throw new Error(`Option ${arg} requires a path`);
        }
        if (arg === '--config') {
          result.config = nextArg;
        } else {
          result.output = nextArg;
        }
        i++;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

function printHelp(): void {
  console.log(`
Ollama Benchmark - Latency, throughput and resource usage per model

USAGE:
  ollama-bench [options]

OPTIONS:
  --config <path>     Session configuration (default: ${DEFAULT_CONFIG_PATH})
  --output <path>     Override output_file from the configuration
  -h, --help          Show this help

ENVIRONMENT:
  OLLAMA_BENCH_LOG_LEVEL   Override the configured log level
`);
}

async function main(): Promise<void> {
  let args: CLIArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    printHelp();
    process.exit(1);
  }

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  try {
    const config = await loadConfig(args.config);
    const logger = createLogger({ level: config.log_level, name: 'ollama-bench' });

    const client = new OllamaClient({
      host: config.ollama_host,
      timeoutMs: config.request_timeout_ms,
      logger,
    });
    const sampler = await ResourceSampler.create({
      processMatch: config.process_match,
      temperature: new TemperatureReader({
        command: config.sensors.command,
        timeoutMs: config.sensors.timeout_ms,
        priorityLabels: config.sensors.priority_labels,
        logger,
      }),
      logger,
    });
    const runner = new BenchmarkRunner(config, {
      collector: new StreamingMetricsCollector(client, { logger }),
      sampler,
      logger,
    });

    const report = await runner.run();
    const outputFile = args.output ?? config.output_file;
    await saveReport(report, outputFile, logger);

    console.log('\nPerformance Summary (Averages)\n');
    console.log(renderSummaryTable(report.summary_by_model));
    console.log(`\nReport written to ${outputFile}`);
    process.exit(0);
  } catch (error) {
    if (isBenchError(error)) {
      console.error(`\nError: ${error.message}`);
      console.error(`   Code: ${error.code}`);
    } else {
      console.error('\nError:', error);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
