#!/usr/bin/env node

/**
 * Report analysis CLI
 *
 * Reads a persisted benchmark report and prints the average performance
 * and the peak resource usage per model.
 *
 * Usage:
 *   ollama-bench-report [--report <path>] [--json]
 */

import { DEFAULT_REPORT_PATH } from '../config/defaults.js';
import { analyzeResourceUsage } from '../monitoring/resource-analyzer.js';
import { renderAnalysisReport } from '../report/console-report.js';
import { loadReport } from '../report/report-store.js';
import { wrapError } from '../utils/errors.js';

interface CLIArgs {
  report: string;
  json: boolean;
  help: boolean;
}

function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = { report: DEFAULT_REPORT_PATH, json: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--json':
        result.json = true;
        break;
      case '--report': {
        const nextArg = args[i + 1];
        if (nextArg === undefined || nextArg.startsWith('--')) {
          throw new Error('Option --report requires a path');
        }
        result.report = nextArg;
        i++;
        break;
      }
      default:
        // Bare path, as in `ollama-bench-report results.json`
        if (arg.startsWith('-')) {
          throw new Error(`Unknown argument: ${arg}`);
        }
        result.report = arg;
    }
  }

  return result;
}

function printHelp(): void {
  console.log(`
Ollama Benchmark Report - Summarize a saved benchmark report

USAGE:
  ollama-bench-report [<path>] [options]

OPTIONS:
  --report <path>     Report file (default: ${DEFAULT_REPORT_PATH})
  --json              Print the analysis as JSON
  -h, --help          Show this help
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
    const report = await loadReport(args.report);
    const peaks = analyzeResourceUsage(report.raw_results);

    if (args.json) {
      console.log(JSON.stringify({ summary_by_model: report.summary_by_model, peak_usage: peaks }, null, 2));
    } else {
      console.log(renderAnalysisReport(report.summary_by_model, peaks));
    }
    process.exit(0);
  } catch (error) {
    const err = wrapError(error);
    console.error(`\nError: ${err.message}`);
    console.error(`   Code: ${err.code}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
