/**
 * Resource Analyzer
 *
 * Peak (max) resource usage per model, computed from raw run records. Works
 * on persisted reports as well as on a live aggregator's output.
 */

import type { PeakResourceUsage, ResourceSnapshot, RunRecord } from '../types/benchmark.js';

/**
 * Missing and null fields count as 0 for max comparison
 */
function valueOf(value: number | null | undefined): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function emptyPeaks(): PeakResourceUsage {
  return { max_system_cpu: 0, max_ollama_cpu: 0, max_ollama_ram_gb: 0 };
}

function foldSnapshot(peaks: PeakResourceUsage, snapshot: ResourceSnapshot): PeakResourceUsage {
  return {
    max_system_cpu: Math.max(peaks.max_system_cpu, valueOf(snapshot.system_cpu_percent)),
    max_ollama_cpu: Math.max(peaks.max_ollama_cpu, valueOf(snapshot.ollama_process_cpu_percent)),
    max_ollama_ram_gb: Math.max(peaks.max_ollama_ram_gb, valueOf(snapshot.ollama_process_ram_rss_gb)),
  };
}

/**
 * Max system CPU, server CPU and server RSS across every snapshot of every
 * run, per model. Never throws and never drops a model.
 *
 * @example
 * ```typescript
 * const peaks = analyzeResourceUsage(report.raw_results);
 * console.log(peaks['llama3.2:3b'].max_ollama_ram_gb);
 * ```
 */
export function analyzeResourceUsage(
  rawResults: Readonly<Record<string, readonly RunRecord[]>>
): Record<string, PeakResourceUsage> {
  const peaksByModel: Record<string, PeakResourceUsage> = {};

  for (const [model, runs] of Object.entries(rawResults)) {
    let peaks = emptyPeaks();
    for (const run of runs) {
      for (const snapshot of run.resource_snapshots) {
        peaks = foldSnapshot(peaks, snapshot);
      }
    }
    peaksByModel[model] = peaks;
  }

  return peaksByModel;
}
