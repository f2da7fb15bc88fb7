/**
 * Console report rendering
 *
 * Plain fixed-width tables for the averages and the peak resource usage.
 * Rendering returns strings; callers decide where they go.
 */

import type { ModelSummary, PeakResourceUsage } from '../types/benchmark.js';

const RULE_WIDTH = 80;

/**
 * Format a GB value as GB and whole MB
 *
 * @example
 * ```typescript
 * formatMemoryUsage(1.5)   // => '1.50 GB (1536 MB)'
 * formatMemoryUsage(0)     // => '0.00 GB (0 MB)'
 * ```
 */
export function formatMemoryUsage(gbValue: number): string {
  if (gbValue <= 0) {
    return '0.00 GB (0 MB)';
  }
  return `${gbValue.toFixed(2)} GB (${Math.floor(gbValue * 1024)} MB)`;
}

/**
 * Render rows as a fixed-width table with a header rule
 */
export function renderTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  const formatRow = (cells: readonly string[]): string =>
    widths.map((width, column) => (cells[column] ?? '').padEnd(width)).join('  ').trimEnd();

  return [
    formatRow(headers),
    widths.map((width) => '-'.repeat(width)).join('  '),
    ...rows.map(formatRow),
  ].join('\n');
}

export function renderSummaryTable(summaryByModel: Readonly<Record<string, ModelSummary>>): string {
  const rows = Object.entries(summaryByModel).map(([model, summary]) => [
    model,
    String(summary.total_runs),
    summary.total_latency_s.toFixed(4),
    summary.time_to_first_token_s.toFixed(4),
    summary.tokens_per_second.toFixed(2),
  ]);
  return renderTable(['Model', 'Runs', 'Latency (s)', 'TTFT (s)', 'Tokens/s'], rows);
}

export function renderPeakTable(peaksByModel: Readonly<Record<string, PeakResourceUsage>>): string {
  const rows = Object.entries(peaksByModel).map(([model, peaks]) => [
    model,
    peaks.max_system_cpu.toFixed(1),
    peaks.max_ollama_cpu.toFixed(1),
    formatMemoryUsage(peaks.max_ollama_ram_gb),
  ]);
  return renderTable(['Model', 'Max Host CPU (%)', 'Max Ollama CPU (%)', 'Max Ollama RAM'], rows);
}

/**
 * Full analysis report: averages followed by peak resource usage
 */
export function renderAnalysisReport(
  summaryByModel: Readonly<Record<string, ModelSummary>>,
  peaksByModel: Readonly<Record<string, PeakResourceUsage>>
): string {
  return [
    '='.repeat(RULE_WIDTH),
    'LLM Benchmark Analysis Report',
    '='.repeat(RULE_WIDTH),
    '',
    'Performance Summary (Averages)',
    '',
    renderSummaryTable(summaryByModel),
    '',
    '-'.repeat(RULE_WIDTH),
    'Peak Resource Usage',
    '',
    renderPeakTable(peaksByModel),
    '',
    '='.repeat(RULE_WIDTH),
  ].join('\n');
}
