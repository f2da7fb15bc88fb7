import { describe, it, expect } from 'vitest';
import {
  formatMemoryUsage,
  renderAnalysisReport,
  renderPeakTable,
  renderSummaryTable,
  renderTable,
} from '@/report/console-report.js';

const SUMMARY = {
  'llama3.2:3b': { total_runs: 3, total_latency_s: 2.5, time_to_first_token_s: 0.125, tokens_per_second: 42.123 },
};

const PEAKS = {
  m: { max_system_cpu: 85, max_ollama_cpu: 300.2, max_ollama_ram_gb: 2.4 },
};

describe('formatMemoryUsage', () => {
  it('should show GB and whole MB', () => {
    expect(formatMemoryUsage(1.5)).toBe('1.50 GB (1536 MB)');
    expect(formatMemoryUsage(2.4)).toBe('2.40 GB (2457 MB)');
  });

  it('should show zero for non-positive values', () => {
    expect(formatMemoryUsage(0)).toBe('0.00 GB (0 MB)');
    expect(formatMemoryUsage(-1)).toBe('0.00 GB (0 MB)');
  });
});

describe('renderTable', () => {
  it('should pad columns to the widest cell', () => {
    expect(renderTable(['A', 'Long'], [['xx', '1']]).split('\n')).toEqual(['A   Long', '--  ----', 'xx  1']);
  });

  it('should render headers alone when there are no rows', () => {
    expect(renderTable(['Model'], [])).toBe('Model\n-----');
  });
});

describe('renderSummaryTable', () => {
  it('should format averages with fixed decimals', () => {
    expect(renderSummaryTable(SUMMARY).split('\n')).toEqual([
      'Model        Runs  Latency (s)  TTFT (s)  Tokens/s',
      '-----------  ----  -----------  --------  --------',
      'llama3.2:3b  3     2.5000       0.1250    42.12',
    ]);
  });
});

describe('renderPeakTable', () => {
  it('should format peaks with one-decimal CPU and GB/MB memory', () => {
    expect(renderPeakTable(PEAKS).split('\n')).toEqual([
      'Model  Max Host CPU (%)  Max Ollama CPU (%)  Max Ollama RAM',
      '-----  ----------------  ------------------  -----------------',
      'm      85.0              300.2               2.40 GB (2457 MB)',
    ]);
  });
});

describe('renderAnalysisReport', () => {
  it('should contain both sections in order', () => {
    const lines = renderAnalysisReport(SUMMARY, PEAKS).split('\n');

    expect(lines[1]).toBe('LLM Benchmark Analysis Report');
    expect(lines.indexOf('Performance Summary (Averages)')).toBeLessThan(lines.indexOf('Peak Resource Usage'));
    expect(lines).toContain('llama3.2:3b  3     2.5000       0.1250    42.12');
    expect(lines).toContain('m      85.0              300.2               2.40 GB (2457 MB)');
  });
});
