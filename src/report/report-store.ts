/**
 * Report persistence
 *
 * A session writes its report once, as pretty-printed JSON; the analysis
 * tool reads it back later, possibly on another machine.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import type { BenchmarkReport } from '../types/benchmark.js';
import { BenchmarkReportSchema } from '../types/schemas/report.js';
import { ReportLoadError, toError } from '../utils/errors.js';

/**
 * Write a report to disk, creating parent directories as needed
 */
export async function saveReport(
  report: BenchmarkReport,
  filePath: string,
  logger?: Logger
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
  logger?.info({ path: filePath }, 'Report written');
}

/**
 * Parse and validate report JSON text
 *
 * @throws {ReportLoadError} if the text is not JSON or not a report
 */
export function parseReport(content: string, source = '<inline>'): BenchmarkReport {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ReportLoadError(
      `Could not decode JSON from '${source}'. Check file integrity.`,
      source,
      toError(error)
    );
  }

  const parsed = BenchmarkReportSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'root'}: ${issue.message}`)
      .join('\n');
    throw new ReportLoadError(`Report '${source}' is malformed:\n${details}`, source, parsed.error);
  }
  return parsed.data;
}

/**
 * Load a persisted report
 *
 * @throws {ReportLoadError} if the file is missing, unreadable or malformed
 */
export async function loadReport(filePath: string, logger?: Logger): Promise<BenchmarkReport> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    throw new ReportLoadError(
      missing
        ? `Report file not found at '${filePath}'.`
        : `Could not read report '${filePath}': ${toError(error).message}`,
      filePath,
      toError(error)
    );
  }

  const report = parseReport(content, filePath);
  logger?.debug({ path: filePath, models: report.metadata.test_models }, 'Report loaded');
  return report;
}
