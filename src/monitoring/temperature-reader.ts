/**
 * Temperature Reader
 *
 * Extracts a representative CPU temperature from the free-form text printed
 * by a hardware-sensor tool (lm-sensors' `sensors` by default). Label naming
 * differs between vendors and boards, so the label keywords and the reading
 * pattern are data passed in from configuration.
 */

import { execa } from 'execa';
import type { Logger } from 'pino';
import {
  DEFAULT_SENSOR_COMMAND,
  DEFAULT_SENSOR_PRIORITY_LABELS,
  DEFAULT_SENSOR_TIMEOUT_MS,
} from '../config/defaults.js';

/**
 * Runs an external command and resolves with its stdout.
 * Rejects on spawn failure, non-zero exit or timeout.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: { timeoutMs: number }
) => Promise<string>;

/**
 * Anything that can produce a temperature reading
 */
export interface TemperatureSource {
  read(): Promise<number | undefined>;
}

export interface TemperatureParseRules {
  /** Label keywords, highest priority first (case-insensitive substring of the label) */
  priorityLabels: readonly string[];
  /** First capture group is the reading in °C */
  readingPattern: RegExp;
}

/**
 * `+45.0°C`, `+45°C`, `+45.0 °C`
 */
export const DEFAULT_READING_PATTERN = /\+(\d+(?:\.\d+)?)\s?°C/;

export const DEFAULT_PARSE_RULES: TemperatureParseRules = {
  priorityLabels: DEFAULT_SENSOR_PRIORITY_LABELS,
  readingPattern: DEFAULT_READING_PATTERN,
};

export const execaRunner: CommandRunner = async (command, args, { timeoutMs }) => {
  const { stdout } = await execa(command, [...args], { timeout: timeoutMs });
  return stdout;
};

function firstReading(text: string, pattern: RegExp): number | undefined {
  const match = pattern.exec(text);
  if (!match || match[1] === undefined) {
    return undefined;
  }
  const value = Number.parseFloat(match[1]);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Parse sensor output into a single temperature
 *
 * Priority labels are tried in order; the first line whose label contains
 * the keyword and carries a reading wins. Without a labelled match, the
 * first reading of every line is collected and the hottest one returned.
 * Only the first reading of a line counts, so `(high = +80.0°C)` style
 * thresholds are never mistaken for the current value.
 *
 * @example
 * ```typescript
 * parseTemperature('Package id 0: +45.0°C  (high = +80.0°C, crit = +100.0°C)'); // => 45
 * ```
 */
export function parseTemperature(
  text: string,
  rules: TemperatureParseRules = DEFAULT_PARSE_RULES
): number | undefined {
  // Global/sticky flags would make exec() stateful across lines
  const pattern = new RegExp(rules.readingPattern.source, rules.readingPattern.flags.replace(/[gy]/g, ''));
  const lines = text.split(/\r?\n/);

  for (const label of rules.priorityLabels) {
    const keyword = label.toLowerCase();
    for (const line of lines) {
      const separator = line.indexOf(':');
      if (separator < 0 || !line.slice(0, separator).toLowerCase().includes(keyword)) {
        continue;
      }
      const reading = firstReading(line.slice(separator + 1), pattern);
      if (reading !== undefined) {
        return reading;
      }
    }
  }

  let hottest: number | undefined;
  for (const line of lines) {
    const reading = firstReading(line, pattern);
    if (reading !== undefined && (hottest === undefined || reading > hottest)) {
      hottest = reading;
    }
  }
  return hottest;
}

export interface TemperatureReaderOptions {
  command?: string;
  args?: readonly string[];
  timeoutMs?: number;
  priorityLabels?: readonly string[];
  readingPattern?: RegExp;
  runner?: CommandRunner;
  logger?: Logger;
}

/**
 * Reads host CPU temperature through the sensor tool. Never rejects.
 */
export class TemperatureReader implements TemperatureSource {
  private readonly command: string;
  private readonly args: readonly string[];
  private readonly timeoutMs: number;
  private readonly rules: TemperatureParseRules;
  private readonly runner: CommandRunner;
  private readonly logger?: Logger;
  private reportedUnavailable = false;

  constructor(options: TemperatureReaderOptions = {}) {
    this.command = options.command ?? DEFAULT_SENSOR_COMMAND;
    this.args = options.args ?? [];
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SENSOR_TIMEOUT_MS;
    this.rules = {
      priorityLabels: options.priorityLabels ?? DEFAULT_SENSOR_PRIORITY_LABELS,
      readingPattern: options.readingPattern ?? DEFAULT_READING_PATTERN,
    };
    this.runner = options.runner ?? execaRunner;
    this.logger = options.logger;
  }

  public async read(): Promise<number | undefined> {
    let output: string;
    try {
      output = await this.runner(this.command, this.args, { timeoutMs: this.timeoutMs });
    } catch (error) {
      this.noteUnavailable({ command: this.command, err: error }, 'Sensor query failed');
      return undefined;
    }

    const value = parseTemperature(output, this.rules);
    if (value === undefined) {
      this.noteUnavailable({ command: this.command }, 'No temperature reading in sensor output');
    }
    return value;
  }

  // First failure at warn, repeats at debug: the tool is queried on every snapshot
  private noteUnavailable(context: Record<string, unknown>, message: string): void {
    if (this.reportedUnavailable) {
      this.logger?.debug(context, message);
      return;
    }
    this.reportedUnavailable = true;
    this.logger?.warn(context, `${message}; temperature will be reported as null`);
  }
}
