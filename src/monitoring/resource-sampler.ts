/**
 * Resource Sampler
 *
 * Point-in-time CPU/RAM/temperature snapshots for the host and the
 * inference-server process. The server process is discovered once, when the
 * sampler is created; once it is seen to exit it stays untracked for the
 * rest of the session.
 */

import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import { DEFAULT_PROCESS_MATCH } from '../config/defaults.js';
import { PROCESS_NOT_FOUND, type ResourceSnapshot } from '../types/benchmark.js';
import { ProcessLostError } from '../utils/errors.js';
import { bytesToGb, roundTo, safeDivide } from '../utils/math-helpers.js';
import { HostCpuMeter, hostRamUsedGb, osHostProbe, type HostProbe } from './host-metrics.js';
import {
  ProcessLocator,
  SystemProcessTable,
  type ProcessTable,
  type ProcessUsage,
} from './process-table.js';
import { TemperatureReader, type TemperatureSource } from './temperature-reader.js';

interface CpuBaseline {
  cpuTimeMs: number;
  atMs: number;
}

/**
 * Server-process tracking state
 *
 * tracking → untracked on ProcessLostError; there is no transition back.
 */
export type ProcessTracking =
  | { state: 'tracking'; pid: number; baseline?: CpuBaseline }
  | { state: 'untracked' };

type ProcessFields = Pick<
  ResourceSnapshot,
  'ollama_process_cpu_percent' | 'ollama_process_ram_rss_gb' | 'ollama_process_status'
>;

export interface ResourceSamplerOptions {
  /** Case-insensitive substring of the server's name or command line */
  processMatch?: string;
  processTable?: ProcessTable;
  hostProbe?: HostProbe;
  temperature?: TemperatureSource;
  /** Wall clock, epoch milliseconds */
  now?: () => number;
  /** Monotonic clock for CPU deltas, milliseconds */
  monotonicNow?: () => number;
  /** Excluded from discovery */
  selfPid?: number;
  logger?: Logger;
}

/**
 * Captures host and server-process resource snapshots
 *
 * @example
 * ```typescript
 * const sampler = await ResourceSampler.create({ processMatch: 'ollama', logger });
 * const before = await sampler.snapshot();
 * // ... run one request ...
 * const after = await sampler.snapshot();
 * ```
 */
export class ResourceSampler {
  private tracking: ProcessTracking;
  // Loss seen while priming, reported by the first snapshot
  private pendingProcessFields: ProcessFields = {};
  private readonly cpuMeter: HostCpuMeter;
  private readonly hostProbe: HostProbe;
  private readonly temperature: TemperatureSource;
  private readonly now: () => number;
  private readonly monotonicNow: () => number;
  private readonly logger?: Logger;

  private constructor(
    private readonly table: ProcessTable,
    pid: number | undefined,
    options: ResourceSamplerOptions
  ) {
    this.hostProbe = options.hostProbe ?? osHostProbe;
    this.cpuMeter = new HostCpuMeter(this.hostProbe);
    this.temperature = options.temperature ?? new TemperatureReader({ logger: options.logger });
    this.now = options.now ?? Date.now;
    this.monotonicNow = options.monotonicNow ?? (() => performance.now());
    this.logger = options.logger;
    this.tracking = pid === undefined ? { state: 'untracked' } : { state: 'tracking', pid };
  }

  /**
   * Discover the server process and build a sampler
   *
   * Discovery failures are never fatal: the sampler falls back to host-only mode.
   */
  public static async create(options: ResourceSamplerOptions = {}): Promise<ResourceSampler> {
    const table = options.processTable ?? new SystemProcessTable();
    const processMatch = options.processMatch ?? DEFAULT_PROCESS_MATCH;
    const locator = new ProcessLocator(table, options.selfPid ?? process.pid);
    const logger = options.logger;

    let pid: number | undefined;
    try {
      pid = await locator.findBySubstring(processMatch);
    } catch (error) {
      logger?.warn({ err: error, processMatch }, 'Process discovery failed');
    }

    if (pid === undefined) {
      logger?.warn(
        { processMatch },
        'No target process tracked; monitoring host-wide resources only'
      );
    } else {
      logger?.info({ pid, processMatch }, 'Found server process');
    }

    const sampler = new ResourceSampler(table, pid, options);
    await sampler.primeProcessBaseline();
    return sampler;
  }

  /**
   * Current tracking state (read-only view)
   */
  public get processTracking(): Readonly<ProcessTracking> {
    return this.tracking;
  }

  public get trackedPid(): number | undefined {
    return this.tracking.state === 'tracking' ? this.tracking.pid : undefined;
  }

  /**
   * Capture one snapshot
   *
   * Host CPU/RAM failures propagate; temperature and process failures only
   * leave the corresponding fields absent.
   */
  public async snapshot(): Promise<ResourceSnapshot> {
    const timestamp = this.now() / 1000;
    const systemCpu = this.cpuMeter.sample();
    const systemRam = hostRamUsedGb(this.hostProbe);
    const temperature = await this.temperature.read();
    const processFields = await this.sampleProcess();

    return Object.freeze({
      timestamp,
      system_cpu_percent: systemCpu,
      system_ram_used_gb: systemRam,
      system_temp_celsius: temperature ?? null,
      ...processFields,
    });
  }

  private async primeProcessBaseline(): Promise<void> {
    if (this.tracking.state !== 'tracking') {
      return;
    }
    const { pid } = this.tracking;
    try {
      const usage = await this.table.sample(pid);
      this.tracking = { state: 'tracking', pid, baseline: this.baselineFrom(usage) };
    } catch (error) {
      this.pendingProcessFields = this.handleProcessError(pid, error);
    }
  }

  private async sampleProcess(): Promise<ProcessFields> {
    if (this.tracking.state !== 'tracking') {
      const pending = this.pendingProcessFields;
      this.pendingProcessFields = {};
      return pending;
    }

    const { pid, baseline } = this.tracking;
    let usage: ProcessUsage;
    try {
      usage = await this.table.sample(pid);
    } catch (error) {
      return this.handleProcessError(pid, error);
    }

    const next = this.baselineFrom(usage);
    this.tracking = { state: 'tracking', pid, baseline: next };

    // No baseline yet: same convention as a first non-blocking sample
    const cpuPercent = baseline
      ? safeDivide(next.cpuTimeMs - baseline.cpuTimeMs, next.atMs - baseline.atMs) * 100
      : 0;

    return {
      ollama_process_cpu_percent: roundTo(Math.max(0, cpuPercent), 1),
      ollama_process_ram_rss_gb: bytesToGb(usage.rssBytes),
    };
  }

  private baselineFrom(usage: ProcessUsage): CpuBaseline {
    return { cpuTimeMs: usage.cpuTimeMs, atMs: this.monotonicNow() };
  }

  private handleProcessError(pid: number, error: unknown): ProcessFields {
    if (error instanceof ProcessLostError) {
      this.tracking = { state: 'untracked' };
      this.logger?.warn({ pid }, 'Server process exited; continuing with host-only sampling');
      return { ollama_process_status: PROCESS_NOT_FOUND };
    }

    this.logger?.warn({ pid, err: error }, 'Process stats unavailable for this snapshot');
    return {};
  }
}
