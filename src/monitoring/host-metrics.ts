/**
 * Host Metrics
 *
 * Host-wide CPU utilisation and memory usage read from the `os` module.
 * CPU usage is the delta of cumulative CPU times since the previous sample,
 * so a reading never blocks waiting for an interval to elapse.
 */

import * as os from 'node:os';
import { bytesToGb, roundTo } from '../utils/math-helpers.js';

export interface CpuTimes {
  idle: number;
  total: number;
}

export interface HostMemory {
  totalBytes: number;
  freeBytes: number;
}

/**
 * Source of raw host counters
 */
export interface HostProbe {
  cpuTimes(): CpuTimes;
  memory(): HostMemory;
}

/**
 * Counters from node:os
 */
export const osHostProbe: HostProbe = {
  cpuTimes(): CpuTimes {
    let idle = 0;
    let total = 0;

    for (const cpu of os.cpus()) {
      const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
      total += user + nice + sys + cpuIdle + irq;
      idle += cpuIdle;
    }

    return { idle, total };
  },

  memory(): HostMemory {
    return { totalBytes: os.totalmem(), freeBytes: os.freemem() };
  },
};

/**
 * Host CPU utilisation over the interval since the previous call
 *
 * The baseline is taken at construction, so the first `sample()` covers the
 * time since the meter was created.
 */
export class HostCpuMeter {
  private last: CpuTimes;

  constructor(private readonly probe: HostProbe = osHostProbe) {
    this.last = probe.cpuTimes();
  }

  /**
   * Current CPU usage (0-100%, one decimal)
   */
  sample(): number {
    const current = this.probe.cpuTimes();
    const idleDelta = current.idle - this.last.idle;
    const totalDelta = current.total - this.last.total;
    this.last = current;

    if (totalDelta <= 0) {
      return 0;
    }

    const usage = (1 - idleDelta / totalDelta) * 100;
    return roundTo(Math.max(0, Math.min(100, usage)), 1);
  }
}

/**
 * Used host RAM in GB (total − free, 2 decimals)
 */
export function hostRamUsedGb(probe: HostProbe = osHostProbe): number {
  const { totalBytes, freeBytes } = probe.memory();
  return bytesToGb(Math.max(0, totalBytes - freeBytes));
}
