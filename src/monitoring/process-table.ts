/**
 * Process Table
 *
 * Process enumeration and per-process counters for the inference server.
 * Linux reads procfs directly; other platforms shell out to `ps`.
 */

import { readdir, readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { execa } from 'execa';
import { ProcessLostError, TelemetryUnavailableError, toError } from '../utils/errors.js';

export interface ProcessInfo {
  pid: number;
  /** Parent pid, when the platform reports it */
  ppid?: number;
  name: string;
  commandLine: string;
}

export interface ProcessUsage {
  /** Cumulative user + system CPU time */
  cpuTimeMs: number;
  rssBytes: number;
}

/**
 * Process/host telemetry boundary
 */
export interface ProcessTable {
  list(): Promise<ProcessInfo[]>;
  /**
   * @throws {ProcessLostError} when the process no longer exists
   * @throws {TelemetryUnavailableError} when its counters cannot be read
   */
  sample(pid: number): Promise<ProcessUsage>;
}

/** procfs reports CPU time in USER_HZ ticks, fixed at 100 for userspace */
const USER_HZ = 100;

/** Fields after the `(comm)` entry of /proc/<pid>/stat start at field 3 */
const STAT_PPID_INDEX = 4 - 3;
const STAT_UTIME_INDEX = 14 - 3;
const STAT_STIME_INDEX = 15 - 3;

export type PsRunner = (args: readonly string[]) => Promise<{ exitCode: number; stdout: string }>;

const execaPsRunner: PsRunner = async (args) => {
  const result = await execa('ps', [...args], { reject: false });
  if (result.exitCode === undefined) {
    throw new TelemetryUnavailableError('ps could not be started', 'ps');
  }
  return { exitCode: result.exitCode, stdout: result.stdout };
};

export interface SystemProcessTableOptions {
  platform?: NodeJS.Platform;
  /** procfs mount point (Linux) */
  procRoot?: string;
  /** `ps` invocation (other platforms) */
  ps?: PsRunner;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Parse `ps` cumulative CPU time: `[[dd-]hh:]mm:ss[.cc]`
 *
 * @example
 * ```typescript
 * parsePsCpuTime('01:02:03')     // => 3723000
 * parsePsCpuTime('1-00:00:00')   // => 86400000
 * parsePsCpuTime('0:01.50')      // => 1500
 * ```
 */
export function parsePsCpuTime(value: string): number | undefined {
  const match = /^(?:(\d+)-)?(?:(\d+):)?(\d+):(\d+(?:\.\d+)?)$/.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [, days = '0', hours = '0', minutes = '0', seconds = '0'] = match;
  const totalSeconds =
    Number(days) * 86_400 + Number(hours) * 3_600 + Number(minutes) * 60 + Number(seconds);
  return Math.round(totalSeconds * 1000);
}

function statFields(stat: string): string[] | undefined {
  // comm may itself contain spaces and parentheses; it ends at the last ')'
  const commEnd = stat.lastIndexOf(')');
  if (commEnd < 0) {
    return undefined;
  }
  return stat.slice(commEnd + 2).trim().split(/\s+/);
}

/**
 * Parse the parent pid (field 4) out of a /proc/<pid>/stat line
 */
export function parseProcStatPpid(stat: string): number | undefined {
  const ppid = Number(statFields(stat)?.[STAT_PPID_INDEX]);
  return Number.isInteger(ppid) ? ppid : undefined;
}

/**
 * Parse the CPU time out of a /proc/<pid>/stat line
 */
export function parseProcStatCpuMs(stat: string): number | undefined {
  const fields = statFields(stat);
  if (!fields) {
    return undefined;
  }
  const utime = Number(fields[STAT_UTIME_INDEX]);
  const stime = Number(fields[STAT_STIME_INDEX]);
  if (!Number.isFinite(utime) || !Number.isFinite(stime)) {
    return undefined;
  }
  return ((utime + stime) * 1000) / USER_HZ;
}

/**
 * Parse resident set size from /proc/<pid>/status (kernel threads have none)
 */
export function parseProcStatusRssBytes(status: string): number {
  const match = /^VmRSS:\s+(\d+)\s+kB$/m.exec(status);
  return match?.[1] !== undefined ? Number(match[1]) * 1024 : 0;
}

/**
 * Default process table backed by the operating system
 */
export class SystemProcessTable implements ProcessTable {
  private readonly platform: NodeJS.Platform;
  private readonly procRoot: string;
  private readonly ps: PsRunner;

  constructor(options: SystemProcessTableOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.procRoot = options.procRoot ?? '/proc';
    this.ps = options.ps ?? execaPsRunner;
  }

  public async list(): Promise<ProcessInfo[]> {
    return this.platform === 'linux' ? this.listProcfs() : this.listPs();
  }

  public async sample(pid: number): Promise<ProcessUsage> {
    return this.platform === 'linux' ? this.sampleProcfs(pid) : this.samplePs(pid);
  }

  private async listProcfs(): Promise<ProcessInfo[]> {
    const entries = await readdir(this.procRoot);
    const processes: ProcessInfo[] = [];

    for (const entry of entries) {
      if (!/^\d+$/.test(entry)) {
        continue;
      }
      try {
        const [comm, cmdline, stat] = await Promise.all([
          readFile(join(this.procRoot, entry, 'comm'), 'utf8'),
          readFile(join(this.procRoot, entry, 'cmdline'), 'utf8'),
          readFile(join(this.procRoot, entry, 'stat'), 'utf8'),
        ]);
        processes.push({
          pid: Number(entry),
          ppid: parseProcStatPpid(stat),
          name: comm.trim(),
          commandLine: cmdline.split('\0').filter(Boolean).join(' '),
        });
      } catch (error) {
        // Exited between readdir and read, or not readable by this user
        const code = errnoCode(error);
        if (code !== 'ENOENT' && code !== 'ESRCH' && code !== 'EACCES' && code !== 'EPERM') {
          throw error;
        }
      }
    }

    return processes;
  }

  private async sampleProcfs(pid: number): Promise<ProcessUsage> {
    const dir = join(this.procRoot, String(pid));
    let stat: string;
    let status: string;
    try {
      [stat, status] = await Promise.all([
        readFile(join(dir, 'stat'), 'utf8'),
        readFile(join(dir, 'status'), 'utf8'),
      ]);
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT' || code === 'ESRCH') {
        throw new ProcessLostError(pid, toError(error));
      }
      throw new TelemetryUnavailableError(`Cannot read ${dir}`, 'procfs', toError(error));
    }

    const cpuTimeMs = parseProcStatCpuMs(stat);
    if (cpuTimeMs === undefined) {
      throw new TelemetryUnavailableError(`Unparsable ${dir}/stat`, 'procfs');
    }
    return { cpuTimeMs, rssBytes: parseProcStatusRssBytes(status) };
  }

  private async listPs(): Promise<ProcessInfo[]> {
    const { exitCode, stdout } = await this.ps(['-axww', '-o', 'pid=,ppid=,args=']);
    if (exitCode !== 0) {
      throw new TelemetryUnavailableError(`ps exited with code ${exitCode}`, 'ps');
    }

    const processes: ProcessInfo[] = [];
    for (const line of stdout.split('\n')) {
      const match = /^\s*(\d+)\s+(\d+)\s+(.*)$/.exec(line);
      if (!match?.[1] || !match[2] || match[3] === undefined) {
        continue;
      }
      const commandLine = match[3].trim();
      processes.push({
        pid: Number(match[1]),
        ppid: Number(match[2]),
        name: basename(commandLine.split(/\s+/)[0] ?? ''),
        commandLine,
      });
    }
    return processes;
  }

  private async samplePs(pid: number): Promise<ProcessUsage> {
    const { exitCode, stdout } = await this.ps(['-o', 'rss=,time=', '-p', String(pid)]);
    const line = stdout.trim();
    if (line === '') {
      // `ps -p` exits 1 with no rows once the process is gone
      throw new ProcessLostError(pid);
    }
    if (exitCode !== 0) {
      throw new TelemetryUnavailableError(`ps exited with code ${exitCode}`, 'ps');
    }

    const [rssKb, time] = line.split(/\s+/);
    const cpuTimeMs = time === undefined ? undefined : parsePsCpuTime(time);
    if (rssKb === undefined || cpuTimeMs === undefined) {
      throw new TelemetryUnavailableError(`Unparsable ps output: ${line}`, 'ps');
    }
    return { cpuTimeMs, rssBytes: Number(rssKb) * 1024 };
  }
}

/**
 * Locates the inference-server process by name or command line
 */
export class ProcessLocator {
  constructor(
    private readonly table: ProcessTable,
    private readonly selfPid: number = process.pid
  ) {}

  /**
   * First process whose name or command line contains `pattern`
   * (case-insensitive), excluding this process and its ancestors
   */
  public async findBySubstring(pattern: string): Promise<number | undefined> {
    const needle = pattern.toLowerCase();
    const processes = await this.table.list();
    const excluded = this.selfAndAncestors(processes);

    const match = processes.find(
      (proc) =>
        !excluded.has(proc.pid) &&
        (proc.name.toLowerCase().includes(needle) || proc.commandLine.toLowerCase().includes(needle))
    );
    return match?.pid;
  }

  // Launchers (npm, tsx, sh -c) often carry the pattern in their own command line
  private selfAndAncestors(processes: readonly ProcessInfo[]): Set<number> {
    const parents = new Map(processes.map((proc) => [proc.pid, proc.ppid]));
    const excluded = new Set<number>();
    let pid: number | undefined = this.selfPid;

    while (pid !== undefined && pid > 0 && !excluded.has(pid)) {
      excluded.add(pid);
      pid = parents.get(pid);
    }
    return excluded;
  }
}
