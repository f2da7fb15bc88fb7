import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ProcessLocator,
  SystemProcessTable,
  parseProcStatCpuMs,
  parseProcStatPpid,
  parseProcStatusRssBytes,
  parsePsCpuTime,
  type PsRunner,
} from '@/monitoring/process-table.js';
import { ProcessLostError, TelemetryUnavailableError } from '@/utils/errors.js';
import { FakeProcessTable } from '../../helpers/fakes.js';

const STAT_LINE = '100 (ollama) S 1 100 100 0 -1 4194560 100 0 0 0 250 50 0 0 20 0 12 0 500 0 0';

describe('parsePsCpuTime', () => {
  it('should parse the ps time formats', () => {
    expect(parsePsCpuTime('01:02:03')).toBe(3_723_000);
    expect(parsePsCpuTime('1-00:00:00')).toBe(86_400_000);
    expect(parsePsCpuTime('0:01.50')).toBe(1_500);
    expect(parsePsCpuTime(' 00:00:07 ')).toBe(7_000);
  });

  it('should reject anything else', () => {
    expect(parsePsCpuTime('')).toBeUndefined();
    expect(parsePsCpuTime('soon')).toBeUndefined();
  });
});

describe('parseProcStatCpuMs', () => {
  it('should add user and system ticks', () => {
    expect(parseProcStatCpuMs(STAT_LINE)).toBe(3_000);
  });

  it('should cope with spaces and parentheses in the command name', () => {
    const stat = '7 (my (odd) proc) R 1 7 7 0 -1 0 0 0 0 0 10 5 0 0';
    expect(parseProcStatCpuMs(stat)).toBe(150);
  });

  it('should return undefined for truncated lines', () => {
    expect(parseProcStatCpuMs('100 (ollama) S 1')).toBeUndefined();
    expect(parseProcStatCpuMs('garbage')).toBeUndefined();
  });
});

describe('parseProcStatPpid', () => {
  it('should read the parent pid after the command name', () => {
    expect(parseProcStatPpid(STAT_LINE)).toBe(1);
    expect(parseProcStatPpid('7 (sh -c (x)) S 42 7 7')).toBe(42);
  });

  it('should return undefined for garbage', () => {
    expect(parseProcStatPpid('garbage')).toBeUndefined();
  });
});

describe('parseProcStatusRssBytes', () => {
  it('should read VmRSS in kB', () => {
    const status = ['Name:\tollama', 'VmPeak:\t 3000000 kB', 'VmRSS:\t  204800 kB', 'Threads:\t12'].join('\n');
    expect(parseProcStatusRssBytes(status)).toBe(204_800 * 1024);
  });

  it('should report 0 without a VmRSS line', () => {
    expect(parseProcStatusRssBytes('Name:\tkthreadd\nState:\tS (sleeping)')).toBe(0);
  });
});

describe('SystemProcessTable', () => {
  describe('procfs', () => {
    let procRoot: string;

    async function addProcess(pid: number, files: Record<string, string>): Promise<void> {
      const dir = join(procRoot, String(pid));
      await mkdir(dir, { recursive: true });
      for (const [name, content] of Object.entries(files)) {
        await writeFile(join(dir, name), content);
      }
    }

    beforeEach(async () => {
      procRoot = await mkdtemp(join(tmpdir(), 'bench-proc-'));
      await addProcess(100, {
        comm: 'ollama\n',
        cmdline: '/usr/local/bin/ollama\0serve\0',
        stat: STAT_LINE,
        status: 'Name:\tollama\nVmRSS:\t  2097152 kB\n',
      });
      await addProcess(200, {
        comm: 'bash\n',
        cmdline: 'bash\0',
        stat: '200 (bash) S 100 200 200 0 -1 0 0 0 0 0 3 1 0 0',
      });
      // exited mid-listing: comm without cmdline
      await addProcess(300, { comm: 'zombie\n' });
      await mkdir(join(procRoot, 'self'));
    });

    afterEach(async () => {
      await rm(procRoot, { recursive: true, force: true });
    });

    it('should list numeric entries and skip vanished ones', async () => {
      const table = new SystemProcessTable({ platform: 'linux', procRoot });
      const processes = await table.list();

      expect(processes.sort((a, b) => a.pid - b.pid)).toEqual([
        { pid: 100, ppid: 1, name: 'ollama', commandLine: '/usr/local/bin/ollama serve' },
        { pid: 200, ppid: 100, name: 'bash', commandLine: 'bash' },
      ]);
    });

    it('should sample CPU time and RSS', async () => {
      const table = new SystemProcessTable({ platform: 'linux', procRoot });

      await expect(table.sample(100)).resolves.toEqual({
        cpuTimeMs: 3_000,
        rssBytes: 2_097_152 * 1024,
      });
    });

    it('should raise ProcessLostError for a missing pid', async () => {
      const table = new SystemProcessTable({ platform: 'linux', procRoot });

      await expect(table.sample(999)).rejects.toBeInstanceOf(ProcessLostError);
    });

    it('should raise TelemetryUnavailableError for an unparsable stat', async () => {
      await addProcess(400, { comm: 'odd\n', cmdline: 'odd\0', stat: 'garbage', status: '' });
      const table = new SystemProcessTable({ platform: 'linux', procRoot });

      await expect(table.sample(400)).rejects.toBeInstanceOf(TelemetryUnavailableError);
    });
  });

  describe('ps', () => {
    it('should list processes from ps output', async () => {
      const ps = vi.fn<PsRunner>().mockResolvedValue({
        exitCode: 0,
        stdout: '    1     0 /sbin/launchd\n  512     1 /usr/local/bin/ollama serve\n',
      });
      const table = new SystemProcessTable({ platform: 'darwin', ps });

      await expect(table.list()).resolves.toEqual([
        { pid: 1, ppid: 0, name: 'launchd', commandLine: '/sbin/launchd' },
        { pid: 512, ppid: 1, name: 'ollama', commandLine: '/usr/local/bin/ollama serve' },
      ]);
      expect(ps).toHaveBeenCalledWith(['-axww', '-o', 'pid=,ppid=,args=']);
    });

    it('should fail the listing when ps fails', async () => {
      const ps = vi.fn<PsRunner>().mockResolvedValue({ exitCode: 1, stdout: '' });
      const table = new SystemProcessTable({ platform: 'darwin', ps });

      await expect(table.list()).rejects.toBeInstanceOf(TelemetryUnavailableError);
    });

    it('should sample RSS and CPU time', async () => {
      const ps = vi.fn<PsRunner>().mockResolvedValue({ exitCode: 0, stdout: '  204800   0:01.50\n' });
      const table = new SystemProcessTable({ platform: 'darwin', ps });

      await expect(table.sample(512)).resolves.toEqual({ cpuTimeMs: 1_500, rssBytes: 204_800 * 1024 });
      expect(ps).toHaveBeenCalledWith(['-o', 'rss=,time=', '-p', '512']);
    });

    it('should raise ProcessLostError when ps has no row for the pid', async () => {
      const ps = vi.fn<PsRunner>().mockResolvedValue({ exitCode: 1, stdout: '' });
      const table = new SystemProcessTable({ platform: 'darwin', ps });

      await expect(table.sample(512)).rejects.toBeInstanceOf(ProcessLostError);
    });
  });
});

describe('ProcessLocator', () => {
  const table = new FakeProcessTable([
    { pid: 20, ppid: 1, name: 'systemd', commandLine: '/lib/systemd/systemd' },
    { pid: 30, ppid: 1, name: 'Ollama', commandLine: '/Applications/Ollama.app/Contents/MacOS/Ollama' },
    { pid: 40, ppid: 1, name: 'ollama', commandLine: '/usr/local/bin/ollama serve' },
  ]);

  it('should match name or command line case-insensitively', async () => {
    const locator = new ProcessLocator(table, 999);
    await expect(locator.findBySubstring('OLLAMA')).resolves.toBe(30);
  });

  it('should never match itself', async () => {
    const locator = new ProcessLocator(table, 30);
    await expect(locator.findBySubstring('ollama')).resolves.toBe(40);
  });

  it('should return undefined without a match', async () => {
    const locator = new ProcessLocator(table, 999);
    await expect(locator.findBySubstring('llama-server')).resolves.toBeUndefined();
  });

  describe('launcher processes', () => {
    const launchers = [
      { pid: 1, ppid: 0, name: 'systemd', commandLine: '/sbin/init' },
      { pid: 400, ppid: 1, name: 'npm', commandLine: 'npm exec ollama-bench' },
      { pid: 500, ppid: 400, name: 'sh', commandLine: 'sh -c tsx src/cli/ollama-bench.ts' },
      { pid: 600, ppid: 500, name: 'node', commandLine: 'node --import tsx src/cli/ollama-bench.ts' },
    ];

    it('should skip ancestors whose command line contains the pattern', async () => {
      const locator = new ProcessLocator(
        new FakeProcessTable([
          ...launchers,
          { pid: 700, ppid: 1, name: 'ollama', commandLine: '/usr/local/bin/ollama serve' },
        ]),
        600
      );

      await expect(locator.findBySubstring('ollama')).resolves.toBe(700);
    });

    it('should find nothing when only the launchers match', async () => {
      const locator = new ProcessLocator(new FakeProcessTable(launchers), 600);

      await expect(locator.findBySubstring('ollama')).resolves.toBeUndefined();
    });
  });
});
