// portable-probe.ts - Probe for non-Linux Unix hosts (macOS, BSD) using ps, mount and lsof
import * as os from 'os';
import { exec } from 'child_process';
import { promisify } from 'util';
import {
  BaseProbe,
  ConnectionSample,
  DiskPartition,
  InterfaceStatsSample,
  IoCountersSample,
  ProbeResult,
  ProcessSample,
  ProcessStatusSample,
  SocketAddress,
  SwapMemory,
  VirtualMemory
} from './system-probe';
import { AccessDeniedError, ProbeError, toProbeError } from '../common/errors';

const execAsync = promisify(exec);

const EXEC_OPTIONS = { timeout: 15000, maxBuffer: 16 * 1024 * 1024 };

// BSD ps marks anything asleep for more than ~20s as I, and
// uninterruptible waits as U (macOS) or D (FreeBSD)
const PS_STATES: Record<string, string> = {
  R: 'running',
  S: 'sleeping',
  I: 'sleeping',
  U: 'sleeping',
  D: 'sleeping',
  T: 'stopped',
  Z: 'zombie'
};

export function psStateName(stat: string): string {
  return PS_STATES[stat.charAt(0)] ?? stat;
}

export interface PsRow {
  pid: number;
  stat: string;
  user: string;
  cpu: number;
  rssKb: number;
  started: Date;
  command: string;
}

/**
 * Parse one line of `ps -axo pid=,stat=,user=,%cpu=,rss=,lstart=,comm=`.
 * lstart is always five tokens ("Mon Oct 19 10:00:00 2026").
 */
export function parsePsLine(line: string): PsRow {
  const match = /^\s*(\d+)\s+(\S+)\s+(\S+)\s+([\d.]+)\s+(\d+)\s+(\S+\s+\S+\s+\d+\s+[\d:]+\s+\d+)\s+(.+)$/.exec(line);
  if (!match) {
    throw new Error(`Unparsable ps line: ${line.trim()}`);
  }
  return {
    pid: parseInt(match[1], 10),
    stat: match[2],
    user: match[3],
    cpu: parseFloat(match[4]),
    rssKb: parseInt(match[5], 10),
    started: new Date(match[6]),
    command: match[7].trim()
  };
}

export interface VmStat {
  pageSize: number;
  pages: Map<string, number>;
}

/**
 * Parse `vm_stat` output:
 *   Mach Virtual Memory Statistics: (page size of 16384 bytes)
 *   Pages free:                               12345.
 */
export function parseVmStat(output: string): VmStat {
  const size = /page size of (\d+) bytes/.exec(output);
  const pages = new Map<string, number>();
  for (const line of output.split('\n')) {
    const match = /^(.+?):\s+(\d+)\.?$/.exec(line.trim());
    if (match) {
      pages.set(match[1], parseInt(match[2], 10));
    }
  }
  return { pageSize: size ? parseInt(size[1], 10) : 4096, pages };
}

/**
 * Free and inactive pages count as available; active and wired pages as used.
 */
export function memoryFromVmStat(vm: VmStat, total: number): VirtualMemory | null {
  const free = vm.pages.get('Pages free');
  const inactive = vm.pages.get('Pages inactive');
  if (free === undefined || inactive === undefined) {
    return null;
  }
  const active = vm.pages.get('Pages active') ?? 0;
  const wired = vm.pages.get('Pages wired down') ?? 0;
  return {
    total,
    available: Math.min(total, (free + inactive) * vm.pageSize),
    used: Math.min(total, (active + wired) * vm.pageSize)
  };
}

/**
 * Parse `mount` output: "/dev/disk1s1 on / (apfs, local, journaled)".
 * Only device-backed mounts are kept.
 */
export function parseMountOutput(output: string): DiskPartition[] {
  const partitions: DiskPartition[] = [];
  for (const line of output.split('\n')) {
    const match = /^(\S+) on (.+) \(([^,)]+)/.exec(line.trim());
    if (!match || !match[1].startsWith('/dev/')) continue;
    partitions.push({ device: match[1], mountpoint: match[2], fstype: match[3].trim() });
  }
  return partitions;
}

function parseEndpoint(value: string, family: string): SocketAddress | null {
  const idx = value.lastIndexOf(':');
  if (idx < 0) {
    return null;
  }
  const port = parseInt(value.slice(idx + 1), 10);
  if (isNaN(port) || port === 0) {
    return null;
  }
  let ip = value.slice(0, idx);
  if (ip.startsWith('[') && ip.endsWith(']')) {
    ip = ip.slice(1, -1);
  }
  if (ip === '*') {
    ip = family === 'AF_INET6' ? '::' : '0.0.0.0';
  }
  return { ip, port };
}

/**
 * Parse `lsof -nP -i -F pftPnT` field output. Each record starts with
 * p<pid>; each file within it with f<fd>.
 */
export function parseLsofFields(output: string): ProbeResult<ConnectionSample>[] {
  const results: ProbeResult<ConnectionSample>[] = [];
  let pid: number | null = null;
  let current: Partial<Record<'f' | 't' | 'P' | 'n' | 'state', string>> | null = null;

  const flush = (): void => {
    if (!current) return;
    try {
      results.push({ success: true, data: toConnection(current, pid) });
    } catch (error) {
      results.push({ success: false, error: toProbeError(error, 'lsof record') });
    }
    current = null;
  };

  for (const line of output.split('\n')) {
    if (!line) continue;
    const tag = line.charAt(0);
    const value = line.slice(1);

    switch (tag) {
      case 'p':
        flush();
        pid = parseInt(value, 10);
        break;
      case 'f':
        flush();
        current = { f: value };
        break;
      case 't':
        if (current) current.t = value;
        break;
      case 'P':
        if (current) current.P = value;
        break;
      case 'n':
        if (current) current.n = value;
        break;
      case 'T':
        if (current && value.startsWith('ST=')) current.state = value.slice(3);
        break;
    }
  }
  flush();

  return results;
}

function toConnection(
  fields: Partial<Record<'f' | 't' | 'P' | 'n' | 'state', string>>,
  pid: number | null
): ConnectionSample {
  if (!fields.n || !fields.P) {
    throw new Error('Incomplete lsof record');
  }
  const [local, remote] = fields.n.split('->');
  const fd = parseInt(fields.f ?? '', 10);
  const isTcp = fields.P.toUpperCase() === 'TCP';
  const family = fields.t === 'IPv6' ? 'AF_INET6' : 'AF_INET';

  return {
    fd: isNaN(fd) ? null : fd,
    family,
    type: isTcp ? 'SOCK_STREAM' : fields.P.toUpperCase() === 'UDP' ? 'SOCK_DGRAM' : fields.P,
    laddr: parseEndpoint(local, family),
    raddr: remote ? parseEndpoint(remote, family) : null,
    status: isTcp ? (fields.state ?? 'NONE') : 'NONE',
    pid
  };
}

export class PortableProbe extends BaseProbe {
  protected async physicalCoreCount(): Promise<number | null> {
    try {
      const { stdout } = await execAsync('sysctl -n hw.physicalcpu', EXEC_OPTIONS);
      const count = parseInt(stdout.trim(), 10);
      return isNaN(count) ? null : count;
    } catch {
      return null;
    }
  }

  private async readVmStat(): Promise<VmStat | null> {
    try {
      const { stdout } = await execAsync('vm_stat', EXEC_OPTIONS);
      return parseVmStat(stdout);
    } catch {
      return null;
    }
  }

  public async virtualMemory(): Promise<VirtualMemory> {
    const total = os.totalmem();
    const vm = await this.readVmStat();
    const fromVmStat = vm ? memoryFromVmStat(vm, total) : null;
    if (fromVmStat) {
      return fromVmStat;
    }
    // No vm_stat (FreeBSD): free pages are all the OS reports
    const available = os.freemem();
    return { total, available, used: total - available };
  }

  public async swapMemory(): Promise<SwapMemory> {
    try {
      // "total = 2048.00M  used = 1024.50M  free = 1023.50M  (encrypted)"
      const { stdout } = await execAsync('sysctl -n vm.swapusage', EXEC_OPTIONS);
      const total = /total = ([\d.]+)M/.exec(stdout);
      const used = /used = ([\d.]+)M/.exec(stdout);
      const mb = (m: RegExpExecArray | null): number => (m ? Math.round(parseFloat(m[1]) * 1024 * 1024) : 0);
      return { total: mb(total), used: mb(used) };
    } catch {
      return { total: 0, used: 0 };
    }
  }

  public async diskPartitions(): Promise<DiskPartition[]> {
    const { stdout } = await execAsync('mount', EXEC_OPTIONS);
    return parseMountOutput(stdout);
  }

  private async ps(columns: string): Promise<string[]> {
    const { stdout } = await execAsync(`ps -axo ${columns}`, EXEC_OPTIONS);
    return stdout.split('\n').filter(line => line.trim());
  }

  public async processStatuses(): Promise<ProbeResult<ProcessStatusSample>[]> {
    const lines = await this.ps('pid=,stat=');
    return lines.map((line): ProbeResult<ProcessStatusSample> => {
      const [pid, stat] = line.trim().split(/\s+/);
      const pidValue = parseInt(pid, 10);
      if (isNaN(pidValue) || !stat) {
        return { success: false, error: new ProbeError(`Unparsable ps line: ${line.trim()}`, 'ps') };
      }
      return { success: true, data: { pid: pidValue, status: psStateName(stat) } };
    });
  }

  public async processDetails(): Promise<ProbeResult<ProcessSample>[]> {
    const lines = await this.ps('pid=,stat=,user=,%cpu=,rss=,lstart=,comm=');
    return lines.map((line): ProbeResult<ProcessSample> => {
      try {
        const row = parsePsLine(line);
        return {
          success: true,
          data: {
            pid: row.pid,
            name: row.command.split('/').pop() ?? row.command,
            username: row.user || null,
            status: psStateName(row.stat),
            cpuPercent: row.cpu,
            rssBytes: row.rssKb * 1024,
            threadCount: null,
            createTime: row.started.getTime() / 1000
          }
        };
      } catch (error) {
        return { success: false, error: toProbeError(error, 'ps') };
      }
    });
  }

  public async netConnections(): Promise<ProbeResult<ConnectionSample>[]> {
    try {
      const { stdout } = await execAsync('lsof -nP -i -F pftPnT', EXEC_OPTIONS);
      return parseLsofFields(stdout);
    } catch (error) {
      // lsof exits 1 when it finds nothing it may show
      if (typeof error === 'object' && error !== null && 'stdout' in error && error.stdout === '') {
        return [];
      }
      throw new AccessDeniedError('lsof');
    }
  }

  // No portable source for link flags or per-interface counters
  public async netInterfaceStats(): Promise<Record<string, InterfaceStatsSample>> {
    return {};
  }

  public async netIoCounters(): Promise<Record<string, IoCountersSample>> {
    return {};
  }
}
