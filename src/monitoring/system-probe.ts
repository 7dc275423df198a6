// system-probe.ts - The single seam between the collectors and the host OS
import * as os from 'os';
import * as fs from 'fs';
import { toProbeError } from '../common/errors';
import type { LogWriter } from '../common/logger';

/**
 * Outcome of reading one item (a process, a connection line) from the OS.
 * A failed item carries the error instead of aborting the enumeration.
 */
export type ProbeResult<T> =
  | { success: true; data: T }
  | { success: false; error: Error };

export interface CpuSample {
  overall: number;
  perCore: number[];
}

export interface VirtualMemory {
  total: number;
  available: number;
  used: number;
}

export interface SwapMemory {
  total: number;
  used: number;
}

export interface DiskPartition {
  device: string;
  mountpoint: string;
  fstype: string;
}

export interface DiskUsage {
  total: number;
  used: number;
  free: number;
}

export interface ProcessStatusSample {
  pid: number;
  status: string;
}

export interface ProcessSample {
  pid: number;
  name: string;
  username: string | null;
  status: string;
  cpuPercent: number;
  rssBytes: number;
  threadCount: number | null;
  createTime: number;
}

export interface SocketAddress {
  ip: string;
  port: number;
}

export interface ConnectionSample {
  fd: number | null;
  family: string;
  type: string;
  laddr: SocketAddress | null;
  raddr: SocketAddress | null;
  status: string;
  pid: number | null;
}

export interface InterfaceAddressSample {
  family: string;
  address: string;
  netmask: string | null;
  broadcast: string | null;
}

export interface InterfaceStatsSample {
  isUp: boolean;
  speed: number;
  mtu: number;
}

export interface IoCountersSample {
  bytesSent: number;
  bytesRecv: number;
  packetsSent: number;
  packetsRecv: number;
  errin: number;
  errout: number;
  dropin: number;
  dropout: number;
}

export interface HostIdentity {
  hostname: string;
  system: string;
  release: string;
  version: string;
  machine: string;
  processor: string;
}

/**
 * One method per metric family. Methods returning ProbeResult lists report
 * per-item failures in band; `netConnections` throws AccessDeniedError when
 * the OS refuses the whole enumeration.
 */
export interface SystemProbe {
  sampleCpuPercent(intervalMs: number): Promise<CpuSample>;
  cpuCounts(): Promise<{ logical: number; physical: number | null }>;
  virtualMemory(): Promise<VirtualMemory>;
  swapMemory(): Promise<SwapMemory>;
  diskPartitions(): Promise<DiskPartition[]>;
  diskUsage(mountpoint: string): Promise<DiskUsage>;
  processStatuses(): Promise<ProbeResult<ProcessStatusSample>[]>;
  processDetails(): Promise<ProbeResult<ProcessSample>[]>;
  netConnections(): Promise<ProbeResult<ConnectionSample>[]>;
  netInterfaceAddresses(): Promise<Record<string, InterfaceAddressSample[]>>;
  netInterfaceStats(): Promise<Record<string, InterfaceStatsSample>>;
  netIoCounters(): Promise<Record<string, IoCountersSample>>;
  hostIdentity(): Promise<HostIdentity>;
}

/**
 * Keep what succeeded, log and drop what failed.
 */
export function drainProbeResults<T>(results: ProbeResult<T>[], logger: LogWriter, what: string): T[] {
  const items: T[] = [];
  for (const result of results) {
    if (result.success) {
      items.push(result.data);
    } else {
      logger.logSkipped(what, result.error);
    }
  }
  return items;
}

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function busyPercent(before: os.CpuInfo['times'], after: os.CpuInfo['times']): number {
  const idle = after.idle - before.idle;
  const total =
    (after.user - before.user) +
    (after.nice - before.nice) +
    (after.sys - before.sys) +
    (after.irq - before.irq) +
    idle;
  if (total <= 0) {
    return 0;
  }
  return round(Math.min(100, Math.max(0, ((total - idle) / total) * 100)), 1);
}

function sumTimes(cpus: os.CpuInfo[]): os.CpuInfo['times'] {
  return cpus.reduce(
    (acc, cpu) => ({
      user: acc.user + cpu.times.user,
      nice: acc.nice + cpu.times.nice,
      sys: acc.sys + cpu.times.sys,
      idle: acc.idle + cpu.times.idle,
      irq: acc.irq + cpu.times.irq
    }),
    { user: 0, nice: 0, sys: 0, idle: 0, irq: 0 }
  );
}

function ipv4ToInt(address: string): number {
  return address.split('.').reduce((acc, octet) => ((acc << 8) | (parseInt(octet, 10) & 0xff)) >>> 0, 0);
}

function intToIpv4(value: number): string {
  return [24, 16, 8, 0].map(shift => (value >>> shift) & 0xff).join('.');
}

export function ipv4Broadcast(address: string, netmask: string): string {
  const addr = ipv4ToInt(address);
  const mask = ipv4ToInt(netmask);
  return intToIpv4((addr | (~mask >>> 0)) >>> 0);
}

/**
 * Shared OS-module and statfs plumbing for the concrete probes.
 */
export abstract class BaseProbe implements SystemProbe {
  public async sampleCpuPercent(intervalMs: number): Promise<CpuSample> {
    const before = os.cpus();
    await sleep(intervalMs);
    const after = os.cpus();

    const perCore = after.map((cpu, i) =>
      before[i] ? busyPercent(before[i].times, cpu.times) : 0
    );

    return {
      overall: busyPercent(sumTimes(before), sumTimes(after)),
      perCore
    };
  }

  public async cpuCounts(): Promise<{ logical: number; physical: number | null }> {
    return { logical: os.cpus().length, physical: await this.physicalCoreCount() };
  }

  public async diskUsage(mountpoint: string): Promise<DiskUsage> {
    try {
      const stats = await fs.promises.statfs(mountpoint);
      return {
        total: stats.blocks * stats.bsize,
        used: (stats.blocks - stats.bfree) * stats.bsize,
        free: stats.bavail * stats.bsize
      };
    } catch (error) {
      throw toProbeError(error, mountpoint);
    }
  }

  protected ipInterfaceAddresses(): Record<string, InterfaceAddressSample[]> {
    const result: Record<string, InterfaceAddressSample[]> = {};

    for (const [name, entries] of Object.entries(os.networkInterfaces())) {
      if (!entries) {
        continue;
      }
      result[name] = entries.map(entry => {
        const isV4 = entry.family === 'IPv4';
        return {
          family: isV4 ? 'AF_INET' : 'AF_INET6',
          address: entry.address,
          netmask: entry.netmask || null,
          // Loopback has no broadcast address
          broadcast: isV4 && !entry.internal ? ipv4Broadcast(entry.address, entry.netmask) : null
        };
      });
    }

    return result;
  }

  /**
   * IP addresses plus one AF_LINK entry carrying the MAC. Interfaces with
   * no IP address assigned are not visible through the os module.
   */
  public async netInterfaceAddresses(): Promise<Record<string, InterfaceAddressSample[]>> {
    const result = this.ipInterfaceAddresses();

    for (const [name, entries] of Object.entries(os.networkInterfaces())) {
      const mac = entries?.[0]?.mac;
      if (mac && result[name]) {
        result[name].push({ family: 'AF_LINK', address: mac, netmask: null, broadcast: null });
      }
    }

    return result;
  }

  public async hostIdentity(): Promise<HostIdentity> {
    const cpus = os.cpus();
    return {
      hostname: os.hostname(),
      system: os.type(),
      release: os.release(),
      version: os.version(),
      machine: os.machine(),
      processor: cpus.length > 0 ? cpus[0].model : ''
    };
  }

  protected abstract physicalCoreCount(): Promise<number | null>;

  public abstract virtualMemory(): Promise<VirtualMemory>;
  public abstract swapMemory(): Promise<SwapMemory>;
  public abstract diskPartitions(): Promise<DiskPartition[]>;
  public abstract processStatuses(): Promise<ProbeResult<ProcessStatusSample>[]>;
  public abstract processDetails(): Promise<ProbeResult<ProcessSample>[]>;
  public abstract netConnections(): Promise<ProbeResult<ConnectionSample>[]>;
  public abstract netInterfaceStats(): Promise<Record<string, InterfaceStatsSample>>;
  public abstract netIoCounters(): Promise<Record<string, IoCountersSample>>;
}
