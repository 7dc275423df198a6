// metrics-collector.ts - CPU, memory and disk snapshot
import { SystemProbe, round } from './system-probe';
import { LogWriter } from '../common/logger';
import { CpuMetrics, DiskMetrics, MemoryMetrics, MetricsSnapshot } from '../types';

const GIB = 1024 ** 3;

export const DEFAULT_CPU_SAMPLE_INTERVAL_MS = 1000;

export function toGb(bytes: number): number {
  return round(bytes / GIB, 2);
}

function percentOf(part: number, whole: number): number {
  return whole > 0 ? round((part / whole) * 100, 1) : 0;
}

export class MetricsCollector {
  private probe: SystemProbe;
  private logger: LogWriter;
  private cpuSampleIntervalMs: number;

  constructor(probe: SystemProbe, logger: LogWriter, cpuSampleIntervalMs: number = DEFAULT_CPU_SAMPLE_INTERVAL_MS) {
    this.probe = probe;
    this.logger = logger;
    this.cpuSampleIntervalMs = cpuSampleIntervalMs;
  }

  async collect(): Promise<MetricsSnapshot> {
    const cpu = await this.collectCpu();
    const memory = await this.collectMemory();
    const disk = await this.collectDisk();
    return { cpu, memory, disk };
  }

  /**
   * One blocking window yields both the aggregate and the per-core figures.
   */
  async collectCpu(): Promise<CpuMetrics> {
    const sample = await this.probe.sampleCpuPercent(this.cpuSampleIntervalMs);
    const counts = await this.probe.cpuCounts();

    return {
      overall_percent: sample.overall,
      per_core_percent: sample.perCore,
      logical_count: counts.logical,
      physical_count: counts.physical
    };
  }

  async collectMemory(): Promise<MemoryMetrics> {
    const mem = await this.probe.virtualMemory();
    const swap = await this.probe.swapMemory();

    return {
      total: mem.total,
      available: mem.available,
      used: mem.used,
      percent: percentOf(mem.total - mem.available, mem.total),
      total_gb: toGb(mem.total),
      available_gb: toGb(mem.available),
      used_gb: toGb(mem.used),
      swap_total: swap.total,
      swap_used: swap.used,
      swap_percent: percentOf(swap.used, swap.total)
    };
  }

  async collectDisk(): Promise<Record<string, DiskMetrics>> {
    const partitions = await this.probe.diskPartitions();
    const disk: Record<string, DiskMetrics> = {};

    for (const partition of partitions) {
      try {
        const usage = await this.probe.diskUsage(partition.mountpoint);
        disk[partition.mountpoint] = {
          device: partition.device,
          fstype: partition.fstype,
          total: usage.total,
          used: usage.used,
          free: usage.free,
          percent: percentOf(usage.used, usage.used + usage.free),
          total_gb: toGb(usage.total),
          used_gb: toGb(usage.used),
          free_gb: toGb(usage.free)
        };
      } catch (error) {
        // Unreadable or vanished mounts are left out of the snapshot
        this.logger.logSkipped(`mountpoint ${partition.mountpoint}`, error);
      }
    }

    return disk;
  }
}
