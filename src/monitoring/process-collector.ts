// process-collector.ts - Process table summary and top-N rankings
import { ProcessSample, SystemProbe, drainProbeResults, round } from './system-probe';
import { LogWriter } from '../common/logger';
import { NOT_AVAILABLE, ProcessRecord, ProcessReport, ProcessSummary } from '../types';

export type ProcessSortKey = 'memory' | 'cpu' | 'pid' | 'name';

const SUMMARY_BUCKETS = ['running', 'sleeping', 'stopped', 'zombie'] as const;
type SummaryBucket = typeof SUMMARY_BUCKETS[number];
const BUCKET_NAMES: ReadonlySet<string> = new Set(SUMMARY_BUCKETS);

function isSummaryBucket(status: string): status is SummaryBucket {
  return BUCKET_NAMES.has(status);
}

const COMPARATORS: Record<ProcessSortKey, (a: ProcessRecord, b: ProcessRecord) => number> = {
  memory: (a, b) => b.memory_percent - a.memory_percent,
  cpu: (a, b) => b.cpu_percent - a.cpu_percent,
  pid: (a, b) => a.pid - b.pid,
  name: (a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase())
};

/**
 * Sort a copy of `records` (stable, so equal keys keep enumeration order)
 * and keep the first `limit`. No limit keeps every record.
 */
export function rankProcesses(records: ProcessRecord[], sortBy: ProcessSortKey, limit?: number): ProcessRecord[] {
  const sorted = [...records].sort(COMPARATORS[sortBy]);
  return limit === undefined ? sorted : sorted.slice(0, Math.max(0, limit));
}

export function toProcessRecord(sample: ProcessSample, totalMemory: number): ProcessRecord {
  return {
    pid: sample.pid,
    name: sample.name,
    username: sample.username || NOT_AVAILABLE,
    status: sample.status,
    cpu_percent: sample.cpuPercent,
    memory_percent: totalMemory > 0 ? round((sample.rssBytes / totalMemory) * 100, 2) : 0,
    memory_mb: round(sample.rssBytes / (1024 * 1024), 2),
    thread_count: sample.threadCount,
    create_time: sample.createTime
  };
}

export class ProcessCollector {
  private probe: SystemProbe;
  private logger: LogWriter;

  constructor(probe: SystemProbe, logger: LogWriter) {
    this.probe = probe;
    this.logger = logger;
  }

  async collect(topN?: number): Promise<ProcessReport> {
    const summary = await this.summarize();
    const records = await this.enumerate();

    return {
      summary,
      top_by_memory: rankProcesses(records, 'memory', topN),
      top_by_cpu: rankProcesses(records, 'cpu', topN)
    };
  }

  async summarize(): Promise<ProcessSummary> {
    const statuses = drainProbeResults(await this.probe.processStatuses(), this.logger, 'process');
    const summary: ProcessSummary = { total: 0, running: 0, sleeping: 0, stopped: 0, zombie: 0, other: 0 };

    for (const { status } of statuses) {
      if (isSummaryBucket(status)) {
        summary[status]++;
      } else {
        summary.other++;
      }
      summary.total++;
    }

    return summary;
  }

  async enumerate(): Promise<ProcessRecord[]> {
    const { total } = await this.probe.virtualMemory();
    const samples = drainProbeResults(await this.probe.processDetails(), this.logger, 'process');
    return samples.map(sample => toProcessRecord(sample, total));
  }
}
