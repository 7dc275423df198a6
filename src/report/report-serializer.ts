// report-serializer.ts - JSON and plain-text renderings of a health report
import { ProcessRecord, Report, ReportFormat } from '../types';

const WIDTH = 80;
const HEAVY_RULE = '='.repeat(WIDTH);
const LIGHT_RULE = '-'.repeat(WIDTH);

// Display caps, independent of how many records were collected
export const TEXT_TOP_PROCESSES = 10;
export const TEXT_LISTENING_PORTS = 20;

export const REPORT_TITLE = 'SYSTEM HEALTH & INTEGRITY MONITOR REPORT';

/**
 * health_monitor_YYYYMMDD_HHMMSS.<json|log>, local time. Two reports
 * generated within the same second get the same name.
 */
export function generateFilename(format: ReportFormat, now: Date = new Date()): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  const extension = format === 'json' ? 'json' : 'log';
  return `health_monitor_${stamp}.${extension}`;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  switch (typeof value) {
    case 'bigint':
    case 'symbol':
    case 'function':
      return String(value);
    default:
      return value;
  }
}

export function renderJson(report: Report): string {
  return JSON.stringify(report, jsonReplacer, 2);
}

function section(lines: string[], title: string): void {
  lines.push(LIGHT_RULE);
  lines.push(title);
  lines.push(LIGHT_RULE);
}

export function formatCounts(counts: Record<string, number>): string {
  const entries = Object.entries(counts).map(([key, count]) => `${key}: ${count}`);
  return `{${entries.join(', ')}}`;
}

export function formatProcessRow(proc: ProcessRecord): string {
  return [
    String(proc.pid).padEnd(10),
    proc.name.slice(0, 28).padEnd(30),
    proc.username.slice(0, 13).padEnd(15),
    proc.memory_percent.toFixed(2).padEnd(12),
    proc.memory_mb.toFixed(2)
  ].join(' ');
}

export function renderText(report: Report): string {
  const lines: string[] = [];
  const { cpu, memory, disk } = report.metrics;

  lines.push(HEAVY_RULE);
  lines.push(REPORT_TITLE);
  lines.push(HEAVY_RULE);
  lines.push(`Timestamp: ${report.timestamp}`);
  lines.push(`Hostname: ${report.system_info.hostname}`);
  lines.push(`Platform: ${report.system_info.platform}`);
  lines.push(`OS: ${report.system_info.os_version}`);
  lines.push('');

  section(lines, 'CPU METRICS');
  lines.push(`Overall Usage: ${cpu.overall_percent}%`);
  lines.push(`Logical CPUs: ${cpu.logical_count}`);
  lines.push(`Physical CPUs: ${cpu.physical_count ?? 'N/A'}`);
  lines.push(`Per-Core Usage: [${cpu.per_core_percent.join(', ')}]`);
  lines.push('');

  section(lines, 'MEMORY METRICS');
  lines.push(`Total: ${memory.total_gb} GB`);
  lines.push(`Available: ${memory.available_gb} GB`);
  lines.push(`Used: ${memory.used_gb} GB (${memory.percent}%)`);
  lines.push(`Swap Used: ${memory.swap_percent}%`);
  lines.push('');

  section(lines, 'DISK METRICS');
  for (const [mount, info] of Object.entries(disk)) {
    lines.push('');
    lines.push(`Mount: ${mount}`);
    lines.push(`  Device: ${info.device}`);
    lines.push(`  Type: ${info.fstype}`);
    lines.push(`  Total: ${info.total_gb} GB`);
    lines.push(`  Used: ${info.used_gb} GB (${info.percent}%)`);
    lines.push(`  Free: ${info.free_gb} GB`);
  }
  lines.push('');

  const summary = report.processes.summary;
  section(lines, 'PROCESS SUMMARY');
  lines.push(`Total Processes: ${summary.total}`);
  lines.push(`Running: ${summary.running}`);
  lines.push(`Sleeping: ${summary.sleeping}`);
  lines.push(`Stopped: ${summary.stopped}`);
  lines.push(`Zombie: ${summary.zombie}`);
  lines.push(`Other: ${summary.other}`);
  lines.push('');

  section(lines, 'TOP PROCESSES BY MEMORY');
  lines.push(['PID'.padEnd(10), 'Name'.padEnd(30), 'User'.padEnd(15), 'Memory %'.padEnd(12), 'Memory MB'].join(' '));
  lines.push(LIGHT_RULE);
  for (const proc of report.processes.top_by_memory.slice(0, TEXT_TOP_PROCESSES)) {
    lines.push(formatProcessRow(proc));
  }
  lines.push('');

  const net = report.network.summary;
  section(lines, 'NETWORK SUMMARY');
  lines.push(`Total Connections: ${net.total_connections}`);
  lines.push(`Connections by Status: ${formatCounts(net.by_status)}`);
  lines.push(`Connections by Protocol: ${formatCounts(net.by_protocol)}`);
  lines.push('');
  lines.push(`Listening Ports (${net.listening_ports.length}):`);
  for (const port of net.listening_ports.slice(0, TEXT_LISTENING_PORTS)) {
    lines.push(`  Port ${port.port}: ${port.address} (PID: ${port.pid})`);
  }
  lines.push('');

  lines.push(HEAVY_RULE);
  lines.push('END OF REPORT');
  lines.push(HEAVY_RULE);

  return lines.join('\n');
}

export function renderReport(report: Report, format: ReportFormat): string {
  return format === 'json' ? renderJson(report) : renderText(report);
}
