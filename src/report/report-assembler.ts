import { HostIdentity } from '../monitoring/system-probe';
import { MetricsSnapshot, NetworkReport, ProcessReport, Report, SystemInfo } from '../types';

export interface ReportParts {
  metrics: MetricsSnapshot;
  processes: ProcessReport;
  network: NetworkReport;
}

/**
 * Local time with offset, e.g. 2026-10-19T14:03:07.123+02:00
 */
export function localIsoTimestamp(date: Date): string {
  const pad = (n: number, width: number = 2): string => String(n).padStart(width, '0');
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const abs = Math.abs(offsetMinutes);

  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `.${pad(date.getMilliseconds(), 3)}${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`
  );
}

export function toSystemInfo(host: HostIdentity): SystemInfo {
  return {
    hostname: host.hostname,
    platform: host.system,
    platform_release: host.release,
    platform_version: host.version,
    architecture: host.machine,
    processor: host.processor,
    os_version: `${host.system} ${host.release}`
  };
}

export function assembleReport(parts: ReportParts, host: HostIdentity, generatedAt: Date): Report {
  return {
    timestamp: localIsoTimestamp(generatedAt),
    system_info: toSystemInfo(host),
    metrics: parts.metrics,
    processes: parts.processes,
    network: parts.network
  };
}
