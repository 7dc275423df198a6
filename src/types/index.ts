// Type definitions for the health report document

export type ReportFormat = 'json' | 'text';

export const NOT_AVAILABLE = 'N/A';
export type NotAvailable = typeof NOT_AVAILABLE;

export interface CpuMetrics {
  overall_percent: number;
  per_core_percent: number[];
  logical_count: number;
  physical_count: number | null;
}

export interface MemoryMetrics {
  total: number;
  available: number;
  used: number;
  percent: number;
  total_gb: number;
  available_gb: number;
  used_gb: number;
  swap_total: number;
  swap_used: number;
  swap_percent: number;
}

export interface DiskMetrics {
  device: string;
  fstype: string;
  total: number;
  used: number;
  free: number;
  percent: number;
  total_gb: number;
  used_gb: number;
  free_gb: number;
}

export interface MetricsSnapshot {
  cpu: CpuMetrics;
  memory: MemoryMetrics;
  disk: Record<string, DiskMetrics>;
}

export interface ProcessRecord {
  pid: number;
  name: string;
  username: string;
  status: string;
  cpu_percent: number;
  memory_percent: number;
  memory_mb: number;
  thread_count: number | null;
  create_time: number;
}

export interface ProcessSummary {
  total: number;
  running: number;
  sleeping: number;
  stopped: number;
  zombie: number;
  other: number;
}

export interface ProcessReport {
  summary: ProcessSummary;
  top_by_memory: ProcessRecord[];
  top_by_cpu: ProcessRecord[];
}

export interface ConnectionRecord {
  fd: number | NotAvailable;
  family: string;
  type: string;
  local_address: string;
  local_port: number | NotAvailable;
  remote_address: string;
  remote_port: number | NotAvailable;
  status: string;
  pid: number | NotAvailable;
}

export interface ListeningPort {
  port: number;
  address: string;
  pid: number | NotAvailable;
}

export interface NetworkSummary {
  total_connections: number;
  by_status: Record<string, number>;
  by_protocol: Record<string, number>;
  listening_ports: ListeningPort[];
}

export interface InterfaceAddress {
  family: string;
  address: string;
  netmask: string | null;
  broadcast: string | null;
}

export interface InterfaceIoStats {
  bytes_sent: number;
  bytes_recv: number;
  packets_sent: number;
  packets_recv: number;
  errin: number;
  errout: number;
  dropin: number;
  dropout: number;
}

export interface InterfaceInfo {
  addresses: InterfaceAddress[];
  is_up: boolean;
  speed: number;
  mtu: number;
  io_stats?: InterfaceIoStats;
}

export interface NetworkReport {
  summary: NetworkSummary;
  interfaces: Record<string, InterfaceInfo>;
  all_connections?: ConnectionRecord[];
}

export interface SystemInfo {
  hostname: string;
  platform: string;
  platform_release: string;
  platform_version: string;
  architecture: string;
  processor: string;
  os_version: string;
}

export interface Report {
  timestamp: string;
  system_info: SystemInfo;
  metrics: MetricsSnapshot;
  processes: ProcessReport;
  network: NetworkReport;
}
