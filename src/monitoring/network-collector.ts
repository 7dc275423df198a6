// network-collector.ts - Connection summary and interface inventory
import { ConnectionSample, SystemProbe, drainProbeResults } from './system-probe';
import { LogWriter } from '../common/logger';
import { AccessDeniedError } from '../common/errors';
import {
  ConnectionRecord,
  InterfaceInfo,
  ListeningPort,
  NOT_AVAILABLE,
  NetworkReport,
  NetworkSummary
} from '../types';

export function toConnectionRecord(sample: ConnectionSample): ConnectionRecord {
  return {
    fd: sample.fd ?? NOT_AVAILABLE,
    family: sample.family,
    type: sample.type,
    local_address: sample.laddr ? sample.laddr.ip : NOT_AVAILABLE,
    local_port: sample.laddr ? sample.laddr.port : NOT_AVAILABLE,
    remote_address: sample.raddr ? sample.raddr.ip : NOT_AVAILABLE,
    remote_port: sample.raddr ? sample.raddr.port : NOT_AVAILABLE,
    status: sample.status,
    pid: sample.pid ?? NOT_AVAILABLE
  };
}

export function protocolOf(type: string): 'TCP' | 'UDP' | null {
  if (type.includes('STREAM')) return 'TCP';
  if (type.includes('DGRAM')) return 'UDP';
  return null;
}

export function summarizeConnections(connections: ConnectionRecord[]): NetworkSummary {
  const byStatus: Record<string, number> = {};
  const byProtocol: Record<string, number> = {};
  const listening: ListeningPort[] = [];

  for (const conn of connections) {
    byStatus[conn.status] = (byStatus[conn.status] ?? 0) + 1;

    const protocol = protocolOf(conn.type);
    if (protocol) {
      byProtocol[protocol] = (byProtocol[protocol] ?? 0) + 1;
    }

    if (conn.status === 'LISTEN' && conn.local_port !== NOT_AVAILABLE) {
      listening.push({ port: conn.local_port, address: conn.local_address, pid: conn.pid });
    }
  }

  return {
    total_connections: connections.length,
    by_status: byStatus,
    by_protocol: byProtocol,
    // Array.prototype.sort is stable: equal ports keep enumeration order
    listening_ports: listening.sort((a, b) => a.port - b.port)
  };
}

export class NetworkCollector {
  private probe: SystemProbe;
  private logger: LogWriter;

  constructor(probe: SystemProbe, logger: LogWriter) {
    this.probe = probe;
    this.logger = logger;
  }

  async collect(includeAll: boolean = false): Promise<NetworkReport> {
    const connections = await this.collectConnections();
    const report: NetworkReport = {
      summary: summarizeConnections(connections),
      interfaces: await this.collectInterfaces()
    };

    if (includeAll) {
      report.all_connections = connections;
    }

    return report;
  }

  async collectConnections(): Promise<ConnectionRecord[]> {
    try {
      const results = await this.probe.netConnections();
      return drainProbeResults(results, this.logger, 'connection').map(toConnectionRecord);
    } catch (error) {
      if (error instanceof AccessDeniedError) {
        this.logger.warn('Connection enumeration refused by the OS; reporting no connections', { subject: error.subject });
        return [];
      }
      throw error;
    }
  }

  private async bestEffort<T>(what: string, read: () => Promise<Record<string, T>>): Promise<Record<string, T>> {
    try {
      return await read();
    } catch (error) {
      this.logger.warn(`Could not read ${what}; interfaces will omit them`, undefined, error);
      return {};
    }
  }

  async collectInterfaces(): Promise<Record<string, InterfaceInfo>> {
    const addresses = await this.probe.netInterfaceAddresses();
    const stats = await this.bestEffort('interface stats', () => this.probe.netInterfaceStats());
    const counters = await this.bestEffort('interface I/O counters', () => this.probe.netIoCounters());
    const interfaces: Record<string, InterfaceInfo> = {};

    for (const [name, addrList] of Object.entries(addresses)) {
      const info: InterfaceInfo = {
        addresses: addrList.map(addr => ({
          family: addr.family,
          address: addr.address,
          netmask: addr.netmask,
          broadcast: addr.broadcast
        })),
        is_up: false,
        speed: 0,
        mtu: 0
      };

      const stat = stats[name];
      if (stat) {
        info.is_up = stat.isUp;
        info.speed = stat.speed;
        info.mtu = stat.mtu;
      }

      const counter = counters[name];
      if (counter) {
        info.io_stats = {
          bytes_sent: counter.bytesSent,
          bytes_recv: counter.bytesRecv,
          packets_sent: counter.packetsSent,
          packets_recv: counter.packetsRecv,
          errin: counter.errin,
          errout: counter.errout,
          dropin: counter.dropin,
          dropout: counter.dropout
        };
      }

      interfaces[name] = info;
    }

    return interfaces;
  }
}
