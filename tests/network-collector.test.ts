import {
  NetworkCollector,
  protocolOf,
  summarizeConnections,
  toConnectionRecord
} from '../src/monitoring/network-collector';
import { AccessDeniedError, ProbeError } from '../src/common/errors';
import { FakeProbe, connection, createMockLogger, fail, ok } from './helpers/fake-probe';

const mockLogger = createMockLogger();

beforeEach(() => {
  jest.clearAllMocks();
});

describe('protocolOf', () => {
  it('maps stream sockets to TCP and datagram sockets to UDP', () => {
    expect(protocolOf('SOCK_STREAM')).toBe('TCP');
    expect(protocolOf('SOCK_DGRAM')).toBe('UDP');
    expect(protocolOf('SOCK_RAW')).toBeNull();
  });
});

describe('toConnectionRecord', () => {
  it('substitutes N/A for missing endpoints and owner', () => {
    const record = toConnectionRecord(connection({ fd: null, pid: null, raddr: null }));

    expect(record).toEqual({
      fd: 'N/A',
      family: 'AF_INET',
      type: 'SOCK_STREAM',
      local_address: '127.0.0.1',
      local_port: 8080,
      remote_address: 'N/A',
      remote_port: 'N/A',
      status: 'LISTEN',
      pid: 'N/A'
    });
  });
});

describe('summarizeConnections', () => {
  it('returns an empty summary for no connections', () => {
    expect(summarizeConnections([])).toEqual({
      total_connections: 0,
      by_status: {},
      by_protocol: {},
      listening_ports: []
    });
  });

  it('counts by status and protocol', () => {
    const records = [
      connection({ status: 'LISTEN' }),
      connection({ status: 'ESTABLISHED', raddr: { ip: '10.0.0.2', port: 50000 } }),
      connection({ status: 'ESTABLISHED', raddr: { ip: '10.0.0.3', port: 50001 } }),
      connection({ type: 'SOCK_DGRAM', status: 'NONE', laddr: { ip: '0.0.0.0', port: 53 } }),
      connection({ type: 'SOCK_RAW', status: 'NONE' })
    ].map(toConnectionRecord);

    const summary = summarizeConnections(records);

    expect(summary.total_connections).toBe(5);
    expect(summary.by_status).toEqual({ LISTEN: 1, ESTABLISHED: 2, NONE: 2 });
    expect(summary.by_protocol).toEqual({ TCP: 3, UDP: 1 });
  });

  it('sorts listening ports ascending and keeps enumeration order for equal ports', () => {
    const records = [
      connection({ laddr: { ip: '0.0.0.0', port: 443 }, pid: 1 }),
      connection({ laddr: { ip: '0.0.0.0', port: 22 }, pid: 2 }),
      connection({ family: 'AF_INET6', laddr: { ip: '::', port: 22 }, pid: 3 }),
      connection({ laddr: null, pid: 4 })
    ].map(toConnectionRecord);

    expect(summarizeConnections(records).listening_ports).toEqual([
      { port: 22, address: '0.0.0.0', pid: 2 },
      { port: 22, address: '::', pid: 3 },
      { port: 443, address: '0.0.0.0', pid: 1 }
    ]);
  });
});

describe('NetworkCollector', () => {
  it('omits all_connections unless asked', async () => {
    const probe = new FakeProbe({ connections: [ok(connection())] });
    const report = await new NetworkCollector(probe, mockLogger).collect();

    expect(report.all_connections).toBeUndefined();
    expect(report.summary.total_connections).toBe(1);
  });

  it('lists every connection when asked', async () => {
    const probe = new FakeProbe({ connections: [ok(connection()), ok(connection({ fd: 4, status: 'ESTABLISHED' }))] });
    const report = await new NetworkCollector(probe, mockLogger).collect(true);

    expect(report.all_connections).toHaveLength(2);
    expect(report.all_connections?.[1].fd).toBe(4);
  });

  it('reports no connections and warns when enumeration is refused', async () => {
    const probe = new FakeProbe({ connections: new AccessDeniedError('/proc/net/tcp') });
    const report = await new NetworkCollector(probe, mockLogger).collect(true);

    expect(report.summary.total_connections).toBe(0);
    expect(report.all_connections).toEqual([]);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      'Connection enumeration refused by the OS; reporting no connections',
      { subject: '/proc/net/tcp' }
    );
  });

  it('skips individual connections that fail to decode', async () => {
    const probe = new FakeProbe({
      connections: [ok(connection()), fail(new ProbeError('bad line', '/proc/net/tcp'))]
    });
    const report = await new NetworkCollector(probe, mockLogger).collect();

    expect(report.summary.total_connections).toBe(1);
    expect(mockLogger.logSkipped).toHaveBeenCalledTimes(1);
  });

  it('merges addresses, stats and I/O counters per interface', async () => {
    const probe = new FakeProbe({
      addresses: {
        lo: [{ family: 'AF_INET', address: '127.0.0.1', netmask: '255.0.0.0', broadcast: null }],
        eth0: [{ family: 'AF_INET', address: '10.0.0.5', netmask: '255.255.255.0', broadcast: '10.0.0.255' }]
      },
      stats: {
        lo: { isUp: true, speed: 0, mtu: 65536 },
        eth0: { isUp: true, speed: 1000, mtu: 1500 }
      },
      counters: {
        eth0: {
          bytesSent: 10, bytesRecv: 20, packetsSent: 1, packetsRecv: 2,
          errin: 0, errout: 0, dropin: 0, dropout: 0
        }
      }
    });
    const interfaces = await new NetworkCollector(probe, mockLogger).collectInterfaces();

    expect(interfaces.eth0).toEqual({
      addresses: [{ family: 'AF_INET', address: '10.0.0.5', netmask: '255.255.255.0', broadcast: '10.0.0.255' }],
      is_up: true,
      speed: 1000,
      mtu: 1500,
      io_stats: {
        bytes_sent: 10, bytes_recv: 20, packets_sent: 1, packets_recv: 2,
        errin: 0, errout: 0, dropin: 0, dropout: 0
      }
    });
    expect(interfaces.lo.io_stats).toBeUndefined();
    expect(interfaces.lo.mtu).toBe(65536);
  });

  it('falls back to defaults when interface stats cannot be read', async () => {
    const probe = new FakeProbe({
      addresses: { eth0: [{ family: 'AF_INET', address: '10.0.0.5', netmask: null, broadcast: null }] }
    });
    jest.spyOn(probe, 'netInterfaceStats').mockRejectedValue(new AccessDeniedError('/sys/class/net'));

    const interfaces = await new NetworkCollector(probe, mockLogger).collectInterfaces();

    expect(interfaces.eth0.is_up).toBe(false);
    expect(interfaces.eth0.speed).toBe(0);
    expect(interfaces.eth0.mtu).toBe(0);
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
  });
});
