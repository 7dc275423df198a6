import { MetricsCollector, toGb } from '../src/monitoring/metrics-collector';
import { AccessDeniedError } from '../src/common/errors';
import { FakeProbe, GIB, createMockLogger } from './helpers/fake-probe';

const mockLogger = createMockLogger();

beforeEach(() => {
  jest.clearAllMocks();
});

describe('MetricsCollector - CPU', () => {
  it('reports aggregate and per-core usage from one sampling window', async () => {
    const probe = new FakeProbe();
    const cpu = await new MetricsCollector(probe, mockLogger, 250).collectCpu();

    expect(cpu).toEqual({
      overall_percent: 12.5,
      per_core_percent: [10, 15],
      logical_count: 2,
      physical_count: 1
    });
    expect(probe.sampledIntervals).toEqual([250]);
  });

  it('defaults to a one second sampling window', async () => {
    const probe = new FakeProbe();
    await new MetricsCollector(probe, mockLogger).collectCpu();
    expect(probe.sampledIntervals).toEqual([1000]);
  });

  it('keeps an unknown physical core count as null', async () => {
    const probe = new FakeProbe({ counts: { logical: 8, physical: null } });
    const cpu = await new MetricsCollector(probe, mockLogger).collectCpu();
    expect(cpu.physical_count).toBeNull();
  });
});

describe('MetricsCollector - memory', () => {
  it('derives GB figures and percentages', async () => {
    const memory = await new MetricsCollector(new FakeProbe(), mockLogger).collectMemory();

    expect(memory.total_gb).toBe(16);
    expect(memory.available_gb).toBe(8);
    expect(memory.used_gb).toBe(8);
    expect(memory.percent).toBe(50);
    expect(memory.swap_percent).toBe(25);
    expect(memory.swap_total).toBe(2 * GIB);
  });

  it('reports zero swap usage when there is no swap', async () => {
    const probe = new FakeProbe({ swap: { total: 0, used: 0 } });
    const memory = await new MetricsCollector(probe, mockLogger).collectMemory();
    expect(memory.swap_percent).toBe(0);
  });

  it('rounds the used percentage to one decimal', async () => {
    const probe = new FakeProbe({ memory: { total: 3 * GIB, available: 2 * GIB, used: GIB } });
    const memory = await new MetricsCollector(probe, mockLogger).collectMemory();
    expect(memory.percent).toBe(33.3);
  });
});

describe('MetricsCollector - disk', () => {
  it('keys usage by mountpoint', async () => {
    const disk = await new MetricsCollector(new FakeProbe(), mockLogger).collectDisk();

    expect(disk).toEqual({
      '/': {
        device: '/dev/sda1',
        fstype: 'ext4',
        total: 100 * GIB,
        used: 50 * GIB,
        free: 50 * GIB,
        percent: 50,
        total_gb: 100,
        used_gb: 50,
        free_gb: 50
      }
    });
  });

  it('computes percent against space available to users', async () => {
    const probe = new FakeProbe({
      usage: { '/': { total: 100 * GIB, used: 45 * GIB, free: 45 * GIB } }
    });
    const disk = await new MetricsCollector(probe, mockLogger).collectDisk();
    expect(disk['/'].percent).toBe(50);
  });

  it('omits a mountpoint whose usage cannot be read', async () => {
    const probe = new FakeProbe({
      partitions: [
        { device: '/dev/sda1', mountpoint: '/', fstype: 'ext4' },
        { device: '/dev/sdb1', mountpoint: '/secret', fstype: 'xfs' }
      ],
      usage: {
        '/': { total: 100 * GIB, used: 50 * GIB, free: 50 * GIB },
        '/secret': new AccessDeniedError('/secret')
      }
    });
    const disk = await new MetricsCollector(probe, mockLogger).collectDisk();

    expect(Object.keys(disk)).toEqual(['/']);
    expect(mockLogger.logSkipped).toHaveBeenCalledWith('mountpoint /secret', expect.any(AccessDeniedError));
  });

  it('returns an empty map when no partitions are mounted', async () => {
    const probe = new FakeProbe({ partitions: [] });
    expect(await new MetricsCollector(probe, mockLogger).collectDisk()).toEqual({});
  });
});

describe('toGb', () => {
  it('rounds to two decimals', () => {
    expect(toGb(1.5 * GIB)).toBe(1.5);
    expect(toGb(GIB / 3)).toBe(0.33);
  });
});

describe('MetricsCollector - collect', () => {
  it('returns all three families', async () => {
    const snapshot = await new MetricsCollector(new FakeProbe(), mockLogger).collect();
    expect(Object.keys(snapshot)).toEqual(['cpu', 'memory', 'disk']);
  });
});
