import {
  memoryFromVmStat,
  parseLsofFields,
  parseMountOutput,
  parseVmStat,
  parsePsLine,
  psStateName
} from '../src/monitoring/portable-probe';
import { createSystemProbe } from '../src/monitoring/probe-factory';
import { ProcfsProbe } from '../src/monitoring/procfs-probe';
import { PortableProbe } from '../src/monitoring/portable-probe';

describe('psStateName', () => {
  it('maps the leading state letter', () => {
    expect(psStateName('Ss')).toBe('sleeping');
    expect(psStateName('R+')).toBe('running');
    expect(psStateName('T')).toBe('stopped');
    expect(psStateName('Z')).toBe('zombie');
  });

  it('treats long sleeps and uninterruptible waits as sleeping', () => {
    expect(psStateName('I')).toBe('sleeping');
    expect(psStateName('Is')).toBe('sleeping');
    expect(psStateName('I<')).toBe('sleeping');
    expect(psStateName('U')).toBe('sleeping');
    expect(psStateName('D+')).toBe('sleeping');
  });

  it('passes unknown codes through', () => {
    expect(psStateName('X')).toBe('X');
  });
});

describe('parsePsLine', () => {
  it('splits the fixed columns and keeps the command intact', () => {
    const row = parsePsLine('  123 Ss   root   0.5  2048 Mon Oct 19 10:00:00 2026 /Applications/Some App.app/Contents/MacOS/Some App');

    expect(row.pid).toBe(123);
    expect(row.stat).toBe('Ss');
    expect(row.user).toBe('root');
    expect(row.cpu).toBe(0.5);
    expect(row.rssKb).toBe(2048);
    expect(row.started.getFullYear()).toBe(2026);
    expect(row.started.getMonth()).toBe(9);
    expect(row.started.getHours()).toBe(10);
    expect(row.command).toBe('/Applications/Some App.app/Contents/MacOS/Some App');
  });

  it('rejects malformed lines', () => {
    expect(() => parsePsLine('not a ps line')).toThrow('Unparsable ps line: not a ps line');
  });
});

describe('vm_stat parsing', () => {
  const VM_STAT = [
    'Mach Virtual Memory Statistics: (page size of 16384 bytes)',
    'Pages free:                                1000.',
    'Pages active:                              3000.',
    'Pages inactive:                            2000.',
    'Pages speculative:                          500.',
    'Pages throttled:                              0.',
    'Pages wired down:                          1500.',
    'Pages purgeable:                            100.',
    '"Translation faults":                   123456.',
    ''
  ].join('\n');

  it('reads the page size and page counts', () => {
    const vm = parseVmStat(VM_STAT);

    expect(vm.pageSize).toBe(16384);
    expect(vm.pages.get('Pages free')).toBe(1000);
    expect(vm.pages.get('Pages wired down')).toBe(1500);
    expect(vm.pages.get('"Translation faults"')).toBe(123456);
  });

  it('counts free plus inactive pages as available', () => {
    const total = 10000 * 16384;
    expect(memoryFromVmStat(parseVmStat(VM_STAT), total)).toEqual({
      total,
      available: 3000 * 16384,
      used: 4500 * 16384
    });
  });

  it('gives up when the free or inactive counts are missing', () => {
    expect(memoryFromVmStat(parseVmStat('Pages active: 10.\n'), 1024)).toBeNull();
  });
});

describe('parseMountOutput', () => {
  it('keeps device-backed mounts only', () => {
    const output = [
      '/dev/disk1s1 on / (apfs, local, journaled)',
      'map auto_home on /System/Volumes/Data/home (autofs, automounted, nobrowse)',
      '/dev/disk2s1 on /Volumes/My Disk (msdos, local, nodev)',
      'devfs on /dev (devfs, local, nobrowse)'
    ].join('\n');

    expect(parseMountOutput(output)).toEqual([
      { device: '/dev/disk1s1', mountpoint: '/', fstype: 'apfs' },
      { device: '/dev/disk2s1', mountpoint: '/Volumes/My Disk', fstype: 'msdos' }
    ]);
  });
});

describe('parseLsofFields', () => {
  it('decodes TCP and UDP records with their owning process', () => {
    const output = [
      'p123',
      'f5',
      'tIPv4',
      'PTCP',
      'n127.0.0.1:8080',
      'TST=LISTEN',
      'TQR=0',
      'f6',
      'tIPv6',
      'PTCP',
      'n[::1]:5432->[::1]:61000',
      'TST=ESTABLISHED',
      'p456',
      'f7',
      'tIPv6',
      'PUDP',
      'n*:53',
      ''
    ].join('\n');

    const results = parseLsofFields(output);

    expect(results).toEqual([
      {
        success: true,
        data: {
          fd: 5, family: 'AF_INET', type: 'SOCK_STREAM',
          laddr: { ip: '127.0.0.1', port: 8080 }, raddr: null, status: 'LISTEN', pid: 123
        }
      },
      {
        success: true,
        data: {
          fd: 6, family: 'AF_INET6', type: 'SOCK_STREAM',
          laddr: { ip: '::1', port: 5432 }, raddr: { ip: '::1', port: 61000 }, status: 'ESTABLISHED', pid: 123
        }
      },
      {
        success: true,
        data: {
          fd: 7, family: 'AF_INET6', type: 'SOCK_DGRAM',
          laddr: { ip: '::', port: 53 }, raddr: null, status: 'NONE', pid: 456
        }
      }
    ]);
  });

  it('reports incomplete records as failures', () => {
    const results = parseLsofFields('p9\nf1\ntIPv4\n');

    expect(results).toHaveLength(1);
    expect(results[0].success).toBe(false);
  });

  it('returns nothing for empty output', () => {
    expect(parseLsofFields('')).toEqual([]);
  });
});

describe('createSystemProbe', () => {
  it('uses procfs on Linux', () => {
    expect(createSystemProbe('linux')).toBeInstanceOf(ProcfsProbe);
  });

  it('uses command-line tools on macOS and BSD', () => {
    expect(createSystemProbe('darwin')).toBeInstanceOf(PortableProbe);
    expect(createSystemProbe('freebsd')).toBeInstanceOf(PortableProbe);
  });

  it('refuses Windows', () => {
    expect(() => createSystemProbe('win32')).toThrow(/not supported/);
  });
});
