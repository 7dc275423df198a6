// procfs-probe.ts - Linux probe backed by /proc and /sys
import * as fs from 'fs';
import * as path from 'path';
import {
  BaseProbe,
  ConnectionSample,
  DiskPartition,
  InterfaceAddressSample,
  InterfaceStatsSample,
  IoCountersSample,
  ProbeResult,
  ProcessSample,
  ProcessStatusSample,
  SocketAddress,
  SwapMemory,
  VirtualMemory
} from './system-probe';
import { AccessDeniedError, ZombieProcessError, toProbeError } from '../common/errors';

// USER_HZ; fixed at 100 on every mainstream Linux build
const CLOCK_TICKS = 100;

const PROC_STATES: Record<string, string> = {
  R: 'running',
  S: 'sleeping',
  D: 'disk-sleep',
  T: 'stopped',
  t: 'tracing-stop',
  Z: 'zombie',
  X: 'dead',
  x: 'dead',
  K: 'wake-kill',
  W: 'waking',
  I: 'idle',
  P: 'parked'
};

const TCP_STATES: Record<string, string> = {
  '01': 'ESTABLISHED',
  '02': 'SYN_SENT',
  '03': 'SYN_RECV',
  '04': 'FIN_WAIT1',
  '05': 'FIN_WAIT2',
  '06': 'TIME_WAIT',
  '07': 'CLOSE',
  '08': 'CLOSE_WAIT',
  '09': 'LAST_ACK',
  '0A': 'LISTEN',
  '0B': 'CLOSING',
  '0C': 'NEW_SYN_RECV'
};

export interface ProcNetTable {
  file: string;
  family: 'AF_INET' | 'AF_INET6';
  type: 'SOCK_STREAM' | 'SOCK_DGRAM';
}

const NET_TABLES: ProcNetTable[] = [
  { file: 'tcp', family: 'AF_INET', type: 'SOCK_STREAM' },
  { file: 'tcp6', family: 'AF_INET6', type: 'SOCK_STREAM' },
  { file: 'udp', family: 'AF_INET', type: 'SOCK_DGRAM' },
  { file: 'udp6', family: 'AF_INET6', type: 'SOCK_DGRAM' }
];

export interface ProcStat {
  comm: string;
  state: string;
  utime: number;
  stime: number;
  numThreads: number;
  startTime: number;
}

/**
 * Parse /proc/<pid>/stat. The command name sits in parentheses and may
 * itself contain spaces and parentheses, so split on the last ')'.
 */
export function parseProcStat(content: string): ProcStat {
  const open = content.indexOf('(');
  const close = content.lastIndexOf(')');
  if (open < 0 || close < open) {
    throw new Error('Malformed stat line');
  }

  const rest = content.slice(close + 2).trim().split(/\s+/);
  // rest[0] is field 3 (state)
  if (rest.length < 20) {
    throw new Error('Truncated stat line');
  }

  return {
    comm: content.slice(open + 1, close),
    state: rest[0],
    utime: parseInt(rest[11], 10),
    stime: parseInt(rest[12], 10),
    numThreads: parseInt(rest[17], 10),
    startTime: parseInt(rest[19], 10)
  };
}

export function procStateName(code: string): string {
  return PROC_STATES[code] ?? code;
}

/**
 * Parse "Key:   value kB" style files (/proc/meminfo, /proc/<pid>/status).
 * Values ending in kB are returned in bytes.
 */
export function parseKeyValueFile(content: string): Map<string, string> {
  const values = new Map<string, string>();
  for (const line of content.split('\n')) {
    const idx = line.indexOf(':');
    if (idx <= 0) continue;
    values.set(line.slice(0, idx).trim(), line.slice(idx + 1).trim());
  }
  return values;
}

export function kbToBytes(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const amount = parseInt(value, 10);
  if (isNaN(amount)) {
    return undefined;
  }
  return value.endsWith('kB') ? amount * 1024 : amount;
}

export function parsePasswd(content: string): Map<number, string> {
  const users = new Map<number, string>();
  for (const line of content.split('\n')) {
    if (!line || line.startsWith('#')) continue;
    const fields = line.split(':');
    if (fields.length < 3) continue;
    const uid = parseInt(fields[2], 10);
    if (!isNaN(uid) && !users.has(uid)) {
      users.set(uid, fields[0]);
    }
  }
  return users;
}

/**
 * Decode the octal escapes (\040 for space, etc.) used in /proc/mounts.
 */
export function unescapeMountField(field: string): string {
  return field.replace(/\\([0-7]{3})/g, (_, octal: string) => String.fromCharCode(parseInt(octal, 8)));
}

export function parseMounts(content: string, physicalFsTypes: Set<string>): DiskPartition[] {
  const partitions: DiskPartition[] = [];
  for (const line of content.split('\n')) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 3) continue;
    const [device, mountpoint, fstype] = fields;
    if (!device || device === 'none' || !physicalFsTypes.has(fstype)) continue;
    partitions.push({
      device: unescapeMountField(device),
      mountpoint: unescapeMountField(mountpoint),
      fstype
    });
  }
  return partitions;
}

export function parsePhysicalFsTypes(content: string): Set<string> {
  const types = new Set<string>(['zfs']);
  for (const line of content.split('\n')) {
    if (!line.trim() || line.startsWith('nodev')) continue;
    types.add(line.trim());
  }
  return types;
}

function hexWordToBytes(word: string): number[] {
  // Each 32-bit word is printed in host (little-endian) order
  const bytes: number[] = [];
  for (let i = word.length - 2; i >= 0; i -= 2) {
    bytes.push(parseInt(word.slice(i, i + 2), 16));
  }
  return bytes;
}

export function formatIPv6(bytes: number[]): string {
  const groups: number[] = [];
  for (let i = 0; i < 16; i += 2) {
    groups.push((bytes[i] << 8) | bytes[i + 1]);
  }

  // IPv4-mapped ::ffff:a.b.c.d
  if (groups.slice(0, 5).every(g => g === 0) && groups[5] === 0xffff) {
    return `::ffff:${bytes.slice(12).join('.')}`;
  }

  let bestStart = -1;
  let bestLen = 0;
  for (let i = 0; i < 8; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < 8 && groups[j] === 0) j++;
    if (j - i > bestLen && j - i > 1) {
      bestStart = i;
      bestLen = j - i;
    }
    i = j;
  }

  const hex = groups.map(g => g.toString(16));
  if (bestStart < 0) {
    return hex.join(':');
  }
  const head = hex.slice(0, bestStart).join(':');
  const tail = hex.slice(bestStart + bestLen).join(':');
  return `${head}::${tail}`;
}

/**
 * Decode "0100007F:1F90" into an address. Port 0 means "unset".
 */
export function decodeProcAddress(value: string, family: 'AF_INET' | 'AF_INET6'): SocketAddress | null {
  const [hexIp, hexPort] = value.split(':');
  if (!hexIp || !hexPort) {
    throw new Error(`Malformed address: ${value}`);
  }
  const port = parseInt(hexPort, 16);
  if (!port) {
    return null;
  }

  if (family === 'AF_INET') {
    return { ip: hexWordToBytes(hexIp).join('.'), port };
  }

  const bytes: number[] = [];
  for (let i = 0; i < 32; i += 8) {
    bytes.push(...hexWordToBytes(hexIp.slice(i, i + 8)));
  }
  return { ip: formatIPv6(bytes), port };
}

export interface ProcNetEntry {
  laddr: SocketAddress | null;
  raddr: SocketAddress | null;
  status: string;
  inode: string;
}

export function parseProcNetLine(line: string, table: ProcNetTable): ProcNetEntry {
  const fields = line.trim().split(/\s+/);
  if (fields.length < 10) {
    throw new Error(`Malformed ${table.file} entry: ${line.trim()}`);
  }
  return {
    laddr: decodeProcAddress(fields[1], table.family),
    raddr: decodeProcAddress(fields[2], table.family),
    status: table.type === 'SOCK_STREAM' ? (TCP_STATES[fields[3].toUpperCase()] ?? 'NONE') : 'NONE',
    inode: fields[9]
  };
}

export function parseNetDev(content: string): Record<string, IoCountersSample> {
  const counters: Record<string, IoCountersSample> = {};
  for (const line of content.split('\n').slice(2)) {
    const idx = line.indexOf(':');
    if (idx < 0) continue;
    const name = line.slice(0, idx).trim();
    const f = line.slice(idx + 1).trim().split(/\s+/).map(v => parseInt(v, 10));
    if (f.length < 16) continue;
    counters[name] = {
      bytesRecv: f[0],
      packetsRecv: f[1],
      errin: f[2],
      dropin: f[3],
      bytesSent: f[8],
      packetsSent: f[9],
      errout: f[10],
      dropout: f[11]
    };
  }
  return counters;
}

export function countPhysicalCores(cpuinfo: string): number | null {
  const cores = new Set<string>();
  let physicalId = '';
  for (const line of cpuinfo.split('\n')) {
    const idx = line.indexOf(':');
    if (idx < 0) continue;
    const key = line.slice(0, idx).trim();
    const value = line.slice(idx + 1).trim();
    if (key === 'physical id') {
      physicalId = value;
    } else if (key === 'core id') {
      cores.add(`${physicalId}:${value}`);
    }
  }
  return cores.size > 0 ? cores.size : null;
}

export class ProcfsProbe extends BaseProbe {
  private readonly procRoot: string;
  private readonly sysRoot: string;

  constructor(procRoot: string = '/proc', sysRoot: string = '/sys') {
    super();
    this.procRoot = procRoot;
    this.sysRoot = sysRoot;
  }

  private proc(...segments: string[]): string {
    return path.join(this.procRoot, ...segments);
  }

  private async readProc(...segments: string[]): Promise<string> {
    return fs.promises.readFile(this.proc(...segments), 'utf8');
  }

  protected async physicalCoreCount(): Promise<number | null> {
    try {
      return countPhysicalCores(await this.readProc('cpuinfo'));
    } catch {
      return null;
    }
  }

  public async virtualMemory(): Promise<VirtualMemory> {
    const info = parseKeyValueFile(await this.readProc('meminfo'));
    const total = kbToBytes(info.get('MemTotal')) ?? 0;
    const free = kbToBytes(info.get('MemFree')) ?? 0;
    // Kernels older than 3.14 lack MemAvailable
    const available = kbToBytes(info.get('MemAvailable')) ??
      free + (kbToBytes(info.get('Buffers')) ?? 0) + (kbToBytes(info.get('Cached')) ?? 0);
    return { total, available, used: Math.max(0, total - available) };
  }

  public async swapMemory(): Promise<SwapMemory> {
    const info = parseKeyValueFile(await this.readProc('meminfo'));
    const total = kbToBytes(info.get('SwapTotal')) ?? 0;
    const free = kbToBytes(info.get('SwapFree')) ?? 0;
    return { total, used: Math.max(0, total - free) };
  }

  public async diskPartitions(): Promise<DiskPartition[]> {
    const fsTypes = parsePhysicalFsTypes(await this.readProc('filesystems'));
    return parseMounts(await this.readProc('self', 'mounts'), fsTypes);
  }

  private async listPids(): Promise<number[]> {
    const entries = await fs.promises.readdir(this.procRoot);
    return entries.filter(name => /^\d+$/.test(name)).map(name => parseInt(name, 10));
  }

  private async readStat(pid: number): Promise<ProcStat> {
    try {
      return parseProcStat(await this.readProc(String(pid), 'stat'));
    } catch (error) {
      throw toProbeError(error, `pid ${pid}`, pid);
    }
  }

  private async readStatus(pid: number, state: string): Promise<string> {
    try {
      return await this.readProc(String(pid), 'status');
    } catch (error) {
      if (state === 'Z') {
        throw new ZombieProcessError(pid);
      }
      throw toProbeError(error, `pid ${pid}`, pid);
    }
  }

  public async processStatuses(): Promise<ProbeResult<ProcessStatusSample>[]> {
    const pids = await this.listPids();
    const results: ProbeResult<ProcessStatusSample>[] = [];

    for (const pid of pids) {
      try {
        const stat = await this.readStat(pid);
        results.push({ success: true, data: { pid, status: procStateName(stat.state) } });
      } catch (error) {
        results.push({ success: false, error: toProbeError(error, `pid ${pid}`, pid) });
      }
    }

    return results;
  }

  public async processDetails(): Promise<ProbeResult<ProcessSample>[]> {
    const [pids, users, bootTime] = await Promise.all([
      this.listPids(),
      this.loadUsers(),
      this.bootTime()
    ]);
    const uptime = await this.uptimeSeconds();
    const results: ProbeResult<ProcessSample>[] = [];

    for (const pid of pids) {
      try {
        const stat = await this.readStat(pid);
        const status = parseKeyValueFile(await this.readStatus(pid, stat.state));

        const uidField = status.get('Uid');
        const uid = uidField ? parseInt(uidField.split(/\s+/)[0], 10) : NaN;
        const startedAfterBoot = stat.startTime / CLOCK_TICKS;
        const elapsed = uptime - startedAfterBoot;
        const cpuSeconds = (stat.utime + stat.stime) / CLOCK_TICKS;
        const threads = parseInt(status.get('Threads') ?? '', 10);

        results.push({
          success: true,
          data: {
            pid,
            name: status.get('Name') ?? stat.comm,
            // Unknown uids (no passwd entry) report the numeric id
            username: users.get(uid) ?? (isNaN(uid) ? null : String(uid)),
            status: procStateName(stat.state),
            // Average over the process lifetime, as ps reports it
            cpuPercent: elapsed > 0 ? Math.round((cpuSeconds / elapsed) * 1000) / 10 : 0,
            rssBytes: kbToBytes(status.get('VmRSS')) ?? 0,
            threadCount: isNaN(threads) ? stat.numThreads : threads,
            createTime: bootTime + startedAfterBoot
          }
        });
      } catch (error) {
        results.push({ success: false, error: toProbeError(error, `pid ${pid}`, pid) });
      }
    }

    return results;
  }

  private async loadUsers(): Promise<Map<number, string>> {
    try {
      return parsePasswd(await fs.promises.readFile('/etc/passwd', 'utf8'));
    } catch {
      return new Map();
    }
  }

  private async bootTime(): Promise<number> {
    const stat = await this.readProc('stat');
    const line = stat.split('\n').find(l => l.startsWith('btime'));
    return line ? parseInt(line.split(/\s+/)[1], 10) : 0;
  }

  private async uptimeSeconds(): Promise<number> {
    const content = await this.readProc('uptime');
    return parseFloat(content.split(/\s+/)[0]);
  }

  /**
   * Map socket inodes to their owning pid and fd by walking /proc/<pid>/fd.
   * Processes we may not inspect are skipped.
   */
  private async socketOwners(): Promise<Map<string, { pid: number; fd: number }>> {
    const owners = new Map<string, { pid: number; fd: number }>();

    for (const pid of await this.listPids()) {
      let fds: string[];
      try {
        fds = await fs.promises.readdir(this.proc(String(pid), 'fd'));
      } catch {
        continue;
      }

      for (const fd of fds) {
        try {
          const target = await fs.promises.readlink(this.proc(String(pid), 'fd', fd));
          const match = /^socket:\[(\d+)\]$/.exec(target);
          if (match) {
            owners.set(match[1], { pid, fd: parseInt(fd, 10) });
          }
        } catch {
          continue;
        }
      }
    }

    return owners;
  }

  public async netConnections(): Promise<ProbeResult<ConnectionSample>[]> {
    const tables: Array<{ table: ProcNetTable; content: string }> = [];

    for (const table of NET_TABLES) {
      try {
        tables.push({ table, content: await this.readProc('net', table.file) });
      } catch (error) {
        const probeError = toProbeError(error, `${this.procRoot}/net/${table.file}`);
        if (probeError instanceof AccessDeniedError) {
          throw probeError;
        }
        // IPv6 disabled: the table simply does not exist
        if (probeError.code === 'ENOENT') {
          continue;
        }
        throw probeError;
      }
    }

    const owners = await this.socketOwners();
    const results: ProbeResult<ConnectionSample>[] = [];

    for (const { table, content } of tables) {
      for (const line of content.split('\n').slice(1)) {
        if (!line.trim()) continue;
        try {
          const entry = parseProcNetLine(line, table);
          const owner = entry.inode !== '0' ? owners.get(entry.inode) : undefined;
          results.push({
            success: true,
            data: {
              fd: owner?.fd ?? null,
              family: table.family,
              type: table.type,
              laddr: entry.laddr,
              raddr: entry.raddr,
              status: entry.status,
              pid: owner?.pid ?? null
            }
          });
        } catch (error) {
          results.push({ success: false, error: toProbeError(error, `${table.file} entry`) });
        }
      }
    }

    return results;
  }

  private async readNetFile(netDir: string, name: string, file: string): Promise<string | null> {
    try {
      return (await fs.promises.readFile(path.join(netDir, name, file), 'utf8')).trim();
    } catch {
      // speed raises EINVAL while the link is down
      return null;
    }
  }

  /**
   * Interface names come from /sys/class/net so links with no IP address
   * (down, or not yet configured) are listed too, each with an AF_PACKET
   * entry for its hardware address.
   */
  public async netInterfaceAddresses(): Promise<Record<string, InterfaceAddressSample[]>> {
    const result = this.ipInterfaceAddresses();
    const netDir = path.join(this.sysRoot, 'class', 'net');

    let names: string[];
    try {
      names = await fs.promises.readdir(netDir);
    } catch {
      // sysfs not mounted (some containers): IP addresses only
      return result;
    }

    for (const name of names) {
      const [address, broadcast] = await Promise.all([
        this.readNetFile(netDir, name, 'address'),
        this.readNetFile(netDir, name, 'broadcast')
      ]);
      const entries = result[name] ?? [];
      if (address) {
        entries.push({ family: 'AF_PACKET', address, netmask: null, broadcast: broadcast || null });
      }
      result[name] = entries;
    }

    return result;
  }

  public async netInterfaceStats(): Promise<Record<string, InterfaceStatsSample>> {
    const netDir = path.join(this.sysRoot, 'class', 'net');
    const stats: Record<string, InterfaceStatsSample> = {};

    let names: string[];
    try {
      names = await fs.promises.readdir(netDir);
    } catch (error) {
      throw toProbeError(error, netDir);
    }

    for (const name of names) {
      const [flags, speed, mtu] = await Promise.all([
        this.readNetFile(netDir, name, 'flags'),
        this.readNetFile(netDir, name, 'speed'),
        this.readNetFile(netDir, name, 'mtu')
      ]);
      if (flags === null) {
        continue;
      }
      const speedValue = speed === null ? 0 : parseInt(speed, 10);
      stats[name] = {
        // IFF_UP
        isUp: (parseInt(flags, 16) & 0x1) === 1,
        speed: isNaN(speedValue) || speedValue < 0 ? 0 : speedValue,
        mtu: mtu === null ? 0 : parseInt(mtu, 10) || 0
      };
    }

    return stats;
  }

  public async netIoCounters(): Promise<Record<string, IoCountersSample>> {
    return parseNetDev(await this.readProc('net', 'dev'));
  }
}
