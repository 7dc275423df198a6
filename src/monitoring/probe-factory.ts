import * as os from 'os';
import { SystemProbe } from './system-probe';
import { ProcfsProbe } from './procfs-probe';
import { PortableProbe } from './portable-probe';

export function createSystemProbe(platform: NodeJS.Platform = os.platform()): SystemProbe {
  if (platform === 'linux') {
    return new ProcfsProbe();
  }
  if (platform === 'win32') {
    throw new Error('Windows hosts are not supported; run on Linux, macOS or BSD');
  }
  return new PortableProbe();
}
