// errors.ts - Error types raised by the system probes

/**
 * Base class for failures while reading OS state.
 * `subject` names what was being read (a pid, a mountpoint, a proc file).
 */
export class ProbeError extends Error {
  public readonly subject: string;
  public readonly code?: string;

  constructor(message: string, subject: string, code?: string) {
    super(message);
    this.name = 'ProbeError';
    this.subject = subject;
    this.code = code;
  }
}

export class AccessDeniedError extends ProbeError {
  constructor(subject: string, code?: string) {
    super(`Access denied: ${subject}`, subject, code);
    this.name = 'AccessDeniedError';
  }
}

export class NoSuchProcessError extends ProbeError {
  public readonly pid: number;

  constructor(pid: number, code?: string) {
    super(`Process ${pid} no longer exists`, `pid ${pid}`, code);
    this.name = 'NoSuchProcessError';
    this.pid = pid;
  }
}

export class ZombieProcessError extends NoSuchProcessError {
  constructor(pid: number) {
    super(pid);
    this.message = `Process ${pid} is a zombie`;
    this.name = 'ZombieProcessError';
  }
}

const ACCESS_CODES = new Set(['EACCES', 'EPERM']);
const GONE_CODES = new Set(['ENOENT', 'ESRCH']);

export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

export function isPermissionError(error: unknown): boolean {
  if (error instanceof AccessDeniedError) {
    return true;
  }
  const code = errnoCode(error);
  return code !== undefined && ACCESS_CODES.has(code);
}

/**
 * Map a raw fs/child_process error onto the probe taxonomy.
 * When `pid` is given, missing files mean the process went away.
 */
export function toProbeError(error: unknown, subject: string, pid?: number): ProbeError {
  if (error instanceof ProbeError) {
    return error;
  }

  const code = errnoCode(error);
  if (code !== undefined && ACCESS_CODES.has(code)) {
    return new AccessDeniedError(subject, code);
  }
  if (pid !== undefined && code !== undefined && GONE_CODES.has(code)) {
    return new NoSuchProcessError(pid, code);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProbeError(message, subject, code);
}
