import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

/**
 * Atomic file write - writes to temp file first, then renames
 */
export function atomicWriteFileSync(filePath: string, data: string, mode: number = 0o644): void {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.tmp.${crypto.randomBytes(8).toString('hex')}`);

  try {
    fs.writeFileSync(tempPath, data, { encoding: 'utf8', mode });
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    // Drop the temp file and rethrow
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

export function ensureDirectory(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}
