/**
 * Atomic Storage Module
 *
 * Crash-safe JSON files for the host's durable state. Writes go through
 * write-to-temp + fsync + atomic-rename, so after a crash either the old or
 * the new file is intact. Every file carries a checksum, and the previous
 * version is kept as a backup to recover from.
 */

import * as fs from 'fs';
import * as path from 'path';
import { sha256 } from '../crypto';
import { StructuredLogger, logger as defaultLogger } from '../logging/structured-logger';

/**
 * File wrapper with checksum for corruption detection
 */
export interface ChecksummedFile<T> {
  version: number;        // Wrapper format version
  checksum: string;       // SHA-256 of the serialized data
  data: T;
  writtenAt: number;
}

export type ReadResult<T> =
  | { success: true; data: T; recoveredFromBackup: boolean }
  | { success: false; error: string };

export type ShapeGuard<T> = (value: unknown) => value is T;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class AtomicStorage {
  static readonly CURRENT_VERSION = 1;
  static readonly TEMP_SUFFIX = '.tmp';
  static readonly BACKUP_SUFFIX = '.bak';

  constructor(private log: StructuredLogger = defaultLogger) {}

  /**
   * Atomically write data to a file with checksum
   *
   * 1. Serialize data inside the checksummed wrapper
   * 2. Write to a temp file and fsync it
   * 3. Move the current file (if any) to the backup slot
   * 4. Rename temp -> target
   */
  writeFileAtomic<T>(filePath: string, data: T): void {
    const tempPath = filePath + AtomicStorage.TEMP_SUFFIX;
    const backupPath = filePath + AtomicStorage.BACKUP_SUFFIX;

    const wrapper: ChecksummedFile<T> = {
      version: AtomicStorage.CURRENT_VERSION,
      checksum: sha256(JSON.stringify(data)),
      data,
      writtenAt: Date.now(),
    };

    const dir = path.dirname(filePath);
    fs.mkdirSync(dir, { recursive: true });

    const fd = fs.openSync(tempPath, 'w');
    try {
      fs.writeSync(fd, JSON.stringify(wrapper, null, 2));
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }

    if (fs.existsSync(filePath)) {
      try {
        fs.rmSync(backupPath, { force: true });
        fs.renameSync(filePath, backupPath);
      } catch (err) {
        // The temp file is complete; losing the backup only loses one fallback.
        this.log.warn('AtomicStorage', 'Backup failed', { filePath, error: errorMessage(err) });
      }
    }

    fs.renameSync(tempPath, filePath);

    try {
      const dirFd = fs.openSync(dir, 'r');
      try {
        fs.fsyncSync(dirFd);
      } finally {
        fs.closeSync(dirFd);
      }
    } catch (err) {
      // Not every platform can fsync a directory.
      this.log.debug('AtomicStorage', 'Directory sync skipped', { dir, error: errorMessage(err) });
    }
  }

  /**
   * Read a file with checksum and shape verification, falling back to the
   * backup. A recovered backup is written back over the main file.
   */
  readFileAtomic<T>(filePath: string, guard: ShapeGuard<T>): ReadResult<T> {
    const mainResult = this.tryReadFile(filePath, guard);
    if (mainResult.success) {
      return mainResult;
    }

    const backupPath = filePath + AtomicStorage.BACKUP_SUFFIX;
    if (!fs.existsSync(backupPath)) {
      return mainResult;
    }

    this.log.warn('AtomicStorage', 'Main file unreadable, trying backup', { filePath, error: mainResult.error });
    const backupResult = this.tryReadFile(backupPath, guard);
    if (!backupResult.success) {
      return {
        success: false,
        error: `Both main file and backup are unreadable: ${mainResult.error}; ${backupResult.error}`,
      };
    }

    this.writeFileAtomic(filePath, backupResult.data);
    this.log.warn('AtomicStorage', 'Recovered from backup', { filePath });
    return { success: true, data: backupResult.data, recoveredFromBackup: true };
  }

  exists(filePath: string): boolean {
    return fs.existsSync(filePath) || fs.existsSync(filePath + AtomicStorage.BACKUP_SUFFIX);
  }

  /**
   * Remove temp files left by interrupted writes
   */
  cleanupTempFiles(directory: string): number {
    if (!fs.existsSync(directory)) {
      return 0;
    }

    let cleaned = 0;
    for (const file of fs.readdirSync(directory)) {
      if (!file.endsWith(AtomicStorage.TEMP_SUFFIX)) continue;
      fs.unlinkSync(path.join(directory, file));
      cleaned++;
      this.log.info('AtomicStorage', 'Cleaned up orphaned temp file', { file });
    }
    return cleaned;
  }

  private tryReadFile<T>(filePath: string, guard: ShapeGuard<T>): ReadResult<T> {
    if (!fs.existsSync(filePath)) {
      return { success: false, error: 'File does not exist' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (err) {
      return { success: false, error: `Invalid JSON: ${errorMessage(err)}` };
    }

    if (!isRecord(parsed) || typeof parsed.checksum !== 'string' || !('data' in parsed)) {
      return { success: false, error: 'Missing checksum wrapper' };
    }
    if (parsed.version !== AtomicStorage.CURRENT_VERSION) {
      return { success: false, error: `Unsupported file version: ${String(parsed.version)}` };
    }

    const calculated = sha256(JSON.stringify(parsed.data));
    if (calculated !== parsed.checksum) {
      return { success: false, error: `Checksum mismatch: expected ${parsed.checksum}, got ${calculated}` };
    }

    const { data } = parsed;
    if (!guard(data)) {
      return { success: false, error: 'Unexpected data shape' };
    }
    return { success: true, data, recoveredFromBackup: false };
  }
}
