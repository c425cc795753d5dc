/**
 * Registry Snapshot
 *
 * The host's durable state: registry parameters, items, both indexes, the
 * amendment log, the height clock and the journal tip.
 */

import * as path from 'path';
import { StructuredLogger, logger as defaultLogger } from '../logging/structured-logger';
import { JournalHead } from '../event-store/journal-types';
import { ItemRegistryState } from '../registry/item-registry';
import { AmendmentRecord, ItemRecord, ItemType, RegistryParameters, isItemType } from '../registry/registry-types';
import { AtomicStorage } from './atomic-storage';

export const SNAPSHOT_VERSION = 1;
export const SNAPSHOT_FILE = 'registry-state.json';

export interface RegistrySnapshot {
  version: typeof SNAPSHOT_VERSION;
  height: number;
  registry: ItemRegistryState;
  journalHead: JournalHead;
}

export class SnapshotError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SnapshotError';
  }
}

export interface SnapshotStore {
  load(): RegistrySnapshot | null;
  save(snapshot: RegistrySnapshot): void;
}

// ============================================================================
// Shape guards
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isUint(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

function isPair<A, B>(value: unknown, first: (v: unknown) => v is A, second: (v: unknown) => v is B): value is [A, B] {
  return Array.isArray(value) && value.length === 2 && first(value[0]) && second(value[1]);
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isUintList(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(isUint);
}

function isParameters(value: unknown): value is RegistryParameters {
  return (
    isRecord(value) &&
    isUint(value.nextItemId) &&
    isUint(value.maxItems) &&
    isUint(value.issuerFee) &&
    (value.authority === null || isString(value.authority)) &&
    isString(value.defaultLocation)
  );
}

function isItemRecord(value: unknown): value is ItemRecord {
  return (
    isRecord(value) &&
    isUint(value.id) &&
    isString(value.metadata) &&
    isString(value.itemType) &&
    isItemType(value.itemType) &&
    isUint(value.expiry) &&
    isString(value.serial) &&
    isString(value.location) &&
    isString(value.category) &&
    isUint(value.issuedAt) &&
    isString(value.issuer) &&
    typeof value.status === 'boolean'
  );
}

function isAmendment(value: unknown): value is AmendmentRecord {
  return (
    isRecord(value) &&
    isString(value.updatedMetadata) &&
    isUint(value.updatedExpiry) &&
    isString(value.updatedLocation) &&
    isUint(value.updateTimestamp) &&
    isString(value.updater)
  );
}

function isTypeIndexEntry(value: unknown): value is [ItemType, number[]] {
  return Array.isArray(value) && value.length === 2 && isString(value[0]) && isItemType(value[0]) && isUintList(value[1]);
}

function isRegistryState(value: unknown): value is ItemRegistryState {
  return (
    isRecord(value) &&
    isParameters(value.parameters) &&
    Array.isArray(value.items) && value.items.every(isItemRecord) &&
    Array.isArray(value.serialIndex) && value.serialIndex.every(entry => isPair(entry, isString, isUint)) &&
    Array.isArray(value.typeIndex) && value.typeIndex.every(isTypeIndexEntry) &&
    Array.isArray(value.amendments) && value.amendments.every(entry => isPair(entry, isUint, isAmendment))
  );
}

export function isRegistrySnapshot(value: unknown): value is RegistrySnapshot {
  return (
    isRecord(value) &&
    value.version === SNAPSHOT_VERSION &&
    isUint(value.height) &&
    isRegistryState(value.registry) &&
    isRecord(value.journalHead) &&
    isUint(value.journalHead.sequence) &&
    isString(value.journalHead.hash)
  );
}

// ============================================================================
// Stores
// ============================================================================

/**
 * Snapshot kept in a single checksummed file under the data directory.
 */
export class FileSnapshotStore implements SnapshotStore {
  private storage: AtomicStorage;
  private filePath: string;

  constructor(private dataDir: string, private log: StructuredLogger = defaultLogger) {
    this.storage = new AtomicStorage(log);
    this.filePath = path.join(dataDir, SNAPSHOT_FILE);
  }

  get location(): string {
    return this.filePath;
  }

  load(): RegistrySnapshot | null {
    this.storage.cleanupTempFiles(this.dataDir);

    if (!this.storage.exists(this.filePath)) {
      return null;
    }

    const result = this.storage.readFileAtomic(this.filePath, isRegistrySnapshot);
    if (!result.success) {
      throw new SnapshotError(`Cannot load registry snapshot from ${this.filePath}: ${result.error}`);
    }

    this.log.info('SnapshotStore', 'Snapshot loaded', {
      filePath: this.filePath,
      height: result.data.height,
      items: result.data.registry.items.length,
      recoveredFromBackup: result.recoveredFromBackup,
    });
    return result.data;
  }

  save(snapshot: RegistrySnapshot): void {
    this.storage.writeFileAtomic(this.filePath, snapshot);
  }
}

export class MemorySnapshotStore implements SnapshotStore {
  private latest: string | null = null;
  saves = 0;

  load(): RegistrySnapshot | null {
    if (this.latest === null) return null;
    const parsed: unknown = JSON.parse(this.latest);
    if (!isRegistrySnapshot(parsed)) {
      throw new SnapshotError('Stored snapshot has an unexpected shape');
    }
    return parsed;
  }

  save(snapshot: RegistrySnapshot): void {
    this.latest = JSON.stringify(snapshot);
    this.saves++;
  }
}
