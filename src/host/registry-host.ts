/**
 * Registry Host
 *
 * Stands in for the ledger runtime around the registry: keeps the height
 * clock, attaches caller and height to each operation, applies operations
 * one at a time, journals the events they emit and saves the durable state
 * after every committed operation.
 */

import { EventJournal } from '../event-store';
import { StructuredLogger, logger as defaultLogger } from '../logging/structured-logger';
import {
  Identity,
  ItemRegistry,
  OperationContext,
  RegistryParameters,
  RegistryResult,
  ValueTransfer,
} from '../registry';
import { RegistrySnapshot, SNAPSHOT_VERSION, SnapshotError, SnapshotStore } from '../storage';
import { OperationReceipt, QueryAnswer, RegistryOperation, RegistryQuery } from './operations';

export interface RegistryHostOptions {
  transfer: ValueTransfer;
  logger?: StructuredLogger;
  snapshotStore?: SnapshotStore;

  // Used only when there is no stored snapshot
  parameters?: Partial<RegistryParameters>;
  startHeight?: number;

  // Journal entries kept in memory; unbounded when unset
  journalRetention?: number;
}

/** A mint emits at most an eviction and its own event. */
export const MAX_EVENTS_PER_OPERATION = 2;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function restoreRegistry(
  snapshot: RegistrySnapshot,
  transfer: ValueTransfer,
  journal: EventJournal,
  log: StructuredLogger
): ItemRegistry {
  try {
    return new ItemRegistry({ transfer, events: journal, logger: log, state: snapshot.registry });
  } catch (err) {
    throw new SnapshotError(errorMessage(err));
  }
}

export class RegistryHost {
  readonly journal: EventJournal;
  readonly registry: ItemRegistry;

  private currentHeight: number;
  private applied = 0;
  private store?: SnapshotStore;
  private log: StructuredLogger;

  /**
   * Build a host, resuming from the snapshot store when it holds state.
   */
  static open(options: RegistryHostOptions): RegistryHost {
    const snapshot = options.snapshotStore?.load() ?? null;
    return new RegistryHost(options, snapshot);
  }

  constructor(options: RegistryHostOptions, snapshot: RegistrySnapshot | null = null) {
    this.log = options.logger ?? defaultLogger;
    this.store = options.snapshotStore;

    const retention = options.journalRetention;
    if (retention !== undefined && (!Number.isSafeInteger(retention) || retention < MAX_EVENTS_PER_OPERATION)) {
      throw new RangeError(`Journal retention must be an integer >= ${MAX_EVENTS_PER_OPERATION}, got ${retention}`);
    }
    const journalOptions = { retainEntries: retention };

    if (snapshot) {
      this.journal = new EventJournal(snapshot.journalHead, journalOptions);
      this.registry = restoreRegistry(snapshot, options.transfer, this.journal, this.log);
      this.currentHeight = snapshot.height;
      this.log.info('RegistryHost', 'Resumed from snapshot', {
        height: this.currentHeight,
        items: this.registry.getItemCount(),
        journalSequence: snapshot.journalHead.sequence,
      });
    } else {
      const startHeight = options.startHeight ?? 0;
      if (!Number.isSafeInteger(startHeight) || startHeight < 0) {
        throw new RangeError(`Start height must be a non-negative integer, got ${startHeight}`);
      }
      this.journal = new EventJournal(undefined, journalOptions);
      this.registry = new ItemRegistry({
        transfer: options.transfer,
        events: this.journal,
        logger: this.log,
        parameters: options.parameters,
      });
      this.currentHeight = startHeight;
    }
  }

  get height(): number {
    return this.currentHeight;
  }

  /**
   * Move the clock forward. Height never goes back.
   */
  advanceHeight(blocks = 1): number {
    if (!Number.isSafeInteger(blocks) || blocks < 1) {
      throw new RangeError(`Height can only advance by a positive integer, got ${blocks}`);
    }
    this.currentHeight += blocks;
    this.log.debug('RegistryHost', 'Height advanced', { height: this.currentHeight });
    this.persist(`height ${this.currentHeight}`);
    return this.currentHeight;
  }

  /**
   * Apply one operation for a caller at the current height.
   */
  submit(caller: Identity, operation: RegistryOperation): OperationReceipt {
    const ctx: OperationContext = { caller, height: this.currentHeight };
    const headBefore = this.journal.getHead().sequence;

    const result = this.dispatch(operation, ctx);

    this.applied++;
    const receipt: OperationReceipt = {
      sequence: this.applied,
      name: operation.name,
      caller,
      height: ctx.height,
      result,
      events: this.journal.getEntries(headBefore + 1),
    };

    if (result.ok) {
      this.log.info('RegistryHost', 'Operation applied', {
        sequence: receipt.sequence,
        operation: operation.name,
        caller,
        height: ctx.height,
        events: receipt.events.length,
      });
      this.persist(`operation ${receipt.sequence} (${operation.name})`);
    } else {
      this.log.info('RegistryHost', 'Operation rejected', {
        sequence: receipt.sequence,
        operation: operation.name,
        caller,
        height: ctx.height,
        kind: result.error.kind,
        code: result.error.code,
      });
    }

    return receipt;
  }

  query(query: RegistryQuery): QueryAnswer {
    switch (query.name) {
      case 'getItem':
        return this.registry.getItem(query.id);
      case 'getItemUpdates':
        return this.registry.getItemUpdates(query.id);
      case 'getItemsByType':
        return this.registry.getItemsByType(query.itemType);
      case 'isItemRegistered':
        return this.registry.isItemRegistered(query.serial);
      case 'getItemCount':
        return this.registry.getItemCount();
    }
  }

  snapshot(): RegistrySnapshot {
    return {
      version: SNAPSHOT_VERSION,
      height: this.currentHeight,
      registry: this.registry.exportState(),
      journalHead: this.journal.getHead(),
    };
  }

  private dispatch(operation: RegistryOperation, ctx: OperationContext): RegistryResult<number | boolean> {
    switch (operation.name) {
      case 'setAuthority':
        return this.registry.setAuthority(operation.identity, ctx);
      case 'setIssuerFee':
        return this.registry.setIssuerFee(operation.fee, ctx);
      case 'setMaxItems':
        return this.registry.setMaxItems(operation.maxItems, ctx);
      case 'setDefaultLocation':
        return this.registry.setDefaultLocation(operation.location, ctx);
      case 'mint':
        return this.registry.mint(operation, ctx);
      case 'update':
        return this.registry.update(operation, ctx);
      case 'deactivate':
        return this.registry.deactivate(operation.id, ctx);
    }
  }

  /**
   * Save the current state. The change is already applied in memory, so a
   * failed save is a host fault: it surfaces as SnapshotError, never as a
   * registry result.
   */
  private persist(change: string): void {
    if (!this.store) return;
    try {
      this.store.save(this.snapshot());
    } catch (err) {
      this.log.error('RegistryHost', 'Snapshot save failed', { change, error: errorMessage(err) });
      throw new SnapshotError(`Snapshot save failed after ${change}: ${errorMessage(err)}`);
    }
  }
}
