/**
 * Item Registry
 *
 * Owns the item records, the serial index and the type index, and exposes
 * every registry entry point. Each mutating entry point runs all of its
 * checks before its first write; once the mint fee has been collected no
 * write can fail, so an operation commits fully or not at all.
 *
 * Events are handed to the sink only after the writes they describe.
 */

import { StructuredLogger, logger as defaultLogger } from '../logging/structured-logger';
import { AmendmentLog } from './amendment-log';
import { ConfigStore } from './config-store';
import { ItemValidator } from './item-validator';
import {
  AmendmentRecord,
  EventSink,
  Identity,
  ItemRecord,
  ItemType,
  MintRequest,
  OperationContext,
  RegistryEvent,
  RegistryParameters,
  UpdateRequest,
  ValueTransfer,
  isItemType,
} from './registry-types';
import { RegistryFailure, RegistryResult, failure, ok } from './registry-errors';

/**
 * Ids kept per item type. When a list is full the oldest id is evicted,
 * logged and announced with a `type-index-evicted` event; the item itself
 * and its serial entry stay.
 */
export const TYPE_INDEX_CAPACITY = 100;

export interface ItemRegistryState {
  parameters: RegistryParameters;
  items: ItemRecord[];
  serialIndex: Array<[string, number]>;
  typeIndex: Array<[ItemType, number[]]>;
  amendments: Array<[number, AmendmentRecord]>;
}

export interface ItemRegistryOptions {
  transfer: ValueTransfer;
  events?: EventSink;
  logger?: StructuredLogger;
  parameters?: Partial<RegistryParameters>;
  state?: ItemRegistryState;
}

const noopSink: EventSink = { record: () => undefined };

export class ItemRegistry {
  private config: ConfigStore;
  private validator: ItemValidator;
  private amendments: AmendmentLog;
  private transfer: ValueTransfer;
  private events: EventSink;
  private log: StructuredLogger;

  private items: Map<number, ItemRecord> = new Map();
  private serialIndex: Map<string, number> = new Map();
  private typeIndex: Map<ItemType, number[]> = new Map();

  constructor(options: ItemRegistryOptions) {
    this.transfer = options.transfer;
    this.events = options.events ?? noopSink;
    this.log = options.logger ?? defaultLogger;

    const { state } = options;
    this.config = new ConfigStore(state ? state.parameters : options.parameters);
    this.validator = new ItemValidator(this.config);
    this.amendments = new AmendmentLog(state?.amendments);

    if (state) {
      this.restore(state);
    }
  }

  // ============================================================================
  // Configuration
  // ============================================================================

  setAuthority(identity: Identity, ctx: OperationContext): RegistryResult<true> {
    return this.settle('set-authority', ctx, this.config.setAuthority(identity), { authority: identity });
  }

  setIssuerFee(fee: number, ctx: OperationContext): RegistryResult<true> {
    return this.settle('set-issuer-fee', ctx, this.config.setIssuerFee(fee), { fee });
  }

  setMaxItems(maxItems: number, ctx: OperationContext): RegistryResult<true> {
    return this.settle('set-max-items', ctx, this.config.setMaxItems(maxItems), { maxItems });
  }

  setDefaultLocation(location: string, ctx: OperationContext): RegistryResult<true> {
    return this.settle('set-default-location', ctx, this.config.setDefaultLocation(location), { location });
  }

  getParameters(): RegistryParameters {
    return this.config.snapshot();
  }

  // ============================================================================
  // Item lifecycle
  // ============================================================================

  /**
   * Mint a new item. Checks run in a fixed order and the first failure wins:
   * capacity, field validation, serial uniqueness, authority. The issuer fee
   * is collected before any write; a failed transfer aborts the mint.
   */
  mint(request: MintRequest, ctx: OperationContext): RegistryResult<number> {
    if (this.config.nextItemId >= this.config.maxItems) {
      return this.reject('mint', ctx, failure('MaxItemsExceeded', `Registry is full (${this.config.maxItems} items)`));
    }

    const checked = this.validator.validateMint(request, ctx.height);
    if (!checked.valid) {
      return this.reject('mint', ctx, checked.failure);
    }

    if (this.serialIndex.has(request.serial)) {
      return this.reject('mint', ctx, failure('ItemAlreadyExists', `Serial already registered: ${request.serial}`));
    }

    const authority = this.config.authority;
    if (authority === null) {
      return this.reject('mint', ctx, failure('AuthorityNotSet', 'Authority must be set before minting'));
    }

    const fee = this.config.issuerFee;
    const paid = this.transfer.transfer(fee, ctx.caller, authority);
    if (!paid.ok) {
      return this.reject('mint', ctx, failure('TransferFailed', `Issuer fee transfer failed: ${paid.reason}`));
    }

    // No failure paths past this point.
    const pending: RegistryEvent[] = [];
    const id = this.config.allocateItemId();
    const item: ItemRecord = {
      id,
      metadata: request.metadata,
      itemType: checked.itemType,
      expiry: request.expiry,
      serial: request.serial,
      location: request.location === '' ? this.config.defaultLocation : request.location,
      category: request.category,
      issuedAt: ctx.height,
      issuer: ctx.caller,
      status: true,
    };

    this.items.set(id, item);
    this.serialIndex.set(item.serial, id);
    this.appendToTypeIndex(item.itemType, id, pending);
    pending.push({ type: 'item-minted', id });

    this.log.info('ItemRegistry', 'Item minted', {
      id,
      itemType: item.itemType,
      serial: item.serial,
      issuer: ctx.caller,
      fee,
      height: ctx.height,
    });
    this.publish(pending, ctx);

    return ok(id);
  }

  /**
   * Amend metadata, expiry and location of an active item. Only the issuer
   * may do this; serial, category and item type have no update path.
   */
  update(request: UpdateRequest, ctx: OperationContext): RegistryResult<true> {
    const item = this.items.get(request.id);
    if (!item) {
      return this.reject('update', ctx, failure('InvalidUpdate', `Item not found: ${request.id}`));
    }
    if (item.issuer !== ctx.caller) {
      return this.reject('update', ctx, failure('Unauthorized', `Only the issuer may update item ${item.id}`));
    }
    if (!item.status) {
      return this.reject('update', ctx, failure('UpdateNotAllowed', `Item ${item.id} is deactivated`));
    }

    const checked = this.validator.validateUpdate(request, ctx.height);
    if (!checked.valid) {
      return this.reject('update', ctx, checked.failure);
    }

    item.metadata = request.metadata;
    item.expiry = request.expiry;
    item.location = request.location;
    this.amendments.recordAmendment(item.id, request, ctx.height, ctx.caller);

    this.log.info('ItemRegistry', 'Item updated', { id: item.id, updater: ctx.caller, height: ctx.height });
    this.publish([{ type: 'item-updated', id: item.id }], ctx);

    return ok(true);
  }

  /**
   * Deactivate an item. Repeating it on an inactive item succeeds and
   * changes nothing but still emits the event.
   */
  deactivate(id: number, ctx: OperationContext): RegistryResult<true> {
    const item = this.items.get(id);
    if (!item) {
      return this.reject('deactivate', ctx, failure('InvalidUpdate', `Item not found: ${id}`));
    }
    if (item.issuer !== ctx.caller) {
      return this.reject('deactivate', ctx, failure('Unauthorized', `Only the issuer may deactivate item ${id}`));
    }

    item.status = false;

    this.log.info('ItemRegistry', 'Item deactivated', { id, height: ctx.height });
    this.publish([{ type: 'item-deactivated', id }], ctx);

    return ok(true);
  }

  // ============================================================================
  // Queries
  // ============================================================================

  getItem(id: number): ItemRecord | undefined {
    const item = this.items.get(id);
    return item ? { ...item } : undefined;
  }

  getItemUpdates(id: number): AmendmentRecord | undefined {
    return this.amendments.getAmendment(id);
  }

  getItemsByType(itemType: string): number[] | undefined {
    if (!isItemType(itemType)) return undefined;
    const ids = this.typeIndex.get(itemType);
    return ids ? [...ids] : undefined;
  }

  isItemRegistered(serial: string): boolean {
    return this.serialIndex.has(serial);
  }

  getItemCount(): number {
    return this.config.nextItemId;
  }

  // ============================================================================
  // State export / restore
  // ============================================================================

  exportState(): ItemRegistryState {
    return {
      parameters: this.config.snapshot(),
      items: Array.from(this.items.values(), item => ({ ...item })),
      serialIndex: Array.from(this.serialIndex.entries()),
      typeIndex: Array.from(this.typeIndex, ([type, ids]): [ItemType, number[]] => [type, [...ids]]),
      amendments: this.amendments.entries(),
    };
  }

  private restore(state: ItemRegistryState): void {
    const { nextItemId } = state.parameters;
    if (state.items.length !== nextItemId) {
      throw new Error(`Inconsistent registry state: ${state.items.length} items but nextItemId ${nextItemId}`);
    }

    for (const item of state.items) {
      if (item.id < 0 || item.id >= nextItemId || this.items.has(item.id)) {
        throw new Error(`Inconsistent registry state: unexpected item id ${item.id}`);
      }
      this.items.set(item.id, { ...item });
    }

    for (const [serial, id] of state.serialIndex) {
      if (this.items.get(id)?.serial !== serial) {
        throw new Error(`Inconsistent registry state: serial ${serial} does not resolve to item ${id}`);
      }
      this.serialIndex.set(serial, id);
    }
    if (this.serialIndex.size !== this.items.size) {
      throw new Error('Inconsistent registry state: serial index does not cover every item');
    }

    for (const [type, ids] of state.typeIndex) {
      if (this.typeIndex.has(type)) {
        throw new Error(`Inconsistent registry state: type ${type} listed twice`);
      }
      if (ids.length > TYPE_INDEX_CAPACITY || new Set(ids).size !== ids.length) {
        throw new Error(`Inconsistent registry state: type index for ${type} is oversized or repeats ids`);
      }
      for (const id of ids) {
        if (this.items.get(id)?.itemType !== type) {
          throw new Error(`Inconsistent registry state: type index ${type} lists item ${id}`);
        }
      }
      this.typeIndex.set(type, [...ids]);
    }

    for (const [id] of state.amendments) {
      if (!this.items.has(id)) {
        throw new Error(`Inconsistent registry state: amendment for unknown item ${id}`);
      }
    }
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private appendToTypeIndex(itemType: ItemType, id: number, pending: RegistryEvent[]): void {
    const ids = this.typeIndex.get(itemType) ?? [];
    if (ids.length >= TYPE_INDEX_CAPACITY) {
      const evictedId = ids.shift();
      if (evictedId !== undefined) {
        this.log.warn('ItemRegistry', 'Type index full, evicted oldest id', { itemType, evictedId, newId: id });
        pending.push({ type: 'type-index-evicted', itemType, evictedId });
      }
    }
    ids.push(id);
    this.typeIndex.set(itemType, ids);
  }

  private publish(events: RegistryEvent[], ctx: OperationContext): void {
    for (const event of events) {
      this.events.record(event, ctx);
    }
  }

  private settle(
    operation: string,
    ctx: OperationContext,
    result: RegistryResult<true>,
    fields: Record<string, unknown>
  ): RegistryResult<true> {
    if (!result.ok) {
      return this.reject(operation, ctx, result.error);
    }
    this.log.info('ItemRegistry', 'Configuration changed', { operation, caller: ctx.caller, ...fields });
    return result;
  }

  private reject<T>(operation: string, ctx: OperationContext, error: RegistryFailure): RegistryResult<T> {
    this.log.debug('ItemRegistry', 'Operation rejected', {
      operation,
      kind: error.kind,
      code: error.code,
      caller: ctx.caller,
      height: ctx.height,
    });
    return { ok: false, error };
  }
}
