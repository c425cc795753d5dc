/**
 * ITEM ISSUER REGISTRY TYPES
 *
 * A single-authority registry of physical items (travel documents, aid kits)
 * held on a replicated ledger. The host state machine supplies the caller and
 * the current height; everything here is plain data.
 *
 * Key principles:
 * - One record per serial number, ever (serials are never released)
 * - Ids are dense and sequential from 0
 * - Only the issuer may amend or deactivate a record
 * - Deactivation is one-way
 */

/** Principal that submitted an operation, as attached by the host. */
export type Identity = string;

export const ITEM_TYPES = ['passport', 'visa', 'aid-kit', 'document'] as const;

export type ItemType = typeof ITEM_TYPES[number];

export function isItemType(value: string): value is ItemType {
  return ITEM_TYPES.some(itemType => itemType === value);
}

/**
 * Ambient context of one operation. The host fills both fields; the
 * registry never reads a clock or a caller from anywhere else.
 */
export interface OperationContext {
  caller: Identity;
  height: number;
}

/**
 * Item Record
 * Created once per accepted mint and never removed.
 */
export interface ItemRecord {
  id: number;
  metadata: string;
  itemType: ItemType;

  // Height at or after which the item counts as expired
  expiry: number;

  // Immutable after mint
  serial: string;
  category: string;
  issuedAt: number;
  issuer: Identity;

  location: string;

  // true = active; goes false exactly once
  status: boolean;
}

/**
 * Amendment Record
 * The most recent successful update of an item. Overwritten on each update.
 */
export interface AmendmentRecord {
  updatedMetadata: string;
  updatedExpiry: number;
  updatedLocation: string;
  updateTimestamp: number;
  updater: Identity;
}

/**
 * Global registry parameters.
 */
export interface RegistryParameters {
  nextItemId: number;
  maxItems: number;
  issuerFee: number;
  authority: Identity | null;
  defaultLocation: string;
}

export interface MintRequest {
  metadata: string;
  itemType: string;
  expiry: number;
  serial: string;
  location: string;
  category: string;
}

export interface UpdateRequest {
  id: number;
  metadata: string;
  expiry: number;
  location: string;
}

/**
 * Registry Event
 * Emitted only after an operation has committed all of its writes.
 */
export type RegistryEvent =
  | { type: 'item-minted'; id: number }
  | { type: 'item-updated'; id: number }
  | { type: 'item-deactivated'; id: number }
  | { type: 'type-index-evicted'; itemType: ItemType; evictedId: number };

export type RegistryEventType = RegistryEvent['type'];

export interface EventSink {
  record(event: RegistryEvent, context: OperationContext): void;
}

/**
 * Value transfer capability provided by the ledger.
 * Called once per mint, before any registry write.
 */
export type TransferResult = { ok: true } | { ok: false; reason: string };

export interface ValueTransfer {
  transfer(amount: number, from: Identity, to: Identity): TransferResult;
}
