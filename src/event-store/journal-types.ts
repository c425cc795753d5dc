/**
 * Event Journal Types
 *
 * Append-only, hash-chained record of every event the registry emits.
 */

import { Identity, RegistryEvent } from '../registry/registry-types';

export const JOURNAL_DOMAIN_SEPARATOR = 'ITEM_ISSUER_EVT_V1';

export interface JournalEntry {
  sequence: number;          // 1-based, gap-free
  height: number;            // Height of the operation that emitted the event
  caller: Identity;
  event: RegistryEvent;
  prevHash: string;          // '' for the first entry
  hash: string;
}

/** Position of the chain tip, enough to resume hashing after a restart. */
export interface JournalHead {
  sequence: number;
  hash: string;
}

export type ChainVerification =
  | { valid: true; checked: number }
  | { valid: false; brokenAt: number; reason: string };
