/**
 * Event Journal
 *
 * Keeps the registry's events in emission order, each linked to the
 * previous one by hash, and fans them out to subscribers.
 *
 * Listeners get every entry on 'event' and on a channel named after the
 * event type ('item-minted', 'item-updated', ...). Entries handed out, to
 * listeners or through getEntries, are copies.
 *
 * Without `retainEntries` every entry stays in memory for the journal's
 * lifetime.
 */

import { EventEmitter } from 'events';
import { canonicalCborEncode, sha256 } from '../crypto';
import { EventSink, OperationContext, RegistryEvent } from '../registry/registry-types';
import { ChainVerification, JOURNAL_DOMAIN_SEPARATOR, JournalEntry, JournalHead } from './journal-types';

export function computeEntryHash(entry: Omit<JournalEntry, 'hash'>): string {
  const canonical = {
    sequence: entry.sequence,
    height: entry.height,
    caller: entry.caller,
    event: entry.event,
    prevHash: entry.prevHash,
  };

  const domainSep = Buffer.from(JOURNAL_DOMAIN_SEPARATOR, 'utf8');
  const delimiter = Buffer.from([0x00]);
  return sha256(Buffer.concat([domainSep, delimiter, canonicalCborEncode(canonical)]));
}

function copyEntry(entry: JournalEntry): JournalEntry {
  return { ...entry, event: { ...entry.event } };
}

/**
 * Check a run of entries that follows `base`: consecutive sequences, each
 * prevHash equal to the previous hash, each hash recomputed.
 */
export function verifyJournalEntries(entries: readonly JournalEntry[], base: JournalHead): ChainVerification {
  let prev = base;

  for (const entry of entries) {
    if (entry.sequence !== prev.sequence + 1) {
      return { valid: false, brokenAt: entry.sequence, reason: `Expected sequence ${prev.sequence + 1}` };
    }
    if (entry.prevHash !== prev.hash) {
      return { valid: false, brokenAt: entry.sequence, reason: 'prevHash does not match previous entry' };
    }
    const { hash, ...unsigned } = entry;
    if (computeEntryHash(unsigned) !== hash) {
      return { valid: false, brokenAt: entry.sequence, reason: 'Entry hash mismatch' };
    }
    prev = { sequence: entry.sequence, hash };
  }

  return { valid: true, checked: entries.length };
}

export interface EventJournalOptions {
  /**
   * Most recent entries kept in memory. Older entries are dropped and the
   * chain is then verified from the last dropped one. Unbounded when unset.
   */
  retainEntries?: number;
}

export class EventJournal extends EventEmitter implements EventSink {
  private entries: JournalEntry[] = [];
  private base: JournalHead;
  private head: JournalHead;
  private retainEntries?: number;

  /**
   * @param resumeFrom tip of a chain recorded by an earlier process; entries
   *   before it are not held in memory, only linked to.
   */
  constructor(resumeFrom?: JournalHead, options: EventJournalOptions = {}) {
    super();
    const { retainEntries } = options;
    if (retainEntries !== undefined && (!Number.isSafeInteger(retainEntries) || retainEntries < 1)) {
      throw new RangeError(`retainEntries must be a positive integer, got ${retainEntries}`);
    }
    this.retainEntries = retainEntries;
    this.base = resumeFrom ? { ...resumeFrom } : { sequence: 0, hash: '' };
    this.head = { ...this.base };
  }

  record(event: RegistryEvent, context: OperationContext): void {
    const unsigned: Omit<JournalEntry, 'hash'> = {
      sequence: this.head.sequence + 1,
      height: context.height,
      caller: context.caller,
      event: { ...event },
      prevHash: this.head.hash,
    };
    const entry: JournalEntry = { ...unsigned, hash: computeEntryHash(unsigned) };

    this.entries.push(entry);
    this.head = { sequence: entry.sequence, hash: entry.hash };
    this.trim();

    this.emit('event', copyEntry(entry));
    this.emit(event.type, copyEntry(entry));
  }

  getHead(): JournalHead {
    return { ...this.head };
  }

  /**
   * Copies of the entries held in memory with sequence >= fromSequence.
   */
  getEntries(fromSequence = 1): JournalEntry[] {
    return this.entries.filter(entry => entry.sequence >= fromSequence).map(copyEntry);
  }

  get length(): number {
    return this.entries.length;
  }

  /**
   * Recompute every held entry's hash and check each link, starting from
   * the head the journal was resumed from (or the last entry trimmed away).
   */
  verifyChain(): ChainVerification {
    return verifyJournalEntries(this.entries, this.base);
  }

  private trim(): void {
    if (this.retainEntries === undefined) return;
    const excess = this.entries.length - this.retainEntries;
    if (excess <= 0) return;

    const dropped = this.entries.splice(0, excess);
    const last = dropped[dropped.length - 1];
    this.base = { sequence: last.sequence, hash: last.hash };
  }
}
